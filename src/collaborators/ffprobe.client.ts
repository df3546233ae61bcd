import { Logger } from '../services/logger.service';
import { errorMessage } from '../utils/errors';
import { ProcessRunner, runProcess } from './process-runner';
import { AudioMetricsClient } from './types';

export interface FfprobeOptions {
  binaryPath: string;
  timeoutMs: number;
}

/**
 * Audio metrics from ffprobe. Every failure reads as "unknown" (null).
 */
export class FfprobeClient implements AudioMetricsClient {
  private options: FfprobeOptions;

  constructor(
    private logger: Logger,
    options: Partial<FfprobeOptions> = {},
    private run: ProcessRunner = runProcess
  ) {
    this.options = { binaryPath: 'ffprobe', timeoutMs: 10000, ...options };
  }

  public async probeBitrateKbps(filePath: string): Promise<number | null> {
    const bitsPerSecond = await this.probe([
      '-v', 'error',
      '-select_streams', 'a:0',
      '-show_entries', 'stream=bit_rate',
      '-of', 'default=noprint_wrappers=1:nokey=1',
      filePath
    ]);

    return bitsPerSecond === null ? null : Math.floor(bitsPerSecond / 1000);
  }

  public async probeDurationSec(filePath: string): Promise<number | null> {
    return this.probe([
      '-v', 'error',
      '-show_entries', 'format=duration',
      '-of', 'default=noprint_wrappers=1:nokey=1',
      filePath
    ]);
  }

  private async probe(args: string[]): Promise<number | null> {
    try {
      const result = await this.run(this.options.binaryPath, args, { timeoutMs: this.options.timeoutMs });
      if (result.timedOut || result.exitCode !== 0) return null;

      const value = Number.parseFloat(result.stdout.trim());
      return Number.isFinite(value) && value > 0 ? value : null;
    } catch (error) {
      this.logger.debug(`ffprobe unavailable: ${errorMessage(error)}`);
      return null;
    }
  }
}
