import { RawSearchResult } from '../models/candidate.model';
import { Logger } from '../services/logger.service';
import { UpstreamUnavailableError, errorMessage } from '../utils/errors';
import { ProcessRunner, runProcess } from './process-runner';
import { FetchClient, FetchOutcome, SearchClient } from './types';

export interface YtDlpOptions {
  binaryPath: string;
  searchTimeoutMs: number;
  audioFormat: string;
  ffmpegLocation?: string;
}

const DEFAULT_OPTIONS: YtDlpOptions = {
  binaryPath: 'yt-dlp',
  searchTimeoutMs: 30000,
  audioFormat: 'mp3'
};

function readString(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

function readNumber(record: Record<string, unknown>, key: string): number | undefined {
  const value = record[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
 * Turn `--dump-json` output (one JSON object per line) into search results.
 * Lines that are not JSON objects, or have neither url nor id, are skipped.
 */
export function parseSearchOutput(stdout: string): RawSearchResult[] {
  const results: RawSearchResult[] = [];

  for (const line of stdout.split('\n')) {
    if (!line.trim()) continue;

    let data: unknown;
    try {
      data = JSON.parse(line);
    } catch {
      continue;
    }
    if (typeof data !== 'object' || data === null || Array.isArray(data)) continue;

    const record: Record<string, unknown> = { ...data };
    const id = readString(record, 'id');
    const url = readString(record, 'url') ?? (id ? `https://www.youtube.com/watch?v=${id}` : undefined);
    if (!url) continue;

    results.push({
      url,
      title: readString(record, 'title') ?? 'Unknown',
      durationSec: readNumber(record, 'duration'),
      popularity: readNumber(record, 'view_count')
    });
  }

  return results;
}

/**
 * Search and fetch through the yt-dlp command line tool.
 */
export class YtDlpClient implements SearchClient, FetchClient {
  private options: YtDlpOptions;

  constructor(
    private logger: Logger,
    options: Partial<YtDlpOptions> = {},
    private run: ProcessRunner = runProcess
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  public async search(query: string, maxResults: number): Promise<RawSearchResult[]> {
    const args = [
      `ytsearch${maxResults}:${query}`,
      '--dump-json',
      '--flat-playlist',
      '--no-warnings',
      '--quiet'
    ];

    const result = await this.invoke(args, this.options.searchTimeoutMs);

    if (result.timedOut) {
      this.logger.warn(`Search timed out: ${query}`);
      return [];
    }
    if (result.exitCode !== 0) {
      this.logger.debug(`Search exited with ${result.exitCode} for "${query}": ${result.stderr.trim()}`);
      return [];
    }

    return parseSearchOutput(result.stdout);
  }

  public async fetch(sourceUrl: string, outputTemplate: string, timeoutMs: number): Promise<FetchOutcome> {
    const args = [
      sourceUrl,
      '-x',
      '-f', 'bestaudio/best',
      '--audio-format', this.options.audioFormat,
      '--audio-quality', '0',
      '-o', outputTemplate,
      '--no-playlist',
      '--no-warnings',
      '--quiet'
    ];
    if (this.options.ffmpegLocation) {
      args.push('--ffmpeg-location', this.options.ffmpegLocation);
    }

    const result = await this.invoke(args, timeoutMs);

    if (result.timedOut) {
      return { status: 'timeout', detail: `Download timed out after ${timeoutMs}ms` };
    }
    if (result.exitCode !== 0) {
      return { status: 'failed', detail: `Download failed: ${result.stderr.trim() || `exit code ${result.exitCode}`}` };
    }
    return { status: 'success' };
  }

  private async invoke(args: string[], timeoutMs: number) {
    try {
      return await this.run(this.options.binaryPath, args, { timeoutMs });
    } catch (error) {
      throw new UpstreamUnavailableError(
        'connectivity',
        `Could not run ${this.options.binaryPath}: ${errorMessage(error)}`
      );
    }
  }
}
