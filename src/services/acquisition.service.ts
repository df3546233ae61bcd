import * as path from 'path';
import { AudioMetricsClient, FetchClient } from '../collaborators/types';
import { SearchCandidate } from '../models/candidate.model';
import {
  AcquisitionResult,
  acquisitionFailure,
  acquisitionSuccess
} from '../models/job.model';
import { TrackDescriptor } from '../models/track.model';
import {
  ArtifactMissingError,
  FailureReason,
  FetchFailedError,
  TrackFetchError,
  ValidationFailedError,
  errorMessage
} from '../utils/errors';
import { FileService } from './file.service';
import { Logger } from './logger.service';

export interface AcquisitionOptions {
  outputDir: string;
  audioFormat: string;
  fetchTimeoutMs: number;
  minFileSizeBytes: number;
  minBitrateKbps: number;
  fallbackBitrateKbps: number;   // Assumed when neither bitrate nor duration can be probed
}

export const DEFAULT_ACQUISITION_OPTIONS: AcquisitionOptions = {
  outputDir: 'downloads',
  audioFormat: 'mp3',
  fetchTimeoutMs: 300000,
  minFileSizeBytes: 500000,
  minBitrateKbps: 128,
  fallbackBitrateKbps: 192
};

// Length of the filename prefix used to find an artifact saved under another name
const PREFIX_MATCH_LENGTH = 20;

export interface ValidationReport {
  valid: boolean;
  fileSizeBytes: number;
  bitrateKbps: number;
}

/**
 * Fetches the audio for a chosen candidate and checks it meets the quality
 * thresholds. Expected failures come back as unsuccessful results.
 */
export class AcquisitionService {
  private options: AcquisitionOptions;

  constructor(
    private logger: Logger,
    private fileService: FileService,
    private fetchClient: FetchClient,
    private metricsClient: AudioMetricsClient,
    options: Partial<AcquisitionOptions> = {}
  ) {
    this.options = { ...DEFAULT_ACQUISITION_OPTIONS, ...options };
  }

  public get outputDir(): string {
    return this.options.outputDir;
  }

  public artifactPathFor(track: TrackDescriptor): string {
    return path.join(this.options.outputDir, `${track.filename}.${this.options.audioFormat}`);
  }

  public async acquire(candidate: SearchCandidate, track: TrackDescriptor): Promise<AcquisitionResult> {
    const finalPath = this.artifactPathFor(track);

    try {
      await this.fileService.ensureDirectory(this.options.outputDir);

      const existing = await this.checkExisting(finalPath);
      if (existing) {
        this.logger.info(`Already exists: ${track.filename}`);
        return existing;
      }

      const present = new Set(await this.fileService.listFiles(this.options.outputDir));
      await this.fetch(candidate, track);
      await this.locateArtifact(track, finalPath, present);

      const report = await this.validate(finalPath);
      if (!report.valid) {
        await this.fileService.deleteFile(finalPath);
        throw new ValidationFailedError(report.fileSizeBytes, report.bitrateKbps);
      }

      await this.fileService.removeSiblings(this.options.outputDir, track.filename, finalPath);
      this.logger.info(`Downloaded ${track.filename} (${report.fileSizeBytes} bytes, ${report.bitrateKbps} kbps)`);
      return acquisitionSuccess(finalPath, report.fileSizeBytes, report.bitrateKbps);
    } catch (error) {
      await this.fileService.removeSiblings(this.options.outputDir, track.filename);
      const result = toFailure(error);
      this.logger.warn(`Acquisition failed for ${track.filename}: ${result.error}`);
      return result;
    }
  }

  /**
   * Size first, then bitrate. A file under the size threshold is not probed.
   */
  public async validate(filePath: string): Promise<ValidationReport> {
    const { exists, size } = await this.fileService.getFileInfo(filePath);
    if (!exists || size < this.options.minFileSizeBytes) {
      return { valid: false, fileSizeBytes: size, bitrateKbps: 0 };
    }

    const bitrateKbps = await this.measureBitrate(filePath, size);
    return {
      valid: bitrateKbps >= this.options.minBitrateKbps,
      fileSizeBytes: size,
      bitrateKbps
    };
  }

  public async measureBitrate(filePath: string, fileSizeBytes: number): Promise<number> {
    const probed = await this.metricsClient.probeBitrateKbps(filePath);
    if (probed !== null) {
      return probed;
    }

    const durationSec = await this.metricsClient.probeDurationSec(filePath);
    if (durationSec !== null && durationSec > 0) {
      return Math.floor((fileSizeBytes * 8) / (durationSec * 1000));
    }

    this.logger.debug(`Could not measure bitrate of ${filePath}, assuming ${this.options.fallbackBitrateKbps} kbps`);
    return this.options.fallbackBitrateKbps;
  }

  /**
   * Delete every file in the output directory that fails validation.
   */
  public async cleanupInvalidArtifacts(): Promise<number> {
    let removed = 0;

    for (const name of await this.fileService.listFiles(this.options.outputDir)) {
      const filePath = path.join(this.options.outputDir, name);
      const report = await this.validate(filePath);
      if (!report.valid && await this.fileService.deleteFile(filePath)) {
        this.logger.info(`Removed invalid file ${name} (size: ${report.fileSizeBytes}, bitrate: ${report.bitrateKbps})`);
        removed++;
      }
    }

    return removed;
  }

  private async checkExisting(finalPath: string): Promise<AcquisitionResult | null> {
    const { exists } = await this.fileService.getFileInfo(finalPath);
    if (!exists) return null;

    const report = await this.validate(finalPath);
    if (report.valid) {
      return acquisitionSuccess(finalPath, report.fileSizeBytes, report.bitrateKbps);
    }

    this.logger.info(`Existing file is invalid, downloading again: ${finalPath}`);
    await this.fileService.deleteFile(finalPath);
    return null;
  }

  private async fetch(candidate: SearchCandidate, track: TrackDescriptor): Promise<void> {
    const template = path.join(this.options.outputDir, `${track.filename}.%(ext)s`);
    this.logger.debug(`Fetching ${candidate.sourceUrl} for ${track.filename}`);

    const outcome = await this.fetchClient.fetch(candidate.sourceUrl, template, this.options.fetchTimeoutMs);

    switch (outcome.status) {
      case 'success':
        return;
      case 'timeout':
        throw new FetchFailedError(outcome.detail ?? 'Download timed out', true);
      case 'failed':
        throw new FetchFailedError(outcome.detail ?? 'Download failed');
    }
  }

  /**
   * Make sure the artifact sits at `finalPath`. A file saved under another name
   * is only taken when it appeared during this fetch and its name is this
   * track's filename, extended or truncated; files of other tracks that share
   * the prefix are left alone.
   */
  private async locateArtifact(track: TrackDescriptor, finalPath: string, present: Set<string>): Promise<void> {
    if ((await this.fileService.getFileInfo(finalPath)).exists) return;

    const extension = `.${this.options.audioFormat}`;
    const fallback = await this.fileService.findByPrefix(
      this.options.outputDir,
      track.filename.slice(0, PREFIX_MATCH_LENGTH),
      extension,
      name => !present.has(name) && isNameOf(name.slice(0, -extension.length), track.filename)
    );

    if (fallback) {
      this.logger.debug(`Renaming ${path.basename(fallback)} to ${path.basename(finalPath)}`);
      await this.fileService.moveFile(fallback, finalPath);
      return;
    }

    throw new ArtifactMissingError(finalPath);
  }
}

function isNameOf(stem: string, filename: string): boolean {
  return stem.startsWith(filename) || filename.startsWith(stem);
}

function toFailure(error: unknown): AcquisitionResult {
  if (error instanceof ValidationFailedError) {
    return acquisitionFailure(FailureReason.VALIDATION_FAILED, error.message, error.fileSizeBytes, error.bitrateKbps);
  }
  if (error instanceof TrackFetchError && error.code !== 'INVALID_TRANSITION') {
    return acquisitionFailure(error.code, error.message);
  }
  return acquisitionFailure(FailureReason.FETCH_FAILED, errorMessage(error));
}
