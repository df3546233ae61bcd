import { FailureReason } from '../utils/errors';
import { SearchCandidate } from './candidate.model';
import { TrackDescriptor } from './track.model';

export enum JobStage {
  STARTING = 'starting',
  AUTHENTICATING = 'authenticating',
  FETCHING = 'fetching',
  SEARCHING = 'searching',
  DOWNLOADING = 'downloading',
  PROCESSING = 'processing',
  COMPLETE = 'complete',
  ERROR = 'error'
}

export interface StageInfo {
  order: number;
  progressPercent: number;
  message: string;
}

export type ProgressStage = Exclude<JobStage, JobStage.ERROR>;

// A failed job keeps the percentage it had reached, so ERROR has no entry here
export const STAGES: Record<ProgressStage, StageInfo> = {
  [JobStage.STARTING]: { order: 0, progressPercent: 0, message: 'Initializing...' },
  [JobStage.AUTHENTICATING]: { order: 1, progressPercent: 10, message: 'Connecting to catalog...' },
  [JobStage.FETCHING]: { order: 2, progressPercent: 20, message: 'Fetching track metadata...' },
  [JobStage.SEARCHING]: { order: 3, progressPercent: 40, message: 'Searching for audio source...' },
  [JobStage.DOWNLOADING]: { order: 4, progressPercent: 60, message: 'Downloading audio...' },
  [JobStage.PROCESSING]: { order: 5, progressPercent: 85, message: 'Finalizing audio file...' },
  [JobStage.COMPLETE]: { order: 6, progressPercent: 100, message: 'Download complete!' }
};

export function isTerminal(stage: JobStage): boolean {
  return stage === JobStage.COMPLETE || stage === JobStage.ERROR;
}

export interface JobStatus {
  readonly jobId: string;
  readonly stage: JobStage;
  readonly progressPercent: number;
  readonly message: string;
  readonly artifactPath?: string;
  readonly error?: string;
  readonly updatedAt: Date;
}

export interface AcquisitionResult {
  readonly success: boolean;
  readonly artifactPath?: string;
  readonly fileSizeBytes: number;
  readonly bitrateKbps: number;
  readonly error?: string;
  readonly reason?: FailureReason;
}

export function acquisitionSuccess(
  artifactPath: string,
  fileSizeBytes: number,
  bitrateKbps: number
): AcquisitionResult {
  return Object.freeze({ success: true, artifactPath, fileSizeBytes, bitrateKbps });
}

export function acquisitionFailure(
  reason: FailureReason,
  error: string,
  fileSizeBytes: number = 0,
  bitrateKbps: number = 0
): AcquisitionResult {
  return Object.freeze({ success: false, fileSizeBytes, bitrateKbps, error, reason });
}

export interface BatchItem {
  candidate: SearchCandidate;
  descriptor: TrackDescriptor;
}

export interface BatchItemResult {
  descriptor: TrackDescriptor;
  candidate?: SearchCandidate;
  result: AcquisitionResult;
}
