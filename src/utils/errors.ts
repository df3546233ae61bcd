export enum FailureReason {
  NO_MATCH_FOUND = 'NO_MATCH_FOUND',
  FETCH_FAILED = 'FETCH_FAILED',
  VALIDATION_FAILED = 'VALIDATION_FAILED',
  ARTIFACT_MISSING = 'ARTIFACT_MISSING',
  UPSTREAM_UNAVAILABLE = 'UPSTREAM_UNAVAILABLE'
}

export class TrackFetchError extends Error {
  constructor(public readonly code: FailureReason | 'INVALID_TRANSITION', message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class NoMatchFoundError extends TrackFetchError {
  constructor(trackName: string) {
    super(FailureReason.NO_MATCH_FOUND, `No match found for: ${trackName}`);
  }
}

export class FetchFailedError extends TrackFetchError {
  constructor(message: string, public readonly timedOut: boolean = false) {
    super(FailureReason.FETCH_FAILED, message);
  }
}

export class ValidationFailedError extends TrackFetchError {
  constructor(
    public readonly fileSizeBytes: number,
    public readonly bitrateKbps: number
  ) {
    super(
      FailureReason.VALIDATION_FAILED,
      `File validation failed (size: ${fileSizeBytes}, bitrate: ${bitrateKbps})`
    );
  }
}

export class ArtifactMissingError extends TrackFetchError {
  constructor(expectedPath: string) {
    super(FailureReason.ARTIFACT_MISSING, `Output file not found after download: ${expectedPath}`);
  }
}

export type UpstreamFailureKind = 'auth' | 'rate-limit' | 'transient' | 'connectivity';

export class UpstreamUnavailableError extends TrackFetchError {
  constructor(
    public readonly kind: UpstreamFailureKind,
    message: string,
    public readonly retryAfterMs?: number
  ) {
    super(FailureReason.UPSTREAM_UNAVAILABLE, message);
  }
}

export class InvalidTransitionError extends TrackFetchError {
  constructor(message: string) {
    super('INVALID_TRANSITION', message);
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}
