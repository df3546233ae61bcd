import { RawSearchResult } from '../models/candidate.model';
import { TrackDescriptor } from '../models/track.model';

export interface CatalogClient {
  authenticate(): Promise<boolean>;
  /** `null` when the catalog has no such track. */
  resolveTrack(urlOrUri: string): Promise<TrackDescriptor | null>;
  /** Every track of a playlist or album. */
  resolveCollection(urlOrUri: string): Promise<TrackDescriptor[]>;
}

export interface SearchClient {
  /** An empty list means no results, not an error. */
  search(query: string, maxResults: number): Promise<RawSearchResult[]>;
}

export type FetchStatus = 'success' | 'failed' | 'timeout';

export interface FetchOutcome {
  status: FetchStatus;
  detail?: string;
}

export interface FetchClient {
  fetch(sourceUrl: string, outputTemplate: string, timeoutMs: number): Promise<FetchOutcome>;
}

export interface AudioMetricsClient {
  probeBitrateKbps(filePath: string): Promise<number | null>;
  probeDurationSec(filePath: string): Promise<number | null>;
}

/**
 * Runs on a validated artifact before a job completes (tag embedding, normalization).
 */
export interface ArtifactProcessor {
  process(artifactPath: string, track: TrackDescriptor): Promise<void>;
}
