/**
 * A single result as returned by the search provider, before scoring.
 */
export interface RawSearchResult {
  url: string;
  title: string;
  durationSec?: number;
  popularity?: number;
}

export interface SearchCandidate {
  readonly sourceUrl: string;
  readonly title: string;
  readonly durationSec: number;
  readonly popularity: number;
  readonly score: number;
}
