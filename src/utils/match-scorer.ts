import { RawSearchResult, SearchCandidate } from '../models/candidate.model';
import { TrackDescriptor } from '../models/track.model';

export interface ScoringOptions {
  durationTolerance: number; // Relative duration difference still counted as a match
}

export const DEFAULT_SCORING_OPTIONS: ScoringOptions = {
  durationTolerance: 0.3
};

const TITLE_WEIGHT = 0.5;
const DURATION_WEIGHT = 0.25;
const POPULARITY_WEIGHT = 0.15;
const KEYWORD_WEIGHT = 0.1;

// Flat credits added to the total when a signal is missing
const UNKNOWN_DURATION_CREDIT = 0.1;
const UNKNOWN_POPULARITY_CREDIT = 0.05;

const MIN_SCORE = 0.1;
const MAX_SCORE = 1.0;

const POSITIVE_KEYWORDS = ['official', 'audio', 'lyrics', 'hd', 'hq', 'full'];
const NEGATIVE_KEYWORDS = ['cover', 'remix', 'live', 'karaoke', 'instrumental', 'acoustic', 'slowed', 'reverb'];

function titleScore(title: string, artist: string, trackName: string): number {
  let score = 0;

  for (const word of [...artist.split(/\s+/), ...trackName.split(/\s+/)]) {
    if (word.length > 2 && title.includes(word)) {
      score += 0.25;
    }
  }

  return Math.min(1, score);
}

function durationScore(durationSec: number, targetSec: number, tolerance: number): number {
  const diff = Math.abs(durationSec - targetSec) / Math.max(targetSec, 1);

  if (diff <= tolerance) {
    return 1 - diff / tolerance;
  }
  return Math.max(0, 0.5 - diff * 0.3);
}

function popularityScore(popularity: number): number {
  return Math.min(1, Math.log10(popularity + 1) / 8);
}

function keywordScore(title: string, trackName: string): number {
  let score = 0.5;

  for (const keyword of POSITIVE_KEYWORDS) {
    if (title.includes(keyword)) {
      score = Math.min(1, score + 0.1);
    }
  }

  // A track that is itself called "Live" or "Acoustic" is not penalized for it
  for (const keyword of NEGATIVE_KEYWORDS) {
    if (title.includes(keyword) && !trackName.includes(keyword)) {
      score = Math.max(0, score - 0.15);
    }
  }

  return score;
}

/**
 * Score a search result against the track it should match, in [0.1, 1.0].
 */
export function scoreCandidate(
  result: Pick<RawSearchResult, 'title' | 'durationSec' | 'popularity'>,
  track: TrackDescriptor,
  options: ScoringOptions = DEFAULT_SCORING_OPTIONS
): number {
  const title = result.title.toLowerCase();
  const artist = track.artist.toLowerCase();
  const trackName = track.name.toLowerCase();
  const targetSec = track.durationMs / 1000;

  let score = titleScore(title, artist, trackName) * TITLE_WEIGHT;

  const durationSec = result.durationSec ?? 0;
  if (durationSec > 0 && targetSec > 0) {
    score += durationScore(durationSec, targetSec, options.durationTolerance) * DURATION_WEIGHT;
  } else {
    score += UNKNOWN_DURATION_CREDIT;
  }

  const popularity = result.popularity ?? 0;
  if (popularity > 0) {
    score += popularityScore(popularity) * POPULARITY_WEIGHT;
  } else {
    score += UNKNOWN_POPULARITY_CREDIT;
  }

  score += keywordScore(title, trackName) * KEYWORD_WEIGHT;

  return Math.min(MAX_SCORE, Math.max(MIN_SCORE, score));
}

export function toCandidate(
  result: RawSearchResult,
  track: TrackDescriptor,
  options: ScoringOptions = DEFAULT_SCORING_OPTIONS
): SearchCandidate {
  return Object.freeze({
    sourceUrl: result.url,
    title: result.title,
    durationSec: result.durationSec || Math.floor(track.durationMs / 1000),
    popularity: result.popularity ?? 0,
    score: scoreCandidate(result, track, options)
  });
}

/**
 * Score every result and return them best first. Ties keep provider order.
 */
export function rankCandidates(
  results: RawSearchResult[],
  track: TrackDescriptor,
  options: ScoringOptions = DEFAULT_SCORING_OPTIONS
): SearchCandidate[] {
  return results
    .map(result => toCandidate(result, track, options))
    .sort((a, b) => b.score - a.score);
}
