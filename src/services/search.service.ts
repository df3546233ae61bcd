import { SearchClient } from '../collaborators/types';
import { SearchCandidate } from '../models/candidate.model';
import { TrackDescriptor } from '../models/track.model';
import { NoMatchFoundError } from '../utils/errors';
import { rankCandidates } from '../utils/match-scorer';
import { generateQueries } from '../utils/query-generator';
import { RateLimiter } from '../utils/rate-limiter';
import { sleep } from '../utils/retry-policy';
import { Logger } from './logger.service';

export interface SearchServiceOptions {
  maxRetries: number;          // Queries tried before falling back
  maxResults: number;          // Results requested per query
  minAcceptScore: number;      // Score at which a match is taken immediately
  emptyBackoffMs: number;      // Pause between attempts
  durationTolerance: number;
}

export const DEFAULT_SEARCH_OPTIONS: SearchServiceOptions = {
  maxRetries: 5,
  maxResults: 10,
  minAcceptScore: 0.3,
  emptyBackoffMs: 300,
  durationTolerance: 0.3
};

/**
 * Walks the query ladder for one track until a candidate clears the
 * acceptance score, falling back to the best candidate seen overall.
 *
 * A weak early match that clears `minAcceptScore` wins over a stronger one a
 * later query might have found; raise the score to trade latency for recall.
 */
export class SearchService {
  private options: SearchServiceOptions;

  constructor(
    private logger: Logger,
    private searchClient: SearchClient,
    options: Partial<SearchServiceOptions> = {},
    private rateLimiter?: RateLimiter
  ) {
    this.options = { ...DEFAULT_SEARCH_OPTIONS, ...options };
  }

  public async findBestMatch(track: TrackDescriptor): Promise<SearchCandidate | null> {
    const { maxRetries, maxResults, minAcceptScore, emptyBackoffMs, durationTolerance } = this.options;
    const queries = generateQueries(track).slice(0, maxRetries);
    let best: SearchCandidate | null = null;

    for (const [index, query] of queries.entries()) {
      this.logger.info(`Searching (${index + 1}/${queries.length}): ${query}`);

      if (this.rateLimiter) {
        await this.rateLimiter.removeTokens(1);
      }

      const results = await this.searchClient.search(query, maxResults);
      if (results.length === 0) {
        await this.pause(index, queries.length, emptyBackoffMs);
        continue;
      }

      const [attemptBest] = rankCandidates(results, track, { durationTolerance });
      if (!best || attemptBest.score > best.score) {
        best = attemptBest;
      }

      if (attemptBest.score >= minAcceptScore) {
        this.logger.info(`Found match: ${attemptBest.title} (score: ${attemptBest.score.toFixed(2)})`);
        return attemptBest;
      }

      await this.pause(index, queries.length, emptyBackoffMs);
    }

    if (best) {
      this.logger.warn(`Using best available match: ${best.title} (score: ${best.score.toFixed(2)})`);
      return best;
    }

    this.logger.warn(`No match found for: ${track.name}`);
    return null;
  }

  public async findBestMatchOrThrow(track: TrackDescriptor): Promise<SearchCandidate> {
    const match = await this.findBestMatch(track);
    if (!match) {
      throw new NoMatchFoundError(track.name);
    }
    return match;
  }

  private async pause(index: number, total: number, ms: number): Promise<void> {
    // Nothing left to wait for after the last query
    if (ms > 0 && index < total - 1) {
      await sleep(ms);
    }
  }
}
