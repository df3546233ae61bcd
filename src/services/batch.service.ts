import { EventEmitter } from 'events';
import { BatchItem, BatchItemResult, acquisitionFailure } from '../models/job.model';
import { TrackDescriptor } from '../models/track.model';
import { FailureReason, TrackFetchError, errorMessage } from '../utils/errors';
import { AcquisitionService } from './acquisition.service';
import { Logger } from './logger.service';
import { SearchService } from './search.service';

export const DEFAULT_CONCURRENCY = 4;

export interface BatchStats {
  total: number;
  queued: number;
  active: number;
  completed: number;
  failed: number;
  peakActive: number;
}

export interface BatchSummary {
  total: number;
  succeeded: number;
  failed: number;
  failures: Array<{ filename: string; error: string }>;
}

/**
 * Runs acquisitions through a fixed number of workers. One batch at a time:
 * stats and events describe the batch in flight.
 *
 * Events: `start` (item), `complete` (result, item), `fail` (result, item),
 * `progress` (stats).
 */
export class BatchCoordinator extends EventEmitter {
  private stats: BatchStats = BatchCoordinator.emptyStats();
  private busy = false;

  constructor(
    private logger: Logger,
    private acquisitionService: AcquisitionService,
    private searchService: SearchService
  ) {
    super();
  }

  private static emptyStats(total: number = 0): BatchStats {
    return { total, queued: total, active: 0, completed: 0, failed: 0, peakActive: 0 };
  }

  public getStats(): BatchStats {
    return { ...this.stats };
  }

  /**
   * Acquire every item with at most `concurrency` in flight. Resolves with one
   * result per item, in completion order; a failing item never stops the rest.
   */
  public async run(items: BatchItem[], concurrency: number = DEFAULT_CONCURRENCY): Promise<BatchItemResult[]> {
    return this.exclusive(() => this.runItems(items, concurrency));
  }

  private async runItems(items: BatchItem[], concurrency: number): Promise<BatchItemResult[]> {
    const workerCount = Math.max(1, Math.min(Math.floor(concurrency) || 1, items.length));
    const queue = [...items];
    const results: BatchItemResult[] = [];

    this.stats = BatchCoordinator.emptyStats(items.length);
    this.logger.info(`Downloading ${items.length} tracks with ${workerCount} workers`);

    const worker = async (): Promise<void> => {
      let item = queue.shift();
      while (item) {
        results.push(await this.runItem(item));
        item = queue.shift();
      }
    };

    await Promise.all(Array.from({ length: items.length === 0 ? 0 : workerCount }, () => worker()));

    this.logger.info(`Batch finished: ${this.stats.completed} downloaded, ${this.stats.failed} failed`);
    return results;
  }

  /**
   * Search every track one after another, then acquire the matches concurrently.
   * Tracks without a match get a failure result without any fetch. Results
   * come back in the order the descriptors were given.
   */
  public async resolveAndAcquire(
    descriptors: TrackDescriptor[],
    concurrency: number = DEFAULT_CONCURRENCY
  ): Promise<BatchItemResult[]> {
    return this.exclusive(() => this.resolveThenAcquire(descriptors, concurrency));
  }

  private async resolveThenAcquire(descriptors: TrackDescriptor[], concurrency: number): Promise<BatchItemResult[]> {
    const matched: BatchItem[] = [];
    const unmatched: BatchItemResult[] = [];

    for (const [index, descriptor] of descriptors.entries()) {
      this.logger.info(`[${index + 1}/${descriptors.length}] ${descriptor.artist} - ${descriptor.name}`);

      try {
        const candidate = await this.searchService.findBestMatch(descriptor);
        if (candidate) {
          matched.push({ candidate, descriptor });
        } else {
          unmatched.push({
            descriptor,
            result: acquisitionFailure(FailureReason.NO_MATCH_FOUND, `No match found for: ${descriptor.name}`)
          });
        }
      } catch (error) {
        const reason = error instanceof TrackFetchError && error.code !== 'INVALID_TRANSITION'
          ? error.code
          : FailureReason.UPSTREAM_UNAVAILABLE;
        this.logger.error(`Search failed for ${descriptor.filename}: ${errorMessage(error)}`);
        unmatched.push({ descriptor, result: acquisitionFailure(reason, errorMessage(error)) });
      }
    }

    const acquired = await this.runItems(matched, concurrency);
    return inSubmissionOrder([...unmatched, ...acquired], descriptors);
  }

  private async exclusive<T>(task: () => Promise<T>): Promise<T> {
    if (this.busy) {
      throw new Error('A batch is already running on this coordinator');
    }

    this.busy = true;
    try {
      return await task();
    } finally {
      this.busy = false;
    }
  }

  private async runItem(item: BatchItem): Promise<BatchItemResult> {
    const { candidate, descriptor } = item;
    this.markStarted();
    this.emit('start', item);

    let outcome: BatchItemResult;
    try {
      const result = await this.acquisitionService.acquire(candidate, descriptor);
      outcome = { descriptor, candidate, result };
    } catch (error) {
      outcome = {
        descriptor,
        candidate,
        result: acquisitionFailure(FailureReason.FETCH_FAILED, errorMessage(error))
      };
    }

    this.markFinished(outcome.result.success);

    if (outcome.result.success) {
      this.logger.info(`Downloaded: ${descriptor.filename}`);
      this.emit('complete', outcome, item);
    } else {
      this.logger.error(`Failed: ${descriptor.filename} - ${outcome.result.error}`);
      this.emit('fail', outcome, item);
    }
    this.emit('progress', this.getStats());

    return outcome;
  }

  private markStarted(): void {
    this.stats.queued--;
    this.stats.active++;
    this.stats.peakActive = Math.max(this.stats.peakActive, this.stats.active);
  }

  private markFinished(success: boolean): void {
    this.stats.active--;
    if (success) {
      this.stats.completed++;
    } else {
      this.stats.failed++;
    }
  }
}

function inSubmissionOrder(results: BatchItemResult[], submitted: TrackDescriptor[]): BatchItemResult[] {
  const order = new Map<TrackDescriptor, number>();
  submitted.forEach((descriptor, index) => order.set(descriptor, index));

  // Unknown descriptors sort last; Array#sort is stable so they keep their order
  const rank = (item: BatchItemResult) => order.get(item.descriptor) ?? Number.MAX_SAFE_INTEGER;
  return [...results].sort((a, b) => rank(a) - rank(b));
}

/**
 * Count results and list failures in the order the tracks were submitted.
 * Without `submitted`, failures keep the order of `results`.
 */
export function summarize(results: BatchItemResult[], submitted?: TrackDescriptor[]): BatchSummary {
  const failures = (submitted ? inSubmissionOrder(results, submitted) : results)
    .filter(item => !item.result.success)
    .map(item => ({ filename: item.descriptor.filename, error: item.result.error ?? 'Unknown error' }));

  return {
    total: results.length,
    succeeded: results.length - failures.length,
    failed: failures.length,
    failures
  };
}
