import { ArtifactProcessor, CatalogClient } from '../collaborators/types';
import { BatchItemResult, JobStage, JobStatus } from '../models/job.model';
import { errorMessage } from '../utils/errors';
import { AcquisitionService } from './acquisition.service';
import { BatchCoordinator, DEFAULT_CONCURRENCY } from './batch.service';
import { JobStatusTracker } from './job-status.service';
import { Logger } from './logger.service';
import { SearchService } from './search.service';

export interface JobServiceDeps {
  catalog: CatalogClient;
  searchService: SearchService;
  acquisitionService: AcquisitionService;
  batchCoordinator: BatchCoordinator;
  tracker: JobStatusTracker;
  processor?: ArtifactProcessor;
}

class JobFailure extends Error {}

/**
 * Accepts track requests, runs each one in the background and exposes its
 * status. Every job ends in `complete` or `error`.
 */
export class JobService {
  private running: Map<string, Promise<JobStatus>> = new Map();

  constructor(private logger: Logger, private deps: JobServiceDeps) {}

  public submit(urlOrUri: string): string {
    const { jobId } = this.deps.tracker.create();
    this.logger.info(`Accepted job ${jobId} for ${urlOrUri}`);

    const job = this.process(jobId, urlOrUri).finally(() => this.running.delete(jobId));
    this.running.set(jobId, job);
    return jobId;
  }

  public getStatus(jobId: string): JobStatus | undefined {
    return this.deps.tracker.get(jobId);
  }

  /**
   * Resolves with the final snapshot of a job.
   */
  public async waitForJob(jobId: string): Promise<JobStatus | undefined> {
    const job = this.running.get(jobId);
    return job ? job : this.getStatus(jobId);
  }

  /**
   * Resolve a playlist or album and download every track in it.
   */
  public async runCollection(urlOrUri: string, concurrency: number = DEFAULT_CONCURRENCY): Promise<BatchItemResult[]> {
    const { catalog, batchCoordinator } = this.deps;

    if (!await catalog.authenticate()) {
      throw new Error('Failed to authenticate with catalog');
    }

    const tracks = await catalog.resolveCollection(urlOrUri);
    this.logger.info(`Resolved ${tracks.length} tracks from ${urlOrUri}`);
    return batchCoordinator.resolveAndAcquire(tracks, concurrency);
  }

  private async process(jobId: string, urlOrUri: string): Promise<JobStatus> {
    const { catalog, searchService, acquisitionService, tracker, processor } = this.deps;

    try {
      tracker.advance(jobId, JobStage.AUTHENTICATING);
      if (!await catalog.authenticate()) {
        throw new JobFailure('Failed to authenticate with catalog');
      }

      tracker.advance(jobId, JobStage.FETCHING);
      const track = await catalog.resolveTrack(urlOrUri);
      if (!track) {
        throw new JobFailure('Could not fetch track information');
      }

      tracker.advance(jobId, JobStage.SEARCHING, `Searching for ${track.artist} - ${track.name}...`);
      const candidate = await searchService.findBestMatch(track);
      if (!candidate) {
        throw new JobFailure('Could not find a matching audio source');
      }

      tracker.advance(jobId, JobStage.DOWNLOADING);
      const result = await acquisitionService.acquire(candidate, track);
      if (!result.success || !result.artifactPath) {
        throw new JobFailure(result.error || 'Download failed');
      }

      tracker.advance(jobId, JobStage.PROCESSING);
      if (processor) {
        await processor.process(result.artifactPath, track);
      }

      const done = tracker.complete(jobId, result.artifactPath);
      this.logger.info(`Job ${jobId} complete: ${result.artifactPath}`);
      return done;
    } catch (error) {
      const message = errorMessage(error);
      if (!(error instanceof JobFailure)) {
        this.logger.error(`Job ${jobId} crashed: ${error instanceof Error && error.stack ? error.stack : message}`);
      } else {
        this.logger.warn(`Job ${jobId} failed: ${message}`);
      }
      return tracker.fail(jobId, message);
    }
  }
}
