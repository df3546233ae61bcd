import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { JobStage, JobStatus, ProgressStage, STAGES, isTerminal } from '../models/job.model';
import { InvalidTransitionError } from '../utils/errors';
import { Logger } from './logger.service';

export type AdvanceStage = Exclude<ProgressStage, JobStage.STARTING | JobStage.COMPLETE>;

/**
 * Owns the status record of every job. Stages only move forward; `complete`
 * and `error` are final.
 *
 * Every write builds a new frozen record and swaps it in, so readers always
 * see a whole transition. Readers get copies.
 *
 * Emits `change` with the new snapshot after each write.
 */
export class JobStatusTracker extends EventEmitter {
  private jobs: Map<string, JobStatus> = new Map();

  constructor(private logger: Logger) {
    super();
  }

  public create(jobId: string = uuidv4()): JobStatus {
    if (this.jobs.has(jobId)) {
      throw new InvalidTransitionError(`Job ${jobId} already exists`);
    }

    const info = STAGES[JobStage.STARTING];
    return this.write({
      jobId,
      stage: JobStage.STARTING,
      progressPercent: info.progressPercent,
      message: info.message,
      updatedAt: new Date()
    });
  }

  public advance(jobId: string, stage: AdvanceStage, message?: string): JobStatus {
    const current = this.requireActive(jobId);
    const info = STAGES[stage];

    if (current.stage === JobStage.ERROR || info.order <= STAGES[current.stage].order) {
      throw new InvalidTransitionError(`Job ${jobId} cannot move from ${current.stage} to ${stage}`);
    }

    return this.write({
      jobId,
      stage,
      progressPercent: info.progressPercent,
      message: message ?? info.message,
      updatedAt: new Date()
    });
  }

  public complete(jobId: string, artifactPath: string, message?: string): JobStatus {
    this.requireActive(jobId);
    if (!artifactPath) {
      throw new InvalidTransitionError(`Job ${jobId} cannot complete without an artifact path`);
    }

    const info = STAGES[JobStage.COMPLETE];
    return this.write({
      jobId,
      stage: JobStage.COMPLETE,
      progressPercent: info.progressPercent,
      message: message ?? info.message,
      artifactPath,
      updatedAt: new Date()
    });
  }

  public fail(jobId: string, error: string): JobStatus {
    const current = this.requireActive(jobId);
    const description = error.trim() || 'Unknown error';

    return this.write({
      jobId,
      stage: JobStage.ERROR,
      progressPercent: current.progressPercent,
      message: `Failed while ${current.stage}`,
      error: description,
      updatedAt: new Date()
    });
  }

  public get(jobId: string): JobStatus | undefined {
    const status = this.jobs.get(jobId);
    return status ? { ...status } : undefined;
  }

  public list(): JobStatus[] {
    return Array.from(this.jobs.values(), status => ({ ...status }));
  }

  public getCounts(): Record<JobStage, number> {
    const counts: Record<JobStage, number> = {
      [JobStage.STARTING]: 0,
      [JobStage.AUTHENTICATING]: 0,
      [JobStage.FETCHING]: 0,
      [JobStage.SEARCHING]: 0,
      [JobStage.DOWNLOADING]: 0,
      [JobStage.PROCESSING]: 0,
      [JobStage.COMPLETE]: 0,
      [JobStage.ERROR]: 0
    };

    for (const status of this.jobs.values()) {
      counts[status.stage]++;
    }
    return counts;
  }

  private requireActive(jobId: string): JobStatus {
    const current = this.jobs.get(jobId);
    if (!current) {
      throw new InvalidTransitionError(`Unknown job ${jobId}`);
    }
    if (isTerminal(current.stage)) {
      throw new InvalidTransitionError(`Job ${jobId} already finished with ${current.stage}`);
    }
    return current;
  }

  private write(status: JobStatus): JobStatus {
    const snapshot = Object.freeze(status);
    const previous = this.jobs.get(status.jobId);
    this.jobs.set(status.jobId, snapshot);

    if (previous?.stage !== snapshot.stage) {
      this.logger.debug(`Job ${snapshot.jobId}: ${previous?.stage ?? 'new'} -> ${snapshot.stage} (${snapshot.progressPercent}%)`);
    }

    this.emit('change', { ...snapshot });
    return { ...snapshot };
  }
}
