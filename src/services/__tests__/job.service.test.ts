import * as path from 'path';
import { ArtifactProcessor, CatalogClient } from '../../collaborators/types';
import { JobStage, JobStatus } from '../../models/job.model';
import { TrackDescriptor } from '../../models/track.model';
import {
  FakeFetchClient,
  FakeMetricsClient,
  FakeSearchClient,
  makeTempDir,
  makeTrack,
  removeTempDir
} from '../../test-utils/fixtures';
import { AcquisitionService } from '../acquisition.service';
import { BatchCoordinator } from '../batch.service';
import { FileService } from '../file.service';
import { JobStatusTracker } from '../job-status.service';
import { JobService } from '../job.service';
import { silentLogger } from '../logger.service';
import { SearchService } from '../search.service';

class FakeCatalog implements CatalogClient {
  public authenticated = true;
  public tracks: Record<string, TrackDescriptor> = {};
  public collections: Record<string, TrackDescriptor[]> = {};

  async authenticate(): Promise<boolean> {
    return this.authenticated;
  }

  async resolveTrack(urlOrUri: string): Promise<TrackDescriptor | null> {
    return this.tracks[urlOrUri] ?? null;
  }

  async resolveCollection(urlOrUri: string): Promise<TrackDescriptor[]> {
    return this.collections[urlOrUri] ?? [];
  }
}

const TRACK_URL = 'https://open.spotify.com/track/track-1';
const MATCH = { url: 'https://video.example/watch?v=abc', title: 'Aurora Fields - Northern Lights', durationSec: 240 };

describe('JobService', () => {
  let dir: string;
  let catalog: FakeCatalog;
  let searchClient: FakeSearchClient;
  let fetchClient: FakeFetchClient;
  let tracker: JobStatusTracker;
  let seen: JobStatus[];

  beforeEach(async () => {
    dir = await makeTempDir();
    catalog = new FakeCatalog();
    catalog.tracks[TRACK_URL] = makeTrack();
    searchClient = new FakeSearchClient({}, [MATCH]);
    fetchClient = new FakeFetchClient({ sizeBytes: 600000 });
    tracker = new JobStatusTracker(silentLogger());
    seen = [];
    tracker.on('change', (status: JobStatus) => seen.push(status));
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  function makeJobService(processor?: ArtifactProcessor): JobService {
    const logger = silentLogger();
    const searchService = new SearchService(logger, searchClient, { emptyBackoffMs: 0 });
    const acquisitionService = new AcquisitionService(
      logger,
      new FileService(logger),
      fetchClient,
      new FakeMetricsClient(320),
      { outputDir: dir }
    );
    const batchCoordinator = new BatchCoordinator(logger, acquisitionService, searchService);
    return new JobService(logger, { catalog, searchService, acquisitionService, batchCoordinator, tracker, processor });
  }

  async function runJob(service: JobService, url: string = TRACK_URL): Promise<JobStatus | undefined> {
    const jobId = service.submit(url);
    return service.waitForJob(jobId);
  }

  it('walks every stage and completes with the artifact path', async () => {
    const final = await runJob(makeJobService());

    expect(final).toMatchObject({
      stage: JobStage.COMPLETE,
      progressPercent: 100,
      artifactPath: path.join(dir, 'Aurora Fields - Northern Lights.mp3')
    });
    expect(seen.map(status => status.stage)).toEqual([
      JobStage.STARTING,
      JobStage.AUTHENTICATING,
      JobStage.FETCHING,
      JobStage.SEARCHING,
      JobStage.DOWNLOADING,
      JobStage.PROCESSING,
      JobStage.COMPLETE
    ]);
    expect(seen[3].message).toBe('Searching for Aurora Fields - Northern Lights...');
  });

  it('starts the job as soon as it is submitted', () => {
    const service = makeJobService();
    const jobId = service.submit(TRACK_URL);

    expect(service.getStatus(jobId)?.stage).toBe(JobStage.AUTHENTICATING);
    return service.waitForJob(jobId);
  });

  it('returns the stored status once the job has finished', async () => {
    const service = makeJobService();
    const jobId = service.submit(TRACK_URL);
    await service.waitForJob(jobId);

    await expect(service.waitForJob(jobId)).resolves.toMatchObject({ stage: JobStage.COMPLETE });
    await expect(service.waitForJob('unknown')).resolves.toBeUndefined();
  });

  it('fails when the catalog rejects the credentials', async () => {
    catalog.authenticated = false;

    const final = await runJob(makeJobService());

    expect(final).toMatchObject({
      stage: JobStage.ERROR,
      progressPercent: 10,
      message: 'Failed while authenticating',
      error: 'Failed to authenticate with catalog'
    });
  });

  it('fails when the track is unknown', async () => {
    const final = await runJob(makeJobService(), 'https://open.spotify.com/track/missing');

    expect(final).toMatchObject({ stage: JobStage.ERROR, error: 'Could not fetch track information' });
  });

  it('fails without fetching when no source matches', async () => {
    searchClient = new FakeSearchClient();

    const final = await runJob(makeJobService());

    expect(final).toMatchObject({
      stage: JobStage.ERROR,
      progressPercent: 40,
      error: 'Could not find a matching audio source'
    });
    expect(fetchClient.calls).toHaveLength(0);
  });

  it('carries the acquisition error into the job', async () => {
    fetchClient = new FakeFetchClient({ sizeBytes: 1000 });

    const final = await runJob(makeJobService());

    expect(final).toMatchObject({
      stage: JobStage.ERROR,
      progressPercent: 60,
      error: 'File validation failed (size: 1000, bitrate: 0)'
    });
  });

  it('runs the artifact processor before completing', async () => {
    const processed: Array<[string, string]> = [];
    const processor: ArtifactProcessor = {
      process: async (artifactPath, track) => {
        processed.push([path.basename(artifactPath), track.id]);
      }
    };

    const final = await runJob(makeJobService(processor));

    expect(processed).toEqual([['Aurora Fields - Northern Lights.mp3', 'track-1']]);
    expect(final?.stage).toBe(JobStage.COMPLETE);
  });

  it('fails the job when the processor throws', async () => {
    const processor: ArtifactProcessor = {
      process: async () => {
        throw new Error('tag write failed');
      }
    };

    const final = await runJob(makeJobService(processor));

    expect(final).toMatchObject({
      stage: JobStage.ERROR,
      progressPercent: 85,
      message: 'Failed while processing',
      error: 'tag write failed'
    });
  });

  it('fails the job when a collaborator throws', async () => {
    jest.spyOn(catalog, 'resolveTrack').mockRejectedValue(new Error('socket hang up'));

    const final = await runJob(makeJobService());

    expect(final).toMatchObject({ stage: JobStage.ERROR, progressPercent: 20, error: 'socket hang up' });
  });

  describe('runCollection', () => {
    it('acquires every track of the collection', async () => {
      catalog.collections['playlist-1'] = [
        makeTrack({ id: 'a', name: 'First' }),
        makeTrack({ id: 'b', name: 'Second' })
      ];

      const results = await makeJobService().runCollection('playlist-1', 2);

      expect(results.map(item => item.result.success)).toEqual([true, true]);
      expect(fetchClient.calls).toHaveLength(2);
    });

    it('refuses to run without catalog access', async () => {
      catalog.authenticated = false;

      await expect(makeJobService().runCollection('playlist-1')).rejects.toThrow('Failed to authenticate with catalog');
    });
  });
});
