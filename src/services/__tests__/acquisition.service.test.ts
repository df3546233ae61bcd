import * as fs from 'fs';
import * as path from 'path';
import {
  FakeFetchClient,
  FakeMetricsClient,
  makeCandidate,
  makeTempDir,
  makeTrack,
  removeTempDir,
  writeBytes
} from '../../test-utils/fixtures';
import { FailureReason } from '../../utils/errors';
import { AcquisitionService } from '../acquisition.service';
import { FileService } from '../file.service';
import { silentLogger } from '../logger.service';

describe('AcquisitionService', () => {
  const track = makeTrack();
  const candidate = makeCandidate();
  let dir: string;
  let finalPath: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    finalPath = path.join(dir, 'Aurora Fields - Northern Lights.mp3');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  function makeService(fetchClient: FakeFetchClient, metrics: FakeMetricsClient = new FakeMetricsClient(320)) {
    const logger = silentLogger();
    return new AcquisitionService(logger, new FileService(logger), fetchClient, metrics, { outputDir: dir });
  }

  it('fetches, validates and reports metrics', async () => {
    const fetchClient = new FakeFetchClient({ sizeBytes: 600000 });

    const result = await makeService(fetchClient).acquire(candidate, track);

    expect(result).toEqual({ success: true, artifactPath: finalPath, fileSizeBytes: 600000, bitrateKbps: 320 });
    expect(fetchClient.calls).toEqual([{
      sourceUrl: 'https://video.example/watch?v=abc',
      outputTemplate: path.join(dir, 'Aurora Fields - Northern Lights.%(ext)s'),
      timeoutMs: 300000
    }]);
  });

  it('reuses a valid existing artifact without fetching', async () => {
    await writeBytes(finalPath, 600000);
    const fetchClient = new FakeFetchClient({ sizeBytes: 600000 });

    const result = await makeService(fetchClient).acquire(candidate, track);

    expect(result.success).toBe(true);
    expect(result.artifactPath).toBe(finalPath);
    expect(fetchClient.calls).toHaveLength(0);
  });

  it('replaces an invalid existing artifact', async () => {
    await writeBytes(finalPath, 100);
    const fetchClient = new FakeFetchClient({ sizeBytes: 700000 });

    const result = await makeService(fetchClient).acquire(candidate, track);

    expect(fetchClient.calls).toHaveLength(1);
    expect(result.fileSizeBytes).toBe(700000);
    expect(fs.statSync(finalPath).size).toBe(700000);
  });

  it('deletes an undersized artifact and reports its size', async () => {
    const metrics = new FakeMetricsClient(320);

    const result = await makeService(new FakeFetchClient({ sizeBytes: 1000 }), metrics).acquire(candidate, track);

    expect(result).toEqual({
      success: false,
      fileSizeBytes: 1000,
      bitrateKbps: 0,
      error: 'File validation failed (size: 1000, bitrate: 0)',
      reason: FailureReason.VALIDATION_FAILED
    });
    expect(fs.existsSync(finalPath)).toBe(false);
    expect(metrics.bitrateCalls).toBe(0);
  });

  it('deletes a low-bitrate artifact and reports the bitrate', async () => {
    const result = await makeService(
      new FakeFetchClient({ sizeBytes: 600000 }),
      new FakeMetricsClient(96)
    ).acquire(candidate, track);

    expect(result.reason).toBe(FailureReason.VALIDATION_FAILED);
    expect(result.error).toBe('File validation failed (size: 600000, bitrate: 96)');
    expect(fs.existsSync(finalPath)).toBe(false);
  });

  it('reports a timeout as a fetch failure and removes partial files', async () => {
    const fetchClient = new FakeFetchClient({
      outcome: { status: 'timeout', detail: 'Download timed out after 300000ms' },
      extraFiles: ['Aurora Fields - Northern Lights.webm.part']
    });

    const result = await makeService(fetchClient).acquire(candidate, track);

    expect(result.success).toBe(false);
    expect(result.reason).toBe(FailureReason.FETCH_FAILED);
    expect(result.error).toBe('Download timed out after 300000ms');
    expect(fs.readdirSync(dir)).toEqual([]);
  });

  it('reports a nonzero exit as a fetch failure', async () => {
    const fetchClient = new FakeFetchClient({ outcome: { status: 'failed', detail: 'Download failed: HTTP 403' } });

    const result = await makeService(fetchClient).acquire(candidate, track);

    expect(result.reason).toBe(FailureReason.FETCH_FAILED);
    expect(result.error).toBe('Download failed: HTTP 403');
    expect(result.artifactPath).toBeUndefined();
  });

  it('reports a missing artifact when the fetch wrote nothing', async () => {
    const result = await makeService(new FakeFetchClient()).acquire(candidate, track);

    expect(result.reason).toBe(FailureReason.ARTIFACT_MISSING);
    expect(result.error).toBe(`Output file not found after download: ${finalPath}`);
  });

  it('renames an artifact saved under a different name', async () => {
    const fetchClient = new FakeFetchClient({ sizeBytes: 600000, fileName: 'Aurora Fields - Northern Lights (1).mp3' });

    const result = await makeService(fetchClient).acquire(candidate, track);

    expect(result.success).toBe(true);
    expect(fs.readdirSync(dir)).toEqual(['Aurora Fields - Northern Lights.mp3']);
  });

  it('takes a truncated name written by the fetch', async () => {
    const fetchClient = new FakeFetchClient({ sizeBytes: 600000, fileName: 'Aurora Fields - Northern Li.mp3' });

    const result = await makeService(fetchClient).acquire(candidate, track);

    expect(result.success).toBe(true);
    expect(fs.readdirSync(dir)).toEqual(['Aurora Fields - Northern Lights.mp3']);
  });

  it('never claims another track of the same artist that was already on disk', async () => {
    const longArtist = makeTrack({ artist: 'Red Hot Chili Peppers', name: 'Californication' });
    const otherPath = path.join(dir, 'Red Hot Chili Peppers - Otherside.mp3');
    await writeBytes(otherPath, 600000);

    const result = await makeService(new FakeFetchClient()).acquire(candidate, longArtist);

    expect(result.reason).toBe(FailureReason.ARTIFACT_MISSING);
    expect(fs.readdirSync(dir)).toEqual(['Red Hot Chili Peppers - Otherside.mp3']);
    expect(fs.statSync(otherPath).size).toBe(600000);
  });

  it('never claims a file another track finished during the fetch', async () => {
    const fetchClient = new FakeFetchClient({ extraFiles: ['Aurora Fields - Northern Skies.mp3'] });

    const result = await makeService(fetchClient).acquire(candidate, track);

    expect(result.reason).toBe(FailureReason.ARTIFACT_MISSING);
    expect(fs.readdirSync(dir)).toEqual(['Aurora Fields - Northern Skies.mp3']);
  });

  it('removes intermediate files after a successful download', async () => {
    const fetchClient = new FakeFetchClient({
      sizeBytes: 600000,
      extraFiles: ['Aurora Fields - Northern Lights.webm']
    });

    await makeService(fetchClient).acquire(candidate, track);

    expect(fs.readdirSync(dir)).toEqual(['Aurora Fields - Northern Lights.mp3']);
  });

  describe('measureBitrate', () => {
    it('estimates from the duration when the bitrate probe fails', async () => {
      const service = makeService(new FakeFetchClient(), new FakeMetricsClient(null, 30));

      await expect(service.measureBitrate(finalPath, 600000)).resolves.toBe(160);
    });

    it('assumes the fallback bitrate when nothing can be probed', async () => {
      const service = makeService(new FakeFetchClient(), new FakeMetricsClient(null, null));

      await expect(service.measureBitrate(finalPath, 600000)).resolves.toBe(192);
    });
  });

  it('cleans invalid files out of the output directory', async () => {
    await writeBytes(path.join(dir, 'good.mp3'), 600000);
    await writeBytes(path.join(dir, 'broken.mp3'), 10);

    const removed = await makeService(new FakeFetchClient()).cleanupInvalidArtifacts();

    expect(removed).toBe(1);
    expect(fs.readdirSync(dir)).toEqual(['good.mp3']);
  });
});
