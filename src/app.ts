import { FfprobeClient } from './collaborators/ffprobe.client';
import { SpotifyCatalog } from './collaborators/spotify.client';
import { ArtifactProcessor } from './collaborators/types';
import { YtDlpClient } from './collaborators/ytdlp.client';
import { AppConfig } from './config/config';
import { AcquisitionService } from './services/acquisition.service';
import { BatchCoordinator } from './services/batch.service';
import { FileService } from './services/file.service';
import { JobStatusTracker } from './services/job-status.service';
import { JobService } from './services/job.service';
import { Logger } from './services/logger.service';
import { SearchService } from './services/search.service';
import { errorMessage } from './utils/errors';
import { RateLimiter } from './utils/rate-limiter';
import { RetryPolicy } from './utils/retry-policy';

export interface Services {
  catalog: SpotifyCatalog;
  searchService: SearchService;
  acquisitionService: AcquisitionService;
  batchCoordinator: BatchCoordinator;
  tracker: JobStatusTracker;
  jobService: JobService;
}

/**
 * Wire the services with the command line collaborators.
 */
export function createServices(config: AppConfig, logger: Logger, processor?: ArtifactProcessor): Services {
  const catalogLogger = logger.child('catalog');
  const catalog = new SpotifyCatalog(catalogLogger, {
    clientId: config.spotifyClientId,
    clientSecret: config.spotifyClientSecret,
    retryPolicy: new RetryPolicy(
      { maxAttempts: config.catalogMaxRetries, baseDelayMs: config.catalogRetryDelayMs, jitter: 'full' },
      {
        onRetry: (error, attempt, delayMs) =>
          catalogLogger.warn(`${errorMessage(error)}. Retry ${attempt + 1} in ${delayMs}ms`)
      }
    )
  });

  const ytDlp = new YtDlpClient(logger.child('yt-dlp'), {
    binaryPath: config.ytDlpPath,
    searchTimeoutMs: config.searchTimeoutMs,
    audioFormat: config.audioFormat,
    ffmpegLocation: config.ffmpegLocation
  });

  const ffprobe = new FfprobeClient(logger.child('ffprobe'), {
    binaryPath: config.ffprobePath,
    timeoutMs: config.probeTimeoutMs
  });

  const searchService = new SearchService(
    logger.child('search'),
    ytDlp,
    {
      maxRetries: config.maxSearchRetries,
      maxResults: config.maxSearchResults,
      minAcceptScore: config.minAcceptScore,
      emptyBackoffMs: config.searchBackoffMs,
      durationTolerance: config.durationTolerance
    },
    RateLimiter.perMinute(config.searchRequestsPerMinute)
  );

  const acquisitionService = new AcquisitionService(
    logger.child('download'),
    new FileService(logger),
    ytDlp,
    ffprobe,
    {
      outputDir: config.outputDir,
      audioFormat: config.audioFormat,
      fetchTimeoutMs: config.fetchTimeoutMs,
      minFileSizeBytes: config.minFileSizeBytes,
      minBitrateKbps: config.minBitrateKbps,
      fallbackBitrateKbps: config.fallbackBitrateKbps
    }
  );

  const batchCoordinator = new BatchCoordinator(logger.child('batch'), acquisitionService, searchService);
  const tracker = new JobStatusTracker(logger.child('jobs'));
  const jobService = new JobService(logger, {
    catalog,
    searchService,
    acquisitionService,
    batchCoordinator,
    tracker,
    processor
  });

  return { catalog, searchService, acquisitionService, batchCoordinator, tracker, jobService };
}
