#!/usr/bin/env node
import { Command } from 'commander';
import * as path from 'path';
import { createServices, Services } from './app';
import { AppConfig, loadConfig, saveConfig } from './config/config';
import { JobStage, JobStatus } from './models/job.model';
import { formatTrackDuration } from './models/track.model';
import { summarize } from './services/batch.service';
import { Logger, parseLogLevel } from './services/logger.service';
import { ProgressTracker } from './services/progress.service';
import { errorMessage } from './utils/errors';
import { formatScore } from './utils/formatter';

interface CliOptions {
  output?: string;
  workers?: string;
  logLevel: string;
  logFile?: string;
  progress: boolean;
  config?: string;
}

const program = new Command();
program
  .name('track-fetch')
  .description('Find, download and validate audio for catalog tracks, playlists and albums')
  .version('1.0.0')
  .option('-o, --output <path>', 'Output directory')
  .option('-w, --workers <number>', 'Maximum concurrent downloads')
  .option('-l, --log-level <level>', 'Log level (debug, info, warn, error)', 'info')
  .option('--log-file <path>', 'Log to file')
  .option('--no-progress', 'Disable progress display')
  .option('--config <path>', 'Path to config file');

interface Context {
  config: AppConfig;
  logger: Logger;
  services: Services;
}

function setup(): Context {
  const options = program.opts<CliOptions>();
  const config = loadConfig(options.config);

  if (options.output) {
    config.outputDir = path.resolve(options.output);
  }
  if (options.workers) {
    const workers = parseInt(options.workers, 10);
    if (Number.isFinite(workers) && workers > 0) {
      config.maxConcurrentDownloads = workers;
    }
  }

  const logger = new Logger({
    level: parseLogLevel(options.logLevel),
    logToConsole: true,
    logToFile: !!options.logFile,
    logFilePath: options.logFile
  });

  logger.debug(`Output directory: ${config.outputDir}`);
  return { config, logger, services: createServices(config, logger) };
}

async function runTrack(url: string): Promise<void> {
  const { logger, services } = setup();
  const { jobService, tracker } = services;

  tracker.on('change', (status: JobStatus) => {
    if (status.stage !== JobStage.ERROR) {
      logger.info(`[${status.progressPercent}%] ${status.message}`);
    }
  });

  try {
    const jobId = jobService.submit(url);
    const final = await jobService.waitForJob(jobId);

    if (final?.stage === JobStage.COMPLETE) {
      logger.info(`Successfully downloaded: ${final.artifactPath}`);
    } else {
      logger.error(`Download failed: ${final?.error ?? 'unknown error'}`);
      process.exitCode = 1;
    }
  } finally {
    logger.close();
  }
}

async function runCollection(url: string): Promise<void> {
  const { config, logger, services } = setup();
  const showProgress = program.opts<CliOptions>().progress !== false;
  const progress = showProgress ? new ProgressTracker(services.batchCoordinator, process.stdout, config.progressUpdateIntervalMs) : null;

  try {
    progress?.start();
    const results = await services.jobService.runCollection(url, config.maxConcurrentDownloads);
    progress?.stop();

    const summary = summarize(results);
    logger.info(`Downloaded ${summary.succeeded}/${summary.total} tracks to ${config.outputDir}`);
    for (const failure of summary.failures) {
      logger.warn(`  ${failure.filename}: ${failure.error}`);
    }
    if (summary.failed > 0) {
      process.exitCode = 1;
    }
  } catch (error) {
    progress?.stop();
    logger.error(errorMessage(error));
    process.exitCode = 1;
  } finally {
    logger.close();
  }
}

async function runSearch(url: string): Promise<void> {
  const { logger, services } = setup();

  try {
    if (!await services.catalog.authenticate()) {
      process.exitCode = 1;
      return;
    }

    const track = await services.catalog.resolveTrack(url);
    if (!track) {
      logger.error('Could not fetch track information');
      process.exitCode = 1;
      return;
    }

    logger.info(`Track: ${track.artist} - ${track.name} [${formatTrackDuration(track.durationMs)}] ${track.isrc ?? ''}`.trim());

    const candidate = await services.searchService.findBestMatch(track);
    if (!candidate) {
      process.exitCode = 1;
      return;
    }

    logger.info(`Best match: ${candidate.title}`);
    logger.info(`  URL: ${candidate.sourceUrl}`);
    logger.info(`  Score: ${formatScore(candidate.score)} | Duration: ${candidate.durationSec}s | Views: ${candidate.popularity}`);
  } catch (error) {
    logger.error(errorMessage(error));
    process.exitCode = 1;
  } finally {
    logger.close();
  }
}

async function runCleanup(): Promise<void> {
  const { config, logger, services } = setup();

  try {
    const removed = await services.acquisitionService.cleanupInvalidArtifacts();
    logger.info(`Removed ${removed} invalid files from ${config.outputDir}`);
  } finally {
    logger.close();
  }
}

program
  .command('track')
  .description('Download a single track')
  .argument('<url>', 'Track URL or URI')
  .action(runTrack);

program
  .command('playlist')
  .description('Download every track of a playlist')
  .argument('<url>', 'Playlist URL or URI')
  .action(runCollection);

program
  .command('album')
  .description('Download every track of an album')
  .argument('<url>', 'Album URL or URI')
  .action(runCollection);

program
  .command('search')
  .description('Show the best audio source for a track without downloading it')
  .argument('<url>', 'Track URL or URI')
  .action(runSearch);

program
  .command('cleanup')
  .description('Delete files in the output directory that fail validation')
  .action(runCleanup);

program
  .command('init')
  .description('Write the current settings to a config file')
  .action(() => {
    const options = program.opts<CliOptions>();
    saveConfig(loadConfig(options.config), options.config);
    console.info('Config written');
  });

process.on('unhandledRejection', reason => {
  console.error(`Unhandled Promise Rejection: ${errorMessage(reason)}`);
  process.exitCode = 1;
});

program.parseAsync(process.argv).catch(error => {
  console.error('Fatal error:', errorMessage(error));
  process.exit(1);
});
