import * as fs from 'fs';
import * as path from 'path';
import { errorMessage } from '../utils/errors';

export interface AppConfig {
  // Output
  outputDir: string;
  audioFormat: string;

  // Batch settings
  maxConcurrentDownloads: number;
  progressUpdateIntervalMs: number;

  // Search settings
  searchRequestsPerMinute: number;
  maxSearchRetries: number;
  maxSearchResults: number;
  minAcceptScore: number;
  durationTolerance: number;
  searchBackoffMs: number;
  searchTimeoutMs: number;

  // Acquisition settings
  fetchTimeoutMs: number;
  probeTimeoutMs: number;
  minFileSizeBytes: number;
  minBitrateKbps: number;
  fallbackBitrateKbps: number;

  // Catalog settings
  catalogMaxRetries: number;
  catalogRetryDelayMs: number;
  spotifyClientId?: string;
  spotifyClientSecret?: string;

  // External tools
  ytDlpPath: string;
  ffprobePath: string;
  ffmpegLocation?: string;
}

export const CONFIG_FILE_NAME = 'track-fetch.config.json';

const defaultConfig: AppConfig = {
  outputDir: path.join(process.cwd(), 'downloads'),
  audioFormat: 'mp3',

  maxConcurrentDownloads: 4,
  progressUpdateIntervalMs: 200,

  searchRequestsPerMinute: 30,
  maxSearchRetries: 5,
  maxSearchResults: 10,
  minAcceptScore: 0.3,
  durationTolerance: 0.3,
  searchBackoffMs: 300,
  searchTimeoutMs: 30000,

  fetchTimeoutMs: 300000,
  probeTimeoutMs: 10000,
  minFileSizeBytes: 500000,
  minBitrateKbps: 128,
  fallbackBitrateKbps: 192,

  catalogMaxRetries: 3,
  catalogRetryDelayMs: 1000,

  ytDlpPath: 'yt-dlp',
  ffprobePath: 'ffprobe'
};

const NUMBER_KEYS = [
  'maxConcurrentDownloads',
  'progressUpdateIntervalMs',
  'searchRequestsPerMinute',
  'maxSearchRetries',
  'maxSearchResults',
  'minAcceptScore',
  'durationTolerance',
  'searchBackoffMs',
  'searchTimeoutMs',
  'fetchTimeoutMs',
  'probeTimeoutMs',
  'minFileSizeBytes',
  'minBitrateKbps',
  'fallbackBitrateKbps',
  'catalogMaxRetries',
  'catalogRetryDelayMs'
] as const satisfies readonly (keyof AppConfig)[];

const STRING_KEYS = [
  'outputDir',
  'audioFormat',
  'spotifyClientId',
  'spotifyClientSecret',
  'ytDlpPath',
  'ffprobePath',
  'ffmpegLocation'
] as const satisfies readonly (keyof AppConfig)[];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Copy the recognised keys of `overrides` whose type matches the setting.
 */
export function mergeConfig(base: AppConfig, overrides: Record<string, unknown>): AppConfig {
  const merged: AppConfig = { ...base };

  for (const key of NUMBER_KEYS) {
    const value = overrides[key];
    if (typeof value === 'number' && Number.isFinite(value)) {
      merged[key] = value;
    }
  }

  for (const key of STRING_KEYS) {
    const value = overrides[key];
    if (typeof value === 'string' && value !== '') {
      merged[key] = value;
    }
  }

  return merged;
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  return {
    spotifyClientId: env.SPOTIFY_CLIENT_ID,
    spotifyClientSecret: env.SPOTIFY_CLIENT_SECRET,
    ytDlpPath: env.YTDLP_PATH,
    ffprobePath: env.FFPROBE_PATH,
    ffmpegLocation: env.FFMPEG_LOCATION
  };
}

/**
 * Load config from file if it exists, then apply environment overrides.
 */
export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const configFilePath = configPath || path.join(process.cwd(), CONFIG_FILE_NAME);
  let config: AppConfig = { ...defaultConfig };

  try {
    if (fs.existsSync(configFilePath)) {
      const fileConfig: unknown = JSON.parse(fs.readFileSync(configFilePath, 'utf8'));
      if (isRecord(fileConfig)) {
        config = mergeConfig(config, fileConfig);
      } else {
        console.warn(`Config file ${configFilePath} does not contain an object, using defaults`);
      }
    }
  } catch (error) {
    console.warn(`Error loading config from ${configFilePath}, using defaults: ${errorMessage(error)}`);
  }

  config = mergeConfig(config, envOverrides(env));
  config.outputDir = path.resolve(config.outputDir);
  return config;
}

/**
 * Save config to file, leaving credentials out
 */
export function saveConfig(config: AppConfig, configPath?: string): void {
  const configFilePath = configPath || path.join(process.cwd(), CONFIG_FILE_NAME);
  const { spotifyClientId, spotifyClientSecret, ...persisted } = config;

  try {
    fs.writeFileSync(configFilePath, JSON.stringify(persisted, null, 2));
  } catch (error) {
    console.error(`Error saving config to ${configFilePath}: ${errorMessage(error)}`);
    throw error;
  }
}
