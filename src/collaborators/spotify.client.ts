import axios, { AxiosInstance } from 'axios';
import { createTrack, TrackDescriptor } from '../models/track.model';
import { Logger } from '../services/logger.service';
import { UpstreamUnavailableError, errorMessage } from '../utils/errors';
import { RetryDecision, RetryPolicy } from '../utils/retry-policy';
import { CatalogClient } from './types';

export const SPOTIFY_TOKEN_URL = 'https://accounts.spotify.com/api/token';
export const SPOTIFY_API_BASE = 'https://api.spotify.com/v1';

const PAGE_SIZE = 100;

export type SpotifyContentType = 'track' | 'playlist' | 'album';

export interface SpotifyCatalogOptions {
  clientId?: string;
  clientSecret?: string;
  retryPolicy?: RetryPolicy;
}

type JsonRecord = Record<string, unknown>;

function asRecord(value: unknown): JsonRecord | null {
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    return { ...value };
  }
  return null;
}

function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

function readString(record: JsonRecord | null, key: string): string | undefined {
  const value = record?.[key];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function readNumber(record: JsonRecord | null, key: string): number | undefined {
  const value = record?.[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function firstImageUrl(album: JsonRecord | null): string | undefined {
  return readString(asRecord(asArray(album?.images)[0]), 'url');
}

function joinArtists(value: unknown): string {
  return asArray(value)
    .map(artist => readString(asRecord(artist), 'name'))
    .filter((name): name is string => name !== undefined)
    .join(', ');
}

/**
 * Pull the catalog id out of a `spotify:type:id` URI or an open.spotify.com URL.
 * Anything else is taken to be the bare id.
 */
export function extractId(urlOrUri: string, type: SpotifyContentType): string {
  const input = urlOrUri.trim();

  if (input.startsWith('spotify:')) {
    const parts = input.split(':');
    return parts[parts.length - 1];
  }

  if (input.includes('open.spotify.com')) {
    const parts = input.split('/');
    const index = parts.indexOf(type);
    if (index !== -1 && index + 1 < parts.length) {
      return parts[index + 1].split('?')[0];
    }
  }

  return input;
}

export function detectContentType(urlOrUri: string): SpotifyContentType | null {
  const match = /(?:spotify:|open\.spotify\.com\/(?:intl-[a-z-]+\/)?)(track|playlist|album)[:/]/i.exec(urlOrUri);
  if (!match) return null;

  const type = match[1].toLowerCase();
  return type === 'track' || type === 'playlist' || type === 'album' ? type : null;
}

/**
 * Parse a full track object (as returned by /tracks and inside playlists).
 */
export function parseTrack(value: unknown): TrackDescriptor | null {
  const track = asRecord(value);
  const id = readString(track, 'id');
  const name = readString(track, 'name');
  const durationMs = readNumber(track, 'duration_ms');
  if (!id || !name || durationMs === undefined) return null;

  const album = asRecord(track?.album);

  return createTrack({
    id,
    name,
    artist: joinArtists(track?.artists),
    album: readString(album, 'name') ?? '',
    albumArtUrl: firstImageUrl(album),
    isrc: readString(asRecord(track?.external_ids), 'isrc'),
    durationMs,
    releaseDate: readString(album, 'release_date')
  });
}

/**
 * Catalog client for the Spotify Web API using the client credentials flow.
 */
export class SpotifyCatalog implements CatalogClient {
  private token: { value: string; expiresAt: number } | null = null;
  private retryPolicy: RetryPolicy;

  constructor(
    private logger: Logger,
    private options: SpotifyCatalogOptions = {},
    private http: AxiosInstance = axios.create({ timeout: 30000 })
  ) {
    this.retryPolicy = options.retryPolicy ?? new RetryPolicy(
      { maxAttempts: 3, baseDelayMs: 1000 },
      {
        onRetry: (error, attempt, delayMs) => this.logger.warn(
          `Catalog request failed (${errorMessage(error)}), retry ${attempt + 1} in ${delayMs}ms`
        )
      }
    );
  }

  public async authenticate(): Promise<boolean> {
    if (!this.options.clientId || !this.options.clientSecret) {
      this.logger.error('SPOTIFY_CLIENT_ID and SPOTIFY_CLIENT_SECRET must be set');
      return false;
    }

    try {
      await this.getToken();
      this.logger.info('Authenticated with Spotify API');
      return true;
    } catch (error) {
      this.logger.error(`Authentication failed: ${errorMessage(error)}`);
      return false;
    }
  }

  public async resolveTrack(urlOrUri: string): Promise<TrackDescriptor | null> {
    const id = extractId(urlOrUri, 'track');

    try {
      const data = await this.get(`/tracks/${encodeURIComponent(id)}`);
      return parseTrack(data);
    } catch (error) {
      if (axios.isAxiosError(error) && error.response?.status === 404) {
        return null;
      }
      throw this.toUpstreamError(error);
    }
  }

  public async resolveCollection(urlOrUri: string): Promise<TrackDescriptor[]> {
    const type = detectContentType(urlOrUri);

    try {
      if (type === 'album') {
        return await this.getAlbumTracks(extractId(urlOrUri, 'album'));
      }
      return await this.getPlaylistTracks(extractId(urlOrUri, 'playlist'));
    } catch (error) {
      throw this.toUpstreamError(error);
    }
  }

  private async getPlaylistTracks(playlistId: string): Promise<TrackDescriptor[]> {
    const tracks: TrackDescriptor[] = [];
    let offset = 0;

    while (true) {
      const page = asRecord(await this.get(`/playlists/${encodeURIComponent(playlistId)}/tracks`, {
        offset,
        limit: PAGE_SIZE
      }));

      for (const item of asArray(page?.items)) {
        const track = parseTrack(asRecord(item)?.track);
        if (track) tracks.push(track);
      }

      if (!page?.next) break;
      offset += PAGE_SIZE;
    }

    this.logger.info(`Found ${tracks.length} tracks in playlist`);
    return tracks;
  }

  private async getAlbumTracks(albumId: string): Promise<TrackDescriptor[]> {
    const album = asRecord(await this.get(`/albums/${encodeURIComponent(albumId)}`));
    const albumName = readString(album, 'name') ?? '';
    const albumArtUrl = firstImageUrl(album);
    const releaseDate = readString(album, 'release_date');

    // Album track objects are simplified: no album block and no ISRC
    const items: unknown[] = [];
    let page = asRecord(album?.tracks);
    items.push(...asArray(page?.items));

    let offset = items.length;
    while (page?.next) {
      page = asRecord(await this.get(`/albums/${encodeURIComponent(albumId)}/tracks`, {
        offset,
        limit: 50
      }));
      const pageItems = asArray(page?.items);
      items.push(...pageItems);
      offset += pageItems.length;
      if (pageItems.length === 0) break;
    }

    const tracks: TrackDescriptor[] = [];
    for (const value of items) {
      const item = asRecord(value);
      const id = readString(item, 'id');
      const name = readString(item, 'name');
      const durationMs = readNumber(item, 'duration_ms');
      if (!id || !name || durationMs === undefined) continue;

      tracks.push(createTrack({
        id,
        name,
        artist: joinArtists(item?.artists),
        album: albumName,
        albumArtUrl,
        durationMs,
        releaseDate
      }));
    }

    this.logger.info(`Found ${tracks.length} tracks in album`);
    return tracks;
  }

  private async getToken(): Promise<string> {
    if (this.token && this.token.expiresAt > Date.now()) {
      return this.token.value;
    }

    const credentials = Buffer.from(`${this.options.clientId}:${this.options.clientSecret}`).toString('base64');
    const response = await this.http.post(
      SPOTIFY_TOKEN_URL,
      'grant_type=client_credentials',
      {
        headers: {
          Authorization: `Basic ${credentials}`,
          'Content-Type': 'application/x-www-form-urlencoded'
        }
      }
    );

    const body = asRecord(response.data);
    const value = readString(body, 'access_token');
    if (!value) {
      throw new UpstreamUnavailableError('auth', 'Token response did not contain an access token');
    }

    // Refresh a minute early
    const expiresIn = readNumber(body, 'expires_in') ?? 3600;
    this.token = { value, expiresAt: Date.now() + Math.max(0, expiresIn - 60) * 1000 };
    return value;
  }

  private async get(apiPath: string, params?: Record<string, number | string>): Promise<unknown> {
    return this.retryPolicy.execute(async () => {
      const token = await this.getToken();
      const response = await this.http.get(`${SPOTIFY_API_BASE}${apiPath}`, {
        headers: { Authorization: `Bearer ${token}` },
        params
      });
      return response.data;
    }, error => this.classify(error));
  }

  private classify(error: unknown): RetryDecision {
    if (!axios.isAxiosError(error)) {
      return { retry: false };
    }

    const status = error.response?.status;
    if (status === undefined) {
      // Network failure, no response at all
      return { retry: true };
    }

    if (status === 429) {
      return { retry: true, delayHintMs: retryAfterMs(error.response?.headers['retry-after']) };
    }

    if (status === 401) {
      this.token = null;
      return { retry: true };
    }

    return { retry: status >= 500 };
  }

  private toUpstreamError(error: unknown): Error {
    if (error instanceof UpstreamUnavailableError || !axios.isAxiosError(error)) {
      return error instanceof Error ? error : new Error(String(error));
    }

    const status = error.response?.status;
    if (status === 429) {
      return new UpstreamUnavailableError(
        'rate-limit',
        'Catalog rate limit exceeded',
        retryAfterMs(error.response?.headers['retry-after'])
      );
    }
    if (status === 401 || status === 403) {
      return new UpstreamUnavailableError('auth', `Catalog rejected credentials (HTTP ${status})`);
    }
    if (status === undefined) {
      return new UpstreamUnavailableError('connectivity', `Catalog unreachable: ${error.message}`);
    }
    if (status >= 500) {
      return new UpstreamUnavailableError('transient', `Catalog server error (HTTP ${status})`);
    }
    return new Error(`Catalog request failed (HTTP ${status}): ${error.message}`);
  }
}

function retryAfterMs(header: unknown): number | undefined {
  const seconds = typeof header === 'string' || typeof header === 'number' ? Number(header) : NaN;
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}
