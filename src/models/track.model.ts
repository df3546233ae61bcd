import { sanitize } from 'sanitize-filename-ts';

export interface TrackInput {
  id: string;               // Catalog identifier
  name: string;             // Track title
  artist: string;           // Comma-separated artist names
  album: string;            // Album title
  albumArtUrl?: string;     // Largest cover image, when the catalog has one
  isrc?: string;            // International Standard Recording Code
  durationMs: number;       // Catalog duration in milliseconds
  releaseDate?: string;     // Album release date as reported by the catalog
}

export interface TrackDescriptor extends Readonly<TrackInput> {
  readonly filename: string; // "{artist} - {name}", safe for the file system
}

/**
 * Keep letters, digits, spaces, dashes and underscores.
 */
function stripUnsafe(value: string): string {
  return value.replace(/[^\p{L}\p{N} _-]/gu, '').trim();
}

export function buildFilename(artist: string, name: string): string {
  return sanitize(`${stripUnsafe(artist)} - ${stripUnsafe(name)}`);
}

export function createTrack(input: TrackInput): TrackDescriptor {
  if (!Number.isFinite(input.durationMs) || input.durationMs < 0) {
    throw new RangeError(`Invalid duration for track ${input.id}: ${input.durationMs}`);
  }

  return Object.freeze({
    ...input,
    filename: buildFilename(input.artist, input.name)
  });
}

export function formatTrackDuration(durationMs: number): string {
  const minutes = Math.floor(durationMs / 60000);
  const seconds = Math.floor(durationMs / 1000) % 60;
  return `${minutes}:${seconds.toString().padStart(2, '0')}`;
}
