import { TrackDescriptor } from '../models/track.model';

/**
 * Build the search queries for a track, most specific first.
 *
 * The list always has the same shape for the same input; the search
 * orchestrator decides how many of them to try.
 */
export function generateQueries(track: TrackDescriptor): string[] {
  const { artist, name, album, isrc } = track;
  const queries: string[] = [];

  queries.push(`${artist} ${name}`);
  queries.push(`${artist} ${name} official audio`);
  queries.push(`${name} ${artist}`);

  if (isrc) {
    queries.push(isrc);
  }

  queries.push(`${artist} ${name} lyrics`);
  queries.push(`${name} audio`);
  queries.push(`${name} ${album}`);
  queries.push(`${name} full song`);

  if (artist.includes(',')) {
    queries.push(`${artist.split(',')[0].trim()} ${name}`);
  }

  return queries;
}
