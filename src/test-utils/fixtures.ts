import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { AudioMetricsClient, FetchClient, FetchOutcome, SearchClient } from '../collaborators/types';
import { RawSearchResult, SearchCandidate } from '../models/candidate.model';
import { createTrack, TrackDescriptor, TrackInput } from '../models/track.model';

export function makeTrack(overrides: Partial<TrackInput> = {}): TrackDescriptor {
  return createTrack({
    id: 'track-1',
    name: 'Northern Lights',
    artist: 'Aurora Fields',
    album: 'Polar Nights',
    isrc: 'TEST00000001',
    durationMs: 240000,
    ...overrides
  });
}

export function makeCandidate(overrides: Partial<SearchCandidate> = {}): SearchCandidate {
  return {
    sourceUrl: 'https://video.example/watch?v=abc',
    title: 'Aurora Fields - Northern Lights (Official Audio)',
    durationSec: 240,
    popularity: 1000,
    score: 0.9,
    ...overrides
  };
}

export async function makeTempDir(): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), 'track-fetch-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.promises.rm(dir, { recursive: true, force: true });
}

export async function writeBytes(filePath: string, size: number): Promise<void> {
  await fs.promises.writeFile(filePath, Buffer.alloc(size));
}

/**
 * Search client answering from a per-query table; unknown queries get no results.
 */
export class FakeSearchClient implements SearchClient {
  public calls: Array<{ query: string; maxResults: number }> = [];

  constructor(private responses: Record<string, RawSearchResult[]> = {}, private fallback: RawSearchResult[] = []) {}

  async search(query: string, maxResults: number): Promise<RawSearchResult[]> {
    this.calls.push({ query, maxResults });
    return this.responses[query] ?? this.fallback;
  }
}

export interface FakeFetchBehaviour {
  outcome?: FetchOutcome;
  fileName?: string;        // Written under this name instead of the template's
  sizeBytes?: number;
  extraFiles?: string[];    // Leftovers written next to the artifact
  delayMs?: number;
}

/**
 * Fetch client that writes a zero-filled file where yt-dlp would.
 */
export class FakeFetchClient implements FetchClient {
  public calls: Array<{ sourceUrl: string; outputTemplate: string; timeoutMs: number }> = [];
  public active = 0;
  public peakActive = 0;

  constructor(private behaviour: FakeFetchBehaviour | ((sourceUrl: string) => FakeFetchBehaviour) = {}) {}

  async fetch(sourceUrl: string, outputTemplate: string, timeoutMs: number): Promise<FetchOutcome> {
    this.calls.push({ sourceUrl, outputTemplate, timeoutMs });
    const behaviour = typeof this.behaviour === 'function' ? this.behaviour(sourceUrl) : this.behaviour;

    this.active++;
    this.peakActive = Math.max(this.peakActive, this.active);
    try {
      if (behaviour.delayMs) {
        await new Promise(resolve => setTimeout(resolve, behaviour.delayMs));
      }

      const dir = path.dirname(outputTemplate);
      for (const extra of behaviour.extraFiles ?? []) {
        await writeBytes(path.join(dir, extra), 10);
      }

      const outcome = behaviour.outcome ?? { status: 'success' };
      if (outcome.status === 'success' && behaviour.sizeBytes !== undefined) {
        const fileName = behaviour.fileName ?? path.basename(outputTemplate).replace('%(ext)s', 'mp3');
        await writeBytes(path.join(dir, fileName), behaviour.sizeBytes);
      }
      return outcome;
    } finally {
      this.active--;
    }
  }
}

export class FakeMetricsClient implements AudioMetricsClient {
  public bitrateCalls = 0;

  constructor(private bitrateKbps: number | null = 320, private durationSec: number | null = null) {}

  async probeBitrateKbps(): Promise<number | null> {
    this.bitrateCalls++;
    return this.bitrateKbps;
  }

  async probeDurationSec(): Promise<number | null> {
    return this.durationSec;
  }
}
