/**
 * Shared fakes and fixtures
 */

import type {
  AudioProbe,
  AudioProber,
  CatalogTrack,
  CatalogWork,
  IdentityKey,
} from '@chaptify/core';
import type { CatalogClient } from '@chaptify/catalog';
import type { CommandOptions, CommandResult } from '@chaptify/utils';

export function makeTracks(durations: readonly number[], names: readonly string[] = []): CatalogTrack[] {
  return durations.map((nominalDurationMs, index) => ({
    index,
    name: names[index] ?? `Part ${index + 1}`,
    nominalDurationMs,
  }));
}

export function makeWork(
  id: string,
  title: string,
  authors: readonly string[],
  tracks: readonly CatalogTrack[] = []
): CatalogWork {
  return {
    id,
    title,
    authors,
    author: authors.join(', '),
    tracks,
  };
}

export function makeProbe(overrides: Partial<AudioProbe> = {}): AudioProbe {
  return {
    actualDurationMs: 3_600_000,
    tags: {},
    existingChapterCount: 0,
    ...overrides,
  };
}

/**
 * Returns a fixed probe per path, or throws what it was told to
 */
export class FakeProber implements AudioProber {
  readonly calls: string[] = [];

  constructor(
    private readonly probes: Record<string, AudioProbe | Error>,
    private readonly fallback?: AudioProbe
  ) {}

  async probe(filePath: string): Promise<AudioProbe> {
    this.calls.push(filePath);
    const entry = this.probes[filePath] ?? this.fallback;
    if (entry === undefined) {
      throw new Error(`no probe configured for ${filePath}`);
    }
    if (entry instanceof Error) {
      throw entry;
    }
    return entry;
  }
}

type Step<T> = T | Error;

/**
 * Catalog whose responses are queued per call; the last queued response repeats
 */
export class FakeCatalog implements CatalogClient {
  readonly searches: IdentityKey[] = [];
  readonly trackRequests: string[] = [];

  constructor(
    private readonly searchSteps: Array<Step<CatalogWork[]>>,
    private readonly trackSteps: Record<string, Array<Step<CatalogTrack[]>>> = {}
  ) {}

  async search(key: IdentityKey): Promise<CatalogWork[]> {
    this.searches.push(key);
    return next(this.searchSteps, this.searches.length - 1);
  }

  async fetchTracks(workId: string): Promise<CatalogTrack[]> {
    this.trackRequests.push(workId);
    const steps = this.trackSteps[workId] ?? [];
    const attempt = this.trackRequests.filter(id => id === workId).length - 1;
    return next(steps, attempt);
  }
}

function next<T>(steps: Array<Step<T>>, attempt: number): T {
  const step = steps[Math.min(attempt, steps.length - 1)];
  if (step === undefined) {
    throw new Error('fake catalog has no response configured');
  }
  if (step instanceof Error) {
    throw step;
  }
  return step;
}

export interface RecordedCommand {
  command: string;
  args: string[];
  options?: CommandOptions;
}

export function commandResult(overrides: Partial<CommandResult> = {}): CommandResult {
  return {
    exitCode: 0,
    stdout: '',
    stderr: '',
    duration: 5,
    timedOut: false,
    ...overrides,
  };
}
