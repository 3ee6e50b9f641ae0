import { config } from '../config/index.js';
import type { AnalysisRecord } from '../config/types/analysis.js';

export interface AnalysisCache {
  get(url: string): AnalysisRecord | undefined;
  set(url: string, record: AnalysisRecord): void;
  readonly size: number;
}

export interface InMemoryCacheOptions {
  /** 0 disables eviction. */
  maxEntries?: number;
}

/**
 * Results keyed by the request URL exactly as received, with no
 * normalisation. Every operation is synchronous with no await inside it, so
 * each get or set runs as a single critical section on the event loop.
 */
export class InMemoryAnalysisCache implements AnalysisCache {
  private readonly entries = new Map<string, AnalysisRecord>();
  private readonly maxEntries: number;

  constructor(options: InMemoryCacheOptions = {}) {
    this.maxEntries = Math.max(0, options.maxEntries ?? 0);
  }

  get size(): number {
    return this.entries.size;
  }

  get(url: string): AnalysisRecord | undefined {
    return this.entries.get(url);
  }

  set(url: string, record: AnalysisRecord): void {
    this.entries.delete(url);
    this.entries.set(url, record);
    this.enforceMaxEntries();
  }

  private enforceMaxEntries(): void {
    if (this.maxEntries === 0 || this.entries.size <= this.maxEntries) return;
    const keysToRemove = this.entries.size - this.maxEntries;
    const iterator = this.entries.keys();
    for (let i = 0; i < keysToRemove; i++) {
      const { value, done } = iterator.next();
      if (done) break;
      this.entries.delete(value);
    }
  }
}

/** Stores nothing; every lookup misses. */
export class NoopAnalysisCache implements AnalysisCache {
  readonly size = 0;

  get(_url: string): AnalysisRecord | undefined {
    return undefined;
  }

  set(_url: string, _record: AnalysisRecord): void {}
}

export function createAnalysisCache(): AnalysisCache {
  if (!config.cache.enabled) return new NoopAnalysisCache();
  return new InMemoryAnalysisCache({ maxEntries: config.cache.maxEntries });
}
