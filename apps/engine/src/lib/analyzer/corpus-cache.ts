/**
 * Corpus Cache
 *
 * TTL cache for corpus reports with a single-writer discipline:
 * - a fresh entry is returned without waiting
 * - at most one recompute is in flight; concurrent callers get the stale
 *   entry if there is one, otherwise they await the same promise
 * - a recompute is time-boxed (AbortController + setTimeout); on timeout
 *   the last good entry is served as stale, or AggregationTimeout is raised
 *
 * One cache holds one corpus at a time. A recompute for a different key
 * does not cancel the one in flight: the older one still resolves for its
 * own caller but is not stored once a newer one has started.
 *
 * @module analyzer/corpus-cache
 */

import { AggregationTimeout } from "../errors";

// ============================================================================
// TYPES
// ============================================================================

export interface CacheRead<T> {
  value: T;
  stale: boolean;
}

export interface CorpusCacheOptions {
  ttlMs: number;
  timeoutMs: number;
  /** Injected clock, for tests */
  now?: () => number;
}

export interface CorpusCacheStats {
  hits: number;
  misses: number;
  staleServed: number;
  recomputes: number;
  timeouts: number;
}

interface CacheEntry<T> {
  key: string;
  value: T;
  expiresAt: number;
}

interface InFlight<T> {
  key: string;
  controller: AbortController;
  promise: Promise<T>;
}

export type Recompute<T> = (signal: AbortSignal) => Promise<T>;

/**
 * Settle with the task, or reject as soon as the signal aborts.
 */
function raceAbort<T>(task: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(signal.reason);
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    task.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

// ============================================================================
// CORPUS CACHE
// ============================================================================

export class CorpusCache<T> {
  private entry: CacheEntry<T> | null = null;
  private inflight: InFlight<T> | null = null;
  private readonly pending = new Set<Promise<void>>();
  private readonly now: () => number;
  private initialized = false;
  private disposed = false;
  private generation = 0;
  private readonly counters: CorpusCacheStats = { hits: 0, misses: 0, staleServed: 0, recomputes: 0, timeouts: 0 };

  constructor(private readonly options: CorpusCacheOptions) {
    this.now = options.now ?? Date.now;
  }

  init(): void {
    if (this.disposed) {
      throw new Error("CorpusCache was disposed");
    }
    this.initialized = true;
  }

  get isReady(): boolean {
    return this.initialized && !this.disposed;
  }

  get stats(): Readonly<CorpusCacheStats> {
    return { ...this.counters };
  }

  /**
   * Current entry for `key` without triggering a recompute.
   */
  peek(key: string): CacheRead<T> | null {
    if (!this.entry || this.entry.key !== key) return null;
    return { value: this.entry.value, stale: this.now() >= this.entry.expiresAt };
  }

  async get(key: string, compute: Recompute<T>): Promise<CacheRead<T>> {
    this.assertReady();

    const entry = this.entry?.key === key ? this.entry : null;
    if (entry && this.now() < entry.expiresAt) {
      this.counters.hits += 1;
      return { value: entry.value, stale: false };
    }
    this.counters.misses += 1;

    // Someone is already recomputing this corpus
    if (this.inflight && this.inflight.key === key) {
      if (entry) {
        this.counters.staleServed += 1;
        return { value: entry.value, stale: true };
      }
      return { value: await this.inflight.promise, stale: false };
    }

    return this.recompute(key, compute, entry);
  }

  /**
   * Expire the current entry. It stays as the last good value for stale reads.
   */
  invalidate(): void {
    if (this.entry) {
      this.entry = { ...this.entry, expiresAt: 0 };
      console.log("[Corpus-Cache] Invalidated");
    }
  }

  clear(): void {
    this.entry = null;
  }

  /**
   * Abort any in-flight recompute and wait for it to settle.
   */
  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    this.inflight?.controller.abort(new Error("CorpusCache disposed"));
    await Promise.allSettled([...this.pending]);
    this.inflight = null;
    this.entry = null;
  }

  // ==========================================================================
  // INTERNALS
  // ==========================================================================

  private assertReady(): void {
    if (this.disposed) throw new Error("CorpusCache was disposed");
    if (!this.initialized) throw new Error("CorpusCache.init() must be called before use");
  }

  private async recompute(key: string, compute: Recompute<T>, lastGood: CacheEntry<T> | null): Promise<CacheRead<T>> {
    const { timeoutMs, ttlMs } = this.options;
    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(new AggregationTimeout(`Corpus recompute exceeded ${timeoutMs}ms`, timeoutMs));
    }, timeoutMs);

    this.counters.recomputes += 1;
    const generation = ++this.generation;
    const promise = raceAbort(compute(controller.signal), controller.signal);
    this.inflight = { key, controller, promise };
    // Settles either way; dispose() waits on it, the outcome is handled below
    const settled: Promise<void> = promise
      .then(
        () => undefined,
        () => undefined,
      )
      .finally(() => {
        clearTimeout(timer);
        if (this.inflight?.controller === controller) this.inflight = null;
        this.pending.delete(settled);
      });
    this.pending.add(settled);

    try {
      const value = await promise;
      if (!this.disposed && !controller.signal.aborted && generation === this.generation) {
        this.entry = { key, value, expiresAt: this.now() + ttlMs };
      }
      return { value, stale: false };
    } catch (err) {
      if (err instanceof AggregationTimeout) {
        this.counters.timeouts += 1;
        if (lastGood) {
          console.warn(`[Corpus-Cache] ${err.message}; serving last good value`);
          this.counters.staleServed += 1;
          return { value: lastGood.value, stale: true };
        }
        console.warn(`[Corpus-Cache] ${err.message}; no cached value to serve`);
      }
      throw err;
    }
  }
}
