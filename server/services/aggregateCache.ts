import type { Snapshot, SnapshotRead } from '../../shared/api-types.js';
import { CACHE_TTL_MS } from '../config.js';

export type CacheState = 'empty' | 'populated';

export type CommitResult = { accepted: true } | { accepted: false; reason: 'older_snapshot' | 'duplicate_cycle' };

export interface CycleError {
  message: string;
  at: number;
}

/**
 * Holds the single current snapshot. Readers get either the previous complete
 * snapshot or the new one, since a commit is one reference swap of an
 * already-frozen value. The cache never returns to `empty` and never evicts;
 * the TTL only drives the `stale` flag.
 */
export class AggregateCache {
  private current: Snapshot | null = null;
  private lastCycleError: CycleError | null = null;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: { ttlMs?: number; now?: () => number } = {}) {
    this.ttlMs = Math.max(0, options.ttlMs ?? CACHE_TTL_MS);
    this.now = options.now ?? Date.now;
  }

  get state(): CacheState {
    return this.current ? 'populated' : 'empty';
  }

  isReady(): boolean {
    return this.current !== null;
  }

  getRefreshedAt(): number | null {
    return this.current ? this.current.refreshedAt : null;
  }

  /**
   * Swap in `snapshot` unless the held one is newer. Equal timestamps fall back
   * to the cycle id so a replayed cycle is a no-op.
   */
  commit(snapshot: Snapshot): CommitResult {
    const held = this.current;
    if (held) {
      if (snapshot.refreshedAt < held.refreshedAt) {
        return { accepted: false, reason: 'older_snapshot' };
      }
      if (snapshot.refreshedAt === held.refreshedAt && snapshot.cycleId <= held.cycleId) {
        return { accepted: false, reason: 'duplicate_cycle' };
      }
    }
    this.current = snapshot;
    this.lastCycleError = null;
    return { accepted: true };
  }

  currentSnapshot(): SnapshotRead {
    const snapshot = this.current;
    if (!snapshot) return { ready: false };
    const ageSeconds = this.ageSecondsOf(snapshot);
    return {
      ready: true,
      snapshot,
      ageSeconds,
      stale: ageSeconds * 1000 > this.ttlMs,
      ttlSeconds: Math.round(this.ttlMs / 1000),
    };
  }

  /** Seconds since the held snapshot was refreshed, or null while empty. */
  getAgeSeconds(): number | null {
    return this.current ? this.ageSecondsOf(this.current) : null;
  }

  isStale(): boolean {
    const age = this.getAgeSeconds();
    return age !== null && age * 1000 > this.ttlMs;
  }

  /** A cycle that could not commit leaves the held snapshot authoritative. */
  recordFailedCycle(error: unknown): void {
    this.lastCycleError = {
      message: error instanceof Error ? error.message : String(error),
      at: this.now(),
    };
  }

  getLastCycleError(): CycleError | null {
    return this.lastCycleError;
  }

  private ageSecondsOf(snapshot: Snapshot): number {
    return Math.max(0, (this.now() - snapshot.refreshedAt) / 1000);
  }
}
