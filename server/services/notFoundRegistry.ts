import { LRUCache } from 'lru-cache';
import { NOT_FOUND_TTL_MS } from '../config.js';

interface NotFoundEntry {
  message: string;
  expiresAt: number;
}

const NOT_FOUND_REGISTRY_MAX_ENTRIES = 2_000;

/**
 * Remembers symbols the provider reported as unknown so later cycles can mark
 * them absent without another round trip, until the entry expires.
 */
export class NotFoundRegistry {
  private readonly entries = new LRUCache<string, NotFoundEntry>({ max: NOT_FOUND_REGISTRY_MAX_ENTRIES });
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: { ttlMs?: number; now?: () => number } = {}) {
    this.ttlMs = Math.max(0, options.ttlMs ?? NOT_FOUND_TTL_MS);
    this.now = options.now ?? Date.now;
  }

  record(symbol: string, message: string): void {
    if (this.ttlMs <= 0) return;
    this.entries.set(symbol.toUpperCase(), { message, expiresAt: this.now() + this.ttlMs });
  }

  /** The stored message while the entry is live, otherwise null. */
  lookup(symbol: string): string | null {
    const key = symbol.toUpperCase();
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return null;
    }
    return entry.message;
  }
}
