// resolver/cache.ts - Bounded in-memory LRU of name → coordinate lookups
//
// Process-lifetime only; nothing is persisted. Every operation is synchronous,
// so each one runs to completion without interleaving on the event loop. A
// get-then-put pair is NOT atomic: two concurrent misses on the same name can
// both reach the backend, and the second put simply overwrites the first.

import {
  DEFAULT_CACHE_CAPACITY,
  ValidationError,
  type ResolvedCoordinate,
} from "@skycut/contracts";

export interface CacheStats {
  size: number;
  capacity: number;
  hits: number;
  misses: number;
  evictions: number;
}

/** "  ngc   788 " and "NGC 788" share an entry */
export function normalizeName(name: string): string {
  return name.trim().replace(/\s+/g, " ").toLowerCase();
}

export class ResolutionCache {
  readonly capacity: number;
  // Map iteration order is insertion order; the first key is least recently used.
  private readonly entries = new Map<string, ResolvedCoordinate>();
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(capacity: number = DEFAULT_CACHE_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new ValidationError(`Cache capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.entries.size;
  }

  /** Lookup; a hit becomes the most recently used entry. */
  get(name: string): ResolvedCoordinate | undefined {
    const key = normalizeName(name);
    const value = this.entries.get(key);
    if (value === undefined) {
      this.misses++;
      return undefined;
    }
    this.hits++;
    this.entries.delete(key);
    this.entries.set(key, value);
    return value;
  }

  /** Insert or replace. A new key at capacity evicts the least recently used. */
  put(name: string, coord: ResolvedCoordinate): void {
    const key = normalizeName(name);
    if (this.entries.has(key)) {
      this.entries.delete(key);
    } else if (this.entries.size >= this.capacity) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        this.entries.delete(oldest.value);
        this.evictions++;
      }
    }
    this.entries.set(key, coord);
  }

  /** Membership test; does not touch recency or counters. */
  has(name: string): boolean {
    return this.entries.has(normalizeName(name));
  }

  delete(name: string): boolean {
    return this.entries.delete(normalizeName(name));
  }

  clear(): void {
    this.entries.clear();
  }

  /** Keys from least to most recently used */
  keys(): string[] {
    return [...this.entries.keys()];
  }

  stats(): CacheStats {
    return {
      size: this.entries.size,
      capacity: this.capacity,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
    };
  }
}
