import type { CompositeScore, ScoreKey, ScoreKind } from "../../lib/scoring/types";
import { DurableWriteFailed, errorMessage } from "../errors";
import { DEFAULT_BACKOFF, RetriesExhausted, withBackoff, type BackoffOptions } from "../retry";
import { LruMap } from "./lru";
import { keyOf, scoreKeyId, type ScoreRepository, type StoredScore } from "./score-repository";

export interface CacheEntry {
  key: ScoreKey;
  value: CompositeScore;
  lastComputedAt: string;
  lastPublishedAt: string;
  stale: boolean;
}

export interface CacheStats {
  hits: number;
  misses: number;
  evictions: number;
  size: number;
  capacity: number;
  pendingWrites: number;
  durableFailures: number;
}

export interface ScoreCacheOptions {
  capacity: number;
  backoff?: BackoffOptions;
  now?: () => Date;
}

interface WriteSlot {
  pending: StoredScore | null;
  running: Promise<void>;
}

/**
 * Two-tier score cache. The memory tier is authoritative for reads; the
 * durable tier receives every put asynchronously, at most one write per key
 * in flight, and only the latest value queued behind it.
 */
export class ScoreCache {
  private readonly memory: LruMap<string, CacheEntry>;
  private readonly staleKeys = new Set<string>();
  private readonly writes = new Map<string, WriteSlot>();
  private readonly backoff: BackoffOptions;
  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private durableFailures = 0;

  constructor(
    private readonly repository: ScoreRepository,
    private readonly options: ScoreCacheOptions,
  ) {
    this.memory = new LruMap(options.capacity);
    this.backoff = options.backoff ?? DEFAULT_BACKOFF;
  }

  /** Memory first, then the durable tier. A durable hit is promoted into memory. */
  async get(key: ScoreKey): Promise<CacheEntry | null> {
    const id = scoreKeyId(key);
    const cached = this.memory.get(id);
    if (cached) {
      this.hits++;
      return this.withStaleness(id, cached);
    }
    this.misses++;

    let stored: StoredScore | null;
    try {
      stored = await this.repository.load(key);
    } catch (err) {
      console.error(`[score-cache] durable read ${id} failed:`, errorMessage(err));
      return null;
    }

    // A put may have landed while the load was pending.
    const raced = this.memory.get(id);
    if (raced) return this.withStaleness(id, raced);
    if (!stored) {
      // Nothing in either tier can be stale.
      this.staleKeys.delete(id);
      return null;
    }

    const entry: CacheEntry = {
      key: { dayKey: key.dayKey, scoreKind: key.scoreKind },
      value: stored.value,
      lastComputedAt: stored.value.computedAt,
      lastPublishedAt: stored.publishedAt,
      stale: false,
    };
    this.remember(id, entry);
    return this.withStaleness(id, entry);
  }

  /** Memory tier only, without touching recency or counters. */
  peek(key: ScoreKey): CacheEntry | null {
    const id = scoreKeyId(key);
    const entry = this.memory.peek(id);
    return entry ? this.withStaleness(id, entry) : null;
  }

  put(value: CompositeScore): CacheEntry {
    const key = keyOf(value);
    const id = scoreKeyId(key);
    const now = this.options.now ? this.options.now() : new Date();
    const entry: CacheEntry = {
      key,
      value,
      lastComputedAt: value.computedAt,
      lastPublishedAt: now.toISOString(),
      stale: false,
    };
    this.staleKeys.delete(id);
    this.remember(id, entry);
    this.enqueueWrite(id, { value, publishedAt: entry.lastPublishedAt });
    return entry;
  }

  /**
   * Marks the key stale in both tiers. The last value stays readable until
   * replaced; a mark on a key with no value is dropped by the next `get`.
   */
  invalidate(key: ScoreKey): void {
    this.staleKeys.add(scoreKeyId(key));
  }

  isStale(key: ScoreKey): boolean {
    return this.staleKeys.has(scoreKeyId(key));
  }

  /** Most recent day first, merging both tiers; memory wins on the same day. */
  async listRecent(scoreKind: ScoreKind, offset: number, limit: number): Promise<CacheEntry[]> {
    if (limit <= 0) return [];
    const byDay = new Map<string, CacheEntry>();

    let durable: StoredScore[] = [];
    try {
      durable = await this.repository.listRecent(scoreKind, 0, offset + limit);
    } catch (err) {
      console.error(`[score-cache] durable list ${scoreKind} failed:`, errorMessage(err));
    }
    for (const row of durable) {
      byDay.set(row.value.dayKey, {
        key: keyOf(row.value),
        value: row.value,
        lastComputedAt: row.value.computedAt,
        lastPublishedAt: row.publishedAt,
        stale: false,
      });
    }
    for (const entry of this.memory.values()) {
      if (entry.key.scoreKind === scoreKind) byDay.set(entry.key.dayKey, entry);
    }

    return [...byDay.values()]
      .sort((a, b) => b.key.dayKey.localeCompare(a.key.dayKey))
      .slice(offset, offset + limit)
      .map((e) => this.withStaleness(scoreKeyId(e.key), e));
  }

  /** Resolves once every queued durable write has settled. */
  async flush(): Promise<void> {
    while (this.writes.size > 0) {
      await Promise.all([...this.writes.values()].map((slot) => slot.running));
    }
  }

  stats(): CacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      size: this.memory.size,
      capacity: this.memory.capacity,
      pendingWrites: this.writes.size,
      durableFailures: this.durableFailures,
    };
  }

  private withStaleness(id: string, entry: CacheEntry): CacheEntry {
    return { ...entry, stale: this.staleKeys.has(id) };
  }

  private remember(id: string, entry: CacheEntry): void {
    const evicted = this.memory.set(id, entry);
    if (evicted) this.evictions++;
  }

  private enqueueWrite(id: string, stored: StoredScore): void {
    const slot = this.writes.get(id);
    if (slot) {
      slot.pending = stored;
      return;
    }
    const fresh: WriteSlot = { pending: stored, running: Promise.resolve() };
    this.writes.set(id, fresh);
    fresh.running = this.drain(id, fresh);
  }

  private async drain(id: string, slot: WriteSlot): Promise<void> {
    await Promise.resolve();
    while (slot.pending) {
      const next = slot.pending;
      slot.pending = null;
      try {
        await withBackoff(() => this.repository.save(next), this.backoff, (attempt, delayMs, err) => {
          console.warn(`[score-cache] durable write ${id} attempt ${attempt + 1} failed, retrying in ${delayMs}ms:`, errorMessage(err));
        });
      } catch (err) {
        this.durableFailures++;
        const cause = err instanceof RetriesExhausted ? err.lastError : err;
        const attempts = err instanceof RetriesExhausted ? err.attempts : 1;
        console.error("[score-cache]", new DurableWriteFailed(keyOf(next.value), attempts, cause).message);
      }
    }
    this.writes.delete(id);
  }
}
