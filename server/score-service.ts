import { addDays, localHour, toDayKey } from "../lib/day-key";
import { freshnessMessage, resolveFreshness } from "../lib/freshness";
import type { Baseline, BiometricSample, CompositeScore, FreshnessStatus, MetricKind, ScoreKind } from "../lib/scoring/types";
import type { BaselineTracker } from "./baseline/baseline-tracker";
import type { CacheEntry, CacheStats, ScoreCache } from "./cache/score-cache";
import type { CoordinatorStats, UpdateCoordinator } from "./coordinator/update-coordinator";
import type { SampleFeed } from "./samples/sample-feed";
import type { SampleStore } from "./samples/sample-store";

const HISTORY_PAGE = 50;

export interface ScoreServiceDeps {
  samples: SampleStore;
  feed: SampleFeed;
  baselines: BaselineTracker;
  cache: ScoreCache;
  coordinator: UpdateCoordinator;
  timezone: string;
  now?: () => Date;
}

export interface IngestResult {
  received: number;
  inserted: number;
}

export interface Freshness {
  scoreKind: ScoreKind;
  dayKey: string;
  status: FreshnessStatus;
  message: string | null;
  lastPublishedAt: string | null;
}

export interface Diagnostics {
  cache: CacheStats;
  coordinator: CoordinatorStats;
  baselineFetches: number;
}

/** Read and write surface shared by the HTTP routes and the dev scripts. */
export class ScoreService {
  constructor(private readonly deps: ScoreServiceDeps) {}

  today(): string {
    return toDayKey(this.now(), this.deps.timezone);
  }

  /** Stores the batch and announces only the samples that were new. */
  async ingest(samples: BiometricSample[]): Promise<IngestResult> {
    const inserted = await this.deps.samples.insertBatch(samples);
    this.deps.feed.publish(inserted);
    return { received: samples.length, inserted: inserted.length };
  }

  /**
   * Latest cached score. A miss or a stale entry schedules the computation;
   * a stale entry is still returned, flagged.
   */
  async currentScore(scoreKind: ScoreKind, dayKey: string): Promise<CacheEntry | null> {
    const key = { dayKey, scoreKind };
    const entry = await this.deps.cache.get(key);
    if ((!entry || entry.stale) && !this.deps.coordinator.isPending(key)) {
      this.deps.coordinator.request(key);
    }
    return entry;
  }

  /** Scores of the last `rangeDays` days up to today, most recent first. */
  async history(scoreKind: ScoreKind, rangeDays: number): Promise<CompositeScore[]> {
    if (rangeDays <= 0) return [];
    const today = this.today();
    const start = addDays(today, -(rangeDays - 1));
    const out: CompositeScore[] = [];
    for (let offset = 0; ; offset += HISTORY_PAGE) {
      const page = await this.deps.cache.listRecent(scoreKind, offset, HISTORY_PAGE);
      for (const entry of page) {
        const day = entry.key.dayKey;
        if (day > today) continue;
        if (day < start) return out;
        out.push(entry.value);
      }
      if (page.length < HISTORY_PAGE) return out;
    }
  }

  async freshnessStatus(scoreKind: ScoreKind, dayKey: string): Promise<Freshness> {
    const key = { dayKey, scoreKind };
    const entry = await this.deps.cache.get(key);
    const now = this.now();
    const status = resolveFreshness({
      pending: this.deps.coordinator.isPending(key),
      hasScore: entry != null,
      dataComplete: entry?.value.dataComplete ?? false,
      lastPublishedAt: entry ? Date.parse(entry.lastPublishedAt) : null,
      now: now.getTime(),
    });
    return {
      scoreKind,
      dayKey,
      status,
      message: freshnessMessage(status, localHour(now, this.deps.timezone)),
      lastPublishedAt: entry?.lastPublishedAt ?? null,
    };
  }

  baseline(metricKind: MetricKind, asOf: string): Promise<Baseline> {
    return this.deps.baselines.refreshBaseline(metricKind, asOf);
  }

  diagnostics(): Diagnostics {
    return {
      cache: this.deps.cache.stats(),
      coordinator: this.deps.coordinator.stats(),
      baselineFetches: this.deps.baselines.fetchCount,
    };
  }

  private now(): Date {
    return this.deps.now ? this.deps.now() : new Date();
  }
}
