import { BaselineTracker } from "./baseline/baseline-tracker";
import { PgScoreRepository } from "./cache/pg-score-repository";
import { ScoreCache } from "./cache/score-cache";
import { MemoryScoreRepository, type ScoreRepository } from "./cache/score-repository";
import type { EngineConfig } from "./config";
import { UpdateCoordinator } from "./coordinator/update-coordinator";
import { initDb } from "./db";
import { PgSampleStore } from "./samples/pg-sample-store";
import { SampleFeed } from "./samples/sample-feed";
import { MemorySampleStore, type SampleStore } from "./samples/sample-store";
import { ScoreService } from "./score-service";

export interface EngineOverrides {
  samples?: SampleStore;
  repository?: ScoreRepository;
  now?: () => Date;
}

export interface Engine {
  samples: SampleStore;
  feed: SampleFeed;
  baselines: BaselineTracker;
  cache: ScoreCache;
  coordinator: UpdateCoordinator;
  service: ScoreService;
  /** Stops recomputation and waits for queued durable writes. */
  close(): Promise<void>;
}

/** Wires the engine without touching storage; `startEngine` also prepares the database. */
export function createEngine(config: EngineConfig, overrides: EngineOverrides = {}): Engine {
  const pg = config.storage === "pg";
  const samples = overrides.samples ?? (pg ? new PgSampleStore(config.timezone) : new MemorySampleStore(config.timezone));
  const repository = overrides.repository ?? (pg ? new PgScoreRepository() : new MemoryScoreRepository());
  const feed = new SampleFeed();
  const baselines = new BaselineTracker(samples, {
    windowDays: config.baselineWindowDays,
    minCoverageDays: config.baselineMinCoverageDays,
    timezone: config.timezone,
    now: overrides.now,
  });
  const cache = new ScoreCache(repository, {
    capacity: config.cacheCapacity,
    backoff: {
      attempts: config.durableWriteAttempts,
      baseDelayMs: config.durableWriteBaseDelayMs,
      maxDelayMs: 10000,
    },
    now: overrides.now,
  });
  const coordinator = new UpdateCoordinator(feed, samples, baselines, cache, {
    timezone: config.timezone,
    concurrency: config.recomputeConcurrency,
    scoring: { growthCurve: config.growthCurve },
    now: overrides.now,
  });
  const service = new ScoreService({ samples, feed, baselines, cache, coordinator, timezone: config.timezone, now: overrides.now });

  return {
    samples,
    feed,
    baselines,
    cache,
    coordinator,
    service,
    async close() {
      await coordinator.stop();
      await cache.flush();
    },
  };
}

export async function startEngine(config: EngineConfig, overrides: EngineOverrides = {}): Promise<Engine> {
  if (config.storage === "pg" && !overrides.samples && !overrides.repository) {
    await initDb();
  }
  const engine = createEngine(config, overrides);
  engine.coordinator.start();
  console.log(`[engine] started (storage=${config.storage}, timezone=${config.timezone})`);
  return engine;
}
