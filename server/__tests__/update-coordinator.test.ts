import type { CompositeScore } from "../../lib/scoring/types";
import { MemoryScoreRepository } from "../cache/score-repository";
import { createEngine, type Engine } from "../engine";
import { GatedSampleStore, TODAY, daily, fixedNow, testConfig } from "./fakes";

const KEY = { dayKey: TODAY, scoreKind: "recovery" as const };

describe("UpdateCoordinator", () => {
  let store: GatedSampleStore;
  let repo: MemoryScoreRepository;
  let engine: Engine;

  beforeEach(async () => {
    store = new GatedSampleStore();
    repo = new MemoryScoreRepository();
    engine = createEngine(testConfig({ recomputeConcurrency: 2 }), { samples: store, repository: repo, now: fixedNow });
    await store.insertBatch(daily("hrv_sdnn", 40, "2024-03-01", 14));
    await store.insertBatch(daily("hrv_sdnn", 45, TODAY, 1));
  });

  afterEach(async () => {
    store.release();
    await engine.close();
  });

  it("moves idle → invalidated → computing → idle and publishes", async () => {
    const { coordinator, cache } = engine;
    const published: CompositeScore[] = [];
    coordinator.onPublished((s) => published.push(s));

    expect(coordinator.phaseOf(KEY)).toBe("idle");
    store.hold();
    coordinator.request(KEY);
    expect(coordinator.phaseOf(KEY)).toBe("invalidated");
    expect(cache.isStale(KEY)).toBe(true);

    await store.whenDayReads(1);
    expect(coordinator.phaseOf(KEY)).toBe("computing");

    store.release();
    await coordinator.settled();
    expect(coordinator.phaseOf(KEY)).toBe("idle");
    expect(published.map((s) => s.overall)).toEqual([43]);
    expect(cache.peek(KEY)?.value.overall).toBe(43);
    expect(cache.isStale(KEY)).toBe(false);
  });

  it("a repeated notification before the run starts is a no-op", async () => {
    const { coordinator } = engine;
    coordinator.request(KEY);
    coordinator.request(KEY);
    coordinator.request(KEY);
    await coordinator.settled();
    expect(coordinator.stats()).toMatchObject({ computations: 1, superseded: 0, pending: 0 });
  });

  it("a notification while computing supersedes; the stale result is dropped", async () => {
    const { coordinator, cache } = engine;
    const published: CompositeScore[] = [];
    coordinator.onPublished((s) => published.push(s));

    store.hold();
    coordinator.request(KEY);
    await store.whenDayReads(1);

    await store.insertBatch([{ metricKind: "hrv_sdnn", timestamp: `${TODAY}T20:00:00.000Z`, value: 55 }]);
    coordinator.request(KEY);
    expect(coordinator.phaseOf(KEY)).toBe("superseded");
    coordinator.request(KEY);
    expect(coordinator.phaseOf(KEY)).toBe("superseded");

    store.release();
    await coordinator.settled();
    await cache.flush();

    expect(coordinator.stats()).toMatchObject({ computations: 2, superseded: 1 });
    expect(store.maxActiveDayReads).toBe(1);
    expect(published).toHaveLength(1);
    // mean(45, 55) = 50 → ratio 1.25
    expect(published[0].components[0].rawInputs.hrvMs).toBe(50);
    expect(repo.saveCount(KEY)).toBe(1);
  });

  it("different keys compute concurrently on the pool", async () => {
    const { coordinator } = engine;
    store.hold();
    coordinator.request(KEY);
    coordinator.request({ dayKey: TODAY, scoreKind: "sleep" });
    await store.whenDayReads(2);
    expect(store.maxActiveDayReads).toBe(2);
    store.release();
    await coordinator.settled();
  });

  it("a failed computation logs, returns to idle and retries on the next notification", async () => {
    const error = jest.spyOn(console, "error").mockImplementation(() => {});
    const { coordinator, cache } = engine;
    store.failNextDayReads = 1;
    coordinator.request(KEY);
    await coordinator.settled();

    expect(coordinator.phaseOf(KEY)).toBe("idle");
    expect(coordinator.stats().failures).toBe(1);
    expect(cache.peek(KEY)).toBeNull();
    expect(error).toHaveBeenCalledWith("[coordinator] recompute recovery|2024-03-15 failed:", "sample store unreachable");

    coordinator.request(KEY);
    await coordinator.settled();
    expect(cache.peek(KEY)?.value.overall).toBe(43);
    error.mockRestore();
  });

  it("feed batches invalidate the sample's day and cached later days in the window", async () => {
    const log = jest.spyOn(console, "log").mockImplementation(() => {});
    const { coordinator, feed } = engine;
    coordinator.start();
    coordinator.request({ dayKey: "2024-03-14", scoreKind: "recovery" });
    await coordinator.settled();
    const before = coordinator.stats().computations;

    const late = { metricKind: "hrv_sdnn" as const, timestamp: "2024-03-10T21:00:00.000Z", value: 30 };
    await store.insertBatch([late]);
    feed.publish([late]);
    expect(coordinator.isPending({ dayKey: "2024-03-10", scoreKind: "recovery" })).toBe(true);
    expect(coordinator.isPending({ dayKey: "2024-03-14", scoreKind: "recovery" })).toBe(true);
    expect(coordinator.isPending({ dayKey: "2024-03-12", scoreKind: "recovery" })).toBe(false);
    expect(coordinator.isPending({ dayKey: "2024-03-10", scoreKind: "sleep" })).toBe(false);

    await coordinator.settled();
    expect(coordinator.stats().computations).toBe(before + 2);
    log.mockRestore();
  });

  it("stop unsubscribes from the feed", async () => {
    const log = jest.spyOn(console, "log").mockImplementation(() => {});
    engine.coordinator.start();
    expect(engine.feed.listenerCount()).toBe(1);
    await engine.coordinator.stop();
    expect(engine.feed.listenerCount()).toBe(0);
    log.mockRestore();
  });
});

describe("UpdateCoordinator later-day invalidation", () => {
  let store: GatedSampleStore;
  let repo: MemoryScoreRepository;
  let engine: Engine | null;

  const build = (cacheCapacity: number): Engine => {
    const built = createEngine(testConfig({ cacheCapacity }), { samples: store, repository: repo, now: fixedNow });
    built.coordinator.start();
    engine = built;
    return built;
  };

  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => {});
    store = new GatedSampleStore();
    repo = new MemoryScoreRepository();
    engine = null;
  });

  afterEach(async () => {
    store.release();
    if (engine) await engine.close();
    jest.restoreAllMocks();
  });

  it("marks a durable-only day stale and recomputes it on the next read", async () => {
    const { coordinator, cache, service } = build(1);
    await store.insertBatch(daily("hrv_sdnn", 40, "2024-03-01", 14));
    await store.insertBatch(daily("hrv_sdnn", 45, TODAY, 1));
    coordinator.request(KEY);
    await coordinator.settled();
    coordinator.request({ dayKey: TODAY, scoreKind: "sleep" });
    await coordinator.settled();
    await cache.flush();
    expect(cache.peek(KEY)).toBeNull();
    expect(repo.saveCount(KEY)).toBe(1);

    await service.ingest([{ metricKind: "hrv_sdnn", timestamp: "2024-03-14T20:00:00.000Z", value: 10 }]);
    expect(cache.isStale(KEY)).toBe(true);
    expect(coordinator.isPending(KEY)).toBe(false);
    await coordinator.settled();

    const first = await service.currentScore("recovery", TODAY);
    expect(first?.stale).toBe(true);
    expect(first?.value.overall).toBe(43);
    expect(coordinator.isPending(KEY)).toBe(true);

    await coordinator.settled();
    const second = await service.currentScore("recovery", TODAY);
    expect(second?.stale).toBe(false);
    // 13 days of 40 plus mean(40, 10) = 25 on 2024-03-14
    expect(second?.value.components[0].rawInputs.baselineMs).toBeCloseTo(545 / 14, 6);
    expect(coordinator.isPending(KEY)).toBe(false);
  });

  it("a window sample landing during a key's first computation supersedes it", async () => {
    const { coordinator, cache, service } = build(100);
    store.hold({ ranges: false });
    await service.ingest(daily("hrv_sdnn", 45, TODAY, 1));
    await store.whenDayReads(1);
    expect(coordinator.phaseOf(KEY)).toBe("computing");
    expect((await service.baseline("hrv_sdnn", TODAY)).status).toBe("insufficient");

    await service.ingest(daily("hrv_sdnn", 40, "2024-03-01", 14));
    expect(coordinator.phaseOf(KEY)).toBe("superseded");

    store.release();
    await coordinator.settled();
    await cache.flush();

    const entry = cache.peek(KEY);
    expect(entry?.stale).toBe(false);
    expect(entry?.value.components[0].complete).toBe(true);
    expect(entry?.value.components[0].rawInputs.baselineMs).toBe(40);
    expect(entry?.value.overall).toBe(43);
    expect(repo.saveCount(KEY)).toBe(1);
  });
});
