import Bottleneck from "bottleneck";
import { toDayKey } from "../../lib/day-key";
import { computeCompositeScore, DEFAULT_SCORING_CONFIG, type ScoringConfig } from "../../lib/scoring";
import { baselineMetricsFor, dayMetricsFor, SCORE_KINDS, scoreKindsReading } from "../../lib/scoring/metrics";
import type { BiometricSample, CompositeScore, ScoreKey } from "../../lib/scoring/types";
import type { BaselineTracker } from "../baseline/baseline-tracker";
import { scoreKeyId } from "../cache/score-repository";
import type { ScoreCache } from "../cache/score-cache";
import { errorMessage } from "../errors";
import type { SampleSubscription } from "../samples/sample-feed";
import type { SampleStore } from "../samples/sample-store";

export type KeyPhase = "idle" | "invalidated" | "computing" | "superseded";

export type ScoreListener = (score: CompositeScore) => void;

export interface UpdateCoordinatorOptions {
  timezone: string;
  concurrency: number;
  scoring?: ScoringConfig;
  now?: () => Date;
}

export interface CoordinatorStats {
  pending: number;
  computations: number;
  superseded: number;
  failures: number;
}

interface KeyState {
  key: ScoreKey;
  computing: boolean;
  supersedePending: boolean;
}

/**
 * Turns sample notifications into recomputations. Each score key has at most
 * one computation in flight; a notification that lands mid-computation marks
 * it superseded, its result is dropped and the key runs again.
 */
export class UpdateCoordinator {
  private readonly limiter: Bottleneck;
  private readonly states = new Map<string, KeyState>();
  private readonly listeners = new Set<ScoreListener>();
  private idleWaiters: Array<() => void> = [];
  private unsubscribe: (() => void) | null = null;
  private stopped = false;
  private computations = 0;
  private supersededCount = 0;
  private failures = 0;

  constructor(
    private readonly feed: SampleSubscription,
    private readonly samples: SampleStore,
    private readonly baselines: BaselineTracker,
    private readonly cache: ScoreCache,
    private readonly options: UpdateCoordinatorOptions,
  ) {
    this.limiter = new Bottleneck({ maxConcurrent: options.concurrency });
  }

  start(): void {
    if (this.unsubscribe || this.stopped) return;
    this.unsubscribe = this.feed.subscribe((batch) => this.handleBatch(batch));
    console.log(`[coordinator] listening for samples (concurrency ${this.options.concurrency})`);
  }

  /** Unsubscribes, then waits for pending keys to finish. */
  async stop(): Promise<void> {
    if (this.unsubscribe) {
      this.unsubscribe();
      this.unsubscribe = null;
    }
    await this.settled();
    if (this.stopped) return;
    this.stopped = true;
    await this.limiter.stop({ dropWaitingJobs: false });
  }

  onPublished(listener: ScoreListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  phaseOf(key: ScoreKey): KeyPhase {
    const state = this.states.get(scoreKeyId(key));
    if (!state) return "idle";
    if (!state.computing) return "invalidated";
    return state.supersedePending ? "superseded" : "computing";
  }

  isPending(key: ScoreKey): boolean {
    return this.states.has(scoreKeyId(key));
  }

  /** Resolves once no key is invalidated or computing. */
  settled(): Promise<void> {
    if (this.states.size === 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  stats(): CoordinatorStats {
    return {
      pending: this.states.size,
      computations: this.computations,
      superseded: this.supersededCount,
      failures: this.failures,
    };
  }

  handleBatch(batch: BiometricSample[]): void {
    const now = this.now();
    const today = toDayKey(now, this.options.timezone);
    for (const sample of batch) {
      const later = this.baselines.noteSample(sample);
      const day = toDayKey(sample.timestamp, this.options.timezone);
      for (const scoreKind of scoreKindsReading(sample.metricKind)) {
        this.request({ dayKey: day, scoreKind });
      }
      for (const scoreKind of SCORE_KINDS) {
        if (!baselineMetricsFor(scoreKind).includes(sample.metricKind)) continue;
        for (const dayKey of later) {
          if (dayKey > today) break;
          const key = { dayKey, scoreKind };
          // Keys not held in memory are only marked; the next read recomputes them.
          if (this.states.has(scoreKeyId(key)) || this.cache.peek(key)) {
            this.request(key);
          } else {
            this.cache.invalidate(key);
          }
        }
      }
    }
  }

  /** Invalidates the key and schedules a recomputation unless one is already due. */
  request(key: ScoreKey): void {
    if (this.stopped) {
      console.warn(`[coordinator] stopped, ignoring request for ${scoreKeyId(key)}`);
      return;
    }
    const id = scoreKeyId(key);
    this.cache.invalidate(key);
    const state = this.states.get(id);
    if (!state) {
      const fresh: KeyState = { key: { dayKey: key.dayKey, scoreKind: key.scoreKind }, computing: false, supersedePending: false };
      this.states.set(id, fresh);
      this.schedule(id, fresh);
      return;
    }
    if (state.computing) state.supersedePending = true;
  }

  private schedule(id: string, state: KeyState): void {
    this.limiter.schedule(() => this.run(id, state)).catch((err: unknown) => {
      console.error(`[coordinator] could not schedule ${id}:`, errorMessage(err));
      this.finish(id);
    });
  }

  private async run(id: string, state: KeyState): Promise<void> {
    state.computing = true;
    this.computations++;
    let score: CompositeScore | null = null;
    try {
      score = await this.compute(state.key);
    } catch (err) {
      this.failures++;
      console.error(`[coordinator] recompute ${id} failed:`, errorMessage(err));
    }

    if (state.supersedePending) {
      state.supersedePending = false;
      state.computing = false;
      this.supersededCount++;
      console.debug(`[coordinator] ${id} superseded, recomputing`);
      this.schedule(id, state);
      return;
    }

    if (score) {
      this.cache.put(score);
      this.emit(score);
    }
    this.finish(id);
  }

  private async compute(key: ScoreKey): Promise<CompositeScore> {
    const wanted = dayMetricsFor(key.scoreKind);
    const [daySamples, baselines] = await Promise.all([
      this.samples.listDay(key.dayKey),
      this.baselines.refreshMany(baselineMetricsFor(key.scoreKind), key.dayKey),
    ]);
    return computeCompositeScore(
      key.scoreKind,
      key.dayKey,
      daySamples.filter((s) => wanted.includes(s.metricKind)),
      baselines,
      this.now().toISOString(),
      this.options.scoring ?? DEFAULT_SCORING_CONFIG,
    );
  }

  private emit(score: CompositeScore): void {
    for (const listener of this.listeners) {
      try {
        listener(score);
      } catch (err) {
        console.error("[coordinator] score listener failed:", err);
      }
    }
  }

  private finish(id: string): void {
    this.states.delete(id);
    if (this.states.size > 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  private now(): Date {
    return this.options.now ? this.options.now() : new Date();
  }
}
