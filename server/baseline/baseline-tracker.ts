import { addDays, toDayKey } from "../../lib/day-key";
import { aggregate, groupByDay, reduceDay } from "../../lib/scoring/day-values";
import { METRIC_SPECS } from "../../lib/scoring/metrics";
import type { Baseline, BaselineMap, BiometricSample, MetricKind } from "../../lib/scoring/types";
import type { SampleStore } from "../samples/sample-store";

export interface BaselineTrackerOptions {
  windowDays: number;
  minCoverageDays: number;
  timezone: string;
  now?: () => Date;
}

interface CacheSlot {
  generation: number;
  value: Baseline | null;
  inflight: Promise<Baseline> | null;
}

const slotKey = (kind: MetricKind, asOf: string) => `${kind}|${asOf}`;

/**
 * Rolling trailing-window baselines. A baseline for `asOf` covers
 * [asOf - windowDays, asOf) so a day's own data never feeds its reference.
 * Results are memoized per (metric, asOf) and dropped when a sample lands
 * inside the window.
 */
export class BaselineTracker {
  private readonly slots = new Map<string, CacheSlot>();
  private fetches = 0;

  constructor(
    private readonly samples: SampleStore,
    private readonly options: BaselineTrackerOptions,
  ) {}

  get windowDays(): number {
    return this.options.windowDays;
  }

  /** Number of sample-window fetches issued so far. */
  get fetchCount(): number {
    return this.fetches;
  }

  async refreshBaseline(metricKind: MetricKind, asOf: string): Promise<Baseline> {
    const key = slotKey(metricKind, asOf);
    let slot = this.slots.get(key);
    if (!slot) {
      slot = { generation: 0, value: null, inflight: null };
      this.slots.set(key, slot);
    }
    if (slot.value) return slot.value;
    if (slot.inflight) return slot.inflight;

    const generation = slot.generation;
    const current = slot;
    const inflight = this.compute(metricKind, asOf).then(
      (baseline) => {
        if (current.generation === generation && this.slots.get(key) === current) {
          current.value = baseline;
        }
        if (current.inflight === inflight) current.inflight = null;
        return baseline;
      },
      (err: unknown) => {
        if (current.inflight === inflight) current.inflight = null;
        throw err;
      },
    );
    slot.inflight = inflight;
    return inflight;
  }

  async refreshMany(kinds: MetricKind[], asOf: string): Promise<BaselineMap> {
    const results = await Promise.all(kinds.map((k) => this.refreshBaseline(k, asOf)));
    const map: BaselineMap = {};
    for (const b of results) map[b.metricKind] = b;
    return map;
  }

  /** Cached value only; never triggers a fetch. */
  peek(metricKind: MetricKind, asOf: string): Baseline | null {
    return this.slots.get(slotKey(metricKind, asOf))?.value ?? null;
  }

  /**
   * Drops every memoized baseline whose window contains the sample's day,
   * i.e. asOf in (day, day + windowDays]. Returns the asOf days affected.
   */
  noteSample(sample: BiometricSample): string[] {
    const day = toDayKey(sample.timestamp, this.options.timezone);
    const affected: string[] = [];
    for (let i = 1; i <= this.options.windowDays; i++) {
      const asOf = addDays(day, i);
      affected.push(asOf);
      const slot = this.slots.get(slotKey(sample.metricKind, asOf));
      if (!slot) continue;
      slot.generation++;
      slot.value = null;
      slot.inflight = null;
    }
    return affected;
  }

  private async compute(metricKind: MetricKind, asOf: string): Promise<Baseline> {
    const { windowDays, minCoverageDays, timezone } = this.options;
    const start = addDays(asOf, -windowDays);
    this.fetches++;
    const samples = await this.samples.listRange(metricKind, start, asOf);
    const spec = METRIC_SPECS[metricKind];

    const dayValues: number[] = [];
    for (const [day, list] of groupByDay(samples, timezone)) {
      if (day < start || day >= asOf) continue;
      const v = reduceDay(list, spec.dayReducer);
      if (v != null && Number.isFinite(v)) dayValues.push(v);
    }

    const daysCovered = dayValues.length;
    const value = daysCovered >= minCoverageDays ? aggregate(dayValues, spec.aggregate) : null;
    const now = this.options.now ? this.options.now() : new Date();

    return {
      metricKind,
      asOf,
      windowDays,
      status: value == null ? "insufficient" : "available",
      aggregate: value,
      sampleCount: samples.length,
      daysCovered,
      computedAt: now.toISOString(),
    };
  }
}
