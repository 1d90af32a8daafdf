import type { BiometricSample, MetricKind } from "../../lib/scoring/types";
import { addDays } from "../../lib/day-key";
import { loadConfig, type EngineConfig } from "../config";
import { MemorySampleStore, type SampleStore } from "../samples/sample-store";

export const TODAY = "2024-03-15";
export const NOW = new Date("2024-03-15T12:00:00.000Z");
export const fixedNow = () => NOW;

export function testConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return {
    ...loadConfig({ STORAGE: "memory", API_KEY: "test-secret" }),
    durableWriteAttempts: 3,
    durableWriteBaseDelayMs: 0,
    ...overrides,
  };
}

/** One sample per day at 08:00 UTC for `count` days starting at `startDay`. */
export function daily(metricKind: MetricKind, value: number, startDay: string, count: number, hour = 8): BiometricSample[] {
  const samples: BiometricSample[] = [];
  for (let i = 0; i < count; i++) {
    const day = addDays(startDay, i);
    samples.push({ metricKind, timestamp: `${day}T${String(hour).padStart(2, "0")}:00:00.000Z`, value });
  }
  return samples;
}

interface ReadWatcher {
  count: number;
  resolve: () => void;
}

/**
 * Memory store whose reads can be held open, so tests can act while a
 * recomputation is suspended on its sample fetch.
 */
export class GatedSampleStore implements SampleStore {
  readonly inner = new MemorySampleStore("UTC");
  dayReads = 0;
  rangeReads = 0;
  activeDayReads = 0;
  maxActiveDayReads = 0;
  failNextDayReads = 0;
  private gate: Promise<void> | null = null;
  private gateRanges = true;
  private openGate: (() => void) | null = null;
  private watchers: ReadWatcher[] = [];

  /** Holds day reads, and range reads too unless `ranges` is false. */
  hold(options: { ranges?: boolean } = {}): void {
    this.gateRanges = options.ranges ?? true;
    this.gate = new Promise((resolve) => {
      this.openGate = resolve;
    });
  }

  release(): void {
    const open = this.openGate;
    this.gate = null;
    this.openGate = null;
    if (open) open();
  }

  /** Resolves once `count` day reads have started. */
  whenDayReads(count: number): Promise<void> {
    if (this.dayReads >= count) return Promise.resolve();
    return new Promise((resolve) => {
      this.watchers.push({ count, resolve });
    });
  }

  insertBatch(samples: BiometricSample[]): Promise<BiometricSample[]> {
    return this.inner.insertBatch(samples);
  }

  async listRange(metricKind: MetricKind, startDay: string, endDayExclusive: string): Promise<BiometricSample[]> {
    this.rangeReads++;
    if (this.gate && this.gateRanges) await this.gate;
    return this.inner.listRange(metricKind, startDay, endDayExclusive);
  }

  async listDay(dayKey: string): Promise<BiometricSample[]> {
    this.dayReads++;
    this.activeDayReads++;
    this.maxActiveDayReads = Math.max(this.maxActiveDayReads, this.activeDayReads);
    const ready = this.watchers.filter((w) => w.count <= this.dayReads);
    this.watchers = this.watchers.filter((w) => w.count > this.dayReads);
    for (const w of ready) w.resolve();
    try {
      if (this.gate) await this.gate;
      if (this.failNextDayReads > 0) {
        this.failNextDayReads--;
        throw new Error("sample store unreachable");
      }
      return await this.inner.listDay(dayKey);
    } finally {
      this.activeDayReads--;
    }
  }
}
