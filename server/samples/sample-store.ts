import { toDayKey } from "../../lib/day-key";
import type { BiometricSample, MetricKind } from "../../lib/scoring/types";

export interface SampleStore {
  /** Inserts samples, ignoring ones already stored under the same (metricKind, timestamp). Returns the new ones. */
  insertBatch(samples: BiometricSample[]): Promise<BiometricSample[]>;
  /** Samples of one metric whose day falls in [startDay, endDayExclusive). */
  listRange(metricKind: MetricKind, startDay: string, endDayExclusive: string): Promise<BiometricSample[]>;
  /** Every sample that falls on `dayKey`. */
  listDay(dayKey: string): Promise<BiometricSample[]>;
}

export function sampleId(s: Pick<BiometricSample, "metricKind" | "timestamp">): string {
  return `${s.metricKind}|${new Date(s.timestamp).toISOString()}`;
}

interface StoredSample {
  sample: BiometricSample;
  dayKey: string;
}

export class MemorySampleStore implements SampleStore {
  private readonly rows = new Map<string, StoredSample>();

  constructor(private readonly timezone: string = "UTC") {}

  async insertBatch(samples: BiometricSample[]): Promise<BiometricSample[]> {
    const inserted: BiometricSample[] = [];
    for (const s of samples) {
      const id = sampleId(s);
      if (this.rows.has(id)) continue;
      const sample = { ...s, timestamp: new Date(s.timestamp).toISOString() };
      this.rows.set(id, { sample, dayKey: toDayKey(sample.timestamp, this.timezone) });
      inserted.push(sample);
    }
    return inserted;
  }

  async listRange(metricKind: MetricKind, startDay: string, endDayExclusive: string): Promise<BiometricSample[]> {
    const out: BiometricSample[] = [];
    for (const { sample, dayKey } of this.rows.values()) {
      if (sample.metricKind === metricKind && dayKey >= startDay && dayKey < endDayExclusive) out.push(sample);
    }
    return out.sort((a, b) => a.timestamp.localeCompare(b.timestamp));
  }

  async listDay(dayKey: string): Promise<BiometricSample[]> {
    const out: BiometricSample[] = [];
    for (const row of this.rows.values()) {
      if (row.dayKey === dayKey) out.push(row.sample);
    }
    return out.sort((a, b) => a.timestamp.localeCompare(b.timestamp));
  }

  size(): number {
    return this.rows.size;
  }
}
