import type pg from "pg";
import { toDayKey } from "../../lib/day-key";
import { isMetricKind } from "../../lib/scoring/metrics";
import type { BiometricSample, MetricKind } from "../../lib/scoring/types";
import { pool as defaultPool } from "../db";
import type { SampleStore } from "./sample-store";

const DEFAULT_USER_ID = "local_default";
const INSERT_CHUNK = 500;

type SampleRow = {
  metric_kind: string;
  ts: Date;
  value: number | string;
};

function toSample(r: SampleRow): BiometricSample | null {
  if (!isMetricKind(r.metric_kind)) return null;
  return { metricKind: r.metric_kind, timestamp: r.ts.toISOString(), value: Number(r.value) };
}

function toSamples(rows: SampleRow[]): BiometricSample[] {
  return rows.map(toSample).filter((s): s is BiometricSample => s != null);
}

export class PgSampleStore implements SampleStore {
  constructor(
    private readonly timezone: string,
    private readonly db: pg.Pool = defaultPool,
    private readonly userId: string = DEFAULT_USER_ID,
  ) {}

  async insertBatch(samples: BiometricSample[]): Promise<BiometricSample[]> {
    const inserted: BiometricSample[] = [];
    for (let i = 0; i < samples.length; i += INSERT_CHUNK) {
      const chunk = samples.slice(i, i + INSERT_CHUNK);
      const values: unknown[] = [];
      const placeholders = chunk.map((s, j) => {
        const base = j * 5;
        values.push(this.userId, s.metricKind, s.timestamp, toDayKey(s.timestamp, this.timezone), s.value);
        return `($${base + 1}, $${base + 2}, $${base + 3}::timestamptz, $${base + 4}::date, $${base + 5})`;
      });
      const { rows } = await this.db.query<SampleRow>(
        `INSERT INTO biometric_sample (user_id, metric_kind, ts, day_key, value)
         VALUES ${placeholders.join(", ")}
         ON CONFLICT (user_id, metric_kind, ts) DO NOTHING
         RETURNING metric_kind, ts, value`,
        values,
      );
      inserted.push(...toSamples(rows));
    }
    return inserted;
  }

  async listRange(metricKind: MetricKind, startDay: string, endDayExclusive: string): Promise<BiometricSample[]> {
    const { rows } = await this.db.query<SampleRow>(
      `SELECT metric_kind, ts, value FROM biometric_sample
       WHERE user_id = $1 AND metric_kind = $2 AND day_key >= $3::date AND day_key < $4::date
       ORDER BY ts ASC`,
      [this.userId, metricKind, startDay, endDayExclusive],
    );
    return toSamples(rows);
  }

  async listDay(dayKey: string): Promise<BiometricSample[]> {
    const { rows } = await this.db.query<SampleRow>(
      `SELECT metric_kind, ts, value FROM biometric_sample
       WHERE user_id = $1 AND day_key = $2::date
       ORDER BY ts ASC`,
      [this.userId, dayKey],
    );
    return toSamples(rows);
  }
}
