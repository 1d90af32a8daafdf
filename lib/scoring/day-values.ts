import { toDayKey } from "../day-key";
import { METRIC_SPECS } from "./metrics";
import type { BaselineAggregate, BiometricSample, DayReducer, DayValues, MetricKind } from "./types";

const MINUTES_PER_DAY = 1440;

export function mean(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((s, v) => s + v, 0) / values.length;
}

/** Mean of clock times (minutes after midnight) on the 24h circle, in [0, 1440). */
export function circularMeanMinutes(values: number[]): number | null {
  if (values.length === 0) return null;
  let sinSum = 0;
  let cosSum = 0;
  for (const v of values) {
    const angle = (v / MINUTES_PER_DAY) * 2 * Math.PI;
    sinSum += Math.sin(angle);
    cosSum += Math.cos(angle);
  }
  if (Math.abs(sinSum) < 1e-9 && Math.abs(cosSum) < 1e-9) return null;
  let minutes = (Math.atan2(sinSum, cosSum) / (2 * Math.PI)) * MINUTES_PER_DAY;
  if (minutes < 0) minutes += MINUTES_PER_DAY;
  return Math.round(minutes * 1000) / 1000 % MINUTES_PER_DAY;
}

/** Signed difference actual − planned on the 24h circle, in (−720, 720]. */
export function circularDeltaMinutes(actual: number, planned: number): number {
  let d = actual - planned;
  while (d > 720) d -= MINUTES_PER_DAY;
  while (d <= -720) d += MINUTES_PER_DAY;
  return d;
}

export function aggregate(values: number[], how: BaselineAggregate): number | null {
  switch (how) {
    case "mean":
      return mean(values);
    case "circular":
      return circularMeanMinutes(values);
  }
}

function byTimestamp(a: BiometricSample, b: BiometricSample): number {
  return Date.parse(a.timestamp) - Date.parse(b.timestamp);
}

export function reduceDay(samples: BiometricSample[], how: DayReducer): number | null {
  if (samples.length === 0) return null;
  switch (how) {
    case "mean":
      return mean(samples.map((s) => s.value));
    case "sum":
      return samples.reduce((s, v) => s + v.value, 0);
    case "first":
      return [...samples].sort(byTimestamp)[0].value;
    case "last": {
      const sorted = [...samples].sort(byTimestamp);
      return sorted[sorted.length - 1].value;
    }
  }
}

export function groupByMetric(samples: BiometricSample[]): Map<MetricKind, BiometricSample[]> {
  const grouped = new Map<MetricKind, BiometricSample[]>();
  for (const s of samples) {
    const list = grouped.get(s.metricKind);
    if (list) list.push(s);
    else grouped.set(s.metricKind, [s]);
  }
  return grouped;
}

export function groupByDay(samples: BiometricSample[], timezone: string): Map<string, BiometricSample[]> {
  const grouped = new Map<string, BiometricSample[]>();
  for (const s of samples) {
    const day = toDayKey(s.timestamp, timezone);
    const list = grouped.get(day);
    if (list) list.push(s);
    else grouped.set(day, [s]);
  }
  return grouped;
}

/** One value per metric for a single day's samples. */
export function reduceDayValues(samples: BiometricSample[]): DayValues {
  const values: DayValues = {};
  for (const [kind, list] of groupByMetric(samples)) {
    const v = reduceDay(list, METRIC_SPECS[kind].dayReducer);
    if (v != null && Number.isFinite(v)) values[kind] = v;
  }
  return values;
}
