import { isMetricKind } from "../lib/scoring/metrics";
import type { BiometricSample, MetricKind } from "../lib/scoring/types";

const ISO_REGEX = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d{1,6})?(?:Z|[+-]\d{2}:?\d{2})$/;

export interface ValidationResult {
  ok: boolean;
  errors: string[];
}

export interface SampleBatchResult extends ValidationResult {
  samples: BiometricSample[];
}

const RANGES: Record<MetricKind, [number, number]> = {
  hrv_sdnn: [1, 300],
  resting_hr: [25, 250],
  walking_hr: [25, 250],
  respiratory_rate: [4, 60],
  oxygen_saturation: [50, 100],
  sleep_asleep_min: [0, 1000],
  sleep_in_bed_min: [0, 1000],
  sleep_deep_min: [0, 1000],
  sleep_rem_min: [0, 1000],
  sleep_bedtime: [0, 1439.999],
  sleep_waketime: [0, 1439.999],
  sleep_hr: [25, 250],
};

export function parseStrictISO(ts: string): Date | null {
  if (typeof ts !== "string") return null;
  if (!ISO_REGEX.test(ts)) return null;
  const d = new Date(ts);
  if (isNaN(d.getTime())) return null;
  return d;
}

export function ensureUTCTimestamp(ts: string): string {
  const d = new Date(ts);
  if (isNaN(d.getTime())) return ts;
  return d.toISOString();
}

export function validateMetricValue(kind: MetricKind, val: unknown): val is number {
  if (typeof val !== "number" || !Number.isFinite(val)) return false;
  const [lo, hi] = RANGES[kind];
  return val >= lo && val <= hi;
}

function field(obj: object, key: string): unknown {
  return Object.prototype.hasOwnProperty.call(obj, key) ? Reflect.get(obj, key) : undefined;
}

/** Keeps the valid entries of a batch and reports the rest by index. */
export function validateSampleBatch(input: unknown): SampleBatchResult {
  const errors: string[] = [];
  const samples: BiometricSample[] = [];
  if (!Array.isArray(input)) {
    return { ok: false, errors: ["samples: expected an array"], samples };
  }
  input.forEach((raw: unknown, i) => {
    if (raw == null || typeof raw !== "object") {
      errors.push(`samples[${i}]: expected an object`);
      return;
    }
    const metricKind = field(raw, "metricKind");
    const timestamp = field(raw, "timestamp");
    const value = field(raw, "value");
    if (!isMetricKind(metricKind)) {
      errors.push(`samples[${i}].metricKind: unknown metric "${String(metricKind)}"`);
      return;
    }
    if (typeof timestamp !== "string" || !parseStrictISO(timestamp)) {
      errors.push(`samples[${i}].timestamp: invalid ISO timestamp "${String(timestamp)}"`);
      return;
    }
    if (!validateMetricValue(metricKind, value)) {
      const [lo, hi] = RANGES[metricKind];
      errors.push(`samples[${i}].value: out of range [${lo}-${hi}] for ${metricKind}, got ${String(value)}`);
      return;
    }
    samples.push({ metricKind, timestamp: ensureUTCTimestamp(timestamp), value });
  });
  return { ok: errors.length === 0, errors, samples };
}
