import type { MetricKind, MetricSpec, ScoreKind } from "./types";

export const METRIC_SPECS: Record<MetricKind, MetricSpec> = {
  hrv_sdnn: { unit: "ms", dayReducer: "mean", aggregate: "mean" },
  resting_hr: { unit: "bpm", dayReducer: "mean", aggregate: "mean" },
  walking_hr: { unit: "bpm", dayReducer: "mean", aggregate: "mean" },
  respiratory_rate: { unit: "breaths/min", dayReducer: "mean", aggregate: "mean" },
  oxygen_saturation: { unit: "%", dayReducer: "mean", aggregate: "mean" },
  sleep_asleep_min: { unit: "min", dayReducer: "sum", aggregate: "mean" },
  sleep_in_bed_min: { unit: "min", dayReducer: "sum", aggregate: "mean" },
  sleep_deep_min: { unit: "min", dayReducer: "sum", aggregate: "mean" },
  sleep_rem_min: { unit: "min", dayReducer: "sum", aggregate: "mean" },
  sleep_bedtime: { unit: "clock min", dayReducer: "first", aggregate: "circular" },
  sleep_waketime: { unit: "clock min", dayReducer: "last", aggregate: "circular" },
  sleep_hr: { unit: "bpm", dayReducer: "mean", aggregate: "mean" },
};

export const METRIC_KINDS: readonly MetricKind[] = [
  "hrv_sdnn",
  "resting_hr",
  "walking_hr",
  "respiratory_rate",
  "oxygen_saturation",
  "sleep_asleep_min",
  "sleep_in_bed_min",
  "sleep_deep_min",
  "sleep_rem_min",
  "sleep_bedtime",
  "sleep_waketime",
  "sleep_hr",
];

export const SCORE_KINDS: readonly ScoreKind[] = ["recovery", "sleep"];

export function isMetricKind(value: unknown): value is MetricKind {
  return METRIC_KINDS.some((kind) => kind === value);
}

export function isScoreKind(value: unknown): value is ScoreKind {
  return value === "recovery" || value === "sleep";
}

const SLEEP_DAY_METRICS: MetricKind[] = [
  "sleep_asleep_min",
  "sleep_in_bed_min",
  "sleep_deep_min",
  "sleep_rem_min",
  "sleep_bedtime",
];

const RECOVERY_DAY_METRICS: MetricKind[] = [...METRIC_KINDS];

export function dayMetricsFor(kind: ScoreKind): MetricKind[] {
  switch (kind) {
    case "recovery":
      return RECOVERY_DAY_METRICS;
    case "sleep":
      return SLEEP_DAY_METRICS;
  }
}

export function baselineMetricsFor(kind: ScoreKind): MetricKind[] {
  switch (kind) {
    case "recovery":
      return ["hrv_sdnn", "resting_hr", "walking_hr", "respiratory_rate", "oxygen_saturation", "sleep_bedtime", "sleep_waketime"];
    case "sleep":
      return ["sleep_bedtime"];
  }
}

export function scoreKindsReading(metric: MetricKind): ScoreKind[] {
  return SCORE_KINDS.filter((kind) => dayMetricsFor(kind).includes(metric));
}
