import { baselineValue } from "./components";
import { clamp } from "./growth-curve";
import type { BaselineMap, DayValues, MetricKind } from "./types";

export type StressMetric = Extract<MetricKind, "walking_hr" | "respiratory_rate" | "oxygen_saturation">;
export type StressBand = "excellent" | "good" | "elevated" | "high";

export const STRESS_SENSITIVITY: Record<StressMetric, number> = {
  walking_hr: 1.2,
  respiratory_rate: 1.5,
  oxygen_saturation: 2.0,
};

export const STRESS_METRICS: StressMetric[] = ["walking_hr", "respiratory_rate", "oxygen_saturation"];

export interface StressReading {
  metric: StressMetric;
  current: number | null;
  baseline: number | null;
  weightedDeviationPct: number | null;
}

export function deviationPct(current: number, baseline: number): number | null {
  if (!(baseline > 0)) return null;
  return (Math.abs(current - baseline) / baseline) * 100;
}

export function readStress(day: DayValues, baselines: BaselineMap): StressReading[] {
  return STRESS_METRICS.map((metric) => {
    const current = day[metric] ?? null;
    const baseline = baselineValue(baselines, metric);
    const dev = current != null && baseline != null ? deviationPct(current, baseline) : null;
    return {
      metric,
      current,
      baseline,
      weightedDeviationPct: dev == null ? null : dev * STRESS_SENSITIVITY[metric],
    };
  });
}

export function stressScore(avgWeightedDeviation: number): number {
  return clamp(100 - avgWeightedDeviation, 0, 100);
}

export function stressBand(avgWeightedDeviation: number): StressBand {
  if (avgWeightedDeviation <= 3) return "excellent";
  if (avgWeightedDeviation <= 8) return "good";
  if (avgWeightedDeviation <= 15) return "elevated";
  return "high";
}
