import {
  RECOVERY_WEIGHTS,
  baselineValue,
  completeComponent,
  composeScore,
  gapReason,
  missingComponent,
} from "./components";
import { mean } from "./day-values";
import { DEFAULT_GROWTH_CURVE, clamp, growthCurveScore, type GrowthCurveConfig } from "./growth-curve";
import {
  MAX_POINTS,
  bedtimeConsistencyPoints,
  efficiencyPoints,
  sleepEfficiencyPct,
  toNormalized,
  wakeConsistencyPoints,
} from "./sleep-points";
import { readStress, stressBand, stressScore } from "./stress";
import type { BaselineMap, CompositeScore, DayValues, ScoreComponent } from "./types";

export const SLEEP_QUALITY_WEIGHTS = {
  efficiency: 0.3,
  deep_rem: 0.3,
  hr_dip: 0.25,
  consistency: 0.15,
} as const;

export type SleepQualityPart = keyof typeof SLEEP_QUALITY_WEIGHTS;

export const SLEEP_QUALITY_PARTS: SleepQualityPart[] = ["efficiency", "deep_rem", "hr_dip", "consistency"];

const DEEP_REM_RANGE = { min: 33, max: 48, overshoot: 10 } as const;
const FULL_HR_DIP = 0.1;

const pct = (x: number) => `${x >= 0 ? "+" : ""}${(x * 100).toFixed(1)}%`;

export function hrvComponent(day: DayValues, baselines: BaselineMap, curve: GrowthCurveConfig): ScoreComponent {
  const current = day.hrv_sdnn;
  const baseline = baselineValue(baselines, "hrv_sdnn");
  if (current == null || baseline == null || !(baseline > 0)) {
    return missingComponent(
      "hrv",
      RECOVERY_WEIGHTS.hrv,
      { hrvMs: current ?? null, baselineMs: baseline, ratio: null },
      gapReason(current, baseline, "HRV"),
    );
  }
  const ratio = current / baseline;
  return completeComponent(
    "hrv",
    RECOVERY_WEIGHTS.hrv,
    growthCurveScore(ratio, curve),
    { hrvMs: current, baselineMs: baseline, ratio },
    `HRV ${current.toFixed(1)}ms vs baseline ${baseline.toFixed(1)}ms (${pct(ratio - 1)})`,
  );
}

/** Lower is better, so the ratio is inverted before it goes through the curve. */
export function restingHrComponent(day: DayValues, baselines: BaselineMap, curve: GrowthCurveConfig): ScoreComponent {
  const current = day.resting_hr;
  const baseline = baselineValue(baselines, "resting_hr");
  if (current == null || baseline == null || !(current > 0)) {
    return missingComponent(
      "resting_hr",
      RECOVERY_WEIGHTS.resting_hr,
      { restingHrBpm: current ?? null, baselineBpm: baseline, ratio: null },
      gapReason(current, baseline, "resting heart rate"),
    );
  }
  const ratio = baseline / current;
  return completeComponent(
    "resting_hr",
    RECOVERY_WEIGHTS.resting_hr,
    growthCurveScore(ratio, curve),
    { restingHrBpm: current, baselineBpm: baseline, ratio },
    `Resting HR ${Math.round(current)} bpm vs baseline ${Math.round(baseline)} bpm`,
  );
}

export function rangeScore(value: number, min: number, max: number, overshoot: number): number {
  if (value >= min && value <= max) return 100;
  if (value < min) return clamp((value / min) * 100, 0, 100);
  return clamp((1 - (value - max) / overshoot) * 100, 0, 100);
}

export function sleepQualityParts(day: DayValues, baselines: BaselineMap): Record<SleepQualityPart, number | null> {
  const asleep = day.sleep_asleep_min ?? null;
  const inBed = day.sleep_in_bed_min ?? null;
  const effPct = asleep != null && inBed != null ? sleepEfficiencyPct(asleep, inBed) : null;
  const efficiency = effPct == null ? null : toNormalized(efficiencyPoints(effPct), MAX_POINTS.efficiency);

  const deep = day.sleep_deep_min;
  const rem = day.sleep_rem_min;
  const deepRem =
    asleep != null && asleep > 0 && deep != null && rem != null
      ? rangeScore(((deep + rem) / asleep) * 100, DEEP_REM_RANGE.min, DEEP_REM_RANGE.max, DEEP_REM_RANGE.overshoot)
      : null;

  const sleepHr = day.sleep_hr;
  const rhr = day.resting_hr;
  const hrDip =
    sleepHr != null && rhr != null && rhr > 0 ? clamp(((1 - sleepHr / rhr) / FULL_HR_DIP) * 100, 0, 100) : null;

  const bed = day.sleep_bedtime;
  const wake = day.sleep_waketime;
  const bedTarget = baselineValue(baselines, "sleep_bedtime");
  const wakeTarget = baselineValue(baselines, "sleep_waketime");
  const consistency =
    bed != null && wake != null && bedTarget != null && wakeTarget != null
      ? mean([
          toNormalized(bedtimeConsistencyPoints(bed, bedTarget), MAX_POINTS.consistency),
          toNormalized(wakeConsistencyPoints(wake, wakeTarget), MAX_POINTS.consistency),
        ])
      : null;

  return { efficiency, deep_rem: deepRem, hr_dip: hrDip, consistency };
}

export function sleepQualityComponent(day: DayValues, baselines: BaselineMap): ScoreComponent {
  const parts = sleepQualityParts(day, baselines);
  const rawInputs: Record<string, number | null> = {
    efficiency: parts.efficiency,
    deepRem: parts.deep_rem,
    hrDip: parts.hr_dip,
    consistency: parts.consistency,
  };
  let value = 0;
  const missing: SleepQualityPart[] = [];
  for (const part of SLEEP_QUALITY_PARTS) {
    const v = parts[part];
    if (v == null) missing.push(part);
    else value += v * SLEEP_QUALITY_WEIGHTS[part];
  }
  if (missing.length > 0) {
    return missingComponent(
      "sleep_quality",
      RECOVERY_WEIGHTS.sleep_quality,
      rawInputs,
      `MissingSample: sleep quality lacks ${missing.join(", ")}`,
    );
  }
  return completeComponent(
    "sleep_quality",
    RECOVERY_WEIGHTS.sleep_quality,
    value,
    rawInputs,
    `Sleep quality ${Math.round(value)}/100`,
  );
}

export function stressComponent(day: DayValues, baselines: BaselineMap): ScoreComponent {
  const readings = readStress(day, baselines);
  const rawInputs: Record<string, number | null> = {};
  for (const r of readings) rawInputs[r.metric] = r.weightedDeviationPct;

  const gaps = readings.filter((r) => r.weightedDeviationPct == null);
  if (gaps.length > 0) {
    const first = gaps[0];
    return missingComponent(
      "stress",
      RECOVERY_WEIGHTS.stress,
      rawInputs,
      gapReason(first.current, first.baseline, first.metric.replace(/_/g, " ")),
    );
  }
  const avg = mean(readings.map((r) => r.weightedDeviationPct ?? 0)) ?? 0;
  rawInputs.avgWeightedDeviationPct = avg;
  return completeComponent(
    "stress",
    RECOVERY_WEIGHTS.stress,
    stressScore(avg),
    rawInputs,
    `Physiological stress ${stressBand(avg)} (${avg.toFixed(1)}% weighted deviation)`,
  );
}

export function computeRecoveryScore(
  dayKey: string,
  day: DayValues,
  baselines: BaselineMap,
  computedAt: string,
  curve: GrowthCurveConfig = DEFAULT_GROWTH_CURVE,
): CompositeScore {
  return composeScore(
    "recovery",
    dayKey,
    [
      hrvComponent(day, baselines, curve),
      restingHrComponent(day, baselines, curve),
      sleepQualityComponent(day, baselines),
      stressComponent(day, baselines),
    ],
    computedAt,
  );
}
