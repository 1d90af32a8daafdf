import { SLEEP_WEIGHTS, baselineValue, completeComponent, composeScore, gapReason, missingComponent } from "./components";
import {
  MAX_POINTS,
  bedtimeConsistencyPoints,
  deepSleepPoints,
  durationPoints,
  efficiencyPoints,
  remPoints,
  sleepEfficiencyPct,
  toNormalized,
} from "./sleep-points";
import type { BaselineMap, CompositeScore, DayValues, ScoreComponent } from "./types";

function formatClock(min: number): string {
  const m = Math.round(min) % 1440;
  return `${String(Math.floor(m / 60)).padStart(2, "0")}:${String(m % 60).padStart(2, "0")}`;
}

function formatHm(min: number): string {
  const rounded = Math.round(min);
  return `${Math.floor(rounded / 60)}h ${rounded % 60}m`;
}

function pointsComponent(
  name: keyof typeof MAX_POINTS,
  points: number,
  rawInputs: Record<string, number | null>,
  detail: string,
): ScoreComponent {
  const max = MAX_POINTS[name];
  return completeComponent(
    name,
    SLEEP_WEIGHTS[name],
    toNormalized(points, max),
    { ...rawInputs, points, maxPoints: max },
    `${detail}. ${points}/${max} points`,
  );
}

export function durationComponent(day: DayValues): ScoreComponent {
  const asleep = day.sleep_asleep_min;
  if (asleep == null) {
    return missingComponent("duration", SLEEP_WEIGHTS.duration, { asleepMin: null }, gapReason(asleep, null, "sleep duration"));
  }
  return pointsComponent("duration", durationPoints(asleep), { asleepMin: asleep }, `Time asleep ${formatHm(asleep)}`);
}

export function deepSleepComponent(day: DayValues): ScoreComponent {
  const deep = day.sleep_deep_min;
  if (deep == null) {
    return missingComponent("deep_sleep", SLEEP_WEIGHTS.deep_sleep, { deepMin: null }, gapReason(deep, null, "deep sleep"));
  }
  return pointsComponent("deep_sleep", deepSleepPoints(deep), { deepMin: deep }, `Deep sleep ${formatHm(deep)}`);
}

export function remSleepComponent(day: DayValues): ScoreComponent {
  const rem = day.sleep_rem_min;
  if (rem == null) {
    return missingComponent("rem_sleep", SLEEP_WEIGHTS.rem_sleep, { remMin: null }, gapReason(rem, null, "REM sleep"));
  }
  return pointsComponent("rem_sleep", remPoints(rem), { remMin: rem }, `REM sleep ${formatHm(rem)}`);
}

export function efficiencyComponent(day: DayValues): ScoreComponent {
  const asleep = day.sleep_asleep_min ?? null;
  const inBed = day.sleep_in_bed_min ?? null;
  const pct = asleep != null && inBed != null ? sleepEfficiencyPct(asleep, inBed) : null;
  if (pct == null) {
    return missingComponent(
      "efficiency",
      SLEEP_WEIGHTS.efficiency,
      { asleepMin: asleep, inBedMin: inBed },
      asleep == null
        ? gapReason(null, null, "sleep duration")
        : inBed == null
          ? gapReason(null, null, "time in bed")
          : "time in bed must be positive",
    );
  }
  return pointsComponent(
    "efficiency",
    efficiencyPoints(pct),
    { asleepMin: asleep, inBedMin: inBed, efficiencyPct: pct },
    `Sleep efficiency ${pct.toFixed(1)}%`,
  );
}

export function bedtimeConsistencyComponent(day: DayValues, baselines: BaselineMap): ScoreComponent {
  const bedtime = day.sleep_bedtime;
  const target = baselineValue(baselines, "sleep_bedtime");
  if (bedtime == null || target == null) {
    return missingComponent(
      "consistency",
      SLEEP_WEIGHTS.consistency,
      { bedtimeMin: bedtime ?? null, baselineBedtimeMin: target },
      gapReason(bedtime, target, "bedtime"),
    );
  }
  return pointsComponent(
    "consistency",
    bedtimeConsistencyPoints(bedtime, target),
    { bedtimeMin: bedtime, baselineBedtimeMin: target },
    `Bedtime ${formatClock(bedtime)} vs usual ${formatClock(target)}`,
  );
}

/**
 * Components are scored on their own point scales and normalized to 0–100
 * before weighting, so the headline number and the per-component percentages
 * always agree.
 */
export function computeSleepScore(
  dayKey: string,
  day: DayValues,
  baselines: BaselineMap,
  computedAt: string,
): CompositeScore {
  return composeScore(
    "sleep",
    dayKey,
    [
      durationComponent(day),
      deepSleepComponent(day),
      remSleepComponent(day),
      efficiencyComponent(day),
      bedtimeConsistencyComponent(day, baselines),
    ],
    computedAt,
  );
}
