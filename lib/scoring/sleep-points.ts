import { circularDeltaMinutes } from "./day-values";

export const MAX_POINTS = {
  duration: 30,
  deep_sleep: 25,
  rem_sleep: 20,
  efficiency: 15,
  consistency: 10,
} as const;

const DURATION_STEPS: ReadonlyArray<readonly [number, number]> = [
  [470, 29],
  [460, 28],
  [450, 27],
  [440, 26],
  [420, 25],
  [410, 24],
  [400, 22],
  [390, 20],
  [380, 18],
  [370, 16],
  [360, 15],
  [330, 10],
  [300, 5],
];

const DEEP_STEPS: ReadonlyArray<readonly [number, number]> = [
  [105, 25],
  [90, 22],
  [75, 18],
  [60, 14],
  [45, 8],
];

const REM_STEPS: ReadonlyArray<readonly [number, number]> = [
  [120, 20],
  [105, 18],
  [90, 16],
  [75, 13],
  [60, 10],
];

const EFFICIENCY_STEPS: ReadonlyArray<readonly [number, number]> = [
  [95, 15],
  [92.5, 12],
  [90, 10],
  [85, 5],
];

function stepPoints(value: number, steps: ReadonlyArray<readonly [number, number]>): number {
  for (const [min, points] of steps) {
    if (value >= min) return points;
  }
  return 0;
}

export function durationPoints(asleepMin: number): number {
  if (asleepMin > 480) return MAX_POINTS.duration;
  return stepPoints(asleepMin, DURATION_STEPS);
}

export function deepSleepPoints(deepMin: number): number {
  return stepPoints(deepMin, DEEP_STEPS);
}

/** Under an hour of REM earns up to 5 points pro rata. */
export function remPoints(remMin: number): number {
  if (remMin < 0) return 0;
  if (remMin < 60) return Math.floor((remMin / 60) * 5);
  return stepPoints(remMin, REM_STEPS);
}

export function sleepEfficiencyPct(asleepMin: number, inBedMin: number): number | null {
  if (!(inBedMin > 0)) return null;
  return (asleepMin / inBedMin) * 100;
}

export function efficiencyPoints(efficiencyPct: number): number {
  return stepPoints(efficiencyPct, EFFICIENCY_STEPS);
}

/** Full marks at or before the target; one point lost per 10 minutes later. */
export function bedtimeConsistencyPoints(bedtimeMin: number, targetMin: number): number {
  const lateBy = circularDeltaMinutes(bedtimeMin, targetMin);
  if (lateBy <= 0) return MAX_POINTS.consistency;
  return Math.max(0, Math.floor(MAX_POINTS.consistency - lateBy / 10));
}

/** Wake time drifts in either direction count against consistency. */
export function wakeConsistencyPoints(wakeMin: number, targetMin: number): number {
  const off = Math.abs(circularDeltaMinutes(wakeMin, targetMin));
  return Math.max(0, Math.floor(MAX_POINTS.consistency - off / 10));
}

export function toNormalized(points: number, maxPoints: number): number {
  if (maxPoints <= 0) return 0;
  return Math.max(0, Math.min(100, (points * 100) / maxPoints));
}
