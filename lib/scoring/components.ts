import { clamp } from "./growth-curve";
import type {
  Baseline,
  BaselineMap,
  ComponentName,
  CompositeScore,
  MetricKind,
  RecoveryComponentName,
  ScoreComponent,
  ScoreKind,
  SleepComponentName,
} from "./types";

export const RECOVERY_WEIGHTS: Record<RecoveryComponentName, number> = {
  hrv: 0.5,
  resting_hr: 0.25,
  sleep_quality: 0.15,
  stress: 0.1,
};

export const SLEEP_WEIGHTS: Record<SleepComponentName, number> = {
  duration: 0.3,
  deep_sleep: 0.25,
  rem_sleep: 0.2,
  efficiency: 0.15,
  consistency: 0.1,
};

export const WEIGHT_TOLERANCE = 1e-6;

export function weightSum(weights: Record<string, number>): number {
  return Object.values(weights).reduce((s, w) => s + w, 0);
}

export function assertWeightsSumToOne(label: string, weights: Record<string, number>): void {
  const sum = weightSum(weights);
  if (Math.abs(sum - 1) > WEIGHT_TOLERANCE) {
    throw new Error(`${label} weights sum to ${sum}, expected 1`);
  }
}

export function completeComponent(
  name: ComponentName,
  weight: number,
  value: number,
  rawInputs: Record<string, number | null>,
  description: string,
): ScoreComponent {
  const normalizedValue = Number.isFinite(value) ? clamp(value, 0, 100) : 0;
  return {
    name,
    weight,
    normalizedValue,
    contribution: weight * normalizedValue,
    rawInputs,
    complete: true,
    description,
  };
}

export function missingComponent(
  name: ComponentName,
  weight: number,
  rawInputs: Record<string, number | null>,
  description: string,
): ScoreComponent {
  return {
    name,
    weight,
    normalizedValue: 0,
    contribution: 0,
    rawInputs,
    complete: false,
    description,
  };
}

export function composeScore(
  scoreKind: ScoreKind,
  dayKey: string,
  components: ScoreComponent[],
  computedAt: string,
): CompositeScore {
  const total = components.reduce((s, c) => s + c.contribution, 0);
  return {
    scoreKind,
    dayKey,
    overall: clamp(Math.round(total), 0, 100),
    components,
    computedAt,
    dataComplete: components.every((c) => c.complete),
  };
}

export function baselineValue(baselines: BaselineMap, kind: MetricKind): number | null {
  const b: Baseline | undefined = baselines[kind];
  if (!b || b.status !== "available" || b.aggregate == null) return null;
  return b.aggregate;
}

/** Explains why an input is unusable: no sample for the day, or an under-covered baseline. */
export function gapReason(current: number | null | undefined, baseline: number | null, label: string): string {
  if (current == null) return `MissingSample: no ${label} recorded for this day`;
  if (baseline == null) return `InsufficientBaseline: not enough ${label} history yet`;
  return `${label} unavailable`;
}
