import { RECOVERY_WEIGHTS, SLEEP_WEIGHTS, assertWeightsSumToOne } from "./components";
import { reduceDayValues } from "./day-values";
import { DEFAULT_GROWTH_CURVE, type GrowthCurveConfig } from "./growth-curve";
import { SLEEP_QUALITY_WEIGHTS, computeRecoveryScore } from "./recovery-score";
import { computeSleepScore } from "./sleep-score";
import type { BaselineMap, BiometricSample, CompositeScore, ScoreKind } from "./types";

export interface ScoringConfig {
  growthCurve: GrowthCurveConfig;
}

export const DEFAULT_SCORING_CONFIG: ScoringConfig = {
  growthCurve: DEFAULT_GROWTH_CURVE,
};

assertWeightsSumToOne("recovery", RECOVERY_WEIGHTS);
assertWeightsSumToOne("sleep", SLEEP_WEIGHTS);
assertWeightsSumToOne("sleep quality", SLEEP_QUALITY_WEIGHTS);

/**
 * Pure entry point of the scoring engine. `daySamples` are the samples that
 * fall on `dayKey`; baselines must already exclude that day.
 */
export function computeCompositeScore(
  kind: ScoreKind,
  dayKey: string,
  daySamples: BiometricSample[],
  baselines: BaselineMap,
  computedAt: string,
  config: ScoringConfig = DEFAULT_SCORING_CONFIG,
): CompositeScore {
  const day = reduceDayValues(daySamples);
  switch (kind) {
    case "recovery":
      return computeRecoveryScore(dayKey, day, baselines, computedAt, config.growthCurve);
    case "sleep":
      return computeSleepScore(dayKey, day, baselines, computedAt);
  }
}

export * from "./types";
export { METRIC_KINDS, METRIC_SPECS, SCORE_KINDS, baselineMetricsFor, dayMetricsFor, isMetricKind, isScoreKind, scoreKindsReading } from "./metrics";
export { recoveryDirective } from "./directive";
