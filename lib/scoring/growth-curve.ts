export interface GrowthCurveConfig {
  anchorScore: number;
  upperGain: number;
  lowerGain: number;
}

export const DEFAULT_GROWTH_CURVE: GrowthCurveConfig = {
  anchorScore: 75,
  upperGain: 5,
  lowerGain: 2,
};

export const clamp = (x: number, lo: number, hi: number) => Math.max(lo, Math.min(hi, x));

/**
 * Maps a "goodness" ratio against baseline onto 0–100.
 *
 * ratio 1.0 lands on `anchorScore`. Above 1 the score approaches 100
 * exponentially; below 1 it falls linearly and reaches 0 at `1 - 1/lowerGain`.
 */
export function growthCurveScore(ratio: number, config: GrowthCurveConfig = DEFAULT_GROWTH_CURVE): number {
  if (!Number.isFinite(ratio) || ratio <= 0) return 0;
  const { anchorScore, upperGain, lowerGain } = config;
  if (ratio >= 1) {
    return clamp(anchorScore + (100 - anchorScore) * (1 - Math.exp(-upperGain * (ratio - 1))), 0, 100);
  }
  return clamp(anchorScore * (1 - lowerGain * (1 - ratio)), 0, 100);
}

export function validateGrowthCurve(config: GrowthCurveConfig): string[] {
  const errors: string[] = [];
  if (!(config.anchorScore > 0 && config.anchorScore < 100)) {
    errors.push(`anchorScore must be inside (0, 100), got ${config.anchorScore}`);
  }
  if (!(config.upperGain > 0)) errors.push(`upperGain must be positive, got ${config.upperGain}`);
  if (!(config.lowerGain > 0)) errors.push(`lowerGain must be positive, got ${config.lowerGain}`);
  return errors;
}
