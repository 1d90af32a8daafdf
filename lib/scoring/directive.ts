import type { ComponentName, CompositeScore } from "./types";

function componentValue(score: CompositeScore, name: ComponentName): number | null {
  const c = score.components.find((x) => x.name === name);
  return c && c.complete ? c.normalizedValue : null;
}

const below = (v: number | null, limit: number) => v != null && v < limit;

/** Training guidance for a recovery score; the weakest complete component picks the message below 55. */
export function recoveryDirective(score: CompositeScore): string {
  if (score.scoreKind !== "recovery") {
    throw new Error(`recoveryDirective expects a recovery score, got ${score.scoreKind}`);
  }
  if (score.overall >= 85) return "Primed for peak performance. Your body is ready for high-intensity training.";
  if (score.overall >= 70) return "Good recovery state. Moderate to high-intensity training is appropriate.";
  if (score.overall >= 55) return "Moderate recovery. Consider lighter training or active recovery.";
  if (below(componentValue(score, "hrv"), 60)) return "Nervous system under strain. Prioritize rest and recovery activities.";
  if (below(componentValue(score, "resting_hr"), 60)) {
    return "Elevated cardiovascular load. Focus on active recovery and stress management.";
  }
  if (below(componentValue(score, "sleep_quality"), 50)) return "Poor sleep quality detected. Prioritize sleep hygiene and recovery.";
  if (below(componentValue(score, "stress"), 70)) return "Stress indicators present. Consider reducing training load.";
  return "Recovery needs attention. Focus on rest, nutrition, and stress management.";
}
