import type { ScoreKey } from "../lib/scoring/types";

export class DurableWriteFailed extends Error {
  public readonly key: ScoreKey;
  public readonly attempts: number;

  constructor(key: ScoreKey, attempts: number, cause: unknown) {
    super(
      `Durable write for ${key.scoreKind}/${key.dayKey} failed after ${attempts} attempt(s): ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
    );
    this.name = "DurableWriteFailed";
    this.key = key;
    this.attempts = attempts;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
