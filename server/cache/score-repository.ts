import type { CompositeScore, ScoreKey, ScoreKind } from "../../lib/scoring/types";

export interface StoredScore {
  value: CompositeScore;
  publishedAt: string;
}

/** Durable tier of the score cache. */
export interface ScoreRepository {
  load(key: ScoreKey): Promise<StoredScore | null>;
  /** Upsert by (dayKey, scoreKind). */
  save(entry: StoredScore): Promise<void>;
  /** Most recent day first. */
  listRecent(scoreKind: ScoreKind, offset: number, limit: number): Promise<StoredScore[]>;
}

export function scoreKeyId(key: ScoreKey): string {
  return `${key.scoreKind}|${key.dayKey}`;
}

export function keyOf(score: CompositeScore): ScoreKey {
  return { dayKey: score.dayKey, scoreKind: score.scoreKind };
}

export class MemoryScoreRepository implements ScoreRepository {
  private readonly rows = new Map<string, StoredScore>();
  private readonly saves = new Map<string, number>();
  private failuresLeft = 0;

  /** Makes the next `count` saves reject. */
  failNextSaves(count: number): void {
    this.failuresLeft = count;
  }

  saveCount(key: ScoreKey): number {
    return this.saves.get(scoreKeyId(key)) ?? 0;
  }

  async load(key: ScoreKey): Promise<StoredScore | null> {
    const row = this.rows.get(scoreKeyId(key));
    return row ? structuredClone(row) : null;
  }

  async save(entry: StoredScore): Promise<void> {
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      throw new Error("score repository unavailable");
    }
    const id = scoreKeyId(keyOf(entry.value));
    this.rows.set(id, structuredClone(entry));
    this.saves.set(id, (this.saves.get(id) ?? 0) + 1);
  }

  async listRecent(scoreKind: ScoreKind, offset: number, limit: number): Promise<StoredScore[]> {
    return [...this.rows.values()]
      .filter((r) => r.value.scoreKind === scoreKind)
      .sort((a, b) => b.value.dayKey.localeCompare(a.value.dayKey))
      .slice(offset, offset + limit)
      .map((r) => structuredClone(r));
  }
}
