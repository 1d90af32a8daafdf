import type pg from "pg";
import { isScoreKind } from "../../lib/scoring/metrics";
import type { CompositeScore, ScoreComponent, ScoreKey, ScoreKind } from "../../lib/scoring/types";
import { pool as defaultPool } from "../db";
import type { ScoreRepository, StoredScore } from "./score-repository";

const DEFAULT_USER_ID = "local_default";

type ScoreRow = {
  day_key: string;
  score_kind: string;
  overall: number;
  data_complete: boolean;
  components: ScoreComponent[];
  computed_at: Date;
  published_at: Date;
};

const SELECT_COLUMNS = `to_char(day_key, 'YYYY-MM-DD') AS day_key, score_kind, overall, data_complete,
  components, computed_at, published_at`;

function toStored(r: ScoreRow): StoredScore | null {
  if (!isScoreKind(r.score_kind)) return null;
  const value: CompositeScore = {
    scoreKind: r.score_kind,
    dayKey: r.day_key,
    overall: Number(r.overall),
    components: r.components,
    computedAt: r.computed_at.toISOString(),
    dataComplete: r.data_complete,
  };
  return { value, publishedAt: r.published_at.toISOString() };
}

export class PgScoreRepository implements ScoreRepository {
  constructor(
    private readonly db: pg.Pool = defaultPool,
    private readonly userId: string = DEFAULT_USER_ID,
  ) {}

  async load(key: ScoreKey): Promise<StoredScore | null> {
    const { rows } = await this.db.query<ScoreRow>(
      `SELECT ${SELECT_COLUMNS} FROM score_cache
       WHERE user_id = $1 AND day_key = $2::date AND score_kind = $3`,
      [this.userId, key.dayKey, key.scoreKind],
    );
    return rows.length > 0 ? toStored(rows[0]) : null;
  }

  async save(entry: StoredScore): Promise<void> {
    const s = entry.value;
    await this.db.query(
      `INSERT INTO score_cache (user_id, day_key, score_kind, overall, data_complete, components, computed_at, published_at)
       VALUES ($1, $2::date, $3, $4, $5, $6::jsonb, $7::timestamptz, $8::timestamptz)
       ON CONFLICT (user_id, day_key, score_kind) DO UPDATE SET
         overall = EXCLUDED.overall,
         data_complete = EXCLUDED.data_complete,
         components = EXCLUDED.components,
         computed_at = EXCLUDED.computed_at,
         published_at = EXCLUDED.published_at`,
      [this.userId, s.dayKey, s.scoreKind, s.overall, s.dataComplete, JSON.stringify(s.components), s.computedAt, entry.publishedAt],
    );
  }

  async listRecent(scoreKind: ScoreKind, offset: number, limit: number): Promise<StoredScore[]> {
    const { rows } = await this.db.query<ScoreRow>(
      `SELECT ${SELECT_COLUMNS} FROM score_cache
       WHERE user_id = $1 AND score_kind = $2
       ORDER BY day_key DESC
       OFFSET $3 LIMIT $4`,
      [this.userId, scoreKind, offset, limit],
    );
    return rows.map(toStored).filter((s): s is StoredScore => s != null);
  }
}
