import pg from "pg";

const pool = new pg.Pool({
  connectionString: process.env.DATABASE_URL,
});

export async function runMigration(name: string, sql: string, db: pg.Pool = pool): Promise<void> {
  const { rows } = await db.query(
    `SELECT id FROM schema_migrations WHERE name = $1`,
    [name]
  );
  if (rows.length > 0) return;
  console.log(`[migration] applying: ${name}`);
  await db.query(sql);
  await db.query(
    `INSERT INTO schema_migrations (name) VALUES ($1)`,
    [name]
  );
  console.log(`[migration] applied: ${name}`);
}

export async function initDb(db: pg.Pool = pool): Promise<void> {
  await db.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id SERIAL PRIMARY KEY,
      name TEXT UNIQUE NOT NULL,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);

  await db.query(`
    CREATE TABLE IF NOT EXISTS biometric_sample (
      user_id TEXT NOT NULL DEFAULT 'local_default',
      metric_kind TEXT NOT NULL,
      ts TIMESTAMPTZ NOT NULL,
      day_key DATE NOT NULL,
      value DOUBLE PRECISION NOT NULL,
      received_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      PRIMARY KEY (user_id, metric_kind, ts)
    );
  `);

  await db.query(`
    CREATE INDEX IF NOT EXISTS biometric_sample_day_idx
      ON biometric_sample (user_id, metric_kind, day_key);
  `);

  await db.query(`
    CREATE TABLE IF NOT EXISTS score_cache (
      user_id TEXT NOT NULL DEFAULT 'local_default',
      day_key DATE NOT NULL,
      score_kind TEXT NOT NULL,
      overall INTEGER NOT NULL,
      data_complete BOOLEAN NOT NULL,
      components JSONB NOT NULL,
      computed_at TIMESTAMPTZ NOT NULL,
      published_at TIMESTAMPTZ NOT NULL,
      PRIMARY KEY (user_id, day_key, score_kind)
    );
  `);

  await runMigration('001_score_cache_kind_day_idx', `
    CREATE INDEX IF NOT EXISTS score_cache_kind_day_idx
      ON score_cache (user_id, score_kind, day_key DESC);
  `, db);
}

export { pool };
