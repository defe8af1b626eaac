import type { ColumnType, Generated } from 'kysely';
import { Kysely, PostgresDialect } from 'kysely';
import { Pool } from 'pg';

/** DB schema for Kysely type-safe query builder */
export interface Database {
  users: {
    id: Generated<number>;
    email: string;
    password_hash: string;
    created_at: Generated<Date>;
  };
  strokes: {
    id: Generated<number>;
    user_id: number;
    color: string;
    width: number;
    // BIGINT comes back from pg as a string
    started_at_unix_ms: ColumnType<string, number, number>;
    created_at: Generated<Date>;
  };
  stroke_points: {
    id: Generated<number>;
    stroke_id: number;
    seq: number;
    x: number;
    y: number;
  };
}

export interface DatabaseHandle {
  pool: Pool;
  db: Kysely<Database>;
}

export function createDatabase(connectionString?: string): DatabaseHandle {
  const pool = new Pool({ connectionString });
  const db = new Kysely<Database>({
    dialect: new PostgresDialect({ pool }),
  });
  return { pool, db };
}

export async function migrate(pool: Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS users (
      id SERIAL PRIMARY KEY,
      email VARCHAR(320) NOT NULL UNIQUE,
      password_hash TEXT NOT NULL,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);

  await pool.query(`
    CREATE TABLE IF NOT EXISTS strokes (
      id SERIAL PRIMARY KEY,
      user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      color VARCHAR(64) NOT NULL,
      width INTEGER NOT NULL,
      started_at_unix_ms BIGINT NOT NULL,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);

  await pool.query(`
    CREATE TABLE IF NOT EXISTS stroke_points (
      id SERIAL PRIMARY KEY,
      stroke_id INTEGER NOT NULL REFERENCES strokes(id) ON DELETE CASCADE,
      seq INTEGER NOT NULL,
      x DOUBLE PRECISION NOT NULL,
      y DOUBLE PRECISION NOT NULL
    );
  `);

  await pool.query(`
    CREATE INDEX IF NOT EXISTS idx_strokes_user ON strokes(user_id, id);
    CREATE INDEX IF NOT EXISTS idx_stroke_points_stroke ON stroke_points(stroke_id, seq);
  `);
}
