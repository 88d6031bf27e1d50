/**
 * PostgreSQL connection handle
 *
 * The pool is created once at process start, handed to every store, and
 * closed on shutdown. Stores depend on the narrow `Queryable` shape so tests
 * can pass an in-process stand-in.
 */

import pg from 'pg'

export interface QueryOutcome {
  rows: unknown[]
  rowCount: number | null
}

export interface Queryable {
  query(text: string, values?: unknown[]): Promise<QueryOutcome>
}

export interface PoolOptions {
  databaseUrl: string
  production: boolean
  caCert?: string
}

export function createPool(options: PoolOptions): pg.Pool {
  // sslmode=no-verify is non-standard and confuses pg; SSL is configured below.
  const cleanUrl = options.databaseUrl.replace(/[?&]sslmode=[^&]*/g, '').replace(/\?$/, '')

  return new pg.Pool({
    connectionString: cleanUrl,
    max: 10,
    idleTimeoutMillis: 30000,
    ssl: options.production
      ? {
        ca: options.caCert ? Buffer.from(options.caCert, 'base64').toString() : undefined,
        rejectUnauthorized: !!options.caCert,
      }
      : false,
  })
}

/**
 * Create the schema if it is missing. Safe to call on every startup: all
 * statements use IF NOT EXISTS.
 */
export async function runMigrations(db: Queryable): Promise<void> {
  await db.query(`
    CREATE TABLE IF NOT EXISTS users (
      id          BIGSERIAL PRIMARY KEY,
      telegram_id BIGINT UNIQUE NOT NULL,
      username    TEXT,
      first_name  TEXT,
      last_name   TEXT,
      is_active   BOOLEAN NOT NULL DEFAULT TRUE,
      created_at  TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      updated_at  TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `)
  await db.query(`
    CREATE TABLE IF NOT EXISTS messages (
      id                  BIGSERIAL PRIMARY KEY,
      user_id             BIGINT NOT NULL REFERENCES users(id),
      telegram_message_id BIGINT NOT NULL,
      message_type        TEXT NOT NULL,
      text_content        TEXT,
      caption             TEXT,
      file_id             TEXT,
      file_name           TEXT,
      file_size           BIGINT,
      mime_type           TEXT,
      duration            INTEGER,
      forwarded_date      TIMESTAMPTZ,
      forwarded_from      TEXT,
      urls                TEXT[] NOT NULL DEFAULT '{}',
      hashtags            TEXT[] NOT NULL DEFAULT '{}',
      mentions            TEXT[] NOT NULL DEFAULT '{}',
      created_at          TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      UNIQUE (user_id, telegram_message_id)
    )
  `)
  await db.query(`
    CREATE TABLE IF NOT EXISTS tags (
      id         BIGSERIAL PRIMARY KEY,
      user_id    BIGINT NOT NULL REFERENCES users(id),
      name       TEXT NOT NULL,
      color      TEXT,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      UNIQUE (user_id, name)
    )
  `)
  await db.query(`
    CREATE TABLE IF NOT EXISTS message_tags (
      id         BIGSERIAL PRIMARY KEY,
      message_id BIGINT NOT NULL REFERENCES messages(id),
      tag_id     BIGINT NOT NULL REFERENCES tags(id),
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      UNIQUE (message_id, tag_id)
    )
  `)
  await db.query(`CREATE INDEX IF NOT EXISTS idx_message_tags_tag_id ON message_tags(tag_id)`)
  await db.query(`CREATE INDEX IF NOT EXISTS idx_messages_user_created ON messages(user_id, created_at DESC)`)
  console.log('[DB] Migrations complete')
}

export async function closePool(pool: pg.Pool): Promise<void> {
  await pool.end()
}

/** pg reports unique_violation as SQLSTATE 23505. */
export function isUniqueViolation(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === '23505'
}
