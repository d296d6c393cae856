import { Pool } from 'pg';

import type { AppConfig } from './config.js';
import { logger } from './logger.js';
import type { Queryable } from './access/pgStore.js';

type DatabaseConfig = AppConfig['db'];

let pool: Pool | null = null;

export const asQueryable = (client: Pool): Queryable => ({
  query: (text, params = []) => client.query(text, params)
});

const sanitizeDatabaseName = (name: string): string => name.replace(/[^a-zA-Z0-9_-]/g, '');

const createDatabaseIfMissing = async (db: DatabaseConfig): Promise<void> => {
  const databaseName = sanitizeDatabaseName(db.database);
  const adminPool = new Pool({
    host: db.host,
    port: db.port,
    user: db.user,
    password: db.password,
    database: 'postgres',
    ssl: db.ssl
  });

  try {
    const existing = await adminPool.query<{ exists: boolean }>(
      'SELECT EXISTS(SELECT 1 FROM pg_database WHERE datname = $1) as exists',
      [databaseName]
    );

    if (!existing.rows[0]?.exists) {
      await adminPool.query(`CREATE DATABASE "${databaseName}"`);
      logger.info({ database: databaseName }, 'Created turnstile access database');
    }
  } finally {
    await adminPool.end();
  }
};

export const ensureSchema = async (client: Queryable): Promise<void> => {
  await client.query(`
    CREATE TABLE IF NOT EXISTS users (
      id SERIAL PRIMARY KEY,
      registration TEXT NOT NULL UNIQUE,
      name TEXT NOT NULL DEFAULT '',
      active BOOLEAN NOT NULL DEFAULT TRUE,
      valid_from TIMESTAMPTZ,
      valid_until TIMESTAMPTZ,
      allow_card BOOLEAN NOT NULL DEFAULT TRUE,
      allow_biometric BOOLEAN NOT NULL DEFAULT FALSE,
      allow_keypad BOOLEAN NOT NULL DEFAULT FALSE,
      code TEXT UNIQUE,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);

  await client.query(`
    CREATE TABLE IF NOT EXISTS cards (
      id SERIAL PRIMARY KEY,
      card_number TEXT NOT NULL UNIQUE,
      registration TEXT NOT NULL,
      user_id INTEGER REFERENCES users(id) ON DELETE CASCADE,
      active BOOLEAN NOT NULL DEFAULT TRUE,
      valid_from TIMESTAMPTZ,
      valid_until TIMESTAMPTZ,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);

  await client.query(`
    CREATE TABLE IF NOT EXISTS access_logs (
      id SERIAL PRIMARY KEY,
      user_id INTEGER REFERENCES users(id) ON DELETE SET NULL,
      registration TEXT,
      credential TEXT NOT NULL,
      direction TEXT NOT NULL CHECK (direction IN ('ENTRY', 'EXIT', 'UNKNOWN')),
      reader_type TEXT NOT NULL CHECK (reader_type IN ('CARD', 'BIOMETRIC', 'KEYPAD')),
      granted BOOLEAN NOT NULL,
      display_message TEXT NOT NULL,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);

  await client.query(`
    CREATE INDEX IF NOT EXISTS access_logs_passback_idx
      ON access_logs (user_id, direction, created_at DESC)
      WHERE granted;
  `);
};

export const initDatabase = async (db: DatabaseConfig): Promise<Pool> => {
  if (pool) {
    return pool;
  }

  await createDatabaseIfMissing(db);
  pool = new Pool({
    host: db.host,
    port: db.port,
    user: db.user,
    password: db.password,
    database: sanitizeDatabaseName(db.database),
    ssl: db.ssl
  });
  pool.on('error', (error) => {
    logger.error({ err: error }, 'Idle PostgreSQL client error');
  });

  await ensureSchema(asQueryable(pool));
  return pool;
};

export const closeDatabase = async (): Promise<void> => {
  if (!pool) {
    return;
  }
  const current = pool;
  pool = null;
  await current.end();
};
