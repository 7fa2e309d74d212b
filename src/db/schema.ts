import { getPool, SqlClient } from './client';

/**
 * Database schema - embedded for serverless compatibility
 * Shared by api/migrate.ts and src/scripts/migrate.ts
 */
export const SCHEMA_SQL = `
-- Job Listings Table
-- One row per external job ID among non-trashed rows
CREATE TABLE IF NOT EXISTS job_listings (
  id BIGSERIAL PRIMARY KEY,
  external_id VARCHAR(255) NOT NULL,
  status VARCHAR(20) NOT NULL DEFAULT 'publish',
  title VARCHAR(500) NOT NULL,
  content TEXT NOT NULL DEFAULT '',
  excerpt TEXT NOT NULL DEFAULT '',
  department VARCHAR(255) NOT NULL DEFAULT '',
  location VARCHAR(255) NOT NULL DEFAULT '',
  job_type VARCHAR(100) NOT NULL DEFAULT '',
  employment_type VARCHAR(100) NOT NULL DEFAULT '',
  salary_range VARCHAR(255) NOT NULL DEFAULT '',
  apply_url TEXT NOT NULL DEFAULT '',
  source_url TEXT NOT NULL DEFAULT '',
  posted_date VARCHAR(100) NOT NULL DEFAULT '',
  expiry_date VARCHAR(100) NOT NULL DEFAULT '',
  published_at TIMESTAMP WITH TIME ZONE NOT NULL,
  source VARCHAR(50) NOT NULL DEFAULT 'drivehr',
  raw_data JSONB NOT NULL DEFAULT '{}'::jsonb,
  sync_version VARCHAR(50) NOT NULL,
  last_updated TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW(),
  created_at TIMESTAMP WITH TIME ZONE DEFAULT NOW(),
  updated_at TIMESTAMP WITH TIME ZONE DEFAULT NOW()
);

-- Webhook Rate Limits Table
-- Fixed-window request counters keyed by hashed client IP
CREATE TABLE IF NOT EXISTS webhook_rate_limits (
  key VARCHAR(100) PRIMARY KEY,
  count INTEGER NOT NULL,
  expires_at TIMESTAMP WITH TIME ZONE NOT NULL
);

-- Indexes
CREATE UNIQUE INDEX IF NOT EXISTS idx_job_listings_external_id_active
  ON job_listings(external_id) WHERE status <> 'trash';
CREATE INDEX IF NOT EXISTS idx_job_listings_status ON job_listings(status);
CREATE INDEX IF NOT EXISTS idx_webhook_rate_limits_expires_at ON webhook_rate_limits(expires_at);
`;

export const MANAGED_TABLES = ['job_listings', 'webhook_rate_limits'] as const;

export interface MigrationReport {
  tables: string[];
  missing: string[];
}

/**
 * Applies the schema, then reports which managed tables exist in the
 * current schema
 */
export async function runMigration(db: SqlClient = getPool()): Promise<MigrationReport> {
  await db.query(SCHEMA_SQL);

  const result = await db.query(
    `SELECT table_name
     FROM information_schema.tables
     WHERE table_schema = current_schema()
       AND table_name = ANY($1::text[])`,
    [[...MANAGED_TABLES]]
  );
  const present = new Set(result.rows.map(row => String(row.table_name)));

  return {
    tables: MANAGED_TABLES.filter(table => present.has(table)),
    missing: MANAGED_TABLES.filter(table => !present.has(table)),
  };
}
