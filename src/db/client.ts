import { Pool } from 'pg';

export type SqlRow = Record<string, unknown>;

export interface SqlResult {
  rows: SqlRow[];
  rowCount: number | null;
}

/**
 * The slice of a `pg` client the repositories use
 */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<SqlResult>;
}

export interface SqlPoolClient extends SqlClient {
  release(err?: Error | boolean): void;
}

export interface SqlPool extends SqlClient {
  connect(): Promise<SqlPoolClient>;
}

let pool: Pool | null = null;

export function getPool(): Pool {
  if (!pool) {
    const databaseUrl = process.env.DATABASE_URL;
    if (!databaseUrl) {
      throw new Error('DATABASE_URL environment variable is not set');
    }

    // Detect production/serverless environments
    const isProduction =
      process.env.NODE_ENV === 'production' ||
      process.env.VERCEL === '1' ||
      process.env.VERCEL_ENV === 'production' ||
      !!process.env.VERCEL_URL ||
      !!process.env.AWS_LAMBDA_FUNCTION_NAME;

    // Production/serverless: always SSL (managed DBs require it)
    // Development: SSL by default, DATABASE_SSL=false disables it
    let sslConfig: boolean | { rejectUnauthorized: boolean };

    if (isProduction) {
      sslConfig = { rejectUnauthorized: false };
    } else {
      const sslDisabled = process.env.DATABASE_SSL === 'false';
      sslConfig = sslDisabled ? false : { rejectUnauthorized: false };
    }

    pool = new Pool({
      connectionString: stripSslParams(databaseUrl),
      // Explicit SSL config overrides any SSL params in the connection string
      ssl: sslConfig,
      max: 20,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    });

    pool.on('error', (err) => {
      console.error('Unexpected error on idle database client', err);
    });
  }

  return pool;
}

/**
 * Removes SSL-related query params (e.g. Neon's sslmode=require) so the
 * explicit pool SSL config takes precedence
 */
export function stripSslParams(databaseUrl: string): string {
  let url: URL;
  try {
    url = new URL(databaseUrl);
  } catch {
    // Non-URL connection strings are passed through untouched
    return databaseUrl;
  }
  const sslParams = ['sslmode', 'ssl', 'sslcert', 'sslkey', 'sslrootcert', 'sslcrl'];
  sslParams.forEach(param => url.searchParams.delete(param));
  return url.toString();
}

/**
 * Runs `callback` inside BEGIN/COMMIT on a dedicated pooled client.
 * Rolls back and rethrows if the callback or the commit fails; the client
 * is released on every path.
 */
export async function withTransaction<T>(
  callback: (client: SqlClient) => Promise<T>,
  db: SqlPool = getPool()
): Promise<T> {
  const client = await db.connect();
  try {
    await client.query('BEGIN');
    const result = await callback(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      console.error('Failed to roll back transaction', rollbackError);
    }
    throw error;
  } finally {
    client.release();
  }
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
