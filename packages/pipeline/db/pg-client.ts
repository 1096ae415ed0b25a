// PG client — connection pool wrapper for the transaction store
// Provides pool management, health check, migration runner and retrying queries

import { readFileSync, readdirSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Pool, QueryResult, QueryResultRow } from 'pg';
import type { PgConfig } from '../config/index.js';
import { createLogger } from '../utils/logger.js';
import { errorMessage } from '../types/errors.js';

const log = createLogger('pg-client');

// pg is dynamically imported so it's only loaded when the postgres store is used
let _pg: typeof import('pg') | null = null;

async function loadPg(): Promise<typeof import('pg')> {
  if (!_pg) {
    _pg = await import('pg');
  }
  return _pg;
}

const RECOVERABLE_MESSAGES = [
  'Connection terminated',
  'recovery mode',
  'the database system is starting up',
  'connection refused',
  'ECONNREFUSED',
  'terminating connection',
];

export function isRecoverablePgError(err: unknown): boolean {
  const msg = errorMessage(err);
  return RECOVERABLE_MESSAGES.some(m => msg.includes(m));
}

export class PgClient {
  private pool: Pool | null = null;

  constructor(private readonly config: PgConfig) {}

  async getPool(): Promise<Pool> {
    if (this.pool) return this.pool;

    const pg = await loadPg();
    const c = this.config;

    const pool = new pg.default.Pool({
      host: c.host,
      port: c.port,
      user: c.user,
      password: c.password,
      database: c.database,
      max: c.poolMax,
      idleTimeoutMillis: c.idleTimeoutMs,
      connectionTimeoutMillis: c.connectionTimeoutMs,
      statement_timeout: 30_000,
      application_name: 'transaction-insights',
    });

    // Never crash the process on idle-client errors
    pool.on('error', (err) => {
      log.warn('pool background error, resetting pool', { error: err.message });
      this.reset().catch((resetErr: unknown) => {
        log.error('pool reset failed', { error: errorMessage(resetErr) });
      });
    });

    this.pool = pool;
    return pool;
  }

  async healthCheck(): Promise<boolean> {
    try {
      const pool = await this.getPool();
      const result = await pool.query<{ ok: number }>('SELECT 1 AS ok');
      return result.rows[0]?.ok === 1;
    } catch (err) {
      log.warn('health check failed', { error: errorMessage(err) });
      return false;
    }
  }

  /**
   * Execute a query, retrying recoverable connection errors with exponential
   * backoff: base delay * 3^attempt (1s → 3s → 9s by default).
   */
  async queryWithRetry<T extends QueryResultRow>(
    queryText: string,
    params: unknown[],
  ): Promise<QueryResult<T>> {
    const { retryMax, retryDelayMs } = this.config;

    for (let attempt = 0; ; attempt++) {
      try {
        const pool = await this.getPool();
        return await pool.query<T>(queryText, params);
      } catch (err: unknown) {
        const msg = errorMessage(err);
        if (attempt < retryMax && isRecoverablePgError(err)) {
          const delay = retryDelayMs * Math.pow(3, attempt);
          log.warn(`query attempt ${attempt + 1}/${retryMax + 1} failed, retrying`, { error: msg, delayMs: delay });
          await this.reset();
          await new Promise(r => setTimeout(r, delay));
          continue;
        }
        log.error(`query failed after ${attempt + 1} attempt(s)`, { error: msg });
        throw err;
      }
    }
  }

  /**
   * Run all pending SQL migrations from db/migrations/ in version order.
   * Each migration is wrapped in a transaction with its version recording.
   */
  async runMigrations(migrationsDir = defaultMigrationsDir()): Promise<string[]> {
    const pool = await this.getPool();

    await pool.query(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        version TEXT PRIMARY KEY,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
      )
    `);

    const { rows: applied } = await pool.query<{ version: string }>(
      'SELECT version FROM schema_migrations ORDER BY version',
    );
    const appliedSet = new Set(applied.map(r => r.version));

    if (!existsSync(migrationsDir)) return [];
    const migrationFiles = readdirSync(migrationsDir)
      .filter(f => f.endsWith('.sql'))
      .sort();

    const ran: string[] = [];
    for (const file of migrationFiles) {
      const version = file.replace('.sql', '');
      if (appliedSet.has(version)) continue;

      const sql = readFileSync(join(migrationsDir, file), 'utf-8');

      const client = await pool.connect();
      try {
        await client.query('BEGIN');
        await client.query(sql);
        await client.query('INSERT INTO schema_migrations (version) VALUES ($1)', [version]);
        await client.query('COMMIT');
      } catch (err) {
        await client.query('ROLLBACK');
        throw err;
      } finally {
        client.release();
      }

      log.info('applied migration', { version });
      ran.push(version);
    }

    return ran;
  }

  async close(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
    }
  }

  /** End a broken pool so the next getPool() creates a fresh one. */
  async reset(): Promise<void> {
    const pool = this.pool;
    this.pool = null;
    if (pool) {
      try {
        await pool.end();
      } catch (err) {
        log.warn('ending broken pool failed', { error: errorMessage(err) });
      }
    }
  }
}

function defaultMigrationsDir(): string {
  return join(dirname(fileURLToPath(import.meta.url)), 'migrations');
}
