/**
 * Postgres access for the site registry and the settings store
 */

import pg from 'pg';
import type { DatabaseConfig } from './types.js';
import { createLogger } from './logger.js';
import { describeError } from './result.js';

const { Pool } = pg;
const logger = createLogger('database');

export type DatabaseTarget = DatabaseConfig | { connectionString: string; maxConnections?: number };

function poolOptions(target: DatabaseTarget): pg.PoolConfig {
  const shared = {
    max: target.maxConnections ?? 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
  };

  if ('connectionString' in target) {
    return { ...shared, connectionString: target.connectionString };
  }
  return {
    ...shared,
    host: target.host,
    port: target.port,
    database: target.database,
    user: target.user,
    password: target.password,
    ssl: target.ssl ? { rejectUnauthorized: false } : undefined,
  };
}

/** Where the pool points, without credentials */
function describeTarget(target: DatabaseTarget): string {
  if ('connectionString' in target) {
    try {
      const url = new URL(target.connectionString);
      return `${url.hostname}${url.pathname}`;
    } catch {
      return 'DATABASE_URL';
    }
  }
  return `${target.host}/${target.database}`;
}

export class Database {
  private readonly pool: pg.Pool;
  private readonly target: string;
  private connected = false;

  constructor(target: DatabaseTarget) {
    this.target = describeTarget(target);
    this.pool = new Pool(poolOptions(target));
    this.pool.on('error', (error) => {
      logger.error('Idle client error', { target: this.target, error: error.message });
    });
  }

  async connect(): Promise<void> {
    if (this.connected) return;

    try {
      const client = await this.pool.connect();
      client.release();
    } catch (error) {
      logger.error('Cannot reach Postgres', { target: this.target, error: describeError(error) });
      throw error;
    }
    this.connected = true;
    logger.info('Connected to Postgres', { target: this.target });
  }

  async disconnect(): Promise<void> {
    await this.pool.end();
    this.connected = false;
  }

  async query<T extends pg.QueryResultRow = pg.QueryResultRow>(text: string, params?: unknown[]): Promise<pg.QueryResult<T>> {
    const start = Date.now();
    try {
      const result = await this.pool.query<T>(text, params);
      logger.debug('Query', { ms: Date.now() - start, rows: result.rowCount });
      return result;
    } catch (error) {
      logger.error('Query failed', { error: describeError(error), query: text.trim().substring(0, 80) });
      throw error;
    }
  }

  async queryOne<T extends pg.QueryResultRow = pg.QueryResultRow>(text: string, params?: unknown[]): Promise<T | null> {
    const result = await this.query<T>(text, params);
    return result.rows[0] ?? null;
  }

  /** Number of rows the statement touched */
  async execute(text: string, params?: unknown[]): Promise<number> {
    const result = await this.query(text, params);
    return result.rowCount ?? 0;
  }
}

export function isDatabaseConfigured(env: NodeJS.ProcessEnv = process.env): boolean {
  return Boolean(env.DATABASE_URL || env.POSTGRES_HOST);
}

/** DATABASE_URL when set, the POSTGRES_* variables otherwise */
export function databaseTarget(env: NodeJS.ProcessEnv = process.env): DatabaseTarget {
  const maxConnections = parseInt(env.POSTGRES_MAX_CONNECTIONS ?? '10', 10);
  if (env.DATABASE_URL) {
    return { connectionString: env.DATABASE_URL, maxConnections };
  }

  return {
    host: env.POSTGRES_HOST ?? 'localhost',
    port: parseInt(env.POSTGRES_PORT ?? '5432', 10),
    database: env.POSTGRES_DB ?? 'mediabridge',
    user: env.POSTGRES_USER ?? 'postgres',
    password: env.POSTGRES_PASSWORD ?? '',
    ssl: env.POSTGRES_SSL === 'true',
    maxConnections,
  };
}

export function createDatabase(env: NodeJS.ProcessEnv = process.env): Database {
  const target = databaseTarget(env);
  if (!('connectionString' in target) && !target.password) {
    logger.warn('POSTGRES_PASSWORD is empty', { host: target.host });
  }
  return new Database(target);
}
