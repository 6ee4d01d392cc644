/**
 * PostgreSQL Database Adapter
 *
 * DatabaseAdapter over a node-postgres pool. Each top-level transaction
 * checks out its own client, so concurrent transactions never share a
 * connection. Calls made from inside a transaction are routed to its client
 * and nested transactions become savepoints.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import pg from 'pg';
import type { PoolClient, PoolConfig } from 'pg';
import type { DatabaseAdapter } from '../repository.js';
import { createLogger } from '../../core/utils/logger.js';

const { Pool } = pg;

const logger = createLogger({ module: 'postgresql' });

/** Pool sizing for a single pipeline process */
export const POOL_DEFAULTS = {
  max: 5,
  idleTimeoutMillis: 10_000,
  connectionTimeoutMillis: 5_000,
} as const;

interface TransactionScope {
  readonly client: PoolClient;
  nextSavepoint: number;
}

/**
 * Rewrite `?` placeholders as `$1`, `$2`, ... in order of appearance
 */
export function toPositionalParams(sql: string): string {
  let index = 0;
  return sql.replace(/\?/g, () => `$${++index}`);
}

export class PostgreSQLAdapter implements DatabaseAdapter {
  private readonly pool: pg.Pool;
  private readonly scope = new AsyncLocalStorage<TransactionScope>();

  constructor(config: PoolConfig) {
    this.pool = new Pool({ ...POOL_DEFAULTS, ...config });

    this.pool.on('error', (err: Error) => {
      logger.error('Idle PostgreSQL client failed', { error: err.message });
    });
  }

  async queryOne<T>(sql: string, params: ReadonlyArray<unknown> = []): Promise<T | null> {
    const rows = await this.queryMany<T>(sql, params);
    return rows[0] ?? null;
  }

  async queryMany<T>(sql: string, params: ReadonlyArray<unknown> = []): Promise<ReadonlyArray<T>> {
    const result = await this.query(sql, params);
    return result.rows as T[];
  }

  async execute(sql: string, params: ReadonlyArray<unknown> = []): Promise<number> {
    const result = await this.query(sql, params);
    return result.rowCount ?? 0;
  }

  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    const scope = this.scope.getStore();
    if (scope) {
      return this.savepoint(scope, fn);
    }

    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      try {
        const result = await this.scope.run({ client, nextSavepoint: 0 }, fn);
        await client.query('COMMIT');
        return result;
      } catch (error) {
        await client.query('ROLLBACK');
        throw error;
      }
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  /**
   * Initialize database schema from SQL file.
   */
  async initializeSchema(schemaSQL: string): Promise<void> {
    // Same DDL as SQLite
    await this.pool.query(schemaSQL);
  }

  private query(sql: string, params: ReadonlyArray<unknown>): Promise<pg.QueryResult> {
    const text = toPositionalParams(sql);
    const client = this.scope.getStore()?.client;
    return client ? client.query(text, [...params]) : this.pool.query(text, [...params]);
  }

  private async savepoint<T>(scope: TransactionScope, fn: () => Promise<T>): Promise<T> {
    const name = `sp_${scope.nextSavepoint++}`;
    await scope.client.query(`SAVEPOINT ${name}`);
    try {
      const result = await fn();
      await scope.client.query(`RELEASE SAVEPOINT ${name}`);
      return result;
    } catch (error) {
      await scope.client.query(`ROLLBACK TO SAVEPOINT ${name}`);
      throw error;
    }
  }
}
