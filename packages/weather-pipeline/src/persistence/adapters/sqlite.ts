/**
 * SQLite Database Adapter
 *
 * Implements DatabaseAdapter interface using better-sqlite3.
 * One connection: top-level transactions are queued, nested ones become
 * savepoints.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import Database from 'better-sqlite3';
import type { DatabaseAdapter } from '../repository.js';

/**
 * Transaction a call runs inside; savepoint names are unique per transaction
 */
interface TransactionScope {
  nextSavepoint: number;
}

export class SQLiteAdapter implements DatabaseAdapter {
  private db: Database.Database;

  /** Set while a call runs inside `transaction()` */
  private readonly scope = new AsyncLocalStorage<TransactionScope>();

  /**
   * Settles when every queued top-level transaction has finished.
   * One connection holds at most one open transaction.
   */
  private idle: Promise<void> = Promise.resolve();

  constructor(filepath: string) {
    this.db = new Database(filepath);

    // Enable foreign keys (required for referential integrity)
    this.db.pragma('foreign_keys = ON');

    // WAL mode for better concurrency
    this.db.pragma('journal_mode = WAL');

    // Reasonable cache size (10MB)
    this.db.pragma('cache_size = -10000');
  }

  async queryOne<T>(
    sql: string,
    params: ReadonlyArray<unknown> = []
  ): Promise<T | null> {
    await this.outsideOthers();
    const stmt = this.db.prepare(sql);
    const row = stmt.get(...params) as T | undefined;
    return row ?? null;
  }

  async queryMany<T>(
    sql: string,
    params: ReadonlyArray<unknown> = []
  ): Promise<ReadonlyArray<T>> {
    await this.outsideOthers();
    const stmt = this.db.prepare(sql);
    return stmt.all(...params) as T[];
  }

  async execute(
    sql: string,
    params: ReadonlyArray<unknown> = []
  ): Promise<number> {
    await this.outsideOthers();
    const stmt = this.db.prepare(sql);
    const result = stmt.run(...params);
    return result.changes;
  }

  /**
   * Run `fn` in a transaction. Calls made from inside `fn` nest as
   * savepoints; top-level transactions started concurrently run one after
   * another.
   */
  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    const scope = this.scope.getStore();
    if (scope) {
      return this.savepoint(scope, fn);
    }

    const run = this.idle.then(() => this.scope.run({ nextSavepoint: 0 }, () => this.topLevel(fn)));
    // The queue only orders work; the caller sees the outcome through `run`
    this.idle = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  async close(): Promise<void> {
    await this.idle;
    this.db.close();
  }

  /**
   * Initialize database schema from SQL file.
   */
  async initializeSchema(schemaSQL: string): Promise<void> {
    this.db.exec(schemaSQL);
  }

  private async topLevel<T>(fn: () => Promise<T>): Promise<T> {
    this.db.exec('BEGIN');
    try {
      const result = await fn();
      this.db.exec('COMMIT');
      return result;
    } catch (error) {
      this.db.exec('ROLLBACK');
      throw error;
    }
  }

  private async savepoint<T>(scope: TransactionScope, fn: () => Promise<T>): Promise<T> {
    const name = `sp_${scope.nextSavepoint++}`;
    this.db.exec(`SAVEPOINT ${name}`);
    try {
      const result = await fn();
      this.db.exec(`RELEASE SAVEPOINT ${name}`);
      return result;
    } catch (error) {
      this.db.exec(`ROLLBACK TO SAVEPOINT ${name}`);
      this.db.exec(`RELEASE SAVEPOINT ${name}`);
      throw error;
    }
  }

  /**
   * Statements issued outside a transaction wait for the open one, so they
   * never commit or roll back with somebody else's work
   */
  private async outsideOthers(): Promise<void> {
    if (this.scope.getStore() === undefined) {
      await this.idle;
    }
  }
}
