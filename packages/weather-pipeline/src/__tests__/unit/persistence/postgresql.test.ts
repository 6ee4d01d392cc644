/**
 * PostgreSQL Adapter Tests
 *
 * `pg` is replaced by an in-process pool that records every statement and
 * the connection it ran on.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { PostgreSQLAdapter, toPositionalParams } from '../../../persistence/adapters/postgresql.js';

const pgStub = vi.hoisted(() => {
  interface Statement {
    readonly target: string;
    readonly text: string;
    readonly values: readonly unknown[];
  }

  const statements: Statement[] = [];
  const pools: StubPool[] = [];
  let clientCount = 0;

  class StubClient {
    readonly id = `client-${++clientCount}`;
    released = false;

    async query(text: string, values: readonly unknown[] = []): Promise<{ rows: unknown[]; rowCount: number }> {
      statements.push({ target: this.id, text, values });
      if (text.startsWith('FAIL')) {
        throw new Error('statement failed');
      }
      return { rows: [{ id: this.id }], rowCount: 1 };
    }

    release(): void {
      this.released = true;
    }
  }

  class StubPool {
    readonly clients: StubClient[] = [];
    ended = false;

    constructor(readonly config: Record<string, unknown>) {
      pools.push(this);
    }

    async query(text: string, values: readonly unknown[] = []): Promise<{ rows: unknown[]; rowCount: number }> {
      statements.push({ target: 'pool', text, values });
      return { rows: [{ id: 'pool' }], rowCount: 3 };
    }

    async connect(): Promise<StubClient> {
      const client = new StubClient();
      this.clients.push(client);
      return client;
    }

    on(): this {
      return this;
    }

    async end(): Promise<void> {
      this.ended = true;
    }
  }

  return {
    StubPool,
    statements,
    pools,
    reset(): void {
      statements.length = 0;
      pools.length = 0;
      clientCount = 0;
    },
    textsOn(target: string): string[] {
      return statements.filter((s) => s.target === target).map((s) => s.text);
    },
  };
});

vi.mock('pg', () => ({ default: { Pool: pgStub.StubPool } }));

let adapter: PostgreSQLAdapter;

beforeEach(() => {
  pgStub.reset();
  adapter = new PostgreSQLAdapter({ host: 'db.test', database: 'weather', password: 'test-secret' });
});

describe('toPositionalParams', () => {
  it('numbers placeholders in order', () => {
    expect(toPositionalParams('UPDATE t SET a = ?, b = ? WHERE c = ?')).toBe(
      'UPDATE t SET a = $1, b = $2 WHERE c = $3'
    );
  });

  it('leaves statements without placeholders alone', () => {
    expect(toPositionalParams('SELECT 1')).toBe('SELECT 1');
  });
});

describe('PostgreSQLAdapter - queries', () => {
  it('merges pool defaults under the connection settings', () => {
    expect(pgStub.pools[0]?.config).toEqual({
      max: 5,
      idleTimeoutMillis: 10_000,
      connectionTimeoutMillis: 5_000,
      host: 'db.test',
      database: 'weather',
      password: 'test-secret',
    });
  });

  it('runs plain statements on the pool with positional parameters', async () => {
    expect(await adapter.queryOne<{ id: string }>('SELECT * FROM t WHERE a = ?', [7])).toEqual({ id: 'pool' });
    expect(await adapter.execute('DELETE FROM t WHERE a = ? AND b = ?', [1, 'x'])).toBe(3);

    expect(pgStub.statements).toEqual([
      { target: 'pool', text: 'SELECT * FROM t WHERE a = $1', values: [7] },
      { target: 'pool', text: 'DELETE FROM t WHERE a = $1 AND b = $2', values: [1, 'x'] },
    ]);
  });

  it('ends the pool on close', async () => {
    await adapter.close();
    expect(pgStub.pools[0]?.ended).toBe(true);
  });
});

describe('PostgreSQLAdapter - transactions', () => {
  it('runs the body on one checked-out client and commits', async () => {
    const result = await adapter.transaction(async () => {
      await adapter.execute('INSERT INTO t VALUES (?)', [1]);
      return 'done';
    });

    expect(result).toBe('done');
    expect(pgStub.textsOn('client-1')).toEqual(['BEGIN', 'INSERT INTO t VALUES ($1)', 'COMMIT']);
    expect(pgStub.textsOn('pool')).toEqual([]);
    expect(pgStub.pools[0]?.clients[0]?.released).toBe(true);
  });

  it('rolls back, releases the client and rethrows when the body fails', async () => {
    await expect(
      adapter.transaction(async () => {
        await adapter.execute('INSERT INTO t VALUES (1)');
        await adapter.execute('FAIL here');
      })
    ).rejects.toThrow('statement failed');

    expect(pgStub.textsOn('client-1')).toEqual(['BEGIN', 'INSERT INTO t VALUES (1)', 'FAIL here', 'ROLLBACK']);
    expect(pgStub.pools[0]?.clients[0]?.released).toBe(true);
  });

  it('nests inner transactions as savepoints on the same client', async () => {
    await adapter.transaction(async () => {
      await adapter.execute('INSERT a');
      await adapter.transaction(() => adapter.execute('INSERT b'));
      await expect(adapter.transaction(() => adapter.execute('FAIL c'))).rejects.toThrow('statement failed');
      await adapter.execute('INSERT d');
    });

    expect(pgStub.textsOn('client-1')).toEqual([
      'BEGIN',
      'INSERT a',
      'SAVEPOINT sp_0',
      'INSERT b',
      'RELEASE SAVEPOINT sp_0',
      'SAVEPOINT sp_1',
      'FAIL c',
      'ROLLBACK TO SAVEPOINT sp_1',
      'INSERT d',
      'COMMIT',
    ]);
    expect(pgStub.pools[0]?.clients).toHaveLength(1);
  });

  it('gives concurrent transactions their own clients and keeps outside work on the pool', async () => {
    await Promise.all([
      adapter.transaction(() => adapter.execute('INSERT one')),
      adapter.transaction(() => adapter.execute('INSERT two')),
      adapter.execute('UPDATE three'),
    ]);

    expect(pgStub.textsOn('client-1')).toEqual(['BEGIN', 'INSERT one', 'COMMIT']);
    expect(pgStub.textsOn('client-2')).toEqual(['BEGIN', 'INSERT two', 'COMMIT']);
    expect(pgStub.textsOn('pool')).toEqual(['UPDATE three']);
  });
});
