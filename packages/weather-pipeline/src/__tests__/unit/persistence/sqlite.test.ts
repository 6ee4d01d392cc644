/**
 * SQLite Adapter Tests - transaction scoping on a single connection
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SQLiteAdapter } from '../../../persistence/adapters/sqlite.js';

let adapter: SQLiteAdapter;

beforeEach(async () => {
  adapter = new SQLiteAdapter(':memory:');
  await adapter.initializeSchema('CREATE TABLE notes (value TEXT NOT NULL)');
});

afterEach(async () => {
  await adapter.close();
});

async function values(): Promise<string[]> {
  const rows = await adapter.queryMany<{ value: string }>('SELECT value FROM notes ORDER BY rowid');
  return rows.map((row) => row.value);
}

const pause = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

describe('SQLiteAdapter - transactions', () => {
  it('commits on success and rolls back on failure', async () => {
    await adapter.transaction(() => adapter.execute("INSERT INTO notes VALUES ('kept')"));
    await expect(
      adapter.transaction(async () => {
        await adapter.execute("INSERT INTO notes VALUES ('dropped')");
        throw new Error('abort');
      })
    ).rejects.toThrow('abort');

    expect(await values()).toEqual(['kept']);
  });

  it('rolls back only the failed savepoint of a nested transaction', async () => {
    await adapter.transaction(async () => {
      await adapter.execute("INSERT INTO notes VALUES ('outer')");
      await expect(
        adapter.transaction(async () => {
          await adapter.execute("INSERT INTO notes VALUES ('inner')");
          throw new Error('inner abort');
        })
      ).rejects.toThrow('inner abort');
      await adapter.transaction(() => adapter.execute("INSERT INTO notes VALUES ('second inner')"));
    });

    expect(await values()).toEqual(['outer', 'second inner']);
  });

  it('runs concurrent top-level transactions one after another', async () => {
    const first = adapter.transaction(async () => {
      await adapter.execute("INSERT INTO notes VALUES ('a1')");
      await pause(10);
      await adapter.execute("INSERT INTO notes VALUES ('a2')");
      throw new Error('first failed');
    });
    const second = adapter.transaction(async () => {
      await adapter.execute("INSERT INTO notes VALUES ('b1')");
    });

    await expect(first).rejects.toThrow('first failed');
    await second;

    expect(await values()).toEqual(['b1']);
  });

  it('keeps a statement issued outside out of an open transaction', async () => {
    const failing = adapter.transaction(async () => {
      await adapter.execute("INSERT INTO notes VALUES ('inside')");
      await pause(10);
      throw new Error('abort');
    });
    const outside = adapter.execute("INSERT INTO notes VALUES ('outside')");

    await expect(failing).rejects.toThrow('abort');
    expect(await outside).toBe(1);
    expect(await values()).toEqual(['outside']);
  });
});
