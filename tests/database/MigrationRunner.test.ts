import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { SqliteConnection } from '../../src/database/connections/SqliteConnection.js';
import { MigrationRunner } from '../../src/database/MigrationRunner.js';
import { DatabaseError } from '../../src/errors/index.js';

async function tableNames(db: SqliteConnection): Promise<string[]> {
  const rows = await db.query<{ name: string }>(
    "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
  );
  return rows.map(row => row.name);
}

describe('MigrationRunner', () => {
  let db: SqliteConnection;

  beforeEach(async () => {
    db = new SqliteConnection({ filename: ':memory:' });
    await db.connect();
  });

  afterEach(async () => {
    await db.close();
  });

  it('creates the schema and records the migration', async () => {
    const runner = new MigrationRunner(db);

    expect(await runner.migrate()).toEqual(['20261019_001']);
    expect(await tableNames(db)).toEqual(['admins', 'favorites', 'migrations', 'searches', 'users']);
    expect(await runner.status()).toEqual([
      { version: '20261019_001', name: 'initial_schema', executed: true },
    ]);
  });

  it('skips migrations that already ran', async () => {
    const runner = new MigrationRunner(db);
    await runner.migrate();

    expect(await runner.migrate()).toEqual([]);
  });

  it('rolls back and can migrate again', async () => {
    const runner = new MigrationRunner(db);
    await runner.migrate();

    expect(await runner.rollback()).toEqual(['20261019_001']);
    expect(await tableNames(db)).toEqual(['migrations']);
    expect(await runner.migrate()).toEqual(['20261019_001']);
  });

  it('rolls back a failed migration and reports it', async () => {
    const runner = new MigrationRunner(db, [
      {
        version: '20990101_001',
        name: 'broken',
        up: async connection => {
          await connection.execute('CREATE TABLE half_done (id INTEGER)');
          await connection.execute('INSERT INTO missing_table VALUES (1)');
        },
        down: async () => undefined,
      },
    ]);

    await expect(runner.migrate()).rejects.toBeInstanceOf(DatabaseError);
    expect(await tableNames(db)).toEqual(['migrations']);
    expect(await runner.status()).toEqual([{ version: '20990101_001', name: 'broken', executed: false }]);
  });
});
