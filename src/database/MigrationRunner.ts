import { DatabaseConnection, MigrationDefinition } from '../types/database.js';
import { InitialSchemaMigration } from './migrations/20261019_001_initial_schema.js';
import { logger } from '../middleware/logging.js';
import { DatabaseError } from '../errors/index.js';
import { getErrorMessage } from '../utils/errorHandling.js';

interface MigrationRecord {
  version: string;
}

export interface MigrationStatus {
  version: string;
  name: string;
  executed: boolean;
}

export class MigrationRunner {
  private db: DatabaseConnection;
  private migrations: MigrationDefinition[];

  constructor(db: DatabaseConnection, migrations?: MigrationDefinition[]) {
    this.db = db;

    this.migrations = migrations ?? [
      {
        version: InitialSchemaMigration.version,
        name: InitialSchemaMigration.migrationName,
        up: InitialSchemaMigration.up,
        down: InitialSchemaMigration.down,
      },
    ];
  }

  async ensureMigrationTable(): Promise<void> {
    await this.db.execute(`
      CREATE TABLE IF NOT EXISTS migrations (
        version VARCHAR(255) PRIMARY KEY,
        name VARCHAR(255) NOT NULL,
        executed_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP
      )
    `);
  }

  async getExecutedMigrations(): Promise<string[]> {
    const results = await this.db.query<MigrationRecord>(
      'SELECT version FROM migrations ORDER BY version'
    );
    return results.map(row => row.version);
  }

  /**
   * Apply pending migrations in order, each inside its own transaction.
   * Returns the versions that were applied.
   */
  async migrate(): Promise<string[]> {
    await this.ensureMigrationTable();
    const executedMigrations = await this.getExecutedMigrations();
    const applied: string[] = [];

    for (const migration of this.migrations) {
      if (executedMigrations.includes(migration.version)) {
        continue;
      }

      logger.info(`Running migration: ${migration.version} - ${migration.name}`);

      try {
        await this.db.beginTransaction();
        await migration.up(this.db);
        await this.db.execute('INSERT INTO migrations (version, name) VALUES (?, ?)', [
          migration.version,
          migration.name,
        ]);
        await this.db.commit();
      } catch (error) {
        await this.db.rollback();
        throw new DatabaseError(`Migration failed: ${migration.version} - ${getErrorMessage(error)}`, {
          context: { service: 'MigrationRunner', operation: 'migrate', metadata: { version: migration.version } },
          cause: error instanceof Error ? error : undefined,
        });
      }

      applied.push(migration.version);
      logger.info(`Migration completed: ${migration.version}`);
    }

    return applied;
  }

  async rollback(targetVersion?: string): Promise<string[]> {
    await this.ensureMigrationTable();
    const executedMigrations = await this.getExecutedMigrations();
    const rolledBack: string[] = [];

    const migrationsToRollback = this.migrations
      .filter(migration => executedMigrations.includes(migration.version))
      .reverse();

    for (const migration of migrationsToRollback) {
      if (targetVersion && migration.version <= targetVersion) {
        break;
      }

      logger.info(`Rolling back migration: ${migration.version} - ${migration.name}`);

      try {
        await this.db.beginTransaction();
        await migration.down(this.db);
        await this.db.execute('DELETE FROM migrations WHERE version = ?', [migration.version]);
        await this.db.commit();
      } catch (error) {
        await this.db.rollback();
        throw new DatabaseError(`Rollback failed: ${migration.version} - ${getErrorMessage(error)}`, {
          context: { service: 'MigrationRunner', operation: 'rollback', metadata: { version: migration.version } },
          cause: error instanceof Error ? error : undefined,
        });
      }

      rolledBack.push(migration.version);
    }

    return rolledBack;
  }

  async status(): Promise<MigrationStatus[]> {
    await this.ensureMigrationTable();
    const executedMigrations = await this.getExecutedMigrations();

    return this.migrations.map(migration => ({
      version: migration.version,
      name: migration.name,
      executed: executedMigrations.includes(migration.version),
    }));
  }
}
