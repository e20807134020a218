import { DatabaseManager } from './DatabaseManager.js';
import { MigrationRunner } from './MigrationRunner.js';
import { DatabaseConfig } from '../types/database.js';
import { defaultConfig } from '../config/defaults.js';
import { logger } from '../middleware/logging.js';
import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

// Usage: migrate [rollback [targetVersion]]
async function runMigrations(): Promise<void> {
  const [command, targetVersion] = process.argv.slice(2);

  const dbConfig: DatabaseConfig = {
    ...defaultConfig.database,
    filename: process.env.DB_FILE || defaultConfig.database.filename,
  };

  logger.info('Starting database migration', { filename: dbConfig.filename, command: command ?? 'migrate' });

  const dbManager = new DatabaseManager(dbConfig);

  try {
    await dbManager.connect();
    const migrationRunner = new MigrationRunner(dbManager.getConnection());

    if (command === 'rollback') {
      const rolledBack = await migrationRunner.rollback(targetVersion);
      logger.info('Rollback completed', { rolledBack });
    } else {
      const applied = await migrationRunner.migrate();
      logger.info('Migrations completed successfully', { applied });
    }

    const status = await migrationRunner.status();
    status.forEach(migration => {
      logger.info(`${migration.executed ? '[x]' : '[ ]'} ${migration.version} - ${migration.name}`);
    });
  } catch (error) {
    logger.error('Migration failed', { error });
    process.exitCode = 1;
  } finally {
    await dbManager.disconnect();
  }
}

void runMigrations();
