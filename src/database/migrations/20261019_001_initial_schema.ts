import { DatabaseConnection } from '../../types/database.js';
import { logger } from '../../middleware/logging.js';

/**
 * Initial schema
 *
 * - users: one row per Telegram user, joined_at set on first contact only
 * - searches: append-only lookup log, movie_id NULL when nothing resolved
 * - favorites: one row per (user, movie)
 * - admins: user ids allowed to run /stats and /broadcast
 */
export class InitialSchemaMigration {
  static version = '20261019_001';
  static migrationName = 'initial_schema';

  static async up(db: DatabaseConnection): Promise<void> {
    logger.info('Running initial schema migration');

    await db.execute(`
      CREATE TABLE users (
        user_id INTEGER PRIMARY KEY,
        username TEXT,
        first_name TEXT,
        last_name TEXT,
        joined_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP,
        last_seen_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await db.execute(`
      CREATE TABLE searches (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        user_id INTEGER NOT NULL,
        query TEXT NOT NULL,
        movie_id INTEGER,
        searched_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await db.execute('CREATE INDEX idx_searches_movie_id ON searches(movie_id)');
    await db.execute('CREATE INDEX idx_searches_user_id ON searches(user_id)');

    await db.execute(`
      CREATE TABLE favorites (
        user_id INTEGER NOT NULL,
        movie_id INTEGER NOT NULL,
        movie_title TEXT NOT NULL,
        added_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP,
        PRIMARY KEY (user_id, movie_id)
      )
    `);

    await db.execute(`
      CREATE TABLE admins (
        user_id INTEGER PRIMARY KEY,
        added_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP
      )
    `);
  }

  static async down(db: DatabaseConnection): Promise<void> {
    await db.execute('DROP TABLE IF EXISTS admins');
    await db.execute('DROP TABLE IF EXISTS favorites');
    await db.execute('DROP INDEX IF EXISTS idx_searches_user_id');
    await db.execute('DROP INDEX IF EXISTS idx_searches_movie_id');
    await db.execute('DROP TABLE IF EXISTS searches');
    await db.execute('DROP TABLE IF EXISTS users');
  }
}
