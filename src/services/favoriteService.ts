import { DatabaseConnection } from '../types/database.js';
import { DuplicateKeyError } from '../errors/index.js';
import { logger } from '../middleware/logging.js';

export interface Favorite {
  movieId: number;
  title: string;
  addedAt: string;
}

export type AddFavoriteResult = 'added' | 'exists';

interface FavoriteRow {
  movie_id: number;
  movie_title: string;
  added_at: string;
}

function toFavorite(row: FavoriteRow): Favorite {
  return {
    movieId: row.movie_id,
    title: row.movie_title,
    addedAt: row.added_at,
  };
}

export class FavoriteService {
  constructor(private readonly db: DatabaseConnection) {}

  /**
   * Insert if absent. A concurrent insert that wins the race surfaces as a
   * unique-key violation and is reported the same as an existing row.
   */
  async add(userId: number, movieId: number, title: string): Promise<AddFavoriteResult> {
    if (await this.has(userId, movieId)) {
      return 'exists';
    }

    try {
      await this.db.execute(
        'INSERT INTO favorites (user_id, movie_id, movie_title) VALUES (?, ?, ?)',
        [userId, movieId, title]
      );
    } catch (error) {
      if (error instanceof DuplicateKeyError) {
        return 'exists';
      }
      throw error;
    }

    logger.info('Favorite added', { userId, movieId });
    return 'added';
  }

  /**
   * Returns false when the favorite was not present
   */
  async remove(userId: number, movieId: number): Promise<boolean> {
    const result = await this.db.execute(
      'DELETE FROM favorites WHERE user_id = ? AND movie_id = ?',
      [userId, movieId]
    );
    return result.affectedRows > 0;
  }

  async get(userId: number, movieId: number): Promise<Favorite | undefined> {
    const row = await this.db.get<FavoriteRow>(
      'SELECT movie_id, movie_title, added_at FROM favorites WHERE user_id = ? AND movie_id = ?',
      [userId, movieId]
    );
    return row ? toFavorite(row) : undefined;
  }

  async has(userId: number, movieId: number): Promise<boolean> {
    return (await this.get(userId, movieId)) !== undefined;
  }

  /**
   * Newest first
   */
  async list(userId: number, limit?: number): Promise<Favorite[]> {
    const rows = await this.db.query<FavoriteRow>(
      `SELECT movie_id, movie_title, added_at FROM favorites
       WHERE user_id = ?
       ORDER BY added_at DESC, rowid DESC
       LIMIT ?`,
      [userId, limit ?? -1]
    );

    return rows.map(toFavorite);
  }

  async count(userId: number): Promise<number> {
    const row = await this.db.get<{ count: number }>(
      'SELECT COUNT(*) AS count FROM favorites WHERE user_id = ?',
      [userId]
    );
    return row?.count ?? 0;
  }
}
