import { DatabaseConnection } from '../types/database.js';

export interface MovieSearchCount {
  movieId: number;
  count: number;
}

/**
 * Append-only log of lookups. Id lookups are recorded as "ID:<n>".
 */
export class SearchLogService {
  constructor(private readonly db: DatabaseConnection) {}

  static idQuery(movieId: number): string {
    return `ID:${movieId}`;
  }

  async log(userId: number, query: string, movieId: number | null): Promise<void> {
    await this.db.execute(
      'INSERT INTO searches (user_id, query, movie_id) VALUES (?, ?, ?)',
      [userId, query, movieId]
    );
  }

  async totalSearches(): Promise<number> {
    const row = await this.db.get<{ count: number }>('SELECT COUNT(*) AS count FROM searches');
    return row?.count ?? 0;
  }

  /**
   * Most looked-up movies; searches that resolved nothing are ignored.
   * Ties are ordered by movie id.
   */
  async topMovies(limit: number): Promise<MovieSearchCount[]> {
    const rows = await this.db.query<{ movie_id: number; count: number }>(
      `SELECT movie_id, COUNT(*) AS count FROM searches
       WHERE movie_id IS NOT NULL
       GROUP BY movie_id
       ORDER BY count DESC, movie_id ASC
       LIMIT ?`,
      [limit]
    );
    return rows.map(row => ({ movieId: row.movie_id, count: row.count }));
  }
}
