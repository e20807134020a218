import { TMDBClient } from './providers/tmdb/TMDBClient.js';
import {
  extractResultIds,
  normalizeMovie,
  normalizeSearchResults,
} from './providers/tmdb/normalizeMovie.js';
import { MovieList, MovieRecord, MovieUrlOptions, SearchCandidate } from '../types/movie.js';
import { TMDBAppendToResponse } from '../types/providers/tmdb.js';
import { logger } from '../middleware/logging.js';
import { createErrorLogContext } from '../utils/errorHandling.js';

const DETAIL_APPENDS: TMDBAppendToResponse[] = ['videos', 'recommendations'];

export interface MovieLookupOptions {
  urls: MovieUrlOptions;
  /** Entries taken from trending/popular lists */
  listLimit: number;
  parallelDetailFetches: boolean;
}

/**
 * Read side of the bot: TMDB client + normalizer.
 *
 * Callers never see exceptions. Any failure, after the client's retries,
 * collapses to null ("no data"); the distinction between not found,
 * malformed and unreachable only survives in the logs.
 */
export class MovieLookupService {
  constructor(
    private readonly client: TMDBClient,
    private readonly options: MovieLookupOptions
  ) {}

  /**
   * Search by title (and year), then fetch the first hit's details
   */
  async search(title: string, year?: number): Promise<MovieRecord | null> {
    try {
      const results = await this.client.searchMovies({
        query: title,
        ...(year !== undefined ? { year } : {}),
      });

      const [firstId] = extractResultIds(results, 1);
      if (firstId === undefined) {
        logger.info('No search results', { query: title, year });
        return null;
      }

      return await this.loadDetails(firstId);
    } catch (error) {
      logger.error('Movie search failed', createErrorLogContext(error, { query: title, year }));
      return null;
    }
  }

  async fetchById(movieId: number): Promise<MovieRecord | null> {
    try {
      return await this.loadDetails(movieId);
    } catch (error) {
      logger.error('Movie lookup failed', createErrorLogContext(error, { movieId }));
      return null;
    }
  }

  async trending(): Promise<MovieList | null> {
    return this.list('trending', () => this.client.getTrending());
  }

  async popular(): Promise<MovieList | null> {
    return this.list('popular', () => this.client.getPopular());
  }

  /**
   * One search round trip for inline queries, no detail fetches
   */
  async searchCandidates(query: string, limit: number): Promise<SearchCandidate[]> {
    try {
      const results = await this.client.searchMovies({ query });
      return normalizeSearchResults(results, this.options.urls, limit);
    } catch (error) {
      logger.error('Inline search failed', createErrorLogContext(error, { query }));
      return [];
    }
  }

  private async loadDetails(movieId: number): Promise<MovieRecord | null> {
    const raw = await this.client.getMovie(movieId, { appendToResponse: DETAIL_APPENDS });
    const record = normalizeMovie(raw, this.options.urls);
    if (!record) {
      logger.warn('TMDB returned a movie payload without an id', { movieId });
    }
    return record;
  }

  /**
   * Fetch a list endpoint, then each entry's details. A failed list call is
   * "no data"; a failed detail fetch leaves a null entry in its slot.
   */
  private async list(
    name: string,
    fetchList: () => Promise<unknown>
  ): Promise<MovieList | null> {
    let ids: number[];
    try {
      ids = extractResultIds(await fetchList(), this.options.listLimit);
    } catch (error) {
      logger.error(`Fetching ${name} list failed`, createErrorLogContext(error));
      return null;
    }

    if (this.options.parallelDetailFetches) {
      return Promise.all(ids.map(id => this.fetchById(id)));
    }

    const records: MovieList = [];
    for (const id of ids) {
      records.push(await this.fetchById(id));
    }
    return records;
  }
}
