/**
 * TMDB API Response Types
 * Only the fields the bot reads are declared; responses are validated again
 * by the normalizer before use.
 * @see https://developer.themoviedb.org/reference/intro/getting-started
 */

import type { AxiosAdapter } from 'axios';

// ============================================
// Common Types
// ============================================

export interface TMDBVideo {
  id: string;
  key: string; // YouTube video ID
  name: string;
  site: string; // "YouTube"
  type: string; // "Trailer", "Teaser", "Clip", "Featurette"
}

export interface TMDBGenre {
  id: number;
  name: string;
}

export interface TMDBPagedResponse<T> {
  page: number;
  results: T[];
  total_pages: number;
  total_results: number;
}

// ============================================
// Movies
// ============================================

export interface TMDBMovieSearchResult {
  id: number;
  title: string;
  original_title?: string;
  overview?: string;
  release_date?: string;
  poster_path: string | null;
  vote_average?: number;
  original_language?: string;
}

export type TMDBMovieSearchResponse = TMDBPagedResponse<TMDBMovieSearchResult>;

export type TMDBMovieListResponse = TMDBPagedResponse<TMDBMovieSearchResult>;

export interface TMDBMovie {
  id: number;
  title: string;
  overview: string | null;
  release_date: string;
  runtime: number | null;
  genres: TMDBGenre[];
  original_language: string;
  vote_average: number;
  poster_path: string | null;
  videos?: { results: TMDBVideo[] };
  recommendations?: TMDBMovieListResponse;
}

export interface TMDBError {
  status_code: number;
  status_message: string;
  success?: boolean;
}

// ============================================
// Client Options
// ============================================

export interface TMDBClientOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  retry?: {
    maxAttempts: number;
    delayMs: number;
  };
  /** Replaces axios' HTTP adapter; tests use it to answer requests in process */
  adapter?: AxiosAdapter;
}

export interface TMDBSearchOptions {
  query: string;
  year?: number;
}

export type TMDBAppendToResponse = 'videos' | 'recommendations';

export interface TMDBMovieDetailsOptions {
  appendToResponse?: TMDBAppendToResponse[];
}
