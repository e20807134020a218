/**
 * Converts raw TMDB movie payloads into MovieRecords.
 *
 * Pure: no I/O, no logging. Every optional field has its own fallback, so a
 * malformed field degrades to "N/A", an empty list or an absent value
 * without discarding the rest of the record.
 */

import { z } from 'zod';
import {
  MovieRecord,
  MovieUrlOptions,
  RecommendationRef,
  SearchCandidate,
} from '../../../types/movie.js';

export const NOT_AVAILABLE = 'N/A';
export const NO_OVERVIEW = 'No overview available.';
export const MAX_RECOMMENDATIONS = 5;

export const DEFAULT_URL_OPTIONS: MovieUrlOptions = {
  imageBaseUrl: 'https://image.tmdb.org/t/p',
  siteUrl: 'https://www.themoviedb.org',
};

const optionalString = z.string().optional().catch(undefined);
const optionalNumber = z.number().finite().optional().catch(undefined);

/**
 * Array whose malformed elements are dropped instead of failing the parse.
 * With a limit, only the first `limit` raw entries are considered, so a
 * dropped entry is not replaced by a later one.
 */
function lenientArray<O>(element: z.ZodType<O, z.ZodTypeDef, unknown>, limit?: number) {
  return z
    .array(z.unknown())
    .catch([])
    .transform(items =>
      items.slice(0, limit).flatMap(item => {
        const parsed = element.safeParse(item);
        return parsed.success ? [parsed.data] : [];
      })
    );
}

function lenientResults<O>(element: z.ZodType<O, z.ZodTypeDef, unknown>, limit?: number) {
  return z
    .object({ results: lenientArray(element, limit) })
    .optional()
    .catch(undefined)
    .transform(value => value?.results ?? []);
}

const genreSchema = z.object({ name: z.string() });

const videoSchema = z.object({
  key: z.string(),
  site: z.string(),
  type: z.string(),
});

const movieStubSchema = z.object({
  id: z.number().int(),
  title: optionalString,
  release_date: optionalString,
  poster_path: z.string().nullable().optional().catch(undefined),
  overview: optionalString,
});

const movieDetailSchema = movieStubSchema.extend({
  runtime: optionalNumber,
  genres: lenientArray(genreSchema),
  original_language: optionalString,
  vote_average: optionalNumber,
  videos: lenientResults(videoSchema),
  recommendations: lenientResults(movieStubSchema, MAX_RECOMMENDATIONS),
});

type MovieStub = z.infer<typeof movieStubSchema>;

// ============================================
// Field rules
// ============================================

export function formatYear(releaseDate: string | undefined): string {
  return releaseDate ? releaseDate.slice(0, 4) : NOT_AVAILABLE;
}

export function formatRuntime(minutes: number | undefined): string {
  return minutes ? `${minutes} min` : NOT_AVAILABLE;
}

/**
 * One decimal place, always printed ("7.0"). Zero counts as unrated.
 */
export function formatRating(voteAverage: number | undefined): string {
  if (!voteAverage) {
    return NOT_AVAILABLE;
  }
  return (Math.round(voteAverage * 10) / 10).toFixed(1);
}

function imageUrl(baseUrl: string, size: string, path: string | null | undefined): string | undefined {
  return path ? `${baseUrl}/${size}${path}` : undefined;
}

function youtubeTrailer(videos: Array<z.infer<typeof videoSchema>>): string | undefined {
  const trailer = videos.find(video => video.type === 'Trailer' && video.site === 'YouTube');
  return trailer ? `https://www.youtube.com/watch?v=${trailer.key}` : undefined;
}

function toRecommendation(stub: MovieStub, urls: MovieUrlOptions): RecommendationRef {
  const thumbnailUrl = imageUrl(urls.imageBaseUrl, 'w200', stub.poster_path);
  return {
    id: stub.id,
    title: stub.title || NOT_AVAILABLE,
    year: formatYear(stub.release_date),
    ...(thumbnailUrl ? { thumbnailUrl } : {}),
    externalLink: movieLink(stub.id, urls),
  };
}

export function movieLink(id: number, urls: MovieUrlOptions = DEFAULT_URL_OPTIONS): string {
  return `${urls.siteUrl}/movie/${id}`;
}

// ============================================
// Public API
// ============================================

/**
 * Normalize a /movie/{id} payload (with videos and recommendations appended).
 * Returns null when the payload carries no numeric id.
 */
export function normalizeMovie(
  raw: unknown,
  urls: MovieUrlOptions = DEFAULT_URL_OPTIONS
): MovieRecord | null {
  const parsed = movieDetailSchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }

  const movie = parsed.data;
  const posterUrl = imageUrl(urls.imageBaseUrl, 'original', movie.poster_path);
  const trailerUrl = youtubeTrailer(movie.videos);
  const genres = movie.genres.map(genre => genre.name).join(', ');

  return {
    id: movie.id,
    title: movie.title || NOT_AVAILABLE,
    year: formatYear(movie.release_date),
    runtime: formatRuntime(movie.runtime),
    genres: genres || NOT_AVAILABLE,
    language: movie.original_language ? movie.original_language.toUpperCase() : NOT_AVAILABLE,
    rating: formatRating(movie.vote_average),
    overview: movie.overview || NO_OVERVIEW,
    ...(posterUrl ? { posterUrl } : {}),
    ...(trailerUrl ? { trailerUrl } : {}),
    externalLink: movieLink(movie.id, urls),
    recommendations: movie.recommendations.map(stub => toRecommendation(stub, urls)),
  };
}

/**
 * Pull the ids out of the first `limit` entries of a search or list payload,
 * in order. Entries without a numeric id are skipped.
 */
export function extractResultIds(raw: unknown, limit?: number): number[] {
  return normalizeSearchResults(raw, DEFAULT_URL_OPTIONS, limit).map(candidate => candidate.id);
}

/**
 * Normalize a /search/movie payload into inline-result candidates
 */
export function normalizeSearchResults(
  raw: unknown,
  urls: MovieUrlOptions = DEFAULT_URL_OPTIONS,
  limit?: number
): SearchCandidate[] {
  const parsed = lenientResults(movieStubSchema, limit).safeParse(raw);
  const results = parsed.success ? parsed.data : [];

  return results.map(stub => {
    const thumbnailUrl = imageUrl(urls.imageBaseUrl, 'w200', stub.poster_path);
    return {
      id: stub.id,
      title: stub.title || NOT_AVAILABLE,
      year: formatYear(stub.release_date),
      overview: stub.overview || NO_OVERVIEW,
      ...(thumbnailUrl ? { thumbnailUrl } : {}),
      externalLink: movieLink(stub.id, urls),
    };
  });
}
