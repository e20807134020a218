import { MovieRecord } from '../../src/types/movie.js';

/**
 * Made-up TMDB payloads and records shared by the tests
 */

export function recommendationStub(id: number, title: string, releaseDate: string, posterPath: string | null = null) {
  return { id, title, release_date: releaseDate, poster_path: posterPath, overview: `${title} overview` };
}

export function movieDetailsPayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 19995,
    title: 'Avatar',
    release_date: '2009-12-15',
    runtime: 162,
    genres: [
      { id: 28, name: 'Action' },
      { id: 12, name: 'Adventure' },
    ],
    original_language: 'en',
    vote_average: 7.58,
    poster_path: '/avatar-poster.jpg',
    overview: 'A marine on an alien moon is torn between orders and the people he came to study.',
    videos: {
      results: [
        { id: 'v1', key: 'teaser-key', name: 'Teaser', site: 'YouTube', type: 'Teaser' },
        { id: 'v2', key: 'vimeo-key', name: 'Trailer', site: 'Vimeo', type: 'Trailer' },
        { id: 'v3', key: 'trailer-key', name: 'Official Trailer', site: 'YouTube', type: 'Trailer' },
      ],
    },
    recommendations: {
      page: 1,
      results: [
        recommendationStub(101, 'Sky Harbor', '2010-05-01', '/sky.jpg'),
        recommendationStub(102, 'Deep Current', '2012-07-20'),
      ],
      total_pages: 1,
      total_results: 2,
    },
    ...overrides,
  };
}

export function searchPayload(results: Array<Record<string, unknown>>): Record<string, unknown> {
  return { page: 1, results, total_pages: 1, total_results: results.length };
}

export function movieRecord(overrides: Partial<MovieRecord> = {}): MovieRecord {
  return {
    id: 27205,
    title: 'Dream Heist',
    year: '2010',
    runtime: '148 min',
    genres: 'Action, Thriller',
    language: 'EN',
    rating: '8.4',
    overview: 'A thief enters dreams to plant an idea.',
    posterUrl: 'https://image.tmdb.org/t/p/original/dream.jpg',
    externalLink: 'https://www.themoviedb.org/movie/27205',
    recommendations: [],
    ...overrides,
  };
}
