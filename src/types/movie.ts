/**
 * Movie view model shared by the lookup service, the formatter and the bot.
 */

export interface RecommendationRef {
  readonly id: number;
  readonly title: string;
  readonly year: string;
  readonly thumbnailUrl?: string;
  readonly externalLink: string;
}

/**
 * Normalized movie. Display fields are already strings with "N/A" filled in,
 * so consumers never branch on missing data.
 */
export interface MovieRecord {
  readonly id: number;
  readonly title: string;
  readonly year: string;
  readonly runtime: string;
  readonly genres: string;
  readonly language: string;
  readonly rating: string;
  readonly overview: string;
  readonly posterUrl?: string;
  readonly trailerUrl?: string;
  readonly externalLink: string;
  readonly recommendations: readonly RecommendationRef[];
}

/**
 * Lightweight search hit used for inline results (no detail fetch)
 */
export interface SearchCandidate {
  readonly id: number;
  readonly title: string;
  readonly year: string;
  readonly overview: string;
  readonly thumbnailUrl?: string;
  readonly externalLink: string;
}

export interface MovieUrlOptions {
  imageBaseUrl: string;
  siteUrl: string;
}

export type MovieList = Array<MovieRecord | null>;
