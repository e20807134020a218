/**
 * Movie Formatter
 *
 * Turns MovieRecords and bot state into legacy-Markdown message text plus
 * transport-neutral button rows. Dynamic text outside entities is escaped;
 * text inside bold and link entities goes through bold() and link().
 */

import { PromoLink } from '../../config/types.js';
import { logger } from '../../middleware/logging.js';
import { MovieList, MovieRecord, SearchCandidate } from '../../types/movie.js';
import {
  ActionRow,
  BotStats,
  BroadcastSummary,
  FormattedReply,
  InlineArticle,
} from '../../types/bot.js';
import { NOT_AVAILABLE } from '../providers/tmdb/normalizeMovie.js';
import { bold, escapeMarkdown, link, truncate } from '../../utils/markdown.js';
import { createErrorLogContext } from '../../utils/errorHandling.js';

export const FORMAT_ERROR_TEXT = 'Error formatting movie information.';

export const CALLBACK_PREFIX = {
  favorite: 'fav_',
  remove: 'remove_',
  view: 'view_',
} as const;

export interface DetailOptions {
  /** Shown from the favorites listing: offer removal instead of saving */
  fromFavorites?: boolean;
  promoLinks?: readonly PromoLink[];
}

export interface FavoriteEntry {
  movieId: number;
  title: string;
}

export interface ContactInfo {
  email?: string | undefined;
  url?: string | undefined;
}

// ============================================
// Buttons
// ============================================

export function promoRows(promoLinks: readonly PromoLink[] = []): ActionRow[] {
  return promoLinks.map((link): ActionRow => [{ kind: 'url', label: link.label, url: link.url }]);
}

/**
 * Primary favorite toggle followed by one row per promo link
 */
export function detailActions(movieId: number, options: DetailOptions = {}): ActionRow[] {
  const primary: ActionRow = options.fromFavorites
    ? [{ kind: 'callback', label: '❌ Remove from favorites', data: `${CALLBACK_PREFIX.remove}${movieId}` }]
    : [{ kind: 'callback', label: '❤️ Save to favorites', data: `${CALLBACK_PREFIX.favorite}${movieId}` }];

  return [primary, ...promoRows(options.promoLinks)];
}

// ============================================
// Movies
// ============================================

function ratingLabel(rating: string): string {
  return rating === NOT_AVAILABLE ? rating : `${rating}/10`;
}

function titleWithYear(title: string, year: string): string {
  return `${title} (${year})`;
}

function detailText(record: MovieRecord): string {
  const lines = [
    `🎬 ${bold(record.title)} (${record.year})`,
    `⭐ Rating: ${ratingLabel(record.rating)}`,
    `⏳ Runtime: ${record.runtime}`,
    `📌 Genres: ${escapeMarkdown(record.genres)}`,
    `🌐 Language: ${record.language}`,
    '',
    '📖 *Overview:*',
    escapeMarkdown(record.overview),
    '',
    `🔗 [More info on TMDB](${record.externalLink})`,
  ];

  if (record.trailerUrl) {
    lines.push(`🎥 [Watch trailer](${record.trailerUrl})`);
  }

  if (record.recommendations.length > 0) {
    lines.push('', '🎥 *You might also like:*');
    for (const rec of record.recommendations) {
      lines.push(`• ${link(titleWithYear(rec.title, rec.year), rec.externalLink)}`);
    }
  }

  return lines.join('\n');
}

/**
 * Detail view for one movie. Never throws; a record that cannot be rendered
 * yields the placeholder text with the usual buttons.
 */
export function renderDetail(record: MovieRecord, options: DetailOptions = {}): FormattedReply {
  const actions = detailActions(record.id, options);

  try {
    return { text: detailText(record), actions };
  } catch (error) {
    logger.error('Error formatting movie message', createErrorLogContext(error, { movieId: record.id }));
    return { text: FORMAT_ERROR_TEXT, actions };
  }
}

/**
 * Heading followed by a two-line block per movie; null entries are skipped
 */
export function renderList(records: MovieList, heading: string): string {
  const blocks = records.flatMap(record =>
    record
      ? [
          `🎬 ${link(titleWithYear(record.title, record.year), record.externalLink)}\n` +
            `⭐ ${ratingLabel(record.rating)} | ⏳ ${record.runtime}`,
        ]
      : []
  );

  return [bold(heading), ...blocks].join('\n\n');
}

export function renderInlineResult(candidate: SearchCandidate): InlineArticle {
  const text = [
    `🎬 ${bold(titleWithYear(candidate.title, candidate.year))}`,
    '',
    `📖 ${escapeMarkdown(truncate(candidate.overview, 200))}`,
    '',
    `🔍 Use \`/id ${candidate.id}\` for full details`,
  ].join('\n');

  return {
    id: String(candidate.id),
    title: `${candidate.title} (${candidate.year})`,
    description: truncate(candidate.overview, 100),
    text,
    ...(candidate.thumbnailUrl ? { thumbnailUrl: candidate.thumbnailUrl } : {}),
  };
}

// ============================================
// Favorites, stats and static texts
// ============================================

export function renderFavoritesList(
  favorites: readonly FavoriteEntry[],
  total: number,
  noFavoritesText: string
): FormattedReply {
  if (favorites.length === 0) {
    return { text: noFavoritesText, actions: [] };
  }

  let text = '⭐ Your favorite movies:';
  if (total > favorites.length) {
    text += `\n\nShowing ${favorites.length} of ${total} favorites`;
  }

  return {
    text,
    actions: favorites.map((favorite): ActionRow => [
      { kind: 'callback', label: `🎬 ${favorite.title}`, data: `${CALLBACK_PREFIX.view}${favorite.movieId}` },
    ]),
  };
}

export function renderStats(stats: BotStats): string {
  const lines = [
    '📊 *Bot statistics*',
    '',
    `👥 Total users: ${stats.userCount}`,
    `🔍 Total searches: ${stats.totalSearches}`,
    '',
    '🎥 *Most searched movies:*',
  ];

  if (stats.topMovies.length === 0) {
    lines.push('- No searches yet');
  }
  for (const movie of stats.topMovies) {
    lines.push(`- ${escapeMarkdown(movie.title)}: ${movie.count} ${movie.count === 1 ? 'search' : 'searches'}`);
  }

  return lines.join('\n');
}

export function renderHelp(promoLinks: readonly PromoLink[], botUsername?: string): FormattedReply {
  const lines = [
    '★ *TMDB Bot Help* ★',
    '',
    'I can fetch movie details from *TMDB* and more!',
    '',
    '🔍 *Search commands:*',
    '`/search <movie name> [year]` - Search by name',
    '`/id <tmdb_id>` - Search by TMDB ID',
    '`/trending` - Currently trending movies',
    '`/popular` - Most popular movies',
    '',
    '💖 *Favorite commands:*',
    '`/favorites` - View your saved movies',
    '',
    '📞 `/contactus` - Get in touch',
  ];

  if (botUsername) {
    lines.push(
      '',
      '🔎 *Search inline:*',
      `\`@${botUsername} <movie name>\``,
      'Copy the movie ID from an inline result and use it with the `/id` command.'
    );
  }

  return { text: lines.join('\n'), actions: promoRows(promoLinks) };
}

export function renderContact(contact: ContactInfo): FormattedReply {
  const lines = ['📞 *Contact us*', ''];

  if (contact.email) {
    lines.push(`📧 Email: \`${contact.email}\``, '');
  }

  lines.push(
    'For any issues, business deals or inquiries, please reach out to us.',
    '',
    "❗ *Only for business and help, don't spam!*"
  );

  return {
    text: lines.join('\n'),
    actions: contact.url ? [[{ kind: 'url', label: '📩 Message admin', url: contact.url }]] : [],
  };
}

export function renderBroadcast(message: string): string {
  return `📢 *Announcement from admin:*\n\n${escapeMarkdown(message)}`;
}

export function renderBroadcastStart(recipients: number): string {
  return `📢 Starting broadcast to ${recipients} users...`;
}

export function renderBroadcastSummary(summary: BroadcastSummary): string {
  return `📢 Broadcast completed!\n✅ Success: ${summary.succeeded}\n❌ Failures: ${summary.failed}`;
}
