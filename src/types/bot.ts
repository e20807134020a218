/**
 * Transport-neutral reply shapes produced by the formatter and turned into
 * Telegram markup by the bot layer.
 */

export type ReplyButton =
  | { kind: 'callback'; label: string; data: string }
  | { kind: 'url'; label: string; url: string };

export type ActionRow = ReplyButton[];

export interface FormattedReply {
  text: string;
  actions: ActionRow[];
}

export interface InlineArticle {
  id: string;
  title: string;
  description: string;
  text: string;
  thumbnailUrl?: string;
}

export interface BotUser {
  id: number;
  username?: string | undefined;
  firstName?: string | undefined;
  lastName?: string | undefined;
}

export interface TopMovieStat {
  title: string;
  count: number;
}

export interface BotStats {
  userCount: number;
  totalSearches: number;
  topMovies: TopMovieStat[];
}

export interface BroadcastSummary {
  recipients: number;
  succeeded: number;
  failed: number;
}
