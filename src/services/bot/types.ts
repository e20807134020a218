/**
 * Narrow views of a Telegram update. TelegramBotService adapts Telegraf's
 * context to these, so handlers only depend on what they use.
 */

import { BotConfig } from '../../config/types.js';
import { ActionRow, BotUser, InlineArticle } from '../../types/bot.js';
import { MovieLookupService } from '../movieLookupService.js';
import { UserService } from '../userService.js';
import { FavoriteService } from '../favoriteService.js';
import { SearchLogService } from '../searchLogService.js';
import { BroadcastService } from '../broadcastService.js';

export interface ReplyOptions {
  actions?: ActionRow[];
  /** Legacy Markdown parse mode, on unless set to false */
  markdown?: boolean;
}

export interface ChatContext {
  user: BotUser;
  reply(text: string, options?: ReplyOptions): Promise<void>;
  replyWithPhoto(photoUrl: string, caption: string, options?: ReplyOptions): Promise<void>;
}

export interface CommandContext extends ChatContext {
  command: string;
  /** Text after the command, untrimmed */
  args: string;
  botUsername?: string | undefined;
}

export interface CallbackContext extends ChatContext {
  data: string;
  answer(text?: string, showAlert?: boolean): Promise<void>;
  editActions(actions: ActionRow[]): Promise<void>;
}

export interface InlineContext {
  user: BotUser;
  query: string;
  answer(results: InlineArticle[]): Promise<void>;
}

export interface BotDeps {
  lookup: MovieLookupService;
  users: UserService;
  favorites: FavoriteService;
  searches: SearchLogService;
  broadcaster: BroadcastService;
  config: BotConfig;
}

export type CommandHandler = (ctx: CommandContext, deps: BotDeps) => Promise<void>;

export interface Command {
  name: string;
  description: string;
  adminOnly?: boolean;
  execute: CommandHandler;
}
