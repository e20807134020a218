/**
 * Conversions between Telegram's types and the bot's transport-neutral ones
 */

import { Markup } from 'telegraf';
import type { InlineKeyboardMarkup, InlineQueryResult, User } from 'telegraf/types';
import { ActionRow, BotUser, InlineArticle } from '../../types/bot.js';
import { ReplyOptions } from './types.js';

const COMMAND_PREFIX = /^\/[A-Za-z0-9_]+(?:@[A-Za-z0-9_]+)?/;

/**
 * Text after `/command` or `/command@botname`, untrimmed
 */
export function parseCommandArgs(text: string): string {
  return text.replace(COMMAND_PREFIX, '');
}

export function toBotUser(user: User): BotUser {
  return {
    id: user.id,
    username: user.username,
    firstName: user.first_name,
    lastName: user.last_name,
  };
}

export function toKeyboard(actions: ActionRow[]): InlineKeyboardMarkup {
  return Markup.inlineKeyboard(
    actions.map(row =>
      row.map(button =>
        button.kind === 'url'
          ? Markup.button.url(button.label, button.url)
          : Markup.button.callback(button.label, button.data)
      )
    )
  ).reply_markup;
}

export interface ReplyExtra {
  parse_mode?: 'Markdown';
  reply_markup?: InlineKeyboardMarkup;
}

/**
 * Send options for reply/replyWithPhoto/sendMessage
 */
export function toReplyExtra(options: ReplyOptions = {}): ReplyExtra {
  return {
    ...(options.markdown === false ? {} : { parse_mode: 'Markdown' as const }),
    ...(options.actions && options.actions.length > 0
      ? { reply_markup: toKeyboard(options.actions) }
      : {}),
  };
}

export function toInlineQueryResult(article: InlineArticle): InlineQueryResult {
  return {
    type: 'article',
    id: article.id,
    title: article.title,
    description: article.description,
    input_message_content: {
      message_text: article.text,
      parse_mode: 'Markdown',
    },
    ...(article.thumbnailUrl ? { thumbnail_url: article.thumbnailUrl } : {}),
  };
}
