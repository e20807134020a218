import { BotConfig } from '../../../src/config/types.js';
import { defaultConfig } from '../../../src/config/defaults.js';
import { DatabaseConnection } from '../../../src/types/database.js';
import { ActionRow, BotUser, InlineArticle } from '../../../src/types/bot.js';
import { TMDBClient } from '../../../src/services/providers/tmdb/TMDBClient.js';
import { DEFAULT_URL_OPTIONS } from '../../../src/services/providers/tmdb/normalizeMovie.js';
import { MovieLookupService } from '../../../src/services/movieLookupService.js';
import { UserService } from '../../../src/services/userService.js';
import { FavoriteService } from '../../../src/services/favoriteService.js';
import { SearchLogService } from '../../../src/services/searchLogService.js';
import { BroadcastService } from '../../../src/services/broadcastService.js';
import {
  BotDeps,
  CallbackContext,
  CommandContext,
  InlineContext,
  ReplyOptions,
} from '../../../src/services/bot/types.js';
import { createTmdbStub, routes, StubHandler } from '../../utils/tmdbStub.js';

export const TEST_USER: BotUser = { id: 1001, username: 'moviefan', firstName: 'Test' };
export const ADMIN_USER: BotUser = { id: 9, username: 'owner' };
export const BOT_USERNAME = 'example_movie_bot';

export interface SentMessage {
  kind: 'text' | 'photo';
  text: string;
  photoUrl?: string;
  options?: ReplyOptions | undefined;
}

export interface CallbackAnswer {
  text?: string | undefined;
  showAlert?: boolean | undefined;
}

/**
 * Real services on the given database. Unless a TMDB handler is given the
 * client answers 404 to everything, so tests stub the lookups they rely on.
 */
export function createBotDeps(
  db: DatabaseConnection,
  config: Partial<BotConfig> = {},
  tmdb: StubHandler = routes({})
) {
  const botConfig: BotConfig = { ...defaultConfig.bot, adminIds: [ADMIN_USER.id], broadcastDelayMs: 0, ...config };
  const broadcasts: Array<[number, string]> = [];

  const client = new TMDBClient({
    apiKey: 'test-key',
    retry: { maxAttempts: 1, delayMs: 0 },
    adapter: createTmdbStub(tmdb).adapter,
  });

  const deps: BotDeps = {
    lookup: new MovieLookupService(client, {
      urls: DEFAULT_URL_OPTIONS,
      listLimit: 5,
      parallelDetailFetches: false,
    }),
    users: new UserService(db, botConfig.adminIds),
    favorites: new FavoriteService(db),
    searches: new SearchLogService(db),
    broadcaster: new BroadcastService(
      {
        sendMessage: async (chatId, text) => {
          broadcasts.push([chatId, text]);
        },
      },
      0
    ),
    config: botConfig,
  };

  return { deps, broadcasts };
}

function chatRecorder() {
  const sent: SentMessage[] = [];
  return {
    sent,
    reply: async (text: string, options?: ReplyOptions) => {
      sent.push({ kind: 'text', text, options });
    },
    replyWithPhoto: async (photoUrl: string, caption: string, options?: ReplyOptions) => {
      sent.push({ kind: 'photo', text: caption, photoUrl, options });
    },
  };
}

export function createCommandContext(command: string, args = '', user: BotUser = TEST_USER) {
  const { sent, reply, replyWithPhoto } = chatRecorder();
  const ctx: CommandContext = { user, command, args, botUsername: BOT_USERNAME, reply, replyWithPhoto };
  return { ctx, sent };
}

export function createCallbackContext(data: string, user: BotUser = TEST_USER) {
  const { sent, reply, replyWithPhoto } = chatRecorder();
  const answers: CallbackAnswer[] = [];
  const edits: ActionRow[][] = [];

  const ctx: CallbackContext = {
    user,
    data,
    reply,
    replyWithPhoto,
    answer: async (text, showAlert) => {
      answers.push({ text, showAlert });
    },
    editActions: async actions => {
      edits.push(actions);
    },
  };

  return { ctx, sent, answers, edits };
}

export function createInlineContext(query: string, user: BotUser = TEST_USER) {
  const answers: InlineArticle[][] = [];
  const ctx: InlineContext = {
    user,
    query,
    answer: async results => {
      answers.push(results);
    },
  };
  return { ctx, answers };
}
