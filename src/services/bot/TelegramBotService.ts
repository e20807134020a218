/**
 * Telegram Bot Service
 *
 * Owns the Telegraf instance: registers handlers, adapts Telegraf contexts
 * for the event router, and runs either long polling or a webhook.
 */

import { Context, Telegraf } from 'telegraf';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { TelegramConfig, BotConfig } from '../../config/types.js';
import { logger } from '../../middleware/logging.js';
import { createErrorLogContext } from '../../utils/errorHandling.js';
import { BroadcastService } from '../broadcastService.js';
import { createCommandRegistry, publicCommandList } from './commandRegistry.js';
import { EventRouter } from './eventRouter.js';
import { BotDeps, ChatContext, Command } from './types.js';
import {
  parseCommandArgs,
  toBotUser,
  toInlineQueryResult,
  toKeyboard,
  toReplyExtra,
} from './telegramAdapters.js';
import { BotUser } from '../../types/bot.js';

export type BotStatus = 'stopped' | 'starting' | 'running' | 'stopping';

export type BotServices = Omit<BotDeps, 'broadcaster' | 'config'>;

export class TelegramBotService {
  private readonly bot: Telegraf;
  private readonly commands: Map<string, Command>;
  private readonly router: EventRouter;
  private botStatus: BotStatus = 'stopped';
  private polling = false;
  private botUsername: string | undefined;

  constructor(
    private readonly telegramConfig: TelegramConfig,
    botConfig: BotConfig,
    services: BotServices
  ) {
    this.bot = new Telegraf(telegramConfig.token);
    this.commands = createCommandRegistry();

    const broadcaster = new BroadcastService(
      {
        sendMessage: (chatId, text) => this.bot.telegram.sendMessage(chatId, text, toReplyExtra()),
      },
      botConfig.broadcastDelayMs
    );

    this.router = new EventRouter(this.commands, { ...services, broadcaster, config: botConfig });
    this.registerHandlers();
  }

  private registerHandlers(): void {
    for (const name of this.commands.keys()) {
      this.bot.command(name, async ctx => {
        if (!ctx.from) {
          return;
        }
        await this.router.handleCommand({
          ...this.chatContext(ctx, toBotUser(ctx.from)),
          command: name,
          args: parseCommandArgs(ctx.message.text),
          botUsername: this.botUsername,
        });
      });
    }

    this.bot.on('callback_query', async ctx => {
      const query = ctx.callbackQuery;
      await this.router.handleCallback({
        ...this.chatContext(ctx, toBotUser(query.from)),
        data: 'data' in query ? query.data : '',
        answer: async (text, showAlert) => {
          await ctx.answerCbQuery(text, showAlert ? { show_alert: true } : undefined);
        },
        editActions: async actions => {
          await ctx.editMessageReplyMarkup(toKeyboard(actions));
        },
      });
    });

    this.bot.on('inline_query', async ctx => {
      await this.router.handleInline({
        user: toBotUser(ctx.inlineQuery.from),
        query: ctx.inlineQuery.query,
        answer: async results => {
          await ctx.answerInlineQuery(results.map(toInlineQueryResult));
        },
      });
    });

    this.bot.catch((error, ctx) => {
      logger.error(
        'Unhandled bot error',
        createErrorLogContext(error, { updateType: ctx.updateType, userId: ctx.from?.id })
      );
    });
  }

  private chatContext(ctx: Context, user: BotUser): ChatContext {
    return {
      user,
      reply: async (text, options) => {
        await ctx.reply(text, toReplyExtra(options));
      },
      replyWithPhoto: async (photoUrl, caption, options) => {
        await ctx.replyWithPhoto(photoUrl, { caption, ...toReplyExtra(options) });
      },
    };
  }

  /**
   * Resolve the bot's identity and publish the command menu
   */
  private async initialize(): Promise<void> {
    const me = await this.bot.telegram.getMe();
    this.bot.botInfo = me;
    this.botUsername = me.username;
    await this.bot.telegram.setMyCommands(publicCommandList(this.commands));
    logger.info('Telegram bot identified', { username: me.username });
  }

  /**
   * Start long polling. Resolves once polling has been started.
   */
  async startPolling(): Promise<void> {
    this.botStatus = 'starting';
    await this.initialize();

    this.polling = true;
    this.botStatus = 'running';
    void this.bot.launch().catch((error: unknown) => {
      this.polling = false;
      this.botStatus = 'stopped';
      logger.error('Polling stopped with an error', createErrorLogContext(error));
    });

    logger.info('Telegram bot started (polling)');
  }

  /**
   * Register the webhook with Telegram and return the Express handler that
   * feeds incoming updates to the bot
   */
  async createWebhookHandler(): Promise<RequestHandler> {
    const { url, path, secret } = this.telegramConfig.webhook;
    if (!url) {
      throw new Error('Webhook URL is not configured');
    }

    this.botStatus = 'starting';
    await this.initialize();

    const handleUpdate = await this.bot.createWebhook({
      domain: url,
      path,
      ...(secret ? { secret_token: secret } : {}),
    });

    this.botStatus = 'running';
    logger.info('Telegram bot started (webhook)', { url, path });

    return (req: Request, res: Response, next: NextFunction) => {
      handleUpdate(req, res, () => next()).catch(next);
    };
  }

  stop(reason = 'shutdown'): void {
    if (this.botStatus === 'stopped' || this.botStatus === 'stopping') {
      return;
    }

    this.botStatus = 'stopping';
    if (this.polling) {
      this.bot.stop(reason);
      this.polling = false;
    }
    this.botStatus = 'stopped';
    logger.info('Telegram bot stopped', { reason });
  }

  getStatus(): BotStatus {
    return this.botStatus;
  }
}
