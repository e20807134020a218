/**
 * Bot Event Router
 *
 * Routes commands, button callbacks and inline queries to their handlers.
 * Each route is an error boundary: failures are logged with the operation
 * and user, and the user gets a generic reply.
 */

import { logger } from '../../middleware/logging.js';
import { MESSAGES } from '../formatting/messages.js';
import { callbackDataSchema } from '../../validation/commandSchemas.js';
import { createErrorLogContext } from '../../utils/errorHandling.js';
import { AuthorizationError } from '../../errors/index.js';
import { CALLBACK_FAILURE_TEXT, CALLBACK_HANDLERS, logCallback } from './callbacks.js';
import { handleInlineQuery } from './inlineSearch.js';
import { BotDeps, CallbackContext, Command, CommandContext, InlineContext } from './types.js';

export class EventRouter {
  constructor(
    private readonly commands: Map<string, Command>,
    private readonly deps: BotDeps
  ) {}

  async handleCommand(ctx: CommandContext): Promise<void> {
    const command = this.commands.get(ctx.command);
    if (!command) {
      logger.warn('Unknown command received', { command: ctx.command, userId: ctx.user.id });
      return;
    }

    try {
      await this.deps.users.upsert(ctx.user);
      await this.requireAdmin(command, ctx.user.id);
      await command.execute(ctx, this.deps);
    } catch (error) {
      if (error instanceof AuthorizationError) {
        logger.warn('Admin command denied', { code: error.code, command: error.command, userId: error.userId });
        await this.sendErrorReply(() => ctx.reply(MESSAGES.adminOnly));
        return;
      }
      logger.error(
        'Error handling command',
        createErrorLogContext(error, { operation: command.name, userId: ctx.user.id })
      );
      await this.sendErrorReply(() => ctx.reply(MESSAGES.genericError));
    }
  }

  async handleCallback(ctx: CallbackContext): Promise<void> {
    const parsed = callbackDataSchema.safeParse(ctx.data);
    if (!parsed.success) {
      logger.warn('Unknown callback payload', { data: ctx.data, userId: ctx.user.id });
      await this.sendErrorReply(() => ctx.answer());
      return;
    }

    const { action, movieId } = parsed.data;
    logCallback(action, movieId, ctx.user.id);

    try {
      await this.deps.users.upsert(ctx.user);
      await CALLBACK_HANDLERS[action](ctx, movieId, this.deps);
    } catch (error) {
      logger.error(
        'Error handling callback',
        createErrorLogContext(error, { operation: action, movieId, userId: ctx.user.id })
      );
      await this.sendErrorReply(() => ctx.answer(CALLBACK_FAILURE_TEXT[action], true));
    }
  }

  async handleInline(ctx: InlineContext): Promise<void> {
    try {
      await handleInlineQuery(ctx, this.deps);
    } catch (error) {
      logger.error(
        'Error handling inline query',
        createErrorLogContext(error, { operation: 'inline', userId: ctx.user.id })
      );
    }
  }

  private async requireAdmin(command: Command, userId: number): Promise<void> {
    if (command.adminOnly && !(await this.deps.users.isAdmin(userId))) {
      throw new AuthorizationError(command.name, userId);
    }
  }

  private async sendErrorReply(send: () => Promise<void>): Promise<void> {
    try {
      await send();
    } catch (replyError) {
      logger.error('Error sending error reply', createErrorLogContext(replyError));
    }
  }
}
