import { logger } from '../../../middleware/logging.js';
import { MESSAGES } from '../../formatting/messages.js';
import { SearchLogService } from '../../searchLogService.js';
import { movieIdArgsSchema, searchArgsSchema } from '../../../validation/commandSchemas.js';
import { sendMovie } from '../replies.js';
import { Command } from '../types.js';

export const searchCommand: Command = {
  name: 'search',
  description: 'Search a movie by name, optionally followed by its year',
  execute: async (ctx, deps) => {
    const parsed = searchArgsSchema.safeParse(ctx.args);
    if (!parsed.success) {
      await ctx.reply(MESSAGES.searchUsage);
      return;
    }

    const { title, year } = parsed.data;
    logger.info('Received search query', { userId: ctx.user.id, title, year });

    const record = await deps.lookup.search(title, year);
    await deps.searches.log(ctx.user.id, ctx.args.trim(), record?.id ?? null);
    await sendMovie(ctx, record, deps);
  },
};

export const idCommand: Command = {
  name: 'id',
  description: 'Look up a movie by TMDB id',
  execute: async (ctx, deps) => {
    const parsed = movieIdArgsSchema.safeParse(ctx.args);
    if (!parsed.success) {
      await ctx.reply(MESSAGES.idUsage);
      return;
    }

    const movieId = parsed.data;
    logger.info('Received ID search', { userId: ctx.user.id, movieId });

    const record = await deps.lookup.fetchById(movieId);
    await deps.searches.log(ctx.user.id, SearchLogService.idQuery(movieId), record?.id ?? null);
    await sendMovie(ctx, record, deps);
  },
};
