import { MovieList } from '../../../types/movie.js';
import { renderList } from '../../formatting/movieFormatter.js';
import { HEADINGS, MESSAGES } from '../../formatting/messages.js';
import { Command, CommandContext } from '../types.js';

async function replyWithList(
  ctx: CommandContext,
  movies: MovieList | null,
  heading: string,
  unavailable: string
): Promise<void> {
  if (!movies || movies.every(movie => movie === null)) {
    await ctx.reply(unavailable);
    return;
  }
  await ctx.reply(renderList(movies, heading));
}

export const trendingCommand: Command = {
  name: 'trending',
  description: 'Movies trending this week',
  execute: async (ctx, deps) => {
    await replyWithList(ctx, await deps.lookup.trending(), HEADINGS.trending, MESSAGES.trendingUnavailable);
  },
};

export const popularCommand: Command = {
  name: 'popular',
  description: 'Most popular movies',
  execute: async (ctx, deps) => {
    await replyWithList(ctx, await deps.lookup.popular(), HEADINGS.popular, MESSAGES.popularUnavailable);
  },
};
