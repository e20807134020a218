import { TopMovieStat } from '../../../types/bot.js';
import {
  renderBroadcast,
  renderBroadcastStart,
  renderBroadcastSummary,
  renderStats,
} from '../../formatting/movieFormatter.js';
import { MESSAGES } from '../../formatting/messages.js';
import { broadcastArgsSchema } from '../../../validation/commandSchemas.js';
import { Command } from '../types.js';

export const statsCommand: Command = {
  name: 'stats',
  description: 'Usage statistics',
  adminOnly: true,
  execute: async (ctx, deps) => {
    const userCount = await deps.users.countUsers();
    const totalSearches = await deps.searches.totalSearches();
    const top = await deps.searches.topMovies(deps.config.statsTopLimit);

    const topMovies: TopMovieStat[] = [];
    for (const entry of top) {
      const record = await deps.lookup.fetchById(entry.movieId);
      topMovies.push({ title: record ? record.title : `ID ${entry.movieId}`, count: entry.count });
    }

    await ctx.reply(renderStats({ userCount, totalSearches, topMovies }));
  },
};

export const broadcastCommand: Command = {
  name: 'broadcast',
  description: 'Send a message to every user',
  adminOnly: true,
  execute: async (ctx, deps) => {
    const parsed = broadcastArgsSchema.safeParse(ctx.args);
    if (!parsed.success) {
      await ctx.reply(MESSAGES.broadcastUsage);
      return;
    }

    const recipients = await deps.users.listUserIds();
    await ctx.reply(renderBroadcastStart(recipients.length));

    const summary = await deps.broadcaster.broadcast(recipients, renderBroadcast(parsed.data));
    await ctx.reply(renderBroadcastSummary(summary));
  },
};
