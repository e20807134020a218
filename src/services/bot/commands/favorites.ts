import { renderFavoritesList } from '../../formatting/movieFormatter.js';
import { MESSAGES } from '../../formatting/messages.js';
import { Command } from '../types.js';

export const favoritesCommand: Command = {
  name: 'favorites',
  description: 'Your saved movies',
  execute: async (ctx, deps) => {
    const [favorites, total] = await Promise.all([
      deps.favorites.list(ctx.user.id, deps.config.favoritesPageSize),
      deps.favorites.count(ctx.user.id),
    ]);

    const { text, actions } = renderFavoritesList(favorites, total, MESSAGES.noFavorites);
    await ctx.reply(text, { actions, markdown: false });
  },
};
