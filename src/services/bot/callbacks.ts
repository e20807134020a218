import { logger } from '../../middleware/logging.js';
import { detailActions } from '../formatting/movieFormatter.js';
import { MESSAGES } from '../formatting/messages.js';
import { CallbackAction } from '../../validation/commandSchemas.js';
import { sendMovie } from './replies.js';
import { BotDeps, CallbackContext } from './types.js';

type CallbackHandler = (ctx: CallbackContext, movieId: number, deps: BotDeps) => Promise<void>;

/**
 * `fav_<id>`: resolve the movie for its title, then save it
 */
export const saveFavorite: CallbackHandler = async (ctx, movieId, deps) => {
  const record = await deps.lookup.fetchById(movieId);
  if (!record) {
    await ctx.answer(MESSAGES.favoriteNotFound, true);
    return;
  }

  const result = await deps.favorites.add(ctx.user.id, movieId, record.title);
  await ctx.answer(
    result === 'added'
      ? `❤️ ${record.title} added to favorites!`
      : `❤️ ${record.title} is already in favorites!`,
    true
  );
};

/**
 * `remove_<id>`: delete the favorite and swap the message's primary button
 * back to "save"
 */
export const removeFavorite: CallbackHandler = async (ctx, movieId, deps) => {
  const favorite = await deps.favorites.get(ctx.user.id, movieId);
  const removed = await deps.favorites.remove(ctx.user.id, movieId);

  if (!removed) {
    await ctx.answer("This movie wasn't in your favorites!", true);
    return;
  }

  await ctx.editActions(detailActions(movieId, { promoLinks: deps.config.promoLinks }));
  await ctx.answer(`❌ ${favorite?.title ?? 'Movie'} removed from favorites!`, true);
};

/**
 * `view_<id>`: send the detail view with the "remove" button
 */
export const viewFavorite: CallbackHandler = async (ctx, movieId, deps) => {
  const record = await deps.lookup.fetchById(movieId);
  if (!record) {
    await ctx.answer(MESSAGES.favoriteNotFound, true);
    return;
  }

  await ctx.answer();
  await sendMovie(ctx, record, deps, true);
};

export const CALLBACK_HANDLERS: Record<CallbackAction, CallbackHandler> = {
  fav: saveFavorite,
  remove: removeFavorite,
  view: viewFavorite,
};

export const CALLBACK_FAILURE_TEXT: Record<CallbackAction, string> = {
  fav: MESSAGES.favoriteSaveFailed,
  remove: MESSAGES.favoriteRemoveFailed,
  view: MESSAGES.viewFailed,
};

export function logCallback(action: CallbackAction, movieId: number, userId: number): void {
  logger.debug('Handling callback', { action, movieId, userId });
}
