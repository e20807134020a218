import { MovieRecord } from '../../types/movie.js';
import { logger } from '../../middleware/logging.js';
import { renderDetail } from '../formatting/movieFormatter.js';
import { MESSAGES } from '../formatting/messages.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import { BotDeps, ChatContext } from './types.js';

/** Telegram rejects photo captions longer than this */
export const CAPTION_LIMIT = 1024;

/**
 * Reply with a movie's detail view: as a poster with caption when the
 * record has one, falling back to plain text if the photo send fails.
 * A null record gets the not-found message.
 */
export async function sendMovie(
  ctx: ChatContext,
  record: MovieRecord | null,
  deps: Pick<BotDeps, 'config'>,
  fromFavorites = false
): Promise<void> {
  if (!record) {
    await ctx.reply(MESSAGES.notFound);
    return;
  }

  const { text, actions } = renderDetail(record, {
    fromFavorites,
    promoLinks: deps.config.promoLinks,
  });

  if (record.posterUrl && text.length <= CAPTION_LIMIT) {
    try {
      await ctx.replyWithPhoto(record.posterUrl, text, { actions });
      return;
    } catch (error) {
      logger.warn('Failed to send photo, falling back to text', {
        movieId: record.id,
        error: getErrorMessage(error),
      });
    }
  }

  await ctx.reply(text, { actions });
}
