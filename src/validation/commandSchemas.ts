import { z } from 'zod';

/**
 * Command Argument Schemas
 *
 * Zod schemas for the text after a bot command and for inline button payloads
 */

/**
 * `/search <title> [year]`: the last token is the year when it is all digits
 * and something precedes it
 */
export const searchArgsSchema = z
  .string()
  .trim()
  .min(1, 'Movie name is required')
  .transform((text): { title: string; year?: number } => {
    const tokens = text.split(/\s+/);
    const last = tokens[tokens.length - 1];

    if (tokens.length > 1 && /^\d+$/.test(last)) {
      return { title: tokens.slice(0, -1).join(' '), year: Number(last) };
    }
    return { title: tokens.join(' ') };
  });

export type SearchArgs = z.infer<typeof searchArgsSchema>;

/**
 * `/id <tmdbId>`
 */
export const movieIdArgsSchema = z
  .string()
  .trim()
  .regex(/^\d+$/, 'TMDB id must be numeric')
  .transform(Number)
  .pipe(z.number().int().positive().safe());

/**
 * `/broadcast <message>`
 */
export const broadcastArgsSchema = z
  .string()
  .trim()
  .min(1, 'Broadcast message is required')
  .max(4000, 'Broadcast message must be 4000 characters or less');

export const callbackActionSchema = z.enum(['fav', 'remove', 'view']);

export type CallbackAction = z.infer<typeof callbackActionSchema>;

/**
 * Inline button payloads: `fav_<id>`, `remove_<id>`, `view_<id>`
 */
export const callbackDataSchema = z
  .string()
  .regex(/^(fav|remove|view)_\d+$/, 'Unknown callback payload')
  .transform(data => {
    const separator = data.indexOf('_');
    return {
      action: callbackActionSchema.parse(data.slice(0, separator)),
      movieId: Number(data.slice(separator + 1)),
    };
  });

export type CallbackPayload = z.infer<typeof callbackDataSchema>;
