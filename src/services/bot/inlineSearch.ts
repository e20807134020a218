import { renderInlineResult } from '../formatting/movieFormatter.js';
import { BotDeps, InlineContext } from './types.js';

/**
 * Inline mode: one search call, up to inlineResultLimit article results.
 * Empty queries are left unanswered.
 */
export async function handleInlineQuery(ctx: InlineContext, deps: BotDeps): Promise<void> {
  const query = ctx.query.trim();
  if (!query) {
    return;
  }

  const candidates = await deps.lookup.searchCandidates(query, deps.config.inlineResultLimit);
  await ctx.answer(candidates.map(renderInlineResult));
}
