/**
 * Button callbacks and inline queries through the EventRouter
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { TestDatabase, createTestDatabase } from '../../utils/testDatabase.js';
import { DatabaseConnection } from '../../../src/types/database.js';
import { EventRouter } from '../../../src/services/bot/eventRouter.js';
import { createCommandRegistry } from '../../../src/services/bot/commandRegistry.js';
import { BotDeps } from '../../../src/services/bot/types.js';
import { MESSAGES } from '../../../src/services/formatting/messages.js';
import {
  detailActions,
  renderDetail,
  renderInlineResult,
} from '../../../src/services/formatting/movieFormatter.js';
import { SearchCandidate } from '../../../src/types/movie.js';
import { movieRecord } from '../../utils/fixtures.js';
import {
  TEST_USER,
  createBotDeps,
  createCallbackContext,
  createInlineContext,
} from './helpers.js';

describe('bot callbacks', () => {
  let testDb: TestDatabase;
  let db: DatabaseConnection;
  let deps: BotDeps;
  let router: EventRouter;

  beforeEach(async () => {
    testDb = await createTestDatabase();
    db = await testDb.create();
    ({ deps } = createBotDeps(db));
    router = new EventRouter(createCommandRegistry(), deps);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await testDb.destroy();
  });

  it('acknowledges unknown payloads without side effects', async () => {
    const { ctx, answers } = createCallbackContext('like_1');

    await router.handleCallback(ctx);

    expect(answers).toEqual([{ text: undefined, showAlert: undefined }]);
    expect(await deps.users.countUsers()).toBe(0);
  });

  describe('save to favorites', () => {
    it('saves the movie under its title', async () => {
      jest.spyOn(deps.lookup, 'fetchById').mockResolvedValue(movieRecord());
      const { ctx, answers } = createCallbackContext('fav_27205');

      await router.handleCallback(ctx);

      expect(answers).toEqual([{ text: '❤️ Dream Heist added to favorites!', showAlert: true }]);
      expect(await deps.favorites.get(TEST_USER.id, 27205)).toMatchObject({ title: 'Dream Heist' });
      expect(await deps.users.countUsers()).toBe(1);
    });

    it('reports a movie that is already saved', async () => {
      jest.spyOn(deps.lookup, 'fetchById').mockResolvedValue(movieRecord());
      await deps.favorites.add(TEST_USER.id, 27205, 'Dream Heist');
      const { ctx, answers } = createCallbackContext('fav_27205');

      await router.handleCallback(ctx);

      expect(answers).toEqual([{ text: '❤️ Dream Heist is already in favorites!', showAlert: true }]);
      expect(await deps.favorites.count(TEST_USER.id)).toBe(1);
    });

    it('does not save a movie that cannot be resolved', async () => {
      const { ctx, answers } = createCallbackContext('fav_999999999');

      await router.handleCallback(ctx);

      expect(answers).toEqual([{ text: MESSAGES.favoriteNotFound, showAlert: true }]);
      expect(await deps.favorites.count(TEST_USER.id)).toBe(0);
    });

    it('answers with an error alert when saving fails', async () => {
      jest.spyOn(deps.lookup, 'fetchById').mockResolvedValue(movieRecord());
      jest.spyOn(deps.favorites, 'add').mockRejectedValue(new Error('disk I/O error'));
      const { ctx, answers } = createCallbackContext('fav_27205');

      await router.handleCallback(ctx);

      expect(answers).toEqual([{ text: MESSAGES.favoriteSaveFailed, showAlert: true }]);
    });
  });

  describe('remove from favorites', () => {
    it('removes the favorite and swaps the button back to save', async () => {
      const fetchById = jest.spyOn(deps.lookup, 'fetchById');
      await deps.favorites.add(TEST_USER.id, 27205, 'Dream Heist');
      const { ctx, answers, edits } = createCallbackContext('remove_27205');

      await router.handleCallback(ctx);

      expect(edits).toEqual([detailActions(27205)]);
      expect(answers).toEqual([{ text: '❌ Dream Heist removed from favorites!', showAlert: true }]);
      expect(await deps.favorites.has(TEST_USER.id, 27205)).toBe(false);
      expect(fetchById).not.toHaveBeenCalled();
    });

    it('reports a movie that was not saved', async () => {
      const { ctx, answers, edits } = createCallbackContext('remove_27205');

      await router.handleCallback(ctx);

      expect(edits).toEqual([]);
      expect(answers).toEqual([{ text: "This movie wasn't in your favorites!", showAlert: true }]);
    });
  });

  describe('view favorite', () => {
    it('sends the detail view with the remove button', async () => {
      const record = movieRecord();
      jest.spyOn(deps.lookup, 'fetchById').mockResolvedValue(record);
      const { ctx, answers, sent } = createCallbackContext('view_27205');

      await router.handleCallback(ctx);

      expect(answers).toEqual([{ text: undefined, showAlert: undefined }]);
      expect(sent).toEqual([
        {
          kind: 'photo',
          text: renderDetail(record, { fromFavorites: true }).text,
          photoUrl: record.posterUrl,
          options: { actions: detailActions(27205, { fromFavorites: true }) },
        },
      ]);
    });

    it('alerts when the movie cannot be loaded', async () => {
      const { ctx, answers, sent } = createCallbackContext('view_27205');

      await router.handleCallback(ctx);

      expect(answers).toEqual([{ text: MESSAGES.favoriteNotFound, showAlert: true }]);
      expect(sent).toEqual([]);
    });
  });
});

describe('inline queries', () => {
  let testDb: TestDatabase;
  let deps: BotDeps;
  let router: EventRouter;

  const candidate: SearchCandidate = {
    id: 19995,
    title: 'Avatar',
    year: '2009',
    overview: 'Blue moon.',
    externalLink: 'https://www.themoviedb.org/movie/19995',
  };

  beforeEach(async () => {
    testDb = await createTestDatabase();
    ({ deps } = createBotDeps(await testDb.create()));
    router = new EventRouter(createCommandRegistry(), deps);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await testDb.destroy();
  });

  it('leaves empty queries unanswered', async () => {
    const searchCandidates = jest.spyOn(deps.lookup, 'searchCandidates');
    const { ctx, answers } = createInlineContext('   ');

    await router.handleInline(ctx);

    expect(answers).toEqual([]);
    expect(searchCandidates).not.toHaveBeenCalled();
  });

  it('answers with one article per candidate', async () => {
    const searchCandidates = jest.spyOn(deps.lookup, 'searchCandidates').mockResolvedValue([candidate]);
    const { ctx, answers } = createInlineContext(' Avatar ');

    await router.handleInline(ctx);

    expect(searchCandidates).toHaveBeenCalledWith('Avatar', 5);
    expect(answers).toEqual([[renderInlineResult(candidate)]]);
  });

  it('answers with no results when the search fails', async () => {
    const { ctx, answers } = createInlineContext('Avatar');

    await router.handleInline(ctx);

    expect(answers).toEqual([[]]);
  });

  it('swallows errors from answering', async () => {
    jest.spyOn(deps.lookup, 'searchCandidates').mockResolvedValue([candidate]);
    const { ctx } = createInlineContext('Avatar');
    ctx.answer = async () => {
      throw new Error('query is too old');
    };

    await expect(router.handleInline(ctx)).resolves.toBeUndefined();
  });
});
