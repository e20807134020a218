/**
 * From /search to saved favorite, with TMDB answered in process
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { TestDatabase, createTestDatabase } from '../utils/testDatabase.js';
import { EventRouter } from '../../src/services/bot/eventRouter.js';
import { createCommandRegistry } from '../../src/services/bot/commandRegistry.js';
import { BotDeps } from '../../src/services/bot/types.js';
import { routes } from '../utils/tmdbStub.js';
import { movieDetailsPayload, searchPayload } from '../utils/fixtures.js';
import {
  TEST_USER,
  createBotDeps,
  createCallbackContext,
  createCommandContext,
} from '../services/bot/helpers.js';

describe('search flow', () => {
  let testDb: TestDatabase;
  let deps: BotDeps;
  let router: EventRouter;

  beforeEach(async () => {
    testDb = await createTestDatabase();
    ({ deps } = createBotDeps(
      await testDb.create(),
      { promoLinks: [{ label: 'Our channel', url: 'https://t.me/example_channel' }] },
      routes({
        '/search/movie': { status: 200, data: searchPayload([{ id: 19995, title: 'Avatar' }]) },
        '/movie/19995': { status: 200, data: movieDetailsPayload() },
      })
    ));
    router = new EventRouter(createCommandRegistry(), deps);
  });

  afterEach(async () => {
    await testDb.destroy();
  });

  it('finds Avatar 2009, shows it and saves it as a favorite', async () => {
    const search = createCommandContext('search', ' Avatar 2009');
    await router.handleCommand(search.ctx);

    expect(search.sent).toHaveLength(1);
    const [message] = search.sent;
    expect(message.kind).toBe('photo');
    expect(message.photoUrl).toBe('https://image.tmdb.org/t/p/original/avatar-poster.jpg');
    expect(message.text.split('\n')[0]).toBe('🎬 *Avatar* (2009)');
    expect(message.text).toContain('🔗 [More info on TMDB](https://www.themoviedb.org/movie/19995)');
    expect(message.options?.actions).toEqual([
      [{ kind: 'callback', label: '❤️ Save to favorites', data: 'fav_19995' }],
      [{ kind: 'url', label: 'Our channel', url: 'https://t.me/example_channel' }],
    ]);

    const save = createCallbackContext('fav_19995');
    await router.handleCallback(save.ctx);

    expect(save.answers).toEqual([{ text: '❤️ Avatar added to favorites!', showAlert: true }]);

    const favorites = createCommandContext('favorites');
    await router.handleCommand(favorites.ctx);

    expect(favorites.sent[0].options?.actions).toEqual([
      [{ kind: 'callback', label: '🎬 Avatar', data: 'view_19995' }],
    ]);
    expect(await deps.searches.topMovies(10)).toEqual([{ movieId: 19995, count: 1 }]);
    expect(await deps.users.listUserIds()).toEqual([TEST_USER.id]);
  });
});
