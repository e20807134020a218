import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { TestDatabase, createTestDatabase } from '../utils/testDatabase.js';
import { FavoriteService } from '../../src/services/favoriteService.js';
import { DatabaseConnection } from '../../src/types/database.js';
import { DuplicateKeyError } from '../../src/errors/index.js';

describe('FavoriteService', () => {
  let testDb: TestDatabase;
  let db: DatabaseConnection;
  let service: FavoriteService;

  beforeEach(async () => {
    testDb = await createTestDatabase();
    db = await testDb.create();
    service = new FavoriteService(db);
  });

  afterEach(async () => {
    await testDb.destroy();
  });

  it('adds a favorite once', async () => {
    expect(await service.add(1, 19995, 'Avatar')).toBe('added');
    expect(await service.add(1, 19995, 'Avatar')).toBe('exists');
    expect(await service.count(1)).toBe(1);
  });

  it('reports a lost insert race as already existing', async () => {
    await service.add(1, 19995, 'Avatar');
    jest.spyOn(service, 'has').mockResolvedValue(false);

    expect(await service.add(1, 19995, 'Avatar')).toBe('exists');
  });

  it('surfaces duplicate rows as DuplicateKeyError', async () => {
    const insert = 'INSERT INTO favorites (user_id, movie_id, movie_title) VALUES (?, ?, ?)';
    await db.execute(insert, [1, 2, 'Two']);

    await expect(db.execute(insert, [1, 2, 'Two'])).rejects.toBeInstanceOf(DuplicateKeyError);
  });

  it('gets a stored favorite', async () => {
    await service.add(1, 27205, 'Dream Heist');

    expect(await service.get(1, 27205)).toEqual({
      movieId: 27205,
      title: 'Dream Heist',
      addedAt: expect.any(String),
    });
    expect(await service.get(2, 27205)).toBeUndefined();
  });

  it('removes a favorite and reports whether it existed', async () => {
    await service.add(1, 19995, 'Avatar');

    expect(await service.remove(1, 19995)).toBe(true);
    expect(await service.remove(1, 19995)).toBe(false);
    expect(await service.has(1, 19995)).toBe(false);
  });

  it('lists newest first, with an optional limit', async () => {
    await service.add(1, 10, 'First');
    await service.add(1, 20, 'Second');
    await service.add(1, 30, 'Third');

    expect((await service.list(1)).map(favorite => favorite.movieId)).toEqual([30, 20, 10]);
    expect((await service.list(1, 2)).map(favorite => favorite.title)).toEqual(['Third', 'Second']);
  });

  it('keeps favorites separate per user', async () => {
    await service.add(1, 10, 'First');
    await service.add(2, 20, 'Second');

    expect((await service.list(2)).map(favorite => favorite.movieId)).toEqual([20]);
    expect(await service.count(3)).toBe(0);
  });
});
