import { afterAll, beforeEach, describe, expect, it, vi } from 'vitest';
import { PersistenceError, ValidationError } from '../src/errors';
import { haikuToRow } from '../src/models/haiku';
import { RedisHaikuRepository } from '../src/storage/redisHaikuRepository';
import { createMockRedis, seedHaiku } from './helpers/mockRedis';

const redis = createMockRedis();
let repo: RedisHaikuRepository;

beforeEach(async () => {
  vi.restoreAllMocks();
  await redis.flushall();
  repo = new RedisHaikuRepository(redis);
});

afterAll(async () => {
  await redis.quit();
});

async function seedTimeline() {
  await seedHaiku(redis, { id: '1', subject: 'Dawn chorus', text: 'birds wake the hedge', created_at: '2024-01-01T06:00:00.000Z' });
  await seedHaiku(redis, { id: '2', subject: 'midnight', text: 'owl over the barn', created_at: '2024-01-02T00:00:00.000Z' });
  await seedHaiku(redis, { id: '3', subject: 'DAWN light', text: 'frost on the window', created_at: '2024-01-03T06:00:00.000Z' });
  await seedHaiku(redis, { id: '4', subject: 'rain', text: 'gutters sing all night', created_at: '2024-01-04T18:00:00.000Z' });
}

describe('RedisHaikuRepository - writes', () => {
  it('save assigns id and created_at from the store', async () => {
    const before = Date.now();
    const saved = await repo.save({ subject: 'ocean waves', text: 'salt on the wind' });

    expect(saved.id).toBe('1');
    expect(saved.subject).toBe('ocean waves');
    expect(saved.text).toBe('salt on the wind');
    expect(saved.userId).toBeUndefined();
    expect(saved.createdAt).toBeInstanceOf(Date);
    expect(saved.createdAt.getTime()).toBeGreaterThanOrEqual(before - 1000);

    const second = await repo.save({ subject: 'tide', text: 'moon pulls the water', userId: 'user-1' });
    expect(second.id).toBe('2');
    expect(second.userId).toBe('user-1');
  });

  it('persists the hash and the recency index entry', async () => {
    const saved = await repo.save({ subject: 'ocean waves', text: 'salt on the wind' });

    const hash = await redis.hgetall(`haiku:item:${saved.id}`);
    expect(hash).toMatchObject({ id: saved.id, subject: 'ocean waves', text: 'salt on the wind', user_id: '' });
    expect(hash).toEqual(haikuToRow(saved));
    expect(await redis.zcard('haiku:by_created')).toBe(1);
  });

  it('honours a custom key prefix', async () => {
    const scoped = new RedisHaikuRepository(redis, 'poems');
    const saved = await scoped.save({ subject: 'pines', text: 'needles in the snow' });

    expect(await redis.exists(`poems:item:${saved.id}`)).toBe(1);
    expect(await redis.exists(`haiku:item:${saved.id}`)).toBe(0);
    expect(await scoped.count()).toBe(1);
    expect(await repo.count()).toBe(0);
  });
});

describe('RedisHaikuRepository - reads', () => {
  it('getById round-trips a saved record', async () => {
    const saved = await repo.save({ subject: 'ocean waves', text: 'line one\nline two\nline three', userId: 'owner' });
    const found = await repo.getById(saved.id);
    expect(found).toEqual(saved);
  });

  it('getById returns null for an unknown id', async () => {
    expect(await repo.getById('404')).toBeNull();
  });

  it('listRecent returns newest first, capped at limit', async () => {
    await seedTimeline();

    const recent = await repo.listRecent(3);
    expect(recent.map((h) => h.id)).toEqual(['4', '3', '2']);
  });

  it('listRecent pages with offset', async () => {
    await seedTimeline();

    const page = await repo.listRecent(2, 2);
    expect(page.map((h) => h.id)).toEqual(['2', '1']);
    expect(await repo.listRecent(2, 4)).toEqual([]);
  });

  it('listRecent returns an empty list for an empty store', async () => {
    expect(await repo.listRecent(5)).toEqual([]);
  });

  it('listRecent rejects a non-positive limit', async () => {
    await expect(repo.listRecent(0)).rejects.toBeInstanceOf(ValidationError);
    await expect(repo.listRecent(2.5)).rejects.toBeInstanceOf(ValidationError);
    await expect(repo.listRecent(1, -1)).rejects.toBeInstanceOf(ValidationError);
  });

  it('listRecent skips index entries whose hash is gone', async () => {
    await seedTimeline();
    await redis.del('haiku:item:3');

    const recent = await repo.listRecent(3);
    expect(recent.map((h) => h.id)).toEqual(['4', '2']);
  });

  it('count includes an index entry whose hash is gone until it is deleted', async () => {
    await seedTimeline();
    await redis.del('haiku:item:2');

    expect(await repo.count()).toBe(4);
    expect((await repo.listRecent(10)).map((h) => h.id)).toEqual(['4', '3', '1']);

    expect(await repo.delete('2')).toBe(false);
    expect(await repo.count()).toBe(3);
  });

  it('count reports the number of records', async () => {
    expect(await repo.count()).toBe(0);
    await seedTimeline();
    expect(await repo.count()).toBe(4);
  });
});

describe('RedisHaikuRepository - search', () => {
  it('matches subjects case-insensitively, newest first', async () => {
    await seedTimeline();

    const hits = await repo.searchBySubject('dawn', 10);
    expect(hits.map((h) => h.subject)).toEqual(['DAWN light', 'Dawn chorus']);
  });

  it('matches substrings inside a word', async () => {
    await seedTimeline();

    const hits = await repo.searchBySubject('AWN', 10);
    expect(hits.map((h) => h.id)).toEqual(['3', '1']);
  });

  it('caps results at limit', async () => {
    await seedTimeline();

    const hits = await repo.searchBySubject('dawn', 1);
    expect(hits.map((h) => h.id)).toEqual(['3']);
  });

  it('treats pattern characters literally', async () => {
    await seedTimeline();
    await seedHaiku(redis, { id: '5', subject: '100% rain', text: 'soaked to the bone', created_at: '2024-01-05T00:00:00.000Z' });

    expect((await repo.searchBySubject('%', 10)).map((h) => h.id)).toEqual(['5']);
    expect(await repo.searchBySubject('*', 10)).toEqual([]);
  });

  it('returns an empty list when nothing matches', async () => {
    await seedTimeline();
    expect(await repo.searchBySubject('glacier', 10)).toEqual([]);
  });

  it('rejects a blank substring instead of matching everything', async () => {
    await seedTimeline();
    await expect(repo.searchBySubject('   ', 10)).rejects.toBeInstanceOf(ValidationError);
  });
});

describe('RedisHaikuRepository - search across index pages', () => {
  const base = Date.parse('2024-06-01T00:00:00.000Z');

  // ids 1..650, one minute apart; every hundredth subject is a match
  beforeEach(async () => {
    const pipeline = redis.pipeline();
    for (let i = 1; i <= 650; i += 1) {
      const createdAt = base + i * 60_000;
      pipeline.hset(`haiku:item:${i}`, {
        id: String(i),
        subject: i % 100 === 0 ? `Dawn ${i}` : `dusk ${i}`,
        text: `line ${i}`,
        created_at: new Date(createdAt).toISOString(),
        user_id: '',
      });
      pipeline.zadd('haiku:by_created', createdAt * 1000, String(i));
    }
    await pipeline.exec();
  });

  it('collects matches from every page, newest first', async () => {
    const hits = await repo.searchBySubject('dawn', 10);
    const ids = hits.map((h) => h.id);

    expect(ids).toEqual(['600', '500', '400', '300', '200', '100']);
    expect(new Set(ids).size).toBe(ids.length);
  });

  it('stops at limit partway through a later page', async () => {
    expect((await repo.searchBySubject('dawn', 2)).map((h) => h.id)).toEqual(['600', '500']);
    expect((await repo.searchBySubject('dawn', 4)).map((h) => h.id)).toEqual(['600', '500', '400', '300']);
    expect((await repo.searchBySubject('dawn', 5)).map((h) => h.id)).toEqual(['600', '500', '400', '300', '200']);
  });

  it('ends on a short last page', async () => {
    // dusk 1, dusk 10-19 and dusk 101-199
    const hits = await repo.searchBySubject('dusk 1', 200);
    expect(hits).toHaveLength(110);
    expect(hits.map((h) => h.id).slice(0, 2)).toEqual(['199', '198']);
    expect(hits.map((h) => h.id).slice(-3)).toEqual(['11', '10', '1']);
  });
});

describe('RedisHaikuRepository - delete', () => {
  it('removes the record and reports it once', async () => {
    const saved = await repo.save({ subject: 'ember', text: 'last glow in the grate' });

    expect(await repo.delete(saved.id)).toBe(true);
    expect(await repo.delete(saved.id)).toBe(false);
    expect(await repo.getById(saved.id)).toBeNull();
    expect(await repo.count()).toBe(0);
  });

  it('returns false for an id that never existed', async () => {
    expect(await repo.delete('999')).toBe(false);
  });
});

describe('RedisHaikuRepository - failures', () => {
  it('wraps transport errors in PersistenceError', async () => {
    const cause = new Error('Connection is closed.');
    vi.spyOn(redis, 'zcard').mockRejectedValue(cause);

    const err = await repo.count().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(PersistenceError);
    expect(err).toMatchObject({ message: 'count failed: Connection is closed.', cause });
  });

  it('reports malformed rows as PersistenceError', async () => {
    await redis.hset('haiku:item:1', { id: '1', subject: 'broken' });
    await redis.zadd('haiku:by_created', 1, '1');

    await expect(repo.getById('1')).rejects.toThrow('malformed haiku row: text, created_at');
    await expect(repo.listRecent(5)).rejects.toBeInstanceOf(PersistenceError);
  });
});
