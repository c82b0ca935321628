import type Redis from 'ioredis';
import type { HaikuRepository } from '../contracts/haikuRepository';
import { HaikuStoreError, PersistenceError, ValidationError, errorMessage } from '../errors';
import { haikuFromRow } from '../models/haiku';
import {
  countHaikus,
  deleteHaiku,
  getHaikuHash,
  getHaikuHashes,
  getSubjects,
  haikuKeys,
  insertHaiku,
  recentIds,
  type HaikuKeys,
} from '../redis/haikus';
import type { Haiku, HaikuId, NewHaiku } from '../types';
import { assertLimit, assertOffset } from '../validation';

// Recency-index page size when scanning for subject matches
const SEARCH_PAGE_SIZE = 200;

/**
 * Implements `HaikuRepository` on top of the Redis helpers in `redis/haikus`.
 * Every native failure leaves this class as a `PersistenceError`.
 */
export class RedisHaikuRepository implements HaikuRepository {
  private readonly keys: HaikuKeys;

  constructor(
    private readonly redis: Redis,
    keyPrefix?: string,
  ) {
    this.keys = haikuKeys(keyPrefix);
  }

  async save(haiku: NewHaiku): Promise<Haiku> {
    return this.run('save', async () => {
      const row = await insertHaiku(this.redis, this.keys, haiku);
      return haikuFromRow({ ...row });
    });
  }

  async getById(id: HaikuId): Promise<Haiku | null> {
    return this.run('getById', async () => {
      const hash = await getHaikuHash(this.redis, this.keys, id);
      return hash ? haikuFromRow(hash) : null;
    });
  }

  async listRecent(limit: number, offset = 0): Promise<Haiku[]> {
    assertLimit(limit);
    assertOffset(offset);
    return this.run('listRecent', async () => {
      const ids = await recentIds(this.redis, this.keys, offset, offset + limit - 1);
      const hashes = await getHaikuHashes(this.redis, this.keys, ids);
      return hashes.map(haikuFromRow);
    });
  }

  async searchBySubject(substring: string, limit: number): Promise<Haiku[]> {
    const needle = substring.trim().toLowerCase();
    if (!needle) {
      throw new ValidationError('search substring must not be empty', ['substring']);
    }
    assertLimit(limit);

    return this.run('searchBySubject', async () => {
      const matches: Haiku[] = [];
      const seen = new Set<HaikuId>();

      for (let start = 0; matches.length < limit; start += SEARCH_PAGE_SIZE) {
        const ids = await recentIds(this.redis, this.keys, start, start + SEARCH_PAGE_SIZE - 1);
        if (ids.length === 0) break;

        const subjects = await getSubjects(this.redis, this.keys, ids);
        const hitIds = ids.filter((id, idx) => {
          const subject = subjects[idx];
          return !seen.has(id) && subject != null && subject.toLowerCase().includes(needle);
        });

        const hashes = await getHaikuHashes(this.redis, this.keys, hitIds);
        for (const hash of hashes) {
          const haiku = haikuFromRow(hash);
          seen.add(haiku.id);
          matches.push(haiku);
          if (matches.length >= limit) break;
        }

        if (ids.length < SEARCH_PAGE_SIZE) break;
      }

      return matches;
    });
  }

  async delete(id: HaikuId): Promise<boolean> {
    return this.run('delete', () => deleteHaiku(this.redis, this.keys, id));
  }

  async count(): Promise<number> {
    return this.run('count', () => countHaikus(this.redis, this.keys));
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof HaikuStoreError) throw err;
      throw new PersistenceError(`${operation} failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}
