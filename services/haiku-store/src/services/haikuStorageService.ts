import type Redis from 'ioredis';
import type { Logger } from 'pino';
import { config, type StoreCredentials } from '../config';
import type { HaikuRepository } from '../contracts/haikuRepository';
import type { HaikuStorage } from '../contracts/haikuStorage';
import { PersistenceError, ValidationError, errorMessage } from '../errors';
import { moduleLogger } from '../logger';
import { createRedisClient } from '../redis/client';
import { RedisHaikuRepository } from '../storage/redisHaikuRepository';
import type { Haiku, HaikuId } from '../types';
import { assertLimit, assertOffset, requireText } from '../validation';

export type StorageState = 'uninitialized' | 'available' | 'unavailable';

export interface HaikuStorageOptions {
  logger?: Logger;
  keyPrefix?: string;
  defaultLimit?: number;
  createClient?: (url: string, key: string) => Redis;
  createRepository?: (client: Redis) => HaikuRepository;
}

/**
 * Availability-gated façade over a `HaikuRepository`.
 *
 * The client and repository are built on first use from the credentials
 * given at construction. If that fails, or a credential is missing, the
 * instance is `unavailable` for the rest of its life and every operation
 * returns its degraded default without I/O. Build a new instance to retry.
 *
 * Caching: for a fixed instance, results depend only on the arguments and
 * the store contents. A cache wrapping this service must key on (instance,
 * operation, arguments) and must be cleared by the caller after every
 * `saveHaiku` and `deleteHaiku`; nothing here invalidates it.
 */
export class HaikuStorageService implements HaikuStorage {
  private state: StorageState = 'uninitialized';
  private client: Redis | null = null;
  private repository: HaikuRepository | null = null;
  private readonly log: Logger;
  private readonly defaultLimit: number;

  constructor(
    private readonly credentials: StoreCredentials = {},
    private readonly options: HaikuStorageOptions = {},
  ) {
    this.log = options.logger ?? moduleLogger('haiku-storage');
    this.defaultLimit = options.defaultLimit ?? config.limits.defaultLimit;
  }

  get status(): StorageState {
    return this.state;
  }

  /** Resolves the one-time initialization if needed; never touches the network. */
  isAvailable(): boolean {
    return this.ensureRepository() !== null;
  }

  async probe(): Promise<boolean> {
    const repository = this.ensureRepository();
    if (!repository) return false;
    try {
      await repository.count();
      return true;
    } catch (err) {
      this.log.warn({ err }, 'Storage probe failed');
      return false;
    }
  }

  async saveHaiku(subject: string, text: string, userId?: string): Promise<Haiku | null> {
    const cleanSubject = requireText('subject', subject);
    const cleanText = requireText('text', text);

    const repository = this.gate('saveHaiku');
    if (!repository) return null;

    try {
      const saved = await repository.save({
        subject: cleanSubject,
        text: cleanText,
        ...(userId ? { userId } : {}),
      });
      this.log.info({ haikuId: saved.id }, 'Saved haiku');
      return saved;
    } catch (err) {
      return this.degrade('saveHaiku', err, null);
    }
  }

  async getRecentHaikus(limit: number = this.defaultLimit, offset = 0): Promise<Haiku[]> {
    assertLimit(limit);
    assertOffset(offset);

    const repository = this.gate('getRecentHaikus');
    if (!repository) return [];

    try {
      return await repository.listRecent(limit, offset);
    } catch (err) {
      return this.degrade('getRecentHaikus', err, []);
    }
  }

  async searchHaikus(query: string, limit: number = this.defaultLimit): Promise<Haiku[]> {
    assertLimit(limit);
    const needle = typeof query === 'string' ? query.trim() : '';
    // A blank query is not "match everything"
    if (!needle) return [];

    const repository = this.gate('searchHaikus');
    if (!repository) return [];

    try {
      return await repository.searchBySubject(needle, limit);
    } catch (err) {
      return this.degrade('searchHaikus', err, []);
    }
  }

  async getHaikuById(id: HaikuId): Promise<Haiku | null> {
    const repository = this.gate('getHaikuById');
    if (!repository) return null;

    try {
      return await repository.getById(id);
    } catch (err) {
      return this.degrade('getHaikuById', err, null);
    }
  }

  /**
   * `false` covers not-found, unavailable and failed alike. Check
   * `isAvailable()` to tell them apart.
   */
  async deleteHaiku(id: HaikuId): Promise<boolean> {
    const repository = this.gate('deleteHaiku');
    if (!repository) return false;

    try {
      const removed = await repository.delete(id);
      if (removed) this.log.info({ haikuId: id }, 'Deleted haiku');
      return removed;
    } catch (err) {
      return this.degrade('deleteHaiku', err, false);
    }
  }

  async getTotalCount(): Promise<number> {
    const repository = this.gate('getTotalCount');
    if (!repository) return 0;

    try {
      return await repository.count();
    } catch (err) {
      return this.degrade('getTotalCount', err, 0);
    }
  }

  /** Releases the client, if one was ever built. The instance is unavailable afterwards. */
  async close(): Promise<void> {
    if (!this.client) return;
    const client = this.client;
    this.client = null;
    this.repository = null;
    this.state = 'unavailable';
    try {
      await client.quit();
    } catch (err) {
      this.log.warn({ err }, 'Failed to close store client cleanly');
      client.disconnect();
    }
  }

  private gate(operation: string): HaikuRepository | null {
    const repository = this.ensureRepository();
    if (!repository) {
      this.log.debug({ operation }, 'Storage unavailable, returning default');
    }
    return repository;
  }

  private ensureRepository(): HaikuRepository | null {
    if (this.state === 'available') return this.repository;
    if (this.state === 'unavailable') return null;

    const url = this.credentials.url?.trim();
    const key = this.credentials.key?.trim();
    if (!url || !key) {
      this.state = 'unavailable';
      this.log.info('Storage credentials not configured; haiku storage disabled');
      return null;
    }

    let client: Redis | null = null;
    try {
      const createClient =
        this.options.createClient ??
        ((clientUrl: string, clientKey: string) => createRedisClient(clientUrl, clientKey, { logger: this.log }));
      client = createClient(url, key);
      const createRepository =
        this.options.createRepository ?? ((redis: Redis) => new RedisHaikuRepository(redis, this.options.keyPrefix));
      this.repository = createRepository(client);
      this.client = client;
      this.state = 'available';
      this.log.info('Haiku storage client created');
    } catch (err) {
      client?.disconnect();
      this.state = 'unavailable';
      this.log.info({ err: errorMessage(err) }, 'Could not create storage client; haiku storage disabled');
    }
    return this.repository;
  }

  private degrade<T>(operation: string, err: unknown, fallback: T): T {
    if (err instanceof ValidationError) {
      throw err;
    }
    const cause = err instanceof PersistenceError ? err.cause : undefined;
    this.log.error({ err, ...(cause !== undefined ? { cause: errorMessage(cause) } : {}) }, `${operation} failed`);
    return fallback;
  }
}
