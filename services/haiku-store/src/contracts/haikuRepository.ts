import type { Haiku, HaikuId, NewHaiku } from '../types';

/**
 * Data-access contract between the storage service and a concrete store.
 *
 * Implementations raise `PersistenceError` for every store or transport
 * failure and `ValidationError` for bad arguments; nothing else escapes.
 * "Not found" is a value (`null` / `false`), never an error.
 */
export interface HaikuRepository {
  /** Inserts a record; the store assigns `id` and `createdAt`. */
  save(haiku: NewHaiku): Promise<Haiku>;
  getById(id: HaikuId): Promise<Haiku | null>;
  /**
   * Newest first. Records sharing a `createdAt` come back in whatever order
   * the store's index keeps them; callers must not depend on it.
   */
  listRecent(limit: number, offset?: number): Promise<Haiku[]>;
  /** Case-insensitive literal substring match on `subject`, newest first. */
  searchBySubject(substring: string, limit: number): Promise<Haiku[]>;
  /**
   * Resolves `true` only when a record was actually removed. Also drops a
   * dangling index entry for `id`, if any.
   */
  delete(id: HaikuId): Promise<boolean>;
  /**
   * Number of entries in the recency index. A record whose body was removed
   * outside the repository still counts until `delete(id)` runs for it, while
   * `listRecent` and `searchBySubject` already skip it.
   */
  count(): Promise<number>;
}
