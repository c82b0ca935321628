import type { Haiku, HaikuId } from '../types';

/**
 * What the UI and HTTP layers consume. Every method degrades instead of
 * throwing when the store is missing or failing; only `ValidationError`
 * reaches the caller.
 */
export interface HaikuStorage {
  isAvailable(): boolean;
  /** Active round-trip to the store. Does not change availability. */
  probe(): Promise<boolean>;
  saveHaiku(subject: string, text: string, userId?: string): Promise<Haiku | null>;
  getRecentHaikus(limit?: number, offset?: number): Promise<Haiku[]>;
  searchHaikus(query: string, limit?: number): Promise<Haiku[]>;
  getHaikuById(id: HaikuId): Promise<Haiku | null>;
  deleteHaiku(id: HaikuId): Promise<boolean>;
  getTotalCount(): Promise<number>;
}
