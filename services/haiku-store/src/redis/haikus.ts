import type Redis from 'ioredis';
import { config } from '../config';
import { haikuToRow } from '../models/haiku';
import type { HaikuId, HaikuRow, NewHaiku } from '../types';

export interface HaikuKeys {
  item(id: HaikuId): string;
  byCreated: string;
  seq: string;
}

export function haikuKeys(prefix: string = config.store.keyPrefix): HaikuKeys {
  return {
    item: (id) => `${prefix}:item:${id}`,
    byCreated: `${prefix}:by_created`,
    seq: `${prefix}:seq`,
  };
}

type ExecReply = [error: Error | null, result: unknown][] | null;

// MULTI/pipeline replies carry per-command errors; surface the first one.
function unwrapExec(reply: ExecReply, label: string): unknown[] {
  if (!reply) {
    throw new Error(`${label}: transaction aborted`);
  }
  return reply.map(([err, result]) => {
    if (err) throw err;
    return result;
  });
}

function timeToMicros(reply: unknown): number {
  if (!Array.isArray(reply) || reply.length < 2) {
    throw new Error('unexpected TIME reply');
  }
  const seconds = Number(reply[0]);
  const micros = Number(reply[1]);
  if (!Number.isFinite(seconds) || !Number.isFinite(micros)) {
    throw new Error('unexpected TIME reply');
  }
  return seconds * 1e6 + micros;
}

function toHash(value: unknown): Record<string, string> | null {
  if (value == null) return null;
  const hash: Record<string, string> = {};
  if (Array.isArray(value)) {
    // raw HGETALL reply: [field, value, field, value, ...]
    for (let i = 0; i + 1 < value.length; i += 2) {
      hash[String(value[i])] = String(value[i + 1]);
    }
  } else if (typeof value === 'object') {
    for (const [field, fieldValue] of Object.entries(value)) {
      hash[field] = String(fieldValue);
    }
  }
  return Object.keys(hash).length === 0 ? null : hash;
}

/**
 * Allocates an id and a timestamp from the store, then writes the hash and
 * its recency index entry in one MULTI.
 */
export async function insertHaiku(redis: Redis, keys: HaikuKeys, input: NewHaiku): Promise<HaikuRow> {
  const [seq, time] = unwrapExec(await redis.multi().incr(keys.seq).time().exec(), 'allocate');
  const id: HaikuId = String(seq);
  const createdMicros = timeToMicros(time);

  const row = haikuToRow({
    id,
    subject: input.subject,
    text: input.text,
    createdAt: new Date(Math.floor(createdMicros / 1000)),
    ...(input.userId ? { userId: input.userId } : {}),
  });

  unwrapExec(
    await redis.multi().hset(keys.item(id), row).zadd(keys.byCreated, createdMicros, id).exec(),
    'insert',
  );
  return row;
}

export async function getHaikuHash(redis: Redis, keys: HaikuKeys, id: HaikuId): Promise<Record<string, string> | null> {
  return toHash(await redis.hgetall(keys.item(id)));
}

/** Ids in `[start, stop]` of the recency index, newest first. */
export async function recentIds(redis: Redis, keys: HaikuKeys, start: number, stop: number): Promise<HaikuId[]> {
  return redis.zrevrange(keys.byCreated, start, stop);
}

/**
 * Loads hashes for `ids`, preserving order. Ids whose hash is gone (deleted
 * after the index was read) are dropped.
 */
export async function getHaikuHashes(redis: Redis, keys: HaikuKeys, ids: HaikuId[]): Promise<Record<string, string>[]> {
  if (ids.length === 0) return [];
  const pipeline = redis.pipeline();
  for (const id of ids) pipeline.hgetall(keys.item(id));
  const replies = unwrapExec(await pipeline.exec(), 'load');
  const hashes: Record<string, string>[] = [];
  for (const reply of replies) {
    const hash = toHash(reply);
    if (hash) hashes.push(hash);
  }
  return hashes;
}

export async function getSubjects(redis: Redis, keys: HaikuKeys, ids: HaikuId[]): Promise<(string | null)[]> {
  if (ids.length === 0) return [];
  const pipeline = redis.pipeline();
  for (const id of ids) pipeline.hget(keys.item(id), 'subject');
  const replies = unwrapExec(await pipeline.exec(), 'subjects');
  return replies.map((reply) => (typeof reply === 'string' ? reply : null));
}

export async function deleteHaiku(redis: Redis, keys: HaikuKeys, id: HaikuId): Promise<boolean> {
  const [removed] = unwrapExec(
    await redis.multi().del(keys.item(id)).zrem(keys.byCreated, id).exec(),
    'delete',
  );
  return Number(removed) > 0;
}

/** Size of the recency index, which includes entries whose hash is gone. */
export async function countHaikus(redis: Redis, keys: HaikuKeys): Promise<number> {
  return redis.zcard(keys.byCreated);
}
