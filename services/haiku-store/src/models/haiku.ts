import { z } from 'zod';
import { PersistenceError } from '../errors';
import type { Haiku, HaikuRow } from '../types';

const haikuRowSchema = z.object({
  id: z.string().min(1, 'id required'),
  subject: z.string().min(1, 'subject required'),
  text: z.string().min(1, 'text required'),
  created_at: z.string().datetime({ message: 'created_at must be an ISO timestamp' }),
  user_id: z.string().optional(),
});

/** Parses a raw hash read from the store into a domain record. */
export function haikuFromRow(raw: Record<string, string>): Haiku {
  const parsed = haikuRowSchema.safeParse(raw);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.') || issue.message);
    throw new PersistenceError(`malformed haiku row: ${fields.join(', ')}`, { cause: parsed.error });
  }

  const { id, subject, text, created_at, user_id } = parsed.data;
  return {
    id,
    subject,
    text,
    createdAt: new Date(created_at),
    ...(user_id ? { userId: user_id } : {}),
  };
}

export function haikuToRow(haiku: Haiku): HaikuRow {
  return {
    id: haiku.id,
    subject: haiku.subject,
    text: haiku.text,
    created_at: haiku.createdAt.toISOString(),
    user_id: haiku.userId ?? '',
  };
}

/** JSON body shape used by the HTTP routes. */
export interface HaikuJson {
  id: string;
  subject: string;
  text: string;
  created_at: string;
  user_id?: string;
}

export function serializeHaiku(haiku: Haiku): HaikuJson {
  return {
    id: haiku.id,
    subject: haiku.subject,
    text: haiku.text,
    created_at: haiku.createdAt.toISOString(),
    ...(haiku.userId ? { user_id: haiku.userId } : {}),
  };
}
