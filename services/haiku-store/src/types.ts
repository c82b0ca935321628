export type HaikuId = string;

// Persisted hash shape (every field is a string on the wire)
export interface HaikuRow {
  id: HaikuId;
  subject: string;
  text: string;
  created_at: string;   // ISO-8601, UTC
  user_id: string;      // '' when unowned
}

// Save input: the store assigns id and created_at
export interface NewHaiku {
  subject: string;
  text: string;
  userId?: string;
}

export interface Haiku {
  readonly id: HaikuId;
  readonly subject: string;
  readonly text: string;
  readonly createdAt: Date;
  readonly userId?: string;
}
