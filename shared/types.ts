/** JSON body of `/trmnl-data`: flat, pre-formatted strings the dashboard template prints as-is. */
export interface ReadingDisplayPayload {
  title: string;
  author: string;
  progress: number;
  cover_url: string | null;
  start_date: string;
  update_date: string;
  challenge: string | null;
  challenge_progress_percent: number;
  entries_count: number;
  current_time: string;
}

export interface SlotStatusPayload {
  valid: boolean;
  writtenAt: string | null;
  ttlMs: number;
}

export interface CacheStatusPayload {
  book: SlotStatusPayload;
  challenge: SlotStatusPayload;
  /** Label of the challenge held in a live slot; null when the slot is empty, expired or holds a miss. */
  cachedChallenge: string | null;
}

export interface DebugRecordPayload {
  title: string;
  progress: number;
  type: string;
  rss_title: string;
  timestamp: string | null;
}
