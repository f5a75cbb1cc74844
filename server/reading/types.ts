export interface FeedEntry {
  title: string;
  /** Publication time exactly as the feed printed it (RFC 822 for RSS). */
  published?: string;
  /** HTML fragment. */
  description?: string;
  author?: string;
}

export type ActivityKind = 'started' | 'progress_update' | 'currently_reading' | 'unknown';

export interface ActivityRecord {
  rawTitle: string;
  normalizedTitle: string;
  kind: ActivityKind;
  progressPercent: number;
  timestamp?: Date;
  entry: FeedEntry;
}

/** normalized title -> records in feed order; Map iteration keeps first-sighting order. */
export type BookGroups = Map<string, ActivityRecord[]>;

export interface SelectedGroup {
  normalizedTitle: string;
  records: ActivityRecord[];
}

export interface ChallengeState {
  booksRead: number;
  booksGoal: number;
}

export interface CanonicalBook {
  title: string;
  author: string;
  progressPercent: number;
  coverUrl?: string;
  startDate?: Date;
  updateDate?: Date;
  entriesCount: number;
  challenge?: ChallengeState;
  entryKinds: ActivityKind[];
  selectedProgressEntry?: string;
}

export const UNKNOWN_AUTHOR = 'Unknown Author';
export const NO_CURRENT_BOOK_TITLE = 'No current book found';
