import type { CanonicalBook } from '../reading/types';
import type { ReadingDisplayPayload } from '../../shared/types';
import { challengeProgressPercent, formatChallenge } from '../reading/challenge';

const UNKNOWN_DATE = 'Unknown';

const partsOf = (date: Date, timeZone: string, options: Intl.DateTimeFormatOptions) => {
  const parts = new Intl.DateTimeFormat('en-US', { ...options, timeZone }).formatToParts(date);
  const lookup: Partial<Record<Intl.DateTimeFormatPartTypes, string>> = {};
  for (const part of parts) {
    lookup[part.type] = part.value;
  }
  return lookup;
};

/** "Jun 05, 2025" */
export const formatDisplayDate = (date: Date | undefined, timeZone = 'UTC'): string => {
  if (!date || Number.isNaN(date.getTime())) return UNKNOWN_DATE;
  const p = partsOf(date, timeZone, { month: 'short', day: '2-digit', year: 'numeric' });
  return `${p.month} ${p.day}, ${p.year}`;
};

/** "06/05 14:03" */
export const formatClock = (date: Date, timeZone = 'UTC'): string => {
  const p = partsOf(date, timeZone, { month: '2-digit', day: '2-digit', hour: '2-digit', minute: '2-digit', hourCycle: 'h23' });
  return `${p.month}/${p.day} ${p.hour}:${p.minute}`;
};

export const toDisplayPayload = (book: CanonicalBook, now: Date, timeZone = 'UTC'): ReadingDisplayPayload => ({
  title: book.title,
  author: book.author,
  progress: book.progressPercent,
  cover_url: book.coverUrl ?? null,
  start_date: formatDisplayDate(book.startDate, timeZone),
  update_date: formatDisplayDate(book.updateDate, timeZone),
  challenge: book.challenge ? formatChallenge(book.challenge) : null,
  challenge_progress_percent: challengeProgressPercent(book.challenge),
  entries_count: book.entriesCount,
  current_time: formatClock(now, timeZone),
});

const placeholder = (
  fields: Pick<ReadingDisplayPayload, 'title' | 'author' | 'challenge'>,
  now: Date,
  timeZone: string,
): ReadingDisplayPayload => ({
  ...fields,
  progress: 0,
  cover_url: null,
  start_date: UNKNOWN_DATE,
  update_date: UNKNOWN_DATE,
  challenge_progress_percent: 0,
  entries_count: 0,
  current_time: formatClock(now, timeZone),
});

export const configurationRequiredPayload = (now: Date, timeZone = 'UTC'): ReadingDisplayPayload =>
  placeholder(
    {
      title: 'Configuration Required',
      author: 'Set READING_FEED_URL to your activity feed',
      challenge: 'Set READING_FEED_URL to see challenge data',
    },
    now,
    timeZone,
  );

export const errorPayload = (now: Date, timeZone = 'UTC'): ReadingDisplayPayload =>
  placeholder(
    {
      title: 'Error Loading Data',
      author: 'Please check configuration and connection',
      challenge: null,
    },
    now,
    timeZone,
  );

/** Fixed payload for laying out the dashboard template without a live feed. */
export const sampleDisplayPayload = (now: Date, timeZone = 'UTC'): ReadingDisplayPayload => ({
  title: 'The Lighthouse Ledger',
  author: 'Mara Quill',
  progress: 68,
  cover_url: null,
  start_date: 'Jun 15, 2025',
  update_date: 'Jun 26, 2025',
  challenge: '15 of 25 books',
  challenge_progress_percent: 60,
  entries_count: 3,
  current_time: formatClock(now, timeZone),
});
