import type { ActivityKind, ActivityRecord, FeedEntry } from './types';
import { extractEntryProgress, extractQuotedTitle } from './patterns';
import { normalizeTitle } from './normalize';

interface TriggerGroup {
  kind: Exclude<ActivityKind, 'unknown'>;
  phrases: readonly string[];
}

// "started reading" must win over the broader progress phrases, and the progress
// phrases over the bare "currently reading".
export const TRIGGER_GROUPS: readonly TriggerGroup[] = [
  { kind: 'started', phrases: ['started reading'] },
  { kind: 'progress_update', phrases: ['is on page', 'is currently reading', 'updated her progress', '% done'] },
  { kind: 'currently_reading', phrases: ['currently reading'] },
];

const PROGRESS_SUFFIX_TITLE =
  /(?:is on page \d+ of \d+ of|is currently reading|updated (?:her|his) progress on|% done with)\s*(.+?)(?:\s*\bby\b|\s*$)/i;

export const detectActivityKind = (title: string): ActivityKind => {
  const lower = title.toLowerCase();
  const group = TRIGGER_GROUPS.find(({ phrases }) => phrases.some((phrase) => lower.includes(phrase)));
  return group ? group.kind : 'unknown';
};

const extractBookTitle = (kind: ActivityKind, feedTitle: string): string | null => {
  const quoted = extractQuotedTitle(feedTitle);
  if (quoted || kind !== 'progress_update') {
    return quoted;
  }
  const m = feedTitle.match(PROGRESS_SUFFIX_TITLE);
  const suffix = m?.[1]?.trim();
  return suffix ? suffix : null;
};

export const parsePublished = (value: string | undefined): Date | undefined => {
  if (!value) return undefined;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? undefined : new Date(ms);
};

/**
 * Turns one feed entry into an activity record, or null when the entry is not a
 * reading event (or names no book we can pull out).
 */
export const classifyEntry = (entry: FeedEntry): ActivityRecord | null => {
  const kind = detectActivityKind(entry.title);
  if (kind === 'unknown') return null;

  const rawTitle = extractBookTitle(kind, entry.title);
  if (!rawTitle) return null;

  // Unmatched progress defaults to 0 here; a "started" entry is 0 by definition.
  const progressPercent = kind === 'started' ? 0 : extractEntryProgress(entry) ?? 0;

  return {
    rawTitle,
    normalizedTitle: normalizeTitle(rawTitle),
    kind,
    progressPercent,
    timestamp: parsePublished(entry.published),
    entry,
  };
};
