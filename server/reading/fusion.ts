import type { ActivityRecord, BookGroups, CanonicalBook, SelectedGroup } from './types';
import { UNKNOWN_AUTHOR } from './types';
import { extractAuthor, extractCoverUrl } from './patterns';

const timeOf = (record: ActivityRecord): number | undefined => record.timestamp?.getTime();

/** Newest first; records without a timestamp go after every timestamped one. Stable. */
export const sortNewestFirst = (records: readonly ActivityRecord[]): ActivityRecord[] =>
  records
    .map((record, index) => ({ record, index }))
    .sort((a, b) => {
      const ta = timeOf(a.record);
      const tb = timeOf(b.record);
      if (ta === undefined && tb === undefined) return a.index - b.index;
      if (ta === undefined) return 1;
      if (tb === undefined) return -1;
      return tb - ta || a.index - b.index;
    })
    .map(({ record }) => record);

/**
 * Picks the group with the most recent activity. A group is only displaced by one
 * whose latest timestamp is strictly newer, so with no timestamps at all the first
 * group wins.
 */
export const selectCurrentGroup = (groups: BookGroups): SelectedGroup | null => {
  let selected: SelectedGroup | null = null;
  let selectedTime: number | undefined;

  for (const [normalizedTitle, records] of groups) {
    if (!records.length) continue;
    const sorted = sortNewestFirst(records);
    const latest = timeOf(sorted[0]);
    const newer = latest !== undefined && (selectedTime === undefined || latest > selectedTime);
    if (!selected || newer) {
      selected = { normalizedTitle, records: sorted };
      selectedTime = latest;
    }
  }

  return selected;
};

const longest = (values: Iterable<string>): string | undefined => {
  let best: string | undefined;
  for (const value of values) {
    if (best === undefined || value.length > best.length) {
      best = value;
    }
  }
  return best;
};

/**
 * Reconciles every observation of one book into a single record. Pure: the author
 * and cover come from re-reading the entries already attached to the records.
 */
export const fuseBookGroup = (records: readonly ActivityRecord[]): CanonicalBook | null => {
  if (!records.length) return null;

  let progressRecord = records[0];
  let bestProgress = progressRecord.progressPercent;
  let metadataRecord: ActivityRecord | undefined;
  let coverUrl: string | undefined;
  const authors = new Set<string>();

  for (const record of records) {
    // Later nonzero progress beats the 0 a "started" entry carries.
    if (record.progressPercent > bestProgress || (record.progressPercent > 0 && bestProgress === 0)) {
      bestProgress = record.progressPercent;
      progressRecord = record;
    }

    if (record.kind === 'started' && !metadataRecord) {
      metadataRecord = record;
    }

    const author = extractAuthor(record.entry);
    if (author) {
      authors.add(author);
    }

    if (!coverUrl) {
      coverUrl = extractCoverUrl(record.entry) ?? undefined;
    }
  }

  const anchor = metadataRecord ?? records[0];
  const title = longest([progressRecord.rawTitle, ...records.map((r) => r.rawTitle)]) ?? progressRecord.rawTitle;

  return {
    title,
    author: longest(authors) ?? UNKNOWN_AUTHOR,
    progressPercent: bestProgress,
    coverUrl,
    startDate: anchor.timestamp,
    updateDate: progressRecord.timestamp,
    entriesCount: records.length,
    entryKinds: records.map((r) => r.kind),
    selectedProgressEntry: progressRecord.entry.title,
  };
};

export const buildCurrentBook = (groups: BookGroups): CanonicalBook | null => {
  const selected = selectCurrentGroup(groups);
  return selected ? fuseBookGroup(selected.records) : null;
};
