import type { BookGroups, FeedEntry } from './types';
import { classifyEntry } from './classify';

/** Classifies every entry in feed order and buckets the reading events by normalized title. */
export const collectBookGroups = (entries: readonly FeedEntry[]): BookGroups => {
  const groups: BookGroups = new Map();
  for (const entry of entries) {
    const record = classifyEntry(entry);
    if (!record) continue;
    const bucket = groups.get(record.normalizedTitle);
    if (bucket) {
      bucket.push(record);
    } else {
      groups.set(record.normalizedTitle, [record]);
    }
  }
  return groups;
};

export const summarizeGroups = (groups: BookGroups): Record<string, number> =>
  Object.fromEntries(Array.from(groups, ([title, records]) => [title, records.length]));
