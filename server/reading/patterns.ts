import type { FeedEntry } from './types';
import { UNKNOWN_AUTHOR } from './types';
import { collapseWhitespace, stripTags, visibleText } from '../utils/text';

/**
 * One step of an ordered extraction cascade. `arity` says how the captures are read:
 * 1 = a direct percentage, 2 = a `(current, total)` pair.
 */
export interface PatternRule {
  pattern: RegExp;
  arity: 1 | 2;
}

export interface PatternMatch {
  rule: PatternRule;
  groups: string[];
}

const rule = (source: string, arity: 1 | 2): PatternRule => ({ pattern: new RegExp(source, 'i'), arity });

// Order is precedence: the first rule that matches wins, even if a later one would match "better".
export const TITLE_PROGRESS_RULES: readonly PatternRule[] = [
  rule(String.raw`(\d+)%`, 1),
  rule(String.raw`is (\d+)% done`, 1),
  rule(String.raw`(\d+) percent`, 1),
  rule(String.raw`page (\d+) of (\d+)`, 2),
  rule(String.raw`is on page (\d+) of (\d+)`, 2),
];

export const DESCRIPTION_PROGRESS_RULES: readonly PatternRule[] = [
  rule(String.raw`(\d+)%\s*(?:complete|done|finished|read)`, 1),
  rule(String.raw`(\d+)\s*percent`, 1),
  rule(String.raw`page\s+(\d+)\s+of\s+(\d+)`, 2),
  rule(String.raw`(\d+)\s*/\s*(\d+)\s*pages`, 2),
  rule(String.raw`progress:?\s*(\d+)%`, 1),
];

export const clampPercent = (value: number): number => Math.max(0, Math.min(100, Math.trunc(value)));

/** `floor(current / total * 100)`, clamped; null when the total cannot be divided by. */
export const pairToPercent = (current: number, total: number): number | null => {
  if (!Number.isFinite(current) || !Number.isFinite(total) || total <= 0) return null;
  return clampPercent(Math.floor((current * 100) / total));
};

/**
 * Walks the cascade in order and returns the first match that `interpret` accepts.
 * A rejected match does not stop the walk, so a later rule still gets its turn.
 */
export const firstAccepted = <T>(
  text: string,
  rules: readonly PatternRule[],
  interpret: (match: PatternMatch) => T | null,
): T | null => {
  if (!text) return null;
  for (const candidate of rules) {
    const m = text.match(candidate.pattern);
    if (!m) continue;
    const groups = m.slice(1, 1 + candidate.arity).map((g) => g ?? '');
    const value = interpret({ rule: candidate, groups });
    if (value !== null) return value;
  }
  return null;
};

export const matchFirst = (text: string, rules: readonly PatternRule[]): PatternMatch | null =>
  firstAccepted(text, rules, (match) => match);

const interpretPercent = ({ rule: matched, groups }: PatternMatch): number | null => {
  const first = Number.parseInt(groups[0], 10);
  if (matched.arity === 1) {
    return Number.isFinite(first) ? clampPercent(first) : null;
  }
  return pairToPercent(first, Number.parseInt(groups[1], 10));
};

/** Runs a progress cascade. Returns null when nothing usable matched, which is not 0. */
export const extractProgress = (text: string, rules: readonly PatternRule[]): number | null =>
  firstAccepted(text, rules, interpretPercent);

export const extractEntryProgress = (entry: FeedEntry): number | null => {
  const fromTitle = extractProgress(entry.title, TITLE_PROGRESS_RULES);
  if (fromTitle !== null) return fromTitle;
  if (!entry.description) return null;
  return extractProgress(visibleText(entry.description), DESCRIPTION_PROGRESS_RULES);
};

const MAX_AUTHOR_LENGTH = 100;

const isPlausibleAuthor = (name: string | null | undefined): name is string =>
  !!name && name.length > 1 && name.length < MAX_AUTHOR_LENGTH && name !== UNKNOWN_AUTHOR;

const AUTHOR_LINK = /<a\b[^>]*\bhref\s*=\s*["'][^"']*\/author\/[^"']*["'][^>]*>([\s\S]*?)<\/a>/i;

const TITLE_ACTIVITY_VERBS = /(started reading|is currently reading|finished reading|is on page \d+ of \d+ of)/gi;

const TITLE_AUTHOR_PATTERNS: readonly RegExp[] = [
  /'[^']+'\s+by\s+([^(]+?)(?:\s*\(|$)/i,
  /\bby\s+([^(]+?)(?:\s*\(|$)/i,
  /'[^']*'\s*(.+?)(?:\s*started|\s*is|\s*$)/i,
];

const AUTHOR_FIELD_PREFIX = /^.*?(started reading|is currently reading)/i;

export const authorFromDescriptionLink = (description: string | undefined): string | null => {
  if (!description) return null;
  const m = description.match(AUTHOR_LINK);
  if (!m) return null;
  const name = visibleText(m[1]);
  return isPlausibleAuthor(name) ? name : null;
};

export const authorFromTitle = (title: string): string | null => {
  const cleaned = title.replace(TITLE_ACTIVITY_VERBS, '');
  for (const pattern of TITLE_AUTHOR_PATTERNS) {
    const m = cleaned.match(pattern);
    if (!m) continue;
    const name = stripTags(m[1] ?? '');
    if (isPlausibleAuthor(name)) return name;
  }
  return null;
};

export const authorFromField = (author: string | undefined): string | null => {
  if (!author) return null;
  const text = stripTags(author).replace(AUTHOR_FIELD_PREFIX, '');
  if (!text.includes(' by ')) return null;
  const parts = text.split(' by ');
  const name = collapseWhitespace(parts[parts.length - 1]);
  return isPlausibleAuthor(name) ? name : null;
};

/** Description link, then the "by Name" phrase in the title, then the author field. */
export const extractAuthor = (entry: FeedEntry): string | null =>
  authorFromDescriptionLink(entry.description) ?? authorFromTitle(entry.title) ?? authorFromField(entry.author);

const COVER_IMAGE = /src="(https:\/\/[^"]+\.jpg)"/;

export const extractCoverUrl = (entry: FeedEntry): string | null => {
  if (!entry.description) return null;
  const m = entry.description.match(COVER_IMAGE);
  return m ? m[1] : null;
};

const QUOTED_TITLE = /'([^']+)'/;

export const extractQuotedTitle = (text: string): string | null => {
  const m = text.match(QUOTED_TITLE);
  return m ? m[1] : null;
};
