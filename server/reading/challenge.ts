import type { ChallengeState } from './types';
import { firstAccepted, type PatternMatch, type PatternRule } from './patterns';
import { visibleText } from '../utils/text';

export const MAX_PLAUSIBLE_GOAL = 500;

const pair = (source: string): PatternRule => ({ pattern: new RegExp(source, 'i'), arity: 2 });

export const buildFeedChallengeRules = (year: number = new Date().getFullYear()): readonly PatternRule[] => [
  pair(String.raw`You have read (\d+) of (\d+) books`),
  pair(String.raw`has read (\d+) of (\d+) books`),
  pair(String.raw`read (\d+) of (\d+) books`),
  pair(String.raw`(\d+) of (\d+) books.*(?:challenge|goal|${year})`),
  pair(String.raw`(\d+)/(\d+) books`),
  pair(String.raw`has read (\d+) books? toward.*?goal of (\d+) books?`),
];

export const buildProfileChallengeRules = (year: number = new Date().getFullYear()): readonly PatternRule[] => [
  pair(String.raw`You have read (\d+) of (\d+) books`),
  pair(String.raw`(\d+) of (\d+) books.*?(?:ahead of schedule|behind|on track)`),
  pair(String.raw`${year}.*?(\d+) of (\d+)`),
  pair(String.raw`(\d+) of (\d+) books`),
  pair(String.raw`(\d+)/(\d+) books`),
  pair(String.raw`read (\d+).*?of (\d+)`),
];

export const isPlausibleChallenge = ({ booksRead, booksGoal }: ChallengeState): boolean =>
  Number.isInteger(booksRead) &&
  Number.isInteger(booksGoal) &&
  booksRead >= 0 &&
  booksRead <= booksGoal &&
  booksGoal <= MAX_PLAUSIBLE_GOAL;

const interpretChallenge = ({ groups }: PatternMatch): ChallengeState | null => {
  const state = {
    booksRead: Number.parseInt(groups[0], 10),
    booksGoal: Number.parseInt(groups[1], 10),
  };
  return isPlausibleChallenge(state) ? state : null;
};

/** First plausible match of the cascade; implausible matches are dropped and the walk goes on. */
export const matchChallenge = (text: string, rules: readonly PatternRule[]): ChallengeState | null =>
  firstAccepted(text, rules, interpretChallenge);

export const findChallengeInFeed = (
  descriptions: Iterable<string | undefined>,
  rules: readonly PatternRule[] = buildFeedChallengeRules(),
): ChallengeState | null => {
  for (const description of descriptions) {
    const found = matchChallenge(visibleText(description), rules);
    if (found) return found;
  }
  return null;
};

const CHALLENGE_WIDGET_OPEN = /<(div|section)\b[^>]*class\s*=\s*["'][^"']*challenge[^"']*["'][^>]*>/i;
const CHALLENGE_WIDGET_SPAN = 2_000;

/** Visible text of the reading-challenge widget, when the page has one. */
export const challengeWidgetText = (html: string): string | null => {
  const m = CHALLENGE_WIDGET_OPEN.exec(html);
  if (!m) return null;
  const start = m.index + m[0].length;
  const text = visibleText(html.slice(start, start + CHALLENGE_WIDGET_SPAN));
  return text || null;
};

export const findChallengeInProfile = (
  html: string,
  rules: readonly PatternRule[] = buildProfileChallengeRules(),
): ChallengeState | null => {
  const widget = challengeWidgetText(html);
  if (widget) {
    const found = matchChallenge(widget, rules);
    if (found) return found;
  }
  return matchChallenge(visibleText(html), rules);
};

export const formatChallenge = ({ booksRead, booksGoal }: ChallengeState): string =>
  `${booksRead} of ${booksGoal} books`;

export const challengeProgressPercent = (state: ChallengeState | null | undefined): number => {
  if (!state || state.booksGoal <= 0) return 0;
  return Math.min(Math.floor((state.booksRead * 100) / state.booksGoal), 100);
};
