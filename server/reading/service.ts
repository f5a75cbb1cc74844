import type { AppConfig } from '../../shared/config';
import type { Logger } from '../obs/logger';
import { errorMessage } from '../obs/logger';
import type { BookGroups, CanonicalBook, ChallengeState, FeedEntry } from './types';
import { NO_CURRENT_BOOK_TITLE } from './types';
import { ReadingCache } from './cache';
import { collectBookGroups, summarizeGroups } from './collect';
import { selectCurrentGroup, fuseBookGroup } from './fusion';
import { findChallengeInFeed, findChallengeInProfile, formatChallenge } from './challenge';
import { fetchFeed } from '../sources/feed';
import { fetchProfilePage } from '../sources/profile';

/** Where feed entries and profile HTML come from; swapped for fakes in tests. */
export interface ReadingSources {
  loadFeed: () => Promise<FeedEntry[]>;
  loadProfile: () => Promise<string | null>;
}

export const createHttpSources = (config: AppConfig): ReadingSources => ({
  loadFeed: () => fetchFeed(config),
  loadProfile: () => fetchProfilePage(config),
});

export const buildFallbackBook = (): CanonicalBook => ({
  title: NO_CURRENT_BOOK_TITLE,
  author: 'Check your reading activity',
  progressPercent: 0,
  entriesCount: 0,
  entryKinds: [],
});

export interface ReadingSnapshot {
  groups: BookGroups;
  book: CanonicalBook | null;
}

export interface ReadingServiceOptions {
  sources: ReadingSources;
  cache: ReadingCache;
  logger: Logger;
}

export class ReadingService {
  private readonly sources: ReadingSources;
  readonly cache: ReadingCache;
  private readonly logger: Logger;

  constructor(options: ReadingServiceOptions) {
    this.sources = options.sources;
    this.cache = options.cache;
    this.logger = options.logger;
  }

  /** Feed entries, or an empty list when the upstream cannot be read. */
  async loadEntries(): Promise<FeedEntry[]> {
    try {
      const entries = await this.sources.loadFeed();
      this.logger.debug('Feed loaded', { entries: entries.length });
      return entries;
    } catch (error) {
      this.logger.warn('Feed unavailable', { error: errorMessage(error) });
      return [];
    }
  }

  /**
   * Fresh collection and fusion for inspection. The book slot is left alone;
   * the challenge is resolved through its own slot.
   */
  async snapshot(): Promise<ReadingSnapshot> {
    const entries = await this.loadEntries();
    const groups = collectBookGroups(entries);
    const selected = selectCurrentGroup(groups);
    if (!selected) {
      return { groups, book: null };
    }
    const fused = fuseBookGroup(selected.records);
    const challenge = await this.getChallenge(entries);
    return { groups, book: challenge ? { ...fused, challenge } : fused };
  }

  async getCurrentBook(): Promise<CanonicalBook> {
    const cached = this.cache.book.read();
    if (cached) {
      this.logger.debug('Book cache hit', { writtenAt: new Date(cached.writtenAt).toISOString() });
      return cached.value;
    }

    const entries = await this.loadEntries();
    const groups = collectBookGroups(entries);
    const selected = selectCurrentGroup(groups);
    const fused = selected ? fuseBookGroup(selected.records) : null;

    if (!selected || !fused) {
      this.logger.info('No current book found', { entries: entries.length });
      const fallback = buildFallbackBook();
      this.cache.book.write(fallback);
      return fallback;
    }

    const challenge = await this.getChallenge(entries);
    const book: CanonicalBook = challenge ? { ...fused, challenge } : fused;

    this.logger.info('Current book resolved', {
      groups: summarizeGroups(groups),
      selected: selected.normalizedTitle,
      title: book.title,
      author: book.author,
      progress: book.progressPercent,
      challenge: challenge ? formatChallenge(challenge) : null,
    });
    this.cache.book.write(book);
    return book;
  }

  /**
   * Challenge tally: feed descriptions first, then the profile page. A miss is
   * cached too, so the profile is not re-fetched until the slot expires.
   */
  async getChallenge(entries?: readonly FeedEntry[]): Promise<ChallengeState | null> {
    const cached = this.cache.challenge.read();
    if (cached) {
      this.logger.debug('Challenge cache hit', { found: cached.value !== null });
      return cached.value;
    }

    const feedEntries = entries ?? (await this.loadEntries());
    const fromFeed = findChallengeInFeed(feedEntries.map((entry) => entry.description));
    if (fromFeed) {
      this.logger.info('Challenge found in feed', { challenge: formatChallenge(fromFeed) });
      this.cache.challenge.write(fromFeed);
      return fromFeed;
    }

    const fromProfile = await this.challengeFromProfile();
    if (fromProfile) {
      this.logger.info('Challenge found on profile', { challenge: formatChallenge(fromProfile) });
    } else {
      this.logger.info('No challenge data found');
    }
    this.cache.challenge.write(fromProfile);
    return fromProfile;
  }

  private async challengeFromProfile(): Promise<ChallengeState | null> {
    try {
      const html = await this.sources.loadProfile();
      return html ? findChallengeInProfile(html) : null;
    } catch (error) {
      this.logger.warn('Profile page unavailable', { error: errorMessage(error) });
      return null;
    }
  }

  async refreshChallenge(): Promise<ChallengeState | null> {
    this.cache.challenge.clear();
    return this.getChallenge();
  }

  clearCache(): void {
    this.cache.clear();
    this.logger.info('Caches cleared');
  }
}
