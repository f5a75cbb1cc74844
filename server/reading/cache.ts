import type { CanonicalBook, ChallengeState } from './types';
import type { CacheStatusPayload, SlotStatusPayload } from '../../shared/types';
import { formatChallenge } from './challenge';

export interface CacheEntry<T> {
  value: T;
  writtenAt: number;
}

/**
 * Single-value time-boxed slot. The value may itself be null, which caches a
 * "not found" answer for the whole TTL.
 */
export class TtlSlot<T> {
  private entry: CacheEntry<T> | null = null;

  constructor(readonly ttlMs: number) {}

  isValid(now: number = Date.now()): boolean {
    return this.entry !== null && now - this.entry.writtenAt < this.ttlMs;
  }

  read(now: number = Date.now()): CacheEntry<T> | undefined {
    if (!this.entry || !this.isValid(now)) {
      return undefined;
    }
    return this.entry;
  }

  write(value: T, now: number = Date.now()): CacheEntry<T> {
    this.entry = { value, writtenAt: now };
    return this.entry;
  }

  clear(): void {
    this.entry = null;
  }

  status(now: number = Date.now()): SlotStatusPayload {
    return {
      valid: this.isValid(now),
      writtenAt: this.entry ? new Date(this.entry.writtenAt).toISOString() : null,
      ttlMs: this.ttlMs,
    };
  }
}

export interface ReadingCacheOptions {
  bookTtlMs: number;
  challengeTtlMs: number;
}

/** The two slots a process shares: the fused book and the challenge tally. */
export class ReadingCache {
  readonly book: TtlSlot<CanonicalBook>;
  readonly challenge: TtlSlot<ChallengeState | null>;

  constructor(options: ReadingCacheOptions) {
    this.book = new TtlSlot(options.bookTtlMs);
    this.challenge = new TtlSlot(options.challengeTtlMs);
  }

  clear(): void {
    this.book.clear();
    this.challenge.clear();
  }

  status(now: number = Date.now()): CacheStatusPayload {
    const challenge = this.challenge.read(now);
    return {
      book: this.book.status(now),
      challenge: this.challenge.status(now),
      cachedChallenge: challenge?.value ? formatChallenge(challenge.value) : null,
    };
  }
}
