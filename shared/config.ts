import { z } from 'zod';

export const PLACEHOLDER_MARKERS = ['YOUR_USER_ID', 'YOUR_RSS_KEY'];

const isValidTimeZone = (value: string): boolean => {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: value });
    return true;
  } catch {
    return false;
  }
};

export const ConfigSchema = z.object({
  environment: z.enum(['development', 'test', 'production']),
  server: z.object({
    port: z.number().int().positive().max(65535),
  }),
  sources: z.object({
    feedUrl: z.string().url().optional(),
    profileUserId: z.string().regex(/^\d+$/).optional(),
    profileBaseUrl: z.string().url(),
    fetchTimeoutMs: z.number().int().positive(),
    userAgent: z.string().min(1),
  }),
  cache: z.object({
    bookTtlMs: z.number().int().nonnegative(),
    challengeTtlMs: z.number().int().nonnegative(),
  }),
  display: z.object({
    timeZone: z.string().min(1).refine(isValidTimeZone, { message: 'Unknown IANA time zone' }),
  }),
  observability: z.object({
    logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export interface PublicConfig {
  feedConfigured: boolean;
  profileConfigured: boolean;
  cache: {
    bookTtlMs: number;
    challengeTtlMs: number;
  };
}

export const isPlaceholder = (value: string | undefined | null): boolean =>
  !value || PLACEHOLDER_MARKERS.some((marker) => value.includes(marker));

export const isFeedConfigured = (config: AppConfig): boolean => Boolean(config.sources.feedUrl);

export const isProfileConfigured = (config: AppConfig): boolean => Boolean(config.sources.profileUserId);

export const getPublicConfig = (config: AppConfig): PublicConfig => ({
  feedConfigured: isFeedConfigured(config),
  profileConfigured: isProfileConfigured(config),
  cache: {
    bookTtlMs: config.cache.bookTtlMs,
    challengeTtlMs: config.cache.challengeTtlMs,
  },
});
