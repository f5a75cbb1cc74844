import {
  ConfigSchema,
  isPlaceholder,
  type AppConfig,
  type PublicConfig,
  getPublicConfig as getPublicConfigShared,
} from '../../shared/config';

const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

// Template values copied from the setup docs count as "not configured".
const stringFromEnv = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  if (!trimmed || isPlaceholder(trimmed)) {
    return undefined;
  }
  return trimmed;
};

const logLevelFromEnv = (value: string | undefined): AppConfig['observability']['logLevel'] => {
  const normalized = (value || 'info').trim().toLowerCase();
  if (normalized === 'debug' || normalized === 'warn' || normalized === 'error') {
    return normalized;
  }
  return 'info';
};

export type { AppConfig, PublicConfig };

let cachedConfig: AppConfig | null = null;

export const buildConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const environment = (env.NODE_ENV || 'development').trim().toLowerCase();

  const rawConfig = {
    environment: environment === 'production' ? 'production' : environment === 'test' ? 'test' : 'development',
    server: {
      port: numberFromEnv(env.PORT, 5050),
    },
    sources: {
      feedUrl: stringFromEnv(env.READING_FEED_URL),
      profileUserId: stringFromEnv(env.READING_PROFILE_USER_ID),
      profileBaseUrl: env.READING_PROFILE_BASE_URL?.trim() || 'https://www.goodreads.com/user/show/',
      fetchTimeoutMs: numberFromEnv(env.FETCH_TIMEOUT_MS, 15_000),
      userAgent:
        env.FETCH_USER_AGENT?.trim() ||
        // The profile host answers bare clients with a login wall
        'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0 Safari/537.36',
    },
    cache: {
      bookTtlMs: numberFromEnv(env.BOOK_CACHE_TTL_MS, 5 * 60 * 1000),
      challengeTtlMs: numberFromEnv(env.CHALLENGE_CACHE_TTL_MS, 30 * 60 * 1000),
    },
    display: {
      timeZone: env.DISPLAY_TIME_ZONE?.trim() || 'UTC',
    },
    observability: {
      logLevel: logLevelFromEnv(env.LOG_LEVEL),
    },
  };

  return ConfigSchema.parse(rawConfig);
};

export const loadConfig = (): AppConfig => {
  if (cachedConfig) {
    return cachedConfig;
  }
  cachedConfig = buildConfig();
  return cachedConfig;
};

export const getPublicConfig = (config: AppConfig = loadConfig()): PublicConfig => getPublicConfigShared(config);
