import type { AppConfig } from '../../shared/config';
import { fetchText } from './http';

export const buildProfileUrl = (config: AppConfig): string | null => {
  const userId = config.sources.profileUserId;
  if (!userId) return null;
  const base = config.sources.profileBaseUrl.endsWith('/')
    ? config.sources.profileBaseUrl
    : `${config.sources.profileBaseUrl}/`;
  return `${base}${encodeURIComponent(userId)}`;
};

/** Raw profile page HTML, or null when no profile is configured. */
export const fetchProfilePage = async (config: AppConfig): Promise<string | null> => {
  const url = buildProfileUrl(config);
  if (!url) return null;
  return fetchText(url, {
    timeoutMs: config.sources.fetchTimeoutMs,
    userAgent: config.sources.userAgent,
  });
};
