import 'dotenv/config';
import { loadConfig, getPublicConfig } from './config/config';
import { createLogger } from './obs/logger';
import { ReadingCache } from './reading/cache';
import { ReadingService, createHttpSources } from './reading/service';
import { createApp } from './app';

const config = loadConfig();
const logger = createLogger(config);
logger.info('Config loaded', {
  environment: config.environment,
  ...getPublicConfig(config),
});

if (!config.sources.feedUrl) {
  logger.warn('READING_FEED_URL is not set; /trmnl-data will answer with a configuration placeholder');
}

const cache = new ReadingCache({
  bookTtlMs: config.cache.bookTtlMs,
  challengeTtlMs: config.cache.challengeTtlMs,
});
const service = new ReadingService({ sources: createHttpSources(config), cache, logger });
const app = createApp({ config, service, logger });

const port = config.server.port;

app.listen(port, () => {
  logger.info('Server listening', { url: `http://localhost:${port}` });
});
