import cors from 'cors';
import express from 'express';
import type { Express, Request, Response } from 'express';
import { getPublicConfig, isFeedConfigured, type AppConfig } from '../shared/config';
import type { DebugRecordPayload } from '../shared/types';
import type { Logger } from './obs/logger';
import { errorMessage } from './obs/logger';
import type { ReadingService } from './reading/service';
import { summarizeGroups } from './reading/collect';
import { formatChallenge } from './reading/challenge';
import {
  configurationRequiredPayload,
  errorPayload,
  sampleDisplayPayload,
  toDisplayPayload,
} from './http/display';

export interface AppDependencies {
  config: AppConfig;
  service: ReadingService;
  logger: Logger;
  now?: () => Date;
}

export const createApp = ({ config, service, logger, now = () => new Date() }: AppDependencies): Express => {
  const app = express();
  const timeZone = config.display.timeZone;

  app.use(cors());

  if (config.observability.logLevel === 'debug') {
    app.use((req, res, next) => {
      const startedAt = Date.now();
      res.on('finish', () => {
        logger.debug('HTTP response', {
          method: req.method,
          path: req.originalUrl,
          status: res.statusCode,
          elapsedMs: Date.now() - startedAt,
        });
      });
      next();
    });
  }

  app.get('/api/healthz', (_req: Request, res: Response) => {
    res.json({ ok: true, ts: now().toISOString() });
  });

  app.get('/api/config', (_req: Request, res: Response) => {
    res.json(getPublicConfig(config));
  });

  app.get('/trmnl-data', async (_req: Request, res: Response) => {
    if (!isFeedConfigured(config)) {
      res.json(configurationRequiredPayload(now(), timeZone));
      return;
    }
    try {
      const book = await service.getCurrentBook();
      res.json(toDisplayPayload(book, now(), timeZone));
    } catch (error) {
      logger.error('Failed to build reading payload', { error: errorMessage(error) });
      res.status(500).json(errorPayload(now(), timeZone));
    }
  });

  app.get('/debug', async (_req: Request, res: Response) => {
    try {
      const { groups, book } = await service.snapshot();
      res.json({
        book_data: book,
        cache_status: service.cache.status(),
        raw_entries: summarizeGroups(groups),
        timestamp: now().toISOString(),
      });
    } catch (error) {
      logger.error('Debug snapshot failed', { error: errorMessage(error) });
      res.status(500).json({ error: errorMessage(error), timestamp: now().toISOString() });
    }
  });

  app.get('/debug-entries', async (_req: Request, res: Response) => {
    try {
      const { groups } = await service.snapshot();
      const entriesFound: Record<string, DebugRecordPayload[]> = {};
      for (const [title, records] of groups) {
        entriesFound[title] = records.map((record) => ({
          title: record.rawTitle,
          progress: record.progressPercent,
          type: record.kind,
          rss_title: record.entry.title,
          timestamp: record.timestamp ? record.timestamp.toISOString() : null,
        }));
      }
      res.json({ entries_found: entriesFound, timestamp: now().toISOString() });
    } catch (error) {
      logger.error('Debug entries failed', { error: errorMessage(error) });
      res.status(500).json({ error: errorMessage(error), timestamp: now().toISOString() });
    }
  });

  app.get('/test-challenge', async (_req: Request, res: Response) => {
    try {
      const challenge = await service.refreshChallenge();
      res.json({
        challenge_data: challenge ? formatChallenge(challenge) : null,
        cache_status: service.cache.status().challenge,
        timestamp: now().toISOString(),
      });
    } catch (error) {
      logger.error('Challenge lookup failed', { error: errorMessage(error) });
      res.status(500).json({ error: errorMessage(error), timestamp: now().toISOString() });
    }
  });

  app.get('/clear-cache', (_req: Request, res: Response) => {
    service.clearCache();
    res.json({ message: 'All caches cleared', timestamp: now().toISOString() });
  });

  app.get('/test-data', (_req: Request, res: Response) => {
    res.json(sampleDisplayPayload(now(), timeZone));
  });

  return app;
};
