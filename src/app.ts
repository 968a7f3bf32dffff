import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { CrawlerController } from './controllers/crawler.controller';
import { getErrorStatus } from './errors/http-error';
import { createCrawlerRouter } from './routes/crawler.route';
import type { CrawlOrchestrator } from './services/crawlOrchestrator.service';
import { logger } from './utils/logger';

export interface ServerDependencies {
  orchestrator: CrawlOrchestrator;
  appName: string;
  version: string;
}

export function createServer({ orchestrator, appName, version }: ServerDependencies) {
  const app = express();

  app.use(cors({
    origin: true,
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  }));

  app.use(express.json({ limit: '1mb' }));

  app.get('/', (_req, res) => {
    res.json({ app: appName, version, status: 'running' });
  });

  app.get('/health', (_req, res) => {
    res.json({ status: 'healthy', app: appName, version, uptime: process.uptime() });
  });

  app.use('/api/v1/crawlers', createCrawlerRouter(new CrawlerController(orchestrator)));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ success: false, error: 'Not found' });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = getErrorStatus(err) ?? 500;
    // body-parser errors carry a 4xx status, e.g. malformed JSON
    if (status < 500) {
      logger.warn('Rejected request', { status, error: err instanceof Error ? err.message : err });
      res.status(status).json({ success: false, error: 'Invalid request body' });
      return;
    }
    logger.error('Unhandled error', { error: err });
    res.status(500).json({ success: false, error: 'Internal server error' });
  });

  return app;
}
