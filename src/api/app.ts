// ═══════════════════════════════════════════════════════════════════════════════
// EXPRESS APP — JSON API around a Query Engine
// ═══════════════════════════════════════════════════════════════════════════════

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import type { QueryEngine } from '../bootstrap.js';
import { createApiRouter } from './routes/index.js';
import { getLogger } from '../logging/index.js';

const logger = getLogger({ component: 'http' });

const BODY_ERRORS: Record<number, string> = {
  400: 'Malformed JSON body',
  413: 'Request body too large',
};

export function createApp(engine: QueryEngine): Express {
  const app = express();

  app.set('trust proxy', engine.config.server.trustProxy);
  app.use(express.json({ limit: '16kb' }));

  app.use((req: Request, res: Response, next: NextFunction) => {
    const startTime = Date.now();
    res.on('finish', () => {
      logger.time(`${req.method} ${req.path} ${res.statusCode}`, startTime);
    });
    next();
  });

  app.use('/api/v1', createApiRouter(engine));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Body parser failures carry their own status: malformed JSON, oversized body
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = clientErrorStatus(error);
    if (status !== undefined) {
      logger.warn('Rejected request body', { status, reason: error instanceof Error ? error.message : String(error) });
      res.status(status).json({ error: BODY_ERRORS[status] ?? 'Invalid request body' });
      return;
    }
    logger.error('Unhandled request error', error);
    res.status(500).json({ error: 'Internal error' });
  });

  return app;
}

function clientErrorStatus(error: unknown): number | undefined {
  if (error instanceof SyntaxError) return 400;
  if (typeof error !== 'object' || error === null || !('status' in error)) return undefined;
  const { status } = error;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}
