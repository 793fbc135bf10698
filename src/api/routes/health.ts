// ═══════════════════════════════════════════════════════════════════════════════
// HEALTH ROUTES — GET /health
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';
import type { Dispatcher } from '../../core/rules/dispatcher.js';
import type { DocumentProvider } from '../../core/rules/types.js';

export const SERVICE_VERSION = '1.0.0';

export interface HealthCheck {
  status: 'healthy';
  timestamp: string;
  version: string;
  uptime: number;
  provider: string;
  rules: string[];
}

export function buildHealthCheck(dispatcher: Dispatcher, provider: DocumentProvider): HealthCheck {
  return {
    status: 'healthy',
    timestamp: new Date().toISOString(),
    version: SERVICE_VERSION,
    uptime: Math.round(process.uptime()),
    provider: provider.name,
    rules: dispatcher.rules.describe(),
  };
}

export function createHealthRouter(dispatcher: Dispatcher, provider: DocumentProvider): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json(buildHealthCheck(dispatcher, provider));
  });

  return router;
}
