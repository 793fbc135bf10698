// ═══════════════════════════════════════════════════════════════════════════════
// ROUTES INDEX — API Route Registration
// ═══════════════════════════════════════════════════════════════════════════════
//
// Usage:
//   import { createApiRouter } from './api/routes/index.js';
//   app.use('/api/v1', createApiRouter(engine));
//
// ═══════════════════════════════════════════════════════════════════════════════

import { Router } from 'express';
import type { QueryEngine } from '../../bootstrap.js';
import { createAskRouter } from './ask.js';
import { createHealthRouter } from './health.js';

export { createAskRouter, createAskHandler, toAskResponse } from './ask.js';
export { createHealthRouter, buildHealthCheck, type HealthCheck } from './health.js';

export function createApiRouter(engine: Pick<QueryEngine, 'dispatcher' | 'provider'>): Router {
  const router = Router();
  router.use('/ask', createAskRouter(engine.dispatcher));
  router.use('/health', createHealthRouter(engine.dispatcher, engine.provider));
  return router;
}
