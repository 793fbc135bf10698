// ═══════════════════════════════════════════════════════════════════════════════
// ASK ROUTES — POST /ask
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import type { Dispatcher } from '../../core/rules/dispatcher.js';
import type { DispatchResult } from '../../core/rules/types.js';
import { AskRequestSchema, type AskResponse } from '../schemas/ask.js';
import { getLogger } from '../../logging/index.js';

const logger = getLogger({ component: 'ask-routes' });

/**
 * The exit rule has no meaning over HTTP: it answers with no lines and the
 * server keeps running.
 */
export function toAskResponse(result: DispatchResult): AskResponse {
  switch (result.kind) {
    case 'exit':
      return { kind: 'exit', answers: [], rule: result.rule };
    case 'no-match':
      return { kind: 'no-match', answers: result.answers };
    case 'diagnostic':
      return { kind: 'diagnostic', answers: result.answers, rule: result.rule, errorCode: result.error.code };
    case 'empty':
    case 'answers':
      return { kind: result.kind, answers: result.answers, rule: result.rule };
  }
}

export function createAskHandler(dispatcher: Dispatcher) {
  return async (req: Request, res: Response): Promise<void> => {
    const requestId = uuidv4();
    const startTime = Date.now();
    const requestLogger = logger.child({ requestId });

    try {
      const { question } = AskRequestSchema.parse(req.body);
      const result = await dispatcher.dispatch(question);

      requestLogger.time('Question answered', startTime, { kind: result.kind });
      res.json(toAskResponse(result));
    } catch (error) {
      if (error instanceof z.ZodError) {
        res.status(400).json({
          error: 'Invalid question',
          details: error.errors,
        });
        return;
      }

      requestLogger.error('Question failed', error);
      res.status(500).json({ error: 'Question failed', requestId });
    }
  };
}

export function createAskRouter(dispatcher: Dispatcher): Router {
  const router = Router();

  /**
   * POST /ask
   * Body: { question: string }
   */
  router.post('/', createAskHandler(dispatcher));

  return router;
}
