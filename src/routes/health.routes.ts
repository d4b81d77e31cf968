import { Router, Request, Response, NextFunction } from 'express';

import Paths from '@src/common/constants/Paths';
import HttpStatusCodes from '@src/common/constants/HttpStatusCodes';
import { verifyApiKey, type LlmClient } from '@src/config/openai';

/**
 * GET /api/health/llm: checks the language-model credential by listing models.
 */
export function createHealthRouter(client: LlmClient, model: string): Router {
  const router = Router();

  router.get(Paths.Health.Llm, async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const check = await verifyApiKey(client);
      if (check.ok) {
        res.json({ ok: true, model });
        return;
      }
      res.status(HttpStatusCodes.BAD_GATEWAY).json({ ok: false, model, error: check.message });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
