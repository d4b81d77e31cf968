import { Router } from 'express';

import Paths from '@src/common/constants/Paths';
import { createValidationRouter, type ValidationRouterDeps } from './validation.routes';
import { createHealthRouter } from './health.routes';

/******************************************************************************
                                Setup
******************************************************************************/

// Root API router (mounted at /api in server.ts)
export function createApiRouter(deps: ValidationRouterDeps): Router {
  const apiRouter = Router();

  apiRouter.use(Paths.Validation.Base, createValidationRouter(deps)); // → /api/validation/...
  apiRouter.use(Paths.Health.Base, createHealthRouter(deps.client, deps.env.OPENAI_MODEL)); // → /api/health/...

  return apiRouter;
}
