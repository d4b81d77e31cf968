import morgan from 'morgan';
import helmet from 'helmet';
import cors from 'cors';
import multer from 'multer';
import express, { Express, Request, Response, NextFunction } from 'express';
import rateLimit from 'express-rate-limit';
import logger from 'jet-logger';

import { createApiRouter } from '@src/routes';

import Paths from '@src/common/constants/Paths';
import { allowedOrigins, type Env } from '@src/common/constants/ENV';
import HttpStatusCodes from '@src/common/constants/HttpStatusCodes';
import { RouteError } from '@src/common/util/route-errors';
import { NodeEnvs } from '@src/common/constants';
import type { LlmClient } from '@src/config/openai';
import { pdfTextExtractor, type TextExtractor } from '@src/services/textExtractor';
import { RunStore } from '@src/services/runStore';

export interface ServerOptions {
  env: Env;
  client: LlmClient;
  extractor?: TextExtractor;
  runStore?: RunStore;
}

/******************************************************************************
                                Setup
******************************************************************************/

export function createServer(options: ServerOptions): Express {
  const { env, client } = options;
  const extractor = options.extractor ?? pdfTextExtractor;
  const runStore = options.runStore ?? new RunStore(env.RUN_TTL_SECONDS);

  const app = express();

  /** ******** Middleware ******** **/

  app.use(express.urlencoded({ extended: true }));
  app.use(express.json({ limit: '1mb' }));

  // CORS
  const allowed = allowedOrigins(env);
  app.use(
    cors({
      origin: (origin, cb) => {
        if (!origin || allowed.includes(origin)) return cb(null, true);
        return cb(new RouteError(HttpStatusCodes.BAD_REQUEST, 'Not allowed by CORS'));
      },
    }),
  );

  // Show routes called in console during development
  if (env.NODE_ENV === NodeEnvs.Dev) {
    app.use(morgan('dev'));
  }

  // Rate limiting
  const limiter = rateLimit({
    windowMs: 15 * 60 * 1000, // 15 minutes
    max: env.RATE_LIMIT_MAX_REQUESTS,
    standardHeaders: true,
    legacyHeaders: false,
    message: 'Too many requests from this IP, please try again later.',
  });
  app.use(Paths.Base, limiter);

  // Validation runs call the language model once per document
  const aiLimiter = rateLimit({
    windowMs: 60 * 60 * 1000, // 1 hour
    max: env.AI_RATE_LIMIT_MAX_REQUESTS,
    message: 'Too many validation runs, please try again later.',
  });
  app.post(`${Paths.Base}${Paths.Validation.Base}${Paths.Validation.Runs}`, aiLimiter);

  // Security
  if (env.NODE_ENV === NodeEnvs.Production) {
    app.use(helmet());
  }

  /** ******** Routes ******** **/

  app.use(Paths.Base, createApiRouter({ client, env, extractor, runStore }));

  // Liveness
  app.get('/health', (_: Request, res: Response) => {
    res.json({ ok: true, model: env.OPENAI_MODEL });
  });

  /** ******** Error handler ******** **/
  app.use((err: Error, _: Request, res: Response, next: NextFunction) => {
    if (env.NODE_ENV !== NodeEnvs.Test) {
      logger.err(err, true);
    }
    if (res.headersSent) {
      return next(err);
    }

    let status = HttpStatusCodes.BAD_REQUEST;
    if (err instanceof RouteError) {
      status = err.status;
    } else if (err instanceof multer.MulterError && err.code === 'LIMIT_FILE_SIZE') {
      status = HttpStatusCodes.PAYLOAD_TOO_LARGE;
    }
    res.status(status).json({ error: err.message });
  });

  return app;
}
