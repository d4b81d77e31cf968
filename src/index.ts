// Load env early
import 'dotenv/config';

import logger from 'jet-logger';

import { readEnv } from '@src/common/constants/ENV';
import { createLlmClient } from '@src/config/openai';
import { ConfigurationError } from '@src/services/errors';
import { createServer } from '@src/server';

/******************************************************************************
                             Start HTTP server
******************************************************************************/

function start(): void {
  const env = readEnv();
  const client = createLlmClient(env);
  const app = createServer({ env, client });

  app.listen(env.PORT, () => {
    logger.info(`🚀 Patient record validator listening on port ${env.PORT} (model: ${env.OPENAI_MODEL})`);
  });
}

try {
  start();
} catch (error) {
  if (error instanceof ConfigurationError) {
    logger.err(`❌ ${error.message}`);
    error.issues.forEach((issue) => logger.err(`   - ${issue}`));
    process.exit(1);
  }
  throw error;
}

// Crash hardening
process.on('unhandledRejection', (err) => logger.err(err, true));
process.on('uncaughtException', (err) => logger.err(err, true));
