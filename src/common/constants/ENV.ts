import { z } from 'zod';

import { NodeEnvs } from '@src/common/constants';
import { ConfigurationError } from '@src/services/errors';

/**
 * Environment variables, validated once at startup.
 * Missing optional values fall back to the defaults below.
 */
const envSchema = z.object({
  NODE_ENV: z.nativeEnum(NodeEnvs).default(NodeEnvs.Dev),
  PORT: z.coerce.number().int().positive().default(3000),

  // Language-model service
  OPENAI_API_KEY: z.string().trim().optional(),
  OPENAI_MODEL: z.string().trim().min(1).default('gpt-4o-mini'),
  COMPARATOR_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  COMPARATOR_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(1),
  PROMPT_TEXT_LIMIT: z.coerce.number().int().positive().default(3800),

  // Uploads & runs
  MAX_UPLOAD_MB: z.coerce.number().positive().default(10),
  RUN_TTL_SECONDS: z.coerce.number().int().positive().default(60 * 60),

  // HTTP
  ALLOWED_ORIGINS: z.string().default('http://localhost:4200'),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(100),
  AI_RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(20),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parse an environment map. Every invalid variable is listed in the
 * ConfigurationError's issues.
 */
export function readEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`,
    );
    throw new ConfigurationError('Invalid environment configuration', issues);
  }

  return result.data;
}

export function requireApiKey(env: Pick<Env, 'OPENAI_API_KEY'>): string {
  if (!env.OPENAI_API_KEY) {
    throw new ConfigurationError(
      'OPENAI_API_KEY is not set. Add it to your .env file or the process environment.',
      ['OPENAI_API_KEY: Required'],
    );
  }
  return env.OPENAI_API_KEY;
}

export function allowedOrigins(env: Pick<Env, 'ALLOWED_ORIGINS'>): string[] {
  return env.ALLOWED_ORIGINS
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}
