import OpenAI from 'openai';
import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import logger from 'jet-logger';

import { requireApiKey, type Env } from '@src/common/constants/ENV';

/**
 * The slice of the OpenAI SDK the validator uses. The real client satisfies it;
 * tests hand in a fake.
 */
export interface LlmClient {
  chat: {
    completions: {
      create(
        body: ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal; timeout?: number; maxRetries?: number },
      ): PromiseLike<LlmCompletion>;
    };
  };
  models: {
    list(): PromiseLike<unknown>;
  };
}

export interface LlmCompletion {
  choices: Array<{
    message: { content: string | null };
    finish_reason?: string | null;
  }>;
}

/**
 * Build the single OpenAI client for the process.
 * Throws ConfigurationError when the key is missing.
 */
export function createLlmClient(env: Pick<Env, 'OPENAI_API_KEY' | 'COMPARATOR_TIMEOUT_MS'>): LlmClient {
  const apiKey = requireApiKey(env);

  const client = new OpenAI({
    apiKey,
    timeout: env.COMPARATOR_TIMEOUT_MS,
    maxRetries: 1,
  });

  logger.info(`🤖 OpenAI client ready (timeout: ${env.COMPARATOR_TIMEOUT_MS}ms)`);
  return client;
}

/**
 * Cheap credential check: list models once.
 */
export async function verifyApiKey(client: LlmClient): Promise<{ ok: true } | { ok: false; message: string }> {
  try {
    await client.models.list();
    return { ok: true };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn(`⚠️ API key check failed: ${message}`);
    return { ok: false, message };
  }
}
