import OpenAI from 'openai';
import { z } from 'zod';
import logger from 'jet-logger';

import type { LlmClient } from '@src/config/openai';
import type { ComparisonVerdict, DocumentText, MasterRecord } from '@src/types/validation';
import { COMPARISON_SYSTEM_PROMPT, buildComparisonMessage } from '@src/util/comparisonPrompt';
import { isFormattingOnlyDifference } from '@src/util/valueNormalization';
import { withTimeout } from '@src/util/async-utils';
import {
  ComparatorResponseMalformedError,
  ComparatorServiceError,
  errorMessage,
} from './errors';

// ============================================
// RESPONSE SCHEMA
// ============================================

const cellValueSchema = z
  .union([z.string(), z.number(), z.boolean(), z.null()])
  .transform((value) => (value === null ? '' : String(value).trim()));

const discrepancySchema = z.object({
  field: z.string().trim().min(1),
  masterValue: cellValueSchema,
  documentValue: cellValueSchema,
  explanation: z.string().trim().min(1),
});

const verdictSchema = z.object({
  discrepancies: z.array(discrepancySchema),
});

/**
 * Strict parse of the model's answer. Anything but the agreed JSON shape is
 * a ComparatorResponseMalformedError, never an empty verdict.
 */
export function parseVerdict(raw: string | null | undefined, filename?: string): ComparisonVerdict {
  const content = (raw ?? '')
    .trim()
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```$/, '')
    .trim();

  if (!content) {
    throw new ComparatorResponseMalformedError('Model returned an empty response', raw ?? '', filename);
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new ComparatorResponseMalformedError(
      `Model response is not valid JSON: ${errorMessage(error)}`,
      content,
      filename,
      { cause: error },
    );
  }

  const result = verdictSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ComparatorResponseMalformedError(
      `Model response does not match the discrepancy schema (${issues})`,
      content,
      filename,
    );
  }

  return { discrepancies: result.data.discrepancies };
}

// ============================================
// COMPARATOR
// ============================================

export interface ComparatorOptions {
  model: string;
  timeoutMs: number;
  /** Characters of document text sent to the model */
  promptTextLimit: number;
  temperature?: number;
  maxTokens?: number;
}

export interface RecordComparator {
  compareRecord(document: DocumentText, record: MasterRecord): Promise<ComparisonVerdict>;
}

export class DiscrepancyComparator implements RecordComparator {
  private readonly client: LlmClient;
  private readonly options: Required<ComparatorOptions>;

  constructor(client: LlmClient, options: ComparatorOptions) {
    this.client = client;
    this.options = {
      temperature: 0,
      maxTokens: 1500,
      ...options,
    };
  }

  async compareRecord(document: DocumentText, record: MasterRecord): Promise<ComparisonVerdict> {
    const { filename } = document;
    const content = await this.requestComparison(document, record);
    const verdict = parseVerdict(content, filename);

    const kept = verdict.discrepancies.filter(
      (d) => !isFormattingOnlyDifference(d.masterValue, d.documentValue),
    );

    const dropped = verdict.discrepancies.length - kept.length;
    if (dropped > 0) {
      logger.info(`🧹 ${filename}: dropped ${dropped} formatting-only difference(s)`);
    }

    return { discrepancies: kept };
  }

  private async requestComparison(document: DocumentText, record: MasterRecord): Promise<string | null> {
    const { model, timeoutMs, promptTextLimit, temperature, maxTokens } = this.options;
    const { filename } = document;

    try {
      const completion = await withTimeout(
        (signal) =>
          this.client.chat.completions.create(
            {
              model,
              temperature,
              max_tokens: maxTokens,
              response_format: { type: 'json_object' },
              messages: [
                { role: 'system', content: COMPARISON_SYSTEM_PROMPT },
                { role: 'user', content: buildComparisonMessage(document.text, record, promptTextLimit) },
              ],
            },
            { signal, timeout: timeoutMs },
          ),
        timeoutMs,
        () => new ComparatorServiceError(`Comparison timed out after ${timeoutMs}ms`, filename),
      );

      const choice = completion.choices[0];
      if (!choice) {
        throw new ComparatorResponseMalformedError('Model returned no choices', '', filename);
      }
      return choice.message.content;
    } catch (error) {
      throw toComparatorError(error, filename);
    }
  }
}

function toComparatorError(error: unknown, filename: string): Error {
  if (error instanceof ComparatorServiceError || error instanceof ComparatorResponseMalformedError) {
    return error;
  }

  if (error instanceof OpenAI.APIError) {
    const status = typeof error.status === 'number' ? error.status : undefined;
    const label = status ? `Language-model service error (HTTP ${status})` : 'Language-model service unreachable';
    return new ComparatorServiceError(`${label}: ${error.message}`, filename, { cause: error, status });
  }

  return new ComparatorServiceError(`Error during comparison: ${errorMessage(error)}`, filename, {
    cause: error,
  });
}
