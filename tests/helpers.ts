import * as XLSX from 'xlsx';
import { vi } from 'vitest';

import type { LlmClient, LlmCompletion } from '@src/config/openai';
import type { TextExtractor } from '@src/services/textExtractor';
import { DocumentUnreadableError } from '@src/services/errors';
import type { DocumentText } from '@src/types/validation';

/** In-memory .xlsx built from rows, header first */
export function buildWorkbook(rows: unknown[][]): Uint8Array {
  const sheet = XLSX.utils.aoa_to_sheet(rows);
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, sheet, 'Patients');
  const buffer: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  return new Uint8Array(buffer);
}

export function completion(content: string | null): LlmCompletion {
  return { choices: [{ message: { content }, finish_reason: 'stop' }] };
}

export function noDiscrepancies(): LlmCompletion {
  return completion(JSON.stringify({ discrepancies: [] }));
}

type CreateFn = LlmClient['chat']['completions']['create'];

/** LlmClient whose completions come from `respond` */
export function fakeClient(respond: CreateFn) {
  const create = vi.fn(respond);
  const list = vi.fn(async (): Promise<unknown> => ({ data: [] }));
  const client: LlmClient = {
    chat: { completions: { create } },
    models: { list },
  };
  return { client, create, list };
}

/**
 * Extractor that returns the text registered for each filename; the bytes are
 * ignored. Unknown filenames are unreadable.
 */
export function fakeExtractor(texts: Record<string, string>): TextExtractor {
  return {
    async extractText(filename: string): Promise<DocumentText> {
      const text = texts[filename];
      if (text === undefined) {
        throw new DocumentUnreadableError('File is not a valid PDF document', filename);
      }
      return { filename, text, pageCount: 1 };
    },
  };
}

export function pdfBytes(label: string): Uint8Array {
  return new Uint8Array(Buffer.from(`%PDF-1.4 ${label}`));
}
