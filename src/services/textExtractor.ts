import { PDFParse } from 'pdf-parse';
import logger from 'jet-logger';

import type { DocumentText } from '@src/types/validation';
import { DocumentUnreadableError, errorMessage } from './errors';

export interface TextExtractor {
  extractText(filename: string, bytes: Uint8Array): Promise<DocumentText>;
}

/**
 * Translate pdf.js exception names into something an operator can act on.
 */
function describePdfFailure(error: unknown): string {
  const name = error instanceof Error ? error.name : '';

  switch (name) {
    case 'PasswordException':
      return 'PDF is password-protected';
    case 'InvalidPDFException':
      return 'File is not a valid PDF document';
    case 'FormatError':
      return 'PDF structure is corrupted';
    default:
      return `Unable to read PDF: ${errorMessage(error)}`;
  }
}

/**
 * Decode every page of a PDF and join the pages in document order.
 * Any decoding failure becomes a DocumentUnreadableError for this file only.
 */
export async function extractText(filename: string, bytes: Uint8Array): Promise<DocumentText> {
  if (bytes.byteLength === 0) {
    throw new DocumentUnreadableError('File is empty', filename);
  }

  // pdf.js may detach the buffer it is given, so hand it a copy
  const parser = new PDFParse({ data: new Uint8Array(bytes) });

  try {
    const result = await parser.getText();
    const pages = result.pages.map((page) => page.text);
    const text = pages.join('\n');

    if (text.trim() === '') {
      logger.warn(`⚠️ ${filename}: no text layer found (scanned PDF?)`);
    }

    return { filename, text, pageCount: pages.length };
  } catch (error) {
    throw new DocumentUnreadableError(describePdfFailure(error), filename, { cause: error });
  } finally {
    await parser.destroy().catch((error: unknown) => {
      logger.warn(`⚠️ ${filename}: failed to release PDF parser: ${errorMessage(error)}`);
    });
  }
}

export const pdfTextExtractor: TextExtractor = { extractText };
