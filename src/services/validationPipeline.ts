import PQueue from 'p-queue';
import logger from 'jet-logger';

import type {
  CleanOutcome,
  DiscrepancyOutcome,
  DocumentText,
  ErrorOutcome,
  IdentifierNotFoundOutcome,
  MasterIndex,
  MasterRecordNotFoundOutcome,
  OutcomeError,
  ProcessingOutcome,
  RunSummary,
  UploadedDocument,
  ValidationResult,
} from '@src/types/validation';
import type { ProcessingErrorKind } from './errors';
import { ComparatorResponseMalformedError, errorMessage, isProcessingError } from './errors';
import { findPatientId } from './identifierExtractor';
import { findMasterRecord } from './masterDataService';
import type { TextExtractor } from './textExtractor';
import type { RecordComparator } from './discrepancyComparator';

/** Characters of a malformed model answer kept in the log */
export const RAW_RESPONSE_LOG_LIMIT = 500;

export interface PipelineDependencies {
  masterIndex: MasterIndex;
  extractor: TextExtractor;
  comparator: RecordComparator;
}

export interface ProgressEvent {
  completed: number;
  total: number;
  filename: string;
  status: ProcessingOutcome['status'];
}

export interface RunOptions {
  /** Documents in flight at once. 1 = strictly sequential */
  concurrency?: number;
  /** Abort to abandon the batch; documents already processed are kept */
  signal?: AbortSignal;
  onProgress?: (event: ProgressEvent) => void;
}

function toOutcomeError(error: unknown, fallback: ProcessingErrorKind): OutcomeError {
  if (isProcessingError(error)) {
    return { kind: error.kind, message: error.message };
  }
  return { kind: fallback, message: errorMessage(error) };
}

function errorOutcome(
  filename: string,
  patientId: string | null,
  matched: boolean,
  error: OutcomeError,
): ErrorOutcome {
  logger.warn(`[❌] ${filename}: ${error.kind} - ${error.message}`);
  return Object.freeze({ status: 'error', filename, patientId, matched, error: Object.freeze(error) });
}

/**
 * extract text → find identifier → match master row → compare.
 * Never rejects: every failure becomes this document's outcome.
 */
export async function processDocument(
  upload: UploadedDocument,
  deps: PipelineDependencies,
): Promise<ProcessingOutcome> {
  const { filename } = upload;

  let document: DocumentText;
  try {
    document = await deps.extractor.extractText(filename, upload.bytes);
  } catch (error) {
    return errorOutcome(filename, null, false, toOutcomeError(error, 'DocumentUnreadable'));
  }

  const patientId = findPatientId(document.text);
  if (!patientId) {
    logger.info(`[❌] ${filename}: No Patient ID found`);
    const outcome: IdentifierNotFoundOutcome = {
      status: 'identifier_not_found',
      filename,
      patientId: null,
      matched: false,
    };
    return Object.freeze(outcome);
  }

  const record = findMasterRecord(deps.masterIndex, patientId);
  if (!record) {
    logger.info(`[⚠️] ${filename}: Patient ID ${patientId} not in master data`);
    const outcome: MasterRecordNotFoundOutcome = {
      status: 'master_record_not_found',
      filename,
      patientId,
      matched: false,
    };
    return Object.freeze(outcome);
  }

  logger.info(`[🔍] ${filename} - Patient ID ${patientId}: checking for data errors...`);

  try {
    const verdict = await deps.comparator.compareRecord(document, record);
    const discrepancies = Object.freeze([...verdict.discrepancies]);

    if (discrepancies.length === 0) {
      const outcome: CleanOutcome = { status: 'clean', filename, patientId, matched: true, discrepancies };
      return Object.freeze(outcome);
    }

    const outcome: DiscrepancyOutcome = {
      status: 'discrepancies',
      filename,
      patientId,
      matched: true,
      discrepancies,
    };
    return Object.freeze(outcome);
  } catch (error) {
    if (error instanceof ComparatorResponseMalformedError) {
      logger.warn(`[🧾] ${filename}: raw model answer: ${error.rawResponse.slice(0, RAW_RESPONSE_LOG_LIMIT)}`);
    }
    return errorOutcome(filename, patientId, true, toOutcomeError(error, 'ComparatorServiceError'));
  }
}

export function summarize(outcomes: readonly ProcessingOutcome[]): RunSummary {
  let clean = 0;
  let withDiscrepancies = 0;
  let errored = 0;
  let unmatched = 0;

  for (const outcome of outcomes) {
    switch (outcome.status) {
      case 'clean':
        clean++;
        break;
      case 'discrepancies':
        withDiscrepancies++;
        break;
      case 'error':
        errored++;
        break;
      case 'identifier_not_found':
      case 'master_record_not_found':
        unmatched++;
        break;
    }
  }

  return { total: outcomes.length, clean, withDiscrepancies, errored, unmatched };
}

/**
 * Process a batch and return one outcome per document, in input order.
 */
export async function runValidation(
  documents: readonly UploadedDocument[],
  deps: PipelineDependencies,
  options: RunOptions = {},
): Promise<ValidationResult> {
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
  const queue = new PQueue({ concurrency });
  const total = documents.length;
  let completed = 0;

  logger.info(`🚀 Validating ${total} document(s) against ${deps.masterIndex.sourceName} (concurrency: ${concurrency})`);

  const results = await Promise.all(
    documents.map((upload) =>
      queue.add(async (): Promise<ProcessingOutcome | null> => {
        if (options.signal?.aborted) return null;

        const outcome = await processDocument(upload, deps);
        completed++;
        options.onProgress?.({ completed, total, filename: upload.filename, status: outcome.status });
        return outcome;
      }),
    ),
  );

  const outcomes = results.filter((r): r is ProcessingOutcome => r !== null);
  const abandoned = outcomes.length < total;
  const summary = summarize(outcomes);

  if (abandoned) {
    logger.warn(`⏹️ Batch abandoned after ${outcomes.length}/${total} document(s)`);
  }
  logger.info(
    `📊 Done: ${summary.clean} clean, ${summary.withDiscrepancies} with data errors, ` +
      `${summary.errored} failed, ${summary.unmatched} unmatched`,
  );

  return { outcomes: Object.freeze(outcomes), summary, abandoned };
}
