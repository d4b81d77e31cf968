import type { ProcessingErrorKind } from '@src/services/errors';

// ============================================
// MASTER DATA
// ============================================

export type FieldValue = string | number | boolean | null;

export interface MasterRecord {
  readonly patientId: string;
  readonly fields: Readonly<Record<string, FieldValue>>;
  /** Spreadsheet row number, header row = 1 */
  readonly rowNumber: number;
}

export interface DuplicateIdentifier {
  readonly patientId: string;
  readonly keptRow: number;
  readonly ignoredRows: readonly number[];
}

export interface MasterIndex {
  readonly sourceName: string;
  readonly columns: readonly string[];
  readonly records: ReadonlyMap<string, MasterRecord>;
  readonly rowCount: number;
  readonly skippedRows: number;
  readonly duplicates: readonly DuplicateIdentifier[];
}

// ============================================
// DOCUMENTS & VERDICTS
// ============================================

export interface UploadedDocument {
  readonly filename: string;
  readonly bytes: Uint8Array;
}

export interface DocumentText {
  readonly filename: string;
  readonly text: string;
  readonly pageCount: number;
}

export interface Discrepancy {
  readonly field: string;
  readonly masterValue: string;
  readonly documentValue: string;
  readonly explanation: string;
}

export interface ComparisonVerdict {
  /** Empty when the model found nothing materially different */
  readonly discrepancies: readonly Discrepancy[];
}

// ============================================
// OUTCOMES
// ============================================

export type OutcomeStatus =
  | 'clean'
  | 'discrepancies'
  | 'identifier_not_found'
  | 'master_record_not_found'
  | 'error';

export interface OutcomeError {
  readonly kind: ProcessingErrorKind;
  readonly message: string;
}

interface OutcomeBase {
  readonly filename: string;
}

export interface CleanOutcome extends OutcomeBase {
  readonly status: 'clean';
  readonly patientId: string;
  readonly matched: true;
  readonly discrepancies: readonly Discrepancy[];
}

export interface DiscrepancyOutcome extends OutcomeBase {
  readonly status: 'discrepancies';
  readonly patientId: string;
  readonly matched: true;
  readonly discrepancies: readonly Discrepancy[];
}

export interface IdentifierNotFoundOutcome extends OutcomeBase {
  readonly status: 'identifier_not_found';
  readonly patientId: null;
  readonly matched: false;
}

export interface MasterRecordNotFoundOutcome extends OutcomeBase {
  readonly status: 'master_record_not_found';
  readonly patientId: string;
  readonly matched: false;
}

export interface ErrorOutcome extends OutcomeBase {
  readonly status: 'error';
  readonly patientId: string | null;
  readonly matched: boolean;
  readonly error: OutcomeError;
}

export type ProcessingOutcome =
  | CleanOutcome
  | DiscrepancyOutcome
  | IdentifierNotFoundOutcome
  | MasterRecordNotFoundOutcome
  | ErrorOutcome;

export interface RunSummary {
  readonly total: number;
  readonly clean: number;
  readonly withDiscrepancies: number;
  readonly errored: number;
  /** Identifier missing from the PDF, or not present in the master data */
  readonly unmatched: number;
}

export interface ValidationResult {
  readonly outcomes: readonly ProcessingOutcome[];
  readonly summary: RunSummary;
  readonly abandoned: boolean;
}

export interface ValidationRun extends ValidationResult {
  readonly runId: string;
  readonly createdAt: string;
  readonly masterFile: string;
}
