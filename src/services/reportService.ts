import Papa from 'papaparse';
import { format } from 'date-fns';

import type { OutcomeStatus, ProcessingOutcome } from '@src/types/validation';

export type ReportScope = 'all' | 'issues';
export type StatusFilter = OutcomeStatus | 'issues';
export type SortKey = 'file' | 'patientId' | 'status' | 'issueCount';
export type SortOrder = 'asc' | 'desc';

export const REPORT_SCOPES: readonly ReportScope[] = ['all', 'issues'];
export const STATUS_FILTERS: readonly StatusFilter[] = [
  'clean',
  'discrepancies',
  'identifier_not_found',
  'master_record_not_found',
  'error',
  'issues',
];
export const SORT_KEYS: readonly SortKey[] = ['file', 'patientId', 'status', 'issueCount'];
export const SORT_ORDERS: readonly SortOrder[] = ['asc', 'desc'];

export const REPORT_COLUMNS = [
  'File',
  'Patient ID',
  'Status',
  'Field',
  'Master Value',
  'Document Value',
  'Explanation',
] as const;

type ReportColumn = (typeof REPORT_COLUMNS)[number];
export type ReportRow = Record<ReportColumn, string>;

const STATUS_LABELS: Record<OutcomeStatus, string> = {
  clean: 'Clean',
  discrepancies: 'Data Error',
  identifier_not_found: 'Identifier Not Found',
  master_record_not_found: 'Not In Master Data',
  error: 'Error',
};

const NOT_FOUND = 'Not Found';

export interface ResultsTableRow {
  file: string;
  patientId: string;
  status: OutcomeStatus;
  statusLabel: string;
  issueCount: number;
  details: string;
}

export interface TableQuery {
  status?: StatusFilter;
  sortBy?: SortKey;
  order?: SortOrder;
}

export function statusLabel(status: OutcomeStatus): string {
  return STATUS_LABELS[status];
}

function isIssue(outcome: ProcessingOutcome): boolean {
  return outcome.status !== 'clean';
}

function issueCount(outcome: ProcessingOutcome): number {
  switch (outcome.status) {
    case 'clean':
      return 0;
    case 'discrepancies':
      return outcome.discrepancies.length;
    default:
      return 1;
  }
}

/** Human-readable reason for an outcome that has no discrepancy list */
function reasonFor(outcome: ProcessingOutcome): string {
  switch (outcome.status) {
    case 'clean':
      return 'No discrepancies';
    case 'discrepancies':
      return outcome.discrepancies
        .map((d) => `${d.field}: "${d.masterValue}" vs "${d.documentValue}"`)
        .join('; ');
    case 'identifier_not_found':
      return 'Patient ID not found in PDF';
    case 'master_record_not_found':
      return `Patient ID ${outcome.patientId} not found in master data`;
    case 'error':
      return `${outcome.error.kind}: ${outcome.error.message}`;
  }
}

// ============================================
// RESULTS TABLE
// ============================================

function compareRows(a: ResultsTableRow, b: ResultsTableRow, sortBy: SortKey): number {
  switch (sortBy) {
    case 'issueCount':
      return a.issueCount - b.issueCount;
    case 'file':
      return a.file.localeCompare(b.file);
    case 'patientId':
      return a.patientId.localeCompare(b.patientId, undefined, { numeric: true });
    case 'status':
      return a.statusLabel.localeCompare(b.statusLabel);
  }
}

/**
 * One row per outcome, optionally filtered and sorted. Ties keep input order.
 */
export function buildResultsTable(
  outcomes: readonly ProcessingOutcome[],
  query: TableQuery = {},
): ResultsTableRow[] {
  const { status, sortBy, order = 'asc' } = query;

  const filtered = outcomes.filter((outcome) => {
    if (!status) return true;
    if (status === 'issues') return isIssue(outcome);
    return outcome.status === status;
  });

  const rows: ResultsTableRow[] = filtered.map((outcome) => ({
    file: outcome.filename,
    patientId: outcome.patientId ?? NOT_FOUND,
    status: outcome.status,
    statusLabel: statusLabel(outcome.status),
    issueCount: issueCount(outcome),
    details: reasonFor(outcome),
  }));

  if (!sortBy) return rows;

  const direction = order === 'desc' ? -1 : 1;
  // Array.prototype.sort is stable
  return rows.sort((a, b) => direction * compareRows(a, b, sortBy));
}

// ============================================
// CSV REPORT
// ============================================

export function toReportRows(outcomes: readonly ProcessingOutcome[]): ReportRow[] {
  return outcomes.flatMap((outcome): ReportRow[] => {
    const base = {
      File: outcome.filename,
      'Patient ID': outcome.patientId ?? NOT_FOUND,
      Status: statusLabel(outcome.status),
    };

    if (outcome.status === 'discrepancies') {
      return outcome.discrepancies.map((d) => ({
        ...base,
        Field: d.field,
        'Master Value': d.masterValue,
        'Document Value': d.documentValue,
        Explanation: d.explanation,
      }));
    }

    return [
      {
        ...base,
        Field: '',
        'Master Value': '',
        'Document Value': '',
        Explanation: reasonFor(outcome),
      },
    ];
  });
}

/**
 * CSV text of the report. `issues` leaves out clean documents.
 */
export function buildCsvReport(outcomes: readonly ProcessingOutcome[], scope: ReportScope = 'all'): string {
  const selected = scope === 'issues' ? outcomes.filter(isIssue) : outcomes;
  const rows = toReportRows(selected);

  return Papa.unparse(
    {
      fields: [...REPORT_COLUMNS],
      data: rows.map((row) => REPORT_COLUMNS.map((column) => row[column])),
    },
    { newline: '\n' },
  );
}

export function reportFilename(scope: ReportScope, date: Date = new Date()): string {
  const prefix = scope === 'issues' ? 'errors_only' : 'validation_report';
  return `${prefix}_${format(date, 'yyyyMMdd_HHmmss')}.csv`;
}
