import Papa from 'papaparse';
import { describe, expect, it } from 'vitest';

import {
  buildCsvReport,
  buildResultsTable,
  reportFilename,
  toReportRows,
} from '@src/services/reportService';
import type { ProcessingOutcome } from '@src/types/validation';

const outcomes: ProcessingOutcome[] = [
  { status: 'clean', filename: 'b.pdf', patientId: '2', matched: true, discrepancies: [] },
  {
    status: 'discrepancies',
    filename: 'a.pdf',
    patientId: '10',
    matched: true,
    discrepancies: [
      { field: 'Insurance', masterValue: 'BCBS', documentValue: 'Aetna', explanation: 'Different insurers' },
      { field: 'Amount', masterValue: '$100', documentValue: '$200', explanation: 'Different amounts, $100 vs $200' },
    ],
  },
  { status: 'identifier_not_found', filename: 'c.pdf', patientId: null, matched: false },
  {
    status: 'error',
    filename: 'd.pdf',
    patientId: null,
    matched: false,
    error: { kind: 'DocumentUnreadable', message: 'PDF is password-protected' },
  },
  { status: 'master_record_not_found', filename: 'e.pdf', patientId: '999', matched: false },
];

describe('buildResultsTable', () => {
  it('returns one row per outcome in input order', () => {
    const rows = buildResultsTable(outcomes);

    expect(rows.map((r) => r.file)).toEqual(['b.pdf', 'a.pdf', 'c.pdf', 'd.pdf', 'e.pdf']);
    expect(rows[1]).toEqual({
      file: 'a.pdf',
      patientId: '10',
      status: 'discrepancies',
      statusLabel: 'Data Error',
      issueCount: 2,
      details: 'Insurance: "BCBS" vs "Aetna"; Amount: "$100" vs "$200"',
    });
    expect(rows[2]?.patientId).toBe('Not Found');
  });

  it('filters by status', () => {
    expect(buildResultsTable(outcomes, { status: 'clean' }).map((r) => r.file)).toEqual(['b.pdf']);
    expect(buildResultsTable(outcomes, { status: 'error' }).map((r) => r.details)).toEqual([
      'DocumentUnreadable: PDF is password-protected',
    ]);
  });

  it('groups everything that is not clean under issues', () => {
    expect(buildResultsTable(outcomes, { status: 'issues' }).map((r) => r.file)).toEqual([
      'a.pdf',
      'c.pdf',
      'd.pdf',
      'e.pdf',
    ]);
  });

  it('sorts by file name', () => {
    expect(buildResultsTable(outcomes, { sortBy: 'file', order: 'desc' }).map((r) => r.file)).toEqual([
      'e.pdf',
      'd.pdf',
      'c.pdf',
      'b.pdf',
      'a.pdf',
    ]);
  });

  it('sorts patient IDs numerically', () => {
    const ids = buildResultsTable(outcomes, { status: 'issues', sortBy: 'patientId' }).map((r) => r.patientId);
    expect(ids).toEqual(['10', '999', 'Not Found', 'Not Found']);
  });

  it('keeps input order for equal keys', () => {
    const rows = buildResultsTable(outcomes, { sortBy: 'issueCount', order: 'desc' });
    expect(rows.map((r) => r.file)).toEqual(['a.pdf', 'c.pdf', 'd.pdf', 'e.pdf', 'b.pdf']);
  });
});

describe('toReportRows', () => {
  it('writes one row per discrepancy and one row per other outcome', () => {
    const rows = toReportRows(outcomes);

    expect(rows).toHaveLength(6);
    expect(rows[0]).toEqual({
      File: 'b.pdf',
      'Patient ID': '2',
      Status: 'Clean',
      Field: '',
      'Master Value': '',
      'Document Value': '',
      Explanation: 'No discrepancies',
    });
    expect(rows[2]).toEqual({
      File: 'a.pdf',
      'Patient ID': '10',
      Status: 'Data Error',
      Field: 'Amount',
      'Master Value': '$100',
      'Document Value': '$200',
      Explanation: 'Different amounts, $100 vs $200',
    });
    expect(rows[3]).toMatchObject({
      'Patient ID': 'Not Found',
      Status: 'Identifier Not Found',
      Explanation: 'Patient ID not found in PDF',
    });
    expect(rows[5]?.Explanation).toBe('Patient ID 999 not found in master data');
  });
});

describe('buildCsvReport', () => {
  it('writes the header and quotes values containing commas', () => {
    const lines = buildCsvReport(outcomes, 'all').split('\n');

    expect(lines[0]).toBe('File,Patient ID,Status,Field,Master Value,Document Value,Explanation');
    expect(lines[1]).toBe('b.pdf,2,Clean,,,,No discrepancies');
    expect(lines[3]).toBe('a.pdf,10,Data Error,Amount,$100,$200,"Different amounts, $100 vs $200"');
    expect(lines).toHaveLength(7);
  });

  it('leaves clean documents out of the issues export', () => {
    const all = Papa.parse<string[]>(buildCsvReport(outcomes, 'all')).data;
    const issues = Papa.parse<string[]>(buildCsvReport(outcomes, 'issues')).data;

    expect(issues).toHaveLength(6);
    expect(issues.some((row) => row[2] === 'Clean')).toBe(false);
    const allLines = all.map((row) => row.join('|'));
    for (const row of issues) {
      expect(allLines).toContain(row.join('|'));
    }
  });
});

describe('reportFilename', () => {
  const date = new Date(2024, 11, 1, 9, 5, 7);

  it('names the full report', () => {
    expect(reportFilename('all', date)).toBe('validation_report_20241201_090507.csv');
  });

  it('names the issues export', () => {
    expect(reportFilename('issues', date)).toBe('errors_only_20241201_090507.csv');
  });
});
