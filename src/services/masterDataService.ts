import * as XLSX from 'xlsx';
import Papa from 'papaparse';
import { format } from 'date-fns';
import logger from 'jet-logger';

import type {
  DuplicateIdentifier,
  FieldValue,
  MasterIndex,
  MasterRecord,
} from '@src/types/validation';
import { ConfigurationError, errorMessage } from './errors';

export const PATIENT_ID_COLUMN = 'Patient ID';

export interface MasterPreview {
  sourceName: string;
  recordCount: number;
  rowCount: number;
  skippedRows: number;
  columns: readonly string[];
  duplicates: readonly DuplicateIdentifier[];
  rows: readonly MasterRecord[];
}

type RawTable = unknown[][];

// ============================================
// CELL NORMALISATION
// ============================================

/**
 * Spreadsheet cell → JSON-friendly value. Dates keep their time only when
 * it is not midnight.
 */
export function normalizeCell(value: unknown): FieldValue {
  if (value === null || value === undefined) return null;

  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) return null;
    const hasTime = value.getHours() !== 0 || value.getMinutes() !== 0 || value.getSeconds() !== 0;
    return format(value, hasTime ? 'yyyy-MM-dd HH:mm:ss' : 'yyyy-MM-dd');
  }

  if (typeof value === 'number' || typeof value === 'boolean') return value;

  const text = String(value).trim();
  return text === '' ? null : text;
}

function identifierOf(value: FieldValue): string {
  if (value === null) return '';
  return String(value).trim();
}

// ============================================
// FILE READERS
// ============================================

function readWorkbook(bytes: Uint8Array): RawTable {
  const workbook = XLSX.read(bytes, { type: 'array', cellDates: true });
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;

  if (!sheet) {
    throw new ConfigurationError('No sheets found in master data workbook');
  }

  return XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: null,
    blankrows: true,
    raw: true,
  });
}

function readCsv(bytes: Uint8Array): RawTable {
  const text = Buffer.from(bytes).toString('utf-8');
  const parsed = Papa.parse<string[]>(text, { skipEmptyLines: false });

  const fatal = parsed.errors.find((e) => e.type === 'Quotes');
  if (fatal) {
    throw new ConfigurationError(`Master data CSV is malformed: ${fatal.message} (row ${fatal.row ?? '?'})`);
  }

  return parsed.data;
}

function readTable(filename: string, bytes: Uint8Array): RawTable {
  const extension = filename.split('.').pop()?.toLowerCase();

  try {
    switch (extension) {
      case 'xlsx':
      case 'xls':
        return readWorkbook(bytes);
      case 'csv':
        return readCsv(bytes);
      default:
        throw new ConfigurationError(
          `Unsupported master data file type ".${extension ?? ''}". Use Excel (.xlsx, .xls) or CSV.`,
        );
    }
  } catch (error) {
    if (error instanceof ConfigurationError) throw error;
    throw new ConfigurationError(`Failed to read master data file: ${errorMessage(error)}`);
  }
}

// ============================================
// INDEX
// ============================================

/**
 * Read the master spreadsheet and index it by "Patient ID".
 *
 * Duplicate identifiers: the first row wins, later rows are reported in
 * `duplicates` and never matched.
 */
export function loadMasterData(filename: string, bytes: Uint8Array): MasterIndex {
  const table = readTable(filename, bytes);
  const [headerRow, ...dataRows] = table;

  if (!headerRow || headerRow.every((cell) => normalizeCell(cell) === null)) {
    throw new ConfigurationError('Master data file is empty');
  }

  const columns = headerRow.map((cell, i) => {
    const name = normalizeCell(cell);
    return name === null ? `Column ${i + 1}` : String(name);
  });

  const idIndex = columns.findIndex((c) => c.toLowerCase() === PATIENT_ID_COLUMN.toLowerCase());
  if (idIndex === -1) {
    throw new ConfigurationError(`Missing required column: "${PATIENT_ID_COLUMN}"`, [
      `Found columns: ${columns.join(', ')}`,
    ]);
  }

  const records = new Map<string, MasterRecord>();
  const duplicates = new Map<string, { keptRow: number; ignoredRows: number[] }>();
  let skippedRows = 0;
  let rowCount = 0;

  dataRows.forEach((row, i) => {
    const rowNumber = i + 2;
    const values = columns.map((_, c) => normalizeCell(row[c]));

    if (values.every((v) => v === null)) return;
    rowCount++;

    const patientId = identifierOf(values[idIndex] ?? null);
    if (!patientId) {
      skippedRows++;
      return;
    }

    const existing = records.get(patientId);
    if (existing) {
      const entry = duplicates.get(patientId) ?? { keptRow: existing.rowNumber, ignoredRows: [] };
      entry.ignoredRows.push(rowNumber);
      duplicates.set(patientId, entry);
      return;
    }

    const fields: Record<string, FieldValue> = {};
    columns.forEach((column, c) => {
      fields[column] = c === idIndex ? patientId : values[c] ?? null;
    });

    records.set(patientId, { patientId, fields, rowNumber });
  });

  if (records.size === 0) {
    throw new ConfigurationError(`Master data contains no rows with a "${PATIENT_ID_COLUMN}"`);
  }

  const duplicateList: DuplicateIdentifier[] = [...duplicates.entries()].map(([patientId, d]) => ({
    patientId,
    keptRow: d.keptRow,
    ignoredRows: d.ignoredRows,
  }));

  if (duplicateList.length > 0) {
    logger.warn(
      `⚠️ ${filename}: ${duplicateList.length} duplicate Patient ID(s), first row kept: ` +
        duplicateList.map((d) => d.patientId).join(', '),
    );
  }

  logger.info(`📋 Loaded ${records.size} master records from ${filename} (${columns.length} fields)`);

  return {
    sourceName: filename,
    columns,
    records,
    rowCount,
    skippedRows,
    duplicates: duplicateList,
  };
}

export function findMasterRecord(index: MasterIndex, patientId: string): MasterRecord | null {
  const key = patientId.trim();
  if (!key) return null;
  return index.records.get(key) ?? null;
}

export function previewMasterData(index: MasterIndex, limit = 5): MasterPreview {
  return {
    sourceName: index.sourceName,
    recordCount: index.records.size,
    rowCount: index.rowCount,
    skippedRows: index.skippedRows,
    columns: index.columns,
    duplicates: index.duplicates,
    rows: [...index.records.values()].slice(0, limit),
  };
}
