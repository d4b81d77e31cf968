import { readdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import logger from 'jet-logger';

import type { UploadedDocument, ValidationResult } from '@src/types/validation';
import { ConfigurationError } from './errors';
import { loadMasterData } from './masterDataService';
import { runValidation, type RunOptions } from './validationPipeline';
import { buildCsvReport, reportFilename } from './reportService';
import type { TextExtractor } from './textExtractor';
import type { RecordComparator } from './discrepancyComparator';

export interface FolderValidationArgs {
  masterPath: string;
  folder: string;
  /** Defaults to validation_report_<timestamp>.csv in the current directory */
  outputPath?: string;
}

export interface FolderValidationResult extends ValidationResult {
  reportPath: string;
}

export function parseCliArgs(argv: readonly string[]): FolderValidationArgs {
  const [masterPath, folder, outputPath] = argv;
  if (!masterPath || !folder) {
    throw new ConfigurationError('Usage: validate-folder <master.xlsx> <pdf-folder> [output.csv]');
  }
  return { masterPath, folder, outputPath };
}

/** PDF files directly inside `folder`, sorted by name */
export async function listPdfFiles(folder: string): Promise<string[]> {
  const entries = await readdir(folder, { withFileTypes: true }).catch((error: unknown) => {
    throw new ConfigurationError(`Cannot read document folder "${folder}"`, [String(error)]);
  });

  return entries
    .filter((entry) => entry.isFile() && /\.pdf$/i.test(entry.name))
    .map((entry) => entry.name)
    .sort((a, b) => a.localeCompare(b));
}

/**
 * Validate every PDF in a folder against a master data file and write the
 * full CSV report.
 */
export async function validateFolder(
  args: FolderValidationArgs,
  deps: { extractor: TextExtractor; comparator: RecordComparator },
  options: RunOptions = {},
): Promise<FolderValidationResult> {
  let masterBytes: Buffer;
  try {
    masterBytes = await readFile(args.masterPath);
  } catch (error) {
    throw new ConfigurationError(`Cannot read master data file "${args.masterPath}"`, [String(error)]);
  }
  const masterIndex = loadMasterData(path.basename(args.masterPath), new Uint8Array(masterBytes));

  const names = await listPdfFiles(args.folder);
  if (names.length === 0) {
    throw new ConfigurationError(`No PDF files found in "${args.folder}"`);
  }

  const documents: UploadedDocument[] = await Promise.all(
    names.map(async (name) => ({
      filename: name,
      bytes: new Uint8Array(await readFile(path.join(args.folder, name))),
    })),
  );

  const result = await runValidation(documents, { masterIndex, ...deps }, options);

  const reportPath = args.outputPath ?? reportFilename('all');
  await writeFile(reportPath, buildCsvReport(result.outcomes, 'all'), 'utf-8');
  logger.info(`📄 Report written to ${reportPath}`);

  for (const outcome of result.outcomes) {
    if (outcome.status !== 'discrepancies') continue;
    logger.warn(`⚠️ ${outcome.filename} (Patient ID ${outcome.patientId}):`);
    for (const d of outcome.discrepancies) {
      logger.warn(`   - ${d.field}: "${d.masterValue}" vs "${d.documentValue}" (${d.explanation})`);
    }
  }

  return { ...result, reportPath };
}
