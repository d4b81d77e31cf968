import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import logger from 'jet-logger';

import Paths from '@src/common/constants/Paths';
import HttpStatusCodes from '@src/common/constants/HttpStatusCodes';
import type { Env } from '@src/common/constants/ENV';
import { RouteError } from '@src/common/util/route-errors';
import type { LlmClient } from '@src/config/openai';
import { ConfigurationError } from '@src/services/errors';
import { loadMasterData, previewMasterData } from '@src/services/masterDataService';
import { DiscrepancyComparator } from '@src/services/discrepancyComparator';
import { runValidation } from '@src/services/validationPipeline';
import type { TextExtractor } from '@src/services/textExtractor';
import type { RunStore } from '@src/services/runStore';
import {
  REPORT_SCOPES,
  SORT_KEYS,
  SORT_ORDERS,
  STATUS_FILTERS,
  buildCsvReport,
  buildResultsTable,
  reportFilename,
} from '@src/services/reportService';
import { DOCUMENTS_FIELD, MASTER_FIELD, createUpload, toUploadedDocument } from '@src/util/upload-utils';
import type { MasterIndex, ValidationRun } from '@src/types/validation';

export interface ValidationRouterDeps {
  client: LlmClient;
  env: Env;
  extractor: TextExtractor;
  runStore: RunStore;
}

/******************************************************************************
                                Query schemas
******************************************************************************/

const tableQuerySchema = z.object({
  status: z.enum(toTuple(STATUS_FILTERS)).optional(),
  sortBy: z.enum(toTuple(SORT_KEYS)).optional(),
  order: z.enum(toTuple(SORT_ORDERS)).optional(),
});

const reportQuerySchema = z.object({
  scope: z.enum(toTuple(REPORT_SCOPES)).default('all'),
});

function toTuple<T extends string>(values: readonly T[]): [T, ...T[]] {
  const [first, ...rest] = values;
  if (first === undefined) throw new Error('Enum needs at least one value');
  return [first, ...rest];
}

function parseQuery<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, query: unknown): T {
  const result = schema.safeParse(query);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new RouteError(HttpStatusCodes.BAD_REQUEST, `Invalid query: ${issues}`);
  }
  return result.data;
}

/******************************************************************************
                                Helpers
******************************************************************************/

function uploadedFiles(req: Request, field: string): Express.Multer.File[] {
  const files = req.files;
  if (!files || Array.isArray(files)) return [];
  return files[field] ?? [];
}

function readMaster(file: Express.Multer.File): MasterIndex {
  try {
    return loadMasterData(file.originalname, new Uint8Array(file.buffer));
  } catch (error) {
    if (error instanceof ConfigurationError) {
      const details = error.issues.length ? ` (${error.issues.join('; ')})` : '';
      throw new RouteError(HttpStatusCodes.BAD_REQUEST, `${error.message}${details}`);
    }
    throw error;
  }
}

function findRun(runStore: RunStore, runId: string): ValidationRun {
  const run = runStore.get(runId);
  if (!run) {
    throw new RouteError(HttpStatusCodes.NOT_FOUND, `Validation run ${runId} not found or expired`);
  }
  return run;
}

/******************************************************************************
                                Router
******************************************************************************/

export function createValidationRouter(deps: ValidationRouterDeps): Router {
  const { client, env, extractor, runStore } = deps;
  const router = Router();
  const upload = createUpload(env.MAX_UPLOAD_MB);

  /**
   * POST /api/validation/master/preview
   * First rows, columns and duplicate report of a master data file.
   */
  router.post(
    Paths.Validation.MasterPreview,
    upload.fields([{ name: MASTER_FIELD, maxCount: 1 }]),
    (req: Request, res: Response, next: NextFunction) => {
      try {
        const [masterFile] = uploadedFiles(req, MASTER_FIELD);
        if (!masterFile) {
          throw new RouteError(HttpStatusCodes.BAD_REQUEST, `No master data file uploaded (field "${MASTER_FIELD}")`);
        }

        const index = readMaster(masterFile);
        res.status(HttpStatusCodes.OK).json(previewMasterData(index));
      } catch (error) {
        next(error);
      }
    },
  );

  /**
   * POST /api/validation/runs
   * Validate every uploaded PDF against the uploaded master data.
   */
  router.post(
    Paths.Validation.Runs,
    upload.fields([
      { name: MASTER_FIELD, maxCount: 1 },
      { name: DOCUMENTS_FIELD },
    ]),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const [masterFile] = uploadedFiles(req, MASTER_FIELD);
        const documentFiles = uploadedFiles(req, DOCUMENTS_FIELD);

        if (!masterFile) {
          throw new RouteError(HttpStatusCodes.BAD_REQUEST, `No master data file uploaded (field "${MASTER_FIELD}")`);
        }
        if (documentFiles.length === 0) {
          throw new RouteError(HttpStatusCodes.BAD_REQUEST, `No PDF documents uploaded (field "${DOCUMENTS_FIELD}")`);
        }

        const masterIndex = readMaster(masterFile);
        const comparator = new DiscrepancyComparator(client, {
          model: env.OPENAI_MODEL,
          timeoutMs: env.COMPARATOR_TIMEOUT_MS,
          promptTextLimit: env.PROMPT_TEXT_LIMIT,
        });

        // Client went away: stop starting new documents
        const controller = new AbortController();
        res.on('close', () => {
          if (!res.writableEnded) controller.abort();
        });

        const result = await runValidation(
          documentFiles.map(toUploadedDocument),
          { masterIndex, extractor, comparator },
          { concurrency: env.COMPARATOR_CONCURRENCY, signal: controller.signal },
        );

        const run = runStore.save(masterIndex.sourceName, result);
        if (controller.signal.aborted) {
          logger.warn(`⏹️ Client disconnected, run ${run.runId} stored as abandoned`);
          return;
        }

        res.status(HttpStatusCodes.CREATED).json({
          ...run,
          master: {
            recordCount: masterIndex.records.size,
            skippedRows: masterIndex.skippedRows,
            duplicates: masterIndex.duplicates,
          },
        });
      } catch (error) {
        next(error);
      }
    },
  );

  /**
   * GET /api/validation/runs/:runId
   */
  router.get(Paths.Validation.Run, (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(findRun(runStore, req.params.runId ?? ''));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/validation/runs/:runId/table?status=&sortBy=&order=
   */
  router.get(Paths.Validation.Table, (req: Request, res: Response, next: NextFunction) => {
    try {
      const run = findRun(runStore, req.params.runId ?? '');
      const query = parseQuery(tableQuerySchema, req.query);

      res.json({
        runId: run.runId,
        summary: run.summary,
        rows: buildResultsTable(run.outcomes, query),
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/validation/runs/:runId/report?scope=all|issues
   */
  router.get(Paths.Validation.Report, (req: Request, res: Response, next: NextFunction) => {
    try {
      const run = findRun(runStore, req.params.runId ?? '');
      const { scope } = parseQuery(reportQuerySchema, req.query);

      const csv = buildCsvReport(run.outcomes, scope);
      const filename = reportFilename(scope);

      res.setHeader('Content-Type', 'text/csv; charset=utf-8');
      res.setHeader('Content-Disposition', `attachment; filename="${filename}"`);
      res.status(HttpStatusCodes.OK).send(csv);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
