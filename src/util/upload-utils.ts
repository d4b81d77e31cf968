import multer from 'multer';

import HttpStatusCodes from '@src/common/constants/HttpStatusCodes';
import { RouteError } from '@src/common/util/route-errors';
import type { UploadedDocument } from '@src/types/validation';

export const MASTER_FIELD = 'master';
export const DOCUMENTS_FIELD = 'documents';

const MASTER_TYPES = [
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet', // .xlsx
  'application/vnd.ms-excel', // .xls
  'text/csv', // .csv
];

const MASTER_EXTENSIONS = /\.(xlsx|xls|csv)$/i;
const PDF_EXTENSION = /\.pdf$/i;

/**
 * Memory-storage multer instance for validation uploads.
 * `master` takes a spreadsheet, `documents` take PDFs only.
 */
export function createUpload(maxUploadMb: number): multer.Multer {
  return multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: Math.floor(maxUploadMb * 1024 * 1024),
    },
    fileFilter: (_req, file, cb) => {
      if (file.fieldname === MASTER_FIELD) {
        if (MASTER_TYPES.includes(file.mimetype) || MASTER_EXTENSIONS.test(file.originalname)) {
          return cb(null, true);
        }
        return cb(new RouteError(
          HttpStatusCodes.BAD_REQUEST,
          `Invalid master data file "${file.originalname}". Only Excel (.xlsx, .xls) and CSV files are allowed.`,
        ));
      }

      if (file.fieldname === DOCUMENTS_FIELD) {
        if (file.mimetype === 'application/pdf' || PDF_EXTENSION.test(file.originalname)) {
          return cb(null, true);
        }
        return cb(new RouteError(
          HttpStatusCodes.BAD_REQUEST,
          `Invalid document "${file.originalname}". Only PDF files are allowed.`,
        ));
      }

      return cb(new RouteError(HttpStatusCodes.BAD_REQUEST, `Unexpected upload field "${file.fieldname}"`));
    },
  });
}

export function toUploadedDocument(file: Express.Multer.File): UploadedDocument {
  return {
    filename: file.originalname,
    bytes: new Uint8Array(file.buffer),
  };
}
