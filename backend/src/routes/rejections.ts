import { Router } from 'express';
import multer from 'multer';
import { z } from 'zod';
import { config } from '../config.js';
import { badRequest, notFound, unauthorized } from '../errors.js';
import { getLogger } from '../logger.js';
import { requirePermission } from '../middleware/auth.js';
import { rejectionStore } from '../services/default-store.js';
import { createBufferedImportLog } from '../services/import-log.js';
import { getImportRun, listImportRuns, recordImportRun } from '../services/import-runs.js';
import { FileReadError, UnsupportedFileError, readRejectionFile } from '../services/rejection-file-reader.js';
import { previewRejectionTable, runRejectionImport, type ImportStatus } from '../services/rejection-import.js';
import type { RawTable } from '../types/rejections.js';
import { asyncHandler } from '../utils/async-handler.js';

export const router = Router();

const log = getLogger('rejections');

const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    files: 1,
    fileSize: config.uploadMaxFileSize,
  },
});

const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(20),
});

const runParamsSchema = z.object({
  id: z.string().uuid(),
});

const STATUS_CODES: Record<ImportStatus, number> = {
  completed: 200,
  invalid: 422,
  failed: 500,
};

function readUpload(file: Express.Multer.File | undefined): RawTable {
  if (!file) {
    throw badRequest('a file is required');
  }
  try {
    return readRejectionFile(file.buffer, file.originalname);
  } catch (error) {
    if (error instanceof UnsupportedFileError || error instanceof FileReadError) {
      throw badRequest(error.message);
    }
    throw error;
  }
}

router.post(
  '/preview',
  requirePermission('rejections:import'),
  upload.single('file'),
  asyncHandler(async (req, res) => {
    const table = readUpload(req.file);
    res.json(previewRejectionTable(table));
  })
);

router.post(
  '/import',
  requirePermission('rejections:import'),
  upload.single('file'),
  asyncHandler(async (req, res) => {
    const user = req.user;
    if (!user) {
      throw unauthorized();
    }

    const table = readUpload(req.file);
    const fileName = req.file?.originalname ?? 'upload';
    const startedAt = new Date();
    const importLog = createBufferedImportLog(log.child({ fileName, userId: user.id }));
    importLog.write('info', `Import of ${fileName} requested by ${user.name}`);

    const outcome = await runRejectionImport({ table, store: rejectionStore, log: importLog });
    const runId = await recordImportRun({
      fileName,
      userId: user.id,
      outcome,
      logs: importLog.entries(),
      startedAt,
    });

    res.status(STATUS_CODES[outcome.status]).json({ runId, ...outcome });
  })
);

router.get(
  '/imports',
  requirePermission('rejections:read', 'rejections:import'),
  asyncHandler(async (req, res) => {
    const { limit } = listQuerySchema.parse(req.query);
    res.json(await listImportRuns(limit));
  })
);

router.get(
  '/imports/:id',
  requirePermission('rejections:read', 'rejections:import'),
  asyncHandler(async (req, res) => {
    const { id } = runParamsSchema.parse(req.params);
    const run = await getImportRun(id);
    if (!run) {
      throw notFound('import run not found');
    }
    res.json(run);
  })
);
