import type {
  BranchHomologationDetail,
  CellValue,
  DerivationSummary,
  ProductHomologationDetail,
  RawTable,
  UpdateSummary,
  ValidationResult,
} from '../types/rejections.js';
import { describeError } from '../utils/describe-error.js';
import { deriveBranchHomologations } from './branch-homologation.js';
import { silentImportLog, type ImportLog } from './import-log.js';
import { deriveProductHomologations } from './product-homologation.js';
import type { RejectionStore } from './rejection-store.js';
import { applyRejectionUpdates } from './rejection-updater.js';
import { rowCount, transformRejectionTable, validateRejectionTable } from './rejection-validator.js';

export type ImportStatus = 'completed' | 'invalid' | 'failed';

export type ImportOutcome = {
  status: ImportStatus;
  validation: ValidationResult;
  rowCount: number;
  updates: UpdateSummary | null;
  productHomologations: DerivationSummary<ProductHomologationDetail> | null;
  branchHomologations: DerivationSummary<BranchHomologationDetail> | null;
  error: string | null;
};

export type ImportRequest = {
  table: RawTable;
  store: RejectionStore;
  log?: ImportLog;
  now?: () => Date;
};

export type FilePreview = {
  rowCount: number;
  columns: string[];
  rows: Record<string, CellValue>[];
  validation: ValidationResult;
};

const PREVIEW_ROWS = 10;

export function previewRejectionTable(table: RawTable): FilePreview {
  const columns = Object.keys(table);
  const total = rowCount(table);
  const rows = Array.from({ length: Math.min(PREVIEW_ROWS, total) }, (_, index) =>
    Object.fromEntries(columns.map((column) => [column, table[column][index] ?? null]))
  );
  return { rowCount: total, columns, rows, validation: validateRejectionTable(table) };
}

/**
 * Validates the uploaded table, applies it to the rejection follow-up table and
 * derives homologation rows from whatever was updated. Store failures end up
 * in the outcome; the returned promise does not reject.
 */
export async function runRejectionImport(request: ImportRequest): Promise<ImportOutcome> {
  const { table, store } = request;
  const log = request.log ?? silentImportLog;
  const now = request.now ?? (() => new Date());
  const outcome: ImportOutcome = {
    status: 'failed',
    validation: { valid: false, errors: [] },
    rowCount: rowCount(table),
    updates: null,
    productHomologations: null,
    branchHomologations: null,
    error: null,
  };

  log.write('info', `Validating ${outcome.rowCount} rows`);
  outcome.validation = validateRejectionTable(table);
  if (!outcome.validation.valid) {
    outcome.validation.errors.forEach((error) => log.write('warn', error));
    return { ...outcome, status: 'invalid' };
  }

  const rows = transformRejectionTable(table, now());
  log.write('info', `${rows.length} rows ready to update`);

  try {
    if (!(await store.rejectionTableExists())) {
      const message = 'the rejection follow-up table does not exist';
      log.write('error', message);
      return { ...outcome, error: message };
    }

    outcome.updates = await applyRejectionUpdates(rows, { store, log });
    log.write('info', `Updated ${outcome.updates.updated} rejections, ${outcome.updates.failed} rows failed`);

    if (outcome.updates.updatedIds.length) {
      outcome.productHomologations = await deriveProductHomologations(outcome.updates.updatedIds, { store, log, now });
      outcome.branchHomologations = await deriveBranchHomologations(outcome.updates.updatedIds, { store, log, now });
    }
  } catch (error) {
    const message = describeError(error);
    log.write('error', `Import failed: ${message}`);
    return { ...outcome, error: message };
  }

  return { ...outcome, status: 'completed' };
}
