import type { RejectionAssignments, UpdateRow, UpdateSummary } from '../types/rejections.js';
import { silentImportLog, type ImportLog } from './import-log.js';
import type { RejectionStore } from './rejection-store.js';
import { describeError } from '../utils/describe-error.js';

export const PRODUCT_CODE_FIELD = 'PROPSTID';

type UpdateOptions = {
  store: RejectionStore;
  log?: ImportLog;
};

function buildAssignments(row: UpdateRow): RejectionAssignments {
  const assignments: RejectionAssignments = {
    updatedAt: row.updatedAt,
    resolvedAt: row.resolvedAt,
  };
  if (row.case !== null) assignments.case = row.case;
  if (row.caseOwner !== null) assignments.caseOwner = row.caseOwner;
  if (row.homologatedValue !== null) assignments.homologatedValue = row.homologatedValue;
  return assignments;
}

/**
 * Applies each row as a partial update of its rejection and spreads product
 * homologations to sibling rejections of groups that share barcodes. Rows are
 * independent: a failing row is reported and the next one is processed.
 */
export async function applyRejectionUpdates(rows: UpdateRow[], options: UpdateOptions): Promise<UpdateSummary> {
  const { store } = options;
  const log = options.log ?? silentImportLog;
  const updatedIds: number[] = [];
  const seen = new Set<number>();
  const errors: string[] = [];
  let failed = 0;

  const markUpdated = (rejectionId: number): boolean => {
    if (seen.has(rejectionId)) return false;
    seen.add(rejectionId);
    updatedIds.push(rejectionId);
    return true;
  };

  for (const [index, row] of rows.entries()) {
    try {
      const matched = await store.updateRejection(row.rejectionId, buildAssignments(row));
      if (matched === 0) {
        throw new Error(`rejection ${row.rejectionId} not found`);
      }
      markUpdated(row.rejectionId);

      if (row.homologatedValue === null) continue;

      const record = await store.findRejection(row.rejectionId);
      if (!record || record.rejectedField !== PRODUCT_CODE_FIELD) continue;

      const siblings = await store.propagateHomologatedValue(
        { rejectionId: record.rejectionId, countryId: record.countryId, barcode: record.barcode },
        { homologatedValue: row.homologatedValue, updatedAt: row.updatedAt, resolvedAt: row.resolvedAt }
      );
      const added = siblings.filter((siblingId) => markUpdated(siblingId));
      if (added.length) {
        log.write('info', `Rejection ${row.rejectionId}: shared value copied to ${added.join(', ')}`);
      }
    } catch (error) {
      failed += 1;
      const message = `Row ${index + 1} (ID: ${row.rejectionId}): ${describeError(error)}`;
      errors.push(message);
      log.write('error', message);
    }
  }

  return {
    total: rows.length,
    updated: updatedIds.length,
    failed,
    errors,
    updatedIds,
  };
}
