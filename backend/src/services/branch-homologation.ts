import type { BranchHomologationDetail, DerivationSummary, RejectionCriteria } from '../types/rejections.js';
import { describeError } from '../utils/describe-error.js';
import {
  DATA_GOVERNANCE_OWNER,
  SELLOUT_MODULE,
  VALID_UNTIL,
  emptySummary,
  resolveValidFrom,
} from './homologation-common.js';
import { silentImportLog, type ImportLog } from './import-log.js';
import type { RejectionStore } from './rejection-store.js';

export const BRANCH_CODE_FIELD = 'SUCID';

export const BRANCH_CRITERIA: RejectionCriteria = {
  caseOwner: DATA_GOVERNANCE_OWNER,
  module: SELLOUT_MODULE,
  rejectedField: BRANCH_CODE_FIELD,
  rejectionReason: 'Sucursal no encontrada en tabla de homologación',
  case: 'Homologacion Sucursal',
  homologatedValuePresent: true,
};

type DeriveOptions = {
  store: RejectionStore;
  log?: ImportLog;
  now?: () => Date;
};

// Branch metadata is mandatory here; a missing branch fails the record.
export async function deriveBranchHomologations(
  rejectionIds: number[],
  options: DeriveOptions
): Promise<DerivationSummary<BranchHomologationDetail>> {
  const { store } = options;
  const log = options.log ?? silentImportLog;
  const now = options.now ?? (() => new Date());
  const summary = emptySummary<BranchHomologationDetail>();

  if (!rejectionIds.length) {
    return summary;
  }

  try {
    const records = await store.findRejections(rejectionIds, BRANCH_CRITERIA);
    summary.total = records.length;

    for (const record of records) {
      const branchId = record.homologatedValue ?? '';
      const branchNumber = record.rejectedValue ?? '';

      try {
        const branch = await store.findBranchMetadata(branchId);
        if (!branch) {
          summary.failed += 1;
          const message = `Rejection ${record.rejectionId}: no branch metadata found for SUCID='${branchId}'`;
          summary.errors.push(message);
          log.write('error', message);
          continue;
        }

        const detail: BranchHomologationDetail = {
          rejectionId: record.rejectionId,
          countryId: record.countryId,
          branchNumber,
          groupId: branch.groupId,
          branchId,
        };

        const exists = await store.branchHomologationExists({
          countryId: detail.countryId,
          branchNumber,
          groupId: branch.groupId,
        });
        if (exists) {
          summary.duplicated += 1;
          summary.duplicates.push(detail);
          log.write('warn', `Rejection ${record.rejectionId}: branch ${branchNumber} is already homologated`);
          continue;
        }

        const validFrom = await resolveValidFrom(store, record.weekCode, log);
        const timestamp = now();
        await store.insertBranchHomologation({
          countryId: detail.countryId,
          branchNumber,
          groupId: branch.groupId,
          chainId: branch.chainId,
          description: branch.name || null,
          address: branch.street || null,
          branchId,
          active: true,
          createdAt: timestamp,
          updatedAt: timestamp,
          validFrom,
          validUntil: VALID_UNTIL,
        });
        summary.inserted += 1;
        summary.insertedDetails.push(detail);
      } catch (error) {
        summary.failed += 1;
        const message = `Rejection ${record.rejectionId}: ${describeError(error)}`;
        summary.errors.push(message);
        log.write('error', message);
      }
    }
  } catch (error) {
    const message = `General error: ${describeError(error)}`;
    summary.errors.push(message);
    log.write('error', `Branch homologation: ${message}`);
  }

  log.write(
    'info',
    `Branch homologation: ${summary.inserted} inserted, ${summary.duplicated} duplicated, ${summary.failed} failed of ${summary.total}`
  );
  return summary;
}
