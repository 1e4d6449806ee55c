import type { DerivationSummary, ProductHomologationDetail, RejectionCriteria } from '../types/rejections.js';
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
import { PRODUCT_CODE_FIELD } from './rejection-updater.js';

export const DEFAULT_PRODUCT_DESCRIPTION = 'Producto homologado';

export const PRODUCT_CRITERIA: RejectionCriteria = {
  caseOwner: DATA_GOVERNANCE_OWNER,
  module: SELLOUT_MODULE,
  rejectedField: PRODUCT_CODE_FIELD,
  rejectionReason: 'Producto no encontrado en tabla de homologación',
};

type DeriveOptions = {
  store: RejectionStore;
  log?: ImportLog;
  now?: () => Date;
};

async function findDescriptions(
  store: RejectionStore,
  productIds: string[],
  log: ImportLog
): Promise<Map<string, string>> {
  if (!productIds.length) return new Map();
  try {
    return await store.findProductDescriptions(productIds);
  } catch (error) {
    log.write(
      'warn',
      `Product descriptions unavailable, using '${DEFAULT_PRODUCT_DESCRIPTION}': ${describeError(error)}`
    );
    return new Map();
  }
}

export async function deriveProductHomologations(
  rejectionIds: number[],
  options: DeriveOptions
): Promise<DerivationSummary<ProductHomologationDetail>> {
  const { store } = options;
  const log = options.log ?? silentImportLog;
  const now = options.now ?? (() => new Date());
  const summary = emptySummary<ProductHomologationDetail>();

  if (!rejectionIds.length) {
    return summary;
  }

  try {
    const records = await store.findRejections(rejectionIds, PRODUCT_CRITERIA);
    summary.total = records.length;

    const productIds = [
      ...new Set(records.map((record) => record.homologatedValue).filter((value): value is string => value !== null)),
    ];
    const descriptions = await findDescriptions(store, productIds, log);

    for (const record of records) {
      const detail: ProductHomologationDetail = {
        rejectionId: record.rejectionId,
        countryId: record.countryId,
        productCode: record.rejectedValue ?? '',
        groupId: record.groupId,
        productId: record.homologatedValue ?? '',
      };

      try {
        const exists = await store.productHomologationExists({
          countryId: detail.countryId,
          productCode: detail.productCode,
          groupId: detail.groupId,
        });
        if (exists) {
          summary.duplicated += 1;
          summary.duplicates.push(detail);
          log.write('warn', `Rejection ${record.rejectionId}: product ${detail.productCode} is already homologated`);
          continue;
        }

        const validFrom = await resolveValidFrom(store, record.weekCode, log);
        const timestamp = now();
        await store.insertProductHomologation({
          countryId: detail.countryId,
          productCode: detail.productCode,
          groupId: detail.groupId,
          description: descriptions.get(detail.productId) ?? DEFAULT_PRODUCT_DESCRIPTION,
          productId: detail.productId,
          barcode: record.barcode,
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
    log.write('error', `Product homologation: ${message}`);
  }

  log.write(
    'info',
    `Product homologation: ${summary.inserted} inserted, ${summary.duplicated} duplicated, ${summary.failed} failed of ${summary.total}`
  );
  return summary;
}
