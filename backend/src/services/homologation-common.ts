import type { DerivationSummary } from '../types/rejections.js';
import { describeError } from '../utils/describe-error.js';
import { parseWeekCode } from '../utils/week-code.js';
import type { ImportLog } from './import-log.js';
import type { RejectionStore } from './rejection-store.js';

export const DATA_GOVERNANCE_OWNER = 'Gobierno de Datos';
export const SELLOUT_MODULE = 'Sellout';
export const VALID_UNTIL = new Date(Date.UTC(2999, 11, 31));

export function emptySummary<TDetail>(): DerivationSummary<TDetail> {
  return {
    total: 0,
    inserted: 0,
    duplicated: 0,
    failed: 0,
    errors: [],
    duplicates: [],
    insertedDetails: [],
  };
}

/**
 * First day of the rejection's week, or null when the code, the calendar entry
 * or the calendar itself is unavailable.
 */
export async function resolveValidFrom(
  store: RejectionStore,
  weekCode: number | null,
  log: ImportLog
): Promise<Date | null> {
  const parsed = parseWeekCode(weekCode);
  if (!parsed) return null;
  try {
    return await store.findWeekStart(parsed.year, parsed.week);
  } catch (error) {
    log.write('warn', `Week ${weekCode}: start date unavailable, valid-from left empty: ${describeError(error)}`);
    return null;
  }
}
