import type { CellValue, RawTable, UpdateRow, ValidationResult } from '../types/rejections.js';

type CanonicalColumn = 'rejectionId' | 'case' | 'caseOwner' | 'homologatedValue';

/** File header for each canonical column, in the order missing ones are reported. */
export const FILE_COLUMNS: Record<CanonicalColumn, string> = {
  rejectionId: 'IDRechazo',
  case: 'Caso',
  caseOwner: 'Responsable de Caso',
  homologatedValue: 'Valor homologación',
};

const CANONICAL_COLUMNS: CanonicalColumn[] = ['rejectionId', 'case', 'caseOwner', 'homologatedValue'];
const UPDATE_COLUMNS: CanonicalColumn[] = ['case', 'caseOwner', 'homologatedValue'];
const MISSING_PLACEHOLDERS = new Set(['', 'nan', 'none', 'null']);
const MAX_LISTED_DUPLICATES = 10;

function normalizeName(name: string): string {
  return name.trim().toLowerCase();
}

function findColumn(table: RawTable, name: string): string | null {
  const target = normalizeName(name);
  return Object.keys(table).find((column) => normalizeName(column) === target) ?? null;
}

function resolveColumn(table: RawTable, column: CanonicalColumn): string | null {
  return findColumn(table, FILE_COLUMNS[column]) ?? findColumn(table, column);
}

function isBlank(value: CellValue | undefined): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'number') return Number.isNaN(value);
  if (typeof value === 'string') return value.trim().length === 0;
  return false;
}

function cellText(value: CellValue): string {
  if (value instanceof Date) return value.toISOString();
  return String(value).trim();
}

export function coerceRejectionId(value: CellValue | undefined): number | null {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) ? value : null;
  }
  if (typeof value !== 'string' || !value.trim()) {
    return null;
  }
  const parsed = Number(value.trim());
  return Number.isSafeInteger(parsed) ? parsed : null;
}

function normalizeText(value: CellValue | undefined): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number' && Number.isNaN(value)) return null;
  const text = cellText(value);
  return MISSING_PLACEHOLDERS.has(text.toLowerCase()) ? null : text;
}

export function rowCount(table: RawTable): number {
  return Object.values(table).reduce((max, values) => Math.max(max, values.length), 0);
}

// Ids that coerce to the same integer are the same rejection, however they are written.
function idKey(value: CellValue): string {
  const id = coerceRejectionId(value);
  return id === null ? cellText(value) : String(id);
}

function describeDuplicates(values: CellValue[]): string | null {
  const seen = new Set<string>();
  const repeated: string[] = [];
  let duplicateCount = 0;

  for (const value of values) {
    if (isBlank(value)) continue;
    const key = idKey(value);
    if (seen.has(key)) {
      duplicateCount += 1;
      if (!repeated.includes(key)) repeated.push(key);
    } else {
      seen.add(key);
    }
  }

  if (!duplicateCount) return null;
  const listed = repeated.slice(0, MAX_LISTED_DUPLICATES).join(', ');
  const more = repeated.length > MAX_LISTED_DUPLICATES ? ' ...' : '';
  return `Found ${duplicateCount} duplicated ${FILE_COLUMNS.rejectionId} values in the file. Duplicated IDs: ${listed}${more}`;
}

export function validateRejectionTable(table: RawTable): ValidationResult {
  const missing = CANONICAL_COLUMNS.filter((column) => !findColumn(table, FILE_COLUMNS[column])).map(
    (column) => FILE_COLUMNS[column]
  );
  if (missing.length) {
    return { valid: false, errors: [`Missing columns: ${missing.join(', ')}`] };
  }

  const errors: string[] = [];
  const idColumn = resolveColumn(table, 'rejectionId');
  if (idColumn) {
    const ids = table[idColumn];
    const nullCount = ids.filter((value) => isBlank(value)).length;
    if (nullCount > 0) {
      errors.push(`Found ${nullCount} records without ${FILE_COLUMNS.rejectionId}`);
    }

    const duplicates = describeDuplicates(ids);
    if (duplicates) {
      errors.push(duplicates);
    }

    if (ids.some((value) => !isBlank(value) && coerceRejectionId(value) === null)) {
      errors.push(`${FILE_COLUMNS.rejectionId} contains non-numeric values`);
    }
  }

  const hasUpdateData = UPDATE_COLUMNS.some((column) => {
    const name = resolveColumn(table, column);
    return name !== null && table[name].some((value) => !isBlank(value));
  });
  if (!hasUpdateData) {
    errors.push('No data to update (all update columns are empty)');
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Renames, stamps and normalizes a validated table. Rows whose id does not
 * coerce to an integer are dropped.
 */
export function transformRejectionTable(table: RawTable, now: Date = new Date()): UpdateRow[] {
  const columns: Record<CanonicalColumn, string | null> = {
    rejectionId: resolveColumn(table, 'rejectionId'),
    case: resolveColumn(table, 'case'),
    caseOwner: resolveColumn(table, 'caseOwner'),
    homologatedValue: resolveColumn(table, 'homologatedValue'),
  };

  const cell = (column: CanonicalColumn, index: number): CellValue | undefined => {
    const name = columns[column];
    return name === null ? undefined : table[name][index];
  };

  const rows: UpdateRow[] = [];
  const total = rowCount(table);
  for (let index = 0; index < total; index += 1) {
    const rejectionId = coerceRejectionId(cell('rejectionId', index));
    if (rejectionId === null) continue;
    rows.push({
      rejectionId,
      case: normalizeText(cell('case', index)),
      caseOwner: normalizeText(cell('caseOwner', index)),
      homologatedValue: normalizeText(cell('homologatedValue', index)),
      updatedAt: now,
      resolvedAt: now,
    });
  }
  return rows;
}

export function toRawTable(rows: UpdateRow[]): RawTable {
  return {
    rejectionId: rows.map((row) => row.rejectionId),
    case: rows.map((row) => row.case),
    caseOwner: rows.map((row) => row.caseOwner),
    homologatedValue: rows.map((row) => row.homologatedValue),
  };
}
