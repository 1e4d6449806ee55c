import {
  toRawTable,
  transformRejectionTable,
  validateRejectionTable,
} from '../src/services/rejection-validator.js';
import type { RawTable, UpdateRow } from '../src/types/rejections.js';

function fileTable(overrides: Partial<RawTable> = {}): RawTable {
  return {
    IDRechazo: ['101', '102'],
    Caso: ['Homologacion Producto', null],
    'Responsable de Caso': ['Gobierno de Datos', null],
    'Valor homologación': ['P999', null],
    ...overrides,
  };
}

function withoutTimestamps(rows: UpdateRow[]) {
  return rows.map(({ updatedAt: _updatedAt, resolvedAt: _resolvedAt, ...rest }) => rest);
}

describe('validateRejectionTable', () => {
  it('accepts a well formed table', () => {
    expect(validateRejectionTable(fileTable())).toEqual({ valid: true, errors: [] });
  });

  it('matches required columns ignoring case and surrounding spaces', () => {
    const table: RawTable = {
      ' idrechazo ': ['1'],
      CASO: ['x'],
      'responsable de caso': [null],
      'VALOR HOMOLOGACIÓN ': [null],
    };
    expect(validateRejectionTable(table)).toEqual({ valid: true, errors: [] });
  });

  it('names every missing column and skips the other rules', () => {
    const table: RawTable = {
      IDRechazo: ['1', '1', null],
      Caso: [null, null, null],
    };
    expect(validateRejectionTable(table)).toEqual({
      valid: false,
      errors: ['Missing columns: Responsable de Caso, Valor homologación'],
    });
  });

  it('reports ids without a value', () => {
    const result = validateRejectionTable(fileTable({ IDRechazo: ['101', null, '  '], Caso: ['a', 'b', 'c'] }));
    expect(result).toEqual({ valid: false, errors: ['Found 2 records without IDRechazo'] });
  });

  it('counts repeated occurrences and lists each duplicated id once', () => {
    const result = validateRejectionTable(
      fileTable({ IDRechazo: ['1', '1', '2', '2', '2', '3'], Caso: ['a', 'a', 'a', 'a', 'a', 'a'] })
    );
    expect(result.errors).toEqual([
      'Found 3 duplicated IDRechazo values in the file. Duplicated IDs: 1, 2',
    ]);
  });

  it('lists at most ten duplicated ids followed by an ellipsis', () => {
    const ids = Array.from({ length: 12 }, (_, index) => String(index + 1));
    const result = validateRejectionTable(fileTable({ IDRechazo: [...ids, ...ids], Caso: ['a'] }));
    expect(result.errors).toEqual([
      'Found 12 duplicated IDRechazo values in the file. Duplicated IDs: 1, 2, 3, 4, 5, 6, 7, 8, 9, 10 ...',
    ]);
  });

  it('treats numeric and textual copies of an id as the same id', () => {
    const result = validateRejectionTable(fileTable({ IDRechazo: [101, ' 101'] }));
    expect(result.errors).toEqual([
      'Found 1 duplicated IDRechazo values in the file. Duplicated IDs: 101',
    ]);
  });

  it('treats ids written with a decimal part or an exponent as the integer they denote', () => {
    const decimal = validateRejectionTable(fileTable({ IDRechazo: ['101', '101.0'] }));
    const mixed = validateRejectionTable(fileTable({ IDRechazo: [101, '1e2', '100'], Caso: ['a', 'b', 'c'] }));

    expect(decimal).toEqual({
      valid: false,
      errors: ['Found 1 duplicated IDRechazo values in the file. Duplicated IDs: 101'],
    });
    expect(mixed).toEqual({
      valid: false,
      errors: ['Found 1 duplicated IDRechazo values in the file. Duplicated IDs: 100'],
    });
  });

  it('rejects ids that are not integers', () => {
    const result = validateRejectionTable(fileTable({ IDRechazo: ['101', 'abc', '12.5'] }));
    expect(result).toEqual({ valid: false, errors: ['IDRechazo contains non-numeric values'] });
  });

  it('requires at least one value in the update columns', () => {
    const result = validateRejectionTable(
      fileTable({ Caso: [null, ''], 'Responsable de Caso': [null, null], 'Valor homologación': ['  ', null] })
    );
    expect(result).toEqual({ valid: false, errors: ['No data to update (all update columns are empty)'] });
  });

  it('collects every data problem in one pass', () => {
    const result = validateRejectionTable({
      IDRechazo: ['7', '7', null, 'x'],
      Caso: [null, null, null, null],
      'Responsable de Caso': [null, null, null, null],
      'Valor homologación': [null, null, null, null],
    });
    expect(result.errors).toEqual([
      'Found 1 records without IDRechazo',
      'Found 1 duplicated IDRechazo values in the file. Duplicated IDs: 7',
      'IDRechazo contains non-numeric values',
      'No data to update (all update columns are empty)',
    ]);
  });
});

describe('transformRejectionTable', () => {
  const now = new Date('2026-01-05T10:00:00Z');

  const table: RawTable = {
    IDRechazo: ['101', ' 102 ', 'x', 103],
    Caso: [' Homologacion Producto ', 'nan', 'None', null],
    'Responsable de Caso': ['Gobierno de Datos', '', 'NULL', 'Equipo Comercial'],
    'Valor homologación': ['P999', null, 'v', 42],
  };

  it('renames, trims and stamps the rows, dropping ids that do not coerce', () => {
    expect(transformRejectionTable(table, now)).toEqual([
      {
        rejectionId: 101,
        case: 'Homologacion Producto',
        caseOwner: 'Gobierno de Datos',
        homologatedValue: 'P999',
        updatedAt: now,
        resolvedAt: now,
      },
      { rejectionId: 102, case: null, caseOwner: null, homologatedValue: null, updatedAt: now, resolvedAt: now },
      {
        rejectionId: 103,
        case: null,
        caseOwner: 'Equipo Comercial',
        homologatedValue: '42',
        updatedAt: now,
        resolvedAt: now,
      },
    ]);
  });

  it('yields the same rows when run on its own output', () => {
    const first = transformRejectionTable(table, now);
    const second = transformRejectionTable(toRawTable(first), new Date('2026-01-06T08:00:00Z'));
    expect(withoutTimestamps(second)).toEqual(withoutTimestamps(first));
    expect(second[0].updatedAt).toEqual(new Date('2026-01-06T08:00:00Z'));
  });

  it('never emits a row without an id', () => {
    const rows = transformRejectionTable({ IDRechazo: [null, '', 'abc', '5'], Caso: ['a', 'b', 'c', 'd'] }, now);
    expect(rows.map((row) => row.rejectionId)).toEqual([5]);
  });
});
