import type { QueryResult, QueryResultRow } from 'pg';
import type { Queryable } from '../src/db.js';
import { PgRejectionStore } from '../src/services/pg-rejection-store.js';
import { BRANCH_CRITERIA } from '../src/services/branch-homologation.js';
import { buildInsert, buildUpdate } from '../src/utils/sql.js';

class RecordingDb implements Queryable {
  readonly calls: { text: string; params: unknown[] }[] = [];

  constructor(private readonly rowCount = 1) {}

  async query<T extends QueryResultRow = QueryResultRow>(text: string, params: unknown[] = []): Promise<QueryResult<T>> {
    this.calls.push({ text: text.replace(/\s+/g, ' ').trim(), params });
    return { command: 'SELECT', rowCount: this.rowCount, oid: 0, fields: [], rows: [] };
  }
}

const stamp = new Date('2026-02-10T09:30:00Z');

describe('statement builders', () => {
  it('builds a parameterized update that leaves undefined fields out', () => {
    const statement = buildUpdate(
      'gnm_ct.rechazos_seguimiento',
      { update_at: stamp, caso: "O'Higgins", valor_homologacion: undefined },
      { rechazoid: 101 }
    );

    expect(statement).toEqual({
      text: 'update gnm_ct.rechazos_seguimiento set update_at = $1, caso = $2 where rechazoid = $3',
      values: [stamp, "O'Higgins", 101],
    });
  });

  it('refuses an update without a key', () => {
    expect(() => buildUpdate('t', { a: 1 }, {})).toThrow('refusing to update t without a key');
  });

  it('keeps null values in inserts', () => {
    expect(buildInsert('t', { a: 1, b: null, c: undefined })).toEqual({
      text: 'insert into t (a, b) values ($1, $2)',
      values: [1, null],
    });
  });
});

describe('PgRejectionStore', () => {
  const schemas = { rejections: 'gnm_ct', clients: 'gnm_cf' };

  it('updates one rejection by id and reports the matched rows', async () => {
    const db = new RecordingDb(1);
    const store = new PgRejectionStore(db, schemas);

    const matched = await store.updateRejection(101, { updatedAt: stamp, resolvedAt: stamp, case: 'X' });

    expect(matched).toBe(1);
    expect(db.calls).toEqual([
      {
        text: 'update gnm_ct.rechazos_seguimiento set update_at = $1, fecha_solucion_rechazo = $2, caso = $3 where rechazoid = $4',
        params: [stamp, stamp, 'X', 101],
      },
    ]);
  });

  it('limits propagation to groups that share barcodes', async () => {
    const db = new RecordingDb();
    const store = new PgRejectionStore(db, schemas);

    await store.propagateHomologatedValue(
      { rejectionId: 101, countryId: 1, barcode: '7790001' },
      { homologatedValue: 'P999', updatedAt: stamp, resolvedAt: stamp }
    );

    expect(db.calls[0].text).toContain(
      'and grpid in (select grpid from gnm_cf.cf_clientes_so where comparte_ean = true) returning rechazoid'
    );
    expect(db.calls[0].params).toEqual(['P999', stamp, stamp, 101, 1, '7790001', 'PROPSTID']);
  });

  it('adds the optional case and value filters to the selection', async () => {
    const db = new RecordingDb();
    const store = new PgRejectionStore(db, schemas);

    await store.findRejections([301, 302], BRANCH_CRITERIA);

    expect(db.calls[0].text).toContain(
      "where rechazoid = any($1::bigint[]) and responsable_de_caso = $2 and modulo = $3 and campo_rechazado = $4 and motivo_rechazo = $5 and caso = $6 and valor_homologacion is not null"
    );
    expect(db.calls[0].params).toEqual([
      [301, 302],
      'Gobierno de Datos',
      'Sellout',
      'SUCID',
      'Sucursal no encontrada en tabla de homologación',
      'Homologacion Sucursal',
    ]);
  });
});
