import type { Queryable } from '../db.js';
import type {
  BranchHomologation,
  BranchHomologationKey,
  BranchMetadata,
  ProductHomologation,
  ProductHomologationKey,
  RejectionAssignments,
  RejectionCriteria,
  RejectionRecord,
  SharedValueAssignments,
  SharedValueSource,
} from '../types/rejections.js';
import { executeInsert, executeQuery, executeUpdate, tableExists } from '../utils/sql.js';
import type { RejectionStore } from './rejection-store.js';
import { PRODUCT_CODE_FIELD } from './rejection-updater.js';

export const REJECTION_TABLE = 'rechazos_seguimiento';

type RejectionRow = {
  rechazoid: string | number;
  caso: string | null;
  responsable_de_caso: string | null;
  valor_homologacion: string | null;
  campo_rechazado: string | null;
  valor_rechazado: string | null;
  paisid: string | number | null;
  codigo_barras: string | null;
  grpid: string | number | null;
  modulo: string | null;
  motivo_rechazo: string | null;
  semanas: string | number | null;
  update_at: Date | null;
  fecha_solucion_rechazo: Date | null;
};

const REJECTION_COLUMNS = `rechazoid, caso, responsable_de_caso, valor_homologacion, campo_rechazado,
  valor_rechazado, paisid, codigo_barras, grpid, modulo, motivo_rechazo, semanas, update_at,
  fecha_solucion_rechazo`;

function toNumber(value: string | number | null): number | null {
  if (value === null) return null;
  const parsed = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

function mapRejection(row: RejectionRow): RejectionRecord {
  return {
    rejectionId: Number(row.rechazoid),
    case: row.caso,
    caseOwner: row.responsable_de_caso,
    homologatedValue: row.valor_homologacion,
    rejectedField: row.campo_rechazado,
    rejectedValue: row.valor_rechazado,
    countryId: toNumber(row.paisid),
    barcode: row.codigo_barras,
    groupId: toNumber(row.grpid),
    module: row.modulo,
    rejectionReason: row.motivo_rechazo,
    weekCode: toNumber(row.semanas),
    updatedAt: row.update_at,
    resolvedAt: row.fecha_solucion_rechazo,
  };
}

type StoreSchemas = {
  rejections: string;
  clients: string;
};

/** PostgreSQL implementation; every value travels as a bind parameter. */
export class PgRejectionStore implements RejectionStore {
  private readonly db: Queryable;
  private readonly schemas: StoreSchemas;

  constructor(db: Queryable, schemas: StoreSchemas) {
    this.db = db;
    this.schemas = schemas;
  }

  private table(name: string): string {
    return `${this.schemas.rejections}.${name}`;
  }

  rejectionTableExists(): Promise<boolean> {
    return tableExists(this.db, this.schemas.rejections, REJECTION_TABLE);
  }

  updateRejection(rejectionId: number, assignments: RejectionAssignments): Promise<number> {
    return executeUpdate(
      this.db,
      this.table(REJECTION_TABLE),
      { rechazoid: rejectionId },
      {
        update_at: assignments.updatedAt,
        fecha_solucion_rechazo: assignments.resolvedAt,
        caso: assignments.case,
        responsable_de_caso: assignments.caseOwner,
        valor_homologacion: assignments.homologatedValue,
      }
    );
  }

  async findRejection(rejectionId: number): Promise<RejectionRecord | null> {
    const rows = await executeQuery<RejectionRow>(
      this.db,
      `select ${REJECTION_COLUMNS} from ${this.table(REJECTION_TABLE)} where rechazoid = $1`,
      [rejectionId]
    );
    return rows[0] ? mapRejection(rows[0]) : null;
  }

  async propagateHomologatedValue(source: SharedValueSource, assignments: SharedValueAssignments): Promise<number[]> {
    const rows = await executeQuery<{ rechazoid: string | number }>(
      this.db,
      `update ${this.table(REJECTION_TABLE)}
          set valor_homologacion = $1,
              update_at = $2,
              fecha_solucion_rechazo = $3
        where rechazoid <> $4
          and paisid = $5
          and codigo_barras = $6
          and campo_rechazado = $7
          and grpid in (select grpid from ${this.schemas.clients}.cf_clientes_so where comparte_ean = true)
        returning rechazoid`,
      [
        assignments.homologatedValue,
        assignments.updatedAt,
        assignments.resolvedAt,
        source.rejectionId,
        source.countryId,
        source.barcode,
        PRODUCT_CODE_FIELD,
      ]
    );
    return rows.map((row) => Number(row.rechazoid)).sort((a, b) => a - b);
  }

  async findRejections(rejectionIds: number[], criteria: RejectionCriteria): Promise<RejectionRecord[]> {
    const values: unknown[] = [
      rejectionIds,
      criteria.caseOwner,
      criteria.module,
      criteria.rejectedField,
      criteria.rejectionReason,
    ];
    const filters = [
      'rechazoid = any($1::bigint[])',
      'responsable_de_caso = $2',
      'modulo = $3',
      'campo_rechazado = $4',
      'motivo_rechazo = $5',
    ];
    if (criteria.case !== undefined) {
      values.push(criteria.case);
      filters.push(`caso = $${values.length}`);
    }
    if (criteria.homologatedValuePresent) {
      filters.push('valor_homologacion is not null');
    }

    const rows = await executeQuery<RejectionRow>(
      this.db,
      `select ${REJECTION_COLUMNS}
         from ${this.table(REJECTION_TABLE)}
        where ${filters.join(' and ')}
        order by array_position($1::bigint[], rechazoid)`,
      values
    );
    return rows.map(mapRejection);
  }

  async findProductDescriptions(productIds: string[]): Promise<Map<string, string>> {
    const rows = await executeQuery<{ propstid: string; propstnombre: string | null }>(
      this.db,
      `select propstid, propstnombre
         from ${this.table('vw_estructuraproductostotalpaises')}
        where propstid = any($1::text[])`,
      [productIds]
    );
    const descriptions = new Map<string, string>();
    for (const row of rows) {
      if (row.propstnombre !== null && !descriptions.has(row.propstid)) {
        descriptions.set(row.propstid, row.propstnombre);
      }
    }
    return descriptions;
  }

  async findWeekStart(year: number, week: number): Promise<Date | null> {
    const rows = await executeQuery<{ seminicio: Date | null }>(
      this.db,
      `select seminicio from ${this.table('catsemanas')} where semanio = $1 and semnumero = $2 limit 1`,
      [year, week]
    );
    return rows[0]?.seminicio ?? null;
  }

  async productHomologationExists(key: ProductHomologationKey): Promise<boolean> {
    const rows = await executeQuery<{ found: boolean }>(
      this.db,
      `select exists (
         select 1 from ${this.table('pro_so_homologacion')}
          where paisid is not distinct from $1
            and cod_prod = $2
            and grpid is not distinct from $3
       ) as found`,
      [key.countryId, key.productCode, key.groupId]
    );
    return rows[0]?.found === true;
  }

  insertProductHomologation(row: ProductHomologation): Promise<void> {
    return executeInsert(this.db, this.table('pro_so_homologacion'), {
      paisid: row.countryId,
      cod_prod: row.productCode,
      descripcion_producto: row.description,
      grpid: row.groupId,
      propstid: row.productId,
      propstcodbarras: row.barcode,
      activo: row.active,
      create_at: row.createdAt,
      update_at: row.updatedAt,
      fecha_valido_desde: row.validFrom,
      fecha_valido_hasta: row.validUntil,
    });
  }

  async findBranchMetadata(branchId: string): Promise<BranchMetadata | null> {
    const rows = await executeQuery<{
      grpid: string | number;
      cadid: string | number | null;
      sucnombre: string | null;
      dircalle: string | null;
    }>(
      this.db,
      `select grpid, cadid, sucnombre, dircalle
         from ${this.table('vw_estructurasucursales')}
        where sucid = $1
        limit 1`,
      [branchId]
    );
    const row = rows[0];
    if (!row) return null;
    return {
      groupId: Number(row.grpid),
      chainId: toNumber(row.cadid),
      name: row.sucnombre,
      street: row.dircalle,
    };
  }

  async branchHomologationExists(key: BranchHomologationKey): Promise<boolean> {
    const rows = await executeQuery<{ found: boolean }>(
      this.db,
      `select exists (
         select 1 from ${this.table('suc_so_homologacion')}
          where paisid is not distinct from $1
            and num_sucursal = $2
            and grpid = $3
       ) as found`,
      [key.countryId, key.branchNumber, key.groupId]
    );
    return rows[0]?.found === true;
  }

  insertBranchHomologation(row: BranchHomologation): Promise<void> {
    return executeInsert(this.db, this.table('suc_so_homologacion'), {
      paisid: row.countryId,
      grpid: row.groupId,
      cadid: row.chainId,
      num_sucursal: row.branchNumber,
      descripcion: row.description,
      direccion: row.address,
      sucid: row.branchId,
      activo: row.active,
      create_at: row.createdAt,
      update_at: row.updatedAt,
      fecha_valido_desde: row.validFrom,
      fecha_valido_hasta: row.validUntil,
    });
  }
}
