import type { QueryResultRow } from 'pg';
import type { Queryable } from '../db.js';

export type Statement = {
  text: string;
  values: unknown[];
};

type Fields = Record<string, unknown>;

function entriesOf(fields: Fields): [string, unknown][] {
  return Object.entries(fields).filter(([, value]) => value !== undefined);
}

/** `update <table> set a = $1, b = $2 where k = $3`; undefined fields are left out. */
export function buildUpdate(table: string, assignments: Fields, predicate: Fields): Statement {
  const sets = entriesOf(assignments);
  const keys = entriesOf(predicate);
  if (!sets.length) {
    throw new Error(`nothing to update in ${table}`);
  }
  if (!keys.length) {
    throw new Error(`refusing to update ${table} without a key`);
  }
  const values: unknown[] = [];
  const setClause = sets.map(([column, value]) => {
    values.push(value);
    return `${column} = $${values.length}`;
  });
  const whereClause = keys.map(([column, value]) => {
    values.push(value);
    return `${column} = $${values.length}`;
  });
  return {
    text: `update ${table} set ${setClause.join(', ')} where ${whereClause.join(' and ')}`,
    values,
  };
}

export function buildInsert(table: string, fields: Fields): Statement {
  const columns = entriesOf(fields);
  const placeholders = columns.map((_, index) => `$${index + 1}`);
  return {
    text: `insert into ${table} (${columns.map(([column]) => column).join(', ')}) values (${placeholders.join(', ')})`,
    values: columns.map(([, value]) => value),
  };
}

export async function executeUpdate(db: Queryable, table: string, predicate: Fields, assignments: Fields): Promise<number> {
  const statement = buildUpdate(table, assignments, predicate);
  const result = await db.query(statement.text, statement.values);
  return result.rowCount ?? 0;
}

export async function executeInsert(db: Queryable, table: string, fields: Fields): Promise<void> {
  const statement = buildInsert(table, fields);
  await db.query(statement.text, statement.values);
}

export async function executeQuery<T extends QueryResultRow>(db: Queryable, text: string, values: unknown[] = []): Promise<T[]> {
  const result = await db.query<T>(text, values);
  return result.rows;
}

export async function tableExists(db: Queryable, schema: string, tableName: string): Promise<boolean> {
  const rows = await executeQuery<{ found: boolean }>(
    db,
    `select exists (
       select 1 from information_schema.tables
       where table_schema = $1 and table_name = $2
     ) as found`,
    [schema, tableName]
  );
  return rows[0]?.found === true;
}
