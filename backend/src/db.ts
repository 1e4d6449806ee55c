import { Pool, type QueryResult, type QueryResultRow } from 'pg';
import { config } from './config.js';

const pool = new Pool(config.db);

export type Queryable = {
  query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<T>>;
};

export async function query<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<QueryResult<T>> {
  return pool.query<T>(text, params);
}

export const database: Queryable = { query };

export async function closePool(): Promise<void> {
  await pool.end();
}
