import { query } from '../db.js';
import { resolveEnvironment, type StoreEnvironment } from '../utils/environment.js';

export type StoreSession = {
  user: string;
  database: string;
  schema: string | null;
  role: string | null;
  environment: StoreEnvironment;
  environmentDefaulted: boolean;
};

export async function describeStoreSession(): Promise<StoreSession> {
  const { rows } = await query<{ user: string; database: string; schema: string | null; role: string | null }>(
    `select current_user as "user", current_database() as "database", current_schema() as "schema",
            current_setting('role', true) as "role"`
  );
  const row = rows[0];
  const { environment, defaulted } = resolveEnvironment(row.database);
  return {
    user: row.user,
    database: row.database,
    schema: row.schema,
    role: row.role,
    environment,
    environmentDefaulted: defaulted,
  };
}
