import { query } from '../db.js';
import type { ImportLogEntry } from './import-log.js';
import type { ImportOutcome, ImportStatus } from './rejection-import.js';

type ImportRunRow = {
  id: string;
  file_name: string;
  status: ImportStatus;
  row_count: number;
  summary: ImportOutcome | string | null;
  error_message: string | null;
  created_by: string | null;
  created_at: Date;
  finished_at: Date | null;
};

export type ImportRun = {
  id: string;
  fileName: string;
  status: ImportStatus;
  rowCount: number;
  error: string | null;
  createdBy: string | null;
  createdAt: Date;
  finishedAt: Date | null;
};

export type ImportRunDetail = ImportRun & {
  summary: unknown;
  logs: ImportLogEntry[];
};

type RecordRunInput = {
  fileName: string;
  userId: string | null;
  outcome: ImportOutcome;
  logs: ImportLogEntry[];
  startedAt: Date;
};

let initialized = false;

export async function ensureImportRunTables(): Promise<void> {
  if (initialized) return;
  await query(`
    create table if not exists rejection_import_run (
      id uuid primary key default gen_random_uuid(),
      file_name text not null,
      status text not null,
      row_count integer not null default 0,
      summary jsonb,
      error_message text,
      created_by text,
      created_at timestamptz not null default now(),
      finished_at timestamptz
    )
  `);
  await query(`
    create table if not exists rejection_import_log (
      id bigserial primary key,
      run_id uuid not null references rejection_import_run(id) on delete cascade,
      level text not null default 'info',
      message text not null,
      created_at timestamptz not null default now()
    )
  `);
  await query(
    `create index if not exists idx_rejection_import_log_run on rejection_import_log(run_id, created_at)`
  );
  initialized = true;
}

function mapRun(row: ImportRunRow): ImportRun {
  return {
    id: row.id,
    fileName: row.file_name,
    status: row.status,
    rowCount: row.row_count,
    error: row.error_message,
    createdBy: row.created_by,
    createdAt: row.created_at,
    finishedAt: row.finished_at,
  };
}

function parseSummary(summary: ImportRunRow['summary']): unknown {
  if (typeof summary !== 'string') return summary;
  try {
    return JSON.parse(summary);
  } catch (error) {
    return { raw: summary, parseError: error instanceof Error ? error.message : String(error) };
  }
}

export async function recordImportRun({ fileName, userId, outcome, logs, startedAt }: RecordRunInput): Promise<string> {
  const { rows } = await query<{ id: string }>(
    `insert into rejection_import_run (file_name, status, row_count, summary, error_message, created_by, created_at, finished_at)
     values ($1, $2, $3, $4::jsonb, $5, $6, $7, now())
     returning id`,
    [fileName, outcome.status, outcome.rowCount, JSON.stringify(outcome), outcome.error, userId, startedAt]
  );
  const runId = rows[0].id;

  for (const entry of logs) {
    await query(`insert into rejection_import_log (run_id, level, message, created_at) values ($1, $2, $3, $4)`, [
      runId,
      entry.level,
      entry.message,
      entry.createdAt,
    ]);
  }
  return runId;
}

export async function listImportRuns(limit: number): Promise<ImportRun[]> {
  const { rows } = await query<ImportRunRow>(
    `select id, file_name, status, row_count, null as summary, error_message, created_by, created_at, finished_at
       from rejection_import_run
      order by created_at desc
      limit $1`,
    [limit]
  );
  return rows.map(mapRun);
}

export async function getImportRun(runId: string): Promise<ImportRunDetail | null> {
  const { rows } = await query<ImportRunRow>(
    `select id, file_name, status, row_count, summary, error_message, created_by, created_at, finished_at
       from rejection_import_run
      where id = $1`,
    [runId]
  );
  const record = rows[0];
  if (!record) return null;

  const logRows = await query<{ level: ImportLogEntry['level']; message: string; created_at: Date }>(
    `select level, message, created_at from rejection_import_log where run_id = $1 order by id`,
    [runId]
  );

  return {
    ...mapRun(record),
    summary: parseSummary(record.summary),
    logs: logRows.rows.map((log) => ({
      level: log.level,
      message: log.message,
      createdAt: log.created_at.toISOString(),
    })),
  };
}
