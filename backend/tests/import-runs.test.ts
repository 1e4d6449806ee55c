import { ensureImportRunTables } from '../src/services/import-runs.js';

const mockQuery = jest.fn(async (_text: string, _params?: unknown[]) => ({ rows: [] }));

jest.mock('../src/db.js', () => ({
  query: (text: string, params?: unknown[]) => mockQuery(text, params),
}));

describe('ensureImportRunTables', () => {
  it('creates the run and log tables without installing extensions, once per process', async () => {
    await ensureImportRunTables();
    await ensureImportRunTables();

    const statements = mockQuery.mock.calls.map(([text]) => text.trim().split(/\s+/).slice(0, 6).join(' '));
    expect(statements).toEqual([
      'create table if not exists rejection_import_run',
      'create table if not exists rejection_import_log',
      'create index if not exists idx_rejection_import_log_run',
    ]);
  });
});
