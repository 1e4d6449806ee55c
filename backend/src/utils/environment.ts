export type StoreEnvironment = 'DEV' | 'PRD';

export type EnvironmentResolution = {
  environment: StoreEnvironment;
  defaulted: boolean;
};

/**
 * Environment from the database name prefix. Names with neither prefix fall
 * back to DEV and are flagged so callers can surface the misconfiguration.
 */
export function resolveEnvironment(databaseName: string): EnvironmentResolution {
  const normalized = databaseName.trim().toUpperCase();
  if (normalized.startsWith('DEV_')) return { environment: 'DEV', defaulted: false };
  if (normalized.startsWith('PRD_')) return { environment: 'PRD', defaulted: false };
  return { environment: 'DEV', defaulted: true };
}
