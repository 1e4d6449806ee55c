import type { Logger } from 'pino';

export type ImportLogLevel = 'info' | 'warn' | 'error';

export type ImportLogEntry = {
  createdAt: string;
  level: ImportLogLevel;
  message: string;
};

export interface ImportLog {
  write(level: ImportLogLevel, message: string): void;
}

export const silentImportLog: ImportLog = {
  write() {},
};

export type BufferedImportLog = ImportLog & {
  entries(): ImportLogEntry[];
};

/** Keeps every entry for later persistence and mirrors it to `logger` when given. */
export function createBufferedImportLog(logger?: Logger, now: () => Date = () => new Date()): BufferedImportLog {
  const buffer: ImportLogEntry[] = [];
  return {
    write(level, message) {
      buffer.push({ createdAt: now().toISOString(), level, message });
      logger?.[level](message);
    },
    entries() {
      return [...buffer];
    },
  };
}
