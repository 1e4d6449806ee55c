import type { ImportLog, ImportLogLevel } from '../../src/services/import-log.js';

export class CollectingLog implements ImportLog {
  readonly lines: { level: ImportLogLevel; message: string }[] = [];

  write(level: ImportLogLevel, message: string): void {
    this.lines.push({ level, message });
  }

  messages(level: ImportLogLevel): string[] {
    return this.lines.filter((line) => line.level === level).map((line) => line.message);
  }
}
