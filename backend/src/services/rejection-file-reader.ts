import path from 'node:path';
import { TextDecoder } from 'node:util';
import { parse } from 'csv-parse/sync';
import * as XLSX from 'xlsx';
import type { CellValue, RawTable } from '../types/rejections.js';
import { describeError } from '../utils/describe-error.js';

export const CSV_ENCODINGS = ['utf-8', 'latin1', 'iso-8859-1', 'windows-1252', 'cp1252'] as const;
export const SUPPORTED_EXTENSIONS = ['.csv', '.xlsx', '.xls'];

export class UnsupportedFileError extends Error {
  constructor(fileName: string) {
    super(`unsupported file type: ${fileName} (expected ${SUPPORTED_EXTENSIONS.join(', ')})`);
    this.name = 'UnsupportedFileError';
  }
}

export class FileReadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FileReadError';
  }
}

export function decodeText(buffer: Buffer): { text: string; encoding: string } {
  for (const encoding of CSV_ENCODINGS) {
    try {
      const text = new TextDecoder(encoding, { fatal: true }).decode(buffer);
      return { text, encoding };
    } catch {
      continue;
    }
  }
  throw new FileReadError(`could not decode the file; tried encodings: ${CSV_ENCODINGS.join(', ')}`);
}

function detectDelimiter(text: string): string {
  const headerLine = text.split(/\r?\n/, 1)[0] ?? '';
  const semicolons = headerLine.split(';').length - 1;
  const commas = headerLine.split(',').length - 1;
  return semicolons > commas ? ';' : ',';
}

function uniqueHeaders(headers: string[]): string[] {
  const counts = new Map<string, number>();
  return headers.map((header) => {
    const seen = counts.get(header) ?? 0;
    counts.set(header, seen + 1);
    return seen ? `${header}.${seen}` : header;
  });
}

function toCell(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string') return value.length ? value : null;
  if (typeof value === 'number' || typeof value === 'boolean' || value instanceof Date) return value;
  return String(value);
}

function buildTable(grid: unknown[][]): RawTable {
  const [headerRow = [], ...dataRows] = grid;
  const headers = uniqueHeaders(headerRow.map((header) => (header === null || header === undefined ? '' : String(header).trim())));
  const table: RawTable = {};
  headers.forEach((header, columnIndex) => {
    table[header] = dataRows.map((row) => toCell(row[columnIndex]));
  });
  return table;
}

export function readCsv(buffer: Buffer): RawTable {
  const { text } = decodeText(buffer);
  let grid: string[][];
  try {
    grid = parse(text, {
      bom: true,
      delimiter: detectDelimiter(text),
      relax_column_count: true,
      skip_empty_lines: true,
    });
  } catch (error) {
    throw new FileReadError(`could not parse the CSV file: ${describeError(error)}`);
  }
  return buildTable(grid);
}

export function readWorkbook(buffer: Buffer): RawTable {
  let grid: unknown[][];
  try {
    const workbook = XLSX.read(buffer, { type: 'buffer', cellDates: true });
    const sheetName = workbook.SheetNames[0];
    if (!sheetName) {
      throw new FileReadError('the workbook has no sheets');
    }
    grid = XLSX.utils.sheet_to_json<unknown[]>(workbook.Sheets[sheetName], {
      header: 1,
      defval: null,
      blankrows: false,
    });
  } catch (error) {
    if (error instanceof FileReadError) throw error;
    throw new FileReadError(`could not read the workbook: ${describeError(error)}`);
  }
  return buildTable(grid);
}

export function readRejectionFile(buffer: Buffer, fileName: string): RawTable {
  const extension = path.extname(fileName).toLowerCase();
  if (extension === '.csv') return readCsv(buffer);
  if (extension === '.xlsx' || extension === '.xls') return readWorkbook(buffer);
  throw new UnsupportedFileError(fileName);
}
