/**
 * CSV bar feed
 *
 * Reads `<SYMBOL>.csv` files from a directory. Columns are matched by
 * header name: timestamp, open, high, low, close, volume. Timestamps may
 * be Unix seconds or ISO 8601 strings.
 */

import * as fs from 'fs';
import * as path from 'path';
import { DataIntegrityError, type Bar } from '@equity-pilot/shared';
import type { BarFeed } from './bar-feed.js';

const COLUMNS = ['timestamp', 'open', 'high', 'low', 'close', 'volume'] as const;
type Column = (typeof COLUMNS)[number];

export interface CsvBarFeedOptions {
  /** Directory holding one CSV per symbol */
  directory: string;
  delimiter?: string;
}

/**
 * Parse a CSV line handling quoted values
 */
function parseCSVLine(line: string, delimiter: string): string[] {
  const result: string[] = [];
  let current = '';
  let inQuotes = false;

  for (const char of line) {
    if (char === '"') {
      inQuotes = !inQuotes;
    } else if (char === delimiter && !inQuotes) {
      result.push(current.trim());
      current = '';
    } else {
      current += char;
    }
  }

  result.push(current.trim());
  return result;
}

const HAS_ZONE = /(?:Z|[+-]\d{2}:?\d{2})$/i;
const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Unix seconds from a numeric or ISO 8601 cell; NaN when unreadable.
 * Date-times without an offset are read as UTC.
 */
export function parseTimestamp(value: string): number {
  if (/^\d+$/.test(value)) {
    return parseInt(value, 10);
  }
  const iso = DATE_ONLY.test(value) || HAS_ZONE.test(value) ? value : `${value.replace(' ', 'T')}Z`;
  return Math.floor(Date.parse(iso) / 1000);
}

/**
 * Parse CSV text into bars. Rows are kept in file order; ordering is
 * checked by validateBars, not repaired here.
 */
export function parseBarsCsv(symbol: string, content: string, delimiter = ','): Bar[] {
  const lines = content
    .split(/\r?\n/)
    .map((text, i) => ({ text, number: i + 1 }))
    .filter((line) => line.text.trim().length > 0);
  const [header, ...rows] = lines;
  if (header === undefined) {
    return [];
  }

  const headers = parseCSVLine(header.text, delimiter).map((h) => h.toLowerCase());
  const columns = new Map<Column, number>();
  for (const column of COLUMNS) {
    const i = headers.indexOf(column);
    if (i === -1) {
      throw new DataIntegrityError(symbol, 0, `CSV is missing column "${column}"`);
    }
    columns.set(column, i);
  }

  return rows.map((line, index) => {
    const cells = parseCSVLine(line.text, delimiter);
    const cell = (column: Column): string => cells[columns.get(column) ?? -1] ?? '';

    const bar: Bar = {
      symbol,
      timestamp: parseTimestamp(cell('timestamp')),
      open: parseFloat(cell('open')),
      high: parseFloat(cell('high')),
      low: parseFloat(cell('low')),
      close: parseFloat(cell('close')),
      volume: parseFloat(cell('volume')),
    };

    if (Object.values(bar).some((v) => typeof v === 'number' && Number.isNaN(v))) {
      throw new DataIntegrityError(symbol, index, `unreadable CSV row on line ${line.number}: "${line.text}"`);
    }
    return bar;
  });
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class CsvBarFeed implements BarFeed {
  private readonly directory: string;
  private readonly delimiter: string;

  constructor(options: CsvBarFeedOptions) {
    this.directory = options.directory;
    this.delimiter = options.delimiter ?? ',';
  }

  fileFor(symbol: string): string {
    return path.join(this.directory, `${symbol}.csv`);
  }

  async *bars(symbol: string): AsyncIterable<Bar> {
    const file = this.fileFor(symbol);
    let content: string;
    try {
      content = await fs.promises.readFile(file, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        throw new DataIntegrityError(symbol, 0, `no data file ${file}`);
      }
      throw error;
    }
    yield* parseBarsCsv(symbol, content, this.delimiter);
  }
}
