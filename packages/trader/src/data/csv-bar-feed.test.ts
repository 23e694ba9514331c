import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DataIntegrityError } from '@equity-pilot/shared';
import { CsvBarFeed, parseBarsCsv, parseTimestamp } from './csv-bar-feed.js';
import { collectBars } from './bar-feed.js';

describe('parseTimestamp', () => {
  it('reads unix seconds', () => {
    expect(parseTimestamp('1704067200')).toBe(1_704_067_200);
  });

  it('reads ISO dates', () => {
    expect(parseTimestamp('2024-01-02T00:00:00Z')).toBe(1_704_153_600);
  });

  it('reads date-times without an offset as UTC', () => {
    expect(parseTimestamp('2024-01-02 10:00')).toBe(1_704_189_600);
    expect(parseTimestamp('2024-01-02T10:00:00')).toBe(1_704_189_600);
  });

  it('honours an explicit offset', () => {
    expect(parseTimestamp('2024-01-02T10:00:00+03:00')).toBe(1_704_178_800);
  });

  it('returns NaN for garbage', () => {
    expect(parseTimestamp('yesterday')).toBeNaN();
  });
});

describe('parseBarsCsv', () => {
  it('matches columns by header name in any order', () => {
    const csv = ['Close,Timestamp,Open,High,Low,Volume', '101,1704067200,100,102,99,1500', ''].join('\n');

    expect(parseBarsCsv('SBER', csv)).toEqual([
      { symbol: 'SBER', timestamp: 1_704_067_200, open: 100, high: 102, low: 99, close: 101, volume: 1500 },
    ]);
  });

  it('handles quoted cells and CRLF line endings', () => {
    const csv = 'timestamp,open,high,low,close,volume\r\n"2024-01-01T00:00:00Z",1,2,0.5,1.5,10\r\n';

    const [bar] = parseBarsCsv('GAZP', csv);

    expect(bar?.timestamp).toBe(1_704_067_200);
    expect(bar?.close).toBe(1.5);
  });

  it('fails on a missing column', () => {
    expect(() => parseBarsCsv('SBER', 'timestamp,open,high,low,close\n1,1,1,1,1')).toThrow(
      'CSV is missing column "volume"'
    );
  });

  it('fails on an unreadable row', () => {
    const csv = 'timestamp,open,high,low,close,volume\n1704067200,abc,2,1,1.5,10';

    expect(() => parseBarsCsv('SBER', csv)).toThrow(DataIntegrityError);
    expect(() => parseBarsCsv('SBER', csv)).toThrow(
      'SBER: bar #0 unreadable CSV row on line 2: "1704067200,abc,2,1,1.5,10"'
    );
  });

  it('reports the file line of a bad row past blank lines', () => {
    const csv = 'timestamp,open,high,low,close,volume\n\n1704067200,1,2,0.5,1.5,10\n1704153600,x,2,1,1.5,10\n';

    expect(() => parseBarsCsv('SBER', csv)).toThrow(
      'SBER: bar #1 unreadable CSV row on line 4: "1704153600,x,2,1,1.5,10"'
    );
  });

  it('returns nothing for an empty file', () => {
    expect(parseBarsCsv('SBER', '')).toEqual([]);
  });
});

describe('CsvBarFeed', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'csv-feed-'));
    fs.writeFileSync(
      path.join(dir, 'SBER.csv'),
      'timestamp,open,high,low,close,volume\n1704067200,100,101,99,100.5,1000\n1704153600,100.5,102,100,101.5,1200\n'
    );
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads <SYMBOL>.csv from its directory', async () => {
    const feed = new CsvBarFeed({ directory: dir });

    const bars = await collectBars(feed, 'SBER');

    expect(feed.fileFor('SBER')).toBe(path.join(dir, 'SBER.csv'));
    expect(bars.map((b) => b.close)).toEqual([100.5, 101.5]);
  });

  it('re-reads the file on every pass', async () => {
    const feed = new CsvBarFeed({ directory: dir });

    await collectBars(feed, 'SBER');
    fs.appendFileSync(path.join(dir, 'SBER.csv'), '1704240000,101.5,103,101,102,900\n');

    expect(await collectBars(feed, 'SBER')).toHaveLength(3);
  });

  it('rejects with a data error when the file does not exist', async () => {
    const feed = new CsvBarFeed({ directory: dir });
    const pass = collectBars(feed, 'LKOH');

    await expect(pass).rejects.toThrow(DataIntegrityError);
    await expect(pass).rejects.toThrow(`LKOH: bar #0 no data file ${path.join(dir, 'LKOH.csv')}`);
  });
});
