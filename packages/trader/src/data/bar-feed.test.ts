import { describe, it, expect } from 'vitest';
import { DataIntegrityError } from '@equity-pilot/shared';
import { DAY, START, barsFromCloses, makeBar } from '../test-utils/bars.js';
import { InMemoryBarFeed, collectBars, validateBars } from './bar-feed.js';

describe('validateBars', () => {
  it('accepts a strictly increasing series', () => {
    const bars = barsFromCloses('SBER', [100, 101, 102]);
    expect(validateBars('SBER', bars)).toEqual(bars);
  });

  it('rejects duplicate timestamps', () => {
    const bars = [makeBar('SBER', 0, { close: 100 }), makeBar('SBER', 0, { close: 101 })];

    expect(() => validateBars('SBER', bars)).toThrow(DataIntegrityError);
    expect(() => validateBars('SBER', bars)).toThrow(`SBER: bar #1 duplicates timestamp ${START}`);
  });

  it('rejects out-of-order bars', () => {
    const bars = [makeBar('SBER', 1, { close: 100 }), makeBar('SBER', 0, { close: 101 })];

    expect(() => validateBars('SBER', bars)).toThrow(`timestamp ${START} is before ${START + DAY}`);
  });

  it('rejects bars that break OHLC consistency', () => {
    const bar = { ...makeBar('SBER', 0, { close: 100 }), high: 99 };

    expect(() => validateBars('SBER', [bar])).toThrow(DataIntegrityError);
  });

  it('rejects bars of another symbol', () => {
    expect(() => validateBars('SBER', barsFromCloses('GAZP', [100]))).toThrow('SBER: bar #0 belongs to GAZP');
  });

  it('enforces the maximum gap when given', () => {
    const bars = [makeBar('SBER', 0, { close: 100 }), makeBar('SBER', 3, { close: 101 })];

    expect(() => validateBars('SBER', bars, { maxGapSeconds: 2 * DAY })).toThrow(
      `gap of ${3 * DAY}s exceeds ${2 * DAY}s`
    );
    expect(validateBars('SBER', bars)).toHaveLength(2);
  });
});

describe('InMemoryBarFeed', () => {
  it('restarts from the first bar on every pass', async () => {
    const feed = new InMemoryBarFeed(barsFromCloses('SBER', [100, 101, 102]));

    const first = await collectBars(feed, 'SBER');
    const second = await collectBars(feed, 'SBER');

    expect(first.map((b) => b.close)).toEqual([100, 101, 102]);
    expect(second).toEqual(first);
  });

  it('keeps symbols apart', async () => {
    const feed = new InMemoryBarFeed([
      ...barsFromCloses('SBER', [100, 101]),
      ...barsFromCloses('GAZP', [160]),
    ]);

    expect(feed.getSymbols()).toEqual(['SBER', 'GAZP']);
    expect(await collectBars(feed, 'GAZP')).toHaveLength(1);
    expect(await collectBars(feed, 'LKOH')).toEqual([]);
  });

  it('returns only bars newer than the given timestamp', async () => {
    const feed = new InMemoryBarFeed(barsFromCloses('SBER', [100, 101, 102]));

    const fresh = await feed.latestBars('SBER', START + DAY);

    expect(fresh.map((b) => b.close)).toEqual([102]);
    expect(await feed.latestBars('SBER', null)).toHaveLength(3);
  });
});
