/**
 * Tests for candlestick patterns, levels and divergence
 */

import { describe, it, expect } from 'vitest';
import {
  detectPatterns,
  findSupportResistance,
  nearestLevel,
  rsiDivergence,
  type Candle,
} from './patterns.js';

const candle = (open: number, close: number, high: number, low: number): Candle => ({ open, close, high, low });

describe('detectPatterns', () => {
  it('finds a hammer', () => {
    expect(detectPatterns([candle(100, 101, 101, 97)])).toEqual({ bullish: ['hammer'], bearish: [] });
  });

  it('calls a hammer shape after a rise a hanging man', () => {
    const rising = [0, 1, 2, 3, 4].map((i) => candle(90 + i, 91 + i, 91 + i, 90 + i));

    expect(detectPatterns([...rising, candle(100, 101, 101, 97)])).toEqual({
      bullish: [],
      bearish: ['hanging_man'],
    });
  });

  it('finds a shooting star', () => {
    expect(detectPatterns([candle(100, 99, 103, 99)]).bearish).toEqual(['shooting_star']);
  });

  it('finds a bullish engulfing', () => {
    const patterns = detectPatterns([candle(102, 100, 102.5, 99.5), candle(99.5, 103, 103.2, 99.4)]);
    expect(patterns).toEqual({ bullish: ['bullish_engulfing'], bearish: [] });
  });

  it('finds a piercing line', () => {
    const patterns = detectPatterns([candle(104, 100, 104.2, 99.8), candle(99, 103, 103.1, 98.9)]);
    expect(patterns).toEqual({ bullish: ['piercing_line'], bearish: [] });
  });

  it('finds a morning star', () => {
    const patterns = detectPatterns([
      candle(110, 102, 110.5, 101.5),
      candle(101, 100.8, 101.5, 100),
      candle(101, 108, 108.5, 100.8),
    ]);
    expect(patterns).toEqual({ bullish: ['morning_star'], bearish: [] });
  });

  it('finds an evening star', () => {
    const patterns = detectPatterns([
      candle(100, 108, 108.5, 99.5),
      candle(109, 109.2, 110, 108.5),
      candle(109, 102, 109.2, 101.5),
    ]);
    expect(patterns).toEqual({ bullish: [], bearish: ['evening_star'] });
  });

  it('finds three white soldiers and three black crows', () => {
    const soldiers = [candle(100, 102, 102.1, 99.9), candle(101, 104, 104.2, 100.9), candle(103, 106, 106.1, 102.9)];
    const crows = [candle(106, 104, 106.1, 103.9), candle(105, 102, 105.1, 101.8), candle(103, 100, 103.1, 99.9)];

    expect(detectPatterns(soldiers).bullish).toEqual(['three_white_soldiers']);
    expect(detectPatterns(crows).bearish).toEqual(['three_black_crows']);
  });

  it('finds nothing in flat candles', () => {
    const flat = candle(100, 100, 100, 100);
    expect(detectPatterns([flat, flat, flat])).toEqual({ bullish: [], bearish: [] });
    expect(detectPatterns([])).toEqual({ bullish: [], bearish: [] });
  });
});

describe('support and resistance', () => {
  const ranges: Array<[number, number]> = [
    [100, 104],
    [98, 102],
    [95, 99],
    [97, 101],
    [99, 106],
    [98, 103],
    [96, 100],
    [95.5, 99],
    [97, 101],
    [99, 105],
    [100, 104],
  ];
  const bars = ranges.map(([low, high]) => candle(low, high, high, low));
  const options = { window: 2, tolerance: 0.02, minTouches: 2 };

  it('groups swing lows and keeps levels price revisited', () => {
    expect(findSupportResistance(bars, options)).toEqual({ support: [95.25], resistance: [106] });
  });

  it('drops levels with too few touches', () => {
    expect(findSupportResistance(bars, { ...options, minTouches: 4 })).toEqual({ support: [], resistance: [] });
  });

  it('picks the closest level within tolerance', () => {
    expect(nearestLevel(96, [95.25, 106], 0.02)).toBe(95.25);
    expect(nearestLevel(100, [95.25, 106], 0.02)).toBeNull();
    expect(nearestLevel(100, [98.5, 99.5], 0.02)).toBe(99.5);
  });
});

describe('rsiDivergence', () => {
  const lowerLow = [10, 9, 8, 9, 10, 9, 7, 8, 9];
  const higherHigh = [10, 11, 12, 11, 10, 11, 13, 12, 11];

  it('is bullish when RSI makes a higher low at a lower price low', () => {
    expect(rsiDivergence(lowerLow, [50, 40, 30, 40, 50, 40, 35, 45, 50])).toBe(1);
  });

  it('is bearish when RSI makes a lower high at a higher price high', () => {
    expect(rsiDivergence(higherHigh, [50, 60, 70, 60, 50, 60, 65, 55, 50])).toBe(-1);
  });

  it('is none when RSI confirms the price low', () => {
    expect(rsiDivergence(lowerLow, [50, 40, 30, 40, 50, 40, 25, 45, 50])).toBe(0);
  });

  it('waits for two closes after the swing', () => {
    expect(rsiDivergence(lowerLow.slice(0, 8), [50, 40, 30, 40, 50, 40, 35, 45])).toBe(0);
  });

  it('ignores swings older than the RSI series', () => {
    expect(rsiDivergence(lowerLow, [50, 40, 35, 45, 50])).toBe(0);
  });
});
