/**
 * Tests for Technical Indicators
 */

import { describe, it, expect } from 'vitest';
import { InsufficientDataError } from '@equity-pilot/shared';
import {
  calculateSMA,
  calculateEMA,
  calculateRSI,
  calculateMACD,
  calculateBollingerBands,
  calculateVolumeMA,
  buildSnapshot,
  requiredBars,
} from './index.js';
import { barsFromCloses, makeBar } from '../test-utils/bars.js';

const TREND = {
  emaShort: 5,
  emaLong: 15,
  macdFast: 12,
  macdSlow: 26,
  macdSignal: 9,
  volumeMaPeriod: 20,
  minVolumeFactor: 1.5,
};

const REVERSAL = {
  rsiPeriod: 14,
  rsiOversold: 30,
  rsiOverbought: 70,
  bollingerPeriod: 20,
  bollingerStd: 2,
};

describe('SMA', () => {
  it('averages each window', () => {
    expect(calculateSMA([1, 2, 3, 4, 5], 3)).toEqual([2, 3, 4]);
  });

  it('throws below the period and succeeds at it', () => {
    expect(() => calculateSMA([1, 2], 3)).toThrow(InsufficientDataError);
    expect(calculateSMA([1, 2, 3], 3)).toEqual([2]);
  });
});

describe('EMA', () => {
  it('seeds with the simple average and smooths afterwards', () => {
    const ema = calculateEMA([1, 2, 3, 4, 5], 3);

    expect(ema).toHaveLength(3);
    expect(ema[0]).toBeCloseTo(2, 10);
    expect(ema[1]).toBeCloseTo(3, 10);
    expect(ema[2]).toBeCloseTo(4, 10);
  });

  it('throws InsufficientDataError with the counts', () => {
    try {
      calculateEMA([1, 2, 3, 4], 5);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InsufficientDataError);
      if (error instanceof InsufficientDataError) {
        expect(error.required).toBe(5);
        expect(error.available).toBe(4);
      }
    }
  });
});

describe('RSI', () => {
  it('needs period + 1 values', () => {
    expect(() => calculateRSI([1, 2], 2)).toThrow(InsufficientDataError);
    expect(calculateRSI([1, 2, 3], 2)).toEqual([100]);
  });

  it('applies Wilder smoothing after the first average', () => {
    // changes +1, -1, +1
    expect(calculateRSI([1, 2, 1, 2], 2)).toEqual([50, 75]);
  });

  it('reads 0 on a falling series and 50 on a flat one', () => {
    expect(calculateRSI([5, 4, 3, 2, 1], 4)).toEqual([0]);
    expect(calculateRSI([3, 3, 3, 3], 3)).toEqual([50]);
  });
});

describe('MACD', () => {
  it('needs slow + signal - 1 values', () => {
    expect(() => calculateMACD([1, 2, 3], 2, 3, 2)).toThrow(InsufficientDataError);
    expect(calculateMACD([1, 2, 3, 4], 2, 3, 2)).toHaveLength(1);
  });

  it('is constant on a linear series', () => {
    const points = calculateMACD([1, 2, 3, 4, 5, 6], 2, 3, 2);

    expect(points).toHaveLength(3);
    for (const p of points) {
      expect(p.macd).toBeCloseTo(0.5, 10);
      expect(p.signal).toBeCloseTo(0.5, 10);
      expect(p.histogram).toBeCloseTo(0, 10);
    }
  });
});

describe('Bollinger Bands', () => {
  it('uses the population standard deviation', () => {
    const [band] = calculateBollingerBands([1, 2, 3, 4, 5], 5, 2);

    expect(band?.middle).toBeCloseTo(3, 10);
    expect(band?.upper).toBeCloseTo(3 + 2 * Math.SQRT2, 10);
    expect(band?.lower).toBeCloseTo(3 - 2 * Math.SQRT2, 10);
  });

  it('throws below the period', () => {
    expect(() => calculateBollingerBands([1, 2, 3, 4], 5, 2)).toThrow(InsufficientDataError);
  });
});

describe('volume MA', () => {
  it('averages volume', () => {
    const bars = barsFromCloses('TEST', [1, 2, 3], 300);
    expect(calculateVolumeMA(bars, 3)).toEqual([300]);
  });
});

describe('buildSnapshot', () => {
  it('sizes the window from the requested groups', () => {
    expect(requiredBars({ trend: TREND })).toBe(34);
    expect(requiredBars({ reversal: REVERSAL })).toBe(20);
    expect(requiredBars({})).toBe(1);
  });

  it('fills only the requested groups', () => {
    const bars = barsFromCloses('TEST', Array.from({ length: 20 }, (_, i) => 100 + i));
    const snapshot = buildSnapshot(bars, { reversal: REVERSAL });

    expect(snapshot.symbol).toBe('TEST');
    expect(snapshot.timestamp).toBe(bars[19]?.timestamp);
    expect(snapshot.close).toBe(119);
    expect(snapshot.trend).toBeNull();
    expect(snapshot.reversal?.rsi).toBe(100);
    expect(snapshot.reversal?.bbMiddle).toBeCloseTo(109.5, 10);
    expect(snapshot.reversal).toMatchObject({
      bullishPatterns: [],
      bearishPatterns: [],
      rsiDivergence: 0,
      nearSupport: null,
      nearResistance: null,
    });
  });

  it('reports price-action context for the last bar', () => {
    const closes = [100, 99, 98, 97, 96, 95, 94, 93, 92, 91, 90, 89, 88, 87, 86, 85, 84, 83, 82];
    const bars = [
      ...barsFromCloses('TEST', closes),
      makeBar('TEST', 19, { open: 82, close: 83, high: 83, low: 79 }),
    ];

    expect(buildSnapshot(bars, { reversal: REVERSAL }).reversal?.bullishPatterns).toEqual(['hammer']);
  });

  it('throws until the longest window fills', () => {
    const closes = Array.from({ length: 34 }, (_, i) => 100 + Math.sin(i));
    const bars = barsFromCloses('TEST', closes);

    expect(() => buildSnapshot(bars.slice(0, 33), { trend: TREND })).toThrow(InsufficientDataError);
    expect(buildSnapshot(bars, { trend: TREND }).trend).not.toBeNull();
  });

  it('is reproducible for the same window', () => {
    const closes = Array.from({ length: 40 }, (_, i) => 100 + Math.cos(i / 3) * 5);
    const bars = barsFromCloses('TEST', closes);
    const request = { trend: TREND, reversal: REVERSAL };

    expect(JSON.stringify(buildSnapshot(bars, request))).toBe(
      JSON.stringify(buildSnapshot(bars, request))
    );
  });
});
