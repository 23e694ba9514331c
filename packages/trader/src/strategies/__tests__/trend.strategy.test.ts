import { describe, it, expect } from 'vitest';
import type { IndicatorSnapshot, TrendIndicators } from '@equity-pilot/shared';
import { TrendStrategy } from '../trend.strategy.js';

const PARAMS = {
  emaShort: 5,
  emaLong: 12,
  macdFast: 5,
  macdSlow: 12,
  macdSignal: 3,
  volumeMaPeriod: 20,
  minVolumeFactor: 1.5,
};

function snapshot(timestamp: number, trend: Partial<TrendIndicators>, volume = 1000): IndicatorSnapshot {
  return {
    symbol: 'SBER',
    timestamp,
    close: 100,
    volume,
    trend: {
      emaShort: 100,
      emaLong: 100,
      macd: 0,
      macdSignal: 0,
      macdHistogram: 0,
      volumeMa: 1000,
      ...trend,
    },
    reversal: null,
  };
}

describe('TrendStrategy', () => {
  const strategy = new TrendStrategy(PARAMS);

  it('goes long on an upward cross with histogram and volume confirmation', () => {
    const signal = strategy.evaluate([
      snapshot(1, { emaShort: 99 }),
      snapshot(2, { emaShort: 101, macdHistogram: 0.1 }, 1600),
    ]);

    expect(signal.direction).toBe('long');
    expect(signal.strategyName).toBe('trend');
    expect(signal.timestamp).toBe(2);
    expect(signal.strength).toBe(0.7);
    expect(signal.reasons[0]).toBe('EMA 5 crossed above EMA 12');
  });

  it('treats a zero spread on the previous bar as below', () => {
    const signal = strategy.evaluate([
      snapshot(1, {}),
      snapshot(2, { emaShort: 101, macdHistogram: 0.1 }, 1600),
    ]);

    expect(signal.direction).toBe('long');
  });

  it('stays flat without volume confirmation', () => {
    const signal = strategy.evaluate([
      snapshot(1, { emaShort: 99 }),
      snapshot(2, { emaShort: 101, macdHistogram: 0.1 }, 1400),
    ]);

    expect(signal.direction).toBe('flat');
    expect(signal.strength).toBe(0);
  });

  it('stays flat when the histogram disagrees', () => {
    const signal = strategy.evaluate([
      snapshot(1, { emaShort: 99 }),
      snapshot(2, { emaShort: 101, macdHistogram: -0.1 }, 2000),
    ]);

    expect(signal.direction).toBe('flat');
  });

  it('stays flat while the spread keeps its sign', () => {
    const signal = strategy.evaluate([
      snapshot(1, { emaShort: 101 }),
      snapshot(2, { emaShort: 102, macdHistogram: 0.5 }, 3000),
    ]);

    expect(signal.direction).toBe('flat');
  });

  it('goes short on a downward cross', () => {
    const signal = strategy.evaluate([
      snapshot(1, { emaShort: 101 }),
      snapshot(2, { emaShort: 99, macdHistogram: -0.3 }, 2500),
    ]);

    expect(signal.direction).toBe('short');
    expect(signal.strength).toBe(0.9);
  });

  it('needs a previous snapshot', () => {
    const signal = strategy.evaluate([snapshot(2, { emaShort: 101, macdHistogram: 1 }, 5000)]);

    expect(signal.direction).toBe('flat');
    expect(signal.reasons).toEqual(['no previous bar']);
  });
});
