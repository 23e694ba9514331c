import { describe, it, expect } from 'vitest';
import type { IndicatorSnapshot, ReversalIndicators } from '@equity-pilot/shared';
import { ReversalStrategy } from '../reversal.strategy.js';

const PARAMS = {
  rsiPeriod: 14,
  rsiOversold: 30,
  rsiOverbought: 70,
  bollingerPeriod: 20,
  bollingerStd: 2,
};

function snapshot(close: number, reversal: Partial<ReversalIndicators>): IndicatorSnapshot {
  return {
    symbol: 'GAZP',
    timestamp: 10,
    close,
    volume: 1000,
    trend: null,
    reversal: {
      rsi: 50,
      bbUpper: 110,
      bbMiddle: 100,
      bbLower: 90,
      bullishPatterns: [],
      bearishPatterns: [],
      rsiDivergence: 0,
      nearSupport: null,
      nearResistance: null,
      ...reversal,
    },
  };
}

describe('ReversalStrategy', () => {
  const strategy = new ReversalStrategy(PARAMS);

  it('goes long when oversold at the lower band', () => {
    const signal = strategy.evaluate([snapshot(95, { rsi: 25, bbLower: 96 })]);

    expect(signal.direction).toBe('long');
    expect(signal.strategyName).toBe('reversal');
    expect(signal.strength).toBe(0.7);
    expect(signal.reasons).toEqual(['RSI 25.00 < 30', 'close 95 <= lower band 96.00']);
  });

  it('accepts a close exactly on the band', () => {
    expect(strategy.evaluate([snapshot(96, { rsi: 29, bbLower: 96 })]).direction).toBe('long');
  });

  it('stays flat when only one condition holds', () => {
    expect(strategy.evaluate([snapshot(97, { rsi: 25, bbLower: 96 })]).direction).toBe('flat');
    expect(strategy.evaluate([snapshot(95, { rsi: 35, bbLower: 96 })]).direction).toBe('flat');
  });

  it('goes short when overbought at the upper band', () => {
    const signal = strategy.evaluate([snapshot(105, { rsi: 82, bbUpper: 104.9 })]);

    expect(signal.direction).toBe('short');
    expect(signal.strength).toBe(0.7);
  });

  it('stays flat without reversal indicators', () => {
    const signal = strategy.evaluate([{ ...snapshot(100, {}), reversal: null }]);
    expect(signal.direction).toBe('flat');
  });

  describe('confirmation', () => {
    it('adds patterns, divergence and support to a long, capped at 1', () => {
      const signal = strategy.evaluate([
        snapshot(95, {
          rsi: 25,
          bbLower: 96,
          bullishPatterns: ['hammer', 'bullish_engulfing'],
          rsiDivergence: 1,
          nearSupport: 94.5,
        }),
      ]);

      expect(signal.direction).toBe('long');
      expect(signal.strength).toBe(1);
      expect(signal.reasons).toEqual([
        'RSI 25.00 < 30',
        'close 95 <= lower band 96.00',
        'bullish pattern: hammer, bullish_engulfing',
        'bullish RSI divergence',
        'near support 94.50',
      ]);
    });

    it('adds 0.15 for a pattern alone', () => {
      const signal = strategy.evaluate([snapshot(95, { rsi: 25, bbLower: 96, bullishPatterns: ['morning_star'] })]);
      expect(signal.strength).toBe(0.85);
    });

    it('ignores bearish context on a long', () => {
      const signal = strategy.evaluate([
        snapshot(95, {
          rsi: 25,
          bbLower: 96,
          bearishPatterns: ['shooting_star'],
          rsiDivergence: -1,
          nearResistance: 95.5,
        }),
      ]);

      expect(signal.strength).toBe(0.7);
      expect(signal.reasons).toHaveLength(2);
    });

    it('confirms a short with bearish context', () => {
      const signal = strategy.evaluate([
        snapshot(105, { rsi: 82, bbUpper: 104.9, bearishPatterns: ['evening_star'], nearResistance: 105.5 }),
      ]);

      expect(signal.direction).toBe('short');
      expect(signal.strength).toBe(0.95);
      expect(signal.reasons.slice(2)).toEqual(['bearish pattern: evening_star', 'near resistance 105.50']);
    });

    it('never opens a signal from context alone', () => {
      const signal = strategy.evaluate([
        snapshot(100, { bullishPatterns: ['hammer'], rsiDivergence: 1, nearSupport: 99.5 }),
      ]);
      expect(signal.direction).toBe('flat');
    });
  });
});
