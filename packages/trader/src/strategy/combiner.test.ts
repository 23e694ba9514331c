import { describe, it, expect } from 'vitest';
import type { Signal, SignalDirection } from '@equity-pilot/shared';
import { combineSignals } from './combiner.js';

function vote(strategyName: string, direction: SignalDirection, strength = 0.6): Signal {
  return {
    strategyName,
    symbol: 'SBER',
    direction,
    timestamp: 100,
    strength: direction === 'flat' ? 0 : strength,
    reasons: direction === 'flat' ? [] : [`${strategyName} ${direction}`],
  };
}

describe('combineSignals', () => {
  describe('any', () => {
    it('takes the single non-flat vote', () => {
      const signal = combineSignals([vote('trend', 'long'), vote('reversal', 'flat')], 'any', 'SBER', 100);

      expect(signal.direction).toBe('long');
      expect(signal.strategyName).toBe('trend');
      expect(signal.strength).toBe(0.6);
    });

    it('resolves a long/short conflict to flat', () => {
      const signal = combineSignals([vote('trend', 'long'), vote('reversal', 'short')], 'any', 'SBER', 100);

      expect(signal.direction).toBe('flat');
      expect(signal.reasons).toEqual(['conflict: trend long, reversal short']);
    });

    it('keeps the first of two agreeing votes', () => {
      const signal = combineSignals(
        [vote('reversal', 'short', 0.7), vote('trend', 'short', 0.9)],
        'any',
        'SBER',
        100
      );

      expect(signal.strategyName).toBe('reversal');
      expect(signal.strength).toBe(0.7);
    });

    it('is flat when every vote is flat or there are none', () => {
      expect(combineSignals([vote('trend', 'flat')], 'any', 'SBER', 100).direction).toBe('flat');
      expect(combineSignals([], 'any', 'SBER', 100).direction).toBe('flat');
    });
  });

  describe('all', () => {
    it('is flat on disagreement', () => {
      expect(
        combineSignals([vote('trend', 'long'), vote('reversal', 'short')], 'all', 'SBER', 100).direction
      ).toBe('flat');
      expect(
        combineSignals([vote('trend', 'long'), vote('reversal', 'flat')], 'all', 'SBER', 100).direction
      ).toBe('flat');
    });

    it('merges agreeing votes', () => {
      const signal = combineSignals(
        [vote('trend', 'long', 0.6), vote('reversal', 'long', 0.8)],
        'all',
        'SBER',
        100
      );

      expect(signal.direction).toBe('long');
      expect(signal.strategyName).toBe('trend+reversal');
      expect(signal.strength).toBe(0.8);
      expect(signal.reasons).toEqual(['trend long', 'reversal long']);
    });
  });
});
