import { describe, it, expect } from 'vitest';
import { ConfigValidationError, type ConfigFileInput } from '@equity-pilot/shared';
import { expandGrid, gridSearch } from './optimizer.js';
import { sberCrossoverBars } from '../test-utils/bars.js';

const base: ConfigFileInput = {
  trading: { symbols: ['SBER'] },
  strategies: {
    active_strategies: ['trend'],
    trend: { ema_short: 5, ema_long: 12, macd_fast: 5, macd_slow: 12, macd_signal: 3 },
  },
};

const data = new Map([['SBER', sberCrossoverBars()]]);

describe('expandGrid', () => {
  it('enumerates the Cartesian product, last parameter fastest', () => {
    expect(expandGrid({ a: [1, 2], b: ['x', 'y'] })).toEqual([
      { a: 1, b: 'x' },
      { a: 1, b: 'y' },
      { a: 2, b: 'x' },
      { a: 2, b: 'y' },
    ]);
  });

  it('yields one empty combination for an empty grid', () => {
    expect(expandGrid({})).toEqual([{}]);
  });
});

describe('gridSearch', () => {
  it('ranks runs by total return, best first', async () => {
    const result = await gridSearch({
      base,
      data,
      grid: { 'execution.max_position_size': [0.9, 0.5] },
    });

    expect(result.metric).toBe('totalReturn');
    expect(result.runs.map((r) => r.params)).toEqual([
      { 'execution.max_position_size': 0.5 },
      { 'execution.max_position_size': 0.9 },
    ]);
    expect(result.runs[0]?.score).toBeCloseTo(-2.188932, 6);
    expect(result.runs[1]?.score).toBeCloseTo(-3.943772, 6);
  });

  it('ranks ascending when asked', async () => {
    const result = await gridSearch({
      base,
      data,
      grid: { 'execution.max_position_size': [0.5, 0.9] },
      metric: 'maxDrawdown',
      direction: 'asc',
    });

    expect(result.runs.map((r) => r.params['execution.max_position_size'])).toEqual([0.5, 0.9]);
  });

  it('keeps enumeration order for ties', async () => {
    const result = await gridSearch({
      base,
      data,
      grid: { 'risk.stop_loss_percent': [5, 2.5] },
    });

    expect(result.runs.map((r) => r.params['risk.stop_loss_percent'])).toEqual([5, 2.5]);
    expect(result.runs[0]?.metrics.exitReasons.max_holding_days).toBe(1);
    expect(result.runs[1]?.metrics.exitReasons.stop_loss).toBe(1);
  });

  it('skips inconsistent combinations', async () => {
    const result = await gridSearch({
      base,
      data,
      grid: { 'strategies.trend.ema_short': [5, 12] },
    });

    expect(result.runs).toHaveLength(1);
    expect(result.skipped).toEqual([
      {
        params: { 'strategies.trend.ema_short': 12 },
        reason: 'strategies.trend.ema_short: ema_short must be shorter than ema_long',
      },
    ]);
  });

  it('rejects unknown parameter paths', async () => {
    await expect(gridSearch({ base, data, grid: { 'risk.stop_los_percent': [1] } })).rejects.toThrow(
      ConfigValidationError
    );
  });
});
