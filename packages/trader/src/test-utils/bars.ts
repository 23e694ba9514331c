/**
 * Bar builders for tests
 */

import type { Bar } from '@equity-pilot/shared';

export const DAY = 86_400;
/** 2024-01-01T00:00:00Z */
export const START = 1_704_067_200;

export interface BarSpec {
  close: number;
  open?: number;
  high?: number;
  low?: number;
  volume?: number;
}

/**
 * One daily bar; open defaults to close, high/low to the body
 */
export function makeBar(symbol: string, index: number, spec: BarSpec): Bar {
  const open = spec.open ?? spec.close;
  return {
    symbol,
    timestamp: START + index * DAY,
    open,
    high: spec.high ?? Math.max(open, spec.close),
    low: spec.low ?? Math.min(open, spec.close),
    close: spec.close,
    volume: spec.volume ?? 1000,
  };
}

/**
 * Daily bars from a list of closes
 */
export function barsFromCloses(symbol: string, closes: readonly number[], volume = 1000): Bar[] {
  return closes.map((close, i) => makeBar(symbol, i, { close, volume }));
}

/**
 * Deterministic pseudo-random walk (LCG), never below 1
 */
export function randomWalk(symbol: string, count: number, seed: number, start = 100): Bar[] {
  let state = seed >>> 0;
  const next = (): number => {
    state = (Math.imul(state, 1_664_525) + 1_013_904_223) >>> 0;
    return state / 4_294_967_296;
  };

  const bars: Bar[] = [];
  let price = start;
  for (let i = 0; i < count; i++) {
    const open = price;
    const close = Math.max(1, open * (1 + (next() - 0.5) * 0.08));
    const high = Math.max(open, close) * (1 + next() * 0.02);
    const low = Math.min(open, close) * (1 - next() * 0.02);
    bars.push({
      symbol,
      timestamp: START + i * DAY,
      open,
      high,
      low,
      close,
      volume: Math.round(500 + next() * 3000),
    });
    price = close;
  }
  return bars;
}

/**
 * 60 daily SBER bars: a slow decline, a high-volume jump to 105 on bar 20
 * (EMA 5/12 cross up), a flat stretch, a drop to 101 on bar 25 that trades
 * down to 100.5, then flat at 101.
 */
export function sberCrossoverBars(): Bar[] {
  const bars: Bar[] = [];
  for (let i = 0; i < 60; i++) {
    if (i < 20) {
      bars.push(makeBar('SBER', i, { close: 100 - 0.5 * i }));
    } else if (i === 20) {
      bars.push(makeBar('SBER', i, { open: 91, close: 105, high: 105.5, low: 90.5, volume: 3000 }));
    } else if (i < 25) {
      bars.push(makeBar('SBER', i, { close: 105, high: 105.8, low: 104 }));
    } else if (i === 25) {
      bars.push(makeBar('SBER', i, { open: 105, close: 101, high: 105, low: 100.5 }));
    } else {
      bars.push(makeBar('SBER', i, { close: 101 }));
    }
  }
  return bars;
}

/**
 * Element of a bar list; throws past the end
 */
export function barAt(bars: readonly Bar[], index: number): Bar {
  const bar = bars[index];
  if (!bar) {
    throw new Error(`no bar at index ${index}`);
  }
  return bar;
}
