/**
 * Technical Indicators
 *
 * Wrapper around the technicalindicators library, plus the two series it
 * does not compute the way the strategies need (Wilder RSI without
 * rounding, MACD with an EMA-seeded signal line).
 *
 * Every function takes the full trailing window and returns the whole
 * series; the last element belongs to the last input value. A window
 * shorter than the lookback throws InsufficientDataError.
 */

import { SMA, EMA, BollingerBands } from 'technicalindicators';
import { InsufficientDataError } from '@equity-pilot/shared';
import type { Bar } from '@equity-pilot/shared';

export interface MACDPoint {
  macd: number;
  signal: number;
  histogram: number;
}

export interface BollingerPoint {
  upper: number;
  middle: number;
  lower: number;
}

function requireWindow(indicator: string, values: readonly number[], required: number): void {
  if (values.length < required) {
    throw new InsufficientDataError(indicator, required, values.length);
  }
}

/**
 * Extract one field from bars
 */
export function extractValues(
  bars: readonly Bar[],
  field: 'open' | 'high' | 'low' | 'close' | 'volume' = 'close'
): number[] {
  return bars.map((b) => b[field]);
}

/**
 * Last element of a series
 */
export function last<T>(series: readonly T[]): T {
  const value = series[series.length - 1];
  if (value === undefined) {
    throw new InsufficientDataError('series', 1, 0);
  }
  return value;
}

/**
 * Simple Moving Average
 */
export function calculateSMA(values: readonly number[], period: number): number[] {
  requireWindow(`SMA(${period})`, values, period);
  return SMA.calculate({ period, values: [...values] });
}

/**
 * Exponential Moving Average, seeded with the SMA of the first `period` values
 */
export function calculateEMA(values: readonly number[], period: number): number[] {
  requireWindow(`EMA(${period})`, values, period);
  return EMA.calculate({ period, values: [...values] });
}

/**
 * Relative Strength Index with Wilder smoothing
 *
 * Needs `period + 1` values; the first output uses simple averages of
 * the first `period` changes.
 */
export function calculateRSI(values: readonly number[], period: number = 14): number[] {
  requireWindow(`RSI(${period})`, values, period + 1);

  const changes: number[] = [];
  for (let i = 1; i < values.length; i++) {
    changes.push((values[i] ?? 0) - (values[i - 1] ?? 0));
  }

  let avgGain = 0;
  let avgLoss = 0;
  for (let i = 0; i < period; i++) {
    const change = changes[i] ?? 0;
    if (change > 0) avgGain += change;
    else avgLoss -= change;
  }
  avgGain /= period;
  avgLoss /= period;

  const toRsi = (gain: number, loss: number): number => {
    if (loss === 0) return gain === 0 ? 50 : 100;
    return 100 - 100 / (1 + gain / loss);
  };

  const result = [toRsi(avgGain, avgLoss)];
  for (let i = period; i < changes.length; i++) {
    const change = changes[i] ?? 0;
    avgGain = (avgGain * (period - 1) + Math.max(change, 0)) / period;
    avgLoss = (avgLoss * (period - 1) + Math.max(-change, 0)) / period;
    result.push(toRsi(avgGain, avgLoss));
  }

  return result;
}

/**
 * MACD (Moving Average Convergence Divergence)
 *
 * MACD line = EMA(fast) - EMA(slow); signal = EMA(MACD line, signalPeriod).
 * Needs `slowPeriod + signalPeriod - 1` values.
 */
export function calculateMACD(
  values: readonly number[],
  fastPeriod: number = 12,
  slowPeriod: number = 26,
  signalPeriod: number = 9
): MACDPoint[] {
  requireWindow(`MACD(${fastPeriod},${slowPeriod},${signalPeriod})`, values, slowPeriod + signalPeriod - 1);

  const fast = calculateEMA(values, fastPeriod);
  const slow = calculateEMA(values, slowPeriod);
  const offset = fast.length - slow.length;
  const macdLine = slow.map((s, i) => (fast[i + offset] ?? 0) - s);

  const signal = calculateEMA(macdLine, signalPeriod);
  const signalOffset = macdLine.length - signal.length;

  return signal.map((sig, i) => {
    const macd = macdLine[i + signalOffset] ?? 0;
    return { macd, signal: sig, histogram: macd - sig };
  });
}

/**
 * Bollinger Bands: SMA(period) ± stdDev × population standard deviation
 */
export function calculateBollingerBands(
  values: readonly number[],
  period: number = 20,
  stdDev: number = 2
): BollingerPoint[] {
  requireWindow(`BB(${period})`, values, period);
  return BollingerBands.calculate({ period, stdDev, values: [...values] }).map((b) => ({
    upper: b.upper,
    middle: b.middle,
    lower: b.lower,
  }));
}

/**
 * Volume moving average
 */
export function calculateVolumeMA(bars: readonly Bar[], period: number = 20): number[] {
  return calculateSMA(extractValues(bars, 'volume'), period);
}

export { buildSnapshot, requiredBars, type IndicatorRequest } from './snapshot.js';
export {
  DEFAULT_LEVEL_OPTIONS,
  detectPatterns,
  findSupportResistance,
  nearestLevel,
  rsiDivergence,
  type Candle,
  type DetectedPatterns,
  type LevelOptions,
  type SupportResistance,
} from './patterns.js';
