/**
 * Indicator snapshot for the bar at the end of a trailing window
 */

import type {
  Bar,
  IndicatorSnapshot,
  ReversalIndicators,
  ReversalParams,
  TrendIndicators,
  TrendParams,
} from '@equity-pilot/shared';
import {
  calculateBollingerBands,
  calculateEMA,
  calculateMACD,
  calculateRSI,
  calculateVolumeMA,
  extractValues,
  last,
} from './index.js';
import {
  DEFAULT_LEVEL_OPTIONS,
  detectPatterns,
  findSupportResistance,
  nearestLevel,
  rsiDivergence,
} from './patterns.js';

/**
 * Indicator groups to compute; an omitted group stays null in the snapshot
 */
export interface IndicatorRequest {
  trend?: TrendParams;
  reversal?: ReversalParams;
}

/**
 * Bars needed before every requested indicator is defined
 */
export function requiredBars(request: IndicatorRequest): number {
  let required = 1;
  if (request.trend) {
    const t = request.trend;
    required = Math.max(required, t.emaLong, t.macdSlow + t.macdSignal - 1, t.volumeMaPeriod);
  }
  if (request.reversal) {
    const r = request.reversal;
    required = Math.max(required, r.rsiPeriod + 1, r.bollingerPeriod);
  }
  return required;
}

function trendIndicators(bars: readonly Bar[], closes: number[], p: TrendParams): TrendIndicators {
  const macd = last(calculateMACD(closes, p.macdFast, p.macdSlow, p.macdSignal));
  return {
    emaShort: last(calculateEMA(closes, p.emaShort)),
    emaLong: last(calculateEMA(closes, p.emaLong)),
    macd: macd.macd,
    macdSignal: macd.signal,
    macdHistogram: macd.histogram,
    volumeMa: last(calculateVolumeMA(bars, p.volumeMaPeriod)),
  };
}

function reversalIndicators(bars: readonly Bar[], closes: number[], p: ReversalParams): ReversalIndicators {
  const bands = last(calculateBollingerBands(closes, p.bollingerPeriod, p.bollingerStd));
  const rsi = calculateRSI(closes, p.rsiPeriod);
  const patterns = detectPatterns(bars);
  const levels = findSupportResistance(bars);
  const close = last(closes);

  return {
    rsi: last(rsi),
    bbUpper: bands.upper,
    bbMiddle: bands.middle,
    bbLower: bands.lower,
    bullishPatterns: patterns.bullish,
    bearishPatterns: patterns.bearish,
    rsiDivergence: rsiDivergence(closes, rsi),
    nearSupport: nearestLevel(close, levels.support, DEFAULT_LEVEL_OPTIONS.tolerance),
    nearResistance: nearestLevel(close, levels.resistance, DEFAULT_LEVEL_OPTIONS.tolerance),
  };
}

/**
 * Compute the requested indicators over `bars`, ending at the last bar.
 * Throws InsufficientDataError while any requested window is underfilled.
 */
export function buildSnapshot(bars: readonly Bar[], request: IndicatorRequest): IndicatorSnapshot {
  const bar = last(bars);
  const closes = extractValues(bars, 'close');

  return {
    symbol: bar.symbol,
    timestamp: bar.timestamp,
    close: bar.close,
    volume: bar.volume,
    trend: request.trend ? trendIndicators(bars, closes, request.trend) : null,
    reversal: request.reversal ? reversalIndicators(bars, closes, request.reversal) : null,
  };
}
