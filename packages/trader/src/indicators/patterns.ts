/**
 * Price-action context for the reversal strategy
 *
 * - Candlestick patterns completed by the last bar
 * - Support/resistance levels grouped from swing extremes
 * - RSI divergence confirmed on the last bar
 *
 * Everything here reads only the bars it is given, so a snapshot never
 * depends on bars after its own.
 */

import type { Bar, BearishPattern, BullishPattern } from '@equity-pilot/shared';

export type Candle = Pick<Bar, 'open' | 'high' | 'low' | 'close'>;

export interface DetectedPatterns {
  bullish: BullishPattern[];
  bearish: BearishPattern[];
}

export interface SupportResistance {
  support: number[];
  resistance: number[];
}

export interface LevelOptions {
  /** Bars on each side a swing extreme must beat */
  window: number;
  /** Relative distance that groups extremes and counts as a touch */
  tolerance: number;
  /** Separate visits needed to confirm a level */
  minTouches: number;
}

export const DEFAULT_LEVEL_OPTIONS: LevelOptions = {
  window: 5,
  tolerance: 0.02,
  minTouches: 2,
};

const SHADOW_BODY_RATIO = 2;
const STRONG_BODY_RATIO = 0.8;
/** Bars before a hammer shape that decide hammer vs hanging man */
const CONTEXT_BARS = 5;

const body = (c: Candle): number => Math.abs(c.close - c.open);
const range = (c: Candle): number => c.high - c.low;
const isUp = (c: Candle): boolean => c.close > c.open;
const isDown = (c: Candle): boolean => c.close < c.open;
const upperShadow = (c: Candle): number => c.high - Math.max(c.open, c.close);
const lowerShadow = (c: Candle): number => Math.min(c.open, c.close) - c.low;
const midBody = (c: Candle): number => (c.open + c.close) / 2;

function hasRealBody(c: Candle): boolean {
  return range(c) > 0 && body(c) >= range(c) * 0.05;
}

/**
 * Long lower shadow, almost no upper shadow
 */
export function isHammerShape(c: Candle): boolean {
  return hasRealBody(c) && lowerShadow(c) >= body(c) * SHADOW_BODY_RATIO && upperShadow(c) <= body(c) * 0.1;
}

/**
 * Long upper shadow, almost no lower shadow
 */
export function isShootingStar(c: Candle): boolean {
  return hasRealBody(c) && upperShadow(c) >= body(c) * SHADOW_BODY_RATIO && lowerShadow(c) <= body(c) * 0.1;
}

export function isBullishEngulfing(prev: Candle, curr: Candle): boolean {
  return isDown(prev) && isUp(curr) && curr.open < prev.close && curr.close > prev.open;
}

export function isBearishEngulfing(prev: Candle, curr: Candle): boolean {
  return isUp(prev) && isDown(curr) && curr.open > prev.close && curr.close < prev.open;
}

export function isPiercingLine(prev: Candle, curr: Candle): boolean {
  return (
    isDown(prev) &&
    isUp(curr) &&
    curr.open < prev.close &&
    curr.close > midBody(prev) &&
    curr.close < prev.open
  );
}

export function isDarkCloudCover(prev: Candle, curr: Candle): boolean {
  return (
    isUp(prev) &&
    isDown(curr) &&
    curr.open > prev.close &&
    curr.close < midBody(prev) &&
    curr.close > prev.open
  );
}

export function isMorningStar(first: Candle, middle: Candle, last: Candle): boolean {
  return (
    isDown(first) &&
    body(first) > range(first) * 0.6 &&
    body(middle) < range(middle) * 0.3 &&
    isUp(last) &&
    last.close > midBody(first)
  );
}

export function isEveningStar(first: Candle, middle: Candle, last: Candle): boolean {
  return (
    isUp(first) &&
    body(first) > range(first) * 0.6 &&
    body(middle) < range(middle) * 0.3 &&
    isDown(last) &&
    last.close < midBody(first)
  );
}

function strongBodies(...candles: Candle[]): boolean {
  return candles.every((c) => range(c) > 0 && body(c) / range(c) >= STRONG_BODY_RATIO);
}

export function isThreeWhiteSoldiers(a: Candle, b: Candle, c: Candle): boolean {
  return (
    isUp(a) &&
    isUp(b) &&
    isUp(c) &&
    b.open >= a.open &&
    b.close > a.close &&
    c.open >= b.open &&
    c.close > b.close &&
    strongBodies(a, b, c)
  );
}

export function isThreeBlackCrows(a: Candle, b: Candle, c: Candle): boolean {
  return (
    isDown(a) &&
    isDown(b) &&
    isDown(c) &&
    b.open <= a.open &&
    b.close < a.close &&
    c.open <= b.open &&
    c.close < b.close &&
    strongBodies(a, b, c)
  );
}

/**
 * Patterns completed by the last candle. A hammer shape after mostly
 * rising candles is a hanging man instead of a hammer.
 */
export function detectPatterns(candles: readonly Candle[]): DetectedPatterns {
  const bullish: BullishPattern[] = [];
  const bearish: BearishPattern[] = [];
  const n = candles.length;
  const curr = candles[n - 1];
  const prev = candles[n - 2];
  const first = candles[n - 3];

  if (!curr) {
    return { bullish, bearish };
  }

  if (isHammerShape(curr)) {
    const context = candles.slice(Math.max(0, n - 1 - CONTEXT_BARS), n - 1);
    const rising = context.filter(isUp).length;
    if (context.length === CONTEXT_BARS && rising >= 3) bearish.push('hanging_man');
    else bullish.push('hammer');
  }
  if (isShootingStar(curr)) bearish.push('shooting_star');

  if (prev) {
    if (isBullishEngulfing(prev, curr)) bullish.push('bullish_engulfing');
    if (isPiercingLine(prev, curr)) bullish.push('piercing_line');
    if (isBearishEngulfing(prev, curr)) bearish.push('bearish_engulfing');
    if (isDarkCloudCover(prev, curr)) bearish.push('dark_cloud_cover');
  }

  if (first && prev) {
    if (isMorningStar(first, prev, curr)) bullish.push('morning_star');
    if (isThreeWhiteSoldiers(first, prev, curr)) bullish.push('three_white_soldiers');
    if (isEveningStar(first, prev, curr)) bearish.push('evening_star');
    if (isThreeBlackCrows(first, prev, curr)) bearish.push('three_black_crows');
  }

  return { bullish, bearish };
}

/**
 * Sorted levels merged while each stays within `tolerance` of the
 * previous one; a group becomes its mean
 */
function groupLevels(levels: readonly number[], tolerance: number): number[] {
  const sorted = [...levels].sort((a, b) => a - b);
  const grouped: number[] = [];
  let group: number[] = [];

  for (const level of sorted) {
    const tail = group[group.length - 1];
    if (tail !== undefined && level > tail * (1 + tolerance)) {
      grouped.push(mean(group));
      group = [];
    }
    group.push(level);
  }
  if (group.length > 0) grouped.push(mean(group));

  return grouped;
}

function mean(values: readonly number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Separate runs of bars whose range reaches within `tolerance` of `level`
 */
function countTouches(level: number, bars: readonly Candle[], tolerance: number): number {
  const lower = level * (1 - tolerance);
  const upper = level * (1 + tolerance);
  let touches = 0;
  let touching = false;

  for (const bar of bars) {
    if (bar.low <= upper && bar.high >= lower) {
      if (!touching) touches++;
      touching = true;
    } else {
      touching = false;
    }
  }
  return touches;
}

/**
 * Support from swing lows and resistance from swing highs, each kept
 * only when price has visited it at least `minTouches` times
 */
export function findSupportResistance(
  bars: readonly Candle[],
  options: LevelOptions = DEFAULT_LEVEL_OPTIONS
): SupportResistance {
  const { window, tolerance, minTouches } = options;
  const lows: number[] = [];
  const highs: number[] = [];

  for (let i = window; i < bars.length - window; i++) {
    const bar = bars[i];
    if (!bar) continue;
    const around = bars.slice(i - window, i + window + 1);
    if (bar.low === Math.min(...around.map((b) => b.low))) lows.push(bar.low);
    if (bar.high === Math.max(...around.map((b) => b.high))) highs.push(bar.high);
  }

  const confirmed = (level: number): boolean => countTouches(level, bars, tolerance) >= minTouches;
  return {
    support: groupLevels(lows, tolerance).filter(confirmed),
    resistance: groupLevels(highs, tolerance).filter(confirmed),
  };
}

/**
 * Level closest to `price` within `tolerance`, or null
 */
export function nearestLevel(price: number, levels: readonly number[], tolerance: number): number | null {
  let nearest: number | null = null;
  for (const level of levels) {
    const distance = Math.abs(price - level) / level;
    if (distance < tolerance && (nearest === null || distance < Math.abs(price - nearest) / nearest)) {
      nearest = level;
    }
  }
  return nearest;
}

type Swing = 'low' | 'high';

function isSwing(values: readonly number[], i: number, kind: Swing): boolean {
  const v = values[i];
  if (v === undefined || i < 2) return false;
  return [i - 2, i - 1, i + 1, i + 2].every((j) => {
    const other = values[j];
    return other !== undefined && (kind === 'low' ? v < other : v > other);
  });
}

/**
 * Divergence between closes and RSI at the swing confirmed by the last
 * close (two closes on each side).
 *
 * Bullish (1): the close makes a lower swing low than the previous one
 * while RSI makes a higher one. Bearish (-1) mirrors it at swing highs.
 *
 * @param rsi RSI series aligned to the end of `closes`
 */
export function rsiDivergence(closes: readonly number[], rsi: readonly number[]): -1 | 0 | 1 {
  const offset = closes.length - rsi.length;
  const pivot = closes.length - 3;
  const rsiAt = (i: number): number | undefined => rsi[i - offset];

  for (const kind of ['low', 'high'] as const) {
    if (!isSwing(closes, pivot, kind)) continue;

    let previous = pivot - 1;
    while (previous >= 2 && !isSwing(closes, previous, kind)) previous--;
    if (previous < 2) continue;

    const [price, prevPrice] = [closes[pivot], closes[previous]];
    const [strength, prevStrength] = [rsiAt(pivot), rsiAt(previous)];
    if (price === undefined || prevPrice === undefined || strength === undefined || prevStrength === undefined) {
      continue;
    }

    if (kind === 'low' && price < prevPrice && strength > prevStrength) return 1;
    if (kind === 'high' && price > prevPrice && strength < prevStrength) return -1;
  }
  return 0;
}
