/**
 * Market data types
 */

/**
 * Bar timeframe, expressed the way the broker names candle intervals
 */
export type Timeframe = '1m' | '5m' | '15m' | '1h' | '4h' | '1d';

/**
 * Timeframe length in seconds
 */
export const TIMEFRAME_SECONDS: Record<Timeframe, number> = {
  '1m': 60,
  '5m': 300,
  '15m': 900,
  '1h': 3600,
  '4h': 14400,
  '1d': 86400,
};

/**
 * One OHLCV observation for a symbol
 */
export interface Bar {
  /** Instrument ticker (e.g., "SBER") */
  readonly symbol: string;
  /** Bar open time (Unix timestamp in seconds) */
  readonly timestamp: number;
  /** Opening price */
  readonly open: number;
  /** Highest price */
  readonly high: number;
  /** Lowest price */
  readonly low: number;
  /** Closing price */
  readonly close: number;
  /** Traded volume */
  readonly volume: number;
}

/**
 * Values derived from the trailing window ending at one bar
 */
export interface IndicatorSnapshot {
  symbol: string;
  timestamp: number;
  close: number;
  volume: number;
  /** Present when the trend indicators were requested */
  trend: TrendIndicators | null;
  /** Present when the reversal indicators were requested */
  reversal: ReversalIndicators | null;
}

export interface TrendIndicators {
  emaShort: number;
  emaLong: number;
  macd: number;
  macdSignal: number;
  macdHistogram: number;
  volumeMa: number;
}

export type BullishPattern = 'hammer' | 'bullish_engulfing' | 'piercing_line' | 'morning_star' | 'three_white_soldiers';

export type BearishPattern =
  | 'shooting_star'
  | 'hanging_man'
  | 'bearish_engulfing'
  | 'dark_cloud_cover'
  | 'evening_star'
  | 'three_black_crows';

export interface ReversalIndicators {
  rsi: number;
  bbUpper: number;
  bbMiddle: number;
  bbLower: number;
  /** Candlestick patterns completed by the last bar */
  bullishPatterns: BullishPattern[];
  bearishPatterns: BearishPattern[];
  /** 1 bullish, -1 bearish, confirmed on the last bar */
  rsiDivergence: -1 | 0 | 1;
  /** Support level the close sits within tolerance of */
  nearSupport: number | null;
  nearResistance: number | null;
}
