import { z } from 'zod';
import type { Timeframe } from '../types/market.js';

/**
 * Strategies the engine knows, in their default evaluation order
 */
export const StrategyNameSchema = z.enum(['trend', 'reversal']);
export type StrategyName = z.infer<typeof StrategyNameSchema>;

export const StrategyModeSchema = z.enum(['any', 'all']);
export type StrategyMode = z.infer<typeof StrategyModeSchema>;

export const TimeframeSchema = z.enum(['1m', '5m', '15m', '1h', '4h', '1d']) satisfies z.ZodType<Timeframe>;

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

const positiveInt = z.number().int().positive();

const TrendParamsSchema = z
  .object({
    ema_short: positiveInt.default(5),
    ema_long: positiveInt.default(15),
    macd_fast: positiveInt.default(12),
    macd_slow: positiveInt.default(26),
    macd_signal: positiveInt.default(9),
    volume_ma_period: positiveInt.default(20),
    min_volume_factor: z.number().nonnegative().default(1.5),
  })
  .refine((p) => p.ema_short < p.ema_long, {
    message: 'ema_short must be shorter than ema_long',
    path: ['ema_short'],
  })
  .refine((p) => p.macd_fast < p.macd_slow, {
    message: 'macd_fast must be shorter than macd_slow',
    path: ['macd_fast'],
  });

const ReversalParamsSchema = z
  .object({
    rsi_period: positiveInt.default(14),
    rsi_oversold: z.number().min(0).max(100).default(30),
    rsi_overbought: z.number().min(0).max(100).default(70),
    bollinger_period: positiveInt.default(20),
    bollinger_std: z.number().positive().default(2),
  })
  .refine((p) => p.rsi_oversold < p.rsi_overbought, {
    message: 'rsi_oversold must be below rsi_overbought',
    path: ['rsi_oversold'],
  });

/**
 * Configuration file layout (YAML, snake_case, grouped by concern)
 */
export const ConfigFileSchema = z
  .object({
    trading: z
      .object({
        symbols: z.array(z.string().min(1)).min(1).default(['SBER', 'GAZP', 'LKOH', 'ROSN']),
        timeframe: TimeframeSchema.default('1d'),
        /** Seconds between live polls */
        update_interval: positiveInt.default(900),
        /** Largest allowed distance between consecutive bars; covers weekends and holidays */
        max_gap_days: z.number().positive().default(14),
      })
      .default({}),
    execution: z
      .object({
        commission_rate: z.number().min(0).max(0.1).default(0.003),
        max_positions: positiveInt.default(1),
        max_position_size: z.number().positive().max(1).default(0.9),
        max_holding_days: positiveInt.default(7),
        order_timeout_ms: positiveInt.default(10_000),
      })
      .default({}),
    risk: z
      .object({
        stop_loss_percent: z.number().positive().max(100).default(2.5),
        trailing_stop_percent: z.number().positive().max(100).default(1.8),
        take_profit_percent: z.number().positive().default(6.0),
      })
      .default({}),
    strategies: z
      .object({
        active_strategies: z.array(StrategyNameSchema).min(1).default(['trend', 'reversal']),
        strategy_mode: StrategyModeSchema.default('any'),
        trend: TrendParamsSchema.default({}),
        reversal: ReversalParamsSchema.default({}),
      })
      .default({}),
    backtest: z
      .object({
        initial_capital: z.number().positive().default(50_000),
        min_data_points: positiveInt.default(30),
        /** Bars kept per symbol for indicator windows */
        indicator_window: positiveInt.default(500),
      })
      .default({}),
    logging: z
      .object({
        level: LogLevelSchema.default('info'),
      })
      .default({}),
  })
  .refine((c) => new Set(c.trading.symbols).size === c.trading.symbols.length, {
    message: 'symbols must be unique',
    path: ['trading', 'symbols'],
  })
  .refine(
    (c) => new Set(c.strategies.active_strategies).size === c.strategies.active_strategies.length,
    { message: 'active_strategies must be unique', path: ['strategies', 'active_strategies'] }
  );

export type ConfigFile = z.infer<typeof ConfigFileSchema>;
export type ConfigFileInput = z.input<typeof ConfigFileSchema>;

export interface TrendParams {
  emaShort: number;
  emaLong: number;
  macdFast: number;
  macdSlow: number;
  macdSignal: number;
  volumeMaPeriod: number;
  minVolumeFactor: number;
}

export interface ReversalParams {
  rsiPeriod: number;
  rsiOversold: number;
  rsiOverbought: number;
  bollingerPeriod: number;
  bollingerStd: number;
}

export interface TelegramSettings {
  botToken: string;
  chatId: string;
}

/**
 * Runtime configuration, read once at startup
 */
export interface TradingConfig {
  symbols: string[];
  timeframe: Timeframe;
  updateIntervalSec: number;
  /** A wider hole between consecutive bars is a DataIntegrityError */
  maxGapDays: number;
  /** Evaluation order matters: the "any" combiner takes the first vote */
  activeStrategies: StrategyName[];
  strategyMode: StrategyMode;
  trend: TrendParams;
  reversal: ReversalParams;
  /** Fraction of notional, charged on every fill */
  commissionRate: number;
  maxPositions: number;
  /** Fraction of free capital committed to one entry */
  maxPositionSize: number;
  maxHoldingDays: number;
  orderTimeoutMs: number;
  /** Percent units (2.5 = 2.5%) */
  stopLossPercent: number;
  trailingStopPercent: number;
  takeProfitPercent: number;
  initialCapital: number;
  minDataPoints: number;
  indicatorWindow: number;
  logLevel: z.infer<typeof LogLevelSchema>;
  telegram?: TelegramSettings;
}

/**
 * Map the validated file layout onto the runtime shape
 */
export function toTradingConfig(file: ConfigFile): TradingConfig {
  const { trading, execution, risk, strategies, backtest, logging } = file;

  return {
    symbols: trading.symbols,
    timeframe: trading.timeframe,
    updateIntervalSec: trading.update_interval,
    maxGapDays: trading.max_gap_days,
    activeStrategies: strategies.active_strategies,
    strategyMode: strategies.strategy_mode,
    trend: {
      emaShort: strategies.trend.ema_short,
      emaLong: strategies.trend.ema_long,
      macdFast: strategies.trend.macd_fast,
      macdSlow: strategies.trend.macd_slow,
      macdSignal: strategies.trend.macd_signal,
      volumeMaPeriod: strategies.trend.volume_ma_period,
      minVolumeFactor: strategies.trend.min_volume_factor,
    },
    reversal: {
      rsiPeriod: strategies.reversal.rsi_period,
      rsiOversold: strategies.reversal.rsi_oversold,
      rsiOverbought: strategies.reversal.rsi_overbought,
      bollingerPeriod: strategies.reversal.bollinger_period,
      bollingerStd: strategies.reversal.bollinger_std,
    },
    commissionRate: execution.commission_rate,
    maxPositions: execution.max_positions,
    maxPositionSize: execution.max_position_size,
    maxHoldingDays: execution.max_holding_days,
    orderTimeoutMs: execution.order_timeout_ms,
    stopLossPercent: risk.stop_loss_percent,
    trailingStopPercent: risk.trailing_stop_percent,
    takeProfitPercent: risk.take_profit_percent,
    initialCapital: backtest.initial_capital,
    minDataPoints: backtest.min_data_points,
    indicatorWindow: backtest.indicator_window,
    logLevel: logging.level,
  };
}
