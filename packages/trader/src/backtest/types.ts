/**
 * Backtest Types
 */

import type { Bar, EquityPoint, ExitReason, Trade, TradingConfig } from '@equity-pilot/shared';

/**
 * Bars per symbol. Symbols run in the order of `config.symbols`.
 */
export type BacktestData = ReadonlyMap<string, readonly Bar[]>;

// =============================================================================
// BACKTEST METRICS
// =============================================================================

export interface SymbolStats {
  trades: number;
  wins: number;
  pnl: number;
}

export interface BacktestMetrics {
  totalTrades: number;
  wins: number;
  losses: number;
  /** Percent of trades with positive net pnl */
  winRate: number;
  initialCapital: number;
  finalCapital: number;
  netPnl: number;
  /** Percent */
  totalReturn: number;
  /** Percent, compounded over the equity curve's span */
  annualizedReturn: number;
  /** Percent, peak to trough of capital + unrealized pnl */
  maxDrawdown: number;
  maxDrawdownAmount: number;
  /** Days */
  avgTradeDuration: number;
  totalCommission: number;
  grossProfit: number;
  grossLoss: number;
  profitFactor: number;
  avgWin: number;
  /** Positive number */
  avgLoss: number;
  maxConsecutiveWins: number;
  maxConsecutiveLosses: number;
  sharpeRatio: number;
  exitReasons: Record<ExitReason, number>;
  bySymbol: Record<string, SymbolStats>;
}

// =============================================================================
// BACKTEST RESULT
// =============================================================================

/**
 * A symbol left out of the run because its data failed a fatal check
 */
export interface ExcludedSymbol {
  symbol: string;
  code: string;
  message: string;
}

export interface BacktestResult {
  config: TradingConfig;
  /** Symbols that were replayed */
  symbols: string[];
  excluded: ExcludedSymbol[];
  dateRange: {
    /** Unix seconds */
    from: number;
    to: number;
    barCount: number;
  };
  trades: Trade[];
  /** One point per processed bar */
  equity: EquityPoint[];
  metrics: BacktestMetrics;
}
