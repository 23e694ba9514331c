/**
 * Backtest metrics
 *
 * Pure functions over the trade ledger and the equity curve.
 */

import type { EquityPoint, ExitReason, Trade } from '@equity-pilot/shared';
import type { BacktestMetrics, SymbolStats } from './types.js';

const SECONDS_PER_DAY = 86_400;
const SECONDS_PER_YEAR = 365 * SECONDS_PER_DAY;
const PERIODS_PER_YEAR = 252;

function equityOf(point: EquityPoint): number {
  return point.capital + point.unrealizedPnl;
}

/**
 * Largest peak-to-trough fall, starting from the initial capital
 */
export function calculateMaxDrawdown(
  equity: readonly EquityPoint[],
  initialCapital: number
): { amount: number; percent: number } {
  let peak = initialCapital;
  let amount = 0;
  let percent = 0;

  for (const point of equity) {
    const value = equityOf(point);
    peak = Math.max(peak, value);
    const drawdown = peak - value;
    if (drawdown > amount) {
      amount = drawdown;
      percent = (drawdown / peak) * 100;
    }
  }

  return { amount, percent };
}

/**
 * Annualized Sharpe ratio of per-period equity returns. Points sharing a
 * timestamp count once, at their last value.
 */
export function calculateSharpeRatio(
  equity: readonly EquityPoint[],
  riskFreeRate = 0,
  periodsPerYear = PERIODS_PER_YEAR
): number {
  const closes: number[] = [];
  let lastTimestamp: number | null = null;
  for (const point of equity) {
    if (point.timestamp === lastTimestamp) {
      closes[closes.length - 1] = equityOf(point);
    } else {
      closes.push(equityOf(point));
      lastTimestamp = point.timestamp;
    }
  }

  const returns: number[] = [];
  for (let i = 1; i < closes.length; i++) {
    const prev = closes[i - 1] ?? 0;
    if (prev > 0) {
      returns.push((closes[i] ?? prev) / prev - 1 - riskFreeRate / periodsPerYear);
    }
  }
  if (returns.length < 2) {
    return 0;
  }

  const mean = returns.reduce((sum, r) => sum + r, 0) / returns.length;
  const variance = returns.reduce((sum, r) => sum + (r - mean) ** 2, 0) / (returns.length - 1);
  const std = Math.sqrt(variance);

  return std > 0 ? (mean / std) * Math.sqrt(periodsPerYear) : 0;
}

/**
 * Calculate all backtest metrics
 */
export function calculateMetrics(
  trades: readonly Trade[],
  equity: readonly EquityPoint[],
  initialCapital: number
): BacktestMetrics {
  const wins = trades.filter((t) => t.pnl > 0);
  const losses = trades.filter((t) => t.pnl <= 0);

  const grossProfit = wins.reduce((sum, t) => sum + t.pnl, 0);
  const grossLoss = Math.abs(losses.reduce((sum, t) => sum + t.pnl, 0));

  const last = equity[equity.length - 1];
  const first = equity[0];
  const finalCapital = last ? equityOf(last) : initialCapital;
  const netPnl = finalCapital - initialCapital;

  let annualizedReturn = 0;
  if (first && last && last.timestamp > first.timestamp && finalCapital > 0) {
    const years = (last.timestamp - first.timestamp) / SECONDS_PER_YEAR;
    annualizedReturn = (Math.pow(finalCapital / initialCapital, 1 / years) - 1) * 100;
  }

  // Consecutive wins/losses
  let consecutiveWins = 0;
  let consecutiveLosses = 0;
  let maxConsecutiveWins = 0;
  let maxConsecutiveLosses = 0;

  for (const trade of trades) {
    if (trade.pnl > 0) {
      consecutiveWins++;
      consecutiveLosses = 0;
      maxConsecutiveWins = Math.max(maxConsecutiveWins, consecutiveWins);
    } else {
      consecutiveLosses++;
      consecutiveWins = 0;
      maxConsecutiveLosses = Math.max(maxConsecutiveLosses, consecutiveLosses);
    }
  }

  const exitReasons: Record<ExitReason, number> = {
    stop_loss: 0,
    trailing_stop: 0,
    take_profit: 0,
    max_holding_days: 0,
    signal: 0,
    end_of_data: 0,
  };
  const bySymbol: Record<string, SymbolStats> = {};
  for (const trade of trades) {
    exitReasons[trade.exitReason] += 1;
    const stats = bySymbol[trade.symbol] ?? { trades: 0, wins: 0, pnl: 0 };
    stats.trades += 1;
    stats.wins += trade.pnl > 0 ? 1 : 0;
    stats.pnl += trade.pnl;
    bySymbol[trade.symbol] = stats;
  }

  const drawdown = calculateMaxDrawdown(equity, initialCapital);
  const duration = trades.reduce((sum, t) => sum + (t.exitTime - t.entryTime), 0);

  return {
    totalTrades: trades.length,
    wins: wins.length,
    losses: losses.length,
    winRate: trades.length > 0 ? (wins.length / trades.length) * 100 : 0,
    initialCapital,
    finalCapital,
    netPnl,
    totalReturn: (netPnl / initialCapital) * 100,
    annualizedReturn,
    maxDrawdown: drawdown.percent,
    maxDrawdownAmount: drawdown.amount,
    avgTradeDuration: trades.length > 0 ? duration / trades.length / SECONDS_PER_DAY : 0,
    totalCommission: trades.reduce((sum, t) => sum + t.commissionPaid, 0),
    grossProfit,
    grossLoss,
    profitFactor: grossLoss > 0 ? grossProfit / grossLoss : grossProfit > 0 ? Infinity : 0,
    avgWin: wins.length > 0 ? grossProfit / wins.length : 0,
    avgLoss: losses.length > 0 ? grossLoss / losses.length : 0,
    maxConsecutiveWins,
    maxConsecutiveLosses,
    sharpeRatio: calculateSharpeRatio(equity),
    exitReasons,
    bySymbol,
  };
}
