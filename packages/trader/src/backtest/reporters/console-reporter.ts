/**
 * Console Reporter for Backtest Results
 *
 * Pretty-prints backtest results to the console.
 */

import type { BacktestMetrics, BacktestResult } from '../types.js';
import type { ReportSink } from './report-sink.js';

/**
 * Format a number with fixed decimals
 */
function fmt(n: number, decimals: number = 2): string {
  return n.toFixed(decimals);
}

/**
 * Format percentage
 */
function fmtPct(n: number): string {
  return `${fmt(n)}%`;
}

/**
 * Create a horizontal line
 */
function line(char: string = '─', length: number = 60): string {
  return char.repeat(length);
}

function isoDate(unixSeconds: number): string {
  return new Date(unixSeconds * 1000).toISOString().split('T')[0] ?? '';
}

/**
 * Metrics block
 */
export function formatMetrics(metrics: BacktestMetrics): string[] {
  const reasons = Object.entries(metrics.exitReasons)
    .filter(([, count]) => count > 0)
    .map(([reason, count]) => `${reason}=${count}`);

  return [
    '',
    '📈 PERFORMANCE',
    line(),
    `  Trades:        ${metrics.totalTrades} (${metrics.wins}W / ${metrics.losses}L)`,
    `  Win Rate:      ${fmtPct(metrics.winRate)}`,
    `  Final Capital: ${fmt(metrics.finalCapital)}`,
    `  Total Return:  ${fmtPct(metrics.totalReturn)}`,
    `  Annualized:    ${fmtPct(metrics.annualizedReturn)}`,
    `  Profit Factor: ${metrics.profitFactor === Infinity ? '∞' : fmt(metrics.profitFactor)}`,
    '',
    '⚠️  RISK',
    line(),
    `  Max Drawdown:  ${fmtPct(metrics.maxDrawdown)} (${fmt(metrics.maxDrawdownAmount)})`,
    `  Sharpe:        ${fmt(metrics.sharpeRatio)}`,
    `  Max Consec W:  ${metrics.maxConsecutiveWins}`,
    `  Max Consec L:  ${metrics.maxConsecutiveLosses}`,
    '',
    '🔍 TRADES',
    line(),
    `  Avg Win:       ${fmt(metrics.avgWin)}`,
    `  Avg Loss:      ${fmt(metrics.avgLoss)}`,
    `  Avg Duration:  ${fmt(metrics.avgTradeDuration, 1)} days`,
    `  Commission:    ${fmt(metrics.totalCommission)}`,
    `  Exits:         ${reasons.length > 0 ? reasons.join(', ') : '-'}`,
  ];
}

/**
 * Full report as lines
 */
export function formatBacktestResult(result: BacktestResult): string[] {
  const { config, dateRange } = result;

  const lines = [
    '',
    line('═'),
    `  BACKTEST RESULT: ${config.activeStrategies.join(' + ')} (${config.strategyMode})`,
    line('═'),
    '',
    '📊 CONFIGURATION',
    line(),
    `  Symbols:       ${result.symbols.join(', ')}`,
    `  Period:        ${isoDate(dateRange.from)} → ${isoDate(dateRange.to)}`,
    `  Bars:          ${dateRange.barCount}`,
    `  Initial:       ${fmt(config.initialCapital)}`,
    `  SL/TS/TP:      ${config.stopLossPercent}% / ${config.trailingStopPercent}% / ${config.takeProfitPercent}%`,
  ];

  for (const skipped of result.excluded) {
    lines.push(`  Excluded:      ${skipped.symbol} (${skipped.message})`);
  }

  lines.push(...formatMetrics(result.metrics), '', line('═'));
  return lines;
}

export class ConsoleReporter implements ReportSink {
  constructor(private readonly write: (line: string) => void = (l) => console.log(l)) {}

  async publish(result: BacktestResult): Promise<void> {
    for (const l of formatBacktestResult(result)) {
      this.write(l);
    }
  }
}
