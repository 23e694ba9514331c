/**
 * Backtesting
 *
 * @example
 * ```typescript
 * import { runBacktest, ConsoleReporter } from '@equity-pilot/trader';
 *
 * const result = await runBacktest(config, new Map([['SBER', bars]]));
 * await new ConsoleReporter().publish(result);
 * ```
 */

export * from './types.js';
export { BacktestEngine, mergeTimeline, runBacktest, type BacktestEngineOptions } from './backtest-engine.js';
export { calculateMaxDrawdown, calculateMetrics, calculateSharpeRatio } from './metrics.js';
export {
  expandGrid,
  gridSearch,
  type GridSearchOptions,
  type GridSearchResult,
  type GridSearchRun,
  type GridValue,
  type ParamGrid,
  type ParamSet,
  type RankMetric,
} from './optimizer.js';
export * from './reporters/index.js';
