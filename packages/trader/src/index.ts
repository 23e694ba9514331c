/**
 * @equity-pilot/trader - Indicators, strategies, risk management, execution and backtesting
 */

// Indicators
export * from './indicators/index.js';

// Strategy
export { BaseStrategy } from './strategy/base-strategy.js';
export { COMBINED_STRATEGY_NAME, combineSignals } from './strategy/combiner.js';
export {
  StrategyEngine,
  type StrategyEngineEvents,
  type StrategyEngineOptions,
  type StrategyEvaluation,
} from './strategy/strategy-engine.js';

// Built-in Strategies
export * from './strategies/index.js';

// Risk Management
export { CapitalPool } from './risk/capital-pool.js';
export * from './risk/risk-manager.js';

// Position Management
export {
  PositionManager,
  type PositionManagerEvents,
  type PositionSlot,
  type PositionState,
} from './position/position-manager.js';

// Execution
export type { ExecutionAdapter, ExecutionMode } from './adapters/execution-adapter.js';
export {
  SimulatedExecution,
  type SettlementGuard,
  type SimulatedExecutionConfig,
} from './adapters/simulated-execution.js';
export { LiveExecution, type LiveExecutionConfig } from './adapters/live-execution.js';

// Market Data
export * from './data/bar-feed.js';
export * from './data/csv-bar-feed.js';

// Services
export * from './services/trading-session.service.js';
export * from './services/live-trader.service.js';

// Backtesting
export * from './backtest/index.js';

// Command line
export * from './cli/backtest-cli.js';
