import type { BacktestResult } from '../types.js';

/**
 * Receives the finished backtest for rendering or storage
 */
export interface ReportSink {
  publish(result: BacktestResult): Promise<void>;
}
