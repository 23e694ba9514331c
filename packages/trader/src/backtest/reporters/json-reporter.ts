/**
 * JSON Reporter for Backtest Results
 *
 * Exports backtest results to JSON files.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { BacktestResult } from '../types.js';
import type { ReportSink } from './report-sink.js';

/**
 * Options for JSON export
 */
export interface JSONExportOptions {
  /** Pretty print with indentation */
  pretty?: boolean;
  /** Include the equity curve */
  includeEquity?: boolean;
  /** Report time; defaults to now */
  now?: () => Date;
}

const DEFAULT_OPTIONS = {
  pretty: true,
  includeEquity: true,
  now: () => new Date(),
} satisfies Required<JSONExportOptions>;

/**
 * Convert BacktestResult to a JSON-serializable object
 */
export function toJSON(result: BacktestResult, options?: JSONExportOptions): Record<string, unknown> {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  const json: Record<string, unknown> = {
    metadata: {
      generatedAt: opts.now().toISOString(),
      symbols: result.symbols,
      excluded: result.excluded,
      dateRange: {
        from: new Date(result.dateRange.from * 1000).toISOString(),
        to: new Date(result.dateRange.to * 1000).toISOString(),
        barCount: result.dateRange.barCount,
      },
    },
    config: result.config,
    metrics: result.metrics,
    trades: result.trades,
  };

  if (opts.includeEquity) {
    json.equity = result.equity;
  }

  return json;
}

/**
 * JSON has no Infinity or NaN (profit factor without losses); write them as strings
 */
function nonFiniteAsString(_key: string, value: unknown): unknown {
  return typeof value === 'number' && !Number.isFinite(value) ? String(value) : value;
}

/**
 * Export backtest result to JSON file
 */
export function exportToJSON(result: BacktestResult, outputPath: string, options?: JSONExportOptions): string {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const json = toJSON(result, opts);

  const content = JSON.stringify(json, nonFiniteAsString, opts.pretty ? 2 : undefined);

  // Ensure directory exists
  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  fs.writeFileSync(outputPath, content, 'utf-8');

  return outputPath;
}

export class JsonReporter implements ReportSink {
  constructor(
    private readonly outputPath: string,
    private readonly options: JSONExportOptions = {}
  ) {}

  async publish(result: BacktestResult): Promise<void> {
    exportToJSON(result, this.outputPath, this.options);
  }
}
