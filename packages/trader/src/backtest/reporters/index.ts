/**
 * Backtest Reporters
 */

export type { ReportSink } from './report-sink.js';

export { ConsoleReporter, formatBacktestResult, formatMetrics } from './console-reporter.js';

export { JsonReporter, toJSON, exportToJSON, type JSONExportOptions } from './json-reporter.js';
