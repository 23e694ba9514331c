/**
 * Backtest command line
 *
 *   backtest [--config <file.yaml>] --data <csv directory> [--out <report.json>]
 *
 * Bars are read from `<SYMBOL>.csv` files in the data directory, one per
 * configured symbol. The report goes to the console and, with --out, to a
 * JSON file.
 */

import { parseArgs } from 'util';
import {
  ConfigValidationError,
  createLogger,
  errorMessage,
  loadTradingConfig,
  type Env,
  type Logger,
} from '@equity-pilot/shared';
import { BacktestEngine } from '../backtest/backtest-engine.js';
import { ConsoleReporter, JsonReporter, type ReportSink } from '../backtest/reporters/index.js';
import type { BacktestResult } from '../backtest/types.js';
import { CsvBarFeed } from '../data/csv-bar-feed.js';

export const BACKTEST_USAGE =
  'Usage: backtest [--config <file.yaml>] --data <csv directory> [--out <report.json>]';

export interface BacktestCliArgs {
  config?: string;
  data: string;
  out?: string;
}

export interface BacktestCliOptions {
  /** Defaults to process.env */
  env?: Env;
  logger?: Logger;
  /** Console line writer */
  write?: (line: string) => void;
}

/**
 * Parse command line arguments (without the node and script entries)
 */
export function parseBacktestArgs(argv: readonly string[]): BacktestCliArgs {
  let values: { config?: string; data?: string; out?: string };
  try {
    ({ values } = parseArgs({
      args: [...argv],
      options: {
        config: { type: 'string', short: 'c' },
        data: { type: 'string', short: 'd' },
        out: { type: 'string', short: 'o' },
      },
      strict: true,
    }));
  } catch (error) {
    throw new ConfigValidationError([errorMessage(error)], 'command line');
  }

  if (!values.data) {
    throw new ConfigValidationError(['--data is required'], 'command line');
  }
  return { config: values.config, data: values.data, out: values.out };
}

/**
 * Load configuration and bars, run the backtest and publish the report
 */
export async function runBacktestCli(
  args: BacktestCliArgs,
  options: BacktestCliOptions = {}
): Promise<BacktestResult> {
  const config = loadTradingConfig({ path: args.config, env: options.env });
  const logger =
    options.logger ??
    createLogger({
      service: 'backtest',
      level: config.logLevel,
      telegramToken: config.telegram?.botToken,
      telegramChatId: config.telegram?.chatId,
    });

  logger.info('Loading bars', { directory: args.data, symbols: config.symbols });
  const result = await new BacktestEngine(config, { logger }).runFeed(new CsvBarFeed({ directory: args.data }));

  const sinks: ReportSink[] = [new ConsoleReporter(options.write)];
  if (args.out) {
    sinks.push(new JsonReporter(args.out));
  }
  for (const sink of sinks) {
    await sink.publish(result);
  }

  if (args.out) {
    logger.info('Report written', { path: args.out });
  }
  return result;
}
