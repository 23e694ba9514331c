#!/usr/bin/env npx tsx
/**
 * Backtest runner
 *
 * Usage:
 *   npm run backtest -- --config config/default.yaml --data ./data --out report.json
 *
 * Relative paths resolve against the directory npm was started from.
 */

import * as path from 'path';
import { ConfigValidationError, errorMessage, loadEnvFromRoot } from '@equity-pilot/shared';
import { BACKTEST_USAGE, parseBacktestArgs, runBacktestCli } from '../cli/backtest-cli.js';

loadEnvFromRoot();

const cwd = process.env.INIT_CWD ?? process.cwd();

async function main(): Promise<void> {
  const args = parseBacktestArgs(process.argv.slice(2));

  await runBacktestCli({
    config: args.config && path.resolve(cwd, args.config),
    data: path.resolve(cwd, args.data),
    out: args.out && path.resolve(cwd, args.out),
  });
}

main().catch((error: unknown) => {
  console.error(`❌ ${errorMessage(error)}`);
  if (error instanceof ConfigValidationError) {
    console.error(BACKTEST_USAGE);
  }
  process.exitCode = 1;
});
