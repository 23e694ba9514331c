/**
 * Grid Search Optimization
 *
 * Runs the backtest over the Cartesian product of parameter values and
 * ranks the runs by one metric. Parameters are dot paths into the
 * configuration file layout (e.g. `strategies.trend.ema_short`,
 * `risk.stop_loss_percent`); every combination is re-validated, and
 * inconsistent ones are skipped.
 */

import {
  ConfigFileSchema,
  ConfigValidationError,
  createSilentLogger,
  parseTradingConfig,
  type ConfigFileInput,
  type Logger,
  type TradingConfig,
} from '@equity-pilot/shared';
import { BacktestEngine } from './backtest-engine.js';
import type { BacktestData, BacktestMetrics } from './types.js';

export type GridValue = number | string;
export type ParamGrid = Record<string, readonly GridValue[]>;
export type ParamSet = Record<string, GridValue>;

type NumericKeys<T> = { [K in keyof T]: T[K] extends number ? K : never }[keyof T];
export type RankMetric = NumericKeys<BacktestMetrics>;

export interface GridSearchOptions {
  /** Configuration document every combination starts from */
  base: ConfigFileInput;
  grid: ParamGrid;
  data: BacktestData;
  /** Default totalReturn */
  metric?: RankMetric;
  /** Default desc (higher is better) */
  direction?: 'asc' | 'desc';
  logger?: Logger;
}

export interface GridSearchRun {
  params: ParamSet;
  score: number;
  metrics: BacktestMetrics;
}

export interface GridSearchResult {
  metric: RankMetric;
  /** Best first; ties keep enumeration order */
  runs: GridSearchRun[];
  skipped: Array<{ params: ParamSet; reason: string }>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function hasPath(target: unknown, path: string): boolean {
  let node = target;
  for (const key of path.split('.')) {
    if (!isRecord(node) || !(key in node)) return false;
    node = node[key];
  }
  return true;
}

function setPath(target: Record<string, unknown>, path: string, value: GridValue): void {
  const keys = path.split('.');
  const leaf = keys.pop();
  if (leaf === undefined) return;

  let node = target;
  for (const key of keys) {
    const child = node[key];
    if (isRecord(child)) {
      node = child;
    } else {
      const created: Record<string, unknown> = {};
      node[key] = created;
      node = created;
    }
  }
  node[leaf] = value;
}

/**
 * Every combination of the grid; the last parameter varies fastest
 */
export function expandGrid(grid: ParamGrid): ParamSet[] {
  return Object.entries(grid).reduce<ParamSet[]>(
    (combos, [path, values]) => combos.flatMap((combo) => values.map((value) => ({ ...combo, [path]: value }))),
    [{}]
  );
}

/**
 * Run the grid search
 */
export async function gridSearch(options: GridSearchOptions): Promise<GridSearchResult> {
  const metric = options.metric ?? 'totalReturn';
  const sign = (options.direction ?? 'desc') === 'desc' ? -1 : 1;
  const logger = options.logger ?? createSilentLogger('optimizer');

  const layout = ConfigFileSchema.parse({});
  const unknown = Object.keys(options.grid).filter((path) => !hasPath(layout, path));
  if (unknown.length > 0) {
    throw new ConfigValidationError(unknown.map((path) => `unknown parameter "${path}"`));
  }

  const combos = expandGrid(options.grid);
  const runs: GridSearchRun[] = [];
  const skipped: GridSearchResult['skipped'] = [];

  logger.info('Grid search started', { combinations: combos.length, metric });

  for (const params of combos) {
    const document: Record<string, unknown> = structuredClone({ ...options.base });
    for (const [path, value] of Object.entries(params)) {
      setPath(document, path, value);
    }

    let config: TradingConfig;
    try {
      config = parseTradingConfig(document);
    } catch (error) {
      if (!(error instanceof ConfigValidationError)) throw error;
      skipped.push({ params, reason: error.issues.join('; ') });
      continue;
    }

    const result = await new BacktestEngine(config, { logger }).run(options.data);
    runs.push({ params, score: result.metrics[metric], metrics: result.metrics });
  }

  runs.sort((a, b) => sign * (a.score - b.score));

  logger.info('Grid search finished', { runs: runs.length, skipped: skipped.length, best: runs[0]?.params });
  return { metric, runs, skipped };
}
