/**
 * Backtest Engine
 *
 * Replays historical bars through the same trading session the live
 * trader runs, with simulated fills at the bar close. Deterministic:
 * no wall clock, no randomness, symbols merged in a fixed order.
 *
 * Principles:
 * 1. One decision per symbol per bar
 * 2. Shared capital pool across symbols
 * 3. A symbol with bad or short data is excluded, not the whole run
 */

import {
  DataIntegrityError,
  InsufficientHistoryError,
  createSilentLogger,
  type Bar,
  type EquityPoint,
  type Logger,
  type TradingConfig,
} from '@equity-pilot/shared';
import { SimulatedExecution } from '../adapters/simulated-execution.js';
import { collectBars, validateBars, type BarFeed } from '../data/bar-feed.js';
import { RiskManager } from '../risk/risk-manager.js';
import { TradingSession } from '../services/trading-session.service.js';
import { StrategyEngine } from '../strategy/strategy-engine.js';
import { calculateMetrics } from './metrics.js';
import type { BacktestData, BacktestResult, ExcludedSymbol } from './types.js';

const SECONDS_PER_DAY = 86_400;

export interface BacktestEngineOptions {
  logger?: Logger;
}

interface TimelineEntry {
  bar: Bar;
  order: number;
}

/**
 * Bars of every symbol ordered by (timestamp, symbol order)
 */
export function mergeTimeline(series: ReadonlyArray<readonly Bar[]>): Bar[] {
  const entries: TimelineEntry[] = [];
  series.forEach((bars, order) => {
    for (const bar of bars) entries.push({ bar, order });
  });
  entries.sort((a, b) => a.bar.timestamp - b.bar.timestamp || a.order - b.order);
  return entries.map((e) => e.bar);
}

/**
 * Backtest Engine
 *
 * @example
 * ```typescript
 * const engine = new BacktestEngine(config, { logger });
 * const result = await engine.run(new Map([['SBER', bars]]));
 * console.log(result.metrics.totalReturn);
 * ```
 */
export class BacktestEngine {
  private readonly config: TradingConfig;
  private readonly logger: Logger;

  constructor(config: TradingConfig, options: BacktestEngineOptions = {}) {
    this.config = config;
    this.logger = options.logger ?? createSilentLogger('backtest');
  }

  /**
   * Load every configured symbol from a feed and run. A symbol the feed
   * cannot read is excluded like one with bad bars.
   */
  async runFeed(feed: BarFeed): Promise<BacktestResult> {
    const data = new Map<string, Bar[]>();
    const loadErrors = new Map<string, DataIntegrityError>();
    for (const symbol of this.config.symbols) {
      try {
        data.set(symbol, await collectBars(feed, symbol));
      } catch (error) {
        if (!(error instanceof DataIntegrityError)) throw error;
        loadErrors.set(symbol, error);
      }
    }
    return this.replay(data, loadErrors);
  }

  async run(data: BacktestData): Promise<BacktestResult> {
    return this.replay(data, new Map());
  }

  private async replay(
    data: BacktestData,
    loadErrors: ReadonlyMap<string, DataIntegrityError>
  ): Promise<BacktestResult> {
    const { accepted, excluded, firstError } = this.prepare(data, loadErrors);
    if (accepted.length === 0) {
      throw firstError ?? new InsufficientHistoryError('(none)', this.config.minDataPoints, 0);
    }

    const engine = StrategyEngine.fromConfig(this.config, this.logger.child({ component: 'strategy' }));
    const risk = RiskManager.fromConfig(this.config, this.logger.child({ component: 'risk' }));
    const execution = new SimulatedExecution({
      commissionRate: this.config.commissionRate,
      guard: (order, price, commission) => risk.canSettle(order, price, commission),
    });
    const session = new TradingSession({ engine, risk, execution, logger: this.logger });

    const timeline = mergeTimeline(accepted.map((s) => s.bars));
    const equity: EquityPoint[] = [];

    this.logger.info('Backtest started', {
      symbols: accepted.map((s) => s.symbol),
      bars: timeline.length,
      strategies: this.config.activeStrategies,
      mode: this.config.strategyMode,
    });

    for (const bar of timeline) {
      await session.onBar(bar);
      equity.push({ timestamp: bar.timestamp, ...session.markToMarket() });
    }

    await session.closeAll('end_of_data');
    const lastPoint = equity[equity.length - 1];
    if (lastPoint) {
      equity[equity.length - 1] = { timestamp: lastPoint.timestamp, ...session.markToMarket() };
    }

    const trades = [...session.getTrades()];
    const metrics = calculateMetrics(trades, equity, this.config.initialCapital);

    this.logger.info('Backtest finished', {
      trades: metrics.totalTrades,
      totalReturn: Number(metrics.totalReturn.toFixed(2)),
      maxDrawdown: Number(metrics.maxDrawdown.toFixed(2)),
    });

    return {
      config: this.config,
      symbols: accepted.map((s) => s.symbol),
      excluded,
      dateRange: {
        from: timeline[0]?.timestamp ?? 0,
        to: timeline[timeline.length - 1]?.timestamp ?? 0,
        barCount: timeline.length,
      },
      trades,
      equity,
      metrics,
    };
  }

  /**
   * Validate each configured symbol. Fatal data errors exclude the symbol.
   */
  private prepare(
    data: BacktestData,
    loadErrors: ReadonlyMap<string, DataIntegrityError>
  ): {
    accepted: Array<{ symbol: string; bars: Bar[] }>;
    excluded: ExcludedSymbol[];
    firstError: Error | null;
  } {
    const accepted: Array<{ symbol: string; bars: Bar[] }> = [];
    const excluded: ExcludedSymbol[] = [];
    let firstError: Error | null = null;

    for (const symbol of this.config.symbols) {
      try {
        const loadError = loadErrors.get(symbol);
        if (loadError) throw loadError;
        const bars = validateBars(symbol, data.get(symbol) ?? [], {
          maxGapSeconds: this.config.maxGapDays * SECONDS_PER_DAY,
        });
        if (bars.length < this.config.minDataPoints) {
          throw new InsufficientHistoryError(symbol, this.config.minDataPoints, bars.length);
        }
        accepted.push({ symbol, bars });
      } catch (error) {
        if (!(error instanceof InsufficientHistoryError || error instanceof DataIntegrityError)) {
          throw error;
        }
        this.logger.error('Symbol excluded from backtest', { symbol, code: error.code, error: error.message });
        excluded.push({ symbol, code: error.code, message: error.message });
        firstError ??= error;
      }
    }

    return { accepted, excluded, firstError };
  }
}

/**
 * Convenience wrapper around BacktestEngine
 */
export function runBacktest(
  config: TradingConfig,
  data: BacktestData,
  logger?: Logger
): Promise<BacktestResult> {
  return new BacktestEngine(config, { logger }).run(data);
}
