/**
 * Strategy Engine
 *
 * Keeps a trailing bar window and snapshot history per symbol, runs the
 * active strategies on each closed bar and combines their votes.
 */

import { EventEmitter } from 'events';
import {
  ConfigValidationError,
  DataIntegrityError,
  InsufficientDataError,
  createSilentLogger,
  type Bar,
  type IndicatorSnapshot,
  type Logger,
  type Signal,
  type StrategyMode,
  type TradingConfig,
} from '@equity-pilot/shared';
import type { BaseStrategy } from './base-strategy.js';
import { combineSignals } from './combiner.js';
import { buildSnapshot, requiredBars, type IndicatorRequest } from '../indicators/index.js';
import { createStrategies } from '../strategies/index.js';

/** Snapshots kept per symbol; strategies look one bar back */
const SNAPSHOT_HISTORY = 2;

const SECONDS_PER_DAY = 86_400;

export interface StrategyEngineEvents {
  signal: (signal: Signal, votes: readonly Signal[]) => void;
  indicators: (snapshot: IndicatorSnapshot) => void;
}

export interface StrategyEngineOptions {
  strategies: BaseStrategy[];
  mode: StrategyMode;
  /** Bars kept per symbol */
  indicatorWindow: number;
  /** Largest allowed distance between consecutive bars of a symbol */
  maxGapSeconds?: number;
  logger?: Logger;
}

/**
 * Outcome of one bar
 */
export interface StrategyEvaluation {
  /** null while the indicator windows are filling */
  snapshot: IndicatorSnapshot | null;
  votes: Signal[];
  signal: Signal;
}

interface SymbolState {
  bars: Bar[];
  snapshots: IndicatorSnapshot[];
}

/**
 * Strategy Engine
 *
 * @example
 * ```typescript
 * const engine = StrategyEngine.fromConfig(config);
 *
 * engine.on('signal', (signal) => {
 *   console.log(`${signal.symbol}: ${signal.direction}`);
 * });
 *
 * const { signal } = engine.onBar(bar);
 * ```
 */
export class StrategyEngine extends EventEmitter {
  private readonly strategies: BaseStrategy[];
  private readonly mode: StrategyMode;
  private readonly window: number;
  private readonly maxGapSeconds: number | null;
  private readonly request: IndicatorRequest;
  private readonly logger: Logger;
  private readonly symbols = new Map<string, SymbolState>();

  constructor(options: StrategyEngineOptions) {
    super();
    this.strategies = options.strategies;
    this.mode = options.mode;
    this.window = options.indicatorWindow;
    this.maxGapSeconds = options.maxGapSeconds ?? null;
    this.logger = options.logger ?? createSilentLogger('strategy-engine');
    this.request = this.strategies.reduce<IndicatorRequest>(
      (acc, s) => ({ ...acc, ...s.indicators() }),
      {}
    );

    const required = requiredBars(this.request);
    if (this.window < required) {
      throw new ConfigValidationError([
        `indicator_window ${this.window} is shorter than the ${required} bars the active strategies need`,
      ]);
    }
  }

  static fromConfig(config: TradingConfig, logger?: Logger): StrategyEngine {
    return new StrategyEngine({
      strategies: createStrategies(config),
      mode: config.strategyMode,
      indicatorWindow: config.indicatorWindow,
      maxGapSeconds: config.maxGapDays * SECONDS_PER_DAY,
      logger,
    });
  }

  getStrategies(): readonly BaseStrategy[] {
    return this.strategies;
  }

  /**
   * Bars needed before the first vote
   */
  getWarmupBars(): number {
    return requiredBars(this.request);
  }

  /**
   * Feed one closed bar. Bars of a symbol must arrive in strictly
   * increasing timestamp order, no further apart than the gap limit.
   */
  onBar(bar: Bar): StrategyEvaluation {
    const state = this.stateFor(bar.symbol);
    const previous = state.bars[state.bars.length - 1];

    if (previous && bar.timestamp <= previous.timestamp) {
      throw new DataIntegrityError(
        bar.symbol,
        state.bars.length,
        `timestamp ${bar.timestamp} does not follow ${previous.timestamp}`
      );
    }
    if (previous && this.maxGapSeconds !== null && bar.timestamp - previous.timestamp > this.maxGapSeconds) {
      throw new DataIntegrityError(
        bar.symbol,
        state.bars.length,
        `gap of ${bar.timestamp - previous.timestamp}s exceeds ${this.maxGapSeconds}s`
      );
    }

    state.bars.push(bar);
    if (state.bars.length > this.window) {
      state.bars.shift();
    }

    let snapshot: IndicatorSnapshot;
    try {
      snapshot = buildSnapshot(state.bars, this.request);
    } catch (error) {
      if (error instanceof InsufficientDataError) {
        const signal = combineSignals([], this.mode, bar.symbol, bar.timestamp);
        return { snapshot: null, votes: [], signal };
      }
      throw error;
    }

    state.snapshots.push(snapshot);
    if (state.snapshots.length > SNAPSHOT_HISTORY) {
      state.snapshots.shift();
    }
    this.emit('indicators', snapshot);

    const votes = this.strategies.map((s) => s.evaluate(state.snapshots));
    const signal = combineSignals(votes, this.mode, bar.symbol, bar.timestamp);

    if (signal.direction !== 'flat') {
      this.logger.debug('Signal', {
        symbol: signal.symbol,
        direction: signal.direction,
        strategy: signal.strategyName,
        strength: signal.strength,
      });
    }
    this.emit('signal', signal, votes);

    return { snapshot, votes, signal };
  }

  /**
   * Bars currently buffered for a symbol
   */
  getBars(symbol: string): readonly Bar[] {
    return this.symbols.get(symbol)?.bars ?? [];
  }

  reset(symbol?: string): void {
    if (symbol) this.symbols.delete(symbol);
    else this.symbols.clear();
  }

  private stateFor(symbol: string): SymbolState {
    let state = this.symbols.get(symbol);
    if (!state) {
      state = { bars: [], snapshots: [] };
      this.symbols.set(symbol, state);
    }
    return state;
  }

  /**
   * Type-safe event listener
   */
  override on<K extends keyof StrategyEngineEvents>(event: K, listener: StrategyEngineEvents[K]): this {
    return super.on(event as string, listener);
  }

  /**
   * Type-safe event emitter
   */
  override emit<K extends keyof StrategyEngineEvents>(
    event: K,
    ...args: Parameters<StrategyEngineEvents[K]>
  ): boolean {
    return super.emit(event as string, ...args);
  }
}
