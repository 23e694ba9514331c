/**
 * Trading Session Service
 *
 * The per-bar pipeline shared by the backtest and the live trader:
 *
 *   bar -> StrategyEngine -> RiskManager -> ExecutionAdapter -> RiskManager
 *
 * Decisions that touch capital or the position table run inside the
 * capital pool's exclusive section, so symbols can be fed concurrently.
 */

import { EventEmitter } from 'events';
import {
  createSilentLogger,
  errorMessage,
  type Bar,
  type ExecutionResult,
  type ExitReason,
  type Logger,
  type Order,
  type Position,
  type Rejected,
  type Signal,
  type Trade,
  type TradeEvent,
  type TradeNotifier,
} from '@equity-pilot/shared';
import type { ExecutionAdapter } from '../adapters/execution-adapter.js';
import type { DropReason, EquityMark, RiskDecision, RiskManager } from '../risk/risk-manager.js';
import type { StrategyEngine } from '../strategy/strategy-engine.js';

export interface TradingSessionEvents {
  signal: (signal: Signal) => void;
  'position:opened': (position: Position) => void;
  'position:closed': (trade: Trade) => void;
  'order:rejected': (order: Order, rejected: Rejected) => void;
  'entry:dropped': (signal: Signal, reason: DropReason) => void;
}

export interface TradingSessionOptions {
  engine: StrategyEngine;
  risk: RiskManager;
  execution: ExecutionAdapter;
  notifier?: TradeNotifier;
  logger?: Logger;
}

/**
 * What happened on one bar
 */
export interface BarOutcome {
  signal: Signal;
  decision: RiskDecision;
  /** Execution result when an order was submitted */
  result: ExecutionResult | null;
  opened: Position | null;
  closed: Trade | null;
}

export class TradingSession extends EventEmitter {
  readonly engine: StrategyEngine;
  readonly risk: RiskManager;
  readonly execution: ExecutionAdapter;
  private readonly notifier: TradeNotifier | null;
  private readonly logger: Logger;
  private readonly lastBars = new Map<string, Bar>();

  constructor(options: TradingSessionOptions) {
    super();
    this.engine = options.engine;
    this.risk = options.risk;
    this.execution = options.execution;
    this.notifier = options.notifier ?? null;
    this.logger = options.logger ?? createSilentLogger('session');
  }

  /**
   * Process one closed bar. Throws DataIntegrityError for a bar that does
   * not follow the symbol's previous one.
   */
  async onBar(bar: Bar): Promise<BarOutcome> {
    const { signal } = this.engine.onBar(bar);
    this.lastBars.set(bar.symbol, bar);

    if (signal.direction !== 'flat') {
      this.emit('signal', signal);
    }

    return this.risk.capital.runExclusive(async () => {
      const decision = this.risk.evaluate(bar, signal);

      if (decision.action === 'drop') {
        this.emit('entry:dropped', decision.signal, decision.reason);
        return { signal, decision, result: null, opened: null, closed: null };
      }
      if (decision.action !== 'enter' && decision.action !== 'exit') {
        return { signal, decision, result: null, opened: null, closed: null };
      }

      return { signal, decision, ...(await this.execute(decision.order)) };
    });
  }

  /**
   * Feed a historical bar to the indicators only: no decision, no order
   */
  warmup(bar: Bar): void {
    this.engine.onBar(bar);
    this.lastBars.set(bar.symbol, bar);
  }

  /**
   * Force the symbol's open position out at the last seen close
   */
  async closePosition(symbol: string, reason: ExitReason): Promise<Trade | null> {
    const bar = this.lastBars.get(symbol);
    if (!bar) {
      return null;
    }

    return this.risk.capital.runExclusive(async () => {
      const order = this.risk.closeOut(bar, reason);
      if (!order) {
        return null;
      }
      const { closed } = await this.execute(order);
      return closed;
    });
  }

  /**
   * Close every open position, in symbol order of first appearance
   */
  async closeAll(reason: ExitReason): Promise<Trade[]> {
    const trades: Trade[] = [];
    for (const symbol of this.lastBars.keys()) {
      const trade = await this.closePosition(symbol, reason);
      if (trade) trades.push(trade);
    }
    return trades;
  }

  /**
   * Last close per symbol
   */
  getMarks(): Map<string, number> {
    return new Map([...this.lastBars].map(([symbol, bar]) => [symbol, bar.close]));
  }

  markToMarket(): EquityMark {
    return this.risk.markToMarket(this.getMarks());
  }

  getTrades(): readonly Trade[] {
    return this.risk.positions.getTrades();
  }

  private async execute(
    order: Order
  ): Promise<{ result: ExecutionResult; opened: Position | null; closed: Trade | null }> {
    const result = await this.execution.submit(order);

    if (result.status === 'rejected') {
      this.risk.onRejected(order, result);
      this.emit('order:rejected', order, result);
      this.notify({ type: 'rejected', rejection: result });
      return { result, opened: null, closed: null };
    }

    const settled = this.risk.onFill(order, result);
    if ('exitReason' in settled) {
      this.emit('position:closed', settled);
      this.notify({ type: 'exit', trade: settled, exitReason: settled.exitReason });
      return { result, opened: null, closed: settled };
    }

    this.emit('position:opened', settled);
    this.notify({ type: 'entry', position: settled });
    return { result, opened: settled, closed: null };
  }

  private notify(event: TradeEvent): void {
    if (!this.notifier) {
      return;
    }
    this.notifier.notify(event).catch((error: unknown) => {
      this.logger.warn('Trade notification failed', { event: event.type, error: errorMessage(error) });
    });
  }

  /**
   * Type-safe event listener
   */
  override on<K extends keyof TradingSessionEvents>(event: K, listener: TradingSessionEvents[K]): this {
    return super.on(event as string, listener);
  }

  /**
   * Type-safe event emitter
   */
  override emit<K extends keyof TradingSessionEvents>(
    event: K,
    ...args: Parameters<TradingSessionEvents[K]>
  ): boolean {
    return super.emit(event as string, ...args);
  }
}
