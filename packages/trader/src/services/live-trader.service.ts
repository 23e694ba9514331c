/**
 * Live Trader Service
 *
 * Polls the bar source every `updateIntervalSec`, runs new bars through
 * the trading session with the live execution adapter and reconciles the
 * broker's open positions once at startup.
 *
 * Features:
 * - First poll warms the indicators on history and trades only the newest bar
 * - Polls never overlap; a slow poll delays the next one
 * - `stop()` takes effect before the next bar
 */

import { EventEmitter } from 'events';
import {
  DataIntegrityError,
  createSilentLogger,
  errorMessage,
  type BrokerClient,
  type Logger,
  type Position,
  type TradeNotifier,
  type TradingConfig,
} from '@equity-pilot/shared';
import { LiveExecution } from '../adapters/live-execution.js';
import type { BarSource } from '../data/bar-feed.js';
import { RiskManager } from '../risk/risk-manager.js';
import { StrategyEngine } from '../strategy/strategy-engine.js';
import { TradingSession } from './trading-session.service.js';

export interface LiveTraderEvents {
  reconciled: (positions: Position[]) => void;
  poll: (processed: number) => void;
  'poll:error': (error: Error) => void;
}

export interface LiveTraderOptions {
  config: TradingConfig;
  source: BarSource;
  broker: BrokerClient;
  notifier?: TradeNotifier;
  logger?: Logger;
  /** Unix seconds; used for adopted positions the broker reports without an open time */
  now?: () => number;
}

/**
 * Live Trader
 *
 * @example
 * ```typescript
 * const trader = new LiveTrader({ config, source, broker, notifier, logger });
 * trader.session.on('position:closed', (trade) => logger.info('Closed', { ...trade }));
 *
 * await trader.start();
 * process.on('SIGINT', () => trader.stop());
 * ```
 */
export class LiveTrader extends EventEmitter {
  readonly session: TradingSession;
  private readonly config: TradingConfig;
  private readonly source: BarSource;
  private readonly broker: BrokerClient;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly lastSeen = new Map<string, number>();
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private running = false;

  constructor(options: LiveTraderOptions) {
    super();
    this.config = options.config;
    this.source = options.source;
    this.broker = options.broker;
    this.logger = options.logger ?? createSilentLogger('live-trader');
    this.now = options.now ?? (() => Math.floor(Date.now() / 1000));

    this.session = new TradingSession({
      engine: StrategyEngine.fromConfig(this.config, this.logger.child({ component: 'strategy' })),
      risk: RiskManager.fromConfig(this.config, this.logger.child({ component: 'risk' })),
      execution: new LiveExecution({
        broker: this.broker,
        timeoutMs: this.config.orderTimeoutMs,
        logger: this.logger.child({ component: 'execution' }),
      }),
      notifier: options.notifier,
      logger: this.logger,
    });
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Reconcile, run the first poll and schedule the next ones
   */
  async start(): Promise<void> {
    if (this.running) {
      return;
    }
    this.running = true;
    this.logger.info('Live trader starting', {
      symbols: this.config.symbols,
      intervalSec: this.config.updateIntervalSec,
    });

    await this.reconcile();
    await this.launchPoll();
  }

  /**
   * Stop polling. An in-flight poll finishes its current bar and stops.
   */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    await this.settled();
    this.logger.info('Live trader stopped');
  }

  /**
   * Resolves once the current poll, if any, has finished
   */
  async settled(): Promise<void> {
    await this.inFlight;
  }

  /**
   * Adopt the broker's open positions for configured symbols
   */
  async reconcile(): Promise<Position[]> {
    const held = await this.broker.getOpenPositions();
    const adopted = await this.session.risk.capital.runExclusive(() => {
      const positions: Position[] = [];
      for (const position of held) {
        if (!this.config.symbols.includes(position.symbol)) {
          this.logger.warn('Ignoring broker position for unconfigured symbol', { symbol: position.symbol });
          continue;
        }
        const result = this.session.risk.adoptPosition(position, this.now());
        if (result) positions.push(result);
      }
      return positions;
    });

    this.emit('reconciled', adopted);
    return adopted;
  }

  /**
   * Fetch and process new bars for every symbol; returns bars traded.
   * A symbol whose bars fail the integrity checks is reset and retried
   * from its full history on the next poll; the others carry on.
   */
  async poll(): Promise<number> {
    let processed = 0;

    for (const symbol of this.config.symbols) {
      if (!this.running) break;

      try {
        processed += await this.pollSymbol(symbol);
      } catch (error) {
        if (!(error instanceof DataIntegrityError)) throw error;
        this.logger.error('Bad bars from source, symbol reset', { symbol, error: error.message });
        this.session.engine.reset(symbol);
        this.lastSeen.delete(symbol);
        this.emit('poll:error', error);
      }
    }

    return processed;
  }

  private async pollSymbol(symbol: string): Promise<number> {
    const after = this.lastSeen.get(symbol) ?? null;
    const bars = await this.source.latestBars(symbol, after);
    if (bars.length === 0) return 0;

    // history on the first fetch only feeds the indicators
    let fresh = bars;
    if (after === null) {
      const history = bars.slice(0, -1);
      for (const bar of history) this.session.warmup(bar);
      const warmed = history[history.length - 1];
      if (warmed) this.lastSeen.set(symbol, warmed.timestamp);
      fresh = bars.slice(-1);
    }

    let processed = 0;
    for (const bar of fresh) {
      if (!this.running) break;
      await this.session.onBar(bar);
      this.lastSeen.set(symbol, bar.timestamp);
      processed++;
    }
    return processed;
  }

  private async runPoll(): Promise<void> {
    try {
      this.emit('poll', await this.poll());
    } catch (error) {
      this.logger.error('Poll failed', { error: errorMessage(error) });
      this.emit('poll:error', error instanceof Error ? error : new Error(errorMessage(error)));
    }
    this.schedule();
  }

  private schedule(): void {
    if (!this.running) {
      return;
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.launchPoll();
    }, this.config.updateIntervalSec * 1000);
  }

  private launchPoll(): Promise<void> {
    this.inFlight = this.runPoll().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  /**
   * Type-safe event listener
   */
  override on<K extends keyof LiveTraderEvents>(event: K, listener: LiveTraderEvents[K]): this {
    return super.on(event as string, listener);
  }

  /**
   * Type-safe event emitter
   */
  override emit<K extends keyof LiveTraderEvents>(event: K, ...args: Parameters<LiveTraderEvents[K]>): boolean {
    return super.emit(event as string, ...args);
  }
}
