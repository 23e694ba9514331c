/**
 * Risk Manager
 *
 * Gates and sizes entry signals, sets protective levels, ratchets the
 * trailing stop and decides exits. Owns the position table and the
 * capital pool; every change to either goes through this class.
 *
 * Exit priority on a bar, first match wins:
 * 1. stop (initial or trailing) breached intrabar
 * 2. take profit reached intrabar
 * 3. holding time elapsed
 * 4. opposing effective signal
 */

import {
  createSilentLogger,
  type Bar,
  type BrokerPosition,
  type ExitReason,
  type Fill,
  type Logger,
  type Order,
  type Position,
  type PositionSide,
  type Rejected,
  type Signal,
  type Trade,
  type TradingConfig,
} from '@equity-pilot/shared';
import { CapitalPool } from './capital-pool.js';
import { PositionManager } from '../position/position-manager.js';

const SECONDS_PER_DAY = 86_400;

/**
 * Risk Management Configuration
 */
export type RiskConfig = Pick<
  TradingConfig,
  | 'commissionRate'
  | 'maxPositions'
  | 'maxPositionSize'
  | 'maxHoldingDays'
  | 'stopLossPercent'
  | 'trailingStopPercent'
  | 'takeProfitPercent'
>;

export type DropReason = 'capacity_exceeded' | 'insufficient_capital' | 'position_exists';

/**
 * What the risk manager wants done on a bar
 */
export type RiskDecision =
  | { action: 'none' }
  | { action: 'hold'; position: Position }
  | { action: 'enter'; order: Order }
  | { action: 'exit'; order: Order; reason: ExitReason }
  | { action: 'drop'; reason: DropReason; signal: Signal };

export interface ProtectiveLevels {
  stopLossPrice: number;
  takeProfitPrice: number;
}

export interface PositionRisk {
  symbol: string;
  side: PositionSide;
  quantity: number;
  entryPrice: number;
  markPrice: number;
  stopPrice: number;
  /** mark × quantity */
  exposure: number;
  /** |entry − stop| × quantity */
  moneyAtRisk: number;
  unrealizedPnl: number;
}

export interface RiskReport {
  equity: number;
  cash: number;
  positions: PositionRisk[];
  totalExposure: number;
  totalAtRisk: number;
  /** Percent of equity */
  exposurePct: number;
  atRiskPct: number;
}

export interface EquityMark {
  /** Cash plus cost basis of open positions */
  capital: number;
  unrealizedPnl: number;
}

export interface RiskManagerOptions {
  capital?: CapitalPool;
  positions?: PositionManager;
  logger?: Logger;
}

function direction(side: PositionSide): 1 | -1 {
  return side === 'long' ? 1 : -1;
}

/**
 * Stop-loss and take-profit for a new position; percent units
 */
export function protectiveLevels(
  side: PositionSide,
  entryPrice: number,
  stopLossPercent: number,
  takeProfitPercent: number
): ProtectiveLevels {
  const d = direction(side);
  return {
    stopLossPrice: entryPrice * (1 - (d * stopLossPercent) / 100),
    takeProfitPrice: entryPrice * (1 + (d * takeProfitPercent) / 100),
  };
}

/**
 * Move the trailing stop after a close. The stop only tightens, and only
 * once the best close since entry is more than `trailingStopPercent`
 * in profit.
 */
export function ratchetTrailingStop(position: Position, close: number, trailingStopPercent: number): Position {
  const long = position.side === 'long';
  const bestPrice = long ? Math.max(position.bestPrice, close) : Math.min(position.bestPrice, close);
  const gainPct = (direction(position.side) * (bestPrice - position.entryPrice) / position.entryPrice) * 100;

  let trailingStopPrice = position.trailingStopPrice;
  if (gainPct > trailingStopPercent) {
    const candidate = long
      ? bestPrice * (1 - trailingStopPercent / 100)
      : bestPrice * (1 + trailingStopPercent / 100);
    if (long ? candidate > trailingStopPrice : candidate < trailingStopPrice) {
      trailingStopPrice = candidate;
    }
  }

  if (bestPrice === position.bestPrice && trailingStopPrice === position.trailingStopPrice) {
    return position;
  }
  return { ...position, bestPrice, trailingStopPrice };
}

/**
 * First exit condition that holds on `bar`, in priority order
 */
export function detectExit(position: Position, bar: Bar, signal: Signal | null): ExitReason | null {
  const long = position.side === 'long';

  const stopHit = long ? bar.low <= position.trailingStopPrice : bar.high >= position.trailingStopPrice;
  if (stopHit) {
    const trailed = long
      ? position.trailingStopPrice > position.stopLossPrice
      : position.trailingStopPrice < position.stopLossPrice;
    return trailed ? 'trailing_stop' : 'stop_loss';
  }

  const targetHit = long ? bar.high >= position.takeProfitPrice : bar.low <= position.takeProfitPrice;
  if (targetHit) {
    return 'take_profit';
  }

  if (bar.timestamp >= position.maxExitTime) {
    return 'max_holding_days';
  }

  if (signal && signal.direction !== 'flat' && signal.direction !== position.side) {
    return 'signal';
  }

  return null;
}

/**
 * Risk Manager
 *
 * @example
 * ```typescript
 * const risk = RiskManager.fromConfig(config);
 *
 * const decision = risk.evaluate(bar, signal);
 * if (decision.action === 'enter' || decision.action === 'exit') {
 *   const result = await execution.submit(decision.order);
 *   result.status === 'filled'
 *     ? risk.onFill(decision.order, result)
 *     : risk.onRejected(decision.order, result);
 * }
 * ```
 */
export class RiskManager {
  readonly capital: CapitalPool;
  readonly positions: PositionManager;
  private readonly config: RiskConfig;
  private readonly logger: Logger;
  private readonly sequence = new Map<string, number>();

  constructor(config: RiskConfig & { initialCapital: number }, options: RiskManagerOptions = {}) {
    this.config = config;
    this.capital = options.capital ?? new CapitalPool(config.initialCapital);
    this.positions = options.positions ?? new PositionManager();
    this.logger = options.logger ?? createSilentLogger('risk');
  }

  static fromConfig(config: TradingConfig, logger?: Logger): RiskManager {
    return new RiskManager(config, { logger });
  }

  getConfig(): Readonly<RiskConfig> {
    return this.config;
  }

  /**
   * Decide what to do with `symbol` on this bar. Entry and exit decisions
   * move the slot to `entering` / `exiting`; the caller must report the
   * execution result through onFill or onRejected.
   */
  evaluate(bar: Bar, signal: Signal): RiskDecision {
    const slot = this.positions.getSlot(bar.symbol);

    if (slot.state === 'open') {
      const reason = detectExit(slot.position, bar, signal);
      if (reason) {
        return this.beginExit(slot.position, bar, reason);
      }

      const updated = ratchetTrailingStop(slot.position, bar.close, this.config.trailingStopPercent);
      if (updated !== slot.position) {
        this.positions.update(updated);
        if (updated.trailingStopPrice !== slot.position.trailingStopPrice) {
          this.logger.debug('Trailing stop raised', {
            symbol: bar.symbol,
            from: slot.position.trailingStopPrice,
            to: updated.trailingStopPrice,
          });
        }
      }
      return { action: 'hold', position: updated };
    }

    if (signal.direction === 'flat') {
      return { action: 'none' };
    }

    if (slot.state !== 'flat') {
      return this.drop(signal, 'position_exists');
    }

    if (this.positions.getActiveCount() >= this.config.maxPositions) {
      return this.drop(signal, 'capacity_exceeded');
    }

    const unitCost = bar.close * (1 + this.config.commissionRate);
    const budget = this.config.maxPositionSize * this.capital.getAvailable();
    const quantity = Math.floor(budget / unitCost);
    if (quantity < 1) {
      return this.drop(signal, 'insufficient_capital');
    }

    const order = this.createOrder(bar, signal.direction, 'entry', quantity);
    const reserved = quantity * unitCost;
    this.capital.reserve(reserved);
    this.positions.beginEntry(order, reserved, signal.strategyName);

    return { action: 'enter', order };
  }

  /**
   * Force an exit of an open position (end of data, shutdown)
   */
  closeOut(bar: Bar, reason: ExitReason): Order | null {
    const slot = this.positions.getSlot(bar.symbol);
    if (slot.state !== 'open') {
      return null;
    }
    const decision = this.beginExit(slot.position, bar, reason);
    return decision.order;
  }

  /**
   * Whether filling `order` at `price` keeps cash non-negative
   */
  canSettle(order: Order, price: number, commission: number): boolean {
    return this.capital.canApply(this.cashDelta(order, price, order.quantity, commission));
  }

  onFill(order: Order, fill: Fill): Position | Trade {
    return order.intent === 'entry' ? this.settleEntry(order, fill) : this.settleExit(order, fill);
  }

  onRejected(order: Order, rejected: Rejected): void {
    this.logger.warn('Order rejected', {
      symbol: order.symbol,
      orderId: order.id,
      intent: order.intent,
      reason: rejected.reason,
      message: rejected.message,
    });

    if (order.intent === 'entry') {
      const slot = this.positions.getSlot(order.symbol);
      if (slot.state === 'entering') {
        this.capital.release(slot.reserved);
      }
      this.positions.abandonEntry(order.symbol);
    } else {
      this.positions.abandonExit(order.symbol);
    }
  }

  /**
   * Take over a position the broker already holds
   */
  adoptPosition(held: BrokerPosition, now: number): Position | null {
    const cost = held.averagePrice * held.quantity;
    if (!this.capital.canApply(-cost)) {
      this.logger.error('Cannot adopt broker position: capital too small', {
        symbol: held.symbol,
        cost,
        cash: this.capital.getCash(),
      });
      return null;
    }

    const position = this.newPosition(
      held.symbol,
      held.side,
      held.averagePrice,
      held.quantity,
      held.openedAt ?? now,
      0,
      'reconciled'
    );
    this.capital.apply(-cost);
    this.positions.adopt(position);
    this.logger.info('Adopted broker position', {
      symbol: held.symbol,
      side: held.side,
      quantity: held.quantity,
      entryPrice: held.averagePrice,
    });
    return position;
  }

  /**
   * Capital and unrealized PnL at the given marks (symbol → price);
   * positions without a mark are valued at entry
   */
  markToMarket(marks: ReadonlyMap<string, number>): EquityMark {
    let costBasis = 0;
    let unrealizedPnl = 0;
    for (const p of this.positions.getOpenPositions()) {
      const mark = marks.get(p.symbol) ?? p.entryPrice;
      costBasis += p.entryPrice * p.quantity;
      unrealizedPnl += direction(p.side) * (mark - p.entryPrice) * p.quantity;
    }
    return { capital: this.capital.getCash() + costBasis, unrealizedPnl };
  }

  getRiskReport(marks: ReadonlyMap<string, number>): RiskReport {
    const { capital, unrealizedPnl } = this.markToMarket(marks);
    const equity = capital + unrealizedPnl;

    const positions = this.positions.getOpenPositions().map((p): PositionRisk => {
      const markPrice = marks.get(p.symbol) ?? p.entryPrice;
      return {
        symbol: p.symbol,
        side: p.side,
        quantity: p.quantity,
        entryPrice: p.entryPrice,
        markPrice,
        stopPrice: p.trailingStopPrice,
        exposure: markPrice * p.quantity,
        moneyAtRisk: Math.abs(p.entryPrice - p.trailingStopPrice) * p.quantity,
        unrealizedPnl: direction(p.side) * (markPrice - p.entryPrice) * p.quantity,
      };
    });

    const totalExposure = positions.reduce((sum, p) => sum + p.exposure, 0);
    const totalAtRisk = positions.reduce((sum, p) => sum + p.moneyAtRisk, 0);

    return {
      equity,
      cash: this.capital.getCash(),
      positions,
      totalExposure,
      totalAtRisk,
      exposurePct: equity > 0 ? (totalExposure / equity) * 100 : 0,
      atRiskPct: equity > 0 ? (totalAtRisk / equity) * 100 : 0,
    };
  }

  private beginExit(position: Position, bar: Bar, reason: ExitReason): { action: 'exit'; order: Order; reason: ExitReason } {
    const order = this.createOrder(bar, position.side, 'exit', position.quantity);
    this.positions.beginExit(order, reason);
    return { action: 'exit', order, reason };
  }

  private drop(signal: Signal, reason: DropReason): RiskDecision {
    this.logger.info('Entry dropped', {
      symbol: signal.symbol,
      direction: signal.direction,
      strategy: signal.strategyName,
      reason,
    });
    return { action: 'drop', reason, signal };
  }

  private createOrder(bar: Bar, side: PositionSide, intent: Order['intent'], quantity: number): Order {
    const seq = (this.sequence.get(bar.symbol) ?? 0) + 1;
    this.sequence.set(bar.symbol, seq);

    const buys = (side === 'long') === (intent === 'entry');
    return {
      id: `${bar.symbol}-${seq}`,
      symbol: bar.symbol,
      action: buys ? 'buy' : 'sell',
      intent,
      side,
      quantity,
      referencePrice: bar.close,
      timestamp: bar.timestamp,
    };
  }

  /**
   * Cash movement of a fill: entries pay notional plus commission, exits
   * get back the entry notional plus gross PnL minus commission
   */
  private cashDelta(order: Order, price: number, quantity: number, commission: number): number {
    if (order.intent === 'entry') {
      return -(price * quantity + commission);
    }
    const position = this.positions.getPosition(order.symbol);
    if (!position) {
      return 0;
    }
    const gross = direction(position.side) * (price - position.entryPrice) * quantity;
    return position.entryPrice * quantity + gross - commission;
  }

  private settleEntry(order: Order, fill: Fill): Position {
    const slot = this.positions.getSlot(order.symbol);
    if (slot.state !== 'entering') {
      throw new Error(`${order.symbol}: entry fill without a pending entry`);
    }

    const { capital: equity } = this.markToMarket(new Map());
    this.capital.release(slot.reserved);
    this.capital.apply(this.cashDelta(order, fill.price, fill.quantity, fill.commission));

    const position = this.newPosition(
      order.symbol,
      order.side,
      fill.price,
      fill.quantity,
      fill.timestamp,
      fill.commission,
      slot.strategyName,
      equity
    );
    this.positions.open(position);

    this.logger.info('Position opened', {
      symbol: position.symbol,
      side: position.side,
      quantity: position.quantity,
      entryPrice: position.entryPrice,
      stopLoss: position.stopLossPrice,
      takeProfit: position.takeProfitPrice,
    });
    return position;
  }

  private settleExit(order: Order, fill: Fill): Trade {
    const slot = this.positions.getSlot(order.symbol);
    if (slot.state !== 'exiting') {
      throw new Error(`${order.symbol}: exit fill without a pending exit`);
    }
    const { position, reason } = slot;

    this.capital.apply(this.cashDelta(order, fill.price, position.quantity, fill.commission));

    const gross = direction(position.side) * (fill.price - position.entryPrice) * position.quantity;
    const commissionPaid = position.entryCommission + fill.commission;
    const pnl = gross - commissionPaid;

    const trade: Trade = {
      id: order.id,
      symbol: position.symbol,
      side: position.side,
      quantity: position.quantity,
      entryTime: position.entryTime,
      entryPrice: position.entryPrice,
      exitTime: fill.timestamp,
      exitPrice: fill.price,
      exitReason: reason,
      pnl,
      pnlPct: (pnl / (position.entryPrice * position.quantity)) * 100,
      commissionPaid,
      strategyName: position.strategyName,
    };
    this.positions.close(trade);

    this.logger.info('Position closed', {
      symbol: trade.symbol,
      reason: trade.exitReason,
      exitPrice: trade.exitPrice,
      pnl: trade.pnl,
    });
    return trade;
  }

  private newPosition(
    symbol: string,
    side: PositionSide,
    entryPrice: number,
    quantity: number,
    entryTime: number,
    entryCommission: number,
    strategyName: string,
    equity?: number
  ): Position {
    const { stopLossPrice, takeProfitPrice } = protectiveLevels(
      side,
      entryPrice,
      this.config.stopLossPercent,
      this.config.takeProfitPercent
    );
    const base = equity ?? this.markToMarket(new Map()).capital;

    return {
      symbol,
      side,
      entryPrice,
      entryTime,
      quantity,
      size: base > 0 ? (entryPrice * quantity) / base : 0,
      stopLossPrice,
      trailingStopPrice: stopLossPrice,
      takeProfitPrice,
      maxExitTime: entryTime + this.config.maxHoldingDays * SECONDS_PER_DAY,
      bestPrice: entryPrice,
      entryCommission,
      strategyName,
    };
  }
}
