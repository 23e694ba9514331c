/**
 * Position Manager
 *
 * Owning table of per-symbol position state:
 *
 *   flat -> entering -> open -> exiting -> flat
 *
 * `entering` and `exiting` hold the in-flight order; a rejected entry
 * returns to `flat`, a rejected exit returns to `open`.
 */

import { EventEmitter } from 'events';
import type { ExitReason, Order, Position, Trade } from '@equity-pilot/shared';

export type PositionSlot =
  | { state: 'flat' }
  | { state: 'entering'; order: Order; reserved: number; strategyName: string }
  | { state: 'open'; position: Position }
  | { state: 'exiting'; position: Position; order: Order; reason: ExitReason };

export type PositionState = PositionSlot['state'];

/**
 * Position Manager Events
 */
export interface PositionManagerEvents {
  'position:opened': (position: Position) => void;
  'position:closed': (position: Position, trade: Trade) => void;
  'position:updated': (position: Position) => void;
}

const FLAT: PositionSlot = { state: 'flat' };

/**
 * Position Manager
 *
 * @example
 * ```typescript
 * const positions = new PositionManager();
 *
 * positions.on('position:closed', (position, trade) => {
 *   console.log(`${trade.symbol} closed: ${trade.exitReason}`);
 * });
 * ```
 */
export class PositionManager extends EventEmitter {
  private readonly slots = new Map<string, PositionSlot>();
  private readonly trades: Trade[] = [];

  getSlot(symbol: string): PositionSlot {
    return this.slots.get(symbol) ?? FLAT;
  }

  getState(symbol: string): PositionState {
    return this.getSlot(symbol).state;
  }

  /**
   * Position of a symbol while open or exiting
   */
  getPosition(symbol: string): Position | undefined {
    const slot = this.getSlot(symbol);
    return slot.state === 'open' || slot.state === 'exiting' ? slot.position : undefined;
  }

  getOpenPositions(): Position[] {
    const positions: Position[] = [];
    for (const slot of this.slots.values()) {
      if (slot.state === 'open' || slot.state === 'exiting') positions.push(slot.position);
    }
    return positions;
  }

  /**
   * Slots that count against max_positions (entering, open, exiting)
   */
  getActiveCount(): number {
    let count = 0;
    for (const slot of this.slots.values()) {
      if (slot.state !== 'flat') count++;
    }
    return count;
  }

  getTrades(): readonly Trade[] {
    return this.trades;
  }

  beginEntry(order: Order, reserved: number, strategyName: string): void {
    this.expect(order.symbol, 'flat');
    this.slots.set(order.symbol, { state: 'entering', order, reserved, strategyName });
  }

  /**
   * Entry filled
   */
  open(position: Position): void {
    this.expect(position.symbol, 'entering');
    this.slots.set(position.symbol, { state: 'open', position });
    this.emit('position:opened', position);
  }

  /**
   * Adopt a position that is already open (broker reconciliation)
   */
  adopt(position: Position): void {
    this.expect(position.symbol, 'flat');
    this.slots.set(position.symbol, { state: 'open', position });
    this.emit('position:opened', position);
  }

  /**
   * Entry rejected
   */
  abandonEntry(symbol: string): void {
    this.expect(symbol, 'entering');
    this.slots.delete(symbol);
  }

  update(position: Position): void {
    this.expect(position.symbol, 'open');
    this.slots.set(position.symbol, { state: 'open', position });
    this.emit('position:updated', position);
  }

  beginExit(order: Order, reason: ExitReason): Position {
    const slot = this.getSlot(order.symbol);
    if (slot.state !== 'open') {
      throw new Error(`${order.symbol}: cannot exit from state ${slot.state}`);
    }
    this.slots.set(order.symbol, { state: 'exiting', position: slot.position, order, reason });
    return slot.position;
  }

  /**
   * Exit filled: record the trade and free the slot
   */
  close(trade: Trade): void {
    const slot = this.getSlot(trade.symbol);
    if (slot.state !== 'exiting') {
      throw new Error(`${trade.symbol}: cannot close from state ${slot.state}`);
    }
    this.slots.delete(trade.symbol);
    this.trades.push(trade);
    this.emit('position:closed', slot.position, trade);
  }

  /**
   * Exit rejected: the position stays open
   */
  abandonExit(symbol: string): void {
    const slot = this.getSlot(symbol);
    if (slot.state !== 'exiting') {
      throw new Error(`${symbol}: cannot abandon exit from state ${slot.state}`);
    }
    this.slots.set(symbol, { state: 'open', position: slot.position });
  }

  private expect(symbol: string, state: PositionState): void {
    const current = this.getState(symbol);
    if (current !== state) {
      throw new Error(`${symbol}: expected state ${state}, found ${current}`);
    }
  }

  /**
   * Type-safe event listener
   */
  override on<K extends keyof PositionManagerEvents>(event: K, listener: PositionManagerEvents[K]): this {
    return super.on(event as string, listener);
  }

  /**
   * Type-safe event emitter
   */
  override emit<K extends keyof PositionManagerEvents>(
    event: K,
    ...args: Parameters<PositionManagerEvents[K]>
  ): boolean {
    return super.emit(event as string, ...args);
  }
}
