/**
 * Execution types
 *
 * The contract between the risk manager and whichever venue fills orders:
 * the simulated fill model in backtests, a broker in live trading.
 */

import type { PositionSide } from './trade.js';

export type OrderAction = 'buy' | 'sell';

/**
 * Whether an order opens or closes a position
 */
export type OrderIntent = 'entry' | 'exit';

/**
 * Market order produced by the risk manager
 */
export interface Order {
  /** Deterministic id: `${symbol}-${sequence}` */
  readonly id: string;
  readonly symbol: string;
  readonly action: OrderAction;
  readonly intent: OrderIntent;
  readonly side: PositionSide;
  readonly quantity: number;
  /** Close of the bar the decision was taken on */
  readonly referencePrice: number;
  /** Bar timestamp (Unix seconds) */
  readonly timestamp: number;
}

export interface Fill {
  readonly status: 'filled';
  readonly orderId: string;
  readonly symbol: string;
  readonly price: number;
  readonly quantity: number;
  readonly commission: number;
  readonly timestamp: number;
}

export type RejectionReason =
  | 'timeout'
  | 'insufficient_funds'
  | 'broker_error'
  | 'invalid_order'
  | (string & {});

export interface Rejected {
  readonly status: 'rejected';
  readonly orderId: string;
  readonly symbol: string;
  readonly reason: RejectionReason;
  readonly message?: string;
}

export type ExecutionResult = Fill | Rejected;

/**
 * Position held at the broker, used for reconciliation at startup
 */
export interface BrokerPosition {
  symbol: string;
  side: PositionSide;
  quantity: number;
  averagePrice: number;
  /** Unix seconds, when the broker knows it */
  openedAt?: number;
}

/**
 * Fill report returned by a broker for a submitted order
 */
export interface BrokerFill {
  price: number;
  quantity: number;
  commission: number;
  /** Unix seconds */
  timestamp: number;
}

/**
 * External broker collaborator (live mode only)
 */
export interface BrokerClient {
  /**
   * Resolves with the fill, or rejects with the broker's reason.
   * `clientOrderId` is unique per submission and lets the broker drop duplicates.
   */
  submit(order: Order, clientOrderId: string): Promise<BrokerFill>;
  getOpenPositions(): Promise<BrokerPosition[]>;
}
