/**
 * Simulated execution
 *
 * Fills every order in full at its reference price (the decision bar's
 * close) and charges notional × commission rate. Deterministic: no
 * clock, no randomness, no slippage.
 */

import type { ExecutionResult, Order } from '@equity-pilot/shared';
import type { ExecutionAdapter } from './execution-adapter.js';

/**
 * Decides whether a fill may settle (capital would stay non-negative)
 */
export type SettlementGuard = (order: Order, price: number, commission: number) => boolean;

export interface SimulatedExecutionConfig {
  commissionRate: number;
  guard?: SettlementGuard;
}

export class SimulatedExecution implements ExecutionAdapter {
  readonly mode = 'simulated' as const;
  private readonly commissionRate: number;
  private readonly guard: SettlementGuard;

  constructor(config: SimulatedExecutionConfig) {
    this.commissionRate = config.commissionRate;
    this.guard = config.guard ?? (() => true);
  }

  async submit(order: Order): Promise<ExecutionResult> {
    const price = order.referencePrice;
    const commission = price * order.quantity * this.commissionRate;

    if (!this.guard(order, price, commission)) {
      return {
        status: 'rejected',
        orderId: order.id,
        symbol: order.symbol,
        reason: 'insufficient_funds',
        message: `fill of ${order.quantity} @ ${price} would leave capital negative`,
      };
    }

    return {
      status: 'filled',
      orderId: order.id,
      symbol: order.symbol,
      price,
      quantity: order.quantity,
      commission,
      timestamp: order.timestamp,
    };
  }
}
