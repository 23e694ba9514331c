import type { BrokerClient, BrokerFill, BrokerPosition, Order } from '@equity-pilot/shared';

/**
 * In-process broker: fills every order at its reference price
 */
export class FakeBroker implements BrokerClient {
  readonly submitted: Array<{ order: Order; clientOrderId: string }> = [];

  constructor(
    private readonly held: BrokerPosition[] = [],
    private readonly commissionRate = 0.003
  ) {}

  async submit(order: Order, clientOrderId: string): Promise<BrokerFill> {
    this.submitted.push({ order, clientOrderId });
    return {
      price: order.referencePrice,
      quantity: order.quantity,
      commission: order.referencePrice * order.quantity * this.commissionRate,
      timestamp: order.timestamp,
    };
  }

  async getOpenPositions(): Promise<BrokerPosition[]> {
    return this.held;
  }
}
