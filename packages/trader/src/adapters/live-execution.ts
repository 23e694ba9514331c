/**
 * Live execution
 *
 * Forwards orders to the broker with a caller-supplied timeout. Every
 * failure becomes a `Rejected` result; nothing is retried here, and a
 * timed-out order is reported as rejected so it is never submitted twice.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  BrokerFillSchema,
  OrderSchema,
  createSilentLogger,
  errorMessage,
  type BrokerClient,
  type ExecutionResult,
  type Logger,
  type Order,
  type Rejected,
} from '@equity-pilot/shared';
import type { ExecutionAdapter } from './execution-adapter.js';

export interface LiveExecutionConfig {
  broker: BrokerClient;
  timeoutMs: number;
  logger?: Logger;
}

const TIMED_OUT = Symbol('timeout');

export class LiveExecution implements ExecutionAdapter {
  readonly mode = 'live' as const;
  private readonly broker: BrokerClient;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(config: LiveExecutionConfig) {
    this.broker = config.broker;
    this.timeoutMs = config.timeoutMs;
    this.logger = config.logger ?? createSilentLogger('live-execution');
  }

  async submit(order: Order): Promise<ExecutionResult> {
    const valid = OrderSchema.safeParse(order);
    if (!valid.success) {
      return this.reject(order, 'invalid_order', valid.error.issues.map((i) => i.message).join('; '));
    }

    const clientOrderId = uuidv4();
    const log = this.logger.child({ orderId: order.id, clientOrderId, symbol: order.symbol });
    log.info('Submitting order', { action: order.action, quantity: order.quantity });

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<typeof TIMED_OUT>((resolve) => {
      timer = setTimeout(() => resolve(TIMED_OUT), this.timeoutMs);
    });

    try {
      const outcome = await Promise.race([this.broker.submit(order, clientOrderId), timeout]);
      if (outcome === TIMED_OUT) {
        log.warn('Broker did not answer in time', { timeoutMs: this.timeoutMs });
        return this.reject(order, 'timeout', `no answer within ${this.timeoutMs}ms`);
      }

      const fill = BrokerFillSchema.safeParse(outcome);
      if (!fill.success) {
        return this.reject(order, 'broker_error', `malformed fill: ${fill.error.issues[0]?.message ?? 'unknown'}`);
      }

      log.info('Order filled', { price: fill.data.price, quantity: fill.data.quantity });
      return {
        status: 'filled',
        orderId: order.id,
        symbol: order.symbol,
        price: fill.data.price,
        quantity: fill.data.quantity,
        commission: fill.data.commission,
        timestamp: fill.data.timestamp,
      };
    } catch (error) {
      return this.reject(order, brokerReason(error), errorMessage(error));
    } finally {
      clearTimeout(timer);
    }
  }

  private reject(order: Order, reason: string, message: string): Rejected {
    return { status: 'rejected', orderId: order.id, symbol: order.symbol, reason, message };
  }
}

/**
 * Reason a broker attached to its error (`reason` or `code`), else broker_error
 */
function brokerReason(error: unknown): string {
  if (typeof error === 'object' && error !== null) {
    for (const key of ['reason', 'code']) {
      const value: unknown = Reflect.get(error, key);
      if (typeof value === 'string' && value.length > 0) return value;
    }
  }
  return 'broker_error';
}
