/**
 * Execution Adapter
 *
 * One contract, two venues: the simulated fill model used by backtests
 * and the live adapter in front of a broker. The run mode picks the
 * adapter once; nothing downstream branches on it.
 */

import type { ExecutionResult, Order } from '@equity-pilot/shared';

export type ExecutionMode = 'simulated' | 'live';

export interface ExecutionAdapter {
  readonly mode: ExecutionMode;
  /**
   * Never rejects: venue failures come back as a `Rejected` result
   */
  submit(order: Order): Promise<ExecutionResult>;
}
