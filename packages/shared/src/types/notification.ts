/**
 * Trade lifecycle events pushed to notifiers
 */

import type { ExitReason, Position, Trade } from './trade.js';
import type { Rejected } from './execution.js';

export type TradeEvent =
  | { type: 'entry'; position: Position }
  | { type: 'exit'; trade: Trade; exitReason: ExitReason }
  | { type: 'rejected'; rejection: Rejected };

/**
 * Receives trade lifecycle events. Delivery is fire-and-forget: callers
 * never await a notifier on the decision path.
 */
export interface TradeNotifier {
  notify(event: TradeEvent): Promise<void>;
}
