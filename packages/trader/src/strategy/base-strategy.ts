/**
 * Base Strategy Class
 *
 * Every trading strategy extends this class
 */

import type {
  IndicatorSnapshot,
  Signal,
  SignalDirection,
  StrategyName,
} from '@equity-pilot/shared';
import type { IndicatorRequest } from '../indicators/index.js';

/**
 * Base Strategy Class
 *
 * A strategy is a pure vote: it reads the snapshot history of one symbol
 * (oldest first, current bar last) and returns a Signal. It holds no state
 * between bars, so live and backtest runs see identical votes.
 *
 * @example
 * ```typescript
 * class MyStrategy extends BaseStrategy<MyParams> {
 *   readonly name = 'trend';
 *
 *   indicators(): IndicatorRequest {
 *     return { trend: this.params };
 *   }
 *
 *   evaluate(history: readonly IndicatorSnapshot[]): Signal {
 *     const current = history[history.length - 1];
 *     ...
 *     return this.createSignal(current, 'long', 0.7, ['EMA crossed up']);
 *   }
 * }
 * ```
 */
export abstract class BaseStrategy<TParams = unknown> {
  abstract readonly name: StrategyName;

  constructor(protected readonly params: TParams) {}

  getName(): StrategyName {
    return this.name;
  }

  getParams(): TParams {
    return this.params;
  }

  /**
   * Indicator groups the snapshot must carry for this strategy
   */
  abstract indicators(): IndicatorRequest;

  /**
   * Vote on the last snapshot of `history`
   */
  abstract evaluate(history: readonly IndicatorSnapshot[]): Signal;

  protected createSignal(
    snapshot: Pick<IndicatorSnapshot, 'symbol' | 'timestamp'>,
    direction: SignalDirection,
    strength: number,
    reasons: string[] = []
  ): Signal {
    return {
      strategyName: this.name,
      symbol: snapshot.symbol,
      direction,
      timestamp: snapshot.timestamp,
      strength: direction === 'flat' ? 0 : Math.min(1, Math.round(strength * 100) / 100),
      reasons,
    };
  }

  protected flat(snapshot: Pick<IndicatorSnapshot, 'symbol' | 'timestamp'>, reason?: string): Signal {
    return this.createSignal(snapshot, 'flat', 0, reason ? [reason] : []);
  }
}
