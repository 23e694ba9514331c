/**
 * Signal combiner
 *
 * Resolves the votes of the active strategies for one symbol and bar into
 * one effective Signal:
 * - "any": first non-flat vote in configured order; a long and a short
 *   together resolve to flat
 * - "all": the common direction when every strategy agrees, else flat
 */

import type { Signal, StrategyMode } from '@equity-pilot/shared';

export const COMBINED_STRATEGY_NAME = 'combined';

function flatSignal(symbol: string, timestamp: number, reasons: string[]): Signal {
  return {
    strategyName: COMBINED_STRATEGY_NAME,
    symbol,
    direction: 'flat',
    timestamp,
    strength: 0,
    reasons,
  };
}

/**
 * @param votes one Signal per active strategy, in configured order
 */
export function combineSignals(
  votes: readonly Signal[],
  mode: StrategyMode,
  symbol: string,
  timestamp: number
): Signal {
  const first = votes[0];
  if (!first) {
    return flatSignal(symbol, timestamp, []);
  }

  if (mode === 'all') {
    const direction = first.direction;
    if (direction === 'flat' || votes.some((v) => v.direction !== direction)) {
      return flatSignal(symbol, timestamp, []);
    }
    return {
      strategyName: votes.map((v) => v.strategyName).join('+'),
      symbol,
      direction,
      timestamp,
      strength: Math.max(...votes.map((v) => v.strength)),
      reasons: votes.flatMap((v) => v.reasons),
    };
  }

  const active = votes.filter((v) => v.direction !== 'flat');
  const winner = active[0];
  if (!winner) {
    return flatSignal(symbol, timestamp, []);
  }

  const opposing = active.find((v) => v.direction !== winner.direction);
  if (opposing) {
    return flatSignal(symbol, timestamp, [
      `conflict: ${winner.strategyName} ${winner.direction}, ${opposing.strategyName} ${opposing.direction}`,
    ]);
  }

  return { ...winner, symbol, timestamp };
}
