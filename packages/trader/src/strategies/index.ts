/**
 * Built-in strategies
 *
 * The set is closed: the combiner iterates it in configured order.
 */

import type { StrategyName, TradingConfig } from '@equity-pilot/shared';
import type { BaseStrategy } from '../strategy/base-strategy.js';
import { TrendStrategy } from './trend.strategy.js';
import { ReversalStrategy } from './reversal.strategy.js';

export { TrendStrategy } from './trend.strategy.js';
export { ReversalStrategy } from './reversal.strategy.js';

export type AnyStrategy = TrendStrategy | ReversalStrategy;

export function createStrategy(
  name: StrategyName,
  config: Pick<TradingConfig, 'trend' | 'reversal'>
): AnyStrategy {
  switch (name) {
    case 'trend':
      return new TrendStrategy(config.trend);
    case 'reversal':
      return new ReversalStrategy(config.reversal);
  }
}

/**
 * Active strategies, in configured order
 */
export function createStrategies(
  config: Pick<TradingConfig, 'activeStrategies' | 'trend' | 'reversal'>
): BaseStrategy[] {
  return config.activeStrategies.map((name) => createStrategy(name, config));
}
