/**
 * Reversal Strategy
 *
 * Mean reversion at the Bollinger bands, gated by RSI:
 * - LONG: RSI < oversold AND close <= lower band
 * - SHORT: RSI > overbought AND close >= upper band
 *
 * Candlestick patterns, RSI divergence and a nearby support/resistance
 * level in the signal's direction raise its strength; they never open a
 * signal on their own.
 */

import type { IndicatorSnapshot, ReversalParams, Signal } from '@equity-pilot/shared';
import { BaseStrategy } from '../strategy/base-strategy.js';
import type { IndicatorRequest } from '../indicators/index.js';

export class ReversalStrategy extends BaseStrategy<ReversalParams> {
  readonly name = 'reversal' as const;

  indicators(): IndicatorRequest {
    return { reversal: this.params };
  }

  evaluate(history: readonly IndicatorSnapshot[]): Signal {
    const current = history[history.length - 1];

    if (!current) {
      throw new Error('ReversalStrategy.evaluate called with an empty history');
    }
    if (!current.reversal) {
      return this.flat(current, 'no reversal indicators');
    }

    const reversal = current.reversal;
    const { rsi, bbUpper, bbLower } = reversal;
    const { close } = current;

    if (rsi < this.params.rsiOversold && close <= bbLower) {
      const depth = bbLower > 0 ? ((bbLower - close) / bbLower) * 100 : 0;
      const confirmation = this.confirmation(
        reversal.bullishPatterns,
        reversal.rsiDivergence === 1,
        reversal.nearSupport,
        'bullish',
        'support'
      );
      return this.createSignal(
        current,
        'long',
        this.strength(this.params.rsiOversold - rsi, depth) + confirmation.bonus,
        [
          `RSI ${rsi.toFixed(2)} < ${this.params.rsiOversold}`,
          `close ${close} <= lower band ${bbLower.toFixed(2)}`,
          ...confirmation.reasons,
        ]
      );
    }

    if (rsi > this.params.rsiOverbought && close >= bbUpper) {
      const depth = bbUpper > 0 ? ((close - bbUpper) / bbUpper) * 100 : 0;
      const confirmation = this.confirmation(
        reversal.bearishPatterns,
        reversal.rsiDivergence === -1,
        reversal.nearResistance,
        'bearish',
        'resistance'
      );
      return this.createSignal(
        current,
        'short',
        this.strength(rsi - this.params.rsiOverbought, depth) + confirmation.bonus,
        [
          `RSI ${rsi.toFixed(2)} > ${this.params.rsiOverbought}`,
          `close ${close} >= upper band ${bbUpper.toFixed(2)}`,
          ...confirmation.reasons,
        ]
      );
    }

    return this.flat(current);
  }

  private confirmation(
    patterns: readonly string[],
    divergence: boolean,
    level: number | null,
    side: 'bullish' | 'bearish',
    levelName: 'support' | 'resistance'
  ): { bonus: number; reasons: string[] } {
    let bonus = 0;
    const reasons: string[] = [];
    if (patterns.length > 0) {
      bonus += 0.15;
      reasons.push(`${side} pattern: ${patterns.join(', ')}`);
    }
    if (divergence) {
      bonus += 0.2;
      reasons.push(`${side} RSI divergence`);
    }
    if (level !== null) {
      bonus += 0.1;
      reasons.push(`near ${levelName} ${level.toFixed(2)}`);
    }
    return { bonus, reasons };
  }

  /**
   * @param rsiDistance points beyond the threshold
   * @param bandDepth percent beyond the band
   */
  private strength(rsiDistance: number, bandDepth: number): number {
    let strength = 0.5;
    if (rsiDistance >= 10) strength += 0.2;
    else if (rsiDistance >= 5) strength += 0.1;
    if (bandDepth > 0.5) strength += 0.1;
    return strength;
  }
}
