/**
 * Trend Strategy
 *
 * EMA crossover confirmed by MACD histogram and volume:
 * - LONG: EMA(short) crosses above EMA(long), histogram > 0,
 *   volume >= minVolumeFactor x volume MA
 * - SHORT: mirror image on a cross below
 *
 * A cross is a sign change of (EMA short - EMA long) between the previous
 * and the current bar: <= 0 then > 0 is up, >= 0 then < 0 is down.
 */

import type { IndicatorSnapshot, Signal, TrendParams } from '@equity-pilot/shared';
import { BaseStrategy } from '../strategy/base-strategy.js';
import type { IndicatorRequest } from '../indicators/index.js';

export class TrendStrategy extends BaseStrategy<TrendParams> {
  readonly name = 'trend' as const;

  indicators(): IndicatorRequest {
    return { trend: this.params };
  }

  evaluate(history: readonly IndicatorSnapshot[]): Signal {
    const current = history[history.length - 1];
    const previous = history[history.length - 2];

    if (!current) {
      throw new Error('TrendStrategy.evaluate called with an empty history');
    }
    if (!current.trend || !previous?.trend) {
      return this.flat(current, 'no previous bar');
    }

    const t = current.trend;
    const spread = t.emaShort - t.emaLong;
    const previousSpread = previous.trend.emaShort - previous.trend.emaLong;
    const volumeRatio = t.volumeMa > 0 ? current.volume / t.volumeMa : 0;
    const volumeOk = current.volume >= this.params.minVolumeFactor * t.volumeMa;

    const crossedUp = previousSpread <= 0 && spread > 0;
    const crossedDown = previousSpread >= 0 && spread < 0;

    if (crossedUp && t.macdHistogram > 0 && volumeOk) {
      return this.createSignal(current, 'long', this.strength(spread, t.emaLong, t.macdHistogram, volumeRatio), [
        `EMA ${this.params.emaShort} crossed above EMA ${this.params.emaLong}`,
        `MACD histogram ${t.macdHistogram.toFixed(4)} > 0`,
        `volume ${volumeRatio.toFixed(2)}x average`,
      ]);
    }

    if (crossedDown && t.macdHistogram < 0 && volumeOk) {
      return this.createSignal(current, 'short', this.strength(spread, t.emaLong, t.macdHistogram, volumeRatio), [
        `EMA ${this.params.emaShort} crossed below EMA ${this.params.emaLong}`,
        `MACD histogram ${t.macdHistogram.toFixed(4)} < 0`,
        `volume ${volumeRatio.toFixed(2)}x average`,
      ]);
    }

    return this.flat(current);
  }

  private strength(spread: number, emaLong: number, histogram: number, volumeRatio: number): number {
    let strength = 0.5;
    if (emaLong > 0 && (Math.abs(spread) / emaLong) * 100 > 0.5) strength += 0.1;
    if (Math.abs(histogram) > 0.2) strength += 0.1;
    if (volumeRatio > 2) strength += 0.2;
    else if (volumeRatio > 1.5) strength += 0.1;
    return strength;
  }
}
