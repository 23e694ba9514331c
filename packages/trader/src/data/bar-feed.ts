/**
 * Market data feeds
 *
 * A feed hands out a fresh, time-ordered pass over a symbol's bars each
 * time `bars()` is called. Live trading polls a `BarSource` instead.
 */

import { BarSchema, DataIntegrityError, type Bar } from '@equity-pilot/shared';

export interface BarFeed {
  /** Restartable: every call iterates from the first bar */
  bars(symbol: string): AsyncIterable<Bar>;
}

/**
 * Polled by the live trader; returns bars newer than `after` (all when null)
 */
export interface BarSource {
  latestBars(symbol: string, after: number | null): Promise<Bar[]>;
}

export interface ValidateBarsOptions {
  /** Largest allowed distance between consecutive bars, in seconds */
  maxGapSeconds?: number;
}

/**
 * Check shape, symbol and ordering of a bar series.
 * Throws DataIntegrityError on the first offending bar.
 */
export function validateBars(
  symbol: string,
  bars: readonly Bar[],
  options: ValidateBarsOptions = {}
): Bar[] {
  const out: Bar[] = [];
  let previous: Bar | undefined;

  bars.forEach((bar, index) => {
    const parsed = BarSchema.safeParse(bar);
    if (!parsed.success) {
      throw new DataIntegrityError(symbol, index, parsed.error.issues.map((i) => i.message).join('; '));
    }
    if (bar.symbol !== symbol) {
      throw new DataIntegrityError(symbol, index, `belongs to ${bar.symbol}`);
    }
    if (previous) {
      if (bar.timestamp === previous.timestamp) {
        throw new DataIntegrityError(symbol, index, `duplicates timestamp ${bar.timestamp}`);
      }
      if (bar.timestamp < previous.timestamp) {
        throw new DataIntegrityError(symbol, index, `timestamp ${bar.timestamp} is before ${previous.timestamp}`);
      }
      const gap = bar.timestamp - previous.timestamp;
      if (options.maxGapSeconds !== undefined && gap > options.maxGapSeconds) {
        throw new DataIntegrityError(symbol, index, `gap of ${gap}s exceeds ${options.maxGapSeconds}s`);
      }
    }
    out.push(bar);
    previous = bar;
  });

  return out;
}

/**
 * Drain a feed for one symbol
 */
export async function collectBars(feed: BarFeed, symbol: string): Promise<Bar[]> {
  const bars: Bar[] = [];
  for await (const bar of feed.bars(symbol)) {
    bars.push(bar);
  }
  return bars;
}

/**
 * Feed over bars held in memory. Also serves as a polled source.
 */
export class InMemoryBarFeed implements BarFeed, BarSource {
  private readonly series = new Map<string, Bar[]>();

  constructor(bars: Iterable<Bar> = []) {
    for (const bar of bars) {
      this.append(bar);
    }
  }

  append(bar: Bar): void {
    const list = this.series.get(bar.symbol) ?? [];
    list.push(bar);
    this.series.set(bar.symbol, list);
  }

  getSymbols(): string[] {
    return [...this.series.keys()];
  }

  async *bars(symbol: string): AsyncIterable<Bar> {
    yield* this.series.get(symbol) ?? [];
  }

  async latestBars(symbol: string, after: number | null): Promise<Bar[]> {
    const list = this.series.get(symbol) ?? [];
    return after === null ? [...list] : list.filter((b) => b.timestamp > after);
  }
}
