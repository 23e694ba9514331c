/**
 * Error taxonomy
 *
 * Conditions the core raises. `Rejected` orders and entries dropped for
 * capacity are results, not errors, and live in the execution and risk types.
 */

export enum TradingErrorCode {
  /** Indicator window underfilled; wait for more bars */
  INSUFFICIENT_DATA = 'INSUFFICIENT_DATA',
  /** Backtest has too few bars for a symbol */
  INSUFFICIENT_HISTORY = 'INSUFFICIENT_HISTORY',
  /** Duplicate, out-of-order or malformed bars */
  DATA_INTEGRITY = 'DATA_INTEGRITY',
  /** Configuration failed validation */
  CONFIG_INVALID = 'CONFIG_INVALID',
}

export class TradingError extends Error {
  readonly code: TradingErrorCode;
  readonly context?: Record<string, unknown>;
  readonly timestamp: number;

  constructor(code: TradingErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'TradingError';
    this.code = code;
    this.context = context;
    this.timestamp = Date.now();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp,
    };
  }
}

export class InsufficientDataError extends TradingError {
  readonly indicator: string;
  readonly required: number;
  readonly available: number;

  constructor(indicator: string, required: number, available: number) {
    super(
      TradingErrorCode.INSUFFICIENT_DATA,
      `${indicator} needs ${required} values, got ${available}`,
      { indicator, required, available }
    );
    this.name = 'InsufficientDataError';
    this.indicator = indicator;
    this.required = required;
    this.available = available;
  }
}

export class InsufficientHistoryError extends TradingError {
  readonly symbol: string;

  constructor(symbol: string, required: number, available: number) {
    super(
      TradingErrorCode.INSUFFICIENT_HISTORY,
      `${symbol}: backtest needs at least ${required} bars, got ${available}`,
      { symbol, required, available }
    );
    this.name = 'InsufficientHistoryError';
    this.symbol = symbol;
  }
}

export class DataIntegrityError extends TradingError {
  readonly symbol: string;
  /** Position of the offending bar in the series */
  readonly index: number;

  constructor(symbol: string, index: number, detail: string) {
    super(TradingErrorCode.DATA_INTEGRITY, `${symbol}: bar #${index} ${detail}`, {
      symbol,
      index,
    });
    this.name = 'DataIntegrityError';
    this.symbol = symbol;
    this.index = index;
  }
}

export class ConfigValidationError extends TradingError {
  readonly issues: string[];

  constructor(issues: string[], source?: string) {
    super(
      TradingErrorCode.CONFIG_INVALID,
      `Invalid configuration${source ? ` in ${source}` : ''}:\n  - ${issues.join('\n  - ')}`,
      { source, issues }
    );
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

/**
 * Narrow an unknown throwable to a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
