/**
 * Trading types
 */

/**
 * Directional vote of a strategy
 */
export type SignalDirection = 'long' | 'short' | 'flat';

/**
 * Direction of an open position
 */
export type PositionSide = Exclude<SignalDirection, 'flat'>;

/**
 * Strategy output for one symbol and bar
 */
export interface Signal {
  /** Strategy that produced the vote ("trend", "reversal" or "combined") */
  readonly strategyName: string;
  readonly symbol: string;
  readonly direction: SignalDirection;
  /** Bar timestamp (Unix seconds) */
  readonly timestamp: number;
  /** Signal strength, 0-1. Zero for flat votes */
  readonly strength: number;
  /** Human-readable conditions that fired */
  readonly reasons: readonly string[];
}

/**
 * Why a position was closed
 */
export type ExitReason =
  | 'stop_loss'
  | 'trailing_stop'
  | 'take_profit'
  | 'max_holding_days'
  | 'signal'
  | 'end_of_data';

/**
 * Open position, owned by the risk manager
 */
export interface Position {
  symbol: string;
  side: PositionSide;
  entryPrice: number;
  /** Entry bar timestamp (Unix seconds) */
  entryTime: number;
  /** Whole shares held */
  quantity: number;
  /** Notional at entry as a fraction of equity */
  size: number;
  stopLossPrice: number;
  trailingStopPrice: number;
  takeProfitPrice: number;
  /** Unix seconds after which the position is force-closed */
  maxExitTime: number;
  /** Most favorable close seen since entry */
  bestPrice: number;
  /** Commission paid on the entry fill */
  entryCommission: number;
  /** Strategy that opened the position */
  strategyName: string;
}

/**
 * Closed position record
 */
export interface Trade {
  readonly id: string;
  readonly symbol: string;
  readonly side: PositionSide;
  readonly quantity: number;
  readonly entryTime: number;
  readonly entryPrice: number;
  readonly exitTime: number;
  readonly exitPrice: number;
  readonly exitReason: ExitReason;
  /** Profit/loss net of entry and exit commission */
  readonly pnl: number;
  /** pnl relative to the entry notional, in percent */
  readonly pnlPct: number;
  readonly commissionPaid: number;
  readonly strategyName: string;
}

/**
 * Equity curve sample, one per processed bar
 */
export interface EquityPoint {
  readonly timestamp: number;
  /** Realized equity: free cash plus cost basis of open positions */
  readonly capital: number;
  /** Mark-to-market gain/loss of open positions at the bar close */
  readonly unrealizedPnl: number;
}
