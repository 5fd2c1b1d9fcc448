/**
 * Portfolio types
 */

/**
 * Trade side
 */
export type TradeSide = 'buy' | 'sell';

/**
 * Cash/shares pair emitted after every ledger mutation
 */
export interface PortfolioSnapshot {
  /** Cash balance, always rounded to cents */
  cash: number;
  /** Whole shares held */
  shares: number;
}

/**
 * Durable record written to the state file
 *
 * Field names follow the on-disk layout.
 */
export interface PortfolioRecord {
  cash: number;
  shares: number;
  stock_price: number;
}

/**
 * Rejection codes for trade requests
 */
export type TradeErrorCode =
  | 'INVALID_QUANTITY'
  | 'INVALID_PRICE'
  | 'INSUFFICIENT_FUNDS'
  | 'INSUFFICIENT_SHARES';

/**
 * Why a trade was refused
 */
export interface TradeError {
  code: TradeErrorCode;
  /** Short notice suitable for a status line */
  message: string;
}

/**
 * A trade the ledger applied
 */
export interface ExecutedTrade {
  side: TradeSide;
  quantity: number;
  /** Execution price per share */
  price: number;
  /** price * quantity, before rounding the balance */
  amount: number;
}

/**
 * Outcome of Ledger.buy / Ledger.sell
 *
 * `snapshot` is the state after the call. On rejection it is the
 * unchanged state from before the call.
 */
export type TradeResult =
  | { ok: true; trade: ExecutedTrade; snapshot: PortfolioSnapshot }
  | { ok: false; error: TradeError; snapshot: PortfolioSnapshot };
