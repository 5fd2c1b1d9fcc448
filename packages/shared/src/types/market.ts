/**
 * Market types
 */

/**
 * GBM parameters
 */
export interface PriceProcessParameters {
  /** Annualized expected return (mu) */
  drift: number;
  /** Annualized standard deviation of returns (sigma) */
  volatility: number;
  /** Fraction of a year per tick (dt) */
  timeStep: number;
}

/**
 * Trade marker on the price timeline
 */
export interface TradeMarker {
  /** Index into the price history */
  timeIndex: number;
  price: number;
}

/**
 * Everything a chart needs to draw one frame
 */
export interface MarketTimeline {
  priceHistory: number[];
  buyEvents: TradeMarker[];
  sellEvents: TradeMarker[];
}
