/**
 * Event Log
 *
 * Append-only record of the price path and of the ticks at which trades
 * executed. Insertion order is the timeline; nothing is ever removed or
 * reordered. Kept in memory only.
 */

import type { MarketTimeline, TradeMarker } from '@stocksim/shared';

export class EventLog {
  private readonly priceHistory: number[];
  private readonly buyEvents: TradeMarker[] = [];
  private readonly sellEvents: TradeMarker[] = [];

  constructor(initialPrice: number) {
    this.priceHistory = [initialPrice];
  }

  recordPrice(price: number): void {
    this.priceHistory.push(price);
  }

  /**
   * The caller passes the tick the trade executed at, normally currentIndex()
   */
  recordBuy(timeIndex: number, price: number): void {
    this.buyEvents.push({ timeIndex, price });
  }

  recordSell(timeIndex: number, price: number): void {
    this.sellEvents.push({ timeIndex, price });
  }

  /**
   * Index of the latest recorded price
   */
  currentIndex(): number {
    return this.priceHistory.length - 1;
  }

  getPriceHistory(): readonly number[] {
    return this.priceHistory;
  }

  getBuyEvents(): readonly TradeMarker[] {
    return this.buyEvents;
  }

  getSellEvents(): readonly TradeMarker[] {
    return this.sellEvents;
  }

  /**
   * Copy of all three sequences for a renderer
   */
  getSnapshot(): MarketTimeline {
    return {
      priceHistory: [...this.priceHistory],
      buyEvents: this.buyEvents.map((marker) => ({ ...marker })),
      sellEvents: this.sellEvents.map((marker) => ({ ...marker })),
    };
  }
}
