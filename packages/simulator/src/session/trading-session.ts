/**
 * Trading Session
 *
 * Wires the core together for one run of the simulator:
 * - PriceProcess: advanced on every tick
 * - Ledger: buys and sells at the latest emitted price
 * - EventLog: price path and trade markers
 * - StateStore: loaded once, saved after every trade and at shutdown
 *
 * Every public mutation is synchronous, so a timer tick and a trade issued
 * from an input handler cannot interleave on the event loop.
 */

import { EventEmitter } from 'events';
import {
  createSilentLogger,
  type ExecutedTrade,
  type Logger,
  type MarketTimeline,
  type PortfolioRecord,
  type PortfolioSnapshot,
  type PriceProcessParameters,
  type TradeError,
  type TradeResult,
  type TradeSide,
} from '@stocksim/shared';
import { PriceProcess } from '../market/price-process.js';
import type { NormalSource } from '../market/normal-source.js';
import { Ledger } from '../portfolio/ledger.js';
import { EventLog } from '../history/event-log.js';
import type { StateStore } from '../persistence/state-store.js';

/**
 * Session events
 */
export interface TradingSessionEvents {
  'price': (price: number, timeIndex: number) => void;
  'portfolio': (snapshot: PortfolioSnapshot) => void;
  'trade': (trade: ExecutedTrade, snapshot: PortfolioSnapshot, timeIndex: number) => void;
  'rejected': (side: TradeSide, error: TradeError) => void;
  'persistence:warning': (error: Error) => void;
}

export interface TradingSessionOptions extends Partial<PriceProcessParameters> {
  store: StateStore;
  /** Standard normal source for the price process */
  normal?: NormalSource;
  /** Tick cadence used by start() */
  tickIntervalMs?: number;
  logger?: Logger;
}

export const DEFAULT_TICK_INTERVAL_MS = 1000;

/**
 * Trading Session
 *
 * @example
 * ```typescript
 * const session = TradingSession.open({ store: new StateStore() });
 *
 * session.on('price', (price) => render(price));
 * session.on('rejected', (_side, error) => notify(error.message));
 *
 * session.start();
 * session.buy('10');
 * // ...
 * session.shutdown();
 * ```
 */
export class TradingSession extends EventEmitter {
  private readonly store: StateStore;
  private readonly priceProcess: PriceProcess;
  private readonly ledger: Ledger;
  private readonly eventLog: EventLog;
  private readonly logger: Logger;
  private readonly tickIntervalMs: number;
  private currentPrice: number;
  private lastFiniteLevel: number;
  private timer: NodeJS.Timeout | null = null;
  private closed = false;

  private constructor(record: PortfolioRecord, options: TradingSessionOptions) {
    super();

    this.store = options.store;
    this.logger = options.logger ?? createSilentLogger('session');
    this.tickIntervalMs = options.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS;

    if (!Number.isInteger(this.tickIntervalMs) || this.tickIntervalMs <= 0) {
      throw new RangeError(`Tick interval must be a positive whole number of ms, got ${this.tickIntervalMs}`);
    }

    this.currentPrice = record.stock_price;
    this.lastFiniteLevel = record.stock_price;
    this.priceProcess = new PriceProcess(record.stock_price, {
      drift: options.drift,
      volatility: options.volatility,
      timeStep: options.timeStep,
      normal: options.normal,
    });
    this.ledger = new Ledger({
      initialCash: record.cash,
      initialShares: record.shares,
      logger: this.logger.child({ component: 'ledger' }),
    });
    this.eventLog = new EventLog(record.stock_price);

    this.ledger.on('portfolio:updated', (snapshot) => this.emit('portfolio', snapshot));
  }

  /**
   * Load the saved portfolio and build a session around it
   */
  static open(options: TradingSessionOptions): TradingSession {
    const record = options.store.load();
    const session = new TradingSession(record, options);
    session.logger.info('Session opened', { ...record, file: options.store.getFilePath() });
    return session;
  }

  // ===========================================================================
  // MARKET
  // ===========================================================================

  /**
   * Advance the price by one step
   */
  tick(): number {
    this.assertOpen();

    const price = this.priceProcess.advance();
    this.currentPrice = price;
    this.eventLog.recordPrice(price);

    const level = this.priceProcess.getPrice();
    if (Number.isFinite(level) && level > 0) {
      this.lastFiniteLevel = level;
    }

    const timeIndex = this.eventLog.currentIndex();
    this.logger.debug('Tick', { timeIndex, price });
    this.emit('price', price, timeIndex);
    return price;
  }

  /**
   * Tick every `tickIntervalMs` until shutdown()
   */
  start(): void {
    this.assertOpen();
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => this.tick(), this.tickIntervalMs);
    this.logger.info('Price ticker started', { intervalMs: this.tickIntervalMs });
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  // ===========================================================================
  // TRADING
  // ===========================================================================

  buy(quantity: unknown): TradeResult {
    return this.trade('buy', quantity);
  }

  sell(quantity: unknown): TradeResult {
    return this.trade('sell', quantity);
  }

  private trade(side: TradeSide, quantity: unknown): TradeResult {
    this.assertOpen();

    const result =
      side === 'buy' ? this.ledger.buy(quantity, this.currentPrice) : this.ledger.sell(quantity, this.currentPrice);

    if (!result.ok) {
      this.emit('rejected', side, result.error);
      return result;
    }

    const timeIndex = this.eventLog.currentIndex();
    if (side === 'buy') {
      this.eventLog.recordBuy(timeIndex, result.trade.price);
    } else {
      this.eventLog.recordSell(timeIndex, result.trade.price);
    }

    this.emit('trade', result.trade, result.snapshot, timeIndex);
    this.persist();
    return result;
  }

  // ===========================================================================
  // LIFECYCLE
  // ===========================================================================

  /**
   * Stop ticking and write the final state
   *
   * Safe to call more than once; only the first call saves.
   */
  shutdown(): void {
    if (this.closed) {
      return;
    }

    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }

    this.persist();
    this.closed = true;
    this.logger.info('Session closed', { ...this.toRecord(), ticks: this.eventLog.currentIndex() });
  }

  private persist(): void {
    const result = this.store.save(this.toRecord());
    if (!result.ok) {
      this.emit('persistence:warning', result.error);
    }
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error('Trading session is closed');
    }
  }

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  getCurrentPrice(): number {
    return this.currentPrice;
  }

  getSnapshot(): PortfolioSnapshot {
    return this.ledger.getSnapshot();
  }

  /**
   * Cash plus holdings at the current price
   */
  getValue(): number {
    return this.ledger.getValue(this.currentPrice);
  }

  getTimeline(): MarketTimeline {
    return this.eventLog.getSnapshot();
  }

  getParameters(): PriceProcessParameters {
    return this.priceProcess.getParameters();
  }

  /**
   * Record as it would be written now
   *
   * A price that rounds to zero is stored unrounded so the next run can
   * still start from it. A price that has overflowed or underflowed is
   * replaced by the last level that was finite and positive.
   */
  toRecord(): PortfolioRecord {
    const { cash, shares } = this.ledger.getSnapshot();
    const usable = Number.isFinite(this.currentPrice) && this.currentPrice > 0;
    return { cash, shares, stock_price: usable ? this.currentPrice : this.lastFiniteLevel };
  }

  // ===========================================================================
  // EVENTS (type-safe)
  // ===========================================================================

  override on<K extends keyof TradingSessionEvents>(event: K, listener: TradingSessionEvents[K]): this {
    return super.on(event, listener);
  }

  override off<K extends keyof TradingSessionEvents>(event: K, listener: TradingSessionEvents[K]): this {
    return super.off(event, listener);
  }

  override emit<K extends keyof TradingSessionEvents>(
    event: K,
    ...args: Parameters<TradingSessionEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }
}
