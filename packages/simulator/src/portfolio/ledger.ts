/**
 * Ledger
 *
 * Holds the cash balance and share count and applies trades against them.
 * This component is responsible for:
 * - Validating trade requests (quantity, price, funds, holdings)
 * - Applying accepted trades in one step
 * - Emitting the updated snapshot for observers
 *
 * Rejected trades are returned as values and never touch state. Cash is
 * rounded to cents after every update, not only when read, so many small
 * trades can drift a cent or two away from the exact total.
 */

import { EventEmitter } from 'events';
import {
  QuantitySchema,
  UnitPriceSchema,
  createSilentLogger,
  roundCurrency,
  type ExecutedTrade,
  type Logger,
  type PortfolioSnapshot,
  type TradeError,
  type TradeErrorCode,
  type TradeResult,
  type TradeSide,
} from '@stocksim/shared';

// =============================================================================
// TYPES
// =============================================================================

/**
 * Ledger events
 */
export interface LedgerEvents {
  'portfolio:updated': (snapshot: PortfolioSnapshot, previous: PortfolioSnapshot) => void;
  'trade:executed': (trade: ExecutedTrade, snapshot: PortfolioSnapshot) => void;
  'trade:rejected': (side: TradeSide, error: TradeError) => void;
}

export interface LedgerOptions {
  initialCash?: number;
  initialShares?: number;
  logger?: Logger;
}

export const DEFAULT_INITIAL_CASH = 10000;

/**
 * Notices shown to the user for each rejection
 */
export const TRADE_ERROR_MESSAGES: Record<TradeErrorCode, string> = {
  INVALID_QUANTITY: 'Invalid quantity!',
  INVALID_PRICE: 'Invalid price!',
  INSUFFICIENT_FUNDS: 'Insufficient funds!',
  INSUFFICIENT_SHARES: 'Not enough shares!',
};

type Validated = { ok: true; quantity: number; price: number } | { ok: false; error: TradeError };

function tradeError(code: TradeErrorCode): TradeError {
  return { code, message: TRADE_ERROR_MESSAGES[code] };
}

// =============================================================================
// IMPLEMENTATION
// =============================================================================

export class Ledger extends EventEmitter {
  private cash: number;
  private shares: number;
  private readonly logger: Logger;

  constructor(options: LedgerOptions = {}) {
    super();

    const initialCash = options.initialCash ?? DEFAULT_INITIAL_CASH;
    const initialShares = options.initialShares ?? 0;

    if (!Number.isFinite(initialCash) || initialCash < 0) {
      throw new RangeError(`Initial cash must be >= 0, got ${initialCash}`);
    }
    if (!Number.isSafeInteger(initialShares) || initialShares < 0) {
      throw new RangeError(`Initial shares must be a whole number >= 0, got ${initialShares}`);
    }

    this.cash = roundCurrency(initialCash);
    this.shares = initialShares;
    this.logger = options.logger ?? createSilentLogger('ledger');
  }

  // ===========================================================================
  // TRADES
  // ===========================================================================

  /**
   * Buy `quantity` shares at `unitPrice` each
   *
   * `quantity` may be raw user input; anything other than a positive whole
   * number is rejected with INVALID_QUANTITY, and so is one that would take
   * the holding past Number.MAX_SAFE_INTEGER.
   */
  buy(quantity: unknown, unitPrice: number): TradeResult {
    const validated = this.validate(quantity, unitPrice);
    if (!validated.ok) {
      return this.reject('buy', validated.error);
    }

    if (validated.quantity > Number.MAX_SAFE_INTEGER - this.shares) {
      return this.reject('buy', tradeError('INVALID_QUANTITY'), {
        quantity: validated.quantity,
        shares: this.shares,
      });
    }

    const totalCost = validated.price * validated.quantity;
    if (totalCost > this.cash) {
      return this.reject('buy', tradeError('INSUFFICIENT_FUNDS'), { totalCost, cash: this.cash });
    }

    return this.apply({
      side: 'buy',
      quantity: validated.quantity,
      price: validated.price,
      amount: totalCost,
    });
  }

  /**
   * Sell `quantity` shares at `unitPrice` each
   */
  sell(quantity: unknown, unitPrice: number): TradeResult {
    const validated = this.validate(quantity, unitPrice);
    if (!validated.ok) {
      return this.reject('sell', validated.error);
    }

    if (validated.quantity > this.shares) {
      return this.reject('sell', tradeError('INSUFFICIENT_SHARES'), {
        quantity: validated.quantity,
        shares: this.shares,
      });
    }

    return this.apply({
      side: 'sell',
      quantity: validated.quantity,
      price: validated.price,
      amount: validated.price * validated.quantity,
    });
  }

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  getSnapshot(): PortfolioSnapshot {
    return { cash: this.cash, shares: this.shares };
  }

  getCash(): number {
    return this.cash;
  }

  getShares(): number {
    return this.shares;
  }

  /**
   * Mark-to-market value of cash plus holdings at `price`
   */
  getValue(price: number): number {
    return roundCurrency(this.cash + this.shares * price);
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private validate(quantity: unknown, unitPrice: number): Validated {
    const parsedQuantity = QuantitySchema.safeParse(quantity);
    if (!parsedQuantity.success) {
      return { ok: false, error: tradeError('INVALID_QUANTITY') };
    }

    const parsedPrice = UnitPriceSchema.safeParse(unitPrice);
    if (!parsedPrice.success) {
      return { ok: false, error: tradeError('INVALID_PRICE') };
    }

    return { ok: true, quantity: parsedQuantity.data, price: parsedPrice.data };
  }

  private apply(trade: ExecutedTrade): TradeResult {
    const previous = this.getSnapshot();

    // Both fields are computed before either is written
    const cash = roundCurrency(trade.side === 'buy' ? this.cash - trade.amount : this.cash + trade.amount);
    const shares = trade.side === 'buy' ? this.shares + trade.quantity : this.shares - trade.quantity;

    this.cash = cash;
    this.shares = shares;

    const snapshot = this.getSnapshot();
    this.logger.info(`${trade.side === 'buy' ? 'Bought' : 'Sold'} ${trade.quantity} @ ${trade.price}`, {
      ...trade,
      cash: snapshot.cash,
      shares: snapshot.shares,
    });

    this.emit('trade:executed', trade, snapshot);
    this.emit('portfolio:updated', snapshot, previous);

    return { ok: true, trade, snapshot };
  }

  private reject(side: TradeSide, error: TradeError, context: Record<string, number> = {}): TradeResult {
    this.logger.debug(`Rejected ${side}: ${error.message}`, { code: error.code, ...context });
    this.emit('trade:rejected', side, error);
    return { ok: false, error, snapshot: this.getSnapshot() };
  }

  // ===========================================================================
  // EVENTS (type-safe)
  // ===========================================================================

  override on<K extends keyof LedgerEvents>(event: K, listener: LedgerEvents[K]): this {
    return super.on(event, listener);
  }

  override off<K extends keyof LedgerEvents>(event: K, listener: LedgerEvents[K]): this {
    return super.off(event, listener);
  }

  override emit<K extends keyof LedgerEvents>(event: K, ...args: Parameters<LedgerEvents[K]>): boolean {
    return super.emit(event, ...args);
  }
}
