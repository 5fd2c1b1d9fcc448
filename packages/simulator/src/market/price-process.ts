/**
 * Price Process
 *
 * Geometric Brownian Motion, one discrete step per call:
 *
 *   S(t+dt) = S(t) * exp((mu - sigma^2 / 2) * dt + sigma * Z * sqrt(dt))
 *
 * The multiplicative update keeps the price strictly positive.
 */

import { roundCurrency, type PriceProcessParameters } from '@stocksim/shared';
import { createStandardNormal, type NormalSource } from './normal-source.js';

export interface PriceProcessOptions extends Partial<PriceProcessParameters> {
  /** Standard normal source, Box-Muller over Math.random by default */
  normal?: NormalSource;
}

/**
 * Daily step against a 252 trading-day year
 */
export const DEFAULT_PRICE_PROCESS_PARAMETERS: Readonly<PriceProcessParameters> = Object.freeze({
  drift: 0.1,
  volatility: 0.2,
  timeStep: 1 / 252,
});

/**
 * Stateful GBM price generator
 *
 * @example
 * ```typescript
 * const process = new PriceProcess(100, { normal: createSeededNormal(42) });
 * const next = process.advance(); // e.g. 101.37
 * ```
 */
export class PriceProcess {
  private price: number;
  private readonly parameters: PriceProcessParameters;
  private readonly normal: NormalSource;
  private readonly driftTerm: number;
  private readonly volTerm: number;

  constructor(initialPrice: number, options: PriceProcessOptions = {}) {
    if (!Number.isFinite(initialPrice) || initialPrice <= 0) {
      throw new RangeError(`Initial price must be a positive number, got ${initialPrice}`);
    }

    const parameters: PriceProcessParameters = {
      drift: options.drift ?? DEFAULT_PRICE_PROCESS_PARAMETERS.drift,
      volatility: options.volatility ?? DEFAULT_PRICE_PROCESS_PARAMETERS.volatility,
      timeStep: options.timeStep ?? DEFAULT_PRICE_PROCESS_PARAMETERS.timeStep,
    };

    if (!Number.isFinite(parameters.drift)) {
      throw new RangeError(`Drift must be finite, got ${parameters.drift}`);
    }
    if (!Number.isFinite(parameters.volatility) || parameters.volatility < 0) {
      throw new RangeError(`Volatility must be >= 0, got ${parameters.volatility}`);
    }
    if (!Number.isFinite(parameters.timeStep) || parameters.timeStep <= 0) {
      throw new RangeError(`Time step must be > 0, got ${parameters.timeStep}`);
    }

    this.price = initialPrice;
    this.parameters = parameters;
    this.normal = options.normal ?? createStandardNormal();
    this.driftTerm = (parameters.drift - 0.5 * parameters.volatility ** 2) * parameters.timeStep;
    this.volTerm = parameters.volatility * Math.sqrt(parameters.timeStep);
  }

  /**
   * Apply one step and return the new price rounded to cents
   *
   * The internal level is kept unrounded.
   */
  advance(): number {
    const z = this.normal();
    this.price *= Math.exp(this.driftTerm + this.volTerm * z);
    return roundCurrency(this.price);
  }

  /**
   * Current unrounded level
   */
  getPrice(): number {
    return this.price;
  }

  getParameters(): PriceProcessParameters {
    return { ...this.parameters };
  }
}
