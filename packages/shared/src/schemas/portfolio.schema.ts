import { z } from 'zod';
import type { PortfolioRecord } from '../types/portfolio.js';

/**
 * Record used on first run or when the state file cannot be read
 */
export const DEFAULT_PORTFOLIO_RECORD: Readonly<PortfolioRecord> = Object.freeze({
  cash: 10000,
  shares: 0,
  stock_price: 100,
});

/**
 * Zod schema for the persisted portfolio record
 *
 * Absent fields fall back to their defaults; present fields of the wrong
 * type fail the whole record.
 */
export const PortfolioRecordSchema = z.object({
  cash: z.number().finite().nonnegative().default(DEFAULT_PORTFOLIO_RECORD.cash),
  shares: z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER).default(DEFAULT_PORTFOLIO_RECORD.shares),
  stock_price: z.number().finite().positive().default(DEFAULT_PORTFOLIO_RECORD.stock_price),
});

/**
 * Trade quantity: a positive whole number, or text holding one
 */
export const QuantitySchema = z
  .union([
    z.number(),
    z
      .string()
      .trim()
      .regex(/^[+-]?\d+$/)
      .transform(Number),
  ])
  .pipe(z.number().int().positive().max(Number.MAX_SAFE_INTEGER));

/**
 * Execution price per share
 */
export const UnitPriceSchema = z.number().finite().positive();

/**
 * Types inferred from schemas
 */
export type PortfolioRecordSchemaType = z.infer<typeof PortfolioRecordSchema>;
export type QuantitySchemaType = z.infer<typeof QuantitySchema>;
