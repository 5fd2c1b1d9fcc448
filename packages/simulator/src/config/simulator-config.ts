/**
 * Simulator configuration from environment
 */

import { z } from 'zod';
import type { LogLevel } from '@stocksim/shared';
import { DEFAULT_PRICE_PROCESS_PARAMETERS } from '../market/price-process.js';
import { DEFAULT_STATE_FILE } from '../persistence/state-store.js';

export interface SimulatorConfig {
  stateFile: string;
  drift: number;
  volatility: number;
  timeStep: number;
  tickIntervalMs: number;
  /** Seed for a reproducible price path; Math.random when absent */
  seed?: number;
  logLevel: LogLevel;
  logToFile: boolean;
}

const numberFromEnv = z.coerce.number().finite();

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const EnvSchema = z.object({
  STOCKSIM_STATE_FILE: z.string().min(1).default(DEFAULT_STATE_FILE),
  STOCKSIM_DRIFT: numberFromEnv.default(DEFAULT_PRICE_PROCESS_PARAMETERS.drift),
  STOCKSIM_VOLATILITY: numberFromEnv.nonnegative().default(DEFAULT_PRICE_PROCESS_PARAMETERS.volatility),
  STOCKSIM_TIME_STEP: numberFromEnv.positive().default(DEFAULT_PRICE_PROCESS_PARAMETERS.timeStep),
  STOCKSIM_TICK_MS: z.coerce.number().int().positive().default(1000),
  STOCKSIM_SEED: z.coerce.number().int().optional(),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_TO_FILE: booleanFromEnv.default('true'),
});

/**
 * Load configuration from environment
 *
 * Empty variables count as unset. Throws naming every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SimulatorConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid simulator configuration:\n  ${problems.join('\n  ')}`);
  }

  const vars = parsed.data;
  return {
    stateFile: vars.STOCKSIM_STATE_FILE,
    drift: vars.STOCKSIM_DRIFT,
    volatility: vars.STOCKSIM_VOLATILITY,
    timeStep: vars.STOCKSIM_TIME_STEP,
    tickIntervalMs: vars.STOCKSIM_TICK_MS,
    seed: vars.STOCKSIM_SEED,
    logLevel: vars.LOG_LEVEL,
    logToFile: vars.LOG_TO_FILE,
  };
}
