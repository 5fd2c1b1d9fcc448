/**
 * @stocksim/simulator - Price process, portfolio ledger and session wiring
 */

// Market
export {
  PriceProcess,
  DEFAULT_PRICE_PROCESS_PARAMETERS,
  type PriceProcessOptions,
} from './market/price-process.js';
export {
  createStandardNormal,
  createSeededUniform,
  createSeededNormal,
  zeroNormal,
  type NormalSource,
  type UniformSource,
} from './market/normal-source.js';

// Portfolio
export {
  Ledger,
  DEFAULT_INITIAL_CASH,
  TRADE_ERROR_MESSAGES,
  type LedgerEvents,
  type LedgerOptions,
} from './portfolio/ledger.js';

// History
export { EventLog } from './history/event-log.js';

// Persistence
export {
  StateStore,
  DEFAULT_STATE_FILE,
  type StateStoreOptions,
  type SaveResult,
} from './persistence/state-store.js';

// Session
export {
  TradingSession,
  DEFAULT_TICK_INTERVAL_MS,
  type TradingSessionEvents,
  type TradingSessionOptions,
} from './session/trading-session.js';

// Config
export { loadConfig, type SimulatorConfig } from './config/simulator-config.js';
