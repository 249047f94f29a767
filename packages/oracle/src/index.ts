export {
  PriceOracle,
  type PriceOracleOptions,
  type CreatedOracle,
  type OracleState,
} from './price-oracle.js';
export { AdminCapability } from './admin-capability.js';
export { PriceLedger } from './price-ledger.js';
export { EventLog, type EventListener, type EventLogOptions } from './event-log.js';
