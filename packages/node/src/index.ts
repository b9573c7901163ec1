/**
 * @tally/node: HTTP service exposing the reconciliation engine.
 */

export { ReconciliationService } from "./services/reconciliation-service.js";
export type {
  ReconciliationServiceConfig,
  RunLogEntry,
} from "./services/reconciliation-service.js";
export {
  loadConfig,
  toEngineConfig,
  parseCurrencyDecimals,
  parseBusinessHours,
  parseWeekendDays,
  ConfigSchema,
} from "./config.js";
export type { AppConfig, ParsedBusinessHours } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./types/index.js";
