export * from "./types.js";
export {
  validateObservationData,
  validateAreaRecordData,
  validateConnectionsRecordData,
  validateEngineConfigData,
  validateJournalEventData,
  isObservation,
  isAgentSnapshot,
  isAreaRecord,
  isConnectionsRecord,
  isJournalEvent,
  isEngineConfigInput,
} from "./validator.js";
export type { ValidationResult } from "./validator.js";
export { EngineConfigSchema } from "./config.schema.js";
export { ConsoleLogger, createLogger, parseLogLevel, silentLogger } from "./logger.js";
export { systemClock, ManualClock, TimeoutError, withTimeout } from "./timing.js";
export type { Clock } from "./timing.js";
