// Types
export type * from "./types/manifest.js";
export type * from "./types/state.js";
export type * from "./types/plan.js";
export type * from "./types/config.js";

// Values
export { configSchema, parseConfig } from "./types/config.js";
export { manifestDocumentSchema, TOP_LEVEL_PHASES } from "./types/manifest.js";
export { stateDocumentSchema, RESOURCE_KINDS } from "./types/state.js";

// Errors
export {
  LabfleetError,
  ValidationError,
  CycleError,
  cycleViolation,
  ApplyError,
  TransientApplyError,
  FatalApplyError,
  MissingCredentialError,
  HealthTimeoutError,
  StateError,
  ConfigError,
  errorMessage,
  rootCause,
} from "./errors.js";
export type { Violation } from "./errors.js";

// Utils
export { createLogger, setLogLevel, isLogLevel, formatMessage } from "./utils/logger.js";
export type { LogLevel, LogFields, Logger } from "./utils/logger.js";
export { retry, retryDelay, sleep, RetryAbortedError } from "./utils/retry.js";
export type { RetryOptions, Backoff } from "./utils/retry.js";
export { canonicalJson, fingerprint } from "./utils/fingerprint.js";
