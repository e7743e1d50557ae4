// Types
export type * from "./types/plan.js";
export type * from "./types/config.js";

// Values
export { COMPARATORS } from "./types/plan.js";
export { configSchema, parseConfig, DEFAULT_DIALECT, SQL_DIALECTS } from "./types/config.js";
export { ok, err, unwrap } from "./result.js";
export type { Result } from "./result.js";

// Errors
export {
  KubeqlError,
  UnsupportedSyntaxError,
  MissingClauseError,
  TypeMismatchError,
  ArityError,
  SqlSyntaxError,
  ConfigError,
  ContextNotFoundError,
  ClusterRequestError,
} from "./errors.js";
export type { ErrorCode, RequiredClause, TranslationError } from "./errors.js";

// Utils
export {
  createLogger,
  setLogLevel,
  formatMessage,
} from "./utils/logger.js";
export type { LogLevel, Logger } from "./utils/logger.js";
export { retry } from "./utils/retry.js";
export type { RetryOptions } from "./utils/retry.js";
