// Error classes
export {
  SynthError,
  ValidationError,
  ParseError,
  ConfigError,
  FetchError,
} from "./errors.js";

// Result type and utilities
export {
  ok,
  err,
  unwrap,
  unwrapOr,
  map,
  mapErr,
  andThen,
  all,
  tryCatch,
  tryCatchAsync,
} from "./result.js";
export type { Result } from "./result.js";

// Logger
export { logger, Logger } from "./logger.js";
export type { LogLevel } from "./logger.js";
