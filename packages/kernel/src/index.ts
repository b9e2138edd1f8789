/**
 * Exposure Kernel
 * Errors, logging, configuration and constants shared by the SDK packages
 *
 * @packageDocumentation
 */

export type {
  JsonPrimitive,
  JsonValue,
  JsonArray,
  JsonObject,
  ErrorCategory,
  ErrorDefinition,
} from './types.js';

export { FAIRPLAY, HEADERS, CONTENT_TYPES, EXPOSURE } from './constants.js';

export {
  ERROR_CODES,
  ERRORS,
  getError,
  isErrorCode,
  ExposureSdkError,
  type ErrorCode,
} from './errors.js';

export { createLogger, logger, moduleLogger, REDACT_PATHS } from './logging.js';
export type { Logger, LoggerOptions } from './logging.js';

export { loadConfig, type SdkConfig } from './config.js';
