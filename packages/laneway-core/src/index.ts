/**
 * Laneway Core - shared exports
 *
 * Logging, typed errors and retry helpers used by the gateway package.
 */

export {
  DebugLogger,
  setLogLevel,
  getLogLevel,
  isLogLevel,
  silentLogger,
  type Logger,
  type LogLevel,
} from './debug-logger.js';

export {
  LanewayError,
  NotFoundError,
  ValidationError,
  ConfigurationError,
  NoAgentConfiguredError,
  SessionStoreError,
  RunCancelledError,
  QueueClosedError,
  DeliveryError,
  ErrorCodes,
  wrapError,
  isLanewayError,
  errorMessage,
  type ErrorCode,
  type ErrorDetails,
  type ErrorJSON,
  type ErrorResponse,
} from './errors.js';

export {
  withRetry,
  retrySync,
  backoffDelay,
  RetryExhaustedError,
  type RetryOptions,
} from './retry.js';
