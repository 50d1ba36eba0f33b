/**
 * Laneway Error Classes - Typed Error Handling
 *
 * Error payloads follow a common response format:
 * {error: {code: 'ERROR_CODE', message: '...', details: {}}}
 *
 * @module errors
 */

export interface ErrorDetails {
  [key: string]: unknown;
}

export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details: ErrorDetails;
  };
}

export interface ErrorJSON {
  name: string;
  code: string;
  message: string;
  details: ErrorDetails;
  timestamp: string;
  stack?: string;
}

/**
 * Error codes enum for reference
 */
export const ErrorCodes = {
  // Resource errors
  NOT_FOUND: 'NOT_FOUND',
  SESSION_NOT_FOUND: 'SESSION_NOT_FOUND',

  // Validation errors
  INVALID_INPUT: 'INVALID_INPUT',
  CONFIG_ERROR: 'CONFIG_ERROR',

  // Routing
  NO_AGENT_CONFIGURED: 'NO_AGENT_CONFIGURED',

  // Storage
  SESSION_STORE_ERROR: 'SESSION_STORE_ERROR',

  // Execution
  RUN_CANCELLED: 'RUN_CANCELLED',
  QUEUE_CLOSED: 'QUEUE_CLOSED',
  DELIVERY_FAILED: 'DELIVERY_FAILED',

  // Fallback
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base error class for all Laneway errors
 */
export class LanewayError extends Error {
  code: string;
  details: ErrorDetails;
  timestamp: string;

  constructor(message: string, code: string = ErrorCodes.INTERNAL_ERROR, details: ErrorDetails = {}) {
    super(message);
    this.name = 'LanewayError';
    this.code = code;
    this.details = details;
    this.timestamp = new Date().toISOString();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toResponse(): ErrorResponse {
    return {
      error: {
        code: this.code,
        message: this.message,
        details: this.details,
      },
    };
  }

  /**
   * Convert to JSON for logging
   */
  toJSON(): ErrorJSON {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

export class NotFoundError extends LanewayError {
  constructor(resourceType: string, identifier: string, details: ErrorDetails = {}) {
    super(`${resourceType} not found: ${identifier}`, `${resourceType.toUpperCase()}_NOT_FOUND`, {
      resourceType,
      identifier,
      ...details,
    });
    this.name = 'NotFoundError';
  }
}

/**
 * Error thrown when input validation fails
 */
export class ValidationError extends LanewayError {
  field: string;

  constructor(field: string, message: string, received?: unknown, details: ErrorDetails = {}) {
    super(`Validation failed for '${field}': ${message}`, ErrorCodes.INVALID_INPUT, {
      field,
      received: received !== undefined ? String(received).substring(0, 100) : undefined,
      ...details,
    });
    this.name = 'ValidationError';
    this.field = field;
  }
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends LanewayError {
  configKey: string;

  constructor(configKey: string, message: string, details: ErrorDetails = {}) {
    super(`Configuration error for '${configKey}': ${message}`, ErrorCodes.CONFIG_ERROR, {
      configKey,
      ...details,
    });
    this.name = 'ConfigurationError';
    this.configKey = configKey;
  }
}

/**
 * Routing found no agent at all. Fatal for the message, never retried.
 */
export class NoAgentConfiguredError extends LanewayError {
  constructor(details: ErrorDetails = {}) {
    super('No agent configured: cannot route inbound message', ErrorCodes.NO_AGENT_CONFIGURED, details);
    this.name = 'NoAgentConfiguredError';
  }
}

/**
 * Session storage failed after the local retry budget was spent
 */
export class SessionStoreError extends LanewayError {
  operation: string;
  attempts: number;

  constructor(operation: string, message: string, attempts: number, details: ErrorDetails = {}) {
    super(
      `Session store ${operation} failed after ${attempts} attempt(s): ${message}`,
      ErrorCodes.SESSION_STORE_ERROR,
      { operation, attempts, ...details }
    );
    this.name = 'SessionStoreError';
    this.operation = operation;
    this.attempts = attempts;
  }
}

/**
 * Abort reason raised on a run's signal when a newer message interrupts it
 */
export class RunCancelledError extends LanewayError {
  laneKey: string;

  constructor(laneKey: string, reason = 'interrupted', details: ErrorDetails = {}) {
    super(`Run cancelled on ${laneKey}: ${reason}`, ErrorCodes.RUN_CANCELLED, {
      laneKey,
      reason,
      ...details,
    });
    this.name = 'RunCancelledError';
    this.laneKey = laneKey;
  }
}

export class QueueClosedError extends LanewayError {
  constructor(laneKey: string) {
    super(`Queue is shutting down, rejected work for ${laneKey}`, ErrorCodes.QUEUE_CLOSED, {
      laneKey,
    });
    this.name = 'QueueClosedError';
  }
}

/**
 * Outbound delivery through a channel adapter failed after retries
 */
export class DeliveryError extends LanewayError {
  provider: string;

  constructor(provider: string, message: string, details: ErrorDetails = {}) {
    super(`Delivery via ${provider} failed: ${message}`, ErrorCodes.DELIVERY_FAILED, {
      provider,
      ...details,
    });
    this.name = 'DeliveryError';
    this.provider = provider;
  }
}

/**
 * Helper function to wrap unknown errors
 */
export function wrapError(error: unknown, context = 'Unknown operation'): LanewayError {
  if (error instanceof LanewayError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new LanewayError(`${context}: ${message}`, ErrorCodes.INTERNAL_ERROR, {
    originalError: message,
    originalStack: stack,
  });
}

export function isLanewayError(error: unknown): error is LanewayError {
  return error instanceof LanewayError;
}

/**
 * Extract a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
