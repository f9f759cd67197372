/**
 * Quality Gate Errors
 *
 * Exhausting the iteration budget is a normal terminal outcome and has no
 * error class here.
 */

import { ErrorCode, ErrorCategory, getErrorCategory, getErrorMessage } from './error-codes';

/**
 * Base error class for the quality gate
 */
export class QualityGateError extends Error {
  public readonly code: ErrorCode;
  public readonly category: ErrorCategory;
  public readonly context?: string;

  constructor(code: ErrorCode, context?: string) {
    const baseMessage = getErrorMessage(code);
    const fullMessage = context
      ? `[${code}] ${baseMessage}: ${context}`
      : `[${code}] ${baseMessage}`;

    super(fullMessage);
    this.name = 'QualityGateError';
    this.code = code;
    this.category = getErrorCategory(code);
    this.context = context;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Empty or malformed input, raised at the boundary before any capability runs
 */
export class InputValidationError extends QualityGateError {
  public readonly field?: string;

  constructor(context: string, field?: string, code: ErrorCode = ErrorCode.E103_INVALID_DOCUMENT) {
    super(code, context);
    this.name = 'InputValidationError';
    this.field = field;
  }
}

export class ConfigurationError extends QualityGateError {
  public readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, context?: string, details?: Record<string, unknown>) {
    super(code, context);
    this.name = 'ConfigurationError';
    this.details = details;
  }
}

/**
 * A capability kept failing at the transport level after the retry budget
 */
export class TransientCapabilityError extends QualityGateError {
  public readonly capability: string;
  public readonly attempts: number;
  public readonly lastError?: unknown;

  constructor(
    capability: string,
    attempts: number,
    lastError?: unknown,
    code: ErrorCode = ErrorCode.E201_CAPABILITY_UNAVAILABLE
  ) {
    const causeMessage = lastError instanceof Error
      ? lastError.message
      : lastError === undefined ? 'unknown' : String(lastError);
    super(code, `${capability} failed after ${attempts} attempt(s): ${causeMessage}`);
    this.name = 'TransientCapabilityError';
    this.capability = capability;
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/**
 * A capability returned a structurally invalid result. Never retried.
 */
export class ContractViolationError extends QualityGateError {
  public readonly capability: string;

  constructor(code: ErrorCode, capability: string, context: string) {
    super(code, `${capability}: ${context}`);
    this.name = 'ContractViolationError';
    this.capability = capability;
  }
}

/**
 * Plain `{ code, message }` view used in LoopResult and API responses
 */
export interface SerializedError {
  code: string;
  message: string;
}

export function serializeError(error: unknown): SerializedError {
  if (error instanceof QualityGateError) {
    return { code: error.code, message: error.message };
  }
  if (error instanceof Error) {
    return { code: 'UNKNOWN', message: error.message };
  }
  return { code: 'UNKNOWN', message: String(error) };
}
