/**
 * Error Codes for the Article Quality Gate
 *
 * E1xx: Configuration and Input Errors - fail before any capability runs
 * E2xx: Capability Transport Errors - recovered by bounded retry, then terminal
 * E3xx: Contract Violations - a capability returned a structurally invalid result
 * E4xx: LLM Provider Errors - raised by the model-backed capability adapters
 */

/**
 * Error Categories
 */
export enum ErrorCategory {
  CONFIGURATION = 'CONFIGURATION',
  TRANSPORT = 'TRANSPORT',
  CONTRACT = 'CONTRACT',
  PROVIDER = 'PROVIDER',
}

export enum ErrorCode {
  // E1xx: Configuration and Input Errors
  E101_CONFIG_FILE_UNREADABLE = 'E101',
  E102_CONFIG_SCHEMA_VALIDATION_FAILURE = 'E102',
  E103_INVALID_DOCUMENT = 'E103',
  E104_INVALID_GATE_OPTIONS = 'E104',

  // E2xx: Capability Transport Errors
  E201_CAPABILITY_UNAVAILABLE = 'E201',
  E202_CAPABILITY_TIMEOUT = 'E202',
  E203_CAPABILITY_RATE_LIMITED = 'E203',

  // E3xx: Contract Violations
  E301_REVISION_COUNTER_NOT_INCREMENTED = 'E301',
  E302_SUB_SCORE_OUT_OF_RANGE = 'E302',
  E303_MALFORMED_CAPABILITY_OUTPUT = 'E303',
  E304_INVALID_CLAIM_VERDICT = 'E304',
  E305_EMPTY_REVISION = 'E305',

  // E4xx: LLM Provider Errors
  E401_API_KEY_MISSING = 'E401',
  E402_PROVIDER_REQUEST_FAILED = 'E402',
}

const ERROR_MESSAGES: Record<string, string> = {
  // E1xx
  E101: 'Configuration file could not be read',
  E102: 'Configuration schema validation failed',
  E103: 'Invalid input document',
  E104: 'Invalid quality gate options',

  // E2xx
  E201: 'Capability unavailable after transport retries',
  E202: 'Capability call timed out',
  E203: 'Capability rate limited',

  // E3xx
  E301: 'Revision engine did not increment the revision number',
  E302: 'Critic sub-score outside the 0-10 range',
  E303: 'Capability returned a malformed result',
  E304: 'Verifier returned an invalid claim verdict',
  E305: 'Revision engine returned an empty document',

  // E4xx
  E401: 'LLM provider API key is not configured',
  E402: 'LLM provider request failed',
};

/**
 * Get the error category for an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const codeStr = code.toString();
  if (codeStr.startsWith('E1')) {
    return ErrorCategory.CONFIGURATION;
  }
  if (codeStr.startsWith('E2')) {
    return ErrorCategory.TRANSPORT;
  }
  if (codeStr.startsWith('E3')) {
    return ErrorCategory.CONTRACT;
  }
  if (codeStr.startsWith('E4')) {
    return ErrorCategory.PROVIDER;
  }
  throw new Error(`Unknown error code: ${code}`);
}

/**
 * Get the error message for an error code
 */
export function getErrorMessage(code: ErrorCode): string {
  return ERROR_MESSAGES[code.toString()] || `Unknown error: ${code}`;
}

export function isTransportError(code: ErrorCode): boolean {
  return getErrorCategory(code) === ErrorCategory.TRANSPORT;
}

export function isContractError(code: ErrorCode): boolean {
  return getErrorCategory(code) === ErrorCategory.CONTRACT;
}
