/**
 * Transport Retry
 *
 * Bounded retry with backoff for capability calls. This budget is separate
 * from the quality loop's iteration budget: a transient failure retried here
 * never consumes a REVISE iteration.
 */

import { ErrorCode } from '../errors/error-codes';
import {
  ContractViolationError,
  InputValidationError,
  QualityGateError,
  TransientCapabilityError,
} from '../errors/gate-error';
import { APIKeyMissingError, LLMAPIError } from '../llm/llm-client';

// ============================================================================
// Types
// ============================================================================

export type FailureType =
  | 'TIMEOUT'
  | 'RATE_LIMIT'
  | 'TRANSIENT_ERROR'
  | 'CONTRACT_VIOLATION'
  | 'FATAL';

export interface BackoffStrategy {
  type: 'exponential' | 'linear' | 'fixed';
  initial_delay_ms: number;
  max_delay_ms: number;
  multiplier: number;
  /** Relative jitter, 0-1 */
  jitter: number;
}

export interface TransportRetryPolicy {
  /** Total attempts including the first call */
  max_attempts: number;
  backoff: BackoffStrategy;
  /** Per-attempt timeout; 0 disables it */
  timeout_ms: number;
}

export interface RetryHooks {
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  onRetry?: (event: RetryEvent) => void;
}

export interface RetryEvent {
  capability: string;
  attempt: number;
  failure_type: FailureType;
  delay_ms: number;
  error: string;
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_BACKOFF: BackoffStrategy = {
  type: 'exponential',
  initial_delay_ms: 1000,
  max_delay_ms: 30000,
  multiplier: 2,
  jitter: 0.1,
};

export const DEFAULT_TRANSPORT_RETRY_POLICY: TransportRetryPolicy = {
  max_attempts: 3,
  backoff: DEFAULT_BACKOFF,
  timeout_ms: 60000,
};

const RETRYABLE_FAILURES: readonly FailureType[] = ['TIMEOUT', 'RATE_LIMIT', 'TRANSIENT_ERROR'];

// ============================================================================
// Functions
// ============================================================================

/**
 * Delay before retry number `attempt` (1-based)
 */
export function calculateBackoff(
  attempt: number,
  strategy: BackoffStrategy,
  random: () => number = Math.random
): number {
  let base: number;
  switch (strategy.type) {
    case 'exponential':
      base = strategy.initial_delay_ms * Math.pow(strategy.multiplier, attempt - 1);
      break;
    case 'linear':
      base = strategy.initial_delay_ms * attempt;
      break;
    case 'fixed':
      base = strategy.initial_delay_ms;
      break;
  }

  const capped = Math.min(base, strategy.max_delay_ms);
  if (strategy.jitter <= 0) {
    return capped;
  }

  const spread = capped * strategy.jitter * (2 * random() - 1);
  return Math.max(0, Math.round(capped + spread));
}

export function classifyFailure(error: unknown): FailureType {
  if (error instanceof ContractViolationError) {
    return 'CONTRACT_VIOLATION';
  }
  if (error instanceof InputValidationError || error instanceof APIKeyMissingError) {
    return 'FATAL';
  }
  if (error instanceof LLMAPIError) {
    if (error.statusCode === 429) {
      return 'RATE_LIMIT';
    }
    if (error.statusCode === 408) {
      return 'TIMEOUT';
    }
    if (error.statusCode >= 400 && error.statusCode < 500) {
      return 'FATAL';
    }
    return 'TRANSIENT_ERROR';
  }
  if (error instanceof QualityGateError) {
    switch (error.code) {
      case ErrorCode.E202_CAPABILITY_TIMEOUT:
        return 'TIMEOUT';
      case ErrorCode.E203_CAPABILITY_RATE_LIMITED:
        return 'RATE_LIMIT';
      default:
        return 'TRANSIENT_ERROR';
    }
  }
  return 'TRANSIENT_ERROR';
}

export function isRetryable(type: FailureType): boolean {
  return RETRYABLE_FAILURES.includes(type);
}

/**
 * Reject with an E202 error when `promise` does not settle within `ms`
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  if (!Number.isFinite(ms) || ms <= 0) {
    return promise;
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new QualityGateError(ErrorCode.E202_CAPABILITY_TIMEOUT, `${label} exceeded ${ms} ms`));
    }, ms);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function errorCodeFor(type: FailureType): ErrorCode {
  switch (type) {
    case 'TIMEOUT':
      return ErrorCode.E202_CAPABILITY_TIMEOUT;
    case 'RATE_LIMIT':
      return ErrorCode.E203_CAPABILITY_RATE_LIMITED;
    default:
      return ErrorCode.E201_CAPABILITY_UNAVAILABLE;
  }
}

/**
 * Run a capability call with per-attempt timeout and backoff.
 * Contract violations and fatal errors are rethrown unchanged on first sight.
 *
 * @throws TransientCapabilityError once the attempts are used up
 */
export async function withTransportRetry<T>(
  capability: string,
  operation: () => Promise<T>,
  policy: TransportRetryPolicy = DEFAULT_TRANSPORT_RETRY_POLICY,
  hooks: RetryHooks = {}
): Promise<T> {
  const sleep = hooks.sleep ?? defaultSleep;
  const maxAttempts = Math.max(1, policy.max_attempts);
  let lastError: unknown;
  let lastType: FailureType = 'TRANSIENT_ERROR';

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await withTimeout(operation(), policy.timeout_ms, capability);
    } catch (error) {
      const type = classifyFailure(error);
      if (!isRetryable(type)) {
        throw error;
      }

      lastError = error;
      lastType = type;
      if (attempt === maxAttempts) {
        break;
      }

      const delay = calculateBackoff(attempt, policy.backoff, hooks.random);
      hooks.onRetry?.({
        capability,
        attempt,
        failure_type: type,
        delay_ms: delay,
        error: error instanceof Error ? error.message : String(error),
      });
      await sleep(delay);
    }
  }

  throw new TransientCapabilityError(capability, maxAttempts, lastError, errorCodeFor(lastType));
}
