/**
 * Retry Module
 *
 * Exports:
 * - Transport retry policy and defaults
 * - Backoff calculation and failure classification
 * - withTimeout / withTransportRetry wrappers
 */

export {
  // Types
  type FailureType,
  type BackoffStrategy,
  type TransportRetryPolicy,
  type RetryHooks,
  type RetryEvent,

  // Constants
  DEFAULT_BACKOFF,
  DEFAULT_TRANSPORT_RETRY_POLICY,

  // Functions
  calculateBackoff,
  classifyFailure,
  isRetryable,
  withTimeout,
  withTransportRetry,
} from './transport-retry';
