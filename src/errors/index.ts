/**
 * Errors Module Index
 */

export {
  ErrorCode,
  ErrorCategory,
  getErrorCategory,
  getErrorMessage,
  isTransportError,
  isContractError,
} from './error-codes';

export {
  QualityGateError,
  InputValidationError,
  ConfigurationError,
  TransientCapabilityError,
  ContractViolationError,
  serializeError,
  type SerializedError,
} from './gate-error';
