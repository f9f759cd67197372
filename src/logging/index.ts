/**
 * Logging Module Index
 */

export {
  GateLogger,
  getGateLogger,
  resetGateLogger,
  type GateLogLevel,
  type GateLogCategory,
  type GateLogEntry,
  type GateLogSubscriber,
  type GateLoggerOptions,
  type GateLogFilter,
} from './gate-logger';
