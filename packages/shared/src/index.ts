/**
 * Shared components for position-audit packages
 */

// Logging
export {
  type LogEntry,
  type LoggerConfig,
  LogLevel,
  type LogMetadata,
  Logger,
  type PerformanceTimer,
} from './logger/Logger';

// Errors
export { AuditError, ErrorCode, getUserFriendlyMessage, isAuditError } from './errors/AuditError';

// Statistics
export {
  type MaybeNumber,
  mean,
  median,
  mode,
  sampleStdDev,
  zScores,
} from './utils/math/Statistics';
