export {
  createLevelFilteredLogger,
  JsonLineLogger,
  LOG_LEVELS,
  noopLogger,
  PrettyLineLogger,
  type LogLevel,
  type StructuredLogEvent,
  type StructuredLogger,
} from './structured-logger.js';
