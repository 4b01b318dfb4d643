/**
 * Azure DevOps Access — Logging Module Index
 */

export {
  type LogLevel,
  type LogEntry,
  type LogFormatter,
  type LogTransport,
  type Logger,
  type LoggingConfig,
  LOG_LEVELS,
  shouldLog,
  createDefaultFormatter,
  ConsoleTransport,
  MemoryTransport,
  SubsystemLogger,
  createLogger,
  createSilentLogger,
} from "./logger.js";
