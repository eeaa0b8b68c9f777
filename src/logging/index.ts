export {
  LOG_LEVELS,
  shouldLog,
  isLogLevel,
  createDefaultFormatter,
  ConsoleTransport,
  FileTransport,
  MemoryTransport,
  SubsystemLogger,
  createLogger,
  createMemoryLogger,
} from "./logger.js";
export type { LogLevel, LogEntry, LogFormatter, LogTransport, Logger, LoggingOptions } from "./logger.js";
