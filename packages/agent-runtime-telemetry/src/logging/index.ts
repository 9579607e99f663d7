/**
 * Logging Module
 */

export {
  ConsoleTransport,
  configureLogger,
  createLogger,
  createMemoryTransport,
  getLogger,
  Logger,
  MemoryTransport,
  resetLogger,
  type ConsoleTransportOptions,
  type ILogTransport,
  type LogContext,
  type LogEntry,
  type LoggerConfig,
  type LogLevel,
} from "./logger";
export { createPinoTransport, PinoTransport, type PinoTransportOptions } from "./pinoTransport";
