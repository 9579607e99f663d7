/**
 * Structured Logging
 *
 * JSON or pretty-printed log lines with levels, context propagation and
 * pluggable transports.
 */

import { PinoTransport } from "./pinoTransport";

// ============================================================================
// Types
// ============================================================================

/** Log levels */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/** Log level priority (lower = more verbose) */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
};

function writeLine(output: string, stream: "stdout" | "stderr"): void {
  const target = stream === "stderr" ? process.stderr : process.stdout;
  target.write(`${output}\n`);
}

/** Structured log entry */
export interface LogEntry {
  level: LogLevel;
  message: string;

  /** ISO-8601 timestamp */
  timestamp: string;

  /** Unix timestamp in ms */
  timestampMs: number;

  /** Logger name/category */
  logger: string;

  correlationId?: string;
  sessionId?: string;
  toolName?: string;
  requestId?: string;

  /** Additional structured data */
  data?: Record<string, unknown>;

  error?: {
    name: string;
    message: string;
    stack?: string;
  };

  /** Duration in ms (for timing logs) */
  durationMs?: number;
}

/** Log context carried by child loggers */
export interface LogContext {
  correlationId?: string;
  sessionId?: string;
  toolName?: string;
  requestId?: string;
}

/** Log transport interface */
export interface ILogTransport {
  name: string;
  write(entry: LogEntry): void;
  flush?(): Promise<void>;
}

/** Logger configuration */
export interface LoggerConfig {
  name: string;

  /** Minimum log level */
  level?: LogLevel;

  transports?: ILogTransport[];

  /** Default context */
  context?: LogContext;
}

// ============================================================================
// Console Transport
// ============================================================================

export interface ConsoleTransportOptions {
  colors?: boolean;

  /** Human-readable lines instead of JSON */
  pretty?: boolean;

  showTimestamp?: boolean;
}

/**
 * Console transport that outputs to stdout/stderr.
 */
export class ConsoleTransport implements ILogTransport {
  readonly name = "console";
  private readonly options: Required<ConsoleTransportOptions>;

  private readonly LEVEL_COLORS: Record<LogLevel, string> = {
    trace: "\x1b[90m",
    debug: "\x1b[36m",
    info: "\x1b[32m",
    warn: "\x1b[33m",
    error: "\x1b[31m",
    fatal: "\x1b[35m",
  };

  private readonly RESET = "\x1b[0m";

  constructor(options: ConsoleTransportOptions = {}) {
    this.options = {
      colors: options.colors ?? true,
      pretty: options.pretty ?? false,
      showTimestamp: options.showTimestamp ?? true,
    };
  }

  write(entry: LogEntry): void {
    const output = this.options.pretty ? this.formatPretty(entry) : JSON.stringify(entry);
    const stream = entry.level === "error" || entry.level === "fatal" ? "stderr" : "stdout";
    writeLine(output, stream);
  }

  private formatPretty(entry: LogEntry): string {
    const parts: string[] = [];

    if (this.options.showTimestamp) {
      parts.push(`[${entry.timestamp}]`);
    }

    const level = entry.level.toUpperCase().padEnd(5);
    parts.push(this.options.colors ? `${this.LEVEL_COLORS[entry.level]}${level}${this.RESET}` : level);
    parts.push(`[${entry.logger}]`);

    if (entry.correlationId) {
      parts.push(`[${entry.correlationId}]`);
    }
    if (entry.sessionId) {
      parts.push(`[session:${entry.sessionId}]`);
    }
    if (entry.toolName) {
      parts.push(`[tool:${entry.toolName}]`);
    }
    if (entry.requestId) {
      parts.push(`[request:${entry.requestId}]`);
    }

    parts.push(entry.message);

    if (entry.durationMs !== undefined) {
      parts.push(`(${entry.durationMs}ms)`);
    }

    if (entry.data && Object.keys(entry.data).length > 0) {
      parts.push(JSON.stringify(entry.data));
    }

    if (entry.error) {
      parts.push(`\n  Error: ${entry.error.name}: ${entry.error.message}`);
      if (entry.error.stack) {
        parts.push(`\n${entry.error.stack}`);
      }
    }

    return parts.join(" ");
  }
}

// ============================================================================
// Memory Transport (for testing)
// ============================================================================

/**
 * In-memory transport that stores logs for testing.
 */
export class MemoryTransport implements ILogTransport {
  readonly name = "memory";
  private readonly entries: LogEntry[] = [];
  private readonly maxEntries: number;

  constructor(maxEntries = 1000) {
    this.maxEntries = maxEntries;
  }

  write(entry: LogEntry): void {
    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries.shift();
    }
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  getEntriesByLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter((e) => e.level === level);
  }

  find(predicate: (entry: LogEntry) => boolean): LogEntry[] {
    return this.entries.filter(predicate);
  }

  clear(): void {
    this.entries.length = 0;
  }

  get size(): number {
    return this.entries.length;
  }
}

// ============================================================================
// Logger Implementation
// ============================================================================

interface LogExtras {
  error?: LogEntry["error"];
  durationMs?: number;
}

/**
 * Structured logger with context propagation.
 */
export class Logger {
  private readonly name: string;
  private readonly level: LogLevel;
  private readonly transports: ILogTransport[];
  private readonly context: LogContext;

  constructor(config: LoggerConfig) {
    this.name = config.name;
    this.level = config.level ?? "info";
    this.transports = config.transports ?? [new ConsoleTransport({ pretty: true })];
    this.context = config.context ?? {};
  }

  trace(message: string, data?: Record<string, unknown>): void {
    this.log("trace", message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log("error", message, data, { error: extractError(error) });
  }

  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log("fatal", message, data, { error: extractError(error) });
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.level];
  }

  /**
   * Create a timer that logs when stopped.
   */
  startTimer(
    message: string,
    level: LogLevel = "debug"
  ): { stop: (data?: Record<string, unknown>) => void } {
    const start = Date.now();

    return {
      stop: (data?: Record<string, unknown>) => {
        this.log(level, message, data, { durationMs: Date.now() - start });
      },
    };
  }

  /**
   * Create a child logger with additional context.
   */
  child(context: LogContext): Logger {
    return new Logger({
      name: this.name,
      level: this.level,
      transports: this.transports,
      context: { ...this.context, ...context },
    });
  }

  /**
   * Create a logger with a different name sharing this logger's transports.
   */
  named(name: string): Logger {
    return new Logger({
      name,
      level: this.level,
      transports: this.transports,
      context: this.context,
    });
  }

  forSession(sessionId: string): Logger {
    return this.child({ sessionId });
  }

  forTool(toolName: string): Logger {
    return this.child({ toolName });
  }

  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    extras: LogExtras = {}
  ): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const now = new Date();
    const entry: LogEntry = {
      level,
      message,
      timestamp: now.toISOString(),
      timestampMs: now.getTime(),
      logger: this.name,
      correlationId: this.context.correlationId,
      sessionId: this.context.sessionId,
      toolName: this.context.toolName,
      requestId: this.context.requestId,
      data: data && Object.keys(data).length > 0 ? data : undefined,
      error: extras.error,
      durationMs: extras.durationMs,
    };

    for (const transport of this.transports) {
      try {
        transport.write(entry);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        writeLine(`[${this.name}] log transport "${transport.name}" failed: ${reason}`, "stderr");
      }
    }
  }
}

function extractError(error: unknown): LogEntry["error"] | undefined {
  if (error === undefined || error === null) {
    return undefined;
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    name: "Error",
    message: String(error),
  };
}

// ============================================================================
// Global Logger
// ============================================================================

const DEFAULT_LOGGER_NAME = "tollgate";

let globalLogger: Logger | null = null;

/**
 * Get or create the global logger.
 */
export function getLogger(name?: string): Logger {
  if (!globalLogger) {
    globalLogger = new Logger({
      name: DEFAULT_LOGGER_NAME,
      level: readEnvLevel() ?? "info",
      transports: [defaultTransport()],
    });
  }

  return name ? globalLogger.named(name) : globalLogger;
}

/**
 * Configure the global logger.
 */
export function configureLogger(config: Omit<LoggerConfig, "name"> & { name?: string }): Logger {
  globalLogger = new Logger({
    ...config,
    name: config.name ?? DEFAULT_LOGGER_NAME,
  });
  return globalLogger;
}

export function resetLogger(): void {
  globalLogger = null;
}

/** JSON lines through pino in production, pretty console lines elsewhere */
function defaultTransport(): ILogTransport {
  return process.env.NODE_ENV === "production"
    ? new PinoTransport()
    : new ConsoleTransport({ pretty: true });
}

function readEnvLevel(): LogLevel | undefined {
  const raw = process.env.TOLLGATE_LOG_LEVEL?.toLowerCase();
  return raw && isLogLevel(raw) ? raw : undefined;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVEL_PRIORITY, value);
}

// ============================================================================
// Factory Functions
// ============================================================================

export function createLogger(config: LoggerConfig): Logger {
  return new Logger(config);
}

export function createMemoryTransport(maxEntries?: number): MemoryTransport {
  return new MemoryTransport(maxEntries);
}
