/**
 * Pino Transport
 *
 * Forwards log entries to pino, which writes newline-delimited JSON. Level
 * filtering stays with the Logger; pino accepts everything it is handed.
 */

import pino, { type DestinationStream, type Logger as PinoLogger } from "pino";
import type { ILogTransport, LogEntry } from "./logger";

export interface PinoTransportOptions {
  /** Bindings included in every line */
  base?: Record<string, unknown>;

  /** Defaults to stdout */
  destination?: DestinationStream;
}

export class PinoTransport implements ILogTransport {
  readonly name = "pino";
  private readonly target: PinoLogger;

  constructor(options: PinoTransportOptions = {}) {
    const pinoOptions = { level: "trace", base: options.base ?? { service: "tollgate" } };
    this.target = options.destination ? pino(pinoOptions, options.destination) : pino(pinoOptions);
  }

  write(entry: LogEntry): void {
    const bindings: Record<string, unknown> = {
      logger: entry.logger,
      correlationId: entry.correlationId,
      sessionId: entry.sessionId,
      toolName: entry.toolName,
      requestId: entry.requestId,
      durationMs: entry.durationMs,
      ...entry.data,
    };
    if (entry.error) {
      bindings.err = entry.error;
    }

    this.target[entry.level](bindings, entry.message);
  }

  flush(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.target.flush((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }
}

export function createPinoTransport(options?: PinoTransportOptions): PinoTransport {
  return new PinoTransport(options);
}
