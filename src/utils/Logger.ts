import pino from 'pino';
import { DEFAULT_REDACTION_PATHS } from './redactionPaths';
import { ILogger } from './ILogger';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  level: LogLevel;
  redactPaths?: string[];
  /** Where JSON lines are written. Defaults to stdout. */
  destination?: pino.DestinationStream;
}

/**
 * pino-backed logger writing JSON lines to stdout, with credentials
 * censored as `[REDACTED]`.
 */
export class Logger implements ILogger {
  private pino: pino.Logger;

  constructor(private readonly options: LoggerOptions) {
    const redactPaths = options.redactPaths || DEFAULT_REDACTION_PATHS;

    const pinoOptions: pino.LoggerOptions = {
      level: options.level,
      redact: {
        paths: redactPaths,
        censor: '[REDACTED]',
      },
    };

    this.pino = options.destination ? pino(pinoOptions, options.destination) : pino(pinoOptions);
  }

  child(bindings: Record<string, unknown>): ILogger {
    const childLogger = new Logger(this.options);
    childLogger.pino = this.pino.child(bindings);
    return childLogger;
  }

  trace(msg: string, ...args: unknown[]): void {
    if (args.length > 0) {
      this.pino.trace(args[0], msg);
    } else {
      this.pino.trace(msg);
    }
  }

  debug(msg: string, ...args: unknown[]): void {
    if (args.length > 0) {
      this.pino.debug(args[0], msg);
    } else {
      this.pino.debug(msg);
    }
  }

  info(msg: string, ...args: unknown[]): void {
    if (args.length > 0) {
      this.pino.info(args[0], msg);
    } else {
      this.pino.info(msg);
    }
  }

  warn(msg: string, ...args: unknown[]): void {
    if (args.length > 0) {
      this.pino.warn(args[0], msg);
    } else {
      this.pino.warn(msg);
    }
  }

  error(msg: string, ...args: unknown[]): void {
    if (args.length > 0) {
      this.pino.error(args[0], msg);
    } else {
      this.pino.error(msg);
    }
  }
}
