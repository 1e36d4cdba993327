import path from 'path';
import winston from 'winston';

const { combine, timestamp, printf, colorize, errors } = winston.format;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  level?: LogLevel;
  /** Append-only execution log; omit to log to the console only */
  logFile?: string;
  console?: boolean;
}

const logFormat = printf(({ level, message, timestamp, stack }) => {
  return `${timestamp} [${level}]: ${stack || message}`;
});

const timestampFormat = timestamp({ format: 'YYYY-MM-DD HH:mm:ss' });

export function createLogger(options: LoggerOptions = {}): winston.Logger {
  const transports: Array<winston.transports.ConsoleTransportInstance | winston.transports.FileTransportInstance> = [];

  if (options.console !== false) {
    transports.push(
      new winston.transports.Console({
        format: combine(colorize(), timestampFormat, logFormat)
      })
    );
  }

  if (options.logFile) {
    transports.push(
      new winston.transports.File({
        filename: path.resolve(options.logFile),
        format: combine(timestampFormat, logFormat)
      })
    );
  }

  return winston.createLogger({
    level: options.level ?? 'info',
    format: combine(errors({ stack: true }), timestampFormat, logFormat),
    transports,
    silent: transports.length === 0,
    exitOnError: false
  });
}

/**
 * Logger that discards everything; used by tests and library callers
 */
export function createSilentLogger(): winston.Logger {
  return createLogger({ console: false });
}

export type Logger = winston.Logger;
