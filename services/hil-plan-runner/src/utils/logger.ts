/**
 * HIL Plan Runner - Logger
 *
 * Winston logger shared by the engine and the CLIs. The console gets short
 * human-readable lines; the optional log file gets one JSON record per
 * entry with a timestamp.
 */

import winston from 'winston';
import { config } from '../config.js';

const { combine, timestamp, printf, colorize, errors, json } = winston.format;

export interface LogMetadata {
  service?: string;
  operation?: string;
  testName?: string;
  board?: string;
  hub?: string;
  port?: number | string | null;
  duration?: number;
  [key: string]: unknown;
}

// service and stack are left to the file log
const consoleLine = printf(({ level, message, service: _service, stack, ...metadata }) => {
  const fields = Object.entries(metadata).filter(([key, value]) => value !== undefined && key !== 'timestamp');
  const meta = fields.length > 0 ? ` ${JSON.stringify(Object.fromEntries(fields))}` : '';
  const trace = config.logLevel === 'debug' && stack ? `\n${stack}` : '';
  return `[${level}] ${message}${meta}${trace}`;
});

const winstonLogger = winston.createLogger({
  level: config.logLevel,
  silent: config.nodeEnv === 'test',
  format: combine(errors({ stack: true }), timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' })),
  defaultMeta: { service: config.serviceName, version: config.version },
  transports: [
    new winston.transports.Console({
      stderrLevels: ['error', 'warn'],
      format: combine(colorize({ level: config.nodeEnv === 'development' }), consoleLine),
    }),
  ],
});

if (config.logFile) {
  winstonLogger.add(
    new winston.transports.File({
      filename: config.logFile,
      format: json(),
      maxsize: 10 * 1024 * 1024,
      maxFiles: 5,
    })
  );
}

export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, error?: Error, metadata?: LogMetadata): void;
  child(defaultMetadata: LogMetadata): Logger;
}

function createLogger(defaults: LogMetadata = {}): Logger {
  const write = (level: 'debug' | 'info' | 'warn' | 'error', message: string, metadata?: LogMetadata) => {
    winstonLogger.log(level, message, { ...defaults, ...metadata });
  };

  return {
    debug: (message, metadata) => write('debug', message, metadata),
    info: (message, metadata) => write('info', message, metadata),
    warn: (message, metadata) => write('warn', message, metadata),
    error: (message, error, metadata) =>
      write('error', message, {
        ...metadata,
        error: error?.message,
        stack: error?.stack,
      }),
    child: (childMetadata) => createLogger({ ...defaults, ...childMetadata }),
  };
}

export const log = createLogger();

export default log;
