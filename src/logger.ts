/**
 * Logger
 *
 * winston with chalk-coloured console output. Everything goes to stderr:
 * stdout belongs to CLI output and, inside a spawned server, to the protocol.
 */

import winston from 'winston';
import chalk from 'chalk';

const logLevels = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3
} as const;

export type LogLevel = keyof typeof logLevels;

const SENSITIVE_KEYS = ['apiKey', 'password', 'secret', 'token', 'authorization'];
const MASK_REGEX = new RegExp(
  `(${SENSITIVE_KEYS.join('|')})(["']?\\s*[:=]\\s*)(["'])?[^"',\\s}]*\\3`,
  'gi'
);

export function redactSecrets(text: string): string {
  return text.replace(MASK_REGEX, (_match, key: string, separator: string, quote?: string) => {
    const quoteMark = quote ?? '';
    return `${key}${separator}${quoteMark}***REDACTED***${quoteMark}`;
  });
}

const levelColorMap: Record<string, (text: string) => string> = {
  error: chalk.red,
  warn: chalk.yellow,
  info: chalk.blue,
  debug: chalk.gray
};

const consoleFormat = winston.format.printf((info) => {
  const { level, message, timestamp, ...meta } = info;
  const colorize = levelColorMap[level] ?? chalk.white;
  const scope = typeof meta.server === 'string' ? chalk.cyan(`[${meta.server}] `) : '';
  delete meta.server;
  const extra = Object.keys(meta).length > 0 ? ` ${chalk.dim(JSON.stringify(meta))}` : '';
  return redactSecrets(
    `${chalk.dim(String(timestamp))} ${colorize(level.toUpperCase())}: ${scope}${String(message)}${extra}`
  );
});

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(logLevels, value);
}

function getDefaultLogLevel(): LogLevel {
  const envLevel = process.env.MCPLEX_LOG_LEVEL?.toLowerCase();
  return envLevel && isLogLevel(envLevel) ? envLevel : 'info';
}

export interface LoggerOptions {
  level?: LogLevel;
  silent?: boolean;
}

export class Logger {
  private constructor(private readonly inner: winston.Logger) {}

  static create(options: LoggerOptions = {}): Logger {
    const inner = winston.createLogger({
      levels: logLevels,
      level: options.level ?? getDefaultLogLevel(),
      silent: options.silent ?? process.env.MCPLEX_LOG_SILENT === '1',
      format: winston.format.combine(
        winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
        consoleFormat
      ),
      transports: [
        new winston.transports.Console({
          stderrLevels: Object.keys(logLevels)
        })
      ]
    });
    return new Logger(inner);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.inner.log('error', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.inner.log('warn', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.inner.log('info', message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.inner.log('debug', message, meta);
  }

  /**
   * Scoped logger; `meta` is attached to every entry
   */
  child(meta: Record<string, unknown>): Logger {
    return new Logger(this.inner.child(meta));
  }

  setLevel(level: LogLevel): void {
    this.inner.level = level;
  }

  getLevel(): string {
    return this.inner.level;
  }
}

export const logger = Logger.create();
