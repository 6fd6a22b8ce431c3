/**
 * Structured logging with pino, written to stderr so CLI output on stdout
 * stays machine-readable.
 *
 * LOG_LEVEL   trace | debug | info | warn | error | fatal | silent (default info)
 * LOG_FORMAT  json | pretty (default: pretty when NODE_ENV=development and pino-pretty resolves)
 */
import { createRequire } from 'node:module';
import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';

const require = createRequire(import.meta.url);

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/** Case-insensitive level lookup; unknown or missing values fall back to info. */
export function resolveLogLevel(value: string | undefined): LogLevel {
  const level = value?.toLowerCase();
  return level && isLogLevel(level) ? level : 'info';
}

function canPrettyPrint(): boolean {
  try {
    require.resolve('pino-pretty');
    return true;
  } catch {
    return false;
  }
}

/** Pretty output only when asked for (or in development) and pino-pretty is installed. */
export function wantsPrettyOutput(env: NodeJS.ProcessEnv): boolean {
  const format = env.LOG_FORMAT?.toLowerCase();
  if (format === 'json') return false;
  if (format !== 'pretty' && env.NODE_ENV !== 'development') return false;
  return canPrettyPrint();
}

export function createLogger(env: NodeJS.ProcessEnv = process.env): Logger {
  const options: LoggerOptions = {
    level: resolveLogLevel(env.LOG_LEVEL),
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    base: {
      service: 'blog-scraper',
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (wantsPrettyOutput(env)) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,service',
          destination: 2,
        },
      },
    });
  }
  return pino(options, pino.destination(2));
}

export const logger = createLogger();
