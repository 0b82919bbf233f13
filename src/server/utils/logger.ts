import pino from 'pino';
import type { Logger, LevelWithSilent } from 'pino';
import { AsyncLocalStorage } from 'async_hooks';

/**
 * Per-request logging context (requestId, method, path); run loggers add runId
 */
export const requestContext = new AsyncLocalStorage<Record<string, unknown>>();

export function getRequestContext(): Record<string, unknown> {
  return requestContext.getStore() ?? {};
}

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function resolveLevel(isDevelopment: boolean): LevelWithSilent {
  const configured = LEVELS.find((level) => level === process.env.LOG_LEVEL);
  return configured ?? (isDevelopment ? 'debug' : 'info');
}

function createLogger(): Logger {
  const isDevelopment = process.env.NODE_ENV === 'development';
  return pino({
    level: resolveLevel(isDevelopment),
    base: {
      env: process.env.NODE_ENV || 'development',
      service: 'coa-compliance-verifier',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    // Lines written while handling a request carry its requestId
    mixin: () => getRequestContext(),
    // Errors are logged under `error`, not pino's default `err`
    serializers: {
      error: pino.stdSerializers.err,
      reason: pino.stdSerializers.err,
    },
    redact: {
      paths: ['apiKey', '*.apiKey', 'headers.authorization', 'req.headers.authorization'],
      censor: '[redacted]',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(isDevelopment && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    }),
  });
}

export const logger = createLogger();

export function createChildLogger(bindings: Record<string, unknown>): Logger {
  return logger.child(bindings);
}
