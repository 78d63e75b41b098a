/**
 * Structured Logger (pino-backed)
 *
 * Every log line is a JSON object containing:
 *   - `level`      pino numeric level
 *   - `time`       epoch ms
 *   - `service`    the tag passed to `createLogger`
 *   - `requestId`  auto-injected from AsyncLocalStorage (inside an HTTP request)
 *   - `msg`        human-readable message
 *   - …any extra fields from the payload object
 *
 * For human-readable output in development:
 *   npm start | npx pino-pretty
 */

import pino from 'pino';
import { resolveLogLevel, tryParseEnv } from '../config/env';
import { currentRequestId } from './requestContext';

// ─────────────────────────────────────────────────────────────────────────────
// Root pino instance
// ─────────────────────────────────────────────────────────────────────────────

const rootLogger = pino({
  level: resolveLogLevel(tryParseEnv(process.env)),
  base: { pid: process.pid },
  mixin() {
    const requestId = currentRequestId();
    return requestId === undefined ? {} : { requestId };
  },
  serializers: pino.stdSerializers,
});

// ─────────────────────────────────────────────────────────────────────────────
// Public interface
// ─────────────────────────────────────────────────────────────────────────────

export type LogPayload = Record<string, unknown>;

export interface Logger {
  info(payload: LogPayload | string, message?: string): void;
  debug(payload: LogPayload | string, message?: string): void;
  warn(payload: LogPayload | string, message?: string): void;
  error(payload: LogPayload | string, message?: string): void;
}

/**
 * Create a child logger scoped to a module:
 *   const logger = createLogger('httpMetrics');
 *   logger.warn({ metric }, 'Dropped metric update');
 */
export function createLogger(prefix: string): Logger {
  const child = rootLogger.child({ service: prefix });

  function log(
    level: 'info' | 'debug' | 'warn' | 'error',
    payload: LogPayload | string,
    message?: string,
  ): void {
    if (typeof payload === 'string') {
      child[level](payload);
    } else {
      child[level](payload, message ?? '');
    }
  }

  return {
    info: (p, m) => log('info', p, m),
    debug: (p, m) => log('debug', p, m),
    warn: (p, m) => log('warn', p, m),
    error: (p, m) => log('error', p, m),
  };
}

/** Flattens an unknown thrown value into log fields. */
export function errorFields(error: unknown): LogPayload {
  if (error instanceof Error) {
    return { error: error.message, errorName: error.name };
  }
  return { error: String(error) };
}
