import pino from 'pino';
import type { Logger, LogLevel } from '../types/index.js';
import { LOG_LEVELS } from '../types/index.js';
import { getRequestId } from '../observability/requestContext.js';

export interface PinoLoggerOptions {
  level?: LogLevel;
  pretty?: boolean;
  /** Alternate destination, mainly for tests. Ignored when `pretty` is set. */
  destination?: pino.DestinationStream;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function withRequest(meta: unknown): Record<string, unknown> | undefined {
  const requestId = getRequestId();
  if (!requestId && (meta == null || typeof meta !== 'object')) return undefined;

  const base: Record<string, unknown> = requestId ? { requestId } : {};
  if (meta == null) return Object.keys(base).length ? base : undefined;
  if (meta instanceof Error) return { ...base, err: meta };
  if (typeof meta === 'object' && !Array.isArray(meta)) return { ...base, ...meta };
  return { ...base, meta };
}

export class PinoLogger implements Logger {
  private readonly log: pino.Logger;

  constructor(options: PinoLoggerOptions = {}) {
    const envLevel = process.env.LOG_LEVEL;
    const level = options.level ?? (isLogLevel(envLevel) ? envLevel : 'info');
    const pretty = options.pretty ?? (process.env.LOG_PRETTY === '1');

    const destination = pretty
      ? pino.transport({ target: 'pino-pretty', options: { colorize: true, translateTime: 'SYS:standard' } })
      : options.destination;

    this.log = pino(
      {
        level,
        base: { service: 'semantic-search' },
        redact: {
          paths: [
            '*.apiKey',
            '*.authToken',
            '*.token',
            '*.secret',
            'backend.authToken',
            'embedding.apiKey',
            'headers.authorization',
            'req.headers.authorization'
          ],
          censor: '***'
        }
      },
      destination
    );
  }

  trace(message: string, meta?: unknown): void {
    this.log.trace(withRequest(meta), message);
  }

  debug(message: string, meta?: unknown): void {
    this.log.debug(withRequest(meta), message);
  }

  info(message: string, meta?: unknown): void {
    this.log.info(withRequest(meta), message);
  }

  warn(message: string, meta?: unknown): void {
    this.log.warn(withRequest(meta), message);
  }

  error(message: string, meta?: unknown): void {
    this.log.error(withRequest(meta), message);
  }
}
