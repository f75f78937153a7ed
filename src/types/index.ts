export * from './config.js';
export * from './search.js';

// Logger Interface
export interface Logger {
  trace(message: string, meta?: unknown): void;
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}

/** Per-call options accepted by every operation that may suspend. */
export interface CallOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}
