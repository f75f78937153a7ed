import type { BackendConfig, Logger } from '../types/index.js';
import type { IndexBackend } from './types.js';
import { InMemoryIndexBackend } from './backends/InMemoryIndexBackend.js';
import { HttpIndexBackend } from './backends/HttpIndexBackend.js';

export function createIndexBackend(config: BackendConfig, opts?: { logger?: Logger }): IndexBackend {
  if (config.provider === 'http') {
    return new HttpIndexBackend({
      baseUrl: config.baseUrl,
      authToken: config.authToken,
      timeoutMs: config.timeoutMs,
      logger: opts?.logger
    });
  }
  return new InMemoryIndexBackend();
}
