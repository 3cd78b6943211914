import 'dotenv/config';

export type StoreBackend = 'redis' | 'memory';

function parseBackend(value: string | undefined): StoreBackend {
  if (!value || value === 'redis') return 'redis';
  if (value === 'memory') return 'memory';
  throw new Error(`Unsupported STORE_BACKEND: ${value}`);
}

export const config = {
  port: parseInt(process.env.PORT || '8080', 10),
  host: process.env.HOST || '0.0.0.0',
  redis: {
    url: process.env.REDIS_URL || 'redis://localhost:6379',
    // a command that has not answered by then rejects instead of waiting for a reconnect
    commandTimeoutMs: parseInt(process.env.REDIS_COMMAND_TIMEOUT_MS || '2000', 10),
    maxRetriesPerRequest: parseInt(process.env.REDIS_MAX_RETRIES || '1', 10),
  },
  logLevel: process.env.LOG_LEVEL || 'info',
  store: {
    backend: parseBackend(process.env.STORE_BACKEND),
    // every collection lives under `${keyPrefix}:${name}`
    keyPrefix: process.env.STORE_KEY_PREFIX || 'lists',
    // upper bound on any single substrate call made by a store
    timeoutMs: parseInt(process.env.STORE_TIMEOUT_MS || '5000', 10),
  },
};
