import Redis, { type RedisOptions } from 'ioredis';
import { config } from '../config';

let client: Redis | null = null;

/**
 * Commands queue while the connection is down, but each one is bounded by
 * `commandTimeout` and a retry budget, so callers always get an answer.
 */
export function redisOptions(): RedisOptions {
  return {
    lazyConnect: false,
    enableReadyCheck: true,
    enableOfflineQueue: true,
    maxRetriesPerRequest: config.redis.maxRetriesPerRequest,
    commandTimeout: config.redis.commandTimeoutMs,
    connectTimeout: config.redis.commandTimeoutMs,
  };
}

export function getRedis(): Redis {
  if (!client) {
    client = new Redis(config.redis.url, redisOptions());
  }
  return client;
}

export async function closeRedis(): Promise<void> {
  if (!client) return;
  const current = client;
  client = null;
  await current.quit();
}
