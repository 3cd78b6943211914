import { config } from '../config';
import { getRedis } from '../redis/client';
import { RedisKvSubstrate } from '../redis/kv';
import type { KvSubstrate } from '../contracts/kvSubstrate';
import { MemoryKvSubstrate } from './memorySubstrate';

export function createSubstrate(backend = config.store.backend): KvSubstrate {
  switch (backend) {
    case 'redis':
      return new RedisKvSubstrate(getRedis());
    case 'memory':
      return new MemoryKvSubstrate();
    default:
      throw new Error(`Unsupported store backend: ${String(backend)}`);
  }
}
