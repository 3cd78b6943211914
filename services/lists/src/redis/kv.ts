import type { KvSubstrate } from '../contracts/kvSubstrate';

/** The string commands the substrate needs; an ioredis client satisfies it. */
export interface RedisStringClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  ping(): Promise<string>;
}

export class RedisKvSubstrate implements KvSubstrate {
  constructor(private readonly redis: RedisStringClient) {}

  async get(key: string): Promise<string | null> {
    return this.redis.get(key);
  }

  async set(key: string, value: string): Promise<void> {
    const reply = await this.redis.set(key, value);
    if (reply !== 'OK') {
      throw new Error(`SET ${key} answered ${String(reply)}`);
    }
  }

  async ping(): Promise<void> {
    await this.redis.ping();
  }
}
