import { describe, expect, it, vi } from 'vitest';

const { constructed, quitMock } = vi.hoisted(() => {
  const constructed: Array<{ url: string; options: Record<string, unknown> }> = [];
  return { constructed, quitMock: vi.fn(async () => 'OK') };
});

vi.mock('ioredis', () => ({
  default: class {
    constructor(url: string, options: Record<string, unknown>) {
      constructed.push({ url, options });
    }
    quit = quitMock;
  },
}));

import { closeRedis, getRedis, redisOptions } from '../src/redis/client';

describe('redis client', () => {
  it('bounds every command so an outage surfaces as an error', () => {
    const options = redisOptions();

    expect(options.commandTimeout).toBe(2000);
    expect(options.maxRetriesPerRequest).toBe(1);
    expect(options.connectTimeout).toBe(2000);
  });

  it('shares one client until it is closed', async () => {
    const first = getRedis();
    expect(getRedis()).toBe(first);
    expect(constructed).toHaveLength(1);
    expect(constructed[0]).toEqual({ url: 'redis://localhost:6379', options: redisOptions() });

    await closeRedis();
    expect(quitMock).toHaveBeenCalledTimes(1);

    getRedis();
    expect(constructed).toHaveLength(2);
    await closeRedis();
  });

  it('closing without a client is a no-op', async () => {
    await closeRedis();
    expect(quitMock).toHaveBeenCalledTimes(2);
  });
});
