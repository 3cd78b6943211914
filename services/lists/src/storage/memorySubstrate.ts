import type { KvSubstrate } from '../contracts/kvSubstrate';

/**
 * In-process substrate backed by a plain Map. Data lives only as long as the
 * process; used for `STORE_BACKEND=memory` and in tests.
 */
export class MemoryKvSubstrate implements KvSubstrate {
  private readonly values = new Map<string, string>();

  async get(key: string): Promise<string | null> {
    return this.values.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<void> {
    this.values.set(key, value);
  }

  async ping(): Promise<void> {}
}
