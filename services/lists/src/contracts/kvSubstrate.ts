/**
 * The key-value collaborator a collection is mirrored into.
 * Values are opaque strings; a store owns exactly one key per collection.
 */
export interface KvSubstrate {
  /** Resolves to `null` when nothing was ever written under `key`. */
  get(key: string): Promise<string | null>;
  /** Replaces whatever is stored under `key`. Rejects when the write is refused. */
  set(key: string, value: string): Promise<void>;
  ping(): Promise<void>;
}
