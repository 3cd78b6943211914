import type { CollectionRecord } from '../types';

/** Failure codes reported back to the owner when a save does not reach the substrate. */
export type PersistErrorCode = 'encoding_failed' | 'write_failed';

export type SaveResult =
  | { ok: true; bytes: number }
  | { ok: false; error: PersistErrorCode; detail: string };

/** What a read found under the store's key. `load` collapses every case but `loaded` to `[]`. */
export type LoadOutcome<T extends CollectionRecord> =
  | { status: 'loaded'; records: T[] }
  | { status: 'missing'; records: T[] }
  | { status: 'corrupt'; records: T[]; detail: string }
  | { status: 'unavailable'; records: T[]; detail: string };

/** Whole-collection mirror of an in-memory list under one fixed key. */
export interface CollectionStore<T extends CollectionRecord> {
  readonly key: string;
  save(records: readonly T[]): Promise<SaveResult>;
  load(): Promise<T[]>;
  inspect(): Promise<LoadOutcome<T>>;
}
