import type { CollectionStore, SaveResult } from '../contracts/collectionStore';
import type { RecordSchema } from '../storage/codec';
import type { CollectionRecord, RecordId, RecordPatch, ToggleField } from '../types';
import { log, type Logger } from '../log';

export interface MutationResult<T extends CollectionRecord> {
  records: readonly T[];
  persisted: SaveResult;
}

export interface RecordMutationResult<T extends CollectionRecord> extends MutationResult<T> {
  record: T;
}

export interface CollectionContextOptions<T extends CollectionRecord> {
  store: CollectionStore<T>;
  schema: RecordSchema<T>;
  logger?: Logger;
}

/**
 * Owns one in-memory collection and mirrors it through a store after every
 * mutation. The in-memory list is authoritative: a failed save is logged and
 * reported, but the mutation stands.
 */
export class CollectionContext<T extends CollectionRecord> {
  private records: readonly T[] = [];
  private readonly store: CollectionStore<T>;
  private readonly schema: RecordSchema<T>;
  private readonly logger: Logger;

  constructor(options: CollectionContextOptions<T>) {
    this.store = options.store;
    this.schema = options.schema;
    this.logger = options.logger ?? log;
  }

  /** Replaces the in-memory list with whatever the store holds. */
  async load(): Promise<readonly T[]> {
    this.records = await this.store.load();
    return this.records;
  }

  list(): readonly T[] {
    return this.records;
  }

  get(id: RecordId): T | undefined {
    return this.records.find((record) => record.id === id);
  }

  async add(record: T): Promise<RecordMutationResult<T>> {
    if (this.get(record.id)) {
      throw new Error(`duplicate record id: ${record.id}`);
    }
    this.records = [...this.records, record];
    const result = await this.persist('add');
    return { ...result, record };
  }

  /** Drops the records at the given positions; unknown positions are ignored. */
  async removeAt(offsets: Iterable<number>): Promise<MutationResult<T>> {
    const drop = new Set(offsets);
    this.records = this.records.filter((_, index) => !drop.has(index));
    return this.persist('removeAt');
  }

  async remove(id: RecordId): Promise<RecordMutationResult<T> | null> {
    const record = this.get(id);
    if (!record) return null;
    this.records = this.records.filter((candidate) => candidate.id !== id);
    const result = await this.persist('remove');
    return { ...result, record };
  }

  async update(id: RecordId, patch: RecordPatch<T>): Promise<RecordMutationResult<T> | null> {
    const current = this.get(id);
    if (!current) return null;
    return this.replace(this.schema.parse({ ...current, ...patch, id }), 'update');
  }

  async toggle(id: RecordId, field: ToggleField<T>): Promise<RecordMutationResult<T> | null> {
    const current = this.get(id);
    if (!current) return null;
    return this.replace(this.schema.parse({ ...current, [field]: !current[field] }), 'toggle');
  }

  private async replace(next: T, action: string): Promise<RecordMutationResult<T>> {
    this.records = this.records.map((record) => (record.id === next.id ? next : record));
    const result = await this.persist(action);
    return { ...result, record: next };
  }

  private async persist(action: string): Promise<MutationResult<T>> {
    const records = this.records;
    const persisted = await this.store.save(records);
    if (!persisted.ok) {
      this.logger.error(
        { key: this.store.key, action, error: persisted.error, detail: persisted.detail },
        'Collection not persisted, keeping in-memory state',
      );
    }
    return { records, persisted };
  }
}
