import type { KvSubstrate } from '../contracts/kvSubstrate';
import type { CollectionStore, LoadOutcome, SaveResult } from '../contracts/collectionStore';
import type { CollectionRecord } from '../types';
import { config } from '../config';
import { log, type Logger } from '../log';
import { decodeCollection, encodeCollection, type RecordSchema } from './codec';

export interface JsonCollectionStoreOptions<T extends CollectionRecord> {
  key: string;
  schema: RecordSchema<T>;
  substrate: KvSubstrate;
  logger?: Logger;
  /** Deadline for each substrate call; a call that misses it counts as failed. */
  timeoutMs?: number;
}

/**
 * Mirrors a whole collection as one JSON blob under a single key.
 *
 * `save` always replaces the stored value. The collection is encoded when
 * `save` is called, and writes from one instance reach the substrate in call
 * order. `load` never rejects: a missing, undecodable or unreadable blob all
 * come back as `[]`; use `inspect` to tell those cases apart. Substrate calls
 * that outlive `timeoutMs` are treated as failures.
 */
export class JsonCollectionStore<T extends CollectionRecord> implements CollectionStore<T> {
  readonly key: string;
  private readonly schema: RecordSchema<T>;
  private readonly substrate: KvSubstrate;
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private pending: Promise<unknown> = Promise.resolve();

  constructor(options: JsonCollectionStoreOptions<T>) {
    if (!options.key) {
      throw new Error('collection key required');
    }
    this.key = options.key;
    this.schema = options.schema;
    this.substrate = options.substrate;
    this.logger = options.logger ?? log;
    this.timeoutMs = options.timeoutMs ?? config.store.timeoutMs;
  }

  async save(records: readonly T[]): Promise<SaveResult> {
    const encoded = encodeCollection(this.schema, records);
    if (!encoded.ok) {
      this.logger.error({ key: this.key, detail: encoded.detail }, 'Collection could not be encoded');
      return { ok: false, error: 'encoding_failed', detail: encoded.detail };
    }

    const write = this.pending.then(() => this.write(encoded.blob));
    this.pending = write;
    return write;
  }

  async load(): Promise<T[]> {
    const outcome = await this.inspect();
    return outcome.records;
  }

  async inspect(): Promise<LoadOutcome<T>> {
    // read our own queued writes
    await this.pending;

    let raw: string | null;
    try {
      raw = await this.withDeadline('get', this.substrate.get(this.key));
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      this.logger.warn({ key: this.key, err }, 'Collection read failed, starting empty');
      return { status: 'unavailable', records: [], detail };
    }

    if (raw === null) {
      return { status: 'missing', records: [] };
    }

    const decoded = decodeCollection(this.schema, raw);
    if (!decoded.ok) {
      this.logger.warn({ key: this.key, detail: decoded.detail }, 'Discarding undecodable collection blob');
      return { status: 'corrupt', records: [], detail: decoded.detail };
    }

    this.logger.debug({ key: this.key, count: decoded.records.length }, 'Collection loaded');
    return { status: 'loaded', records: decoded.records };
  }

  private async write(blob: string): Promise<SaveResult> {
    try {
      await this.withDeadline('set', this.substrate.set(this.key, blob));
      return { ok: true, bytes: Buffer.byteLength(blob, 'utf8') };
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      this.logger.error({ key: this.key, err }, 'Collection write failed');
      return { ok: false, error: 'write_failed', detail };
    }
  }

  private withDeadline<R>(op: string, call: Promise<R>): Promise<R> {
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new Error(`${op} ${this.key} timed out after ${this.timeoutMs}ms`)),
        this.timeoutMs,
      );
    });
    return Promise.race([call, deadline]).finally(() => clearTimeout(timer));
  }
}
