import { z } from 'zod';
import {
  favoritesCollection,
  itemsCollection,
  todosCollection,
  type CollectionDefinition,
} from '../collections/registry';
import type { CollectionRecord, RecordId, RecordPatch, ToggleField } from '../types';

const DEFAULT_BASE_URL = 'http://localhost:8080';

type FetchImpl = typeof fetch;

export interface ListsClientOptions {
  baseUrl?: string;
  fetch?: FetchImpl;
}

const persistStatusSchema = z.object({
  persisted: z.boolean(),
  persist_error: z.enum(['encoding_failed', 'write_failed']).optional(),
});

const inspectSchema = z.object({
  status: z.enum(['loaded', 'missing', 'corrupt', 'unavailable']),
  count: z.number(),
  detail: z.string().optional(),
});

export type PersistStatus = z.infer<typeof persistStatusSchema>;
export type InspectResponse = z.infer<typeof inspectSchema>;

export interface RecordResponse<T> extends PersistStatus {
  record: T;
}

export interface RecordsResponse<T> extends PersistStatus {
  records: T[];
}

export interface CollectionClient<T extends CollectionRecord, D> {
  list(): Promise<T[]>;
  create(draft: D): Promise<RecordResponse<T>>;
  /** Resolves to `null` when the id is unknown to the service. */
  update(id: RecordId, patch: RecordPatch<T>): Promise<RecordResponse<T> | null>;
  toggle(id: RecordId, field: ToggleField<T>): Promise<RecordResponse<T> | null>;
  remove(id: RecordId): Promise<PersistStatus | null>;
  removeAt(offsets: number[]): Promise<RecordsResponse<T>>;
  inspect(): Promise<InspectResponse>;
}

export function createListsClient(options: ListsClientOptions = {}) {
  const baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
  const fetchImpl: FetchImpl | undefined = options.fetch ?? globalThis.fetch;
  if (!fetchImpl) {
    throw new Error('createListsClient: fetch implementation required');
  }
  const boundFetch: FetchImpl = fetchImpl.bind(globalThis);

  return {
    items: collectionClient(boundFetch, baseUrl, itemsCollection),
    todos: collectionClient(boundFetch, baseUrl, todosCollection),
    favorites: collectionClient(boundFetch, baseUrl, favoritesCollection),
  };
}

export type ListsClient = ReturnType<typeof createListsClient>;

function collectionClient<T extends CollectionRecord, D>(
  fetchFn: FetchImpl,
  baseUrl: string,
  definition: CollectionDefinition<T, D>,
): CollectionClient<T, D> {
  const url = (suffix = '') => `${baseUrl}/${definition.name}${suffix}`;
  const recordList = z.array(definition.schema);
  const withRecord = persistStatusSchema.extend({ record: z.unknown() });
  const withRecords = persistStatusSchema.extend({ records: z.unknown() });
  const listBody = z.object({ records: z.unknown() });

  const toRecordResponse = (op: string, body: unknown): RecordResponse<T> => {
    const { record, ...status } = parseBody(op, withRecord, body);
    return { ...status, record: parseBody(op, definition.schema, record) };
  };

  return {
    async list() {
      const body = await request(fetchFn, 'list', url(), { method: 'GET' });
      return parseBody('list', recordList, parseBody('list', listBody, body).records);
    },

    async create(draft) {
      const body = await request(fetchFn, 'create', url(), jsonInit('POST', draft));
      return toRecordResponse('create', body);
    },

    async update(id, patch) {
      const body = await request(fetchFn, 'update', url(`/${encodeURIComponent(id)}`), jsonInit('PATCH', patch), true);
      return body === null ? null : toRecordResponse('update', body);
    },

    async toggle(id, field) {
      const body = await request(
        fetchFn,
        'toggle',
        url(`/${encodeURIComponent(id)}/toggle`),
        jsonInit('POST', { field }),
        true,
      );
      return body === null ? null : toRecordResponse('toggle', body);
    },

    async remove(id) {
      const body = await request(fetchFn, 'remove', url(`/${encodeURIComponent(id)}`), { method: 'DELETE' }, true);
      return body === null ? null : parseBody('remove', persistStatusSchema, body);
    },

    async removeAt(offsets) {
      const body = await request(fetchFn, 'removeAt', url(), jsonInit('DELETE', { offsets }));
      const { records, ...status } = parseBody('removeAt', withRecords, body);
      return { ...status, records: parseBody('removeAt', recordList, records) };
    },

    async inspect() {
      const body = await request(fetchFn, 'inspect', url('/inspect'), { method: 'GET' });
      return parseBody('inspect', inspectSchema, body);
    },
  };
}

function jsonInit(method: string, payload: unknown): RequestInit {
  return {
    method,
    headers: { 'content-type': 'application/json' },
    body: JSON.stringify(payload),
  };
}

async function request(
  fetchFn: FetchImpl,
  op: string,
  url: string,
  init: RequestInit,
  allowNotFound = false,
): Promise<unknown> {
  const res = await fetchFn(url, init);

  if (allowNotFound && res.status === 404) {
    return null;
  }

  if (!res.ok) {
    const detail = await safeReadBody(res);
    throw new Error(`${op} failed: ${res.status} ${res.statusText}${detail}`);
  }

  return res.json();
}

function parseBody<S extends z.ZodTypeAny>(op: string, schema: S, body: unknown): z.output<S> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new Error(`${op} failed: malformed response`);
  }
  return parsed.data;
}

async function safeReadBody(res: Response): Promise<string> {
  try {
    const text = await res.text();
    return text ? ` - ${text}` : '';
  } catch {
    return '';
  }
}
