import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createListsClient } from '../src/sdk/listsClient';
import { buildApp } from '../src/server';
import { MemoryKvSubstrate } from '../src/storage/memorySubstrate';

type AppInstance = Awaited<ReturnType<typeof buildApp>>;

const METHODS = ['GET', 'POST', 'PATCH', 'DELETE'] as const;

function toMethod(value: string | undefined) {
  const method = METHODS.find((candidate) => candidate === (value ?? 'GET').toUpperCase());
  if (!method) throw new Error(`Unexpected method ${value}`);
  return method;
}

// Routes fetch calls into the in-process app instead of the network.
function fetchVia(app: AppInstance): typeof fetch {
  return async (input, init) => {
    const raw = typeof input === 'string' ? input : input instanceof URL ? input.toString() : input.url;
    const url = new URL(raw);
    const body = typeof init?.body === 'string' ? init.body : undefined;
    const res = await app.inject({
      method: toMethod(init?.method),
      url: `${url.pathname}${url.search}`,
      payload: body,
      headers: body ? { 'content-type': 'application/json' } : {},
    });
    return new Response(res.body, { status: res.statusCode });
  };
}

describe('lists client', () => {
  let app: AppInstance;
  let client: ReturnType<typeof createListsClient>;

  beforeEach(async () => {
    app = await buildApp({ substrate: new MemoryKvSubstrate(), keyPrefix: 'test' });
    client = createListsClient({ baseUrl: 'http://lists.test/', fetch: fetchVia(app) });
  });

  afterEach(async () => {
    await app.close();
  });

  it('creates, lists and toggles to-dos', async () => {
    const created = await client.todos.create({ title: 'Pack lunch' });
    expect(created).toEqual({
      record: { id: expect.any(String), title: 'Pack lunch', isCompleted: false },
      persisted: true,
    });

    const toggled = await client.todos.toggle(created.record.id, 'isCompleted');
    expect(toggled?.record.isCompleted).toBe(true);

    await expect(client.todos.list()).resolves.toEqual([{ ...created.record, isCompleted: true }]);
  });

  it('updates items and removes them by id', async () => {
    const { record } = await client.items.create({ name: 'Desk' });

    const updated = await client.items.update(record.id, { description: 'standing' });
    expect(updated?.record).toEqual({ id: record.id, name: 'Desk', description: 'standing' });

    await expect(client.items.remove(record.id)).resolves.toEqual({ persisted: true });
    await expect(client.items.list()).resolves.toEqual([]);
  });

  it('resolves null for unknown ids', async () => {
    await expect(client.favorites.update('nope', { name: 'x' })).resolves.toBeNull();
    await expect(client.favorites.toggle('nope', 'isFavorite')).resolves.toBeNull();
    await expect(client.favorites.remove('nope')).resolves.toBeNull();
  });

  it('removes by position', async () => {
    await client.favorites.create({ name: 'Rain' });
    await client.favorites.create({ name: 'Snow', isFavorite: true });

    const result = await client.favorites.removeAt([0]);
    expect(result.persisted).toBe(true);
    expect(result.records).toEqual([{ id: expect.any(String), name: 'Snow', isFavorite: true }]);
  });

  it('reports the mirror status', async () => {
    await expect(client.items.inspect()).resolves.toEqual({ status: 'missing', count: 0 });
  });

  it('throws with status and body for rejected requests', async () => {
    await expect(client.todos.create({ title: '' })).rejects.toThrow(/^create failed: 400/);
  });

  it('throws on a response that does not match the record schema', async () => {
    const broken = createListsClient({
      baseUrl: 'http://lists.test',
      fetch: async () => new Response(JSON.stringify({ records: [{ id: 1 }] }), { status: 200 }),
    });

    await expect(broken.items.list()).rejects.toThrow('list failed: malformed response');
  });

  it('includes status text and body of server errors', async () => {
    const failing = createListsClient({
      baseUrl: 'http://lists.test',
      fetch: async () => new Response('boom', { status: 500, statusText: 'Internal Server Error' }),
    });

    await expect(failing.todos.list()).rejects.toThrow('list failed: 500 Internal Server Error - boom');
  });
});
