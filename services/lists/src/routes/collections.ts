import { randomUUID } from 'crypto';
import type { FastifyInstance, FastifyReply } from 'fastify';
import { z } from 'zod';
import type { CollectionContext } from '../collections/collectionContext';
import { isToggleField, type CollectionDefinition } from '../collections/registry';
import type { CollectionStore, SaveResult } from '../contracts/collectionStore';
import type { CollectionRecord } from '../types';

// ---------- Schemas ----------
const idParamsSchema = z.object({
  id: z.string().min(1),
});

const toggleSchema = z.object({
  field: z.string().min(1, 'field required'),
});

const removeAtSchema = z.object({
  offsets: z.array(z.number().int().nonnegative()).min(1, 'offsets required'),
});

// ---------- Helpers ----------
function badRequest(reply: FastifyReply, error: z.ZodError) {
  return reply.code(400).send({ error: error.flatten() });
}

function notFound(reply: FastifyReply) {
  return reply.code(404).send({ error: 'not_found' });
}

function persistFields(result: SaveResult): Record<string, unknown> {
  return result.ok ? { persisted: true } : { persisted: false, persist_error: result.error };
}

// ---------- Routes ----------
export async function registerCollectionRoutes<T extends CollectionRecord, D>(
  app: FastifyInstance,
  definition: CollectionDefinition<T, D>,
  context: CollectionContext<T>,
  store: CollectionStore<T>,
) {
  const base = `/${definition.name}`;

  app.get(base, async (_req, reply) => {
    return reply.send({ records: context.list() });
  });

  // What the mirror currently holds, without touching the in-memory list
  app.get(`${base}/inspect`, async (_req, reply) => {
    const outcome = await store.inspect();
    const body: Record<string, unknown> = { status: outcome.status, count: outcome.records.length };
    if (outcome.status === 'corrupt' || outcome.status === 'unavailable') body.detail = outcome.detail;
    return reply.send(body);
  });

  // Create: the id is minted here, never by the store
  app.post(base, async (req, reply) => {
    const parsed = definition.draftSchema.safeParse(req.body);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const record = definition.schema.parse({ ...parsed.data, id: randomUUID() });
    const result = await context.add(record);
    return reply.code(201).send({ record: result.record, ...persistFields(result.persisted) });
  });

  // In-place field update
  app.patch(`${base}/:id`, async (req, reply) => {
    const params = idParamsSchema.safeParse(req.params);
    if (!params.success) return badRequest(reply, params.error);
    const parsed = definition.patchSchema.safeParse(req.body);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const result = await context.update(params.data.id, parsed.data);
    if (!result) return notFound(reply);
    return reply.send({ record: result.record, ...persistFields(result.persisted) });
  });

  app.post(`${base}/:id/toggle`, async (req, reply) => {
    const params = idParamsSchema.safeParse(req.params);
    if (!params.success) return badRequest(reply, params.error);
    const parsed = toggleSchema.safeParse(req.body);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const { field } = parsed.data;
    if (!isToggleField(definition, field)) {
      return reply.code(400).send({ error: `field ${field} cannot be toggled` });
    }

    const result = await context.toggle(params.data.id, field);
    if (!result) return notFound(reply);
    return reply.send({ record: result.record, ...persistFields(result.persisted) });
  });

  app.delete(`${base}/:id`, async (req, reply) => {
    const params = idParamsSchema.safeParse(req.params);
    if (!params.success) return badRequest(reply, params.error);

    const result = await context.remove(params.data.id);
    if (!result) return notFound(reply);
    return reply.send({ ok: true, ...persistFields(result.persisted) });
  });

  // Delete by position set, the way a list view reports swipe-to-delete
  app.delete(base, async (req, reply) => {
    const parsed = removeAtSchema.safeParse(req.body);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const result = await context.removeAt(parsed.data.offsets);
    return reply.send({ records: result.records, ...persistFields(result.persisted) });
  });
}
