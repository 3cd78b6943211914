import Fastify, { type FastifyInstance } from 'fastify';
import { config } from './config';
import { CollectionContext } from './collections/collectionContext';
import {
  collectionKey,
  favoritesCollection,
  itemsCollection,
  todosCollection,
  type CollectionDefinition,
} from './collections/registry';
import type { KvSubstrate } from './contracts/kvSubstrate';
import { registerCollectionRoutes } from './routes/collections';
import { createSubstrate } from './storage';
import { JsonCollectionStore } from './storage/collectionStore';
import type { CollectionRecord } from './types';

export interface BuildAppOptions {
  substrate?: KvSubstrate;
  keyPrefix?: string;
  logger?: boolean | { level: string };
}

export async function buildApp(options: BuildAppOptions = {}) {
  const app = Fastify({ logger: options.logger ?? false });
  const substrate = options.substrate ?? createSubstrate();
  const keyPrefix = options.keyPrefix ?? config.store.keyPrefix;

  app.get('/health', async () => {
    try {
      await substrate.ping();
      return { status: 'ok', store: 'ok' };
    } catch (err) {
      app.log.error({ err }, 'Store health check failed');
      return { status: 'degraded', store: 'error' };
    }
  });

  await mountCollection(app, itemsCollection, substrate, keyPrefix);
  await mountCollection(app, todosCollection, substrate, keyPrefix);
  await mountCollection(app, favoritesCollection, substrate, keyPrefix);
  return app;
}

async function mountCollection<T extends CollectionRecord, D>(
  app: FastifyInstance,
  definition: CollectionDefinition<T, D>,
  substrate: KvSubstrate,
  keyPrefix: string,
) {
  const store = new JsonCollectionStore<T>({
    key: collectionKey(keyPrefix, definition),
    schema: definition.schema,
    substrate,
    logger: app.log,
  });
  const context = new CollectionContext<T>({ store, schema: definition.schema, logger: app.log });
  await context.load();
  await registerCollectionRoutes(app, definition, context, store);
}
