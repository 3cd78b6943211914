import type { z } from 'zod';
import type { RecordSchema } from '../storage/codec';
import type { CollectionRecord, FavoriteItem, ListItem, RecordPatch, TodoItem, ToggleField } from '../types';
import {
  favoriteItemDraftSchema,
  favoriteItemPatchSchema,
  favoriteItemSchema,
  listItemDraftSchema,
  listItemPatchSchema,
  listItemSchema,
  todoItemDraftSchema,
  todoItemPatchSchema,
  todoItemSchema,
} from './schemas';

/** Everything the service needs to own, persist and expose one kind of list. */
export interface CollectionDefinition<T extends CollectionRecord, D = unknown> {
  /** Route segment and key suffix. */
  name: string;
  schema: RecordSchema<T>;
  /** `D` is what a client sends to create a record. */
  draftSchema: z.ZodType<Omit<T, 'id'>, z.ZodTypeDef, D>;
  patchSchema: z.ZodType<RecordPatch<T>, z.ZodTypeDef, unknown>;
  toggleFields: readonly ToggleField<T>[];
}

export const itemsCollection: CollectionDefinition<ListItem, z.input<typeof listItemDraftSchema>> = {
  name: 'items',
  schema: listItemSchema,
  draftSchema: listItemDraftSchema,
  patchSchema: listItemPatchSchema,
  toggleFields: [],
};

export const todosCollection: CollectionDefinition<TodoItem, z.input<typeof todoItemDraftSchema>> = {
  name: 'todos',
  schema: todoItemSchema,
  draftSchema: todoItemDraftSchema,
  patchSchema: todoItemPatchSchema,
  toggleFields: ['isCompleted'],
};

export const favoritesCollection: CollectionDefinition<FavoriteItem, z.input<typeof favoriteItemDraftSchema>> = {
  name: 'favorites',
  schema: favoriteItemSchema,
  draftSchema: favoriteItemDraftSchema,
  patchSchema: favoriteItemPatchSchema,
  toggleFields: ['isFavorite'],
};

export function collectionKey(prefix: string, definition: { name: string }): string {
  return `${prefix}:${definition.name}`;
}

export function isToggleField<T extends CollectionRecord, D>(
  definition: CollectionDefinition<T, D>,
  field: string,
): field is ToggleField<T> {
  return definition.toggleFields.some((name) => name === field);
}
