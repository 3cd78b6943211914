import { z } from 'zod';

const recordId = z.string().min(1, 'id required');

// Persisted shapes. Unknown keys are rejected so a blob round-trips field for field.
export const listItemSchema = z
  .object({
    id: recordId,
    name: z.string(),
    description: z.string().default(''),
  })
  .strict();

export const todoItemSchema = z
  .object({
    id: recordId,
    title: z.string(),
    isCompleted: z.boolean().default(false),
  })
  .strict();

export const favoriteItemSchema = z
  .object({
    id: recordId,
    name: z.string(),
    isFavorite: z.boolean().default(false),
  })
  .strict();

// ---------- Drafts (create input, no id) ----------
export const listItemDraftSchema = listItemSchema
  .omit({ id: true })
  .extend({ name: z.string().trim().min(1, 'name required') });

export const todoItemDraftSchema = todoItemSchema
  .omit({ id: true })
  .extend({ title: z.string().trim().min(1, 'title required') });

export const favoriteItemDraftSchema = favoriteItemSchema
  .omit({ id: true })
  .extend({ name: z.string().trim().min(1, 'name required') });

// ---------- Patches ----------
export const listItemPatchSchema = listItemDraftSchema.partial();
export const todoItemPatchSchema = todoItemDraftSchema.partial();
export const favoriteItemPatchSchema = favoriteItemDraftSchema.partial();
