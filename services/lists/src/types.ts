export type RecordId = string;

/** Anything stored in a collection: a flat record keyed by a caller-generated id. */
export interface CollectionRecord {
  id: RecordId;
}

export interface ListItem extends CollectionRecord {
  name: string;
  description: string;
}

export interface TodoItem extends CollectionRecord {
  title: string;
  isCompleted: boolean;
}

export interface FavoriteItem extends CollectionRecord {
  name: string;
  isFavorite: boolean;
}

/** Names of the boolean fields of `T`, i.e. the ones a toggle may flip. */
export type ToggleField<T> = { [K in keyof T]-?: T[K] extends boolean ? K : never }[keyof T] & string;

export type RecordPatch<T extends CollectionRecord> = Partial<Omit<T, 'id'>>;
