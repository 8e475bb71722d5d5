// backend/shared/src/entity/types.ts

import type { IndexHint } from "./indexHints";

/**
 * Optional static capability: the class names its own collection.
 * Return null to opt out and fall back to the name derived from the class.
 */
export interface NamingCapability {
  dbCollectionName(): string | null;
}

/** Entity classes are constructed without arguments and hydrated field by field. */
export type EntityCtor<T extends object = object> = (new () => T) &
  Partial<NamingCapability> & {
    indexHints?: ReadonlyArray<IndexHint>;
  };

/** Anything the resolver can map to a collection: a class, an instance, or arrays of them. */
export type EntityShape = EntityCtor | object | ReadonlyArray<EntityShape>;

export function isEntityCtor<T extends object>(
  v: EntityCtor<T> | T
): v is EntityCtor<T> {
  return typeof v === "function";
}
