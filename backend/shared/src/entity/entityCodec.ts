// backend/shared/src/entity/entityCodec.ts
/**
 * Purpose:
 * - Entity → document for writes; document → entity for reads.
 *
 * Notes:
 * - Writes copy own enumerable fields; undefined values and functions are
 *   skipped so the driver never stores them as null.
 * - The caller's object is never mutated by a write (the driver adds `_id`
 *   to the document it is given, so it gets a copy).
 * - Reads drop a driver-minted ObjectId `_id`; a caller-assigned `_id` survives.
 */

import { ObjectId, type Document } from "mongodb";
import type { EntityCtor } from "./types";

export function toDocument(entity: object): Document {
  const doc: Document = {};
  for (const [k, v] of Object.entries(entity)) {
    if (v === undefined || typeof v === "function") continue;
    doc[k] = v;
  }
  return doc;
}

function entityFields(raw: Document): Document {
  const out: Document = {};
  for (const [k, v] of Object.entries(raw)) {
    if (k === "_id" && v instanceof ObjectId) continue;
    out[k] = v;
  }
  return out;
}

/** Fresh instance of ctor populated from raw. */
export function hydrate<T extends object>(ctor: EntityCtor<T>, raw: Document): T {
  return Object.assign(new ctor(), entityFields(raw));
}

/** Populate an existing entity in place (the caller's "out" value). */
export function hydrateInto<T extends object>(target: T, raw: Document): T {
  return Object.assign(target, entityFields(raw));
}
