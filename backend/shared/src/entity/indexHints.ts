// backend/shared/src/entity/indexHints.ts
/**
 * Purpose:
 * - DB-agnostic index hints an entity class declares next to its fields, and
 *   their translation into Mongo index descriptions.
 *
 * Usage in an entity module:
 *   class Car {
 *     static indexHints: IndexHint[] = [{ kind: "unique", fields: ["carId"] }];
 *     carId = 0;
 *   }
 *
 * Notes:
 * - A unique hint on the caller-assigned identifier is what makes insert()
 *   report DuplicateKeyError and keeps racing upsertOne() calls on that key
 *   down to one surviving document.
 */

import type { IndexDescription } from "mongodb";
import { InvalidArgumentError } from "../errors/errors";

export type IndexHint =
  | { kind: "lookup"; fields: string[] } // equality / sort
  | { kind: "unique"; fields: string[] } // must be unique together
  | { kind: "text"; fields: string[] } // full-text search
  | { kind: "ttl"; field: string; seconds: number }; // expiry

/** Read the (own or inherited) static indexHints of an entity class. */
export function getIndexHints(ctor: Function): IndexHint[] {
  const raw: unknown = Reflect.get(ctor, "indexHints");
  if (raw === undefined) return [];
  if (!Array.isArray(raw)) {
    throw new InvalidArgumentError(
      `${ctor.name}.indexHints must be an array.`
    );
  }
  return [...raw];
}

export function mongoFromHints(
  collection: string,
  hints: ReadonlyArray<IndexHint>
): IndexDescription[] {
  const specs: IndexDescription[] = [];
  for (const h of hints) {
    switch (h.kind) {
      case "lookup":
        specs.push({
          key: Object.fromEntries(h.fields.map((f) => [f, 1])),
          name: `${collection}_${h.fields.join("_")}_idx`,
        });
        break;
      case "unique":
        specs.push({
          key: Object.fromEntries(h.fields.map((f) => [f, 1])),
          name: `${collection}_${h.fields.join("_")}_uniq`,
          unique: true,
        });
        break;
      case "text":
        specs.push({
          key: Object.fromEntries(h.fields.map((f) => [f, "text"])),
          name: `${collection}_text_${h.fields.join("_")}`,
        });
        break;
      case "ttl":
        specs.push({
          key: { [h.field]: 1 },
          name: `${collection}_ttl_${h.field}`,
          expireAfterSeconds: h.seconds,
        });
        break;
    }
  }
  return specs;
}
