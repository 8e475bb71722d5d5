// backend/shared/src/entity/collectionResolver.ts
/**
 * Purpose:
 * - Map an entity shape (class, instance, array of either, nested arrays) to
 *   exactly one collection name, from the type alone.
 *
 * Resolution order:
 * 1) Unwrap arrays to their first element and instances to their class.
 * 2) Walk the class chain outermost → base. The first class that declares its
 *    OWN static dbCollectionName() decides:
 *      - non-empty string → used verbatim
 *      - null             → opt out; derive from the outermost class name
 * 3) No capability anywhere → derive from the outermost class name.
 *
 * Invariants:
 * - Same class → same name, whatever the wrapping.
 * - Cached per class for the resolver's lifetime (types are static).
 */

import { ResolutionError } from "../errors/errors";
import { deriveCollectionName, type NamingStrategy } from "./naming";
import type { EntityShape } from "./types";

const NATIVE_CODE = /\{\s*\[native code\]\s*\}\s*$/;

function describe(v: unknown): string {
  if (v === null) return "null";
  if (Array.isArray(v)) return "array";
  return typeof v;
}

export class CollectionResolver {
  private readonly naming: NamingStrategy;
  private readonly cache = new WeakMap<Function, string>();

  constructor(opts: { naming?: NamingStrategy } = {}) {
    this.naming = opts.naming ?? "snake";
  }

  public resolve(shape: EntityShape): string {
    const ctor = this.elementClass(shape);
    const hit = this.cache.get(ctor);
    if (hit !== undefined) return hit;

    const name = this.resolveClass(ctor);
    this.cache.set(ctor, name);
    return name;
  }

  /** The innermost element class of a shape. */
  public elementClass(shape: unknown): Function {
    let cur: unknown = shape;
    while (Array.isArray(cur)) {
      if (cur.length === 0) {
        throw new ResolutionError(
          "empty array carries no element type.",
          { ops: "pass the entity class instead of an empty array." }
        );
      }
      cur = cur[0];
    }

    if (typeof cur === "function") {
      this.assertEntityClass(cur);
      return cur;
    }

    if (cur !== null && typeof cur === "object") {
      const proto: unknown = Object.getPrototypeOf(cur);
      if (proto === null || proto === Object.prototype) {
        throw new ResolutionError(
          "plain objects have no declared type.",
          { ops: "pass an instance of an entity class." }
        );
      }
      const ctor: unknown =
        typeof proto === "object" ? Reflect.get(proto, "constructor") : undefined;
      if (typeof ctor !== "function") {
        throw new ResolutionError("value has no constructor.");
      }
      this.assertEntityClass(ctor);
      return ctor;
    }

    throw new ResolutionError(
      `cannot resolve a collection for a ${describe(cur)} value.`,
      { ops: "pass an entity class, an instance, or an array of instances." }
    );
  }

  private assertEntityClass(ctor: Function): void {
    if (NATIVE_CODE.test(Function.prototype.toString.call(ctor))) {
      throw new ResolutionError(
        `built-in type ${ctor.name || "<anonymous>"} is not an entity.`
      );
    }
  }

  private resolveClass(outer: Function): string {
    let cur: unknown = outer;
    while (typeof cur === "function" && cur !== Function.prototype) {
      const own = Object.getOwnPropertyDescriptor(cur, "dbCollectionName");
      if (own) {
        const fn: unknown = own.value;
        if (typeof fn !== "function") {
          throw new ResolutionError(
            `${cur.name}.dbCollectionName must be a static method.`
          );
        }
        const result: unknown = Reflect.apply(fn, outer, []);
        if (result === null) break;
        if (typeof result !== "string" || !result.trim()) {
          throw new ResolutionError(
            `${cur.name}.dbCollectionName() returned ${JSON.stringify(result)}.`,
            { ops: "return a non-empty collection name, or null to use the class name." }
          );
        }
        return result;
      }
      cur = Object.getPrototypeOf(cur);
    }
    return this.derive(outer);
  }

  private derive(ctor: Function): string {
    if (!ctor.name) {
      throw new ResolutionError(
        "anonymous classes need a static dbCollectionName().",
      );
    }
    const name = deriveCollectionName(ctor.name, this.naming);
    if (!name.trim()) {
      throw new ResolutionError(
        `naming strategy produced an empty name for ${ctor.name}.`
      );
    }
    return name;
  }
}
