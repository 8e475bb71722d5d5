// backend/shared/src/entity/EntityEngine.ts
/**
 * Purpose:
 * - Generic CRUD/aggregate operations over arbitrary entity classes.
 * - Every call: resolve the collection → lease a session → run → release → classify.
 *
 * Invariants:
 * - Exactly one collection is resolved before the backend is touched
 *   (insertMany: one per entity, grouped).
 * - No call holds a lease beyond its own duration.
 * - Filters, update documents and pipelines pass through unmodified.
 * - Nothing is retried except the duplicate-key race inside upsertOne().
 *
 * Notes:
 * - updateOne() is write-then-reread: the post-update document comes back from
 *   one atomic findOneAndUpdate and repopulates the caller's instance.
 */

import type {
  Collection,
  Document,
  Filter,
  UpdateFilter,
} from "mongodb";
import type { Logger } from "pino";
import type { DbPool } from "../db/DbPool";
import { buildOrderSpec, pageWindow, toMongoSort } from "../db/orderSpec";
import type { PooledSession } from "../db/PooledSession";
import { classifyError, writeErrorsOf } from "../errors/classifyError";
import { parseDuplicateKey } from "../errors/dupKeyError";
import {
  ConnectionError,
  InsertManyError,
  InvalidArgumentError,
  NotFoundError,
  PoolExhaustedError,
  type InsertManyFailure,
} from "../errors/errors";
import { logger } from "../logger/logger";
import { CollectionResolver } from "./collectionResolver";
import { hydrate, hydrateInto, toDocument } from "./entityCodec";
import { getIndexHints, mongoFromHints } from "./indexHints";
import { isEntityCtor, type EntityCtor, type EntityShape } from "./types";

export type EntityFilter = Filter<Document>;
export type EntityUpdate = UpdateFilter<Document>;

export type UpsertResult = {
  /** True when no document matched and the entity was inserted. */
  inserted: boolean;
  matchedCount: number;
};

export type EntityEngineOptions = {
  pool: DbPool;
  resolver?: CollectionResolver;
  log?: Logger;
};

type Op =
  | "insert"
  | "insertMany"
  | "findOne"
  | "find"
  | "updateOne"
  | "upsertOne"
  | "removeOne"
  | "count"
  | "aggregate"
  | "ensureIndexes";

export class EntityEngine {
  private readonly pool: DbPool;
  private readonly log: Logger;
  public readonly resolver: CollectionResolver;

  constructor(opts: EntityEngineOptions) {
    this.pool = opts.pool;
    this.resolver = opts.resolver ?? new CollectionResolver();
    this.log = opts.log ?? logger.child({ component: "EntityEngine" });
  }

  /** Insert one entity; its identifier fields are stored as given. */
  public async insert(entity: object): Promise<void> {
    if (Array.isArray(entity) || typeof entity === "function") {
      throw new InvalidArgumentError("insert() takes one entity instance.", {
        op: "insert",
        ops: "use insertMany() for batches.",
      });
    }
    const collection = this.resolver.resolve(entity);
    const doc = toDocument(entity);
    await this.run("insert", collection, async (coll, lease) => {
      await coll.insertOne(doc, { session: lease.session });
    });
  }

  /**
   * Insert a batch, possibly spanning collections: one unordered insertMany per
   * collection. Every failure is reported together in one InsertManyError.
   * Resolves to the number of inserted documents.
   *
   * A connectivity failure aborts the batch and surfaces as ConnectionError
   * (or PoolExhaustedError); remaining groups are not attempted.
   */
  public async insertMany(entities: ReadonlyArray<object>): Promise<number> {
    if (entities.length === 0) return 0;

    const groups = new Map<string, { positions: number[]; docs: Document[] }>();
    entities.forEach((entity, position) => {
      const collection = this.resolver.resolve(entity);
      const group = groups.get(collection) ?? { positions: [], docs: [] };
      group.positions.push(position);
      group.docs.push(toDocument(entity));
      groups.set(collection, group);
    });

    this.log.debug(
      { op: "insertMany", collections: Array.from(groups.keys()), count: entities.length },
      "entity op"
    );

    const failures: InsertManyFailure[] = [];
    let inserted = 0;

    await this.pool.withSession(async (lease) => {
      for (const [collection, group] of groups) {
        try {
          const res = await lease
            .collection(collection)
            .insertMany(group.docs, { ordered: false, session: lease.session });
          inserted += res.insertedCount;
        } catch (err) {
          const writeErrors = writeErrorsOf(err);
          if (!writeErrors.length) {
            const error = classifyError(err, { op: "insertMany", collection });
            if (error instanceof ConnectionError || error instanceof PoolExhaustedError) {
              this.log.warn(
                { op: "insertMany", collection, code: error.code, err: error.message, inserted },
                "entity op failed"
              );
              throw error;
            }
            for (const position of group.positions) {
              failures.push({ collection, position, error });
            }
            continue;
          }
          for (const we of writeErrors) {
            failures.push({
              collection,
              position: group.positions[we.index] ?? -1,
              error: classifyError(we, { op: "insertMany", collection }),
            });
          }
          inserted += group.docs.length - writeErrors.length;
        }
      }
    });

    if (failures.length) {
      const err = new InsertManyError(failures, inserted);
      this.log.warn(
        { op: "insertMany", failed: failures.length, inserted },
        "entity op failed"
      );
      throw err;
    }
    return inserted;
  }

  /**
   * First document matching filter. `target` is the entity class, or an
   * instance to populate in place. NotFoundError when nothing matches.
   */
  public async findOne<T extends object>(
    target: EntityCtor<T> | T,
    filter: EntityFilter
  ): Promise<T> {
    const collection = this.resolver.resolve(target);
    const raw = await this.run("findOne", collection, (coll, lease) =>
      coll.findOne(filter, { session: lease.session })
    );
    if (!raw) throw this.notFound("findOne", collection);
    return isEntityCtor(target) ? hydrate(target, raw) : hydrateInto(target, raw);
  }

  /**
   * One page of matches. page and pageSize are 1-indexed; sortFields entries
   * are field names, "-field" for descending. Empty sort = backend order.
   */
  public async find<T extends object>(
    ctor: EntityCtor<T>,
    filter: EntityFilter,
    page: number,
    pageSize: number,
    sortFields: ReadonlyArray<string> = []
  ): Promise<T[]> {
    const { skip, limit } = pageWindow(page, pageSize);
    const order = buildOrderSpec(sortFields);
    const collection = this.resolver.resolve(ctor);

    const docs = await this.run("find", collection, (coll, lease) => {
      let cursor = coll.find(filter, { session: lease.session });
      if (order.length) cursor = cursor.sort(toMongoSort(order));
      return cursor.skip(skip).limit(limit).toArray();
    });
    return docs.map((raw) => hydrate(ctor, raw));
  }

  /**
   * Apply update to the first match and return the updated entity
   * (also written into `target` when it is an instance).
   */
  public async updateOne<T extends object>(
    target: EntityCtor<T> | T,
    filter: EntityFilter,
    update: EntityUpdate
  ): Promise<T> {
    const collection = this.resolver.resolve(target);
    const raw = await this.run("updateOne", collection, (coll, lease) =>
      coll.findOneAndUpdate(filter, update, {
        returnDocument: "after",
        session: lease.session,
      })
    );
    if (!raw) throw this.notFound("updateOne", collection);
    return isEntityCtor(target) ? hydrate(target, raw) : hydrateInto(target, raw);
  }

  /**
   * Replace the first match with the entity's fields, or insert it.
   * One atomic replaceOne({ upsert: true }); a unique index on the filter
   * fields (see indexHints) settles concurrent upserts on the same key.
   */
  public async upsertOne(entity: object, filter: EntityFilter): Promise<UpsertResult> {
    const collection = this.resolver.resolve(entity);
    const doc = toDocument(entity);

    return this.run("upsertOne", collection, async (coll, lease) => {
      const replace = () =>
        coll.replaceOne(filter, doc, { upsert: true, session: lease.session });
      let res: Awaited<ReturnType<typeof replace>>;
      try {
        res = await replace();
      } catch (err) {
        if (!parseDuplicateKey(err)) throw err;
        // A racing upsert inserted first; the filter now matches its document.
        this.log.debug({ op: "upsertOne", collection }, "upsert lost insert race; replacing");
        res = await replace();
      }
      return { inserted: res.upsertedCount > 0, matchedCount: res.matchedCount };
    });
  }

  /** Remove the first match. NotFoundError when nothing matches. */
  public async removeOne<T extends object>(
    target: EntityCtor<T> | T,
    filter: EntityFilter
  ): Promise<void> {
    const collection = this.resolver.resolve(target);
    const res = await this.run("removeOne", collection, (coll, lease) =>
      coll.deleteOne(filter, { session: lease.session })
    );
    if (res.deletedCount === 0) throw this.notFound("removeOne", collection);
  }

  /** Number of matches; 0 is a normal answer. */
  public async count(target: EntityShape, filter: EntityFilter = {}): Promise<number> {
    const collection = this.resolver.resolve(target);
    return this.run("count", collection, (coll, lease) =>
      coll.countDocuments(filter, { session: lease.session })
    );
  }

  /** Run a pipeline on ctor's collection; rows come back as ctor instances in pipeline order. */
  public async aggregate<T extends object>(
    ctor: EntityCtor<T>,
    pipeline: Document[]
  ): Promise<T[]> {
    const collection = this.resolver.resolve(ctor);
    const rows = await this.run("aggregate", collection, (coll, lease) =>
      coll.aggregate(pipeline, { session: lease.session }).toArray()
    );
    return rows.map((raw) => hydrate(ctor, raw));
  }

  /** Escape hatch: a leased session for driver calls the engine does not wrap. */
  public async execute<R>(fn: (lease: PooledSession) => Promise<R>): Promise<R> {
    try {
      return await this.pool.withSession(fn);
    } catch (err) {
      const classified = classifyError(err, { op: "execute" });
      this.log.warn({ op: "execute", code: classified.code }, "entity op failed");
      throw classified;
    }
  }

  /** Drop the pool's whole database. Tests and maintenance only. */
  public async dropDatabase(): Promise<void> {
    await this.pool.drop();
  }

  /**
   * Create the indexes the given entity classes declare, grouped per
   * collection. Resolves to the created index names.
   */
  public async ensureIndexes(...ctors: EntityCtor[]): Promise<string[]> {
    const grouped = new Map<string, ReturnType<typeof mongoFromHints>>();
    for (const ctor of ctors) {
      const collection = this.resolver.resolve(ctor);
      const specs = mongoFromHints(collection, getIndexHints(ctor));
      grouped.set(collection, [...(grouped.get(collection) ?? []), ...specs]);
    }

    const names: string[] = [];
    for (const [collection, specs] of grouped) {
      if (!specs.length) {
        this.log.info({ collection }, "ensureIndexes: no indexHints; skipping");
        continue;
      }
      const created = await this.run("ensureIndexes", collection, (coll, lease) =>
        coll.createIndexes(specs, { session: lease.session })
      );
      this.log.info({ collection, created }, "ensureIndexes: indexes ensured");
      names.push(...created);
    }
    return names;
  }

  /* ----------------- internals ----------------- */

  private async run<R>(
    op: Op,
    collection: string,
    fn: (coll: Collection<Document>, lease: PooledSession) => Promise<R>
  ): Promise<R> {
    this.log.debug({ op, collection }, "entity op");
    try {
      return await this.pool.withSession((lease) => fn(lease.collection(collection), lease));
    } catch (err) {
      const classified = classifyError(err, { op, collection });
      this.log.warn(
        { op, collection, code: classified.code, err: classified.message },
        "entity op failed"
      );
      throw classified;
    }
  }

  private notFound(op: Op, collection: string): NotFoundError {
    this.log.debug({ op, collection }, "no matching document");
    return new NotFoundError(`no document in "${collection}" matches the filter.`, {
      op,
      collection,
    });
  }
}
