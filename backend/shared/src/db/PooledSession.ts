// backend/shared/src/db/PooledSession.ts
/**
 * Purpose:
 * - One lease on the master connection: its own driver ClientSession (isolated
 *   command context) plus the pool's Db handle.
 *
 * Invariants:
 * - acquired → used by exactly one operation → released (once).
 * - A released lease refuses to hand out collections.
 */

import type { ClientSession, Collection, Db, Document } from "mongodb";
import { OperationError } from "../errors/errors";

export class PooledSession {
  public readonly id: number;
  public readonly session: ClientSession;
  public readonly db: Db;
  public readonly acquiredAt: number;
  private released = false;

  constructor(params: { id: number; session: ClientSession; db: Db }) {
    this.id = params.id;
    this.session = params.session;
    this.db = params.db;
    this.acquiredAt = Date.now();
  }

  public get isReleased(): boolean {
    return this.released;
  }

  public collection<TSchema extends Document = Document>(
    name: string
  ): Collection<TSchema> {
    if (this.released) {
      throw new OperationError(`lease #${this.id} was already released.`, {
        collection: name,
        ops: "do not keep a PooledSession beyond the callback that received it.",
      });
    }
    return this.db.collection<TSchema>(name);
  }

  /** Flip to released; false when it already was. Pool-internal. */
  public markReleased(): boolean {
    if (this.released) return false;
    this.released = true;
    return true;
  }
}
