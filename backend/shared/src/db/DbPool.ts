// backend/shared/src/db/DbPool.ts
/**
 * Purpose:
 * - Bounded session pool over one master connection.
 * - acquire() leases a PooledSession; release() returns it; withSession()
 *   scopes a lease to a callback and always releases it.
 *
 * Invariants:
 * - live <= maxPoolSize at every await point.
 * - A freed slot goes to the oldest waiter first (FIFO) without being
 *   decremented in between, so a late acquirer cannot jump the queue.
 * - Waiting for a slot is bounded by socketTimeoutMs (ConnectionError on expiry).
 *
 * Notes:
 * - One DbPool per logical database. Construct it, init() it, pass it to the
 *   EntityEngine; there is no module-level pool.
 */

import type { Document } from "mongodb";
import type { Logger } from "pino";
import { classifyError } from "../errors/classifyError";
import {
  ConnectionError,
  InvalidArgumentError,
  PoolExhaustedError,
} from "../errors/errors";
import { logger, redactUri } from "../logger/logger";
import { MongoDbFactory } from "./mongo/MongoDbFactory";
import { PooledSession } from "./PooledSession";
import type { ExhaustionPolicy, IDbConnectionInfo, IDbFactory } from "./types";

export type DbPoolOptions = IDbConnectionInfo & {
  onExhausted: ExhaustionPolicy;
};

export type DbPoolStats = {
  live: number;
  waiting: number;
  maxPoolSize: number;
};

type Waiter = {
  resolve: () => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout;
};

function assertOptions(opts: DbPoolOptions): void {
  if (!Number.isInteger(opts.maxPoolSize) || opts.maxPoolSize < 1) {
    throw new InvalidArgumentError(
      `maxPoolSize must be a positive integer, got ${opts.maxPoolSize}.`
    );
  }
  if (!Number.isInteger(opts.socketTimeoutMs) || opts.socketTimeoutMs < 1) {
    throw new InvalidArgumentError(
      `socketTimeoutMs must be a positive integer, got ${opts.socketTimeoutMs}.`
    );
  }
}

export class DbPool {
  private readonly factory: IDbFactory;
  private readonly log: Logger;
  private options: DbPoolOptions;

  private live = 0;
  private nextLeaseId = 1;
  private readonly leases = new Set<PooledSession>();
  private readonly waiters: Waiter[] = [];

  constructor(
    options: DbPoolOptions,
    deps: { factory?: IDbFactory; log?: Logger } = {}
  ) {
    assertOptions(options);
    this.options = { ...options };
    this.log = deps.log ?? logger.child({ component: "DbPool" });
    this.factory = deps.factory ?? new MongoDbFactory(this.log);
  }

  /** Connect the master connection. Safe to call more than once. */
  public async init(): Promise<void> {
    if (this.factory.isConnected()) return;
    const { uri, maxPoolSize, socketTimeoutMs, onExhausted } = this.options;
    await this.factory.connect({ uri, maxPoolSize, socketTimeoutMs });
    this.log.info(
      { uri: redactUri(uri), maxPoolSize, socketTimeoutMs, onExhausted },
      "pool initialized"
    );
  }

  /** Close the current connection (if any) and connect again with merged options. */
  public async reinit(options: Partial<DbPoolOptions> = {}): Promise<void> {
    const next = { ...this.options, ...options };
    assertOptions(next);
    await this.close();
    this.options = next;
    await this.init();
  }

  public isConnected(): boolean {
    return this.factory.isConnected();
  }

  public get maxPoolSize(): number {
    return this.options.maxPoolSize;
  }

  /** Name of the database the connection string points at. */
  public get databaseName(): string {
    this.ensureConnected("databaseName");
    return this.factory.getDb().databaseName;
  }

  public stats(): DbPoolStats {
    return {
      live: this.live,
      waiting: this.waiters.length,
      maxPoolSize: this.options.maxPoolSize,
    };
  }

  public async acquire(): Promise<PooledSession> {
    this.ensureConnected("acquire");

    if (this.live >= this.options.maxPoolSize) {
      if (this.options.onExhausted === "fail") {
        this.log.warn({ live: this.live }, "pool exhausted");
        throw new PoolExhaustedError(this.options.maxPoolSize, { op: "acquire" });
      }
      // On resolve the releasing lease has handed its slot straight to us.
      await this.waitForSlot();
    } else {
      this.live++;
    }

    try {
      const lease = new PooledSession({
        id: this.nextLeaseId++,
        session: this.factory.startSession(),
        db: this.factory.getDb(),
      });
      this.leases.add(lease);
      return lease;
    } catch (err) {
      this.freeSlot();
      throw classifyError(err, { op: "acquire" });
    }
  }

  public async release(lease: PooledSession): Promise<void> {
    if (!lease.markReleased()) {
      this.log.warn({ leaseId: lease.id }, "lease released twice; ignoring");
      return;
    }
    this.leases.delete(lease);
    try {
      await lease.session.endSession();
    } catch (err) {
      this.log.warn(
        { leaseId: lease.id, err: err instanceof Error ? err.message : String(err) },
        "endSession failed"
      );
    } finally {
      this.freeSlot();
    }
  }

  /** Lease a session for the duration of fn; released on every exit path. */
  public async withSession<R>(fn: (lease: PooledSession) => Promise<R>): Promise<R> {
    const lease = await this.acquire();
    try {
      return await fn(lease);
    } finally {
      await this.release(lease);
    }
  }

  /** Drop a whole database (default: the one in the connection string). Test/maintenance only. */
  public async drop(databaseName?: string): Promise<void> {
    const name = databaseName ?? this.databaseName;
    await this.withSession(async (lease) => {
      try {
        await this.factory.getDb(name).dropDatabase({ session: lease.session });
      } catch (err) {
        throw classifyError(err, { op: "dropDatabase" });
      }
    });
    this.log.warn({ db: name }, "database dropped");
  }

  public async ping(): Promise<Document> {
    return this.withSession(async (lease) => {
      try {
        return await lease.db.command({ ping: 1 }, { session: lease.session });
      } catch (err) {
        throw classifyError(err, { op: "ping" });
      }
    });
  }

  /**
   * Reject waiters, end every outstanding lease, close the master connection.
   * Leases released after close() are ignored.
   */
  public async close(): Promise<void> {
    for (const w of this.waiters.splice(0)) {
      clearTimeout(w.timer);
      w.reject(new ConnectionError("pool closed while waiting for a session.", { op: "acquire" }));
    }

    const outstanding = Array.from(this.leases);
    this.leases.clear();
    for (const lease of outstanding) {
      lease.markReleased();
      try {
        await lease.session.endSession();
      } catch (err) {
        this.log.warn(
          { leaseId: lease.id, err: err instanceof Error ? err.message : String(err) },
          "endSession failed during close"
        );
      }
    }
    this.live = 0;

    if (this.factory.isConnected()) {
      await this.factory.close();
      this.log.info({ abandonedLeases: outstanding.length }, "pool closed");
    }
  }

  /* ----------------- slot bookkeeping ----------------- */

  private ensureConnected(op: string): void {
    if (!this.factory.isConnected()) {
      throw new ConnectionError("pool is not initialized.", {
        op,
        ops: "call DbPool.init() once at startup before any operation.",
      });
    }
  }

  private waitForSlot(): Promise<void> {
    const timeoutMs = this.options.socketTimeoutMs;
    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = {
        resolve,
        reject,
        timer: setTimeout(() => {
          const idx = this.waiters.indexOf(waiter);
          if (idx >= 0) this.waiters.splice(idx, 1);
          this.log.warn({ timeoutMs }, "timed out waiting for a session");
          reject(
            new ConnectionError(
              `no session became free within ${timeoutMs}ms.`,
              { op: "acquire", ops: "raise DB_MAX_POOL_SIZE or DB_SOCKET_TIMEOUT_MS." }
            )
          );
        }, timeoutMs),
      };
      this.waiters.push(waiter);
      this.log.debug({ waiting: this.waiters.length }, "waiting for a session");
    });
  }

  private freeSlot(): void {
    const next = this.waiters.shift();
    if (next) {
      clearTimeout(next.timer);
      next.resolve();
      return;
    }
    if (this.live > 0) this.live--;
  }
}
