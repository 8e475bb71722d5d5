// backend/shared/src/db/mongo/MongoDbFactory.ts
/**
 * Purpose:
 * - MongoDB-specific factory implementing IDbFactory, injected into DbPool.
 * - Owns the single MongoClient (the master connection) for one pool.
 */

import { MongoClient, type ClientSession, type Db } from "mongodb";
import type { Logger } from "pino";
import { ConnectionError } from "../../errors/errors";
import { logger, redactUri } from "../../logger/logger";
import type { IDbConnectionInfo, IDbFactory } from "../types";

export class MongoDbFactory implements IDbFactory {
  private client: MongoClient | null = null;
  private readonly log: Logger;

  constructor(log?: Logger) {
    this.log = log ?? logger.child({ component: "MongoDbFactory" });
  }

  public async connect(info: IDbConnectionInfo): Promise<void> {
    if (this.client) return;

    let client: MongoClient;
    try {
      client = new MongoClient(info.uri, {
        maxPoolSize: info.maxPoolSize,
        socketTimeoutMS: info.socketTimeoutMs,
        connectTimeoutMS: info.socketTimeoutMs,
        serverSelectionTimeoutMS: info.socketTimeoutMs,
        // Int64 ids come back as bigint, not Long.
        useBigInt64: true,
      });
    } catch (err) {
      throw new ConnectionError(
        `malformed connection string "${redactUri(info.uri)}".`,
        { op: "connect", cause: err, ops: "fix DB_URI." }
      );
    }

    try {
      await client.connect();
    } catch (err) {
      await this.discard(client);
      throw new ConnectionError(
        `cannot reach "${redactUri(info.uri)}": ${
          err instanceof Error ? err.message : String(err)
        }`,
        {
          op: "connect",
          cause: err,
          ops: "verify the server is up and DB_URI points at it.",
        }
      );
    }

    this.client = client;
  }

  public async close(): Promise<void> {
    const client = this.client;
    if (!client) return;
    this.client = null;
    await client.close();
  }

  public isConnected(): boolean {
    return this.client !== null;
  }

  public getDb(dbName?: string): Db {
    return this.requireClient().db(dbName);
  }

  public startSession(): ClientSession {
    return this.requireClient().startSession();
  }

  private requireClient(): MongoClient {
    if (!this.client) {
      throw new ConnectionError("not connected.", {
        ops: "call DbPool.init() before using the pool.",
      });
    }
    return this.client;
  }

  /** A client that failed to connect may still hold monitors; close it without masking the connect error. */
  private async discard(client: MongoClient): Promise<void> {
    try {
      await client.close();
    } catch (err) {
      this.log.warn(
        { err: err instanceof Error ? err.message : String(err) },
        "close after failed connect also failed"
      );
    }
  }
}
