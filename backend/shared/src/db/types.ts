// backend/shared/src/db/types.ts
/**
 * Purpose:
 * - Interfaces for the connection factory so the pool depends on an abstraction,
 *   not on MongoClient construction details.
 */

import type { ClientSession, Db } from "mongodb";

export type ExhaustionPolicy = "wait" | "fail";

export interface IDbConnectionInfo {
  uri: string;
  /** Upper bound on concurrently leased sessions (and the driver's socket pool). */
  maxPoolSize: number;
  /** Socket timeout; also bounds connect, server selection and waiting for a lease. */
  socketTimeoutMs: number;
}

export interface IDbFactory {
  /**
   * Establish the master connection (idempotent).
   * Throws ConnectionError when the address is malformed or unreachable.
   */
  connect(info: IDbConnectionInfo): Promise<void>;

  /** Close the master connection (idempotent). */
  close(): Promise<void>;

  isConnected(): boolean;

  /** Database handle; no name → the database named in the connection string. */
  getDb(dbName?: string): Db;

  /** Start an isolated driver session. Throws if not connected. */
  startSession(): ClientSession;
}
