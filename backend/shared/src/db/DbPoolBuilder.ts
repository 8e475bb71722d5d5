// backend/shared/src/db/DbPoolBuilder.ts
/**
 * Purpose:
 * - Construct a DbPool from validated configuration, or straight from env.
 * - Support optional prefixing for per-database bindings (e.g. ORDERS_DB_URI).
 *
 * Notes:
 * - The pool is returned un-initialized; the caller decides when to connect.
 */

import type { Logger } from "pino";
import { loadDbConfig, type DbConfig } from "../config/dbConfig";
import type { EnvSource } from "../env";
import { DbPool } from "./DbPool";
import type { IDbFactory } from "./types";

export type DbPoolDeps = { factory?: IDbFactory; log?: Logger };

export function createDbPool(
  config: Pick<DbConfig, "uri" | "maxPoolSize" | "socketTimeoutMs" | "onExhausted">,
  deps: DbPoolDeps = {}
): DbPool {
  return new DbPool(
    {
      uri: config.uri,
      maxPoolSize: config.maxPoolSize,
      socketTimeoutMs: config.socketTimeoutMs,
      onExhausted: config.onExhausted,
    },
    deps
  );
}

export function createDbPoolFromEnv(
  opts: { prefix?: string; env?: EnvSource } = {},
  deps: DbPoolDeps = {}
): DbPool {
  return createDbPool(loadDbConfig(opts), deps);
}
