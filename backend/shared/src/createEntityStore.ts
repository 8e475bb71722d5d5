// backend/shared/src/createEntityStore.ts
/**
 * Purpose:
 * - One-call wiring: config → logger → pool (initialized) → resolver → engine.
 *
 * Usage:
 *   const store = await createEntityStoreFromEnv({ prefix: "orders", envFiles: [".env"] });
 *   await store.engine.insert(car);
 *   await store.close();
 */

import { loadDbConfig, parseDbConfig, type DbConfig } from "./config/dbConfig";
import { createDbPool } from "./db/DbPoolBuilder";
import type { DbPool } from "./db/DbPool";
import type { IDbFactory } from "./db/types";
import { CollectionResolver } from "./entity/collectionResolver";
import { EntityEngine } from "./entity/EntityEngine";
import type { NamingStrategy } from "./entity/naming";
import { loadEnvFiles, type EnvSource } from "./env";
import { createLogger } from "./logger/logger";

export type EntityStore = {
  config: DbConfig;
  pool: DbPool;
  engine: EntityEngine;
  close(): Promise<void>;
};

export type EntityStoreOptions = {
  /** Service name stamped on every log line. */
  service?: string;
  /** Overrides the configured DB_NAMING, e.g. with a custom function. */
  naming?: NamingStrategy;
  factory?: IDbFactory;
};

export async function createEntityStore(
  input: unknown,
  opts: EntityStoreOptions = {}
): Promise<EntityStore> {
  return build(parseDbConfig(input), opts);
}

export async function createEntityStoreFromEnv(
  opts: EntityStoreOptions & {
    prefix?: string;
    env?: EnvSource;
    /** Env files loaded (in order) into process.env before reading config. */
    envFiles?: string[];
  } = {}
): Promise<EntityStore> {
  if (opts.envFiles?.length) loadEnvFiles(opts.envFiles, { allowMissing: true });
  return build(loadDbConfig({ prefix: opts.prefix, env: opts.env }), opts);
}

async function build(config: DbConfig, opts: EntityStoreOptions): Promise<EntityStore> {
  const log = createLogger({ level: config.logLevel, service: opts.service });

  const pool = createDbPool(config, {
    factory: opts.factory,
    log: log.child({ component: "DbPool" }),
  });
  await pool.init();

  const engine = new EntityEngine({
    pool,
    resolver: new CollectionResolver({ naming: opts.naming ?? config.naming }),
    log: log.child({ component: "EntityEngine" }),
  });

  return { config, pool, engine, close: () => pool.close() };
}
