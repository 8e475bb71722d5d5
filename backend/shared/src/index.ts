// backend/shared/src/index.ts
/**
 * Curated exports (no god-barrel).
 */

// Store wiring
export {
  createEntityStore,
  createEntityStoreFromEnv,
  type EntityStore,
  type EntityStoreOptions,
} from "./createEntityStore";

// Engine + resolution
export {
  EntityEngine,
  type EntityEngineOptions,
  type EntityFilter,
  type EntityUpdate,
  type UpsertResult,
} from "./entity/EntityEngine";
export { CollectionResolver } from "./entity/collectionResolver";
export { deriveCollectionName, toSnakeCase, type NamingStrategy } from "./entity/naming";
export type { EntityCtor, EntityShape, NamingCapability } from "./entity/types";
export { getIndexHints, mongoFromHints, type IndexHint } from "./entity/indexHints";

// Pool
export type { IDbFactory, IDbConnectionInfo, ExhaustionPolicy } from "./db/types";
export { DbPool, type DbPoolOptions, type DbPoolStats } from "./db/DbPool";
export { PooledSession } from "./db/PooledSession";
export { MongoDbFactory } from "./db/mongo/MongoDbFactory";
export { createDbPool, createDbPoolFromEnv } from "./db/DbPoolBuilder";

// Config + env
export { DbConfigSchema, loadDbConfig, parseDbConfig, type DbConfig } from "./config/dbConfig";
export { loadEnvFiles, getEnv, type EnvSource } from "./env";

// Errors
export * from "./errors/errors";
export { classifyError, type ErrorContext } from "./errors/classifyError";

// Logging
export { createLogger, initLogger, logger, type Logger } from "./logger/logger";
