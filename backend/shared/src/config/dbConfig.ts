// backend/shared/src/config/dbConfig.ts
/**
 * Purpose:
 * - Read and validate the entity-store configuration from env.
 *
 * Env (optionally prefixed, e.g. { prefix: "orders" } → ORDERS_DB_URI):
 *   - DB_URI                 required (the unprefixed MONGODB var overrides it)
 *   - DB_MAX_POOL_SIZE       default 128
 *   - DB_SOCKET_TIMEOUT_MS   default 30000
 *   - DB_ON_EXHAUSTED        wait | fail, default wait
 *   - DB_NAMING              snake | lower, default snake
 *   - LOG_LEVEL              pino level, default info (never prefixed)
 */

import { z } from "zod";
import { getEnv, prefixKey, type EnvSource } from "../env";
import { InvalidArgumentError } from "../errors/errors";
import { LOG_LEVELS } from "../logger/logger";

const LogLevel = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

export const DbConfigSchema = z.object({
  uri: z
    .string({ required_error: "required" })
    .regex(/^mongodb(\+srv)?:\/\//, {
      message: "DB_URI must start with mongodb:// or mongodb+srv://",
    }),
  maxPoolSize: z.coerce.number().int().min(1).max(10_000).default(128),
  socketTimeoutMs: z.coerce.number().int().min(1).default(30_000),
  onExhausted: z.enum(["wait", "fail"]).default("wait"),
  naming: z.enum(["snake", "lower"]).default("snake"),
  logLevel: LogLevel.default("info"),
});

export type DbConfig = z.infer<typeof DbConfigSchema>;
export type DbConfigInput = z.input<typeof DbConfigSchema>;

/** Env key for each config field, used to point error messages at the right variable. */
function envKeys(prefix?: string): Record<keyof DbConfig, string> {
  return {
    uri: prefixKey(prefix, "DB_URI"),
    maxPoolSize: prefixKey(prefix, "DB_MAX_POOL_SIZE"),
    socketTimeoutMs: prefixKey(prefix, "DB_SOCKET_TIMEOUT_MS"),
    onExhausted: prefixKey(prefix, "DB_ON_EXHAUSTED"),
    naming: prefixKey(prefix, "DB_NAMING"),
    logLevel: "LOG_LEVEL",
  };
}

function isConfigKey(k: unknown): k is keyof DbConfig {
  return typeof k === "string" && k in DbConfigSchema.shape;
}

export function parseDbConfig(
  input: unknown,
  keys: Record<keyof DbConfig, string> = envKeys()
): DbConfig {
  const res = DbConfigSchema.safeParse(input);
  if (res.success) return res.data;

  const problems = res.error.issues.map((i) => {
    const field = i.path[0];
    const label = isConfigKey(field) ? keys[field] : i.path.join(".");
    return `${label}: ${i.message}`;
  });
  throw new InvalidArgumentError(
    `invalid entity-store config: ${problems.join("; ")}.`,
    { ops: `fix the listed env vars; LOG_LEVEL accepts ${LOG_LEVELS.join(", ")}.` }
  );
}

export function loadDbConfig(
  opts: { prefix?: string; env?: EnvSource } = {}
): DbConfig {
  const env = opts.env ?? process.env;
  const keys = envKeys(opts.prefix);

  return parseDbConfig(
    {
      uri: getEnv("MONGODB", env) ?? getEnv(keys.uri, env),
      maxPoolSize: getEnv(keys.maxPoolSize, env),
      socketTimeoutMs: getEnv(keys.socketTimeoutMs, env),
      onExhausted: getEnv(keys.onExhausted, env),
      naming: getEnv(keys.naming, env),
      logLevel: getEnv(keys.logLevel, env)?.toLowerCase(),
    },
    keys
  );
}
