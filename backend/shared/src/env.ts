// backend/shared/src/env.ts
/**
 * Purpose:
 * - Env file loading (dotenv + dotenv-expand) and fail-fast accessors.
 * - Accessors take an explicit env source so callers and tests can pass
 *   something other than process.env.
 *
 * Notes:
 * - Files load in order and the first file to set a key wins (dotenv does not
 *   override); later files only fill keys still unset.
 * - Values already present in the process env are never overwritten by files.
 */

import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import { expand } from "dotenv-expand";
import { InvalidArgumentError } from "./errors/errors";

export type EnvSource = Readonly<Record<string, string | undefined>>;

/** Load a single env file if it exists; expand; return true if loaded. */
function loadIfExists(absPath: string): boolean {
  if (!fs.existsSync(absPath)) return false;
  const parsed = dotenv.config({ path: absPath });
  if (parsed.error) {
    throw new InvalidArgumentError(
      `Failed to load env file: ${absPath} (${String(parsed.error)}).`
    );
  }
  expand(parsed);
  return true;
}

/** Load several files in order. Throws if none loaded and allowMissing=false. */
export function loadEnvFiles(
  files: string[],
  opts: { allowMissing?: boolean } = {}
): string[] {
  const loaded: string[] = [];
  for (const f of files) {
    const abs = path.resolve(f);
    if (loadIfExists(abs)) loaded.push(abs);
  }
  if (!loaded.length && !opts.allowMissing) {
    throw new InvalidArgumentError(
      `No env files loaded from: ${files.join(", ")}.`
    );
  }
  return loaded;
}

/** Join prefix and key into an env var name: ("orders", "DB_URI") → ORDERS_DB_URI */
export function prefixKey(prefix: string | undefined, key: string): string {
  return prefix ? `${prefix.toUpperCase()}_${key}` : key;
}

/** Return trimmed env var or undefined. */
export function getEnv(
  name: string,
  env: EnvSource = process.env
): string | undefined {
  const v = env[name];
  if (v == null) return undefined;
  const s = String(v).trim();
  return s === "" ? undefined : s;
}
