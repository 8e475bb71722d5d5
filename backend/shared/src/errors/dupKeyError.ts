// backend/shared/src/errors/dupKeyError.ts
/**
 * Purpose:
 * - Centralize duplicate-key parsing for Mongo write errors.
 * - Prefer the driver's structured keyValue/keyPattern; fall back to the
 *   E11000 message text for older servers and bulk write errors.
 */

import type { DuplicateInfo } from "./errors";

export const DUPLICATE_KEY_CODES: ReadonlySet<number> = new Set([
  11000, 11001, 12582,
]);

function prop(obj: unknown, key: string): unknown {
  if (obj === null || typeof obj !== "object") return undefined;
  return Reflect.get(obj, key);
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return v !== null && typeof v === "object" && !Array.isArray(v);
}

export function parseDuplicateKey(err: unknown): DuplicateInfo | null {
  const code = prop(err, "code") ?? prop(err, "errorCode");
  const message = String(prop(err, "message") ?? prop(err, "errmsg") ?? "");

  const codeHit = typeof code === "number" && DUPLICATE_KEY_CODES.has(code);
  if (!codeHit && !/E11000 duplicate key error/i.test(message)) {
    return null;
  }

  const out: DuplicateInfo = { message };

  const idxMatch = message.match(/index:\s*([^\s]+)\s/);
  if (idxMatch) out.index = idxMatch[1];

  const keyValue = prop(err, "keyValue");
  if (isRecord(keyValue)) {
    out.key = { ...keyValue };
    return out;
  }

  const keyMatch = message.match(/dup key:\s*(\{.*\})/);
  if (keyMatch) {
    const raw = keyMatch[1];
    try {
      const jsonish = raw.replace(/(['"])?([a-zA-Z0-9_.]+)(['"])?:/g, '"$2":');
      const parsed: unknown = JSON.parse(jsonish);
      out.key = isRecord(parsed) ? parsed : { raw };
    } catch {
      out.key = { raw };
    }
  }

  return out;
}
