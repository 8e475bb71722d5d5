// backend/shared/src/errors/classifyError.ts
/**
 * Purpose:
 * - Fold driver/transport errors into the entity-store taxonomy.
 *
 * Invariants:
 * - Already-classified errors pass through unchanged.
 * - Duplicate key wins over every other mapping (a bulk write error is a
 *   server error too).
 * - Unknown errors become OperationError; nothing is dropped.
 */

import {
  BSON,
  MongoInvalidArgumentError,
  MongoNetworkError,
  MongoNotConnectedError,
  MongoParseError,
  MongoServerSelectionError,
  MongoTopologyClosedError,
} from "mongodb";
import {
  ConnectionError,
  DuplicateKeyError,
  EntityStoreError,
  InvalidArgumentError,
  OperationError,
  type EntityStoreErrorOptions,
} from "./errors";
import { parseDuplicateKey } from "./dupKeyError";

export type ErrorContext = Pick<EntityStoreErrorOptions, "collection" | "op">;

function messageOf(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (err !== null && typeof err === "object") {
    const errmsg: unknown = Reflect.get(err, "errmsg");
    if (typeof errmsg === "string") return errmsg;
  }
  return String(err);
}

export function classifyError(
  err: unknown,
  ctx: ErrorContext = {}
): EntityStoreError {
  if (err instanceof EntityStoreError) return err;

  const opts: EntityStoreErrorOptions = { ...ctx, cause: err };

  const dup = parseDuplicateKey(err);
  if (dup) return new DuplicateKeyError(dup, opts);

  if (
    err instanceof MongoNetworkError ||
    err instanceof MongoServerSelectionError ||
    err instanceof MongoTopologyClosedError ||
    err instanceof MongoNotConnectedError
  ) {
    return new ConnectionError(messageOf(err), {
      ...opts,
      ops: "verify DB_URI and that the server is reachable within DB_SOCKET_TIMEOUT_MS.",
    });
  }

  if (
    err instanceof MongoParseError ||
    err instanceof MongoInvalidArgumentError ||
    err instanceof BSON.BSONError
  ) {
    return new InvalidArgumentError(messageOf(err), opts);
  }

  return new OperationError(messageOf(err), opts);
}

/** One per-document failure of an unordered bulk insert. */
export type WriteErrorInfo = {
  /** Position within the batch handed to the driver. */
  index: number;
  code?: number;
  errmsg?: string;
  keyValue?: Record<string, unknown>;
};

/**
 * Per-document write errors carried by a bulk write failure, in batch order.
 * Empty when err is not a bulk write error (the whole batch failed).
 */
export function writeErrorsOf(err: unknown): WriteErrorInfo[] {
  if (err === null || typeof err !== "object") return [];
  const raw: unknown = Reflect.get(err, "writeErrors");
  const list: unknown[] = Array.isArray(raw) ? raw : raw ? [raw] : [];

  const out: WriteErrorInfo[] = [];
  for (const we of list) {
    if (we === null || typeof we !== "object") continue;
    const index: unknown = Reflect.get(we, "index");
    if (typeof index !== "number") continue;
    const code: unknown = Reflect.get(we, "code");
    const errmsg: unknown = Reflect.get(we, "errmsg");
    const keyValue: unknown = Reflect.get(we, "keyValue");
    out.push({
      index,
      code: typeof code === "number" ? code : undefined,
      errmsg: typeof errmsg === "string" ? errmsg : undefined,
      keyValue:
        keyValue !== null && typeof keyValue === "object" && !Array.isArray(keyValue)
          ? { ...keyValue }
          : undefined,
    });
  }
  return out.sort((a, b) => a.index - b.index);
}
