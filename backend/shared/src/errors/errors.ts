// backend/shared/src/errors/errors.ts
/**
 * Purpose:
 * - The small, stable error vocabulary every entity-store caller matches on.
 * - Raw driver errors never cross the public API; classifyError() maps them here.
 *
 * Notes:
 * - Messages follow "<CODE>: detail. Ops: hint" so logs stay greppable.
 * - NotFoundError is an expected outcome for zero-match reads/updates/removes,
 *   not an operational failure.
 */

export type EntityStoreErrorCode =
  | "NOT_FOUND"
  | "DUPLICATE_KEY"
  | "INVALID_ARGUMENT"
  | "RESOLUTION_FAILED"
  | "CONNECTION_FAILED"
  | "POOL_EXHAUSTED"
  | "OPERATION_FAILED";

export type EntityStoreErrorOptions = {
  /** Collection the failing operation targeted, when known. */
  collection?: string;
  /** Operation name (e.g. "insert", "find"). */
  op?: string;
  /** Operator-facing remediation hint. */
  ops?: string;
  cause?: unknown;
};

export class EntityStoreError extends Error {
  public readonly code: EntityStoreErrorCode;
  public readonly collection?: string;
  public readonly op?: string;
  public readonly ops?: string;

  constructor(
    code: EntityStoreErrorCode,
    detail: string,
    opts: EntityStoreErrorOptions = {}
  ) {
    const hint = opts.ops ? ` Ops: ${opts.ops}` : "";
    super(`${code}: ${detail}${hint}`, { cause: opts.cause });
    this.name = "EntityStoreError";
    this.code = code;
    this.collection = opts.collection;
    this.op = opts.op;
    this.ops = opts.ops;
  }
}

export class NotFoundError extends EntityStoreError {
  constructor(detail: string, opts?: EntityStoreErrorOptions) {
    super("NOT_FOUND", detail, opts);
    this.name = "NotFoundError";
  }
}

export type DuplicateInfo = {
  index?: string;
  key?: Record<string, unknown>;
  message: string;
};

export class DuplicateKeyError extends EntityStoreError {
  public readonly index?: string;
  public readonly key?: Record<string, unknown>;

  constructor(info: DuplicateInfo, opts?: EntityStoreErrorOptions) {
    super("DUPLICATE_KEY", info.message, opts);
    this.name = "DuplicateKeyError";
    this.index = info.index;
    this.key = info.key;
  }
}

export class InvalidArgumentError extends EntityStoreError {
  constructor(detail: string, opts?: EntityStoreErrorOptions) {
    super("INVALID_ARGUMENT", detail, opts);
    this.name = "InvalidArgumentError";
  }
}

export class ResolutionError extends EntityStoreError {
  constructor(detail: string, opts?: EntityStoreErrorOptions) {
    super("RESOLUTION_FAILED", detail, opts);
    this.name = "ResolutionError";
  }
}

export class ConnectionError extends EntityStoreError {
  constructor(detail: string, opts?: EntityStoreErrorOptions) {
    super("CONNECTION_FAILED", detail, opts);
    this.name = "ConnectionError";
  }
}

export class PoolExhaustedError extends EntityStoreError {
  public readonly maxPoolSize: number;

  constructor(maxPoolSize: number, opts?: EntityStoreErrorOptions) {
    super(
      "POOL_EXHAUSTED",
      `all ${maxPoolSize} sessions are leased.`,
      {
        ops: "raise DB_MAX_POOL_SIZE or switch DB_ON_EXHAUSTED to wait.",
        ...opts,
      }
    );
    this.name = "PoolExhaustedError";
    this.maxPoolSize = maxPoolSize;
  }
}

export class OperationError extends EntityStoreError {
  constructor(detail: string, opts?: EntityStoreErrorOptions) {
    super("OPERATION_FAILED", detail, opts);
    this.name = "OperationError";
  }
}

/** One failed document of an insertMany batch. */
export type InsertManyFailure = {
  collection: string;
  /** Position of the entity in the caller's input array. */
  position: number;
  error: EntityStoreError;
};

export class InsertManyError extends OperationError {
  public readonly failures: ReadonlyArray<InsertManyFailure>;
  public readonly insertedCount: number;

  constructor(
    failures: ReadonlyArray<InsertManyFailure>,
    insertedCount: number
  ) {
    const summary = failures
      .map((f) => `#${f.position} (${f.collection}) ${f.error.code}`)
      .join("; ");
    super(
      `insertMany failed for ${failures.length} document(s), inserted ${insertedCount}: ${summary}`,
      { op: "insertMany" }
    );
    this.name = "InsertManyError";
    this.failures = failures;
    this.insertedCount = insertedCount;
  }
}
