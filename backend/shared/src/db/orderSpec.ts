// backend/shared/src/db/orderSpec.ts
/**
 * Purpose:
 * - Turn caller sort fields ("name", "-created", "+price") into an OrderSpec and
 *   then into a Mongo sort.
 * - Page math for 1-indexed page/pageSize.
 *
 * Invariants:
 * - A non-empty order always ends with `_id` so skip/limit pages are disjoint
 *   even when the primary fields tie.
 * - An empty order stays empty: the backend's natural order, no stability promise.
 */

import type { Sort } from "mongodb";
import { InvalidArgumentError } from "../errors/errors";

export type OrderDir = 1 | -1;

export type OrderTerm = {
  field: string; // dot-path allowed (e.g., "meta.startAt")
  dir: OrderDir; // 1 ASC, -1 DESC
};

export type OrderSpec = ReadonlyArray<OrderTerm>;

/** "-created" → { field: "created", dir: -1 }; "name" / "+name" → ascending. */
export function parseSortField(raw: string): OrderTerm {
  const s = raw.trim();
  const desc = s.startsWith("-");
  const field = desc || s.startsWith("+") ? s.slice(1).trim() : s;
  if (!field || field.startsWith("-") || field.startsWith("+")) {
    throw new InvalidArgumentError(`invalid sort field "${raw}".`, {
      op: "find",
      ops: 'use "field" for ascending or "-field" for descending.',
    });
  }
  return { field, dir: desc ? -1 : 1 };
}

/**
 * Build an OrderSpec from sort fields.
 * - Duplicates are removed (last one wins).
 * - `_id` is appended ascending unless the caller placed it.
 */
export function buildOrderSpec(sortFields: ReadonlyArray<string> = []): OrderSpec {
  const out: OrderTerm[] = [];
  for (const raw of sortFields) {
    const term = parseSortField(raw);
    const prev = out.findIndex((t) => t.field === term.field);
    if (prev >= 0) out.splice(prev, 1);
    out.push(term);
  }
  if (out.length && !out.some((t) => t.field === "_id")) {
    out.push({ field: "_id", dir: 1 });
  }
  return out;
}

/**
 * [{field:'price',dir:-1},{field:'_id',dir:1}] → [["price", -1], ["_id", 1]]
 * Pairs keep priority order even for integer-like field names.
 */
export function toMongoSort(spec: OrderSpec): Sort {
  return spec.map((t): [string, OrderDir] => [t.field, t.dir]);
}

export type PageWindow = { skip: number; limit: number };

/** page=1,pageSize=10 → skip 0 limit 10; page=3 → skip 20. */
export function pageWindow(page: number, pageSize: number): PageWindow {
  if (!Number.isInteger(page) || page < 1) {
    throw new InvalidArgumentError(`page must be an integer >= 1, got ${page}.`, {
      op: "find",
    });
  }
  if (!Number.isInteger(pageSize) || pageSize < 1) {
    throw new InvalidArgumentError(
      `pageSize must be an integer >= 1, got ${pageSize}.`,
      { op: "find" }
    );
  }
  return { skip: (page - 1) * pageSize, limit: pageSize };
}
