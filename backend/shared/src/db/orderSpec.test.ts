// backend/shared/src/db/orderSpec.test.ts

import { describe, it, expect } from "vitest";
import { InvalidArgumentError } from "../errors/errors";
import { buildOrderSpec, pageWindow, parseSortField, toMongoSort } from "./orderSpec";

describe("parseSortField", () => {
  it("reads direction prefixes", () => {
    expect(parseSortField("-created")).toEqual({ field: "created", dir: -1 });
    expect(parseSortField("+price")).toEqual({ field: "price", dir: 1 });
    expect(parseSortField("name")).toEqual({ field: "name", dir: 1 });
    expect(parseSortField(" meta.startAt ")).toEqual({ field: "meta.startAt", dir: 1 });
  });

  it("rejects empty and doubly-prefixed fields", () => {
    for (const bad of ["", "-", "+", "--created", "-+price"]) {
      expect(() => parseSortField(bad)).toThrow(InvalidArgumentError);
    }
  });
});

describe("buildOrderSpec", () => {
  it("appends the _id tie-breaker to a non-empty order", () => {
    expect(buildOrderSpec(["-price", "name"])).toEqual([
      { field: "price", dir: -1 },
      { field: "name", dir: 1 },
      { field: "_id", dir: 1 },
    ]);
  });

  it("keeps a caller-placed _id where it is", () => {
    expect(buildOrderSpec(["-_id", "name"])).toEqual([
      { field: "_id", dir: -1 },
      { field: "name", dir: 1 },
    ]);
  });

  it("lets the last duplicate win", () => {
    expect(buildOrderSpec(["price", "name", "-price"])).toEqual([
      { field: "name", dir: 1 },
      { field: "price", dir: -1 },
      { field: "_id", dir: 1 },
    ]);
  });

  it("stays empty without sort fields", () => {
    expect(buildOrderSpec([])).toEqual([]);
    expect(buildOrderSpec()).toEqual([]);
  });
});

describe("toMongoSort", () => {
  it("emits field/direction pairs in priority order", () => {
    expect(toMongoSort(buildOrderSpec(["-created"]))).toEqual([
      ["created", -1],
      ["_id", 1],
    ]);
  });

  it("keeps integer-like field names in their place", () => {
    expect(toMongoSort(buildOrderSpec(["price", "-2024"]))).toEqual([
      ["price", 1],
      ["2024", -1],
      ["_id", 1],
    ]);
  });
});

describe("pageWindow", () => {
  it("computes skip/limit for 1-indexed pages", () => {
    expect(pageWindow(1, 10)).toEqual({ skip: 0, limit: 10 });
    expect(pageWindow(3, 10)).toEqual({ skip: 20, limit: 10 });
    expect(pageWindow(2, 1)).toEqual({ skip: 1, limit: 1 });
  });

  it("rejects non-positive or fractional values", () => {
    expect(() => pageWindow(0, 10)).toThrow("page must be an integer >= 1, got 0.");
    expect(() => pageWindow(1, 0)).toThrow("pageSize must be an integer >= 1, got 0.");
    expect(() => pageWindow(1.5, 10)).toThrow(InvalidArgumentError);
    expect(() => pageWindow(1, Number.NaN)).toThrow(InvalidArgumentError);
  });
});
