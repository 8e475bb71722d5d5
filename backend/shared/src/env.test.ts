// backend/shared/src/env.test.ts

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { getEnv, loadEnvFiles, prefixKey } from "./env";
import { InvalidArgumentError } from "./errors/errors";

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "entity-store-env-"));
});

afterEach(() => {
  vi.unstubAllEnvs();
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("loadEnvFiles", () => {
  it("loads and expands files in order without overwriting set vars", () => {
    vi.stubEnv("ES_TEST_DB_HOST", "");
    vi.stubEnv("ES_TEST_DB_URI", "");
    vi.stubEnv("ES_TEST_PRESET", "kept");
    delete process.env.ES_TEST_DB_HOST;
    delete process.env.ES_TEST_DB_URI;

    const base = path.join(dir, ".env");
    fs.writeFileSync(
      base,
      [
        "ES_TEST_DB_HOST=db.internal",
        "ES_TEST_DB_URI=mongodb://${ES_TEST_DB_HOST}:27017/shop",
        "ES_TEST_PRESET=replaced",
      ].join("\n")
    );

    const loaded = loadEnvFiles([base, path.join(dir, ".env.missing")]);

    expect(loaded).toEqual([path.resolve(base)]);
    expect(process.env.ES_TEST_DB_URI).toBe("mongodb://db.internal:27017/shop");
    expect(process.env.ES_TEST_PRESET).toBe("kept");
  });

  it("keeps the first file's value when two files set the same key", () => {
    vi.stubEnv("ES_TEST_LAYERED", "");
    vi.stubEnv("ES_TEST_LOCAL_ONLY", "");
    delete process.env.ES_TEST_LAYERED;
    delete process.env.ES_TEST_LOCAL_ONLY;

    const first = path.join(dir, ".env.dev");
    const second = path.join(dir, ".env");
    fs.writeFileSync(first, "ES_TEST_LAYERED=from-dev\n");
    fs.writeFileSync(second, "ES_TEST_LAYERED=from-base\nES_TEST_LOCAL_ONLY=base\n");

    expect(loadEnvFiles([first, second])).toEqual([path.resolve(first), path.resolve(second)]);
    expect(process.env.ES_TEST_LAYERED).toBe("from-dev");
    expect(process.env.ES_TEST_LOCAL_ONLY).toBe("base");
  });

  it("fails when nothing loads unless allowMissing", () => {
    const missing = path.join(dir, ".env.none");
    expect(() => loadEnvFiles([missing])).toThrow(InvalidArgumentError);
    expect(loadEnvFiles([missing], { allowMissing: true })).toEqual([]);
  });
});

describe("accessors", () => {
  it("joins prefixes", () => {
    expect(prefixKey("orders", "DB_URI")).toBe("ORDERS_DB_URI");
    expect(prefixKey(undefined, "DB_URI")).toBe("DB_URI");
  });

  it("trims and treats blanks as unset", () => {
    const env = { A: " x ", B: "   " };
    expect(getEnv("A", env)).toBe("x");
    expect(getEnv("B", env)).toBeUndefined();
    expect(getEnv("C", env)).toBeUndefined();
  });
});
