// backend/shared/src/createEntityStore.test.ts

import { beforeEach, describe, it, expect, vi } from "vitest";

vi.mock("mongodb", async (importOriginal) => {
  const actual = await importOriginal<typeof import("mongodb")>();
  const { createFakeMongoClient } = await import("./testing/fakeMongo");
  return { ...actual, MongoClient: createFakeMongoClient(actual) };
});

import { fakeServer, resetFakeServer, storedDocs } from "./testing/fakeMongo";
import { createEntityStore, createEntityStoreFromEnv } from "./createEntityStore";
import { ConnectionError, InvalidArgumentError } from "./errors/errors";

class CarOwner {
  ownerId = 0;
  carId = 0;
}

beforeEach(() => {
  resetFakeServer();
});

describe("createEntityStore", () => {
  it("wires an initialized pool into the engine", async () => {
    const store = await createEntityStore({
      uri: "mongodb://localhost:27017/fleet",
      maxPoolSize: 2,
      naming: "lower",
      logLevel: "silent",
    });

    expect(store.pool.isConnected()).toBe(true);
    expect(store.pool.maxPoolSize).toBe(2);
    expect(store.config.onExhausted).toBe("wait");

    await store.engine.insert(Object.assign(new CarOwner(), { ownerId: 1, carId: 2 }));
    expect(storedDocs("fleet", "carowner")).toHaveLength(1);

    await store.close();
    expect(fakeServer.openClients).toBe(0);
  });

  it("rejects invalid config before connecting", async () => {
    await expect(createEntityStore({ uri: "localhost" })).rejects.toBeInstanceOf(
      InvalidArgumentError
    );
    expect(fakeServer.lastClientOptions).toBeUndefined();
  });

  it("surfaces an unreachable server as ConnectionError", async () => {
    fakeServer.unreachable = true;
    await expect(
      createEntityStore({ uri: "mongodb://localhost:27017/fleet", logLevel: "silent" })
    ).rejects.toBeInstanceOf(ConnectionError);
  });
});

describe("createEntityStoreFromEnv", () => {
  it("reads prefixed env and accepts a custom naming strategy", async () => {
    const store = await createEntityStoreFromEnv({
      prefix: "fleet",
      env: {
        FLEET_DB_URI: "mongodb://localhost:27017/fleet",
        FLEET_DB_ON_EXHAUSTED: "fail",
        LOG_LEVEL: "silent",
      },
      naming: (typeName) => `t_${typeName.toLowerCase()}`,
    });

    expect(store.config.onExhausted).toBe("fail");
    await store.engine.insert(new CarOwner());
    expect(storedDocs("fleet", "t_carowner")).toHaveLength(1);
    await store.close();
  });
});
