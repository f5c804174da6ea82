import { describe, it, expect } from "vitest";
import {
  describeStoreContract,
  MemoryObjectStore,
  SEED_RECORDS,
} from "@service-catalog/testkit";
import { MalformedDataError, UnavailableError } from "../errors.js";
import { staticSeed } from "../seed.js";
import { RemoteCatalogStore } from "./remote.js";

const KEY = "services.json";

describeStoreContract("RemoteCatalogStore", async (seed) => {
  const objectStore = new MemoryObjectStore({ latencyMs: 1 });
  return {
    store: new RemoteCatalogStore({ objectStore, key: KEY, seed }),
    readRaw: async () => objectStore.getRaw(KEY) ?? null,
    writeRaw: async (content) => objectStore.setRaw(KEY, content),
  };
});

describe("RemoteCatalogStore", () => {
  function setup(): { objectStore: MemoryObjectStore; store: RemoteCatalogStore } {
    const objectStore = new MemoryObjectStore({ bucket: "catalog" });
    const store = new RemoteCatalogStore({
      objectStore,
      key: KEY,
      seed: staticSeed(SEED_RECORDS),
    });
    return { objectStore, store };
  }

  it("should describe itself by object URL", () => {
    const { store } = setup();
    expect(store.describe()).toEqual({
      backend: "remote",
      location: "memory://catalog/services.json",
    });
  });

  it("should upload the seed exactly once", async () => {
    const { objectStore, store } = setup();

    await store.list();
    await store.list();

    expect(objectStore.puts).toBe(1);
    expect(objectStore.gets).toBe(3);
  });

  it("should write the whole document once per mutation", async () => {
    const { objectStore, store } = setup();
    await store.list();

    await store.create({ name: "B", category: "C2", description: "D2" });
    await store.update("B", { category: "C3" });
    await store.delete("A");

    expect(objectStore.puts).toBe(4);
    expect(JSON.parse(objectStore.getRaw(KEY) ?? "null")).toEqual({
      services: [{ name: "B", category: "C3", description: "D2" }],
    });
  });

  it("should surface read failures as Unavailable with the cause", async () => {
    const { objectStore, store } = setup();
    const failure = new Error("connect ECONNREFUSED");
    objectStore.failWith(failure);

    try {
      await store.list();
      expect.unreachable("list should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(UnavailableError);
      if (err instanceof UnavailableError) {
        expect(err.code).toBe("E_UNAVAILABLE");
        expect(err.message).toBe(
          "Catalog storage unavailable (read): memory://catalog/services.json"
        );
        expect(err.cause).toBe(failure);
      }
    }
  });

  it("should not retry a failed call", async () => {
    const { objectStore, store } = setup();
    objectStore.failWith(new Error("timeout"));

    await expect(store.get("A")).rejects.toThrow(UnavailableError);

    objectStore.failWith(null);
    expect(objectStore.gets).toBe(0);
    expect(await store.get("A")).toEqual({ name: "A", category: "C1", description: "D1" });
  });

  it("should keep the document when a write fails", async () => {
    const { objectStore, store } = setup();
    await store.list();
    const before = objectStore.getRaw(KEY);

    objectStore.failWith(new Error("access denied"), "put");
    await expect(
      store.create({ name: "B", category: "C2", description: "D2" })
    ).rejects.toThrow("Catalog storage unavailable (write): memory://catalog/services.json");

    expect(objectStore.getRaw(KEY)).toBe(before);
  });

  it("should not rewrite a malformed object", async () => {
    const { objectStore, store } = setup();
    objectStore.setRaw(KEY, '{"services": "nope"}');

    await expect(store.list()).rejects.toThrow(MalformedDataError);
    expect(objectStore.puts).toBe(0);
    expect(objectStore.getRaw(KEY)).toBe('{"services": "nope"}');
  });
});
