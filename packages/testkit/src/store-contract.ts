/**
 * Behavioral suite every CatalogStore adapter must pass
 */

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  DuplicateNameError,
  MalformedDataError,
  NotFoundError,
  ValidationError,
  staticSeed,
  type CatalogStore,
  type SeedLoader,
} from "@service-catalog/store";
import { SEED_RECORDS, sampleRecord } from "./fixtures.js";

export interface StoreHarness {
  store: CatalogStore;
  /** Current persisted document, or null if absent */
  readRaw(): Promise<string | null>;
  /** Replace the persisted document out-of-band */
  writeRaw(content: string): Promise<void>;
  dispose?(): Promise<void>;
}

export type HarnessFactory = (seed: SeedLoader) => Promise<StoreHarness>;

export function describeStoreContract(label: string, createHarness: HarnessFactory): void {
  describe(`${label} contract`, () => {
    let harness: StoreHarness;
    let store: CatalogStore;

    beforeEach(async () => {
      harness = await createHarness(staticSeed(SEED_RECORDS));
      store = harness.store;
    });

    afterEach(async () => {
      await harness.dispose?.();
    });

    it("should seed a missing document on first list", async () => {
      expect(await harness.readRaw()).toBeNull();

      expect(await store.list()).toEqual([{ name: "A", category: "C1", description: "D1" }]);

      const raw = await harness.readRaw();
      expect(raw).not.toBeNull();
      expect(JSON.parse(raw ?? "null")).toEqual({
        services: [{ name: "A", category: "C1", description: "D1" }],
      });
    });

    it("should seed a missing document on first get", async () => {
      expect(await store.get("A")).toEqual({ name: "A", category: "C1", description: "D1" });
    });

    it("should create and read back a record", async () => {
      const created = await store.create({ name: "B", category: "C2", description: "D2" });

      expect(created).toEqual({ name: "B", category: "C2", description: "D2" });
      expect(await store.get("B")).toEqual({ name: "B", category: "C2", description: "D2" });
      expect((await store.list()).map((r) => r.name)).toEqual(["A", "B"]);
    });

    it("should reject a duplicate name and keep the collection unchanged", async () => {
      await store.create({ name: "B", category: "C2", description: "D2" });

      await expect(
        store.create({ name: "B", category: "Other", description: "Other" })
      ).rejects.toThrow(DuplicateNameError);

      expect(await store.list()).toHaveLength(2);
      expect(await store.get("B")).toEqual({ name: "B", category: "C2", description: "D2" });
    });

    it("should update description and keep category", async () => {
      await store.create({ name: "B", category: "C2", description: "D2" });

      const updated = await store.update("B", { description: "D2b" });

      expect(updated).toEqual({ name: "B", category: "C2", description: "D2b" });
      expect(await store.get("B")).toEqual({ name: "B", category: "C2", description: "D2b" });
    });

    it("should keep list order after an update", async () => {
      await store.create({ name: "B", category: "C2", description: "D2" });
      await store.update("A", { category: "C9" });

      expect(await store.list()).toEqual([
        { name: "A", category: "C9", description: "D1" },
        { name: "B", category: "C2", description: "D2" },
      ]);
    });

    it("should delete a record", async () => {
      await store.create({ name: "B", category: "C2", description: "D2" });
      await store.delete("B");

      await expect(store.get("B")).rejects.toThrow(NotFoundError);
      expect((await store.list()).map((r) => r.name)).toEqual(["A"]);
    });

    it("should report NotFound for an absent name and leave the collection unchanged", async () => {
      await store.list();
      const before = await harness.readRaw();

      await expect(store.delete("Z")).rejects.toThrow(NotFoundError);
      await expect(store.update("Z", { category: "C" })).rejects.toThrow(NotFoundError);
      await expect(store.get("Z")).rejects.toThrow("Record not found: Z");

      expect(await harness.readRaw()).toBe(before);
    });

    it("should match names case-sensitively", async () => {
      await expect(store.get("a")).rejects.toThrow(NotFoundError);
    });

    it("should reject invalid records before touching storage", async () => {
      await expect(store.create({ name: "B", category: "", description: "D2" })).rejects.toThrow(
        ValidationError
      );
      expect(await harness.readRaw()).toBeNull();
    });

    it("should reject an update that renames the record", async () => {
      await store.list();
      const before = await harness.readRaw();

      const fields = { description: "D1b", name: "Renamed" };
      await expect(store.update("A", fields)).rejects.toThrow(ValidationError);

      expect(await harness.readRaw()).toBe(before);
    });

    it("should return copies that do not alias stored records", async () => {
      const [first] = await store.list();
      if (first) {
        first.description = "mutated";
      }

      expect((await store.get("A")).description).toBe("D1");
    });

    it("should filter the listing", async () => {
      await store.create({ name: "B", category: "C2", description: "Second record" });
      await store.create({ name: "C", category: "c2", description: "Third" });

      expect((await store.list({ category: "C2" })).map((r) => r.name)).toEqual(["B", "C"]);
      expect((await store.list({ search: "second" })).map((r) => r.name)).toEqual(["B"]);
    });

    it("should raise MalformedData for a corrupt document and leave it untouched", async () => {
      await harness.writeRaw("{not json");

      await expect(store.list()).rejects.toThrow(MalformedDataError);
      await expect(
        store.create({ name: "B", category: "C2", description: "D2" })
      ).rejects.toThrow(MalformedDataError);

      expect(await harness.readRaw()).toBe("{not json");
    });

    it("should raise MalformedData for a document with an incomplete record", async () => {
      await harness.writeRaw(JSON.stringify({ services: [{ name: "A", category: "C1" }] }));

      await expect(store.get("A")).rejects.toThrow(MalformedDataError);
    });

    it("should accept a legacy bare-array document and rewrite it keyed", async () => {
      await harness.writeRaw(JSON.stringify([{ name: "L", category: "Legacy", description: "Old" }]));

      expect(await store.list()).toEqual([{ name: "L", category: "Legacy", description: "Old" }]);

      await store.create({ name: "B", category: "C2", description: "D2" });
      expect(JSON.parse((await harness.readRaw()) ?? "null")).toEqual({
        services: [
          { name: "L", category: "Legacy", description: "Old" },
          { name: "B", category: "C2", description: "D2" },
        ],
      });
    });

    it(
      "should keep every record from 50 concurrent creates",
      async () => {
        const initial = (await store.list()).length;
        const names = Array.from({ length: 50 }, (_, i) => `S${i}`);

        await Promise.all(
          names.map((name) => store.create(sampleRecord(name, { category: "Load" })))
        );

        const listed = (await store.list()).map((r) => r.name);
        expect(listed).toHaveLength(initial + 50);
        for (const name of names) {
          expect(listed.filter((n) => n === name)).toHaveLength(1);
        }
      },
      30_000
    );

    it("should let exactly one of two concurrent duplicate creates succeed", async () => {
      const results = await Promise.allSettled([
        store.create({ name: "Twin", category: "C", description: "first" }),
        store.create({ name: "Twin", category: "C", description: "second" }),
      ]);

      const fulfilled = results.filter((r) => r.status === "fulfilled");
      const rejected = results.filter(
        (r): r is PromiseRejectedResult => r.status === "rejected"
      );
      expect(fulfilled).toHaveLength(1);
      expect(rejected).toHaveLength(1);
      expect(rejected[0]?.reason).toBeInstanceOf(DuplicateNameError);

      const twins = (await store.list()).filter((r) => r.name === "Twin");
      expect(twins).toHaveLength(1);
    });

    it("should seed once when the first calls race", async () => {
      const [listed] = await Promise.all([
        store.list(),
        store.create({ name: "B", category: "C2", description: "D2" }),
      ]);

      expect(listed.map((r) => r.name)[0]).toBe("A");
      expect((await store.list()).map((r) => r.name)).toEqual(["A", "B"]);
    });
  });
}
