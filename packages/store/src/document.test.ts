import { describe, it, expect } from "vitest";
import {
  decodeDocument,
  filterRecords,
  insertRecord,
  mergeRecord,
  parseDocument,
  removeRecord,
  serializeDocument,
} from "./document.js";
import { DuplicateNameError, MalformedDataError, NotFoundError } from "./errors.js";
import type { CatalogRecord } from "./record.js";

const records: CatalogRecord[] = [
  { name: "Virtual Machines", category: "Compute", description: "On-demand servers" },
  { name: "Blob Storage", category: "Storage", description: "Object storage for files" },
  { name: "Functions", category: "compute", description: "Event-driven code" },
];

describe("document codec", () => {
  describe("parseDocument()", () => {
    it("should read the keyed document format", () => {
      const raw = JSON.stringify({ services: [records[0]] });
      expect(parseDocument(raw, "mem")).toEqual([records[0]]);
    });

    it("should read a bare array", () => {
      const raw = JSON.stringify(records);
      expect(parseDocument(raw, "mem")).toEqual(records);
    });

    it("should read an empty collection", () => {
      expect(parseDocument('{"services": []}', "mem")).toEqual([]);
    });

    it("should reject invalid JSON", () => {
      expect(() => parseDocument("{not json", "/tmp/catalog.json")).toThrow(MalformedDataError);
      expect(() => parseDocument("{not json", "/tmp/catalog.json")).toThrow(
        /^Malformed catalog document at \/tmp\/catalog\.json: invalid JSON/
      );
    });

    it("should reject a record missing a field", () => {
      const raw = JSON.stringify({ services: [{ name: "X", category: "C" }] });
      expect(() => parseDocument(raw, "mem")).toThrow(MalformedDataError);
    });

    it("should reject the wrong top-level key", () => {
      const raw = JSON.stringify({ items: records });
      expect(() => parseDocument(raw, "mem")).toThrow(MalformedDataError);
    });

    it("should reject duplicate names", () => {
      const raw = JSON.stringify({ services: [records[0], records[0]] });
      expect(() => parseDocument(raw, "mem")).toThrow(
        'Malformed catalog document at mem: duplicate record name "Virtual Machines"'
      );
    });
  });

  describe("decodeDocument()", () => {
    it("should validate in-memory data", () => {
      expect(decodeDocument({ services: records }, "seed")).toEqual(records);
      expect(() => decodeDocument(42, "seed")).toThrow(MalformedDataError);
    });
  });

  describe("serializeDocument()", () => {
    it("should write two-space JSON with a trailing newline", () => {
      const text = serializeDocument(records.slice(0, 1));
      expect(text).toBe(
        [
          "{",
          '  "services": [',
          "    {",
          '      "name": "Virtual Machines",',
          '      "category": "Compute",',
          '      "description": "On-demand servers"',
          "    }",
          "  ]",
          "}",
          "",
        ].join("\n")
      );
    });

    it("should round-trip through parseDocument", () => {
      expect(parseDocument(serializeDocument(records), "mem")).toEqual(records);
    });
  });

  describe("mutations", () => {
    it("should append on insert without touching the input", () => {
      const record = { name: "Queue", category: "Messaging", description: "Queues" };
      const next = insertRecord(records, record);

      expect(next.map((r) => r.name)).toEqual([
        "Virtual Machines",
        "Blob Storage",
        "Functions",
        "Queue",
      ]);
      expect(records).toHaveLength(3);
    });

    it("should reject an insert with a taken name", () => {
      const duplicate = { name: "Blob Storage", category: "Other", description: "Copy" };
      expect(() => insertRecord(records, duplicate)).toThrow(DuplicateNameError);
    });

    it("should treat names that differ only in case as distinct", () => {
      const next = insertRecord(records, { name: "functions", category: "C", description: "D" });
      expect(next).toHaveLength(4);
    });

    it("should merge an update in place", () => {
      const { records: next, record } = mergeRecord(records, "Blob Storage", {
        description: "Updated",
      });

      expect(record).toEqual({ name: "Blob Storage", category: "Storage", description: "Updated" });
      expect(next[1]).toEqual(record);
      expect(records[1]?.description).toBe("Object storage for files");
    });

    it("should reject an update for a missing name", () => {
      expect(() => mergeRecord(records, "Nope", { category: "X" })).toThrow(NotFoundError);
    });

    it("should remove by name", () => {
      expect(removeRecord(records, "Blob Storage").map((r) => r.name)).toEqual([
        "Virtual Machines",
        "Functions",
      ]);
    });

    it("should reject a removal for a missing name", () => {
      expect(() => removeRecord(records, "blob storage")).toThrow("Record not found: blob storage");
    });
  });

  describe("filterRecords()", () => {
    it("should return everything without a filter", () => {
      expect(filterRecords(records)).toEqual(records);
    });

    it("should match category case-insensitively", () => {
      expect(filterRecords(records, { category: "COMPUTE" }).map((r) => r.name)).toEqual([
        "Virtual Machines",
        "Functions",
      ]);
    });

    it("should not match a partial category", () => {
      expect(filterRecords(records, { category: "Comp" })).toEqual([]);
    });

    it("should search names and descriptions", () => {
      expect(filterRecords(records, { search: "storage" }).map((r) => r.name)).toEqual([
        "Blob Storage",
      ]);
      expect(filterRecords(records, { search: "event" }).map((r) => r.name)).toEqual([
        "Functions",
      ]);
    });

    it("should combine category and search", () => {
      expect(filterRecords(records, { category: "compute", search: "server" })).toEqual([
        records[0],
      ]);
    });
  });
});
