/**
 * Seed datasets used to create a missing catalog document
 */

import { fileURLToPath } from "node:url";
import type { SeedLoader } from "./contract.js";
import { decodeDocument, parseDocument } from "./document.js";
import { UnavailableError } from "./errors.js";
import { readFileIfExists } from "./io.js";
import type { CatalogRecord } from "./record.js";

/**
 * Dataset bundled with the package
 */
export const DEFAULT_SEED_PATH = fileURLToPath(new URL("../data/services.json", import.meta.url));

/**
 * Seed from a document file (same format as the catalog document).
 * The file is read each time the loader runs, which is at most once per
 * missing document.
 */
export function fileSeed(filePath: string): SeedLoader {
  return async () => {
    const raw = await readFileIfExists(filePath);
    if (raw === null) {
      throw new UnavailableError(filePath, "read", {
        cause: new Error("seed dataset file does not exist"),
      });
    }
    return parseDocument(raw, filePath);
  };
}

/**
 * Seed from records held in memory
 * @throws MalformedDataError immediately if the records are incomplete or repeat a name
 */
export function staticSeed(records: readonly CatalogRecord[]): SeedLoader {
  const validated = decodeDocument(records, "inline seed");
  return async () => validated.map((record) => ({ ...record }));
}

export const loadDefaultSeed: SeedLoader = fileSeed(DEFAULT_SEED_PATH);
