/**
 * Sample records for catalog tests
 */

import type { CatalogRecord } from "@service-catalog/store";

export const SEED_RECORDS: readonly CatalogRecord[] = [
  { name: "A", category: "C1", description: "D1" },
];

export function sampleRecord(name: string, overrides: Partial<CatalogRecord> = {}): CatalogRecord {
  return {
    name,
    category: "Testing",
    description: `Sample service ${name}`,
    ...overrides,
  };
}
