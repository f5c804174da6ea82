/**
 * Test helpers for the service catalog packages
 */

export { createTempDir, removeDir } from "./fs.js";
export { sleep } from "./timers.js";
export {
  MemoryObjectStore,
  type FailingOperation,
  type MemoryObjectStoreOptions,
} from "./memory-object-store.js";
export { SEED_RECORDS, sampleRecord } from "./fixtures.js";
export { describeStoreContract, type HarnessFactory, type StoreHarness } from "./store-contract.js";
