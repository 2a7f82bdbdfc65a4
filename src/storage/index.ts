/**
 * Storage module exports.
 */

export type { Storage } from './storage.js';
export type { JSONStorageConfig } from './json-storage.js';
export { JSONStorage, createJSONStorage } from './json-storage.js';
export type { ContinuitySnapshot, SnapshotRecord } from './snapshot.js';
export { SNAPSHOT_VERSION, encodeSnapshot, decodeSnapshot } from './snapshot.js';
export type { ContinuityStore, JsonContinuityStoreConfig } from './continuity-store.js';
export {
  JsonContinuityStore,
  createContinuityStore,
  continuityKey,
} from './continuity-store.js';
export type { TruthRecord } from './records.js';
export { encodeTruth, decodeTruth, truthRecordSchema } from './records.js';
