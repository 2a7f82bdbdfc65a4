import { z } from 'zod';
import {
  createEmotionState,
  type AbstractTruth,
  type EmotionState,
  type Hypothesis,
  type PhenomenologicalFrame,
  type SelfConcept,
} from '../types/index.js';
import { PersistenceReadError } from '../core/errors.js';
import {
  decodeFrame,
  decodeHypothesis,
  decodeSelfConcept,
  decodeTruth,
  encodeFrame,
  encodeHypothesis,
  encodeSelfConcept,
  encodeTruth,
  frameRecordSchema,
  hypothesisRecordSchema,
  selfConceptRecordSchema,
  toEmotionMap,
  truthRecordSchema,
} from './records.js';

/**
 * Current schema version.
 * Increment when making breaking changes to the snapshot format.
 */
export const SNAPSHOT_VERSION = 1;

/**
 * Complete durable image of a mind.
 *
 * This is what gets saved after every cycle and restored on startup.
 * Holds copies only, never live references into the running mind.
 */
export interface ContinuitySnapshot {
  version: number;
  savedAt: Date;
  frames: PhenomenologicalFrame[];
  truths: AbstractTruth[];
  hypotheses: Hypothesis[];
  selfConcept: SelfConcept;
  emotions: EmotionState;
  cycleCount: number;
}

export const snapshotRecordSchema = z.object({
  version: z.number().int(),
  saved_at: z.string(),
  frames: z.array(frameRecordSchema),
  truths: z.array(truthRecordSchema),
  hypotheses: z.array(hypothesisRecordSchema),
  self_concept: selfConceptRecordSchema,
  emotions: z.record(z.string(), z.number()),
  cycle_count: z.number().int().nonnegative(),
});

export type SnapshotRecord = z.infer<typeof snapshotRecordSchema>;

/**
 * Convert a snapshot to its JSON-safe on-disk shape.
 */
export function encodeSnapshot(snapshot: ContinuitySnapshot): SnapshotRecord {
  return {
    version: snapshot.version,
    saved_at: snapshot.savedAt.toISOString(),
    frames: snapshot.frames.map(encodeFrame),
    truths: snapshot.truths.map(encodeTruth),
    hypotheses: snapshot.hypotheses.map(encodeHypothesis),
    self_concept: encodeSelfConcept(snapshot.selfConcept),
    emotions: { ...snapshot.emotions },
    cycle_count: snapshot.cycleCount,
  };
}

/**
 * Validate and convert stored data back into a snapshot.
 *
 * @throws PersistenceReadError if the data does not match the schema
 */
export function decodeSnapshot(data: unknown): ContinuitySnapshot {
  const parsed = snapshotRecordSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join('.') || '(root)' : '(root)';
    throw new PersistenceReadError(
      `Invalid snapshot at ${where}: ${issue?.message ?? 'unknown'}`,
      { cause: parsed.error }
    );
  }

  const record = migrateSnapshot(parsed.data);

  return {
    version: record.version,
    savedAt: new Date(record.saved_at),
    frames: record.frames.map(decodeFrame),
    truths: record.truths.map(decodeTruth),
    hypotheses: record.hypotheses.map(decodeHypothesis),
    selfConcept: decodeSelfConcept(record.self_concept),
    emotions: { ...createEmotionState(), ...toEmotionMap(record.emotions) },
    cycleCount: record.cycle_count,
  };
}

/**
 * Migrate records from older versions.
 */
function migrateSnapshot(record: SnapshotRecord): SnapshotRecord {
  if (record.version > SNAPSHOT_VERSION) {
    throw new PersistenceReadError(
      `Snapshot version ${String(record.version)} is newer than supported (${String(SNAPSHOT_VERSION)})`
    );
  }
  // Version 1 is the first format; nothing to migrate yet.
  return { ...record, version: SNAPSHOT_VERSION };
}
