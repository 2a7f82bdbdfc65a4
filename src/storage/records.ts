/**
 * Serialized record shapes shared by snapshots and peer envelopes.
 *
 * In-memory types use camelCase, Sets and Dates; records use snake_case,
 * arrays and ISO-8601 strings. Zod schemas validate anything read back.
 */

import { z } from 'zod';
import {
  GOAL_STATUSES,
  isEmotion,
  type AbstractTruth,
  type EmotionMap,
  type Goal,
  type Hypothesis,
  type PhenomenologicalFrame,
  type SelfConcept,
} from '../types/index.js';

export const isoTimestamp = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), { message: 'Invalid ISO-8601 timestamp' });

const emotionMapSchema = z.record(z.string(), z.number());

export const frameRecordSchema = z.object({
  id: z.string(),
  timestamp: isoTimestamp,
  raw_input: z.string(),
  subjective_interpretation: z.string(),
  emotional_resonance: emotionMapSchema,
  qualia_signature: z.array(z.number()),
  connections: z.array(z.string()),
  salience: z.number(),
});

export const truthRecordSchema = z.object({
  id: z.string(),
  core_concept: z.string(),
  supporting_frames: z.array(z.string()),
  confidence: z.number(),
  emergent_principle: z.string(),
});

export const hypothesisRecordSchema = z.object({
  id: z.string(),
  prediction: z.string(),
  supporting_truth_id: z.string(),
  confidence: z.number(),
  is_violated: z.boolean(),
});

export const goalRecordSchema = z.object({
  id: z.string(),
  description: z.string(),
  priority: z.number(),
  status: z.enum(GOAL_STATUSES),
});

export const selfConceptRecordSchema = z.object({
  identity: z.string(),
  core_values: z.array(z.string()),
  perceived_limitations: z.array(z.string()),
  understanding_of_existence: z.string(),
  active_goals: z.array(goalRecordSchema),
});

export type FrameRecord = z.infer<typeof frameRecordSchema>;
export type TruthRecord = z.infer<typeof truthRecordSchema>;
export type HypothesisRecord = z.infer<typeof hypothesisRecordSchema>;
export type GoalRecord = z.infer<typeof goalRecordSchema>;
export type SelfConceptRecord = z.infer<typeof selfConceptRecordSchema>;

/**
 * Keep only known emotion keys.
 */
export function toEmotionMap(record: Record<string, number>): EmotionMap {
  const result: EmotionMap = {};
  for (const [key, value] of Object.entries(record)) {
    if (isEmotion(key)) {
      result[key] = value;
    }
  }
  return result;
}

// =============================================================================
// Frames
// =============================================================================

export function encodeFrame(frame: PhenomenologicalFrame): FrameRecord {
  return {
    id: frame.id,
    timestamp: frame.timestamp.toISOString(),
    raw_input: frame.rawInput,
    subjective_interpretation: frame.subjectiveInterpretation,
    emotional_resonance: { ...frame.emotionalResonance },
    qualia_signature: [...frame.qualiaSignature.vector],
    connections: [...frame.connections],
    salience: frame.salience,
  };
}

export function decodeFrame(record: FrameRecord): PhenomenologicalFrame {
  return {
    id: record.id,
    timestamp: new Date(record.timestamp),
    rawInput: record.raw_input,
    subjectiveInterpretation: record.subjective_interpretation,
    emotionalResonance: toEmotionMap(record.emotional_resonance),
    qualiaSignature: { vector: [...record.qualia_signature] },
    connections: new Set(record.connections),
    salience: record.salience,
  };
}

// =============================================================================
// Truths & hypotheses
// =============================================================================

export function encodeTruth(truth: AbstractTruth): TruthRecord {
  return {
    id: truth.id,
    core_concept: truth.coreConcept,
    supporting_frames: [...truth.supportingFrames],
    confidence: truth.confidence,
    emergent_principle: truth.emergentPrinciple,
  };
}

export function decodeTruth(record: TruthRecord): AbstractTruth {
  return {
    id: record.id,
    coreConcept: record.core_concept,
    supportingFrames: new Set(record.supporting_frames),
    confidence: record.confidence,
    emergentPrinciple: record.emergent_principle,
  };
}

export function encodeHypothesis(hypothesis: Hypothesis): HypothesisRecord {
  return {
    id: hypothesis.id,
    prediction: hypothesis.prediction,
    supporting_truth_id: hypothesis.supportingTruthId,
    confidence: hypothesis.confidence,
    is_violated: hypothesis.isViolated,
  };
}

export function decodeHypothesis(record: HypothesisRecord): Hypothesis {
  return {
    id: record.id,
    prediction: record.prediction,
    supportingTruthId: record.supporting_truth_id,
    confidence: record.confidence,
    isViolated: record.is_violated,
  };
}

// =============================================================================
// Self-concept
// =============================================================================

export function encodeSelfConcept(concept: SelfConcept): SelfConceptRecord {
  return {
    identity: concept.identity,
    core_values: [...concept.coreValues],
    perceived_limitations: [...concept.perceivedLimitations],
    understanding_of_existence: concept.understandingOfExistence,
    active_goals: concept.activeGoals.map((goal) => ({ ...goal })),
  };
}

export function decodeSelfConcept(record: SelfConceptRecord): SelfConcept {
  return {
    identity: record.identity,
    coreValues: new Set(record.core_values),
    perceivedLimitations: new Set(record.perceived_limitations),
    understandingOfExistence: record.understanding_of_existence,
    activeGoals: record.active_goals.map(decodeGoal),
  };
}

function decodeGoal(record: GoalRecord): Goal {
  return {
    id: record.id,
    description: record.description,
    priority: record.priority,
    status: record.status,
  };
}
