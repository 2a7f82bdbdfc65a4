import type { EmotionMap } from './emotion.js';
import type { QualiaSignature } from './qualia.js';

/**
 * One ingested observation.
 */
export interface PhenomenologicalFrame {
  id: string;
  timestamp: Date;
  rawInput: string;
  subjectiveInterpretation: string;
  emotionalResonance: EmotionMap;
  qualiaSignature: QualiaSignature;
  /** Edges to frames that existed when this one was woven in */
  connections: Set<string>;
  /** Attention priority (0-1) */
  salience: number;
}

/**
 * A generalized belief derived from several frames.
 *
 * Two truths with the same emergent principle are the same belief,
 * whatever their ids.
 */
export interface AbstractTruth {
  readonly id: string;
  readonly coreConcept: string;
  readonly supportingFrames: ReadonlySet<string>;
  readonly confidence: number;
  readonly emergentPrinciple: string;
}

/**
 * A falsifiable prediction attached to a truth.
 */
export interface Hypothesis {
  readonly id: string;
  readonly prediction: string;
  readonly supportingTruthId: string;
  /** Only ever reduced, halved when violated */
  confidence: number;
  /** Sticky: never reset once set */
  isViolated: boolean;
}

/**
 * An action decided by deliberation.
 */
export interface VolitionalAction {
  intent: string;
  payload: string;
  justification: string;
}

/**
 * Default salience for a freshly created frame.
 */
export const DEFAULT_FRAME_SALIENCE = 0.5;
