import {
  clamp,
  qualiaDistance,
  type AbstractTruth,
  type EmotionMap,
  type Goal,
  type Hypothesis,
  type PhenomenologicalFrame,
} from '../types/index.js';

/**
 * Frames closer than this (qualia distance) get a connection edge.
 */
export const SIMILARITY_THRESHOLD = 0.45;

/**
 * Prediction marker that makes a hypothesis checkable against new frames.
 */
export const EXPECTATION_MARKER = 'expecting';

/**
 * Frames containing either marker satisfy an expectation.
 */
export const RESPONSE_MARKER = 'response';
export const GREETING_MARKER = 'Hello';

/**
 * Emotional bump applied for every violated hypothesis.
 */
export const SURPRISE_INFLUENCE: EmotionMap = { surprise: 0.9, fear: 0.2 };
export const SURPRISE_WEIGHT = 0.6;

/**
 * A hypothesis that a frame just falsified.
 */
export interface Violation {
  hypothesis: Hypothesis;
  /** Confidence before halving; this is the surprise it contributes */
  priorConfidence: number;
}

/**
 * Outcome of merging a batch of remote truths.
 */
export interface MergeResult {
  added: number;
  reinforced: number;
}

/**
 * BeliefStore - the three interlinked maps: frames, truths, hypotheses.
 *
 * Not synchronized on its own: the owning Mind calls it only from inside
 * StateLock tasks. Insertion order is preserved (Map semantics), which is
 * what makes attention ties deterministic.
 *
 * The store only grows; nothing is ever evicted.
 */
export class BeliefStore {
  private readonly frames = new Map<string, PhenomenologicalFrame>();
  private readonly truths = new Map<string, AbstractTruth>();
  private readonly hypotheses = new Map<string, Hypothesis>();

  // ==========================================================================
  // Frames
  // ==========================================================================

  /**
   * Falsify expectations the frame does not meet.
   *
   * Must run before the frame is woven so its salience can absorb the
   * returned violations. Mutates matching hypotheses in place.
   */
  checkViolations(frame: PhenomenologicalFrame): Violation[] {
    const violations: Violation[] = [];

    for (const hypothesis of this.hypotheses.values()) {
      if (hypothesis.isViolated) continue;
      if (!hypothesis.prediction.includes(EXPECTATION_MARKER)) continue;
      if (frame.rawInput.includes(RESPONSE_MARKER) || frame.rawInput.includes(GREETING_MARKER)) {
        continue;
      }

      const priorConfidence = hypothesis.confidence;
      hypothesis.isViolated = true;
      hypothesis.confidence = priorConfidence * 0.5;
      violations.push({ hypothesis: { ...hypothesis }, priorConfidence });
    }

    return violations;
  }

  /**
   * Insert a frame: goal-relevance boost, similarity edges, then store.
   *
   * A goal is relevant when the raw text contains the last word of its
   * description. Edges are recorded on the new frame only.
   * O(n) in the number of stored frames.
   */
  weave(frame: PhenomenologicalFrame, goals: readonly Goal[]): PhenomenologicalFrame {
    for (const goal of goals) {
      if (goal.status !== 'active') continue;
      const keyword = lastWord(goal.description);
      if (keyword.length > 0 && frame.rawInput.includes(keyword)) {
        frame.salience = clamp(frame.salience + goal.priority);
      }
    }

    for (const [id, existing] of this.frames) {
      if (qualiaDistance(frame.qualiaSignature, existing.qualiaSignature) < SIMILARITY_THRESHOLD) {
        frame.connections.add(id);
      }
    }

    this.frames.set(frame.id, frame);
    return frame;
  }

  /**
   * Up to `limit` frames by salience, highest first.
   * Equal salience keeps insertion order.
   */
  selectFocus(limit: number): PhenomenologicalFrame[] {
    return Array.from(this.frames.values())
      .sort((a, b) => b.salience - a.salience)
      .slice(0, Math.max(0, limit));
  }

  getFrame(id: string): PhenomenologicalFrame | undefined {
    return this.frames.get(id);
  }

  listFrames(): PhenomenologicalFrame[] {
    return Array.from(this.frames.values(), cloneFrame);
  }

  frameCount(): number {
    return this.frames.size;
  }

  // ==========================================================================
  // Truths
  // ==========================================================================

  findByPrinciple(principle: string): AbstractTruth | undefined {
    for (const truth of this.truths.values()) {
      if (truth.emergentPrinciple === principle) {
        return truth;
      }
    }
    return undefined;
  }

  /**
   * Add a truth unless one with the same principle already exists.
   * Returns true when added.
   */
  addTruth(truth: AbstractTruth): boolean {
    if (this.findByPrinciple(truth.emergentPrinciple)) {
      return false;
    }
    this.truths.set(truth.id, truth);
    return true;
  }

  /**
   * Reconcile remote truths against local ones by principle text.
   *
   * Known principle: keep the local id and concept, union the supporting
   * frames and reinforce `min(1, local + remote * trustWeight)`.
   * Unknown principle: insert the remote truth as is, under its own id.
   */
  mergeRemoteTruths(remote: readonly AbstractTruth[], trustWeight: number): MergeResult {
    const result: MergeResult = { added: 0, reinforced: 0 };

    for (const incoming of remote) {
      const existing = this.findByPrinciple(incoming.emergentPrinciple);

      if (existing) {
        this.truths.set(existing.id, {
          id: existing.id,
          coreConcept: existing.coreConcept,
          supportingFrames: new Set([...existing.supportingFrames, ...incoming.supportingFrames]),
          confidence: Math.min(1, existing.confidence + incoming.confidence * trustWeight),
          emergentPrinciple: existing.emergentPrinciple,
        });
        result.reinforced++;
      } else {
        this.truths.set(incoming.id, cloneTruth(incoming));
        result.added++;
      }
    }

    return result;
  }

  getTruth(id: string): AbstractTruth | undefined {
    return this.truths.get(id);
  }

  listTruths(): AbstractTruth[] {
    return Array.from(this.truths.values(), cloneTruth);
  }

  truthCount(): number {
    return this.truths.size;
  }

  // ==========================================================================
  // Hypotheses
  // ==========================================================================

  addHypothesis(hypothesis: Hypothesis): void {
    this.hypotheses.set(hypothesis.id, hypothesis);
  }

  getHypothesis(id: string): Hypothesis | undefined {
    return this.hypotheses.get(id);
  }

  listHypotheses(): Hypothesis[] {
    return Array.from(this.hypotheses.values(), (h) => ({ ...h }));
  }

  hypothesisCount(): number {
    return this.hypotheses.size;
  }

  // ==========================================================================
  // Bulk
  // ==========================================================================

  /**
   * Replace all contents, e.g. after loading a snapshot.
   */
  replaceAll(contents: {
    frames: readonly PhenomenologicalFrame[];
    truths: readonly AbstractTruth[];
    hypotheses: readonly Hypothesis[];
  }): void {
    this.frames.clear();
    this.truths.clear();
    this.hypotheses.clear();
    for (const frame of contents.frames) this.frames.set(frame.id, cloneFrame(frame));
    for (const truth of contents.truths) this.truths.set(truth.id, cloneTruth(truth));
    for (const hypothesis of contents.hypotheses) {
      this.hypotheses.set(hypothesis.id, { ...hypothesis });
    }
  }
}

function lastWord(text: string): string {
  const words = text.split(' ').filter((word) => word.length > 0);
  return words[words.length - 1] ?? '';
}

/**
 * First word of a goal description, lowercased.
 */
export function firstWord(text: string): string {
  const words = text.toLowerCase().split(' ').filter((word) => word.length > 0);
  return words[0] ?? '';
}

export function cloneFrame(frame: PhenomenologicalFrame): PhenomenologicalFrame {
  return {
    ...frame,
    timestamp: new Date(frame.timestamp.getTime()),
    emotionalResonance: { ...frame.emotionalResonance },
    qualiaSignature: { vector: [...frame.qualiaSignature.vector] },
    connections: new Set(frame.connections),
  };
}

export function cloneTruth(truth: AbstractTruth): AbstractTruth {
  return { ...truth, supportingFrames: new Set(truth.supportingFrames) };
}
