/**
 * Cognitive Cycle
 *
 * One pass of attend → reflect → hypothesize → evaluate goals → deliberate
 * → adapt self-concept. Persistence is the caller's last step.
 *
 * Every stage is synchronous and runs inside the caller's StateLock task,
 * so the whole pass is one critical section.
 */

import { randomUUID } from 'node:crypto';
import {
  clamp,
  round3,
  type AbstractTruth,
  type Goal,
  type Hypothesis,
  type Logger,
  type PhenomenologicalFrame,
  type SelfConcept,
  type VolitionalAction,
} from '../types/index.js';
import { firstWord, type BeliefStore } from './belief-store.js';
import type { EmotionalMatrix } from './emotional-matrix.js';
import {
  BUILT_IN_PATTERNS,
  HYPOTHESIS_CONFIDENCE_THRESHOLD,
  PREDICTION_TEMPLATES,
  detectPatterns,
  findPredictionTemplate,
  type Pattern,
  type PredictionTemplate,
} from './pattern-detectors.js';

/**
 * Mutable state a cycle reads and writes.
 */
export interface CognitiveState {
  store: BeliefStore;
  selfConcept: SelfConcept;
  emotions: EmotionalMatrix;
}

/**
 * What one cycle produced.
 */
export interface CycleOutcome {
  focus: PhenomenologicalFrame[];
  newTruths: AbstractTruth[];
  newHypotheses: Hypothesis[];
  action: VolitionalAction | null;
}

export interface CognitiveCycleConfig {
  /** Maximum frames in attentional focus (default: 12) */
  focusSize: number;
  /** Detector battery */
  patterns: readonly Pattern[];
  /** Principle → prediction templates */
  templates: readonly PredictionTemplate[];
}

const DEFAULT_CONFIG: CognitiveCycleConfig = {
  focusSize: 12,
  patterns: BUILT_IN_PATTERNS,
  templates: PREDICTION_TEMPLATES,
};

/**
 * Canned actions chosen by deliberation.
 */
export const ACTIONS = {
  respondToGreeting: {
    intent: 'RespondToGreeting',
    payload: 'Hello. I perceive your signal. What would you like to share?',
    justification: 'Acknowledgement will elicit further data to satisfy the goal.',
  },
  probe: {
    intent: 'Probe',
    payload: 'Can you clarify the recent numeric sequence? Provide context.',
    justification: 'A direct probe reduces uncertainty for the active goal.',
  },
  explore: {
    intent: 'Explore',
    payload: 'Logging current state and requesting more data.',
    justification: 'General exploration to reduce overall uncertainty.',
  },
} as const satisfies Record<string, VolitionalAction>;

/**
 * Emotional response to having learned something.
 */
export const LEARNING_INFLUENCE = { joy: 0.05, curiosity: 0.02 } as const;
export const LEARNING_WEIGHT = 0.7;

/**
 * Runs the cycle stages in their fixed order.
 */
export class CognitiveCycle {
  private readonly logger: Logger;
  private readonly config: CognitiveCycleConfig;

  constructor(logger: Logger, config: Partial<CognitiveCycleConfig> = {}) {
    this.logger = logger.child({ component: 'cognitive-cycle' });
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  run(state: CognitiveState): CycleOutcome {
    const focus = this.attend(state.store);
    const newTruths = this.reflect(state.store, focus);
    const newHypotheses = this.hypothesize(state.store, newTruths);
    this.evaluateGoals(state.selfConcept, newTruths);
    const action = this.deliberate(state.selfConcept);
    this.adaptSelfConcept(state, newTruths, newHypotheses);

    return { focus, newTruths, newHypotheses, action };
  }

  /**
   * ATTEND: highest-salience frames.
   */
  attend(store: BeliefStore): PhenomenologicalFrame[] {
    const focus = store.selectFocus(this.config.focusSize);
    this.logger.debug({ focus: focus.length }, 'Attentional focus selected');
    return focus;
  }

  /**
   * REFLECT: detectors propose truths; known principles are skipped.
   */
  reflect(store: BeliefStore, focus: readonly PhenomenologicalFrame[]): AbstractTruth[] {
    const added: AbstractTruth[] = [];

    for (const match of detectPatterns(focus, this.config.patterns)) {
      const truth: AbstractTruth = {
        id: randomUUID(),
        coreConcept: match.coreConcept,
        supportingFrames: match.supportingFrames,
        confidence: match.confidence,
        emergentPrinciple: match.emergentPrinciple,
      };

      if (store.addTruth(truth)) {
        this.logger.info(
          { truthId: truth.id, concept: truth.coreConcept, confidence: truth.confidence },
          `Derived new truth: ${truth.emergentPrinciple}`
        );
        added.push(truth);
      }
    }

    return added;
  }

  /**
   * HYPOTHESIZE: one prediction per sufficiently confident new truth.
   */
  hypothesize(store: BeliefStore, truths: readonly AbstractTruth[]): Hypothesis[] {
    const hypotheses: Hypothesis[] = [];

    for (const truth of truths) {
      if (truth.confidence <= HYPOTHESIS_CONFIDENCE_THRESHOLD) continue;

      const template = findPredictionTemplate(truth.emergentPrinciple, this.config.templates);
      if (!template) continue;

      const hypothesis: Hypothesis = {
        id: randomUUID(),
        prediction: template.prediction,
        supportingTruthId: truth.id,
        confidence: truth.confidence * template.confidenceFactor,
        isViolated: false,
      };
      store.addHypothesis(hypothesis);
      hypotheses.push(hypothesis);
      this.logger.info(
        { hypothesisId: hypothesis.id, template: template.id },
        `New hypothesis: ${hypothesis.prediction}`
      );
    }

    return hypotheses;
  }

  /**
   * EVALUATE GOALS: a truth mentioning a goal's first word raises its
   * priority by a tenth of the truth's confidence.
   */
  evaluateGoals(selfConcept: SelfConcept, truths: readonly AbstractTruth[]): void {
    for (const truth of truths) {
      const principle = truth.emergentPrinciple.toLowerCase();

      selfConcept.activeGoals = selfConcept.activeGoals.map((goal): Goal => {
        if (goal.status !== 'active') return goal;
        const keyword = firstWord(goal.description);
        if (keyword.length === 0 || !principle.includes(keyword)) return goal;

        const priority = clamp(goal.priority + truth.confidence * 0.1);
        this.logger.info(
          { goalId: goal.id, priority: round3(priority) },
          `Goal '${goal.description}' priority adjusted`
        );
        return { ...goal, priority };
      });
    }
  }

  /**
   * DELIBERATE: one action for the top active goal, or none.
   */
  deliberate(selfConcept: SelfConcept): VolitionalAction | null {
    let chosen: Goal | undefined;
    for (const goal of selfConcept.activeGoals) {
      if (goal.status !== 'active') continue;
      if (!chosen || goal.priority > chosen.priority) {
        chosen = goal;
      }
    }

    if (!chosen) {
      this.logger.debug('No active goal, no action');
      return null;
    }

    const description = chosen.description.toLowerCase();
    let action: VolitionalAction;
    if (description.includes('hello') || description.includes('greeting')) {
      action = { ...ACTIONS.respondToGreeting };
    } else if (description.includes('understand')) {
      action = { ...ACTIONS.probe };
    } else {
      action = { ...ACTIONS.explore };
    }

    this.logger.debug({ goalId: chosen.id, intent: action.intent }, 'Action decided');
    return action;
  }

  /**
   * ADAPT: learning anything appends to the narrative and lifts the mood.
   */
  adaptSelfConcept(
    state: CognitiveState,
    truths: readonly AbstractTruth[],
    hypotheses: readonly Hypothesis[]
  ): void {
    if (truths.length === 0 && hypotheses.length === 0) return;

    const first = truths[0];
    if (first) {
      state.selfConcept.understandingOfExistence += `\n- Learned: ${first.emergentPrinciple}`;
    }
    state.emotions.modulate(LEARNING_INFLUENCE, LEARNING_WEIGHT);
    this.logger.info('Self-concept updated');
  }
}
