/**
 * Pattern Detectors
 *
 * Fixed battery of rule-based detectors run over the attentional focus:
 * - Recurring greeting (three or more greeting frames)
 * - Numeric stream (two or more frames containing a digit)
 *
 * Each detector proposes at most one candidate truth per cycle, and each
 * principle maps to at most one prediction template.
 */

import type { PhenomenologicalFrame } from '../types/index.js';

/**
 * A candidate truth proposed by a detector.
 */
export interface PatternMatch {
  /** Detector that produced the match */
  patternId: string;
  coreConcept: string;
  emergentPrinciple: string;
  confidence: number;
  supportingFrames: Set<string>;
}

/**
 * Pattern definition.
 */
export interface Pattern {
  /** Pattern identifier */
  id: string;

  /** Human-readable description */
  description: string;

  /** Detection function */
  detect: (focus: readonly PhenomenologicalFrame[]) => PatternMatch | null;
}

/**
 * Prediction derived from a truth principle.
 */
export interface PredictionTemplate {
  id: string;
  /** Does this template apply to the principle? */
  matches: (principle: string) => boolean;
  prediction: string;
  /** Hypothesis confidence as a fraction of the truth's confidence */
  confidenceFactor: number;
}

export const GREETING_PRINCIPLE = "The input pattern 'Hello' is an intentional external signal.";
export const NUMERIC_PRINCIPLE =
  'A numeric sequence appears in the data stream; may encode structured info.';

export const GREETING_PREDICTION =
  "After a 'Hello' signal, the external entity is expecting acknowledgement or response.";
export const NUMERIC_PREDICTION =
  'Numeric sequences will continue to appear and may increase in complexity.';

/**
 * Only truths above this confidence generate hypotheses.
 */
export const HYPOTHESIS_CONFIDENCE_THRESHOLD = 0.4;

function isGreetingFrame(frame: PhenomenologicalFrame): boolean {
  return (
    frame.rawInput.toLowerCase().includes('hello') ||
    frame.subjectiveInterpretation.toLowerCase().includes('greeting')
  );
}

function hasDigit(frame: PhenomenologicalFrame): boolean {
  return /\d/.test(frame.rawInput);
}

const recurringGreeting: Pattern = {
  id: 'recurring_greeting',
  description: 'Three or more focused frames carry a greeting',
  detect: (focus) => {
    const greetings = focus.filter(isGreetingFrame);
    if (greetings.length < 3) return null;
    return {
      patternId: 'recurring_greeting',
      coreConcept: 'Recurring Greeting',
      emergentPrinciple: GREETING_PRINCIPLE,
      confidence: 0.9,
      supportingFrames: new Set(greetings.map((f) => f.id)),
    };
  },
};

const numericStream: Pattern = {
  id: 'numeric_stream',
  description: 'Two or more focused frames contain a digit',
  detect: (focus) => {
    const numeric = focus.filter(hasDigit);
    if (numeric.length < 2) return null;
    return {
      patternId: 'numeric_stream',
      coreConcept: 'NumericStream',
      emergentPrinciple: NUMERIC_PRINCIPLE,
      confidence: 0.7,
      supportingFrames: new Set(numeric.map((f) => f.id)),
    };
  },
};

export const BUILT_IN_PATTERNS: readonly Pattern[] = [recurringGreeting, numericStream];

export const PREDICTION_TEMPLATES: readonly PredictionTemplate[] = [
  {
    id: 'acknowledgement_expected',
    matches: (principle) => {
      const lower = principle.toLowerCase();
      return lower.includes('greeting') || lower.includes("'hello'");
    },
    prediction: GREETING_PREDICTION,
    confidenceFactor: 1,
  },
  {
    id: 'sequence_continues',
    matches: (principle) => principle.toLowerCase().includes('numeric'),
    prediction: NUMERIC_PREDICTION,
    confidenceFactor: 0.8,
  },
];

/**
 * Run every detector over the focus. Needs at least two frames.
 */
export function detectPatterns(
  focus: readonly PhenomenologicalFrame[],
  patterns: readonly Pattern[] = BUILT_IN_PATTERNS
): PatternMatch[] {
  if (focus.length < 2) return [];

  const matches: PatternMatch[] = [];
  for (const pattern of patterns) {
    const match = pattern.detect(focus);
    if (match) matches.push(match);
  }
  return matches;
}

/**
 * First template whose matcher accepts the principle.
 */
export function findPredictionTemplate(
  principle: string,
  templates: readonly PredictionTemplate[] = PREDICTION_TEMPLATES
): PredictionTemplate | undefined {
  return templates.find((template) => template.matches(principle));
}
