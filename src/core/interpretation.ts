import type { EmotionMap } from '../types/index.js';

/**
 * Text heuristics applied to every raw observation.
 *
 * Interpretation and resonance run independently over the same text and
 * are not required to agree with each other.
 */

export const INTERPRETATIONS = {
  greeting: 'A greeting directed at me.',
  question: 'An explicit question seeking information.',
  failure: 'A reported malfunction or failure.',
} as const;

/**
 * Classify raw text. First match wins:
 * greeting, question, failure, then a verbatim data token.
 */
export function interpretRawInput(input: string): string {
  const lower = input.toLowerCase();

  if (lower.includes('hello') || input.includes("'Hello?'")) {
    return INTERPRETATIONS.greeting;
  }
  if (lower.includes('query') || input.includes('?')) {
    return INTERPRETATIONS.question;
  }
  if (lower.includes('error') || lower.includes('fail')) {
    return INTERPRETATIONS.failure;
  }
  return `A data token: '${input}'.`;
}

/**
 * Emotional resonance of raw text.
 *
 * Later cues overwrite earlier ones for the same emotion
 * (a greeting with a question mark ends at curiosity 0.9).
 */
export function inferEmotionalResonance(raw: string): EmotionMap {
  const result: EmotionMap = {};
  const lower = raw.toLowerCase();

  if (lower.includes('hello')) {
    result.curiosity = 0.7;
    result.awe = 0.1;
  }
  if (raw.includes('?')) {
    result.curiosity = 0.9;
  }
  if (lower.includes('error')) {
    result.fear = 0.6;
    result.surprise = 0.4;
  }
  if (Object.keys(result).length === 0) {
    result.curiosity = 0.4;
  }
  return result;
}
