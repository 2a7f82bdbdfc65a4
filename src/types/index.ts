/**
 * Core type definitions for the mind.
 */

export type * from './emotion.js';
export type * from './qualia.js';
export type * from './cognition.js';
export type * from './logger.js';
export type * from './agent/index.js';

export { EMOTIONS, DEFAULT_EMOTION_INTENSITY, isEmotion, createEmotionState } from './emotion.js';
export {
  QUALIA_RANDOM_COMPONENTS,
  qualiaDistance,
  generateQualiaSignature,
  byteChecksum,
  qualiaSeed,
  lcgNext,
} from './qualia.js';
export { DEFAULT_FRAME_SALIENCE } from './cognition.js';
export { GOAL_STATUSES, cloneSelfConcept } from './agent/index.js';

/**
 * Clamp a value to [min, max] (default 0-1).
 */
export function clamp(value: number, min = 0, max = 1): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Round a number to 3 decimal places.
 * Use for logging to avoid noise like 0.30000000000000004.
 */
export function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}
