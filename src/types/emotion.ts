/**
 * Emotion vocabulary shared by frames, the emotional matrix and snapshots.
 */

/**
 * Canonical emotion order. Qualia vectors and persisted maps use this order.
 */
export const EMOTIONS = [
  'joy',
  'sadness',
  'fear',
  'anger',
  'surprise',
  'disgust',
  'curiosity',
  'awe',
] as const;

export type Emotion = (typeof EMOTIONS)[number];

/**
 * Sparse emotion map. Absent emotions are "not influenced".
 */
export type EmotionMap = Partial<Record<Emotion, number>>;

/**
 * Dense emotion map with every emotion present.
 */
export type EmotionState = Record<Emotion, number>;

/**
 * Intensity every emotion starts at.
 */
export const DEFAULT_EMOTION_INTENSITY = 0.5;

export function isEmotion(value: string): value is Emotion {
  return EMOTIONS.some((emotion) => emotion === value);
}

/**
 * Create a dense state with every emotion at the given intensity.
 */
export function createEmotionState(intensity = DEFAULT_EMOTION_INTENSITY): EmotionState {
  return {
    joy: intensity,
    sadness: intensity,
    fear: intensity,
    anger: intensity,
    surprise: intensity,
    disgust: intensity,
    curiosity: intensity,
    awe: intensity,
  };
}
