import {
  EMOTIONS,
  clamp,
  createEmotionState,
  type EmotionMap,
  type EmotionState,
} from '../types/index.js';

/**
 * Current affect: every emotion has an intensity in [0, 1].
 */
export class EmotionalMatrix {
  private state: EmotionState;

  constructor(initial?: Partial<EmotionState>) {
    this.state = createEmotionState();
    if (initial) {
      this.restore(initial);
    }
  }

  /**
   * Weighted blend: `new = clamp(old + influence * weight)`.
   * Emotions missing from the influence map are left alone.
   */
  modulate(influence: EmotionMap, weight: number): void {
    for (const emotion of EMOTIONS) {
      const value = influence[emotion];
      if (value === undefined) continue;
      this.state[emotion] = clamp(this.state[emotion] + value * weight);
    }
  }

  get(emotion: keyof EmotionState): number {
    return this.state[emotion];
  }

  /**
   * Copy of the full state.
   */
  snapshot(): EmotionState {
    return { ...this.state };
  }

  /**
   * Replace intensities from a persisted map. Missing emotions keep their value.
   */
  restore(values: Partial<EmotionState>): void {
    for (const emotion of EMOTIONS) {
      const value = values[emotion];
      if (value !== undefined) {
        this.state[emotion] = clamp(value);
      }
    }
  }

  /**
   * Emotions above 0.05, strongest first, e.g. "curiosity: 0.90, joy: 0.50".
   */
  describe(): string {
    const significant = EMOTIONS.map((emotion) => ({ emotion, value: this.state[emotion] }))
      .filter((entry) => entry.value > 0.05)
      .sort((a, b) => b.value - a.value)
      .map((entry) => `${entry.emotion}: ${entry.value.toFixed(2)}`);

    return significant.length > 0 ? significant.join(', ') : 'neutral';
  }
}
