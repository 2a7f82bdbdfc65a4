import { EMOTIONS, type EmotionMap } from './emotion.js';

/**
 * Numeric fingerprint of an observation, used for similarity links.
 */
export interface QualiaSignature {
  readonly vector: readonly number[];
}

/**
 * Number of pseudo-random components before the emotion components.
 */
export const QUALIA_RANDOM_COMPONENTS = 8;

const LCG_MULTIPLIER = 6364136223846793005n;
const LCG_INCREMENT = 1442695040888963407n;
const U64_MASK = (1n << 64n) - 1n;

/**
 * Euclidean distance between two signatures.
 * Signatures of different dimensionality are infinitely far apart.
 */
export function qualiaDistance(a: QualiaSignature, b: QualiaSignature): number {
  if (a.vector.length !== b.vector.length) {
    return Number.POSITIVE_INFINITY;
  }
  let sum = 0;
  for (let i = 0; i < a.vector.length; i++) {
    const diff = (a.vector[i] ?? 0) - (b.vector[i] ?? 0);
    sum += diff * diff;
  }
  return Math.sqrt(sum);
}

/**
 * Sum of the UTF-8 byte values of a string.
 */
export function byteChecksum(text: string): bigint {
  let sum = 0n;
  for (const byte of Buffer.from(text, 'utf-8')) {
    sum += BigInt(byte);
  }
  return sum;
}

/**
 * Seed for the signature generator.
 * Raw-text checksum XOR (interpretation checksum << 1), kept to 64 bits.
 */
export function qualiaSeed(raw: string, interpretation: string): bigint {
  return (byteChecksum(raw) ^ (byteChecksum(interpretation) << 1n)) & U64_MASK;
}

/**
 * One step of the 64-bit linear-congruential generator.
 */
export function lcgNext(state: bigint): bigint {
  return (state * LCG_MULTIPLIER + LCG_INCREMENT) & U64_MASK;
}

/**
 * Deterministic signature for a frame: eight LCG samples in [0, 1)
 * followed by the resonance values in canonical emotion order.
 */
export function generateQualiaSignature(
  raw: string,
  interpretation: string,
  resonance: EmotionMap
): QualiaSignature {
  let state = qualiaSeed(raw, interpretation);
  const vector: number[] = [];

  for (let i = 0; i < QUALIA_RANDOM_COMPONENTS; i++) {
    state = lcgNext(state);
    vector.push(Number(state % 1000n) / 1000);
  }

  for (const emotion of EMOTIONS) {
    vector.push(resonance[emotion] ?? 0);
  }

  return { vector };
}
