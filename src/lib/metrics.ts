/**
 * @file src/lib/metrics.ts
 * @description Lexical similarity metrics between two texts. Every metric is total: empty or
 *              degenerate input resolves to a fixed value instead of throwing.
 */

import type { NormalizedText } from './normalizer';
import { intersectionSize, unionSize } from './sets';
import { cosine, fitTransform } from './tfidf';

export interface SimilarityScores {
  /** Letter-set intersection over union, 0..1. */
  characterSimilarity: number;
  /** Cosine of character 1-3 gram TF-IDF vectors, 0..1. */
  cosineSimilarity: number;
  /** Word-set intersection over union, 0..1. */
  jaccardIndex: number;
  /** Dice coefficient over word sets, as a percentage. */
  wordOverlap: number;
  /**
   * Absolute difference in raw length (code points). Serialized as `edit_distance`,
   * but it is only a length-divergence signal.
   */
  sizeDifference: number;
}

const clampUnit = (value: number): number => Math.max(0, Math.min(1, value));

export const characterSimilarity = (a: NormalizedText, b: NormalizedText): number => {
  if (!a.chars.size || !b.chars.size) {
    return 0;
  }
  return intersectionSize(a.chars, b.chars) / unionSize(a.chars, b.chars);
};

export const cosineSimilarity = (raw1: string, raw2: string): number => {
  const result = fitTransform([raw1, raw2]);
  if (result.status === 'degenerate') {
    return 0;
  }
  const [first, second] = result.vectors;
  return clampUnit(cosine(first, second));
};

export const jaccardIndex = (a: NormalizedText, b: NormalizedText): number => {
  if (!a.wordSet.size && !b.wordSet.size) {
    return 1;
  }
  const union = unionSize(a.wordSet, b.wordSet);
  return union > 0 ? intersectionSize(a.wordSet, b.wordSet) / union : 0;
};

export const wordOverlap = (a: NormalizedText, b: NormalizedText): number => {
  if (!a.wordSet.size && !b.wordSet.size) {
    return 100;
  }
  const total = a.wordSet.size + b.wordSet.size;
  return ((intersectionSize(a.wordSet, b.wordSet) * 2) / total) * 100;
};

export const codePointLength = (text: string): number => Array.from(text).length;

export const sizeDifference = (raw1: string, raw2: string): number =>
  Math.abs(codePointLength(raw1) - codePointLength(raw2));

export const computeSimilarityScores = (
  raw1: string,
  raw2: string,
  normalized1: NormalizedText,
  normalized2: NormalizedText,
): SimilarityScores => ({
  characterSimilarity: characterSimilarity(normalized1, normalized2),
  cosineSimilarity: cosineSimilarity(raw1, raw2),
  jaccardIndex: jaccardIndex(normalized1, normalized2),
  wordOverlap: wordOverlap(normalized1, normalized2),
  sizeDifference: sizeDifference(raw1, raw2),
});
