/**
 * @file src/lib/word-diff.ts
 * @description Shared and per-text vocabulary, sorted so reports are deterministic.
 */

import type { NormalizedText } from './normalizer';
import { difference, intersection } from './sets';

export interface WordDiff {
  shared: readonly string[];
  uniqueToFirst: readonly string[];
  uniqueToSecond: readonly string[];
}

const byCodeUnit = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

export const computeWordDiff = (first: NormalizedText, second: NormalizedText): WordDiff => ({
  shared: intersection(first.wordSet, second.wordSet).sort(byCodeUnit),
  uniqueToFirst: difference(first.wordSet, second.wordSet).sort(byCodeUnit),
  uniqueToSecond: difference(second.wordSet, first.wordSet).sort(byCodeUnit),
});
