/**
 * @file src/lib/tfidf.ts
 * @description Character n-gram TF-IDF vectorizer. Documents are lowercased, runs of whitespace
 *              are collapsed to one space, and every n-gram in the configured range is counted
 *              (spaces included). Weights use smoothed idf, `ln((1 + n) / (1 + df)) + 1`, and
 *              each row is L2-normalized.
 */

import { NGRAM_RANGE } from '../shared/analyzer-config';

export type SparseVector = ReadonlyMap<string, number>;

export interface NgramRange {
  min: number;
  max: number;
}

export type VectorizationResult =
  | { status: 'ok'; vocabularySize: number; vectors: SparseVector[] }
  | { status: 'degenerate'; reason: 'no_documents' | 'empty_vocabulary' | 'invalid_range' };

const preprocess = (text: string): string[] =>
  Array.from(text.toLowerCase().replace(/\s\s+/g, ' '));

export const charNgrams = (text: string, range: NgramRange = NGRAM_RANGE): string[] => {
  const chars = preprocess(text);
  const grams: string[] = [];
  for (let n = range.min; n <= Math.min(range.max, chars.length); n++) {
    for (let i = 0; i + n <= chars.length; i++) {
      grams.push(chars.slice(i, i + n).join(''));
    }
  }
  return grams;
};

const countTerms = (grams: string[]): Map<string, number> => {
  const counts = new Map<string, number>();
  for (const gram of grams) {
    counts.set(gram, (counts.get(gram) ?? 0) + 1);
  }
  return counts;
};

const l2Normalize = (vector: Map<string, number>): Map<string, number> => {
  let sumSquares = 0;
  for (const weight of vector.values()) {
    sumSquares += weight * weight;
  }
  if (sumSquares === 0) {
    return vector;
  }
  const norm = Math.sqrt(sumSquares);
  return new Map(
    [...vector].map(([term, weight]): [string, number] => [term, weight / norm]),
  );
};

export const fitTransform = (
  documents: string[],
  range: NgramRange = NGRAM_RANGE,
): VectorizationResult => {
  if (!documents.length) {
    return { status: 'degenerate', reason: 'no_documents' };
  }
  if (range.min < 1 || range.max < range.min) {
    return { status: 'degenerate', reason: 'invalid_range' };
  }

  const termCounts = documents.map((doc) => countTerms(charNgrams(doc, range)));
  const documentFrequency = new Map<string, number>();
  for (const counts of termCounts) {
    for (const term of counts.keys()) {
      documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
    }
  }
  if (documentFrequency.size === 0) {
    return { status: 'degenerate', reason: 'empty_vocabulary' };
  }

  const total = documents.length;
  const idf = (term: string): number =>
    Math.log((1 + total) / (1 + (documentFrequency.get(term) ?? 0))) + 1;

  const vectors = termCounts.map((counts) =>
    l2Normalize(
      new Map(
        [...counts].map(([term, count]): [string, number] => [term, count * idf(term)]),
      ),
    ),
  );
  return { status: 'ok', vocabularySize: documentFrequency.size, vectors };
};

/**
 * Cosine of two sparse vectors; a zero vector on either side yields 0.
 */
export const cosine = (a: SparseVector, b: SparseVector): number => {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (const [term, weight] of a) {
    normA += weight * weight;
    const other = b.get(term);
    if (other !== undefined) dot += weight * other;
  }
  for (const weight of b.values()) {
    normB += weight * weight;
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
};
