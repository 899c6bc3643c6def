/**
 * @file src/workflows/compare-workflow.ts
 * @description Shared comparison pipeline reused by the CLI and the HTTP service. Validation is the
 *              only step that can fail; Gemini problems surface as fallback values in the report.
 */

import type { SemanticOracle } from '../lib/gemini-client';
import { computeSimilarityScores } from '../lib/metrics';
import { normalizeText } from '../lib/normalizer';
import { attachSemantic, buildSimilarityReport, type SimilarityReport } from '../lib/report';
import { computeWordDiff } from '../lib/word-diff';
import type { Logger } from '../shared/logger';

export class InvalidInputError extends Error {
  constructor(message = 'Please enter both texts') {
    super(message);
    this.name = 'InvalidInputError';
  }
}

export interface TextPair {
  text1: string;
  text2: string;
}

export interface CompareWorkflowOptions {
  text1: unknown;
  text2: unknown;
  semantic?: boolean;
  oracle?: SemanticOracle | null;
  logger?: Logger;
}

/**
 * Accepts anything so HTTP bodies and CLI arguments go through the same check.
 */
export const validateTextPair = (text1: unknown, text2: unknown): TextPair => {
  if (typeof text1 !== 'string' || typeof text2 !== 'string') {
    throw new InvalidInputError();
  }
  if (!text1.trim() || !text2.trim()) {
    throw new InvalidInputError();
  }
  return { text1, text2 };
};

export const compareTexts = ({ text1, text2 }: TextPair): SimilarityReport => {
  const normalized1 = normalizeText(text1);
  const normalized2 = normalizeText(text2);
  return buildSimilarityReport({
    raw1: text1,
    raw2: text2,
    normalized1,
    normalized2,
    scores: computeSimilarityScores(text1, text2, normalized1, normalized2),
    diff: computeWordDiff(normalized1, normalized2),
  });
};

export const runCompareWorkflow = async ({
  text1,
  text2,
  semantic = true,
  oracle,
  logger = console,
}: CompareWorkflowOptions): Promise<SimilarityReport> => {
  const pair = validateTextPair(text1, text2);
  const base = compareTexts(pair);
  const { stats, scores } = base;
  logger.log(
    `[compare] scored pair (${stats.text1_words}/${stats.text2_words} words, jaccard ${scores.jaccardIndex.toFixed(3)})`,
  );
  if (!semantic || !oracle) {
    return base;
  }

  const [analysis, suggestions] = await Promise.all([
    oracle.analyzeSimilarity(pair.text1, pair.text2),
    oracle.suggestImprovements(pair.text1, pair.text2, base.scores),
  ]);
  logger.log(`[compare] semantic analysis ${analysis.status}`);
  return attachSemantic(base, { analysis, suggestions });
};
