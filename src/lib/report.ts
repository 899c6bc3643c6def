/**
 * @file src/lib/report.ts
 * @description Assembles scores, word lists, stats and the optional semantic enrichment into one
 *              immutable report, and shapes it into the JSON schema returned by the HTTP service
 *              and `simcheck compare --json`.
 */

import type {
  ImprovementSuggestions,
  OracleFailureReason,
  SemanticAnalysis,
} from './gemini-client';
import { codePointLength, type SimilarityScores } from './metrics';
import type { NormalizedText } from './normalizer';
import { unionSize } from './sets';
import type { WordDiff } from './word-diff';

export interface ReportStats {
  text1_words: number;
  text2_words: number;
  text1_chars: number;
  text2_chars: number;
  total_unique_words: number;
}

export interface SemanticEnrichment {
  analysis: SemanticAnalysis;
  suggestions: ImprovementSuggestions;
}

export interface SimilarityReport {
  readonly scores: Readonly<SimilarityScores>;
  readonly diff: WordDiff;
  readonly stats: Readonly<ReportStats>;
  readonly semantic?: Readonly<SemanticEnrichment>;
}

export interface BuildReportInput {
  raw1: string;
  raw2: string;
  normalized1: NormalizedText;
  normalized2: NormalizedText;
  scores: SimilarityScores;
  diff: WordDiff;
}

export interface SemanticAnalysisJson {
  status: SemanticAnalysis['status'];
  reason?: OracleFailureReason;
  semantic_similarity: number;
  insights: string;
  themes_text1: string[];
  themes_text2: string[];
  key_differences: string;
  writing_style_comparison: string;
}

export interface SimilarityReportJson {
  cosine_similarity: number;
  jaccard_index: number;
  word_overlap: number;
  character_similarity: number;
  edit_distance: number;
  shared_words: string[];
  unique_text1: string[];
  unique_text2: string[];
  stats: ReportStats;
  gemini_analysis?: SemanticAnalysisJson;
  improvement_suggestions?: string;
}

export const computeStats = (
  raw1: string,
  raw2: string,
  normalized1: NormalizedText,
  normalized2: NormalizedText,
): ReportStats => ({
  text1_words: normalized1.words.length,
  text2_words: normalized2.words.length,
  text1_chars: codePointLength(raw1),
  text2_chars: codePointLength(raw2),
  total_unique_words: unionSize(normalized1.wordSet, normalized2.wordSet),
});

export const buildSimilarityReport = ({
  raw1,
  raw2,
  normalized1,
  normalized2,
  scores,
  diff,
}: BuildReportInput): SimilarityReport =>
  Object.freeze({
    scores: Object.freeze({ ...scores }),
    diff: Object.freeze({
      shared: Object.freeze([...diff.shared]),
      uniqueToFirst: Object.freeze([...diff.uniqueToFirst]),
      uniqueToSecond: Object.freeze([...diff.uniqueToSecond]),
    }),
    stats: Object.freeze(computeStats(raw1, raw2, normalized1, normalized2)),
  });

export const attachSemantic = (
  report: SimilarityReport,
  semantic: SemanticEnrichment,
): SimilarityReport => Object.freeze({ ...report, semantic: Object.freeze({ ...semantic }) });

const serializeAnalysis = (analysis: SemanticAnalysis): SemanticAnalysisJson => {
  const fields = {
    semantic_similarity: analysis.semantic_similarity,
    insights: analysis.insights,
    themes_text1: [...analysis.themes_text1],
    themes_text2: [...analysis.themes_text2],
    key_differences: analysis.key_differences,
    writing_style_comparison: analysis.writing_style_comparison,
  };
  switch (analysis.status) {
    case 'ok':
      return { status: 'ok', ...fields };
    case 'fallback':
      return { status: 'fallback', reason: analysis.reason, ...fields };
  }
};

export const serializeReport = (report: SimilarityReport): SimilarityReportJson => {
  const { scores, diff, stats, semantic } = report;
  const json: SimilarityReportJson = {
    cosine_similarity: scores.cosineSimilarity,
    jaccard_index: scores.jaccardIndex,
    word_overlap: scores.wordOverlap,
    character_similarity: scores.characterSimilarity,
    edit_distance: scores.sizeDifference,
    shared_words: [...diff.shared],
    unique_text1: [...diff.uniqueToFirst],
    unique_text2: [...diff.uniqueToSecond],
    stats: { ...stats },
  };
  if (semantic) {
    json.gemini_analysis = serializeAnalysis(semantic.analysis);
    json.improvement_suggestions = semantic.suggestions.text;
  }
  return json;
};
