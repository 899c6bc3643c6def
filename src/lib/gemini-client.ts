/**
 * @file src/lib/gemini-client.ts
 * @description Gemini-backed semantic oracle. Asks the Generative Language API for a structured
 *              similarity judgement and for writing suggestions. Every failure (missing key,
 *              transport error, timeout, bad status, prose instead of JSON) resolves to a
 *              fallback value of the same shape; nothing here rejects.
 */

import fetch, { FetchError } from 'node-fetch';
import { z } from 'zod';
import { FALLBACK_SEMANTIC_SIMILARITY } from '../shared/analyzer-config';
import type { GeminiConfig } from '../shared/config';
import { describeError, type Logger } from '../shared/logger';
import type { SimilarityScores } from './metrics';

export type OracleFailureReason =
  | 'not_configured'
  | 'request_failed'
  | 'timeout'
  | 'http_error'
  | 'empty_response'
  | 'unparseable';

export interface SemanticAnalysisFields {
  semantic_similarity: number;
  insights: string;
  themes_text1: string[];
  themes_text2: string[];
  key_differences: string;
  writing_style_comparison: string;
}

export type SemanticAnalysis =
  | ({ status: 'ok' } & SemanticAnalysisFields)
  | ({ status: 'fallback'; reason: OracleFailureReason; detail: string } & SemanticAnalysisFields);

export type ImprovementSuggestions =
  | { status: 'ok'; text: string }
  | { status: 'fallback'; reason: OracleFailureReason; detail: string; text: string };

export type OracleCallResult =
  | { ok: true; text: string }
  | { ok: false; reason: Exclude<OracleFailureReason, 'unparseable'>; detail: string };

export type EmbeddedJsonResult = { ok: true; value: unknown } | { ok: false; detail: string };

export interface SemanticOracle {
  readonly configured: boolean;
  analyzeSimilarity(text1: string, text2: string): Promise<SemanticAnalysis>;
  suggestImprovements(
    text1: string,
    text2: string,
    scores: SimilarityScores,
  ): Promise<ImprovementSuggestions>;
}

export interface GeminiOracleOptions {
  config: GeminiConfig | null;
  logger?: Logger;
}

const GeminiEnvelopeSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).optional(),
          })
          .optional(),
      }),
    )
    .optional(),
  error: z.object({ message: z.string().optional() }).optional(),
});

const ScoreSchema = z
  .union([z.number(), z.string().trim().min(1)])
  .transform((value) => Number(value))
  .pipe(z.number().finite());

const SemanticPayloadSchema = z.object({
  semantic_similarity: ScoreSchema,
  insights: z.string().catch(''),
  themes_text1: z.array(z.string()).catch([]),
  themes_text2: z.array(z.string()).catch([]),
  key_differences: z.string().catch(''),
  writing_style_comparison: z.string().catch(''),
});

const UNAVAILABLE_INSIGHT =
  'Unable to generate AI analysis. Please check your API key and internet connection.';
const NO_SUGGESTIONS = 'No suggestions available. Please check your API key.';
const DETAIL_LIMIT = 200;
const TIMEOUT_ERROR_TYPES = new Set(['request-timeout', 'body-timeout']);

const clamp = (value: number): number => Math.max(0, Math.min(1, value));

// Cuts by code point so an astral character is never split.
const trimContext = (value: string, limit: number): string => {
  const codePoints = Array.from(value);
  return codePoints.length > limit ? `${codePoints.slice(0, limit).join('')}…` : value;
};

export const buildAnalysisPrompt = (text1: string, text2: string): string =>
  [
    'Analyze the similarity between these two texts and provide a comprehensive analysis.',
    '',
    'Text 1:',
    `"""${text1}"""`,
    '',
    'Text 2:',
    `"""${text2}"""`,
    '',
    'Please provide:',
    '1. A similarity score from 0.0 to 1.0 based on semantic meaning',
    '2. Key insights about the relationship between the texts',
    '3. What makes them similar or different',
    '4. The main themes or topics in each text',
    '5. Any notable patterns or writing styles',
    '',
    'Format your response as JSON with these fields:',
    '{',
    '  "semantic_similarity": <float between 0.0 and 1.0>,',
    '  "insights": "<string with analysis>",',
    '  "themes_text1": ["<theme1>", "<theme2>"],',
    '  "themes_text2": ["<theme1>", "<theme2>"],',
    '  "key_differences": "<string>",',
    '  "writing_style_comparison": "<string>"',
    '}',
  ].join('\n');

export const buildSuggestionPrompt = (
  text1: string,
  text2: string,
  scores: SimilarityScores,
): string =>
  [
    'Based on these similarity metrics between two texts:',
    `- Cosine Similarity: ${scores.cosineSimilarity.toFixed(3)}`,
    `- Character Similarity: ${scores.characterSimilarity.toFixed(3)}`,
    `- Jaccard Index: ${scores.jaccardIndex.toFixed(3)}`,
    `- Word Overlap: ${scores.wordOverlap.toFixed(1)}%`,
    '',
    `Text 1: """${text1}"""`,
    `Text 2: """${text2}"""`,
    '',
    'Provide 3 specific suggestions for improving text similarity if that was the goal.',
    'Keep each suggestion under 50 words and focus on practical writing tips.',
    'Format as a simple numbered list.',
  ].join('\n');

/**
 * Decodes the object spanning the first `{` and the last `}` of a reply. Models often wrap the
 * JSON in prose or Markdown fences.
 */
export const extractEmbeddedJson = (text: string): EmbeddedJsonResult => {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end < start) {
    return { ok: false, detail: 'No JSON object found in Gemini response.' };
  }
  try {
    return { ok: true, value: JSON.parse(text.slice(start, end + 1)) };
  } catch (error) {
    return { ok: false, detail: `Embedded JSON could not be decoded: ${describeError(error)}` };
  }
};

export const parseSemanticAnalysis = (text: string): SemanticAnalysis => {
  const embedded = extractEmbeddedJson(text);
  if (!embedded.ok) {
    return buildFallbackAnalysis('unparseable', embedded.detail, text);
  }
  const parsed = SemanticPayloadSchema.safeParse(embedded.value);
  if (!parsed.success) {
    return buildFallbackAnalysis(
      'unparseable',
      'Gemini JSON did not contain a numeric semantic_similarity.',
      text,
    );
  }
  return {
    status: 'ok',
    ...parsed.data,
    semantic_similarity: clamp(parsed.data.semantic_similarity),
  };
};

export const buildFallbackAnalysis = (
  reason: OracleFailureReason,
  detail: string,
  rawText?: string,
): SemanticAnalysis => {
  const reached = rawText !== undefined && rawText.length > 0;
  const theme = reached ? 'General content' : 'Analysis unavailable';
  return {
    status: 'fallback',
    reason,
    detail,
    semantic_similarity: FALLBACK_SEMANTIC_SIMILARITY,
    insights: reached ? rawText : UNAVAILABLE_INSIGHT,
    themes_text1: [theme],
    themes_text2: [theme],
    key_differences: 'Analysis could not be completed',
    writing_style_comparison: 'Unable to compare writing styles',
  };
};

export const buildFallbackSuggestions = (
  reason: OracleFailureReason,
  detail: string,
): ImprovementSuggestions => ({
  status: 'fallback',
  reason,
  detail,
  text:
    reason === 'not_configured' || reason === 'empty_response'
      ? NO_SUGGESTIONS
      : `Unable to generate suggestions: ${detail}`,
});

const failure = (
  reason: Exclude<OracleFailureReason, 'unparseable'>,
  detail: string,
): OracleCallResult => ({ ok: false, reason, detail });

const readErrorBody = async (response: { text(): Promise<string> }): Promise<string> => {
  try {
    return trimContext(await response.text(), DETAIL_LIMIT);
  } catch (error) {
    return describeError(error);
  }
};

export const createGeminiOracle = ({
  config,
  logger = console,
}: GeminiOracleOptions): SemanticOracle => {
  const callGemini = async (prompt: string, temperature: number): Promise<OracleCallResult> => {
    if (!config) {
      return failure('not_configured', 'Gemini API key is not configured.');
    }
    const key = encodeURIComponent(config.apiKey);
    const target = `${config.endpoint}/v1beta/models/${config.model}:generateContent?key=${key}`;
    const body = {
      contents: [
        {
          role: 'user',
          parts: [{ text: prompt }],
        },
      ],
      generationConfig: {
        temperature,
      },
    };
    try {
      const response = await fetch(target, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        timeout: config.timeoutMs,
      });
      if (!response.ok) {
        const err = await readErrorBody(response);
        return failure('http_error', `Gemini request failed (${response.status}): ${err}`);
      }
      const envelope = GeminiEnvelopeSchema.safeParse(await response.json());
      if (!envelope.success) {
        return failure('empty_response', 'Gemini response had an unexpected shape.');
      }
      if (envelope.data.error?.message) {
        return failure('http_error', `Gemini API returned an error: ${envelope.data.error.message}`);
      }
      const text =
        envelope.data.candidates?.[0]?.content?.parts
          ?.map((part) => part.text ?? '')
          .join('\n')
          .trim() ?? '';
      if (!text) {
        return failure('empty_response', 'Gemini response contained no text content.');
      }
      return { ok: true, text };
    } catch (error) {
      if (error instanceof FetchError && TIMEOUT_ERROR_TYPES.has(error.type)) {
        return failure('timeout', `Gemini request timed out after ${config.timeoutMs}ms.`);
      }
      return failure('request_failed', `Gemini request failed: ${describeError(error)}`);
    }
  };

  const analyzeSimilarity = async (text1: string, text2: string): Promise<SemanticAnalysis> => {
    const limit = config?.analysisPromptChars ?? 0;
    const result = await callGemini(
      buildAnalysisPrompt(trimContext(text1, limit), trimContext(text2, limit)),
      0.2,
    );
    if (!result.ok) {
      if (result.reason !== 'not_configured') {
        logger.warn(`[gemini] analysis unavailable (${result.reason}): ${result.detail}`);
      }
      return buildFallbackAnalysis(result.reason, result.detail);
    }
    const analysis = parseSemanticAnalysis(result.text);
    if (analysis.status === 'fallback') {
      logger.warn(`[gemini] analysis degraded (${analysis.reason}): ${analysis.detail}`);
    }
    return analysis;
  };

  const suggestImprovements = async (
    text1: string,
    text2: string,
    scores: SimilarityScores,
  ): Promise<ImprovementSuggestions> => {
    const limit = config?.suggestionPromptChars ?? 0;
    const result = await callGemini(
      buildSuggestionPrompt(trimContext(text1, limit), trimContext(text2, limit), scores),
      0.4,
    );
    if (!result.ok) {
      if (result.reason !== 'not_configured') {
        logger.warn(`[gemini] suggestions unavailable (${result.reason}): ${result.detail}`);
      }
      return buildFallbackSuggestions(result.reason, result.detail);
    }
    return { status: 'ok', text: result.text };
  };

  return {
    configured: config !== null,
    analyzeSimilarity,
    suggestImprovements,
  };
};
