/**
 * @file src/shared/analyzer-config.ts
 * @description Centralized knobs for the similarity pipeline and the Gemini oracle.
 */

/**
 * Character n-gram window used to build the TF-IDF space for cosine similarity.
 */
export const NGRAM_RANGE = { min: 1, max: 3 } as const;

/**
 * Each text is cut to this many characters before it is embedded in the analysis prompt.
 */
export const ANALYSIS_PROMPT_CHARS = 500;

/**
 * Shorter prefix for the suggestion prompt; the metrics already summarize the texts.
 */
export const SUGGESTION_PROMPT_CHARS = 200;

export const GEMINI_DEFAULT_ENDPOINT = 'https://generativelanguage.googleapis.com';
export const GEMINI_DEFAULT_MODEL = 'gemini-1.5-flash';
export const GEMINI_TIMEOUT_MS = 30_000;

/**
 * Neutral semantic score reported when Gemini output cannot be used.
 */
export const FALLBACK_SEMANTIC_SIMILARITY = 0.5;

export const DEFAULT_SERVER_HOST = '127.0.0.1';
export const DEFAULT_SERVER_PORT = 5000;
