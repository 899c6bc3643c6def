/**
 * @file tests/gemini-client.test.ts
 * @description Gemini oracle request shape, JSON extraction and every fallback path.
 */

import { beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('node-fetch', async () => {
  const actual = await vi.importActual<typeof import('node-fetch')>('node-fetch');
  return {
    ...actual,
    default: vi.fn(),
  };
});

import fetch, { FetchError } from 'node-fetch';
import {
  buildSuggestionPrompt,
  createGeminiOracle,
  extractEmbeddedJson,
  parseSemanticAnalysis,
} from '../src/lib/gemini-client';
import type { SimilarityScores } from '../src/lib/metrics';
import type { GeminiConfig } from '../src/shared/config';

const mockFetch = fetch as unknown as ReturnType<typeof vi.fn>;

const config: GeminiConfig = {
  apiKey: 'test-key',
  model: 'gemini-test',
  endpoint: 'https://gemini.example.test',
  timeoutMs: 1000,
  analysisPromptChars: 500,
  suggestionPromptChars: 200,
};

const scores: SimilarityScores = {
  characterSimilarity: 0.5,
  cosineSimilarity: 0.12345,
  jaccardIndex: 1 / 3,
  wordOverlap: 50,
  sizeDifference: 3,
};

const geminiReply = (text: string) => ({
  ok: true,
  status: 200,
  json: async () => ({ candidates: [{ content: { parts: [{ text }] } }] }),
});

const createLoggerSpy = () => ({ log: vi.fn(), warn: vi.fn(), error: vi.fn() });

const sentPrompt = (callIndex = 0): string => {
  const init = mockFetch.mock.calls[callIndex][1] as { body: string };
  const body = JSON.parse(init.body) as { contents: Array<{ parts: Array<{ text: string }> }> };
  return body.contents[0].parts[0].text;
};

describe('extractEmbeddedJson', () => {
  it('decodes the object between the first and last brace', () => {
    const result = extractEmbeddedJson('Sure!\n```json\n{"a": {"b": 1}}\n```\nDone.');
    expect(result).toEqual({ ok: true, value: { a: { b: 1 } } });
  });

  it('fails when there is no object', () => {
    expect(extractEmbeddedJson('no json here').ok).toBe(false);
    expect(extractEmbeddedJson('} reversed {').ok).toBe(false);
  });

  it('fails when the braces do not enclose valid JSON', () => {
    expect(extractEmbeddedJson('{not: json}').ok).toBe(false);
  });
});

describe('parseSemanticAnalysis', () => {
  it('coerces a numeric string and clamps the score', () => {
    const ok = parseSemanticAnalysis('{"semantic_similarity": "0.25"}');
    expect(ok).toMatchObject({ status: 'ok', semantic_similarity: 0.25, insights: '' });
    const high = parseSemanticAnalysis('{"semantic_similarity": 1.7}');
    expect(high.semantic_similarity).toBe(1);
  });

  it('falls back when the score is missing', () => {
    const text = '{"insights": "no score"}';
    const result = parseSemanticAnalysis(text);
    expect(result).toMatchObject({
      status: 'fallback',
      reason: 'unparseable',
      semantic_similarity: 0.5,
      insights: text,
    });
  });

  it('falls back when the score is not a number', () => {
    expect(parseSemanticAnalysis('{"semantic_similarity": "high"}').status).toBe('fallback');
    expect(parseSemanticAnalysis('{"semantic_similarity": null}').status).toBe('fallback');
  });

  it('replaces malformed optional fields with defaults', () => {
    const result = parseSemanticAnalysis(
      '{"semantic_similarity": 0.4, "themes_text1": "cats", "insights": 12}',
    );
    expect(result).toMatchObject({ status: 'ok', themes_text1: [], insights: '' });
  });
});

describe('buildSuggestionPrompt', () => {
  it('formats ratios to three decimals and overlap as a percentage', () => {
    const prompt = buildSuggestionPrompt('one', 'two', scores);
    expect(prompt.split('\n').slice(0, 5)).toEqual([
      'Based on these similarity metrics between two texts:',
      '- Cosine Similarity: 0.123',
      '- Character Similarity: 0.500',
      '- Jaccard Index: 0.333',
      '- Word Overlap: 50.0%',
    ]);
  });
});

describe('createGeminiOracle', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('returns a fallback without calling Gemini when no key is configured', async () => {
    const oracle = createGeminiOracle({ config: null, logger: createLoggerSpy() });
    expect(oracle.configured).toBe(false);

    const analysis = await oracle.analyzeSimilarity('a', 'b');
    expect(analysis).toEqual({
      status: 'fallback',
      reason: 'not_configured',
      detail: 'Gemini API key is not configured.',
      semantic_similarity: 0.5,
      insights: 'Unable to generate AI analysis. Please check your API key and internet connection.',
      themes_text1: ['Analysis unavailable'],
      themes_text2: ['Analysis unavailable'],
      key_differences: 'Analysis could not be completed',
      writing_style_comparison: 'Unable to compare writing styles',
    });

    const suggestions = await oracle.suggestImprovements('a', 'b', scores);
    expect(suggestions.text).toBe('No suggestions available. Please check your API key.');
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('posts the prompt to the configured model and parses the embedded JSON', async () => {
    mockFetch.mockResolvedValueOnce(
      geminiReply(
        'Here you go:\n```json\n{"semantic_similarity": "0.82", "insights": "Both describe pets.", "themes_text1": ["cats"], "themes_text2": ["dogs"], "key_differences": "Animal", "writing_style_comparison": "Similar"}\n```',
      ),
    );
    const oracle = createGeminiOracle({ config, logger: createLoggerSpy() });

    const analysis = await oracle.analyzeSimilarity('the cat sat', 'the dog sat');

    expect(analysis).toEqual({
      status: 'ok',
      semantic_similarity: 0.82,
      insights: 'Both describe pets.',
      themes_text1: ['cats'],
      themes_text2: ['dogs'],
      key_differences: 'Animal',
      writing_style_comparison: 'Similar',
    });
    expect(mockFetch).toHaveBeenCalledTimes(1);
    const [url, init] = mockFetch.mock.calls[0] as [string, { method: string; timeout: number }];
    expect(url).toBe(
      'https://gemini.example.test/v1beta/models/gemini-test:generateContent?key=test-key',
    );
    expect(init.method).toBe('POST');
    expect(init.timeout).toBe(1000);
    expect(sentPrompt()).toContain('"""the cat sat"""');
  });

  it('truncates each text before embedding it in the analysis prompt', async () => {
    mockFetch.mockResolvedValueOnce(geminiReply('{"semantic_similarity": 0.1}'));
    const oracle = createGeminiOracle({ config, logger: createLoggerSpy() });

    await oracle.analyzeSimilarity('a'.repeat(600), 'short');

    const prompt = sentPrompt();
    expect(prompt).toContain(`"""${'a'.repeat(500)}…"""`);
    expect(prompt).not.toContain('a'.repeat(501));
  });

  it('never splits an astral character when truncating', async () => {
    mockFetch.mockResolvedValueOnce(geminiReply('{"semantic_similarity": 0.1}'));
    const oracle = createGeminiOracle({ config, logger: createLoggerSpy() });

    await oracle.analyzeSimilarity(`${'a'.repeat(499)}😀tail`, 'short');

    expect(sentPrompt()).toContain(`"""${'a'.repeat(499)}😀…"""`);
  });

  it('keeps the raw reply as insights when Gemini answers in prose', async () => {
    const prose = 'These texts are fairly similar in tone.';
    mockFetch.mockResolvedValueOnce(geminiReply(prose));
    const logger = createLoggerSpy();
    const oracle = createGeminiOracle({ config, logger });

    const analysis = await oracle.analyzeSimilarity('a', 'b');

    expect(analysis).toMatchObject({
      status: 'fallback',
      reason: 'unparseable',
      semantic_similarity: 0.5,
      insights: prose,
      themes_text1: ['General content'],
      themes_text2: ['General content'],
    });
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('falls back on a non-success status without leaking the key into logs', async () => {
    mockFetch.mockResolvedValueOnce({ ok: false, status: 500, text: async () => 'boom' });
    const logger = createLoggerSpy();
    const oracle = createGeminiOracle({ config, logger });

    const analysis = await oracle.analyzeSimilarity('a', 'b');

    expect(analysis).toMatchObject({
      status: 'fallback',
      reason: 'http_error',
      detail: 'Gemini request failed (500): boom',
      semantic_similarity: 0.5,
    });
    const logged = logger.warn.mock.calls.flat().join(' ');
    expect(logged).toBe('[gemini] analysis unavailable (http_error): Gemini request failed (500): boom');
  });

  it('reports timeouts separately from other transport failures', async () => {
    mockFetch.mockRejectedValueOnce(
      new FetchError('network timeout at: https://gemini.example.test', 'request-timeout'),
    );
    mockFetch.mockRejectedValueOnce(new Error('connect ECONNREFUSED'));
    const oracle = createGeminiOracle({ config, logger: createLoggerSpy() });

    const timedOut = await oracle.analyzeSimilarity('a', 'b');
    const refused = await oracle.analyzeSimilarity('a', 'b');

    expect(timedOut).toMatchObject({
      status: 'fallback',
      reason: 'timeout',
      detail: 'Gemini request timed out after 1000ms.',
    });
    expect(refused).toMatchObject({
      status: 'fallback',
      reason: 'request_failed',
      detail: 'Gemini request failed: connect ECONNREFUSED',
    });
  });

  it('reports a stalled response body as a timeout', async () => {
    mockFetch.mockResolvedValueOnce({
      ok: true,
      status: 200,
      json: async () => {
        throw new FetchError('Response timeout while trying to fetch', 'body-timeout');
      },
    });
    const oracle = createGeminiOracle({ config, logger: createLoggerSpy() });

    const analysis = await oracle.analyzeSimilarity('a', 'b');

    expect(analysis).toMatchObject({
      status: 'fallback',
      reason: 'timeout',
      detail: 'Gemini request timed out after 1000ms.',
    });
  });

  it('treats a reply without candidates as empty', async () => {
    mockFetch.mockResolvedValueOnce({ ok: true, status: 200, json: async () => ({ candidates: [] }) });
    const oracle = createGeminiOracle({ config, logger: createLoggerSpy() });

    const suggestions = await oracle.suggestImprovements('a', 'b', scores);

    expect(suggestions).toEqual({
      status: 'fallback',
      reason: 'empty_response',
      detail: 'Gemini response contained no text content.',
      text: 'No suggestions available. Please check your API key.',
    });
  });

  it('returns suggestion text and explains failures', async () => {
    mockFetch.mockResolvedValueOnce(geminiReply('1. Use the same verbs.'));
    mockFetch.mockResolvedValueOnce({ ok: false, status: 503, text: async () => 'unavailable' });
    const oracle = createGeminiOracle({ config, logger: createLoggerSpy() });

    const ok = await oracle.suggestImprovements('x'.repeat(300), 'y', scores);
    const failed = await oracle.suggestImprovements('x', 'y', scores);

    expect(ok).toEqual({ status: 'ok', text: '1. Use the same verbs.' });
    expect(sentPrompt(0)).toContain(`Text 1: """${'x'.repeat(200)}…"""`);
    expect(failed.text).toBe('Unable to generate suggestions: Gemini request failed (503): unavailable');
  });
});
