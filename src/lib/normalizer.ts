/**
 * @file src/lib/normalizer.ts
 * @description Reduces raw text to the lowercase word and letter views the metrics operate on.
 */

export interface NormalizedText {
  readonly words: readonly string[];
  readonly wordSet: ReadonlySet<string>;
  readonly chars: ReadonlySet<string>;
}

const NON_WORD = /[^a-z\s]/g;
const NON_LETTER = /[^a-z]/g;

export const extractWords = (raw: string): string[] =>
  raw
    .toLowerCase()
    .replace(NON_WORD, '')
    .split(/\s+/)
    .filter((word) => word.length > 0);

export const extractLetters = (raw: string): Set<string> =>
  new Set(raw.toLowerCase().replace(NON_LETTER, ''));

export const normalizeText = (raw: string): NormalizedText => {
  const words = Object.freeze(extractWords(raw));
  return Object.freeze({
    words,
    wordSet: new Set(words),
    chars: extractLetters(raw),
  });
};
