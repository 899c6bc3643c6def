/**
 * @file src/lib/terminal-report.ts
 * @description Renders a similarity report for the terminal. Kept separate from the command so the
 *              layout can be tested without spawning the CLI.
 */

import chalk from 'chalk';
import type { SimilarityReport } from './report';

const formatRatio = (value: number): string => value.toFixed(3);

const formatPercent = (value: number): string => `${value.toFixed(1)}%`;

const formatWordList = (words: readonly string[], limit = 25): string => {
  if (!words.length) return chalk.gray('(none)');
  const shown = words.slice(0, limit).join(', ');
  return words.length > limit ? `${shown} … (+${words.length - limit} more)` : shown;
};

export const renderReport = (report: SimilarityReport): string[] => {
  const { scores, diff, stats, semantic } = report;
  const lines: string[] = [
    chalk.bold('# Similarity report'),
    [
      `Cosine: ${formatRatio(scores.cosineSimilarity)}`,
      `Jaccard: ${formatRatio(scores.jaccardIndex)}`,
      `Word overlap: ${formatPercent(scores.wordOverlap)}`,
      `Characters: ${formatRatio(scores.characterSimilarity)}`,
      `Length difference: ${scores.sizeDifference}`,
    ].join(' · '),
    chalk.gray(
      `Text 1: ${stats.text1_words} words, ${stats.text1_chars} chars · Text 2: ${stats.text2_words} words, ${stats.text2_chars} chars · ${stats.total_unique_words} unique words`,
    ),
    '',
    `${chalk.green('Shared words')} (${diff.shared.length}): ${formatWordList(diff.shared)}`,
    `${chalk.yellow('Only in text 1')} (${diff.uniqueToFirst.length}): ${formatWordList(diff.uniqueToFirst)}`,
    `${chalk.cyan('Only in text 2')} (${diff.uniqueToSecond.length}): ${formatWordList(diff.uniqueToSecond)}`,
  ];

  if (!semantic) {
    return lines;
  }

  const { analysis, suggestions } = semantic;
  lines.push('', chalk.bold('Gemini analysis'));
  if (analysis.status === 'fallback') {
    lines.push(chalk.yellow(`[degraded: ${analysis.reason}] ${analysis.detail}`));
  }
  lines.push(
    `Semantic similarity: ${formatRatio(analysis.semantic_similarity)}`,
    `Insights: ${analysis.insights}`,
    `Themes (text 1): ${analysis.themes_text1.join(', ')}`,
    `Themes (text 2): ${analysis.themes_text2.join(', ')}`,
    `Key differences: ${analysis.key_differences}`,
    `Writing style: ${analysis.writing_style_comparison}`,
    '',
    chalk.bold('Suggestions'),
    suggestions.text,
  );
  return lines;
};
