/**
 * @file src/commands/compare.ts
 * @description CLI wiring for the comparison workflow. Texts come from positional arguments or
 *              files; the report is printed as a colored summary or as the service JSON.
 */

import chalk from 'chalk';
import { Command } from 'commander';
import fs from 'node:fs';
import ora from 'ora';
import { createGeminiOracle } from '../lib/gemini-client';
import { serializeReport } from '../lib/report';
import { renderReport } from '../lib/terminal-report';
import { resolveGeminiConfig } from '../shared/config';
import { describeError, type Logger } from '../shared/logger';
import { InvalidInputError, runCompareWorkflow } from '../workflows/compare-workflow';
import { parseTimeoutOption } from './option-parsers';

interface CompareCliOptions {
  file1?: string;
  file2?: string;
  json?: boolean;
  semantic: boolean;
  geminiKey?: string;
  geminiModel?: string;
  timeout?: number;
}

const cliLogger: Logger = {
  log: () => undefined,
  warn: (...args) => console.warn(chalk.yellow(args.join(' '))),
  error: (...args) => console.error(chalk.red(args.join(' '))),
};

const resolveText = (inline: string | undefined, file: string | undefined): string | undefined =>
  file ? fs.readFileSync(file, 'utf8') : inline;

const runCompare = async (
  inline1: string | undefined,
  inline2: string | undefined,
  options: CompareCliOptions,
): Promise<void> => {
  const text1 = resolveText(inline1, options.file1);
  const text2 = resolveText(inline2, options.file2);
  const gemini = options.semantic
    ? resolveGeminiConfig({
        apiKey: options.geminiKey,
        model: options.geminiModel,
        timeoutMs: options.timeout,
      })
    : null;
  const oracle = createGeminiOracle({ config: gemini, logger: cliLogger });

  const spinner =
    options.semantic && !options.json
      ? ora('[compare] asking Gemini for a semantic read').start()
      : null;
  try {
    const report = await runCompareWorkflow({
      text1,
      text2,
      semantic: options.semantic,
      oracle,
      logger: cliLogger,
    });
    spinner?.stop();
    if (options.json) {
      console.log(JSON.stringify(serializeReport(report), null, 2));
      return;
    }
    if (options.semantic && !oracle.configured) {
      console.log(
        chalk.gray('[compare] Gemini is not configured; run `simcheck init` or set GEMINI_API_KEY.'),
      );
    }
    renderReport(report).forEach((line) => console.log(line));
  } catch (error) {
    spinner?.stop();
    throw error;
  }
};

const compareCommand = new Command('compare')
  .description('Compare two texts and print similarity metrics (optionally with Gemini analysis)')
  .argument('[text1]', 'First text (or use --file1)')
  .argument('[text2]', 'Second text (or use --file2)')
  .option('--file1 <path>', 'Read the first text from a file')
  .option('--file2 <path>', 'Read the second text from a file')
  .option('--json', 'Print the report as JSON')
  .option('--no-semantic', 'Skip the Gemini semantic analysis and suggestions')
  .option('--gemini-key <key>', 'API key for Gemini (falls back to GEMINI_API_KEY)')
  .option('--gemini-model <model>', 'Gemini model identifier')
  .option('--timeout <ms>', 'Gemini request timeout in milliseconds', parseTimeoutOption)
  .action(
    async (text1: string | undefined, text2: string | undefined, options: CompareCliOptions) => {
      try {
        await runCompare(text1, text2, options);
      } catch (error) {
        const message =
          error instanceof InvalidInputError
            ? `${error.message} (pass two texts or --file1/--file2)`
            : describeError(error);
        console.error(chalk.red(`[error] ${message}`));
        process.exitCode = 1;
      }
    },
  );

export default compareCommand;
