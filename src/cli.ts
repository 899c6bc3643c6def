#!/usr/bin/env node
/**
 * @file src/cli.ts
 * @description Bootstraps the simcheck CLI, which scores how similar two texts are and can ask
 *              Gemini for a semantic read of the pair.
 *
 * Commands exposed by the entry point:
 *   - `init`: store the Gemini key, model, timeout and server port in `.simcheckrc.json`.
 *   - `compare`: score two texts (inline or from files) and print the report.
 *   - `serve`: expose `POST /compare` and `GET /health` over HTTP.
 *
 * @example
 *   simcheck init --gemini-key test-key
 *   simcheck compare "the cat sat" "the dog sat"
 *   simcheck compare --file1 a.txt --file2 b.txt --json --no-semantic
 *   simcheck serve --port 5000
 */

import chalk from 'chalk';
import { Command } from 'commander';
import figlet from 'figlet';
import pkg from '../package.json';
import compareCommand from './commands/compare';
import initCommand from './commands/init';
import serveCommand from './commands/serve';

const program = new Command();
program
  .name('simcheck')
  .description('Compare two texts with lexical similarity metrics and optional Gemini analysis')
  .version(pkg.version, '-v, --version', 'Display CLI version');

program.addCommand(initCommand);
program.addCommand(compareCommand);
program.addCommand(serveCommand);

const args = process.argv.slice(2);

if (!args.length) {
  const banner = figlet.textSync('simcheck', { font: 'Standard' });
  console.log(chalk.hex('#9be2ff')(banner));
  program.outputHelp();
} else {
  program.parseAsync().catch((error: unknown) => {
    console.error(chalk.red(`[error] ${error instanceof Error ? error.message : String(error)}`));
    process.exitCode = 1;
  });
}
