/**
 * @file src/commands/init.ts
 * @description Interactive/non-interactive configuration. Captures Gemini credentials, the request
 *              timeout and HTTP server defaults in `.simcheckrc.json`.
 */

import chalk from 'chalk';
import { Command } from 'commander';
import prompts from 'prompts';
import {
  DEFAULT_SERVER_PORT,
  GEMINI_DEFAULT_MODEL,
  GEMINI_TIMEOUT_MS,
} from '../shared/analyzer-config';
import { CONFIG_PATH, readConfig, writeConfig, type SimcheckConfig } from '../shared/config';
import { parsePortOption, parseTimeoutOption } from './option-parsers';

type InitOptions = {
  geminiKey?: string;
  geminiModel?: string;
  timeout?: number;
  port?: number;
};

const normalize = (value?: string | null) =>
  value && value.trim().length ? value.trim() : undefined;

const maskKey = (value?: string): string =>
  value ? `${value.slice(0, 4)}…${value.slice(-2)}` : chalk.gray('(not set)');

const initCommand = new Command('init')
  .description('Configure the Gemini API key, model, timeout and server port')
  .option('--gemini-key <key>', 'Gemini API key')
  .option('--gemini-model <model>', `Gemini model identifier (default: ${GEMINI_DEFAULT_MODEL})`)
  .option('--timeout <ms>', 'Gemini request timeout in milliseconds', parseTimeoutOption)
  .option('--port <number>', 'Default HTTP server port', parsePortOption)
  .action(async (options: InitOptions) => {
    const existing = readConfig();
    let cancelled = false;
    const onCancel = () => {
      cancelled = true;
      return false;
    };

    const responses = await prompts(
      [
        {
          type: options.geminiKey ? null : 'password',
          name: 'geminiKey',
          message: 'Gemini API key (leave empty to skip semantic analysis)',
          initial: existing.geminiApiKey ?? '',
        },
        {
          type: options.geminiModel ? null : 'text',
          name: 'geminiModel',
          message: 'Gemini model',
          initial: existing.geminiModel ?? GEMINI_DEFAULT_MODEL,
        },
        {
          type: options.timeout !== undefined ? null : 'number',
          name: 'timeout',
          message: 'Gemini request timeout (ms)',
          initial: existing.geminiTimeoutMs ?? GEMINI_TIMEOUT_MS,
          validate: (value: number) => (value > 0 ? true : 'Timeout must be greater than zero.'),
        },
        {
          type: options.port !== undefined ? null : 'number',
          name: 'port',
          message: 'HTTP server port',
          initial: existing.serverPort ?? DEFAULT_SERVER_PORT,
          validate: (value: number) =>
            Number.isInteger(value) && value >= 0 ? true : 'Port must be a whole number.',
        },
      ],
      { onCancel },
    );

    if (cancelled) {
      console.log(chalk.yellow('Initialization cancelled.'));
      process.exitCode = 1;
      return;
    }

    const timeout = options.timeout ?? Number(responses.timeout);
    const port = options.port ?? Number(responses.port);
    const update: Partial<SimcheckConfig> = {
      geminiApiKey: normalize(options.geminiKey ?? responses.geminiKey),
      geminiModel: normalize(options.geminiModel ?? responses.geminiModel) ?? GEMINI_DEFAULT_MODEL,
      geminiTimeoutMs: Number.isInteger(timeout) && timeout > 0 ? timeout : GEMINI_TIMEOUT_MS,
      serverPort: Number.isInteger(port) && port >= 0 ? port : DEFAULT_SERVER_PORT,
    };

    const saved = writeConfig(update);
    console.log(chalk.green(`Configuration saved to ${CONFIG_PATH}`));
    console.log(` - Gemini key: ${maskKey(saved.geminiApiKey)}`);
    console.log(` - Gemini model: ${saved.geminiModel}`);
    console.log(` - Timeout: ${saved.geminiTimeoutMs}ms`);
    console.log(` - Server port: ${saved.serverPort}`);
  });

export default initCommand;
