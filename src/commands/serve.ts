/**
 * @file src/commands/serve.ts
 * @description Starts the HTTP comparison service.
 */

import chalk from 'chalk';
import { Command } from 'commander';
import { createServer, startServer } from '../server';
import { resolveGeminiConfig, resolveServerConfig } from '../shared/config';
import { createLogger, describeError } from '../shared/logger';
import { parsePortOption } from './option-parsers';

type ServeOptions = { port?: number; host?: string };

const serveCommand = new Command('serve')
  .description('Serve POST /compare and GET /health over HTTP')
  .option('-p, --port <number>', 'Port to listen on', parsePortOption)
  .option('--host <host>', 'Interface to bind')
  .action(async (options: ServeOptions) => {
    const logger = createLogger('server');
    const gemini = resolveGeminiConfig();
    const target = resolveServerConfig({ host: options.host, port: options.port });
    try {
      await startServer(createServer({ gemini }), target);
    } catch (error) {
      console.error(chalk.red(`[error] Failed to start server: ${describeError(error)}`));
      process.exitCode = 1;
      return;
    }
    logger.log(`Listening on http://${target.host}:${target.port}`);
    logger.log(
      gemini
        ? `Gemini enrichment enabled (${gemini.model}).`
        : 'Gemini is not configured; reports will carry fallback analyses.',
    );
  });

export default serveCommand;
