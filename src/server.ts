/**
 * @file src/server.ts
 * @description HTTP surface for the comparison workflow: `POST /compare` and `GET /health`.
 */

import express, {
  type Express,
  type NextFunction,
  type Request,
  type Response,
} from 'express';
import type { Server } from 'node:http';
import { z } from 'zod';
import pkg from '../package.json';
import { createGeminiOracle, type SemanticOracle } from './lib/gemini-client';
import { serializeReport } from './lib/report';
import type { GeminiConfig, ServerConfig } from './shared/config';
import { describeError, type Logger } from './shared/logger';
import { InvalidInputError, runCompareWorkflow } from './workflows/compare-workflow';

export interface ServerOptions {
  gemini: GeminiConfig | null;
  /** Receives the pipeline's own `[compare]`/`[gemini]` lines, so it should not add a prefix. */
  logger?: Logger;
  /** Replaces the Gemini-backed oracle built from `gemini`. */
  oracle?: SemanticOracle;
}

const CompareBodySchema = z.object({
  text1: z.string().default(''),
  text2: z.string().default(''),
  semantic: z.boolean().optional(),
});

const INVALID_TEXTS = 'Please enter both texts';

/** 4xx status carried by body-parser's http-errors, such as 413 for an oversized body. */
const clientErrorStatus = (error: unknown): number | undefined => {
  if (typeof error !== 'object' || error === null || !('status' in error)) {
    return undefined;
  }
  const { status } = error;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
};

const describeClientError = (status: number, error: unknown): string =>
  status === 413 ? 'Request body is too large' : describeError(error);

const describeBodyIssue = (error: z.ZodError): string =>
  error.issues.some((issue) => issue.path[0] === 'semantic')
    ? 'Field "semantic" must be a boolean'
    : INVALID_TEXTS;

export const createServer = ({
  gemini,
  logger = console,
  oracle = createGeminiOracle({ config: gemini, logger }),
}: ServerOptions): Express => {
  const app = express();
  app.use(express.json({ limit: '2mb' }));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      gemini_configured: oracle.configured,
      version: pkg.version,
    });
  });

  app.post('/compare', async (req: Request, res: Response) => {
    const body = CompareBodySchema.safeParse(req.body ?? {});
    if (!body.success) {
      res.status(400).json({ error: describeBodyIssue(body.error) });
      return;
    }
    try {
      const report = await runCompareWorkflow({
        text1: body.data.text1,
        text2: body.data.text2,
        semantic: body.data.semantic ?? true,
        oracle,
        logger,
      });
      res.json(serializeReport(report));
    } catch (error) {
      if (error instanceof InvalidInputError) {
        res.status(400).json({ error: error.message });
        return;
      }
      logger.error('[server] Comparison failed:', describeError(error));
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: 'Request body must be valid JSON' });
      return;
    }
    const status = clientErrorStatus(error);
    if (status !== undefined) {
      res.status(status).json({ error: describeClientError(status, error) });
      return;
    }
    logger.error('[server] Unhandled request error:', describeError(error));
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
};

export const startServer = (app: Express, { host, port }: ServerConfig): Promise<Server> =>
  new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => resolve(server));
    server.on('error', reject);
  });
