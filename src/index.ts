/**
 * @file src/index.ts
 * @description Library entry point for embedding the comparison pipeline.
 */

export * from './lib/gemini-client';
export * from './lib/metrics';
export * from './lib/normalizer';
export * from './lib/report';
export * from './lib/tfidf';
export * from './lib/word-diff';
export * from './shared/config';
export * from './shared/logger';
export { createServer, startServer, type ServerOptions } from './server';
export * from './workflows/compare-workflow';
