/**
 * @file src/shared/logger.ts
 * @description Console-backed loggers with bracketed prefixes shared by the CLI, workflows and server.
 */

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;

export const createLogger = (prefix: string): Logger => ({
  log: (...args) => console.log(`[${prefix}]`, ...args),
  warn: (...args) => console.warn(`[${prefix}]`, ...args),
  error: (...args) => console.error(`[${prefix}]`, ...args),
});

export const silentLogger: Logger = {
  log: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
