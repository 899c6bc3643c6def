/**
 * @file src/shared/config.ts
 * @description Handles persistent simcheck configuration (.simcheckrc.json) and resolves the
 *              Gemini and server settings from CLI flags, environment variables and that file.
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import {
  ANALYSIS_PROMPT_CHARS,
  DEFAULT_SERVER_HOST,
  DEFAULT_SERVER_PORT,
  GEMINI_DEFAULT_ENDPOINT,
  GEMINI_DEFAULT_MODEL,
  GEMINI_TIMEOUT_MS,
  SUGGESTION_PROMPT_CHARS,
} from './analyzer-config';
import { paths } from './paths';

const TimeoutSchema = z.number().int().positive();

// A mistyped field is dropped on its own so the rest of the file still applies.
const SimcheckConfigSchema = z.object({
  geminiApiKey: z.string().optional().catch(undefined),
  geminiModel: z.string().optional().catch(undefined),
  geminiEndpoint: z.string().optional().catch(undefined),
  geminiTimeoutMs: TimeoutSchema.optional().catch(undefined),
  serverPort: z.number().int().nonnegative().optional().catch(undefined),
  serverHost: z.string().optional().catch(undefined),
});

export type SimcheckConfig = z.infer<typeof SimcheckConfigSchema>;

export const CONFIG_PATH = paths.CONFIG;

export interface GeminiConfig {
  apiKey: string;
  model: string;
  endpoint: string;
  timeoutMs: number;
  analysisPromptChars: number;
  suggestionPromptChars: number;
}

export interface GeminiConfigOverrides {
  apiKey?: string;
  model?: string;
  endpoint?: string;
  timeoutMs?: number;
}

export interface ServerConfig {
  host: string;
  port: number;
}

export interface ServerConfigOverrides {
  host?: string;
  port?: number;
}

type Env = Record<string, string | undefined>;

const normalize = (value?: string | null): string | undefined => {
  if (!value) return undefined;
  const trimmed = value.trim();
  return trimmed.length ? trimmed : undefined;
};

const cleanUrl = (value?: string | null): string | undefined =>
  normalize(value)?.replace(/\/+$/, '');

const validTimeout = (value?: number): number | undefined => {
  const parsed = TimeoutSchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
};

const parsePort = (value?: string): number | undefined => {
  const normalized = normalize(value);
  if (!normalized) return undefined;
  const port = Number(normalized);
  return Number.isInteger(port) && port >= 0 ? port : undefined;
};

export const readConfig = (configPath: string = CONFIG_PATH): SimcheckConfig => {
  if (!fs.existsSync(configPath)) {
    return {};
  }
  try {
    const raw: unknown = JSON.parse(fs.readFileSync(configPath, 'utf8'));
    const parsed = SimcheckConfigSchema.safeParse(raw);
    return parsed.success ? parsed.data : {};
  } catch {
    return {};
  }
};

export const writeConfig = (
  update: Partial<SimcheckConfig>,
  configPath: string = CONFIG_PATH,
): SimcheckConfig => {
  const next: SimcheckConfig = {
    ...readConfig(configPath),
    ...update,
  };
  paths.ensureDir(path.dirname(configPath));
  fs.writeFileSync(configPath, JSON.stringify(next, null, 2), 'utf8');
  return next;
};

/**
 * Returns `null` when no API key is available anywhere; the oracle treats that as "not configured".
 */
export const resolveGeminiConfig = (
  overrides: GeminiConfigOverrides = {},
  env: Env = process.env,
  fileConfig: SimcheckConfig = readConfig(),
): GeminiConfig | null => {
  const apiKey =
    normalize(overrides.apiKey) ??
    normalize(env.GEMINI_API_KEY) ??
    normalize(fileConfig.geminiApiKey);
  if (!apiKey) {
    return null;
  }
  return {
    apiKey,
    model:
      normalize(overrides.model) ??
      normalize(env.GEMINI_MODEL) ??
      normalize(fileConfig.geminiModel) ??
      GEMINI_DEFAULT_MODEL,
    endpoint:
      cleanUrl(overrides.endpoint) ??
      cleanUrl(fileConfig.geminiEndpoint) ??
      GEMINI_DEFAULT_ENDPOINT,
    timeoutMs:
      validTimeout(overrides.timeoutMs) ??
      validTimeout(fileConfig.geminiTimeoutMs) ??
      GEMINI_TIMEOUT_MS,
    analysisPromptChars: ANALYSIS_PROMPT_CHARS,
    suggestionPromptChars: SUGGESTION_PROMPT_CHARS,
  };
};

export const resolveServerConfig = (
  overrides: ServerConfigOverrides = {},
  env: Env = process.env,
  fileConfig: SimcheckConfig = readConfig(),
): ServerConfig => ({
  host:
    normalize(overrides.host) ??
    normalize(env.SIMCHECK_HOST) ??
    normalize(fileConfig.serverHost) ??
    DEFAULT_SERVER_HOST,
  port:
    overrides.port ??
    parsePort(env.SIMCHECK_PORT) ??
    parsePort(env.PORT) ??
    fileConfig.serverPort ??
    DEFAULT_SERVER_PORT,
});
