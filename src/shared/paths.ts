/**
 * @file src/shared/paths.ts
 * @description Resolves the directory that holds the simcheck configuration file.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

const ROOT = process.env.SIMCHECK_HOME ?? path.join(os.homedir(), '.simcheck');

const ensureDir = (target: string): void => {
  fs.mkdirSync(target, { recursive: true });
};

export const paths = {
  ROOT,
  CONFIG: path.join(ROOT, '.simcheckrc.json'),
  ensureDir,
};
