/**
 * @file src/commands/option-parsers.ts
 * @description Commander argument parsers for numeric flags.
 */

import { InvalidArgumentError } from 'commander';

const toInteger = (value: string): number | undefined => {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) return undefined;
  const parsed = Number(trimmed);
  return Number.isSafeInteger(parsed) ? parsed : undefined;
};

export const parseTimeoutOption = (value: string): number => {
  const parsed = toInteger(value);
  if (parsed === undefined || parsed <= 0) {
    throw new InvalidArgumentError('Timeout must be a positive whole number of milliseconds.');
  }
  return parsed;
};

export const parsePortOption = (value: string): number => {
  const parsed = toInteger(value);
  if (parsed === undefined || parsed > 65535) {
    throw new InvalidArgumentError('Port must be a whole number between 0 and 65535.');
  }
  return parsed;
};
