/**
 * Shared option parsers and error reporting for the commands
 */

import { InvalidArgumentError } from 'commander';
import { describeError, exitCodeFor } from '../errors.js';
import type { Language } from '../types.js';
import { parseLanguage } from '../utils/language.js';
import type { QualityPreference } from '../workflow.js';

export function languageOption(value: string): Language {
  try {
    return parseLanguage(value);
  } catch (error) {
    throw new InvalidArgumentError(describeError(error));
  }
}

/** Repeatable --lang; replaces the default list on first use */
export function languageListOption(value: string, previous: Language[] | undefined): Language[] {
  return [...(previous ?? []), ...value.split(',').map(languageOption)];
}

export function qualityOption(value: string): QualityPreference {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'best' || normalized === 'hd' || normalized === 'sd') {
    return normalized;
  }
  throw new InvalidArgumentError('Expected best, hd or sd.');
}

export function limitOption(value: string): number {
  const parsed = parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Expected a whole number (0 = no limit).');
  }
  return parsed;
}

export function scoreOption(value: string): number {
  const parsed = parseFloat(value);
  if (Number.isNaN(parsed) || parsed < 0 || parsed > 1) {
    throw new InvalidArgumentError('Expected a score between 0 and 1.');
  }
  return parsed;
}

/**
 * Print a failure and leave the exit code for when the process winds down,
 * so exit handlers (cookie jar) still run.
 */
export function reportFailure(error: unknown): void {
  console.error(`\n❌ ${describeError(error)}`);
  process.exitCode = exitCodeFor(error);
}
