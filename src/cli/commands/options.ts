// src/cli/commands/options.ts
import { InvalidArgumentError } from 'commander';
import { ScrapeError } from '../../core/errors.js';

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function reportError(error: unknown): void {
  if (error instanceof ScrapeError) {
    console.error(`Error: ${error.message}`);
    if (error.suggestion) {
      console.error(`Hint: ${error.suggestion}`);
    }
    return;
  }
  console.error('Error:', error instanceof Error ? error.message : error);
}
