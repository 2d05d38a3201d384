/**
 * Task input resolution for the run command
 */

import * as fs from 'fs';

/**
 * Bad invocation or unreadable input; the CLI exits with code 2
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface TaskSource {
  /** Positional task words */
  words: string[];
  file?: string;
  pr?: string;
}

/**
 * Task text from a file or the positional arguments. A pull request alone
 * yields a default review task.
 */
export function resolveTaskText(source: TaskSource): string {
  if (source.file && source.words.length > 0) {
    throw new UsageError('Pass the task either as an argument or with --file, not both');
  }

  if (source.file) {
    try {
      return fs.readFileSync(source.file, 'utf-8');
    } catch (error) {
      throw new UsageError(
        `Cannot read task file ${source.file}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  const text = source.words.join(' ').trim();
  if (text) {
    return text;
  }
  if (source.pr) {
    return 'Review this pull request';
  }
  throw new UsageError('A task description is required (argument or --file)');
}

/**
 * Parse a positive integer option
 */
export function parsePositiveInt(name: string, value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new UsageError(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}
