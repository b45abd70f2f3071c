/**
 * CLI helpers: input parsing and error handling.
 */

import { isTodoError } from '@todo-console/core';
import * as out from './output.js';

const INTEGER = /^[+-]?\d+$/;

/** Parse a whole number, allowing surrounding whitespace */
export function parseInteger(raw: string): number | null {
  const trimmed = raw.trim();
  if (!INTEGER.test(trimmed)) return null;
  return Number.parseInt(trimmed, 10);
}

/** Parse a menu selection in 1..max, or null */
export function parseMenuChoice(raw: string, max: number): number | null {
  const choice = parseInteger(raw);
  if (choice == null || choice < 1 || choice > max) return null;
  return choice;
}

/**
 * Parse a yes/no answer (case-insensitive y, yes, n, no).
 * Returns null for anything else.
 */
export function parseConfirmation(raw: string): boolean | null {
  switch (raw.trim().toLowerCase()) {
    case 'y': case 'yes': return true;
    case 'n': case 'no': return false;
    default: return null;
  }
}

/**
 * Print an error the way the menu reports it: domain errors show their
 * message, anything else is flagged as unexpected.
 */
export function reportError(err: unknown): void {
  if (isTodoError(err)) {
    out.error(`Error: ${err.message}`);
  } else if (err instanceof Error) {
    out.error(`Unexpected error: ${err.message}`);
  } else {
    out.error(`Unexpected error: ${String(err)}`);
  }
}

/**
 * Wrap a command action with error handling.
 */
export async function $try(fn: () => Promise<void> | void): Promise<void> {
  try {
    await fn();
  } catch (err: unknown) {
    reportError(err);
    process.exitCode = 1;
  }
}
