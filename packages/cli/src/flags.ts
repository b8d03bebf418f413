/**
 * Shared CLI flag helpers.
 */

import * as fs from 'node:fs';
import { CLIError } from './index';

/** Flags that consume the argument after them. */
const VALUE_FLAGS = new Set(['--config', '--format', '--warps', '--wefts']);

/**
 * Extract a named flag's value from an argument array.
 * Returns the string following `flag`, or undefined if not present.
 */
export function getFlag(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx !== -1 && idx + 1 < args.length) {
    return args[idx + 1];
  }
  return undefined;
}

/** A flag's value as a positive integer, or undefined when the flag is absent. */
export function getCountFlag(args: string[], flag: string): number | undefined {
  const raw = getFlag(args, flag);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!/^\d+$/.test(raw) || value < 1) {
    throw new CLIError(`Invalid ${flag} value: ${raw}. Use a positive whole number.`);
  }
  return value;
}

/** Arguments that are neither flags nor flag values, in order. */
export function getPositionals(args: string[]): string[] {
  const positionals: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (VALUE_FLAGS.has(arg)) {
      i++;
    } else if (!arg.startsWith('-')) {
      positionals.push(arg);
    }
  }
  return positionals;
}

/**
 * Read a file referenced on the command line, throwing CLIError if missing.
 */
export function readInputFile(filePath: string): string {
  if (!fs.existsSync(filePath)) {
    throw new CLIError(`File not found: ${filePath}`);
  }
  return fs.readFileSync(filePath, 'utf-8');
}
