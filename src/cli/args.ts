/**
 * Minimal argv helpers for `--name value` options and `--flag` switches.
 */

import { UsageError } from './types.js';

/**
 * Value following `--name`, or undefined when absent.
 */
export function getOption(args: string[], name: string): string | undefined {
  const index = args.indexOf(`--${name}`);
  if (index < 0) return undefined;
  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new UsageError(`--${name} requires a value`);
  }
  return value;
}

export function requireOption(args: string[], name: string, usage: string): string {
  const value = getOption(args, name);
  if (value === undefined) {
    throw new UsageError(`--${name} is required`, usage);
  }
  return value;
}

export function hasFlag(args: string[], name: string): boolean {
  return args.includes(`--${name}`);
}

/**
 * Non-negative integer option, or `fallback` when absent.
 */
export function getIntOption(args: string[], name: string, fallback: number): number {
  const raw = getOption(args, name);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new UsageError(`--${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

/**
 * Arguments that are neither options nor option values.
 *
 * @param valued - Option names that consume the following argument
 */
export function positionals(args: string[], valued: readonly string[]): string[] {
  const result: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      if (valued.includes(arg.slice(2))) i++;
      continue;
    }
    result.push(arg);
  }
  return result;
}
