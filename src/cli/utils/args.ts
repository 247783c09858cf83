/**
 * Minimal flag parsing for the CLI
 *
 * Accepts both `--name value` and `--name=value`.
 */

import { ConfigurationError } from '../../lib/errors.js';

export function hasFlag(args: string[], name: string): boolean {
  return args.includes(`--${name}`);
}

export function getFlag(args: string[], name: string): string | undefined {
  const inline = args.find(a => a.startsWith(`--${name}=`));
  if (inline !== undefined) {
    const value = inline.slice(name.length + 3);
    if (value.trim() === '') {
      throw new ConfigurationError(`Flag --${name} needs a value`);
    }
    return value;
  }

  const index = args.indexOf(`--${name}`);
  if (index === -1) return undefined;

  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new ConfigurationError(`Flag --${name} needs a value`);
  }
  return value;
}

/**
 * Numeric flag value; throws on anything that is not a positive number
 */
export function getPositiveNumberFlag(args: string[], name: string): number | undefined {
  const raw = getFlag(args, name);
  if (raw === undefined) return undefined;

  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`Flag --${name} must be a positive number, got "${raw}"`);
  }
  return value;
}

/**
 * Arguments that are neither flags nor flag values
 *
 * @param valueFlags Flags that take a value
 */
export function positionals(args: string[], valueFlags: readonly string[]): string[] {
  const result: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      if (!arg.includes('=') && valueFlags.includes(arg.slice(2))) i++;
      continue;
    }
    result.push(arg);
  }
  return result;
}
