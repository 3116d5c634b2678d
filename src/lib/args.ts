import { RcompError } from './errors.js';

/** Commander collector for repeatable options. */
export function collect(value: string, previous: string[]): string[] {
  return previous.concat([value]);
}

/**
 * Flatten repeated and comma-separated CLI values (`--goal a,b --goal c`)
 * into a trimmed list without empty entries.
 */
export function parseList(values: string[] | undefined): string[] {
  return (values ?? [])
    .flatMap((v) => v.split(','))
    .map((v) => v.trim())
    .filter((v) => v.length > 0);
}

export function parseCount(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value.trim())) {
    throw new RcompError(`Invalid ${flag} value: "${value}" — expected a non-negative integer`, 'INVALID_ARGS');
  }
  return Number(value.trim());
}
