/**
 * Narrowing helpers for the opaque option maps stages receive.
 */

import type { OptionMap, OptionSpec } from '@bitforge/types';
import { StageError } from '../errors/BitforgeError.js';

function invalid(stage: string, option: string, expected: string, value: unknown): StageError {
  return new StageError(
    `Option "${option}" of stage "${stage}" must be ${expected}, got ${JSON.stringify(value)}`,
    'ERR_INVALID_OPTION',
    { stage, option, value }
  );
}

export function stringOption(stage: string, options: OptionMap, name: string): string | undefined;
export function stringOption(stage: string, options: OptionMap, name: string, fallback: string): string;
export function stringOption(stage: string, options: OptionMap, name: string, fallback?: string): string | undefined {
  const value = options[name];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'string') throw invalid(stage, name, 'a string', value);
  return value;
}

export function requireStringOption(stage: string, options: OptionMap, name: string): string {
  const value = stringOption(stage, options, name);
  if (value === undefined || value === '') throw invalid(stage, name, 'a non-empty string', value);
  return value;
}

export function enumOption<T extends string>(
  stage: string,
  options: OptionMap,
  name: string,
  values: readonly T[],
  fallback: T
): T {
  const value = stringOption(stage, options, name);
  if (value === undefined) return fallback;
  const match = values.find((candidate) => candidate === value);
  if (match === undefined) throw invalid(stage, name, `one of ${values.join(', ')}`, value);
  return match;
}

/**
 * Lists accept an array of strings or one whitespace-separated string.
 */
export function listOption(stage: string, options: OptionMap, name: string): string[] {
  const value = options[name];
  if (value === undefined || value === null) return [];
  if (typeof value === 'string') return value.split(/\s+/).filter(Boolean);
  if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
    return [...value];
  }
  throw invalid(stage, name, 'a list of strings', value);
}

/**
 * Check resolved options against a variant's option table. Keys the table
 * does not document are left alone; they belong to other stages.
 *
 * @throws StageError ERR_INVALID_OPTION
 */
export function checkOptions(stage: string, specs: Readonly<Record<string, OptionSpec>>, options: OptionMap): void {
  for (const [name, spec] of Object.entries(specs)) {
    const value = options[name];
    if (value === undefined || value === null) continue;

    switch (spec.type) {
      case 'string':
        if (spec.values) enumOption(stage, options, name, spec.values, spec.values[0]);
        else stringOption(stage, options, name);
        break;
      case 'list':
        listOption(stage, options, name);
        break;
      case 'integer':
        if (!Number.isInteger(value)) throw invalid(stage, name, 'an integer', value);
        break;
      case 'boolean':
        if (typeof value !== 'boolean') throw invalid(stage, name, 'a boolean', value);
        break;
    }
  }
}
