/**
 * Grid Engine - Function Registry
 *
 * Lookup is case-insensitive and resolves synonyms to their canonical name.
 */

import { dateFunctions } from './date.js';
import { logicalFunctions } from './logical.js';
import { mathFunctions } from './math.js';
import { textFunctions } from './text.js';
import { FunctionDefinition } from './types.js';

export type { ArgValue, FunctionContext, FunctionDefinition, LazyArg, RangeValues } from './types.js';

export const functions: ReadonlyMap<string, FunctionDefinition> = new Map(
  [...mathFunctions, ...logicalFunctions, ...textFunctions, ...dateFunctions].map(
    fn => [fn.name, fn] as const
  )
);

/** Alternate name → canonical name */
export const FUNCTION_SYNONYMS: Readonly<Record<string, string>> = {
  AVG: 'AVERAGE',
  CEILING: 'CEIL',
  CONCAT: 'CONCATENATE',
  SEARCH: 'FIND',
  REPLACE: 'SUBSTITUTE',
  POW: 'POWER',
  LENGTH: 'LEN',
};

/**
 * Canonical names of functions whose result changes without any input changing.
 */
export const VOLATILE_FUNCTIONS: ReadonlySet<string> = new Set(
  [...functions.values()].filter(fn => fn.volatile).map(fn => fn.name)
);

export function resolveFunctionName(name: string): string {
  const upper = name.toUpperCase();
  return FUNCTION_SYNONYMS[upper] ?? upper;
}

export function getFunction(name: string): FunctionDefinition | undefined {
  return functions.get(resolveFunctionName(name));
}

/**
 * Does this name (or synonym) resolve to a volatile function?
 */
export function isVolatileFunction(name: string): boolean {
  return VOLATILE_FUNCTIONS.has(resolveFunctionName(name));
}
