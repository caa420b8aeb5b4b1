/**
 * Grid Engine - Date Functions
 *
 * Both read the evaluation clock, so cells using them are volatile.
 */

import { dateValue, daysSinceEpoch, numberValue } from '../../types/CellValue.js';
import { FunctionDefinition } from './types.js';

const MS_PER_DAY = 86_400_000;

/**
 * Current UTC day as a date value.
 */
export const TODAY: FunctionDefinition = {
  name: 'TODAY',
  minArgs: 0,
  maxArgs: 0,
  volatile: true,
  evaluate(_args, context) {
    return dateValue(daysSinceEpoch(context.now()));
  },
};

/**
 * Current instant as fractional days since 1970-01-01.
 */
export const NOW: FunctionDefinition = {
  name: 'NOW',
  minArgs: 0,
  maxArgs: 0,
  volatile: true,
  evaluate(_args, context) {
    return numberValue(context.now().getTime() / MS_PER_DAY);
  },
};

export const dateFunctions: FunctionDefinition[] = [TODAY, NOW];
