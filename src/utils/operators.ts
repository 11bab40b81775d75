import type { ComparisonOperator } from '../types/condition.js';
import type { AttributeValue } from '../types/device.js';

/** Operand of a static comparison; arrays only for `in` / `not_in` */
export type Operand = AttributeValue | AttributeValue[];

/** Cache for RegExp objects of the `matches` operator */
const matchesRegexCache = new Map<string, RegExp>();

const TRUTHY_STRINGS: ReadonlySet<string> = new Set(['true', '1', 'yes', 'on', 'active', 'open']);

/**
 * Clears the regex cache. Useful in tests.
 */
export function clearMatchesCache(): void {
  matchesRegexCache.clear();
}

/**
 * Coerces a value reported by the hub to the type of the operand it is
 * compared against. Hubs commonly report numbers and switches as strings.
 * Values that cannot be converted are returned unchanged.
 */
export function coerceToOperand(value: AttributeValue, operand: Operand): AttributeValue {
  if (value === null) return null;

  const sample = Array.isArray(operand) ? operand.find(item => item !== null) : operand;
  if (sample === undefined || sample === null) return value;

  switch (typeof sample) {
    case 'boolean':
      if (typeof value === 'string') return TRUTHY_STRINGS.has(value.toLowerCase());
      if (typeof value === 'number') return value !== 0;
      return value;

    case 'number': {
      if (typeof value === 'number') return value;
      if (typeof value === 'string' && value.trim() !== '') {
        const parsed = Number(value);
        return Number.isNaN(parsed) ? value : parsed;
      }
      return value;
    }

    case 'string':
      return typeof value === 'string' ? value : String(value);

    default:
      return value;
  }
}

/**
 * Evaluates `value <operator> operand`.
 *
 * Ordering operators only compare two numbers or two strings; anything
 * else (including a missing value) is false.
 */
export function compareValues(
  operator: ComparisonOperator,
  value: AttributeValue | undefined,
  operand: Operand | undefined
): boolean {
  switch (operator) {
    case 'eq':
      return value === operand;

    case 'neq':
      return value !== operand;

    case 'gt': {
      const order = orderOf(value, operand);
      return order !== null && order > 0;
    }

    case 'gte': {
      const order = orderOf(value, operand);
      return order !== null && order >= 0;
    }

    case 'lt': {
      const order = orderOf(value, operand);
      return order !== null && order < 0;
    }

    case 'lte': {
      const order = orderOf(value, operand);
      return order !== null && order <= 0;
    }

    case 'in':
      return value !== undefined && Array.isArray(operand) && operand.includes(value);

    case 'not_in':
      return value !== undefined && Array.isArray(operand) && !operand.includes(value);

    case 'contains':
      return typeof value === 'string' && typeof operand === 'string' && value.includes(operand);

    case 'matches':
      if (typeof value === 'string' && typeof operand === 'string') {
        let regex = matchesRegexCache.get(operand);
        if (!regex) {
          try {
            regex = new RegExp(operand);
          } catch {
            return false;
          }
          matchesRegexCache.set(operand, regex);
        }
        return regex.test(value);
      }
      return false;

    default:
      return false;
  }
}

/** Symbol used in condition labels */
export const OPERATOR_SYMBOLS: Record<ComparisonOperator, string> = {
  eq: '==',
  neq: '!=',
  gt: '>',
  gte: '>=',
  lt: '<',
  lte: '<=',
  in: 'in',
  not_in: 'not in',
  contains: 'contains',
  matches: '=~',
};

/** Sign of `a - b` for two numbers or two strings, null when not comparable */
function orderOf(a: AttributeValue | undefined, b: Operand | undefined): number | null {
  if (typeof a === 'number' && typeof b === 'number') {
    if (Number.isNaN(a) || Number.isNaN(b)) return null;
    return Math.sign(a - b);
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return a === b ? 0 : a > b ? 1 : -1;
  }
  return null;
}
