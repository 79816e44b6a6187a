import { ExpectationConfigError } from '../errors.js';

export type ComparisonOperator = '==' | '!=' | '>' | '>=' | '<' | '<=';

export interface Comparison {
  operator: ComparisonOperator;
  threshold: number;
  /** The outcome as written by the caller, used in diagnostics */
  raw: string;
}

/** A leading number on its own means "equals" */
const EQUALS_PATTERN = /^\s*(\d+(?:\.\d+)?)/;

/** Longer operators first so ">=" is not read as ">" */
const OPERATOR_PATTERN = /^\s*(==|!=|>=|<=|>|<)\s*(\d+(?:\.\d+)?)/;

function isComparisonOperator(value: string): value is ComparisonOperator {
  return ['==', '!=', '>', '>=', '<', '<='].includes(value);
}

/**
 * Parse an expected outcome into an operator and a threshold.
 *
 * @example
 * parseComparison(3)        // { operator: '==', threshold: 3, raw: '3' }
 * parseComparison('<= 2')   // { operator: '<=', threshold: 2, raw: '<= 2' }
 * parseComparison('~= 2')   // throws ExpectationConfigError
 *
 * @throws ExpectationConfigError if the outcome is not a valid comparison
 */
export function parseComparison(outcome: number | string): Comparison {
  if (typeof outcome === 'number') {
    if (!Number.isFinite(outcome) || outcome < 0) {
      throw new ExpectationConfigError(`expected queries: invalid comparison (${outcome})`);
    }
    return { operator: '==', threshold: outcome, raw: String(outcome) };
  }

  const equalsMatch = EQUALS_PATTERN.exec(outcome);
  if (equalsMatch) {
    return { operator: '==', threshold: Number(equalsMatch[1]), raw: outcome };
  }

  const operatorMatch = OPERATOR_PATTERN.exec(outcome);
  if (operatorMatch && isComparisonOperator(operatorMatch[1])) {
    return { operator: operatorMatch[1], threshold: Number(operatorMatch[2]), raw: outcome };
  }

  throw new ExpectationConfigError(`expected queries: invalid comparison (${outcome})`);
}

/**
 * Apply a comparison to an actual value (actual <op> threshold).
 */
export function compare(actual: number, comparison: Comparison): boolean {
  const { threshold } = comparison;
  switch (comparison.operator) {
    case '==':
      return actual === threshold;
    case '!=':
      return actual !== threshold;
    case '>':
      return actual > threshold;
    case '>=':
      return actual >= threshold;
    case '<':
      return actual < threshold;
    case '<=':
      return actual <= threshold;
  }
}
