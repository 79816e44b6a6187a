/**
 * Expectation Evaluator
 *
 * Checks aggregated statistics against an expectation spec and collects
 * every violation. Only (table, operation) pairs that were actually
 * observed are checked: a table named in the expectations that saw no queries is
 * not reported, so expectations cannot assert that a query did run.
 */

import { ExpectationConfigError, UnsupportedStatisticError } from '../errors.js';
import { isStatisticName, statisticValue, TableOperationStats } from '../statistics/aggregator.js';
import {
  ALL_TABLES_KEY,
  ComparisonValue,
  ExpectationSpec,
  ExpectedOutcome,
  OperationExpectations,
  StatisticName,
  TABLE_OPERATIONS,
  TableOperation,
  Violation,
} from '../types.js';
import { compare, parseComparison } from './comparison.js';

/** Resolved outcome for one observed (table, operation) */
export type ResolvedOutcome =
  | { dontCare: true }
  | { dontCare: false; outcome: Exclude<ExpectedOutcome, null | undefined> };

function hasOwn(object: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(object, key);
}

function isTableOperation(value: string): value is TableOperation {
  return TABLE_OPERATIONS.some((operation) => operation === value);
}

/**
 * Expand an outcome into (statistic, comparison) pairs, sorted by statistic.
 * A scalar outcome is a count.
 */
function normalizeOutcome(outcome: ExpectedOutcome): [string, ComparisonValue][] {
  if (outcome !== null && typeof outcome === 'object') {
    return Object.entries(outcome).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  }
  return [['count', outcome]];
}

/**
 * Look up a table entry by case-insensitive name.
 */
function findTableEntry(spec: ExpectationSpec, table: string): OperationExpectations | undefined {
  if (hasOwn(spec, table)) {
    return spec[table];
  }
  const key = Object.keys(spec).find((candidate) => candidate.toLowerCase() === table);
  return key === undefined ? undefined : spec[key];
}

/**
 * Resolve the expected outcome: the table's own entry, then `_all_`,
 * then "exactly 0".
 */
export function resolveOutcome(
  spec: ExpectationSpec,
  table: string,
  operation: TableOperation
): ResolvedOutcome {
  const candidates = [findTableEntry(spec, table), spec[ALL_TABLES_KEY]];

  for (const entry of candidates) {
    if (entry && hasOwn(entry, operation)) {
      const outcome = entry[operation];
      if (outcome === null || outcome === undefined) {
        return { dontCare: true };
      }
      return { dontCare: false, outcome };
    }
  }

  return { dontCare: false, outcome: 0 };
}

/**
 * Check that every concrete outcome in the expectations parses, whether or not its
 * table was observed.
 *
 * @throws ExpectationConfigError on the first malformed entry
 */
export function validateExpectationSpec(spec: ExpectationSpec): void {
  for (const [table, operations] of Object.entries(spec)) {
    if (operations === null || typeof operations !== 'object' || Array.isArray(operations)) {
      throw new ExpectationConfigError(`expected queries: table '${table}' must map operations to outcomes`);
    }

    for (const [operation, outcome] of Object.entries(operations)) {
      if (!isTableOperation(operation)) {
        throw new ExpectationConfigError(
          `expected queries: unknown operation '${operation}' for table '${table}' ` +
            `(expected one of ${TABLE_OPERATIONS.join(', ')})`
        );
      }
      if (outcome === null || outcome === undefined) {
        continue;
      }

      for (const [statistic, value] of normalizeOutcome(outcome)) {
        if (!isStatisticName(statistic)) {
          throw new UnsupportedStatisticError(statistic);
        }
        if (value !== null && value !== undefined) {
          parseComparison(value);
        }
      }
    }
  }
}

/**
 * Print a statistic for a diagnostic: counts as integers, durations
 * rounded to microseconds.
 */
export function formatStatistic(statistic: StatisticName, value: number): string {
  if (statistic === 'count') {
    return String(value);
  }
  return String(Number(value.toFixed(6)));
}

/**
 * Evaluate aggregated statistics against an expectation spec.
 *
 * Violations are ordered by table, then operation, then statistic.
 *
 * @param stats - Aggregated statistics of the observed queries
 * @param spec - Expected outcomes per table and operation
 * @returns Every violated expectation
 * @throws ExpectationConfigError if the expectations are malformed
 */
export function evaluateExpectations(stats: TableOperationStats, spec: ExpectationSpec): Violation[] {
  validateExpectationSpec(spec);

  const violations: Violation[] = [];

  for (const table of [...stats.keys()].sort()) {
    const operations = stats.get(table);
    if (!operations) continue;

    for (const operation of [...operations.keys()].sort()) {
      const sample = operations.get(operation);
      if (!sample) continue;

      const resolved = resolveOutcome(spec, table, operation);
      if (resolved.dontCare) {
        continue;
      }

      for (const [statistic, value] of normalizeOutcome(resolved.outcome)) {
        if (value === null || value === undefined || !isStatisticName(statistic)) {
          continue;
        }

        const comparison = parseComparison(value);
        const actual = statisticValue(sample, statistic);
        if (compare(actual, comparison)) {
          continue;
        }

        violations.push({
          table,
          operation,
          statistic,
          expectedOutcome: comparison.raw,
          actual,
          message:
            `Expected ${statistic} '${comparison.raw}' ${operation}s for table '${table}', ` +
            `got '${formatStatistic(statistic, actual)}'`,
        });
      }
    }
  }

  return violations;
}
