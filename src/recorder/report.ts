/**
 * Report Formatting
 *
 * Builds the pass/fail message for a set of observed queries checked
 * against an expectation spec.
 */

import { evaluateExpectations } from '../expectations/evaluator.js';
import { Query } from '../query/query.js';
import { aggregateQueries, TableOperationStats } from '../statistics/aggregator.js';
import { ExpectationReport, ExpectationSpec, Violation } from '../types.js';

const REPORT_TITLE = 'Expected queries for tables';

/**
 * Every query whose table matches (case-insensitively), one display block
 * per line.
 */
export function sqlQueriesForTable(queries: readonly Query[], table: string): string {
  const wanted = table.toLowerCase();
  return queries
    .filter((query) => (query.table ?? '').toLowerCase() === wanted)
    .map((query) => query.displaySql())
    .join('\n');
}

/**
 * Advisory block listing unclassified queries, or an empty string.
 */
export function unknownQueriesWarning(queries: readonly Query[]): string {
  const unknown = queries.filter((query) => !query.isClassified);
  if (unknown.length === 0) {
    return '';
  }
  return `\n\nWarning: unknown queries:\n${unknown.map((query) => query.displaySql()).join('\n')}\n`;
}

/**
 * One section per violated table: its violation lines followed by the SQL
 * actually executed against it.
 */
export function formatViolations(violations: readonly Violation[], queries: readonly Query[]): string {
  const byTable = new Map<string, string[]>();
  for (const violation of violations) {
    const lines = byTable.get(violation.table) ?? [];
    lines.push(violation.message);
    byTable.set(violation.table, lines);
  }

  let message = '';
  for (const table of [...byTable.keys()].sort()) {
    message += `* Table: ${table}\n`;
    message += (byTable.get(table) ?? []).join('\n');
    message += `\nActually executed SQL queries on table '${table}':\n`;
    message += `${sqlQueriesForTable(queries, table)}\n\n`;
  }
  return message;
}

/**
 * Evaluate the queries against the expectations and format the result.
 *
 * @param queries - Observed queries
 * @param spec - Expected outcomes per table and operation
 * @param stats - Precomputed aggregate of `queries`, if available
 * @throws ExpectationConfigError if the expectations are malformed
 */
export function buildReport(
  queries: readonly Query[],
  spec: ExpectationSpec,
  stats: TableOperationStats = aggregateQueries(queries)
): ExpectationReport {
  const violations = evaluateExpectations(stats, spec);
  const warning = unknownQueriesWarning(queries);
  const unknownQueries = queries.filter((query) => !query.isClassified).map((query) => query.sql);

  if (violations.length > 0) {
    return {
      passed: false,
      message: `${REPORT_TITLE}:\n\n${formatViolations(violations, queries)}${warning}`,
      violations,
      unknownQueries,
    };
  }

  return {
    passed: true,
    message: `${REPORT_TITLE}${warning}`,
    violations,
    unknownQueries,
  };
}
