/** Operations a classified statement is attributed to */
export const TABLE_OPERATIONS = ['select', 'insert', 'update', 'delete'] as const;

export type TableOperation = (typeof TABLE_OPERATIONS)[number];

/** Statistics that can be asserted on per table operation */
export const STATISTIC_NAMES = ['count', 'max', 'mean', 'min', 'sum'] as const;

export type StatisticName = (typeof STATISTIC_NAMES)[number];

/** Reserved expectation key holding defaults for every table */
export const ALL_TABLES_KEY = '_all_';

/**
 * Result of classifying a single SQL statement.
 *
 * `subselect` is the marker used when a SELECT reads from a parenthesised
 * sub-select and no table could be found inside it: the statement counts as
 * a select on the pseudo-table "select".
 */
export type Classification =
  | { kind: 'classified'; operation: TableOperation; table: string }
  | { kind: 'subselect'; operation: 'select'; table: 'select' }
  | { kind: 'unclassified' };

export interface ClassifierOptions {
  /** Look inside `FROM (select ...)` for the first real table name */
  reportSubselectTables?: boolean;
}

/**
 * A single comparison: a bare number means "equals", a string is
 * `"<op> <number>"` with op one of == != > >= < <=.
 * `null` / `undefined` on a present key means "don't care".
 */
export type ComparisonValue = number | string | null | undefined;

/** Per-statistic comparisons, e.g. `{ count: '<= 2', max: '< 0.5' }` */
export type StatisticExpectations = Partial<Record<StatisticName, ComparisonValue>>;

export type ExpectedOutcome = ComparisonValue | StatisticExpectations;

export type OperationExpectations = Partial<Record<TableOperation, ExpectedOutcome>>;

/**
 * Expected table operations, keyed by table name. The `_all_` key supplies
 * defaults for tables without their own entry for an operation.
 *
 * @example
 * {
 *   book: { select: '<= 2' },
 *   author: { insert: 1, update: null },
 *   _all_: { select: { count: '< 10', max: '< 0.25' } },
 * }
 */
export interface ExpectationSpec {
  [table: string]: OperationExpectations;
}

/** One evaluated expectation that did not hold */
export interface Violation {
  table: string;
  operation: TableOperation;
  statistic: StatisticName;
  /** The outcome as written in the expectation spec */
  expectedOutcome: string;
  actual: number;
  message: string;
}

/**
 * Outcome of checking collected queries against an expectation spec
 */
export interface ExpectationReport {
  passed: boolean;
  message: string;
  violations: Violation[];
  unknownQueries: string[];
}
