/**
 * Raised for an expectation spec that cannot be evaluated, e.g. a malformed
 * comparison string. Evaluation stops at the first one.
 */
export class ExpectationConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExpectationConfigError';
  }
}

/**
 * Raised when an expectation names a statistic other than
 * count, mean, sum, max or min.
 */
export class UnsupportedStatisticError extends ExpectationConfigError {
  readonly statistic: string;

  constructor(statistic: string) {
    super(`expected queries: unsupported statistic (${statistic})`);
    this.name = 'UnsupportedStatisticError';
    this.statistic = statistic;
  }
}

/**
 * Thrown by the default assertion sink when collected queries do not match
 * the expectation spec.
 */
export class ExpectedQueriesAssertionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExpectedQueriesAssertionError';
  }
}

/**
 * Type guard for configuration errors raised while evaluating expectations.
 */
export function isExpectationConfigError(error: unknown): error is ExpectationConfigError {
  return error instanceof ExpectationConfigError;
}
