/**
 * expected-sql-queries
 *
 * Assert which SQL queries a piece of code runs, per table and operation.
 */

export * from './types.js';
export * from './errors.js';
export { classifySql, normalizeTableTarget, stripLeadingComments } from './query/classifier.js';
export { Query, QueryInit } from './query/query.js';
export {
  StatSample,
  TableOperationStats,
  aggregateQueries,
  statisticValue,
  summarizeStatistics,
} from './statistics/aggregator.js';
export { Comparison, ComparisonOperator, compare, parseComparison } from './expectations/comparison.js';
export { evaluateExpectations, validateExpectationSpec } from './expectations/evaluator.js';
export { expectationSpecSchema } from './expectations/schema.js';
export { QueryRecorder } from './recorder/recorder.js';
export { buildReport } from './recorder/report.js';
export { DEFAULT_STACK_TRACE_IGNORE, captureStackTrace } from './recorder/stack-trace.js';
export { QueryTraceListener, TraceSource } from './trace/types.js';
export { ManualTraceSource } from './trace/manual-trace-source.js';
export { PgQueryTarget, PgTraceSource, Queryable } from './trace/pg-trace-source.js';
export {
  AssertionResult,
  AssertionSink,
  CollectingAssertionSink,
  createCollectingAssertionSink,
  loggingAssertionSink,
  throwingAssertionSink,
} from './assertions/sink.js';
export { RecorderConfig, RecorderOptions, loadRecorderOptionsFromEnv, parseRecorderOptions } from './config.js';
export { expectedQueries, expectedQueriesAsync } from './expected-queries.js';
