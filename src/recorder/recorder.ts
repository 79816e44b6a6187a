/**
 * Query Recorder
 *
 * Collects the SQL statements a unit of work issues through a trace source,
 * possibly across several runs, and tests them against an expectation spec.
 */

import { parseRecorderOptions, RecorderConfig, RecorderOptions } from '../config.js';
import { Query } from '../query/query.js';
import { aggregateQueries, TableOperationStats } from '../statistics/aggregator.js';
import { TraceSource } from '../trace/types.js';
import { ExpectationReport, ExpectationSpec } from '../types.js';
import { QueryCollector } from './collector.js';
import { buildReport } from './report.js';

export class QueryRecorder {
  private readonly config: RecorderConfig;
  private collected: Query[] = [];
  private cachedStats: TableOperationStats | null = null;
  private running = false;

  constructor(
    private readonly traceSource: TraceSource,
    options: RecorderOptions = {}
  ) {
    this.config = parseRecorderOptions(options);
  }

  /** Every query collected since the last `test` or `reset` */
  get queries(): readonly Query[] {
    return this.collected;
  }

  /** Aggregate of the collected queries, rebuilt after the list changes */
  get statistics(): TableOperationStats {
    if (this.cachedStats === null) {
      this.cachedStats = aggregateQueries(this.collected);
    }
    return this.cachedStats;
  }

  unknownQueries(): Query[] {
    return this.collected.filter((query) => !query.isClassified);
  }

  /**
   * Run `work` with the trace source attached and collect its queries.
   * The source is detached on every exit path; errors from `work` are
   * rethrown unchanged.
   *
   * @returns Whatever `work` returned
   */
  run<T>(work: () => T): T {
    const collector = this.begin();
    try {
      const result = work();
      if (result instanceof Promise) {
        console.error(
          'QueryRecorder.run: work returned a promise; queries issued after it yields are not collected. Use runAsync().'
        );
      }
      return result;
    } finally {
      this.finish(collector);
    }
  }

  /**
   * Async variant of `run`: the trace source stays attached until the
   * promise returned by `work` settles.
   */
  async runAsync<T>(work: () => Promise<T>): Promise<T> {
    const collector = this.begin();
    try {
      return await work();
    } finally {
      this.finish(collector);
    }
  }

  /**
   * Check the collected queries without resetting them.
   *
   * @throws ExpectationConfigError if the expectations are malformed
   */
  check(spec: ExpectationSpec): ExpectationReport {
    return buildReport(this.collected, spec, this.statistics);
  }

  /**
   * Check the collected queries, clear them, and report the verdict to the
   * assertion sink.
   *
   * @returns true if every expectation held
   * @throws ExpectationConfigError if the expectations are malformed (queries are kept)
   */
  test(spec: ExpectationSpec): boolean {
    const report = this.check(spec);
    this.reset();

    if (report.passed) {
      this.config.sink.pass(report.message);
    } else {
      this.config.sink.fail(report.message);
    }
    return report.passed;
  }

  reset(): void {
    this.collected = [];
    this.cachedStats = null;
  }

  private begin(): QueryCollector {
    if (this.running) {
      throw new Error('QueryRecorder is already running; nested runs are not supported');
    }

    const { clock, reportSubselectTables, stackTrace } = this.config;
    const collector = new QueryCollector({
      clock,
      reportSubselectTables,
      stackTraceIgnore: stackTrace.enabled ? stackTrace.ignore : null,
    });

    this.traceSource.attach(collector);
    this.running = true;
    return collector;
  }

  private finish(collector: QueryCollector): void {
    this.running = false;
    this.traceSource.detach();
    if (collector.queries.length > 0) {
      this.collected = [...this.collected, ...collector.queries];
      this.cachedStats = null;
    }
  }
}
