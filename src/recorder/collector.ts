import { Query } from '../query/query.js';
import { QueryTraceListener } from '../trace/types.js';
import { ClassifierOptions } from '../types.js';
import { captureStackTrace } from './stack-trace.js';

export interface CollectorOptions extends ClassifierOptions {
  /** Current time in seconds */
  clock: () => number;
  /** Frame labels to drop, or null to skip stack traces */
  stackTraceIgnore: readonly string[] | null;
}

/**
 * Turns start/end notifications into Query records. Statements may
 * overlap: an end is paired with the earliest pending start of the same
 * statement text. Duration is 0 when no start is pending.
 */
export class QueryCollector implements QueryTraceListener {
  private readonly collected: Query[] = [];
  private readonly pendingStarts = new Map<string, number[]>();

  constructor(private readonly options: CollectorOptions) {}

  get queries(): readonly Query[] {
    return this.collected;
  }

  queryStart(sql: string): void {
    const starts = this.pendingStarts.get(sql);
    if (starts) {
      starts.push(this.options.clock());
    } else {
      this.pendingStarts.set(sql, [this.options.clock()]);
    }
  }

  queryEnd(sql: string): void {
    const starts = this.pendingStarts.get(sql);
    const startTime = starts?.shift();
    if (starts && starts.length === 0) {
      this.pendingStarts.delete(sql);
    }
    const duration = startTime === undefined ? 0 : this.options.clock() - startTime;

    const { stackTraceIgnore } = this.options;
    this.collected.push(
      new Query(
        {
          sql,
          duration,
          stackTrace: stackTraceIgnore === null ? undefined : captureStackTrace(stackTraceIgnore),
        },
        { reportSubselectTables: this.options.reportSubselectTables }
      )
    );
  }
}
