import { v4 as uuidv4 } from 'uuid';
import { Classification, ClassifierOptions, TableOperation } from '../types.js';
import { classifySql } from './classifier.js';

export interface QueryInit {
  sql: string;
  /** Seconds; negative or non-finite values are stored as 0 */
  duration?: number;
  stackTrace?: string;
}

/**
 * One observed SQL statement, classified when it is created.
 */
export class Query {
  readonly id: string;
  readonly sql: string;
  readonly duration: number;
  readonly stackTrace: string | undefined;
  readonly classification: Classification;

  constructor(init: QueryInit, options: ClassifierOptions = {}) {
    this.id = uuidv4();
    this.sql = init.sql.endsWith('\n') ? init.sql.slice(0, -1) : init.sql;
    this.duration = init.duration !== undefined && Number.isFinite(init.duration) && init.duration > 0
      ? init.duration
      : 0;
    this.stackTrace = init.stackTrace;
    this.classification = classifySql(this.sql, options);
    Object.freeze(this);
  }

  get operation(): TableOperation | undefined {
    return this.classification.kind === 'unclassified' ? undefined : this.classification.operation;
  }

  get table(): string | undefined {
    return this.classification.kind === 'unclassified' ? undefined : this.classification.table;
  }

  get isClassified(): boolean {
    return this.classification.kind !== 'unclassified';
  }

  /**
   * The statement as shown in reports, followed by its stack trace
   * (indented) when one was captured.
   */
  displaySql(): string {
    const sql = `SQL: (${this.sql})`;
    if (!this.stackTrace) {
      return sql;
    }
    const indented = this.stackTrace
      .split('\n')
      .map((line) => `    ${line}`)
      .join('\n');
    return `${sql}\n${indented}`;
  }
}
