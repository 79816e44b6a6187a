import { QueryTraceListener, TraceSource } from './types.js';

/**
 * In-process trace source driven by the caller. Useful for replaying a
 * query log or for code that reports its own statements.
 */
export class ManualTraceSource implements TraceSource {
  private listener: QueryTraceListener | null = null;

  attach(listener: QueryTraceListener): void {
    if (this.listener) {
      throw new Error('ManualTraceSource is already attached');
    }
    this.listener = listener;
  }

  detach(): void {
    this.listener = null;
  }

  get isAttached(): boolean {
    return this.listener !== null;
  }

  /** Report the start of a statement; ignored while detached */
  begin(sql: string): void {
    this.listener?.queryStart(sql);
  }

  /** Report the end of a statement; ignored while detached */
  end(sql: string): void {
    this.listener?.queryEnd(sql);
  }

  /** Report a complete statement */
  execute(sql: string): void {
    this.begin(sql);
    this.end(sql);
  }
}
