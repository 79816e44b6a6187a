/**
 * Receives notifications for every statement executed while attached.
 * Each statement's start precedes its end. Statements may overlap (e.g.
 * concurrent pool queries), so starts and ends of different statements
 * can interleave.
 */
export interface QueryTraceListener {
  queryStart(sql: string): void;
  queryEnd(sql: string): void;
}

/**
 * A source of SQL statement notifications, e.g. an instrumented database
 * client. At most one listener is attached at a time.
 */
export interface TraceSource {
  attach(listener: QueryTraceListener): void;
  detach(): void;
}
