/**
 * node-postgres Trace Source
 *
 * Instruments a pg Pool, Client or PoolClient while a listener is attached
 * by shadowing `query` on the instance. Supports the promise form, the
 * callback form and submittables (pg.Query, pg-cursor).
 */

import { EventEmitter } from 'events';
import type { ClientBase, Pool } from 'pg';
import { QueryTraceListener, TraceSource } from './types.js';

/**
 * Anything with a pg-style `query` method.
 */
export interface Queryable {
  query(...args: unknown[]): unknown;
}

export type PgQueryTarget = Pool | ClientBase | Queryable;

/**
 * Extract the statement text from pg `query` arguments:
 * `(text, values?, cb?)` or `({ text, values }, cb?)`.
 */
export function statementText(args: readonly unknown[]): string {
  const [first] = args;
  if (typeof first === 'string') {
    return first;
  }
  if (typeof first === 'object' && first !== null && 'text' in first && typeof first.text === 'string') {
    return first.text;
  }
  return '';
}

export class PgTraceSource implements TraceSource {
  private readonly target: Queryable;
  private restore: (() => void) | null = null;

  constructor(target: PgQueryTarget) {
    this.target = target;
  }

  attach(listener: QueryTraceListener): void {
    if (this.restore) {
      throw new Error('PgTraceSource is already attached');
    }

    const target = this.target;
    const hadOwnQuery = Object.prototype.hasOwnProperty.call(target, 'query');
    const previous = target.query;

    target.query = (...args: unknown[]): unknown => {
      const text = statementText(args);
      let ended = false;
      const end = (): void => {
        if (ended) return;
        ended = true;
        listener.queryEnd(text);
      };

      const callback = args[args.length - 1];
      if (typeof callback === 'function') {
        args[args.length - 1] = (...callbackArgs: unknown[]) => {
          end();
          callback(...callbackArgs);
        };
      }

      listener.queryStart(text);
      let result: unknown;
      try {
        result = previous.apply(target, args);
      } catch (error) {
        end();
        throw error;
      }

      if (result instanceof Promise) {
        return result.finally(end);
      }
      if (result instanceof EventEmitter) {
        const submittable = result;
        const onEnd = (): void => {
          submittable.removeListener('error', onError);
          end();
        };
        // Without a listener of the caller's, the error must still throw
        const onError = (error: unknown): void => {
          submittable.removeListener('end', onEnd);
          end();
          if (submittable.listenerCount('error') === 0) {
            throw error;
          }
        };
        submittable.once('end', onEnd);
        submittable.once('error', onError);
      } else if (typeof callback !== 'function') {
        end();
      }
      return result;
    };

    this.restore = () => {
      if (hadOwnQuery) {
        target.query = previous;
      } else {
        Reflect.deleteProperty(target, 'query');
      }
    };
  }

  detach(): void {
    const restore = this.restore;
    this.restore = null;
    restore?.();
  }
}
