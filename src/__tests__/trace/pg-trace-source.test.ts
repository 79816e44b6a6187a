import { describe, it, expect, beforeEach } from '@jest/globals';
import { EventEmitter } from 'events';
import { Pool } from 'pg';
import { createCollectingAssertionSink } from '../../assertions/sink.js';
import { QueryRecorder } from '../../recorder/recorder.js';
import { PgTraceSource, statementText } from '../../trace/pg-trace-source.js';
import { QueryTraceListener } from '../../trace/types.js';

type Responder = (args: unknown[]) => unknown;

/**
 * Stand-in for a pg client: `query` lives on the prototype and delegates to
 * a per-test responder.
 */
class FakeClient {
  readonly calls: unknown[][] = [];
  respond: Responder = () => Promise.resolve({ rows: [] });

  query(...args: unknown[]): unknown {
    this.calls.push(args);
    return this.respond(args);
  }
}

const recordingListener = (events: string[]): QueryTraceListener => ({
  queryStart: (sql) => events.push(`start ${sql}`),
  queryEnd: (sql) => events.push(`end ${sql}`),
});

describe('statementText', () => {
  it('should read the text argument', () => {
    expect(statementText(['SELECT 1', [1]])).toBe('SELECT 1');
  });

  it('should read a query config object', () => {
    expect(statementText([{ text: 'SELECT * FROM book WHERE id = $1', values: [34] }])).toBe(
      'SELECT * FROM book WHERE id = $1'
    );
  });

  it('should fall back to an empty statement', () => {
    expect(statementText([])).toBe('');
    expect(statementText([{ name: 'prepared' }])).toBe('');
  });
});

describe('PgTraceSource', () => {
  let client: FakeClient;
  let source: PgTraceSource;
  let events: string[];

  beforeEach(() => {
    client = new FakeClient();
    source = new PgTraceSource(client);
    events = [];
  });

  describe('promise queries', () => {
    it('should report the end once the promise settles', async () => {
      source.attach(recordingListener(events));

      const pending = client.query('SELECT * FROM book');
      expect(events).toEqual(['start SELECT * FROM book']);

      await expect(pending).resolves.toEqual({ rows: [] });
      expect(events).toEqual(['start SELECT * FROM book', 'end SELECT * FROM book']);
    });

    it('should report the end of a rejected query and keep the rejection', async () => {
      const failure = new Error('relation "book" does not exist');
      client.respond = () => Promise.reject(failure);
      source.attach(recordingListener(events));

      await expect(client.query('SELECT * FROM book')).rejects.toBe(failure);
      expect(events).toEqual(['start SELECT * FROM book', 'end SELECT * FROM book']);
    });

    it('should pass arguments through unchanged', async () => {
      source.attach(recordingListener(events));

      await client.query({ text: 'SELECT * FROM book WHERE id = $1', values: [34] });

      expect(client.calls).toEqual([[{ text: 'SELECT * FROM book WHERE id = $1', values: [34] }]]);
      expect(events).toEqual(['start SELECT * FROM book WHERE id = $1', 'end SELECT * FROM book WHERE id = $1']);
    });
  });

  describe('callback queries', () => {
    it('should report the end before calling the original callback', () => {
      let complete: ((...args: unknown[]) => void) | undefined;
      client.respond = (args) => {
        const last = args[args.length - 1];
        if (typeof last === 'function') {
          complete = (...callbackArgs: unknown[]) => last(...callbackArgs);
        }
        return undefined;
      };
      const received: unknown[][] = [];
      source.attach(recordingListener(events));

      client.query('SELECT * FROM book', [], (...callbackArgs: unknown[]) => {
        events.push('callback');
        received.push(callbackArgs);
      });
      expect(events).toEqual(['start SELECT * FROM book']);

      complete?.(null, { rows: [{ id: 1 }] });

      expect(events).toEqual(['start SELECT * FROM book', 'end SELECT * FROM book', 'callback']);
      expect(received).toEqual([[null, { rows: [{ id: 1 }] }]]);
    });
  });

  describe('submittables', () => {
    it('should report the end when the submittable ends', () => {
      const submittable = new EventEmitter();
      client.respond = () => submittable;
      source.attach(recordingListener(events));

      expect(client.query('SELECT * FROM book')).toBe(submittable);
      expect(events).toEqual(['start SELECT * FROM book']);

      submittable.emit('end');

      expect(events).toEqual(['start SELECT * FROM book', 'end SELECT * FROM book']);
      expect(submittable.listenerCount('end')).toBe(0);
      expect(submittable.listenerCount('error')).toBe(0);
    });

    it('should leave a later unhandled error to throw', () => {
      const submittable = new EventEmitter();
      const failure = new Error('late');
      client.respond = () => submittable;
      source.attach(recordingListener(events));

      client.query('SELECT * FROM book');
      submittable.emit('end');

      expect(() => submittable.emit('error', failure)).toThrow(failure);
    });

    it('should report the end and pass the error to the caller listener', () => {
      const submittable = new EventEmitter();
      const failure = new Error('canceled');
      const received: unknown[] = [];
      client.respond = () => submittable;
      source.attach(recordingListener(events));

      client.query('SELECT * FROM book');
      submittable.on('error', (error) => received.push(error));
      submittable.emit('error', failure);

      expect(events).toEqual(['start SELECT * FROM book', 'end SELECT * FROM book']);
      expect(received).toEqual([failure]);
      expect(submittable.listenerCount('end')).toBe(0);
    });

    it('should rethrow an error nobody listens for', () => {
      const submittable = new EventEmitter();
      const failure = new Error('syntax error at or near "FORM"');
      client.respond = () => submittable;
      source.attach(recordingListener(events));

      client.query('SELECT * FORM book');

      expect(() => submittable.emit('error', failure)).toThrow(failure);
      expect(events).toEqual(['start SELECT * FORM book', 'end SELECT * FORM book']);
    });
  });

  describe('synchronous results', () => {
    it('should report the end of a query that throws and rethrow the error', () => {
      const failure = new Error('Client was closed and is not queryable');
      client.respond = () => {
        throw failure;
      };
      source.attach(recordingListener(events));

      expect(() => client.query('SELECT 1')).toThrow(failure);
      expect(events).toEqual(['start SELECT 1', 'end SELECT 1']);
    });

    it('should report the end of a plain return value immediately', () => {
      client.respond = () => 'queued';
      source.attach(recordingListener(events));

      expect(client.query('SELECT 1')).toBe('queued');
      expect(events).toEqual(['start SELECT 1', 'end SELECT 1']);
    });
  });

  describe('attach and detach', () => {
    it('should remove the instance override on detach', async () => {
      source.attach(recordingListener(events));
      expect(Object.prototype.hasOwnProperty.call(client, 'query')).toBe(true);

      source.detach();
      await client.query('SELECT 1');

      expect(Object.prototype.hasOwnProperty.call(client, 'query')).toBe(false);
      expect(client.query).toBe(FakeClient.prototype.query);
      expect(events).toEqual([]);
    });

    it('should restore an own query property on detach', () => {
      const query = (): unknown => Promise.resolve({ rows: [] });
      const target = { query };
      const ownSource = new PgTraceSource(target);

      ownSource.attach(recordingListener(events));
      expect(target.query).not.toBe(query);
      ownSource.detach();

      expect(target.query).toBe(query);
    });

    it('should reject a second attach', () => {
      source.attach(recordingListener(events));

      expect(() => source.attach(recordingListener(events))).toThrow('PgTraceSource is already attached');
    });

    it('should allow detach without attach', () => {
      expect(() => source.detach()).not.toThrow();
    });

    it('should instrument a pg Pool without connecting', async () => {
      const pool = new Pool();
      const poolSource = new PgTraceSource(pool);

      poolSource.attach(recordingListener(events));
      expect(Object.prototype.hasOwnProperty.call(pool, 'query')).toBe(true);
      poolSource.detach();

      expect(Object.prototype.hasOwnProperty.call(pool, 'query')).toBe(false);
      await pool.end();
    });
  });

  describe('with QueryRecorder', () => {
    it('should collect awaited queries and test them', async () => {
      const sink = createCollectingAssertionSink();
      const recorder = new QueryRecorder(source, { sink, stackTrace: { enabled: false } });

      await recorder.runAsync(async () => {
        await client.query('SELECT * FROM book WHERE id = $1', [34]);
        await client.query('SELECT * FROM author WHERE id = $1', [7]);
      });

      expect(recorder.queries.map((query) => query.table)).toEqual(['book', 'author']);
      expect(recorder.test({ _all_: { select: 1 } })).toBe(true);
      expect(sink.results).toEqual([{ passed: true, message: 'Expected queries for tables' }]);
      expect(Object.prototype.hasOwnProperty.call(client, 'query')).toBe(false);
    });

    it('should time concurrent queries individually', async () => {
      let now = 0;
      const settle = new Map<string, () => void>();
      client.respond = (args) =>
        new Promise((resolve) => {
          settle.set(statementText(args), () => resolve({ rows: [] }));
        });
      const recorder = new QueryRecorder(source, { clock: () => now, stackTrace: { enabled: false } });
      const flush = () => new Promise((resolve) => setImmediate(resolve));

      const work = recorder.runAsync(() => {
        const book = client.query('SELECT * FROM book');
        now = 1;
        const author = client.query('SELECT * FROM author');
        return Promise.all([book, author]);
      });

      now = 3;
      settle.get('SELECT * FROM author')?.();
      await flush();
      now = 6;
      settle.get('SELECT * FROM book')?.();
      await work;

      const durations = Object.fromEntries(recorder.queries.map((query) => [query.table, query.duration]));
      expect(durations).toEqual({ author: 2, book: 6 });
    });

    it('should leave the tracing frames out of stack traces', () => {
      let complete: (() => void) | undefined;
      client.respond = (args) => {
        const last = args[args.length - 1];
        if (typeof last === 'function') {
          complete = () => last(null, { rows: [] });
        }
        return undefined;
      };
      const recorder = new QueryRecorder(source, { sink: createCollectingAssertionSink() });

      recorder.run(() => {
        client.query('SELECT * FROM book', [], () => undefined);
        complete?.();
      });

      const [query] = recorder.queries;
      expect(query.stackTrace).toContain('pg-trace-source.test.ts');
      expect(query.stackTrace).not.toContain('pg-trace-source.ts:');
      expect(query.stackTrace).not.toContain('QueryCollector.');
    });
  });
});
