import { RecorderOptions } from './config.js';
import { QueryRecorder } from './recorder/recorder.js';
import { TraceSource } from './trace/types.js';
import { ExpectationSpec } from './types.js';

/**
 * Run `work` while collecting its queries, then test them against `spec`.
 *
 * @example
 * const book = expectedQueries(source, () => loadBookWithAuthor(34), {
 *   book: { select: '<= 2' },
 *   author: { insert: null },
 * });
 *
 * @returns Whatever `work` returned
 */
export function expectedQueries<T>(
  source: TraceSource,
  work: () => T,
  spec: ExpectationSpec,
  options?: RecorderOptions
): T {
  const recorder = new QueryRecorder(source, options);
  const result = recorder.run(work);
  recorder.test(spec);
  return result;
}

/**
 * Async variant of `expectedQueries`.
 */
export async function expectedQueriesAsync<T>(
  source: TraceSource,
  work: () => Promise<T>,
  spec: ExpectationSpec,
  options?: RecorderOptions
): Promise<T> {
  const recorder = new QueryRecorder(source, options);
  const result = await recorder.runAsync(work);
  recorder.test(spec);
  return result;
}
