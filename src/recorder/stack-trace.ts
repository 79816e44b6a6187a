/** Frames from these locations are dropped from captured stack traces */
export const DEFAULT_STACK_TRACE_IGNORE: readonly string[] = [
  'node:internal',
  '/node_modules/',
  'captureStackTrace',
  'QueryCollector.',
  'pg-trace-source.ts:',
  'pg-trace-source.js:',
  'ManualTraceSource.',
];

/**
 * Capture the current call stack as text, one "at ..." frame per line,
 * without the frames matching any ignore label.
 *
 * @param ignore - Substrings identifying frames to drop
 */
export function captureStackTrace(ignore: readonly string[] = DEFAULT_STACK_TRACE_IGNORE): string {
  const stack = new Error().stack ?? '';
  return stack
    .split('\n')
    .slice(1)
    .map((line) => line.trim())
    .filter((line) => line !== '' && !ignore.some((label) => line.includes(label)))
    .join('\n');
}
