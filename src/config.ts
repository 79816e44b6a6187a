/**
 * Recorder Configuration
 *
 * Options are validated with zod and can be read from the environment:
 * - EXPECTED_QUERIES_SUBSELECT_TABLES: look inside `FROM (select ...)` for a table
 * - EXPECTED_QUERIES_STACK_TRACE: set to false/0/no/off to skip stack traces
 * - EXPECTED_QUERIES_STACK_TRACE_IGNORE: comma-separated frame labels to drop,
 *   in addition to the defaults
 */

import { z } from 'zod';
import { AssertionSink, throwingAssertionSink } from './assertions/sink.js';
import { DEFAULT_STACK_TRACE_IGNORE } from './recorder/stack-trace.js';

const recorderOptionsSchema = z.object({
  reportSubselectTables: z.boolean().default(false),
  stackTrace: z
    .object({
      enabled: z.boolean().default(true),
      /** Frame labels to drop in addition to DEFAULT_STACK_TRACE_IGNORE */
      ignore: z.array(z.string().min(1)).default([]),
    })
    .default({}),
});

export type RecorderOptions = z.input<typeof recorderOptionsSchema> & {
  /** Current time in seconds; defaults to the high-resolution process clock */
  clock?: () => number;
  /** Where `test` reports its verdict; defaults to throwing on failure */
  sink?: AssertionSink;
};

export type RecorderConfig = z.output<typeof recorderOptionsSchema> & {
  clock: () => number;
  sink: AssertionSink;
};

/**
 * High-resolution process time in seconds.
 */
export function hrtimeSeconds(): number {
  return Number(process.hrtime.bigint()) / 1e9;
}

/**
 * Validate recorder options and apply defaults.
 *
 * @throws Error listing every invalid option
 */
export function parseRecorderOptions(options: RecorderOptions = {}): RecorderConfig {
  const { clock, sink, ...rest } = options;
  const parsed = recorderOptionsSchema.safeParse(rest);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid recorder options: ${details}`);
  }

  const { stackTrace } = parsed.data;
  return {
    ...parsed.data,
    stackTrace: { ...stackTrace, ignore: [...DEFAULT_STACK_TRACE_IGNORE, ...stackTrace.ignore] },
    clock: clock ?? hrtimeSeconds,
    sink: sink ?? throwingAssertionSink,
  };
}

/**
 * Parses a boolean flag from an environment variable.
 * Returns undefined for unset or unrecognised values.
 */
function parseFlag(value: string | undefined): boolean | undefined {
  const lower = value?.toLowerCase().trim();
  if (lower === 'true' || lower === '1' || lower === 'yes' || lower === 'on') return true;
  if (lower === 'false' || lower === '0' || lower === 'no' || lower === 'off') return false;
  return undefined;
}

/**
 * Read recorder options from environment variables.
 */
export function loadRecorderOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): RecorderOptions {
  const options: RecorderOptions = {};

  const subselect = parseFlag(env.EXPECTED_QUERIES_SUBSELECT_TABLES);
  if (subselect !== undefined) {
    options.reportSubselectTables = subselect;
  }

  const stackTrace: NonNullable<RecorderOptions['stackTrace']> = {};
  const enabled = parseFlag(env.EXPECTED_QUERIES_STACK_TRACE);
  if (enabled !== undefined) {
    stackTrace.enabled = enabled;
  }

  const extraIgnore = (env.EXPECTED_QUERIES_STACK_TRACE_IGNORE ?? '')
    .split(',')
    .map((label) => label.trim())
    .filter((label) => label !== '');
  if (extraIgnore.length > 0) {
    stackTrace.ignore = extraIgnore;
  }

  if (Object.keys(stackTrace).length > 0) {
    options.stackTrace = stackTrace;
  }

  return options;
}
