import { ExpectedQueriesAssertionError } from '../errors.js';

/**
 * Receives exactly one pass or fail per `QueryRecorder.test` call.
 */
export interface AssertionSink {
  pass(message: string): void;
  fail(message: string): void;
}

/**
 * Default sink: a failure throws, which fails the surrounding test in any
 * test runner.
 */
export const throwingAssertionSink: AssertionSink = {
  pass(): void {},
  fail(message: string): void {
    throw new ExpectedQueriesAssertionError(message);
  },
};

/**
 * Writes results to the console and never throws.
 */
export const loggingAssertionSink: AssertionSink = {
  pass(message: string): void {
    console.log(`ok - ${message}`);
  },
  fail(message: string): void {
    console.error(`not ok - ${message}`);
  },
};

export interface AssertionResult {
  passed: boolean;
  message: string;
}

export interface CollectingAssertionSink extends AssertionSink {
  readonly results: AssertionResult[];
}

/**
 * Sink that keeps every result in memory.
 */
export function createCollectingAssertionSink(): CollectingAssertionSink {
  const results: AssertionResult[] = [];
  return {
    results,
    pass(message: string): void {
      results.push({ passed: true, message });
    },
    fail(message: string): void {
      results.push({ passed: false, message });
    },
  };
}
