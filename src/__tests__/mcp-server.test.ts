/**
 * MCP Server Tests
 *
 * These tests verify that the MCP server's:
 * - Tool input schemas accept and reject the right arguments
 * - Environment configuration works
 * - Tool responses serialize to the documented JSON shape
 *
 * Note: mcp-server.ts connects a stdio transport when loaded, so the
 * tools are tested through the modules it registers.
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { z } from 'zod';
import { loadRecorderOptionsFromEnv } from '../config.js';
import {
  checkQueryLog,
  checkQueryLogInputSchema,
  classifySqlInputSchema,
} from '../tools/query-log-tools.js';

describe('MCP Server Tool Definitions', () => {
  const tools = {
    classify_sql: z.object(classifySqlInputSchema),
    check_query_log: z.object(checkQueryLogInputSchema),
  };

  it('should define all expected tools', () => {
    expect(Object.keys(tools)).toEqual(['classify_sql', 'check_query_log']);
  });

  it.each([
    ['classify_sql', ['statements']],
    ['check_query_log', ['queries', 'expectations']],
  ] as const)('%s should require %p', (name, required) => {
    const result = tools[name].safeParse({});

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues.map((issue) => issue.path[0])).toEqual(required);
    }
  });

  it('should describe every parameter', () => {
    const shapes = [classifySqlInputSchema, checkQueryLogInputSchema];

    for (const shape of shapes) {
      for (const schema of Object.values(shape)) {
        expect(schema.description).toEqual(expect.any(String));
      }
    }
  });
});

describe('Environment Configuration', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.EXPECTED_QUERIES_SUBSELECT_TABLES;
    delete process.env.EXPECTED_QUERIES_STACK_TRACE;
    delete process.env.EXPECTED_QUERIES_STACK_TRACE_IGNORE;
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('should support EXPECTED_QUERIES_SUBSELECT_TABLES environment variable', () => {
    process.env.EXPECTED_QUERIES_SUBSELECT_TABLES = 'true';

    expect(loadRecorderOptionsFromEnv().reportSubselectTables).toBe(true);
  });

  it('should default to reporting sub-selects as the select pseudo-table', () => {
    expect(loadRecorderOptionsFromEnv().reportSubselectTables).toBeUndefined();
  });
});

describe('Response Format', () => {
  it('should serialize check_query_log results as JSON', async () => {
    const result = await checkQueryLog({
      queries: [{ sql: 'SELECT * FROM book', durationMs: 5 }],
      expectations: { book: { select: 1 } },
    });

    const parsed = JSON.parse(JSON.stringify(result, null, 2));

    expect(Object.keys(parsed)).toEqual(['passed', 'message', 'violations', 'unknownQueries', 'statistics']);
    expect(parsed.statistics).toEqual({
      book: { select: { count: 1, max: 0.005, mean: 0.005, min: 0.005, sum: 0.005 } },
    });
  });
});
