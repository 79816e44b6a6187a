import { z } from 'zod';
import { isExpectationConfigError } from '../errors.js';
import { expectationSpecSchema } from '../expectations/schema.js';
import { Query } from '../query/query.js';
import { buildReport } from '../recorder/report.js';
import { aggregateQueries, summarizeStatistics } from '../statistics/aggregator.js';
import { Classification, TableOperation, Violation } from '../types.js';

interface ClassifiedStatement {
  sql: string;
  kind: Classification['kind'];
  operation: TableOperation | null;
  table: string | null;
}

export async function classifySqlStatements(args: {
  statements: string[];
  reportSubselectTables?: boolean;
}): Promise<ClassifiedStatement[]> {
  return args.statements.map((sql) => {
    const query = new Query({ sql }, { reportSubselectTables: args.reportSubselectTables });
    return {
      sql: query.sql,
      kind: query.classification.kind,
      operation: query.operation ?? null,
      table: query.table ?? null,
    };
  });
}

interface CheckQueryLogResult {
  passed: boolean;
  message: string;
  violations: Violation[];
  unknownQueries: string[];
  statistics: ReturnType<typeof summarizeStatistics>;
}

/**
 * Check a recorded query log (e.g. exported from a test run) against an
 * expectation spec.
 *
 * @throws Error if the expectations are invalid
 */
export async function checkQueryLog(args: {
  queries: { sql: string; durationMs?: number }[];
  expectations: unknown;
  reportSubselectTables?: boolean;
}): Promise<CheckQueryLogResult> {
  const parsed = expectationSpecSchema.safeParse(args.expectations);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid expectations: ${details}`);
  }

  const queries = args.queries.map(
    (entry) =>
      new Query(
        { sql: entry.sql, duration: (entry.durationMs ?? 0) / 1000 },
        { reportSubselectTables: args.reportSubselectTables }
      )
  );
  const stats = aggregateQueries(queries);

  try {
    const report = buildReport(queries, parsed.data, stats);
    return { ...report, statistics: summarizeStatistics(stats) };
  } catch (error) {
    if (isExpectationConfigError(error)) {
      throw new Error(`Invalid expectations: ${error.message}`);
    }
    throw error;
  }
}

export const classifySqlInputSchema = {
  statements: z.array(z.string()).min(1).describe('SQL statements to classify'),
  reportSubselectTables: z
    .boolean()
    .optional()
    .describe('Look inside FROM (select ...) for the first real table instead of reporting "select"'),
};

export const checkQueryLogInputSchema = {
  queries: z
    .array(
      z.object({
        sql: z.string().describe('Statement text as executed'),
        durationMs: z.number().nonnegative().optional().describe('Execution time in milliseconds'),
      })
    )
    .describe('Executed statements in order'),
  expectations: expectationSpecSchema,
  reportSubselectTables: z
    .boolean()
    .optional()
    .describe('Look inside FROM (select ...) for the first real table instead of reporting "select"'),
};
