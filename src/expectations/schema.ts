/**
 * zod schemas for expectation specs received as untyped input (JSON).
 */

import { z } from 'zod';

const comparisonSchema = z.union([z.number().nonnegative(), z.string().min(1), z.null()]);

const statisticExpectationsSchema = z
  .object({
    count: comparisonSchema.optional(),
    max: comparisonSchema.optional(),
    mean: comparisonSchema.optional(),
    min: comparisonSchema.optional(),
    sum: comparisonSchema.optional(),
  })
  .strict();

const expectedOutcomeSchema = z.union([comparisonSchema, statisticExpectationsSchema]);

const operationExpectationsSchema = z
  .object({
    select: expectedOutcomeSchema.optional(),
    insert: expectedOutcomeSchema.optional(),
    update: expectedOutcomeSchema.optional(),
    delete: expectedOutcomeSchema.optional(),
  })
  .strict();

export const expectationSpecSchema = z
  .record(z.string(), operationExpectationsSchema)
  .describe(
    'Expected queries per table: { table: { select|insert|update|delete: outcome } }. ' +
      'An outcome is a number (exact count), a comparison string such as "<= 2", null (any number), ' +
      'or an object of per-statistic comparisons { count, mean, sum, max, min } (durations in seconds). ' +
      'The "_all_" table supplies defaults; operations without an entry expect 0 queries.'
  );
