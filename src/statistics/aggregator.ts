/**
 * Statistics Aggregator
 *
 * Groups classified queries by (table, operation) and exposes count and
 * duration statistics per group.
 */

import { UnsupportedStatisticError } from '../errors.js';
import { Query } from '../query/query.js';
import { STATISTIC_NAMES, StatisticName, TableOperation } from '../types.js';

/**
 * Durations (seconds) of every query in one (table, operation) group,
 * in observation order.
 */
export class StatSample {
  private readonly samples: number[] = [];

  add(duration: number): void {
    this.samples.push(duration);
  }

  get values(): readonly number[] {
    return this.samples;
  }

  get count(): number {
    return this.samples.length;
  }

  /** Summed in ascending order so the total does not depend on arrival order */
  get sum(): number {
    return [...this.samples].sort((a, b) => a - b).reduce((total, value) => total + value, 0);
  }

  get mean(): number {
    return this.count === 0 ? 0 : this.sum / this.count;
  }

  get max(): number {
    return this.count === 0 ? 0 : Math.max(...this.samples);
  }

  get min(): number {
    return this.count === 0 ? 0 : Math.min(...this.samples);
  }
}

/** table (lowercased) -> operation -> sample */
export type TableOperationStats = Map<string, Map<TableOperation, StatSample>>;

export function isStatisticName(name: string): name is StatisticName {
  return STATISTIC_NAMES.some((statistic) => statistic === name);
}

/**
 * Read a statistic from a sample by name.
 *
 * @throws UnsupportedStatisticError for a name outside count/mean/sum/max/min
 */
export function statisticValue(sample: StatSample, name: string): number {
  if (!isStatisticName(name)) {
    throw new UnsupportedStatisticError(name);
  }
  switch (name) {
    case 'count':
      return sample.count;
    case 'sum':
      return sample.sum;
    case 'mean':
      return sample.mean;
    case 'max':
      return sample.max;
    case 'min':
      return sample.min;
  }
}

/**
 * Group the classified queries by lowercased table and operation.
 * Unclassified queries are left out.
 *
 * @param queries - Observed queries in observation order
 * @returns Statistics per table and operation
 */
export function aggregateQueries(queries: readonly Query[]): TableOperationStats {
  const stats: TableOperationStats = new Map();

  for (const query of queries) {
    const { classification } = query;
    if (classification.kind === 'unclassified') {
      continue;
    }

    const table = classification.table.toLowerCase();
    let operations = stats.get(table);
    if (!operations) {
      operations = new Map();
      stats.set(table, operations);
    }

    let sample = operations.get(classification.operation);
    if (!sample) {
      sample = new StatSample();
      operations.set(classification.operation, sample);
    }
    sample.add(query.duration);
  }

  return stats;
}

/**
 * Plain-object view of the aggregate, for JSON output.
 */
export function summarizeStatistics(
  stats: TableOperationStats
): Record<string, Partial<Record<TableOperation, Record<StatisticName, number>>>> {
  const summary: Record<string, Partial<Record<TableOperation, Record<StatisticName, number>>>> = {};

  for (const table of [...stats.keys()].sort()) {
    const operations = stats.get(table) ?? new Map<TableOperation, StatSample>();
    const tableSummary: Partial<Record<TableOperation, Record<StatisticName, number>>> = {};
    for (const operation of [...operations.keys()].sort()) {
      const sample = operations.get(operation);
      if (!sample) continue;
      tableSummary[operation] = {
        count: sample.count,
        max: sample.max,
        mean: sample.mean,
        min: sample.min,
        sum: sample.sum,
      };
    }
    summary[table] = tableSummary;
  }

  return summary;
}
