/**
 * Descending, stable ranking of aggregated records by one pair aggregate.
 * Records with no value for the key (non-pairs, or a blank metric) rank last.
 */

import type {
  AggregatedRecord,
  AggregatedTable,
  AggregateMetric,
} from "@/types/compound-table";

export function aggregateValue(
  record: AggregatedRecord,
  metric: AggregateMetric,
): number | null {
  return record.aggregates?.[metric] ?? null;
}

function compareDescending(a: number | null, b: number | null): number {
  if (a === null && b === null) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return b - a;
}

/** New table sorted descending by `metric`; ties keep input order. */
export function rankByAggregate(
  table: AggregatedTable,
  metric: AggregateMetric,
): AggregatedTable {
  // Array.prototype.sort is stable, and we sort a copy.
  const records = [...table.records].sort((a, b) =>
    compareDescending(aggregateValue(a, metric), aggregateValue(b, metric)),
  );
  return { columns: table.columns, records };
}
