/**
 * Benchmark lookup and "better on both metrics" filtering.
 *
 * The benchmark is located by case-insensitive substring match on Title and
 * may span several rows (both members of its pair, or several compounds when
 * the query is short). Thresholds come from the first selected row carrying
 * each aggregate, in group-encounter order.
 */

import type {
  AggregatedRecord,
  AggregatedTable,
  BenchmarkThresholds,
} from "@/types/compound-table";
import { BENCHMARK_TEMPLATE } from "@/lib/compound-columns";
import { applyColumnTemplate } from "@/lib/column-arrangement";
import { aggregateValue } from "@/lib/ranking";

// ─── Lookup ────────────────────────────────────────────────

export function normalizeBenchmarkQuery(query: string): string {
  return query.trim().toLowerCase();
}

/** Every record whose identifier contains the query, case-insensitively. */
export function selectBenchmark(
  table: AggregatedTable,
  query: string,
): AggregatedRecord[] {
  const q = normalizeBenchmarkQuery(query);
  return table.records.filter((r) => r.identifier.toLowerCase().includes(q));
}

export type BenchmarkResolution =
  | { status: "not-found" }
  /** Matched rows exist, but none of them carries a pair aggregate to compare against. */
  | { status: "unscored"; selection: AggregatedRecord[] }
  | { status: "found"; selection: AggregatedRecord[]; thresholds: BenchmarkThresholds };

function firstPresent(
  selection: AggregatedRecord[],
  metric: "avgMpo" | "avgNormDocking",
): number | null {
  for (const r of selection) {
    const v = aggregateValue(r, metric);
    if (v !== null) return v;
  }
  return null;
}

export function resolveBenchmark(
  table: AggregatedTable,
  query: string,
): BenchmarkResolution {
  const selection = selectBenchmark(table, query);
  if (selection.length === 0) return { status: "not-found" };

  const avgMpo = firstPresent(selection, "avgMpo");
  const avgNormDocking = firstPresent(selection, "avgNormDocking");
  if (avgMpo === null || avgNormDocking === null) {
    return { status: "unscored", selection };
  }
  return { status: "found", selection, thresholds: { avgMpo, avgNormDocking } };
}

// ─── Filtering ─────────────────────────────────────────────

/** Records strictly above the benchmark on both averages. Benchmark rows equal themselves, so they drop out. */
export function filterAboveBenchmark(
  table: AggregatedTable,
  thresholds: BenchmarkThresholds,
): AggregatedRecord[] {
  return table.records.filter((r) => {
    const mpo = aggregateValue(r, "avgMpo");
    const dock = aggregateValue(r, "avgNormDocking");
    return (
      mpo !== null &&
      dock !== null &&
      mpo > thresholds.avgMpo &&
      dock > thresholds.avgNormDocking
    );
  });
}

export interface BenchmarkView {
  thresholds: BenchmarkThresholds;
  selection: AggregatedRecord[];
  /** Filtered set before the benchmark rows are appended. */
  above: AggregatedRecord[];
  /** `above` followed by the whole selection, in benchmark-first column order. */
  output: AggregatedTable;
}

/**
 * Build the filtered view for a resolved benchmark. The selection is appended
 * as-is, without de-duplication against `above`.
 */
export function buildBenchmarkView(
  table: AggregatedTable,
  resolution: Extract<BenchmarkResolution, { status: "found" }>,
): BenchmarkView {
  const above = filterAboveBenchmark(table, resolution.thresholds);
  const output = applyColumnTemplate(
    { columns: table.columns, records: [...above, ...resolution.selection] },
    BENCHMARK_TEMPLATE,
  );
  return {
    thresholds: resolution.thresholds,
    selection: resolution.selection,
    above,
    output,
  };
}
