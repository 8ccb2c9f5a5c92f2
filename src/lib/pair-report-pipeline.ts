/**
 * One pair-report run over an in-memory table: validate, aggregate pairs, rank
 * by each average, then filter against the benchmark. Pure and synchronous;
 * writing the results is left to report-files.
 */

import type { AggregatedTable, BenchmarkThresholds, CompoundTable } from "@/types/compound-table";
import { DOCKING_FIRST_TEMPLATE, MPO_FIRST_TEMPLATE } from "@/lib/compound-columns";
import { assertRequiredColumns } from "@/lib/schema-validation";
import { aggregatePairs } from "@/lib/pair-aggregation";
import { rankByAggregate } from "@/lib/ranking";
import { applyColumnTemplate } from "@/lib/column-arrangement";
import {
  buildBenchmarkView,
  normalizeBenchmarkQuery,
  resolveBenchmark,
  type BenchmarkResolution,
  type BenchmarkView,
} from "@/lib/benchmark-filter";
import { summarizeThresholds, type ThresholdSummary } from "@/lib/report-summary";

export type BenchmarkOutcome =
  | { status: "not-found"; query: string }
  | { status: "unscored"; query: string; matchedRows: number }
  | {
      status: "found";
      query: string;
      thresholds: BenchmarkThresholds;
      view: BenchmarkView;
      summary: ThresholdSummary;
    };

export interface PairReportResult {
  aggregated: AggregatedTable;
  /** Descending Avg_MPO, MPO-first column order. */
  mpoRanked: AggregatedTable;
  /** Descending Avg_norm_docking, docking-first column order. */
  dockingRanked: AggregatedTable;
  benchmark: BenchmarkOutcome;
}

function describeBenchmark(
  resolution: BenchmarkResolution,
  query: string,
  aggregated: AggregatedTable,
  mpoRanked: AggregatedTable,
  dockingRanked: AggregatedTable,
): BenchmarkOutcome {
  switch (resolution.status) {
    case "not-found":
      return { status: "not-found", query };
    case "unscored":
      return { status: "unscored", query, matchedRows: resolution.selection.length };
    case "found": {
      const view = buildBenchmarkView(aggregated, resolution);
      return {
        status: "found",
        query,
        thresholds: resolution.thresholds,
        view,
        summary: summarizeThresholds({
          mpoRanked,
          dockingRanked,
          above: view.above,
          thresholds: resolution.thresholds,
        }),
      };
    }
  }
}

export function runPairReport(table: CompoundTable, benchmarkQuery: string): PairReportResult {
  const validated = assertRequiredColumns(table);
  const aggregated = aggregatePairs(validated);

  const mpoRanked = applyColumnTemplate(rankByAggregate(aggregated, "avgMpo"), MPO_FIRST_TEMPLATE);
  const dockingRanked = applyColumnTemplate(
    rankByAggregate(aggregated, "avgNormDocking"),
    DOCKING_FIRST_TEMPLATE,
  );

  const query = normalizeBenchmarkQuery(benchmarkQuery);
  const resolution = resolveBenchmark(aggregated, query);

  const benchmark = describeBenchmark(resolution, query, aggregated, mpoRanked, dockingRanked);

  return { aggregated, mpoRanked, dockingRanked, benchmark };
}
