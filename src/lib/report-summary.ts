/**
 * Threshold counts and the console summary of a pair-report run.
 */

import type {
  AggregatedRecord,
  AggregatedTable,
  BenchmarkThresholds,
} from "@/types/compound-table";
import type { BenchmarkOutcome } from "@/lib/pair-report-pipeline";
import type { ReportFilePaths } from "@/lib/report-files";
import { aggregateValue } from "@/lib/ranking";

// ─── Counts ────────────────────────────────────────────────

export interface ThresholdSummary {
  /** Distinct titles whose Avg_MPO exceeds the benchmark's. */
  aboveMpo: number;
  /** Distinct titles whose Avg_norm_docking exceeds the benchmark's. */
  aboveDocking: number;
  /** Distinct titles exceeding on both (benchmark rows not included). */
  aboveBoth: number;
}

export function countDistinctIdentifiers(records: readonly AggregatedRecord[]): number {
  return new Set(records.map((r) => r.identifier)).size;
}

export function summarizeThresholds(input: {
  mpoRanked: AggregatedTable;
  dockingRanked: AggregatedTable;
  above: readonly AggregatedRecord[];
  thresholds: BenchmarkThresholds;
}): ThresholdSummary {
  const { mpoRanked, dockingRanked, above, thresholds } = input;
  const overMpo = mpoRanked.records.filter((r) => {
    const v = aggregateValue(r, "avgMpo");
    return v !== null && v > thresholds.avgMpo;
  });
  const overDocking = dockingRanked.records.filter((r) => {
    const v = aggregateValue(r, "avgNormDocking");
    return v !== null && v > thresholds.avgNormDocking;
  });
  return {
    aboveMpo: countDistinctIdentifiers(overMpo),
    aboveDocking: countDistinctIdentifiers(overDocking),
    aboveBoth: countDistinctIdentifiers(above),
  };
}

// ─── Text ──────────────────────────────────────────────────

/** "cariprazine" → "Cariprazine"; every run of letters is capitalized. */
export function toTitleCase(s: string): string {
  return s.replace(/[A-Za-z]+/g, (w) => w[0].toUpperCase() + w.slice(1).toLowerCase());
}

export type ReportLevel = "success" | "info" | "detail" | "warning";

export interface ReportLine {
  level: ReportLevel;
  text: string;
}

export function formatReportLines(
  benchmark: BenchmarkOutcome,
  paths: ReportFilePaths,
): ReportLine[] {
  const label = toTitleCase(benchmark.query);

  if (benchmark.status === "not-found") {
    return [
      { level: "warning", text: `Benchmark compound '${benchmark.query}' not found.` },
      { level: "info", text: `- File sorted by Avg MPO: ${paths.mpo}` },
      { level: "info", text: `- File sorted by Avg norm docking score: ${paths.docking}` },
    ];
  }
  if (benchmark.status === "unscored") {
    return [
      {
        level: "warning",
        text: `Benchmark compound '${benchmark.query}' matched ${benchmark.matchedRows} row(s) but none belongs to a scored pair; no filtered file written.`,
      },
      { level: "info", text: `- File sorted by Avg MPO: ${paths.mpo}` },
      { level: "info", text: `- File sorted by Avg norm docking score: ${paths.docking}` },
    ];
  }

  const { summary } = benchmark;
  return [
    { level: "success", text: "Processing complete." },
    { level: "info", text: `- File sorted by Avg MPO: ${paths.mpo}` },
    { level: "detail", text: `  → ${summary.aboveMpo} unique compounds exceeded ${label}'s Avg MPO` },
    { level: "info", text: `- File sorted by Avg norm docking score: ${paths.docking}` },
    {
      level: "detail",
      text: `  → ${summary.aboveDocking} unique compounds exceeded ${label}'s Avg norm docking`,
    },
    { level: "info", text: `- Compounds outperforming benchmark saved to: ${paths.benchmark}` },
    { level: "detail", text: `  → ${summary.aboveBoth} unique compounds exceeded ${label} on both metrics` },
  ];
}
