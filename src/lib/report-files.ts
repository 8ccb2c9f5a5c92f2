/**
 * Output file naming and writing for a pair-report run. Outputs land beside
 * the input file and reuse its extension and delimiter.
 */

import { dirname, extname, join } from "path";
import type { DelimitedFormat } from "@/types/compound-table";
import type { PairReportResult } from "@/lib/pair-report-pipeline";
import { normalizeBenchmarkQuery } from "@/lib/benchmark-filter";
import { toCompoundTable } from "@/lib/pair-aggregation";
import { writeCompoundTable } from "@/lib/compound-table-io";

export const MPO_OUTPUT_STEM = "Sorted_by_Avg_MPO";
export const DOCKING_OUTPUT_STEM = "Sorted_by_Avg_normDocking";

/** Path separators in the query become "_" so the file stays in the output directory. */
export function benchmarkOutputStem(query: string): string {
  const name = normalizeBenchmarkQuery(query).replace(/[\\/]/g, "_");
  return `Above_${name}_Compounds`;
}

export interface ReportFilePaths {
  mpo: string;
  docking: string;
  benchmark: string;
}

export function reportFilePaths(
  inputPath: string,
  benchmarkQuery: string,
  outDir?: string,
): ReportFilePaths {
  const dir = outDir ?? dirname(inputPath);
  const ext = extname(inputPath) || ".csv";
  return {
    mpo: join(dir, `${MPO_OUTPUT_STEM}${ext}`),
    docking: join(dir, `${DOCKING_OUTPUT_STEM}${ext}`),
    benchmark: join(dir, `${benchmarkOutputStem(benchmarkQuery)}${ext}`),
  };
}

/**
 * Write both ranked tables, and the benchmark table when the benchmark
 * resolved. Returns the paths written, in write order.
 */
export async function writePairReport(
  result: PairReportResult,
  paths: ReportFilePaths,
  delimiter: DelimitedFormat = ",",
): Promise<string[]> {
  const written: string[] = [];

  await writeCompoundTable(paths.mpo, toCompoundTable(result.mpoRanked), delimiter);
  written.push(paths.mpo);
  await writeCompoundTable(paths.docking, toCompoundTable(result.dockingRanked), delimiter);
  written.push(paths.docking);

  if (result.benchmark.status === "found") {
    await writeCompoundTable(
      paths.benchmark,
      toCompoundTable(result.benchmark.view.output),
      delimiter,
    );
    written.push(paths.benchmark);
  }
  return written;
}
