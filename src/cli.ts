/**
 * pair-report: rank enantiomer/analog compound pairs by average MPO and
 * normalized docking score, and list the pairs that beat a benchmark on both.
 *
 * Run with: npm run pair-report -- --input compounds.csv --benchmark cariprazine
 */

import chalk from "chalk";
import { createInterface, type Interface } from "readline/promises";
import {
  collectRunOptions,
  parseCliFlags,
  USAGE,
  type CliFlags,
  type RunOptions,
} from "@/lib/cli-options";
import { readCompoundTable } from "@/lib/compound-table-io";
import { runPairReport } from "@/lib/pair-report-pipeline";
import { reportFilePaths, writePairReport } from "@/lib/report-files";
import { formatReportLines, type ReportLine } from "@/lib/report-summary";
import { PairReportError } from "@/lib/errors";

function printLine(line: ReportLine): void {
  switch (line.level) {
    case "success":
      console.log(chalk.green(line.text));
      break;
    case "warning":
      console.warn(chalk.yellow(line.text));
      break;
    case "detail":
      console.log(chalk.cyan(line.text));
      break;
    case "info":
      console.log(line.text);
      break;
  }
}

async function resolveOptions(flags: CliFlags): Promise<RunOptions> {
  // Only open stdin when a flag is missing and a prompt is actually needed.
  const session: { rl?: Interface } = {};
  const ask = (question: string): Promise<string> => {
    session.rl ??= createInterface({ input: process.stdin, output: process.stdout });
    return session.rl.question(question);
  };
  try {
    return await collectRunOptions(flags, ask);
  } finally {
    session.rl?.close();
  }
}

async function main(argv: string[]): Promise<number> {
  const flags = parseCliFlags(argv);
  if (flags.help) {
    console.log(USAGE);
    return 0;
  }

  const options = await resolveOptions(flags);
  const { table, delimiter } = await readCompoundTable(options.input);
  const result = runPairReport(table, options.benchmark);

  const paths = reportFilePaths(options.input, options.benchmark, options.outDir);
  await writePairReport(result, paths, delimiter);

  console.log("");
  for (const line of formatReportLines(result.benchmark, paths)) printLine(line);
  return 0;
}

try {
  process.exitCode = await main(process.argv.slice(2));
} catch (err) {
  if (err instanceof PairReportError) {
    console.error(chalk.red(`${err.name}: ${err.message}`));
  } else {
    console.error(chalk.red("pair-report failed:"), err);
  }
  process.exitCode = 1;
}
