/**
 * Run options for the pair-report CLI: flags first, then interactive prompts
 * for whatever is still missing, validated with zod.
 */

import { parseArgs } from "util";
import { z } from "zod";
import { InvalidOptionsError } from "@/lib/errors";

export const INPUT_PROMPT = "Enter the full path to the input CSV file: ";
export const BENCHMARK_PROMPT = "Enter the benchmark compound name (e.g., cariprazine): ";

export const runOptionsSchema = z.object({
  input: z.string().min(1, "input path is required"),
  benchmark: z.string().trim().min(1, "benchmark name is required"),
  outDir: z.string().min(1).optional(),
});

export type RunOptions = z.infer<typeof runOptionsSchema>;

export interface CliFlags {
  input?: string;
  benchmark?: string;
  outDir?: string;
  help: boolean;
}

export const USAGE = [
  "Usage: pair-report [--input <file>] [--benchmark <name>] [--out-dir <dir>]",
  "",
  "  -i, --input      delimited file with Title, MPO_score, norm_docking_score, docking score",
  "  -b, --benchmark  benchmark compound name (case-insensitive partial match on Title)",
  "  -o, --out-dir    directory for the output files (default: the input's directory)",
  "  -h, --help       show this message",
].join("\n");

export function parseCliFlags(argv: readonly string[]): CliFlags {
  try {
    const { values } = parseArgs({
      args: [...argv],
      options: {
        input: { type: "string", short: "i" },
        benchmark: { type: "string", short: "b" },
        "out-dir": { type: "string", short: "o" },
        help: { type: "boolean", short: "h" },
      },
      strict: true,
      allowPositionals: false,
    });
    return {
      input: values.input,
      benchmark: values.benchmark,
      outDir: values["out-dir"],
      help: values.help ?? false,
    };
  } catch (err) {
    throw new InvalidOptionsError([err instanceof Error ? err.message : String(err)]);
  }
}

/** Trim, drop surrounding double quotes, and use forward slashes (pasted Windows paths). */
export function normalizeInputPath(raw: string): string {
  return raw.trim().replace(/\\/g, "/").replace(/^"+|"+$/g, "");
}

export type Ask = (question: string) => Promise<string>;

export async function collectRunOptions(flags: CliFlags, ask: Ask): Promise<RunOptions> {
  const input = flags.input ?? (await ask(INPUT_PROMPT));
  const benchmark = flags.benchmark ?? (await ask(BENCHMARK_PROMPT));

  const parsed = runOptionsSchema.safeParse({
    input: normalizeInputPath(input),
    benchmark,
    outDir: flags.outDir,
  });
  if (!parsed.success) {
    throw new InvalidOptionsError(
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    );
  }
  return parsed.data;
}
