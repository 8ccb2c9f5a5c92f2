/**
 * Delimited-text loading and writing for compound tables (papaparse).
 * Cells are kept as the verbatim strings of the file; numbers are only read
 * where a metric is needed.
 */

import Papa from "papaparse";
import { readFile, writeFile } from "fs/promises";
import type {
  CellValue,
  CompoundTable,
  DelimitedFormat,
  TableRow,
} from "@/types/compound-table";
import { TableParseError } from "@/lib/errors";

export interface LoadedTable {
  table: CompoundTable;
  delimiter: DelimitedFormat;
}

const DELIMITERS: readonly DelimitedFormat[] = [",", "\t", ";", "|"];

function toDelimitedFormat(detected: string): DelimitedFormat {
  return DELIMITERS.find((d) => d === detected) ?? ",";
}

// ─── Parse ─────────────────────────────────────────────────

export function parseCompoundTable(text: string): LoadedTable {
  const source = text.startsWith("\uFEFF") ? text.slice(1) : text;
  const result = Papa.parse<string[]>(source, {
    skipEmptyLines: "greedy",
    delimitersToGuess: [...DELIMITERS],
  });

  // A single-column file has no delimiter to guess; that is not an error.
  const fatal = result.errors.find((e) => e.type !== "Delimiter");
  if (fatal) {
    throw new TableParseError(fatal.message, fatal.row != null ? fatal.row + 1 : null);
  }
  if (result.data.length === 0) throw new TableParseError("Input table is empty");

  const [header, ...body] = result.data;
  const columns = header.map((h) => h.trim());
  const seen = new Set<string>();
  for (const c of columns) {
    if (seen.has(c)) throw new TableParseError(`Duplicate column "${c}" in header`, 1);
    seen.add(c);
  }

  const rows: TableRow[] = body.map((fields, i) => {
    if (fields.length > columns.length) {
      // +2: one for the header, one for 1-based numbering
      throw new TableParseError(
        `Expected ${columns.length} fields, saw ${fields.length}`,
        i + 2,
      );
    }
    const row: Record<string, CellValue> = {};
    columns.forEach((c, j) => {
      row[c] = j < fields.length ? fields[j] : null;
    });
    return row;
  });

  return { table: { columns, rows }, delimiter: toDelimitedFormat(result.meta.delimiter) };
}

// ─── Serialize ─────────────────────────────────────────────

function cellText(value: CellValue | undefined): string {
  if (value == null) return "";
  return typeof value === "number" ? String(value) : value;
}

export function serializeCompoundTable(
  table: CompoundTable,
  delimiter: DelimitedFormat = ",",
): string {
  const data = table.rows.map((row) => table.columns.map((c) => cellText(row[c])));
  const body = Papa.unparse(
    { fields: [...table.columns], data },
    { delimiter, newline: "\n" },
  );
  return `${body}\n`;
}

// ─── Files ─────────────────────────────────────────────────

export async function readCompoundTable(path: string): Promise<LoadedTable> {
  const text = await readFile(path, "utf-8");
  return parseCompoundTable(text);
}

export async function writeCompoundTable(
  path: string,
  table: CompoundTable,
  delimiter: DelimitedFormat = ",",
): Promise<void> {
  await writeFile(path, serializeCompoundTable(table, delimiter), "utf-8");
}
