/**
 * Reads numeric metric cells. Loaded cells are verbatim strings, derived cells
 * are numbers; blank or non-numeric text is a missing value, never zero.
 */

import type { CellValue } from "@/types/compound-table";

export function parseMetric(value: CellValue | undefined): number | null {
  if (value == null) return null;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  const s = value.trim();
  if (s === "") return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

/** Identifier cell as a trimmed string ("" when absent). */
export function readIdentifier(value: CellValue | undefined): string {
  if (value == null) return "";
  return String(value).trim();
}
