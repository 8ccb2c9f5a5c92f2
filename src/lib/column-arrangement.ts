/**
 * Column ordering for the output tables. Operates on the ordered list of
 * column names only; row contents are never touched.
 */

import type { AggregatedTable, CompoundTable } from "@/types/compound-table";
import type { ColumnTemplate } from "@/lib/compound-columns";
import { ColumnError } from "@/lib/errors";

/**
 * Remove every stripped and inserted name, then splice `insert` directly after
 * the anchor (or at the front when the anchor is null).
 */
export function arrangeColumns(
  columns: readonly string[],
  template: ColumnTemplate,
): string[] {
  const present = new Set(columns);
  for (const c of template.insert) {
    if (!present.has(c)) throw new ColumnError(c, template.name, "insert");
  }

  const removed = new Set([...template.strip, ...template.insert]);
  const kept = columns.filter((c) => !removed.has(c));

  let at = 0;
  if (template.anchor !== null) {
    const anchorIdx = kept.indexOf(template.anchor);
    if (anchorIdx === -1) throw new ColumnError(template.anchor, template.name, "anchor");
    at = anchorIdx + 1;
  }

  return [...kept.slice(0, at), ...template.insert, ...kept.slice(at)];
}

export function applyColumnTemplate(table: CompoundTable, template: ColumnTemplate): CompoundTable;
export function applyColumnTemplate(table: AggregatedTable, template: ColumnTemplate): AggregatedTable;
export function applyColumnTemplate(
  table: CompoundTable | AggregatedTable,
  template: ColumnTemplate,
): CompoundTable | AggregatedTable {
  return { ...table, columns: arrangeColumns(table.columns, template) };
}
