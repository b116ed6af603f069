import type { ColumnMapping, SampleRow } from './shared/types.js';

/**
 * Renames uploaded columns to the names the engine reads
 *
 * `mapping` goes from target name (metal identifier, `latitude`, `longitude`) to the
 * source column holding it. Unmapped columns keep their names; when two targets
 * name the same source the later one wins.
 */
export function applyColumnMapping(rows: readonly SampleRow[], mapping: ColumnMapping): SampleRow[] {
  const renames = new Map<string, string>();
  for (const [target, source] of Object.entries(mapping)) {
    if (source && source !== target) renames.set(source, target);
  }
  if (renames.size === 0) return [...rows];

  return rows.map((row) =>
    Object.fromEntries(Object.entries(row).map(([column, value]) => [renames.get(column) ?? column, value])),
  );
}
