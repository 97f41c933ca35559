/**
 * Ranking Extractor
 *
 * Turns one breed's record table into the top-N list for one trait.
 */

import type { CellValue, RankingResult, RecordTable } from "./types.js";
import { RANK_COLUMN } from "./types.js";
import { parseTraitValue } from "./delimited-reader.js";
import type { TraitNameMapping } from "./trait-names.js";

interface KeyedRow {
  index: number;
  value: number | null;
}

/**
 * Descending by value; missing/non-numeric values last; ties keep file order
 */
function compareKeyed(a: KeyedRow, b: KeyedRow): number {
  if (a.value === null || b.value === null) {
    if (a.value === b.value) return a.index - b.index;
    return a.value === null ? 1 : -1;
  }
  if (a.value !== b.value) return b.value - a.value;
  return a.index - b.index;
}

/**
 * Ranks `table` by `trait`. Returns an absent result when the breed's file
 * has no such column. The input table is never modified.
 */
export function extractRanking(
  table: RecordTable,
  trait: string,
  descriptiveColumns: readonly string[],
  topN: number,
  names: TraitNameMapping,
  breed: string = table.source
): RankingResult {
  if (!table.columns.includes(trait)) {
    return { kind: "absent", breed, trait };
  }

  const keyed: KeyedRow[] = table.rows.map((row, index) => ({
    index,
    value: parseTraitValue(row[trait]),
  }));
  keyed.sort(compareKeyed);

  const limit = Math.max(0, Math.floor(topN));
  const traitName = names.lookup(trait);

  const rows: CellValue[][] = keyed.slice(0, limit).map((entry, position) => {
    const source = table.rows[entry.index];
    const descriptive = descriptiveColumns.map((column) => source[column] ?? "");
    return [position + 1, ...descriptive, entry.value];
  });

  return {
    kind: "present",
    table: {
      breed,
      trait,
      traitName,
      columns: [RANK_COLUMN, ...descriptiveColumns, traitName],
      rows,
    },
  };
}
