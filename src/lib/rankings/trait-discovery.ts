/**
 * Trait Discovery
 *
 * Breeds do not share one trait list, so the trait universe is the union of
 * every file's header, in first-seen order, minus the identifier columns.
 */

import { DEFAULT_DELIMITER, readHeader } from "./delimited-reader.js";

export function discoverTraits(
  paths: readonly string[],
  nonTraitColumns: readonly string[],
  delimiter: string = DEFAULT_DELIMITER
): string[] {
  const excluded = new Set(nonTraitColumns);
  const seen = new Set<string>();

  for (const path of paths) {
    for (const column of readHeader(path, delimiter)) {
      if (!column || excluded.has(column)) continue;
      seen.add(column);
    }
  }

  return [...seen];
}

/**
 * Identifier columns carried into every result table
 */
export function resolveDescriptiveColumns(
  nonTraitColumns: readonly string[],
  excludedColumns: readonly string[]
): string[] {
  const excluded = new Set(excludedColumns);
  return nonTraitColumns.filter((column) => !excluded.has(column));
}
