/**
 * Trait Rankings - Type Definitions
 *
 * Shared shapes for record tables, ranking results and the aggregated report
 */

export type CellValue = string | number | null;

/**
 * One data row of an input file, keyed by column identifier
 */
export type RecordRow = Record<string, CellValue>;

/**
 * Fully loaded input file (one per breed)
 */
export interface RecordTable {
  source: string;
  columns: string[];
  rows: RecordRow[];
}

/**
 * One breed's input: where its records live and how many animals to keep per trait
 */
export interface BreedInputSpec {
  readonly breed: string;
  readonly file: string;
  readonly topN: number;
}

export const RANK_COLUMN = "Rank";

/**
 * Ranked, truncated and relabelled rows for one (breed, trait) pair.
 * `columns` is [Rank, ...descriptive columns, trait display name];
 * every row is aligned with it.
 */
export interface ResultTable {
  breed: string;
  trait: string;
  traitName: string;
  columns: string[];
  rows: CellValue[][];
}

export type RankingResult =
  | { kind: "present"; table: ResultTable }
  | { kind: "absent"; breed: string; trait: string };

/**
 * breed -> trait -> result, both levels in declaration order
 */
export type AggregatedResult = Map<string, Map<string, RankingResult>>;
