/**
 * Multi-Breed Aggregator
 *
 * Runs the extractor for every (breed, trait) pair. Breeds and traits keep
 * their declaration order because both drive the report layout.
 */

import type { AggregatedResult, BreedInputSpec, RankingResult, RecordTable } from "./types.js";
import { DEFAULT_DELIMITER, loadRecordTable } from "./delimited-reader.js";
import { extractRanking } from "./ranking-extractor.js";
import { SourceReadError, describeError } from "./errors.js";
import type { TraitNameMapping } from "./trait-names.js";

export type RecordTableLoader = (path: string, delimiter: string) => RecordTable;

export interface AggregateOptions {
  delimiter?: string;
  loader?: RecordTableLoader;
}

export interface BreedSummary {
  breed: string;
  rows: number;
  present: number;
  absent: string[];
}

export function aggregateRankings(
  breedSpecs: readonly BreedInputSpec[],
  traitIds: readonly string[],
  descriptiveColumns: readonly string[],
  names: TraitNameMapping,
  options: AggregateOptions = {}
): AggregatedResult {
  const delimiter = options.delimiter ?? DEFAULT_DELIMITER;
  const loader = options.loader ?? loadRecordTable;
  const result: AggregatedResult = new Map();

  for (const spec of breedSpecs) {
    let table: RecordTable;
    try {
      table = loader(spec.file, delimiter);
    } catch (error) {
      // Every declared breed must be attempted; no partial report
      throw new SourceReadError(
        `Cannot load records for breed ${spec.breed} from ${spec.file}: ${describeError(error)}`,
        { breed: spec.breed, path: spec.file, cause: error }
      );
    }

    const byTrait = new Map<string, RankingResult>();
    for (const trait of traitIds) {
      byTrait.set(trait, extractRanking(table, trait, descriptiveColumns, spec.topN, names, spec.breed));
    }
    result.set(spec.breed, byTrait);

    console.log(`[rankings] ${spec.breed}: ranked ${table.rows.length} records from ${spec.file}`);
  }

  return result;
}

export function summarizeAggregation(result: AggregatedResult): BreedSummary[] {
  const summaries: BreedSummary[] = [];
  for (const [breed, byTrait] of result) {
    const summary: BreedSummary = { breed, rows: 0, present: 0, absent: [] };
    for (const [trait, ranking] of byTrait) {
      if (ranking.kind === "absent") {
        summary.absent.push(trait);
      } else {
        summary.present += 1;
        summary.rows += ranking.table.rows.length;
      }
    }
    summaries.push(summary);
  }
  return summaries;
}
