/**
 * Rankings report run: discovery, naming, aggregation, workbook.
 */

import { existsSync } from "node:fs";
import type { RunConfig } from "../../config/run-config.js";
import { aggregateRankings, summarizeAggregation, type RecordTableLoader } from "./aggregator.js";
import { ConfigurationError } from "./errors.js";
import { writeReport } from "./report-writer.js";
import { discoverTraits, resolveDescriptiveColumns } from "./trait-discovery.js";
import { TraitNameMapping } from "./trait-names.js";

export interface RunDependencies {
  loader?: RecordTableLoader;
}

export interface RunSummary {
  output: string;
  traits: string[];
  sheets: number;
  blocks: number;
  mappingWritten: boolean;
}

function uniqueInOrder(values: readonly string[]): string[] {
  return [...new Set(values)];
}

function buildTraitNames(config: RunConfig, traits: readonly string[]): TraitNameMapping {
  const names = TraitNameMapping.buildDefault(traits);

  if (config.traitNamesFile && existsSync(config.traitNamesFile)) {
    names.merge(TraitNameMapping.load(config.traitNamesFile));
    console.log(`[rankings] Loaded trait names from ${config.traitNamesFile}`);
  }
  if (config.traitNames) {
    names.applyOverrides(config.traitNames);
  }

  return names;
}

export async function runRankingReport(
  config: RunConfig,
  deps: RunDependencies = {}
): Promise<RunSummary> {
  const startTime = Date.now();
  const breedSpecs = config.breedSpecs;
  const descriptiveColumns = resolveDescriptiveColumns(config.nonTraitColumns, config.excludedColumns);

  const traits = config.traits
    ? uniqueInOrder(config.traits)
    : discoverTraits(
        breedSpecs.map((spec) => spec.file),
        config.nonTraitColumns,
        config.delimiter
      );

  if (traits.length === 0) {
    throw new ConfigurationError("No trait columns found in the input files");
  }
  console.log(`[rankings] ${traits.length} traits: ${traits.join(", ")}`);

  const names = buildTraitNames(config, traits);
  const mappingWritten = config.traitNamesFile ? names.save(config.traitNamesFile).written : false;
  names.freeze();

  const aggregated = aggregateRankings(breedSpecs, traits, descriptiveColumns, names, {
    delimiter: config.delimiter,
    loader: deps.loader,
  });

  for (const summary of summarizeAggregation(aggregated)) {
    const missing = summary.absent.length > 0 ? ` (no data for ${summary.absent.join(", ")})` : "";
    console.log(`[rankings] ${summary.breed}: ${summary.present} traits, ${summary.rows} rows${missing}`);
  }

  const written = await writeReport(
    aggregated,
    traits,
    breedSpecs.map((spec) => spec.breed),
    config.output,
    names
  );

  console.log(`[rankings] Run complete in ${Date.now() - startTime}ms`);

  return {
    output: written.path,
    traits,
    sheets: written.sheets,
    blocks: written.blocks,
    mappingWritten,
  };
}
