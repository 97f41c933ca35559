// src/config/run-config.ts
// Run configuration for the rankings report: which breed files to read, how
// many animals to keep per breed, and where the workbook goes.

import dotenv from "dotenv";
import { readFileSync } from "node:fs";
import { dirname, isAbsolute, resolve } from "node:path";
import { z } from "zod";
import type { BreedInputSpec } from "../lib/rankings/types.js";
import { ConfigurationError, describeError } from "../lib/rankings/errors.js";
import { DEFAULT_DELIMITER } from "../lib/rankings/delimited-reader.js";

// Honor ENV_FILE if present; otherwise default to .env
dotenv.config({ path: process.env.ENV_FILE || ".env" });

export const DEFAULT_CONFIG_PATH = "rankings.config.json";
export const DEFAULT_OUTPUT = "rankings.xlsx";
export const DEFAULT_NON_TRAIT_COLUMNS = ["Name", "RegNr", "Provider"];
export const DEFAULT_EXCLUDED_COLUMNS = ["Provider"];

export const RunConfigSchema = z
  .object({
    breeds: z.array(z.string().min(1, "breed name required")).min(1, "at least one breed required"),
    files: z.array(z.string().min(1, "file path required")),
    topN: z.array(z.number().int().nonnegative()),
    nonTraitColumns: z.array(z.string()).default(DEFAULT_NON_TRAIT_COLUMNS),
    excludedColumns: z.array(z.string()).default(DEFAULT_EXCLUDED_COLUMNS),
    delimiter: z.string().length(1, "delimiter must be a single character").default(DEFAULT_DELIMITER),
    traits: z.array(z.string().min(1)).optional(),
    traitNames: z.record(z.string()).optional(),
    traitNamesFile: z.string().min(1).optional(),
    output: z.string().min(1).default(DEFAULT_OUTPUT),
  })
  .strict();

export type RunConfigInput = z.input<typeof RunConfigSchema>;
export type RunConfigData = z.output<typeof RunConfigSchema>;

export interface RunConfig extends RunConfigData {
  breedSpecs: BreedInputSpec[];
}

/**
 * Validates raw configuration. Relative paths resolve against `baseDir`.
 */
export function parseRunConfig(raw: unknown, baseDir: string = process.cwd()): RunConfig {
  const parsed = RunConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid run configuration: ${issues}`);
  }

  const data = parsed.data;
  const { breeds, files, topN } = data;

  if (breeds.length !== files.length || breeds.length !== topN.length) {
    throw new ConfigurationError(
      `breeds, files and topN must have the same length (got ${breeds.length}, ${files.length}, ${topN.length})`
    );
  }

  const duplicates = breeds.filter((breed, index) => breeds.indexOf(breed) !== index);
  if (duplicates.length > 0) {
    throw new ConfigurationError(`Duplicate breed names: ${[...new Set(duplicates)].join(", ")}`);
  }

  const toPath = (path: string) => (isAbsolute(path) ? path : resolve(baseDir, path));
  const output = process.env.RANKINGS_OUTPUT || data.output;

  const breedSpecs: BreedInputSpec[] = breeds.map((breed, index) =>
    Object.freeze({ breed, file: toPath(files[index]), topN: topN[index] })
  );

  return {
    ...data,
    files: breedSpecs.map((spec) => spec.file),
    output: toPath(output),
    traitNamesFile: data.traitNamesFile ? toPath(data.traitNamesFile) : undefined,
    breedSpecs,
  };
}

export function resolveConfigPath(argvPath?: string): string {
  return resolve(argvPath || process.env.RANKINGS_CONFIG || DEFAULT_CONFIG_PATH);
}

export function loadRunConfig(path: string): RunConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    throw new ConfigurationError(`Cannot read run configuration ${path}: ${describeError(error)}`, {
      path,
      cause: error,
    });
  }
  return parseRunConfig(raw, dirname(path));
}
