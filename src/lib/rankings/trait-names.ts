/**
 * Trait Name Mapping
 *
 * Abbreviation -> display name table used to relabel trait columns and sheet
 * headings. Persisted as a two-column `Abk,Name` file that is written once and
 * then left to manual editing.
 */

import { readFileSync, writeFileSync } from "node:fs";
import { parseDelimitedLine, splitRecords } from "./delimited-reader.js";
import { ConfigurationError, DestinationWriteError, describeError } from "./errors.js";

export const MAPPING_HEADERS = ["Abk", "Name"] as const;

const MAPPING_DELIMITER = ",";

export interface SaveResult {
  written: boolean;
  path: string;
}

/**
 * Escapes a field value
 * Wraps in quotes if contains comma, line break, or quote
 */
function escapeCsvField(value: string): string {
  if (!value) return "";

  if (/[,"\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }

  return value;
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "EEXIST";
}

export class TraitNameMapping {
  private readonly names = new Map<string, string>();
  private frozen = false;

  /**
   * Identity mapping: every trait is its own display name
   */
  static buildDefault(traitIds: Iterable<string>): TraitNameMapping {
    const mapping = new TraitNameMapping();
    for (const id of traitIds) {
      mapping.override(id, id);
    }
    return mapping;
  }

  static load(path: string): TraitNameMapping {
    let content: string;
    try {
      content = readFileSync(path, "utf8");
    } catch (error) {
      throw new ConfigurationError(`Cannot read trait name file ${path}: ${describeError(error)}`, {
        path,
        cause: error,
      });
    }
    return TraitNameMapping.parse(content, path);
  }

  static parse(content: string, source = "<inline>"): TraitNameMapping {
    const lines = splitRecords(content.replace(/^\uFEFF/, ""));
    const headers = parseDelimitedLine(lines[0] ?? "", MAPPING_DELIMITER);
    const abkIndex = headers.indexOf(MAPPING_HEADERS[0]);
    const nameIndex = headers.indexOf(MAPPING_HEADERS[1]);

    if (abkIndex < 0 || nameIndex < 0) {
      throw new ConfigurationError(
        `Trait name file ${source} must have the columns ${MAPPING_HEADERS.join(", ")}`,
        { path: source }
      );
    }

    const mapping = new TraitNameMapping();
    for (const line of lines.slice(1)) {
      if (!line.trim()) continue;
      const values = parseDelimitedLine(line, MAPPING_DELIMITER);
      const abbreviation = values[abkIndex] ?? "";
      if (!abbreviation) continue;
      mapping.override(abbreviation, values[nameIndex] || abbreviation);
    }
    return mapping;
  }

  /**
   * Upserts one entry
   */
  override(abbreviation: string, name: string): this {
    if (this.frozen) {
      throw new Error(`Trait name mapping is read-only; cannot rename ${abbreviation}`);
    }
    this.names.set(abbreviation, name);
    return this;
  }

  applyOverrides(overrides: Readonly<Record<string, string>>): this {
    for (const [abbreviation, name] of Object.entries(overrides)) {
      this.override(abbreviation, name);
    }
    return this;
  }

  merge(other: TraitNameMapping): this {
    for (const [abbreviation, name] of other.entries()) {
      this.override(abbreviation, name);
    }
    return this;
  }

  /** Never fails: unmapped abbreviations name themselves. */
  lookup(abbreviation: string): string {
    return this.names.get(abbreviation) ?? abbreviation;
  }

  has(abbreviation: string): boolean {
    return this.names.has(abbreviation);
  }

  get size(): number {
    return this.names.size;
  }

  entries(): Array<[string, string]> {
    return [...this.names.entries()];
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  serialize(): string {
    const lines = [MAPPING_HEADERS.join(MAPPING_DELIMITER)];
    for (const [abbreviation, name] of this.names) {
      lines.push([abbreviation, name].map(escapeCsvField).join(MAPPING_DELIMITER));
    }
    return lines.join("\n") + "\n";
  }

  /**
   * Writes the mapping unless the file already exists, so manual edits to a
   * previously saved file are kept.
   */
  save(path: string): SaveResult {
    try {
      writeFileSync(path, this.serialize(), { encoding: "utf8", flag: "wx" });
    } catch (error) {
      if (isAlreadyExists(error)) {
        console.log(`[trait-names] ${path} already exists, leaving it unchanged`);
        return { written: false, path };
      }
      throw new DestinationWriteError(`Cannot write trait name file ${path}: ${describeError(error)}`, {
        path,
        cause: error,
      });
    }

    console.log(`[trait-names] Wrote ${this.names.size} trait names to ${path}`);
    return { written: true, path };
  }
}
