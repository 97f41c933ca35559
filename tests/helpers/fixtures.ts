/**
 * Temporary breed files for ranking tests
 */

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";

export function makeTempDir(prefix = "rankings-test-"): string {
  return mkdtempSync(path.join(tmpdir(), prefix));
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/**
 * Writes a semicolon-separated file and returns its path
 */
export function writeDelimitedFile(
  dir: string,
  name: string,
  header: string[],
  rows: Array<Array<string | number>>,
  delimiter = ";"
): string {
  const filePath = path.join(dir, name);
  const lines = [header.join(delimiter), ...rows.map((row) => row.map(String).join(delimiter))];
  writeFileSync(filePath, lines.join("\n") + "\n", "utf8");
  return filePath;
}

/**
 * `count` animals named `${prefix}1..n` with trait values derived from the index
 */
export function makeBreedRows(
  prefix: string,
  count: number,
  traitValues: (index: number) => Array<string | number>
): Array<Array<string | number>> {
  const rows: Array<Array<string | number>> = [];
  for (let i = 1; i <= count; i++) {
    rows.push([`${prefix}${i}`, `${prefix}-REG-${i}`, "TestProvider", ...traitValues(i)]);
  }
  return rows;
}
