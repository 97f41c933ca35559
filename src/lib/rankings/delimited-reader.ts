/**
 * Delimited Text Reader
 *
 * Loads breed export files (semicolon-separated by default) into record tables
 */

import { closeSync, openSync, readFileSync, readSync } from "node:fs";
import type { CellValue, RecordRow, RecordTable } from "./types.js";
import { ConfigurationError, SourceReadError, describeError } from "./errors.js";

export const DEFAULT_DELIMITER = ";";

const HEADER_CHUNK_BYTES = 4096;

/**
 * Parses a single line handling quotes and delimiters properly
 */
export function parseDelimitedLine(line: string, delimiter: string = DEFAULT_DELIMITER): string[] {
  const result: string[] = [];
  let current = "";
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];

    if (char === '"') {
      // Handle escaped quotes ("")
      if (inQuotes && line[i + 1] === '"') {
        current += '"';
        i++;
      } else {
        inQuotes = !inQuotes;
      }
    } else if (char === delimiter && !inQuotes) {
      result.push(current.trim());
      current = "";
    } else {
      current += char;
    }
  }

  result.push(current.trim());
  return result;
}

/**
 * Splits content into records. A line break inside a quoted field belongs to
 * the field, not to the record boundary.
 */
export function splitRecords(content: string): string[] {
  const records: string[] = [];
  let start = 0;
  let inQuotes = false;

  for (let i = 0; i < content.length; i++) {
    const char = content[i];
    if (char === '"') {
      inQuotes = !inQuotes;
    } else if (char === "\n" && !inQuotes) {
      records.push(content.slice(start, i).replace(/\r$/, ""));
      start = i + 1;
    }
  }

  records.push(content.slice(start).replace(/\r$/, ""));
  return records;
}

function stripBom(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/**
 * Reads the first line of a file without loading the rest of it
 */
function readFirstLine(path: string): string {
  const fd = openSync(path, "r");
  try {
    const chunks: Buffer[] = [];
    const buffer = Buffer.alloc(HEADER_CHUNK_BYTES);
    for (;;) {
      const bytesRead = readSync(fd, buffer, 0, buffer.length, null);
      if (bytesRead === 0) break;
      const chunk = Buffer.from(buffer.subarray(0, bytesRead));
      const newline = chunk.indexOf(0x0a);
      if (newline >= 0) {
        chunks.push(chunk.subarray(0, newline));
        break;
      }
      chunks.push(chunk);
    }
    return stripBom(Buffer.concat(chunks).toString("utf8")).replace(/\r$/, "");
  } finally {
    closeSync(fd);
  }
}

/**
 * Returns the column identifiers of a file's header line
 */
export function readHeader(path: string, delimiter: string = DEFAULT_DELIMITER): string[] {
  let line: string;
  try {
    line = readFirstLine(path);
  } catch (error) {
    throw new ConfigurationError(`Cannot read header of ${path}: ${describeError(error)}`, {
      path,
      cause: error,
    });
  }

  if (!line.trim()) {
    throw new ConfigurationError(`Header line of ${path} is empty`, { path });
  }

  return parseDelimitedLine(line, delimiter);
}

/**
 * Parses delimited content into a record table. Blank lines are skipped and
 * short rows are padded with empty cells.
 */
export function parseRecordTable(
  content: string,
  delimiter: string = DEFAULT_DELIMITER,
  source = "<inline>"
): RecordTable {
  const lines = splitRecords(stripBom(content));
  const headerLine = lines[0] ?? "";
  if (!headerLine.trim()) {
    throw new Error("File has no header line");
  }

  const columns = parseDelimitedLine(headerLine, delimiter);
  const rows: RecordRow[] = [];

  for (let i = 1; i < lines.length; i++) {
    const line = lines[i];
    if (!line.trim()) continue;

    const values = parseDelimitedLine(line, delimiter);
    const row: RecordRow = {};
    columns.forEach((column, index) => {
      row[column] = values[index] ?? "";
    });
    rows.push(row);
  }

  return { source, columns, rows };
}

/**
 * Reads and parses a whole breed file
 */
export function loadRecordTable(path: string, delimiter: string = DEFAULT_DELIMITER): RecordTable {
  try {
    const content = readFileSync(path, "utf8");
    return parseRecordTable(content, delimiter, path);
  } catch (error) {
    throw new SourceReadError(`Failed to load ${path}: ${describeError(error)}`, {
      path,
      cause: error,
    });
  }
}

const DECIMAL_COMMA = /^[+-]?\d+,\d+$/;
const DECIMAL_NUMBER = /^[+-]?(\d+(\.\d*)?|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Sort key of a trait cell. Accepts a decimal comma; anything that is not a
 * finite decimal number becomes null.
 */
export function parseTraitValue(value: CellValue | undefined): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;

  const text = value.trim();
  if (!text) return null;

  const normalized = DECIMAL_COMMA.test(text) ? text.replace(",", ".") : text;
  // Plain decimal notation only, no 0x/0b/0o prefixes
  if (!DECIMAL_NUMBER.test(normalized)) return null;

  const parsed = Number(normalized);
  return Number.isFinite(parsed) ? parsed : null;
}
