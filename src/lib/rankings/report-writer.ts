/**
 * Report Writer (XLSX)
 *
 * One worksheet per trait. Each sheet starts with the trait's display name,
 * followed by one block per breed that has data for the trait:
 *
 *   row L        breed label
 *   row L+1      table header
 *   rows L+2..   ranked rows (k of them)
 *   row L+k+2    blank
 *   row L+k+3    next breed label
 */

import ExcelJS from "exceljs";
import { basename, dirname, join } from "node:path";
import { rename, rm } from "node:fs/promises";
import type { AggregatedResult, ResultTable } from "./types.js";
import { DestinationWriteError, describeError } from "./errors.js";
import type { TraitNameMapping } from "./trait-names.js";

export const HEADING_ROW = 1;
export const FIRST_LABEL_ROW = 3;
export const FIRST_COLUMN = 1;

const MAX_SHEET_NAME_LENGTH = 31;
const INVALID_SHEET_CHARS = /[[\]:*?/\\]/g;
const EDGE_APOSTROPHES = /^[\s']+|[\s']+$/g;
const MIN_COLUMN_WIDTH = 8;
const MAX_COLUMN_WIDTH = 40;

export interface BlockLayout {
  breed: string;
  labelRow: number;
  headerRow: number;
  firstDataRow: number;
  table: ResultTable;
}

export interface SheetLayout {
  trait: string;
  sheetName: string;
  heading: string;
  headingRow: number;
  blocks: BlockLayout[];
}

export interface WriteReportResult {
  path: string;
  sheets: number;
  blocks: number;
}

/**
 * Sanitize and ensure unique sheet name.
 * Excel limits: 31 chars, no []:*?/\, no leading or trailing apostrophe
 */
export function toSheetName(name: string, used: Set<string>): string {
  const base =
    name
      .replace(INVALID_SHEET_CHARS, "_")
      .slice(0, MAX_SHEET_NAME_LENGTH)
      .replace(EDGE_APOSTROPHES, "")
      .trim() || "Sheet";

  let candidate = base;
  let counter = 2;
  // Excel compares sheet names case-insensitively
  while (used.has(candidate.toLowerCase())) {
    const suffix = `~${counter}`;
    candidate = base.slice(0, MAX_SHEET_NAME_LENGTH - suffix.length) + suffix;
    counter++;
  }

  used.add(candidate.toLowerCase());
  return candidate;
}

/**
 * Computes where every heading, label and table goes. Breeds without data
 * for a trait take no space on that trait's sheet.
 */
export function planReportLayout(
  aggregated: AggregatedResult,
  traitIds: readonly string[],
  breedOrder: readonly string[],
  names?: TraitNameMapping
): SheetLayout[] {
  const usedNames = new Set<string>();

  return traitIds.map((trait) => {
    const blocks: BlockLayout[] = [];
    let labelRow = FIRST_LABEL_ROW;

    for (const breed of breedOrder) {
      const ranking = aggregated.get(breed)?.get(trait);
      if (!ranking || ranking.kind === "absent") continue;

      blocks.push({
        breed,
        labelRow,
        headerRow: labelRow + 1,
        firstDataRow: labelRow + 2,
        table: ranking.table,
      });
      labelRow += ranking.table.rows.length + 3;
    }

    const heading = blocks[0]?.table.traitName ?? names?.lookup(trait) ?? trait;

    return {
      trait,
      sheetName: toSheetName(trait, usedNames),
      heading,
      headingRow: HEADING_ROW,
      blocks,
    };
  });
}

function fitColumnWidths(sheet: ExcelJS.Worksheet, layout: SheetLayout): void {
  const widths: number[] = [];
  const measure = (index: number, value: unknown) => {
    const length = value === null || value === undefined ? 0 : String(value).length;
    widths[index] = Math.max(widths[index] ?? 0, length);
  };

  for (const block of layout.blocks) {
    block.table.columns.forEach((column, index) => measure(index, column));
    for (const row of block.table.rows) {
      row.forEach((value, index) => measure(index, value));
    }
  }

  widths.forEach((width, index) => {
    sheet.getColumn(FIRST_COLUMN + index).width = Math.min(
      MAX_COLUMN_WIDTH,
      Math.max(MIN_COLUMN_WIDTH, width + 2)
    );
  });
}

export function buildWorkbook(layouts: readonly SheetLayout[]): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();
  workbook.created = new Date();

  for (const layout of layouts) {
    const sheet = workbook.addWorksheet(layout.sheetName);

    const heading = sheet.getCell(layout.headingRow, FIRST_COLUMN);
    heading.value = layout.heading;
    heading.font = { bold: true, size: 14 };

    for (const block of layout.blocks) {
      const label = sheet.getCell(block.labelRow, FIRST_COLUMN);
      label.value = block.breed;
      label.font = { bold: true };

      block.table.columns.forEach((column, index) => {
        const cell = sheet.getCell(block.headerRow, FIRST_COLUMN + index);
        cell.value = column;
        cell.font = { bold: true };
      });

      block.table.rows.forEach((row, rowIndex) => {
        row.forEach((value, index) => {
          sheet.getCell(block.firstDataRow + rowIndex, FIRST_COLUMN + index).value = value;
        });
      });
    }

    fitColumnWidths(sheet, layout);
  }

  return workbook;
}

async function removeTempFile(tempPath: string): Promise<void> {
  try {
    await rm(tempPath, { force: true });
  } catch (cleanupError) {
    console.error(`[report-writer] Could not remove ${tempPath}:`, describeError(cleanupError));
  }
}

/**
 * Writes the report next to its destination first and renames it into place,
 * so a failed run never leaves a half-written workbook behind.
 */
export async function writeReport(
  aggregated: AggregatedResult,
  traitIds: readonly string[],
  breedOrder: readonly string[],
  destination: string,
  names?: TraitNameMapping
): Promise<WriteReportResult> {
  const layouts = planReportLayout(aggregated, traitIds, breedOrder, names);
  if (layouts.length === 0) {
    throw new DestinationWriteError(`Refusing to write ${destination}: the report has no traits`, {
      path: destination,
    });
  }

  const tempPath = join(dirname(destination), `.${basename(destination)}.${process.pid}.tmp`);

  try {
    const workbook = buildWorkbook(layouts);
    await workbook.xlsx.writeFile(tempPath);
    await rename(tempPath, destination);
  } catch (error) {
    await removeTempFile(tempPath);
    throw new DestinationWriteError(`Failed to write report ${destination}: ${describeError(error)}`, {
      path: destination,
      cause: error,
    });
  }

  const blocks = layouts.reduce((sum, layout) => sum + layout.blocks.length, 0);
  console.log(`[report-writer] Wrote ${layouts.length} sheets (${blocks} breed blocks) to ${destination}`);

  return { path: destination, sheets: layouts.length, blocks };
}
