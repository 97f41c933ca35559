/**
 * End-to-end Tests for the Rankings Report
 *
 * Two breed files: BV with 12 animals and the BV-only trait LBE, OB with 5.
 *
 * Run: npx tsx --test tests/unit/pipeline.test.ts
 */

import { test } from "node:test";
import assert from "node:assert";
import { readFileSync, readdirSync, writeFileSync } from "node:fs";
import path from "node:path";
import ExcelJS from "exceljs";
import { parseRunConfig, type RunConfig } from "../../src/config/run-config.js";
import { runRankingReport } from "../../src/lib/rankings/pipeline.js";
import { ConfigurationError, SourceReadError } from "../../src/lib/rankings/errors.js";
import { makeBreedRows, makeTempDir, removeTempDir, writeDelimitedFile } from "../helpers/fixtures.js";

const HEADER_BV = ["Name", "RegNr", "Provider", "GZW", "ND", "LBE"];
const HEADER_OB = ["Name", "RegNr", "Provider", "GZW", "ND"];

function setup(dir: string, extra: Record<string, unknown> = {}): RunConfig {
  writeDelimitedFile(dir, "bv.csv", HEADER_BV, makeBreedRows("BV", 12, (i) => [100 + i, 20 - i, i * 1000]));
  writeDelimitedFile(dir, "ob.csv", HEADER_OB, makeBreedRows("OB", 5, (i) => [90 + i, `${i},5`]));

  return parseRunConfig(
    {
      breeds: ["BV", "OB"],
      files: ["bv.csv", "ob.csv"],
      topN: [20, 5],
      output: "report.xlsx",
      ...extra,
    },
    dir
  );
}

async function readWorkbook(file: string): Promise<ExcelJS.Workbook> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.readFile(file);
  return workbook;
}

test("runRankingReport", async (t) => {
  const savedOutput = process.env.RANKINGS_OUTPUT;
  delete process.env.RANKINGS_OUTPUT;
  t.after(() => {
    if (savedOutput !== undefined) process.env.RANKINGS_OUTPUT = savedOutput;
  });

  await t.test("writes one sheet per discovered trait with stacked breed blocks", async () => {
    const dir = makeTempDir();
    try {
      const config = setup(dir, { traitNames: { GZW: "Gesamtzuchtwert" } });
      const summary = await runRankingReport(config);

      assert.deepStrictEqual(summary, {
        output: path.join(dir, "report.xlsx"),
        traits: ["GZW", "ND", "LBE"],
        sheets: 3,
        blocks: 5,
        mappingWritten: false,
      });

      const workbook = await readWorkbook(summary.output);
      assert.deepStrictEqual(
        workbook.worksheets.map((sheet) => sheet.name),
        ["GZW", "ND", "LBE"]
      );

      const gzw = workbook.getWorksheet("GZW");
      assert.ok(gzw);
      assert.strictEqual(gzw.getCell(1, 1).value, "Gesamtzuchtwert");
      assert.strictEqual(gzw.getCell(3, 1).value, "BV");
      assert.deepStrictEqual(
        [1, 2, 3, 4].map((column) => gzw.getCell(4, column).value),
        ["Rank", "Name", "RegNr", "Gesamtzuchtwert"]
      );
      assert.deepStrictEqual(
        [1, 2, 3, 4].map((column) => gzw.getCell(5, column).value),
        [1, "BV12", "BV-REG-12", 112]
      );
      assert.strictEqual(gzw.getCell(18, 1).value, "OB");
      assert.deepStrictEqual(
        [1, 2, 4].map((column) => gzw.getCell(20, column).value),
        [1, "OB5", 95]
      );

      const nd = workbook.getWorksheet("ND");
      assert.ok(nd);
      assert.strictEqual(nd.getCell(1, 1).value, "ND");
      assert.deepStrictEqual(
        [2, 4].map((column) => nd.getCell(5, column).value),
        ["BV1", 19]
      );
      assert.strictEqual(nd.getCell(18, 1).value, "OB");
      assert.deepStrictEqual(
        [2, 4].map((column) => nd.getCell(20, column).value),
        ["OB5", 5.5]
      );

      const lbe = workbook.getWorksheet("LBE");
      assert.ok(lbe);
      assert.strictEqual(lbe.getCell(3, 1).value, "BV");
      assert.strictEqual(lbe.getCell(16, 1).value, 12);
      assert.strictEqual(lbe.getCell(18, 1).value, null);
    } finally {
      removeTempDir(dir);
    }
  });

  await t.test("saves the trait name file once and reuses manual edits", async () => {
    const dir = makeTempDir();
    try {
      const config = setup(dir, { traitNamesFile: "traits.csv" });
      const first = await runRankingReport(config);

      assert.strictEqual(first.mappingWritten, true);
      const namesFile = path.join(dir, "traits.csv");
      assert.strictEqual(readFileSync(namesFile, "utf8"), "Abk,Name\nGZW,GZW\nND,ND\nLBE,LBE\n");

      writeFileSync(namesFile, "Abk,Name\nGZW,GZW\nND,Nutzungsdauer\nLBE,LBE\n", "utf8");
      const second = await runRankingReport(config);

      assert.strictEqual(second.mappingWritten, false);
      assert.strictEqual(readFileSync(namesFile, "utf8"), "Abk,Name\nGZW,GZW\nND,Nutzungsdauer\nLBE,LBE\n");

      const workbook = await readWorkbook(second.output);
      const nd = workbook.getWorksheet("ND");
      assert.ok(nd);
      assert.strictEqual(nd.getCell(1, 1).value, "Nutzungsdauer");
      assert.strictEqual(nd.getCell(4, 4).value, "Nutzungsdauer");
    } finally {
      removeTempDir(dir);
    }
  });

  await t.test("uses an explicit trait list in its own order", async () => {
    const dir = makeTempDir();
    try {
      const summary = await runRankingReport(setup(dir, { traits: ["LBE", "GZW", "LBE"] }));

      assert.deepStrictEqual(summary.traits, ["LBE", "GZW"]);
      assert.strictEqual(summary.blocks, 3);

      const workbook = await readWorkbook(summary.output);
      assert.deepStrictEqual(
        workbook.worksheets.map((sheet) => sheet.name),
        ["LBE", "GZW"]
      );
    } finally {
      removeTempDir(dir);
    }
  });

  await t.test("fails without writing a report when a breed file is unreadable", async () => {
    const dir = makeTempDir();
    try {
      const config = setup(dir, { traits: ["GZW"] });
      const broken: RunConfig = {
        ...config,
        breedSpecs: [...config.breedSpecs, { breed: "XX", file: path.join(dir, "xx.csv"), topN: 5 }],
      };

      await assert.rejects(runRankingReport(broken), (error: unknown) => {
        assert.ok(error instanceof SourceReadError);
        assert.strictEqual(error.breed, "XX");
        return true;
      });
      assert.deepStrictEqual(
        readdirSync(dir).sort(),
        ["bv.csv", "ob.csv"]
      );
    } finally {
      removeTempDir(dir);
    }
  });

  await t.test("a missing file during discovery is a configuration error", async () => {
    const dir = makeTempDir();
    try {
      const config = setup(dir);
      const broken: RunConfig = {
        ...config,
        breedSpecs: [{ breed: "XX", file: path.join(dir, "xx.csv"), topN: 5 }],
      };

      await assert.rejects(runRankingReport(broken), ConfigurationError);
    } finally {
      removeTempDir(dir);
    }
  });
});
