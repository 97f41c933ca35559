#!/usr/bin/env node
// Builds the per-trait rankings workbook from the breed files in a run config
// Usage: npx tsx scripts/run-rankings.ts [config.json]

import { loadRunConfig, resolveConfigPath } from "../src/config/run-config.js";
import { RankingError, runRankingReport } from "../src/lib/rankings/index.js";
import { captureException, flush, initSentry } from "../src/lib/sentry.js";

async function main() {
  initSentry();

  const configPath = resolveConfigPath(process.argv[2]);
  console.log(`[rankings] Using configuration ${configPath}`);

  const config = loadRunConfig(configPath);
  const summary = await runRankingReport(config);

  console.log(`[rankings] Summary:
  - Output: ${summary.output}
  - Sheets: ${summary.sheets}
  - Breed blocks: ${summary.blocks}
  - Trait name file written: ${summary.mappingWritten ? "yes" : "no"}
  `);
}

main().catch(async (err: unknown) => {
  if (err instanceof RankingError) {
    console.error(`[rankings] Run failed (${err.code}):`, err.message);
  } else {
    console.error(`[rankings] Run failed:`, err);
  }
  captureException(err);
  await flush();
  process.exitCode = 1;
});
