/**
 * Trait Rankings Module
 *
 * Per-trait top-N lists across breed files, written as a multi-sheet workbook
 */

export * from "./types.js";
export * from "./errors.js";
export * from "./delimited-reader.js";
export * from "./trait-discovery.js";
export * from "./trait-names.js";
export * from "./ranking-extractor.js";
export * from "./aggregator.js";
export * from "./report-writer.js";
export * from "./pipeline.js";
