/**
 * ISO 19139 metadata export
 *
 * Assembles catalogue entries from a relational store, renders each as a
 * gmd:MD_Metadata document, and writes one XML file per entry.
 */

export * from "./errors.js";
export * from "./schemas/index.js";
export type { MetadataSource } from "./source/interfaces.js";
export { SqliteMetadataSource } from "./source/sqlite-source.js";
export { initMetadataDb, applySchema } from "./source/schema.js";
export { fetchBundle, mergeContacts } from "./assembler/bundle-assembler.js";
export type { AssembleOptions, DanglingSourcePolicy } from "./assembler/bundle-assembler.js";
export * from "./iso19139/index.js";
export { exportMetadataRecords, outputFileName } from "./export/exporter.js";
export type { ExportRunOptions, ExportRunSummary, ExportedRecord, RecordFailure } from "./export/exporter.js";
export { loadExportTargets, loadCleanupTargets, parseTargetsCsv, parseBool } from "./config/targets.js";
export { normaliseQuotes } from "./cleanup/quotes.js";
export { runQuoteCleanup, summarise } from "./cleanup/runner.js";
export type { CleanupOptions, CleanupTargetResult } from "./cleanup/runner.js";
