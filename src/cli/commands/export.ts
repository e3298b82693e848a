/**
 * Export commands — export, init-db.
 */

import { resolve } from "node:path";
import { Option, type Command } from "commander";
import { loadExportTargets } from "../../config/targets.js";
import { exportMetadataRecords } from "../../export/exporter.js";
import { SqliteMetadataSource } from "../../source/sqlite-source.js";
import { initMetadataDb } from "../../source/schema.js";

interface ExportCommandOptions {
  config: string;
  outputDir: string;
  db?: string;
  dryRun: boolean;
  strictSources: boolean;
  language: string;
  referenceSystem: string;
  dateStamp?: string;
  verbose: boolean;
}

/**
 * Register export-related commands with the Commander program.
 */
export function registerExportCommands(program: Command): void {
  // --- export ---
  program
    .command("export")
    .description("Export catalogue records to ISO 19139 XML files")
    .option("--config <path>", "CSV or YAML file listing metadata IDs to export", "config/metadata_ids.csv")
    .option("--output-dir <dir>", "Directory where XML files are written", "output")
    .addOption(new Option("--db <path>", "Path to the catalogue SQLite database").env("METADATA_DB_PATH"))
    .option("--dry-run", "Fetch and render records without writing files", false)
    .option("--strict-sources", "Fail a record on a dangling source link instead of skipping it", false)
    .option("--language <code>", "Metadata language code", "eng")
    .option("--reference-system <code>", "Reference system identifier", "British National Grid")
    .option("--date-stamp <date>", "Override the metadata date stamp (YYYY-MM-DD)")
    .option("--verbose", "Enable debug logging", false)
    .action(async (opts: ExportCommandOptions) => {
      if (!opts.db) {
        console.error("❌ No database given. Pass --db or set METADATA_DB_PATH.");
        process.exitCode = 1;
        return;
      }

      const targets = await loadExportTargets(opts.config);
      console.info(`[metadata-export] Loaded ${targets.length} metadata configurations from ${opts.config}`);

      const source = SqliteMetadataSource.open(opts.db);
      try {
        const summary = await exportMetadataRecords({
          source,
          targets,
          outputDir: resolve(opts.outputDir),
          dryRun: opts.dryRun,
          danglingSources: opts.strictSources ? "fail" : "skip",
          buildOptions: {
            languageCode: opts.language,
            referenceSystem: opts.referenceSystem,
            ...(opts.dateStamp ? { dateStamp: opts.dateStamp } : {}),
          },
          verbose: opts.verbose,
        });

        if (summary.ok) {
          const verb = summary.dryRun ? "rendered (dry-run)" : "written";
          console.log(`✅ Export completed: ${summary.exported.length} file(s) ${verb}`);
        } else {
          console.error(
            `❌ Export finished with ${summary.failures.length} failure(s)` +
              `${summary.aborted ? " (run aborted)" : ""}:`,
          );
          for (const failure of summary.failures) {
            console.error(`   ${failure.metadataId}: [${failure.kind}] ${failure.message}`);
          }
          process.exitCode = 1;
        }
      } finally {
        source.close();
      }
    });

  // --- init-db ---
  program
    .command("init-db <path>")
    .description("Create an empty catalogue database with every metadata table")
    .action((path: string) => {
      const db = initMetadataDb(path);
      db.close();
      console.log(`✅ Catalogue schema ready at ${path}`);
    });
}
