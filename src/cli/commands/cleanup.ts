/**
 * Cleanup command — normalise typographic quotes in catalogue columns.
 */

import Database from "better-sqlite3";
import { Option, type Command } from "commander";
import { runQuoteCleanup } from "../../cleanup/runner.js";
import { loadCleanupTargets } from "../../config/targets.js";

interface CleanupCommandOptions {
  config: string;
  db?: string;
  commit: boolean;
}

export function registerCleanupCommands(program: Command): void {
  program
    .command("cleanup")
    .description("Normalise smart quotes in configured columns (dry-run unless --commit)")
    .requiredOption("--config <path>", "JSON or YAML file describing cleanup targets")
    .addOption(new Option("--db <path>", "Path to the catalogue SQLite database").env("METADATA_DB_PATH"))
    .option("--commit", "Apply updates instead of only logging them", false)
    .action(async (opts: CleanupCommandOptions) => {
      if (!opts.db) {
        console.error("❌ No database given. Pass --db or set METADATA_DB_PATH.");
        process.exitCode = 1;
        return;
      }

      const targets = await loadCleanupTargets(opts.config);
      const db = new Database(opts.db, { fileMustExist: true });
      try {
        const results = runQuoteCleanup(db, targets, { commit: opts.commit });
        const total = results.reduce((sum, r) => sum + (opts.commit ? r.applied : r.pending), 0);
        console.log(
          opts.commit
            ? `✅ Cleanup finished: ${total} row(s) updated`
            : `✅ Dry-run completed: ${total} row(s) would change. Re-run with --commit to apply.`,
        );
      } finally {
        db.close();
      }
    });
}
