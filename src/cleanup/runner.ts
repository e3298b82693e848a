/**
 * Quote cleanup runner — scan configured table columns and replace
 * typographic quotes with ASCII ones.
 *
 * Dry-run by default: proposed changes are logged and nothing is written.
 * With `commit`, every update across all targets is applied in a single
 * transaction.
 */

import type Database from "better-sqlite3";
import { z } from "zod";
import { DataSourceError } from "../errors.js";
import type { CleanupTarget } from "../schemas/export-target.js";
import { normaliseQuotes } from "./quotes.js";

export interface CleanupOptions {
  /** Apply updates instead of only logging them (default: false). */
  commit?: boolean;
  /** Width at which logged values are truncated (default: 120). */
  summaryWidth?: number;
}

export interface CleanupTargetResult {
  table: string;
  column: string;
  scanned: number;
  /** Rows whose value would change. */
  pending: number;
  /** Rows actually updated (always 0 in dry-run). */
  applied: number;
}

interface PlannedUpdate {
  rowId: number;
  before: string;
  after: string;
  label: string;
}

const ScannedRow = z.object({
  rowId: z.number(),
  value: z.unknown(),
  label: z.unknown().optional(),
});

export function runQuoteCleanup(
  db: Database.Database,
  targets: readonly CleanupTarget[],
  options: CleanupOptions = {},
): CleanupTargetResult[] {
  const { commit = false, summaryWidth = 120 } = options;

  const plans = targets.map((target) => {
    const { scanned, updates } = planTarget(db, target);
    const where = `${target.table}.${target.column}`;
    if (updates.length === 0) {
      console.info(`[quote-cleanup] No changes required for ${where}`);
    }
    for (const update of updates) {
      console.info(
        `[quote-cleanup] ${where} (${update.label}): ` +
          `${summarise(update.before, summaryWidth)} -> ${summarise(update.after, summaryWidth)}`,
      );
    }
    return { target, scanned, updates };
  });

  const applied = new Map<CleanupTarget, number>();
  if (commit) {
    try {
      db.transaction(() => {
        for (const { target, updates } of plans) {
          const statement = db.prepare(
            `UPDATE ${quoteIdentifier(target.table)} SET ${quoteIdentifier(target.column)} = ? WHERE rowid = ?`,
          );
          for (const update of updates) {
            statement.run(update.after, update.rowId);
          }
          applied.set(target, updates.length);
        }
      })();
    } catch (err) {
      throw new DataSourceError(`Quote cleanup rolled back: ${(err as Error).message}`, { cause: err });
    }
  }

  const results = plans.map(({ target, scanned, updates }) => ({
    table: target.table,
    column: target.column,
    scanned,
    pending: updates.length,
    applied: applied.get(target) ?? 0,
  }));

  const pending = results.reduce((sum, result) => sum + result.pending, 0);
  if (commit) {
    console.info(`[quote-cleanup] Committed ${pending} update(s) in total`);
  } else {
    console.info(`[quote-cleanup] Dry-run: ${pending} pending update(s); re-run with --commit to apply`);
  }
  return results;
}

/** Truncate a value for log output, collapsing runs of whitespace. */
export function summarise(text: string, width = 120): string {
  const collapsed = text.replace(/\s+/g, " ").trim();
  return collapsed.length <= width ? collapsed : `${collapsed.slice(0, width - 1)}…`;
}

// --- Helpers ---

function planTarget(db: Database.Database, target: CleanupTarget): { scanned: number; updates: PlannedUpdate[] } {
  const columns = [`rowid AS rowId`, `${quoteIdentifier(target.column)} AS value`];
  if (target.identifier) columns.push(`${quoteIdentifier(target.identifier)} AS label`);
  let sql = `SELECT ${columns.join(", ")} FROM ${quoteIdentifier(target.table)}`;
  if (target.where) sql += ` WHERE ${target.where}`;

  let rows: unknown[];
  try {
    rows = db.prepare(sql).all();
  } catch (err) {
    throw new DataSourceError(
      `Cannot scan ${target.table}.${target.column}: ${(err as Error).message}`,
      { cause: err },
    );
  }

  const updates: PlannedUpdate[] = [];
  for (const raw of rows) {
    const row = ScannedRow.parse(raw);
    if (typeof row.value !== "string") continue;
    const after = normaliseQuotes(row.value);
    if (after === row.value) continue;
    updates.push({
      rowId: row.rowId,
      before: row.value,
      after,
      label: row.label === undefined || row.label === null ? `rowid=${row.rowId}` : String(row.label),
    });
  }
  return { scanned: rows.length, updates };
}

function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}
