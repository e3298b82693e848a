/**
 * Export target configuration schema.
 *
 * A target list is an ordered sequence of catalogue identifiers with
 * per-entry inclusion flags. YAML/JSON files hold either a bare array or
 * `{ targets: [...] }`.
 */

import { z } from "zod";

export const ExportTarget = z.object({
  id: z.string().trim().min(1, "id must not be blank"),
  /** Include source lineage (default: true). */
  includeSources: z.boolean().default(true),
  /** Include keyword sections (default: true). */
  includeKeywords: z.boolean().default(true),
});
export type ExportTarget = z.infer<typeof ExportTarget>;

export const ExportTargetsFile = z.union([
  z.array(ExportTarget),
  z.object({ targets: z.array(ExportTarget) }).transform((file) => file.targets),
]);
export type ExportTargetsFile = z.infer<typeof ExportTargetsFile>;

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** One table/column pair scanned by the quote cleanup utility. */
export const CleanupTarget = z.object({
  table: z.string().regex(IDENTIFIER, "table must be a plain SQL identifier"),
  column: z.string().regex(IDENTIFIER, "column must be a plain SQL identifier"),
  /** Optional SQL predicate narrowing the scan. */
  where: z.string().min(1).optional(),
  /** Column logged alongside each change for traceability. */
  identifier: z.string().regex(IDENTIFIER, "identifier must be a plain SQL identifier").optional(),
});
export type CleanupTarget = z.infer<typeof CleanupTarget>;

export const CleanupTargetsFile = z.array(CleanupTarget).min(1, "no cleanup targets defined");
export type CleanupTargetsFile = z.infer<typeof CleanupTargetsFile>;
