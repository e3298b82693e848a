/**
 * Export orchestrator — run the Assembler → Builder → Serializer pipeline
 * over a target list.
 *
 * Targets are processed one at a time, in order. A document is written only
 * after it has been fully assembled and rendered; dry-run performs the whole
 * pipeline and discards the bytes. Per-record failures are logged against
 * their identifier and the run moves on; a DataSourceError (or a failed
 * write) stops the remaining targets.
 */

import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import writeFileAtomic from "write-file-atomic";
import { fetchBundle, type DanglingSourcePolicy } from "../assembler/bundle-assembler.js";
import { DataSourceError, MetadataExportError } from "../errors.js";
import { buildDocument, type BuildOptions } from "../iso19139/document-builder.js";
import { serialize } from "../iso19139/serializer.js";
import type { ExportTarget } from "../schemas/export-target.js";
import type { MetadataSource } from "../source/interfaces.js";

export interface ExportRunOptions {
  source: MetadataSource;
  targets: readonly ExportTarget[];
  outputDir: string;
  /** Run the full pipeline but write nothing (default: false). */
  dryRun?: boolean;
  buildOptions?: BuildOptions;
  danglingSources?: DanglingSourcePolicy;
  /** Emit per-record debug lines. */
  verbose?: boolean;
}

export interface ExportedRecord {
  metadataId: string;
  /** Absent in dry-run mode. */
  path?: string;
  bytes: number;
  /** Number of tolerated integrity warnings. */
  warnings: number;
}

export interface RecordFailure {
  metadataId: string;
  /** Error class name, e.g. "NotFoundError". */
  kind: string;
  message: string;
}

export interface ExportRunSummary {
  dryRun: boolean;
  exported: ExportedRecord[];
  failures: RecordFailure[];
  /** True when a run-fatal error stopped the remaining targets. */
  aborted: boolean;
  /** False whenever any record failed. */
  ok: boolean;
}

/** File name for a target: `<id>.xml`, with path separators neutralised. */
export function outputFileName(metadataId: string): string {
  return `${metadataId.replace(/[\\/]/g, "_")}.xml`;
}

export async function exportMetadataRecords(options: ExportRunOptions): Promise<ExportRunSummary> {
  const { source, targets, outputDir, dryRun = false, buildOptions, danglingSources, verbose = false } = options;
  const exported: ExportedRecord[] = [];
  const failures: RecordFailure[] = [];
  let aborted = false;

  if (!dryRun) {
    await mkdir(outputDir, { recursive: true });
  }

  for (const target of targets) {
    console.info(`[metadata-export] Exporting metadata ID ${target.id}`);

    let document: Buffer;
    let warnings: number;
    try {
      const bundle = fetchBundle(
        source,
        target.id,
        { includeSources: target.includeSources, includeKeywords: target.includeKeywords },
        danglingSources ? { danglingSources } : {},
      );
      if (verbose) {
        console.debug(
          `[metadata-export] ${target.id}: ${bundle.contacts.length} contacts, ` +
            `${bundle.attributes.length} attributes, ${bundle.keywords.length} keywords, ` +
            `${bundle.sources.length} sources`,
        );
      }
      document = serialize(buildDocument(bundle, buildOptions));
      warnings = bundle.issues.length;
    } catch (err) {
      if (!(err instanceof MetadataExportError)) throw err;

      failures.push({ metadataId: target.id, kind: err.name, message: err.message });
      if (err instanceof DataSourceError) {
        console.error(`[metadata-export] Data source failure on ${target.id}; aborting run: ${err.message}`);
        aborted = true;
        break;
      }
      console.error(`[metadata-export] Skipping ${target.id}: ${err.message}`);
      continue;
    }

    if (dryRun) {
      console.info(`[metadata-export] Dry-run: ${target.id} rendered (${document.length} bytes), not written`);
      exported.push({ metadataId: target.id, bytes: document.length, warnings });
      continue;
    }

    const path = join(outputDir, outputFileName(target.id));
    try {
      await writeFileAtomic(path, document);
    } catch (err) {
      const message = (err as Error).message;
      console.error(`[metadata-export] Failed to write ${path}; aborting run: ${message}`);
      failures.push({ metadataId: target.id, kind: "WriteError", message });
      aborted = true;
      break;
    }
    console.info(`[metadata-export] Wrote ${path}`);
    exported.push({ metadataId: target.id, path, bytes: document.length, warnings });
  }

  return { dryRun, exported, failures, aborted, ok: failures.length === 0 };
}
