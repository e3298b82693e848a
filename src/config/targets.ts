/**
 * Target list loading — which catalogue entries to export, and which columns
 * the quote cleanup scans.
 *
 * Export targets come from CSV (`metadata_id,include_sources,include_keywords`)
 * or from YAML/JSON validated against the ExportTarget schema. Blank lines and
 * lines starting with `#` are ignored in CSV files.
 */

import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { parse as parseYaml } from "yaml";
import type { z } from "zod";
import { ConfigurationError } from "../errors.js";
import {
  CleanupTargetsFile,
  ExportTargetsFile,
  type CleanupTarget,
  type ExportTarget,
} from "../schemas/export-target.js";

const TRUE_VALUES = new Set(["1", "true", "t", "yes", "y"]);
const FALSE_VALUES = new Set(["0", "false", "f", "no", "n"]);

/** Load export targets, in file order. */
export async function loadExportTargets(path: string): Promise<ExportTarget[]> {
  const content = await readConfigFile(path);
  const extension = extname(path).toLowerCase();
  const targets =
    extension === ".csv" || extension === ".txt"
      ? parseTargetsCsv(content)
      : parseDocument(ExportTargetsFile, content, path);

  if (targets.length === 0) {
    throw new ConfigurationError(`${path} did not contain any metadata records`);
  }
  return targets;
}

/** Load quote-cleanup targets from a JSON or YAML array. */
export async function loadCleanupTargets(path: string): Promise<CleanupTarget[]> {
  const content = await readConfigFile(path);
  return parseDocument(CleanupTargetsFile, content, path);
}

/**
 * Parse CSV target rows. Unrecognised boolean values fall back to the
 * default (true).
 */
export function parseTargetsCsv(content: string): ExportTarget[] {
  const lines = content
    .split(/\r?\n/)
    .map((line, index) => ({ line, lineNumber: index + 1 }))
    .filter(({ line }) => line.trim() !== "" && !line.trimStart().startsWith("#"));

  const [header, ...rows] = lines;
  if (!header) {
    throw new ConfigurationError("Configuration CSV must define column headers");
  }

  const columns = splitCsvLine(header.line).map((name) => name.trim().toLowerCase());
  const idColumn = columns.indexOf("metadata_id");
  if (idColumn === -1) {
    throw new ConfigurationError("Configuration CSV must define a 'metadata_id' column");
  }
  const sourcesColumn = columns.indexOf("include_sources");
  const keywordsColumn = columns.indexOf("include_keywords");

  return rows.map(({ line, lineNumber }) => {
    const fields = splitCsvLine(line);
    const id = (fields[idColumn] ?? "").trim();
    if (!id) {
      throw new ConfigurationError(`Row ${lineNumber} missing mandatory 'metadata_id' value`);
    }
    return {
      id,
      includeSources: parseBool(sourcesColumn === -1 ? undefined : fields[sourcesColumn], true),
      includeKeywords: parseBool(keywordsColumn === -1 ? undefined : fields[keywordsColumn], true),
    };
  });
}

export function parseBool(value: string | undefined, fallback: boolean): boolean {
  const normalised = (value ?? "").trim().toLowerCase();
  if (TRUE_VALUES.has(normalised)) return true;
  if (FALSE_VALUES.has(normalised)) return false;
  return fallback;
}

// --- Helpers ---

async function readConfigFile(path: string): Promise<string> {
  try {
    return await readFile(path, "utf-8");
  } catch (err) {
    throw new ConfigurationError(`Failed to read configuration ${path}: ${(err as Error).message}`);
  }
}

function parseDocument<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, content: string, path: string): T {
  let raw: unknown;
  try {
    raw = parseYaml(content) as unknown;
  } catch (err) {
    throw new ConfigurationError(`${path}: parse error: ${(err as Error).message}`);
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`${path}: invalid configuration: ${details}`);
  }
  return result.data;
}

/** Split one CSV line on commas, honouring double-quoted fields. */
function splitCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = "";
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line.charAt(i);
    if (inQuotes) {
      if (char === '"' && line.charAt(i + 1) === '"') {
        current += '"';
        i++;
      } else if (char === '"') {
        inQuotes = false;
      } else {
        current += char;
      }
    } else if (char === '"') {
      inQuotes = true;
    } else if (char === ",") {
      fields.push(current);
      current = "";
    } else {
      current += char;
    }
  }
  fields.push(current);
  return fields;
}
