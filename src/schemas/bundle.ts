/**
 * Bundle — the in-memory aggregate of one catalogue entry and all of its
 * dependent sub-records. Built fresh per export call and frozen.
 */

import type { DataIntegrityError } from "../errors.js";
import type {
  AttributeRecord,
  CitationRecord,
  ContactRecord,
  GroupRecord,
  KeywordRecord,
  MainRecord,
  SourceRecord,
} from "./records.js";

export interface SourceEntry {
  readonly source: SourceRecord;
  /** Absent when the source has no citation link, or the link dangles. */
  readonly citation?: CitationRecord;
}

export interface MetadataBundle {
  readonly main: MainRecord;
  readonly group?: GroupRecord;
  /** Group contacts first, then main-direct, deduplicated by contactId. */
  readonly contacts: readonly ContactRecord[];
  readonly citation?: CitationRecord;
  readonly attributes: readonly AttributeRecord[];
  readonly keywords: readonly KeywordRecord[];
  readonly sources: readonly SourceEntry[];
  /** Integrity problems tolerated while assembling (dangling references). */
  readonly issues: readonly DataIntegrityError[];
}

/** Inclusion flags for the optional many-valued sections. */
export interface BundleFlags {
  includeSources: boolean;
  includeKeywords: boolean;
}
