/**
 * Bundle Assembler — fetch and compose one catalogue entry's record graph.
 *
 * Join order is fixed: main → group → contacts → citation → attributes →
 * keywords → sources. Nothing here writes to the store. DataSourceError
 * from the source propagates unchanged; there are no retries at this layer.
 */

import { DataIntegrityError, NotFoundError } from "../errors.js";
import type { BundleFlags, MetadataBundle, SourceEntry } from "../schemas/bundle.js";
import type { ContactRecord } from "../schemas/records.js";
import type { MetadataSource } from "../source/interfaces.js";

/** What to do with a source link whose source row is missing. */
export type DanglingSourcePolicy = "skip" | "fail";

export interface AssembleOptions {
  /** Default "skip": omit the source, log a warning, keep the rest. */
  danglingSources?: DanglingSourcePolicy;
}

/**
 * Assemble the bundle for `metadataId`.
 *
 * @throws NotFoundError when no main row matches
 * @throws DataIntegrityError for a dangling source link under the "fail" policy
 */
export function fetchBundle(
  source: MetadataSource,
  metadataId: string,
  flags: BundleFlags,
  options: AssembleOptions = {},
): MetadataBundle {
  const { danglingSources = "skip" } = options;
  const issues: DataIntegrityError[] = [];

  const warn = (issue: DataIntegrityError): void => {
    console.warn(`[metadata-export] ${issue.message}; continuing without it`);
    issues.push(issue);
  };

  const main = source.fetchMain(metadataId);
  if (!main) {
    throw new NotFoundError(metadataId);
  }

  const group = main.groupId ? source.fetchGroup(main.groupId) : undefined;
  if (main.groupId && !group) {
    warn(new DataIntegrityError(metadataId, "metadata_groups", main.groupId));
  }

  const groupContacts = group ? source.fetchContactsByGroup(group.groupId) : [];
  const mainContacts = source.fetchContactsByMain(metadataId);
  const referenced = [
    ...(group ? [group.contactId, group.metadataContactId] : []),
    ...source.fetchMainContactLinks(metadataId).map((link) => link.contactId),
  ];
  const contacts = mergeContacts(groupContacts, mainContacts);
  const found = new Set(contacts.map((contact) => contact.contactId));
  for (const contactId of new Set(referenced)) {
    if (contactId && !found.has(contactId)) {
      warn(new DataIntegrityError(metadataId, "metadata_contacts", contactId));
    }
  }

  const citation = main.citationId ? source.fetchCitation(main.citationId) : undefined;
  if (main.citationId && !citation) {
    warn(new DataIntegrityError(metadataId, "metadata_citations", main.citationId));
  }

  const attributes = bySequence(source.fetchAttributes(metadataId), (a) => a.attributeNo);
  const keywords = flags.includeKeywords
    ? bySequence(source.fetchKeywords(metadataId), (k) => k.keywordNo)
    : [];

  const sources: SourceEntry[] = [];
  if (flags.includeSources) {
    const links = [...source.fetchSourceLinks(metadataId)].sort((a, b) => a.linkNo - b.linkNo);
    for (const link of links) {
      const row = source.fetchSource(link.sourceId);
      if (!row) {
        const issue = new DataIntegrityError(metadataId, "metadata_main_source", link.sourceId);
        if (danglingSources === "fail") throw issue;
        warn(issue);
        continue;
      }

      const citationLink = source.fetchSourceCitationLink(row.sourceId);
      const sourceCitation = citationLink ? source.fetchCitation(citationLink.citationId) : undefined;
      if (citationLink && !sourceCitation) {
        warn(new DataIntegrityError(metadataId, "metadata_source_citation", citationLink.citationId));
      }
      sources.push(Object.freeze(sourceCitation ? { source: row, citation: sourceCitation } : { source: row }));
    }
  }

  return Object.freeze({
    main,
    ...(group ? { group } : {}),
    contacts: Object.freeze(contacts),
    ...(citation ? { citation } : {}),
    attributes: Object.freeze(attributes),
    keywords: Object.freeze(keywords),
    sources: Object.freeze(sources),
    issues: Object.freeze(issues),
  });
}

/** Group contacts first, then main-direct; first occurrence of an id wins. */
export function mergeContacts(
  groupContacts: readonly ContactRecord[],
  mainContacts: readonly ContactRecord[],
): ContactRecord[] {
  const seen = new Set<string>();
  const merged: ContactRecord[] = [];
  for (const contact of [...groupContacts, ...mainContacts]) {
    if (seen.has(contact.contactId)) continue;
    seen.add(contact.contactId);
    merged.push(contact);
  }
  return merged;
}

// Stable ascending sort on the stored sequence column; unsequenced rows last.
function bySequence<T>(rows: readonly T[], sequence: (row: T) => number | null): T[] {
  return rows
    .map((row, index) => ({ row, index, seq: sequence(row) }))
    .sort((a, b) => {
      if (a.seq === b.seq) return a.index - b.index;
      if (a.seq === null) return 1;
      if (b.seq === null) return -1;
      return a.seq - b.seq;
    })
    .map(({ row }) => row);
}
