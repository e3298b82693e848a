/**
 * MetadataSource — read-only access to the catalogue tables.
 *
 * Every method is synchronous and parameterised. Lookups by primary key
 * return `undefined` when the row is absent; list lookups return `[]`.
 * Driver failures surface as DataSourceError; rows that do not match their
 * record schema surface as RecordShapeError.
 */

import type {
  AttributeRecord,
  CitationRecord,
  ContactRecord,
  GroupRecord,
  KeywordRecord,
  MainContactLinkRecord,
  MainRecord,
  SourceCitationLinkRecord,
  SourceLinkRecord,
  SourceRecord,
} from "../schemas/records.js";

export interface MetadataSource {
  fetchMain(metadataId: string): MainRecord | undefined;
  fetchGroup(groupId: string): GroupRecord | undefined;
  /** Contacts referenced by the group: `contactId` first, then `metadataContactId`. */
  fetchContactsByGroup(groupId: string): ContactRecord[];
  /** Contacts linked directly to the main record, in junction order. */
  fetchContactsByMain(metadataId: string): ContactRecord[];
  /** Junction rows behind fetchContactsByMain, including ones whose contact is missing. */
  fetchMainContactLinks(metadataId: string): MainContactLinkRecord[];
  fetchCitation(citationId: string): CitationRecord | undefined;
  fetchAttributes(metadataId: string): AttributeRecord[];
  fetchKeywords(metadataId: string): KeywordRecord[];
  fetchSourceLinks(metadataId: string): SourceLinkRecord[];
  fetchSource(sourceId: string): SourceRecord | undefined;
  /** At most one link; extra junction rows are reported and ignored. */
  fetchSourceCitationLink(sourceId: string): SourceCitationLinkRecord | undefined;
  /** Release the underlying connection. Safe to call more than once. */
  close(): void;
}
