/**
 * Row schemas for the catalogue tables.
 *
 * Each table row is parsed into an explicit typed record at the data-source
 * boundary. Nullable columns stay `null`; nothing downstream reads rows by
 * column name.
 */

import { z } from "zod";

const text = z.string().nullable();
const numeric = z.number().nullable();

/** metadata_main — the root of every export. */
export const MainRecord = z.object({
  metadataId: z.string(),
  groupId: text,
  title: text,
  abstract: text,
  supplementalInformation: text,
  citationId: text,
  publicationDate: text,
  statusProgress: text,
  updateFrequency: text,
  securityClassification: text,
  westBoundingCoordinate: numeric,
  eastBoundingCoordinate: numeric,
  northBoundingCoordinate: numeric,
  southBoundingCoordinate: numeric,
  temporalDateFrom: text,
  temporalDateTo: text,
  /** Spatial representation type, e.g. "vector" or "grid". */
  metadataFacing: text,
});
export type MainRecord = z.infer<typeof MainRecord>;

/** Shared context (constraints, organisation) for a family of records. */
export const GroupRecord = z.object({
  groupId: z.string(),
  useConstraint: text,
  accessConstraint: text,
  purpose: text,
  contactId: text,
  metadataContactId: text,
  attributeAccuracyReport: text,
  thumbnail: text,
});
export type GroupRecord = z.infer<typeof GroupRecord>;

export const ContactRecord = z.object({
  contactId: z.string(),
  contactRole: text,
  individualName: text,
  organisationName: text,
  positionName: text,
  voicePhone: text,
  facsimilePhone: text,
  deliveryPoint: text,
  city: text,
  administrativeArea: text,
  postalCode: text,
  country: text,
  electronicMailAddress: text,
  hoursOfService: text,
  contactInstructions: text,
});
export type ContactRecord = z.infer<typeof ContactRecord>;

export const CitationRecord = z.object({
  citationId: z.string(),
  title: text,
  originator: text,
  publicationDate: text,
  edition: text,
  dataForm: text,
  series: text,
  issueIdentification: text,
  publicationPlace: text,
  publisher: text,
  onlineLinkage: text,
});
export type CitationRecord = z.infer<typeof CitationRecord>;

/** Field descriptor; `attributeNo` is the stored sequence. */
export const AttributeRecord = z.object({
  metadataId: z.string(),
  attributeNo: numeric,
  name: text,
  alias: text,
  definition: text,
  type: text,
  width: numeric,
  precision: numeric,
  scale: numeric,
  codesetName: text,
});
export type AttributeRecord = z.infer<typeof AttributeRecord>;

export const KeywordRecord = z.object({
  metadataId: z.string(),
  keywordNo: numeric,
  keywordType: text,
  keyword: z.string(),
});
export type KeywordRecord = z.infer<typeof KeywordRecord>;

/** Row of the main-to-source junction, ordered by `linkNo`. */
/** metadata_main_contacts junction row. */
export const MainContactLinkRecord = z.object({
  metadataId: z.string(),
  contactId: z.string(),
  contactNo: z.number(),
});
export type MainContactLinkRecord = z.infer<typeof MainContactLinkRecord>;

export const SourceLinkRecord = z.object({
  linkNo: z.number(),
  metadataId: z.string(),
  sourceId: z.string(),
});
export type SourceLinkRecord = z.infer<typeof SourceLinkRecord>;

export const SourceRecord = z.object({
  sourceId: z.string(),
  name: text,
  /** Free text scale, e.g. "1:250000". */
  scale: text,
  media: text,
  contribution: text,
});
export type SourceRecord = z.infer<typeof SourceRecord>;

/** Row of the source-to-citation junction. */
export const SourceCitationLinkRecord = z.object({
  sourceId: z.string(),
  citationId: z.string(),
});
export type SourceCitationLinkRecord = z.infer<typeof SourceCitationLinkRecord>;
