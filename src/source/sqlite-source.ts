/**
 * SQLite-backed MetadataSource.
 *
 * One connection per run, opened read-only. Every query is a cached prepared
 * statement with positional `?` bindings; rows come back with camelCase
 * aliases and are parsed by the record schemas before leaving this module.
 */

import Database from "better-sqlite3";
import { z } from "zod";
import { DataSourceError, RecordShapeError } from "../errors.js";
import {
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
import type { MetadataSource } from "./interfaces.js";

const CONTACT_COLUMNS = `
  c.contact_id AS contactId,
  c.contact_role AS contactRole,
  c.individual_name AS individualName,
  c.organisation_name AS organisationName,
  c.position_name AS positionName,
  c.voice_phone AS voicePhone,
  c.facsimile_phone AS facsimilePhone,
  c.delivery_point AS deliveryPoint,
  c.city AS city,
  c.administrative_area AS administrativeArea,
  c.postal_code AS postalCode,
  c.country AS country,
  c.electronic_mail_address AS electronicMailAddress,
  c.hours_of_service AS hoursOfService,
  c.contact_instructions AS contactInstructions`;

const SQL = {
  main: `
    SELECT
      metadata_id AS metadataId,
      group_id AS groupId,
      title,
      abstract,
      supplemental_information AS supplementalInformation,
      citation_id AS citationId,
      publication_date AS publicationDate,
      status_progress AS statusProgress,
      update_frequency AS updateFrequency,
      security_classification AS securityClassification,
      west_bounding_coordinate AS westBoundingCoordinate,
      east_bounding_coordinate AS eastBoundingCoordinate,
      north_bounding_coordinate AS northBoundingCoordinate,
      south_bounding_coordinate AS southBoundingCoordinate,
      temporal_date_from AS temporalDateFrom,
      temporal_date_to AS temporalDateTo,
      metadata_facing AS metadataFacing
    FROM metadata_main
    WHERE metadata_id = ?`,
  group: `
    SELECT
      group_id AS groupId,
      use_constraint AS useConstraint,
      access_constraint AS accessConstraint,
      purpose,
      contact_id AS contactId,
      metadata_contact_id AS metadataContactId,
      attribute_accuracy_report AS attributeAccuracyReport,
      thumbnail
    FROM metadata_groups
    WHERE group_id = ?`,
  contactsByGroup: `
    SELECT ${CONTACT_COLUMNS}
    FROM metadata_groups g
    JOIN metadata_contacts c
      ON c.contact_id IN (g.contact_id, g.metadata_contact_id)
    WHERE g.group_id = ?
    ORDER BY CASE WHEN c.contact_id = g.contact_id THEN 0 ELSE 1 END`,
  contactsByMain: `
    SELECT ${CONTACT_COLUMNS}
    FROM metadata_main_contacts mc
    JOIN metadata_contacts c ON c.contact_id = mc.contact_id
    WHERE mc.metadata_id = ?
    ORDER BY mc.contact_no`,
  citation: `
    SELECT
      citation_id AS citationId,
      citation_title AS title,
      citation_originator AS originator,
      citation_pubdate AS publicationDate,
      citation_edition AS edition,
      citation_data_form AS dataForm,
      citation_series AS series,
      issue_identification AS issueIdentification,
      publication_place AS publicationPlace,
      publisher,
      online_linkage AS onlineLinkage
    FROM metadata_citations
    WHERE citation_id = ?`,
  attributes: `
    SELECT
      metadata_id AS metadataId,
      attribute_no AS attributeNo,
      attribute_name AS name,
      attribute_alias AS alias,
      attribute_definition AS definition,
      attribute_type AS type,
      attribute_width AS width,
      attribute_precision AS precision,
      attribute_scale AS scale,
      codeset_name AS codesetName
    FROM metadata_attributes
    WHERE metadata_id = ?
    ORDER BY attribute_no IS NULL, attribute_no, rowid`,
  keywords: `
    SELECT
      metadata_id AS metadataId,
      keyword_no AS keywordNo,
      keyword_type AS keywordType,
      keyword
    FROM metadata_keywords
    WHERE metadata_id = ?
    ORDER BY keyword_no IS NULL, keyword_no, rowid`,
  sourceLinks: `
    SELECT
      id AS linkNo,
      metadata_id AS metadataId,
      source_id AS sourceId
    FROM metadata_main_source
    WHERE metadata_id = ?
    ORDER BY id`,
  source: `
    SELECT
      source_id AS sourceId,
      source_name AS name,
      source_scale AS scale,
      source_media AS media,
      source_contribution AS contribution
    FROM metadata_sources
    WHERE source_id = ?`,
  mainContactLinks: `
    SELECT
      metadata_id AS metadataId,
      contact_id AS contactId,
      contact_no AS contactNo
    FROM metadata_main_contacts
    WHERE metadata_id = ?
    ORDER BY contact_no`,
  sourceCitationLinks: `
    SELECT
      source_id AS sourceId,
      citation_id AS citationId
    FROM metadata_source_citation
    WHERE source_id = ?
    ORDER BY citation_id`,
} as const;

type QueryName = keyof typeof SQL;

export class SqliteMetadataSource implements MetadataSource {
  private readonly statements = new Map<QueryName, Database.Statement>();
  private closed = false;

  constructor(private readonly db: Database.Database) {}

  /** Open an existing catalogue database read-only. */
  static open(dbPath: string): SqliteMetadataSource {
    try {
      return new SqliteMetadataSource(new Database(dbPath, { readonly: true, fileMustExist: true }));
    } catch (err) {
      throw new DataSourceError(`Cannot open database ${dbPath}: ${(err as Error).message}`, {
        cause: err,
      });
    }
  }

  fetchMain(metadataId: string): MainRecord | undefined {
    return this.one("main", MainRecord, metadataId);
  }

  fetchGroup(groupId: string): GroupRecord | undefined {
    return this.one("group", GroupRecord, groupId);
  }

  fetchContactsByGroup(groupId: string): ContactRecord[] {
    return this.all("contactsByGroup", ContactRecord, groupId);
  }

  fetchContactsByMain(metadataId: string): ContactRecord[] {
    return this.all("contactsByMain", ContactRecord, metadataId);
  }

  fetchMainContactLinks(metadataId: string): MainContactLinkRecord[] {
    return this.all("mainContactLinks", MainContactLinkRecord, metadataId);
  }

  fetchCitation(citationId: string): CitationRecord | undefined {
    return this.one("citation", CitationRecord, citationId);
  }

  fetchAttributes(metadataId: string): AttributeRecord[] {
    return this.all("attributes", AttributeRecord, metadataId);
  }

  fetchKeywords(metadataId: string): KeywordRecord[] {
    return this.all("keywords", KeywordRecord, metadataId);
  }

  fetchSourceLinks(metadataId: string): SourceLinkRecord[] {
    return this.all("sourceLinks", SourceLinkRecord, metadataId);
  }

  fetchSource(sourceId: string): SourceRecord | undefined {
    return this.one("source", SourceRecord, sourceId);
  }

  /** Lowest citation id wins when a source has several links. */
  fetchSourceCitationLink(sourceId: string): SourceCitationLinkRecord | undefined {
    const [first, ...extra] = this.all("sourceCitationLinks", SourceCitationLinkRecord, sourceId);
    if (first && extra.length > 0) {
      console.warn(
        `[metadata-export] Source '${sourceId}' has ${extra.length + 1} citation links; ` +
          `using '${first.citationId}' and ignoring ${extra.map((link) => `'${link.citationId}'`).join(", ")}`,
      );
    }
    return first;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.statements.clear();
    this.db.close();
  }

  // --- Helpers ---

  private one<T>(name: QueryName, schema: z.ZodType<T, z.ZodTypeDef, unknown>, param: string): T | undefined {
    const row = this.run(name, (statement) => statement.get(param));
    return row === undefined ? undefined : this.parse(name, schema, row, param);
  }

  private all<T>(name: QueryName, schema: z.ZodType<T, z.ZodTypeDef, unknown>, param: string): T[] {
    const rows = this.run(name, (statement) => statement.all(param));
    return rows.map((row) => this.parse(name, schema, row, param));
  }

  private run<R>(name: QueryName, execute: (statement: Database.Statement) => R): R {
    try {
      return execute(this.prepare(name));
    } catch (err) {
      throw new DataSourceError(`Query '${name}' failed: ${(err as Error).message}`, { cause: err });
    }
  }

  private prepare(name: QueryName): Database.Statement {
    let statement = this.statements.get(name);
    if (!statement) {
      statement = this.db.prepare(SQL[name]);
      this.statements.set(name, statement);
    }
    return statement;
  }

  // Bad cell values are a per-record problem, not a connection failure.
  private parse<T>(name: QueryName, schema: z.ZodType<T, z.ZodTypeDef, unknown>, row: unknown, key: string): T {
    const result = schema.safeParse(row);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue ? `${issue.path.join(".")}: ${issue.message}` : "unknown shape";
      throw new RecordShapeError(name, key, where);
    }
    return result.data;
  }
}
