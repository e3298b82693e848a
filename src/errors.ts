/**
 * Error taxonomy for the export pipeline.
 *
 * Every per-record failure is one of these classes so the orchestrator can
 * log it against the offending identifier and move on to the next target.
 */

export class MetadataExportError extends Error {
  /** Identifier of the catalogue entry being exported, when known. */
  readonly metadataId: string | undefined;

  constructor(message: string, metadataId?: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.metadataId = metadataId;
  }
}

/** Main record absent; fatal for that record only. */
export class NotFoundError extends MetadataExportError {
  constructor(metadataId: string) {
    super(`Metadata ID '${metadataId}' not found in metadata_main`, metadataId);
  }
}

/** Dangling foreign key. Usually surfaced as a warning on a degraded bundle. */
export class DataIntegrityError extends MetadataExportError {
  /** The identifier the broken reference points at. */
  readonly danglingId: string;
  /** Relation the reference was followed through, e.g. "metadata_main_source". */
  readonly relation: string;

  constructor(metadataId: string, relation: string, danglingId: string) {
    super(
      `Metadata ID '${metadataId}': ${relation} references missing row '${danglingId}'`,
      metadataId,
    );
    this.relation = relation;
    this.danglingId = danglingId;
  }
}

/** Mandatory scalar missing on the main record. */
export class SchemaMappingError extends MetadataExportError {
  readonly field: string;

  constructor(metadataId: string, field: string) {
    super(`Metadata ID '${metadataId}': mandatory field '${field}' is null or blank`, metadataId);
    this.field = field;
  }
}

/** A stored row does not match its record schema. Fatal for that record only. */
export class RecordShapeError extends MetadataExportError {
  /** Name of the query that returned the row, e.g. "main". */
  readonly query: string;

  constructor(query: string, key: string, detail: string) {
    super(`Query '${query}' returned an unexpected row for '${key}' (${detail})`);
    this.query = query;
  }
}

/** Connectivity or query failure in the data source. Fatal for the run. */
export class DataSourceError extends MetadataExportError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, undefined, options);
  }
}

/** Malformed or empty configuration file. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}
