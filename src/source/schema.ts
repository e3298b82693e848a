import Database from "better-sqlite3";

const TABLES = [
  `CREATE TABLE IF NOT EXISTS metadata_citations (
    citation_id TEXT PRIMARY KEY,
    citation_title TEXT,
    citation_originator TEXT,
    citation_pubdate TEXT,
    citation_edition TEXT,
    citation_data_form TEXT,
    citation_series TEXT,
    issue_identification TEXT,
    publication_place TEXT,
    publisher TEXT,
    online_linkage TEXT
  );`,
  `CREATE TABLE IF NOT EXISTS metadata_contacts (
    contact_id TEXT PRIMARY KEY,
    contact_role TEXT,
    individual_name TEXT,
    organisation_name TEXT,
    position_name TEXT,
    voice_phone TEXT,
    facsimile_phone TEXT,
    delivery_point TEXT,
    city TEXT,
    administrative_area TEXT,
    postal_code TEXT,
    country TEXT,
    electronic_mail_address TEXT,
    hours_of_service TEXT,
    contact_instructions TEXT
  );`,
  `CREATE TABLE IF NOT EXISTS metadata_groups (
    group_id TEXT PRIMARY KEY,
    use_constraint TEXT,
    access_constraint TEXT,
    purpose TEXT,
    contact_id TEXT,
    metadata_contact_id TEXT,
    attribute_accuracy_report TEXT,
    thumbnail TEXT
  );`,
  `CREATE TABLE IF NOT EXISTS metadata_main (
    metadata_id TEXT PRIMARY KEY,
    group_id TEXT,
    title TEXT,
    abstract TEXT,
    supplemental_information TEXT,
    citation_id TEXT,
    publication_date TEXT,
    status_progress TEXT,
    update_frequency TEXT,
    security_classification TEXT,
    west_bounding_coordinate REAL,
    east_bounding_coordinate REAL,
    north_bounding_coordinate REAL,
    south_bounding_coordinate REAL,
    temporal_date_from TEXT,
    temporal_date_to TEXT,
    metadata_facing TEXT
  );`,
  `CREATE TABLE IF NOT EXISTS metadata_main_contacts (
    metadata_id TEXT NOT NULL,
    contact_id TEXT NOT NULL,
    contact_no INTEGER NOT NULL,
    PRIMARY KEY (metadata_id, contact_id)
  );`,
  `CREATE TABLE IF NOT EXISTS metadata_attributes (
    metadata_id TEXT NOT NULL,
    attribute_name TEXT,
    attribute_alias TEXT,
    attribute_no INTEGER,
    attribute_definition TEXT,
    attribute_type TEXT,
    attribute_width INTEGER,
    attribute_precision INTEGER,
    attribute_scale INTEGER,
    codeset_name TEXT
  );`,
  `CREATE TABLE IF NOT EXISTS metadata_keywords (
    metadata_id TEXT NOT NULL,
    keyword_no INTEGER,
    keyword_type TEXT,
    keyword TEXT NOT NULL
  );`,
  `CREATE TABLE IF NOT EXISTS metadata_sources (
    source_id TEXT PRIMARY KEY,
    source_name TEXT,
    source_scale TEXT,
    source_media TEXT,
    source_contribution TEXT
  );`,
  `CREATE TABLE IF NOT EXISTS metadata_main_source (
    id INTEGER PRIMARY KEY,
    metadata_id TEXT NOT NULL,
    source_id TEXT NOT NULL
  );`,
  `CREATE TABLE IF NOT EXISTS metadata_source_citation (
    source_id TEXT NOT NULL,
    citation_id TEXT NOT NULL,
    PRIMARY KEY (source_id, citation_id)
  );`,
];

export const applySchema = (db: Database.Database): void => {
  for (const statement of TABLES) {
    db.exec(statement);
  }
};

/** Open (or create) a catalogue database and ensure every table exists. */
export function initMetadataDb(dbPath: string): Database.Database {
  const db = new Database(dbPath);
  applySchema(db);
  return db;
}
