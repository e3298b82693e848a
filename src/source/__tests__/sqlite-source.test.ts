import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import Database from "better-sqlite3";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { applySchema, initMetadataDb } from "../schema.js";
import { SqliteMetadataSource } from "../sqlite-source.js";
import { DataSourceError, RecordShapeError } from "../../errors.js";

function seed(db: Database.Database): void {
  db.exec(`
    INSERT INTO metadata_main (metadata_id, group_id, title, abstract, citation_id, publication_date, west_bounding_coordinate)
      VALUES ('M1', 'G1', 'Rivers', 'River network', 'C1', '2019-04-01', -3.25);
    INSERT INTO metadata_groups (group_id, purpose, contact_id, metadata_contact_id)
      VALUES ('G1', 'Flood modelling', 'K2', 'K1');
    INSERT INTO metadata_contacts (contact_id, contact_role, organisation_name) VALUES
      ('K1', 'custodian', 'Records Office'),
      ('K2', 'owner', 'Water Agency'),
      ('K3', 'author', 'Field Team');
    INSERT INTO metadata_main_contacts (metadata_id, contact_id, contact_no) VALUES
      ('M1', 'K3', 2),
      ('M1', 'K1', 1);
    INSERT INTO metadata_citations (citation_id, citation_title, citation_pubdate, citation_edition)
      VALUES ('C1', 'River Network', '2019-04-01', '3');
    INSERT INTO metadata_attributes (metadata_id, attribute_name, attribute_no, attribute_definition, attribute_width) VALUES
      ('M1', 'LOOSE', NULL, 'no sequence', NULL),
      ('M1', 'LENGTH', 2, 'Reach length', 12),
      ('M1', 'NAME', 1, 'River name', 64);
    INSERT INTO metadata_keywords (metadata_id, keyword_no, keyword_type, keyword) VALUES
      ('M1', 2, 'theme', 'hydrology'),
      ('M1', 1, 'theme', 'rivers');
    INSERT INTO metadata_sources (source_id, source_name, source_scale) VALUES ('S1', 'Survey', '1:10000');
    INSERT INTO metadata_main_source (id, metadata_id, source_id) VALUES (7, 'M1', 'S1'), (3, 'M1', 'S404');
    INSERT INTO metadata_source_citation (source_id, citation_id) VALUES ('S1', 'C9'), ('S1', 'C1');
  `);
}

describe("SqliteMetadataSource", () => {
  let db: Database.Database;
  let source: SqliteMetadataSource;

  beforeEach(() => {
    db = new Database(":memory:");
    applySchema(db);
    seed(db);
    source = new SqliteMetadataSource(db);
  });

  afterEach(() => {
    source.close();
  });

  it("maps the main row onto camelCase fields", () => {
    const main = source.fetchMain("M1");
    expect(main).toMatchObject({
      metadataId: "M1",
      groupId: "G1",
      title: "Rivers",
      citationId: "C1",
      westBoundingCoordinate: -3.25,
      eastBoundingCoordinate: null,
      supplementalInformation: null,
    });
  });

  it("returns undefined for absent single rows", () => {
    expect(source.fetchMain("NOPE")).toBeUndefined();
    expect(source.fetchGroup("NOPE")).toBeUndefined();
    expect(source.fetchCitation("NOPE")).toBeUndefined();
    expect(source.fetchSource("S404")).toBeUndefined();
  });

  it("returns empty lists for entries without children", () => {
    expect(source.fetchAttributes("NOPE")).toEqual([]);
    expect(source.fetchKeywords("NOPE")).toEqual([]);
    expect(source.fetchContactsByGroup("NOPE")).toEqual([]);
  });

  it("returns the group contact before the group metadata contact", () => {
    expect(source.fetchContactsByGroup("G1").map((c) => c.contactId)).toEqual(["K2", "K1"]);
  });

  it("orders main-direct contacts by contact number", () => {
    expect(source.fetchContactsByMain("M1").map((c) => c.contactId)).toEqual(["K1", "K3"]);
  });

  it("returns main-direct junction rows even when the contact is missing", () => {
    db.exec("INSERT INTO metadata_main_contacts (metadata_id, contact_id, contact_no) VALUES ('M1', 'K404', 3)");
    expect(source.fetchContactsByMain("M1").map((c) => c.contactId)).toEqual(["K1", "K3"]);
    expect(source.fetchMainContactLinks("M1")).toEqual([
      { metadataId: "M1", contactId: "K1", contactNo: 1 },
      { metadataId: "M1", contactId: "K3", contactNo: 2 },
      { metadataId: "M1", contactId: "K404", contactNo: 3 },
    ]);
  });

  it("orders attributes by sequence with unsequenced rows last", () => {
    const attributes = source.fetchAttributes("M1");
    expect(attributes.map((a) => [a.name, a.attributeNo, a.width])).toEqual([
      ["NAME", 1, 64],
      ["LENGTH", 2, 12],
      ["LOOSE", null, null],
    ]);
  });

  it("orders keywords by sequence", () => {
    expect(source.fetchKeywords("M1").map((k) => k.keyword)).toEqual(["rivers", "hydrology"]);
  });

  it("returns source links with their link numbers", () => {
    expect(source.fetchSourceLinks("M1")).toEqual([
      { linkNo: 3, metadataId: "M1", sourceId: "S404" },
      { linkNo: 7, metadataId: "M1", sourceId: "S1" },
    ]);
  });

  it("warns when a source has more than one citation link", () => {
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    try {
      expect(source.fetchSourceCitationLink("S1")).toEqual({ sourceId: "S1", citationId: "C1" });
      expect(warnSpy).toHaveBeenCalledWith(
        "[metadata-export] Source 'S1' has 2 citation links; using 'C1' and ignoring 'C9'",
      );
    } finally {
      warnSpy.mockRestore();
    }
  });

  it("resolves a single citation link silently", () => {
    db.exec("DELETE FROM metadata_source_citation WHERE citation_id = 'C9'");
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    try {
      expect(source.fetchSourceCitationLink("S1")).toEqual({ sourceId: "S1", citationId: "C1" });
      expect(source.fetchSourceCitationLink("S404")).toBeUndefined();
      expect(warnSpy).not.toHaveBeenCalled();
    } finally {
      warnSpy.mockRestore();
    }
  });

  it("maps source columns", () => {
    expect(source.fetchSource("S1")).toEqual({
      sourceId: "S1",
      name: "Survey",
      scale: "1:10000",
      media: null,
      contribution: null,
    });
  });

  it("maps citation columns", () => {
    expect(source.fetchCitation("C1")).toMatchObject({
      citationId: "C1",
      title: "River Network",
      publicationDate: "2019-04-01",
      edition: "3",
      publisher: null,
    });
  });

  it("wraps query failures in DataSourceError", () => {
    db.exec("DROP TABLE metadata_keywords");
    expect(() => source.fetchKeywords("M1")).toThrow(DataSourceError);
    expect(() => source.fetchKeywords("M1")).toThrow(/^Query 'keywords' failed: /);
  });

  it("rejects rows of the wrong shape as a per-record error", () => {
    db.exec("INSERT INTO metadata_main (metadata_id, title, west_bounding_coordinate) VALUES ('BAD', 'Bad', 'west')");
    expect(() => source.fetchMain("BAD")).toThrow(RecordShapeError);
    expect(() => source.fetchMain("BAD")).toThrow(
      "Query 'main' returned an unexpected row for 'BAD' (westBoundingCoordinate: Expected number, received string)",
    );
  });

  it("raises DataSourceError after the connection is closed, and closes only once", () => {
    source.close();
    expect(() => source.fetchMain("M1")).toThrow(DataSourceError);
    expect(() => source.close()).not.toThrow();
  });
});

describe("SqliteMetadataSource.open", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "metadata-db-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("opens a database created by initMetadataDb", () => {
    const path = join(dir, "catalogue.db");
    const db = initMetadataDb(path);
    seed(db);
    db.close();

    const source = SqliteMetadataSource.open(path);
    try {
      expect(source.fetchMain("M1")?.title).toBe("Rivers");
    } finally {
      source.close();
    }
  });

  it("refuses a missing file", () => {
    expect(() => SqliteMetadataSource.open(join(dir, "missing.db"))).toThrow(DataSourceError);
  });
});
