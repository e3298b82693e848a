import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { fetchBundle, mergeContacts } from "../bundle-assembler.js";
import { DataIntegrityError, DataSourceError, NotFoundError } from "../../errors.js";
import {
  InMemoryMetadataSource,
  horizonsFixture,
  makeAttribute,
  makeContact,
  makeGroup,
  makeKeyword,
  makeMain,
  makeSource,
  type CatalogueFixture,
} from "../../testing/catalogue.js";

const ALL = { includeSources: true, includeKeywords: true };

describe("fetchBundle", () => {
  let warnSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("assembles the full record graph for a grouped entry", () => {
    const bundle = fetchBundle(new InMemoryMetadataSource(horizonsFixture()), "HORIZONS", ALL);

    expect(bundle.main.metadataId).toBe("HORIZONS");
    expect(bundle.group?.groupId).toBe("G1");
    expect(bundle.contacts.map((c) => c.contactId)).toEqual(["K1"]);
    expect(bundle.citation?.citationId).toBe("C-MAIN");
    expect(bundle.keywords.map((k) => k.keyword)).toEqual(["soil", "pedology"]);
    expect(bundle.sources).toHaveLength(1);
    expect(bundle.sources[0]?.source.sourceId).toBe("S1");
    expect(bundle.sources[0]?.citation?.citationId).toBe("C-SRC");
    expect(bundle.issues).toEqual([]);
    expect(warnSpy).not.toHaveBeenCalled();
  });

  it("follows the join order main, group, contacts, citation, attributes, keywords, sources", () => {
    const source = new InMemoryMetadataSource(horizonsFixture());
    fetchBundle(source, "HORIZONS", ALL);
    expect(source.calls).toEqual([
      "fetchMain(HORIZONS)",
      "fetchGroup(G1)",
      "fetchContactsByGroup(G1)",
      "fetchContactsByMain(HORIZONS)",
      "fetchMainContactLinks(HORIZONS)",
      "fetchCitation(C-MAIN)",
      "fetchAttributes(HORIZONS)",
      "fetchKeywords(HORIZONS)",
      "fetchSourceLinks(HORIZONS)",
      "fetchSource(S1)",
      "fetchSourceCitationLink(S1)",
      "fetchCitation(C-SRC)",
    ]);
  });

  it("throws NotFoundError for an unknown identifier", () => {
    const source = new InMemoryMetadataSource(horizonsFixture());
    expect(() => fetchBundle(source, "NOPE", ALL)).toThrow(NotFoundError);
    expect(() => fetchBundle(source, "NOPE", ALL)).toThrow("Metadata ID 'NOPE' not found in metadata_main");
  });

  it("returns no group and only main-direct contacts for an ungrouped entry", () => {
    const fixture: CatalogueFixture = {
      mains: [makeMain("M1")],
      contacts: [makeContact("K5")],
      mainContacts: [{ metadataId: "M1", contactId: "K5" }],
    };
    const bundle = fetchBundle(new InMemoryMetadataSource(fixture), "M1", ALL);
    expect(bundle.group).toBeUndefined();
    expect(bundle.citation).toBeUndefined();
    expect(bundle.contacts.map((c) => c.contactId)).toEqual(["K5"]);
  });

  it("deduplicates contacts with group contacts first", () => {
    const fixture: CatalogueFixture = {
      mains: [makeMain("M1", { groupId: "G1" })],
      groups: [makeGroup("G1", { contactId: "K1", metadataContactId: "K2" })],
      contacts: [makeContact("K1"), makeContact("K2"), makeContact("K3")],
      mainContacts: [
        { metadataId: "M1", contactId: "K3" },
        { metadataId: "M1", contactId: "K1" },
      ],
    };
    const bundle = fetchBundle(new InMemoryMetadataSource(fixture), "M1", ALL);
    expect(bundle.contacts.map((c) => c.contactId)).toEqual(["K1", "K2", "K3"]);
  });

  it("warns about group and main-direct contacts that point at missing rows", () => {
    const fixture: CatalogueFixture = {
      mains: [makeMain("M1", { groupId: "G1" })],
      groups: [makeGroup("G1", { contactId: "K1", metadataContactId: "K-GONE" })],
      contacts: [makeContact("K1"), makeContact("K3")],
      mainContacts: [
        { metadataId: "M1", contactId: "K3" },
        { metadataId: "M1", contactId: "K-LOST" },
        { metadataId: "M1", contactId: "K-GONE" },
      ],
    };
    const bundle = fetchBundle(new InMemoryMetadataSource(fixture), "M1", ALL);

    expect(bundle.contacts.map((c) => c.contactId)).toEqual(["K1", "K3"]);
    expect(bundle.issues.map((issue) => [issue.relation, issue.danglingId])).toEqual([
      ["metadata_contacts", "K-GONE"],
      ["metadata_contacts", "K-LOST"],
    ]);
    expect(warnSpy).toHaveBeenCalledWith(
      "[metadata-export] Metadata ID 'M1': metadata_contacts references missing row 'K-LOST'; continuing without it",
    );
  });

  it("skips a dangling source link with a warning naming the missing id", () => {
    const fixture: CatalogueFixture = {
      mains: [makeMain("M1")],
      sourceLinks: [
        { linkNo: 2, metadataId: "M1", sourceId: "S2" },
        { linkNo: 1, metadataId: "M1", sourceId: "GONE" },
      ],
      sources: [makeSource("S2")],
    };
    const bundle = fetchBundle(new InMemoryMetadataSource(fixture), "M1", ALL);

    expect(bundle.sources.map((s) => s.source.sourceId)).toEqual(["S2"]);
    expect(bundle.issues).toHaveLength(1);
    expect(bundle.issues[0]?.danglingId).toBe("GONE");
    expect(warnSpy).toHaveBeenCalledWith(
      "[metadata-export] Metadata ID 'M1': metadata_main_source references missing row 'GONE'; continuing without it",
    );
  });

  it("fails on a dangling source link under the fail policy", () => {
    const fixture: CatalogueFixture = {
      mains: [makeMain("M1")],
      sourceLinks: [{ linkNo: 1, metadataId: "M1", sourceId: "GONE" }],
    };
    const source = new InMemoryMetadataSource(fixture);
    expect(() => fetchBundle(source, "M1", ALL, { danglingSources: "fail" })).toThrow(DataIntegrityError);
    expect(warnSpy).not.toHaveBeenCalled();
  });

  it("tolerates a dangling group or citation reference", () => {
    const fixture: CatalogueFixture = {
      mains: [makeMain("M1", { groupId: "G404", citationId: "C404" })],
    };
    const bundle = fetchBundle(new InMemoryMetadataSource(fixture), "M1", ALL);
    expect(bundle.group).toBeUndefined();
    expect(bundle.citation).toBeUndefined();
    expect(bundle.issues.map((issue) => issue.relation)).toEqual(["metadata_groups", "metadata_citations"]);
    expect(warnSpy).toHaveBeenCalledTimes(2);
  });

  it("keeps a source whose citation link dangles, without the citation", () => {
    const fixture: CatalogueFixture = {
      mains: [makeMain("M1")],
      sourceLinks: [{ linkNo: 1, metadataId: "M1", sourceId: "S1" }],
      sources: [makeSource("S1")],
      sourceCitations: [{ sourceId: "S1", citationId: "C404" }],
    };
    const bundle = fetchBundle(new InMemoryMetadataSource(fixture), "M1", ALL);
    expect(bundle.sources).toHaveLength(1);
    expect(bundle.sources[0]?.citation).toBeUndefined();
    expect(bundle.issues[0]?.relation).toBe("metadata_source_citation");
  });

  it("does not query keywords or sources when excluded", () => {
    const source = new InMemoryMetadataSource(horizonsFixture());
    const bundle = fetchBundle(source, "HORIZONS", { includeSources: false, includeKeywords: false });
    expect(bundle.keywords).toEqual([]);
    expect(bundle.sources).toEqual([]);
    expect(source.calls).not.toContain("fetchKeywords(HORIZONS)");
    expect(source.calls).not.toContain("fetchSourceLinks(HORIZONS)");
  });

  it("orders attributes and keywords by sequence, unsequenced rows last", () => {
    const fixture: CatalogueFixture = {
      mains: [makeMain("M1")],
      attributes: [
        makeAttribute("M1", null, "LOOSE"),
        makeAttribute("M1", 3, "C"),
        makeAttribute("M1", 1, "A"),
        makeAttribute("M1", 2, "B"),
      ],
      keywords: [
        makeKeyword("M1", null, "z"),
        makeKeyword("M1", 2, "b"),
        makeKeyword("M1", 1, "a"),
        makeKeyword("M1", 2, "b2"),
      ],
    };
    const bundle = fetchBundle(new InMemoryMetadataSource(fixture), "M1", ALL);
    expect(bundle.attributes.map((a) => a.name)).toEqual(["A", "B", "C", "LOOSE"]);
    expect(bundle.keywords.map((k) => k.keyword)).toEqual(["a", "b", "b2", "z"]);
  });

  it("propagates DataSourceError unchanged", () => {
    const source = new InMemoryMetadataSource(horizonsFixture(), "fetchAttributes");
    expect(() => fetchBundle(source, "HORIZONS", ALL)).toThrow(DataSourceError);
    expect(() => fetchBundle(source, "HORIZONS", ALL)).toThrow("Simulated failure in fetchAttributes");
  });

  it("returns a frozen bundle", () => {
    const bundle = fetchBundle(new InMemoryMetadataSource(horizonsFixture()), "HORIZONS", ALL);
    expect(Object.isFrozen(bundle)).toBe(true);
    expect(Object.isFrozen(bundle.sources)).toBe(true);
  });
});

describe("mergeContacts", () => {
  it("keeps the first occurrence of each contact id", () => {
    const merged = mergeContacts(
      [makeContact("A", { city: "group copy" })],
      [makeContact("A", { city: "main copy" }), makeContact("B")],
    );
    expect(merged.map((c) => [c.contactId, c.city])).toEqual([
      ["A", "group copy"],
      ["B", null],
    ]);
  });
});
