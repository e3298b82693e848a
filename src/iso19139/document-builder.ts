/**
 * Document Builder — map a MetadataBundle onto an ISO 19139 gmd:MD_Metadata tree.
 *
 * Children are always emitted in the order the gmd schema fixes, whichever
 * optional sections are present. Absent sub-bundles drop their whole
 * subtree; mandatory scalars without a value become empty elements carrying
 * gco:nilReason="missing". The output is a pure function of bundle and
 * options (no clock reads), so identical input always yields the same tree.
 */

import { SchemaMappingError } from "../errors.js";
import type { MetadataBundle, SourceEntry } from "../schemas/bundle.js";
import type {
  AttributeRecord,
  CitationRecord,
  ContactRecord,
  GroupRecord,
  KeywordRecord,
  MainRecord,
  SourceRecord,
} from "../schemas/records.js";
import { codeListUrl, rootAttributes } from "./namespaces.js";
import { cleanText, escapeAttribute, escapeText, formatDecimal, parseIsoDate } from "./text.js";
import { element, textNode, type XmlDocument, type XmlElement } from "./tree.js";

export interface BuildOptions {
  /** ISO 639-2 language of the metadata and the resource (default "eng"). */
  languageCode?: string;
  /** MD_CharacterSetCode value (default "utf8"). */
  characterSet?: string;
  /** MD_ScopeCode for hierarchyLevel and the quality scope (default "dataset"). */
  hierarchyLevel?: string;
  /** Reference system code (default "British National Grid"). */
  referenceSystem?: string;
  /** Overrides main.publicationDate as the metadata date stamp. */
  dateStamp?: string;
}

const DEFAULTS = {
  languageCode: "eng",
  characterSet: "utf8",
  hierarchyLevel: "dataset",
  referenceSystem: "British National Grid",
} as const;

export const METADATA_STANDARD_NAME = "ISO 19115:2003/19139";
export const METADATA_STANDARD_VERSION = "1.0";

type Child = XmlElement | undefined;
type Scalar = string | number | null | undefined;

/**
 * Build the document tree for one bundle.
 *
 * @throws SchemaMappingError when the identifier or title is null or blank
 */
export function buildDocument(bundle: MetadataBundle, options: BuildOptions = {}): XmlDocument {
  const opts = {
    languageCode: options.languageCode ?? DEFAULTS.languageCode,
    characterSet: options.characterSet ?? DEFAULTS.characterSet,
    hierarchyLevel: options.hierarchyLevel ?? DEFAULTS.hierarchyLevel,
    referenceSystem: options.referenceSystem ?? DEFAULTS.referenceSystem,
    dateStamp: options.dateStamp,
  };
  const { main, group } = bundle;

  const fileIdentifier = cleanText(main.metadataId);
  if (fileIdentifier === undefined) throw new SchemaMappingError(main.metadataId, "metadataId");
  const title = cleanText(main.title);
  if (title === undefined) throw new SchemaMappingError(main.metadataId, "title");

  const root = element(
    "gmd:MD_Metadata",
    rootAttributes(),
    compact([
      gmd("fileIdentifier", characterString(fileIdentifier)),
      gmd("language", codeListElement("LanguageCode", opts.languageCode)),
      gmd("characterSet", codeListElement("MD_CharacterSetCode", opts.characterSet)),
      group ? optionalString("parentIdentifier", group.groupId) : undefined,
      gmd("hierarchyLevel", codeListElement("MD_ScopeCode", opts.hierarchyLevel)),
      ...contactSection(bundle.contacts),
      mandatoryDate("dateStamp", opts.dateStamp ?? main.publicationDate),
      optionalString("metadataStandardName", METADATA_STANDARD_NAME),
      optionalString("metadataStandardVersion", METADATA_STANDARD_VERSION),
      referenceSystemInfo(opts.referenceSystem),
      extensionInfo(bundle.attributes),
      identificationInfo(bundle, title, opts.languageCode),
      distributionInfo(bundle.citation),
      dataQualityInfo(bundle, opts.hierarchyLevel),
    ]),
  );

  return { root };
}

// --- Sections ---

function contactSection(contacts: readonly ContactRecord[]): XmlElement[] {
  if (contacts.length === 0) return [nilled("contact")];
  return contacts.map((contact) => gmd("contact", responsibleParty(contact)));
}

function responsibleParty(contact: ContactRecord): XmlElement {
  return gmd(
    "CI_ResponsibleParty",
    optionalString("individualName", contact.individualName),
    optionalString("organisationName", contact.organisationName),
    optionalString("positionName", contact.positionName),
    wrapped("contactInfo", "CI_Contact", [
      wrapped("phone", "CI_Telephone", [
        optionalString("voice", contact.voicePhone),
        optionalString("facsimile", contact.facsimilePhone),
      ]),
      wrapped("address", "CI_Address", [
        optionalString("deliveryPoint", contact.deliveryPoint),
        optionalString("city", contact.city),
        optionalString("administrativeArea", contact.administrativeArea),
        optionalString("postalCode", contact.postalCode),
        optionalString("country", contact.country),
        optionalString("electronicMailAddress", contact.electronicMailAddress),
      ]),
      optionalString("hoursOfService", contact.hoursOfService),
      optionalString("contactInstructions", contact.contactInstructions),
    ]),
    mandatoryCode("role", "CI_RoleCode", contact.contactRole),
  );
}

function referenceSystemInfo(code: string): Child {
  const identifier = optionalString("code", code);
  if (!identifier) return undefined;
  return gmd(
    "referenceSystemInfo",
    gmd("MD_ReferenceSystem", gmd("referenceSystemIdentifier", gmd("RS_Identifier", identifier))),
  );
}

function extensionInfo(attributes: readonly AttributeRecord[]): Child {
  if (attributes.length === 0) return undefined;
  return gmd(
    "metadataExtensionInfo",
    gmd(
      "MD_MetadataExtensionInformation",
      ...attributes.map((attribute) =>
        gmd(
          "extendedElementInformation",
          gmd(
            "MD_ExtendedElementInformation",
            mandatoryString("name", attribute.name),
            optionalString("shortName", attribute.alias),
            mandatoryString("definition", attribute.definition),
            optionalString("condition", attribute.codesetName),
            optionalCode("dataType", "MD_DatatypeCode", attribute.type),
            optionalString("domainValue", sizeDetails(attribute)),
          ),
        ),
      ),
    ),
  );
}

function sizeDetails(attribute: AttributeRecord): string | undefined {
  const parts: string[] = [];
  if (attribute.width !== null) parts.push(`width=${attribute.width}`);
  if (attribute.precision !== null) parts.push(`precision=${attribute.precision}`);
  if (attribute.scale !== null) parts.push(`scale=${attribute.scale}`);
  return parts.length > 0 ? parts.join("; ") : undefined;
}

function identificationInfo(bundle: MetadataBundle, title: string, languageCode: string): XmlElement {
  const { main, group, citation } = bundle;
  return gmd(
    "identificationInfo",
    gmd(
      "MD_DataIdentification",
      gmd("citation", resourceCitation(title, main, citation)),
      mandatoryString("abstract", main.abstract),
      group ? optionalString("purpose", group.purpose) : undefined,
      optionalCode("status", "MD_ProgressCode", main.statusProgress),
      resourceMaintenance(main.updateFrequency),
      group ? wrapped("graphicOverview", "MD_BrowseGraphic", [optionalString("fileName", group.thumbnail)]) : undefined,
      ...descriptiveKeywords(bundle.keywords),
      ...resourceConstraints(group, main.securityClassification),
      optionalCode("spatialRepresentationType", "MD_SpatialRepresentationTypeCode", main.metadataFacing),
      gmd("language", codeListElement("LanguageCode", languageCode)),
      extent(main),
      optionalString("supplementalInformation", main.supplementalInformation),
    ),
  );
}

/** Citation of the dataset itself: title from main, the rest from its Citation. */
function resourceCitation(title: string, main: MainRecord, citation: CitationRecord | undefined): XmlElement {
  return gmd(
    "CI_Citation",
    gmd("title", characterString(title)),
    citation ? optionalString("alternateTitle", citation.title) : undefined,
    citationDate(cleanText(citation?.publicationDate) ?? main.publicationDate),
    ...(citation ? citationDetails(citation) : []),
  );
}

/** Citation attached to a lineage source. */
function sourceCitation(citation: CitationRecord): XmlElement {
  return gmd(
    "CI_Citation",
    mandatoryString("title", citation.title),
    citationDate(citation.publicationDate),
    ...citationDetails(citation),
  );
}

// CI_Citation children after title/alternateTitle/date, in schema order.
function citationDetails(citation: CitationRecord): Child[] {
  const other = [cleanText(citation.publicationPlace), cleanText(citation.onlineLinkage)]
    .filter((part): part is string => part !== undefined)
    .join("; ");
  return [
    optionalString("edition", citation.edition),
    citedParty(citation.originator, "originator"),
    citedParty(citation.publisher, "publisher"),
    wrapped("series", "CI_Series", [
      optionalString("name", citation.series),
      optionalString("issueIdentification", citation.issueIdentification),
    ]),
    optionalString("otherCitationDetails", other),
  ];
}

function citedParty(organisation: Scalar, role: string): Child {
  const name = optionalString("organisationName", organisation);
  if (!name) return undefined;
  return gmd(
    "citedResponsibleParty",
    gmd("CI_ResponsibleParty", name, gmd("role", codeListElement("CI_RoleCode", role))),
  );
}

function citationDate(raw: Scalar): XmlElement {
  const value = dateValue(raw);
  if (!value) return nilled("date");
  return gmd(
    "date",
    gmd(
      "CI_Date",
      gmd("date", value),
      gmd("dateType", codeListElement("CI_DateTypeCode", "publication")),
    ),
  );
}

function resourceMaintenance(frequency: Scalar): Child {
  const code = optionalCode("maintenanceAndUpdateFrequency", "MD_MaintenanceFrequencyCode", frequency);
  return code ? gmd("resourceMaintenance", gmd("MD_MaintenanceInformation", code)) : undefined;
}

/** One MD_Keywords block per keyword type, types in first-seen order. */
function descriptiveKeywords(keywords: readonly KeywordRecord[]): Child[] {
  const byType = new Map<string, KeywordRecord[]>();
  for (const keyword of keywords) {
    const type = cleanText(keyword.keywordType) ?? "";
    const bucket = byType.get(type);
    if (bucket) bucket.push(keyword);
    else byType.set(type, [keyword]);
  }

  return [...byType].map(([type, bucket]) => {
    const entries = compact(bucket.map((keyword) => optionalString("keyword", keyword.keyword)));
    if (entries.length === 0) return undefined;
    return gmd(
      "descriptiveKeywords",
      gmd("MD_Keywords", ...entries, optionalCode("type", "MD_KeywordTypeCode", type)),
    );
  });
}

function resourceConstraints(group: GroupRecord | undefined, classification: Scalar): Child[] {
  const access = optionalCode("accessConstraints", "MD_RestrictionCode", group?.accessConstraint);
  const security = optionalCode("classification", "MD_ClassificationCode", classification);
  return [
    group ? wrapped("resourceConstraints", "MD_Constraints", [optionalString("useLimitation", group.useConstraint)]) : undefined,
    access ? gmd("resourceConstraints", gmd("MD_LegalConstraints", access)) : undefined,
    security ? gmd("resourceConstraints", gmd("MD_SecurityConstraints", security)) : undefined,
  ];
}

function extent(main: MainRecord): Child {
  const bounds = compact([
    decimal("westBoundLongitude", main.westBoundingCoordinate),
    decimal("eastBoundLongitude", main.eastBoundingCoordinate),
    decimal("southBoundLatitude", main.southBoundingCoordinate),
    decimal("northBoundLatitude", main.northBoundingCoordinate),
  ]);
  const parts = compact([
    bounds.length > 0 ? gmd("geographicElement", gmd("EX_GeographicBoundingBox", ...bounds)) : undefined,
    temporalElement(main.temporalDateFrom, main.temporalDateTo),
  ]);
  return parts.length > 0 ? gmd("extent", gmd("EX_Extent", ...parts)) : undefined;
}

function temporalElement(from: Scalar, to: Scalar): Child {
  if (cleanText(from) === undefined && cleanText(to) === undefined) return undefined;
  return gmd(
    "temporalElement",
    gmd(
      "EX_TemporalExtent",
      gmd(
        "extent",
        element("gml:TimePeriod", { "gml:id": "temporal-extent" }, [
          timePosition("gml:beginPosition", from),
          timePosition("gml:endPosition", to),
        ]),
      ),
    ),
  );
}

function timePosition(name: string, raw: Scalar): XmlElement {
  const parsed = parseIsoDate(typeof raw === "number" ? String(raw) : raw);
  if (parsed.status !== "ok") return element(name, { indeterminatePosition: "unknown" });
  return element(name, {}, [textNode(parsed.value)]);
}

function distributionInfo(citation: CitationRecord | undefined): XmlElement {
  const linkage = cleanText(citation?.onlineLinkage);
  return gmd(
    "distributionInfo",
    gmd(
      "MD_Distribution",
      gmd(
        "distributionFormat",
        gmd(
          "MD_Format",
          gmd("name", characterString(cleanText(citation?.dataForm) ?? "Unknown")),
          mandatoryString("version", citation?.edition),
        ),
      ),
      linkage
        ? gmd(
            "transferOptions",
            gmd(
              "MD_DigitalTransferOptions",
              gmd("onLine", gmd("CI_OnlineResource", gmd("linkage", textElement("gmd:URL", linkage)))),
            ),
          )
        : undefined,
    ),
  );
}

function dataQualityInfo(bundle: MetadataBundle, hierarchyLevel: string): XmlElement {
  const accuracy = cleanText(bundle.group?.attributeAccuracyReport);
  return gmd(
    "dataQualityInfo",
    gmd(
      "DQ_DataQuality",
      gmd("scope", gmd("DQ_Scope", gmd("level", codeListElement("MD_ScopeCode", hierarchyLevel)))),
      accuracy
        ? gmd(
            "report",
            gmd(
              "DQ_DomainConsistency",
              gmd(
                "result",
                gmd(
                  "DQ_ConformanceResult",
                  gmd("explanation", characterString(accuracy)),
                  gmd("pass", textElement("gco:Boolean", "true")),
                ),
              ),
            ),
          )
        : undefined,
      lineage(bundle.sources),
    ),
  );
}

function lineage(sources: readonly SourceEntry[]): Child {
  if (sources.length === 0) return undefined;
  return gmd(
    "lineage",
    gmd(
      "LI_Lineage",
      ...sources.map(({ source, citation }) =>
        gmd(
          "source",
          gmd(
            "LI_Source",
            mandatoryString("description", describeSource(source)),
            scaleDenominator(source.scale),
            citation ? gmd("sourceCitation", sourceCitation(citation)) : undefined,
          ),
        ),
      ),
    ),
  );
}

function describeSource(source: SourceRecord): string | undefined {
  const parts = [cleanText(source.name), cleanText(source.contribution)].filter(
    (part): part is string => part !== undefined,
  );
  return parts.length > 0 ? parts.join(": ") : undefined;
}

/** Accepts "250000", "250,000" or "1:250000"; anything else is omitted. */
function scaleDenominator(scale: Scalar): Child {
  const match = /^(?:1\s*:\s*)?(\d[\d,]*)$/.exec(cleanText(scale) ?? "");
  const denominator = match?.[1] ? Number(match[1].replace(/,/g, "")) : Number.NaN;
  if (!Number.isSafeInteger(denominator) || denominator <= 0) return undefined;
  return gmd(
    "scaleDenominator",
    gmd("MD_RepresentativeFraction", gmd("denominator", textElement("gco:Integer", String(denominator)))),
  );
}

// --- Element helpers ---

function compact(children: readonly Child[]): XmlElement[] {
  return children.filter((child): child is XmlElement => child !== undefined);
}

function gmd(tag: string, ...children: Child[]): XmlElement {
  return element(`gmd:${tag}`, {}, compact(children));
}

/** Element holding a single escaped text node; `value` must already be clean. */
function textElement(name: string, value: string): XmlElement {
  return element(name, {}, [textNode(escapeText(value))]);
}

function characterString(value: string): XmlElement {
  return textElement("gco:CharacterString", value);
}

function nilled(tag: string): XmlElement {
  return element(`gmd:${tag}`, { "gco:nilReason": "missing" });
}

/** `<gmd:tag><gmd:inner>…</gmd:inner></gmd:tag>`, or nothing when no child is present. */
function wrapped(tag: string, inner: string, children: readonly Child[]): Child {
  const present = compact(children);
  return present.length > 0 ? gmd(tag, gmd(inner, ...present)) : undefined;
}

function optionalString(tag: string, value: Scalar): Child {
  const cleaned = cleanText(value);
  return cleaned === undefined ? undefined : gmd(tag, characterString(cleaned));
}

function mandatoryString(tag: string, value: Scalar): XmlElement {
  return optionalString(tag, value) ?? nilled(tag);
}

function codeListElement(codeList: string, value: string): XmlElement {
  const cleaned = cleanText(value) ?? "";
  return element(
    `gmd:${codeList}`,
    { codeList: codeListUrl(codeList), codeListValue: escapeAttribute(cleaned) },
    [textNode(escapeText(cleaned))],
  );
}

function optionalCode(tag: string, codeList: string, value: Scalar): Child {
  const cleaned = cleanText(value);
  return cleaned === undefined ? undefined : gmd(tag, codeListElement(codeList, cleaned));
}

function mandatoryCode(tag: string, codeList: string, value: Scalar): XmlElement {
  return optionalCode(tag, codeList, value) ?? nilled(tag);
}

function decimal(tag: string, value: number | null): Child {
  if (value === null || !Number.isFinite(value)) return undefined;
  return gmd(tag, textElement("gco:Decimal", formatDecimal(value)));
}

function dateValue(raw: Scalar): XmlElement | undefined {
  const parsed = parseIsoDate(typeof raw === "number" ? String(raw) : raw);
  if (parsed.status !== "ok") return undefined;
  return textElement(parsed.kind === "date" ? "gco:Date" : "gco:DateTime", parsed.value);
}

function mandatoryDate(tag: string, raw: Scalar): XmlElement {
  const value = dateValue(raw);
  return value ? gmd(tag, value) : nilled(tag);
}
