export const NAMESPACES = {
  gmd: "http://www.isotc211.org/2005/gmd",
  gco: "http://www.isotc211.org/2005/gco",
  gml: "http://www.opengis.net/gml",
  gts: "http://www.isotc211.org/2005/gts",
  srv: "http://www.isotc211.org/2005/srv",
  xsi: "http://www.w3.org/2001/XMLSchema-instance",
} as const;

export const GMD_SCHEMA_LOCATION = "http://schemas.opengis.net/iso/19139/20060504/gmd/gmd.xsd";

const CODE_LIST_CATALOGUE =
  "http://standards.iso.org/ittf/PubliclyAvailableStandards/ISO_19139_Schemas/resources/Codelist/gmxCodelists.xml";

export function codeListUrl(codeList: string): string {
  return `${CODE_LIST_CATALOGUE}#${codeList}`;
}

/** Namespace declarations and schema location for the root element. */
export function rootAttributes(): Record<string, string> {
  const attributes: Record<string, string> = {};
  for (const [prefix, uri] of Object.entries(NAMESPACES)) {
    attributes[`xmlns:${prefix}`] = uri;
  }
  attributes["xsi:schemaLocation"] = `${NAMESPACES.gmd} ${GMD_SCHEMA_LOCATION}`;
  return attributes;
}
