export { buildDocument, METADATA_STANDARD_NAME, METADATA_STANDARD_VERSION } from "./document-builder.js";
export type { BuildOptions } from "./document-builder.js";
export { serialize, serializeToString, XML_DECLARATION } from "./serializer.js";
export { NAMESPACES, codeListUrl } from "./namespaces.js";
export { cleanText, escapeText, escapeAttribute, formatDecimal, parseIsoDate } from "./text.js";
export type { ParsedDate } from "./text.js";
export { element, textNode, childElements, selectPath, findAll, textContent } from "./tree.js";
export type { XmlDocument, XmlElement, XmlNode, XmlText } from "./tree.js";
