/**
 * Minimal XML element tree produced by the document builder.
 *
 * Text nodes and attribute values hold markup-ready strings: escaping is
 * done once, when a node is created, so the serializer writes them verbatim.
 */

export interface XmlText {
  readonly kind: "text";
  readonly text: string;
}

export interface XmlElement {
  readonly kind: "element";
  /** Qualified name, e.g. "gmd:MD_Metadata". */
  readonly name: string;
  /** Rendered in insertion order. */
  readonly attributes: Readonly<Record<string, string>>;
  readonly children: readonly XmlNode[];
}

export type XmlNode = XmlElement | XmlText;

export interface XmlDocument {
  readonly root: XmlElement;
}

export function element(
  name: string,
  attributes: Record<string, string> = {},
  children: readonly XmlNode[] = [],
): XmlElement {
  return { kind: "element", name, attributes, children };
}

export function textNode(markup: string): XmlText {
  return { kind: "text", text: markup };
}

// --- Queries ---

export function childElements(parent: XmlElement, name?: string): XmlElement[] {
  return parent.children.filter(
    (node): node is XmlElement => node.kind === "element" && (name === undefined || node.name === name),
  );
}

/**
 * Resolve a slash-separated path of qualified names below `parent`,
 * e.g. "gmd:identificationInfo/gmd:MD_DataIdentification/gmd:abstract".
 */
export function selectPath(parent: XmlElement, path: string): XmlElement[] {
  let current: XmlElement[] = [parent];
  for (const step of path.split("/")) {
    current = current.flatMap((node) => childElements(node, step));
  }
  return current;
}

/** Every descendant element named `name`, in document order. */
export function findAll(parent: XmlElement, name: string): XmlElement[] {
  const found: XmlElement[] = [];
  for (const child of childElements(parent)) {
    if (child.name === name) found.push(child);
    found.push(...findAll(child, name));
  }
  return found;
}

/** Concatenated (escaped) text of all descendant text nodes. */
export function textContent(node: XmlNode): string {
  if (node.kind === "text") return node.text;
  return node.children.map(textContent).join("");
}
