/**
 * Serializer — render an element tree to indented UTF-8 bytes.
 *
 * Output is a function of the tree alone: attributes in insertion order,
 * children in list order, two-space indentation, empty elements
 * self-closed, and a trailing newline after the root.
 */

import { XMLBuilder } from "fast-xml-parser";
import type { XmlDocument, XmlNode } from "./tree.js";

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

const ATTRIBUTE_PREFIX = "@_";

// Text and attribute values are escaped when the tree is built.
const builder = new XMLBuilder({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  format: true,
  indentBy: "  ",
  suppressEmptyNode: true,
  processEntities: false,
});

type OrderedNode = Record<string, unknown>;

function toOrdered(node: XmlNode): OrderedNode {
  if (node.kind === "text") {
    return { "#text": node.text };
  }
  const ordered: OrderedNode = { [node.name]: node.children.map(toOrdered) };
  const attributes = Object.entries(node.attributes);
  if (attributes.length > 0) {
    ordered[":@"] = Object.fromEntries(attributes.map(([name, value]) => [`${ATTRIBUTE_PREFIX}${name}`, value]));
  }
  return ordered;
}

/** Render the document as a string, XML declaration included. */
export function serializeToString(document: XmlDocument): string {
  const body: string = builder.build([toOrdered(document.root)]);
  return `${XML_DECLARATION}\n${body.trim()}\n`;
}

export function serialize(document: XmlDocument): Buffer {
  return Buffer.from(serializeToString(document), "utf-8");
}
