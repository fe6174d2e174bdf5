/**
 * A minimal ordered element tree, built by both the strict and the relaxed
 * parser so the field mapper does not care which one ran.
 *
 * Element and attribute names are lowercased. Text nodes are already
 * entity-decoded.
 */

export interface XmlElement {
  name: string;
  attributes: Record<string, string>;
  children: XmlNode[];
}

export type XmlNode = XmlElement | string;

export function createElement(name: string, attributes: Record<string, string> = {}): XmlElement {
  return { name: name.toLowerCase(), attributes, children: [] };
}

export function isElement(node: XmlNode): node is XmlElement {
  return typeof node !== "string";
}

/**
 * Direct child elements, optionally filtered by (lowercase) name.
 */
export function childElements(element: XmlElement, ...names: string[]): XmlElement[] {
  const children = element.children.filter(isElement);
  return names.length === 0 ? children : children.filter((child) => names.includes(child.name));
}

/**
 * The first direct child with one of the given names, trying names in order.
 */
export function findChild(element: XmlElement, ...names: string[]): XmlElement | undefined {
  for (const name of names) {
    const child = element.children.find(
      (node): node is XmlElement => isElement(node) && node.name === name
    );
    if (child) {
      return child;
    }
  }
  return undefined;
}

/**
 * Concatenated text of the element and all its descendants.
 */
export function textContent(element: XmlElement): string {
  return element.children
    .map((node) => (isElement(node) ? textContent(node) : node))
    .join("");
}

function escapeText(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function escapeAttribute(value: string): string {
  return escapeText(value).replace(/"/g, "&quot;");
}

function serializeNode(node: XmlNode): string {
  if (!isElement(node)) {
    return escapeText(node);
  }
  const attributes = Object.entries(node.attributes)
    .map(([name, value]) => ` ${name}="${escapeAttribute(value)}"`)
    .join("");
  if (node.children.length === 0) {
    return `<${node.name}${attributes} />`;
  }
  return `<${node.name}${attributes}>${node.children.map(serializeNode).join("")}</${node.name}>`;
}

/**
 * Serializes an element's children back to markup. Used for inline XHTML
 * content.
 */
export function innerXml(element: XmlElement): string {
  return element.children.map(serializeNode).join("");
}
