import { DOMParser, XMLSerializer } from "@xmldom/xmldom";
import { UrdfParseError } from "./UrdfParseError.js";

// ── DOM helpers ───────────────────────────────────────────────────────────────

const ELEMENT_NODE = 1;

export function isElement(node: Node | null): node is Element {
  return node !== null && node.nodeType === ELEMENT_NODE;
}

/** Direct element children of `parent`, in document order. */
export function childElements(parent: Element, tagName?: string): Element[] {
  const out: Element[] = [];
  const nodes = parent.childNodes;
  for (let i = 0; i < nodes.length; i++) {
    const node = nodes.item(i);
    if (isElement(node) && (tagName === undefined || node.tagName === tagName)) {
      out.push(node);
    }
  }
  return out;
}

/** Every element named `tagName` under `root`, depth-first in document order. */
export function elementsByTagName(root: Document | Element, tagName: string): Element[] {
  const out: Element[] = [];
  const list = root.getElementsByTagName(tagName);
  for (let i = 0; i < list.length; i++) {
    const element = list.item(i);
    if (element !== null) out.push(element);
  }
  return out;
}

/**
 * Value of a named attribute, or `undefined` when absent.
 * (xmldom's `getAttribute` returns `""` rather than `null` for a missing one.)
 */
export function attrValue(element: Element, name: string): string | undefined {
  return element.hasAttribute(name) ? element.getAttribute(name) ?? undefined : undefined;
}

/** Attribute names of `element` in document order. */
export function attributeNames(element: Element): string[] {
  const names: string[] = [];
  for (let i = 0; i < element.attributes.length; i++) {
    const attr = element.attributes.item(i);
    if (attr !== null) names.push(attr.name);
  }
  return names;
}

/**
 * Replace every attribute of `element` with `attributes`, in their key
 * order. Attributes not listed are dropped, not merged.
 */
export function replaceAttributes(element: Element, attributes: Readonly<Record<string, string>>): void {
  for (const name of attributeNames(element)) {
    element.removeAttribute(name);
  }
  for (const [name, value] of Object.entries(attributes)) {
    element.setAttribute(name, value);
  }
}

// ── number formatting ─────────────────────────────────────────────────────────

/**
 * Decimal form of a float attribute: the shortest string that parses back to
 * the same double, with a trailing `.0` on integral values (`2` → `"2.0"`).
 */
export function formatFloat(value: number): string {
  const s = String(value);
  return /^-?\d+$/.test(s) ? `${s}.0` : s;
}

/** Space-separated floats in the given (axis) order, e.g. `"2.0 4.0 6.0"`. */
export function formatVector(values: readonly number[]): string {
  return values.map(formatFloat).join(" ");
}

/**
 * Parse a space-separated triple of numbers (e.g. "1.0 0 0.5").
 * Missing or malformed values default to 0.
 */
export function parseTriple(s: string | undefined): [number, number, number] {
  if (!s) return [0, 0, 0];
  const parts = s.trim().split(/\s+/);
  return [
    parseFloat(parts[0] ?? "0") || 0,
    parseFloat(parts[1] ?? "0") || 0,
    parseFloat(parts[2] ?? "0") || 0,
  ];
}

// ── documents ─────────────────────────────────────────────────────────────────

/**
 * Parse URDF text into a fresh, mutable DOM document.
 *
 * @throws {UrdfParseError} if the XML is malformed or the root element is
 *   not `<robot>`.
 */
export function parseUrdfDocument(xml: string): Document {
  const fail = (msg: unknown): never => {
    throw new UrdfParseError(String(msg));
  };
  const doc = new DOMParser({
    errorHandler: { warning: () => undefined, error: fail, fatalError: fail },
  }).parseFromString(xml, "text/xml");

  const root = doc.documentElement;
  if (root === null || root.tagName !== "robot") {
    throw new UrdfParseError("missing <robot> element.");
  }
  return doc;
}

/** Serialize an element subtree to XML text (no declaration). */
export function serializeElement(element: Element): string {
  return new XMLSerializer().serializeToString(element);
}
