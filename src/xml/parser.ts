/**
 * Core XML parsing utilities for S3-compatible responses
 * @module xml/parser
 */

import { XMLParser, XMLBuilder, XMLValidator } from 'fast-xml-parser';

/**
 * Parser options for S3 XML documents. Tag values stay untrimmed strings so
 * that keys such as `0001`, `true` or ` padded ` survive untouched; fields
 * that tolerate surrounding whitespace are read through `childValue`.
 */
const PARSER_OPTIONS = {
  ignoreAttributes: true,
  ignoreDeclaration: true,
  parseTagValue: false,
  trimValues: false,
  processEntities: true,
} as const;

/**
 * Builder options for S3 XML request bodies
 */
const BUILDER_OPTIONS = {
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  format: false,
  suppressEmptyNode: false,
} as const;

/**
 * Parsed XML tree: elements become objects, repeated elements arrays, and
 * leaf elements strings.
 */
export type XmlNode = string | XmlElement | XmlNode[];

export interface XmlElement {
  [name: string]: XmlNode;
}

export function createXmlParser(): XMLParser {
  return new XMLParser(PARSER_OPTIONS);
}

export function createXmlBuilder(): XMLBuilder {
  return new XMLBuilder(BUILDER_OPTIONS);
}

/**
 * Parses an XML document.
 *
 * @throws Error if the document is not well-formed XML
 */
export function parseXml(xml: string): XmlElement {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new Error(`Malformed XML at line ${validation.err.line}: ${validation.err.msg}`);
  }

  const parsed: unknown = createXmlParser().parse(xml);
  if (!isXmlElement(parsed)) {
    throw new Error('XML document has no root element');
  }
  return parsed;
}

/**
 * Converts an object to an XML string, prefixed with the XML declaration.
 *
 * @example
 * ```typescript
 * buildXml({ Root: { Value: 'example' } });
 * // '<?xml version="1.0" encoding="UTF-8"?><Root><Value>example</Value></Root>'
 * ```
 */
export function buildXml(obj: Record<string, unknown>): string {
  return `<?xml version="1.0" encoding="UTF-8"?>${createXmlBuilder().build(obj)}`;
}

export function isXmlElement(value: unknown): value is XmlElement {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Returns the named child element, or undefined when absent or not an element.
 */
export function childElement(parent: XmlElement, name: string): XmlElement | undefined {
  const child = parent[name];
  return isXmlElement(child) ? child : undefined;
}

/**
 * Returns the text of the named child. An empty element (`<Prefix></Prefix>`
 * or `<Prefix/>`) reads as the empty string.
 */
export function childText(parent: XmlElement, name: string): string | undefined {
  const child = parent[name];
  if (typeof child === 'string') {
    return child;
  }
  if (isXmlElement(child) && Object.keys(child).length === 0) {
    return '';
  }
  return undefined;
}

/**
 * Text of the named child without surrounding whitespace. For codes, ids,
 * sizes and flags; object keys and prefixes go through `childText`.
 */
export function childValue(parent: XmlElement, name: string): string | undefined {
  return childText(parent, name)?.trim();
}

/**
 * Normalizes array-or-single-item XML parsing behavior.
 * A repeated element parses to an array, a single one to the element itself.
 */
export function childElements(parent: XmlElement, name: string): XmlElement[] {
  const child = parent[name];
  if (child === undefined) {
    return [];
  }
  const items = Array.isArray(child) ? child : [child];
  return items.filter(isXmlElement);
}

/**
 * Removes surrounding quotes from ETag values
 *
 * @example
 * ```typescript
 * cleanETag('"abc123"'); // 'abc123'
 * cleanETag('abc123'); // 'abc123'
 * ```
 */
export function cleanETag(eTag: string): string {
  return eTag.replace(/^"+|"+$/g, '');
}

/**
 * Safely parses an integer from a string
 */
export function parseIntSafe(value: string | undefined, defaultValue: number): number {
  if (!value) {
    return defaultValue;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parses an ISO 8601 date, returning undefined for absent or invalid values
 */
export function parseDateSafe(value: string | undefined): Date | undefined {
  if (!value) {
    return undefined;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}
