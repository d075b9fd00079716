/**
 * Core XML parsing utilities for S3 API responses
 */

import { XMLParser, XMLValidator, type X2jOptions } from "fast-xml-parser";
import { ResponseError } from "../error";

/**
 * Parser options for S3 XML documents. Tag values stay strings; element
 * paths listed in `arrayPaths` always parse to arrays.
 */
function parserOptions(arrayPaths: readonly string[]): Partial<X2jOptions> {
  return {
    ignoreAttributes: true,
    ignoreDeclaration: true,
    parseTagValue: false,
    trimValues: true,
    isArray: (_tagName: string, jPath: string) => arrayPaths.includes(jPath),
  };
}

/**
 * Creates a configured XML parser instance for S3 responses
 *
 * @param arrayPaths - dotted element paths (e.g. `ListAllMyBucketsResult.Buckets.Bucket`)
 *   that must always be arrays, even with a single child
 */
export function createXmlParser(arrayPaths: readonly string[] = []): XMLParser {
  return new XMLParser(parserOptions(arrayPaths));
}

/**
 * A parsed XML element: child elements keyed by tag name.
 */
export type XmlElement = Record<string, unknown>;

export function isElement(value: unknown): value is XmlElement {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validates and parses an XML document, returning its root element name and content.
 *
 * @throws ResponseError (`Response.XmlParseError`) if the document is not well-formed
 */
export function parseXmlDocument(
  xml: string,
  arrayPaths: readonly string[] = []
): { rootName: string; root: unknown } {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new ResponseError(`Malformed XML at ${line}:${col}: ${msg}`, "XmlParseError");
  }

  const document: unknown = createXmlParser(arrayPaths).parse(xml);
  if (!isElement(document)) {
    throw new ResponseError("XML document has no root element", "XmlParseError");
  }

  const rootName = Object.keys(document)[0];
  if (rootName === undefined) {
    throw new ResponseError("XML document has no root element", "XmlParseError");
  }

  return { rootName, root: document[rootName] };
}

/**
 * Text content of a child element, or undefined when it is absent or not a text node.
 */
export function childText(element: XmlElement, tag: string): string | undefined {
  const value = element[tag];
  return typeof value === "string" ? value : undefined;
}

/**
 * Normalizes array-or-single-item XML parsing behavior
 *
 * @example
 * ```typescript
 * normalizeArray(undefined); // []
 * normalizeArray('single'); // ['single']
 * normalizeArray(['a', 'b']); // ['a', 'b']
 * ```
 */
export function normalizeArray<T>(value: T | T[] | undefined): T[] {
  if (value === undefined || value === null) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

/**
 * Parses an ISO 8601 date string to a Date object
 *
 * @throws ResponseError if the date string is invalid
 */
export function parseDate(dateStr: string): Date {
  const date = new Date(dateStr);
  if (isNaN(date.getTime())) {
    throw new ResponseError(`Invalid date string: ${dateStr}`, "InvalidResponse");
  }
  return date;
}
