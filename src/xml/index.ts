/**
 * XML documents of the S3 REST API: bucket listings and error bodies.
 */

import { ResponseError, type S3ErrorResponse } from "../error";
import type { Bucket } from "../types";
import { childText, isElement, normalizeArray, parseDate, parseXmlDocument } from "./parser";

export {
  createXmlParser,
  parseXmlDocument,
  childText,
  isElement,
  normalizeArray,
  parseDate,
} from "./parser";
export type { XmlElement } from "./parser";

/**
 * Parse a ListAllMyBucketsResult document.
 *
 * Only `Name` and `CreationDate` of each `Buckets/Bucket` entry are read;
 * entries keep document order.
 */
export function parseListBuckets(xml: string): Bucket[] {
  const { rootName, root } = parseXmlDocument(xml, [
    "ListAllMyBucketsResult.Buckets.Bucket",
  ]);

  if (!isElement(root) || !("Buckets" in root)) {
    throw new ResponseError(`Missing Buckets element in ${rootName}`, "InvalidResponse");
  }

  // <Buckets/> parses to an empty string
  const buckets = root["Buckets"];
  if (!isElement(buckets)) {
    return [];
  }

  return normalizeArray(buckets["Bucket"]).map((entry, index) => {
    if (!isElement(entry)) {
      throw new ResponseError(`Bucket entry ${index} is not an element`, "InvalidResponse");
    }
    const name = childText(entry, "Name");
    const creationDate = childText(entry, "CreationDate");
    if (name === undefined || creationDate === undefined) {
      throw new ResponseError(
        `Bucket entry ${index} is missing Name or CreationDate`,
        "InvalidResponse"
      );
    }
    return { name, created: parseDate(creationDate) };
  });
}

/**
 * Parse an S3 `<Error>` document. Returns undefined when the body is not one.
 */
export function parseErrorResponse(xml: string): S3ErrorResponse | undefined {
  if (!xml.trim()) {
    return undefined;
  }

  let parsed: { rootName: string; root: unknown };
  try {
    parsed = parseXmlDocument(xml);
  } catch (error) {
    if (error instanceof ResponseError) {
      return undefined;
    }
    throw error;
  }

  const { rootName, root } = parsed;
  if (rootName !== "Error") {
    return undefined;
  }
  // <Error></Error> parses to an empty string
  const element = isElement(root) ? root : {};

  return {
    code: childText(element, "Code") ?? "UnknownError",
    message: childText(element, "Message") ?? "Unknown error",
    key: childText(element, "Key"),
    bucket: childText(element, "BucketName"),
    requestId: childText(element, "RequestId"),
    hostId: childText(element, "HostId"),
  };
}
