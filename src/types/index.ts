/**
 * Value types shared by the client and the query builder.
 */

/**
 * A bucket as reported by the bucket listing.
 */
export interface Bucket {
  name: string;
  created: Date;
}

/**
 * User metadata for an object. Each entry is sent as an `x-amz-meta-<key>` header.
 */
export type ObjectMetadata = Record<string, string>;

/**
 * Object payload accepted by uploads.
 */
export type ObjectData = Buffer | Uint8Array | string;

/**
 * Header prefix for user metadata.
 */
export const METADATA_HEADER_PREFIX = "x-amz-meta-";

/**
 * Header prefix of every header that takes part in the signature.
 */
export const AMZ_HEADER_PREFIX = "x-amz-";
