/**
 * S3 Query
 *
 * One request to the storage service: addressing, the header set and its
 * signature (signature version 2, `Authorization: AWS <key>:<signature>`).
 */

import * as crypto from "crypto";
import type { AwsCredentials } from "../credentials";
import { ServiceEndpoint, type HttpMethod } from "../endpoint";
import type { HttpResponse, HttpTransport } from "../transport";
import {
  AMZ_HEADER_PREFIX,
  METADATA_HEADER_PREFIX,
  type ObjectData,
  type ObjectMetadata,
} from "../types";
import { guessContentType } from "./content-type";

export { guessContentType } from "./content-type";

/**
 * Query construction options.
 */
export interface QueryOptions {
  action: HttpMethod;
  bucket?: string;
  objectName?: string;
  data?: ObjectData;
  /** Inferred from the object name when omitted. */
  contentType?: string;
  metadata?: ObjectMetadata;
  /** Anonymous request when omitted. */
  credentials?: AwsCredentials;
  /** Defaults to the public S3 endpoint. */
  endpoint?: ServiceEndpoint;
  transport: HttpTransport;
  /** Request timestamp; the construction time when omitted. */
  date?: Date;
}

/**
 * What the client needs from a query.
 */
export interface SubmittableQuery {
  submit(): Promise<HttpResponse>;
}

/**
 * Produces the query for each client operation.
 */
export type QueryFactory = (options: QueryOptions) => SubmittableQuery;

export const defaultQueryFactory: QueryFactory = (options) => new Query(options);

/**
 * Digest algorithm of the request signature.
 */
const SIGNATURE_HASH = "sha1";

/**
 * A single-use request to the storage service.
 */
export class Query implements SubmittableQuery {
  readonly action: HttpMethod;
  readonly bucket?: string;
  readonly objectName?: string;
  readonly data: Buffer;
  readonly contentType?: string;
  readonly metadata: Readonly<ObjectMetadata>;
  readonly date: Date;
  readonly credentials?: AwsCredentials;
  readonly endpoint: ServiceEndpoint;

  private readonly transport: HttpTransport;
  private headers?: Record<string, string>;

  constructor(options: QueryOptions) {
    this.action = options.action;
    this.bucket = options.bucket || undefined;
    this.objectName = options.objectName || undefined;
    this.data = toBuffer(options.data ?? "");
    this.contentType =
      options.contentType ||
      (this.objectName !== undefined ? guessContentType(this.objectName) : undefined);
    this.metadata = { ...options.metadata };
    this.date = options.date ?? new Date();
    this.credentials = options.credentials;
    this.transport = options.transport;

    this.endpoint = options.endpoint ? options.endpoint.clone() : new ServiceEndpoint();
    this.endpoint.setMethod(this.action);
  }

  /**
   * Request host. The bucket becomes a DNS label of the endpoint host
   * (virtual-hosted-style addressing).
   */
  getHost(): string {
    if (!this.bucket) {
      return this.endpoint.getHost();
    }
    return `${this.bucket}.${this.endpoint.getHost()}`;
  }

  /**
   * Request path, percent-encoded once per segment. An object name that
   * already starts with "/" keeps that slash instead of gaining another.
   *
   * The same string is signed and sent, so it must be the form the service
   * receives on the wire.
   */
  getPath(): string {
    if (!this.objectName) {
      return "/";
    }
    const name = this.objectName.startsWith("/") ? this.objectName : `/${this.objectName}`;
    return name.split("/").map(encodeURIComponent).join("/");
  }

  getUri(): string {
    return `${this.endpoint.scheme}://${this.getHost()}${this.getPath()}`;
  }

  /**
   * Request headers, signed when credentials are present. Computed on first
   * call; each call returns a copy.
   */
  getHeaders(): Record<string, string> {
    if (!this.headers) {
      this.headers = this.buildHeaders();
    }
    return { ...this.headers };
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      "Content-Length": String(this.data.length),
      "Content-MD5": calculateMd5(this.data),
      Date: this.date.toUTCString(),
    };

    // fetch strips surrounding whitespace from header values before sending
    for (const [key, value] of Object.entries(this.metadata)) {
      headers[`${METADATA_HEADER_PREFIX}${key}`] = value.trim();
    }

    if (this.credentials?.sessionToken) {
      headers["x-amz-security-token"] = this.credentials.sessionToken;
    }

    if (this.contentType !== undefined) {
      headers["Content-Type"] = this.contentType;
    }

    const signature = this.sign(headers);
    if (this.credentials && signature !== undefined) {
      headers["Authorization"] = `AWS ${this.credentials.accessKey}:${signature}`;
    }

    return headers;
  }

  /**
   * `name:value\n` for every x-amz- header, names lower-cased and sorted.
   *
   * Duplicate names are not merged and long values are not unfolded.
   */
  getCanonicalizedAmzHeaders(headers: Record<string, string>): string {
    return Object.entries(headers)
      .map(([name, value]): [string, string] => [name.toLowerCase(), value])
      .filter(([name]) => name.startsWith(AMZ_HEADER_PREFIX))
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([name, value]) => `${name}:${value}\n`)
      .join("");
  }

  getSigningString(headers: Record<string, string>): string {
    return (
      `${this.action}\n` +
      `${headers["Content-MD5"] ?? ""}\n` +
      `${headers["Content-Type"] ?? ""}\n` +
      `${headers["Date"] ?? ""}\n` +
      this.getCanonicalizedAmzHeaders(headers) +
      this.getPath()
    );
  }

  /**
   * Signature over `headers`; undefined for an anonymous query.
   */
  sign(headers: Record<string, string>): string | undefined {
    return this.credentials?.sign(this.getSigningString(headers), SIGNATURE_HASH);
  }

  submit(): Promise<HttpResponse> {
    return this.transport.send({
      method: this.action,
      url: this.getUri(),
      headers: this.getHeaders(),
      body: this.data,
    });
  }
}

/**
 * Base64 MD5 digest, as sent in Content-MD5.
 */
export function calculateMd5(data: ObjectData): string {
  return crypto.createHash("md5").update(toBuffer(data)).digest("base64");
}

function toBuffer(data: ObjectData): Buffer {
  if (typeof data === "string") {
    return Buffer.from(data, "utf8");
  }
  return Buffer.isBuffer(data) ? data : Buffer.from(data);
}
