/**
 * Service endpoint: where requests go and which method the current query uses.
 */

import { ConfigurationError } from "../error";

/**
 * Standard public S3 endpoint.
 */
export const DEFAULT_ENDPOINT = "https://s3.amazonaws.com/";

export type Scheme = "http" | "https";

export type HttpMethod = "GET" | "PUT" | "POST" | "DELETE" | "HEAD";

export class ServiceEndpoint {
  readonly scheme: Scheme;
  /** Hostname, with the port when the URI names one. */
  readonly host: string;
  readonly path: string;
  private _method: HttpMethod;

  constructor(uri: string = DEFAULT_ENDPOINT, method: HttpMethod = "GET") {
    let parsed: URL;
    try {
      parsed = new URL(uri);
    } catch {
      throw new ConfigurationError(`Invalid endpoint URL: ${uri}`);
    }

    const scheme = parsed.protocol.replace(/:$/, "");
    if (scheme !== "http" && scheme !== "https") {
      throw new ConfigurationError(`Unsupported endpoint scheme: ${scheme}`);
    }
    if (!parsed.host) {
      throw new ConfigurationError(`Endpoint URL has no host: ${uri}`);
    }

    this.scheme = scheme;
    this.host = parsed.host;
    this.path = parsed.pathname || "/";
    this._method = method;
  }

  get method(): HttpMethod {
    return this._method;
  }

  setMethod(method: HttpMethod): void {
    this._method = method;
  }

  getHost(): string {
    return this.host;
  }

  getUri(): string {
    return `${this.scheme}://${this.host}${this.path}`;
  }

  /**
   * Copy of this endpoint, so a query can record its method without
   * touching an endpoint shared by other queries.
   */
  clone(): ServiceEndpoint {
    return new ServiceEndpoint(this.getUri(), this._method);
  }
}
