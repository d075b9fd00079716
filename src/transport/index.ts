/**
 * HTTP Transport Layer
 *
 * Performs the requests a query has fully formed. Non-2xx responses reject
 * with the error the service described in its XML error document.
 */

import { NetworkError, RequestError, S3Error, errorFromStatus, mapS3ErrorCode } from "../error";
import { parseErrorResponse } from "../xml";

/**
 * HTTP request.
 */
export interface HttpRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  body?: Buffer | Uint8Array | string;
  timeout?: number;
}

/**
 * HTTP response.
 */
export interface HttpResponse {
  status: number;
  statusText: string;
  headers: Record<string, string>;
  body: Buffer;
}

/**
 * Transport interface.
 */
export interface HttpTransport {
  /**
   * Send an HTTP request.
   */
  send(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * Check if response indicates success.
 */
export function isSuccess(response: HttpResponse): boolean {
  return response.status >= 200 && response.status < 300;
}

/**
 * Get a header value (case-insensitive).
 */
export function getHeader(response: HttpResponse, name: string): string | undefined {
  const lowerName = name.toLowerCase();
  for (const [key, value] of Object.entries(response.headers)) {
    if (key.toLowerCase() === lowerName) {
      return value;
    }
  }
  return undefined;
}

/**
 * Get request ID from response.
 */
export function getRequestId(response: HttpResponse): string | undefined {
  return getHeader(response, "x-amz-request-id");
}

/**
 * Turn a non-2xx response into the matching {@link S3Error}.
 */
export function toServiceError(response: HttpResponse): S3Error {
  const errorResponse = parseErrorResponse(response.body.toString("utf8"));
  if (!errorResponse) {
    return errorFromStatus(response.status, response.statusText);
  }
  return mapS3ErrorCode(
    errorResponse.code,
    { ...errorResponse, requestId: errorResponse.requestId ?? getRequestId(response) },
    response.status
  );
}

/**
 * Fetch-based HTTP transport.
 */
export class FetchTransport implements HttpTransport {
  private defaultTimeout: number;

  constructor(defaultTimeout: number = 30000) {
    this.defaultTimeout = defaultTimeout;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const timeout = request.timeout ?? this.defaultTimeout;
    const response = await this.perform(request, timeout);
    if (!isSuccess(response)) {
      throw toServiceError(response);
    }
    return response;
  }

  private async perform(request: HttpRequest, timeout: number): Promise<HttpResponse> {
    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.method === "GET" || request.method === "HEAD" ? undefined : request.body,
        signal: AbortSignal.timeout(timeout),
      });

      // Convert headers to plain object
      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key] = value;
      });

      const arrayBuffer = await response.arrayBuffer();

      return {
        status: response.status,
        statusText: response.statusText,
        headers,
        body: Buffer.from(arrayBuffer),
      };
    } catch (error) {
      // fetch rejects invalid headers or bodies before connecting, without a cause
      if (error instanceof TypeError && error.cause === undefined) {
        throw new RequestError(`Invalid request: ${error.message}`);
      }
      if (error instanceof Error) {
        const detail = describeCause(error);
        if (error.name === "AbortError" || error.name === "TimeoutError") {
          throw new NetworkError(`Request timeout after ${timeout}ms`, "Timeout");
        }
        if (detail.includes("ENOTFOUND") || detail.includes("EAI_AGAIN")) {
          throw new NetworkError(`DNS resolution failed: ${detail}`, "DnsResolutionFailed");
        }
        throw new NetworkError(`Connection failed: ${detail}`, "ConnectionFailed");
      }
      throw new NetworkError(String(error), "ConnectionFailed");
    }
  }
}

/**
 * fetch reports socket failures as "fetch failed" with the system error in `cause`.
 */
function describeCause(error: Error): string {
  const cause: unknown = error.cause;
  if (cause instanceof Error) {
    const code = "code" in cause && typeof cause.code === "string" ? cause.code : undefined;
    return code ? `${code} ${cause.message}` : cause.message;
  }
  return error.message;
}
