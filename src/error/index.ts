/**
 * S3 Error Types
 *
 * Error hierarchy for the storage client. Service errors are built from the
 * XML error document the service returns; transport failures surface as
 * {@link NetworkError}; a listing that cannot be parsed surfaces as
 * {@link ResponseError}.
 */

/**
 * Base S3 error class.
 */
export class S3Error extends Error {
  public readonly code: string;
  public readonly requestId?: string;
  public readonly statusCode?: number;
  public readonly retryable: boolean;

  constructor(
    message: string,
    code: string,
    options?: { requestId?: string; statusCode?: number; retryable?: boolean }
  ) {
    super(message);
    this.name = "S3Error";
    this.code = code;
    this.requestId = options?.requestId;
    this.statusCode = options?.statusCode;
    this.retryable = options?.retryable ?? false;
    Object.setPrototypeOf(this, S3Error.prototype);
  }
}

/**
 * Configuration error.
 */
export class ConfigurationError extends S3Error {
  constructor(message: string) {
    super(message, "ConfigurationError");
    this.name = "ConfigurationError";
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Credentials error.
 */
export class CredentialsError extends S3Error {
  constructor(
    message: string,
    code: "NotFound" | "Invalid" | "ProfileError" = "NotFound"
  ) {
    super(message, `Credentials.${code}`);
    this.name = "CredentialsError";
    Object.setPrototypeOf(this, CredentialsError.prototype);
  }
}

interface ServiceErrorOptions {
  requestId?: string;
  statusCode?: number;
}

/**
 * Bucket operation error.
 */
export class BucketError extends S3Error {
  public readonly bucket?: string;

  constructor(
    message: string,
    code: "NotFound" | "AlreadyExists" | "AlreadyOwnedByYou" | "NotEmpty" | "InvalidName",
    options?: ServiceErrorOptions & { bucket?: string }
  ) {
    super(message, `Bucket.${code}`, options);
    this.name = "BucketError";
    this.bucket = options?.bucket;
    Object.setPrototypeOf(this, BucketError.prototype);
  }
}

/**
 * Object operation error.
 */
export class ObjectError extends S3Error {
  public readonly key?: string;

  constructor(
    message: string,
    code: "NotFound" | "PreconditionFailed" | "BadDigest" | "EntityTooLarge",
    options?: ServiceErrorOptions & { key?: string }
  ) {
    super(message, `Object.${code}`, options);
    this.name = "ObjectError";
    this.key = options?.key;
    Object.setPrototypeOf(this, ObjectError.prototype);
  }
}

/**
 * Access/authorization error.
 */
export class AccessError extends S3Error {
  constructor(
    message: string,
    code:
      | "AccessDenied"
      | "InvalidAccessKeyId"
      | "SignatureDoesNotMatch"
      | "RequestTimeTooSkewed"
      | "ExpiredToken",
    options?: ServiceErrorOptions
  ) {
    super(message, `Access.${code}`, options);
    this.name = "AccessError";
    Object.setPrototypeOf(this, AccessError.prototype);
  }
}

/**
 * Network/transport error.
 */
export class NetworkError extends S3Error {
  constructor(
    message: string,
    code: "ConnectionFailed" | "Timeout" | "DnsResolutionFailed",
    options?: { retryable?: boolean }
  ) {
    super(message, `Network.${code}`, { retryable: options?.retryable ?? true });
    this.name = "NetworkError";
    Object.setPrototypeOf(this, NetworkError.prototype);
  }
}

/**
 * Server-side error.
 */
export class ServerError extends S3Error {
  constructor(
    message: string,
    code: "InternalError" | "ServiceUnavailable" | "SlowDown",
    options?: ServiceErrorOptions
  ) {
    super(message, `Server.${code}`, { ...options, retryable: true });
    this.name = "ServerError";
    Object.setPrototypeOf(this, ServerError.prototype);
  }
}

/**
 * Request the HTTP client refused to send, such as a header value that is not
 * a valid byte string. Never retryable.
 */
export class RequestError extends S3Error {
  constructor(message: string) {
    super(message, "Request.Invalid");
    this.name = "RequestError";
    Object.setPrototypeOf(this, RequestError.prototype);
  }
}

/**
 * Response parsing error.
 */
export class ResponseError extends S3Error {
  constructor(message: string, code: "InvalidResponse" | "XmlParseError" = "InvalidResponse") {
    super(message, `Response.${code}`);
    this.name = "ResponseError";
    Object.setPrototypeOf(this, ResponseError.prototype);
  }
}

/**
 * S3 error response from XML.
 */
export interface S3ErrorResponse {
  code: string;
  message: string;
  key?: string;
  bucket?: string;
  requestId?: string;
  hostId?: string;
}

/**
 * Map S3 error code to appropriate error class.
 */
export function mapS3ErrorCode(
  code: string,
  response?: S3ErrorResponse,
  statusCode?: number
): S3Error {
  const message = response?.message || code;
  const options = { requestId: response?.requestId, statusCode };

  switch (code) {
    // Bucket errors
    case "NoSuchBucket":
      return new BucketError(message, "NotFound", { ...options, bucket: response?.bucket });
    case "BucketAlreadyExists":
      return new BucketError(message, "AlreadyExists", { ...options, bucket: response?.bucket });
    case "BucketAlreadyOwnedByYou":
      return new BucketError(message, "AlreadyOwnedByYou", { ...options, bucket: response?.bucket });
    case "BucketNotEmpty":
      return new BucketError(message, "NotEmpty", { ...options, bucket: response?.bucket });
    case "InvalidBucketName":
      return new BucketError(message, "InvalidName", { ...options, bucket: response?.bucket });

    // Object errors
    case "NoSuchKey":
      return new ObjectError(message, "NotFound", { ...options, key: response?.key });
    case "PreconditionFailed":
      return new ObjectError(message, "PreconditionFailed", options);
    case "BadDigest":
    case "InvalidDigest":
      return new ObjectError(message, "BadDigest", { ...options, key: response?.key });
    case "EntityTooLarge":
      return new ObjectError(message, "EntityTooLarge", { ...options, key: response?.key });

    // Access errors
    case "AccessDenied":
      return new AccessError(message, "AccessDenied", options);
    case "InvalidAccessKeyId":
      return new AccessError(message, "InvalidAccessKeyId", options);
    case "SignatureDoesNotMatch":
      return new AccessError(message, "SignatureDoesNotMatch", options);
    case "RequestTimeTooSkewed":
      return new AccessError(message, "RequestTimeTooSkewed", options);
    case "ExpiredToken":
      return new AccessError(message, "ExpiredToken", options);

    // Server errors
    case "InternalError":
      return new ServerError(message, "InternalError", options);
    case "ServiceUnavailable":
      return new ServerError(message, "ServiceUnavailable", options);
    case "SlowDown":
      return new ServerError(message, "SlowDown", options);

    default:
      return new S3Error(message, code, options);
  }
}

/**
 * Build an error from an HTTP status when the response carries no XML body
 * (HEAD responses, proxies that strip the body).
 */
export function errorFromStatus(status: number, statusText: string): S3Error {
  const message = statusText ? `${status} ${statusText}` : `HTTP ${status}`;
  switch (status) {
    case 403:
      return new AccessError(message, "AccessDenied", { statusCode: status });
    case 404:
      return new S3Error(message, "NotFound", { statusCode: status });
    case 409:
      return new S3Error(message, "Conflict", { statusCode: status });
    case 500:
      return new ServerError(message, "InternalError", { statusCode: status });
    case 503:
      return new ServerError(message, "ServiceUnavailable", { statusCode: status });
    default:
      return new S3Error(message, `Http.${status}`, {
        statusCode: status,
        retryable: status >= 500,
      });
  }
}
