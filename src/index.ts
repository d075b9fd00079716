/**
 * S3 REST Client
 *
 * Typed client for S3-compatible object storage: bucket listing, bucket
 * creation and deletion, and object put/get/head/delete, with requests
 * signed using S3 signature version 2.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { clientBuilder, createCredentials } from 's3-rest-client';
 *
 * const client = await clientBuilder()
 *   .credentials(createCredentials(accessKey, secretKey))
 *   .build();
 *
 * await client.createBucket('reports');
 * await client.putObject('reports', 'q3.pdf', pdfBytes, undefined, { team: 'finance' });
 *
 * for (const bucket of await client.listBuckets()) {
 *   console.log(bucket.name, bucket.created.toISOString());
 * }
 * ```
 *
 * @module s3-rest-client
 */

// Client
export {
  StorageClient,
  S3ClientBuilder,
  clientBuilder,
  createClient,
  createClientFromEnv,
} from "./client";
export type { StorageClientOptions } from "./client";

// Configuration
export { S3ConfigBuilder, DEFAULT_CONFIG, DEFAULT_TIMEOUT, configBuilder, validateConfig } from "./config";
export type { S3Config } from "./config";

// Credentials
export {
  AwsCredentials,
  StaticCredentialsProvider,
  EnvCredentialsProvider,
  ProfileCredentialsProvider,
  ChainCredentialsProvider,
  createCredentials,
  createTemporaryCredentials,
  isTemporary,
  parseCredentialsFile,
} from "./credentials";
export type { CredentialsProvider, HashType } from "./credentials";

// Endpoint
export { ServiceEndpoint, DEFAULT_ENDPOINT } from "./endpoint";
export type { HttpMethod, Scheme } from "./endpoint";

// Errors
export {
  S3Error,
  ConfigurationError,
  CredentialsError,
  BucketError,
  ObjectError,
  AccessError,
  NetworkError,
  ServerError,
  ResponseError,
  RequestError,
  mapS3ErrorCode,
  errorFromStatus,
} from "./error";
export type { S3ErrorResponse } from "./error";

// Observability
export { ConsoleLogger, NoopLogger } from "./observability";
export type { Logger, LogLevel, LogContext } from "./observability";

// Query
export { Query, defaultQueryFactory, calculateMd5, guessContentType } from "./query";
export type { QueryOptions, QueryFactory, SubmittableQuery } from "./query";

// Transport
export {
  FetchTransport,
  isSuccess,
  getHeader,
  getRequestId,
  toServiceError,
} from "./transport";
export type { HttpRequest, HttpResponse, HttpTransport } from "./transport";

// Types
export { METADATA_HEADER_PREFIX, AMZ_HEADER_PREFIX } from "./types";
export type { Bucket, ObjectMetadata, ObjectData } from "./types";

// XML utilities (internal, but exported for extensibility)
export * as xml from "./xml";
