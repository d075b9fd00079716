/**
 * S3 Client
 *
 * One method per storage operation. Each call builds its own query through
 * the configured {@link QueryFactory} and submits it.
 */

import { configBuilder, type S3Config } from "../config";
import {
  AwsCredentials,
  type CredentialsProvider,
  ChainCredentialsProvider,
} from "../credentials";
import { ServiceEndpoint, type HttpMethod } from "../endpoint";
import { ConsoleLogger, NoopLogger, logError, logOperation, type Logger } from "../observability";
import { defaultQueryFactory, type QueryFactory, type QueryOptions } from "../query";
import { FetchTransport, type HttpResponse, type HttpTransport } from "../transport";
import type { Bucket, ObjectData, ObjectMetadata } from "../types";
import * as xml from "../xml";

/**
 * Storage client construction options.
 */
export interface StorageClientOptions {
  /** Requests are anonymous when unset. */
  credentials?: AwsCredentials;
  endpoint?: ServiceEndpoint;
  transport?: HttpTransport;
  queryFactory?: QueryFactory;
  logger?: Logger;
}

type Target = Pick<QueryOptions, "bucket" | "objectName" | "data" | "contentType" | "metadata">;

/**
 * S3 storage client.
 */
export class StorageClient {
  readonly credentials?: AwsCredentials;
  readonly endpoint: ServiceEndpoint;
  private readonly transport: HttpTransport;
  private readonly queryFactory: QueryFactory;
  private readonly logger: Logger;

  constructor(options: StorageClientOptions = {}) {
    this.credentials = options.credentials;
    this.endpoint = options.endpoint ?? new ServiceEndpoint();
    this.transport = options.transport ?? new FetchTransport();
    this.queryFactory = options.queryFactory ?? defaultQueryFactory;
    this.logger = options.logger ?? new NoopLogger();
  }

  /**
   * List all buckets owned by the authenticated sender, in the order the
   * service returns them.
   */
  async listBuckets(): Promise<Bucket[]> {
    return this.execute("listBuckets", "GET", {}, (response) =>
      xml.parseListBuckets(response.body.toString("utf8"))
    );
  }

  /**
   * Create a new bucket.
   */
  async createBucket(bucket: string): Promise<HttpResponse> {
    return this.execute("createBucket", "PUT", { bucket });
  }

  /**
   * Delete a bucket. The bucket must be empty; the service rejects the
   * request otherwise.
   */
  async deleteBucket(bucket: string): Promise<HttpResponse> {
    return this.execute("deleteBucket", "DELETE", { bucket });
  }

  /**
   * Put an object in a bucket, replacing any existing object of the same name.
   *
   * @param contentType - guessed from the object name's extension when omitted
   * @param metadata - sent as `x-amz-meta-*` headers
   */
  async putObject(
    bucket: string,
    objectName: string,
    data: ObjectData,
    contentType?: string,
    metadata: ObjectMetadata = {}
  ): Promise<HttpResponse> {
    return this.execute("putObject", "PUT", {
      bucket,
      objectName,
      data,
      contentType,
      metadata: { ...metadata },
    });
  }

  /**
   * Get an object. The body and headers are returned as received.
   */
  async getObject(bucket: string, objectName: string): Promise<HttpResponse> {
    return this.execute("getObject", "GET", { bucket, objectName });
  }

  /**
   * Retrieve an object's headers without its content.
   *
   * The response is returned as received; object metadata is not extracted
   * from it.
   */
  async headObject(bucket: string, objectName: string): Promise<HttpResponse> {
    return this.execute("headObject", "HEAD", { bucket, objectName });
  }

  /**
   * Delete an object. There is no way to restore it afterwards.
   */
  async deleteObject(bucket: string, objectName: string): Promise<HttpResponse> {
    return this.execute("deleteObject", "DELETE", { bucket, objectName });
  }

  private execute(
    operation: string,
    action: HttpMethod,
    target: Target
  ): Promise<HttpResponse>;
  private execute<T>(
    operation: string,
    action: HttpMethod,
    target: Target,
    handle: (response: HttpResponse) => T
  ): Promise<T>;
  private async execute<T>(
    operation: string,
    action: HttpMethod,
    target: Target,
    handle?: (response: HttpResponse) => T
  ): Promise<T | HttpResponse> {
    const query = this.queryFactory({
      ...target,
      action,
      credentials: this.credentials,
      endpoint: this.endpoint,
      transport: this.transport,
    });

    logOperation(this.logger, operation, {
      method: action,
      bucket: target.bucket,
      objectName: target.objectName,
    });

    try {
      const response = await query.submit();
      return handle ? handle(response) : response;
    } catch (error) {
      logError(this.logger, operation, error);
      throw error;
    }
  }
}

/**
 * S3 Client builder.
 */
export class S3ClientBuilder {
  private _config?: S3Config;
  private _credentials?: AwsCredentials;
  private _credentialsProvider?: CredentialsProvider;
  private _transport?: HttpTransport;
  private _queryFactory?: QueryFactory;
  private _logger?: Logger;
  private _fromEnv: boolean = false;

  /**
   * Set the configuration.
   */
  config(config: S3Config): this {
    this._config = config;
    return this;
  }

  /**
   * Set explicit credentials.
   */
  credentials(credentials: AwsCredentials): this {
    this._credentials = credentials;
    return this;
  }

  /**
   * Set a credentials provider.
   */
  credentialsProvider(provider: CredentialsProvider): this {
    this._credentialsProvider = provider;
    return this;
  }

  /**
   * Set a custom HTTP transport.
   */
  transport(transport: HttpTransport): this {
    this._transport = transport;
    return this;
  }

  queryFactory(factory: QueryFactory): this {
    this._queryFactory = factory;
    return this;
  }

  logger(logger: Logger): this {
    this._logger = logger;
    return this;
  }

  /**
   * Load configuration and credentials from the environment.
   */
  fromEnv(): this {
    this._fromEnv = true;
    return this;
  }

  /**
   * Build the S3 client.
   */
  async build(): Promise<StorageClient> {
    let config: S3Config;
    if (this._config) {
      config = this._config;
    } else if (this._fromEnv) {
      config = configBuilder().fromEnv().build();
    } else {
      config = configBuilder().build();
    }

    let credentials: AwsCredentials | undefined;
    if (this._credentials) {
      credentials = this._credentials;
    } else if (config.credentials) {
      credentials = config.credentials;
    } else if (this._credentialsProvider) {
      credentials = await this._credentialsProvider.getCredentials();
    } else if (this._fromEnv) {
      credentials = await new ChainCredentialsProvider().getCredentials();
    }

    const logger =
      this._logger ?? (config.enableLogging ? new ConsoleLogger(config.logLevel) : new NoopLogger());

    return new StorageClient({
      credentials,
      endpoint: new ServiceEndpoint(config.endpoint),
      transport: this._transport ?? new FetchTransport(config.timeout),
      queryFactory: this._queryFactory,
      logger,
    });
  }
}

/**
 * Create a new S3 client builder.
 */
export function clientBuilder(): S3ClientBuilder {
  return new S3ClientBuilder();
}

/**
 * Create an S3 client from environment variables.
 */
export async function createClientFromEnv(): Promise<StorageClient> {
  return clientBuilder().fromEnv().build();
}

/**
 * Create an S3 client with explicit configuration.
 */
export async function createClient(config: S3Config): Promise<StorageClient> {
  return clientBuilder().config(config).build();
}
