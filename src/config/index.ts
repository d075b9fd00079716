/**
 * S3 Configuration Module
 */

import { z } from "zod";
import { AwsCredentials } from "../credentials";
import { DEFAULT_ENDPOINT } from "../endpoint";
import { ConfigurationError } from "../error";
import { LOG_LEVELS, type LogLevel } from "../observability";

/**
 * Default request timeout in milliseconds.
 */
export const DEFAULT_TIMEOUT = 30000;

/**
 * S3 client configuration.
 */
export interface S3Config {
  /** Service endpoint URL (scheme and host; the bucket is prepended to the host). */
  endpoint: string;
  /** Credentials; requests are anonymous when unset. */
  credentials?: AwsCredentials;
  /** Request timeout in milliseconds. */
  timeout: number;
  /** Enable request logging. */
  enableLogging: boolean;
  /** Minimum level written when logging is enabled. */
  logLevel: LogLevel;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: S3Config = {
  endpoint: DEFAULT_ENDPOINT,
  credentials: undefined,
  timeout: DEFAULT_TIMEOUT,
  enableLogging: false,
  logLevel: "info",
};

const logLevelSchema = z.enum(["error", "warn", "info", "debug", "trace"]);

/**
 * Zod schema for configuration validation.
 */
const configSchema = z.object({
  endpoint: z
    .string()
    .url()
    .refine((value) => /^https?:\/\//i.test(value), "endpoint must use http or https"),
  credentials: z.instanceof(AwsCredentials).optional(),
  timeout: z.number().int().positive(),
  enableLogging: z.boolean(),
  logLevel: logLevelSchema,
});

/**
 * Validates a configuration.
 *
 * @throws ConfigurationError listing every invalid field
 */
export function validateConfig(config: S3Config): void {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`);
  }
}

/**
 * S3 configuration builder.
 */
export class S3ConfigBuilder {
  private config: Partial<S3Config> = {};

  /**
   * Set the service endpoint (for S3-compatible services).
   */
  endpoint(endpoint: string): this {
    this.config.endpoint = endpoint;
    return this;
  }

  /**
   * Set explicit credentials.
   */
  credentials(credentials: AwsCredentials): this {
    this.config.credentials = credentials;
    return this;
  }

  /**
   * Set request timeout in milliseconds.
   */
  timeout(ms: number): this {
    this.config.timeout = ms;
    return this;
  }

  /**
   * Enable logging.
   */
  enableLogging(enable: boolean = true): this {
    this.config.enableLogging = enable;
    return this;
  }

  logLevel(level: LogLevel): this {
    this.config.logLevel = level;
    return this;
  }

  /**
   * Load configuration from environment variables.
   */
  fromEnv(env: NodeJS.ProcessEnv = process.env): this {
    const endpoint = env.AWS_ENDPOINT_URL_S3 ?? env.AWS_ENDPOINT_URL;
    if (endpoint) {
      this.config.endpoint = endpoint;
    }

    const timeout = env.S3_CLIENT_TIMEOUT_MS;
    if (timeout) {
      const parsed = Number(timeout);
      if (!Number.isFinite(parsed)) {
        throw new ConfigurationError(`Invalid S3_CLIENT_TIMEOUT_MS: ${timeout}`);
      }
      this.config.timeout = parsed;
    }

    const level = env.S3_CLIENT_LOG_LEVEL;
    if (level) {
      const parsed = logLevelSchema.safeParse(level.toLowerCase());
      if (!parsed.success) {
        throw new ConfigurationError(
          `Invalid S3_CLIENT_LOG_LEVEL: ${level} (expected one of ${LOG_LEVELS.join(", ")})`
        );
      }
      this.config.logLevel = parsed.data;
      this.config.enableLogging = true;
    }

    return this;
  }

  /**
   * Build the configuration.
   */
  build(): S3Config {
    const merged: S3Config = { ...DEFAULT_CONFIG, ...this.config };
    validateConfig(merged);
    return merged;
  }
}

/**
 * Create a new S3 config builder.
 */
export function configBuilder(): S3ConfigBuilder {
  return new S3ConfigBuilder();
}
