/**
 * AWS Credentials Management
 *
 * Credential value type and the providers that resolve it.
 */

import * as crypto from "crypto";
import * as fs from "fs";
import * as path from "path";
import { CredentialsError } from "../error";

/**
 * Digest used by {@link AwsCredentials.sign}.
 */
export type HashType = "sha1" | "sha256";

/**
 * AWS credentials.
 *
 * The secret key is only ever used to key an HMAC. It is left out of
 * `toString()` and `toJSON()`, so credentials can sit in log context.
 */
export class AwsCredentials {
  readonly accessKey: string;
  readonly sessionToken?: string;
  private readonly secretKey: string;

  constructor(accessKey: string, secretKey: string, sessionToken?: string) {
    if (!accessKey) {
      throw new CredentialsError("Access key must not be empty", "Invalid");
    }
    if (!secretKey) {
      throw new CredentialsError("Secret key must not be empty", "Invalid");
    }
    this.accessKey = accessKey;
    this.secretKey = secretKey;
    this.sessionToken = sessionToken;
  }

  /**
   * Sign `text` with the secret key, returning the base64 HMAC.
   */
  sign(text: string, hashType: HashType = "sha256"): string {
    return crypto.createHmac(hashType, this.secretKey).update(text, "utf8").digest("base64");
  }

  toString(): string {
    return `AwsCredentials(${this.accessKey})`;
  }

  toJSON(): { accessKey: string; temporary: boolean } {
    return { accessKey: this.accessKey, temporary: this.sessionToken !== undefined };
  }
}

/**
 * Create long-term credentials.
 */
export function createCredentials(accessKey: string, secretKey: string): AwsCredentials {
  return new AwsCredentials(accessKey, secretKey);
}

/**
 * Create temporary credentials with session token.
 */
export function createTemporaryCredentials(
  accessKey: string,
  secretKey: string,
  sessionToken: string
): AwsCredentials {
  return new AwsCredentials(accessKey, secretKey, sessionToken);
}

/**
 * Check if credentials are temporary (have session token).
 */
export function isTemporary(credentials: AwsCredentials): boolean {
  return credentials.sessionToken !== undefined;
}

/**
 * Credentials provider interface.
 */
export interface CredentialsProvider {
  /**
   * Get credentials from this provider.
   */
  getCredentials(): Promise<AwsCredentials>;

  /**
   * Provider name for debugging.
   */
  readonly name: string;
}

/**
 * Static credentials provider for explicit configuration.
 */
export class StaticCredentialsProvider implements CredentialsProvider {
  readonly name = "static";
  private credentials: AwsCredentials;

  constructor(credentials: AwsCredentials) {
    this.credentials = credentials;
  }

  async getCredentials(): Promise<AwsCredentials> {
    return this.credentials;
  }
}

/**
 * Environment variables credentials provider.
 */
export class EnvCredentialsProvider implements CredentialsProvider {
  readonly name = "environment";
  private env: NodeJS.ProcessEnv;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.env = env;
  }

  async getCredentials(): Promise<AwsCredentials> {
    const accessKey = this.env.AWS_ACCESS_KEY_ID;
    const secretKey = this.env.AWS_SECRET_ACCESS_KEY;

    if (!accessKey || !secretKey) {
      throw new CredentialsError(
        "AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY must be set",
        "NotFound"
      );
    }

    return new AwsCredentials(accessKey, secretKey, this.env.AWS_SESSION_TOKEN || undefined);
  }
}

/**
 * Profile file credentials provider.
 */
export class ProfileCredentialsProvider implements CredentialsProvider {
  readonly name = "profile";
  private profileName: string;
  private credentialsFilePath?: string;
  private env: NodeJS.ProcessEnv;

  constructor(profileName?: string, credentialsFilePath?: string, env: NodeJS.ProcessEnv = process.env) {
    this.env = env;
    this.profileName = profileName ?? env.AWS_PROFILE ?? "default";
    this.credentialsFilePath = credentialsFilePath;
  }

  async getCredentials(): Promise<AwsCredentials> {
    const filePath = this.getCredentialsFilePath();

    if (!fs.existsSync(filePath)) {
      throw new CredentialsError(`Credentials file not found: ${filePath}`, "ProfileError");
    }

    const content = await fs.promises.readFile(filePath, "utf-8");
    const profiles = parseCredentialsFile(content);

    const profile = profiles[this.profileName];
    if (!profile) {
      throw new CredentialsError(`Profile not found: ${this.profileName}`, "ProfileError");
    }

    const accessKey = profile["aws_access_key_id"];
    const secretKey = profile["aws_secret_access_key"];
    if (!accessKey || !secretKey) {
      throw new CredentialsError(
        `Incomplete credentials in profile: ${this.profileName}`,
        "ProfileError"
      );
    }

    return new AwsCredentials(accessKey, secretKey, profile["aws_session_token"]);
  }

  private getCredentialsFilePath(): string {
    if (this.credentialsFilePath) {
      return this.credentialsFilePath;
    }

    if (this.env.AWS_SHARED_CREDENTIALS_FILE) {
      return this.env.AWS_SHARED_CREDENTIALS_FILE;
    }

    const homeDir = this.env.HOME ?? this.env.USERPROFILE ?? "";
    return path.join(homeDir, ".aws", "credentials");
  }
}

/**
 * Parse an INI-style shared credentials file into profile sections.
 */
export function parseCredentialsFile(content: string): Record<string, Record<string, string>> {
  const result: Record<string, Record<string, string>> = {};
  let current: Record<string, string> | undefined;

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();

    if (!trimmed || trimmed.startsWith("#") || trimmed.startsWith(";")) {
      continue;
    }

    if (trimmed.startsWith("[") && trimmed.endsWith("]")) {
      current = {};
      result[trimmed.slice(1, -1).trim()] = current;
    } else if (current && trimmed.includes("=")) {
      const [key, ...valueParts] = trimmed.split("=");
      current[key.trim()] = valueParts.join("=").trim();
    }
  }

  return result;
}

/**
 * Chain credentials provider that tries multiple sources.
 */
export class ChainCredentialsProvider implements CredentialsProvider {
  readonly name = "chain";
  private providers: CredentialsProvider[];

  constructor(providers?: CredentialsProvider[]) {
    this.providers = providers ?? [new EnvCredentialsProvider(), new ProfileCredentialsProvider()];
  }

  async getCredentials(): Promise<AwsCredentials> {
    const errors: string[] = [];

    for (const provider of this.providers) {
      try {
        return await provider.getCredentials();
      } catch (error) {
        errors.push(`${provider.name}: ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    throw new CredentialsError(`No credentials found. Tried: ${errors.join("; ")}`, "NotFound");
  }
}
