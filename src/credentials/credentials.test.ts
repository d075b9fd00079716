/**
 * Tests for credentials and providers
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import {
  AwsCredentials,
  ChainCredentialsProvider,
  EnvCredentialsProvider,
  ProfileCredentialsProvider,
  StaticCredentialsProvider,
  createTemporaryCredentials,
  isTemporary,
  parseCredentialsFile,
  type CredentialsProvider,
} from './index';
import { CredentialsError } from '../error';

describe('AwsCredentials', () => {
  it('should produce a base64 HMAC-SHA256 by default', () => {
    const credentials = new AwsCredentials('test-access', 'test-secret');
    expect(credentials.sign('hello')).toBe('vMiJpAZnyrcV4dwirSgGks9L8cOigO7spg2NvNjkuZM=');
  });

  it('should produce a base64 HMAC-SHA1 on request', () => {
    const credentials = new AwsCredentials('test-access', 'test-secret');
    expect(credentials.sign('hello', 'sha1')).toBe('UEkOd028Wp5kjwcfW/i9aRAqUMY=');
  });

  it('should keep the secret out of string and JSON forms', () => {
    const credentials = new AwsCredentials('test-access', 'test-secret');

    expect(String(credentials)).toBe('AwsCredentials(test-access)');
    expect(JSON.stringify(credentials)).toBe('{"accessKey":"test-access","temporary":false}');
  });

  it('should reject empty keys', () => {
    expect(() => new AwsCredentials('', 'test-secret')).toThrow(CredentialsError);
    expect(() => new AwsCredentials('test-access', '')).toThrow('Secret key must not be empty');
  });

  it('should report temporary credentials', () => {
    expect(isTemporary(createTemporaryCredentials('test-access', 'test-secret', 'test-token'))).toBe(true);
    expect(isTemporary(new AwsCredentials('test-access', 'test-secret'))).toBe(false);
  });
});

describe('StaticCredentialsProvider', () => {
  it('should return the given credentials', async () => {
    const credentials = new AwsCredentials('test-access', 'test-secret');
    await expect(new StaticCredentialsProvider(credentials).getCredentials()).resolves.toBe(credentials);
  });
});

describe('EnvCredentialsProvider', () => {
  it('should read keys and session token', async () => {
    const provider = new EnvCredentialsProvider({
      AWS_ACCESS_KEY_ID: 'test-access',
      AWS_SECRET_ACCESS_KEY: 'test-secret',
      AWS_SESSION_TOKEN: 'test-token',
    });

    const credentials = await provider.getCredentials();

    expect(credentials.accessKey).toBe('test-access');
    expect(credentials.sessionToken).toBe('test-token');
  });

  it('should ignore an empty session token', async () => {
    const provider = new EnvCredentialsProvider({
      AWS_ACCESS_KEY_ID: 'test-access',
      AWS_SECRET_ACCESS_KEY: 'test-secret',
      AWS_SESSION_TOKEN: '',
    });

    expect((await provider.getCredentials()).sessionToken).toBeUndefined();
  });

  it('should fail when keys are missing', async () => {
    const provider = new EnvCredentialsProvider({ AWS_ACCESS_KEY_ID: 'test-access' });

    await expect(provider.getCredentials()).rejects.toThrow(
      'AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY must be set'
    );
  });
});

describe('parseCredentialsFile', () => {
  it('should parse sections, skipping comments', () => {
    const profiles = parseCredentialsFile(
      [
        '# shared credentials',
        '[default]',
        'aws_access_key_id = test-access',
        'aws_secret_access_key = test=secret',
        '; staging',
        '[ staging ]',
        'aws_access_key_id=staging-access',
        '',
      ].join('\n')
    );

    expect(profiles).toEqual({
      default: { aws_access_key_id: 'test-access', aws_secret_access_key: 'test=secret' },
      staging: { aws_access_key_id: 'staging-access' },
    });
  });
});

describe('ProfileCredentialsProvider', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 's3-credentials-'));
    file = path.join(dir, 'credentials');
    fs.writeFileSync(
      file,
      [
        '[default]',
        'aws_access_key_id = test-access',
        'aws_secret_access_key = test-secret',
        '[partial]',
        'aws_access_key_id = partial-access',
      ].join('\n')
    );
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should read the default profile', async () => {
    const credentials = await new ProfileCredentialsProvider(undefined, file, {}).getCredentials();
    expect(credentials.accessKey).toBe('test-access');
  });

  it('should take the file and profile from the environment', async () => {
    const provider = new ProfileCredentialsProvider(undefined, undefined, {
      AWS_PROFILE: 'partial',
      AWS_SHARED_CREDENTIALS_FILE: file,
    });

    await expect(provider.getCredentials()).rejects.toThrow('Incomplete credentials in profile: partial');
  });

  it('should fail for an unknown profile', async () => {
    await expect(new ProfileCredentialsProvider('missing', file, {}).getCredentials()).rejects.toThrow(
      'Profile not found: missing'
    );
  });

  it('should fail when the file does not exist', async () => {
    const missing = path.join(dir, 'absent');
    await expect(new ProfileCredentialsProvider('default', missing, {}).getCredentials()).rejects.toThrow(
      `Credentials file not found: ${missing}`
    );
  });
});

describe('ChainCredentialsProvider', () => {
  const failing: CredentialsProvider = {
    name: 'first',
    getCredentials: async () => {
      throw new CredentialsError('nothing here', 'NotFound');
    },
  };

  it('should return the first provider that succeeds', async () => {
    const credentials = new AwsCredentials('test-access', 'test-secret');
    const chain = new ChainCredentialsProvider([failing, new StaticCredentialsProvider(credentials)]);

    await expect(chain.getCredentials()).resolves.toBe(credentials);
  });

  it('should report every failure', async () => {
    const chain = new ChainCredentialsProvider([failing, new EnvCredentialsProvider({})]);

    await expect(chain.getCredentials()).rejects.toThrow(
      'No credentials found. Tried: first: nothing here; environment: AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY must be set'
    );
  });
});
