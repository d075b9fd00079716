/**
 * Tests for S3 error mapping
 */

import { describe, it, expect } from 'vitest';
import {
  AccessError,
  BucketError,
  ObjectError,
  S3Error,
  ServerError,
  errorFromStatus,
  mapS3ErrorCode,
} from './index';

describe('mapS3ErrorCode', () => {
  it('should map bucket codes', () => {
    const error = mapS3ErrorCode('NoSuchBucket', {
      code: 'NoSuchBucket',
      message: 'The specified bucket does not exist',
      bucket: 'missing',
      requestId: 'req-1',
    });

    expect(error).toBeInstanceOf(BucketError);
    expect(error).toBeInstanceOf(S3Error);
    expect(error).toMatchObject({
      name: 'BucketError',
      code: 'Bucket.NotFound',
      bucket: 'missing',
      requestId: 'req-1',
      retryable: false,
    });
  });

  it('should map object codes', () => {
    const error = mapS3ErrorCode('NoSuchKey', { code: 'NoSuchKey', message: 'gone', key: 'a.txt' }, 404);

    expect(error).toBeInstanceOf(ObjectError);
    expect(error).toMatchObject({ code: 'Object.NotFound', key: 'a.txt', statusCode: 404 });
  });

  it('should map signature failures to access errors', () => {
    const error = mapS3ErrorCode('SignatureDoesNotMatch');

    expect(error).toBeInstanceOf(AccessError);
    expect(error.code).toBe('Access.SignatureDoesNotMatch');
    expect(error.message).toBe('SignatureDoesNotMatch');
  });

  it('should mark server errors retryable', () => {
    const error = mapS3ErrorCode('SlowDown', { code: 'SlowDown', message: 'Reduce your request rate.' }, 503);

    expect(error).toBeInstanceOf(ServerError);
    expect(error).toMatchObject({ code: 'Server.SlowDown', retryable: true, statusCode: 503 });
  });

  it('should keep unknown codes on the base class', () => {
    const error = mapS3ErrorCode('InvalidStorageClass', { code: 'InvalidStorageClass', message: 'nope' });

    expect(error.constructor).toBe(S3Error);
    expect(error.code).toBe('InvalidStorageClass');
    expect(error.message).toBe('nope');
  });
});

describe('errorFromStatus', () => {
  it('should map 403 to access denied', () => {
    expect(errorFromStatus(403, 'Forbidden')).toMatchObject({
      code: 'Access.AccessDenied',
      message: '403 Forbidden',
      statusCode: 403,
    });
  });

  it('should use a generic code for other statuses', () => {
    expect(errorFromStatus(418, '')).toMatchObject({ code: 'Http.418', message: 'HTTP 418', retryable: false });
  });
});
