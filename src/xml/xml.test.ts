/**
 * Tests for S3 XML document parsing
 */

import { describe, it, expect } from 'vitest';
import { parseErrorResponse, parseListBuckets } from './index';
import { normalizeArray, parseDate } from './parser';
import { ResponseError } from '../error';

describe('parseListBuckets', () => {
  it('should return buckets in document order', () => {
    const xml = `<?xml version="1.0" encoding="UTF-8"?>
      <ListAllMyBucketsResult xmlns="http://s3.amazonaws.com/doc/2006-03-01/">
        <Owner>
          <ID>owner-id</ID>
          <DisplayName>owner</DisplayName>
        </Owner>
        <Buckets>
          <Bucket>
            <Name>alpha</Name>
            <CreationDate>2023-01-01T00:00:00Z</CreationDate>
          </Bucket>
          <Bucket>
            <Name>beta</Name>
            <CreationDate>2023-02-01T00:00:00Z</CreationDate>
          </Bucket>
        </Buckets>
      </ListAllMyBucketsResult>`;

    const buckets = parseListBuckets(xml);

    expect(buckets).toHaveLength(2);
    expect(buckets[0].name).toBe('alpha');
    expect(buckets[0].created.toISOString()).toBe('2023-01-01T00:00:00.000Z');
    expect(buckets[1].name).toBe('beta');
    expect(buckets[1].created.toISOString()).toBe('2023-02-01T00:00:00.000Z');
  });

  it('should not reorder buckets', () => {
    const xml =
      '<ListAllMyBucketsResult><Buckets>' +
      '<Bucket><Name>zeta</Name><CreationDate>2023-05-01T00:00:00.000Z</CreationDate></Bucket>' +
      '<Bucket><Name>alpha</Name><CreationDate>2021-05-01T00:00:00.000Z</CreationDate></Bucket>' +
      '</Buckets></ListAllMyBucketsResult>';

    expect(parseListBuckets(xml).map((b) => b.name)).toEqual(['zeta', 'alpha']);
  });

  it('should return an array for a single bucket', () => {
    const xml =
      '<ListAllMyBucketsResult><Buckets>' +
      '<Bucket><Name>only</Name><CreationDate>2023-01-01T00:00:00Z</CreationDate></Bucket>' +
      '</Buckets></ListAllMyBucketsResult>';

    const buckets = parseListBuckets(xml);
    expect(buckets).toHaveLength(1);
    expect(buckets[0].name).toBe('only');
  });

  it('should return no buckets for an empty collection', () => {
    expect(parseListBuckets('<ListAllMyBucketsResult><Buckets/></ListAllMyBucketsResult>')).toEqual([]);
    expect(
      parseListBuckets('<ListAllMyBucketsResult><Buckets></Buckets></ListAllMyBucketsResult>')
    ).toEqual([]);
  });

  it('should decode entities in names', () => {
    const xml =
      '<ListAllMyBucketsResult><Buckets>' +
      '<Bucket><Name>a&amp;b</Name><CreationDate>2023-01-01T00:00:00Z</CreationDate></Bucket>' +
      '</Buckets></ListAllMyBucketsResult>';

    expect(parseListBuckets(xml)[0].name).toBe('a&b');
  });

  it('should reject malformed XML as a parse error', () => {
    let caught: unknown;
    try {
      parseListBuckets('<ListAllMyBucketsResult><Buckets>');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ResponseError);
    expect(caught).toMatchObject({ code: 'Response.XmlParseError' });
  });

  it('should reject a document without Buckets', () => {
    expect(() => parseListBuckets('<ListAllMyBucketsResult></ListAllMyBucketsResult>')).toThrow(
      'Missing Buckets element in ListAllMyBucketsResult'
    );
  });

  it('should reject entries missing a creation date', () => {
    const xml =
      '<ListAllMyBucketsResult><Buckets><Bucket><Name>alpha</Name></Bucket></Buckets></ListAllMyBucketsResult>';

    expect(() => parseListBuckets(xml)).toThrow('Bucket entry 0 is missing Name or CreationDate');
  });

  it('should reject invalid creation dates', () => {
    const xml =
      '<ListAllMyBucketsResult><Buckets>' +
      '<Bucket><Name>alpha</Name><CreationDate>yesterday</CreationDate></Bucket>' +
      '</Buckets></ListAllMyBucketsResult>';

    expect(() => parseListBuckets(xml)).toThrow('Invalid date string: yesterday');
  });
});

describe('parseErrorResponse', () => {
  it('should read the error fields', () => {
    const xml = `<?xml version="1.0" encoding="UTF-8"?>
      <Error>
        <Code>NoSuchBucket</Code>
        <Message>The specified bucket does not exist</Message>
        <BucketName>missing</BucketName>
        <RequestId>req-1</RequestId>
        <HostId>host-1</HostId>
      </Error>`;

    expect(parseErrorResponse(xml)).toEqual({
      code: 'NoSuchBucket',
      message: 'The specified bucket does not exist',
      key: undefined,
      bucket: 'missing',
      requestId: 'req-1',
      hostId: 'host-1',
    });
  });

  it('should default missing code and message', () => {
    expect(parseErrorResponse('<Error></Error>')).toMatchObject({
      code: 'UnknownError',
      message: 'Unknown error',
    });
  });

  it('should return undefined for empty or non-error bodies', () => {
    expect(parseErrorResponse('')).toBeUndefined();
    expect(parseErrorResponse('<html><body>Bad Gateway</body></html>')).toBeUndefined();
    expect(parseErrorResponse('not xml at all <')).toBeUndefined();
  });
});

describe('normalizeArray', () => {
  it('should wrap single values', () => {
    expect(normalizeArray(undefined)).toEqual([]);
    expect(normalizeArray('single')).toEqual(['single']);
    expect(normalizeArray(['a', 'b'])).toEqual(['a', 'b']);
  });
});

describe('parseDate', () => {
  it('should parse ISO 8601 timestamps', () => {
    expect(parseDate('2023-02-01T00:00:00.000Z').getTime()).toBe(Date.UTC(2023, 1, 1));
  });
});
