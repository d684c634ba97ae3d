import { describe, expect, it } from 'vitest';

import {
  ArtifactNotFoundError,
  AuthorizationError,
  MalformedRequestError,
  TransientRemoteError,
} from '../src/errors';
import { S3Source, createS3Client, md5FromEtag, toRemoteError } from '../src/s3-client';

function sdkError(name: string, httpStatusCode?: number, headers: Record<string, string> = {}): Error {
  return Object.assign(new Error(`${name} happened`), {
    name,
    $metadata: { httpStatusCode },
    $response: { headers },
  });
}

describe('toRemoteError', () => {
  it('maps credential failures to authorization errors', () => {
    const error = toRemoteError(sdkError('AccessDenied', 403), 'target', 'a.txt');

    expect(error).toBeInstanceOf(AuthorizationError);
    expect(error.message).toBe('target a.txt: AccessDenied happened');
    expect(toRemoteError(sdkError('Unknown', 401), 'source', 'a.txt')).toBeInstanceOf(AuthorizationError);
  });

  it('maps a missing source object to not found', () => {
    const error = toRemoteError(sdkError('NoSuchKey', 404), 'source', 'a.txt');

    expect(error).toBeInstanceOf(ArtifactNotFoundError);
    expect(error.message).toBe('Artifact not found in source: a.txt');
  });

  it('treats a 404 from the target as malformed', () => {
    expect(toRemoteError(sdkError('NotFound', 404), 'target', 'a.txt')).toBeInstanceOf(MalformedRequestError);
    expect(toRemoteError(sdkError('NoSuchBucket', 404), 'target', 'a.txt')).toBeInstanceOf(MalformedRequestError);
  });

  it('retries bodies damaged in transit', () => {
    expect(toRemoteError(sdkError('BadDigest', 400), 'target', 'a.txt')).toBeInstanceOf(TransientRemoteError);
  });

  it('keeps the server retry delay of throttling responses', () => {
    const error = toRemoteError(sdkError('SlowDown', 503, { 'retry-after': '3' }), 'target', 'a.txt');

    expect(error).toBeInstanceOf(TransientRemoteError);
    expect(error).toMatchObject({ statusCode: 503, retryAfterMs: 3000, endpoint: 'target' });
  });

  it('retries network failures', () => {
    const reset = Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' });
    expect(toRemoteError(reset, 'source', 'a.txt')).toBeInstanceOf(TransientRemoteError);
    expect(toRemoteError(sdkError('TooManyRequests', 429), 'source', 'a.txt')).toBeInstanceOf(TransientRemoteError);
  });

  it('passes engine errors through', () => {
    const original = new AuthorizationError('denied');
    expect(toRemoteError(original, 'source', 'a.txt')).toBe(original);
  });
});

describe('md5FromEtag', () => {
  it('reads a quoted single-part ETag', () => {
    expect(md5FromEtag('"9E107D9D372BB6826BD81D3542A419D6"')).toEqual({
      algorithm: 'md5',
      value: '9e107d9d372bb6826bd81d3542a419d6',
    });
  });

  it('ignores multipart and missing ETags', () => {
    expect(md5FromEtag('"9e107d9d372bb6826bd81d3542a419d6-3"')).toBeUndefined();
    expect(md5FromEtag(undefined)).toBeUndefined();
  });

  it('trusts the ETag of SSE-S3 objects only', () => {
    const etag = '"9e107d9d372bb6826bd81d3542a419d6"';

    expect(md5FromEtag(etag, { ServerSideEncryption: 'AES256' })).toEqual({
      algorithm: 'md5',
      value: '9e107d9d372bb6826bd81d3542a419d6',
    });
    expect(md5FromEtag(etag, { ServerSideEncryption: 'aws:kms' })).toBeUndefined();
    expect(md5FromEtag(etag, { ServerSideEncryption: 'aws:kms:dsse' })).toBeUndefined();
    expect(md5FromEtag(etag, { SSECustomerAlgorithm: 'AES256' })).toBeUndefined();
  });
});

describe('S3Source.matches', () => {
  const client = createS3Client({
    endpoint: 'http://localhost:9000',
    accessKey: 'test-access-key',
    secretKey: 'test-secret',
    region: 'us-east-1',
    bucket: 'unused',
  });

  it('applies include and exclude patterns', () => {
    const source = new S3Source(client, 'bucket', { include: ['\\.tar\\.gz$', '^docs/'], exclude: ['^docs/drafts/'] });

    expect(source.matches('releases/v1.tar.gz')).toBe(true);
    expect(source.matches('docs/index.md')).toBe(true);
    expect(source.matches('docs/drafts/todo.md')).toBe(false);
    expect(source.matches('releases/v1.zip')).toBe(false);
  });

  it('matches everything without patterns', () => {
    expect(new S3Source(client, 'bucket').matches('any/key')).toBe(true);
  });
});
