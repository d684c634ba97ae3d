import { describe, expect, it } from 'vitest';

import { IntegrityError } from '../src/errors';
import { computeDigests, integrityError, verify, verifyTarget } from '../src/validator';

import { md5, sha256 } from './helpers/fakes';

import type { ExpectedMetadata } from '../src/validator';

const content = Buffer.from('hello artifact');

describe('computeDigests', () => {
  it('returns size and both digests', () => {
    expect(computeDigests(content)).toEqual({
      size: 14,
      digests: { md5: md5(content), sha256: sha256(content) },
    });
  });
});

describe('verify', () => {
  it('passes when size and checksum match', () => {
    expect(verify(content, { size: 14, checksum: { algorithm: 'md5', value: md5(content) } })).toEqual({ ok: true });
  });

  it('compares checksums case-insensitively', () => {
    const upper = sha256(content).toUpperCase();
    expect(verify(content, { checksum: { algorithm: 'sha256', value: upper } })).toEqual({ ok: true });
  });

  it('accepts a precomputed digest', () => {
    const digest = computeDigests(content);
    expect(verify(digest, { size: 14 })).toEqual({ ok: true });
  });

  it('reports every mismatching field', () => {
    const result = verify(
      content,
      { id: 'a', size: 15, checksum: { algorithm: 'md5', value: 'ABC' }, contentType: 'text/plain' },
      { id: 'b', contentType: 'application/json' }
    );

    expect(result).toEqual({
      ok: false,
      mismatches: [
        { field: 'size', expected: '15', actual: '14' },
        { field: 'checksum', algorithm: 'md5', expected: 'abc', actual: md5(content) },
        { field: 'identity', expected: 'a', actual: 'b' },
        { field: 'contentType', expected: 'text/plain', actual: 'application/json' },
      ],
    });
  });

  it('gives the same answer on every call and leaves its inputs alone', () => {
    const input = Buffer.from(content);
    const digest = computeDigests(content);
    const expected: ExpectedMetadata = { id: 'a', size: 15, checksum: { algorithm: 'md5', value: md5(content) } };
    const expectedBefore = structuredClone(expected);
    const digestBefore = structuredClone(digest);

    const fromBytes = verify(input, expected, { id: 'a' });
    const fromDigest = verify(digest, expected, { id: 'a' });

    expect(verify(input, expected, { id: 'a' })).toEqual(fromBytes);
    expect(verify(digest, expected, { id: 'a' })).toEqual(fromDigest);
    expect(fromDigest).toEqual(fromBytes);
    expect(fromBytes).toEqual({ ok: false, mismatches: [{ field: 'size', expected: '15', actual: '14' }] });
    expect(input.equals(content)).toBe(true);
    expect(expected).toEqual(expectedBefore);
    expect(digest).toEqual(digestBefore);
  });

  it('skips fields the source did not declare', () => {
    expect(verify(content, {}, { contentType: 'text/plain' })).toEqual({ ok: true });
  });
});

describe('verifyTarget', () => {
  const digest = computeDigests(content);

  it('accepts a confirmation in either algorithm', () => {
    expect(
      verifyTarget(digest, { id: 'a' }, { id: 'a', size: 14, checksum: { algorithm: 'md5', value: md5(content) } })
    ).toEqual({ ok: true });
    expect(
      verifyTarget(digest, { id: 'a' }, { id: 'a', size: 14, checksum: { algorithm: 'sha256', value: sha256(content) } })
    ).toEqual({ ok: true });
  });

  it('flags a wrong checksum and identity', () => {
    const result = verifyTarget(
      digest,
      { id: 'a' },
      { id: 'b', size: 14, checksum: { algorithm: 'sha256', value: 'ff' } }
    );

    expect(result).toEqual({
      ok: false,
      mismatches: [
        { field: 'checksum', algorithm: 'sha256', expected: sha256(content), actual: 'ff' },
        { field: 'identity', expected: 'a', actual: 'b' },
      ],
    });
  });
});

describe('integrityError', () => {
  it('is undefined when verification passed', () => {
    expect(integrityError('a', 'source', { ok: true })).toBeUndefined();
  });

  it('summarizes the mismatches', () => {
    const error = integrityError('a', 'target', {
      ok: false,
      mismatches: [{ field: 'size', expected: '2', actual: '1' }],
    });

    expect(error).toBeInstanceOf(IntegrityError);
    expect(error?.message).toBe('Integrity check failed on target for a: size expected 2, got 1');
    expect(error?.retryable).toBe(false);
  });
});
