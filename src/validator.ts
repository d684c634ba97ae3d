/**
 * Content integrity checks between the source's declared metadata, the bytes
 * actually read, and what the target confirms after the write.
 * All functions here are pure.
 */

// Node.js built-in modules
import * as crypto from 'node:crypto';

// Local imports
import { IntegrityError } from './errors';

// Types
import type { IntegrityMismatch } from './errors';
import type { Checksum, DigestAlgorithm, WriteConfirmation } from './types';

export interface ContentDigest {
  size: number;
  digests: Record<DigestAlgorithm, string>;
}

export interface ExpectedMetadata {
  id?: string;
  size?: number;
  checksum?: Checksum;
  contentType?: string;
}

export interface ObservedMetadata {
  id?: string;
  contentType?: string;
}

export type VerifyResult = { ok: true } | { ok: false; mismatches: IntegrityMismatch[] };

export function computeDigests(content: Buffer): ContentDigest {
  const hash = (algorithm: DigestAlgorithm): string =>
    crypto.createHash(algorithm).update(content).digest('hex');

  return {
    size: content.length,
    digests: { md5: hash('md5'), sha256: hash('sha256') },
  };
}

function isContentDigest(content: Buffer | ContentDigest): content is ContentDigest {
  return !Buffer.isBuffer(content);
}

/**
 * Compare content (or its precomputed digest) with the expected metadata.
 * Only the fields present in `expected` are checked.
 */
export function verify(
  content: Buffer | ContentDigest,
  expected: ExpectedMetadata,
  observed: ObservedMetadata = {}
): VerifyResult {
  const digest = isContentDigest(content) ? content : computeDigests(content);
  const mismatches: IntegrityMismatch[] = [];

  if (expected.size !== undefined && expected.size !== digest.size) {
    mismatches.push({ field: 'size', expected: String(expected.size), actual: String(digest.size) });
  }

  if (expected.checksum) {
    const actual = digest.digests[expected.checksum.algorithm];
    if (actual.toLowerCase() !== expected.checksum.value.toLowerCase()) {
      mismatches.push({
        field: 'checksum',
        algorithm: expected.checksum.algorithm,
        expected: expected.checksum.value.toLowerCase(),
        actual: actual.toLowerCase(),
      });
    }
  }

  if (expected.id !== undefined && observed.id !== undefined && expected.id !== observed.id) {
    mismatches.push({ field: 'identity', expected: expected.id, actual: observed.id });
  }

  if (
    expected.contentType !== undefined &&
    observed.contentType !== undefined &&
    expected.contentType !== observed.contentType
  ) {
    mismatches.push({ field: 'contentType', expected: expected.contentType, actual: observed.contentType });
  }

  return mismatches.length === 0 ? { ok: true } : { ok: false, mismatches };
}

/**
 * Close the loop after a write: the target's confirmed checksum and size must
 * match what was read from the source.
 */
export function verifyTarget(
  source: ContentDigest,
  expected: { id: string; contentType?: string },
  confirmation: WriteConfirmation
): VerifyResult {
  const mismatches: IntegrityMismatch[] = [];

  if (confirmation.size !== source.size) {
    mismatches.push({ field: 'size', expected: String(source.size), actual: String(confirmation.size) });
  }

  const { algorithm, value } = confirmation.checksum;
  if (source.digests[algorithm].toLowerCase() !== value.toLowerCase()) {
    mismatches.push({
      field: 'checksum',
      algorithm,
      expected: source.digests[algorithm].toLowerCase(),
      actual: value.toLowerCase(),
    });
  }

  if (confirmation.id !== expected.id) {
    mismatches.push({ field: 'identity', expected: expected.id, actual: confirmation.id });
  }

  if (
    expected.contentType !== undefined &&
    confirmation.contentType !== undefined &&
    expected.contentType !== confirmation.contentType
  ) {
    mismatches.push({ field: 'contentType', expected: expected.contentType, actual: confirmation.contentType });
  }

  return mismatches.length === 0 ? { ok: true } : { ok: false, mismatches };
}

export function integrityError(
  artifactId: string,
  stage: 'source' | 'target',
  result: VerifyResult
): IntegrityError | undefined {
  return result.ok ? undefined : new IntegrityError(artifactId, stage, result.mismatches);
}
