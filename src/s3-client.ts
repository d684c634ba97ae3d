// Node.js built-in modules
import * as crypto from 'node:crypto';
import { Readable } from 'node:stream';

// Third-party dependencies
import {
  AbortMultipartUploadCommand,
  CompleteMultipartUploadCommand,
  CreateMultipartUploadCommand,
  GetObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
  UploadPartCommand,
} from '@aws-sdk/client-s3';

// Local imports
import {
  ArtifactNotFoundError,
  AuthorizationError,
  errorMessageOf,
  MalformedRequestError,
  MigrationError,
  TransientRemoteError,
} from './errors';
import { logError, logVerbose } from './logger';
import { readProperty, statusCodeOf } from './retry-classifier';
import { formatBytes } from './utils';

// Types
import type { CompletedPart, ListObjectsV2CommandOutput, S3ClientConfig } from '@aws-sdk/client-s3';
import type { RemoteEndpoint } from './errors';
import type {
  ArtifactDescriptor,
  ArtifactSource,
  ArtifactTarget,
  Checksum,
  S3Credentials,
  SourceObject,
  WriteConfirmation,
  WriteMetadata,
} from './types';

export const DEFAULT_MULTIPART_THRESHOLD = 64 * 1024 * 1024; // 64MB

const AUTH_ERROR_NAMES = new Set(['AccessDenied', 'InvalidAccessKeyId', 'SignatureDoesNotMatch', 'ExpiredToken']);
const NOT_FOUND_ERROR_NAMES = new Set(['NoSuchKey', 'NotFound']);
// The body was damaged on the way; sending it again may succeed
const CORRUPT_IN_TRANSIT_ERROR_NAMES = new Set(['BadDigest', 'XAmzContentSHA256Mismatch', 'IncompleteBody']);
const MALFORMED_ERROR_NAMES = new Set(['NoSuchBucket', 'InvalidArgument', 'InvalidRequest', 'EntityTooLarge', 'InvalidBucketName']);

/**
 * Create an S3 client from credentials
 */
export function createS3Client(credentials: S3Credentials): S3Client {
  const clientConfig: S3ClientConfig = {
    endpoint: credentials.endpoint,
    region: credentials.region,
    credentials: {
      accessKeyId: credentials.accessKey,
      secretAccessKey: credentials.secretKey,
    },
    forcePathStyle: credentials.forcePathStyle ?? false,
  };

  return new S3Client(clientConfig);
}

function retryAfterMsOf(error: unknown): number | undefined {
  const headers = readProperty(readProperty(error, '$response'), 'headers');
  const value = readProperty(headers, 'retry-after');
  if (typeof value !== 'string') {
    return undefined;
  }
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}

/**
 * Map an S3 SDK (or network) failure onto the engine's error taxonomy
 */
export function toRemoteError(error: unknown, endpoint: RemoteEndpoint, key: string): MigrationError {
  if (error instanceof MigrationError) {
    return error;
  }

  const name = readProperty(error, 'name');
  const errorName = typeof name === 'string' ? name : '';
  const status = statusCodeOf(error);
  const message = `${endpoint} ${key}: ${errorMessageOf(error)}`;

  if (AUTH_ERROR_NAMES.has(errorName) || status === 401 || status === 403) {
    return new AuthorizationError(message, endpoint, error);
  }
  if (endpoint === 'source' && (NOT_FOUND_ERROR_NAMES.has(errorName) || status === 404)) {
    return new ArtifactNotFoundError(key, error);
  }
  if (CORRUPT_IN_TRANSIT_ERROR_NAMES.has(errorName)) {
    return new TransientRemoteError(message, { endpoint, statusCode: status, cause: error });
  }
  if (
    MALFORMED_ERROR_NAMES.has(errorName) ||
    (status !== undefined && status >= 400 && status < 500 && status !== 408 && status !== 429)
  ) {
    return new MalformedRequestError(message, error);
  }

  // Throttling, 5xx, timeouts, connection resets and anything unrecognised
  return new TransientRemoteError(message, {
    endpoint,
    statusCode: status,
    retryAfterMs: retryAfterMsOf(error),
    cause: error,
  });
}

/**
 * How a stored object is encrypted, as reported on GetObject and PutObject
 * responses
 */
export interface ObjectEncryption {
  ServerSideEncryption?: string;
  SSECustomerAlgorithm?: string;
}

/**
 * MD5 carried by a single-part ETag. Multipart ETags ("<hash>-<parts>") are
 * not content digests, and neither are the ETags of objects encrypted with
 * KMS or a customer-provided key.
 */
export function md5FromEtag(etag: string | undefined, encryption: ObjectEncryption = {}): Checksum | undefined {
  if (encryption.SSECustomerAlgorithm) {
    return undefined;
  }
  if (encryption.ServerSideEncryption && encryption.ServerSideEncryption !== 'AES256') {
    return undefined;
  }

  const value = etag?.replace(/"/g, '');
  if (!value || !/^[0-9a-f]{32}$/i.test(value)) {
    return undefined;
  }
  return { algorithm: 'md5', value: value.toLowerCase() };
}

function hexToBase64(hex: string): string {
  return Buffer.from(hex, 'hex').toString('base64');
}

function calculateOptimalPartSize(fileSize: number): number {
  // Default minimum size - 5MB (the minimum allowed by S3)
  const minPartSize = 5 * 1024 * 1024;

  if (fileSize <= 100 * 1024 * 1024) {
    return minPartSize;
  }
  if (fileSize <= 1 * 1024 * 1024 * 1024) {
    return 10 * 1024 * 1024;
  }
  if (fileSize <= 10 * 1024 * 1024 * 1024) {
    return 25 * 1024 * 1024;
  }
  // Keeps very large objects under the 10,000 part limit
  return 50 * 1024 * 1024;
}

export interface S3SourceOptions {
  prefix?: string;
  include?: string[]; // Regular expressions; a key must match one of them
  exclude?: string[]; // Regular expressions; a matching key is skipped
}

/**
 * Read-only view of the source bucket
 */
export class S3Source implements ArtifactSource {
  private readonly include: RegExp[];
  private readonly exclude: RegExp[];

  constructor(
    private readonly client: S3Client,
    private readonly bucket: string,
    private readonly options: S3SourceOptions = {}
  ) {
    this.include = (options.include ?? []).map(pattern => new RegExp(pattern));
    this.exclude = (options.exclude ?? []).map(pattern => new RegExp(pattern));
  }

  matches(key: string): boolean {
    if (this.include.length > 0 && !this.include.some(pattern => pattern.test(key))) {
      return false;
    }
    return !this.exclude.some(pattern => pattern.test(key));
  }

  /**
   * List all objects in the bucket with pagination
   */
  async *list(): AsyncGenerator<ArtifactDescriptor> {
    let continuationToken: string | undefined;

    do {
      const command = new ListObjectsV2Command({
        Bucket: this.bucket,
        Prefix: this.options.prefix || undefined,
        ContinuationToken: continuationToken,
        MaxKeys: 1000,
      });

      let response: ListObjectsV2CommandOutput;
      try {
        response = await this.client.send(command);
      } catch (error) {
        throw toRemoteError(error, 'source', this.options.prefix ?? '/');
      }

      for (const item of response.Contents ?? []) {
        if (!item.Key || item.Key.endsWith('/') || !this.matches(item.Key)) {
          continue;
        }
        // Listings do not say how an object is encrypted; read() reports the digest
        yield {
          id: item.Key,
          size: item.Size ?? 0,
        };
      }

      continuationToken = response.NextContinuationToken;
    } while (continuationToken);
  }

  async read(key: string): Promise<SourceObject> {
    try {
      const response = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }));
      if (!(response.Body instanceof Readable)) {
        throw new TransientRemoteError(`source ${key}: response has no readable body`, { endpoint: 'source' });
      }

      return {
        body: response.Body,
        size: response.ContentLength ?? 0,
        checksum: md5FromEtag(response.ETag, response),
        contentType: response.ContentType,
        metadata: response.Metadata ?? {},
      };
    } catch (error) {
      throw toRemoteError(error, 'source', key);
    }
  }
}

export interface S3TargetOptions {
  multipartThreshold?: number;
}

/**
 * Write-only view of the target bucket
 */
export class S3Target implements ArtifactTarget {
  private readonly multipartThreshold: number;

  constructor(
    private readonly client: S3Client,
    private readonly bucket: string,
    options: S3TargetOptions = {}
  ) {
    this.multipartThreshold = options.multipartThreshold ?? DEFAULT_MULTIPART_THRESHOLD;
  }

  async write(key: string, body: Readable, metadata: WriteMetadata): Promise<WriteConfirmation> {
    try {
      if (metadata.size <= this.multipartThreshold) {
        return await this.putObject(key, body, metadata);
      }
      return await this.multipartUpload(key, body, metadata);
    } catch (error) {
      throw toRemoteError(error, 'target', key);
    }
  }

  private async putObject(key: string, body: Readable, metadata: WriteMetadata): Promise<WriteConfirmation> {
    const response = await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: body,
        ContentLength: metadata.size,
        ContentType: metadata.contentType,
        ContentMD5: hexToBase64(metadata.checksums.md5),
        Metadata: metadata.metadata,
      })
    );

    const checksum = md5FromEtag(response.ETag, response);
    if (checksum) {
      return { id: key, size: metadata.size, checksum };
    }

    // KMS or SSE-C encrypted objects and some non-AWS targets return no MD5 ETag
    logVerbose(`ETag of ${key} is not a content digest, reading it back`);
    return this.readBack(key);
  }

  /**
   * Multipart upload for large bodies, then a read-back digest: the ETag of a
   * multipart object is not a content checksum.
   */
  private async multipartUpload(key: string, body: Readable, metadata: WriteMetadata): Promise<WriteConfirmation> {
    const partSize = calculateOptimalPartSize(metadata.size);
    logVerbose(`Using part size of ${formatBytes(partSize)} for upload of ${key}`);

    const created = await this.client.send(
      new CreateMultipartUploadCommand({
        Bucket: this.bucket,
        Key: key,
        ContentType: metadata.contentType,
        Metadata: metadata.metadata,
      })
    );
    const uploadId = created.UploadId;
    if (!uploadId) {
      throw new TransientRemoteError(`target ${key}: failed to initialize multipart upload`, { endpoint: 'target' });
    }

    try {
      const parts: CompletedPart[] = [];
      let buffered: Buffer[] = [];
      let bufferedSize = 0;

      const uploadPart = async (): Promise<void> => {
        const partNumber = parts.length + 1;
        const partBuffer = Buffer.concat(buffered);
        buffered = [];
        bufferedSize = 0;

        logVerbose(`Uploading part ${partNumber} (${formatBytes(partBuffer.length)}) for ${key}`);
        const response = await this.client.send(
          new UploadPartCommand({
            Bucket: this.bucket,
            Key: key,
            PartNumber: partNumber,
            UploadId: uploadId,
            Body: partBuffer,
            ContentMD5: crypto.createHash('md5').update(partBuffer).digest('base64'),
          })
        );
        if (!response.ETag) {
          throw new TransientRemoteError(`target ${key}: missing ETag for part ${partNumber}`, { endpoint: 'target' });
        }
        parts.push({ ETag: response.ETag, PartNumber: partNumber });
      };

      for await (const chunk of body) {
        const data = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
        buffered.push(data);
        bufferedSize += data.length;
        if (bufferedSize >= partSize) {
          await uploadPart();
        }
      }
      if (bufferedSize > 0 || parts.length === 0) {
        await uploadPart();
      }

      logVerbose(`Completing multipart upload for ${key} with ${parts.length} parts`);
      await this.client.send(
        new CompleteMultipartUploadCommand({
          Bucket: this.bucket,
          Key: key,
          UploadId: uploadId,
          MultipartUpload: { Parts: parts },
        })
      );
    } catch (error) {
      await this.abortMultipartUpload(key, uploadId);
      throw error;
    }

    return this.readBack(key);
  }

  private async abortMultipartUpload(key: string, uploadId: string): Promise<void> {
    try {
      await this.client.send(new AbortMultipartUploadCommand({ Bucket: this.bucket, Key: key, UploadId: uploadId }));
      logVerbose(`Aborted multipart upload for ${key} (UploadId: ${uploadId})`);
    } catch (abortError) {
      logError(`Failed to abort multipart upload for ${key}: ${errorMessageOf(abortError)}`);
    }
  }

  /**
   * SHA-256 of the stored object, streamed back from the target
   */
  private async readBack(key: string): Promise<WriteConfirmation> {
    const response = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }));
    if (!(response.Body instanceof Readable)) {
      throw new TransientRemoteError(`target ${key}: read-back has no readable body`, { endpoint: 'target' });
    }

    const hash = crypto.createHash('sha256');
    let size = 0;
    for await (const chunk of response.Body) {
      const data = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      hash.update(data);
      size += data.length;
    }

    return {
      id: key,
      size,
      checksum: { algorithm: 'sha256', value: hash.digest('hex') },
      contentType: response.ContentType,
    };
  }
}
