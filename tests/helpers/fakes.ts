import * as crypto from 'node:crypto';
import { Readable } from 'node:stream';

import { ArtifactNotFoundError } from '../../src/errors';
import { TransferState } from '../../src/types';

import type { CheckpointStore, TransferRecordUpdate } from '../../src/checkpoint-store';
import type {
  ArtifactDescriptor,
  ArtifactSource,
  ArtifactTarget,
  SourceObject,
  WriteConfirmation,
  WriteMetadata,
} from '../../src/types';

export function md5(content: Buffer): string {
  return crypto.createHash('md5').update(content).digest('hex');
}

export function sha256(content: Buffer): string {
  return crypto.createHash('sha256').update(content).digest('hex');
}

export interface FakeArtifact {
  id: string;
  content: Buffer;
  contentType?: string;
}

export function artifact(id: string, content = `content of ${id}`, contentType?: string): FakeArtifact {
  return { id, content: Buffer.from(content), contentType };
}

async function drain(body: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of body) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks);
}

/**
 * In-process source. Failures and corruptions are queued per artifact and
 * consumed one read at a time.
 */
export class FakeSource implements ArtifactSource {
  readonly reads = new Map<string, number>();
  private readonly artifacts = new Map<string, FakeArtifact>();
  private readonly failures = new Map<string, unknown[]>();
  private readonly corruptions = new Map<string, number>();
  private readonly gates = new Map<string, Promise<void>>();

  constructor(artifacts: FakeArtifact[]) {
    artifacts.forEach(item => this.artifacts.set(item.id, item));
  }

  add(item: FakeArtifact): void {
    this.artifacts.set(item.id, item);
  }

  remove(id: string): void {
    this.artifacts.delete(id);
  }

  failReads(id: string, ...errors: unknown[]): void {
    this.failures.set(id, [...(this.failures.get(id) ?? []), ...errors]);
  }

  /** The next `times` reads of `id` return bytes that do not match the listing */
  corruptReads(id: string, times = 1): void {
    this.corruptions.set(id, times);
  }

  /** Reads of `id` wait until `gate` resolves */
  holdReads(id: string, gate: Promise<void>): void {
    this.gates.set(id, gate);
  }

  readCount(id: string): number {
    return this.reads.get(id) ?? 0;
  }

  async *list(): AsyncGenerator<ArtifactDescriptor> {
    const ids = [...this.artifacts.keys()].sort();
    for (const id of ids) {
      const item = this.artifacts.get(id);
      if (item) {
        yield {
          id,
          size: item.content.length,
          checksum: { algorithm: 'md5', value: md5(item.content) },
          contentType: item.contentType,
        };
      }
    }
  }

  async read(id: string): Promise<SourceObject> {
    this.reads.set(id, this.readCount(id) + 1);
    await this.gates.get(id);

    const failure = this.failures.get(id)?.shift();
    if (failure !== undefined) {
      throw failure;
    }

    const item = this.artifacts.get(id);
    if (!item) {
      throw new ArtifactNotFoundError(id);
    }

    let content = item.content;
    const corrupt = this.corruptions.get(id) ?? 0;
    if (corrupt > 0) {
      this.corruptions.set(id, corrupt - 1);
      content = Buffer.from(content);
      content[0] = content[0] ^ 0xff;
    }

    return {
      body: Readable.from([content], { objectMode: false }),
      size: item.content.length,
      contentType: item.contentType,
      metadata: { origin: 'fake' },
    };
  }
}

export interface StoredObject {
  content: Buffer;
  metadata: WriteMetadata;
}

/**
 * In-process target recording every write
 */
export class FakeTarget implements ArtifactTarget {
  readonly objects = new Map<string, StoredObject>();
  readonly writes: string[] = [];
  private readonly failures = new Map<string, unknown[]>();
  private readonly tampered = new Set<string>();
  private allFailure: unknown;

  failWrites(id: string, ...errors: unknown[]): void {
    this.failures.set(id, [...(this.failures.get(id) ?? []), ...errors]);
  }

  /** Every write fails with `error` until cleared */
  failAllWrites(error: unknown): void {
    this.allFailure = error;
  }

  /** The confirmation for `id` reports a checksum that does not match */
  tamperConfirmation(id: string): void {
    this.tampered.add(id);
  }

  writeCount(id: string): number {
    return this.writes.filter(written => written === id).length;
  }

  async write(id: string, body: Readable, metadata: WriteMetadata): Promise<WriteConfirmation> {
    this.writes.push(id);
    const content = await drain(body);

    if (this.allFailure !== undefined) {
      throw this.allFailure;
    }
    const failure = this.failures.get(id)?.shift();
    if (failure !== undefined) {
      throw failure;
    }

    this.objects.set(id, { content, metadata });
    return {
      id,
      size: content.length,
      checksum: {
        algorithm: 'sha256',
        value: this.tampered.has(id) ? sha256(Buffer.from('tampered')) : sha256(content),
      },
      contentType: metadata.contentType,
    };
  }
}

export async function listAll(source: ArtifactSource): Promise<ArtifactDescriptor[]> {
  const artifacts: ArtifactDescriptor[] = [];
  for await (const descriptor of source.list()) {
    artifacts.push(descriptor);
  }
  return artifacts;
}

const SEED_PATHS: Record<TransferState, TransferState[]> = {
  [TransferState.PENDING]: [TransferState.PENDING],
  [TransferState.IN_PROGRESS]: [TransferState.IN_PROGRESS],
  [TransferState.VALIDATED]: [TransferState.IN_PROGRESS, TransferState.VALIDATED],
  [TransferState.COMMITTED]: [TransferState.IN_PROGRESS, TransferState.VALIDATED, TransferState.COMMITTED],
  [TransferState.FAILED_RETRYABLE]: [TransferState.IN_PROGRESS, TransferState.FAILED_RETRYABLE],
  [TransferState.FAILED_FATAL]: [TransferState.IN_PROGRESS, TransferState.FAILED_FATAL],
};

/**
 * Write a record straight into `state` through legal transitions
 */
export async function seedRecord(
  store: CheckpointStore,
  runId: string,
  artifactId: string,
  state: TransferState,
  fields: Partial<TransferRecordUpdate> = {}
): Promise<void> {
  let prior: TransferState | null = null;
  for (const next of SEED_PATHS[state]) {
    await store.putRecord(runId, artifactId, { attemptCount: 1, ...fields, state: next }, prior);
    prior = next;
  }
}
