// Node.js built-in modules
import * as crypto from 'node:crypto';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { Readable, Transform } from 'node:stream';
import { pipeline } from 'node:stream/promises';

// Third-party dependencies
import * as fsExtra from 'fs-extra';
import { v4 as uuidv4 } from 'uuid';

// Local imports
import { errorMessageOf } from './errors';
import { logVerbose, logWarning } from './logger';
import { formatBytes } from './utils';

// Types
import type { ContentDigest } from './validator';

export enum SpoolMode {
  MEMORY = 'memory', // Small artifacts, kept as a Buffer
  DISK = 'disk', // Large artifacts, written to a temporary file
}

export interface SpoolOptions {
  name: string; // Artifact id, used for the temp file name
  sizeHint: number;
  memoryThreshold: number;
  tempDir: string;
}

/**
 * Source content read exactly once, with digests computed on the way in.
 * The bytes can be re-opened for the upload after validation passed.
 */
export interface SpooledContent extends ContentDigest {
  mode: SpoolMode;
  open(): Readable;
  /** Closes any stream `open()` handed out and deletes spooled bytes */
  dispose(): Promise<void>;
}

/**
 * Pick a spool mode from the declared size
 */
export function selectSpoolMode(sizeHint: number, memoryThreshold: number): SpoolMode {
  return sizeHint <= memoryThreshold ? SpoolMode.MEMORY : SpoolMode.DISK;
}

/**
 * Drain a source body into memory or a temp file, hashing every chunk
 */
export async function spoolContent(body: Readable, options: SpoolOptions): Promise<SpooledContent> {
  const md5 = crypto.createHash('md5');
  const sha256 = crypto.createHash('sha256');
  let size = 0;

  const hasher = new Transform({
    transform(chunk: Buffer, _encoding, callback) {
      md5.update(chunk);
      sha256.update(chunk);
      size += chunk.length;
      callback(null, chunk);
    },
  });

  const mode = selectSpoolMode(options.sizeHint, options.memoryThreshold);

  if (mode === SpoolMode.MEMORY) {
    const chunks: Buffer[] = [];
    await pipeline(body, hasher, async (source: AsyncIterable<Buffer>) => {
      for await (const chunk of source) {
        chunks.push(chunk);
      }
    });
    const buffer = Buffer.concat(chunks);

    return {
      mode,
      size,
      digests: { md5: md5.digest('hex'), sha256: sha256.digest('hex') },
      open: () => Readable.from([buffer], { objectMode: false }),
      dispose: async () => undefined,
    };
  }

  await fsExtra.ensureDir(options.tempDir);
  const tempFilePath = path.join(options.tempDir, `${uuidv4()}-${path.basename(options.name)}`);
  logVerbose(`Spooling ${options.name} (${formatBytes(options.sizeHint)}) to ${tempFilePath}`);

  try {
    await pipeline(body, hasher, fs.createWriteStream(tempFilePath));
  } catch (error) {
    await removeTempFile(tempFilePath);
    throw error;
  }

  // A target may reject before it consumes the stream; dispose closes those
  const opened: fs.ReadStream[] = [];

  return {
    mode,
    size,
    digests: { md5: md5.digest('hex'), sha256: sha256.digest('hex') },
    open: () => {
      const stream = fs.createReadStream(tempFilePath);
      opened.push(stream);
      return stream;
    },
    dispose: async () => {
      opened.splice(0).forEach(stream => stream.destroy());
      await removeTempFile(tempFilePath);
    },
  };
}

async function removeTempFile(tempFilePath: string): Promise<void> {
  try {
    await fsExtra.remove(tempFilePath);
    logVerbose(`Removed temporary file: ${tempFilePath}`);
  } catch (error) {
    logWarning(`Failed to remove temporary file ${tempFilePath}: ${errorMessageOf(error)}`);
  }
}
