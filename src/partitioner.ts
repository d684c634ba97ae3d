// Types
import type { ArtifactDescriptor, WorkUnit } from './types';

export interface PartitionParams {
  batchArtifactCount: number;
  batchByteSize: number;
}

/**
 * Split an ordered listing into batches.
 *
 * A batch closes when adding the next artifact would exceed either the count
 * or the byte bound. Artifacts are never split; one larger than the byte bound
 * gets a batch of its own. Same input, same batches.
 */
export function partition(artifacts: readonly ArtifactDescriptor[], params: PartitionParams): WorkUnit[] {
  const maxCount = Math.max(1, Math.floor(params.batchArtifactCount));
  const maxBytes = params.batchByteSize > 0 ? params.batchByteSize : Number.POSITIVE_INFINITY;

  const units: WorkUnit[] = [];
  let current: ArtifactDescriptor[] = [];
  let currentBytes = 0;

  const close = (): void => {
    if (current.length > 0) {
      units.push({ index: units.length, artifacts: current, totalBytes: currentBytes });
      current = [];
      currentBytes = 0;
    }
  };

  for (const artifact of artifacts) {
    if (current.length >= maxCount || (current.length > 0 && currentBytes + artifact.size > maxBytes)) {
      close();
    }
    current.push(artifact);
    currentBytes += artifact.size;
  }
  close();

  return units;
}

/**
 * Deal batches round-robin across independent pools. Each pool keeps its
 * batches in their original relative order.
 */
export function assignToPools(units: readonly WorkUnit[], poolCount: number): WorkUnit[][] {
  const count = Math.max(1, Math.floor(poolCount));
  const pools: WorkUnit[][] = Array.from({ length: count }, () => []);
  units.forEach((unit, i) => {
    pools[i % count].push(unit);
  });
  return pools.filter(pool => pool.length > 0);
}
