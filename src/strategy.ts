// Local imports
import { logVerbose } from './logger';
import { formatBytes } from './utils';

// Types
import type { ArtifactDescriptor, EngineConfig, SizeEstimate, StrategyHint, StrategyName, StrategyParams } from './types';

const MiB = 1024 * 1024;
const GiB = 1024 * MiB;

export const SMALL_SCALE_LIMIT = 100 * MiB;
export const MEDIUM_SCALE_LIMIT = 100 * GiB;

export const STRATEGY_PRESETS: Record<StrategyName, StrategyParams> = {
  // One artifact at a time, each one its own transaction
  small: {
    name: 'small',
    concurrencyLimit: 1,
    batchArtifactCount: 1,
    batchByteSize: 0,
    maxRetries: 3,
    poolCount: 1,
  },
  medium: {
    name: 'medium',
    concurrencyLimit: 10,
    batchArtifactCount: 100,
    batchByteSize: 1 * GiB,
    maxRetries: 3,
    poolCount: 1,
  },
  // Independent pools sharing the store and rate limiter
  large: {
    name: 'large',
    concurrencyLimit: 16,
    batchArtifactCount: 1000,
    batchByteSize: 10 * GiB,
    maxRetries: 5,
    poolCount: 4,
  },
};

/**
 * Choose a strategy from an explicit hint, or from the measured size when the
 * hint is `auto`. Without an estimate `auto` falls back to medium.
 */
export function selectStrategy(hint: StrategyHint = 'auto', estimate?: SizeEstimate): StrategyParams {
  if (hint !== 'auto') {
    return { ...STRATEGY_PRESETS[hint] };
  }

  if (!estimate) {
    logVerbose('No size estimate available, using the medium strategy');
    return { ...STRATEGY_PRESETS.medium };
  }

  let name: StrategyName;
  if (estimate.totalBytes <= SMALL_SCALE_LIMIT) {
    name = 'small';
  } else if (estimate.totalBytes <= MEDIUM_SCALE_LIMIT) {
    name = 'medium';
  } else {
    name = 'large';
  }

  logVerbose(
    `Auto-selected ${name} strategy for ${estimate.artifactCount} artifacts (${formatBytes(estimate.totalBytes)})`
  );
  return { ...STRATEGY_PRESETS[name] };
}

/**
 * Selected preset with explicit configuration overrides applied
 */
export function resolveStrategy(config: EngineConfig, estimate?: SizeEstimate): StrategyParams {
  const params = selectStrategy(config.strategyHint, estimate);

  return {
    ...params,
    concurrencyLimit: config.concurrencyLimit ?? params.concurrencyLimit,
    batchArtifactCount: config.batchArtifactCount ?? params.batchArtifactCount,
    batchByteSize: config.batchByteSize ?? params.batchByteSize,
    maxRetries: config.maxRetries ?? params.maxRetries,
    poolCount: config.poolCount ?? params.poolCount,
  };
}

export function estimateListing(artifacts: readonly ArtifactDescriptor[]): SizeEstimate {
  return {
    artifactCount: artifacts.length,
    totalBytes: artifacts.reduce((sum, artifact) => sum + artifact.size, 0),
  };
}
