// Node.js built-in modules
import fs from 'node:fs';
import path from 'node:path';

// Third-party dependencies
import yaml from 'js-yaml';

// Local imports
import { ConfigError, errorMessageOf } from './errors';

// Types
import type { MigrationConfig, S3Credentials, StrategyHint } from './types';

export const DEFAULT_CHECKPOINT_PATH = './.artifact-migrate/checkpoints.sqlite';

const STRATEGY_HINTS: StrategyHint[] = ['auto', 'small', 'medium', 'large'];

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

interface NumberRule {
  integer?: boolean;
  min: number;
}

// Numeric engine and CLI options with their lower bounds
const NUMBER_RULES = {
  concurrencyLimit: { integer: true, min: 1 },
  batchArtifactCount: { integer: true, min: 1 },
  batchByteSize: { integer: true, min: 0 },
  maxRetries: { integer: true, min: 0 },
  backoffBaseMs: { min: 0 },
  backoffFactor: { min: 1 },
  maxBackoffMs: { min: 0 },
  rateLimitSource: { min: 0 },
  rateLimitTarget: { min: 0 },
  rateLimitTimeoutMs: { min: 1 },
  memoryThreshold: { integer: true, min: 0 },
  systemicFailureThreshold: { integer: true, min: 1 },
  poolCount: { integer: true, min: 1 },
  multipartThreshold: { integer: true, min: 5 * 1024 * 1024 },
} satisfies Record<string, NumberRule>;

type NumberKey = keyof typeof NUMBER_RULES;

/**
 * Load and parse the migration configuration file
 * @param configPath Path to a YAML or JSON file
 */
export function loadConfig(configPath: string): MigrationConfig {
  const resolvedPath = path.resolve(configPath);

  if (!fs.existsSync(resolvedPath)) {
    throw new ConfigError(`Configuration file not found: ${resolvedPath}`);
  }

  const fileContent = fs.readFileSync(resolvedPath, 'utf-8');
  const fileExt = path.extname(resolvedPath).toLowerCase();

  let raw: unknown;
  try {
    if (fileExt === '.json') {
      raw = JSON.parse(fileContent);
    } else if (fileExt === '.yaml' || fileExt === '.yml') {
      raw = yaml.load(fileContent);
    } else {
      throw new ConfigError(`Unsupported configuration file format: ${fileExt}`);
    }
  } catch (error) {
    if (error instanceof ConfigError) {
      throw error;
    }
    throw new ConfigError(`Failed to parse configuration file: ${errorMessageOf(error)}`);
  }

  return validateConfig(raw);
}

function readCredentials(raw: RawConfig, side: 'source' | 'target'): S3Credentials {
  const value = raw[side];
  if (!isRecord(value)) {
    throw new ConfigError(`${side === 'source' ? 'Source' : 'Target'} configuration is missing`);
  }

  const field = (key: keyof Omit<S3Credentials, 'forcePathStyle'>): string => {
    const fieldValue = value[key];
    if (typeof fieldValue !== 'string' || fieldValue.length === 0) {
      throw new ConfigError(`${side === 'source' ? 'Source' : 'Target'} ${key} is missing`);
    }
    return fieldValue;
  };

  const forcePathStyle = value.forcePathStyle;
  if (forcePathStyle !== undefined && typeof forcePathStyle !== 'boolean') {
    throw new ConfigError(`${side}.forcePathStyle must be a boolean`);
  }

  return {
    endpoint: field('endpoint'),
    accessKey: field('accessKey'),
    secretKey: field('secretKey'),
    region: field('region'),
    bucket: field('bucket'),
    forcePathStyle,
  };
}

function readNumber(raw: RawConfig, key: NumberKey): number | undefined {
  const value = raw[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  const rule: NumberRule = NUMBER_RULES[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ConfigError(`${key} must be a number`);
  }
  if (rule.integer && !Number.isInteger(value)) {
    throw new ConfigError(`${key} must be an integer`);
  }
  if (value < rule.min) {
    throw new ConfigError(`${key} must be at least ${rule.min}`);
  }
  return value;
}

function readString(raw: RawConfig, key: string, label: string): string | undefined {
  const value = raw[key];
  if (value !== undefined && typeof value !== 'string') {
    throw new ConfigError(`${label} must be a string`);
  }
  return value;
}

function readBoolean(raw: RawConfig, key: string): boolean | undefined {
  const value = raw[key];
  if (value !== undefined && typeof value !== 'boolean') {
    throw new ConfigError(`${key} must be a boolean`);
  }
  return value;
}

function readPatterns(raw: RawConfig, key: 'include' | 'exclude', label: string): string[] | undefined {
  const value = raw[key];
  if (value === undefined) {
    return undefined;
  }
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ConfigError(`${label} patterns must be an array of strings`);
  }
  for (const pattern of value) {
    try {
      new RegExp(pattern);
    } catch (error) {
      throw new ConfigError(`Invalid ${key} pattern ${pattern}: ${errorMessageOf(error)}`);
    }
  }
  return value;
}

function readStrategyHint(raw: RawConfig): StrategyHint | undefined {
  const value = raw.strategyHint;
  if (value === undefined) {
    return undefined;
  }
  const hint = STRATEGY_HINTS.find(candidate => candidate === value);
  if (!hint) {
    throw new ConfigError(`strategyHint must be one of ${STRATEGY_HINTS.join(', ')}`);
  }
  return hint;
}

function readCheckpoint(raw: RawConfig): MigrationConfig['checkpoint'] {
  const value = raw.checkpoint;
  if (value === undefined) {
    return { path: DEFAULT_CHECKPOINT_PATH };
  }
  if (!isRecord(value) || typeof value.path !== 'string' || value.path.length === 0) {
    throw new ConfigError('checkpoint.path must be a string');
  }
  return { path: value.path };
}

/**
 * Validate a parsed configuration document and apply defaults
 */
export function validateConfig(raw: unknown): MigrationConfig {
  if (!isRecord(raw)) {
    throw new ConfigError('Configuration must be a mapping');
  }

  return {
    source: readCredentials(raw, 'source'),
    target: readCredentials(raw, 'target'),
    checkpoint: readCheckpoint(raw),

    strategyHint: readStrategyHint(raw),
    concurrencyLimit: readNumber(raw, 'concurrencyLimit'),
    batchArtifactCount: readNumber(raw, 'batchArtifactCount'),
    batchByteSize: readNumber(raw, 'batchByteSize'),
    maxRetries: readNumber(raw, 'maxRetries'),
    backoffBaseMs: readNumber(raw, 'backoffBaseMs'),
    backoffFactor: readNumber(raw, 'backoffFactor'),
    maxBackoffMs: readNumber(raw, 'maxBackoffMs'),
    rateLimitSource: readNumber(raw, 'rateLimitSource'),
    rateLimitTarget: readNumber(raw, 'rateLimitTarget'),
    rateLimitTimeoutMs: readNumber(raw, 'rateLimitTimeoutMs'),
    memoryThreshold: readNumber(raw, 'memoryThreshold'),
    tempDir: readString(raw, 'tempDir', 'Temp directory'),
    systemicFailureThreshold: readNumber(raw, 'systemicFailureThreshold'),
    poolCount: readNumber(raw, 'poolCount'),
    runId: readString(raw, 'runId', 'runId'),
    priorRunId: readString(raw, 'priorRunId', 'priorRunId'),

    prefix: readString(raw, 'prefix', 'Prefix'),
    include: readPatterns(raw, 'include', 'Include'),
    exclude: readPatterns(raw, 'exclude', 'Exclude'),
    multipartThreshold: readNumber(raw, 'multipartThreshold'),
    dryRun: readBoolean(raw, 'dryRun') ?? false,
    skipConfirmation: readBoolean(raw, 'skipConfirmation') ?? false,
    verbose: readBoolean(raw, 'verbose') ?? false,
    logFile: readString(raw, 'logFile', 'Log file path'),
  };
}
