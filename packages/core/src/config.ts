// ============================================================================
// @bytepair/core: Runtime Configuration
// ============================================================================
//
// Environment variables:
//   BPE_DEBUG           1|true → debug, warn, error (default info)
//   BPE_CACHE_SIZE      encode cache entries per tokenizer (default 10000)
//   BPE_DEFAULT_MERGES  merges learned when no target is given (default 20)
//   BPE_MAX_MODELS      models the REST server keeps in memory (default 100)
//   PORT                REST server port (default 3000)
// ============================================================================

import process from 'node:process';
import { BpeValidationError } from './errors.js';
import { type LogLevel, parseLogLevel } from './logger.js';

export interface BpeConfig {
  logLevel: LogLevel;
  maxCacheSize: number;
  defaultMerges: number;
  maxModels: number;
  port: number;
}

export const DEFAULT_CONFIG: Readonly<BpeConfig> = {
  logLevel: 'info',
  maxCacheSize: 10_000,
  defaultMerges: 20,
  maxModels: 100,
  port: 3000,
};

function readInt(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  min: number,
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new BpeValidationError(`${name} must be an integer >= ${min}, got "${raw}"`, {
      field: name,
      reason: 'out_of_range',
      value: raw,
    });
  }
  return value;
}

/**
 * Resolve configuration from the environment, falling back to defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BpeConfig {
  return {
    logLevel: parseLogLevel(env.BPE_DEBUG),
    maxCacheSize: readInt(env, 'BPE_CACHE_SIZE', DEFAULT_CONFIG.maxCacheSize, 0),
    defaultMerges: readInt(env, 'BPE_DEFAULT_MERGES', DEFAULT_CONFIG.defaultMerges, 0),
    maxModels: readInt(env, 'BPE_MAX_MODELS', DEFAULT_CONFIG.maxModels, 1),
    port: readInt(env, 'PORT', DEFAULT_CONFIG.port, 1),
  };
}
