/**
 * Configuration Management
 * Resolved once at startup from the environment (and CLI flags) into an
 * immutable EngineConfig that is passed into the engine.
 */

import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

export const DEFAULT_REGION = 'us-east-1';
export const DEFAULT_MAX_BATCH_SIZE = 100;
export const MAX_BATCH_SIZE_LIMIT = 500;

export interface EngineConfig {
  region: string;
  maxBatchSize: number;
  strictValidation: boolean;
  testMode: boolean;
  logLevel: string;
}

export interface ResolvedConfig {
  config: EngineConfig;
  /** Problems found while reading the environment, logged by the caller once a logger exists */
  warnings: string[];
}

type Env = Readonly<Record<string, string | undefined>>;

// Current name first, then the deprecated and legacy names
const ENV_CHAINS = {
  maxBatchSize: ['COST_ENGINE_MAX_BATCH_SIZE', 'AWS_PUBLIC_MAX_BATCH_SIZE', 'MAX_BATCH_SIZE'],
  strictValidation: ['COST_ENGINE_STRICT_VALIDATION', 'AWS_PUBLIC_STRICT_VALIDATION', 'STRICT_VALIDATION'],
  testMode: ['COST_ENGINE_TEST_MODE', 'AWS_PUBLIC_TEST_MODE', 'TEST_MODE'],
} as const;

const configSchema = z.object({
  region: z.string().regex(/^[a-z]{2}(-[a-z]+)+-\d+$/, 'must look like an AWS region, e.g. us-east-1'),
  maxBatchSize: z.number().int().min(1).max(MAX_BATCH_SIZE_LIMIT),
  strictValidation: z.boolean(),
  testMode: z.boolean(),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']),
});

/**
 * Load a .env file into process.env if one exists
 */
export function loadEnvFile(path?: string): void {
  loadEnv(path ? { path } : undefined);
}

/**
 * Resolve the engine configuration from environment variables and overrides
 */
export function resolveConfig(env: Env = process.env, overrides: Partial<EngineConfig> = {}): ResolvedConfig {
  const warnings: string[] = [];

  const resolved: EngineConfig = {
    region: nonEmpty(env.COST_ENGINE_REGION) ?? DEFAULT_REGION,
    maxBatchSize: parseMaxBatchSize(lookupEnv(env, ENV_CHAINS.maxBatchSize, warnings), warnings),
    strictValidation: parseTruthy(lookupEnv(env, ENV_CHAINS.strictValidation, warnings)),
    testMode: parseTestMode(lookupEnv(env, ENV_CHAINS.testMode, warnings), warnings),
    logLevel: nonEmpty(env.COST_ENGINE_LOG_LEVEL) ?? nonEmpty(env.LOG_LEVEL) ?? 'info',
  };

  const merged = { ...resolved, ...stripUndefined(overrides) };
  const result = configSchema.safeParse(merged);
  if (!result.success) {
    const problems = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${problems.join('; ')}`);
  }

  return { config: result.data, warnings };
}

/**
 * Read the first set variable in a fallback chain, noting use of old names
 */
function lookupEnv(env: Env, chain: readonly string[], warnings: string[]): string | undefined {
  for (let i = 0; i < chain.length; i++) {
    const value = nonEmpty(env[chain[i]]);
    if (value === undefined) continue;
    if (i > 0) {
      const kind = i === 1 ? 'deprecated' : 'legacy';
      warnings.push(`environment variable ${chain[i]} is ${kind}; use ${chain[0]} instead`);
    }
    return value;
  }
  return undefined;
}

function parseMaxBatchSize(value: string | undefined, warnings: string[]): number {
  if (value === undefined) return DEFAULT_MAX_BATCH_SIZE;

  const parsed = /^-?\d+$/.test(value) ? parseInt(value, 10) : NaN;
  if (isNaN(parsed) || parsed <= 0) {
    warnings.push(`invalid max batch size "${value}"; using default of ${DEFAULT_MAX_BATCH_SIZE}`);
    return DEFAULT_MAX_BATCH_SIZE;
  }
  if (parsed > MAX_BATCH_SIZE_LIMIT) {
    warnings.push(`max batch size ${parsed} exceeds limit; capping at ${MAX_BATCH_SIZE_LIMIT}`);
    return MAX_BATCH_SIZE_LIMIT;
  }
  return parsed;
}

function parseTruthy(value: string | undefined): boolean {
  if (value === undefined) return false;
  return ['true', '1', 'yes', 'on'].includes(value.toLowerCase());
}

function parseTestMode(value: string | undefined, warnings: string[]): boolean {
  if (value === undefined) return false;
  if (value === 'true') return true;
  if (value !== 'false') {
    warnings.push(`invalid test mode value "${value}"; expected "true" or "false", test mode disabled`);
  }
  return false;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function stripUndefined(overrides: Partial<EngineConfig>): Partial<EngineConfig> {
  const result: Partial<EngineConfig> = {};
  if (overrides.region !== undefined) result.region = overrides.region;
  if (overrides.maxBatchSize !== undefined) result.maxBatchSize = overrides.maxBatchSize;
  if (overrides.strictValidation !== undefined) result.strictValidation = overrides.strictValidation;
  if (overrides.testMode !== undefined) result.testMode = overrides.testMode;
  if (overrides.logLevel !== undefined) result.logLevel = overrides.logLevel;
  return result;
}
