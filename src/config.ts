/**
 * Service configuration.
 *
 * Typed settings with defaults, an environment loader for the
 * `SOVEREIGN_*` variables, and a validator that collects every problem
 * instead of stopping at the first.
 *
 * Usage:
 *   const config = loadConfigFromEnv();
 *   const result = validateConfig(config);
 *   if (!result.valid) throw new Error(result.errors.join('; '));
 */

import { isJurisdiction } from './domain/jurisdiction';
import { LogLevel, parseLogLevel } from './logger';

export interface SovereignConfig {
  /** HTTP listen port. */
  port: number;
  logLevel: LogLevel;
  /** Ceiling on active residency rules per tenant. */
  maxResidencyRulesPerTenant: number;
  /**
   * Compliance lookups may be served from cache for at most this long.
   * A mapping changed elsewhere can be stale for up to this window.
   */
  complianceCacheTtlSeconds: number;
  /** Re-read/re-evaluate attempts on optimistic-concurrency conflicts. */
  conflictRetryAttempts: number;
  /** Base delay for the exponential backoff between conflict retries. */
  conflictRetryBaseMs: number;
  /** Jurisdiction assumed for requests that carry none. */
  defaultJurisdiction: string;
  /** Cloud regions deployments may target. Empty means unrestricted. */
  supportedRegions: string[];
}

export const DEFAULT_CONFIG: SovereignConfig = {
  port: 5000,
  logLevel: LogLevel.Info,
  maxResidencyRulesPerTenant: 100,
  complianceCacheTtlSeconds: 3600,
  conflictRetryAttempts: 3,
  conflictRetryBaseMs: 10,
  defaultJurisdiction: 'US',
  supportedRegions: [
    'us-east-1',
    'us-west-2',
    'eu-west-1',
    'eu-central-1',
    'ap-southeast-1',
    'ap-northeast-1',
  ],
};

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
}

/** Merge overrides onto the defaults. */
export function createConfig(overrides: Partial<SovereignConfig> = {}): SovereignConfig {
  return {
    ...DEFAULT_CONFIG,
    ...overrides,
    supportedRegions: [...(overrides.supportedRegions ?? DEFAULT_CONFIG.supportedRegions)],
  };
}

function readInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : NaN;
}

/** Build a config from environment variables, falling back to defaults. */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): SovereignConfig {
  const overrides: Partial<SovereignConfig> = {};

  const port = readInt(env, 'PORT');
  if (port !== undefined) overrides.port = port;

  const logLevel = parseLogLevel(env.SOVEREIGN_LOG_LEVEL);
  if (logLevel) overrides.logLevel = logLevel;

  const maxRules = readInt(env, 'SOVEREIGN_MAX_RULES_PER_TENANT');
  if (maxRules !== undefined) overrides.maxResidencyRulesPerTenant = maxRules;

  const ttl = readInt(env, 'SOVEREIGN_COMPLIANCE_CACHE_TTL_SECONDS');
  if (ttl !== undefined) overrides.complianceCacheTtlSeconds = ttl;

  const attempts = readInt(env, 'SOVEREIGN_CONFLICT_RETRY_ATTEMPTS');
  if (attempts !== undefined) overrides.conflictRetryAttempts = attempts;

  if (env.SOVEREIGN_DEFAULT_JURISDICTION) {
    overrides.defaultJurisdiction = env.SOVEREIGN_DEFAULT_JURISDICTION.trim().toUpperCase();
  }

  if (env.SOVEREIGN_SUPPORTED_REGIONS !== undefined) {
    overrides.supportedRegions = env.SOVEREIGN_SUPPORTED_REGIONS.split(',')
      .map((r) => r.trim())
      .filter((r) => r.length > 0);
  }

  return createConfig(overrides);
}

export function validateConfig(config: SovereignConfig): ConfigValidationResult {
  const errors: string[] = [];

  if (!Number.isInteger(config.port) || config.port < 0 || config.port > 65535) {
    errors.push(`port must be an integer between 0 and 65535, got ${config.port}`);
  }
  if (!Number.isInteger(config.maxResidencyRulesPerTenant) || config.maxResidencyRulesPerTenant < 1) {
    errors.push('maxResidencyRulesPerTenant must be a positive integer');
  }
  if (!Number.isInteger(config.complianceCacheTtlSeconds) || config.complianceCacheTtlSeconds < 0) {
    errors.push('complianceCacheTtlSeconds must be a non-negative integer');
  }
  if (!Number.isInteger(config.conflictRetryAttempts) || config.conflictRetryAttempts < 1) {
    errors.push('conflictRetryAttempts must be at least 1');
  }
  if (!Number.isFinite(config.conflictRetryBaseMs) || config.conflictRetryBaseMs < 0) {
    errors.push('conflictRetryBaseMs must be non-negative');
  }
  if (!isJurisdiction(config.defaultJurisdiction)) {
    errors.push(`defaultJurisdiction is not a valid jurisdiction code: ${config.defaultJurisdiction}`);
  }

  return { valid: errors.length === 0, errors };
}
