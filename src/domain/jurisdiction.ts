/**
 * Jurisdiction and data classification primitives.
 */

/** ISO-3166-1 alpha-2 country code or a recognized region code. */
export type Jurisdiction = string;

/** Region codes accepted in addition to country codes. */
export const REGION_CODES = ['EU', 'APAC'] as const;

const COUNTRY_CODE = /^[A-Z]{2}$/;
const REGIONS = new Set<string>(REGION_CODES);

/** Format-only check; country codes are not looked up against a registry. */
export function isJurisdiction(value: unknown): value is Jurisdiction {
  if (typeof value !== 'string') return false;
  return COUNTRY_CODE.test(value) || REGIONS.has(value);
}

/** Sensitivity tiers that residency rules apply to. */
export enum DataClassification {
  Pii = 'pii',
  Financial = 'financial',
  Health = 'health',
  Biometric = 'biometric',
  /** Matches every request regardless of its own classification. */
  All = 'all',
}

const CLASSIFICATIONS = new Set<string>(Object.values(DataClassification));

export function isDataClassification(value: unknown): value is DataClassification {
  return typeof value === 'string' && CLASSIFICATIONS.has(value);
}

/**
 * Opaque cross-service identifier (e.g. a model registry id). Validated for
 * shape only and never dereferenced inside the core.
 */
const OPAQUE_REF = /^[A-Za-z0-9][A-Za-z0-9._:/-]{0,254}$/;

export function isOpaqueRef(value: unknown): value is string {
  return typeof value === 'string' && OPAQUE_REF.test(value);
}
