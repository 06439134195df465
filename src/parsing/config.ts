/**
 * Classifier Configuration
 * Amount bounds, data-size rules and provider vocabularies. Validated once when a
 * classifier is created; an inconsistent configuration is a startup failure.
 */

import {
  CABLE_PROVIDERS,
  NETWORK_PROVIDERS,
  isCableProvider,
  isNetworkProvider,
  type CableProvider,
  type NetworkProvider,
} from './types';

// ============================================================================
// Types
// ============================================================================

/** Inclusive naira bounds for one transaction class */
export interface AmountBounds {
  readonly min: number;
  readonly max: number;
}

/** Accepted data bundle sizes, in megabytes */
export interface DataSizeRules {
  readonly minMb: number;
  readonly maxMb: number;
  /** Sizes are floored to a multiple of this step */
  readonly granularityMb: number;
}

export interface ClassifierConfig {
  readonly airtimeAmount: AmountBounds;
  readonly electricityAmount: AmountBounds;
  readonly dataSize: DataSizeRules;
  /** Networks currently sold; a subset of NETWORK_PROVIDERS */
  readonly networkProviders: readonly NetworkProvider[];
  /** Cable providers currently sold; a subset of CABLE_PROVIDERS */
  readonly cableProviders: readonly CableProvider[];
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_AIRTIME_BOUNDS: AmountBounds = Object.freeze({ min: 50, max: 50_000 });

export const DEFAULT_ELECTRICITY_BOUNDS: AmountBounds = Object.freeze({ min: 500, max: 100_000 });

export const DEFAULT_DATA_SIZE_RULES: DataSizeRules = Object.freeze({
  minMb: 50,
  maxMb: 100 * 1024,
  granularityMb: 1,
});

export const DEFAULT_CLASSIFIER_CONFIG: ClassifierConfig = Object.freeze({
  airtimeAmount: DEFAULT_AIRTIME_BOUNDS,
  electricityAmount: DEFAULT_ELECTRICITY_BOUNDS,
  dataSize: DEFAULT_DATA_SIZE_RULES,
  networkProviders: Object.freeze([...NETWORK_PROVIDERS]),
  cableProviders: Object.freeze([...CABLE_PROVIDERS]),
});

// ============================================================================
// Validation
// ============================================================================

export class ClassifierConfigError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(['Invalid classifier configuration:', ...issues.map((issue) => `- ${issue}`)].join('\n'));
    this.name = 'ClassifierConfigError';
    this.issues = issues;
  }
}

function isNonNegativeInteger(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

function checkAmountBounds(label: string, bounds: AmountBounds, issues: string[]): void {
  if (!isNonNegativeInteger(bounds.min)) {
    issues.push(`${label}.min must be a non-negative integer (got ${bounds.min})`);
  }
  if (!isNonNegativeInteger(bounds.max)) {
    issues.push(`${label}.max must be a non-negative integer (got ${bounds.max})`);
  }
  if (bounds.min > bounds.max) {
    issues.push(`${label}.min (${bounds.min}) is greater than max (${bounds.max})`);
  }
}

function checkProviders(
  label: string,
  providers: readonly string[],
  isKnown: (value: string) => boolean,
  issues: string[]
): void {
  if (providers.length === 0) {
    issues.push(`${label} must list at least one provider`);
  }
  for (const provider of providers) {
    if (!isKnown(provider)) {
      issues.push(`${label} contains unknown provider "${provider}"`);
    }
  }
  if (new Set(providers).size !== providers.length) {
    issues.push(`${label} contains duplicates`);
  }
}

/**
 * Collect every problem with a configuration.
 * @returns Human-readable issues; empty when the configuration is usable
 */
export function validateClassifierConfig(config: ClassifierConfig): string[] {
  const issues: string[] = [];

  checkAmountBounds('airtimeAmount', config.airtimeAmount, issues);
  checkAmountBounds('electricityAmount', config.electricityAmount, issues);

  const { minMb, maxMb, granularityMb } = config.dataSize;
  if (!isNonNegativeInteger(minMb)) {
    issues.push(`dataSize.minMb must be a non-negative integer (got ${minMb})`);
  }
  if (!isNonNegativeInteger(maxMb)) {
    issues.push(`dataSize.maxMb must be a non-negative integer (got ${maxMb})`);
  }
  if (minMb > maxMb) {
    issues.push(`dataSize.minMb (${minMb}) is greater than maxMb (${maxMb})`);
  }
  if (!Number.isSafeInteger(granularityMb) || granularityMb <= 0) {
    issues.push(`dataSize.granularityMb must be a positive integer (got ${granularityMb})`);
  }

  checkProviders('networkProviders', config.networkProviders, isNetworkProvider, issues);
  checkProviders('cableProviders', config.cableProviders, isCableProvider, issues);

  return issues;
}

/**
 * Build a frozen configuration from defaults plus overrides.
 * @throws ClassifierConfigError listing every issue found
 */
export function createClassifierConfig(overrides: Partial<ClassifierConfig> = {}): ClassifierConfig {
  const merged: ClassifierConfig = { ...DEFAULT_CLASSIFIER_CONFIG, ...overrides };

  const issues = validateClassifierConfig(merged);
  if (issues.length > 0) {
    throw new ClassifierConfigError(issues);
  }

  return Object.freeze({
    airtimeAmount: Object.freeze({ ...merged.airtimeAmount }),
    electricityAmount: Object.freeze({ ...merged.electricityAmount }),
    dataSize: Object.freeze({ ...merged.dataSize }),
    networkProviders: Object.freeze([...merged.networkProviders]),
    cableProviders: Object.freeze([...merged.cableProviders]),
  });
}
