/**
 * Environment Configuration
 * Reads and validates process environment variables. Every problem is collected
 * and reported in a single error so a misconfigured deploy fails once, clearly.
 *
 * @module config
 */

import {
  DEFAULT_CLASSIFIER_CONFIG,
  isCableProvider,
  isNetworkProvider,
  type CableProvider,
  type ClassifierConfig,
  type NetworkProvider,
} from './parsing';
import { isLogThreshold, type LogThreshold } from './logger';

// ============================================================================
// Types
// ============================================================================

export interface WhatsAppConfig {
  accessToken: string;
  phoneNumberId: string;
  verifyToken: string;
  /** Signature verification is skipped when unset */
  appSecret?: string;
  apiVersion: string;
}

export interface BackendConfig {
  baseUrl: string;
  apiKey?: string;
}

export interface EnvConfig {
  port: number;
  logLevel: LogThreshold;
  redisUrl: string;
  whatsapp: WhatsAppConfig;
  backend: BackendConfig;
  classifier: ClassifierConfig;
}

type Env = Record<string, string | undefined>;

// ============================================================================
// Readers
// ============================================================================

function readString(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readRequired(env: Env, name: string, missing: string[]): string {
  const value = readString(env, name);
  if (value === undefined) {
    missing.push(name);
    return '';
  }
  return value;
}

function readInteger(env: Env, name: string, fallback: number, invalid: string[]): number {
  const raw = readString(env, name);
  if (raw === undefined) {
    return fallback;
  }
  if (!/^\d+$/.test(raw)) {
    invalid.push(`${name} must be a non-negative integer (got "${raw}")`);
    return fallback;
  }
  return parseInt(raw, 10);
}

function readList<T extends string>(
  env: Env,
  name: string,
  fallback: readonly T[],
  isKnown: (value: string) => value is T,
  invalid: string[]
): readonly T[] {
  const raw = readString(env, name);
  if (raw === undefined) {
    return fallback;
  }

  const values: T[] = [];
  for (const entry of raw.split(',')) {
    const value = entry.trim().toLowerCase();
    if (value.length === 0) continue;
    if (isKnown(value)) {
      values.push(value);
    } else {
      invalid.push(`${name} contains unknown provider "${value}"`);
    }
  }
  return values;
}

// ============================================================================
// Loader
// ============================================================================

/**
 * Load and validate environment variables.
 * Throws if required variables are missing or any value is malformed.
 */
export function loadEnvConfig(env: Env = process.env): EnvConfig {
  const missing: string[] = [];
  const invalid: string[] = [];

  const accessToken = readRequired(env, 'WHATSAPP_ACCESS_TOKEN', missing);
  const phoneNumberId = readRequired(env, 'WHATSAPP_PHONE_NUMBER_ID', missing);
  const verifyToken = readRequired(env, 'WHATSAPP_VERIFY_TOKEN', missing);
  const backendUrl = readRequired(env, 'BACKEND_URL', missing);

  const port = readInteger(env, 'PORT', 3000, invalid);

  const logLevelRaw = readString(env, 'LOG_LEVEL')?.toLowerCase() ?? 'info';
  let logLevel: LogThreshold = 'info';
  if (isLogThreshold(logLevelRaw)) {
    logLevel = logLevelRaw;
  } else {
    invalid.push(`LOG_LEVEL must be one of debug, info, warn, error, silent (got "${logLevelRaw}")`);
  }

  const defaults = DEFAULT_CLASSIFIER_CONFIG;
  const classifier: ClassifierConfig = {
    airtimeAmount: {
      min: readInteger(env, 'MIN_AIRTIME_AMOUNT', defaults.airtimeAmount.min, invalid),
      max: readInteger(env, 'MAX_AIRTIME_AMOUNT', defaults.airtimeAmount.max, invalid),
    },
    electricityAmount: {
      min: readInteger(env, 'MIN_ELECTRICITY_AMOUNT', defaults.electricityAmount.min, invalid),
      max: readInteger(env, 'MAX_ELECTRICITY_AMOUNT', defaults.electricityAmount.max, invalid),
    },
    dataSize: {
      minMb: readInteger(env, 'MIN_DATA_MB', defaults.dataSize.minMb, invalid),
      maxMb: readInteger(env, 'MAX_DATA_MB', defaults.dataSize.maxMb, invalid),
      granularityMb: readInteger(env, 'DATA_GRANULARITY_MB', defaults.dataSize.granularityMb, invalid),
    },
    networkProviders: readList<NetworkProvider>(
      env,
      'NETWORK_PROVIDERS',
      defaults.networkProviders,
      isNetworkProvider,
      invalid
    ),
    cableProviders: readList<CableProvider>(env, 'CABLE_PROVIDERS', defaults.cableProviders, isCableProvider, invalid),
  };

  const problems: string[] = [];
  if (missing.length > 0) {
    problems.push(`Missing required environment variables: ${missing.join(', ')}`);
  }
  problems.push(...invalid);

  if (problems.length > 0) {
    throw new Error(problems.join('\n'));
  }

  return {
    port,
    logLevel,
    redisUrl: readString(env, 'REDIS_URL') ?? 'redis://localhost:6379',
    whatsapp: {
      accessToken,
      phoneNumberId,
      verifyToken,
      appSecret: readString(env, 'WHATSAPP_APP_SECRET'),
      apiVersion: readString(env, 'WHATSAPP_API_VERSION') ?? 'v18.0',
    },
    backend: {
      baseUrl: backendUrl.replace(/\/+$/, ''),
      apiKey: readString(env, 'BACKEND_API_KEY'),
    },
    classifier,
  };
}
