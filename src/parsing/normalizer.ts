/**
 * Value Normalizer
 * Turns raw text fragments into canonical values: naira amounts, phone numbers,
 * data sizes and provider names. Never matches commands itself.
 */

import { DEFAULT_DATA_SIZE_RULES, type AmountBounds, type DataSizeRules } from './config';
import {
  CABLE_PROVIDERS,
  NETWORK_PROVIDERS,
  type AmountNaira,
  type CableProvider,
  type DataSize,
  type NetworkProvider,
  type NormalizeResult,
  type PhoneNumber,
  type ValidationError,
} from './types';

// ============================================================================
// Constants
// ============================================================================

export const COUNTRY_CODE = '234';

const BYTES_PER_MEGABYTE = 1024 * 1024;

const MEGABYTES_PER_GIGABYTE = 1024;

/** Accepted unit spellings and their size in megabytes */
const DATA_UNIT_MEGABYTES: Record<string, number> = {
  mb: 1,
  meg: 1,
  megs: 1,
  megabyte: 1,
  megabytes: 1,
  gb: MEGABYTES_PER_GIGABYTE,
  gig: MEGABYTES_PER_GIGABYTE,
  gigs: MEGABYTES_PER_GIGABYTE,
  gigabyte: MEGABYTES_PER_GIGABYTE,
  gigabytes: MEGABYTES_PER_GIGABYTE,
};

const PHONE_SEPARATORS = /[\s\-().]/g;

const CURRENCY_PREFIX = /^(?:₦|ngn|n)\s*/;

const CURRENCY_SUFFIX = /\s*(?:naira|ngn)$/;

const WHOLE_AMOUNT = /^\d+(?:\.0+)?$/;

const DECIMAL_QUANTITY = /^\d+(?:\.\d+)?$/;

function ok<T>(value: T): NormalizeResult<T> {
  return { success: true, value };
}

function fail<T>(error: ValidationError): NormalizeResult<T> {
  return { success: false, error };
}

// ============================================================================
// Phone Numbers
// ============================================================================

/**
 * Normalize a Nigerian phone number to 234XXXXXXXXXX.
 *
 * Accepts 0XXXXXXXXXX (11 digits), 234XXXXXXXXXX (13 digits) and XXXXXXXXXX
 * (10 digits, no leading 0). Spaces, dashes, dots, brackets and a leading "+"
 * are ignored. Anything else is InvalidPhoneFormat.
 */
export function normalizePhone(input: string): NormalizeResult<PhoneNumber> {
  const digits = input.trim().replace(PHONE_SEPARATORS, '').replace(/^\+/, '');

  if (/^\d+$/.test(digits)) {
    if (digits.length === 11 && digits.startsWith('0')) {
      return ok(`${COUNTRY_CODE}${digits.slice(1)}`);
    }
    if (digits.length === 13 && digits.startsWith(COUNTRY_CODE)) {
      return ok(digits);
    }
    if (digits.length === 10 && !digits.startsWith('0')) {
      return ok(`${COUNTRY_CODE}${digits}`);
    }
  }

  return fail({ code: 'InvalidPhoneFormat', parameter: 'phone', input });
}

// ============================================================================
// Amounts
// ============================================================================

/**
 * Parse a whole-naira amount and check it against bounds.
 * Currency symbols and thousands separators are ignored; "1000.00" is accepted,
 * "1000.50" is not.
 */
export function normalizeAmount(input: string, bounds: AmountBounds): NormalizeResult<AmountNaira> {
  const cleaned = input
    .trim()
    .toLowerCase()
    .replace(CURRENCY_PREFIX, '')
    .replace(CURRENCY_SUFFIX, '')
    .replace(/,/g, '');

  if (!WHOLE_AMOUNT.test(cleaned)) {
    return fail({ code: 'NotNumeric', parameter: 'amount', input });
  }

  const amount = parseInt(cleaned, 10);
  if (!Number.isSafeInteger(amount)) {
    return fail({ code: 'NotNumeric', parameter: 'amount', input });
  }

  if (amount < bounds.min) {
    return fail({ code: 'AmountTooLow', parameter: 'amount', input, limit: bounds.min });
  }
  if (amount > bounds.max) {
    return fail({ code: 'AmountTooHigh', parameter: 'amount', input, limit: bounds.max });
  }

  return ok(amount);
}

// ============================================================================
// Data Sizes
// ============================================================================

/**
 * Render a size so that parsing the text gives back the same megabytes.
 * Sizes that one-decimal GB text reproduces show as "1.5GB"; the rest stay in MB.
 */
export function formatDataSize(megabytes: number): string {
  if (megabytes >= MEGABYTES_PER_GIGABYTE) {
    const gigabytes = Math.round((megabytes / MEGABYTES_PER_GIGABYTE) * 10) / 10;
    if (Math.floor(gigabytes * MEGABYTES_PER_GIGABYTE) === megabytes) {
      return `${gigabytes.toFixed(1)}GB`;
    }
  }
  return `${megabytes}MB`;
}

/**
 * Convert a quantity and unit to a data size.
 *
 * Rounding: the size is floored to a multiple of `rules.granularityMb`, so a
 * user is never sold more than they asked for (1.5gb -> 1536MB, 1.1gb -> 1126MB
 * at the default 1MB step).
 */
export function normalizeDataSize(
  value: number | string,
  unit: string,
  rules: DataSizeRules = DEFAULT_DATA_SIZE_RULES
): NormalizeResult<DataSize> {
  const input = `${value}${unit}`;

  const quantity = typeof value === 'number' ? value : parseQuantity(value);
  if (quantity === null || !Number.isFinite(quantity) || quantity < 0) {
    return fail({ code: 'NotNumeric', parameter: 'size', input });
  }

  const unitMegabytes = DATA_UNIT_MEGABYTES[unit.trim().toLowerCase()];
  if (unitMegabytes === undefined) {
    return fail({ code: 'UnsupportedDataUnit', parameter: 'size', input });
  }

  const requestedMegabytes = quantity * unitMegabytes;
  const megabytes = Math.floor(requestedMegabytes / rules.granularityMb) * rules.granularityMb;

  if (megabytes <= 0 || megabytes < rules.minMb) {
    return fail({ code: 'DataSizeTooSmall', parameter: 'size', input, limit: rules.minMb });
  }
  if (megabytes > rules.maxMb) {
    return fail({ code: 'DataSizeTooLarge', parameter: 'size', input, limit: rules.maxMb });
  }

  return ok({
    megabytes,
    bytes: megabytes * BYTES_PER_MEGABYTE,
    display: formatDataSize(megabytes),
  });
}

function parseQuantity(value: string): number | null {
  const trimmed = value.trim();
  return DECIMAL_QUANTITY.test(trimmed) ? parseFloat(trimmed) : null;
}

/** Check whether a word is a recognised data unit spelling */
export function isDataUnit(unit: string): boolean {
  return DATA_UNIT_MEGABYTES[unit.trim().toLowerCase()] !== undefined;
}

// ============================================================================
// Providers
// ============================================================================

/**
 * Exact, case-insensitive lookup in a provider vocabulary.
 * There is no fuzzy matching: "mtm" is UnknownProvider, not MTN.
 */
export function normalizeProvider<T extends string>(
  input: string,
  vocabulary: readonly T[]
): NormalizeResult<T> {
  const normalized = input.trim().toLowerCase();
  const match = vocabulary.find((provider) => provider === normalized);

  if (match === undefined) {
    return fail({ code: 'UnknownProvider', input });
  }
  return ok(match);
}

export function normalizeNetworkProvider(
  input: string,
  vocabulary: readonly NetworkProvider[] = NETWORK_PROVIDERS
): NormalizeResult<NetworkProvider> {
  const result = normalizeProvider(input, vocabulary);
  return result.success ? result : fail({ ...result.error, parameter: 'network' });
}

export function normalizeCableProvider(
  input: string,
  vocabulary: readonly CableProvider[] = CABLE_PROVIDERS
): NormalizeResult<CableProvider> {
  const result = normalizeProvider(input, vocabulary);
  return result.success ? result : fail({ ...result.error, parameter: 'provider' });
}
