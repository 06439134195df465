/**
 * Parameter Extractors
 * Each extractor looks for one parameter in a normalized message and hands the
 * fragment it finds to the normalizer. Extractors run independently of each other.
 */

import type { AmountBounds, ClassifierConfig } from './config';
import {
  normalizeAmount,
  normalizeCableProvider,
  normalizeDataSize,
  normalizeNetworkProvider,
  normalizePhone,
} from './normalizer';
import {
  CABLE_PROVIDERS,
  NETWORK_PROVIDERS,
  type NormalizeResult,
  type ParameterName,
  type ParameterValues,
  type ValidationError,
} from './types';

// ============================================================================
// Types
// ============================================================================

export type ExtractionResult<T> =
  | { status: 'found'; value: T }
  | { status: 'absent' }
  | { status: 'invalid'; error: ValidationError };

export interface ParameterExtractor<K extends ParameterName = ParameterName> {
  readonly name: K;
  readonly required: boolean;
  extract(text: string, config: ClassifierConfig): ExtractionResult<ParameterValues[K]>;
}

const ABSENT = { status: 'absent' } as const;

function fromNormalized<T>(result: NormalizeResult<T>): ExtractionResult<T> {
  return result.success
    ? { status: 'found', value: result.value }
    : { status: 'invalid', error: result.error };
}

/** First capture group of the first pattern that matches */
function firstCapture(text: string, patterns: readonly RegExp[]): string | null {
  for (const pattern of patterns) {
    const captured = pattern.exec(text)?.[1];
    if (captured !== undefined) {
      return captured;
    }
  }
  return null;
}

// ============================================================================
// Shared Pattern Fragments
// ============================================================================

/**
 * A naira amount: "1000", "1,000", "1000.00". Capped at nine digits; longer runs
 * only count as amounts next to a command keyword (see LONG_AMOUNT).
 */
export const AMOUNT = String.raw`(?<![\d,.+])((?:\d{1,3}(?:,\d{3})+|\d{1,9})(?:\.\d+)?)(?!\d)`;

/** Any length of digits, for an amount written directly before its keyword */
export const LONG_AMOUNT = String.raw`(?<![\d,.+])((?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d+)?)(?!\d)`;

/** Optional naira sign before an amount */
export const NAIRA_SIGN = String.raw`(?:₦\s*)?`;

export const DATA_UNIT = String.raw`(?:mb|gb|megs?|gigs?|megabytes?|gigabytes?)`;

/** A data size such as "2gb", "1.5 gb", "500mb" (quantity and unit captured) */
const DATA_SIZE_PATTERN = new RegExp(String.raw`(?<![\d.])(\d+(?:\.\d+)?)\s*(${DATA_UNIT})\b`);

/** Digits after "for"/"to", taken even when malformed so the mistake is reported */
const DIGITS_AFTER_PREPOSITION = /\b(?:for|to)\s+(\+?\d[\d-]{6,16}\d)(?!\d)/;

/** Digit groups joined by single spaces or dashes: "0801 234 5678", "+234-801-234-5678" */
const DIGIT_RUN = /(?<![\w.,+])\+?\d+(?:[ -]\d+)*(?!\d)/g;

const DIGIT_GROUP = /\+?\d+/g;

const PREPOSITION_BEFORE = /\b(?:for|to)\s+$/;

/** Shapes read as a phone number without a "for"/"to" in front */
const UNMISTAKABLE_PHONE = /^(?:0\d{10}|234\d{10})$/;

const PHONE_MASK = '#';

interface PhoneMention {
  readonly start: number;
  readonly end: number;
  readonly fragment: string;
  /** The number directly follows "for" or "to" */
  readonly introduced: boolean;
}

/**
 * Find the phone numbers in a message. Within a run of digit groups the longest
 * span of groups forming a valid number is taken, so "0801 234 5678 500" yields
 * the number and leaves the 500.
 */
function findPhoneMentions(text: string): PhoneMention[] {
  const mentions: PhoneMention[] = [];

  for (const run of text.matchAll(DIGIT_RUN)) {
    const runStart = run.index;
    const groups = [...run[0].matchAll(DIGIT_GROUP)].map((group) => ({
      start: runStart + group.index,
      end: runStart + group.index + group[0].length,
    }));

    let first = 0;
    while (first < groups.length) {
      const mention = longestPhoneFrom(text, groups, first);
      if (mention === null) {
        first += 1;
        continue;
      }
      mentions.push(mention.value);
      first = mention.next;
    }
  }

  return mentions;
}

function longestPhoneFrom(
  text: string,
  groups: readonly { start: number; end: number }[],
  first: number
): { value: PhoneMention; next: number } | null {
  const firstGroup = groups[first];
  if (firstGroup === undefined) {
    return null;
  }
  const introduced = PREPOSITION_BEFORE.test(text.slice(0, firstGroup.start));

  for (let last = groups.length - 1; last >= first; last--) {
    const lastGroup = groups[last];
    if (lastGroup === undefined) {
      continue;
    }
    const fragment = text.slice(firstGroup.start, lastGroup.end);
    const normalized = normalizePhone(fragment);
    if (normalized.success && (introduced || UNMISTAKABLE_PHONE.test(fragment.replace(/\D/g, '')))) {
      return {
        value: { start: firstGroup.start, end: lastGroup.end, fragment, introduced },
        next: last + 1,
      };
    }
  }
  return null;
}

/** Replace phone numbers so amount patterns cannot read their digit groups */
function maskPhoneNumbers(text: string): string {
  let masked = '';
  let cursor = 0;
  for (const mention of findPhoneMentions(text)) {
    masked += text.slice(cursor, mention.start) + PHONE_MASK;
    cursor = mention.end;
  }
  return masked + text.slice(cursor);
}

/** Words that can sit next to a provider slot without being a provider name */
const SLOT_STOPWORDS = new Set([
  'a',
  'abeg',
  'bundle',
  'bundles',
  'buy',
  'cable',
  'can',
  'could',
  'daily',
  'data',
  'for',
  'get',
  'give',
  'i',
  'just',
  'kindly',
  'like',
  'me',
  'monthly',
  'my',
  'need',
  'now',
  'of',
  'on',
  'only',
  'plan',
  'please',
  'pls',
  'send',
  'some',
  'sub',
  'subscription',
  'the',
  'to',
  'today',
  'tv',
  'wan',
  'want',
  'weekly',
  'worth',
  'would',
  'you',
]);

function isProviderCandidate(word: string): boolean {
  return !SLOT_STOPWORDS.has(word) && !/^\d+$/.test(word);
}

// ============================================================================
// Extractors
// ============================================================================

/**
 * Amount extractor trying each pattern in turn; the first capture is normalized
 * against the bounds the configuration gives for this command.
 */
export function amountExtractor(
  patterns: readonly RegExp[],
  boundsOf: (config: ClassifierConfig) => AmountBounds
): ParameterExtractor<'amount'> {
  return {
    name: 'amount',
    required: true,
    extract(text, config) {
      const fragment = firstCapture(maskPhoneNumbers(text), patterns);
      return fragment === null ? ABSENT : fromNormalized(normalizeAmount(fragment, boundsOf(config)));
    },
  };
}

/**
 * Recipient phone number. A number after "for"/"to" wins and is taken even when
 * it is the wrong length, so "for 08031234" is reported rather than ignored.
 * Elsewhere only an 0XXXXXXXXXX or 234XXXXXXXXXX number counts.
 */
export const phoneExtractor: ParameterExtractor<'phone'> = {
  name: 'phone',
  required: false,
  extract(text) {
    const mentions = findPhoneMentions(text);
    const introduced = mentions.find((mention) => mention.introduced);
    if (introduced !== undefined) {
      return fromNormalized(normalizePhone(introduced.fragment));
    }

    const malformed = DIGITS_AFTER_PREPOSITION.exec(text)?.[1];
    if (malformed !== undefined) {
      return fromNormalized(normalizePhone(malformed));
    }

    const mention = mentions[0];
    return mention === undefined ? ABSENT : fromNormalized(normalizePhone(mention.fragment));
  },
};

export const dataSizeExtractor: ParameterExtractor<'size'> = {
  name: 'size',
  required: true,
  extract(text, config) {
    const match = DATA_SIZE_PATTERN.exec(text);
    const quantity = match?.[1];
    const unit = match?.[2];
    if (quantity === undefined || unit === undefined) {
      return ABSENT;
    }
    return fromNormalized(normalizeDataSize(quantity, unit, config.dataSize));
  },
};

const KNOWN_NETWORK = new RegExp(String.raw`\b(${NETWORK_PROVIDERS.join('|')})\b`);

const WORD_AFTER_SIZE = new RegExp(String.raw`\d\s*${DATA_UNIT}\s+([a-z0-9]+)`);

const WORD_BEFORE_SIZE = new RegExp(String.raw`\b([a-z0-9]+)\s+\d+(?:\.\d+)?\s*${DATA_UNIT}\b`);

/**
 * Network for a data bundle. A known network name anywhere wins; otherwise the
 * word next to the data size is validated so a misspelling is reported.
 */
export const networkExtractor: ParameterExtractor<'network'> = {
  name: 'network',
  required: true,
  extract(text, config) {
    const known = KNOWN_NETWORK.exec(text)?.[1];
    if (known !== undefined) {
      return fromNormalized(normalizeNetworkProvider(known, config.networkProviders));
    }

    const candidate = [WORD_AFTER_SIZE, WORD_BEFORE_SIZE]
      .map((pattern) => pattern.exec(text)?.[1])
      .find((word): word is string => word !== undefined && isProviderCandidate(word));
    if (candidate === undefined) {
      return ABSENT;
    }
    return fromNormalized(normalizeNetworkProvider(candidate, config.networkProviders));
  },
};

const KNOWN_CABLE_PROVIDER = new RegExp(String.raw`\b(${CABLE_PROVIDERS.join('|')})\b`);

const WORD_AFTER_CABLE_VERB = /\b(?:pay|subscribe|renew)\s+(?:to\s+|for\s+)?(?:my\s+)?([a-z0-9]+)/;

/** Cable TV provider, positional fallback after pay/subscribe/renew */
export const cableProviderExtractor: ParameterExtractor<'provider'> = {
  name: 'provider',
  required: true,
  extract(text, config) {
    const known = KNOWN_CABLE_PROVIDER.exec(text)?.[1];
    if (known !== undefined) {
      return fromNormalized(normalizeCableProvider(known, config.cableProviders));
    }

    const candidate = WORD_AFTER_CABLE_VERB.exec(text)?.[1];
    if (candidate === undefined || !isProviderCandidate(candidate)) {
      return ABSENT;
    }
    return fromNormalized(normalizeCableProvider(candidate, config.cableProviders));
  },
};
