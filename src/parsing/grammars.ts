/**
 * Grammar Catalog
 * Ordered table of command grammars: trigger patterns plus parameter extractors.
 * Declaration order is match priority; adding a command means adding a record.
 */

import {
  AMOUNT,
  DATA_UNIT,
  LONG_AMOUNT,
  NAIRA_SIGN,
  amountExtractor,
  cableProviderExtractor,
  dataSizeExtractor,
  networkExtractor,
  phoneExtractor,
  type ParameterExtractor,
} from './extractors';
import { COMMAND_TYPES, type MatchableCommandType } from './types';

// ============================================================================
// Types
// ============================================================================

export interface TriggerPattern {
  readonly pattern: RegExp;
  /** A weak trigger matched without any command keyword; caps confidence at low */
  readonly weak?: boolean;
}

export interface Grammar {
  readonly commandType: MatchableCommandType;
  readonly triggers: readonly TriggerPattern[];
  readonly extractors: readonly ParameterExtractor[];
}

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CatalogError';
  }
}

// ============================================================================
// Pattern Helpers
// ============================================================================

/** Whole-message phrase, tolerating trailing punctuation */
function phrase(body: string): TriggerPattern {
  return { pattern: new RegExp(`^(?:${body})[\\s!.?]*$`) };
}

function keyword(body: string): TriggerPattern {
  return { pattern: new RegExp(body) };
}

/** Menu shortcut: the message is exactly the option number */
function menuOption(option: number): TriggerPattern {
  return { pattern: new RegExp(`^${option}$`) };
}

const HAS_DATA_SIZE = String.raw`\d\s*${DATA_UNIT}\b`;

/** A message that is only an amount of two or more digits; single digits are menu picks */
const BARE_AMOUNT = String.raw`^${NAIRA_SIGN}((?:\d{1,3}(?:,\d{3})+|\d{2,9}))$`;

// ============================================================================
// Grammars
// ============================================================================

const greeting: Grammar = {
  commandType: COMMAND_TYPES.GREETING,
  triggers: [
    phrase(String.raw`hi|hello|hey|hiya|howdy|start|good\s*(?:morning|afternoon|evening|day)(?: there)?|(?:hi|hello|hey) there`),
  ],
  extractors: [],
};

const help: Grammar = {
  commandType: COMMAND_TYPES.HELP,
  triggers: [phrase(String.raw`help|menu|options|commands|what can you do|how does this work`)],
  extractors: [],
};

const balanceCheck: Grammar = {
  commandType: COMMAND_TYPES.BALANCE_CHECK,
  triggers: [
    phrase(String.raw`bal|balance|wallet|wallet balance|(?:check|show)(?: my)? (?:balance|wallet)|my (?:balance|wallet)`),
    keyword(String.raw`\bwhat(?:'s| is) my (?:wallet )?balance\b`),
    keyword(String.raw`\bhow much (?:do i have|is in my wallet)\b`),
    menuOption(4),
  ],
  extractors: [],
};

const airtimePurchase: Grammar = {
  commandType: COMMAND_TYPES.AIRTIME_PURCHASE,
  triggers: [
    keyword(String.raw`\bairtime\b`),
    // recharge/top up, unless a data size says it is a data bundle
    keyword(String.raw`^(?!.*${HAS_DATA_SIZE}).*\b(?:recharge|top\s*up)\b`),
    menuOption(1),
    { pattern: new RegExp(BARE_AMOUNT), weak: true },
  ],
  extractors: [
    amountExtractor(
      [
        new RegExp(String.raw`${NAIRA_SIGN}${LONG_AMOUNT}\s*(?:naira\s+|ngn\s+)?(?:worth\s+of\s+|of\s+)?airtime\b`),
        new RegExp(String.raw`\bairtime\s+(?:of\s+|for\s+|worth\s+)?${NAIRA_SIGN}${AMOUNT}`),
        new RegExp(String.raw`\b(?:recharge|top\s*up)\s+(?:of\s+|with\s+)?${NAIRA_SIGN}${AMOUNT}`),
        new RegExp(BARE_AMOUNT),
      ],
      (config) => config.airtimeAmount
    ),
    phoneExtractor,
  ],
};

const dataPurchase: Grammar = {
  commandType: COMMAND_TYPES.DATA_PURCHASE,
  triggers: [keyword(String.raw`\b\d+(?:\.\d+)?\s*${DATA_UNIT}\b`), keyword(String.raw`\bdata\b`), menuOption(2)],
  extractors: [networkExtractor, dataSizeExtractor, phoneExtractor],
};

const ELECTRICITY_WORD = String.raw`(?:electricity|light(?:\s*bill)?|nepa|phcn|power)`;

const DISCOS = String.raw`ekedc|ikedc|aedc|phed|ibedc|eedc|kedco|kaedco|jed|bedc|yedc`;

const electricityPayment: Grammar = {
  commandType: COMMAND_TYPES.ELECTRICITY_PAYMENT,
  triggers: [
    keyword(String.raw`\b(?:electricity|light|nepa|phcn|prepaid meter|meter token)\b`),
    keyword(String.raw`\b(?:${DISCOS})\b`),
    menuOption(3),
  ],
  extractors: [
    amountExtractor(
      [
        new RegExp(String.raw`${NAIRA_SIGN}${LONG_AMOUNT}\s*(?:naira\s+)?(?:worth\s+of\s+|of\s+)?${ELECTRICITY_WORD}\b`),
        new RegExp(String.raw`\b${ELECTRICITY_WORD}\s+(?:of\s+|for\s+|worth\s+)?${NAIRA_SIGN}${AMOUNT}`),
        new RegExp(String.raw`\b(?:pay|buy)\s+${NAIRA_SIGN}${AMOUNT}`),
      ],
      (config) => config.electricityAmount
    ),
  ],
};

const cableSubscription: Grammar = {
  commandType: COMMAND_TYPES.CABLE_SUBSCRIPTION,
  triggers: [
    keyword(String.raw`\b(?:dstv|gotv|startimes)\b`),
    keyword(String.raw`\bcable\b`),
    phrase(String.raw`tv|tv (?:subscription|sub|bill)`),
    keyword(String.raw`\b(?:subscribe|renew)\b`),
  ],
  extractors: [cableProviderExtractor],
};

const transactionHistory: Grammar = {
  commandType: COMMAND_TYPES.TRANSACTION_HISTORY,
  triggers: [
    phrase(String.raw`history|transactions?|txns?|statement|my transactions?|transaction history`),
    keyword(String.raw`\b(?:transaction history|(?:recent|past|last|my) transactions)\b`),
    menuOption(5),
  ],
  extractors: [],
};

const referralInfo: Grammar = {
  commandType: COMMAND_TYPES.REFERRAL_INFO,
  triggers: [
    phrase(String.raw`referral|referrals|refer|invite|invite friends?|ref code|my referral|referral code|my code`),
    keyword(String.raw`\brefer(?:ral)? (?:code|link|bonus|earnings)\b`),
  ],
  extractors: [],
};

/** Grammars in priority order */
const GRAMMARS: readonly Grammar[] = [
  greeting,
  help,
  balanceCheck,
  airtimePurchase,
  dataPurchase,
  electricityPayment,
  cableSubscription,
  transactionHistory,
  referralInfo,
];

// ============================================================================
// Catalog
// ============================================================================

/**
 * Check a catalog is usable: non-empty, every grammar triggerable, one grammar
 * per command type, no stateful (global/sticky) patterns.
 * @throws CatalogError
 */
export function assertValidCatalog(grammars: readonly Grammar[]): void {
  if (grammars.length === 0) {
    throw new CatalogError('Grammar catalog is empty');
  }

  const seen = new Set<MatchableCommandType>();
  for (const grammar of grammars) {
    if (seen.has(grammar.commandType)) {
      throw new CatalogError(`Duplicate grammar for ${grammar.commandType}`);
    }
    seen.add(grammar.commandType);

    if (grammar.triggers.length === 0) {
      throw new CatalogError(`Grammar ${grammar.commandType} has no triggers`);
    }
    for (const trigger of grammar.triggers) {
      if (trigger.pattern.global || trigger.pattern.sticky) {
        throw new CatalogError(`Grammar ${grammar.commandType} has a stateful pattern: ${trigger.pattern}`);
      }
    }
  }
}

/**
 * Build the frozen grammar catalog. Extractors read bounds and vocabularies from
 * the classifier configuration at classification time.
 */
export function buildGrammarCatalog(grammars: readonly Grammar[] = GRAMMARS): readonly Grammar[] {
  assertValidCatalog(grammars);
  return Object.freeze(
    grammars.map((grammar) =>
      Object.freeze({
        ...grammar,
        triggers: Object.freeze([...grammar.triggers]),
        extractors: Object.freeze([...grammar.extractors]),
      })
    )
  );
}

/** Command types in the order the default catalog tries them */
export const COMMAND_PRIORITY: readonly MatchableCommandType[] = GRAMMARS.map((grammar) => grammar.commandType);
