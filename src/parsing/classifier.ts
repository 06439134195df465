/**
 * Intent Classifier
 * Matches one message against the grammar catalog in priority order and
 * extracts the winning grammar's parameters.
 *
 * Handles:
 * - 'hi', 'help', 'balance', 'history', 'referral code'
 * - 'buy 1000 airtime', 'airtime 500 for 08012345678', 'recharge 200'
 * - 'buy 2gb mtn', 'glo 500mb for 08012345678'
 * - 'pay 5000 electricity', 'renew dstv'
 * - bare amounts ('1000') as a low-confidence airtime guess
 */

import { createClassifierConfig, type ClassifierConfig } from './config';
import type { ParameterExtractor } from './extractors';
import { buildGrammarCatalog, type Grammar, type TriggerPattern } from './grammars';
import {
  COMMAND_TYPES,
  type CommandParameters,
  type ConfidenceLevel,
  type MatchableCommandType,
  type ParameterName,
  type ParameterValues,
  type ParsedCommand,
  type ValidationError,
} from './types';

// ============================================================================
// Input Normalization
// ============================================================================

/**
 * Canonical form every grammar is written against: trimmed, single-spaced,
 * lowercase, straight apostrophes.
 */
export function normalizeMessage(message: string): string {
  return message.trim().replace(/\s+/g, ' ').toLowerCase().replace(/[‘’]/g, "'");
}

// ============================================================================
// Parameter Extraction
// ============================================================================

type ExtractedValues = { [K in ParameterName]?: ParameterValues[K] };

interface ExtractionOutcome {
  values: ExtractedValues;
  /** Rejected and missing-required parameters, in extractor order */
  errors: ValidationError[];
}

function applyExtractor<K extends ParameterName>(
  extractor: ParameterExtractor<K>,
  text: string,
  config: ClassifierConfig,
  outcome: ExtractionOutcome
): void {
  const result = extractor.extract(text, config);

  switch (result.status) {
    case 'found':
      outcome.values[extractor.name] = result.value;
      break;
    case 'invalid':
      outcome.errors.push({ ...result.error, parameter: extractor.name });
      break;
    case 'absent':
      if (extractor.required) {
        outcome.errors.push({ code: 'MissingRequiredParameter', parameter: extractor.name });
      }
      break;
  }
}

function extractParameters(grammar: Grammar, text: string, config: ClassifierConfig): ExtractionOutcome {
  const outcome: ExtractionOutcome = { values: {}, errors: [] };
  for (const extractor of grammar.extractors) {
    applyExtractor(extractor, text, config, outcome);
  }
  return outcome;
}

// ============================================================================
// Confidence
// ============================================================================

/**
 * Confidence follows from the match alone:
 * - low: only a weak trigger (no command keyword) matched
 * - medium: a required parameter is missing, or any parameter was rejected
 * - high: everything the grammar needs is present and valid
 */
export function deriveConfidence(trigger: TriggerPattern, errors: readonly ValidationError[]): ConfidenceLevel {
  if (trigger.weak) return 'low';
  if (errors.length > 0) return 'medium';
  return 'high';
}

// ============================================================================
// Result Construction
// ============================================================================

function freezeParameters(outcome: ExtractionOutcome): CommandParameters {
  const { size, ...scalars } = outcome.values;
  const [firstError] = outcome.errors;

  return Object.freeze({
    ...scalars,
    ...(size !== undefined ? { size: Object.freeze({ ...size }) } : {}),
    ...(firstError !== undefined ? { error: Object.freeze({ ...firstError }) } : {}),
  });
}

function unknownCommand(rawText: string): ParsedCommand {
  return Object.freeze({
    commandType: COMMAND_TYPES.UNKNOWN,
    rawText,
    confidence: 'low',
    parameters: Object.freeze({}),
  });
}

// ============================================================================
// Classifier
// ============================================================================

/**
 * Immutable classifier. Each instance owns a validated configuration and a
 * frozen catalog, so instances can be shared freely and replaced by swapping
 * the reference (see `reconfigure`).
 */
export class IntentClassifier {
  readonly config: ClassifierConfig;

  private readonly grammars: readonly Grammar[];

  /**
   * @throws ClassifierConfigError if the configuration is inconsistent
   * @throws CatalogError if the catalog is unusable
   */
  constructor(config: Partial<ClassifierConfig> = {}, grammars?: readonly Grammar[]) {
    this.config = createClassifierConfig(config);
    this.grammars = buildGrammarCatalog(grammars);
    Object.freeze(this);
  }

  /** Command types in the order they are tried */
  get priority(): readonly MatchableCommandType[] {
    return this.grammars.map((grammar) => grammar.commandType);
  }

  /**
   * Classify one message. Never throws for user input: unrecognised text is an
   * `unknown` command and bad parameters are reported on `parameters.error`.
   */
  classify(message: string): ParsedCommand {
    const text = normalizeMessage(message);
    if (text.length === 0) {
      return unknownCommand(message);
    }

    for (const grammar of this.grammars) {
      const trigger = grammar.triggers.find((candidate) => candidate.pattern.test(text));
      if (!trigger) {
        continue;
      }

      const outcome = extractParameters(grammar, text, this.config);

      return Object.freeze({
        commandType: grammar.commandType,
        rawText: message,
        confidence: deriveConfidence(trigger, outcome.errors),
        parameters: freezeParameters(outcome),
      });
    }

    return unknownCommand(message);
  }

  /** New classifier with some settings replaced; this instance is unchanged */
  reconfigure(overrides: Partial<ClassifierConfig>): IntentClassifier {
    return new IntentClassifier({ ...this.config, ...overrides }, this.grammars);
  }
}

/**
 * Create a classifier, failing fast on bad configuration.
 *
 * @example
 * ```typescript
 * const classifier = createIntentClassifier({ airtimeAmount: { min: 100, max: 20000 } });
 * classifier.classify('buy 1000 airtime');
 * // { commandType: 'airtime_purchase', confidence: 'high', parameters: { amount: 1000 }, ... }
 * ```
 */
export function createIntentClassifier(config: Partial<ClassifierConfig> = {}): IntentClassifier {
  return new IntentClassifier(config);
}
