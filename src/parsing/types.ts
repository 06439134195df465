/**
 * Command Parsing Types
 * Type definitions for intent classification and parameter extraction.
 */

// ============================================================================
// Command Types
// ============================================================================

/** Commands the bot recognises, one per classification result */
export const COMMAND_TYPES = {
  GREETING: 'greeting',
  HELP: 'help',
  BALANCE_CHECK: 'balance_check',
  AIRTIME_PURCHASE: 'airtime_purchase',
  DATA_PURCHASE: 'data_purchase',
  ELECTRICITY_PAYMENT: 'electricity_payment',
  CABLE_SUBSCRIPTION: 'cable_subscription',
  TRANSACTION_HISTORY: 'transaction_history',
  REFERRAL_INFO: 'referral_info',
  UNKNOWN: 'unknown',
} as const;

export type CommandType = (typeof COMMAND_TYPES)[keyof typeof COMMAND_TYPES];

/** Command types backed by a grammar (everything except the catch-all) */
export type MatchableCommandType = Exclude<CommandType, 'unknown'>;

/** Confidence levels for parsed results */
export type ConfidenceLevel = 'high' | 'medium' | 'low';

// ============================================================================
// Provider Vocabularies
// ============================================================================

export const NETWORK_PROVIDERS = ['mtn', 'glo', 'airtel', '9mobile'] as const;

export type NetworkProvider = (typeof NETWORK_PROVIDERS)[number];

export const CABLE_PROVIDERS = ['dstv', 'gotv', 'startimes'] as const;

export type CableProvider = (typeof CABLE_PROVIDERS)[number];

// ============================================================================
// Parameter Value Types
// ============================================================================

/** Whole naira */
export type AmountNaira = number;

/** Canonical international form: 13 digits starting with 234 */
export type PhoneNumber = string;

/** Data bundle size */
export interface DataSize {
  /** Size in megabytes (1GB = 1024MB) */
  megabytes: number;
  /** Size in bytes */
  bytes: number;
  /** Display text that parses back to the same size (e.g., "2.0GB", "500MB") */
  display: string;
}

export type ParameterName = 'amount' | 'phone' | 'network' | 'size' | 'provider';

/** Normalized value type for each parameter */
export interface ParameterValues {
  amount: AmountNaira;
  phone: PhoneNumber;
  network: NetworkProvider;
  size: DataSize;
  provider: CableProvider;
}

// ============================================================================
// Validation Errors
// ============================================================================

export type ValidationErrorCode =
  | 'AmountTooLow'
  | 'AmountTooHigh'
  | 'NotNumeric'
  | 'InvalidPhoneFormat'
  | 'UnknownProvider'
  | 'MissingRequiredParameter'
  | 'UnsupportedDataUnit'
  | 'DataSizeTooSmall'
  | 'DataSizeTooLarge';

/**
 * A rejected or missing parameter. Carried on the parsed command as data;
 * the wording shown to the user is decided by the handlers.
 */
export interface ValidationError {
  code: ValidationErrorCode;
  /** Parameter the failure belongs to */
  parameter?: ParameterName;
  /** Offending text fragment */
  input?: string;
  /** Bound that was crossed (naira for amounts, MB for data sizes) */
  limit?: number;
}

/** Outcome of a single normalization */
export type NormalizeResult<T> =
  | { success: true; value: T }
  | { success: false; error: ValidationError };

// ============================================================================
// Parsed Command
// ============================================================================

export type CommandParameters = {
  readonly [K in ParameterName]?: Readonly<ParameterValues[K]>;
} & {
  /** First validation failure, if any parameter was rejected or missing */
  readonly error?: Readonly<ValidationError>;
};

/** Result of classifying one message. Frozen once produced. */
export interface ParsedCommand {
  readonly commandType: CommandType;
  /** Original user message, verbatim */
  readonly rawText: string;
  readonly confidence: ConfidenceLevel;
  readonly parameters: CommandParameters;
}

// ============================================================================
// Type Guards
// ============================================================================

const PURCHASE_COMMAND_TYPES: readonly CommandType[] = [
  COMMAND_TYPES.AIRTIME_PURCHASE,
  COMMAND_TYPES.DATA_PURCHASE,
  COMMAND_TYPES.ELECTRICITY_PAYMENT,
  COMMAND_TYPES.CABLE_SUBSCRIPTION,
];

/** Check if a normalization succeeded */
export function isNormalizeSuccess<T>(
  result: NormalizeResult<T>
): result is { success: true; value: T } {
  return result.success;
}

/** Check if the command could not be classified */
export function isUnknownCommand(command: ParsedCommand): boolean {
  return command.commandType === COMMAND_TYPES.UNKNOWN;
}

/** Check if the command moves money (airtime, data, electricity, cable) */
export function isPurchaseCommand(command: ParsedCommand): boolean {
  return PURCHASE_COMMAND_TYPES.includes(command.commandType);
}

/** Check if the command carries a validation error */
export function hasValidationError(
  command: ParsedCommand
): command is ParsedCommand & { parameters: { error: Readonly<ValidationError> } } {
  return command.parameters.error !== undefined;
}

export function isNetworkProvider(value: string): value is NetworkProvider {
  return NETWORK_PROVIDERS.some((provider) => provider === value);
}

export function isCableProvider(value: string): value is CableProvider {
  return CABLE_PROVIDERS.some((provider) => provider === value);
}
