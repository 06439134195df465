// Types
export {
  COMMAND_TYPES,
  NETWORK_PROVIDERS,
  CABLE_PROVIDERS,
  type CommandType,
  type MatchableCommandType,
  type ConfidenceLevel,
  type NetworkProvider,
  type CableProvider,
  type AmountNaira,
  type PhoneNumber,
  type DataSize,
  type ParameterName,
  type ParameterValues,
  type ValidationErrorCode,
  type ValidationError,
  type NormalizeResult,
  type CommandParameters,
  type ParsedCommand,
  // Type guards
  isNormalizeSuccess,
  isUnknownCommand,
  isPurchaseCommand,
  hasValidationError,
  isNetworkProvider,
  isCableProvider,
} from './types';

// Configuration
export {
  type AmountBounds,
  type DataSizeRules,
  type ClassifierConfig,
  DEFAULT_AIRTIME_BOUNDS,
  DEFAULT_ELECTRICITY_BOUNDS,
  DEFAULT_DATA_SIZE_RULES,
  DEFAULT_CLASSIFIER_CONFIG,
  ClassifierConfigError,
  validateClassifierConfig,
  createClassifierConfig,
} from './config';

// Normalizers
export {
  COUNTRY_CODE,
  normalizePhone,
  normalizeAmount,
  normalizeDataSize,
  formatDataSize,
  isDataUnit,
  normalizeProvider,
  normalizeNetworkProvider,
  normalizeCableProvider,
} from './normalizer';

// Grammar catalog
export {
  type TriggerPattern,
  type Grammar,
  CatalogError,
  assertValidCatalog,
  buildGrammarCatalog,
  COMMAND_PRIORITY,
} from './grammars';

// Classifier
export {
  IntentClassifier,
  createIntentClassifier,
  deriveConfidence,
  normalizeMessage,
} from './classifier';
