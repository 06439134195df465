/**
 * Reply Formatting
 * Chat text for every handler outcome. WhatsApp renders *bold* and plain newlines.
 */

import { EXTRA_COMMANDS, MENU_COMMANDS } from '../commands';
import {
  COMMAND_TYPES,
  formatDataSize,
  type ClassifierConfig,
  type CommandType,
  type ParsedCommand,
  type ValidationError,
} from '../parsing';
import type { OrderReceipt, PurchaseOrder, TransactionSummary, ReferralSummary } from './types';

// ============================================================================
// Value Formatting
// ============================================================================

export const MAX_ECHO_LENGTH = 100;

export function formatNaira(amount: number): string {
  return `₦${amount.toLocaleString('en-US')}`;
}

/** 2348012345678 -> "0801 234 5678"; anything else is returned unchanged */
export function formatPhoneDisplay(phone: string): string {
  if (!/^234\d{10}$/.test(phone)) {
    return phone;
  }
  const local = `0${phone.slice(3)}`;
  return `${local.slice(0, 4)} ${local.slice(4, 7)} ${local.slice(7)}`;
}

export function truncate(text: string, maxLength: number = MAX_ECHO_LENGTH): string {
  return text.length <= maxLength ? text : `${text.slice(0, maxLength)}...`;
}

function providerList(providers: readonly string[]): string {
  return providers.map((provider) => provider.toUpperCase()).join(', ');
}

// ============================================================================
// Menus
// ============================================================================

function menuLines(): string[] {
  return MENU_COMMANDS.map((command) => `${command.option}. ${command.title}`);
}

export function welcomeMessage(): string {
  return [
    'Hi! 👋 I can help you buy airtime, data, electricity and cable TV from your wallet.',
    '',
    ...menuLines(),
    '',
    'Reply with a number, or just type what you need, e.g. *buy 1000 airtime*.',
  ].join('\n');
}

export function helpMessage(config: ClassifierConfig): string {
  const examples = [...MENU_COMMANDS, ...EXTRA_COMMANDS].map(
    (command) => `• ${command.title}: *${command.example}*`
  );
  return [
    '*What I can do*',
    '',
    ...examples,
    '',
    `Airtime: ${formatNaira(config.airtimeAmount.min)} to ${formatNaira(config.airtimeAmount.max)}`,
    `Electricity: ${formatNaira(config.electricityAmount.min)} to ${formatNaira(config.electricityAmount.max)}`,
    `Networks: ${providerList(config.networkProviders)}`,
    `Cable: ${providerList(config.cableProviders)}`,
  ].join('\n');
}

export function unknownMessage(command: ParsedCommand): string {
  return `Sorry, I didn't understand "${truncate(command.rawText.trim())}". Send *help* to see what I can do.`;
}

export const TEXT_ONLY_MESSAGE = 'I can only read text messages for now. Send *help* to see what I can do.';

export const GENERIC_ERROR_MESSAGE = 'Something went wrong on our side. Please try again in a moment.';

// ============================================================================
// Clarification
// ============================================================================

const EXAMPLES: Record<CommandType, string> = {
  [COMMAND_TYPES.GREETING]: 'hi',
  [COMMAND_TYPES.HELP]: 'help',
  [COMMAND_TYPES.BALANCE_CHECK]: 'balance',
  [COMMAND_TYPES.AIRTIME_PURCHASE]: 'buy 1000 airtime',
  [COMMAND_TYPES.DATA_PURCHASE]: 'buy 2gb mtn',
  [COMMAND_TYPES.ELECTRICITY_PAYMENT]: 'pay 5000 electricity',
  [COMMAND_TYPES.CABLE_SUBSCRIPTION]: 'renew dstv',
  [COMMAND_TYPES.TRANSACTION_HISTORY]: 'history',
  [COMMAND_TYPES.REFERRAL_INFO]: 'referral',
  [COMMAND_TYPES.UNKNOWN]: 'help',
};

/** Prompt for a low-confidence guess, naming the exact command to send */
export function didYouMeanMessage(command: ParsedCommand): string {
  const { amount } = command.parameters;
  if (command.commandType === COMMAND_TYPES.AIRTIME_PURCHASE && amount !== undefined) {
    return `Did you mean to buy ${formatNaira(amount)} airtime? Send *buy ${amount} airtime* to confirm.`;
  }
  return `I'm not sure what you meant. Did you want something like *${EXAMPLES[command.commandType]}*?`;
}

/** Question asking for one missing parameter */
function missingParameterMessage(
  error: ValidationError,
  commandType: CommandType,
  config: ClassifierConfig
): string {
  const example = EXAMPLES[commandType];

  switch (error.parameter) {
    case 'amount':
      return commandType === COMMAND_TYPES.ELECTRICITY_PAYMENT
        ? `How much electricity would you like to buy? Reply with e.g. *${example}*.`
        : `How much airtime would you like to buy? Reply with e.g. *${example}*.`;
    case 'network':
      return `Which network? I support ${providerList(config.networkProviders)}. Reply with e.g. *${example}*.`;
    case 'size':
      return `How much data would you like? Reply with e.g. *${example}*.`;
    case 'provider':
      return `Which cable provider? I support ${providerList(config.cableProviders)}. Reply with e.g. *${example}*.`;
    default:
      return `Some details are missing. Reply with e.g. *${example}*.`;
  }
}

/**
 * User-facing correction for a validation error.
 * Handlers decide the wording; the classifier only reports codes.
 */
export function describeValidationError(
  error: ValidationError,
  commandType: CommandType,
  config: ClassifierConfig
): string {
  const input = error.input ?? '';

  switch (error.code) {
    case 'MissingRequiredParameter':
      return missingParameterMessage(error, commandType, config);
    case 'AmountTooLow':
      return error.limit === undefined
        ? 'That amount is too low.'
        : `That amount is too low. The minimum is ${formatNaira(error.limit)}.`;
    case 'AmountTooHigh':
      return error.limit === undefined
        ? 'That amount is too high.'
        : `That amount is too high. The maximum is ${formatNaira(error.limit)}.`;
    case 'NotNumeric':
      return error.parameter === 'size'
        ? `"${input}" is not a valid data size. Try e.g. *500mb* or *2gb*.`
        : `"${input}" is not a valid amount. Use whole naira, e.g. *1000*.`;
    case 'InvalidPhoneFormat':
      return `"${input}" is not a valid phone number. Use 11 digits, e.g. *08012345678*.`;
    case 'UnknownProvider':
      return error.parameter === 'provider'
        ? `"${input}" is not a cable provider I support. Choose one of: ${providerList(config.cableProviders)}.`
        : `"${input}" is not a network I support. Choose one of: ${providerList(config.networkProviders)}.`;
    case 'UnsupportedDataUnit':
      return `"${input}" is not a unit I understand. Use MB or GB, e.g. *500mb* or *2gb*.`;
    case 'DataSizeTooSmall':
      return error.limit === undefined
        ? 'That data bundle is too small.'
        : `That data bundle is too small. The smallest is ${formatDataSize(error.limit)}.`;
    case 'DataSizeTooLarge':
      return error.limit === undefined
        ? 'That data bundle is too large.'
        : `That data bundle is too large. The largest is ${formatDataSize(error.limit)}.`;
  }
}

// ============================================================================
// Account Replies
// ============================================================================

export function balanceMessage(balance: number): string {
  return `Your wallet balance is *${formatNaira(balance)}*.`;
}

export function historyMessage(transactions: readonly TransactionSummary[]): string {
  if (transactions.length === 0) {
    return 'You have no transactions yet.';
  }

  const lines = transactions.map(
    (tx) => `• ${tx.createdAt.slice(0, 10)} ${tx.description}: ${formatNaira(tx.amount)} (${tx.status})`
  );
  return ['*Recent transactions*', ...lines].join('\n');
}

export function referralMessage(summary: ReferralSummary): string {
  return [
    `Your referral code is *${summary.code}*.`,
    `Friends referred: ${summary.referrals}`,
    `Earnings: ${formatNaira(summary.earnings)}`,
  ].join('\n');
}

// ============================================================================
// Receipts
// ============================================================================

export function describeOrder(order: PurchaseOrder): string {
  switch (order.kind) {
    case 'airtime':
      return `${formatNaira(order.amount)} airtime for ${formatPhoneDisplay(order.recipient)}`;
    case 'data':
      return `${order.network.toUpperCase()} ${formatDataSize(order.megabytes)} data for ${formatPhoneDisplay(order.recipient)}`;
    case 'electricity':
      return `${formatNaira(order.amount)} electricity`;
    case 'cable':
      return `${order.provider.toUpperCase()} subscription`;
  }
}

export function receiptMessage(order: PurchaseOrder, receipt: OrderReceipt): string {
  const description = describeOrder(order);
  const lines: string[] = [];

  switch (receipt.status) {
    case 'successful':
      lines.push(`✅ ${description} was successful.`);
      break;
    case 'pending':
      lines.push(`⏳ ${description} is processing. Send *history* to check its status.`);
      break;
    case 'failed':
      lines.push(`❌ ${description} failed. Your wallet was not charged.`);
      break;
  }

  lines.push(`Ref: ${receipt.reference}`);
  if (receipt.token !== undefined) {
    lines.push(`Token: ${receipt.token}`);
  }
  if (receipt.balance !== undefined) {
    lines.push(`Balance: ${formatNaira(receipt.balance)}`);
  }
  return lines.join('\n');
}
