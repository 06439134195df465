/**
 * Command Handlers
 * One handler per command type; the record type makes a missing handler a
 * compile error.
 *
 * @module handlers
 */

import { log } from '../logger';
import { COMMAND_TYPES, hasValidationError, type CommandType, type ParsedCommand } from '../parsing';
import {
  balanceMessage,
  describeValidationError,
  didYouMeanMessage,
  helpMessage,
  historyMessage,
  receiptMessage,
  referralMessage,
  unknownMessage,
  welcomeMessage,
} from './replies';
import { ORDER_KINDS, type CommandHandler, type HandlerContext, type PurchaseOrder } from './types';

export const HISTORY_LIMIT = 5;

// ============================================================================
// Purchases
// ============================================================================

/**
 * Reply for a purchase that cannot be submitted yet: a low-confidence guess, a
 * missing parameter or a rejected value. Returns null when the order can go ahead.
 */
function purchaseBlocker(command: ParsedCommand, context: HandlerContext): string | null {
  if (command.confidence === 'low') {
    return didYouMeanMessage(command);
  }
  if (hasValidationError(command)) {
    return describeValidationError(command.parameters.error, command.commandType, context.config);
  }
  return null;
}

/** Build the order for a high-confidence purchase; null if a value is missing */
function buildOrder(command: ParsedCommand, context: HandlerContext): PurchaseOrder | null {
  const { amount, phone, network, size, provider } = command.parameters;
  const payer = context.sender;

  switch (command.commandType) {
    case COMMAND_TYPES.AIRTIME_PURCHASE:
      return amount === undefined ? null : { kind: ORDER_KINDS.AIRTIME, payer, recipient: phone ?? payer, amount };
    case COMMAND_TYPES.DATA_PURCHASE:
      return network === undefined || size === undefined
        ? null
        : { kind: ORDER_KINDS.DATA, payer, recipient: phone ?? payer, network, megabytes: size.megabytes };
    case COMMAND_TYPES.ELECTRICITY_PAYMENT:
      return amount === undefined ? null : { kind: ORDER_KINDS.ELECTRICITY, payer, amount };
    case COMMAND_TYPES.CABLE_SUBSCRIPTION:
      return provider === undefined ? null : { kind: ORDER_KINDS.CABLE, payer, provider };
    default:
      return null;
  }
}

const handlePurchase: CommandHandler = async (command, context) => {
  const blocker = purchaseBlocker(command, context);
  if (blocker !== null) {
    return blocker;
  }

  const order = buildOrder(command, context);
  if (order === null) {
    return didYouMeanMessage(command);
  }

  log('info', 'Submitting order', { from: context.sender, kind: order.kind });
  const receipt = await context.orders.submitOrder(order);
  log('info', 'Order submitted', {
    from: context.sender,
    kind: order.kind,
    reference: receipt.reference,
    status: receipt.status,
  });

  return receiptMessage(order, receipt);
};

// ============================================================================
// Dispatch
// ============================================================================

export const COMMAND_HANDLERS: Record<CommandType, CommandHandler> = {
  [COMMAND_TYPES.GREETING]: async () => welcomeMessage(),
  [COMMAND_TYPES.HELP]: async (_command, context) => helpMessage(context.config),
  [COMMAND_TYPES.BALANCE_CHECK]: async (_command, context) =>
    balanceMessage(await context.accounts.getBalance(context.sender)),
  [COMMAND_TYPES.AIRTIME_PURCHASE]: handlePurchase,
  [COMMAND_TYPES.DATA_PURCHASE]: handlePurchase,
  [COMMAND_TYPES.ELECTRICITY_PAYMENT]: handlePurchase,
  [COMMAND_TYPES.CABLE_SUBSCRIPTION]: handlePurchase,
  [COMMAND_TYPES.TRANSACTION_HISTORY]: async (_command, context) =>
    historyMessage(await context.accounts.getRecentTransactions(context.sender, HISTORY_LIMIT)),
  [COMMAND_TYPES.REFERRAL_INFO]: async (_command, context) =>
    referralMessage(await context.accounts.getReferralSummary(context.sender)),
  [COMMAND_TYPES.UNKNOWN]: async (command) => unknownMessage(command),
};

/**
 * Run the handler for a classified message and return the reply text.
 * Service failures propagate to the caller.
 */
export async function dispatchCommand(command: ParsedCommand, context: HandlerContext): Promise<string> {
  const handler = COMMAND_HANDLERS[command.commandType];
  log('debug', 'Dispatching command', {
    from: context.sender,
    commandType: command.commandType,
    confidence: command.confidence,
  });
  return handler(command, context);
}

export * from './types';
export * from './replies';
