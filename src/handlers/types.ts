/**
 * Command Handler Types
 * Orders, receipts and the service interfaces handlers talk to.
 */

import type {
  AmountNaira,
  CableProvider,
  ClassifierConfig,
  NetworkProvider,
  ParsedCommand,
  PhoneNumber,
} from '../parsing';

// ============================================================================
// Orders
// ============================================================================

export const ORDER_KINDS = {
  AIRTIME: 'airtime',
  DATA: 'data',
  ELECTRICITY: 'electricity',
  CABLE: 'cable',
} as const;

export interface AirtimeOrder {
  kind: typeof ORDER_KINDS.AIRTIME;
  /** Wallet that pays */
  payer: PhoneNumber;
  recipient: PhoneNumber;
  amount: AmountNaira;
}

export interface DataOrder {
  kind: typeof ORDER_KINDS.DATA;
  payer: PhoneNumber;
  recipient: PhoneNumber;
  network: NetworkProvider;
  megabytes: number;
}

export interface ElectricityOrder {
  kind: typeof ORDER_KINDS.ELECTRICITY;
  payer: PhoneNumber;
  amount: AmountNaira;
}

export interface CableOrder {
  kind: typeof ORDER_KINDS.CABLE;
  payer: PhoneNumber;
  provider: CableProvider;
}

export type PurchaseOrder = AirtimeOrder | DataOrder | ElectricityOrder | CableOrder;

export type OrderStatus = 'pending' | 'successful' | 'failed';

export interface OrderReceipt {
  reference: string;
  status: OrderStatus;
  /** Naira charged to the wallet */
  amount: number;
  /** Wallet balance after the charge, when the backend reports it */
  balance?: number;
  /** Electricity token or similar voucher */
  token?: string;
}

// ============================================================================
// Account Data
// ============================================================================

export interface TransactionSummary {
  reference: string;
  description: string;
  amount: number;
  status: OrderStatus;
  /** ISO-8601 timestamp */
  createdAt: string;
}

export interface ReferralSummary {
  code: string;
  referrals: number;
  /** Naira earned from referrals */
  earnings: number;
}

// ============================================================================
// Services
// ============================================================================

export interface AccountService {
  getBalance(phone: PhoneNumber): Promise<number>;
  getRecentTransactions(phone: PhoneNumber, limit: number): Promise<TransactionSummary[]>;
  getReferralSummary(phone: PhoneNumber): Promise<ReferralSummary>;
}

export interface OrderService {
  submitOrder(order: PurchaseOrder): Promise<OrderReceipt>;
}

// ============================================================================
// Handlers
// ============================================================================

export interface HandlerContext {
  /** Sender in canonical 234XXXXXXXXXX form */
  sender: PhoneNumber;
  config: ClassifierConfig;
  accounts: AccountService;
  orders: OrderService;
}

/** Produces the reply text for one classified message */
export type CommandHandler = (command: ParsedCommand, context: HandlerContext) => Promise<string>;
