/**
 * Transaction Backend Client
 * JSON HTTP client for wallet balances, transaction history, referrals and
 * purchase orders. Responses are validated before they reach the handlers.
 */

import type { BackendConfig } from '../../config';
import type {
  AccountService,
  OrderReceipt,
  OrderService,
  OrderStatus,
  PurchaseOrder,
  ReferralSummary,
  TransactionSummary,
} from '../../handlers/types';

export class BackendError extends Error {
  /** HTTP status, or 0 when the response never arrived or was unusable */
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = 'BackendError';
    this.status = status;
  }
}

// ============================================================================
// Response Validation
// ============================================================================

type JsonObject = Record<string, unknown>;

function isRecord(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

const ORDER_STATUSES: readonly OrderStatus[] = ['pending', 'successful', 'failed'];

function isOrderStatus(value: unknown): value is OrderStatus {
  return ORDER_STATUSES.some((status) => status === value);
}

function invalidResponse(path: string, detail: string): BackendError {
  return new BackendError(0, `Invalid backend response from ${path}: ${detail}`);
}

function parseTransaction(value: unknown, path: string): TransactionSummary {
  if (
    !isRecord(value) ||
    typeof value.reference !== 'string' ||
    typeof value.description !== 'string' ||
    !isFiniteNumber(value.amount) ||
    !isOrderStatus(value.status) ||
    typeof value.createdAt !== 'string'
  ) {
    throw invalidResponse(path, 'malformed transaction');
  }

  return {
    reference: value.reference,
    description: value.description,
    amount: value.amount,
    status: value.status,
    createdAt: value.createdAt,
  };
}

function parseReceipt(value: unknown, path: string): OrderReceipt {
  if (
    !isRecord(value) ||
    typeof value.reference !== 'string' ||
    !isOrderStatus(value.status) ||
    !isFiniteNumber(value.amount)
  ) {
    throw invalidResponse(path, 'malformed order receipt');
  }

  const receipt: OrderReceipt = {
    reference: value.reference,
    status: value.status,
    amount: value.amount,
  };
  if (isFiniteNumber(value.balance)) {
    receipt.balance = value.balance;
  }
  if (typeof value.token === 'string') {
    receipt.token = value.token;
  }
  return receipt;
}

// ============================================================================
// Client
// ============================================================================

export class BackendClient implements AccountService, OrderService {
  private readonly baseUrl: string;
  private readonly apiKey?: string;

  constructor(config: BackendConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.apiKey = config.apiKey;
  }

  async getBalance(phone: string): Promise<number> {
    const path = `/wallets/${encodeURIComponent(phone)}/balance`;
    const data = await this.request(path);

    if (!isRecord(data) || !isFiniteNumber(data.balance)) {
      throw invalidResponse(path, 'missing balance');
    }
    return data.balance;
  }

  async getRecentTransactions(phone: string, limit: number): Promise<TransactionSummary[]> {
    const params = new URLSearchParams({ limit: limit.toString() });
    const path = `/wallets/${encodeURIComponent(phone)}/transactions?${params.toString()}`;
    const data = await this.request(path);

    if (!isRecord(data) || !Array.isArray(data.transactions)) {
      throw invalidResponse(path, 'missing transactions');
    }
    return data.transactions.map((transaction: unknown) => parseTransaction(transaction, path));
  }

  async getReferralSummary(phone: string): Promise<ReferralSummary> {
    const path = `/referrals/${encodeURIComponent(phone)}`;
    const data = await this.request(path);

    if (
      !isRecord(data) ||
      typeof data.code !== 'string' ||
      !isFiniteNumber(data.referrals) ||
      !isFiniteNumber(data.earnings)
    ) {
      throw invalidResponse(path, 'malformed referral summary');
    }
    return { code: data.code, referrals: data.referrals, earnings: data.earnings };
  }

  async submitOrder(order: PurchaseOrder): Promise<OrderReceipt> {
    const path = '/orders';
    const data = await this.request(path, { method: 'POST', body: JSON.stringify(order) });
    return parseReceipt(data, path);
  }

  private async request(path: string, init: { method?: string; body?: string } = {}): Promise<unknown> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (init.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }

    const response = await fetch(`${this.baseUrl}${path}`, {
      method: init.method ?? 'GET',
      headers,
      body: init.body,
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new BackendError(response.status, `Backend error (${response.status}) on ${path}: ${errorText}`);
    }

    try {
      return await response.json();
    } catch (error) {
      throw invalidResponse(path, error instanceof Error ? error.message : String(error));
    }
  }
}
