/**
 * Ton.Place public API client
 *
 * Two calls, authenticated with the app credentials in headers. Each call
 * is a single attempt bounded by `timeoutMs`.
 */

import { Logger } from './core/logger.js';
import {
  CreatePurchaseInput,
  PlatformClientConfig,
  PlatformError,
  PlatformErrorCode,
  Purchase,
  PurchaseListOptions
} from './types.js';

export const DEFAULT_API_URL = 'https://api.tonplace.net';
export const DEFAULT_TIMEOUT_MS = 10_000;
export const DEFAULT_PURCHASE_COUNT = 50;

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function numberField(source: JsonObject, key: string): number {
  const value = source[key];
  return typeof value === 'number' ? value : 0;
}

function stringField(source: JsonObject, key: string): string {
  const value = source[key];
  return typeof value === 'string' ? value : '';
}

/**
 * Missing fields default to zero values, like the API's own decoders
 */
function toPurchase(value: unknown): Purchase {
  if (!isJsonObject(value)) {
    throw new PlatformError(PlatformErrorCode.INVALID_RESPONSE, 'Purchase entry is not an object');
  }

  return {
    id: numberField(value, 'id'),
    amount: numberField(value, 'amount'),
    currency: stringField(value, 'currency'),
    user_id: numberField(value, 'user_id'),
    created_at: numberField(value, 'created_at'),
    status: stringField(value, 'status'),
    title: stringField(value, 'title')
  };
}

export class PlatformClient {
  private readonly apiUrl: string;
  private readonly timeoutMs: number;
  private logger: Logger;

  constructor(private config: PlatformClientConfig) {
    if (!config.appId) {
      throw new PlatformError(PlatformErrorCode.INVALID_CONFIG, 'appId is required');
    }
    if (!config.appSecret) {
      throw new PlatformError(PlatformErrorCode.INVALID_CONFIG, 'appSecret is required');
    }

    this.apiUrl = (config.apiUrl ?? DEFAULT_API_URL).replace(/\/+$/, '');
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = config.logger ?? new Logger({ context: 'PlatformClient' });
  }

  /**
   * List a user's purchases in this app, newest first
   */
  async getPurchases(userId: number, options: PurchaseListOptions = {}): Promise<Purchase[]> {
    const query = new URLSearchParams({
      count: String(options.count ?? DEFAULT_PURCHASE_COUNT),
      userId: String(userId)
    });

    const body = await this.request('GET', `/apps/purchases?${query.toString()}`);
    const transactions = body.transactions;

    if (transactions === undefined || transactions === null) {
      return [];
    }
    if (!Array.isArray(transactions)) {
      throw new PlatformError(PlatformErrorCode.INVALID_RESPONSE, 'transactions is not a list');
    }

    return transactions.map(toPurchase);
  }

  /**
   * Create a pending purchase and return its id. The user pays for it in
   * the platform's own dialog.
   */
  async createPurchase(input: CreatePurchaseInput): Promise<number> {
    const body = await this.request('POST', '/apps/purchase/create', {
      amount: input.amount,
      currency: input.currency ?? 'eur',
      title: input.title,
      user_id: input.userId
    });

    const purchaseId = body.purchase_id;
    if (typeof purchaseId !== 'number') {
      throw new PlatformError(PlatformErrorCode.INVALID_RESPONSE, 'purchase_id missing from response');
    }

    return purchaseId;
  }

  private async request(method: 'GET' | 'POST', path: string, payload?: JsonObject): Promise<JsonObject> {
    const url = `${this.apiUrl}${path}`;
    const startTime = Date.now();

    let response: Response;
    let text: string;
    try {
      response = await fetch(url, {
        method,
        headers: {
          'App-Id': this.config.appId,
          Secret: this.config.appSecret,
          'Content-Type': 'application/json'
        },
        body: payload === undefined ? undefined : JSON.stringify(payload),
        signal: AbortSignal.timeout(this.timeoutMs)
      });
      text = await response.text();
    } catch (error) {
      const timedOut = error instanceof Error && error.name === 'TimeoutError';
      throw new PlatformError(
        PlatformErrorCode.NETWORK_ERROR,
        timedOut
          ? `Request timed out after ${this.timeoutMs}ms`
          : `Request failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }

    this.logger.debug(`${method} ${path} ${response.status}`, {
      duration: Date.now() - startTime
    });

    if (response.status !== 200) {
      throw new PlatformError(
        PlatformErrorCode.API_ERROR,
        `API returned status ${response.status}: ${text}`,
        { status: response.status }
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new PlatformError(PlatformErrorCode.INVALID_RESPONSE, 'Failed to parse response', {
        cause: error
      });
    }

    if (!isJsonObject(parsed)) {
      throw new PlatformError(PlatformErrorCode.INVALID_RESPONSE, 'Response is not a JSON object');
    }

    return parsed;
  }
}
