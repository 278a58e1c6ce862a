/**
 * Test utilities for server tests
 *
 * In-process fakes and fixtures; nothing here touches the network.
 */

import { signLaunchParams } from '@tonplace-miniapp/sdk';
import type { CreatePurchaseInput, Purchase, PurchaseListOptions } from '@tonplace-miniapp/sdk';
import type { ServerConfig } from '../src/types';
import type { PurchaseApi } from '../src/services/purchase-api';
import { PrometheusMetrics } from '../src/monitoring/prometheus-metrics';

export const TEST_SECRET = 'test-secret';

/** 2023-11-14T22:13:20Z */
export const NOW_SECONDS = 1_700_000_000;
export const now = () => new Date(NOW_SECONDS * 1000);

/**
 * Creates a valid server configuration for testing
 */
export function createTestConfig(overrides: Partial<ServerConfig> = {}): ServerConfig {
  return {
    port: 8080,
    host: '127.0.0.1',
    appId: '7',
    appSecret: TEST_SECRET,
    apiUrl: 'http://upstream.test',
    signatureMaxAge: 300,
    apiTimeout: 10000,
    purchaseHistoryLimit: 50,
    rateLimitRequests: 100,
    rateLimitWindow: 60000,
    corsOrigin: undefined,
    httpProxyCount: 0,
    logLevel: 'silent',
    ...overrides
  };
}

export interface LaunchOverrides {
  user_id?: string;
  ts?: string;
  first_name?: string;
  last_name?: string;
}

/**
 * Query string signed the way the platform signs launch URLs
 */
export function signedQuery(overrides: LaunchOverrides = {}, secret: string = TEST_SECRET): string {
  return signLaunchParams(
    {
      app_id: '7',
      user_id: '42',
      ts: String(NOW_SECONDS),
      first_name: 'Ada',
      last_name: 'Lovelace',
      ...overrides
    },
    secret
  ).toString();
}

export function createTestPurchase(overrides: Partial<Purchase> = {}): Purchase {
  return {
    id: 1,
    amount: 100,
    currency: 'eur',
    user_id: 42,
    created_at: NOW_SECONDS,
    status: 'paid',
    title: 'Premium',
    ...overrides
  };
}

/**
 * Fake platform API recording its calls
 */
export class FakePurchaseApi implements PurchaseApi {
  purchases: Purchase[] = [];
  nextPurchaseId = 555;
  failWith: Error | null = null;

  readonly listCalls: Array<{ userId: number; options: PurchaseListOptions }> = [];
  readonly createCalls: CreatePurchaseInput[] = [];

  async getPurchases(userId: number, options: PurchaseListOptions = {}): Promise<Purchase[]> {
    this.listCalls.push({ userId, options });
    if (this.failWith) {
      throw this.failWith;
    }
    return this.purchases;
  }

  async createPurchase(input: CreatePurchaseInput): Promise<number> {
    this.createCalls.push(input);
    if (this.failWith) {
      throw this.failWith;
    }
    return this.nextPurchaseId;
  }
}

/**
 * Metrics on a private registry, without default process collectors
 */
export function createTestMetrics(): PrometheusMetrics {
  return new PrometheusMetrics({ collectDefaults: false });
}
