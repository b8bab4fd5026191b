/**
 * Mock Factories
 * Helper functions to create mocked adapters and fixtures for testing
 */

import { IHttpClient } from '@/interfaces/IHttpClient';
import { IAuthTokenSource, IQuoteProvider } from '@/interfaces/IQuoteProvider';
import { IFetchProgressObserver } from '@/interfaces/IFetchProgressObserver';
import { ILogger } from '@/interfaces/ILogger';
import { MarketSnapshot } from '@/models';

/**
 * All methods are jest.fn() and can be configured with .mockResolvedValue()
 */
export function createMockHttpClient(): jest.Mocked<IHttpClient> {
  return {
    get: jest.fn(),
    post: jest.fn(),
  };
}

export function createMockTokenSource(): jest.Mocked<IAuthTokenSource> {
  return {
    obtain: jest.fn(),
  };
}

export function createMockQuoteProvider(): jest.Mocked<IQuoteProvider> {
  return {
    fetchQuote: jest.fn(),
    fetchSnapshot: jest.fn(),
  };
}

export function createMockProgressObserver(): jest.Mocked<IFetchProgressObserver> {
  return {
    onProgress: jest.fn(),
  };
}

/**
 * Logger that records calls and prints nothing
 */
export function createSilentLogger(): jest.Mocked<ILogger> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    fatal: jest.fn(),
  };
}

/**
 * Snapshot with neutral values; override what the test cares about
 */
export function buildSnapshot(overrides: Partial<MarketSnapshot> = {}): MarketSnapshot {
  return {
    code: '000001',
    name: 'Test Co',
    price: 10_000,
    changePercent: 0,
    volume: 0,
    marketCap: 100,
    ...overrides,
  };
}

/**
 * KIS inquire-price body with string-typed fields, as the API sends them
 */
export function buildQuotePayload(overrides: Record<string, string | undefined> = {}) {
  return {
    rt_cd: '0',
    output: {
      hts_kor_isnm: '테스트전자',
      stck_prpr: '71000',
      prdy_ctrt: '2.50',
      acml_vol: '15000000',
      hts_avls: '4230000000000',
      ...overrides,
    },
  };
}
