/**
 * Finnhub API Client
 * Quote endpoint with exponential backoff on rate limits and server errors
 */

import { createChildLogger } from '@/utils/logger';
import { sleep } from '@/core/time';
import { ProviderError } from '../types';
import type { FinnhubQuote } from './types';

const logger = createChildLogger('finnhub');

const BASE_URL = 'https://finnhub.io/api/v1';

export interface FinnhubClientOptions {
  baseUrl?: string;
  maxRetries?: number;
  initialBackoffMs?: number;
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

export class FinnhubClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly maxRetries: number;
  private readonly initialBackoffMs: number;
  private requestCount = 0;

  constructor(apiKey: string, options: FinnhubClientOptions = {}) {
    this.apiKey = apiKey;
    this.baseUrl = options.baseUrl ?? BASE_URL;
    this.maxRetries = options.maxRetries ?? 3;
    this.initialBackoffMs = options.initialBackoffMs ?? 1000;
  }

  getRequestCount(): number {
    return this.requestCount;
  }

  private async fetchWithRetry<T>(
    endpoint: string,
    symbol: string,
    params: Record<string, string | number> = {}
  ): Promise<T> {
    const url = new URL(`${this.baseUrl}${endpoint}`);
    url.searchParams.set('token', this.apiKey);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, String(value));
    }

    let lastError: ProviderError | null = null;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      let response: Response;
      try {
        response = await fetch(url.toString());
        this.requestCount++;
      } catch (error) {
        const cause = error instanceof Error ? error : new Error(String(error));
        lastError = new ProviderError(`Finnhub request failed: ${cause.message}`, 'finnhub', symbol, endpoint, cause);
        await this.backoff(attempt, lastError.message);
        continue;
      }

      if (response.ok) {
        return (await response.json()) as T;
      }

      lastError = new ProviderError(
        `Finnhub API error: ${response.status} ${response.statusText}`,
        'finnhub',
        symbol,
        endpoint
      );
      if (!isRetryableStatus(response.status)) {
        throw lastError;
      }
      await this.backoff(attempt, lastError.message);
    }

    throw lastError ?? new ProviderError('Finnhub request failed after retries', 'finnhub', symbol, endpoint);
  }

  private async backoff(attempt: number, reason: string): Promise<void> {
    if (attempt >= this.maxRetries) return;
    const backoffMs = this.initialBackoffMs * Math.pow(2, attempt);
    logger.warn({ attempt, backoffMs, error: reason }, 'Finnhub request failed, retrying');
    await sleep(backoffMs);
  }

  async fetchQuote(symbol: string): Promise<FinnhubQuote> {
    return this.fetchWithRetry<FinnhubQuote>('/quote', symbol, { symbol });
  }
}
