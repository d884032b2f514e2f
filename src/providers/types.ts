/**
 * Shared types and interfaces for market data providers.
 *
 * Providers hand the orchestrator a quote per symbol. A symbol the source
 * does not know is left out of the map rather than thrown.
 */
import type { Quote } from '@/types/scoring';

export interface QuoteProvider {
  getQuotes(symbols: readonly string[]): Promise<Map<string, Quote>>;
  getRequestCount(): number;
  close(): void;
}

export type ProviderType = 'finnhub' | 'file';

export class ProviderError extends Error {
  constructor(
    message: string,
    public provider: string,
    public symbol: string,
    public method: string,
    public cause?: Error
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}
