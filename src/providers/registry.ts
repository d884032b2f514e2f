import type { EnvConfig } from '@/core/env';
import type { ProviderType, QuoteProvider } from './types';
import { FinnhubClient } from './finnhub/client';
import { FinnhubQuoteProvider } from './finnhub/provider';
import { FileQuoteProvider } from './file_provider';

/**
 * Create the quote provider named by QUOTE_PROVIDER.
 *
 * - `finnhub`: live quotes, needs FINNHUB_API_KEY
 * - `file`: JSON snapshot at QUOTES_FILE (default `config/quotes.json`)
 */
export function createQuoteProvider(
  env: Pick<EnvConfig, 'quoteProvider' | 'finnhubApiKey' | 'quotesFile'>,
  providerType?: ProviderType
): QuoteProvider {
  const type = providerType ?? env.quoteProvider;

  switch (type) {
    case 'finnhub':
      if (!env.finnhubApiKey) {
        throw new Error('FINNHUB_API_KEY is required for the finnhub quote provider');
      }
      return new FinnhubQuoteProvider(new FinnhubClient(env.finnhubApiKey));
    case 'file':
      return new FileQuoteProvider(env.quotesFile ?? 'config/quotes.json');
    default: {
      const unknownType: never = type;
      throw new Error(`Unknown provider type: ${String(unknownType)}`);
    }
  }
}
