import { createChildLogger } from '@/utils/logger';
import type { Quote } from '@/types/scoring';
import type { QuoteProvider } from '../types';
import { FinnhubClient } from './client';
import type { FinnhubQuote } from './types';

const logger = createChildLogger('finnhub_provider');

/** `NVDA.US` -> `NVDA`; other exchange suffixes are passed through. */
export function toFinnhubSymbol(symbol: string): string {
  return symbol.endsWith('.US') ? symbol.slice(0, -3) : symbol;
}

export function toQuote(symbol: string, raw: FinnhubQuote): Quote | null {
  // Finnhub answers unknown symbols with an all-zero quote.
  if (!raw.c && !raw.pc) return null;

  const changePct =
    typeof raw.dp === 'number'
      ? raw.dp
      : raw.pc
        ? Math.round(((raw.c - raw.pc) / raw.pc) * 100 * 100) / 100
        : 0;

  return {
    symbol,
    lastPrice: raw.c,
    open: raw.o,
    high: raw.h,
    low: raw.l,
    previousClose: raw.pc,
    changePct,
    volume: null,
    turnover: null,
  };
}

export class FinnhubQuoteProvider implements QuoteProvider {
  constructor(private readonly client: FinnhubClient) {}

  async getQuotes(symbols: readonly string[]): Promise<Map<string, Quote>> {
    const quotes = new Map<string, Quote>();
    for (const symbol of symbols) {
      try {
        const raw = await this.client.fetchQuote(toFinnhubSymbol(symbol));
        const quote = toQuote(symbol, raw);
        if (quote) {
          quotes.set(symbol, quote);
        } else {
          logger.warn({ symbol }, 'Finnhub returned an empty quote');
        }
      } catch (error) {
        logger.warn(
          { symbol, error: error instanceof Error ? error.message : String(error) },
          'Quote unavailable'
        );
      }
    }

    const missing = symbols.filter((symbol) => !quotes.has(symbol));
    logger.info({ fetched: quotes.size, missing }, 'Quotes fetched from Finnhub');
    return quotes;
  }

  getRequestCount(): number {
    return this.client.getRequestCount();
  }

  close(): void {
    // Finnhub client has no persistent resources to dispose
  }
}
