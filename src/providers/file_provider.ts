/**
 * Quotes from a local JSON snapshot, keyed by symbol.
 * Used for offline runs and for replaying a captured market state.
 */

import { readFileSync } from 'fs';
import { createChildLogger } from '@/utils/logger';
import { validateQuoteFile } from '@/validation/ajv_instance';
import type { Quote } from '@/types/scoring';
import { ProviderError, type QuoteProvider } from './types';

const logger = createChildLogger('file_provider');

export interface QuoteFileEntry {
  last_price: number;
  open: number;
  high: number;
  low: number;
  prev_close: number;
  change_pct?: number;
  volume?: number | null;
  turnover?: number | null;
}

export type QuoteFileJson = Record<string, QuoteFileEntry>;

export function entryToQuote(symbol: string, entry: QuoteFileEntry): Quote {
  const changePct =
    entry.change_pct ??
    (entry.prev_close
      ? Math.round(((entry.last_price - entry.prev_close) / entry.prev_close) * 100 * 100) / 100
      : 0);

  return {
    symbol,
    lastPrice: entry.last_price,
    open: entry.open,
    high: entry.high,
    low: entry.low,
    previousClose: entry.prev_close,
    changePct,
    volume: entry.volume ?? null,
    turnover: entry.turnover ?? null,
  };
}

export class FileQuoteProvider implements QuoteProvider {
  private snapshot: Map<string, QuoteFileEntry> | null = null;
  private readCount = 0;

  constructor(private readonly filePath: string) {}

  private load(): Map<string, QuoteFileEntry> {
    if (this.snapshot) return this.snapshot;

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.filePath, 'utf-8'));
      this.readCount++;
    } catch (error) {
      throw new ProviderError(
        `Cannot read quote file ${this.filePath}: ${error instanceof Error ? error.message : String(error)}`,
        'file',
        '*',
        'load',
        error instanceof Error ? error : undefined
      );
    }

    const result = validateQuoteFile(raw);
    if (!result.valid || !result.data) {
      throw new ProviderError(
        `Quote file ${this.filePath} is invalid: ${(result.errors ?? []).join('; ')}`,
        'file',
        '*',
        'load'
      );
    }

    this.snapshot = new Map(
      Object.entries(result.data).map(([symbol, entry]) => [symbol.trim().toUpperCase(), entry])
    );
    logger.info({ filePath: this.filePath, symbols: this.snapshot.size }, 'Quote file loaded');
    return this.snapshot;
  }

  async getQuotes(symbols: readonly string[]): Promise<Map<string, Quote>> {
    const snapshot = this.load();
    const quotes = new Map<string, Quote>();
    for (const symbol of symbols) {
      const entry = snapshot.get(symbol.toUpperCase());
      if (entry) {
        quotes.set(symbol, entryToQuote(symbol, entry));
      }
    }

    const missing = symbols.filter((symbol) => !quotes.has(symbol));
    if (missing.length > 0) {
      logger.warn({ missing }, 'Symbols absent from quote file');
    }
    return quotes;
  }

  getRequestCount(): number {
    return this.readCount;
  }

  close(): void {
    this.snapshot = null;
  }
}
