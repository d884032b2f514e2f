/**
 * Environment variable handling with validation
 * API keys are never logged or exposed. LOG_LEVEL and NODE_ENV are read by
 * the logger directly.
 */

export type QuoteProviderType = 'finnhub' | 'file';

export interface EnvConfig {
  ollamaBaseUrl: string;
  ollamaModel: string;
  /** Overrides pipeline.json when set */
  temperature: number | null;
  /** Seconds; `undefined` keeps pipeline.json, `null` disables the budget */
  timeoutSeconds: number | null | undefined;
  heartbeatSeconds: number | null;
  outputDir: string | null;
  stockList: string[] | null;
  quoteProvider: QuoteProviderType;
  quotesFile: string | null;
  finnhubApiKey: string | null;
}

function getEnvVar(name: string, required: boolean = false): string | undefined {
  const value = process.env[name];
  if (required && !value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

function parseNumber(name: string): number | null {
  const raw = getEnvVar(name);
  if (raw === undefined || raw.trim() === '') return null;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Environment variable ${name} must be a number, got "${raw}"`);
  }
  return value;
}

function parseTimeout(): number | null | undefined {
  const raw = getEnvVar('SCORE_TIMEOUT_SECONDS');
  if (raw === undefined || raw.trim() === '') return undefined;
  const normalized = raw.trim().toLowerCase();
  if (normalized === 'none' || normalized === 'off') return null;
  const value = Number(normalized);
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`SCORE_TIMEOUT_SECONDS must be a non-negative number, got "${raw}"`);
  }
  return value === 0 ? null : value;
}

export function parseSymbolList(raw: string): string[] {
  const seen = new Set<string>();
  const symbols: string[] = [];
  for (const part of raw.split(',')) {
    const symbol = part.trim().toUpperCase();
    if (symbol && !seen.has(symbol)) {
      seen.add(symbol);
      symbols.push(symbol);
    }
  }
  return symbols;
}

export function loadEnvConfig(): EnvConfig {
  const quoteProviderRaw = getEnvVar('QUOTE_PROVIDER') || 'finnhub';
  if (quoteProviderRaw !== 'finnhub' && quoteProviderRaw !== 'file') {
    throw new Error(`Unsupported QUOTE_PROVIDER: ${quoteProviderRaw}`);
  }
  const quoteProvider: QuoteProviderType = quoteProviderRaw;

  const stockListRaw = getEnvVar('STOCK_LIST');
  const stockList = stockListRaw ? parseSymbolList(stockListRaw) : null;

  return {
    ollamaBaseUrl: (getEnvVar('OLLAMA_BASE_URL') || 'http://localhost:11434').replace(/\/+$/, ''),
    ollamaModel: getEnvVar('OLLAMA_MODEL') || 'deepseek-r1:8b',
    temperature: parseNumber('MODEL_TEMPERATURE'),
    timeoutSeconds: parseTimeout(),
    heartbeatSeconds: parseNumber('HEARTBEAT_SECONDS'),
    outputDir: getEnvVar('OUTPUT_DIR') || null,
    stockList: stockList && stockList.length > 0 ? stockList : null,
    quoteProvider,
    quotesFile: getEnvVar('QUOTES_FILE') || null,
    finnhubApiKey:
      quoteProvider === 'finnhub' ? getEnvVar('FINNHUB_API_KEY', true) ?? null : null,
  };
}

let cachedConfig: EnvConfig | null = null;

export function getEnvConfig(): EnvConfig {
  if (!cachedConfig) {
    cachedConfig = loadEnvConfig();
  }
  return cachedConfig;
}

export function resetEnvConfig(): void {
  cachedConfig = null;
}
