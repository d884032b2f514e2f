/**
 * Batch Scoring Script
 * Fetches quotes, scores every requested entity through the model service and
 * writes progress.md, summary.md, details/ and run.json under the output dir.
 *
 * Usage:
 *   npx tsx scripts/run_batch.ts
 *   npx tsx scripts/run_batch.ts --symbols=NVDA.US,AAPL.US
 *   npx tsx scripts/run_batch.ts --universe=hk_tech
 */

import './load_env';

import { resolve } from 'path';
import { getConfig, withEnvOverrides } from '../src/core/config';
import { getEnvConfig, parseSymbolList } from '../src/core/env';
import { OllamaChatClient } from '../src/llm/ollama_client';
import { ProgressStore } from '../src/lib/progress/progressStore';
import { createQuoteProvider } from '../src/providers/registry';
import { Orchestrator, toEntityRefs } from '../src/run/orchestrator';
import { BatchFatalError, describeError } from '../src/scoring/errors';
import { Scorer } from '../src/scoring/scorer';
import type { Quote } from '../src/types/scoring';
import { createChildLogger } from '../src/utils/logger';

const logger = createChildLogger('run_batch');

interface BatchCliArgs {
  symbols: string[] | null;
}

function readFlag(name: string): string | undefined {
  const eqArg = process.argv.find((arg) => arg.startsWith(`${name}=`));
  if (eqArg) return eqArg.slice(name.length + 1);
  const index = process.argv.indexOf(name);
  return index >= 0 ? process.argv[index + 1] : undefined;
}

function applyCliArgs(): BatchCliArgs {
  const universe = readFlag('--universe');
  if (universe) {
    process.env.UNIVERSE = universe;
    process.env.UNIVERSE_CONFIG = universe;
    logger.info({ universe }, 'Using universe from CLI flag');
  }

  const symbolsRaw = readFlag('--symbols');
  const symbols = symbolsRaw ? parseSymbolList(symbolsRaw) : null;
  return { symbols: symbols && symbols.length > 0 ? symbols : null };
}

async function main(): Promise<number> {
  const args = applyCliArgs();
  const env = getEnvConfig();
  const config = getConfig();
  const pipeline = withEnvOverrides(config.pipeline, env);

  const symbols = args.symbols ?? env.stockList ?? config.universe.symbols;
  if (symbols.length === 0) {
    logger.error('No symbols to score; set STOCK_LIST, pass --symbols or configure a universe');
    return 1;
  }
  const entities = toEntityRefs(symbols, config.universe.names);

  const provider = createQuoteProvider(env);
  let quotes: Map<string, Quote>;
  try {
    quotes = await provider.getQuotes(symbols);
  } finally {
    provider.close();
  }
  logger.info(
    { requested: symbols.length, quotes: quotes.size, requests: provider.getRequestCount() },
    'Market data ready'
  );

  const client = new OllamaChatClient({ baseUrl: env.ollamaBaseUrl, model: env.ollamaModel });
  const scorer = new Scorer(client, {
    temperature: pipeline.temperature,
    maxAttempts: pipeline.maxAttempts,
    retryBackoffMs: pipeline.retryBackoffMs,
    timeoutMs: pipeline.timeoutMs,
    pollIntervalMs: pipeline.pollIntervalMs,
    heartbeatIntervalMs: pipeline.heartbeatIntervalMs,
    strategy: config.strategy,
  });
  const store = new ProgressStore({ outputDir: resolve(config.projectRoot, pipeline.outputDir) });
  const orchestrator = new Orchestrator(scorer, store);

  const result = await orchestrator.run(entities, quotes);

  logger.info(
    {
      runId: result.run.runId,
      succeeded: result.coverage.succeeded,
      requested: result.coverage.requested,
      modelRequests: client.getRequestCount(),
      summary: result.artifacts.summaryPath,
      record: result.artifacts.record.filePath,
    },
    'Batch run finished'
  );

  return result.coverage.succeeded > 0 ? 0 : 1;
}

process.on('SIGINT', () => {
  logger.warn('Interrupted; progress.md reflects the last completed entity');
  process.exit(130);
});

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof BatchFatalError) {
      logger.fatal({ error: error.message }, 'Batch aborted before scoring');
    } else {
      logger.fatal({ error: describeError(error) }, 'Batch run failed');
    }
    process.exitCode = 2;
  });
