/**
 * Application configuration loaded from JSON files
 */

import { existsSync, readFileSync } from 'fs';
import { isAbsolute, join } from 'path';
import type { EnvConfig } from './env';

export interface UniverseConfig {
  name: string;
  symbols: string[];
  /** Display names keyed by symbol */
  names: Record<string, string>;
  description?: string;
}

export interface PipelineConfig {
  temperature: number;
  maxAttempts: number;
  retryBackoffMs: number;
  /** `null` means no time budget per attempt */
  timeoutMs: number | null;
  heartbeatIntervalMs: number;
  pollIntervalMs: number;
  outputDir: string;
  /** Strategy document appended to the system prompt, relative to the project root */
  strategyPath: string | null;
}

export interface AppConfig {
  universe: UniverseConfig;
  pipeline: PipelineConfig;
  /** Text of `pipeline.strategyPath`, read once at load */
  strategy: string | null;
  projectRoot: string;
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public filePath: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  temperature: 0.7,
  maxAttempts: 3,
  retryBackoffMs: 1000,
  timeoutMs: 180_000,
  heartbeatIntervalMs: 5_000,
  pollIntervalMs: 200,
  outputDir: 'report',
  strategyPath: null,
};

let cachedConfig: AppConfig | null = null;

function getProjectRoot(): string {
  return process.cwd();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readJson(filePath: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read ${filePath}: ${message}`, filePath);
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`Expected a JSON object in ${filePath}`, filePath);
  }
  return parsed;
}

function resolveUniversePath(projectRoot: string): string | null {
  const configDir = join(projectRoot, 'config');
  const envPath = process.env.UNIVERSE_CONFIG || process.env.UNIVERSE;

  if (envPath) {
    if (isAbsolute(envPath)) return envPath;
    if (envPath.endsWith('.json') || envPath.includes('/')) {
      return envPath.startsWith('config/') ? join(projectRoot, envPath) : join(configDir, envPath);
    }
    return join(configDir, 'universes', `${envPath}.json`);
  }

  const defaultPack = join(configDir, 'universe.json');
  return existsSync(defaultPack) ? defaultPack : null;
}

export function normalizeUniverse(raw: Record<string, unknown>): UniverseConfig {
  const symbols = Array.isArray(raw.symbols) ? raw.symbols : [];
  const normalizedSymbols: string[] = [];
  const seen = new Set<string>();
  for (const sym of symbols) {
    if (typeof sym !== 'string') continue;
    const upper = sym.trim().toUpperCase();
    if (upper && !seen.has(upper)) {
      seen.add(upper);
      normalizedSymbols.push(upper);
    }
  }

  const names: Record<string, string> = {};
  if (raw.names && typeof raw.names === 'object' && !Array.isArray(raw.names)) {
    for (const [symbol, name] of Object.entries(raw.names)) {
      if (typeof name === 'string' && name.trim()) {
        names[symbol.trim().toUpperCase()] = name.trim();
      }
    }
  }

  return {
    name: typeof raw.name === 'string' ? raw.name : 'Universe',
    symbols: normalizedSymbols,
    names,
    description: typeof raw.description === 'string' ? raw.description : '',
  };
}

function readNumber(
  raw: Record<string, unknown>,
  key: string,
  fallback: number,
  filePath: string,
  min: number
): number {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isFinite(value) || value < min) {
    throw new ConfigError(`${key} must be a number >= ${min}`, filePath);
  }
  return value;
}

export function normalizePipeline(raw: Record<string, unknown>, filePath: string): PipelineConfig {
  const defaults = DEFAULT_PIPELINE_CONFIG;
  let timeoutMs = defaults.timeoutMs;
  if (raw.timeout_seconds === null) {
    timeoutMs = null;
  } else if (raw.timeout_seconds !== undefined) {
    const seconds = readNumber(raw, 'timeout_seconds', 0, filePath, 0);
    timeoutMs = seconds === 0 ? null : seconds * 1000;
  }

  return {
    temperature: readNumber(raw, 'temperature', defaults.temperature, filePath, 0),
    maxAttempts: Math.floor(readNumber(raw, 'max_attempts', defaults.maxAttempts, filePath, 1)),
    retryBackoffMs: readNumber(raw, 'retry_backoff_ms', defaults.retryBackoffMs, filePath, 0),
    timeoutMs,
    heartbeatIntervalMs:
      readNumber(raw, 'heartbeat_seconds', defaults.heartbeatIntervalMs / 1000, filePath, 0.001) *
      1000,
    pollIntervalMs: readNumber(raw, 'poll_interval_ms', defaults.pollIntervalMs, filePath, 1),
    outputDir: typeof raw.output_dir === 'string' && raw.output_dir ? raw.output_dir : defaults.outputDir,
    strategyPath: readOptionalPath(raw, 'strategy_path', filePath),
  };
}

function readOptionalPath(raw: Record<string, unknown>, key: string, filePath: string): string | null {
  const value = raw[key];
  if (value === undefined || value === null || value === '') return null;
  if (typeof value !== 'string') {
    throw new ConfigError(`${key} must be a string path`, filePath);
  }
  return value;
}

export function loadStrategy(strategyPath: string, projectRoot: string): string {
  const filePath = isAbsolute(strategyPath) ? strategyPath : join(projectRoot, strategyPath);
  if (!existsSync(filePath)) {
    throw new ConfigError(`Strategy file not found: ${filePath}`, filePath);
  }
  return readFileSync(filePath, 'utf-8');
}

/**
 * Applies environment overrides on top of the file-based pipeline settings.
 */
export function withEnvOverrides(
  pipeline: PipelineConfig,
  env: Pick<EnvConfig, 'temperature' | 'timeoutSeconds' | 'heartbeatSeconds' | 'outputDir'>
): PipelineConfig {
  return {
    ...pipeline,
    temperature: env.temperature ?? pipeline.temperature,
    timeoutMs:
      env.timeoutSeconds === undefined
        ? pipeline.timeoutMs
        : env.timeoutSeconds === null
          ? null
          : env.timeoutSeconds * 1000,
    heartbeatIntervalMs:
      env.heartbeatSeconds !== null && env.heartbeatSeconds > 0
        ? env.heartbeatSeconds * 1000
        : pipeline.heartbeatIntervalMs,
    outputDir: env.outputDir ?? pipeline.outputDir,
  };
}

export function loadConfig(): AppConfig {
  const projectRoot = getProjectRoot();

  const universePath = resolveUniversePath(projectRoot);
  if (universePath && !existsSync(universePath)) {
    throw new ConfigError(`Universe file not found: ${universePath}`, universePath);
  }
  const universe = universePath
    ? normalizeUniverse(readJson(universePath))
    : normalizeUniverse({});

  const pipelinePath = join(projectRoot, 'config', 'pipeline.json');
  const pipeline = existsSync(pipelinePath)
    ? normalizePipeline(readJson(pipelinePath), pipelinePath)
    : { ...DEFAULT_PIPELINE_CONFIG };

  const strategy = pipeline.strategyPath ? loadStrategy(pipeline.strategyPath, projectRoot) : null;

  return {
    universe,
    pipeline,
    strategy,
    projectRoot,
  };
}

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}
