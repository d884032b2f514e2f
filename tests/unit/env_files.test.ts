import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { fileURLToPath } from 'url';
import { loadEnvFiles } from '@/core/env_files';

const KEYS = ['ENV_FILES_LEVEL', 'ENV_FILES_MODEL', 'ENV_FILES_PRESET'];

let tempDir: string;

describe('loadEnvFiles', () => {
  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'env-files-test-'));
    KEYS.forEach((key) => delete process.env[key]);
  });

  afterEach(() => {
    KEYS.forEach((key) => delete process.env[key]);
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('prefers .env.local over .env', () => {
    writeFileSync(join(tempDir, '.env.local'), 'ENV_FILES_LEVEL=debug\n');
    writeFileSync(join(tempDir, '.env'), 'ENV_FILES_LEVEL=warn\nENV_FILES_MODEL=base-model\n');

    loadEnvFiles(tempDir);

    expect(process.env.ENV_FILES_LEVEL).toBe('debug');
    expect(process.env.ENV_FILES_MODEL).toBe('base-model');
  });

  it('keeps variables that are already set', () => {
    process.env.ENV_FILES_PRESET = 'shell';
    writeFileSync(join(tempDir, '.env'), 'ENV_FILES_PRESET=file\n');

    loadEnvFiles(tempDir);

    expect(process.env.ENV_FILES_PRESET).toBe('shell');
  });

  it('tolerates a directory without env files', () => {
    expect(() => loadEnvFiles(tempDir)).not.toThrow();
    expect(process.env.ENV_FILES_LEVEL).toBeUndefined();
  });

  it('is the first import of the batch script', () => {
    const source = readFileSync(fileURLToPath(new URL('../../scripts/run_batch.ts', import.meta.url)), 'utf-8');
    const firstImport = source.split('\n').find((line) => line.startsWith('import '));

    expect(firstImport).toBe("import './load_env';");
  });
});
