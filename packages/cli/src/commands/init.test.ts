import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { resolve } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CONFIG_TEMPLATE, initCommand } from './init.js';
import { loadConfig } from '../config/index.js';

describe('initCommand', () => {
  let testHomeDir = '';

  beforeEach(() => {
    testHomeDir = mkdtempSync(resolve(tmpdir(), 'claimtrace-init-'));
  });

  afterEach(() => {
    if (testHomeDir && existsSync(testHomeDir)) {
      rmSync(testHomeDir, { recursive: true, force: true });
    }
  });

  it('writes the template to ~/.claimtrace/config.yaml by default', async () => {
    await initCommand({ homeDir: testHomeDir, logger: () => undefined });

    const configPath = resolve(testHomeDir, '.claimtrace', 'config.yaml');
    expect(readFileSync(configPath, 'utf-8')).toBe(CONFIG_TEMPLATE);
  });

  it('uses the provided config path override', async () => {
    const customConfigPath = resolve(testHomeDir, 'custom', 'config.yaml');

    await initCommand({
      homeDir: testHomeDir,
      configPath: customConfigPath,
      logger: () => undefined,
    });

    expect(existsSync(customConfigPath)).toBe(true);
    expect(existsSync(resolve(testHomeDir, '.claimtrace'))).toBe(false);
  });

  it('expands a tilde in the config path against the home directory', async () => {
    await initCommand({ homeDir: testHomeDir, configPath: '~/alt.yaml', logger: () => undefined });
    expect(existsSync(resolve(testHomeDir, 'alt.yaml'))).toBe(true);
  });

  it('leaves an existing config untouched', async () => {
    const configDir = resolve(testHomeDir, '.claimtrace');
    const configPath = resolve(configDir, 'config.yaml');

    mkdirSync(configDir, { recursive: true });
    writeFileSync(configPath, 'output:\n  report: true\n', 'utf-8');
    const messages: unknown[][] = [];

    await initCommand({
      homeDir: testHomeDir,
      logger: (...args) => messages.push(args),
    });

    expect(readFileSync(configPath, 'utf-8')).toBe('output:\n  report: true\n');
    expect(messages[1]).toEqual([expect.stringContaining('Run with --config')]);
  });

  it('writes a template that loads as the defaults', async () => {
    const configPath = resolve(testHomeDir, 'config.yaml');
    await initCommand({ homeDir: testHomeDir, configPath, logger: () => undefined });

    const config = loadConfig({ configPath });
    expect(config.retrieval.top_k).toBe(10);
    expect(config.verification.negation_words).toHaveLength(7);
    expect(config.output).toEqual({ dir: './outputs', report: false });
  });
});
