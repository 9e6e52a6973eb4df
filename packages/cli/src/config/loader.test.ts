import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { loadConfig, loadConfigWithMeta, setConfigValue, getConfigPath, ConfigError } from './loader.js';
import { writeFileSync, mkdtempSync, rmSync, readFileSync } from 'fs';
import { resolve, join } from 'path';
import { homedir, tmpdir } from 'os';

let testDir: string;
let testConfigPath: string;

describe('config loader', () => {
  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'claimtrace-config-'));
    testConfigPath = resolve(testDir, 'config.yaml');
    for (const key of ['CLAIMTRACE_DOCS', 'CLAIMTRACE_QUESTIONS', 'CLAIMTRACE_CLAIMS', 'CLAIMTRACE_OUT']) {
      vi.stubEnv(key, '');
    }
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    rmSync(testDir, { recursive: true, force: true });
  });

  it('returns defaults when no config file exists', () => {
    const { config, configFileExists, envKeysUsed } = loadConfigWithMeta({ configPath: testConfigPath });

    expect(configFileExists).toBe(false);
    expect(envKeysUsed).toEqual([]);
    expect(config).toEqual({
      retrieval: { top_k: 10, k1: 1.5, b: 0.75, epsilon: 0.25 },
      verification: {
        min_score: 3,
        prohibition_overlap: 0.3,
        support_overlap: 0.4,
        log_limit: 10,
        negation_words: ['not', 'never', 'no', 'cannot', 'prohibited', 'must not', 'should not'],
      },
      inputs: {},
      output: { dir: './outputs', report: false },
    });
  });

  it('loads and merges custom config', () => {
    writeFileSync(testConfigPath, `
retrieval:
  top_k: 5
verification:
  min_score: 2.5
  negation_words: [not, none]
inputs:
  docs: ./corpus
output:
  report: true
`);

    const config = loadConfig({ configPath: testConfigPath });

    expect(config.retrieval).toEqual({ top_k: 5, k1: 1.5, b: 0.75, epsilon: 0.25 });
    expect(config.verification.min_score).toBe(2.5);
    expect(config.verification.support_overlap).toBe(0.4);
    expect(config.verification.negation_words).toEqual(['not', 'none']);
    expect(config.inputs).toEqual({ docs: './corpus' });
    expect(config.output).toEqual({ dir: './outputs', report: true });
  });

  it('does not share defaults between loads', () => {
    const first = loadConfig({ configPath: testConfigPath });
    first.verification.negation_words.push('hardly');
    const second = loadConfig({ configPath: testConfigPath });
    expect(second.verification.negation_words).not.toContain('hardly');
  });

  it('resolves env: prefix from environment variable', () => {
    writeFileSync(testConfigPath, `
inputs:
  docs: env:TEST_DOCS_DIR
`);
    vi.stubEnv('TEST_DOCS_DIR', '/data/docs');

    expect(loadConfig({ configPath: testConfigPath }).inputs.docs).toBe('/data/docs');
  });

  it('resolves $ and ${} prefixes from environment variables', () => {
    writeFileSync(testConfigPath, `
inputs:
  questions: $TEST_QUESTIONS
  claims: \${TEST_CLAIMS}
`);
    vi.stubEnv('TEST_QUESTIONS', '/data/q.jsonl');
    vi.stubEnv('TEST_CLAIMS', '/data/c.jsonl');

    const config = loadConfig({ configPath: testConfigPath });
    expect(config.inputs.questions).toBe('/data/q.jsonl');
    expect(config.inputs.claims).toBe('/data/c.jsonl');
  });

  it('clears unresolved env references', () => {
    writeFileSync(testConfigPath, `
inputs:
  docs: env:TEST_UNSET_DOCS
output:
  dir: $TEST_UNSET_OUT
`);
    vi.stubEnv('TEST_UNSET_DOCS', '');
    vi.stubEnv('TEST_UNSET_OUT', '');

    const config = loadConfig({ configPath: testConfigPath });
    expect(config.inputs.docs).toBeUndefined();
    expect(config.output.dir).toBe('./outputs');
  });

  it('falls back to CLAIMTRACE_* environment variables for unset paths', () => {
    writeFileSync(testConfigPath, `
inputs:
  docs: ./corpus
`);
    vi.stubEnv('CLAIMTRACE_DOCS', '/env/docs');
    vi.stubEnv('CLAIMTRACE_CLAIMS', '/env/claims.jsonl');
    vi.stubEnv('CLAIMTRACE_OUT', '/env/out');

    const { config, configFileExists, envKeysUsed } = loadConfigWithMeta({ configPath: testConfigPath });

    expect(configFileExists).toBe(true);
    expect(config.inputs).toEqual({ docs: './corpus', claims: '/env/claims.jsonl' });
    expect(config.output.dir).toBe('/env/out');
    expect(envKeysUsed).toEqual(['CLAIMTRACE_CLAIMS', 'CLAIMTRACE_OUT']);
  });

  it('prefers an output dir from the file over CLAIMTRACE_OUT', () => {
    writeFileSync(testConfigPath, `
output:
  dir: ./runs
`);
    vi.stubEnv('CLAIMTRACE_OUT', '/env/out');

    expect(loadConfig({ configPath: testConfigPath }).output.dir).toBe('./runs');
  });

  it('strips null values left by empty YAML keys', () => {
    writeFileSync(testConfigPath, `
retrieval:
  top_k:
inputs:
`);
    const config = loadConfig({ configPath: testConfigPath });
    expect(config.retrieval.top_k).toBe(10);
    expect(config.inputs).toEqual({});
  });

  it('treats an empty file as defaults', () => {
    writeFileSync(testConfigPath, '');
    expect(loadConfig({ configPath: testConfigPath }).output.dir).toBe('./outputs');
  });

  it('throws ConfigError for out-of-range values', () => {
    writeFileSync(testConfigPath, `
retrieval:
  b: 1.5
`);
    expect(() => loadConfig({ configPath: testConfigPath })).toThrow(ConfigError);
    expect(() => loadConfig({ configPath: testConfigPath })).toThrow(/^Invalid config: retrieval\.b: /);
  });

  it('throws ConfigError for unknown keys', () => {
    writeFileSync(testConfigPath, `
providers:
  anthropic: {}
`);
    expect(() => loadConfig({ configPath: testConfigPath })).toThrow(ConfigError);
  });

  it('throws ConfigError for malformed YAML', () => {
    writeFileSync(testConfigPath, 'retrieval: [unclosed');
    expect(() => loadConfig({ configPath: testConfigPath })).toThrow('Failed to parse config file');
  });

  it('throws ConfigError for a non-mapping document', () => {
    writeFileSync(testConfigPath, '- just\n- a list\n');
    expect(() => loadConfig({ configPath: testConfigPath })).toThrow(ConfigError);
  });
});

describe('getConfigPath', () => {
  it('expands a leading tilde', () => {
    expect(getConfigPath('~/custom.yaml')).toBe(resolve(homedir(), 'custom.yaml'));
  });

  it('defaults to ~/.claimtrace/config.yaml', () => {
    expect(getConfigPath()).toBe(resolve(homedir(), '.claimtrace/config.yaml'));
  });
});

describe('setConfigValue', () => {
  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'claimtrace-config-'));
    testConfigPath = resolve(testDir, 'config.yaml');
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it('sets a nested number, creating parent keys', () => {
    writeFileSync(testConfigPath, 'output:\n  dir: ./runs\n');
    setConfigValue('retrieval.top_k', '7', { configPath: testConfigPath });

    const config = loadConfig({ configPath: testConfigPath });
    expect(config.retrieval.top_k).toBe(7);
    expect(config.output.dir).toBe('./runs');
  });

  it('coerces booleans and strings', () => {
    writeFileSync(testConfigPath, '');
    setConfigValue('output.report', 'true', { configPath: testConfigPath });
    setConfigValue('inputs.docs', './corpus', { configPath: testConfigPath });

    expect(readFileSync(testConfigPath, 'utf-8')).toBe('output:\n  report: true\ninputs:\n  docs: ./corpus\n');
  });

  it('splits comma-separated values into lists', () => {
    writeFileSync(testConfigPath, '');
    setConfigValue('verification.negation_words', 'not, never,no', { configPath: testConfigPath });

    expect(loadConfig({ configPath: testConfigPath }).verification.negation_words).toEqual(['not', 'never', 'no']);
  });

  it('rejects values that fail validation', () => {
    writeFileSync(testConfigPath, '');
    expect(() => setConfigValue('retrieval.top_k', '-3', { configPath: testConfigPath }))
      .toThrow(/^Invalid config after setting retrieval\.top_k: /);
    expect(readFileSync(testConfigPath, 'utf-8')).toBe('');
  });

  it('throws when the config file does not exist', () => {
    expect(() => setConfigValue('output.report', 'true', { configPath: resolve(testDir, 'missing.yaml') }))
      .toThrow(ConfigError);
  });
});
