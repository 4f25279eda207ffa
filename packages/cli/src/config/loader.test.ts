import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { loadConfig, loadConfigWithMeta, expandTilde, maskConfig, maskKey, ConfigError } from './loader.js';
import { writeFileSync, mkdtempSync, rmSync } from 'node:fs';
import { resolve } from 'node:path';
import { homedir, tmpdir } from 'node:os';

const ENV_KEYS = [
  'ANTHROPIC_API_KEY',
  'OPENAI_API_KEY',
  'GEMINI_API_KEY',
  'GOOGLE_API_KEY',
  'RAPIDAPI_KEY',
  'BRAVE_API_KEY',
  'FINNHUB_API_KEY',
  'FMP_API_KEY',
  'FIRECRAWL_API_KEY',
];

let testDir: string;
let testConfigPath: string;

function writeConfig(yaml: string): void {
  writeFileSync(testConfigPath, yaml);
}

describe('config loader', () => {
  beforeEach(() => {
    testDir = mkdtempSync(resolve(tmpdir(), 'finverdict-config-'));
    testConfigPath = resolve(testDir, 'config.yaml');
    for (const key of ENV_KEYS) vi.stubEnv(key, '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    rmSync(testDir, { recursive: true, force: true });
  });

  it('returns defaults when no config file exists', () => {
    const config = loadConfig({ configPath: testConfigPath });

    expect(config.defaults.provider).toBe('anthropic');
    expect(config.defaults.model).toBe('claude-sonnet-4-20250514');
    expect(config.defaults.max_budget_usd).toBe(0.5);
    expect(config.retrieval).toEqual({ top_k: 10, semantic_weight: 0.7 });
    expect(config.index.dir).toBe('~/.finverdict/index');
    expect(config.aggregation.concurrency).toBe(6);
    expect(config.verification.tolerance).toBe(0.01);
    expect(config.server.port).toBe(8787);
    expect(config.agents.resolve.enabled).toBe(true);
  });

  it('loads and merges custom config', () => {
    writeConfig(`
defaults:
  provider: openai
  max_budget_usd: 2.5
retrieval:
  semantic_weight: 0.4
aggregation:
  timeout_ms: 3000
`);

    const config = loadConfig({ configPath: testConfigPath });

    expect(config.defaults.provider).toBe('openai');
    expect(config.defaults.model).toBe('gpt-4o');
    expect(config.defaults.max_budget_usd).toBe(2.5);
    expect(config.retrieval).toEqual({ top_k: 10, semantic_weight: 0.4 });
    expect(config.aggregation.timeout_ms).toBe(3000);
    expect(config.aggregation.deadline_ms).toBe(20000);
  });

  it('treats an empty file as defaults', () => {
    writeConfig('');

    const result = loadConfigWithMeta({ configPath: testConfigPath });

    expect(result.configFileExists).toBe(true);
    expect(result.config.defaults.provider).toBe('anthropic');
  });

  it('resolves env:, $ and ${} references', () => {
    writeConfig(`
providers:
  anthropic:
    api_key: env:TEST_ANTHROPIC
  openai:
    api_key: $TEST_OPENAI
tools:
  finnhub:
    api_key: \${TEST_FINNHUB}
`);
    vi.stubEnv('TEST_ANTHROPIC', 'test-anthropic');
    vi.stubEnv('TEST_OPENAI', 'test-openai');
    vi.stubEnv('TEST_FINNHUB', 'test-finnhub');

    const config = loadConfig({ configPath: testConfigPath });

    expect(config.providers.anthropic.api_key).toBe('test-anthropic');
    expect(config.providers.openai.api_key).toBe('test-openai');
    expect(config.tools.finnhub.api_key).toBe('test-finnhub');
  });

  it('clears unresolved env refs and treats them as unset', () => {
    writeConfig(`
providers:
  anthropic:
    api_key: env:NONEXISTENT_VAR
tools:
  brave:
    api_key: $ALSO_MISSING
`);

    const config = loadConfig({ configPath: testConfigPath });

    expect(config.providers.anthropic.api_key).toBeUndefined();
    expect(config.tools.brave.api_key).toBeUndefined();
  });

  it('rejects unknown keys and out-of-range values', () => {
    writeConfig(`
retrieval:
  semantic_weight: 1.5
`);
    expect(() => loadConfig({ configPath: testConfigPath })).toThrow(ConfigError);

    writeConfig(`
output_dir: ./reports
`);
    expect(() => loadConfig({ configPath: testConfigPath })).toThrow(/Invalid config: : Unrecognized key/);
  });

  it('throws ConfigError when YAML is invalid', () => {
    writeConfig(`
invalid: yaml: content: [
`);

    expect(() => loadConfig({ configPath: testConfigPath })).toThrow(ConfigError);
  });

  describe('env var fallbacks', () => {
    it('fills provider and tool keys from the standard variables', () => {
      vi.stubEnv('ANTHROPIC_API_KEY', 'test-anthropic');
      vi.stubEnv('FMP_API_KEY', 'test-fmp');
      vi.stubEnv('RAPIDAPI_KEY', 'test-rapidapi');

      const result = loadConfigWithMeta({ configPath: testConfigPath });

      expect(result.config.providers.anthropic.api_key).toBe('test-anthropic');
      expect(result.config.tools.fmp.api_key).toBe('test-fmp');
      expect(result.config.tools.market_data.api_key).toBe('test-rapidapi');
      expect(result.envKeysUsed).toEqual(['ANTHROPIC_API_KEY', 'RAPIDAPI_KEY', 'FMP_API_KEY']);
    });

    it('prefers GEMINI_API_KEY over GOOGLE_API_KEY', () => {
      vi.stubEnv('GEMINI_API_KEY', 'test-gemini');
      vi.stubEnv('GOOGLE_API_KEY', 'test-google');

      const result = loadConfigWithMeta({ configPath: testConfigPath });

      expect(result.config.providers.google.api_key).toBe('test-gemini');
      expect(result.envKeysUsed).toEqual(['GEMINI_API_KEY']);
    });

    it('does not override an explicit key', () => {
      writeConfig(`
providers:
  anthropic:
    api_key: test-explicit
`);
      vi.stubEnv('ANTHROPIC_API_KEY', 'test-from-env');

      const result = loadConfigWithMeta({ configPath: testConfigPath });

      expect(result.config.providers.anthropic.api_key).toBe('test-explicit');
      expect(result.envKeysUsed).toEqual([]);
    });

    it('falls back to the env var when a reference did not resolve', () => {
      writeConfig(`
providers:
  anthropic:
    api_key: env:NONEXISTENT_VAR
`);
      vi.stubEnv('ANTHROPIC_API_KEY', 'test-fallback');

      const config = loadConfig({ configPath: testConfigPath });

      expect(config.providers.anthropic.api_key).toBe('test-fallback');
    });

    it('switches to the first provider with a key', () => {
      vi.stubEnv('GOOGLE_API_KEY', 'test-google');

      const config = loadConfig({ configPath: testConfigPath });

      expect(config.defaults.provider).toBe('google');
      expect(config.defaults.model).toBe('gemini-2.5-pro');
    });
  });

  describe('masking', () => {
    it('keeps four characters of long keys', () => {
      expect(maskKey('test-secret-value')).toBe('test********');
      expect(maskKey('short')).toBe('********');
      expect(maskKey(undefined)).toBeUndefined();
    });

    it('masks every key without touching the original', () => {
      vi.stubEnv('OPENAI_API_KEY', 'test-openai-key');
      vi.stubEnv('BRAVE_API_KEY', 'test-brave-key');
      const config = loadConfig({ configPath: testConfigPath });

      const masked = maskConfig(config);

      expect(masked.providers.openai.api_key).toBe('test********');
      expect(masked.tools.brave.api_key).toBe('test********');
      expect(masked.providers.anthropic.api_key).toBeUndefined();
      expect(config.providers.openai.api_key).toBe('test-openai-key');
    });
  });

  it('expands ~ to the home directory', () => {
    expect(expandTilde('~/.finverdict/index')).toBe(resolve(homedir(), '.finverdict/index'));
    expect(expandTilde('/var/data')).toBe('/var/data');
  });
});
