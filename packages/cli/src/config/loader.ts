import { readFileSync, existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { resolve } from 'node:path';
import { parse } from 'yaml';
import {
  ConfigSchema,
  ConfigDefaults,
  PROVIDER_PRIORITY,
  type Config,
  type ProviderId,
  type RawConfig,
  type ToolKeyName,
} from './schema.js';

const DEFAULT_CONFIG_PATH = '.finverdict/config.yaml';

/** Standard environment variables consulted when a key is not configured, in order. */
const PROVIDER_ENV_KEYS: Record<ProviderId, readonly string[]> = {
  anthropic: ['ANTHROPIC_API_KEY'],
  openai: ['OPENAI_API_KEY'],
  google: ['GEMINI_API_KEY', 'GOOGLE_API_KEY'],
};

const TOOL_ENV_KEYS: Record<ToolKeyName, string> = {
  market_data: 'RAPIDAPI_KEY',
  brave: 'BRAVE_API_KEY',
  finnhub: 'FINNHUB_API_KEY',
  fmp: 'FMP_API_KEY',
  firecrawl: 'FIRECRAWL_API_KEY',
};

const TOOL_KEY_NAMES = Object.keys(TOOL_ENV_KEYS).filter(isToolKeyName);

function isToolKeyName(name: string): name is ToolKeyName {
  return name in TOOL_ENV_KEYS;
}

function getDefaultConfigPath(): string {
  return resolve(homedir(), DEFAULT_CONFIG_PATH);
}

export function expandTilde(path: string): string {
  if (path.startsWith('~/') || path === '~') {
    return resolve(homedir(), path.slice(2));
  }
  return path;
}

function resolveEnvVar(value: string): string {
  if (value.startsWith('env:')) {
    const envVal = process.env[value.slice(4)];
    return envVal ? envVal : value;
  }
  if (value.startsWith('${') && value.endsWith('}')) {
    const envVal = process.env[value.slice(2, -1)];
    return envVal ? envVal : value;
  }
  if (value.startsWith('$')) {
    const envVal = process.env[value.slice(1)];
    return envVal ? envVal : value;
  }
  return value;
}

function stripNullValues(obj: unknown): unknown {
  if (obj === null || obj === undefined) {
    return undefined;
  }
  if (Array.isArray(obj)) {
    return obj.filter(item => item !== null).map(stripNullValues);
  }
  if (typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (value !== null) {
        result[key] = stripNullValues(value);
      }
    }
    return result;
  }
  return obj;
}

function resolveEnvVarsInObject(obj: unknown): unknown {
  if (obj === null || obj === undefined) {
    return obj;
  }
  if (typeof obj === 'string') {
    return resolveEnvVar(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(resolveEnvVarsInObject);
  }
  if (typeof obj === 'object') {
    const resolved: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      resolved[key] = resolveEnvVarsInObject(value);
    }
    return resolved;
  }
  return obj;
}

export interface LoadConfigOptions {
  configPath?: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function isUnresolvedEnvRef(value: string | undefined): boolean {
  if (!value) return false;
  return value.startsWith('env:') || value.startsWith('$');
}

function firstEnv(names: readonly string[]): { name: string; value: string } | undefined {
  for (const name of names) {
    const value = process.env[name];
    if (value) return { name, value };
  }
  return undefined;
}

/**
 * Clear env references that did not resolve, then fill missing keys from the
 * standard environment variables. Returns the variables that were used.
 */
function applyEnvVarFallbacks(config: Config): string[] {
  const used: string[] = [];

  for (const provider of PROVIDER_PRIORITY) {
    const entry = config.providers[provider];
    if (isUnresolvedEnvRef(entry.api_key)) entry.api_key = undefined;
    if (!entry.api_key) {
      const env = firstEnv(PROVIDER_ENV_KEYS[provider]);
      if (env) {
        entry.api_key = env.value;
        used.push(env.name);
      }
    }
  }

  for (const tool of TOOL_KEY_NAMES) {
    const entry = config.tools[tool];
    if (isUnresolvedEnvRef(entry.api_key)) entry.api_key = undefined;
    if (!entry.api_key) {
      const env = firstEnv([TOOL_ENV_KEYS[tool]]);
      if (env) {
        entry.api_key = env.value;
        used.push(env.name);
      }
    }
  }

  return used;
}

function mergeConfig(base: Config, raw: RawConfig): Config {
  const result = base;
  if (raw.providers) {
    result.providers = {
      anthropic: { ...result.providers.anthropic, ...raw.providers.anthropic },
      openai: { ...result.providers.openai, ...raw.providers.openai },
      google: { ...result.providers.google, ...raw.providers.google },
    };
  }
  if (raw.defaults) {
    result.defaults = { ...result.defaults, ...raw.defaults };
    // A provider switch without a model picks that provider's default model.
    if (raw.defaults.provider && !raw.defaults.model) {
      result.defaults.model = result.providers[raw.defaults.provider].default_model;
    }
  }
  if (raw.agents) {
    result.agents = {
      resolve: { ...result.agents.resolve, ...raw.agents.resolve },
      generate: { ...result.agents.generate, ...raw.agents.generate },
      verify: { ...result.agents.verify, ...raw.agents.verify },
    };
  }
  if (raw.tools) {
    result.tools = {
      ...result.tools,
      ...(raw.tools.user_agent ? { user_agent: raw.tools.user_agent } : {}),
      ...(raw.tools.news_lookback_days ? { news_lookback_days: raw.tools.news_lookback_days } : {}),
      market_data: { ...result.tools.market_data, ...raw.tools.market_data },
      brave: { ...result.tools.brave, ...raw.tools.brave },
      finnhub: { ...result.tools.finnhub, ...raw.tools.finnhub },
      fmp: { ...result.tools.fmp, ...raw.tools.fmp },
      firecrawl: { ...result.tools.firecrawl, ...raw.tools.firecrawl },
    };
  }
  if (raw.retrieval) result.retrieval = { ...result.retrieval, ...raw.retrieval };
  if (raw.index) result.index = { ...result.index, ...raw.index };
  if (raw.aggregation) result.aggregation = { ...result.aggregation, ...raw.aggregation };
  if (raw.verification) result.verification = { ...result.verification, ...raw.verification };
  if (raw.server) result.server = { ...result.server, ...raw.server };
  return result;
}

function readConfigFile(configPath: string): RawConfig | null {
  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch {
    throw new ConfigError(`Failed to read config file: ${configPath}`);
  }

  let rawConfig: unknown;
  try {
    rawConfig = parse(fileContent);
  } catch {
    throw new ConfigError(`Failed to parse config file: ${configPath}`);
  }

  if (rawConfig === null || rawConfig === undefined) return null;

  const validated = ConfigSchema.safeParse(resolveEnvVarsInObject(stripNullValues(rawConfig)));
  if (!validated.success) {
    const issues = validated.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ');
    throw new ConfigError(`Invalid config: ${issues}`);
  }
  return validated.data;
}

export interface LoadConfigResult {
  config: Config;
  configFileExists: boolean;
  envKeysUsed: string[];
}

export function loadConfig(options: LoadConfigOptions = {}): Config {
  return loadConfigWithMeta(options).config;
}

export function loadConfigWithMeta(options: LoadConfigOptions = {}): LoadConfigResult {
  const configPath = getConfigPath(options.configPath);
  const configFileExists = existsSync(configPath);

  let result = structuredClone(ConfigDefaults);
  if (configFileExists) {
    const raw = readConfigFile(configPath);
    if (raw) result = mergeConfig(result, raw);
  }

  const envKeysUsed = applyEnvVarFallbacks(result);

  // Auto-select provider if the default provider has no API key
  if (!result.providers[result.defaults.provider].api_key) {
    const available = PROVIDER_PRIORITY.find(p => result.providers[p].api_key);
    if (available) {
      result.defaults.provider = available;
      result.defaults.model = result.providers[available].default_model;
    }
  }

  return { config: result, configFileExists, envKeysUsed };
}

export function getConfigPath(configPath?: string): string {
  if (configPath) {
    return expandTilde(configPath);
  }
  return getDefaultConfigPath();
}

/** Shows the first four characters of a key. */
export function maskKey(key: string | undefined): string | undefined {
  if (!key) return key;
  return key.length > 8 ? `${key.slice(0, 4)}${'*'.repeat(8)}` : '*'.repeat(8);
}

/** Copy of the config with every API key masked, for display. */
export function maskConfig(config: Config): Config {
  const masked = structuredClone(config);
  for (const provider of PROVIDER_PRIORITY) {
    masked.providers[provider].api_key = maskKey(masked.providers[provider].api_key);
  }
  for (const tool of TOOL_KEY_NAMES) {
    masked.tools[tool].api_key = maskKey(masked.tools[tool].api_key);
  }
  return masked;
}
