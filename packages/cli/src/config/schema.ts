import { z } from 'zod';

const envVarPattern = /^(env:|\\?\$\{?)/;

const envVarSchema = z.string().refine(
  (val) => envVarPattern.test(val),
  { message: 'Must start with env:, $, or ${' }
).brand('envVar');

const apiKeySchema = z.union([
  envVarSchema,
  z.string().min(1),
]);

const providerConfigSchema = z.object({
  api_key: apiKeySchema.optional(),
  default_model: z.string().optional(),
}).strict();

const providersSchema = z.object({
  anthropic: providerConfigSchema.optional(),
  openai: providerConfigSchema.optional(),
  google: providerConfigSchema.optional(),
}).strict();

const defaultsSchema = z.object({
  provider: z.enum(['anthropic', 'openai', 'google']).optional(),
  model: z.string().optional(),
  max_budget_usd: z.number().positive().optional(),
}).strict();

const agentConfigSchema = z.object({
  model: z.string().optional(),
  max_tokens: z.number().int().positive().optional(),
  temperature: z.number().min(0).max(2).optional(),
}).strict();

const resolveAgentSchema = agentConfigSchema.extend({
  enabled: z.boolean().optional(),
}).strict();

const agentsSchema = z.object({
  resolve: resolveAgentSchema.optional(),
  generate: agentConfigSchema.optional(),
  verify: agentConfigSchema.optional(),
}).strict();

const toolKeySchema = z.object({
  api_key: apiKeySchema.optional(),
}).strict();

const toolsSchema = z.object({
  market_data: toolKeySchema.optional(),
  brave: toolKeySchema.optional(),
  finnhub: toolKeySchema.optional(),
  fmp: toolKeySchema.optional(),
  firecrawl: toolKeySchema.optional(),
  user_agent: z.string().min(1).optional(),
  news_lookback_days: z.number().int().min(1).max(30).optional(),
}).strict();

const retrievalSchema = z.object({
  top_k: z.number().int().min(1).max(50).optional(),
  semantic_weight: z.number().min(0).max(1).optional(),
  embedding_model: z.string().optional(),
}).strict();

const indexSchema = z.object({
  dir: z.string().min(1).optional(),
}).strict();

const aggregationSchema = z.object({
  concurrency: z.number().int().min(1).max(32).optional(),
  timeout_ms: z.number().int().positive().optional(),
  deadline_ms: z.number().int().positive().optional(),
  deep_fetch_count: z.number().int().min(0).max(10).optional(),
  deep_fetch_chars: z.number().int().positive().optional(),
  web_result_count: z.number().int().min(1).max(20).optional(),
}).strict();

const verificationSchema = z.object({
  tolerance: z.number().min(0).max(0.5).optional(),
}).strict();

const serverSchema = z.object({
  port: z.number().int().min(0).max(65535).optional(),
  max_concurrent: z.number().int().min(1).optional(),
  max_queued: z.number().int().min(0).optional(),
  run_timeout_ms: z.number().int().positive().optional(),
}).strict();

const ConfigSchema = z.object({
  providers: providersSchema.optional(),
  defaults: defaultsSchema.optional(),
  agents: agentsSchema.optional(),
  tools: toolsSchema.optional(),
  retrieval: retrievalSchema.optional(),
  index: indexSchema.optional(),
  aggregation: aggregationSchema.optional(),
  verification: verificationSchema.optional(),
  server: serverSchema.optional(),
}).strict();

export type RawConfig = z.infer<typeof ConfigSchema>;

export type ProviderId = 'anthropic' | 'openai' | 'google';

export const PROVIDER_PRIORITY: readonly ProviderId[] = ['anthropic', 'openai', 'google'];

export interface ResolvedProviderConfig {
  api_key?: string;
  default_model: string;
}

export interface AgentConfigEntry {
  model?: string;
  max_tokens?: number;
  temperature?: number;
}

export interface ToolKeyConfig {
  api_key?: string;
}

export type ToolKeyName = 'market_data' | 'brave' | 'finnhub' | 'fmp' | 'firecrawl';

export interface Config {
  providers: Record<ProviderId, ResolvedProviderConfig>;
  defaults: {
    provider: ProviderId;
    model: string;
    max_budget_usd: number;
  };
  agents: {
    resolve: AgentConfigEntry & { enabled: boolean };
    generate: AgentConfigEntry;
    verify: AgentConfigEntry;
  };
  tools: Record<ToolKeyName, ToolKeyConfig> & {
    user_agent: string;
    news_lookback_days: number;
  };
  retrieval: {
    top_k: number;
    semantic_weight: number;
    embedding_model?: string;
  };
  index: {
    dir: string;
  };
  aggregation: {
    concurrency: number;
    timeout_ms: number;
    deadline_ms: number;
    deep_fetch_count: number;
    deep_fetch_chars: number;
    web_result_count: number;
  };
  verification: {
    tolerance: number;
  };
  server: {
    port: number;
    max_concurrent: number;
    max_queued: number;
    run_timeout_ms: number;
  };
}

export const ConfigDefaults: Config = {
  providers: {
    anthropic: {
      default_model: 'claude-sonnet-4-20250514',
    },
    openai: {
      default_model: 'gpt-4o',
    },
    google: {
      default_model: 'gemini-2.5-pro',
    },
  },
  defaults: {
    provider: 'anthropic',
    model: 'claude-sonnet-4-20250514',
    max_budget_usd: 0.5,
  },
  agents: {
    resolve: { enabled: true },
    generate: {},
    verify: {},
  },
  tools: {
    market_data: {},
    brave: {},
    finnhub: {},
    fmp: {},
    firecrawl: {},
    user_agent: 'finverdict/0.1 (+https://example.com/finverdict)',
    news_lookback_days: 7,
  },
  retrieval: {
    top_k: 10,
    semantic_weight: 0.7,
  },
  index: {
    dir: '~/.finverdict/index',
  },
  aggregation: {
    concurrency: 6,
    timeout_ms: 8000,
    deadline_ms: 20000,
    deep_fetch_count: 3,
    deep_fetch_chars: 4000,
    web_result_count: 5,
  },
  verification: {
    tolerance: 0.01,
  },
  server: {
    port: 8787,
    max_concurrent: 4,
    max_queued: 32,
    run_timeout_ms: 60000,
  },
};

export { ConfigSchema };
