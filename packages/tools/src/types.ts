export interface ToolConfig {
  /** RapidAPI key for the Yahoo Finance market-data endpoints. */
  marketDataApiKey?: string;
  /** Brave Search subscription token (news and web search). */
  braveApiKey?: string;
  finnhubApiKey?: string;
  fmpApiKey?: string;
  firecrawlApiKey?: string;
  /** User-Agent sent on plain page fetches and exchange lookups. */
  userAgent?: string;
}

export interface ToolContext {
  /** Provider credentials and client settings. */
  config: ToolConfig;
  /** Abort signal for cancellation support */
  abortSignal?: AbortSignal;
}

/** Every upstream the clients talk to, used to tag documents and failures. */
export const PROVIDER_IDS = [
  'yahoo',
  'brave',
  'finnhub',
  'fmp',
  'nse',
  'brave-web',
  'firecrawl',
  'http',
] as const;

export type ProviderId = (typeof PROVIDER_IDS)[number];

export class MissingApiKeyError extends Error {
  constructor(
    public readonly provider: ProviderId,
    hint: string,
  ) {
    super(`${provider} API key not configured. ${hint}`);
    this.name = 'MissingApiKeyError';
  }
}
