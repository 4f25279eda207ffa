const SECRET_QUERY_PARAM = /([?&](?:token|apikey|api_key|key|access_key)=)[^&\s"']+/gi;
const BEARER_TOKEN = /(Bearer\s+)[A-Za-z0-9._~+/=-]+/g;
const SECRET_HEADER = /((?:X-RapidAPI-Key|X-Subscription-Token|X-Finnhub-Token)["']?\s*[:=]\s*["']?)[^"',\s}]+/gi;

/**
 * Strip credentials from a message before it is logged or returned to a caller.
 * Provider URLs carry keys as query parameters (Finnhub `token`, FMP `apikey`).
 */
export function redactSecrets(message: string): string {
  return message
    .replace(SECRET_QUERY_PARAM, '$1***')
    .replace(BEARER_TOKEN, '$1***')
    .replace(SECRET_HEADER, '$1***');
}
