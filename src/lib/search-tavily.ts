/**
 * Tavily Search API Provider
 *
 * https://docs.tavily.com/
 */

import { z } from "zod";
import {
  SearchProviderError,
  hasUsableApiKey,
  type ProviderContext,
  type WebSearchOptions,
  type WebSearchResult,
} from "./web-search";
import { errorMessage } from "./errors";

const TavilyResponseSchema = z.object({
  results: z
    .array(
      z.object({
        title: z.string().nullish(),
        url: z.string().nullish(),
        content: z.string().nullish(),
        score: z.number().nullish(),
      }),
    )
    .default([]),
});

const TAVILY_API_URL = "https://api.tavily.com/search";
const DEFAULT_TIMEOUT_MS = 12_000;

export async function searchTavily(options: WebSearchOptions, ctx: ProviderContext): Promise<WebSearchResult[]> {
  const { apiKey, logger } = ctx;
  if (!hasUsableApiKey(apiKey)) {
    logger.warn("Tavily: API key not configured");
    return [];
  }

  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const body: Record<string, unknown> = {
    query: options.query,
    max_results: Math.min(options.maxResults, 20),
    search_depth: "basic",
  };
  if (options.domainWhitelist && options.domainWhitelist.length > 0) {
    body.include_domains = options.domainWhitelist;
  }

  logger.debug(`Tavily: searching "${options.query.substring(0, 50)}"`);

  let res: Response;
  try {
    res = await fetch(TAVILY_API_URL, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${apiKey}`,
      },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    const timedOut = error instanceof Error && error.name === "TimeoutError";
    throw new SearchProviderError(
      "Tavily",
      undefined,
      false,
      timedOut ? `Tavily search timed out after ${timeoutMs}ms` : `Tavily request failed: ${errorMessage(error)}`,
      { cause: error },
    );
  }

  if (!res.ok) {
    let errorBody = "";
    try {
      errorBody = await res.text();
    } catch {
      errorBody = "";
    }
    const fatal = res.status === 401 || res.status === 403 || res.status === 429 || res.status === 432;
    throw new SearchProviderError(
      "Tavily",
      res.status,
      fatal,
      `Tavily API HTTP ${res.status}: ${errorBody.substring(0, 200) || res.statusText}`,
    );
  }

  const parsed = TavilyResponseSchema.safeParse(await res.json());
  if (!parsed.success) {
    throw new SearchProviderError("Tavily", res.status, false, "Tavily API returned an unexpected payload");
  }

  const out: WebSearchResult[] = [];
  for (const r of parsed.data.results) {
    if (!r.url || !r.content) continue;
    out.push({ url: r.url, title: r.title || r.url, content: r.content });
  }

  logger.info(`Tavily: ${out.length} results for "${options.query.substring(0, 50)}"`);
  return out.slice(0, options.maxResults);
}
