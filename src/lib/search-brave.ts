/**
 * Brave Search API Provider
 *
 * https://brave.com/search/api/
 */

import {
  SearchProviderError,
  hasUsableApiKey,
  type ProviderContext,
  type WebSearchOptions,
  type WebSearchResult,
} from "./web-search";
import { z } from "zod";
import { errorMessage } from "./errors";

const BraveSearchResponseSchema = z.object({
  web: z
    .object({
      results: z
        .array(
          z.object({
            title: z.string().optional(),
            url: z.string().optional(),
            description: z.string().optional(),
            extra_snippets: z.array(z.string()).optional(),
          }),
        )
        .optional(),
    })
    .optional(),
});

const BRAVE_API_BASE = "https://api.search.brave.com/res/v1/web/search";
const DEFAULT_TIMEOUT_MS = 12_000;

export async function searchBrave(options: WebSearchOptions, ctx: ProviderContext): Promise<WebSearchResult[]> {
  const { apiKey, logger } = ctx;
  if (!hasUsableApiKey(apiKey)) {
    logger.warn("Brave: API key not configured");
    return [];
  }

  const count = Math.min(options.maxResults, 20);
  const params = new URLSearchParams({ q: options.query, count: String(count) });
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  logger.debug(`Brave: searching "${options.query.substring(0, 50)}" (count=${count})`);

  let res: Response;
  const startTime = Date.now();
  try {
    res = await fetch(`${BRAVE_API_BASE}?${params.toString()}`, {
      headers: {
        Accept: "application/json",
        "Accept-Encoding": "gzip",
        "X-Subscription-Token": apiKey,
      },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    const timedOut = error instanceof Error && error.name === "TimeoutError";
    throw new SearchProviderError(
      "Brave",
      undefined,
      false,
      timedOut ? `Brave Search timed out after ${timeoutMs}ms` : `Brave Search request failed: ${errorMessage(error)}`,
      { cause: error },
    );
  }

  logger.debug(`Brave: response ${res.status} in ${Date.now() - startTime}ms`);

  if (!res.ok) {
    let errorBody = "";
    try {
      errorBody = await res.text();
    } catch {
      errorBody = "";
    }
    const fatal =
      res.status === 429 || res.status === 401 || res.status === 403 ||
      errorBody.includes("quota") || errorBody.includes("rate limit");
    throw new SearchProviderError(
      "Brave",
      res.status,
      fatal,
      `Brave Search API HTTP ${res.status}: ${errorBody.substring(0, 200) || res.statusText}`,
    );
  }

  const parsed = BraveSearchResponseSchema.safeParse(await res.json());
  if (!parsed.success) {
    throw new SearchProviderError("Brave", res.status, false, "Brave Search API returned an unexpected payload");
  }
  const results = parsed.data.web?.results ?? [];

  const out: WebSearchResult[] = [];
  for (const r of results) {
    if (!r.url || !r.title) continue;
    const content = [r.description, ...(r.extra_snippets ?? [])].filter(Boolean).join(" ");
    out.push({ url: r.url, title: r.title, content: content || r.title });
  }

  logger.info(`Brave: ${out.length} results for "${options.query.substring(0, 50)}"`);
  return out.slice(0, options.maxResults);
}
