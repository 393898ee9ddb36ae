/**
 * Web Search
 *
 * Provider dispatch for live web search. A provider without credentials is
 * "unavailable": it returns no results and no error. A provider that
 * is configured but fails throws SearchProviderError.
 *
 * @module web-search
 */

import type { SearchConfig, SearchProviderName } from "./config-schemas";
import { ProviderError } from "./errors";
import type { PipelineLogger } from "./analyzer/debug";
import { silentLogger } from "./analyzer/debug";
import type { SearchCache } from "./search-cache";

export type WebSearchResult = {
  url: string;
  title: string;
  content: string;
};

export type WebSearchOptions = {
  query: string;
  maxResults: number;
  timeoutMs?: number;
  domainWhitelist?: string[];
};

export class SearchProviderError extends ProviderError {
  constructor(provider: string, status: number | undefined, fatal: boolean, message: string, options?: { cause?: unknown }) {
    super(provider, "search", message, status, fatal, options);
    this.name = "SearchProviderError";
  }
}

export type ProviderContext = {
  apiKey: string | undefined;
  logger: PipelineLogger;
};

export type SearchProviderFn = (options: WebSearchOptions, ctx: ProviderContext) => Promise<WebSearchResult[]>;

/**
 * Capability consumed by the hybrid retriever.
 */
export interface WebSearch {
  readonly providerName: string;
  /** False when search is disabled or no provider has credentials. */
  isConfigured(): boolean;
  search(options: WebSearchOptions): Promise<WebSearchResult[]>;
}

type ConcreteProvider = Exclude<SearchProviderName, "auto">;

const PROVIDER_ENV_KEYS: Record<ConcreteProvider, string> = {
  tavily: "TAVILY_API_KEY",
  brave: "BRAVE_API_KEY",
};

export function hasUsableApiKey(apiKey: string | undefined): apiKey is string {
  return Boolean(apiKey && apiKey.trim() && !apiKey.includes("PASTE"));
}

export type CreateWebSearchDeps = {
  env?: NodeJS.ProcessEnv;
  logger?: PipelineLogger;
  cache?: SearchCache | null;
  /** Replace provider implementations (tests, custom backends). */
  providers?: Partial<Record<ConcreteProvider, SearchProviderFn>>;
};

function resolveProvider(config: SearchConfig, env: NodeJS.ProcessEnv): ConcreteProvider | null {
  if (!config.enabled) return null;
  if (config.provider !== "auto") {
    return config.provider;
  }
  for (const provider of ["tavily", "brave"] as const) {
    if (hasUsableApiKey(env[PROVIDER_ENV_KEYS[provider]])) return provider;
  }
  return null;
}

async function loadProvider(provider: ConcreteProvider): Promise<SearchProviderFn> {
  if (provider === "tavily") {
    const { searchTavily } = await import("./search-tavily");
    return searchTavily;
  }
  const { searchBrave } = await import("./search-brave");
  return searchBrave;
}

/**
 * Build the WebSearch capability from config. Credentials are read from `env`
 * at construction time.
 */
export function createWebSearch(config: SearchConfig, deps: CreateWebSearchDeps = {}): WebSearch {
  const env = deps.env ?? process.env;
  const logger = deps.logger ?? silentLogger;
  const cache = deps.cache ?? null;
  const provider = resolveProvider(config, env);
  const apiKey = provider ? env[PROVIDER_ENV_KEYS[provider]] : undefined;
  const configured = provider !== null && hasUsableApiKey(apiKey);

  return {
    providerName: provider ?? "none",
    isConfigured: () => configured,
    async search(options: WebSearchOptions): Promise<WebSearchResult[]> {
      if (!provider || !configured) {
        logger.info(`No web search provider configured (provider=${config.provider}, enabled=${config.enabled})`);
        return [];
      }

      const effective: WebSearchOptions = {
        ...options,
        timeoutMs: options.timeoutMs ?? config.timeoutMs,
        domainWhitelist: options.domainWhitelist ?? config.domainWhitelist,
      };

      const cached = cache ? await cache.get(effective, provider) : null;
      if (cached) {
        return cached.results.slice(0, effective.maxResults);
      }

      const searchFn = deps.providers?.[provider] ?? (await loadProvider(provider));
      const raw = await searchFn(effective, { apiKey, logger });
      const results = applyWhitelist(raw, effective.domainWhitelist).slice(0, effective.maxResults);

      if (cache && results.length > 0) {
        await cache.put(effective, provider, results);
      }
      return results;
    },
  };
}

export function applyWhitelist(results: WebSearchResult[], whitelist?: string[]): WebSearchResult[] {
  if (!whitelist || whitelist.length === 0) return results;
  const allowed = new Set(whitelist.map((d) => d.toLowerCase()));
  return results.filter((r) => {
    try {
      const host = new URL(r.url).hostname.toLowerCase();
      return allowed.has(host) || allowed.has(host.replace(/^www\./, ""));
    } catch {
      return false;
    }
  });
}
