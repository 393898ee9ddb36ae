/**
 * Evidence sources
 *
 * Local (vector index) and web (live search) lookups, each returning evidence
 * items already scored on the common relevance scale. A failed lookup throws
 * ProviderError; it never returns a partial set.
 *
 * @module analyzer/evidence-sources
 */

import { ProviderError, errorMessage } from "../errors";
import type { NeighborMatch, VectorIndex } from "../vector-index";
import { documentSourceId } from "../vector-index";
import type { WebSearch, WebSearchResult } from "../web-search";
import type { PipelineLogger } from "./debug";
import { silentLogger } from "./debug";
import { localDistanceToRelevance, webRankToRelevance } from "./score-normalization";
import type { EvidenceItem, EvidenceOrigin } from "./types";

export interface EvidenceSource {
  readonly origin: EvidenceOrigin;
  lookup(claim: string, maxResults: number): Promise<EvidenceItem[]>;
}

export class LocalEvidenceSource implements EvidenceSource {
  readonly origin = "LOCAL" as const;

  constructor(
    private readonly index: VectorIndex,
    private readonly logger: PipelineLogger = silentLogger,
  ) {}

  async lookup(claim: string, maxResults: number): Promise<EvidenceItem[]> {
    let matches: NeighborMatch[];
    try {
      matches = await this.index.nearestNeighbors(claim, maxResults);
    } catch (err) {
      throw new ProviderError("vector-index", "index", `Local index lookup failed: ${errorMessage(err)}`, undefined, false, {
        cause: err,
      });
    }

    const items = matches.slice(0, maxResults).map(
      (match, i): EvidenceItem => ({
        content: match.content,
        origin: "LOCAL",
        sourceId: documentSourceId(match.metadata),
        source: match.metadata.source,
        url: match.metadata.url,
        rawScore: match.distance,
        relevanceScore: localDistanceToRelevance(match.distance),
        rank: i + 1,
      }),
    );
    this.logger.debug(`Local lookup returned ${items.length} documents`);
    return items;
  }
}

export class WebEvidenceSource implements EvidenceSource {
  readonly origin = "WEB" as const;

  constructor(
    private readonly search: WebSearch,
    private readonly logger: PipelineLogger = silentLogger,
  ) {}

  /** False means "unavailable": lookups return [] without error. */
  isAvailable(): boolean {
    return this.search.isConfigured();
  }

  get providerName(): string {
    return this.search.providerName;
  }

  async lookup(claim: string, maxResults: number): Promise<EvidenceItem[]> {
    let results: WebSearchResult[];
    try {
      results = await this.search.search({ query: claim, maxResults });
    } catch (err) {
      if (err instanceof ProviderError) throw err;
      throw new ProviderError(this.search.providerName, "search", `Web search failed: ${errorMessage(err)}`, undefined, false, {
        cause: err,
      });
    }

    const items = results.slice(0, maxResults).map(
      (result, i): EvidenceItem => ({
        content: result.content,
        origin: "WEB",
        sourceId: result.url,
        source: result.title || result.url,
        url: result.url,
        rawScore: i,
        relevanceScore: webRankToRelevance(i),
        rank: i + 1,
      }),
    );
    this.logger.debug(`Web lookup returned ${items.length} results (provider: ${this.search.providerName})`);
    return items;
  }
}
