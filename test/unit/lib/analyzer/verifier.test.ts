/**
 * Verifier facade tests: curated document ingestion and status reporting.
 */
import { describe, it, expect } from "vitest";
import { DEFAULT_APP_CONFIG, type AppConfig } from "@/lib/config-schemas";
import { silentLogger } from "@/lib/analyzer/debug";
import { createVerifier } from "@/lib/analyzer/verifier";
import { APP_VERSION } from "@/lib/version";
import { FakeLanguageModel, FakeVectorIndex, FakeWebSearch } from "@test/helpers/fakes";

function build(index: FakeVectorIndex, config: AppConfig = DEFAULT_APP_CONFIG, web = new FakeWebSearch()) {
  return createVerifier(config, { model: new FakeLanguageModel(), index, webSearch: web, logger: silentLogger });
}

describe("Verifier.addDocuments", () => {
  it("indexes curated documents as LOCAL and skips empty ones", async () => {
    const index = new FakeVectorIndex();
    const result = await build(index).addDocuments([
      { content: "Brazil produces about a third of the world's coffee.", source: "coffee.md" },
      { content: "   ", source: "blank.md" },
      { content: "Vaccines are tested in trials.", source: "Health agency", url: "https://example.org/trials" },
    ]);

    expect(result).toEqual({ success: true, submitted: 2 });
    expect(index.added.map((d) => d.metadata)).toEqual([
      { source: "coffee.md", url: undefined, origin: "LOCAL" },
      { source: "Health agency", url: "https://example.org/trials", origin: "LOCAL" },
    ]);
  });

  it("reports failure when the index rejects the batch", async () => {
    const index = new FakeVectorIndex();
    index.rejectAdds = true;
    expect(await build(index).addDocuments([{ content: "text", source: "a.md" }])).toEqual({
      success: false,
      submitted: 1,
    });
  });

  it("does nothing for an empty batch", async () => {
    expect(await build(new FakeVectorIndex()).addDocuments([])).toEqual({ success: true, submitted: 0 });
  });
});

describe("Verifier.status", () => {
  it("reports version, models, index size and search configuration", async () => {
    const index = new FakeVectorIndex();
    const verifier = build(index);
    await verifier.addDocuments([{ content: "text", source: "a.md" }]);

    expect(await verifier.status()).toEqual({
      version: APP_VERSION,
      llmProvider: "google",
      models: {
        evaluate: "gemini-2.5-pro",
        synthesize: "gemini-2.5-pro",
        review: "gemini-2.5-pro",
        extract: "gemini-2.5-pro",
      },
      indexSize: 1,
      webSearch: { provider: "tavily", configured: true },
      keyClaimsEnabled: false,
    });
  });

  it("reports tiered models and an unconfigured search", async () => {
    const config: AppConfig = {
      ...DEFAULT_APP_CONFIG,
      pipeline: { ...DEFAULT_APP_CONFIG.pipeline, llmProvider: "anthropic", llmTiering: true },
    };
    const status = await build(new FakeVectorIndex(), config, new FakeWebSearch([], false)).status();

    expect(status.models).toEqual({
      evaluate: "claude-3-5-haiku-20241022",
      synthesize: "claude-sonnet-4-20250514",
      review: "claude-3-5-haiku-20241022",
      extract: "claude-3-5-haiku-20241022",
    });
    expect(status.webSearch).toEqual({ provider: "none", configured: false });
  });

  it("reports a null index size when the index cannot be read", async () => {
    const index = new FakeVectorIndex();
    index.count = async () => {
      throw new Error("locked");
    };
    expect((await build(index).status()).indexSize).toBeNull();
  });
});
