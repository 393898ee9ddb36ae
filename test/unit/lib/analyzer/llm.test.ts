/**
 * Model selection and AI SDK adapter tests. `generateText` is mocked; no
 * request leaves the process.
 */
import { describe, it, expect, vi, beforeEach } from "vitest";
import { DEFAULT_APP_CONFIG, DEFAULT_PIPELINE_CONFIG, type PipelineConfig } from "@/lib/config-schemas";
import { ModelInvocationError } from "@/lib/errors";
import { createAiSdkLanguageModel, normalizeProvider, resolveModelName } from "@/lib/analyzer/llm";
import { silentLogger } from "@/lib/analyzer/debug";
import { createVerifier } from "@/lib/analyzer/verifier";
import { FakeVectorIndex, FakeWebSearch, createRecordingLogger, localMatch } from "@test/helpers/fakes";

const { generateText } = vi.hoisted(() => ({ generateText: vi.fn() }));

vi.mock("ai", async (importOriginal) => ({
  ...(await importOriginal<typeof import("ai")>()),
  generateText,
}));

const TIERED: PipelineConfig = { ...DEFAULT_PIPELINE_CONFIG, llmTiering: true };

describe("normalizeProvider", () => {
  it("accepts provider aliases and defaults to openai", () => {
    expect(normalizeProvider("Claude")).toBe("anthropic");
    expect(normalizeProvider(" gemini ")).toBe("google");
    expect(normalizeProvider("mistral")).toBe("mistral");
    expect(normalizeProvider("something-else")).toBe("openai");
  });
});

describe("resolveModelName", () => {
  it("uses the premium model for every task without tiering", () => {
    const config: PipelineConfig = { ...DEFAULT_PIPELINE_CONFIG, llmProvider: "openai", modelEvaluate: "gpt-4o-mini" };
    expect(resolveModelName("evaluate", config)).toEqual({ provider: "openai", modelName: "gpt-4o" });
    expect(resolveModelName("review", config).modelName).toBe("gpt-4o");
  });

  it("uses cheap models for checks and the premium model for synthesis with tiering", () => {
    expect(resolveModelName("evaluate", TIERED).modelName).toBe("gemini-2.5-flash");
    expect(resolveModelName("review", TIERED).modelName).toBe("gemini-2.5-flash");
    expect(resolveModelName("synthesize", TIERED).modelName).toBe("gemini-2.5-pro");
    expect(resolveModelName("synthesize", { ...TIERED, llmProvider: "mistral" }).modelName).toBe(
      "mistral-large-latest",
    );
  });

  it("honours a per-task override that matches the provider", () => {
    const config: PipelineConfig = { ...TIERED, modelEvaluate: "gemini-2.0-flash", modelReview: "custom-review-model" };
    expect(resolveModelName("evaluate", config).modelName).toBe("gemini-2.0-flash");
    expect(resolveModelName("extract", config).modelName).toBe("gemini-2.0-flash");
    expect(resolveModelName("review", config).modelName).toBe("custom-review-model");
  });

  it("ignores an override for another provider and warns", () => {
    const logger = createRecordingLogger();
    const config: PipelineConfig = { ...TIERED, llmProvider: "anthropic", modelSynthesize: "gpt-4o" };

    expect(resolveModelName("synthesize", config, logger).modelName).toBe("claude-sonnet-4-20250514");
    expect(logger.lines).toEqual([
      {
        level: "warn",
        message: 'Ignoring model override "gpt-4o" for task "synthesize" because provider is "anthropic"',
      },
    ]);
  });
});

describe("createAiSdkLanguageModel", () => {
  beforeEach(() => {
    generateText.mockReset();
  });

  it("returns the generated text with the configured temperature", async () => {
    generateText.mockResolvedValueOnce({ text: "DECISION: SUFFICIENT" });
    const model = createAiSdkLanguageModel({ ...DEFAULT_PIPELINE_CONFIG, llmTemperature: 0.2 });

    expect(await model.invoke("prompt text", "evaluate")).toBe("DECISION: SUFFICIENT");
    expect(generateText).toHaveBeenCalledWith(
      expect.objectContaining({ prompt: "prompt text", temperature: 0.2, abortSignal: expect.any(AbortSignal) }),
    );
  });

  it("wraps SDK failures with provider and model", async () => {
    generateText.mockRejectedValueOnce(new Error("503 Service Unavailable"));
    const model = createAiSdkLanguageModel(DEFAULT_PIPELINE_CONFIG);

    const err = await model.invoke("p", "synthesize").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ModelInvocationError);
    expect(err).toMatchObject({
      task: "synthesize",
      message: "google/gemini-2.5-pro call failed: 503 Service Unavailable",
    });
  });

  it("returns a blank response and logs a warning", async () => {
    generateText.mockResolvedValueOnce({ text: "  \n" });
    const logger = createRecordingLogger();
    const model = createAiSdkLanguageModel(DEFAULT_PIPELINE_CONFIG, logger);

    await expect(model.invoke("p", "review")).resolves.toBe("  \n");
    expect(logger.lines.filter((line) => line.level === "warn")).toEqual([
      { level: "warn", message: "review: google/gemini-2.5-pro returned an empty response" },
    ]);
  });
});

describe("empty model responses", () => {
  beforeEach(() => {
    generateText.mockReset();
  });

  it("lead to an INSUFFICIENT verdict instead of an error", async () => {
    generateText.mockResolvedValue({ text: "" });
    const verifier = createVerifier(DEFAULT_APP_CONFIG, {
      model: createAiSdkLanguageModel(DEFAULT_PIPELINE_CONFIG),
      index: new FakeVectorIndex([
        localMatch("who.pdf", 0.15, "Vaccines do not cause autism."),
        localMatch("cdc.pdf", 0.2, "No link between vaccines and autism."),
      ]),
      webSearch: new FakeWebSearch(),
      logger: silentLogger,
    });

    const result = await verifier.verify("Vaccines cause autism");

    expect(result.success).toBe(true);
    expect(result.verdict).toBe("INSUFFICIENT");
    expect(result.trace).toEqual(["START", "SUPERVISOR", "RETRIEVE", "SELF_CHECK", "DONE"]);
    expect(generateText).toHaveBeenCalledTimes(1);
  });
});
