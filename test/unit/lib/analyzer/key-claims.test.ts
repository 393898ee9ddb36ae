/**
 * Key statement extraction tests.
 */
import { describe, it, expect } from "vitest";
import { KeyClaimExtractor, parseKeyClaims } from "@/lib/analyzer/key-claims";
import { FakeLanguageModel, evidenceItem } from "@test/helpers/fakes";

describe("parseKeyClaims", () => {
  it("strips bullets and numbering and skips heading lines", () => {
    const text = "Key statements:\n1. Vaccines are tested\n- No autism link found\n\n* Side effects are rare";
    expect(parseKeyClaims(text, 5)).toEqual(["Vaccines are tested", "No autism link found", "Side effects are rare"]);
  });

  it("stops at the maximum", () => {
    expect(parseKeyClaims("a\nb\nc\nd", 2)).toEqual(["a", "b"]);
  });
});

describe("KeyClaimExtractor", () => {
  it("returns [] without calling the model when there is no evidence", async () => {
    const model = new FakeLanguageModel();
    expect(await new KeyClaimExtractor({ model }).extract("claim", [])).toEqual([]);
    expect(model.calls).toEqual([]);
  });

  it("sends at most 2000 characters of evidence", async () => {
    const model = new FakeLanguageModel().respond("extract", "First\nSecond");
    const evidence = [evidenceItem({ sourceId: "a", content: "x".repeat(1500) }), evidenceItem({ sourceId: "b", content: "y".repeat(1500) })];

    const claims = await new KeyClaimExtractor({ model }, 3).extract("claim", evidence);

    expect(claims).toEqual(["First", "Second"]);
    const [prompt] = model.callsFor("extract");
    expect(prompt).toContain("x".repeat(1500) + "\n\n" + "y".repeat(498) + "\n");
    expect(prompt).not.toContain("y".repeat(499));
    expect(prompt).toContain("Return at most 3 statements");
  });

  it("returns [] when the model fails", async () => {
    const model = new FakeLanguageModel().respond("extract", new Error("quota"));
    expect(await new KeyClaimExtractor({ model }).extract("claim", [evidenceItem({ sourceId: "a" })])).toEqual([]);
  });
});
