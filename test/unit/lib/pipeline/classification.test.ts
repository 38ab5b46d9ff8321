/**
 * Document Classification Tests
 *
 * @module pipeline/classification.test
 */

import { describe, expect, it, vi } from "vitest";
import { toInputDocument } from "@/lib/api";
import {
  classifyDocument,
  heuristicScore,
  HeuristicClassificationStrategy,
  loadPatternFile,
  ModelClassificationStrategy,
  type ClassificationStrategy,
  type ClassificationVerdict,
} from "@/lib/pipeline/classification";
import { APPEAL_TEXT, RULING_TEXT } from "@test/helpers/review-fixture";

const doc = toInputDocument({ id: "doc", path: "doc.txt" });

function fixed(verdict: ClassificationVerdict): ClassificationStrategy {
  return { name: verdict.strategy, classify: vi.fn(async () => verdict) };
}

describe("heuristicScore", () => {
  it("saturates once 30% of the patterns match", () => {
    const patterns = [/A/, /B/, /C/, /D/, /E/, /F/, /G/, /H/, /I/, /J/];
    expect(heuristicScore("A", patterns)).toBeCloseTo(1 / 3, 5);
    expect(heuristicScore("A B C", patterns)).toBe(1);
    expect(heuristicScore("A B C D E", patterns)).toBe(1);
  });

  it("scores empty text and empty pattern lists as 0", () => {
    expect(heuristicScore("", [/A/])).toBe(0);
    expect(heuristicScore("A", [])).toBe(0);
  });
});

describe("HeuristicClassificationStrategy", () => {
  const strategy = new HeuristicClassificationStrategy();

  it("recognizes a ruling by its heading and formula", async () => {
    expect(await strategy.classify(doc, RULING_TEXT)).toEqual({
      type: "SUPPORTING",
      confidence: 0.952,
      strategy: "heuristic",
    });
  });

  it("recognizes an appeal brief with enough markers", async () => {
    const text = "RECURSO ESPECIAL com fundamento no art. 105, III da Constituição. Razoes recursais a seguir.";
    expect(await strategy.classify(doc, text)).toEqual({ type: "PRIMARY", confidence: 1, strategy: "heuristic" });
  });

  it("reports a weak appeal match with low confidence", async () => {
    expect(await strategy.classify(doc, APPEAL_TEXT)).toEqual({ type: "PRIMARY", confidence: 0.417, strategy: "heuristic" });
  });

  it("returns UNKNOWN on a tie", async () => {
    const verdict = await strategy.classify(doc, "Texto sem marcadores processuais.");
    expect(verdict).toEqual({ type: "UNKNOWN", confidence: 0, strategy: "heuristic" });
  });

  it("only reads the configured window", async () => {
    const narrow = new HeuristicClassificationStrategy({ ...loadPatternFile(), windowChars: 10 });
    const verdict = await narrow.classify(doc, `${"x".repeat(20)} ${RULING_TEXT}`);
    expect(verdict.type).toBe("UNKNOWN");
  });
});

describe("ModelClassificationStrategy", () => {
  it("passes the model answer through", async () => {
    const strategy = new ModelClassificationStrategy(async () => ({ type: "PRIMARY", confidence: 0.8 }));
    expect(await strategy.classify(doc, "texto")).toEqual({ type: "PRIMARY", confidence: 0.8, strategy: "model" });
  });
});

describe("classifyDocument", () => {
  it("stops at the first confident verdict", async () => {
    const first = fixed({ type: "PRIMARY", confidence: 0.9, strategy: "first" });
    const second = fixed({ type: "SUPPORTING", confidence: 1, strategy: "second" });

    const verdict = await classifyDocument(doc, "texto", [first, second], 0.7);

    expect(verdict.strategy).toBe("first");
    expect(second.classify).not.toHaveBeenCalled();
  });

  it("falls through a verdict below the threshold", async () => {
    const weak = fixed({ type: "PRIMARY", confidence: 0.4, strategy: "weak" });
    const strong = fixed({ type: "SUPPORTING", confidence: 0.75, strategy: "strong" });

    expect(await classifyDocument(doc, "texto", [weak, strong], 0.7)).toEqual({
      type: "SUPPORTING",
      confidence: 0.75,
      strategy: "strong",
    });
  });

  it("stays UNKNOWN when no strategy is confident, keeping the best score", async () => {
    const weak = fixed({ type: "PRIMARY", confidence: 0.4, strategy: "weak" });
    const weaker = fixed({ type: "SUPPORTING", confidence: 0.2, strategy: "weaker" });

    expect(await classifyDocument(doc, "texto", [weak, weaker], 0.7)).toEqual({
      type: "UNKNOWN",
      confidence: 0.4,
      strategy: "weak",
    });
  });

  it("returns UNKNOWN with no strategies", async () => {
    expect(await classifyDocument(doc, "texto", [], 0.7)).toEqual({ type: "UNKNOWN", confidence: 0, strategy: "none" });
  });
});
