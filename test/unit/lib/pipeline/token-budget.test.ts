/**
 * Token Budget & Chunker Tests
 *
 * @module pipeline/token-budget.test
 */

import { describe, expect, it } from "vitest";
import { DEFAULT_ENGINE_CONFIG } from "@/lib/config-schemas";
import { evaluateCoverageGate } from "@/lib/pipeline/quality-gates";
import {
  chunkTexts,
  dedupedTokenCount,
  estimateTokens,
  planChunks,
  stageTokenCeiling,
} from "@/lib/pipeline/token-budget";

/** 15 paragraphs of 78 chars joined by blank lines: 1198 chars, 20 tokens per paragraph. */
function fifteenParagraphs(): string {
  return Array.from({ length: 15 }, (_, i) => String.fromCharCode(97 + i).repeat(78)).join("\n\n");
}

describe("estimateTokens", () => {
  it("rounds characters per token up", () => {
    expect(estimateTokens("", 4)).toBe(0);
    expect(estimateTokens("abcd", 4)).toBe(1);
    expect(estimateTokens("abcde", 4)).toBe(2);
  });
});

describe("stageTokenCeiling", () => {
  it("subtracts the stage output reservation from the budgeted window", () => {
    expect(stageTokenCeiling(DEFAULT_ENGINE_CONFIG.budget, 1400)).toBe(16_100);
  });

  it("never drops below one token", () => {
    expect(stageTokenCeiling({ ...DEFAULT_ENGINE_CONFIG.budget, contextWindowTokens: 1000 }, 5000)).toBe(1);
  });
});

describe("planChunks", () => {
  it("returns a single full-coverage chunk under the ceiling", () => {
    const text = "Recurso especial interposto contra acórdão do tribunal local.";
    const plan = planChunks(text, { maxTokens: 100, overlapTokens: 20 });

    expect(plan.chunked).toBe(false);
    expect(plan.coverageRatio).toBe(1);
    expect(plan.chunks).toEqual([
      {
        index: 0,
        startChar: 0,
        endChar: text.length,
        startToken: 0,
        endToken: plan.totalTokens,
        tokens: plan.totalTokens,
        overlapPrevTokens: 0,
        sections: [],
      },
    ]);
  });

  it("splits a document three times the ceiling into bounded, overlapping chunks", () => {
    const text = fifteenParagraphs();
    const plan = planChunks(text, { maxTokens: 100, overlapTokens: 20 });

    expect(plan.chunked).toBe(true);
    expect(plan.totalTokens).toBe(300);
    expect(plan.chunks).toHaveLength(4);
    expect(plan.chunks.every((chunk) => chunk.tokens <= 100)).toBe(true);
    expect(plan.chunks[0].startChar).toBe(0);
    expect(plan.chunks[plan.chunks.length - 1].endChar).toBe(text.length);
    expect(plan.chunks.map((chunk) => chunk.overlapPrevTokens)).toEqual([0, 20, 20, 20]);
    expect(plan.coverageRatio).toBe(1);
    expect(dedupedTokenCount(plan)).toBe(300);
  });

  it("starts every chunk on a paragraph boundary", () => {
    const text = fifteenParagraphs();
    const texts = chunkTexts(text, planChunks(text, { maxTokens: 100, overlapTokens: 20 }));

    expect(texts[1].startsWith("e".repeat(78))).toBe(true);
    expect(texts[3].endsWith("o".repeat(78))).toBe(true);
  });

  it("plans identical chunks for identical input", () => {
    const text = fifteenParagraphs();
    const options = { maxTokens: 100, overlapTokens: 20, charsPerToken: 4, maxChunks: 8 };
    expect(planChunks(text, options)).toEqual(planChunks(text, options));
  });

  it("hard-splits a paragraph larger than the ceiling", () => {
    const text = "x".repeat(1000);
    const plan = planChunks(text, { maxTokens: 100, overlapTokens: 0 });

    expect(plan.chunks.map((chunk) => chunk.tokens)).toEqual([90, 90, 70]);
    expect(chunkTexts(text, plan).join("")).toBe(text);
  });

  it("keeps the first and last chunks when capped and reports the lost coverage", () => {
    const text = fifteenParagraphs();
    const plan = planChunks(text, { maxTokens: 100, overlapTokens: 20, maxChunks: 2 });

    expect(plan.chunks).toHaveLength(2);
    expect(plan.chunks[0].startChar).toBe(0);
    expect(plan.chunks[1].endChar).toBe(text.length);
    expect(plan.coverageRatio).toBe(0.5333);

    const gate = evaluateCoverageGate({ stage1: plan }, 0.9);
    expect(gate.verdict).toBe("BLOCK");
    expect(gate.failures.map((f) => f.reason)).toEqual(["stage1: coverage 0.5333 below minimum 0.9 (2 chunks)"]);
  });

  it("carries the active section header into a chunk that starts mid-section", () => {
    const text = `DOS FATOS\n${"b".repeat(290)}\n\n${"c".repeat(300)}`;
    const plan = planChunks(text, { maxTokens: 100, overlapTokens: 0 });

    expect(plan.chunks).toHaveLength(2);
    expect(plan.chunks[0].sections).toEqual(["DOS FATOS"]);
    expect(plan.chunks[1].sections).toEqual(["DOS FATOS"]);
  });
});
