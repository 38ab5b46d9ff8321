/**
 * Document Classification
 *
 * An ordered list of strategies; the first verdict that names a type with
 * enough confidence wins. When none does, the document stays UNKNOWN and the
 * classification gate decides (fail-closed, never a guess).
 *
 * Built-in strategies: keyword heuristic over the start of the text, then a
 * model call on the routine model.
 *
 * @module pipeline/classification
 */

import fs from "fs";
import { fileURLToPath } from "url";
import { z } from "zod";
import type { ClassificationResponse } from "./payloads";
import { DocumentTypeSchema, type DocumentType, type InputDocument } from "./types";

// ============================================================================
// TYPES
// ============================================================================

export interface ClassificationVerdict {
  type: DocumentType;
  confidence: number;
  strategy: string;
}

export interface ClassificationStrategy {
  readonly name: string;
  classify(document: InputDocument, text: string): Promise<ClassificationVerdict>;
}

// ============================================================================
// CHAIN
// ============================================================================

export async function classifyDocument(
  document: InputDocument,
  text: string,
  strategies: ClassificationStrategy[],
  threshold: number,
): Promise<ClassificationVerdict> {
  let best: ClassificationVerdict = { type: "UNKNOWN", confidence: 0, strategy: "none" };

  for (const strategy of strategies) {
    const verdict = await strategy.classify(document, text);
    if (verdict.type !== "UNKNOWN" && verdict.confidence >= threshold) {
      console.log(
        `[Classifier] ${document.id} → ${verdict.type} via ${verdict.strategy} (confidence ${verdict.confidence.toFixed(2)})`,
      );
      return verdict;
    }
    if (verdict.confidence > best.confidence) best = { ...verdict, type: "UNKNOWN" };
  }

  console.warn(`[Classifier] ${document.id} inconclusive (best confidence ${best.confidence.toFixed(2)})`);
  return best;
}

// ============================================================================
// HEURISTIC STRATEGY
// ============================================================================

const PatternFileSchema = z.object({
  windowChars: z.number().int().min(1),
  patterns: z.record(z.string(), z.array(z.string())),
});
export type PatternFile = z.infer<typeof PatternFileSchema>;

export const DEFAULT_PATTERNS_PATH = fileURLToPath(new URL("../../../data/classification-patterns.json", import.meta.url));

export function loadPatternFile(filePath: string = DEFAULT_PATTERNS_PATH): PatternFile {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  return PatternFileSchema.parse(raw);
}

/** Share of patterns matched, saturating once 30% of them match. */
export function heuristicScore(text: string, patterns: RegExp[]): number {
  if (!text || patterns.length === 0) return 0;
  const matches = patterns.filter((pattern) => pattern.test(text)).length;
  return Math.min(matches / Math.max(patterns.length * 0.3, 1), 1);
}

export class HeuristicClassificationStrategy implements ClassificationStrategy {
  readonly name = "heuristic";
  private readonly windowChars: number;
  private readonly patterns: Array<{ type: DocumentType; regexes: RegExp[] }>;

  constructor(file: PatternFile = loadPatternFile()) {
    this.windowChars = file.windowChars;
    this.patterns = Object.entries(file.patterns).map(([type, sources]) => ({
      type: DocumentTypeSchema.parse(type),
      regexes: sources.map((source) => new RegExp(source, "iu")),
    }));
  }

  async classify(_document: InputDocument, text: string): Promise<ClassificationVerdict> {
    const window = text.slice(0, this.windowChars).toUpperCase();
    const scored = this.patterns
      .map(({ type, regexes }) => ({ type, score: heuristicScore(window, regexes) }))
      .sort((a, b) => b.score - a.score);

    const [top, runnerUp] = scored;
    if (!top) return { type: "UNKNOWN", confidence: 0, strategy: this.name };
    const clearWinner = !runnerUp || top.score > runnerUp.score;
    return {
      type: clearWinner ? top.type : "UNKNOWN",
      confidence: Math.round(top.score * 1000) / 1000,
      strategy: this.name,
    };
  }
}

// ============================================================================
// MODEL STRATEGY
// ============================================================================

export type ClassifyWithModel = (document: InputDocument, text: string) => Promise<ClassificationResponse>;

export class ModelClassificationStrategy implements ClassificationStrategy {
  readonly name = "model";

  constructor(private readonly classifyWithModel: ClassifyWithModel) {}

  async classify(document: InputDocument, text: string): Promise<ClassificationVerdict> {
    const response = await this.classifyWithModel(document, text);
    return { type: response.type, confidence: response.confidence, strategy: this.name };
  }
}
