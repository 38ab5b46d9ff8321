/**
 * Plain-text extraction collaborator.
 *
 * Reads an already-extracted text file; form feeds (`\f`) separate pages.
 * PDF and OCR extraction stay outside the engine: anything implementing
 * `DocumentExtractor` can replace this.
 *
 * @module pipeline/text-extractor
 */

import { readFile } from "fs/promises";
import type { DocumentExtractor, ExtractionResult } from "./collaborators";
import type { InputDocument } from "./types";

const WELL_FORMED_WORD = /^[\p{L}\p{N}][\p{L}\p{N}.,;:()'"/%ºª§-]*$/u;

/** Share of whitespace-separated tokens that look like words; 0 for an empty page. */
export function pageQuality(page: string): number {
  const tokens = page.split(/\s+/).filter(Boolean);
  if (tokens.length === 0) return 0;
  const wellFormed = tokens.filter((token) => WELL_FORMED_WORD.test(token)).length;
  return Math.round((wellFormed / tokens.length) * 1000) / 1000;
}

/** Normalize line endings and spacing, drop repeated header/footer lines and bare page numbers. */
export function cleanText(text: string): string {
  let cleaned = text.replace(/\r\n?/g, "\n").replace(/\n{3,}/g, "\n\n").replace(/[^\S\n]{2,}/g, " ");

  const lines = cleaned.split("\n");
  if (lines.length > 10) {
    const counts = new Map<string, number>();
    for (const line of lines) {
      const stripped = line.trim();
      if (stripped && stripped.length < 100) counts.set(stripped, (counts.get(stripped) ?? 0) + 1);
    }
    const threshold = Math.max(3, Math.floor(lines.length / 20));
    const repeated = new Set([...counts].filter(([, count]) => count > threshold).map(([line]) => line));
    if (repeated.size > 0) {
      cleaned = lines.filter((line) => !repeated.has(line.trim())).join("\n");
    }
  }

  return cleaned.replace(/\n\s*\d{1,4}\s*\n/g, "\n").trim();
}

export function extractFromText(raw: string): ExtractionResult {
  const pages = raw.split("\f");
  // A trailing form feed does not open a new page.
  if (pages.length > 1 && pages[pages.length - 1].trim() === "") pages.pop();
  return {
    text: cleanText(pages.join("\n\n")),
    pageQuality: pages.map(pageQuality),
    pageCount: pages.length,
  };
}

export class PlainTextExtractor implements DocumentExtractor {
  async extract(document: InputDocument): Promise<ExtractionResult> {
    const raw = await readFile(document.sourcePath, "utf-8");
    const result = extractFromText(raw);
    console.log(
      `[Extractor] ${document.id}: ${result.pageCount} page(s), ${result.text.length} chars from ${document.sourcePath}`,
    );
    return result;
  }
}
