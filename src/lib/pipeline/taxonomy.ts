/**
 * Reference taxonomy of recognized precedent citations.
 *
 * The table is versioned data (`data/citation-taxonomy.json`); the engine only
 * needs `normalize` and `isRecognized`.
 *
 * @module pipeline/taxonomy
 */

import fs from "fs";
import { fileURLToPath } from "url";
import { z } from "zod";

export interface ReferenceTaxonomy {
  readonly version: string;
  normalize(citationId: string): string;
  isRecognized(citationId: string): boolean;
}

const TaxonomyFileSchema = z.object({
  version: z.string().min(1),
  source: z.string(),
  courts: z.record(z.string(), z.array(z.number().int().positive())),
});
export type TaxonomyFile = z.infer<typeof TaxonomyFileSchema>;

export const DEFAULT_TAXONOMY_PATH = fileURLToPath(new URL("../../../data/citation-taxonomy.json", import.meta.url));

function stripDiacritics(value: string): string {
  return value.normalize("NFKD").replace(/[̀-ͯ]/g, "");
}

export class CitationTaxonomy implements ReferenceTaxonomy {
  readonly version: string;
  readonly source: string;
  private readonly courts: Map<string, Set<number>>;

  constructor(data: TaxonomyFile) {
    const parsed = TaxonomyFileSchema.parse(data);
    this.version = parsed.version;
    this.source = parsed.source;
    this.courts = new Map(
      Object.entries(parsed.courts).map(([court, numbers]) => [court.toUpperCase(), new Set(numbers)]),
    );
  }

  static fromFile(filePath: string = DEFAULT_TAXONOMY_PATH): CitationTaxonomy {
    const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
    return new CitationTaxonomy(TaxonomyFileSchema.parse(raw));
  }

  /**
   * Canonical id: `COURT-N` when a court and number are present, `COURT-N`
   * inferred when the number belongs to exactly one court, `SUMULA-N` when it
   * is ambiguous, otherwise the upper-cased, whitespace-collapsed text.
   */
  normalize(citationId: string): string {
    const text = stripDiacritics(citationId).toUpperCase().replace(/\s+/g, " ").trim();
    const numberMatch = text.match(/(\d{1,4})/);
    if (!numberMatch) return text;
    const num = Number(numberMatch[1]);

    for (const court of this.courts.keys()) {
      if (new RegExp(`\\b${court}\\b`).test(text)) return `${court}-${num}`;
    }

    if (!/\bSUMULA\b|^\d{1,4}$/.test(text)) return text;

    const owners = [...this.courts.entries()].filter(([, numbers]) => numbers.has(num)).map(([court]) => court);
    return owners.length === 1 ? `${owners[0]}-${num}` : `SUMULA-${num}`;
  }

  isRecognized(citationId: string): boolean {
    const normalized = this.normalize(citationId);
    const match = normalized.match(/^([A-Z]+)-(\d+)$/);
    if (!match) return false;
    const [, court, numText] = match;
    const num = Number(numText);
    if (court === "SUMULA") {
      return [...this.courts.values()].some((numbers) => numbers.has(num));
    }
    return this.courts.get(court)?.has(num) ?? false;
  }
}
