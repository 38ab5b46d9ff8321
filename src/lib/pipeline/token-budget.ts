/**
 * Token Budget & Chunker
 *
 * Estimates tokens, derives per-stage ceilings from the context window and
 * splits oversized text into overlapping, token-bounded chunks.
 *
 * Chunk boundaries are a pure function of (text, maxTokens, overlapTokens,
 * charsPerToken, maxChunks). Cache keys depend on that.
 *
 * @module pipeline/token-budget
 */

import type { BudgetConfig } from "../config-schemas";
import type { Chunk, ChunkPlan } from "./types";

// ============================================================================
// ESTIMATION
// ============================================================================

export const DEFAULT_CHARS_PER_TOKEN = 4;

export function estimateTokens(text: string, charsPerToken: number = DEFAULT_CHARS_PER_TOKEN): number {
  if (!text) return 0;
  return Math.ceil(text.length / charsPerToken);
}

/**
 * Input ceiling for a stage: the budgeted share of the context window minus
 * what the stage reserves for its own output.
 */
export function stageTokenCeiling(budget: BudgetConfig, outputTokens: number): number {
  const available = Math.floor(budget.contextWindowTokens * budget.budgetRatio);
  return Math.max(1, available - outputTokens);
}

// ============================================================================
// SEMANTIC UNITS
// ============================================================================

interface Unit {
  start: number;
  end: number;
  tokens: number;
  header: string | null;
}

const PARAGRAPH_BREAK = /\n[ \t]*\n/g;
const SENTENCE_BREAK = /[.!?;:]["')\]]?\s|\n/g;
const SENTENCE_SEARCH_WINDOW = 200;
const HEADER_LINE = /^(?:#{1,6}\s+\S.*|[A-ZÀ-Ý0-9][A-ZÀ-Ý0-9 .,:;ºª°/-]{3,80})$/;

function detectHeader(text: string): string | null {
  const firstLine = text.trimStart().split("\n", 1)[0]?.trim() ?? "";
  if (!firstLine || !/[A-Za-zÀ-ÿ]/.test(firstLine)) return null;
  return HEADER_LINE.test(firstLine) ? firstLine.replace(/^#+\s*/, "") : null;
}

/** Paragraph ranges that tile the whole text (separators stay with the preceding unit). */
function paragraphRanges(text: string): Array<[number, number]> {
  const ranges: Array<[number, number]> = [];
  let start = 0;
  PARAGRAPH_BREAK.lastIndex = 0;
  let match: RegExpExecArray | null;
  while ((match = PARAGRAPH_BREAK.exec(text)) !== null) {
    const end = match.index + match[0].length;
    if (end > start) ranges.push([start, end]);
    start = end;
  }
  if (start < text.length) ranges.push([start, text.length]);
  return ranges;
}

/** Last sentence boundary inside (windowStart, windowEnd], or -1. */
function lastSentenceBreak(text: string, windowStart: number, windowEnd: number): number {
  const slice = text.slice(windowStart, windowEnd);
  SENTENCE_BREAK.lastIndex = 0;
  let best = -1;
  let match: RegExpExecArray | null;
  while ((match = SENTENCE_BREAK.exec(slice)) !== null) {
    best = windowStart + match.index + match[0].length;
  }
  return best;
}

function hardSplit(text: string, start: number, end: number, targetChars: number): Array<[number, number]> {
  const pieces: Array<[number, number]> = [];
  let pos = start;
  while (end - pos > targetChars) {
    const windowEnd = pos + targetChars;
    const windowStart = Math.max(pos + 1, windowEnd - SENTENCE_SEARCH_WINDOW);
    const breakAt = lastSentenceBreak(text, windowStart, windowEnd);
    const cut = breakAt > pos ? breakAt : windowEnd;
    pieces.push([pos, cut]);
    pos = cut;
  }
  if (pos < end) pieces.push([pos, end]);
  return pieces;
}

function buildUnits(text: string, maxTokens: number, charsPerToken: number): Unit[] {
  const targetChars = Math.max(1, Math.floor(maxTokens * charsPerToken * 0.9));
  const units: Unit[] = [];

  for (const [start, end] of paragraphRanges(text)) {
    const header = detectHeader(text.slice(start, end));
    const tokens = estimateTokens(text.slice(start, end), charsPerToken);
    const pieces: Array<[number, number]> =
      tokens > maxTokens ? hardSplit(text, start, end, targetChars) : [[start, end]];
    pieces.forEach(([s, e], i) => {
      units.push({
        start: s,
        end: e,
        tokens: estimateTokens(text.slice(s, e), charsPerToken),
        header: i === 0 ? header : null,
      });
    });
  }

  return units;
}

// ============================================================================
// CHUNK PLANNING
// ============================================================================

export interface ChunkOptions {
  maxTokens: number;
  overlapTokens: number;
  charsPerToken?: number;
  maxChunks?: number;
}

interface UnitSpan {
  first: number;
  last: number;
  overlapUnits: number;
}

function packUnits(units: Unit[], maxTokens: number, overlapTokens: number): UnitSpan[] {
  const spans: UnitSpan[] = [];
  let next = 0;

  while (next < units.length) {
    let first = next;
    let overlapUnits = 0;

    if (spans.length > 0 && overlapTokens > 0) {
      let budget = overlapTokens;
      let i = next - 1;
      const prevFirst = spans[spans.length - 1].first;
      while (i > prevFirst && units[i].tokens <= budget) {
        budget -= units[i].tokens;
        i--;
      }
      first = i + 1;
      overlapUnits = next - first;
      // Drop leading overlap units until the next new unit fits.
      while (overlapUnits > 0 && sumTokens(units, first, next) + units[next].tokens > maxTokens) {
        first++;
        overlapUnits--;
      }
    }

    let tokens = sumTokens(units, first, next);
    let last = next;
    tokens += units[last].tokens;
    while (last + 1 < units.length && tokens + units[last + 1].tokens <= maxTokens) {
      last++;
      tokens += units[last].tokens;
    }

    spans.push({ first, last, overlapUnits });
    next = last + 1;
  }

  return spans;
}

function sumTokens(units: Unit[], from: number, to: number): number {
  let total = 0;
  for (let i = from; i < to; i++) total += units[i].tokens;
  return total;
}

/** Keep the first maxChunks-1 spans and the final span; the middle is dropped. */
function capSpans(spans: UnitSpan[], maxChunks: number | undefined): UnitSpan[] {
  if (!maxChunks || spans.length <= maxChunks) return spans;
  const kept = spans.slice(0, maxChunks - 1);
  const lastSpan = spans[spans.length - 1];
  kept.push({ ...lastSpan, overlapUnits: 0 });
  return kept;
}

function coverageOf(spans: UnitSpan[], offsets: number[], total: number): number {
  if (total === 0) return 1;
  let covered = 0;
  let coveredUntil = 0;
  for (const span of spans) {
    const start = Math.max(offsets[span.first], coveredUntil);
    const end = offsets[span.last + 1];
    if (end > start) {
      covered += end - start;
      coveredUntil = end;
    }
  }
  return Math.round((covered / total) * 10000) / 10000;
}

/**
 * Plan chunks for one logical document.
 *
 * A document whose estimate fits under maxTokens yields a single chunk with
 * coverage 1.0. Otherwise chunks are packed from paragraph units with the
 * configured token overlap; the first chunk starts at character 0 and the
 * last ends at the final character.
 */
export function planChunks(text: string, options: ChunkOptions): ChunkPlan {
  const charsPerToken = options.charsPerToken ?? DEFAULT_CHARS_PER_TOKEN;
  const maxTokens = Math.max(1, Math.floor(options.maxTokens));
  const overlapTokens = Math.max(0, Math.min(Math.floor(options.overlapTokens), maxTokens - 1));
  const totalTokens = estimateTokens(text, charsPerToken);

  if (totalTokens <= maxTokens) {
    return {
      totalTokens,
      maxTokens,
      overlapTokens,
      chunked: false,
      chunks: [
        {
          index: 0,
          startChar: 0,
          endChar: text.length,
          startToken: 0,
          endToken: totalTokens,
          tokens: totalTokens,
          overlapPrevTokens: 0,
          sections: [],
        },
      ],
      coverageRatio: 1,
    };
  }

  const units = buildUnits(text, maxTokens, charsPerToken);
  const offsets = [0];
  for (const unit of units) offsets.push(offsets[offsets.length - 1] + unit.tokens);
  const unitTotal = offsets[offsets.length - 1];

  const spans = capSpans(packUnits(units, maxTokens, overlapTokens), options.maxChunks);

  const headerBefore: Array<string | null> = [];
  let active: string | null = null;
  for (const unit of units) {
    headerBefore.push(active);
    if (unit.header) active = unit.header;
  }

  const chunks: Chunk[] = spans.map((span, index) => {
    const sections: string[] = [];
    const carried = headerBefore[span.first];
    if (carried) sections.push(carried);
    for (let i = span.first; i <= span.last; i++) {
      const header = units[i].header;
      if (header && !sections.includes(header)) sections.push(header);
    }
    return {
      index,
      startChar: units[span.first].start,
      endChar: units[span.last].end,
      startToken: offsets[span.first],
      endToken: offsets[span.last + 1],
      tokens: offsets[span.last + 1] - offsets[span.first],
      overlapPrevTokens: offsets[span.first + span.overlapUnits] - offsets[span.first],
      sections,
    };
  });

  return {
    totalTokens: unitTotal,
    maxTokens,
    overlapTokens,
    chunked: true,
    chunks,
    coverageRatio: coverageOf(spans, offsets, unitTotal),
  };
}

/** Text of each chunk, in plan order. */
export function chunkTexts(text: string, plan: ChunkPlan): string[] {
  return plan.chunks.map((chunk) => text.slice(chunk.startChar, chunk.endChar));
}

/** Tokens covered by the union of chunk ranges (overlap counted once). */
export function dedupedTokenCount(plan: ChunkPlan): number {
  let covered = 0;
  let coveredUntil = 0;
  for (const chunk of plan.chunks) {
    const start = Math.max(chunk.startToken, coveredUntil);
    if (chunk.endToken > start) {
      covered += chunk.endToken - start;
      coveredUntil = chunk.endToken;
    }
  }
  return covered;
}
