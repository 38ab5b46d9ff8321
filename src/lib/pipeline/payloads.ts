/**
 * Stage Payloads
 *
 * Model-facing response schemas per stage, validation into the tagged
 * `StagePayload` union, the request text sent with each call, the stricter
 * follow-up used after a malformed response, and the merge of per-chunk
 * results into one payload.
 *
 * Payload text is deterministic for a given input: it is the cache
 * fingerprint.
 *
 * @module pipeline/payloads
 */

import { z } from "zod";
import type { ProviderId } from "../config-schemas";
import { PayloadValidationError } from "./errors";
import { parseFirstJsonObject } from "./json";
import {
  DecisionSchema,
  DocumentTypeSchema,
  type Decision,
  type FieldValue,
  type Stage1Payload,
  type Stage3Payload,
  type StageId,
} from "./types";

// ============================================================================
// RESPONSE SCHEMAS
// ============================================================================

const ModelEvidenceSchema = z.object({
  quote: z.string(),
  page: z.number().int().nullable().optional(),
  anchor: z.string().optional(),
});

const ModelFieldSchema = z.object({
  content: z.string(),
  evidence: ModelEvidenceSchema.nullable().optional(),
  confidence: z.number().min(0).max(1),
});

const ModelFieldsSchema = z.record(z.string(), ModelFieldSchema);

export const ClassificationResponseSchema = z.object({
  type: DocumentTypeSchema,
  confidence: z.number().min(0).max(1),
});

export const Stage1ResponseSchema = z.object({
  fields: ModelFieldsSchema,
  inconclusive: z.boolean().default(false),
});

export const ThemeListResponseSchema = z.object({
  themes: z.array(
    z.object({
      id: z.string().min(1),
      title: z.string(),
    }),
  ),
});

export const ThemeResponseSchema = z.object({
  fields: ModelFieldsSchema,
  citations: z.array(z.string()).default([]),
  confidence: z.number().min(0).max(1),
});

export const Stage3ResponseSchema = z.object({
  decision: DecisionSchema,
  fields: ModelFieldsSchema,
  citations: z.array(z.string()).default([]),
  transcript: z.string().nullable().default(null),
  /** Explicit warning that the decision is inconclusive. */
  warning: z.string().nullable().default(null),
  reasonCode: z.string().nullable().default(null),
  reasonDescription: z.string().nullable().default(null),
});

export type ClassificationResponse = z.infer<typeof ClassificationResponseSchema>;
export type Stage1Response = z.infer<typeof Stage1ResponseSchema>;
export type ThemeListResponse = z.infer<typeof ThemeListResponseSchema>;
export type ThemeResponse = z.infer<typeof ThemeResponseSchema>;
export type Stage3Response = z.infer<typeof Stage3ResponseSchema>;

// ============================================================================
// VALIDATION
// ============================================================================

/**
 * Parse the first JSON object of a model response against a schema.
 * Throws PayloadValidationError when there is none or it does not match.
 */
export function parseModelResponse<S extends z.ZodTypeAny>(text: string, schema: S): z.infer<S> {
  const json = parseFirstJsonObject(text);
  if (!json.ok) {
    throw new PayloadValidationError(`Malformed model response: ${json.detail}`, []);
  }
  const parsed = schema.safeParse(json.value);
  if (!parsed.success) {
    throw new PayloadValidationError(
      `Model response failed validation: ${summarizeIssues(parsed.error.issues)}`,
      parsed.error.issues,
    );
  }
  return parsed.data;
}

function summarizeIssues(issues: z.ZodIssue[]): string {
  return issues
    .slice(0, 10)
    .map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`)
    .join("; ");
}

/** Follow-up instruction appended to the next request after a malformed response. */
export function buildValidationRetryNote(error: PayloadValidationError, provider: ProviderId): string {
  const problems =
    error.issues.length > 0
      ? error.issues
          .slice(0, 10)
          .map((issue) => `- ${issue.path.join(".") || "root"}: ${issue.message} (code: ${issue.code})`)
          .join("\n")
      : `- ${error.message}`;

  const base = `Your previous output did not match the required structure:\n${problems}\n\n` +
    "Regenerate the COMPLETE output. Every required key must be present, types must match exactly " +
    "and enum values must match case.";

  switch (provider) {
    case "anthropic":
      return `${base}\nReturn ONLY valid JSON. Start your response with a curly brace {`;
    case "openai":
      return `${base}\nCRITICAL: Return ONLY the JSON object. No explanations. No markdown.`;
    case "google":
      return `${base}\nSTRICT FORMAT: Output must be valid JSON only. No text before or after the JSON.`;
    case "mistral":
      return `${base}\n**IMPORTANT**: Generate valid JSON matching the structure exactly.`;
  }
}

// ============================================================================
// CONVERSION
// ============================================================================

type ModelField = z.infer<typeof ModelFieldSchema>;

export function toFieldValue(field: ModelField): FieldValue {
  return {
    content: field.content,
    evidence: field.evidence
      ? { quote: field.evidence.quote, page: field.evidence.page ?? null, anchor: field.evidence.anchor ?? "" }
      : null,
    confidence: field.confidence,
  };
}

export function toFieldMap(fields: Record<string, ModelField>): Record<string, FieldValue> {
  const result: Record<string, FieldValue> = {};
  for (const [name, field] of Object.entries(fields)) {
    result[name] = toFieldValue(field);
  }
  return result;
}

// ============================================================================
// REQUEST TEXT
// ============================================================================

export interface RequestSection {
  title: string;
  body: string;
}

export interface StageRequestInput {
  task: string;
  context?: unknown;
  documentLabel: string;
  chunkIndex: number;
  chunkCount: number;
  sections: string[];
  text: string;
  corrections?: string[];
}

/** User message for one call. Same input, same bytes. */
export function buildStageRequest(input: StageRequestInput): string {
  const parts: RequestSection[] = [{ title: "TASK", body: input.task }];
  if (input.context !== undefined) {
    parts.push({ title: "CONTEXT", body: JSON.stringify(input.context, null, 2) });
  }

  const location = input.chunkCount > 1 ? ` (segment ${input.chunkIndex + 1}/${input.chunkCount})` : "";
  const sectionNote = input.sections.length > 0 ? `Sections: ${input.sections.join(" | ")}\n\n` : "";
  parts.push({ title: `DOCUMENT ${input.documentLabel}${location}`, body: `${sectionNote}${input.text}` });

  if (input.corrections && input.corrections.length > 0) {
    parts.push({ title: "CORRECTIONS", body: input.corrections.join("\n\n") });
  }

  return parts.map((part) => `## ${part.title}\n${part.body}`).join("\n\n");
}

// ============================================================================
// MERGING CHUNK RESULTS
// ============================================================================

/** Union of field maps; on a name clash the higher confidence wins (earlier on a tie). */
export function mergeFieldMaps(maps: Array<Record<string, FieldValue>>): Record<string, FieldValue> {
  const merged: Record<string, FieldValue> = {};
  for (const map of maps) {
    for (const [name, value] of Object.entries(map)) {
      const current = merged[name];
      if (!current || value.confidence > current.confidence) merged[name] = value;
    }
  }
  return merged;
}

export function unionCitations(lists: string[][]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const list of lists) {
    for (const citation of list) {
      const trimmed = citation.trim();
      if (trimmed && !seen.has(trimmed)) {
        seen.add(trimmed);
        result.push(trimmed);
      }
    }
  }
  return result;
}

/** A document is inconclusive only when no segment reached a conclusion. */
export function mergeStage1(responses: Stage1Response[]): Stage1Payload {
  return {
    stage: "stage1",
    fields: mergeFieldMaps(responses.map((r) => toFieldMap(r.fields))),
    inconclusive: responses.length === 0 || responses.every((r) => r.inconclusive),
  };
}

/** Conflicting conclusive decisions across segments merge to INCONCLUSIVE. */
export function mergeDecisions(decisions: Decision[]): Decision {
  const conclusive = [...new Set(decisions.filter((d) => d !== "INCONCLUSIVE"))];
  return conclusive.length === 1 ? conclusive[0] : "INCONCLUSIVE";
}

/**
 * Segments that reach opposite conclusive decisions yield an INCONCLUSIVE
 * payload explained as a segment conflict, unless a segment explained itself.
 */
export function mergeStage3(responses: Stage3Response[]): Stage3Payload {
  const decisions = responses.map((r) => r.decision);
  const conclusive = [...new Set(decisions.filter((d) => d !== "INCONCLUSIVE"))];
  const conflict = conclusive.length > 1;
  return {
    stage: "stage3",
    decision: mergeDecisions(decisions),
    fields: mergeFieldMaps(responses.map((r) => toFieldMap(r.fields))),
    citations: unionCitations(responses.map((r) => r.citations)),
    transcript: responses.find((r) => r.transcript !== null)?.transcript ?? null,
    warning:
      firstPresent(responses.map((r) => r.warning)) ??
      (conflict ? "Segments of the supporting material reached conflicting decisions" : null),
    reasonCode: firstPresent(responses.map((r) => r.reasonCode)) ?? (conflict ? "SEGMENT_CONFLICT" : null),
    reasonDescription:
      firstPresent(responses.map((r) => r.reasonDescription)) ??
      (conflict ? `Segment decisions: ${conclusive.join(", ")}` : null),
  };
}

function firstPresent(values: Array<string | null>): string | null {
  return values.find((value) => value !== null && value.trim() !== "") ?? null;
}

export interface IdentifiedTheme {
  id: string;
  title: string;
  chunkIndexes: number[];
}

/** Themes across segments, in first-seen order, with the segments that mention each. */
export function mergeThemeLists(lists: Array<{ chunkIndex: number; response: ThemeListResponse }>): IdentifiedTheme[] {
  const byId = new Map<string, IdentifiedTheme>();
  for (const { chunkIndex, response } of lists) {
    for (const theme of response.themes) {
      const id = theme.id.trim();
      const existing = byId.get(id);
      if (existing) {
        if (!existing.chunkIndexes.includes(chunkIndex)) existing.chunkIndexes.push(chunkIndex);
      } else {
        byId.set(id, { id, title: theme.title.trim() || id, chunkIndexes: [chunkIndex] });
      }
    }
  }
  return [...byId.values()];
}

/** Compact, deterministic view of a payload handed to downstream stages as context. */
export function payloadContext(stage: StageId, fields: Record<string, FieldValue>): Record<string, string> {
  const context: Record<string, string> = {};
  for (const name of Object.keys(fields).sort()) {
    context[`${stage}.${name}`] = fields[name].content;
  }
  return context;
}
