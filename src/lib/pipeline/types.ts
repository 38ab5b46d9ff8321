/**
 * Pipeline Data Model
 *
 * Zod schemas for everything the engine persists (checkpoints, dead letters,
 * stage results) with their inferred types. Stage payloads are a tagged union
 * dispatched by `stage`.
 *
 * @module pipeline/types
 */

import { z } from "zod";

// ============================================================================
// ENUMS
// ============================================================================

export const STAGE_IDS = ["stage1", "stage2", "stage3"] as const;
export const StageIdSchema = z.enum(STAGE_IDS);
export type StageId = z.infer<typeof StageIdSchema>;

/** Stages that consume instructions; classification is not an analysis stage. */
export type InstructionStageId = "classification" | StageId;
export const INSTRUCTION_STAGE_IDS: InstructionStageId[] = ["classification", ...STAGE_IDS];

export const DocumentTypeSchema = z.enum(["PRIMARY", "SUPPORTING", "UNKNOWN"]);
export type DocumentType = z.infer<typeof DocumentTypeSchema>;

export const PipelineStatusSchema = z.enum([
  "CLASSIFYING",
  "STAGE1",
  "STAGE2",
  "STAGE3",
  "FINALIZED",
  "BLOCKED",
  "DEAD_LETTERED",
]);
export type PipelineStatus = z.infer<typeof PipelineStatusSchema>;

export const GateVerdictSchema = z.enum(["PASS", "RETRY", "BLOCK", "ESCALATE"]);
export type GateVerdict = z.infer<typeof GateVerdictSchema>;

export const ErrorKindSchema = z.enum(["TRANSIENT", "TRUNCATION", "VALIDATION", "GATE_FAILURE", "FATAL"]);
export type ErrorKind = z.infer<typeof ErrorKindSchema>;

export const GateNameSchema = z.enum([
  "extraction",
  "classification",
  "coverage",
  "field_evidence",
  "known_set",
  "coherence",
  "inconclusive",
  "payload_validation",
  "model_output",
  "upstream",
  "token_budget",
  "escalation",
  "user_abort",
  "stage_timeout",
  "run_timeout",
]);
export type GateName = z.infer<typeof GateNameSchema>;

// ============================================================================
// DOCUMENTS
// ============================================================================

export const InputDocumentSchema = z.object({
  id: z.string().min(1),
  sourcePath: z.string(),
  type: DocumentTypeSchema,
  extractedText: z.string().nullable(),
  pageCount: z.number().int().min(0),
  pageQuality: z.array(z.number().min(0).max(1)),
  qualityScore: z.number().nullable(),
  noiseRatio: z.number().nullable(),
  classification: z
    .object({
      strategy: z.string(),
      confidence: z.number(),
    })
    .nullable(),
});
export type InputDocument = z.infer<typeof InputDocumentSchema>;

// ============================================================================
// PAYLOADS
// ============================================================================

export const EvidenceLocatorSchema = z.object({
  quote: z.string(),
  page: z.number().int().nullable(),
  anchor: z.string(),
});
export type EvidenceLocator = z.infer<typeof EvidenceLocatorSchema>;

export const FieldValueSchema = z.object({
  content: z.string(),
  evidence: EvidenceLocatorSchema.nullable(),
  confidence: z.number().min(0).max(1),
});
export type FieldValue = z.infer<typeof FieldValueSchema>;

export const ThemeResultSchema = z.object({
  title: z.string(),
  status: z.enum(["complete", "escalated"]),
  fields: z.record(z.string(), FieldValueSchema),
  citations: z.array(z.string()),
  confidence: z.number().min(0).max(1),
});
export type ThemeResult = z.infer<typeof ThemeResultSchema>;

export const Stage1PayloadSchema = z.object({
  stage: z.literal("stage1"),
  fields: z.record(z.string(), FieldValueSchema),
  inconclusive: z.boolean(),
});

export const Stage2PayloadSchema = z.object({
  stage: z.literal("stage2"),
  themes: z.record(z.string(), ThemeResultSchema),
});

export const DecisionSchema = z.enum(["ADMITTED", "NOT_ADMITTED", "INCONCLUSIVE"]);
export type Decision = z.infer<typeof DecisionSchema>;

export const Stage3PayloadSchema = z.object({
  stage: z.literal("stage3"),
  decision: DecisionSchema,
  fields: z.record(z.string(), FieldValueSchema),
  citations: z.array(z.string()),
  transcript: z.string().nullable(),
  /** Explanation an INCONCLUSIVE decision must carry. */
  warning: z.string().nullable().default(null),
  reasonCode: z.string().nullable().default(null),
  reasonDescription: z.string().nullable().default(null),
});

export const StagePayloadSchema = z.discriminatedUnion("stage", [
  Stage1PayloadSchema,
  Stage2PayloadSchema,
  Stage3PayloadSchema,
]);

export type Stage1Payload = z.infer<typeof Stage1PayloadSchema>;
export type Stage2Payload = z.infer<typeof Stage2PayloadSchema>;
export type Stage3Payload = z.infer<typeof Stage3PayloadSchema>;
export type StagePayload = z.infer<typeof StagePayloadSchema>;

// ============================================================================
// MODEL CALLS
// ============================================================================

export const TokenUsageSchema = z.object({
  promptTokens: z.number().int().min(0),
  completionTokens: z.number().int().min(0),
  totalTokens: z.number().int().min(0),
});
export type TokenUsage = z.infer<typeof TokenUsageSchema>;

export const ModelAttemptSchema = z.object({
  attempt: z.number().int().min(1),
  provider: z.string(),
  modelId: z.string(),
  maxTokens: z.number().int(),
  finishReason: z.string().nullable(),
  errorKind: ErrorKindSchema.nullable(),
  errorCategory: z.string().nullable(),
  content: z.string().nullable(),
  latencyMs: z.number().min(0),
  usage: TokenUsageSchema,
});
export type ModelAttempt = z.infer<typeof ModelAttemptSchema>;

export const UsageTotalsSchema = z.object({
  promptTokens: z.number().int().min(0),
  completionTokens: z.number().int().min(0),
  totalTokens: z.number().int().min(0),
  costUsd: z.number().min(0),
  modelCalls: z.number().int().min(0),
  cacheHits: z.number().int().min(0),
  truncatedCalls: z.number().int().min(0),
  latencyMsTotal: z.number().min(0),
});
export type UsageTotals = z.infer<typeof UsageTotalsSchema>;

// ============================================================================
// GATES
// ============================================================================

export const GateFailureSchema = z.object({
  gate: GateNameSchema,
  verdict: z.enum(["RETRY", "BLOCK"]),
  reason: z.string(),
});
export type GateFailure = z.infer<typeof GateFailureSchema>;

export const EscalationSchema = z.object({
  stage: z.string(),
  target: z.string(),
  confidence: z.number(),
  threshold: z.number(),
  reason: z.string(),
});
export type Escalation = z.infer<typeof EscalationSchema>;

export const GateReportSchema = z.object({
  verdict: GateVerdictSchema,
  failures: z.array(GateFailureSchema),
  escalations: z.array(EscalationSchema),
  checksTotal: z.number().int().min(0),
  checksFailed: z.number().int().min(0),
});
export type GateReport = z.infer<typeof GateReportSchema>;

// ============================================================================
// STAGE RESULTS & CHUNK PLANS
// ============================================================================

export const StageResultSchema = z.object({
  stage: StageIdSchema,
  attempt: z.number().int().min(1),
  payload: StagePayloadSchema.nullable(),
  rawResponse: z.string().nullable(),
  usage: TokenUsageSchema,
  retryCount: z.number().int().min(0),
  gate: GateReportSchema,
  verdict: GateVerdictSchema,
  confidence: z.number().min(0).max(1),
  callHistory: z.array(ModelAttemptSchema),
  cacheHits: z.number().int().min(0),
  createdAt: z.string(),
});
export type StageResult = z.infer<typeof StageResultSchema>;

export const ChunkSchema = z.object({
  index: z.number().int().min(0),
  startChar: z.number().int().min(0),
  endChar: z.number().int().min(0),
  startToken: z.number().int().min(0),
  endToken: z.number().int().min(0),
  tokens: z.number().int().min(0),
  overlapPrevTokens: z.number().int().min(0),
  sections: z.array(z.string()),
});
export type Chunk = z.infer<typeof ChunkSchema>;

export const ChunkPlanSchema = z.object({
  totalTokens: z.number().int().min(0),
  maxTokens: z.number().int().min(1),
  overlapTokens: z.number().int().min(0),
  chunked: z.boolean(),
  chunks: z.array(ChunkSchema),
  coverageRatio: z.number().min(0).max(1),
});
export type ChunkPlan = z.infer<typeof ChunkPlanSchema>;

// ============================================================================
// PIPELINE STATE
// ============================================================================

export const PromptSignatureSchema = z.object({
  profile: z.string(),
  version: z.string(),
  hash: z.string(),
  stages: z.record(z.string(), z.string()),
});
export type PromptSignature = z.infer<typeof PromptSignatureSchema>;

export const TransitionSchema = z.object({
  seq: z.number().int().min(1),
  from: PipelineStatusSchema,
  to: PipelineStatusSchema,
  stage: StageIdSchema.nullable(),
  attempt: z.number().int().min(0),
  at: z.string(),
});
export type Transition = z.infer<typeof TransitionSchema>;

export const BlockRecordSchema = z.object({
  gate: GateNameSchema,
  stage: z.string().nullable(),
  reasons: z.array(z.string()),
  at: z.string(),
});
export type BlockRecord = z.infer<typeof BlockRecordSchema>;

export const PipelineStateSchema = z.object({
  schemaVersion: z.literal(1),
  runId: z.string().min(1),
  status: PipelineStatusSchema,
  stageCursor: z.number().int().min(0).max(4),
  documents: z.array(InputDocumentSchema),
  gates: z.object({
    extraction: GateReportSchema.nullable(),
    classification: GateReportSchema.nullable(),
  }),
  chunkPlans: z.record(z.string(), ChunkPlanSchema),
  stageResults: z.object({
    stage1: z.array(StageResultSchema),
    stage2: z.array(StageResultSchema),
    stage3: z.array(StageResultSchema),
  }),
  usage: UsageTotalsSchema,
  alerts: z.array(z.string()),
  escalations: z.array(EscalationSchema),
  promptSignature: PromptSignatureSchema,
  globalConfidence: z.number().nullable(),
  block: BlockRecordSchema.nullable(),
  transitions: z.array(TransitionSchema),
  createdAt: z.string(),
  updatedAt: z.string(),
});
export type PipelineState = z.infer<typeof PipelineStateSchema>;

export const STAGE_CURSOR: Record<PipelineStatus, number | null> = {
  CLASSIFYING: 0,
  STAGE1: 1,
  STAGE2: 2,
  STAGE3: 3,
  FINALIZED: 4,
  BLOCKED: null,
  DEAD_LETTERED: null,
};

export const STAGE_STATUS: Record<StageId, PipelineStatus> = {
  stage1: "STAGE1",
  stage2: "STAGE2",
  stage3: "STAGE3",
};

/** Upstream stages that must hold a PASS verdict before a stage may start. */
export const STAGE_UPSTREAM: Record<StageId, StageId[]> = {
  stage1: [],
  stage2: ["stage1"],
  stage3: ["stage1", "stage2"],
};

export function emptyUsage(): UsageTotals {
  return {
    promptTokens: 0,
    completionTokens: 0,
    totalTokens: 0,
    costUsd: 0,
    modelCalls: 0,
    cacheHits: 0,
    truncatedCalls: 0,
    latencyMsTotal: 0,
  };
}

export function latestResult(state: PipelineState, stage: StageId): StageResult | null {
  const attempts = state.stageResults[stage];
  return attempts.length > 0 ? attempts[attempts.length - 1] : null;
}
