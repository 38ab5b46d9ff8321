/**
 * Engine Configuration Schemas
 *
 * Zod schemas and defaults for every tunable of the review engine:
 * model routing, token budgets, client retry policy, gate thresholds,
 * confidence/escalation policy, concurrency, timeouts, cache and storage.
 *
 * @module config-schemas
 */

import { z } from "zod";

// ============================================================================
// PRIMITIVES
// ============================================================================

export const PROVIDER_IDS = ["openai", "anthropic", "google", "mistral"] as const;
export const ProviderIdSchema = z.enum(PROVIDER_IDS);
export type ProviderId = z.infer<typeof ProviderIdSchema>;

export const TieBreakSchema = z.enum(["prefer_higher_confidence", "escalate"]);
export type TieBreak = z.infer<typeof TieBreakSchema>;

const ratio = () => z.number().min(0).max(1);

// ============================================================================
// ENGINE CONFIG
// ============================================================================

export const RoutingConfigSchema = z.object({
  provider: ProviderIdSchema.describe("Primary provider for every stage"),
  hybrid: z.boolean().describe("Route ROUTINE stages to the cheaper model (false = strong model everywhere)"),
  routineModel: z.string().min(1).describe("Model for ROUTINE work (classification)"),
  criticalModel: z.string().min(1).describe("Model for CRITICAL work (stages 1-3)"),
  fallback: z
    .object({
      provider: ProviderIdSchema,
      routineModel: z.string().min(1),
      criticalModel: z.string().min(1),
    })
    .nullable()
    .describe("Provider used while the primary provider's circuit is open"),
  circuitThreshold: z.number().int().min(1).max(20).describe("Consecutive failures that open a provider circuit"),
  circuitCooldownMs: z.number().int().min(0).describe("Time an open circuit waits before a half-open probe"),
});

export const BudgetConfigSchema = z.object({
  contextWindowTokens: z.number().int().min(1000).describe("Model context window used to derive stage ceilings"),
  budgetRatio: z.number().gt(0).max(1).describe("Share of the context window available to stage input"),
  overlapTokens: z.number().int().min(0).describe("Fixed token overlap between consecutive chunks"),
  charsPerToken: z.number().gt(0).describe("Characters per token for the token estimate"),
  maxChunks: z.number().int().min(2).describe("Upper bound of chunks per document (middle chunks are dropped beyond it)"),
  minCoverageRatio: ratio().describe("Minimum coverage ratio a chunked document must reach"),
  maxRunTokens: z.number().int().min(0).describe("Token cap per run (0 = unlimited)"),
  tokensPerMinute: z.number().int().min(0).describe("Provider TPM limit for pacing (0 = no pacing)"),
});

export const OutputTokensSchema = z.object({
  classification: z.number().int().min(16),
  stage1: z.number().int().min(16),
  stage2: z.number().int().min(16),
  stage3: z.number().int().min(16),
});

export const ClientConfigSchema = z.object({
  maxAttempts: z.number().int().min(1).max(10).describe("Attempts per model call (transport + truncation)"),
  callTimeoutMs: z.number().int().min(100).describe("Timeout of a single model call"),
  backoffBaseMs: z.number().int().min(0).describe("Base delay for exponential backoff"),
  backoffMaxMs: z.number().int().min(0).describe("Upper bound of a single backoff sleep"),
  truncationGrowthMin: z.number().int().min(1).describe("Minimum maxTokens growth after a truncated response"),
  maxOutputTokensCap: z.number().int().min(16).describe("maxTokens never grows beyond this"),
  temperature: z.number().min(0).max(2),
  validationRetries: z.number().int().min(0).max(5).describe("Follow-ups after a malformed model payload"),
});

export const GateConfigSchema = z.object({
  minQualityScore: ratio().describe("Extraction gate: minimum document quality"),
  maxNoiseRatio: ratio().describe("Extraction gate: maximum share of noisy pages"),
  pageNoiseFloor: ratio().describe("A page below this quality counts as noisy"),
  minSupportingDocuments: z.number().int().min(0).describe("Classification gate: minimum SUPPORTING documents"),
  classificationConfidence: ratio().describe("A classification strategy verdict below this falls through to the next strategy"),
  maxGateAttempts: z.number().int().min(1).max(5).describe("Stage attempts before a RETRY verdict becomes BLOCK"),
  criticalFields: z.object({
    stage1: z.array(z.string().min(1)),
    stage2: z.array(z.string().min(1)),
    stage3: z.array(z.string().min(1)),
  }),
});

export const ConfidenceConfigSchema = z.object({
  globalThreshold: ratio(),
  fieldThreshold: ratio(),
  themeThreshold: ratio(),
  blockOnEscalation: z.boolean().describe("Escalations also halt the run (otherwise advisory only)"),
  stageWeights: z.object({ stage1: ratio(), stage2: ratio(), stage3: ratio() }),
});

export const ConsensusConfigSchema = z.object({
  enabled: z.boolean().describe("Run stage 1 twice and compare critical fields"),
  tieBreak: TieBreakSchema,
});

export const EngineConfigSchema = z.object({
  profile: z.string().min(1).describe("Instruction profile handed to the instruction source"),
  routing: RoutingConfigSchema,
  budget: BudgetConfigSchema,
  outputTokens: OutputTokensSchema,
  client: ClientConfigSchema,
  gates: GateConfigSchema,
  confidence: ConfidenceConfigSchema,
  consensus: ConsensusConfigSchema,
  concurrency: z.object({
    stage2Workers: z.number().int().min(1).max(16),
    workerTimeoutMs: z.number().int().min(100),
  }),
  timeouts: z.object({
    stageTimeoutMs: z.number().int().min(100),
    runTimeoutMs: z.number().int().min(100),
  }),
  cache: z.object({
    enabled: z.boolean(),
    dbPath: z.string().min(1),
    ttlHours: z.number().gt(0),
  }),
  storage: z.object({
    checkpointDir: z.string().min(1),
    archiveDir: z.string().min(1),
    deadLetterDir: z.string().min(1),
    checkpointRetentionDays: z.number().int().min(1),
    deadLetterRetentionDays: z.number().int().min(1),
  }),
  instructions: z.object({
    dir: z.string().min(1),
  }),
});

export type RoutingConfig = z.infer<typeof RoutingConfigSchema>;
export type BudgetConfig = z.infer<typeof BudgetConfigSchema>;
export type OutputTokens = z.infer<typeof OutputTokensSchema>;
export type ClientConfig = z.infer<typeof ClientConfigSchema>;
export type GateConfig = z.infer<typeof GateConfigSchema>;
export type ConfidenceConfig = z.infer<typeof ConfidenceConfigSchema>;
export type EngineConfig = z.infer<typeof EngineConfigSchema>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  profile: "default",
  routing: {
    provider: "openai",
    hybrid: true,
    routineModel: "gpt-4.1-mini",
    criticalModel: "gpt-4.1",
    fallback: null,
    circuitThreshold: 3,
    circuitCooldownMs: 60_000,
  },
  budget: {
    contextWindowTokens: 25_000,
    budgetRatio: 0.7,
    overlapTokens: 500,
    charsPerToken: 4,
    maxChunks: 8,
    minCoverageRatio: 0.9,
    maxRunTokens: 0,
    tokensPerMinute: 200_000,
  },
  outputTokens: {
    classification: 700,
    stage1: 1400,
    stage2: 2200,
    stage3: 3200,
  },
  client: {
    maxAttempts: 3,
    callTimeoutMs: 120_000,
    backoffBaseMs: 1_000,
    backoffMaxMs: 30_000,
    truncationGrowthMin: 256,
    maxOutputTokensCap: 8192,
    temperature: 0,
    validationRetries: 1,
  },
  gates: {
    minQualityScore: 0.2,
    maxNoiseRatio: 0.95,
    pageNoiseFloor: 0.3,
    minSupportingDocuments: 1,
    classificationConfidence: 0.7,
    maxGateAttempts: 2,
    criticalFields: {
      stage1: ["case_number", "appellant", "appeal_type"],
      stage2: ["disputed_matter", "holding", "transcript_excerpt"],
      stage3: ["reasoning"],
    },
  },
  confidence: {
    globalThreshold: 0.75,
    fieldThreshold: 0.75,
    themeThreshold: 0.7,
    blockOnEscalation: false,
    stageWeights: { stage1: 0.35, stage2: 0.35, stage3: 0.3 },
  },
  consensus: {
    enabled: false,
    tieBreak: "prefer_higher_confidence",
  },
  concurrency: {
    stage2Workers: 3,
    workerTimeoutMs: 180_000,
  },
  timeouts: {
    stageTimeoutMs: 600_000,
    runTimeoutMs: 1_800_000,
  },
  cache: {
    enabled: true,
    dbPath: "./response-cache.db",
    ttlHours: 24,
  },
  storage: {
    checkpointDir: "./.pipeline/checkpoints",
    archiveDir: "./.pipeline/archive",
    deadLetterDir: "./.pipeline/dead-letter",
    checkpointRetentionDays: 7,
    deadLetterRetentionDays: 30,
  },
  instructions: {
    dir: "./prompts",
  },
};
