/**
 * Model Router
 *
 * Maps (stage, criticality) to a (provider, model) pair from static config.
 * ROUTINE work gets the cheaper model when hybrid routing is on; CRITICAL
 * work always gets the strong model. Falls back to the secondary provider
 * while the primary provider's circuit is open.
 *
 * Also holds the per-model pricing table used for cost accounting.
 *
 * @module pipeline/model-router
 */

import type { ProviderId, RoutingConfig } from "../config-schemas";
import { allowProbeAfterCooldown } from "../provider-health";
import type { InstructionStageId, TokenUsage } from "./types";

// ============================================================================
// TYPES
// ============================================================================

export type Criticality = "ROUTINE" | "CRITICAL";

export interface ModelRoute {
  stage: InstructionStageId;
  criticality: Criticality;
  provider: ProviderId;
  modelId: string;
  usedFallback: boolean;
}

export const STAGE_CRITICALITY: Record<InstructionStageId, Criticality> = {
  classification: "ROUTINE",
  stage1: "CRITICAL",
  stage2: "CRITICAL",
  stage3: "CRITICAL",
};

// ============================================================================
// ROUTING
// ============================================================================

function pickModel(criticality: Criticality, hybrid: boolean, routine: string, critical: string): string {
  return criticality === "ROUTINE" && hybrid ? routine : critical;
}

/**
 * Resolve the model for one stage attempt.
 *
 * @param isAvailable - provider availability check (defaults to the circuit breaker)
 */
export function routeModel(
  stage: InstructionStageId,
  routing: RoutingConfig,
  isAvailable: (provider: ProviderId) => boolean = (p) => allowProbeAfterCooldown(p, routing.circuitCooldownMs),
): ModelRoute {
  const criticality = STAGE_CRITICALITY[stage];

  if (routing.fallback && !isAvailable(routing.provider)) {
    const fb = routing.fallback;
    console.warn(`[Router] ${routing.provider} circuit open, routing ${stage} to ${fb.provider}`);
    return {
      stage,
      criticality,
      provider: fb.provider,
      modelId: pickModel(criticality, routing.hybrid, fb.routineModel, fb.criticalModel),
      usedFallback: true,
    };
  }

  return {
    stage,
    criticality,
    provider: routing.provider,
    modelId: pickModel(criticality, routing.hybrid, routing.routineModel, routing.criticalModel),
    usedFallback: false,
  };
}

// ============================================================================
// PRICING
// ============================================================================

/** USD per 1M tokens. */
export const MODEL_PRICING: Record<string, { input: number; output: number }> = {
  "gpt-4.1": { input: 2.0, output: 8.0 },
  "gpt-4.1-mini": { input: 0.4, output: 1.6 },
  "gpt-4.1-nano": { input: 0.1, output: 0.4 },
  "gpt-4o": { input: 2.5, output: 10.0 },
  "gpt-4o-mini": { input: 0.15, output: 0.6 },
  "claude-sonnet-4-5-20250929": { input: 3.0, output: 15.0 },
  "claude-haiku-4-5-20251001": { input: 1.0, output: 5.0 },
  "gemini-2.5-pro": { input: 1.25, output: 10.0 },
  "gemini-2.5-flash": { input: 0.3, output: 2.5 },
  "mistral-large-latest": { input: 2.0, output: 6.0 },
  "mistral-small-latest": { input: 0.2, output: 0.6 },
};

/** Cost of one call; unknown models cost 0 and log once per model. */
const warnedUnknownModels = new Set<string>();

export function estimateCostUsd(modelId: string, usage: TokenUsage): number {
  const price = MODEL_PRICING[modelId];
  if (!price) {
    if (!warnedUnknownModels.has(modelId)) {
      warnedUnknownModels.add(modelId);
      console.warn(`[Router] No pricing for model ${modelId}; cost recorded as 0`);
    }
    return 0;
  }
  const cost = (usage.promptTokens * price.input + usage.completionTokens * price.output) / 1_000_000;
  return Math.round(cost * 1_000_000) / 1_000_000;
}
