/**
 * Confidence Scoring
 *
 * Deterministic post-processing of model-reported confidence:
 *   1. Field calibration: a field is never more confident than its evidence checks allow
 *   2. Stage score: penalty curve over failed checks, minus a fixed inconclusive penalty
 *   3. Global score: weighted average over the stages that ran
 *   4. Escalation: critical fields, themes and the global score below threshold
 *
 * All functions are pure (no side effects, no model calls).
 *
 * @module pipeline/confidence
 */

import type { ConfidenceConfig } from "../config-schemas";
import type { Escalation, FieldValue, StageId, ThemeResult } from "./types";

// ============================================================================
// TYPES
// ============================================================================

export interface FieldCheck {
  passed: number;
  total: number;
}

const INCONCLUSIVE_PENALTY = 0.35;
const INCONCLUSIVE_GLOBAL_CAP = 0.49;
const PENALTY_EXPONENT = 1.35;
const PENALTY_SCALE = 1.15;

export function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

// ============================================================================
// FIELD & STAGE SCORES
// ============================================================================

export function checkRatio(check: FieldCheck): number {
  return check.total > 0 ? check.passed / check.total : 0;
}

export function calibrateField(field: FieldValue, check: FieldCheck | undefined): FieldValue {
  if (!check) return field;
  return { ...field, confidence: round3(Math.min(field.confidence, checkRatio(check))) };
}

export function calibrateFields(
  fields: Record<string, FieldValue>,
  checks: Record<string, FieldCheck>,
  prefix = "",
): Record<string, FieldValue> {
  const result: Record<string, FieldValue> = {};
  for (const [name, field] of Object.entries(fields)) {
    result[name] = calibrateField(field, checks[`${prefix}${name}`]);
  }
  return result;
}

/**
 * Stage score from its checks.
 *
 *   penalty = min(1, (failed / total)^1.35 × 1.15)
 *   score   = 1 − penalty − (inconclusive ? 0.35 : 0), floored at 0
 */
export function scoreStageConfidence(checksFailed: number, checksTotal: number, inconclusive: boolean): number {
  const ratio = checksTotal > 0 ? checksFailed / checksTotal : 0;
  const penalty = Math.min(1, ratio ** PENALTY_EXPONENT * PENALTY_SCALE);
  const score = 1 - penalty - (inconclusive ? INCONCLUSIVE_PENALTY : 0);
  return round3(Math.max(0, Math.min(1, score)));
}

/**
 * Weighted average over the stages that produced a score. An inconclusive
 * stage 3 caps the result below any sensible acceptance threshold.
 */
export function computeGlobalConfidence(
  scores: Partial<Record<StageId, number>>,
  weights: Record<StageId, number>,
  inconclusive: boolean,
): number | null {
  let weighted = 0;
  let weightSum = 0;
  for (const [stage, score] of Object.entries(scores)) {
    if (score === undefined || !isStageId(stage)) continue;
    weighted += score * weights[stage];
    weightSum += weights[stage];
  }
  if (weightSum === 0) return null;
  const global = round3(weighted / weightSum);
  return inconclusive ? Math.min(global, INCONCLUSIVE_GLOBAL_CAP) : global;
}

function isStageId(value: string): value is StageId {
  return value === "stage1" || value === "stage2" || value === "stage3";
}

// ============================================================================
// ESCALATION
// ============================================================================

export function fieldEscalations(
  stage: StageId,
  fields: Record<string, FieldValue>,
  criticalFields: string[],
  threshold: number,
  prefix = "",
): Escalation[] {
  const escalations: Escalation[] = [];
  for (const name of criticalFields) {
    const field = fields[name];
    if (field && field.confidence < threshold) {
      escalations.push({
        stage,
        target: `${prefix}${name}`,
        confidence: field.confidence,
        threshold,
        reason: `Field "${prefix}${name}" confidence ${field.confidence.toFixed(3)} below ${threshold}`,
      });
    }
  }
  return escalations;
}

export function themeEscalations(themes: Record<string, ThemeResult>, threshold: number): Escalation[] {
  const escalations: Escalation[] = [];
  for (const [id, theme] of Object.entries(themes)) {
    if (theme.status === "escalated") {
      escalations.push({
        stage: "stage2",
        target: id,
        confidence: theme.confidence,
        threshold,
        reason: `Theme "${id}" analysis did not complete`,
      });
    } else if (theme.confidence < threshold) {
      escalations.push({
        stage: "stage2",
        target: id,
        confidence: theme.confidence,
        threshold,
        reason: `Theme "${id}" confidence ${theme.confidence.toFixed(3)} below ${threshold}`,
      });
    }
  }
  return escalations;
}

export function globalEscalation(global: number | null, config: ConfidenceConfig): Escalation | null {
  if (global === null || global >= config.globalThreshold) return null;
  return {
    stage: "global",
    target: "run",
    confidence: global,
    threshold: config.globalThreshold,
    reason: `Global confidence ${global.toFixed(3)} below ${config.globalThreshold}`,
  };
}
