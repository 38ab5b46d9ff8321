/**
 * Run-wide token budget.
 *
 * Prevents runaway cost on large inputs by tracking the tokens a run has
 * consumed (across resumes: the tracker is seeded from the checkpoint) and
 * refusing a call whose estimate would cross the cap.
 *
 * @module pipeline/budgets
 */

import type { BudgetConfig } from "../config-schemas";

// ============================================================================
// TYPES
// ============================================================================

export interface RunBudget {
  /** Maximum total tokens (input + output) for the run; 0 = unlimited */
  maxRunTokens: number;
}

export interface BudgetTracker {
  tokensUsed: number;
  modelCalls: number;
  budgetExceeded: boolean;
  exceedReason?: string;
}

export class TokenBudgetExceededError extends Error {
  constructor(public readonly reason: string) {
    super(`Run token budget exceeded: ${reason}`);
    this.name = "TokenBudgetExceededError";
  }
}

// ============================================================================
// CONFIGURATION
// ============================================================================

export function getRunBudget(config: BudgetConfig): RunBudget {
  return { maxRunTokens: config.maxRunTokens };
}

export function createBudgetTracker(tokensUsed = 0, modelCalls = 0): BudgetTracker {
  return { tokensUsed, modelCalls, budgetExceeded: false };
}

// ============================================================================
// CHECKS & RECORDING
// ============================================================================

export function checkTokenBudget(
  tracker: BudgetTracker,
  budget: RunBudget,
  tokensToAdd: number,
): { allowed: boolean; reason?: string } {
  if (budget.maxRunTokens <= 0) return { allowed: true };
  const newTotal = tracker.tokensUsed + tokensToAdd;
  if (newTotal > budget.maxRunTokens) {
    return { allowed: false, reason: `Would exceed max tokens: ${newTotal} > ${budget.maxRunTokens}` };
  }
  return { allowed: true };
}

/** Throws TokenBudgetExceededError (and marks the tracker) when the call does not fit. */
export function reserveTokens(tracker: BudgetTracker, budget: RunBudget, tokensToAdd: number): void {
  const check = checkTokenBudget(tracker, budget, tokensToAdd);
  if (!check.allowed) {
    const reason = check.reason ?? "token budget exceeded";
    markBudgetExceeded(tracker, reason);
    throw new TokenBudgetExceededError(reason);
  }
}

export function recordModelCall(tracker: BudgetTracker, tokens: number): void {
  tracker.modelCalls++;
  tracker.tokensUsed += tokens;
}

export function markBudgetExceeded(tracker: BudgetTracker, reason: string): void {
  tracker.budgetExceeded = true;
  tracker.exceedReason = reason;
}

export function getBudgetStats(tracker: BudgetTracker, budget: RunBudget): {
  tokensUsed: number;
  tokensRemaining: number | null;
  tokensPercent: number | null;
  modelCalls: number;
  budgetExceeded: boolean;
} {
  const limited = budget.maxRunTokens > 0;
  return {
    tokensUsed: tracker.tokensUsed,
    tokensRemaining: limited ? Math.max(0, budget.maxRunTokens - tracker.tokensUsed) : null,
    tokensPercent: limited ? Math.round((tracker.tokensUsed / budget.maxRunTokens) * 100) : null,
    modelCalls: tracker.modelCalls,
    budgetExceeded: tracker.budgetExceeded,
  };
}
