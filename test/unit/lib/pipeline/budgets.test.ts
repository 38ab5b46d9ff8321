/**
 * Run Budget Tests
 *
 * @module pipeline/budgets.test
 */

import { describe, expect, it } from "vitest";
import {
  checkTokenBudget,
  createBudgetTracker,
  getBudgetStats,
  getRunBudget,
  recordModelCall,
  reserveTokens,
  TokenBudgetExceededError,
} from "@/lib/pipeline/budgets";
import { DEFAULT_ENGINE_CONFIG } from "@/lib/config-schemas";

describe("checkTokenBudget", () => {
  it("allows anything when the cap is 0", () => {
    const tracker = createBudgetTracker(1_000_000);
    expect(checkTokenBudget(tracker, { maxRunTokens: 0 }, 1_000_000)).toEqual({ allowed: true });
  });

  it("refuses a call that crosses the cap", () => {
    const tracker = createBudgetTracker(900);
    expect(checkTokenBudget(tracker, { maxRunTokens: 1000 }, 100)).toEqual({ allowed: true });
    expect(checkTokenBudget(tracker, { maxRunTokens: 1000 }, 101)).toEqual({
      allowed: false,
      reason: "Would exceed max tokens: 1001 > 1000",
    });
  });
});

describe("reserveTokens", () => {
  it("throws and marks the tracker when the estimate does not fit", () => {
    const tracker = createBudgetTracker(500);
    expect(() => reserveTokens(tracker, { maxRunTokens: 600 }, 200)).toThrow(TokenBudgetExceededError);
    expect(tracker.budgetExceeded).toBe(true);
    expect(tracker.exceedReason).toBe("Would exceed max tokens: 700 > 600");
  });

  it("reserves nothing when the call fits", () => {
    const tracker = createBudgetTracker();
    reserveTokens(tracker, { maxRunTokens: 600 }, 200);
    expect(tracker.tokensUsed).toBe(0);
    expect(tracker.budgetExceeded).toBe(false);
  });
});

describe("recordModelCall / getBudgetStats", () => {
  it("accumulates from the seeded checkpoint totals", () => {
    const tracker = createBudgetTracker(300, 2);
    recordModelCall(tracker, 150);

    expect(getBudgetStats(tracker, { maxRunTokens: 900 })).toEqual({
      tokensUsed: 450,
      tokensRemaining: 450,
      tokensPercent: 50,
      modelCalls: 3,
      budgetExceeded: false,
    });
  });

  it("reports no remaining share for an unlimited run", () => {
    const stats = getBudgetStats(createBudgetTracker(10), getRunBudget(DEFAULT_ENGINE_CONFIG.budget));
    expect(stats.tokensRemaining).toBeNull();
    expect(stats.tokensPercent).toBeNull();
  });
});
