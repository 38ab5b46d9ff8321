/**
 * Pipeline error types.
 *
 * Every failure the orchestrator reacts to carries an ErrorKind so routing
 * (retry, block, dead-letter) never depends on message text.
 *
 * @module pipeline/errors
 */

import type { ZodIssue } from "zod";
import type { ErrorKind, ModelAttempt } from "./types";

export class ModelInvocationError extends Error {
  constructor(
    message: string,
    public readonly kind: Extract<ErrorKind, "GATE_FAILURE" | "FATAL">,
    public readonly attempts: ModelAttempt[],
    public readonly category: string,
    public readonly partialContent: string | null = null,
  ) {
    super(message);
    this.name = "ModelInvocationError";
  }
}

export class PayloadValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: ZodIssue[],
  ) {
    super(message);
    this.name = "PayloadValidationError";
  }
}

export class StageTimeoutError extends Error {
  constructor(
    public readonly scope: "stage" | "run",
    public readonly timeoutMs: number,
  ) {
    super(`${scope === "run" ? "Run" : "Stage"} timeout of ${timeoutMs}ms elapsed`);
    this.name = "StageTimeoutError";
  }
}

export class RunAbortedError extends Error {
  constructor(message = "Run aborted") {
    super(message);
    this.name = "RunAbortedError";
  }
}

export class CheckpointNotFoundError extends Error {
  constructor(public readonly runId: string) {
    super(`No checkpoint found for run ${runId}`);
    this.name = "CheckpointNotFoundError";
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

// ============================================================================
// FRIENDLY MESSAGES
// ============================================================================

const FRIENDLY_MESSAGES: Record<ErrorKind, string> = {
  TRANSIENT: "The model provider was temporarily unavailable and the retry budget ran out.",
  TRUNCATION: "The model kept returning incomplete output within the retry budget.",
  VALIDATION: "The model returned a payload that does not match the expected structure.",
  GATE_FAILURE: "A quality gate rejected the stage result; see the gate report for details.",
  FATAL: "An unrecoverable error stopped the run (authentication, configuration or provider rejection).",
};

/** Operator-facing message for an error kind. Never includes provider text. */
export function toFriendlyError(kind: ErrorKind): string {
  return FRIENDLY_MESSAGES[kind];
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
