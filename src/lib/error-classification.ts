/**
 * Error Classification
 *
 * Classifies model provider errors into TRANSIENT (retry with backoff) and
 * FATAL (no retry, dead-letter) with a finer category for logs and reports.
 *
 * @module error-classification
 */

import { sanitizeLogMessage } from "./pipeline/debug";

export type ErrorCategory =
  | "rate_limit"
  | "provider_outage"
  | "timeout"
  | "auth"
  | "bad_request"
  | "unknown";

export type ClassifiedError = {
  category: ErrorCategory;
  kind: "TRANSIENT" | "FATAL";
  retriable: boolean;
  statusCode: number | null;
  message: string;
};

/** Patterns indicating provider rate limiting or overload */
const RATE_LIMIT_PATTERNS = [
  /status\s*(?:code\s*)?429/i,
  /rate\s*limit/i,
  /too\s*many\s*requests/i,
  /overloaded/i,
  /capacity/i,
  /resource\s*exhausted/i,
];

const OUTAGE_PATTERNS = [
  /status\s*(?:code\s*)?5\d\d/i,
  /service\s*unavailable/i,
  /internal\s*server\s*error/i,
  /bad\s*gateway/i,
];

const AUTH_PATTERNS = [
  /api\s*key/i,
  /authentication/i,
  /unauthorized/i,
  /permission\s*denied/i,
  /invalid.*key/i,
  /status\s*(?:code\s*)?401/i,
  /status\s*(?:code\s*)?403/i,
];

const TIMEOUT_PATTERNS = [
  /timeout/i,
  /timed?\s*out/i,
  /AbortError/i,
  /ETIMEDOUT/i,
  /ECONNRESET/i,
  /ECONNREFUSED/i,
  /ENOTFOUND/i,
  /EAI_AGAIN/i,
  /socket\s*hang\s*up/i,
  /fetch\s*failed/i,
  /network/i,
];

function readStatusCode(error: unknown): number | null {
  if (typeof error !== "object" || error === null) return null;
  if ("statusCode" in error && typeof error.statusCode === "number") return error.statusCode;
  if ("status" in error && typeof error.status === "number") return error.status;
  return null;
}

function readName(error: unknown): string {
  return error instanceof Error ? error.name : "";
}

function readMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
    return error.message;
  }
  return String(error);
}

function transient(category: ErrorCategory, statusCode: number | null, message: string): ClassifiedError {
  return { category, kind: "TRANSIENT", retriable: true, statusCode, message };
}

function fatal(category: ErrorCategory, statusCode: number | null, message: string): ClassifiedError {
  return { category, kind: "FATAL", retriable: false, statusCode, message };
}

/**
 * Classify a model provider error.
 *
 * HTTP status wins over message heuristics. Unknown errors are FATAL so
 * programming errors reach the dead-letter queue instead of being retried.
 */
export function classifyModelError(error: unknown): ClassifiedError {
  const statusCode = readStatusCode(error);
  const rawMessage = readMessage(error);
  const message = sanitizeLogMessage(rawMessage, 300);
  const name = readName(error);

  if (statusCode !== null) {
    if (statusCode === 429) return transient("rate_limit", statusCode, message);
    if (statusCode === 408) return transient("timeout", statusCode, message);
    if (statusCode >= 500) return transient("provider_outage", statusCode, message);
    if (statusCode === 401 || statusCode === 403) return fatal("auth", statusCode, message);
    if (statusCode >= 400) return fatal("bad_request", statusCode, message);
  }

  if (AUTH_PATTERNS.some((p) => p.test(rawMessage))) {
    return fatal("auth", statusCode, message);
  }
  if (RATE_LIMIT_PATTERNS.some((p) => p.test(rawMessage))) {
    return transient("rate_limit", statusCode, message);
  }
  if (OUTAGE_PATTERNS.some((p) => p.test(rawMessage))) {
    return transient("provider_outage", statusCode, message);
  }
  if (name === "AbortError" || name === "TimeoutError" || TIMEOUT_PATTERNS.some((p) => p.test(rawMessage))) {
    return transient("timeout", statusCode, message);
  }

  return fatal("unknown", statusCode, message);
}
