/**
 * Debug logging utilities for the review pipeline
 *
 * File-based and console logging for pipeline runs, plus structured event
 * lines and redaction of secrets and case identifiers.
 * Configured via environment variables.
 *
 * @module pipeline/debug
 */

import * as fs from "fs";
import * as path from "path";

// ============================================================================
// CONFIGURATION
// ============================================================================

const DEBUG_LOG_PATH = process.env.SRE_DEBUG_LOG_PATH || path.resolve(process.cwd(), "debug-pipeline.log");

const DEBUG_LOG_FILE_ENABLED = (process.env.SRE_DEBUG_LOG_FILE ?? "false").toLowerCase() === "true";

const DEBUG_LOG_MAX_DATA_CHARS = 8000;

export const MAX_LOG_MESSAGE_CHARS = 1200;

// ============================================================================
// REDACTION
// ============================================================================

const REDACTION_RULES: Array<{ pattern: RegExp; replacement: string }> = [
  { pattern: /\bsk-ant-[A-Za-z0-9_-]{8,}\b/g, replacement: "[REDACTED_API_KEY]" },
  { pattern: /\bsk-[A-Za-z0-9_-]{8,}\b/g, replacement: "[REDACTED_API_KEY]" },
  { pattern: /\bAIza[0-9A-Za-z_-]{20,}\b/g, replacement: "[REDACTED_API_KEY]" },
  { pattern: /\bBearer\s+[A-Za-z0-9._~+/=-]{8,}/gi, replacement: "Bearer [REDACTED]" },
  {
    pattern: /\b(api[_-]?key|token|secret|password)\s*[:=]\s*["']?[^\s"',;]+/gi,
    replacement: "$1=[REDACTED]",
  },
  // Unified case numbering NNNNNNN-DD.AAAA.J.TR.OOOO
  { pattern: /\b\d{7}-\d{2}\.\d{4}\.\d\.\d{2}\.\d{4}\b/g, replacement: "[REDACTED_CASE_NUMBER]" },
];

/** Mask API keys, bearer tokens, `key=value` secrets and case numbers. */
export function redactSensitive(text: string): string {
  let result = text;
  for (const rule of REDACTION_RULES) {
    result = result.replace(rule.pattern, rule.replacement);
  }
  return result;
}

/** Redact, then cap the message length. */
export function sanitizeLogMessage(text: string, maxChars: number = MAX_LOG_MESSAGE_CHARS): string {
  const redacted = redactSensitive(text);
  if (redacted.length <= maxChars) return redacted;
  return `${redacted.slice(0, maxChars)}…[truncated ${redacted.length - maxChars} chars]`;
}

// ============================================================================
// DEBUG LOGGING FUNCTIONS
// ============================================================================

function appendToFile(line: string): void {
  if (!DEBUG_LOG_FILE_ENABLED) return;
  fs.promises.appendFile(DEBUG_LOG_PATH, line).catch((err: unknown) => {
    console.warn(`[Debug] Could not write ${DEBUG_LOG_PATH}: ${err instanceof Error ? err.message : String(err)}`);
  });
}

/**
 * Log a message to the debug file and console
 */
export function debugLog(message: string, data?: unknown): void {
  const timestamp = new Date().toISOString();
  let logLine = `[${timestamp}] ${redactSensitive(message)}`;

  if (data !== undefined) {
    let payload: string;
    try {
      payload = typeof data === "string" ? data : JSON.stringify(data, null, 2);
    } catch {
      payload = "[unserializable]";
    }
    payload = redactSensitive(payload);
    if (payload.length > DEBUG_LOG_MAX_DATA_CHARS) {
      payload = payload.slice(0, DEBUG_LOG_MAX_DATA_CHARS) + "…[truncated]";
    }
    logLine += ` | ${payload}`;
  }
  logLine += "\n";

  appendToFile(logLine);
  console.log(logLine.trim());
}

export type PipelineEventFields = {
  runId: string;
  stage: string | null;
  [key: string]: string | number | boolean | null | string[];
};

/** Build the structured event payload (one JSON object per pipeline event). */
export function buildLogEvent(event: string, fields: PipelineEventFields): Record<string, unknown> {
  return { event, timestamp: new Date().toISOString(), ...fields };
}

/** Emit one structured JSON line carrying runId and stage. */
export function logEvent(event: string, fields: PipelineEventFields): void {
  const line = sanitizeLogMessage(JSON.stringify(buildLogEvent(event, fields)), DEBUG_LOG_MAX_DATA_CHARS);
  appendToFile(line + "\n");
  console.log(`[Pipeline-Event] ${line}`);
}
