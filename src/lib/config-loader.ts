/**
 * Configuration Loader
 *
 * Resolves the engine config as defaults ← SRE_* environment overrides ←
 * explicit overrides. Every environment override is applied tentatively and
 * only kept when the config still validates.
 *
 * @module config-loader
 */

import {
  DEFAULT_ENGINE_CONFIG,
  EngineConfigSchema,
  type EngineConfig,
} from "./config-schemas";
import { ConfigurationError } from "./pipeline/errors";
import { normalizeProvider } from "./pipeline/llm";

export type { EngineConfig } from "./config-schemas";
export { DEFAULT_ENGINE_CONFIG } from "./config-schemas";

// ============================================================================
// TYPES
// ============================================================================

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends readonly unknown[]
    ? T[K]
    : T[K] extends object | null
      ? DeepPartial<NonNullable<T[K]>> | Extract<T[K], null>
      : T[K];
};

export interface OverrideRecord {
  envVar: string;
  fieldPath: string;
  appliedValue: string | number | boolean | null;
}

export interface ResolvedEngineConfig {
  config: EngineConfig;
  overrides: OverrideRecord[];
  skippedOverrides: string[];
}

type Env = Record<string, string | undefined>;

// ============================================================================
// ENVIRONMENT VARIABLE OVERRIDE MAPPING
// ============================================================================

const int = (v: string) => parseInt(v, 10);
const float = (v: string) => parseFloat(v);
const bool = (v: string) => v.toLowerCase() === "true";
const list = (v: string) => v.split(",").map((s) => s.trim()).filter(Boolean);

const ENGINE_ENV_MAP: Record<string, { fieldPath: string; parser: (v: string) => unknown }> = {
  SRE_PROFILE: { fieldPath: "profile", parser: (v) => v },
  SRE_LLM_PROVIDER: { fieldPath: "routing.provider", parser: normalizeProvider },
  SRE_LLM_HYBRID: { fieldPath: "routing.hybrid", parser: bool },
  SRE_MODEL_ROUTINE: { fieldPath: "routing.routineModel", parser: (v) => v },
  SRE_MODEL_CRITICAL: { fieldPath: "routing.criticalModel", parser: (v) => v },
  SRE_CONTEXT_WINDOW_TOKENS: { fieldPath: "budget.contextWindowTokens", parser: int },
  SRE_TOKEN_BUDGET_RATIO: { fieldPath: "budget.budgetRatio", parser: float },
  SRE_CHUNK_OVERLAP_TOKENS: { fieldPath: "budget.overlapTokens", parser: int },
  SRE_MIN_COVERAGE_RATIO: { fieldPath: "budget.minCoverageRatio", parser: float },
  SRE_MAX_RUN_TOKENS: { fieldPath: "budget.maxRunTokens", parser: int },
  SRE_TOKENS_PER_MINUTE: { fieldPath: "budget.tokensPerMinute", parser: int },
  SRE_LLM_MAX_ATTEMPTS: { fieldPath: "client.maxAttempts", parser: int },
  SRE_LLM_TIMEOUT_MS: { fieldPath: "client.callTimeoutMs", parser: int },
  SRE_LLM_TEMPERATURE: { fieldPath: "client.temperature", parser: float },
  SRE_MIN_QUALITY_SCORE: { fieldPath: "gates.minQualityScore", parser: float },
  SRE_MAX_NOISE_RATIO: { fieldPath: "gates.maxNoiseRatio", parser: float },
  SRE_MIN_SUPPORTING_DOCUMENTS: { fieldPath: "gates.minSupportingDocuments", parser: int },
  SRE_CLASSIFICATION_CONFIDENCE: { fieldPath: "gates.classificationConfidence", parser: float },
  SRE_CRITICAL_FIELDS_STAGE1: { fieldPath: "gates.criticalFields.stage1", parser: list },
  SRE_CONFIDENCE_GLOBAL: { fieldPath: "confidence.globalThreshold", parser: float },
  SRE_CONFIDENCE_FIELD: { fieldPath: "confidence.fieldThreshold", parser: float },
  SRE_CONFIDENCE_THEME: { fieldPath: "confidence.themeThreshold", parser: float },
  SRE_BLOCK_ON_ESCALATION: { fieldPath: "confidence.blockOnEscalation", parser: bool },
  SRE_CONSENSUS_ENABLED: { fieldPath: "consensus.enabled", parser: bool },
  SRE_STAGE2_WORKERS: { fieldPath: "concurrency.stage2Workers", parser: int },
  SRE_STAGE_TIMEOUT_MS: { fieldPath: "timeouts.stageTimeoutMs", parser: int },
  SRE_RUN_TIMEOUT_MS: { fieldPath: "timeouts.runTimeoutMs", parser: int },
  SRE_CACHE_ENABLED: { fieldPath: "cache.enabled", parser: bool },
  SRE_CACHE_PATH: { fieldPath: "cache.dbPath", parser: (v) => v },
  SRE_CACHE_TTL_HOURS: { fieldPath: "cache.ttlHours", parser: float },
  SRE_CHECKPOINT_DIR: { fieldPath: "storage.checkpointDir", parser: (v) => v },
  SRE_DEAD_LETTER_DIR: { fieldPath: "storage.deadLetterDir", parser: (v) => v },
  SRE_PROMPT_DIR: { fieldPath: "instructions.dir", parser: (v) => v },
};

// ============================================================================
// OVERRIDE RESOLUTION
// ============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function cloneConfig(config: EngineConfig): Record<string, unknown> {
  const clone: unknown = JSON.parse(JSON.stringify(config));
  if (!isPlainObject(clone)) {
    throw new ConfigurationError("Config must be an object");
  }
  return clone;
}

function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  let current = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const next = current[parts[i]];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[parts[i]] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

function deepMerge(base: Record<string, unknown>, patch: Record<string, unknown>): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(patch)) {
    if (value === undefined) continue;
    const current = merged[key];
    merged[key] = isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value;
  }
  return merged;
}

function getOverridePolicy(env: Env): string {
  return env.SRE_CONFIG_ENV_OVERRIDES || "on";
}

function applyEnvOverrides(base: EngineConfig, env: Env): ResolvedEngineConfig {
  const policy = getOverridePolicy(env);
  const overrides: OverrideRecord[] = [];
  const skippedOverrides: string[] = [];

  if (policy === "off") {
    return { config: base, overrides, skippedOverrides };
  }

  let allowlist: Set<string> | null = null;
  if (policy.startsWith("allowlist:")) {
    allowlist = new Set(policy.slice("allowlist:".length).split(",").map((s) => s.trim()));
  }

  let result = base;

  for (const [envVar, mapping] of Object.entries(ENGINE_ENV_MAP)) {
    if (allowlist && !allowlist.has(envVar)) continue;

    const envValue = env[envVar];
    if (envValue === undefined || envValue === "") continue;

    const parsed = mapping.parser(envValue);
    const tentative = cloneConfig(result);
    setNestedValue(tentative, mapping.fieldPath, parsed);

    const validation = EngineConfigSchema.safeParse(tentative);
    if (!validation.success) {
      const issue = validation.error.issues[0]?.message ?? "invalid value";
      console.warn(`[Config-Loader] Skipping invalid override ${envVar}=${envValue}: ${issue}`);
      skippedOverrides.push(`${envVar} (invalid: ${issue})`);
      continue;
    }

    result = validation.data;
    overrides.push({
      envVar,
      fieldPath: mapping.fieldPath,
      appliedValue:
        typeof parsed === "string" || typeof parsed === "number" || typeof parsed === "boolean"
          ? parsed
          : null,
    });
  }

  return { config: result, overrides, skippedOverrides };
}

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Resolve the engine configuration.
 *
 * Explicit overrides win over environment variables; the merged result must
 * satisfy `EngineConfigSchema` or a ConfigurationError is thrown.
 */
export function loadEngineConfig(
  options: { env?: Env; overrides?: DeepPartial<EngineConfig> } = {},
): ResolvedEngineConfig {
  const env = options.env ?? process.env;
  const fromEnv = applyEnvOverrides(DEFAULT_ENGINE_CONFIG, env);

  if (!options.overrides) {
    return fromEnv;
  }

  const merged = deepMerge(cloneConfig(fromEnv.config), toRecord(options.overrides));
  const parsed = EngineConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigurationError(`Invalid engine configuration: ${details}`);
  }

  return { ...fromEnv, config: parsed.data };
}

function toRecord(value: object): Record<string, unknown> {
  const record: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    record[key] = isPlainObject(entry) ? toRecord(entry) : entry;
  }
  return record;
}
