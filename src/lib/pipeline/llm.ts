/**
 * Review Pipeline - LLM Provider Selection
 *
 * Builds AI SDK model handles for a (provider, model) pair.
 *
 * @module pipeline/llm
 */

import { openai } from "@ai-sdk/openai";
import { anthropic } from "@ai-sdk/anthropic";
import { google } from "@ai-sdk/google";
import { mistral } from "@ai-sdk/mistral";
import type { ProviderId } from "../config-schemas";

// ============================================================================
// MODEL SELECTION
// ============================================================================

export interface ModelInfo {
  provider: ProviderId;
  modelName: string;
  model: ReturnType<typeof openai> | ReturnType<typeof anthropic> | ReturnType<typeof google> | ReturnType<typeof mistral>;
}

export function normalizeProvider(raw: string): ProviderId {
  const p = (raw || "").toLowerCase().trim();
  if (p === "anthropic" || p === "claude") return "anthropic";
  if (p === "google" || p === "gemini") return "google";
  if (p === "mistral") return "mistral";
  return "openai";
}

export function detectProviderFromModelName(modelName: string): ProviderId | null {
  const name = (modelName || "").toLowerCase();
  if (name.includes("claude")) return "anthropic";
  if (name.includes("gemini")) return "google";
  if (name.includes("mistral")) return "mistral";
  if (name.includes("gpt") || /^o\d/.test(name)) return "openai";
  return null;
}

export function buildModelInfo(provider: ProviderId, modelName: string): ModelInfo {
  const detected = detectProviderFromModelName(modelName);
  if (detected && detected !== provider) {
    console.warn(`[LLM] Model "${modelName}" looks like a ${detected} model but provider is ${provider}`);
  }
  if (provider === "anthropic") {
    return { provider, modelName, model: anthropic(modelName) };
  }
  if (provider === "google") {
    return { provider, modelName, model: google(modelName) };
  }
  if (provider === "mistral") {
    return { provider, modelName, model: mistral(modelName) };
  }
  return { provider: "openai", modelName, model: openai(modelName) };
}
