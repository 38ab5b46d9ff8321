/**
 * Model Invocation Client
 *
 * Uniform call into any configured provider through the AI SDK. Applies a
 * per-call timeout, exponential backoff on transient errors, and treats a
 * non-"stop" finish reason as truncation: the follow-up asks for more output
 * tokens instead of repeating the identical request.
 *
 * Transient and truncation failures never leave this module unless the
 * attempt budget runs out; then they surface as GATE_FAILURE (a partial
 * result exists) or FATAL (nothing usable came back).
 *
 * @module pipeline/model-client
 */

import { generateText } from "ai";
import type { ClientConfig, ProviderId } from "../config-schemas";
import { classifyModelError } from "../error-classification";
import { recordProviderFailure, recordProviderSuccess } from "../provider-health";
import { sanitizeLogMessage } from "./debug";
import { ModelInvocationError, RunAbortedError, StageTimeoutError } from "./errors";
import { buildModelInfo } from "./llm";
import { defaultSleep, type TokenRateLimiter } from "./rate-limiter";
import { estimateTokens } from "./token-budget";
import type { ModelAttempt, TokenUsage } from "./types";

// ============================================================================
// TYPES
// ============================================================================

export interface ModelRequest {
  provider: ProviderId;
  modelId: string;
  system: string;
  payload: string;
  maxTokens: number;
  temperature: number;
}

export interface ProviderResponse {
  text: string;
  finishReason: string;
  usage: TokenUsage;
}

/** Narrow interface over whatever actually produces text. */
export interface ModelProvider {
  generate(request: ModelRequest, signal: AbortSignal): Promise<ProviderResponse>;
}

export interface InvokeOptions {
  signal?: AbortSignal;
  /** Epoch ms after which no further attempt or backoff starts. */
  deadline?: number;
  deadlineScope?: "stage" | "run";
  deadlineTimeoutMs?: number;
}

export interface InvokeResult {
  content: string;
  finishReason: string;
  usage: TokenUsage;
  attempts: ModelAttempt[];
  latencyMs: number;
}

export interface ModelClientOptions {
  config: ClientConfig;
  circuitThreshold?: number;
  rateLimiter?: TokenRateLimiter;
  /** Characters per token for the rate-limiter reservation. */
  charsPerToken?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export const COMPLETE_FINISH_REASON = "stop";

// ============================================================================
// AI SDK PROVIDER
// ============================================================================

/** Default provider: AI SDK `generateText` with SDK-level retries disabled. */
export class AiSdkProvider implements ModelProvider {
  async generate(request: ModelRequest, signal: AbortSignal): Promise<ProviderResponse> {
    const { model } = buildModelInfo(request.provider, request.modelId);
    const result = await generateText({
      model,
      system: request.system,
      messages: [{ role: "user", content: request.payload }],
      temperature: request.temperature,
      maxOutputTokens: request.maxTokens,
      abortSignal: signal,
      maxRetries: 0,
    });

    const promptTokens = result.usage.inputTokens ?? 0;
    const completionTokens = result.usage.outputTokens ?? 0;
    return {
      text: result.text,
      finishReason: result.finishReason,
      usage: {
        promptTokens,
        completionTokens,
        totalTokens: result.usage.totalTokens ?? promptTokens + completionTokens,
      },
    };
  }
}

// ============================================================================
// CLIENT
// ============================================================================

const ZERO_USAGE: TokenUsage = { promptTokens: 0, completionTokens: 0, totalTokens: 0 };

export class ModelClient {
  private readonly config: ClientConfig;
  private readonly circuitThreshold: number | undefined;
  private readonly rateLimiter: TokenRateLimiter | undefined;
  private readonly charsPerToken: number | undefined;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(
    private readonly provider: ModelProvider,
    options: ModelClientOptions,
  ) {
    this.config = options.config;
    this.circuitThreshold = options.circuitThreshold;
    this.rateLimiter = options.rateLimiter;
    this.charsPerToken = options.charsPerToken;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  /** Next maxTokens after a truncated response. */
  growMaxTokens(current: number): number {
    const grown = current + Math.max(this.config.truncationGrowthMin, Math.floor(current / 2));
    return Math.min(this.config.maxOutputTokensCap, grown);
  }

  backoffMs(attempt: number): number {
    return Math.min(this.config.backoffMaxMs, this.config.backoffBaseMs * 2 ** (attempt - 1));
  }

  async invoke(request: ModelRequest, options: InvokeOptions = {}): Promise<InvokeResult> {
    const attempts: ModelAttempt[] = [];
    const startedAt = this.now();
    let maxTokens = Math.min(request.maxTokens, this.config.maxOutputTokensCap);
    let lastTruncated: ProviderResponse | null = null;
    let lastCategory = "unknown";

    for (let attempt = 1; attempt <= this.config.maxAttempts; attempt++) {
      this.checkBudget(options);

      if (this.rateLimiter) {
        await this.rateLimiter.acquire(estimateTokens(request.system + request.payload, this.charsPerToken) + maxTokens);
      }

      const callStarted = this.now();
      try {
        const response = await this.callWithTimeout({ ...request, maxTokens }, options.signal);
        const latencyMs = this.now() - callStarted;
        recordProviderSuccess(request.provider);

        const complete = response.finishReason === COMPLETE_FINISH_REASON;
        attempts.push({
          attempt,
          provider: request.provider,
          modelId: request.modelId,
          maxTokens,
          finishReason: response.finishReason,
          errorKind: complete ? null : "TRUNCATION",
          errorCategory: null,
          content: response.text,
          latencyMs,
          usage: response.usage,
        });

        if (complete) {
          return {
            content: response.text,
            finishReason: response.finishReason,
            usage: response.usage,
            attempts,
            latencyMs: this.now() - startedAt,
          };
        }

        lastTruncated = response;
        const next = this.growMaxTokens(maxTokens);
        console.warn(
          `[ModelClient] ${request.modelId} finished with "${response.finishReason}" at maxTokens=${maxTokens}; ` +
            `retrying with maxTokens=${next} (attempt ${attempt}/${this.config.maxAttempts})`,
        );
        maxTokens = next;
      } catch (error) {
        if (options.signal?.aborted) {
          throw new RunAbortedError();
        }

        const classified = classifyModelError(error);
        lastCategory = classified.category;
        attempts.push({
          attempt,
          provider: request.provider,
          modelId: request.modelId,
          maxTokens,
          finishReason: null,
          errorKind: classified.kind,
          errorCategory: classified.category,
          content: null,
          latencyMs: this.now() - callStarted,
          usage: ZERO_USAGE,
        });
        recordProviderFailure(request.provider, classified.message, this.circuitThreshold, this.now());

        if (!classified.retriable) {
          console.error(`[ModelClient] ${request.modelId} failed permanently (${classified.category}): ${classified.message}`);
          throw new ModelInvocationError(
            `Model call failed: ${classified.category}`,
            "FATAL",
            attempts,
            classified.category,
          );
        }

        if (attempt < this.config.maxAttempts) {
          const waitMs = this.backoffMs(attempt);
          console.warn(
            `[ModelClient] ${classified.category} from ${request.provider} (attempt ${attempt}/${this.config.maxAttempts}), ` +
              `backing off ${waitMs}ms`,
          );
          this.checkBudget(options, waitMs);
          await this.sleep(waitMs);
        }
      }
    }

    if (lastTruncated) {
      throw new ModelInvocationError(
        `Output still truncated after ${this.config.maxAttempts} attempts`,
        "GATE_FAILURE",
        attempts,
        "truncation",
        lastTruncated.text,
      );
    }
    throw new ModelInvocationError(
      `Retry budget of ${this.config.maxAttempts} attempts exhausted (${lastCategory})`,
      "FATAL",
      attempts,
      lastCategory,
    );
  }

  private checkBudget(options: InvokeOptions, upcomingMs = 0): void {
    if (options.signal?.aborted) throw new RunAbortedError();
    if (options.deadline !== undefined && this.now() + upcomingMs >= options.deadline) {
      throw new StageTimeoutError(options.deadlineScope ?? "stage", options.deadlineTimeoutMs ?? 0);
    }
  }

  private async callWithTimeout(request: ModelRequest, external?: AbortSignal): Promise<ProviderResponse> {
    const controller = new AbortController();
    const onAbort = () => controller.abort(external?.reason);
    external?.addEventListener("abort", onAbort, { once: true });
    const timer = setTimeout(() => {
      controller.abort(new Error(`Model call timed out after ${this.config.callTimeoutMs}ms`));
    }, this.config.callTimeoutMs);

    try {
      return await raceAbort(this.provider.generate(request, controller.signal), controller.signal);
    } finally {
      clearTimeout(timer);
      external?.removeEventListener("abort", onAbort);
    }
  }
}

/** Reject as soon as the signal aborts, even if the provider ignores it. */
function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(abortReason(signal));
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal));
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) {
    const error = new Error(sanitizeLogMessage(reason.message, 300));
    error.name = "TimeoutError";
    return error;
  }
  const error = new Error("Model call aborted");
  error.name = "AbortError";
  return error;
}
