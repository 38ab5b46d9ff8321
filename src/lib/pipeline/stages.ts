/**
 * Stage Execution
 *
 * One model task = cache lookup → budget reservation → invoke → validate →
 * cache store, on the route the orchestrator resolved for the stage attempt.
 * Malformed responses get `validationRetries` follow-ups carrying a stricter
 * instruction; only a validated response is ever cached.
 *
 * The stage runners fan a stage out over its chunks (and, for stage 2, over
 * its themes on the worker pool) and merge the parts into one tagged payload.
 *
 * @module pipeline/stages
 */

import type { z } from "zod";
import type { ClientConfig, EngineConfig, TieBreak } from "../config-schemas";
import { fingerprint, type CacheKeyParts, type ResponseCache } from "../response-cache";
import { recordModelCall, reserveTokens, type BudgetTracker, type RunBudget } from "./budgets";
import type { InstructionSet } from "./collaborators";
import { debugLog } from "./debug";
import { PayloadValidationError, ModelInvocationError } from "./errors";
import { cacheVersionOf } from "./instructions";
import type { InvokeOptions, ModelClient } from "./model-client";
import { estimateCostUsd, type ModelRoute } from "./model-router";
import { executeThemesInParallel, type ThemeOutcome } from "./parallel-themes";
import {
  buildStageRequest,
  buildValidationRetryNote,
  mergeFieldMaps,
  mergeStage1,
  mergeStage3,
  mergeThemeLists,
  parseModelResponse,
  payloadContext,
  Stage1ResponseSchema,
  Stage3ResponseSchema,
  ThemeListResponseSchema,
  ThemeResponseSchema,
  toFieldMap,
  unionCitations,
  type IdentifiedTheme,
  type StageRequestInput,
  type ThemeResponse,
} from "./payloads";
import { normalizeForMatch } from "./quality-gates";
import { chunkTexts } from "./token-budget";
import type {
  ChunkPlan,
  Escalation,
  FieldValue,
  ModelAttempt,
  Stage1Payload,
  Stage2Payload,
  Stage3Payload,
  ThemeResult,
  TokenUsage,
} from "./types";

// ============================================================================
// CALL LEDGER
// ============================================================================

/** Everything the calls of one stage attempt cost, including failed ones. */
export class CallLedger {
  readonly attempts: ModelAttempt[] = [];
  cacheHits = 0;
  costUsd = 0;
  latencyMs = 0;
  lastRaw: string | null = null;

  addAttempts(attempts: ModelAttempt[]): void {
    for (const attempt of attempts) {
      this.attempts.push(attempt);
      this.costUsd += estimateCostUsd(attempt.modelId, attempt.usage);
      this.latencyMs += attempt.latencyMs;
    }
  }

  get usage(): TokenUsage {
    const usage: TokenUsage = { promptTokens: 0, completionTokens: 0, totalTokens: 0 };
    for (const attempt of this.attempts) {
      usage.promptTokens += attempt.usage.promptTokens;
      usage.completionTokens += attempt.usage.completionTokens;
      usage.totalTokens += attempt.usage.totalTokens;
    }
    return usage;
  }

  get truncatedCalls(): number {
    return this.attempts.filter((a) => a.errorKind === "TRUNCATION").length;
  }

  /** Provider attempts beyond the first of each call. */
  get retryCount(): number {
    return this.attempts.filter((a) => a.attempt > 1).length;
  }
}

// ============================================================================
// MODEL TASKS
// ============================================================================

export interface ModelTask<S extends z.ZodTypeAny> {
  /** Resolved once per stage attempt; every task of the attempt shares it. */
  route: ModelRoute;
  /** Cache stage id; distinguishes sub-tasks (theme, chunk, consensus pass) of one stage. */
  cacheStageId: string;
  instructions: InstructionSet;
  request: Omit<StageRequestInput, "corrections">;
  corrections: string[];
  schema: S;
  maxTokens: number;
}

export interface ModelTaskRunnerDeps {
  client: ModelClient;
  cache: ResponseCache | null;
  clientConfig: ClientConfig;
  budget: RunBudget;
  tracker: BudgetTracker;
  charsPerToken: number;
}

export class ModelTaskRunner {
  constructor(private readonly deps: ModelTaskRunnerDeps) {}

  async run<S extends z.ZodTypeAny>(task: ModelTask<S>, ledger: CallLedger, options: InvokeOptions): Promise<z.infer<S>> {
    const { route } = task;
    let corrections = task.corrections;
    let lastError: PayloadValidationError | null = null;

    for (let pass = 0; pass <= this.deps.clientConfig.validationRetries; pass++) {
      const payload = buildStageRequest({ ...task.request, corrections });
      const key: CacheKeyParts = {
        fingerprint: fingerprint(payload),
        instructionVersion: cacheVersionOf(task.instructions),
        modelId: route.modelId,
        stageId: task.cacheStageId,
      };

      const cached = this.deps.cache ? await this.deps.cache.get(key) : null;
      if (cached) {
        try {
          const value = parseModelResponse(cached.payload, task.schema);
          ledger.cacheHits++;
          ledger.lastRaw = cached.payload;
          return value;
        } catch (err) {
          console.warn(`[Stages] Ignoring unparseable cache entry for ${task.cacheStageId}: ${String(err)}`);
        }
      }

      const estimate = Math.ceil((task.instructions.text.length + payload.length) / this.deps.charsPerToken) + task.maxTokens;
      reserveTokens(this.deps.tracker, this.deps.budget, estimate);

      let content: string;
      try {
        const result = await this.deps.client.invoke(
          {
            provider: route.provider,
            modelId: route.modelId,
            system: task.instructions.text,
            payload,
            maxTokens: task.maxTokens,
            temperature: this.deps.clientConfig.temperature,
          },
          options,
        );
        ledger.addAttempts(result.attempts);
        recordModelCall(this.deps.tracker, sumTokens(result.attempts));
        content = result.content;
      } catch (err) {
        if (err instanceof ModelInvocationError) {
          ledger.addAttempts(err.attempts);
          recordModelCall(this.deps.tracker, sumTokens(err.attempts));
          if (err.partialContent !== null) ledger.lastRaw = err.partialContent;
        }
        throw err;
      }

      ledger.lastRaw = content;
      try {
        const value = parseModelResponse(content, task.schema);
        if (this.deps.cache) await this.deps.cache.set(key, content);
        return value;
      } catch (err) {
        if (!(err instanceof PayloadValidationError)) throw err;
        lastError = err;
        console.warn(
          `[Stages] ${task.cacheStageId}: ${err.message} (validation pass ${pass + 1}/${this.deps.clientConfig.validationRetries + 1})`,
        );
        debugLog(`[Stages] ${task.cacheStageId} rejected response`, content);
        corrections = [...task.corrections, buildValidationRetryNote(err, route.provider)];
      }
    }

    throw lastError ?? new PayloadValidationError(`No valid response for ${task.cacheStageId}`, []);
  }
}

function sumTokens(attempts: ModelAttempt[]): number {
  return attempts.reduce((sum, a) => sum + a.usage.totalTokens, 0);
}

// ============================================================================
// STAGE CONTEXT
// ============================================================================

export interface StageContext {
  runner: ModelTaskRunner;
  route: ModelRoute;
  ledger: CallLedger;
  instructions: InstructionSet;
  config: EngineConfig;
  invokeOptions: InvokeOptions;
  /** Gate feedback from the previous attempt of this stage. */
  corrections: string[];
}

export interface StageInput {
  documentLabel: string;
  text: string;
  plan: ChunkPlan;
  context?: unknown;
}

function chunkRequests(input: StageInput, task: string, context?: unknown): Array<Omit<StageRequestInput, "corrections">> {
  const texts = chunkTexts(input.text, input.plan);
  return input.plan.chunks.map((chunk, i) => ({
    task,
    context,
    documentLabel: input.documentLabel,
    chunkIndex: chunk.index,
    chunkCount: input.plan.chunks.length,
    sections: chunk.sections,
    text: texts[i],
  }));
}

// ============================================================================
// STAGE 1
// ============================================================================

export interface Stage1Outcome {
  payload: Stage1Payload;
  /** Disagreements between consensus passes that the tie-break left for review. */
  escalations: Escalation[];
}

export async function runStage1(ctx: StageContext, input: StageInput): Promise<Stage1Outcome> {
  const first = await runStage1Pass(ctx, input, "stage1", "stage1");
  if (!ctx.config.consensus.enabled) return { payload: first, escalations: [] };

  const second = await runStage1Pass(ctx, input, "stage1:consensus", "stage1 (independent second pass)");
  return resolveConsensus(first, second, ctx.config.gates.criticalFields.stage1, ctx.config.consensus.tieBreak);
}

async function runStage1Pass(ctx: StageContext, input: StageInput, cacheStageId: string, task: string): Promise<Stage1Payload> {
  const responses = [];
  for (const request of chunkRequests(input, task, input.context)) {
    responses.push(
      await ctx.runner.run(
        {
          route: ctx.route,
          cacheStageId: `${cacheStageId}:chunk:${request.chunkIndex}`,
          instructions: ctx.instructions,
          request,
          corrections: ctx.corrections,
          schema: Stage1ResponseSchema,
          maxTokens: ctx.config.outputTokens.stage1,
        },
        ctx.ledger,
        ctx.invokeOptions,
      ),
    );
  }
  return mergeStage1(responses);
}

/**
 * Compare critical fields of two independent passes. Agreement keeps the
 * more confident value. Disagreement either takes the more confident value
 * or keeps the first pass and escalates the field, per `tieBreak`.
 */
export function resolveConsensus(
  first: Stage1Payload,
  second: Stage1Payload,
  criticalFields: string[],
  tieBreak: TieBreak,
): Stage1Outcome {
  const fields: Record<string, FieldValue> = { ...first.fields };
  const escalations: Escalation[] = [];

  for (const name of criticalFields) {
    const a = first.fields[name];
    const b = second.fields[name];
    if (!a || !b) {
      if (!a && b) fields[name] = b;
      continue;
    }

    const agree = normalizeForMatch(a.content) === normalizeForMatch(b.content);
    if (agree || tieBreak === "prefer_higher_confidence") {
      fields[name] = b.confidence > a.confidence ? b : a;
      if (!agree) console.warn(`[Consensus] "${name}" disagrees between passes; kept the more confident value`);
      continue;
    }

    escalations.push({
      stage: "stage1",
      target: name,
      confidence: Math.min(a.confidence, b.confidence),
      threshold: 1,
      reason: `Consensus passes disagree on "${name}"`,
    });
  }

  return {
    payload: { stage: "stage1", fields, inconclusive: first.inconclusive && second.inconclusive },
    escalations,
  };
}

// ============================================================================
// STAGE 2
// ============================================================================

const ESCALATED_THEME_ERRORS = [PayloadValidationError];

function isThemeLevelFailure(error: unknown): boolean {
  if (error instanceof ModelInvocationError) return error.kind === "GATE_FAILURE";
  return ESCALATED_THEME_ERRORS.some((type) => error instanceof type);
}

export async function runStage2(ctx: StageContext, input: StageInput): Promise<Stage2Payload> {
  const lists = [];
  for (const request of chunkRequests(input, "stage2:identify_themes", input.context)) {
    const response = await ctx.runner.run(
      {
        route: ctx.route,
        cacheStageId: `stage2:themes:chunk:${request.chunkIndex}`,
        instructions: ctx.instructions,
        request,
        corrections: ctx.corrections,
        schema: ThemeListResponseSchema,
        maxTokens: ctx.config.outputTokens.stage2,
      },
      ctx.ledger,
      ctx.invokeOptions,
    );
    lists.push({ chunkIndex: request.chunkIndex, response });
  }

  const themes = mergeThemeLists(lists);
  console.log(`[Stage2] ${themes.length} theme(s) identified across ${input.plan.chunks.length} segment(s)`);

  const texts = chunkTexts(input.text, input.plan);
  const outcomes = await executeThemesInParallel(
    themes.map((theme) => ({
      id: theme.id,
      execute: (signal: AbortSignal) => analyzeTheme(ctx, input, texts, theme, signal),
    })),
    {
      maxConcurrency: ctx.config.concurrency.stage2Workers,
      workerTimeoutMs: ctx.config.concurrency.workerTimeoutMs,
      signal: ctx.invokeOptions.signal,
    },
  );

  return { stage: "stage2", themes: collectThemes(themes, outcomes) };
}

async function analyzeTheme(
  ctx: StageContext,
  input: StageInput,
  texts: string[],
  theme: IdentifiedTheme,
  signal: AbortSignal,
): Promise<ThemeResult> {
  const responses: ThemeResponse[] = [];
  for (const chunkIndex of theme.chunkIndexes) {
    const chunk = input.plan.chunks[chunkIndex];
    responses.push(
      await ctx.runner.run(
        {
          route: ctx.route,
          cacheStageId: `stage2:theme:${theme.id}:chunk:${chunkIndex}`,
          instructions: ctx.instructions,
          request: {
            task: "stage2:analyze_theme",
            context: { upstream: input.context, theme: { id: theme.id, title: theme.title } },
            documentLabel: input.documentLabel,
            chunkIndex,
            chunkCount: input.plan.chunks.length,
            sections: chunk.sections,
            text: texts[chunkIndex],
          },
          corrections: ctx.corrections,
          schema: ThemeResponseSchema,
          maxTokens: ctx.config.outputTokens.stage2,
        },
        ctx.ledger,
        { ...ctx.invokeOptions, signal },
      ),
    );
  }

  return {
    title: theme.title,
    status: "complete",
    fields: mergeFieldMaps(responses.map((r) => toFieldMap(r.fields))),
    citations: unionCitations(responses.map((r) => r.citations)),
    confidence: responses.reduce((max, r) => Math.max(max, r.confidence), 0),
  };
}

/**
 * Completed themes are kept; timed-out or unusable ones are marked
 * escalated. Any other failure (fatal provider error, abort, timeout of the
 * stage, budget) is rethrown once every worker has settled.
 */
export function collectThemes(
  themes: IdentifiedTheme[],
  outcomes: Map<string, ThemeOutcome<ThemeResult>>,
): Record<string, ThemeResult> {
  const result: Record<string, ThemeResult> = {};
  let fatal: unknown = null;

  for (const theme of themes) {
    const outcome = outcomes.get(theme.id);
    if (outcome?.status === "fulfilled") {
      result[theme.id] = outcome.value;
      continue;
    }
    if (outcome?.status === "rejected" && !isThemeLevelFailure(outcome.error)) {
      fatal ??= outcome.error;
    }
    result[theme.id] = { title: theme.title, status: "escalated", fields: {}, citations: [], confidence: 0 };
  }

  if (fatal !== null) throw fatal;
  return result;
}

// ============================================================================
// STAGE 3
// ============================================================================

export async function runStage3(ctx: StageContext, input: StageInput): Promise<Stage3Payload> {
  const responses = [];
  for (const request of chunkRequests(input, "stage3", input.context)) {
    responses.push(
      await ctx.runner.run(
        {
          route: ctx.route,
          cacheStageId: `stage3:chunk:${request.chunkIndex}`,
          instructions: ctx.instructions,
          request,
          corrections: ctx.corrections,
          schema: Stage3ResponseSchema,
          maxTokens: ctx.config.outputTokens.stage3,
        },
        ctx.ledger,
        ctx.invokeOptions,
      ),
    );
  }
  return mergeStage3(responses);
}

/** Context handed to stage 3: what stages 1 and 2 concluded. */
export function stage3Context(stage1: Stage1Payload, stage2: Stage2Payload): Record<string, unknown> {
  const themes: Record<string, unknown> = {};
  for (const id of Object.keys(stage2.themes).sort()) {
    const theme = stage2.themes[id];
    themes[id] = {
      title: theme.title,
      status: theme.status,
      citations: theme.citations,
      fields: payloadContext("stage2", theme.fields),
    };
  }
  return { stage1: payloadContext("stage1", stage1.fields), stage2: themes };
}
