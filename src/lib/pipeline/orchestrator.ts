/**
 * Pipeline Orchestrator
 *
 * Drives one run through CLASSIFYING → STAGE1 → STAGE2 → STAGE3 → FINALIZED.
 * Every transition is checkpointed before the next step starts. Any gate
 * that does not pass halts the run as BLOCKED (fail-closed); a fatal error
 * writes a dead-letter record and ends the run as DEAD_LETTERED.
 *
 * Resume loads the checkpoint and re-enters at the first step whose result
 * is missing or not PASS, so completed stages are never invoked again.
 *
 * @module pipeline/orchestrator
 */

import crypto from "crypto";
import type { EngineConfig } from "../config-schemas";
import type { CheckpointStore } from "../checkpoint-store";
import type { DeadLetterQueue } from "../dead-letter-queue";
import type { ResponseCache } from "../response-cache";
import { allowProbeAfterCooldown } from "../provider-health";
import { clearAbortSignal, linkAbortSignals, registerRun } from "../run-abort";
import {
  createBudgetTracker,
  getBudgetStats,
  getRunBudget,
  TokenBudgetExceededError,
  type BudgetTracker,
  type RunBudget,
} from "./budgets";
import {
  classifyDocument,
  HeuristicClassificationStrategy,
  ModelClassificationStrategy,
  type ClassificationStrategy,
} from "./classification";
import type { DocumentExtractor, InstructionSet, InstructionSource, ReferenceTaxonomy } from "./collaborators";
import { computeGlobalConfidence, globalEscalation } from "./confidence";
import { logEvent } from "./debug";
import {
  errorMessage,
  ModelInvocationError,
  PayloadValidationError,
  RunAbortedError,
  StageTimeoutError,
  toFriendlyError,
} from "./errors";
import { computePromptSignature } from "./instructions";
import { ModelClient, type InvokeOptions, type ModelProvider } from "./model-client";
import { routeModel, type ModelRoute } from "./model-router";
import { ClassificationResponseSchema, payloadContext, type ClassificationResponse } from "./payloads";
import {
  combineVerdicts,
  documentQuality,
  evaluateClassificationGate,
  evaluateCoverageGate,
  evaluateExtractionGate,
  evaluateStageGate,
  type StageSources,
} from "./quality-gates";
import { TokenRateLimiter } from "./rate-limiter";
import {
  CallLedger,
  ModelTaskRunner,
  runStage1,
  runStage2,
  runStage3,
  stage3Context,
  type StageContext,
  type StageInput,
} from "./stages";
import { estimateTokens, planChunks, stageTokenCeiling } from "./token-budget";
import {
  emptyUsage,
  INSTRUCTION_STAGE_IDS,
  latestResult,
  STAGE_CURSOR,
  STAGE_IDS,
  STAGE_STATUS,
  STAGE_UPSTREAM,
  type BlockRecord,
  type Escalation,
  type GateFailure,
  type GateName,
  type GateReport,
  type GateVerdict,
  type InputDocument,
  type InstructionStageId,
  type ModelAttempt,
  type PipelineState,
  type PipelineStatus,
  type StageId,
  type StagePayload,
  type StageResult,
  type Stage2Payload,
  type Transition,
} from "./types";

// ============================================================================
// TYPES
// ============================================================================

export type ExitCode = 0 | 1 | 2;

export const EXIT_CODES: Record<"FINALIZED" | "BLOCKED" | "DEAD_LETTERED", ExitCode> = {
  FINALIZED: 0,
  BLOCKED: 1,
  DEAD_LETTERED: 2,
};

export type TransitionHook = (transition: Transition, state: PipelineState) => void | Promise<void>;

export interface OrchestratorDeps {
  config: EngineConfig;
  provider: ModelProvider;
  extractor: DocumentExtractor;
  instructions: InstructionSource;
  taxonomy: ReferenceTaxonomy;
  checkpoints: CheckpointStore;
  deadLetters: DeadLetterQueue;
  cache: ResponseCache | null;
  /** Classification chain; defaults to heuristic then model. */
  strategies?: ClassificationStrategy[];
  /** Called after each transition's checkpoint is on disk. */
  onTransition?: TransitionHook;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export interface RunOptions {
  runId?: string;
  signal?: AbortSignal;
}

export interface DeadLetterInfo {
  file: string;
  kind: string;
  category: string;
  message: string;
}

export interface RunOutcome {
  runId: string;
  status: PipelineStatus;
  exitCode: ExitCode;
  block: BlockRecord | null;
  deadLetter: DeadLetterInfo | null;
  globalConfidence: number | null;
  escalations: Escalation[];
  state: PipelineState;
}

interface RunContext {
  state: PipelineState;
  signal: AbortSignal;
  runDeadline: number;
  stageDeadline: number;
  budget: RunBudget;
  tracker: BudgetTracker;
  runner: ModelTaskRunner;
  /** Calls of the step in progress; becomes the retry history of a dead letter. */
  ledger: CallLedger;
  deadLetter: DeadLetterInfo | null;
}

// ============================================================================
// ORCHESTRATOR
// ============================================================================

export class PipelineOrchestrator {
  private readonly config: EngineConfig;
  private readonly client: ModelClient;
  private readonly now: () => number;

  constructor(private readonly deps: OrchestratorDeps) {
    this.config = deps.config;
    this.now = deps.now ?? Date.now;
    this.client = new ModelClient(deps.provider, {
      config: deps.config.client,
      circuitThreshold: deps.config.routing.circuitThreshold,
      rateLimiter: new TokenRateLimiter({
        tokensPerMinute: deps.config.budget.tokensPerMinute,
        now: this.now,
        sleep: deps.sleep,
      }),
      charsPerToken: deps.config.budget.charsPerToken,
      sleep: deps.sleep,
      now: this.now,
    });
  }

  /** Start a new run over the given documents. */
  async run(documents: InputDocument[], options: RunOptions = {}): Promise<RunOutcome> {
    const runId = options.runId ?? newRunId(this.now());
    const sets = await this.loadAllInstructions();
    const at = this.timestamp();

    const state: PipelineState = {
      schemaVersion: 1,
      runId,
      status: "CLASSIFYING",
      stageCursor: 0,
      documents: documents.map((doc) => ({ ...doc })),
      gates: { extraction: null, classification: null },
      chunkPlans: {},
      stageResults: { stage1: [], stage2: [], stage3: [] },
      usage: emptyUsage(),
      alerts: [],
      escalations: [],
      promptSignature: computePromptSignature(this.config.profile, sets),
      globalConfidence: null,
      block: null,
      transitions: [],
      createdAt: at,
      updatedAt: at,
    };

    console.log(
      `[Orchestrator] Run ${runId} started with ${documents.length} document(s), ` +
        `instructions ${state.promptSignature.version} (${state.promptSignature.hash.slice(0, 12)})`,
    );
    this.deps.checkpoints.save(state);
    logEvent("run_started", { runId, stage: null, documents: documents.length });

    return this.execute(state, "CLASSIFYING", options.signal);
  }

  /** Continue a run from its checkpoint. */
  async resume(state: PipelineState, options: Pick<RunOptions, "signal"> = {}): Promise<RunOutcome> {
    if (state.status === "DEAD_LETTERED" || state.status === "FINALIZED") {
      console.log(`[Orchestrator] Run ${state.runId} is ${state.status}; nothing to resume`);
      return this.outcome(state, null);
    }

    const sets = await this.loadAllInstructions();
    const current = computePromptSignature(this.config.profile, sets);
    if (current.hash !== state.promptSignature.hash) {
      state.alerts.push(
        `Instructions changed since the run started (${state.promptSignature.hash.slice(0, 12)} → ${current.hash.slice(0, 12)})`,
      );
    }

    const entry = resumeEntry(state);
    console.log(`[Orchestrator] Resuming ${state.runId} from ${state.status} at ${entry}`);
    logEvent("run_resumed", { runId: state.runId, stage: null, from: state.status, entry });
    return this.execute(state, entry, options.signal);
  }

  // ==========================================================================
  // EXECUTION
  // ==========================================================================

  private async execute(state: PipelineState, entry: PipelineStatus, external?: AbortSignal): Promise<RunOutcome> {
    const linked = linkAbortSignals(registerRun(state.runId), external);
    const startedAt = this.now();
    const budget = getRunBudget(this.config.budget);
    const tracker = createBudgetTracker(state.usage.totalTokens, state.usage.modelCalls);
    const ctx: RunContext = {
      state,
      signal: linked.signal,
      runDeadline: startedAt + this.config.timeouts.runTimeoutMs,
      stageDeadline: startedAt + this.config.timeouts.runTimeoutMs,
      budget,
      tracker,
      runner: new ModelTaskRunner({
        client: this.client,
        cache: this.deps.cache,
        clientConfig: this.config.client,
        budget,
        tracker,
        charsPerToken: this.config.budget.charsPerToken,
      }),
      ledger: new CallLedger(),
      deadLetter: null,
    };
    let stage: StageId | null = null;

    try {
      const entryStage = STAGE_IDS.find((id) => STAGE_STATUS[id] === entry) ?? null;
      if (entry !== state.status && entry !== "FINALIZED") {
        state.block = null;
        await this.transition(ctx, entry, entryStage, 0);
      }

      if (entry === "CLASSIFYING") {
        if (!(await this.prepare(ctx))) return this.outcome(state, null);
      }

      const first = entryStage === null ? (entry === "CLASSIFYING" ? 0 : STAGE_IDS.length) : STAGE_IDS.indexOf(entryStage);
      for (const id of STAGE_IDS.slice(first)) {
        stage = id;
        if (!(await this.runStage(ctx, id))) return this.outcome(state, null);
      }
      stage = null;

      await this.finalize(ctx);
    } catch (err) {
      await this.handleError(ctx, err, stage);
    } finally {
      linked.dispose();
      clearAbortSignal(state.runId);
    }

    return this.outcome(state, ctx.deadLetter);
  }

  private async prepare(ctx: RunContext): Promise<boolean> {
    const { state } = ctx;
    const gates = this.config.gates;

    for (const doc of state.documents) {
      this.checkLive(ctx, "run");
      if (doc.extractedText === null) {
        const extracted = await this.deps.extractor.extract(doc);
        doc.extractedText = extracted.text;
        doc.pageQuality = extracted.pageQuality;
        doc.pageCount = extracted.pageCount;
      }
      if (doc.qualityScore === null || doc.noiseRatio === null) {
        const quality = documentQuality(doc.pageQuality, gates.pageNoiseFloor);
        doc.qualityScore = quality.qualityScore;
        doc.noiseRatio = quality.noiseRatio;
      }
    }

    const extraction = evaluateExtractionGate(state.documents, gates);
    state.gates.extraction = extraction;
    this.logGate(state, "extraction", null, extraction);
    if (extraction.verdict !== "PASS") {
      await this.block(ctx, "extraction", null, extraction.failures.map((f) => f.reason));
      return false;
    }
    this.save(state);

    await this.classifyDocuments(ctx);

    const classification = evaluateClassificationGate(state.documents, gates);
    state.gates.classification = classification;
    this.logGate(state, "classification", null, classification);
    if (classification.verdict !== "PASS") {
      await this.block(ctx, "classification", null, classification.failures.map((f) => f.reason));
      return false;
    }

    for (const doc of state.documents.filter((d) => d.type === "UNKNOWN")) {
      state.alerts.push(`Document ${doc.id} could not be classified and is not analyzed`);
    }
    this.save(state);
    return true;
  }

  private async classifyDocuments(ctx: RunContext): Promise<void> {
    const { state } = ctx;
    const strategies = this.deps.strategies ?? [
      new HeuristicClassificationStrategy(),
      new ModelClassificationStrategy((doc, text) => this.classifyWithModel(ctx, doc, text)),
    ];

    for (const doc of state.documents) {
      if (doc.type !== "UNKNOWN") {
        doc.classification ??= { strategy: "caller", confidence: 1 };
        continue;
      }
      ctx.ledger = new CallLedger();
      try {
        const verdict = await classifyDocument(
          doc,
          doc.extractedText ?? "",
          strategies,
          this.config.gates.classificationConfidence,
        );
        doc.type = verdict.type;
        doc.classification = { strategy: verdict.strategy, confidence: verdict.confidence };
      } finally {
        this.foldUsage(state, ctx.ledger);
      }
    }
  }

  /** Model-backed classification on the routine model; an unusable answer counts as UNKNOWN. */
  private async classifyWithModel(ctx: RunContext, doc: InputDocument, text: string): Promise<ClassificationResponse> {
    this.checkLive(ctx, "run");
    const instructions = await this.deps.instructions.load("classification", this.config.profile);
    const ceiling = stageTokenCeiling(this.config.budget, this.config.outputTokens.classification);
    const excerpt = text.slice(0, ceiling * this.config.budget.charsPerToken);

    try {
      return await ctx.runner.run(
        {
          route: this.route("classification"),
          cacheStageId: "classification",
          instructions,
          request: { task: "classification", documentLabel: doc.id, chunkIndex: 0, chunkCount: 1, sections: [], text: excerpt },
          corrections: [],
          schema: ClassificationResponseSchema,
          maxTokens: this.config.outputTokens.classification,
        },
        ctx.ledger,
        this.invokeOptions(ctx, "run"),
      );
    } catch (err) {
      if (stepFailure(err) === null) throw err;
      console.warn(`[Classifier] Model classification of ${doc.id} unusable: ${errorMessage(err)}`);
      return { type: "UNKNOWN", confidence: 0 };
    }
  }

  // ==========================================================================
  // STAGES
  // ==========================================================================

  /** Returns false when the run halted (BLOCKED) inside this stage. */
  private async runStage(ctx: RunContext, stage: StageId): Promise<boolean> {
    const { state } = ctx;
    this.checkLive(ctx, "run");

    const missing = STAGE_UPSTREAM[stage].filter((up) => latestResult(state, up)?.verdict !== "PASS");
    if (missing.length > 0) {
      await this.block(ctx, "upstream", stage, missing.map((up) => `Upstream ${up} has no PASS result`));
      return false;
    }

    const stageTimeout = this.config.timeouts.stageTimeoutMs;
    ctx.stageDeadline = Math.min(this.now() + stageTimeout, ctx.runDeadline);
    if (state.status !== STAGE_STATUS[stage]) {
      await this.transition(ctx, STAGE_STATUS[stage], stage, state.stageResults[stage].length + 1);
    }

    const instructions = await this.deps.instructions.load(stage, this.config.profile);
    const input = this.stageInput(state, stage, instructions);
    state.chunkPlans[stage] = input.plan;

    const coverage = evaluateCoverageGate({ [stage]: input.plan }, this.config.budget.minCoverageRatio);
    if (coverage.verdict !== "PASS") {
      this.logGate(state, "coverage", stage, coverage);
      await this.block(ctx, "coverage", stage, coverage.failures.map((f) => f.reason));
      return false;
    }
    this.save(state);

    let corrections: string[] = [];
    for (let local = 1; ; local++) {
      this.checkLive(ctx, "stage");
      const attempt = state.stageResults[stage].length + 1;
      const result = await this.stageAttempt(ctx, stage, input, instructions, local, attempt, corrections);
      state.stageResults[stage].push(result);
      this.logGate(state, stage, stage, result.gate);

      if (result.verdict === "PASS") {
        state.escalations.push(...result.gate.escalations);
        this.save(state);
        console.log(
          `[Orchestrator] ${stage} passed on attempt ${attempt} (confidence ${result.confidence.toFixed(3)}, ` +
            `${result.callHistory.length} call(s), ${result.cacheHits} cache hit(s))`,
        );
        return true;
      }

      if (result.verdict === "RETRY") {
        this.save(state);
        corrections = [
          `The previous answer was rejected by quality checks:\n${result.gate.failures.map((f) => `- ${f.reason}`).join("\n")}`,
        ];
        console.warn(`[Orchestrator] ${stage} attempt ${attempt} needs a retry (${result.gate.failures.length} failure(s))`);
        continue;
      }

      const { gate, reasons } = blockingCause(result.gate);
      await this.block(ctx, gate, stage, reasons);
      return false;
    }
  }

  private stageInput(state: PipelineState, stage: StageId, instructions: InstructionSet): StageInput {
    const sources = stageSources(state);
    const primaryId = state.documents.find((d) => d.type === "PRIMARY")?.id ?? "primary";

    let text = sources.primary;
    let documentLabel = primaryId;
    let context: unknown;

    if (stage === "stage2") {
      const stage1 = latestPassPayload(state, "stage1");
      if (stage1?.stage === "stage1") context = { stage1: payloadContext("stage1", stage1.fields) };
    } else if (stage === "stage3") {
      const stage1 = latestPassPayload(state, "stage1");
      const stage2 = latestPassPayload(state, "stage2");
      if (stage1?.stage === "stage1" && stage2?.stage === "stage2") context = stage3Context(stage1, stage2);
      if (sources.supporting) {
        text = sources.supporting;
        documentLabel = supportingIds(state).join("+");
      }
    }

    const cpt = this.config.budget.charsPerToken;
    const reserved = estimateTokens(instructions.text, cpt) + estimateTokens(JSON.stringify(context ?? {}), cpt);
    const ceiling = Math.max(256, stageTokenCeiling(this.config.budget, this.config.outputTokens[stage]) - reserved);
    const plan = planChunks(text, {
      maxTokens: ceiling,
      overlapTokens: this.config.budget.overlapTokens,
      charsPerToken: cpt,
      maxChunks: this.config.budget.maxChunks,
    });

    return { documentLabel, text, plan, context };
  }

  private async stageAttempt(
    ctx: RunContext,
    stage: StageId,
    input: StageInput,
    instructions: InstructionSet,
    localAttempt: number,
    attempt: number,
    corrections: string[],
  ): Promise<StageResult> {
    const { state } = ctx;
    const ledger = new CallLedger();
    ctx.ledger = ledger;
    const stageCtx: StageContext = {
      runner: ctx.runner,
      route: this.route(stage),
      ledger,
      instructions,
      config: this.config,
      invokeOptions: this.invokeOptions(ctx, "stage"),
      corrections,
    };

    let executed: { payload: StagePayload; escalations: Escalation[] };
    try {
      executed = await executeStage(stageCtx, stage, input);
    } catch (err) {
      const failure = stepFailure(err);
      if (failure === null) throw err;
      console.warn(`[Orchestrator] ${stage} attempt ${attempt} produced no usable payload: ${failure.reason}`);
      return this.stageResult(stage, attempt, null, ledger, failureReport(failure), "BLOCK", 0);
    } finally {
      this.foldUsage(state, ledger);
    }

    const gated = evaluateStageGate({
      payload: executed.payload,
      sources: stageSources(state),
      stage2: stage === "stage3" ? stage2Payload(state) : null,
      gates: this.config.gates,
      confidence: this.config.confidence,
      taxonomy: this.deps.taxonomy,
      attempt: localAttempt,
    });

    let report = gated.report;
    if (executed.escalations.length > 0) {
      const escalations = [...report.escalations, ...executed.escalations];
      report = { ...report, escalations, verdict: combineVerdicts(report.failures, escalations) };
    }

    return this.stageResult(stage, attempt, gated.payload, ledger, report, this.resolveVerdict(report), gated.confidence);
  }

  /** ESCALATE halts only when escalations are configured to block. */
  private resolveVerdict(report: GateReport): GateVerdict {
    if (report.verdict !== "ESCALATE") return report.verdict;
    return this.config.confidence.blockOnEscalation ? "BLOCK" : "PASS";
  }

  private stageResult(
    stage: StageId,
    attempt: number,
    payload: StagePayload | null,
    ledger: CallLedger,
    gate: GateReport,
    verdict: GateVerdict,
    confidence: number,
  ): StageResult {
    return {
      stage,
      attempt,
      payload,
      rawResponse: ledger.lastRaw,
      usage: ledger.usage,
      retryCount: ledger.retryCount,
      gate,
      verdict,
      confidence,
      callHistory: [...ledger.attempts],
      cacheHits: ledger.cacheHits,
      createdAt: this.timestamp(),
    };
  }

  // ==========================================================================
  // TERMINAL STATES
  // ==========================================================================

  private async finalize(ctx: RunContext): Promise<void> {
    const { state } = ctx;
    const scores: Partial<Record<StageId, number>> = {};
    for (const stage of STAGE_IDS) {
      const result = latestResult(state, stage);
      if (result?.verdict === "PASS") scores[stage] = result.confidence;
    }
    const stage3 = latestResult(state, "stage3")?.payload;
    const inconclusive = stage3?.stage === "stage3" && stage3.decision === "INCONCLUSIVE";
    state.globalConfidence = computeGlobalConfidence(scores, this.config.confidence.stageWeights, inconclusive);
    if (stage3?.stage === "stage3" && inconclusive) {
      state.alerts.push(
        `Final decision is INCONCLUSIVE [${stage3.reasonCode ?? "STAGE3_INCONCLUSIVE"}]: ${stage3.warning ?? "no warning given"}`,
      );
    }

    const escalation = globalEscalation(state.globalConfidence, this.config.confidence);
    if (escalation) {
      state.escalations.push(escalation);
      if (this.config.confidence.blockOnEscalation) {
        await this.block(ctx, "escalation", null, [escalation.reason]);
        return;
      }
    }

    await this.transition(ctx, "FINALIZED", null, 0);
    this.deps.checkpoints.archive(state.runId);
    console.log(
      `[Orchestrator] Run ${state.runId} finalized (global confidence ${state.globalConfidence ?? "n/a"}, ` +
        `${state.usage.modelCalls} call(s), ${state.usage.totalTokens} tokens, $${state.usage.costUsd.toFixed(4)})`,
    );
    const stats = getBudgetStats(ctx.tracker, ctx.budget);
    if (stats.tokensPercent !== null) {
      console.log(`[Budget] ${state.runId}: ${stats.tokensPercent}% of run budget used, ${stats.tokensRemaining} tokens left`);
    }
  }

  private async block(ctx: RunContext, gate: GateName, stage: string | null, reasons: string[]): Promise<void> {
    const { state } = ctx;
    state.block = { gate, stage, reasons, at: this.timestamp() };
    console.warn(`[Orchestrator] Run ${state.runId} BLOCKED at ${gate}${stage ? ` (${stage})` : ""}: ${reasons.join("; ")}`);
    await this.transition(ctx, "BLOCKED", isStageId(stage) ? stage : null, 0);
  }

  private async handleError(ctx: RunContext, err: unknown, stage: StageId | null): Promise<void> {
    const { state } = ctx;

    if (err instanceof RunAbortedError || ctx.signal.aborted) {
      await this.block(ctx, "user_abort", stage, ["USER_ABORT"]);
      return;
    }
    if (err instanceof StageTimeoutError) {
      await this.block(ctx, err.scope === "run" ? "run_timeout" : "stage_timeout", stage, [err.message]);
      return;
    }
    if (err instanceof TokenBudgetExceededError) {
      await this.block(ctx, "token_budget", stage, [err.reason]);
      return;
    }
    const failure = stepFailure(err);
    if (failure) {
      await this.block(ctx, failure.gate, stage, [failure.reason]);
      return;
    }

    const category = err instanceof ModelInvocationError ? err.category : "unknown";
    let retryHistory: ModelAttempt[] = [...ctx.ledger.attempts];
    if (retryHistory.length === 0 && err instanceof ModelInvocationError) retryHistory = err.attempts;
    const message = toFriendlyError("FATAL");

    console.error(`[Orchestrator] Run ${state.runId} failed fatally (${category}) in ${stage ?? state.status}: ${errorMessage(err)}`);
    await this.transition(ctx, "DEAD_LETTERED", stage, 0);

    const { file } = this.deps.deadLetters.write({
      state,
      kind: "FATAL",
      errorName: err instanceof Error ? err.name : "Error",
      category,
      friendlyMessage: message,
      detail: err instanceof Error ? `${err.name}: ${err.message}` : String(err),
      failedStage: stage,
      retryHistory,
    });
    ctx.deadLetter = { file, kind: "FATAL", category, message };
  }

  // ==========================================================================
  // HELPERS
  // ==========================================================================

  private async transition(ctx: RunContext, to: PipelineStatus, stage: StageId | null, attempt: number): Promise<void> {
    const { state } = ctx;
    const transition: Transition = {
      seq: state.transitions.length + 1,
      from: state.status,
      to,
      stage,
      attempt,
      at: this.timestamp(),
    };
    state.transitions.push(transition);
    state.status = to;
    state.stageCursor = Math.max(state.stageCursor, STAGE_CURSOR[to] ?? state.stageCursor);
    this.save(state);
    logEvent("transition", { runId: state.runId, stage, from: transition.from, to, attempt });

    if (this.deps.onTransition) {
      try {
        await this.deps.onTransition(transition, state);
      } catch (err) {
        console.error(`[Orchestrator] Transition hook failed after ${transition.from} → ${to}: ${errorMessage(err)}`);
      }
    }
  }

  private save(state: PipelineState): void {
    state.updatedAt = this.timestamp();
    this.deps.checkpoints.save(state);
  }

  /** Consulted once per stage attempt; the circuit breaker sees the injected clock. */
  private route(stage: InstructionStageId): ModelRoute {
    const { routing } = this.config;
    return routeModel(stage, routing, (provider) => allowProbeAfterCooldown(provider, routing.circuitCooldownMs, this.now()));
  }

  private checkLive(ctx: RunContext, scope: "stage" | "run"): void {
    if (ctx.signal.aborted) throw new RunAbortedError();
    const now = this.now();
    if (now >= ctx.runDeadline) throw new StageTimeoutError("run", this.config.timeouts.runTimeoutMs);
    if (scope === "stage" && now >= ctx.stageDeadline) {
      throw new StageTimeoutError("stage", this.config.timeouts.stageTimeoutMs);
    }
  }

  private invokeOptions(ctx: RunContext, scope: "stage" | "run"): InvokeOptions {
    const stageBound = scope === "stage" && ctx.stageDeadline < ctx.runDeadline;
    return {
      signal: ctx.signal,
      deadline: stageBound ? ctx.stageDeadline : ctx.runDeadline,
      deadlineScope: stageBound ? "stage" : "run",
      deadlineTimeoutMs: stageBound ? this.config.timeouts.stageTimeoutMs : this.config.timeouts.runTimeoutMs,
    };
  }

  private foldUsage(state: PipelineState, ledger: CallLedger): void {
    const usage = ledger.usage;
    state.usage.promptTokens += usage.promptTokens;
    state.usage.completionTokens += usage.completionTokens;
    state.usage.totalTokens += usage.totalTokens;
    state.usage.costUsd += ledger.costUsd;
    state.usage.modelCalls += ledger.attempts.length;
    state.usage.cacheHits += ledger.cacheHits;
    state.usage.truncatedCalls += ledger.truncatedCalls;
    state.usage.latencyMsTotal += ledger.latencyMs;
  }

  private logGate(state: PipelineState, gate: string, stage: string | null, report: GateReport): void {
    logEvent("gate", {
      runId: state.runId,
      stage,
      gate,
      verdict: report.verdict,
      checksTotal: report.checksTotal,
      checksFailed: report.checksFailed,
      reasons: report.failures.map((f) => f.reason),
    });
    if (report.verdict !== "PASS") {
      console.warn(`[Gate] ${gate}${stage ? ` (${stage})` : ""}: ${report.verdict} - ${report.failures.map((f) => f.reason).join("; ")}`);
    }
  }

  private async loadAllInstructions(): Promise<InstructionSet[]> {
    return Promise.all(INSTRUCTION_STAGE_IDS.map((id) => this.deps.instructions.load(id, this.config.profile)));
  }

  private timestamp(): string {
    return new Date(this.now()).toISOString();
  }

  private outcome(state: PipelineState, deadLetter: DeadLetterInfo | null): RunOutcome {
    return {
      runId: state.runId,
      status: state.status,
      exitCode: exitCodeFor(state.status),
      block: state.block,
      deadLetter,
      globalConfidence: state.globalConfidence,
      escalations: state.escalations,
      state,
    };
  }
}

// ============================================================================
// PURE HELPERS
// ============================================================================

export function newRunId(now: number): string {
  const stamp = new Date(now).toISOString().replace(/[-:]/g, "").replace(/\..+$/, "");
  return `run-${stamp}-${crypto.randomUUID().slice(0, 8)}`;
}

export function exitCodeFor(status: PipelineStatus): ExitCode {
  if (status === "FINALIZED") return EXIT_CODES.FINALIZED;
  if (status === "DEAD_LETTERED") return EXIT_CODES.DEAD_LETTERED;
  return EXIT_CODES.BLOCKED;
}

/**
 * Where a resumed run picks up: classification unless it passed, else the
 * first stage without PASS, else straight to finalization.
 */
export function resumeEntry(state: PipelineState): PipelineStatus {
  if (state.gates.classification?.verdict !== "PASS") return "CLASSIFYING";
  for (const stage of STAGE_IDS) {
    if (latestResult(state, stage)?.verdict !== "PASS") return STAGE_STATUS[stage];
  }
  return "FINALIZED";
}

export function stageSources(state: PipelineState): StageSources {
  const primary = state.documents.find((d) => d.type === "PRIMARY")?.extractedText ?? "";
  const supporting = state.documents
    .filter((d) => d.type === "SUPPORTING")
    .map((d) => d.extractedText ?? "")
    .join("\n\n");
  return { primary, supporting };
}

function supportingIds(state: PipelineState): string[] {
  return state.documents.filter((d) => d.type === "SUPPORTING").map((d) => d.id);
}

function latestPassPayload(state: PipelineState, stage: StageId): StagePayload | null {
  const result = latestResult(state, stage);
  return result?.verdict === "PASS" ? result.payload : null;
}

function stage2Payload(state: PipelineState): Stage2Payload | null {
  const payload = latestPassPayload(state, "stage2");
  return payload?.stage === "stage2" ? payload : null;
}

function isStageId(value: string | null): value is StageId {
  return value === "stage1" || value === "stage2" || value === "stage3";
}

async function executeStage(
  ctx: StageContext,
  stage: StageId,
  input: StageInput,
): Promise<{ payload: StagePayload; escalations: Escalation[] }> {
  switch (stage) {
    case "stage1": {
      const outcome = await runStage1(ctx, input);
      return { payload: outcome.payload, escalations: outcome.escalations };
    }
    case "stage2":
      return { payload: await runStage2(ctx, input), escalations: [] };
    case "stage3":
      return { payload: await runStage3(ctx, input), escalations: [] };
  }
}

/** Errors that end a step with a BLOCK verdict rather than a dead letter. */
function stepFailure(err: unknown): GateFailure | null {
  if (err instanceof PayloadValidationError) {
    return { gate: "payload_validation", verdict: "BLOCK", reason: `Model payload failed validation: ${err.message}` };
  }
  if (err instanceof ModelInvocationError && err.kind === "GATE_FAILURE") {
    return { gate: "model_output", verdict: "BLOCK", reason: err.message };
  }
  return null;
}

function failureReport(failure: GateFailure): GateReport {
  return { verdict: "BLOCK", failures: [failure], escalations: [], checksTotal: 1, checksFailed: 1 };
}

/** The gate named in a block record: escalation when only escalations halted the stage. */
function blockingCause(report: GateReport): { gate: GateName; reasons: string[] } {
  if (report.failures.length === 0) {
    return { gate: "escalation", reasons: report.escalations.map((e) => e.reason) };
  }
  const blocking = report.failures.find((f) => f.verdict === "BLOCK") ?? report.failures[0];
  return { gate: blocking.gate, reasons: report.failures.map((f) => f.reason) };
}
