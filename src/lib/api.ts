/**
 * Engine API
 *
 * `run(inputs)`, `resume(runId)` and `inspectDeadLetter(runId)` over one
 * wired set of collaborators. Every collaborator can be replaced; the
 * defaults read documents and instructions from disk, call providers through
 * the AI SDK and cache responses in SQLite.
 *
 * @module api
 */

import path from "path";
import { CheckpointStore, type CheckpointSummary } from "./checkpoint-store";
import { loadEngineConfig, type EngineConfig } from "./config-loader";
import { DeadLetterQueue, type DeadLetterRecord, type DeadLetterSummary } from "./dead-letter-queue";
import { SqliteResponseCache, type CacheStats, type ResponseCache } from "./response-cache";
import type { ClassificationStrategy } from "./pipeline/classification";
import type { DocumentExtractor, InstructionSource, ReferenceTaxonomy } from "./pipeline/collaborators";
import { CheckpointNotFoundError } from "./pipeline/errors";
import { FileInstructionSource } from "./pipeline/instructions";
import { AiSdkProvider, type ModelProvider } from "./pipeline/model-client";
import {
  PipelineOrchestrator,
  type RunOptions,
  type RunOutcome,
  type TransitionHook,
} from "./pipeline/orchestrator";
import { CitationTaxonomy } from "./pipeline/taxonomy";
import { extractFromText, PlainTextExtractor } from "./pipeline/text-extractor";
import type { DocumentType, InputDocument } from "./pipeline/types";

export type { RunOutcome } from "./pipeline/orchestrator";

// ============================================================================
// TYPES
// ============================================================================

export interface RunInput {
  /** Defaults to the file name without extension. */
  id?: string;
  path: string;
  /** Caller-supplied type; a non-UNKNOWN type is never reclassified. */
  type?: DocumentType;
  /** Already extracted text; pages separated by form feeds. Skips the extractor. */
  text?: string;
  /** Per-page quality for `text`; computed from the text when omitted. */
  pageQuality?: number[];
}

export interface EngineOptions {
  config?: EngineConfig;
  provider?: ModelProvider;
  extractor?: DocumentExtractor;
  instructions?: InstructionSource;
  taxonomy?: ReferenceTaxonomy;
  /** `null` disables caching regardless of config. */
  cache?: ResponseCache | null;
  strategies?: ClassificationStrategy[];
  onTransition?: TransitionHook;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export interface DeadLetterReport {
  runId: string;
  summaries: DeadLetterSummary[];
  records: DeadLetterRecord[];
}

export interface HousekeepingResult {
  checkpointsRemoved: number;
  deadLettersRemoved: number;
  cacheEntriesRemoved: number;
}

export interface Engine {
  readonly config: EngineConfig;
  run(inputs: RunInput[], options?: RunOptions): Promise<RunOutcome>;
  resume(runId: string, options?: Pick<RunOptions, "signal">): Promise<RunOutcome>;
  inspectDeadLetter(runId: string): DeadLetterReport;
  listCheckpoints(): CheckpointSummary[];
  /** Drop a run's active checkpoint; false when there was none. */
  clearCheckpoint(runId: string): boolean;
  /** Null when the engine runs without the SQLite cache. */
  cacheStats(): Promise<CacheStats | null>;
  clearCache(): Promise<number>;
  /** Retention cleanup of checkpoints, dead letters and expired cache entries. */
  housekeeping(): Promise<HousekeepingResult>;
  close(): Promise<void>;
}

// ============================================================================
// INPUTS
// ============================================================================

export function toInputDocument(input: RunInput): InputDocument {
  const id = input.id ?? path.basename(input.path, path.extname(input.path));
  const base: InputDocument = {
    id,
    sourcePath: input.path,
    type: input.type ?? "UNKNOWN",
    extractedText: null,
    pageCount: 0,
    pageQuality: [],
    qualityScore: null,
    noiseRatio: null,
    classification: null,
  };
  if (input.text === undefined) return base;

  const extracted = extractFromText(input.text);
  const pageQuality = input.pageQuality ?? extracted.pageQuality;
  return { ...base, extractedText: extracted.text, pageQuality, pageCount: pageQuality.length };
}

// ============================================================================
// ENGINE
// ============================================================================

export function createEngine(options: EngineOptions = {}): Engine {
  const config = options.config ?? loadEngineConfig().config;
  const checkpoints = new CheckpointStore({
    dir: config.storage.checkpointDir,
    archiveDir: config.storage.archiveDir,
  });
  const deadLetters = new DeadLetterQueue(config.storage.deadLetterDir);
  const sqliteCache =
    options.cache === undefined && config.cache.enabled
      ? new SqliteResponseCache({ dbPath: config.cache.dbPath, ttlHours: config.cache.ttlHours, now: options.now })
      : null;
  const cache = options.cache === undefined ? sqliteCache : options.cache;

  const orchestrator = new PipelineOrchestrator({
    config,
    provider: options.provider ?? new AiSdkProvider(),
    extractor: options.extractor ?? new PlainTextExtractor(),
    instructions: options.instructions ?? new FileInstructionSource(config.instructions.dir),
    taxonomy: options.taxonomy ?? CitationTaxonomy.fromFile(),
    checkpoints,
    deadLetters,
    cache,
    strategies: options.strategies,
    onTransition: options.onTransition,
    sleep: options.sleep,
    now: options.now,
  });

  return {
    config,

    run(inputs, runOptions) {
      return orchestrator.run(inputs.map(toInputDocument), runOptions);
    },

    async resume(runId, resumeOptions) {
      const state = checkpoints.load(runId) ?? checkpoints.loadArchived(runId);
      if (!state) throw new CheckpointNotFoundError(runId);
      return orchestrator.resume(state, resumeOptions);
    },

    inspectDeadLetter(runId) {
      return { runId, summaries: deadLetters.list(runId), records: deadLetters.read(runId) };
    },

    listCheckpoints() {
      return checkpoints.list();
    },

    clearCheckpoint(runId) {
      return checkpoints.clear(runId);
    },

    async cacheStats() {
      return sqliteCache ? sqliteCache.getStats() : null;
    },

    async clearCache() {
      return sqliteCache ? sqliteCache.clear() : 0;
    },

    async housekeeping() {
      const result: HousekeepingResult = {
        checkpointsRemoved: checkpoints.cleanupExpired(config.storage.checkpointRetentionDays),
        deadLettersRemoved: deadLetters.cleanupExpired(config.storage.deadLetterRetentionDays),
        cacheEntriesRemoved: sqliteCache ? await sqliteCache.cleanupExpired() : 0,
      };
      console.log(
        `[Engine] Housekeeping removed ${result.checkpointsRemoved} checkpoint(s), ` +
          `${result.deadLettersRemoved} dead letter(s), ${result.cacheEntriesRemoved} cache entr(ies)`,
      );
      return result;
    },

    async close() {
      if (sqliteCache) await sqliteCache.close();
    },
  };
}
