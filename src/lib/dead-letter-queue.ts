/**
 * Dead-Letter Queue
 *
 * Append-only store of fatal pipeline failures. Each record is written once
 * as `<runId>-<attempt>.json` and never rewritten; reads are for operators.
 *
 * @module dead-letter-queue
 */

import fs from "fs";
import path from "path";
import { z } from "zod";
import { safeRunId } from "./checkpoint-store";
import { redactSensitive } from "./pipeline/debug";
import {
  ErrorKindSchema,
  ModelAttemptSchema,
  PipelineStateSchema,
  UsageTotalsSchema,
  type ErrorKind,
  type ModelAttempt,
  type PipelineState,
} from "./pipeline/types";

export const DLQ_SCHEMA_VERSION = "1.0.0";

export const DeadLetterRecordSchema = z.object({
  schemaVersion: z.literal(DLQ_SCHEMA_VERSION),
  runId: z.string(),
  attempt: z.number().int().min(1),
  timestamp: z.string(),
  error: z.object({
    kind: ErrorKindSchema,
    name: z.string(),
    category: z.string(),
    message: z.string(),
    detail: z.string(),
  }),
  failedStage: z.string().nullable(),
  retryHistory: z.array(ModelAttemptSchema),
  metrics: UsageTotalsSchema,
  state: PipelineStateSchema,
});
export type DeadLetterRecord = z.infer<typeof DeadLetterRecordSchema>;

export interface DeadLetterInput {
  state: PipelineState;
  kind: ErrorKind;
  errorName: string;
  category: string;
  friendlyMessage: string;
  detail: string;
  failedStage: string | null;
  retryHistory: ModelAttempt[];
}

export interface DeadLetterSummary {
  runId: string;
  attempt: number;
  timestamp: string;
  kind: ErrorKind;
  message: string;
  failedStage: string | null;
  file: string;
}

const MAX_DETAIL_CHARS = 4000;

export class DeadLetterQueue {
  constructor(private readonly dir: string) {}

  /** Transient and truncation failures are retried, never dead-lettered. */
  static shouldDeadLetter(kind: ErrorKind): boolean {
    return kind !== "TRANSIENT" && kind !== "TRUNCATION";
  }

  private filesFor(runId: string): Array<{ attempt: number; file: string }> {
    if (!fs.existsSync(this.dir)) return [];
    const prefix = `${safeRunId(runId)}-`;
    const entries: Array<{ attempt: number; file: string }> = [];
    for (const name of fs.readdirSync(this.dir)) {
      if (!name.startsWith(prefix) || !name.endsWith(".json")) continue;
      const attempt = Number(name.slice(prefix.length, -".json".length));
      if (Number.isInteger(attempt) && attempt > 0) {
        entries.push({ attempt, file: path.resolve(this.dir, name) });
      }
    }
    return entries.sort((a, b) => a.attempt - b.attempt);
  }

  /** Write one record; the attempt suffix is one past the run's latest record. */
  write(input: DeadLetterInput): { record: DeadLetterRecord; file: string } {
    if (!DeadLetterQueue.shouldDeadLetter(input.kind)) {
      throw new Error(`Refusing to dead-letter a ${input.kind} failure`);
    }

    fs.mkdirSync(this.dir, { recursive: true });
    const existing = this.filesFor(input.state.runId);
    const attempt = existing.length > 0 ? existing[existing.length - 1].attempt + 1 : 1;

    const record = DeadLetterRecordSchema.parse({
      schemaVersion: DLQ_SCHEMA_VERSION,
      runId: input.state.runId,
      attempt,
      timestamp: new Date().toISOString(),
      error: {
        kind: input.kind,
        name: input.errorName,
        category: input.category,
        message: input.friendlyMessage,
        detail: redactSensitive(input.detail).slice(0, MAX_DETAIL_CHARS),
      },
      failedStage: input.failedStage,
      retryHistory: input.retryHistory,
      metrics: input.state.usage,
      state: input.state,
    });

    const file = path.resolve(this.dir, `${safeRunId(input.state.runId)}-${attempt}.json`);
    // "wx" fails if the file exists: records are write-once.
    fs.writeFileSync(file, JSON.stringify(record, null, 2) + "\n", { encoding: "utf-8", flag: "wx" });
    console.error(`[DLQ] Run ${input.state.runId} dead-lettered (${input.kind}/${input.category}) → ${file}`);
    return { record, file };
  }

  read(runId: string): DeadLetterRecord[] {
    return this.filesFor(runId).map(({ file }) => parseRecord(fs.readFileSync(file, "utf-8"), file));
  }

  list(runId: string): DeadLetterSummary[] {
    return this.filesFor(runId).map(({ file }) => {
      const record = parseRecord(fs.readFileSync(file, "utf-8"), file);
      return {
        runId: record.runId,
        attempt: record.attempt,
        timestamp: record.timestamp,
        kind: record.error.kind,
        message: record.error.message,
        failedStage: record.failedStage,
        file,
      };
    });
  }

  cleanupExpired(retentionDays: number, now: number = Date.now()): number {
    if (!fs.existsSync(this.dir)) return 0;
    const cutoff = now - Math.max(1, retentionDays) * 86_400_000;
    let removed = 0;
    for (const name of fs.readdirSync(this.dir)) {
      if (!name.endsWith(".json")) continue;
      const file = path.resolve(this.dir, name);
      if (fs.statSync(file).mtimeMs < cutoff) {
        fs.unlinkSync(file);
        removed++;
      }
    }
    if (removed > 0) {
      console.log(`[DLQ] Retention removed ${removed} record(s) older than ${retentionDays} days`);
    }
    return removed;
  }
}

function parseRecord(raw: string, file: string): DeadLetterRecord {
  const parsed = DeadLetterRecordSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`Corrupt dead-letter record ${file}`);
  }
  return parsed.data;
}
