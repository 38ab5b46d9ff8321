/**
 * Checkpoint Store
 *
 * One JSON record per run, holding the full PipelineState. Writes are
 * synchronous (temp file + rename) so a transition never returns before its
 * checkpoint is durable. Records are serialized in schema order, which makes
 * load → save reproduce the same bytes.
 *
 * @module checkpoint-store
 */

import fs from "fs";
import path from "path";
import { PipelineStateSchema, type PipelineState, type PipelineStatus } from "./pipeline/types";

export interface CheckpointSummary {
  runId: string;
  status: PipelineStatus;
  stageCursor: number;
  updatedAt: string;
  file: string;
}

export interface CheckpointStoreOptions {
  dir: string;
  archiveDir: string;
}

export function safeRunId(runId: string): string {
  return runId.replace(/[^A-Za-z0-9_.-]/g, "_");
}

export function serializeState(state: PipelineState): string {
  return JSON.stringify(PipelineStateSchema.parse(state), null, 2) + "\n";
}

export class CheckpointStore {
  constructor(private readonly options: CheckpointStoreOptions) {}

  fileFor(runId: string): string {
    return path.resolve(this.options.dir, `${safeRunId(runId)}.json`);
  }

  archivedFileFor(runId: string): string {
    return path.resolve(this.options.archiveDir, `${safeRunId(runId)}.json`);
  }

  /** Persist the whole state; blocks until the record is on disk. */
  save(state: PipelineState): void {
    const file = this.fileFor(state.runId);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    const tmp = `${file}.${process.pid}.tmp`;
    fs.writeFileSync(tmp, serializeState(state), "utf-8");
    fs.renameSync(tmp, file);
  }

  /** Raw record bytes, or null when the run has no active checkpoint. */
  loadRaw(runId: string): string | null {
    const file = this.fileFor(runId);
    if (!fs.existsSync(file)) return null;
    return fs.readFileSync(file, "utf-8");
  }

  /** Parsed state, or null when the run has no active checkpoint. Throws on a corrupt record. */
  load(runId: string): PipelineState | null {
    const raw = this.loadRaw(runId);
    return raw === null ? null : parseCheckpoint(raw, this.fileFor(runId));
  }

  loadArchived(runId: string): PipelineState | null {
    const file = this.archivedFileFor(runId);
    if (!fs.existsSync(file)) return null;
    return parseCheckpoint(fs.readFileSync(file, "utf-8"), file);
  }

  list(): CheckpointSummary[] {
    if (!fs.existsSync(this.options.dir)) return [];
    const summaries: CheckpointSummary[] = [];
    for (const name of fs.readdirSync(this.options.dir).filter((f) => f.endsWith(".json")).sort()) {
      const file = path.resolve(this.options.dir, name);
      try {
        const state = parseCheckpoint(fs.readFileSync(file, "utf-8"), file);
        summaries.push({
          runId: state.runId,
          status: state.status,
          stageCursor: state.stageCursor,
          updatedAt: state.updatedAt,
          file,
        });
      } catch (err) {
        console.warn(`[Checkpoint] Skipping unreadable checkpoint ${name}: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
    return summaries;
  }

  clear(runId: string): boolean {
    const file = this.fileFor(runId);
    if (!fs.existsSync(file)) return false;
    fs.unlinkSync(file);
    console.log(`[Checkpoint] Cleared ${runId}`);
    return true;
  }

  /** Move a finalized run's checkpoint out of the active directory. */
  archive(runId: string): string | null {
    const file = this.fileFor(runId);
    if (!fs.existsSync(file)) return null;
    const target = this.archivedFileFor(runId);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.renameSync(file, target);
    console.log(`[Checkpoint] Archived ${runId} → ${target}`);
    return target;
  }

  /** Remove active and archived checkpoints older than the retention window. */
  cleanupExpired(retentionDays: number, now: number = Date.now()): number {
    const cutoff = now - Math.max(1, retentionDays) * 86_400_000;
    let removed = 0;
    for (const dir of [this.options.dir, this.options.archiveDir]) {
      if (!fs.existsSync(dir)) continue;
      for (const name of fs.readdirSync(dir)) {
        if (!name.endsWith(".json")) continue;
        const file = path.resolve(dir, name);
        if (fs.statSync(file).mtimeMs < cutoff) {
          fs.unlinkSync(file);
          removed++;
        }
      }
    }
    if (removed > 0) {
      console.log(`[Checkpoint] Retention removed ${removed} checkpoint(s) older than ${retentionDays} days`);
    }
    return removed;
  }
}

function parseCheckpoint(raw: string, file: string): PipelineState {
  const json: unknown = JSON.parse(raw);
  const parsed = PipelineStateSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Corrupt checkpoint ${file}: ${issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid"}`);
  }
  return parsed.data;
}
