/**
 * Parallel Theme Analysis
 *
 * Runs the per-theme analyses of stage 2 on a bounded worker pool. Every
 * task gets its own timeout; results are handed back only after every task
 * has settled, so the caller merges once. A task that times out is aborted
 * through its signal and reported as `timed_out` so the caller can keep the
 * completed themes and flag the rest.
 *
 * @module pipeline/parallel-themes
 */

import pLimit from "p-limit";
import { errorMessage } from "./errors";

// ============================================================================
// TYPES
// ============================================================================

export interface ParallelThemeConfig {
  maxConcurrency: number;
  workerTimeoutMs: number;
  /** Aborts every running and queued task. */
  signal?: AbortSignal;
  onProgress?: (completed: number, total: number) => void;
}

export interface ThemeTask<T> {
  id: string;
  execute: (signal: AbortSignal) => Promise<T>;
}

export type ThemeOutcome<T> =
  | { status: "fulfilled"; value: T }
  | { status: "rejected"; error: unknown }
  | { status: "timed_out"; timeoutMs: number };

class WorkerTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Worker timed out after ${timeoutMs}ms`);
    this.name = "WorkerTimeoutError";
  }
}

// ============================================================================
// PARALLEL EXECUTION
// ============================================================================

/** Execute theme tasks with a concurrency limit; outcomes keep task order. */
export async function executeThemesInParallel<T>(
  tasks: ThemeTask<T>[],
  config: ParallelThemeConfig,
): Promise<Map<string, ThemeOutcome<T>>> {
  const limit = pLimit(Math.max(1, config.maxConcurrency));
  const outcomes = new Map<string, ThemeOutcome<T>>();
  let completed = 0;

  const settled = await Promise.all(
    tasks.map((task) =>
      limit(async (): Promise<[string, ThemeOutcome<T>]> => {
        const outcome = await runWithTimeout(task, config);
        completed++;
        config.onProgress?.(completed, tasks.length);
        if (outcome.status === "rejected") {
          console.error(`[Themes] Task ${task.id} failed: ${errorMessage(outcome.error)}`);
        } else if (outcome.status === "timed_out") {
          console.warn(`[Themes] Task ${task.id} timed out after ${outcome.timeoutMs}ms`);
        }
        return [task.id, outcome];
      }),
    ),
  );

  for (const [id, outcome] of settled) outcomes.set(id, outcome);
  return outcomes;
}

async function runWithTimeout<T>(task: ThemeTask<T>, config: ParallelThemeConfig): Promise<ThemeOutcome<T>> {
  const controller = new AbortController();
  const onAbort = () => controller.abort(config.signal?.reason);
  if (config.signal?.aborted) {
    return { status: "rejected", error: config.signal.reason };
  }
  config.signal?.addEventListener("abort", onAbort, { once: true });

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new WorkerTimeoutError(config.workerTimeoutMs);
      controller.abort(error);
      reject(error);
    }, config.workerTimeoutMs);
  });

  try {
    const value = await Promise.race([task.execute(controller.signal), timeout]);
    return { status: "fulfilled", value };
  } catch (error) {
    if (error instanceof WorkerTimeoutError) {
      return { status: "timed_out", timeoutMs: error.timeoutMs };
    }
    return { status: "rejected", error };
  } finally {
    clearTimeout(timer);
    config.signal?.removeEventListener("abort", onAbort);
  }
}
