/**
 * Run abort signal management.
 * Kept on globalThis so a CLI signal handler and the engine share one registry.
 */

declare global {
  // eslint-disable-next-line no-var
  var __sreAbortSignals: Map<string, AbortController> | undefined;
}

function getAbortSignals(): Map<string, AbortController> {
  if (!globalThis.__sreAbortSignals) {
    globalThis.__sreAbortSignals = new Map<string, AbortController>();
  }
  return globalThis.__sreAbortSignals;
}

/**
 * Register a run and get the signal that fires when it is aborted.
 * An abort requested before registration is kept.
 */
export function registerRun(runId: string): AbortSignal {
  const signals = getAbortSignals();
  const existing = signals.get(runId);
  if (existing) return existing.signal;
  const controller = new AbortController();
  signals.set(runId, controller);
  return controller.signal;
}

/**
 * Set the abort signal for a run.
 */
export function setAbortSignal(runId: string, reason = "USER_ABORT"): void {
  const signals = getAbortSignals();
  let controller = signals.get(runId);
  if (!controller) {
    controller = new AbortController();
    signals.set(runId, controller);
  }
  if (!controller.signal.aborted) {
    console.warn(`[Abort] Run ${runId} abort requested`);
    controller.abort(new Error(reason));
  }
}

/**
 * Clear the abort signal for a run (called after the run returns).
 */
export function clearAbortSignal(runId: string): void {
  getAbortSignals().delete(runId);
}

/**
 * One signal that fires when any of the given signals fires.
 * `dispose` detaches the listeners once the run is over.
 */
export function linkAbortSignals(...signals: Array<AbortSignal | undefined>): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const detach: Array<() => void> = [];

  for (const signal of signals) {
    if (!signal) continue;
    if (signal.aborted) {
      controller.abort(signal.reason);
      break;
    }
    const onAbort = () => controller.abort(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    detach.push(() => signal.removeEventListener("abort", onAbort));
  }

  return {
    signal: controller.signal,
    dispose: () => detach.forEach((fn) => fn()),
  };
}
