/**
 * Run Abort Tests
 *
 * @module run-abort.test
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { clearAbortSignal, linkAbortSignals, registerRun, setAbortSignal } from "@/lib/run-abort";

beforeEach(() => {
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  clearAbortSignal("run-a");
  vi.restoreAllMocks();
});

describe("run abort registry", () => {
  it("aborts a registered run with the given reason", () => {
    const signal = registerRun("run-a");
    setAbortSignal("run-a", "SIGINT");

    expect(signal.aborted).toBe(true);
    expect(signal.reason).toEqual(new Error("SIGINT"));
    expect(console.warn).toHaveBeenCalledWith("[Abort] Run run-a abort requested");
  });

  it("keeps an abort requested before registration", () => {
    setAbortSignal("run-a");
    expect(registerRun("run-a").aborted).toBe(true);
  });

  it("warns once for repeated aborts", () => {
    registerRun("run-a");
    setAbortSignal("run-a");
    setAbortSignal("run-a");

    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it("starts fresh after clearing", () => {
    setAbortSignal("run-a");
    clearAbortSignal("run-a");

    expect(registerRun("run-a").aborted).toBe(false);
  });
});

describe("linkAbortSignals", () => {
  it("fires when any source fires", () => {
    const a = new AbortController();
    const b = new AbortController();
    const linked = linkAbortSignals(a.signal, undefined, b.signal);

    b.abort(new Error("deadline"));

    expect(linked.signal.aborted).toBe(true);
    expect(linked.signal.reason).toEqual(new Error("deadline"));
  });

  it("is aborted at once when a source already is", () => {
    const linked = linkAbortSignals(AbortSignal.abort(new Error("early")));
    expect(linked.signal.aborted).toBe(true);
  });

  it("stops listening after dispose", () => {
    const a = new AbortController();
    const linked = linkAbortSignals(a.signal);

    linked.dispose();
    a.abort();

    expect(linked.signal.aborted).toBe(false);
  });
});
