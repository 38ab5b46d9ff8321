/**
 * Dead-Letter Queue Tests
 *
 * @module dead-letter-queue.test
 */

import fs from "fs";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DeadLetterQueue, type DeadLetterInput } from "@/lib/dead-letter-queue";
import { sampleState } from "@test/helpers/pipeline-state";
import { makeTempDir, removeTempDir } from "@test/helpers/review-fixture";

let dir: string;
let queue: DeadLetterQueue;

function input(overrides: Partial<DeadLetterInput> = {}): DeadLetterInput {
  return {
    state: sampleState("run-a"),
    kind: "FATAL",
    errorName: "ModelInvocationError",
    category: "auth",
    friendlyMessage: "Model call failed: auth",
    detail: "Incorrect API key provided: sk-test-secret-0000",
    failedStage: "stage1",
    retryHistory: [],
    ...overrides,
  };
}

beforeEach(() => {
  dir = makeTempDir();
  queue = new DeadLetterQueue(dir);
  vi.spyOn(console, "error").mockImplementation(() => {});
  vi.spyOn(console, "log").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  removeTempDir(dir);
});

describe("DeadLetterQueue", () => {
  it("writes a redacted record with the state snapshot", () => {
    const { record, file } = queue.write(input());

    expect(file.endsWith("run-a-1.json")).toBe(true);
    expect(record.attempt).toBe(1);
    expect(record.schemaVersion).toBe("1.0.0");
    expect(record.error).toEqual({
      kind: "FATAL",
      name: "ModelInvocationError",
      category: "auth",
      message: "Model call failed: auth",
      detail: "Incorrect API key provided: [REDACTED_API_KEY]",
    });
    expect(record.state.runId).toBe("run-a");
    expect(fs.readFileSync(file, "utf-8")).not.toContain("sk-test-secret");
  });

  it("numbers records per run and never overwrites one", () => {
    queue.write(input());
    queue.write(input({ kind: "GATE_FAILURE", category: "truncation" }));
    queue.write(input({ state: sampleState("run-b") }));

    expect(queue.list("run-a").map((s) => [s.attempt, s.kind])).toEqual([
      [1, "FATAL"],
      [2, "GATE_FAILURE"],
    ]);
    expect(queue.read("run-b")).toHaveLength(1);
  });

  it("refuses transient failures", () => {
    expect(DeadLetterQueue.shouldDeadLetter("TRANSIENT")).toBe(false);
    expect(DeadLetterQueue.shouldDeadLetter("TRUNCATION")).toBe(false);
    expect(() => queue.write(input({ kind: "TRANSIENT" }))).toThrow("Refusing to dead-letter a TRANSIENT failure");
    expect(queue.read("run-a")).toEqual([]);
  });

  it("reads nothing for an unknown run or a missing directory", () => {
    expect(new DeadLetterQueue(`${dir}/missing`).list("run-a")).toEqual([]);
    expect(queue.read("run-zzz")).toEqual([]);
  });

  it("removes records past retention", () => {
    queue.write(input());

    expect(queue.cleanupExpired(30)).toBe(0);
    expect(queue.cleanupExpired(30, Date.now() + 31 * 86_400_000)).toBe(1);
    expect(queue.list("run-a")).toEqual([]);
  });
});
