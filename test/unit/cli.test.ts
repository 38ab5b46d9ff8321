/**
 * CLI Tests
 *
 * Argument parsing and exit codes of the command line entry point.
 * Storage is pointed at a temp directory through SRE_* variables.
 *
 * @module cli.test
 */

import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { main, parseRunArgs } from "@/cli";
import { CheckpointStore } from "@/lib/checkpoint-store";
import { ConfigurationError } from "@/lib/pipeline/errors";
import { sampleState } from "@test/helpers/pipeline-state";
import { makeTempDir, removeTempDir } from "@test/helpers/review-fixture";

let dir: string;

beforeEach(() => {
  dir = makeTempDir();
  vi.stubEnv("SRE_CACHE_ENABLED", "false");
  vi.stubEnv("SRE_CHECKPOINT_DIR", path.join(dir, "checkpoints"));
  vi.stubEnv("SRE_DEAD_LETTER_DIR", path.join(dir, "dead-letter"));
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
  removeTempDir(dir);
});

describe("parseRunArgs", () => {
  it("collects typed and untyped documents", () => {
    const parsed = parseRunArgs(["--primary", "appeal.txt", "--supporting", "ruling.txt", "notes.txt"]);

    expect(parsed.runId).toBeNull();
    expect(parsed.inputs).toEqual([
      { path: "appeal.txt", type: "PRIMARY" },
      { path: "ruling.txt", type: "SUPPORTING" },
      { path: "notes.txt" },
    ]);
  });

  it("takes an explicit run id", () => {
    expect(parseRunArgs(["--run-id", "run-cli", "a.txt"]).runId).toBe("run-cli");
  });

  it("rejects a flag without a value", () => {
    expect(() => parseRunArgs(["--primary"])).toThrow(ConfigurationError);
    expect(() => parseRunArgs(["--primary", "--supporting", "b.txt"])).toThrow("--primary needs a value");
  });

  it("rejects unknown options and empty runs", () => {
    expect(() => parseRunArgs(["--verbose", "a.txt"])).toThrow("Unknown option --verbose");
    expect(() => parseRunArgs([])).toThrow("run needs at least one document");
  });
});

describe("main", () => {
  it("prints usage and exits 1 without a command", async () => {
    expect(await main([])).toBe(1);
  });

  it("exits 0 for --help", async () => {
    expect(await main(["--help"])).toBe(0);
  });

  it("exits 1 for an unknown command", async () => {
    expect(await main(["frobnicate"])).toBe(1);
  });

  it("exits 2 when resuming a run without a checkpoint", async () => {
    expect(await main(["resume", "run-missing"])).toBe(2);
    expect(console.error).toHaveBeenCalledWith("No checkpoint found for run run-missing");
  });

  it("exits 0 when inspecting a run without dead letters", async () => {
    expect(await main(["inspect-deadletter", "run-clean"])).toBe(0);
    expect(console.log).toHaveBeenCalledWith("No dead-letter records for run-clean");
  });

  it("lists active checkpoints", async () => {
    expect(await main(["checkpoints"])).toBe(0);
    expect(console.log).toHaveBeenCalledWith("No active checkpoints");

    new CheckpointStore({ dir: path.join(dir, "checkpoints"), archiveDir: path.join(dir, "archive") }).save(
      sampleState("run-open"),
    );

    expect(await main(["checkpoints"])).toBe(0);
    expect(console.log).toHaveBeenCalledWith("run-open\tSTAGE1\t2026-10-18T07:00:00.000Z");
  });

  it("clears a checkpoint and exits 2 when there is none", async () => {
    new CheckpointStore({ dir: path.join(dir, "checkpoints"), archiveDir: path.join(dir, "archive") }).save(
      sampleState("run-open"),
    );

    expect(await main(["clear-checkpoint", "run-open"])).toBe(0);
    expect(await main(["clear-checkpoint", "run-open"])).toBe(2);
    expect(console.error).toHaveBeenCalledWith("No checkpoint found for run run-open");
  });

  it("exits 1 when clear-checkpoint has no run id", async () => {
    expect(await main(["clear-checkpoint"])).toBe(1);
  });

  it("reports a disabled cache", async () => {
    expect(await main(["cache-stats"])).toBe(0);
    expect(console.log).toHaveBeenCalledWith("Response cache is disabled");
    expect(await main(["cache-clear"])).toBe(0);
  });
});
