#!/usr/bin/env npx tsx
/**
 * Command line entry point.
 *
 * Usage:
 *   npx tsx src/cli.ts run [--primary <file>] [--supporting <file>]... [--run-id <id>] [<file>...]
 *   npx tsx src/cli.ts resume <runId>
 *   npx tsx src/cli.ts inspect-deadletter <runId>
 *   npx tsx src/cli.ts checkpoints
 *   npx tsx src/cli.ts clear-checkpoint <runId>
 *   npx tsx src/cli.ts cache-stats | cache-clear
 *   npx tsx src/cli.ts housekeeping
 *
 * Files given without a flag are classified by the engine. Exit codes:
 * 0 finalized, 1 blocked, 2 dead-lettered (or unknown run id).
 */

import { createEngine, type Engine, type RunInput, type RunOutcome } from "./lib/api";
import { CheckpointNotFoundError, ConfigurationError, errorMessage } from "./lib/pipeline/errors";
import { newRunId } from "./lib/pipeline/orchestrator";
import { setAbortSignal } from "./lib/run-abort";

const USAGE = [
  "Usage:",
  "  npx tsx src/cli.ts run [--primary <file>] [--supporting <file>]... [--run-id <id>] [<file>...]",
  "  npx tsx src/cli.ts resume <runId>",
  "  npx tsx src/cli.ts inspect-deadletter <runId>",
  "  npx tsx src/cli.ts checkpoints",
  "  npx tsx src/cli.ts clear-checkpoint <runId>",
  "  npx tsx src/cli.ts cache-stats | cache-clear",
  "  npx tsx src/cli.ts housekeeping",
].join("\n");

interface RunArgs {
  runId: string | null;
  inputs: RunInput[];
}

export function parseRunArgs(args: string[]): RunArgs {
  const inputs: RunInput[] = [];
  let runId: string | null = null;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const value = args[i + 1];
    if (arg === "--primary" || arg === "--supporting" || arg === "--run-id") {
      if (value === undefined || value.startsWith("--")) {
        throw new ConfigurationError(`${arg} needs a value`);
      }
      i++;
      if (arg === "--run-id") runId = value;
      else inputs.push({ path: value, type: arg === "--primary" ? "PRIMARY" : "SUPPORTING" });
      continue;
    }
    if (arg.startsWith("--")) throw new ConfigurationError(`Unknown option ${arg}`);
    inputs.push({ path: arg });
  }

  if (inputs.length === 0) throw new ConfigurationError("run needs at least one document");
  return { runId, inputs };
}

function printOutcome(outcome: RunOutcome): void {
  console.log(`Run ${outcome.runId}: ${outcome.status} (exit ${outcome.exitCode})`);
  if (outcome.block) {
    console.log(`  Blocked at gate "${outcome.block.gate}"${outcome.block.stage ? ` in ${outcome.block.stage}` : ""}:`);
    for (const reason of outcome.block.reasons) console.log(`    - ${reason}`);
  }
  if (outcome.deadLetter) {
    console.log(`  ${outcome.deadLetter.kind} (${outcome.deadLetter.category}): ${outcome.deadLetter.message}`);
    console.log(`  Dead-letter record: ${outcome.deadLetter.file}`);
  }
  if (outcome.globalConfidence !== null) {
    console.log(`  Global confidence: ${outcome.globalConfidence}`);
  }
  for (const escalation of outcome.escalations) console.log(`  Escalation: ${escalation.reason}`);
  const usage = outcome.state.usage;
  console.log(
    `  ${usage.modelCalls} model call(s), ${usage.cacheHits} cache hit(s), ${usage.totalTokens} tokens, ` +
      `$${usage.costUsd.toFixed(4)}`,
  );
}

/** Forward Ctrl-C to the run so it blocks with a checkpoint instead of dying mid-write. */
function abortOnSigint(runId: string): () => void {
  const handler = () => setAbortSignal(runId);
  process.once("SIGINT", handler);
  return () => process.removeListener("SIGINT", handler);
}

async function dispatch(engine: Engine, command: string, args: string[]): Promise<number> {
  switch (command) {
    case "run": {
      const parsed = parseRunArgs(args);
      const runId = parsed.runId ?? newRunId(Date.now());
      const detach = abortOnSigint(runId);
      try {
        const outcome = await engine.run(parsed.inputs, { runId });
        printOutcome(outcome);
        return outcome.exitCode;
      } finally {
        detach();
      }
    }
    case "resume": {
      const runId = args[0];
      if (!runId) throw new ConfigurationError("resume needs a run id");
      const detach = abortOnSigint(runId);
      try {
        const outcome = await engine.resume(runId);
        printOutcome(outcome);
        return outcome.exitCode;
      } finally {
        detach();
      }
    }
    case "inspect-deadletter": {
      const runId = args[0];
      if (!runId) throw new ConfigurationError("inspect-deadletter needs a run id");
      const report = engine.inspectDeadLetter(runId);
      if (report.records.length === 0) {
        console.log(`No dead-letter records for ${runId}`);
        return 0;
      }
      console.log(JSON.stringify(report.records, null, 2));
      return 0;
    }
    case "checkpoints": {
      const summaries = engine.listCheckpoints();
      if (summaries.length === 0) console.log("No active checkpoints");
      for (const s of summaries) console.log(`${s.runId}\t${s.status}\t${s.updatedAt}`);
      return 0;
    }
    case "clear-checkpoint": {
      const runId = args[0];
      if (!runId) throw new ConfigurationError("clear-checkpoint needs a run id");
      if (!engine.clearCheckpoint(runId)) throw new CheckpointNotFoundError(runId);
      return 0;
    }
    case "cache-stats": {
      const stats = await engine.cacheStats();
      console.log(stats ? JSON.stringify(stats, null, 2) : "Response cache is disabled");
      return 0;
    }
    case "cache-clear":
      await engine.clearCache();
      return 0;
    case "housekeeping":
      await engine.housekeeping();
      return 0;
    default:
      throw new ConfigurationError(`Unknown command "${command}"`);
  }
}

export async function main(argv: string[]): Promise<number> {
  const [command, ...args] = argv;
  if (!command || command === "--help" || command === "-h") {
    console.log(USAGE);
    return command ? 0 : 1;
  }

  let engine: Engine | null = null;
  try {
    engine = createEngine();
    return await dispatch(engine, command, args);
  } catch (err) {
    if (err instanceof CheckpointNotFoundError) {
      console.error(err.message);
      return 2;
    }
    if (err instanceof ConfigurationError) {
      console.error(`${err.message}\n\n${USAGE}`);
      return 1;
    }
    throw err;
  } finally {
    if (engine) await engine.close();
  }
}

const invokedDirectly = process.argv[1] !== undefined && import.meta.url.endsWith(process.argv[1].replace(/\\/g, "/"));

if (invokedDirectly) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(`Fatal: ${errorMessage(err)}`);
      process.exitCode = 2;
    },
  );
}
