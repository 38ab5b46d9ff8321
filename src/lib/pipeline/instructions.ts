/**
 * Instruction File Loader
 *
 * Loads per-stage instruction text from `<dir>/<profile>/<stage>.prompt.md`,
 * falling back to `<dir>/<stage>.prompt.md`. The version comes from YAML
 * frontmatter (`version: "1.2.0"`) or an HTML comment (`<!-- version: 1.2.0 -->`).
 *
 * The cache is read-through and keyed by content hash, not modification
 * time: an edited file yields a new hash, so the next load returns the new
 * instruction set and every response cached under the old version misses.
 *
 * @module pipeline/instructions
 */

import { readFile } from "fs/promises";
import { createHash } from "crypto";
import path from "path";
import type { InstructionSet, InstructionSource } from "./collaborators";
import type { InstructionStageId, PromptSignature } from "./types";

// ============================================================================
// PARSING
// ============================================================================

export function hashContent(content: string): string {
  return createHash("sha256").update(content, "utf8").digest("hex");
}

/** Declared version, or null when the file carries none. */
export function parseInstructionVersion(content: string): string | null {
  const frontmatterMatch = content.match(/^---\r?\n([\s\S]*?)\r?\n---/);
  if (frontmatterMatch) {
    const versionMatch = frontmatterMatch[1].match(/^version:\s*["']?([^"'\r\n]+)/m);
    if (versionMatch) return versionMatch[1].trim();
  }
  const commentMatch = content.match(/<!--\s*version:\s*([^\s>]+)\s*-->/i);
  return commentMatch ? commentMatch[1].trim() : null;
}

/** Instruction body without frontmatter. */
export function stripFrontmatter(content: string): string {
  return content.replace(/^---\r?\n[\s\S]*?\r?\n---\r?\n?/, "").trim();
}

// ============================================================================
// FILE SOURCE
// ============================================================================

export class FileInstructionSource implements InstructionSource {
  /** `stage:profile:contentHash` → parsed set. */
  private readonly byHash = new Map<string, InstructionSet>();

  constructor(private readonly dir: string) {}

  private async readFirst(candidates: string[]): Promise<{ filePath: string; content: string }> {
    for (const filePath of candidates) {
      try {
        return { filePath, content: await readFile(filePath, "utf-8") };
      } catch (err) {
        if (err instanceof Error && "code" in err && err.code === "ENOENT") continue;
        throw err;
      }
    }
    throw new Error(`No instruction file found (tried ${candidates.join(", ")})`);
  }

  async load(stageId: InstructionStageId, profile: string): Promise<InstructionSet> {
    const fileName = `${stageId}.prompt.md`;
    const { filePath, content } = await this.readFirst([
      path.resolve(this.dir, profile, fileName),
      path.resolve(this.dir, fileName),
    ]);

    const contentHash = hashContent(content);
    const cacheKey = `${stageId}:${profile}:${contentHash}`;
    const cached = this.byHash.get(cacheKey);
    if (cached) return cached;

    const version = parseInstructionVersion(content) ?? "unversioned";
    const set: InstructionSet = {
      stageId,
      profile,
      text: stripFrontmatter(content),
      version,
      contentHash,
    };
    this.byHash.set(cacheKey, set);
    console.log(`[Instructions] Loaded ${stageId} v${version} (${contentHash.slice(0, 12)}) from ${filePath}`);
    return set;
  }
}

/** Fixed in-memory instructions, for embedding and tests. */
export class StaticInstructionSource implements InstructionSource {
  constructor(private readonly texts: Partial<Record<InstructionStageId, { text: string; version: string }>>) {}

  async load(stageId: InstructionStageId, profile: string): Promise<InstructionSet> {
    const entry = this.texts[stageId];
    if (!entry) throw new Error(`No instructions configured for ${stageId}`);
    return { stageId, profile, text: entry.text, version: entry.version, contentHash: hashContent(entry.text) };
  }
}

// ============================================================================
// SIGNATURE
// ============================================================================

/** Version string that keys the response cache: any text change changes it. */
export function cacheVersionOf(set: InstructionSet): string {
  return `${set.version}@${set.contentHash.slice(0, 12)}`;
}

/**
 * Prompt signature of a run: sha256 over the sorted `stage:hash` lines;
 * version is the single shared version or `composite:<v1>,<v2>`.
 */
export function computePromptSignature(profile: string, sets: InstructionSet[]): PromptSignature {
  const ordered = [...sets].sort((a, b) => a.stageId.localeCompare(b.stageId));
  const stages: Record<string, string> = {};
  for (const set of ordered) stages[set.stageId] = set.contentHash;

  const hash = hashContent(ordered.map((set) => `${set.stageId}:${set.contentHash}`).join("\n"));
  const versions = [...new Set(ordered.map((set) => set.version))].sort();
  const version = versions.length === 1 ? versions[0] : `composite:${versions.join(",")}`;

  return { profile, version, hash, stages };
}
