/**
 * A small appeal / ruling pair with model answers whose evidence quotes are
 * taken verbatim from the texts, so every gate passes unless a test changes
 * an answer.
 */

import fs from "fs";
import os from "os";
import path from "path";
import { DEFAULT_ENGINE_CONFIG, EngineConfigSchema, type EngineConfig } from "@/lib/config-schemas";
import type { RunInput } from "@/lib/api";
import { StaticInstructionSource } from "@/lib/pipeline/instructions";
import type { ModelRequest, ProviderResponse } from "@/lib/pipeline/model-client";
import { contextOf, reply, taskOf } from "./fake-provider";

export const APPEAL_TEXT = [
  "RECURSO ESPECIAL",
  "Processo n. 1234567-89.2020.8.26.0100",
  "Recorrente: Construtora Alfa Ltda.",
  "Recorrido: Banco Beta S.A.",
  "",
  "DA PRESCRIÇÃO",
  "A recorrente sustenta que a pretensão de cobrança está prescrita.",
  "A decisão recorrida afastou a prescrição trienal e aplicou o prazo decenal.",
  "A matéria foi prequestionada e não depende de reexame de provas.",
  "",
  "DOS PEDIDOS",
  "Requer o conhecimento e o provimento do recurso especial.",
].join("\n");

export const RULING_TEXT = [
  "ACÓRDÃO",
  "Vistos, relatados e discutidos estes autos.",
  "A turma negou provimento ao recurso, aplicando a Súmula 7/STJ.",
  "Não se admite o reexame de provas em sede especial.",
].join("\n");

export const THEME_ID = "prescricao";

function field(content: string, quote: string, confidence = 0.9) {
  return { content, evidence: { quote, page: 1, anchor: "p1" }, confidence };
}

export const STAGE1_ANSWER = {
  fields: {
    case_number: field("1234567-89.2020.8.26.0100", "Processo n. 1234567-89.2020.8.26.0100"),
    appellant: field("Construtora Alfa Ltda.", "Recorrente: Construtora Alfa Ltda."),
    appeal_type: field("Recurso especial", "RECURSO ESPECIAL"),
  },
  inconclusive: false,
};

export const THEME_LIST_ANSWER = { themes: [{ id: THEME_ID, title: "Prescrição" }] };

export const THEME_ANSWER = {
  fields: {
    disputed_matter: field("Prescrição da pretensão", "A recorrente sustenta que a pretensão de cobrança está prescrita."),
    holding: field("Prazo decenal aplicado", "A decisão recorrida afastou a prescrição trienal e aplicou o prazo decenal."),
    transcript_excerpt: field("Sem reexame de provas", "A matéria foi prequestionada e não depende de reexame de provas."),
  },
  citations: ["Súmula 7/STJ"],
  confidence: 0.9,
};

export const STAGE3_ANSWER = {
  decision: "NOT_ADMITTED",
  fields: {
    reasoning: field("Reexame de provas vedado", "Não se admite o reexame de provas em sede especial."),
  },
  citations: ["Súmula 7/STJ"],
  transcript: "A turma negou provimento ao recurso, aplicando a Súmula 7/STJ.",
};

export const CLASSIFICATION_ANSWER = { type: "UNKNOWN", confidence: 0 };

export type AnswerOverrides = Partial<Record<string, unknown>>;

/** Answer every task with the fixture answer, or the override for that task. */
export function reviewResponder(overrides: AnswerOverrides = {}): (request: ModelRequest) => ProviderResponse {
  const answers: Record<string, unknown> = {
    classification: CLASSIFICATION_ANSWER,
    stage1: STAGE1_ANSWER,
    "stage1 (independent second pass)": STAGE1_ANSWER,
    "stage2:identify_themes": THEME_LIST_ANSWER,
    "stage2:analyze_theme": THEME_ANSWER,
    stage3: STAGE3_ANSWER,
    ...overrides,
  };
  return (request) => {
    const task = taskOf(request);
    if (!(task in answers)) throw new Error(`No scripted answer for task "${task}"`);
    return reply(answers[task]);
  };
}

/** Theme id named in an analyze-theme request. */
export function themeOf(request: ModelRequest): string | null {
  const context = contextOf(request);
  if (typeof context !== "object" || context === null || !("theme" in context)) return null;
  const theme = context.theme;
  return typeof theme === "object" && theme !== null && "id" in theme && typeof theme.id === "string" ? theme.id : null;
}

export function reviewInputs(): RunInput[] {
  return [
    { id: "appeal", path: "appeal.txt", type: "PRIMARY", text: APPEAL_TEXT },
    { id: "ruling", path: "ruling.txt", type: "SUPPORTING", text: RULING_TEXT },
  ];
}

export function testInstructions(version = "2026.10.1"): StaticInstructionSource {
  return new StaticInstructionSource({
    classification: { text: "Classify the document.", version },
    stage1: { text: "Extract the procedural facts.", version },
    stage2: { text: "Identify and analyze themes.", version },
    stage3: { text: "Decide admissibility.", version },
  });
}

export function makeTempDir(prefix = "sre-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** Defaults with storage under `dir`, caching off and fast timeouts; `customize` edits the copy. */
export function testConfig(dir: string, customize?: (config: EngineConfig) => void): EngineConfig {
  const config = EngineConfigSchema.parse(structuredClone(DEFAULT_ENGINE_CONFIG));
  config.cache = { enabled: false, dbPath: path.join(dir, "cache.db"), ttlHours: 24 };
  config.storage = {
    ...config.storage,
    checkpointDir: path.join(dir, "checkpoints"),
    archiveDir: path.join(dir, "archive"),
    deadLetterDir: path.join(dir, "dead-letter"),
  };
  config.instructions = { dir: path.join(dir, "prompts") };
  config.client = { ...config.client, backoffBaseMs: 1, backoffMaxMs: 5 };
  customize?.(config);
  return EngineConfigSchema.parse(config);
}

export const noSleep = async (): Promise<void> => {};
