/**
 * Quality Gates
 *
 * Pure, deterministic gate functions evaluated between pipeline states:
 * - Extraction: document quality and noise
 * - Classification: exactly one PRIMARY, enough SUPPORTING documents
 * - Coverage: chunked documents keep enough of their source
 * - Stage gates, dispatched by payload tag:
 *     field evidence for critical fields, known-set citations,
 *     inconclusive results, and stage-3 coherence with stage 2
 *
 * Verdict precedence: BLOCK > RETRY > ESCALATE > PASS. Evidence failures are
 * RETRY while the stage has attempts left and BLOCK on the last one;
 * coherence and inconclusive failures always BLOCK.
 *
 * @module pipeline/quality-gates
 */

import type { ConfidenceConfig, GateConfig } from "../config-schemas";
import {
  calibrateFields,
  checkRatio,
  fieldEscalations,
  round3,
  scoreStageConfidence,
  themeEscalations,
  type FieldCheck,
} from "./confidence";
import type { ReferenceTaxonomy } from "./taxonomy";
import type {
  ChunkPlan,
  Escalation,
  FieldValue,
  GateFailure,
  GateReport,
  GateVerdict,
  InputDocument,
  Stage1Payload,
  Stage2Payload,
  Stage3Payload,
  StagePayload,
  ThemeResult,
} from "./types";

// ============================================================================
// VERDICTS
// ============================================================================

export function combineVerdicts(failures: GateFailure[], escalations: Escalation[]): GateVerdict {
  if (failures.some((f) => f.verdict === "BLOCK")) return "BLOCK";
  if (failures.length > 0) return "RETRY";
  if (escalations.length > 0) return "ESCALATE";
  return "PASS";
}

function report(failures: GateFailure[], escalations: Escalation[], checksTotal: number, checksFailed: number): GateReport {
  return { verdict: combineVerdicts(failures, escalations), failures, escalations, checksTotal, checksFailed };
}

// ============================================================================
// EVIDENCE MATCHING
// ============================================================================

/** Lower-cased, accent-free, punctuation-free, single-spaced. */
export function normalizeForMatch(text: string): string {
  return text
    .normalize("NFKD")
    .replace(/[̀-ͯ]/g, "")
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, " ")
    .trim();
}

/** Verbatim substring, else normalized substring. An empty quote never matches. */
export function evidenceMatches(quote: string, source: string): boolean {
  const trimmed = quote.trim();
  if (!trimmed) return false;
  if (source.includes(trimmed)) return true;
  const normalized = normalizeForMatch(trimmed);
  return normalized.length > 0 && normalizeForMatch(source).includes(normalized);
}

// ============================================================================
// EXTRACTION GATE
// ============================================================================

/** Mean page quality and the share of pages under the noise floor. */
export function documentQuality(pageQuality: number[], pageNoiseFloor: number): { qualityScore: number; noiseRatio: number } {
  if (pageQuality.length === 0) return { qualityScore: 0, noiseRatio: 1 };
  const mean = pageQuality.reduce((sum, q) => sum + q, 0) / pageQuality.length;
  const noisy = pageQuality.filter((q) => q < pageNoiseFloor).length;
  return { qualityScore: round3(mean), noiseRatio: round3(noisy / pageQuality.length) };
}

export function evaluateExtractionGate(documents: InputDocument[], config: GateConfig): GateReport {
  const failures: GateFailure[] = [];
  let checksTotal = 0;

  for (const doc of documents) {
    checksTotal += 3;
    if (!doc.extractedText || doc.extractedText.trim() === "") {
      failures.push({ gate: "extraction", verdict: "BLOCK", reason: `Document ${doc.id}: no extractable text` });
    }
    const quality = doc.qualityScore ?? 0;
    if (quality < config.minQualityScore) {
      failures.push({
        gate: "extraction",
        verdict: "BLOCK",
        reason: `Document ${doc.id}: quality score ${quality.toFixed(3)} below minimum ${config.minQualityScore}`,
      });
    }
    const noise = doc.noiseRatio ?? 1;
    if (noise > config.maxNoiseRatio) {
      failures.push({
        gate: "extraction",
        verdict: "BLOCK",
        reason: `Document ${doc.id}: noise ratio ${noise.toFixed(3)} above maximum ${config.maxNoiseRatio}`,
      });
    }
  }

  if (documents.length === 0) {
    checksTotal += 1;
    failures.push({ gate: "extraction", verdict: "BLOCK", reason: "No input documents" });
  }

  return report(failures, [], checksTotal, failures.length);
}

// ============================================================================
// CLASSIFICATION GATE
// ============================================================================

export function evaluateClassificationGate(documents: InputDocument[], config: GateConfig): GateReport {
  const failures: GateFailure[] = [];
  const primary = documents.filter((d) => d.type === "PRIMARY");
  const supporting = documents.filter((d) => d.type === "SUPPORTING");

  if (primary.length !== 1) {
    const ids = primary.length > 0 ? ` (${primary.map((d) => d.id).join(", ")})` : "";
    failures.push({
      gate: "classification",
      verdict: "BLOCK",
      reason: `Expected exactly 1 PRIMARY document, found ${primary.length}${ids}`,
    });
  }
  if (supporting.length < config.minSupportingDocuments) {
    failures.push({
      gate: "classification",
      verdict: "BLOCK",
      reason: `Expected at least ${config.minSupportingDocuments} SUPPORTING document(s), found ${supporting.length}`,
    });
  }

  return report(failures, [], 2, failures.length);
}

// ============================================================================
// COVERAGE GATE
// ============================================================================

export function evaluateCoverageGate(plans: Record<string, ChunkPlan>, minCoverageRatio: number): GateReport {
  const failures: GateFailure[] = [];
  const entries = Object.entries(plans);
  for (const [key, plan] of entries) {
    if (plan.chunked && plan.coverageRatio < minCoverageRatio) {
      failures.push({
        gate: "coverage",
        verdict: "BLOCK",
        reason: `${key}: coverage ${plan.coverageRatio.toFixed(4)} below minimum ${minCoverageRatio} (${plan.chunks.length} chunks)`,
      });
    }
  }
  return report(failures, [], entries.length, failures.length);
}

// ============================================================================
// FIELD EVIDENCE
// ============================================================================

const CHECKS_PER_FIELD = 6;

/**
 * Six checks per field: present, evidence attached, non-empty quote, page
 * number, anchor, quote found in the source. Only presence, evidence, quote
 * and match fail the gate; page and anchor only lower confidence.
 */
export function checkField(field: FieldValue | undefined, source: string): { check: FieldCheck; problem: string | null } {
  if (!field) return { check: { passed: 0, total: CHECKS_PER_FIELD }, problem: "missing" };
  const evidence = field.evidence;
  if (!evidence) return { check: { passed: 1, total: CHECKS_PER_FIELD }, problem: "no evidence locator" };

  const hasQuote = evidence.quote.trim().length > 0;
  const matched = hasQuote && evidenceMatches(evidence.quote, source);
  const passed =
    2 + Number(hasQuote) + Number(evidence.page !== null && evidence.page >= 1) + Number(evidence.anchor.trim() !== "") + Number(matched);

  let problem: string | null = null;
  if (!hasQuote) problem = "empty evidence quote";
  else if (!matched) problem = `evidence quote not found in source ("${evidence.quote.trim().slice(0, 60)}")`;
  return { check: { passed, total: CHECKS_PER_FIELD }, problem };
}

interface FieldGateResult {
  failures: GateFailure[];
  checks: Record<string, FieldCheck>;
}

/**
 * Check every field of a map; a problem on a critical field (including its
 * absence) is a gate failure.
 */
export function evaluateFieldEvidence(
  fields: Record<string, FieldValue>,
  criticalFields: string[],
  source: string,
  retryVerdict: "RETRY" | "BLOCK",
  prefix = "",
): FieldGateResult {
  const failures: GateFailure[] = [];
  const checks: Record<string, FieldCheck> = {};
  const names = [...new Set([...criticalFields, ...Object.keys(fields)])];

  for (const name of names) {
    const { check, problem } = checkField(fields[name], source);
    checks[`${prefix}${name}`] = check;
    if (problem && criticalFields.includes(name)) {
      failures.push({ gate: "field_evidence", verdict: retryVerdict, reason: `Field "${prefix}${name}": ${problem}` });
    }
  }
  return { failures, checks };
}

export function evaluateKnownSet(
  citations: string[],
  taxonomy: ReferenceTaxonomy,
  retryVerdict: "RETRY" | "BLOCK",
  label: string,
): GateFailure[] {
  return citations
    .filter((citation) => !taxonomy.isRecognized(citation))
    .map((citation) => ({
      gate: "known_set" as const,
      verdict: retryVerdict,
      reason: `${label}: citation "${citation}" is not in taxonomy ${taxonomy.version}`,
    }));
}

// ============================================================================
// COHERENCE GATE (stage 3)
// ============================================================================

export function evaluateCoherence(
  payload: Stage3Payload,
  stage2: Stage2Payload | null,
  supportingText: string,
  taxonomy: ReferenceTaxonomy,
): GateFailure[] {
  const failures: GateFailure[] = [];
  const upstream = new Set<string>();
  for (const theme of Object.values(stage2?.themes ?? {})) {
    for (const citation of theme.citations) upstream.add(taxonomy.normalize(citation));
  }

  for (const citation of payload.citations) {
    if (!upstream.has(taxonomy.normalize(citation))) {
      failures.push({
        gate: "coherence",
        verdict: "BLOCK",
        reason: `Stage 3 cites "${citation}", which is absent from the stage 2 payload`,
      });
    }
  }

  if (payload.transcript !== null && !evidenceMatches(payload.transcript, supportingText)) {
    failures.push({
      gate: "coherence",
      verdict: "BLOCK",
      reason: `Transcript segment not found in supporting text ("${payload.transcript.trim().slice(0, 60)}")`,
    });
  }
  return failures;
}

// ============================================================================
// STAGE DISPATCH
// ============================================================================

export interface StageSources {
  /** Text of the PRIMARY document. */
  primary: string;
  /** Concatenated SUPPORTING documents. */
  supporting: string;
}

export interface StageGateInput {
  payload: StagePayload;
  sources: StageSources;
  /** Latest PASS payload of stage 2; stage 3 coherence compares against it. */
  stage2: Stage2Payload | null;
  gates: GateConfig;
  confidence: ConfidenceConfig;
  taxonomy: ReferenceTaxonomy;
  /** 1-based attempt of this stage. */
  attempt: number;
}

export interface StageGateResult {
  report: GateReport;
  /** Payload with field and theme confidence calibrated against the checks. */
  payload: StagePayload;
  confidence: number;
}

export function evaluateStageGate(input: StageGateInput): StageGateResult {
  const retryVerdict = input.attempt < input.gates.maxGateAttempts ? "RETRY" : "BLOCK";
  switch (input.payload.stage) {
    case "stage1":
      return gateStage1(input.payload, input, retryVerdict);
    case "stage2":
      return gateStage2(input.payload, input, retryVerdict);
    case "stage3":
      return gateStage3(input.payload, input, retryVerdict);
  }
}

function tally(checks: Record<string, FieldCheck>, extraFailed: number, extraTotal: number): { failed: number; total: number } {
  let failed = extraFailed;
  let total = extraTotal;
  for (const check of Object.values(checks)) {
    failed += check.total - check.passed;
    total += check.total;
  }
  return { failed, total };
}

function gateStage1(payload: Stage1Payload, input: StageGateInput, retryVerdict: "RETRY" | "BLOCK"): StageGateResult {
  const critical = input.gates.criticalFields.stage1;
  const { failures, checks } = evaluateFieldEvidence(payload.fields, critical, input.sources.primary, retryVerdict);
  if (payload.inconclusive) {
    failures.push({ gate: "inconclusive", verdict: "BLOCK", reason: "Stage 1 reported an inconclusive result" });
  }

  const fields = calibrateFields(payload.fields, checks);
  const escalations = fieldEscalations("stage1", fields, critical, input.confidence.fieldThreshold);
  const { failed, total } = tally(checks, Number(payload.inconclusive), 1);

  return {
    report: report(failures, escalations, total, failed),
    payload: { ...payload, fields },
    confidence: scoreStageConfidence(failed, total, payload.inconclusive),
  };
}

function gateStage2(payload: Stage2Payload, input: StageGateInput, retryVerdict: "RETRY" | "BLOCK"): StageGateResult {
  const critical = input.gates.criticalFields.stage2;
  const failures: GateFailure[] = [];
  const checks: Record<string, FieldCheck> = {};
  const themes: Record<string, ThemeResult> = {};
  let knownSetTotal = 0;
  let knownSetFailed = 0;

  const themeIds = Object.keys(payload.themes);
  if (themeIds.length === 0) {
    failures.push({ gate: "field_evidence", verdict: retryVerdict, reason: "Stage 2 identified no themes" });
  }

  for (const id of themeIds) {
    const theme = payload.themes[id];
    if (theme.status === "escalated") {
      themes[id] = theme;
      continue;
    }

    const prefix = `${id}.`;
    const result = evaluateFieldEvidence(theme.fields, critical, input.sources.primary, retryVerdict, prefix);
    failures.push(...result.failures);
    Object.assign(checks, result.checks);

    const citationFailures = evaluateKnownSet(theme.citations, input.taxonomy, retryVerdict, `Theme "${id}"`);
    failures.push(...citationFailures);
    knownSetTotal += theme.citations.length;
    knownSetFailed += citationFailures.length;

    const themeChecks = Object.values(result.checks);
    const passed = themeChecks.reduce((sum, c) => sum + c.passed, 0);
    const total = themeChecks.reduce((sum, c) => sum + c.total, 0);
    themes[id] = {
      ...theme,
      fields: calibrateFields(theme.fields, result.checks, prefix),
      confidence: round3(Math.min(theme.confidence, checkRatio({ passed, total }))),
    };
  }

  const escalations = [
    ...themeEscalations(themes, input.confidence.themeThreshold),
    ...Object.entries(themes)
      .filter(([, theme]) => theme.status === "complete")
      .flatMap(([id, theme]) => fieldEscalations("stage2", theme.fields, critical, input.confidence.fieldThreshold, `${id}.`)),
  ];
  const escalatedCount = Object.values(themes).filter((t) => t.status === "escalated").length;
  const { failed, total } = tally(checks, knownSetFailed + escalatedCount, knownSetTotal + escalatedCount);

  return {
    report: report(failures, escalations, total, failed),
    payload: { ...payload, themes },
    confidence: scoreStageConfidence(failed, total, false),
  };
}

/** Labels of the explanation parts an INCONCLUSIVE decision leaves out. */
function missingExplanation(payload: Stage3Payload): string[] {
  const parts: Array<[string, string | null]> = [
    ["warning", payload.warning],
    ["reason code", payload.reasonCode],
    ["reason description", payload.reasonDescription],
  ];
  return parts.filter(([, value]) => value === null || value.trim() === "").map(([label]) => label);
}

function gateStage3(payload: Stage3Payload, input: StageGateInput, retryVerdict: "RETRY" | "BLOCK"): StageGateResult {
  const critical = input.gates.criticalFields.stage3;
  const evidenceSource = `${input.sources.primary}\n\n${input.sources.supporting}`;
  const { failures, checks } = evaluateFieldEvidence(payload.fields, critical, evidenceSource, retryVerdict);

  const knownSetFailures = evaluateKnownSet(payload.citations, input.taxonomy, retryVerdict, "Stage 3");
  const coherenceFailures = evaluateCoherence(payload, input.stage2, input.sources.supporting, input.taxonomy);
  failures.push(...knownSetFailures, ...coherenceFailures);

  // An INCONCLUSIVE decision stands only with its warning and reason; the
  // run then finalizes under the inconclusive confidence cap.
  const inconclusive = payload.decision === "INCONCLUSIVE";
  const missing = inconclusive ? missingExplanation(payload) : [];
  for (const part of missing) {
    failures.push({ gate: "inconclusive", verdict: retryVerdict, reason: `INCONCLUSIVE decision has no ${part}` });
  }

  const fields = calibrateFields(payload.fields, checks);
  const escalations = fieldEscalations("stage3", fields, critical, input.confidence.fieldThreshold);
  const coherenceChecks = payload.citations.length + (payload.transcript !== null ? 1 : 0);
  const { failed, total } = tally(
    checks,
    knownSetFailures.length + coherenceFailures.length + missing.length,
    payload.citations.length + coherenceChecks + 1 + (inconclusive ? 3 : 0),
  );
  const confidence = scoreStageConfidence(failed, total, inconclusive);

  if (inconclusive && missing.length === 0) {
    escalations.push({
      stage: "stage3",
      target: "decision",
      confidence,
      threshold: 1,
      reason: `Stage 3 decision is INCONCLUSIVE (${payload.reasonCode}): ${payload.reasonDescription}`,
    });
  }

  return {
    report: report(failures, escalations, total, failed),
    payload: { ...payload, fields },
    confidence,
  };
}
