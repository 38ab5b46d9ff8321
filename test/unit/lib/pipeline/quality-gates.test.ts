/**
 * Quality Gate Tests
 *
 * @module pipeline/quality-gates.test
 */

import { describe, expect, it } from "vitest";
import { DEFAULT_ENGINE_CONFIG } from "@/lib/config-schemas";
import { toFieldMap } from "@/lib/pipeline/payloads";
import {
  checkField,
  combineVerdicts,
  documentQuality,
  evaluateClassificationGate,
  evaluateExtractionGate,
  evaluateFieldEvidence,
  evaluateStageGate,
  evidenceMatches,
  normalizeForMatch,
  type StageGateInput,
} from "@/lib/pipeline/quality-gates";
import { CitationTaxonomy } from "@/lib/pipeline/taxonomy";
import type { FieldValue, InputDocument, Stage2Payload, Stage3Payload, StagePayload } from "@/lib/pipeline/types";
import {
  APPEAL_TEXT,
  RULING_TEXT,
  STAGE1_ANSWER,
  STAGE3_ANSWER,
  THEME_ANSWER,
  THEME_ID,
} from "@test/helpers/review-fixture";

const taxonomy = CitationTaxonomy.fromFile();

function doc(overrides: Partial<InputDocument>): InputDocument {
  return {
    id: "d",
    sourcePath: "d.txt",
    type: "PRIMARY",
    extractedText: "Texto.",
    pageCount: 1,
    pageQuality: [1],
    qualityScore: 1,
    noiseRatio: 0,
    classification: null,
    ...overrides,
  };
}

function evidence(quote: string, page: number | null = 1, anchor = "p1", confidence = 0.9): FieldValue {
  return { content: "x", evidence: { quote, page, anchor }, confidence };
}

function stage2Payload(): Stage2Payload {
  return {
    stage: "stage2",
    themes: {
      [THEME_ID]: {
        title: "Prescrição",
        status: "complete",
        fields: toFieldMap(THEME_ANSWER.fields),
        citations: THEME_ANSWER.citations,
        confidence: THEME_ANSWER.confidence,
      },
    },
  };
}

function gateInput(payload: StagePayload, attempt = 1): StageGateInput {
  return {
    payload,
    sources: { primary: APPEAL_TEXT, supporting: RULING_TEXT },
    stage2: stage2Payload(),
    gates: DEFAULT_ENGINE_CONFIG.gates,
    confidence: DEFAULT_ENGINE_CONFIG.confidence,
    taxonomy,
    attempt,
  };
}

describe("combineVerdicts", () => {
  it("orders BLOCK over RETRY over ESCALATE over PASS", () => {
    const escalation = { stage: "stage1", target: "a", confidence: 0.1, threshold: 0.75, reason: "r" };
    expect(
      combineVerdicts(
        [
          { gate: "field_evidence", verdict: "RETRY", reason: "r" },
          { gate: "coherence", verdict: "BLOCK", reason: "b" },
        ],
        [escalation],
      ),
    ).toBe("BLOCK");
    expect(combineVerdicts([{ gate: "field_evidence", verdict: "RETRY", reason: "r" }], [escalation])).toBe("RETRY");
    expect(combineVerdicts([], [escalation])).toBe("ESCALATE");
    expect(combineVerdicts([], [])).toBe("PASS");
  });
});

describe("evidence matching", () => {
  it("normalizes accents, case and punctuation", () => {
    expect(normalizeForMatch("Prescrição, TRIENAL!")).toBe("prescricao trienal");
  });

  it("matches verbatim and normalized quotes", () => {
    expect(evidenceMatches("Recorrente: Construtora Alfa Ltda.", APPEAL_TEXT)).toBe(true);
    expect(evidenceMatches("prescricao trienal", APPEAL_TEXT)).toBe(true);
    expect(evidenceMatches("prescrição quinquenal", APPEAL_TEXT)).toBe(false);
    expect(evidenceMatches("   ", APPEAL_TEXT)).toBe(false);
  });
});

describe("evaluateExtractionGate", () => {
  it("averages page quality and counts noisy pages", () => {
    expect(documentQuality([0.9, 0.2, 0.5, 0.1], 0.3)).toEqual({ qualityScore: 0.425, noiseRatio: 0.5 });
    expect(documentQuality([], 0.3)).toEqual({ qualityScore: 0, noiseRatio: 1 });
  });

  it("blocks an empty, low-quality, noisy document", () => {
    const gate = evaluateExtractionGate(
      [doc({ extractedText: "", qualityScore: 0.1, noiseRatio: 0.96 })],
      DEFAULT_ENGINE_CONFIG.gates,
    );

    expect(gate.verdict).toBe("BLOCK");
    expect(gate.failures.map((f) => f.reason)).toEqual([
      "Document d: no extractable text",
      "Document d: quality score 0.100 below minimum 0.2",
      "Document d: noise ratio 0.960 above maximum 0.95",
    ]);
    expect(gate.checksTotal).toBe(3);
    expect(gate.checksFailed).toBe(3);
  });

  it("blocks a run without documents", () => {
    expect(evaluateExtractionGate([], DEFAULT_ENGINE_CONFIG.gates).failures.map((f) => f.reason)).toEqual([
      "No input documents",
    ]);
  });

  it("passes clean documents", () => {
    expect(evaluateExtractionGate([doc({})], DEFAULT_ENGINE_CONFIG.gates).verdict).toBe("PASS");
  });
});

describe("evaluateClassificationGate", () => {
  it("passes one PRIMARY with one SUPPORTING", () => {
    const gate = evaluateClassificationGate(
      [doc({ id: "a" }), doc({ id: "b", type: "SUPPORTING" })],
      DEFAULT_ENGINE_CONFIG.gates,
    );
    expect(gate.verdict).toBe("PASS");
    expect(gate.checksTotal).toBe(2);
  });

  it("does not count UNKNOWN documents", () => {
    const gate = evaluateClassificationGate(
      [doc({ id: "a" }), doc({ id: "b", type: "UNKNOWN" })],
      DEFAULT_ENGINE_CONFIG.gates,
    );
    expect(gate.failures.map((f) => f.reason)).toEqual(["Expected at least 1 SUPPORTING document(s), found 0"]);
  });
});

describe("checkField", () => {
  it("runs six checks per field", () => {
    expect(checkField(undefined, APPEAL_TEXT)).toEqual({ check: { passed: 0, total: 6 }, problem: "missing" });
    expect(checkField({ content: "x", evidence: null, confidence: 1 }, APPEAL_TEXT)).toEqual({
      check: { passed: 1, total: 6 },
      problem: "no evidence locator",
    });
    expect(checkField(evidence("RECURSO ESPECIAL"), APPEAL_TEXT)).toEqual({ check: { passed: 6, total: 6 }, problem: null });
  });

  it("lowers the score without failing for a missing page or anchor", () => {
    expect(checkField(evidence("RECURSO ESPECIAL", null, ""), APPEAL_TEXT)).toEqual({
      check: { passed: 4, total: 6 },
      problem: null,
    });
  });

  it("flags empty and unmatched quotes", () => {
    expect(checkField(evidence(" "), APPEAL_TEXT).problem).toBe("empty evidence quote");
    expect(checkField(evidence("Recurso extraordinário"), APPEAL_TEXT)).toEqual({
      check: { passed: 5, total: 6 },
      problem: 'evidence quote not found in source ("Recurso extraordinário")',
    });
  });
});

describe("evaluateFieldEvidence", () => {
  it("fails only critical fields", () => {
    const result = evaluateFieldEvidence(
      { a: evidence("RECURSO ESPECIAL"), c: { content: "x", evidence: null, confidence: 1 } },
      ["a", "b"],
      APPEAL_TEXT,
      "RETRY",
    );

    expect(result.failures).toEqual([{ gate: "field_evidence", verdict: "RETRY", reason: 'Field "b": missing' }]);
    expect(Object.keys(result.checks)).toEqual(["a", "b", "c"]);
  });
});

describe("evaluateStageGate", () => {
  it("passes the fixture stage 1 answer", () => {
    const result = evaluateStageGate(
      gateInput({ stage: "stage1", fields: toFieldMap(STAGE1_ANSWER.fields), inconclusive: false }),
    );

    expect(result.report.verdict).toBe("PASS");
    expect(result.report.checksTotal).toBe(19);
    expect(result.report.checksFailed).toBe(0);
    expect(result.confidence).toBe(1);
  });

  it("retries a missing critical field, then blocks on the last attempt", () => {
    const { appellant: _dropped, ...fields } = STAGE1_ANSWER.fields;
    const payload: StagePayload = { stage: "stage1", fields: toFieldMap(fields), inconclusive: false };

    const first = evaluateStageGate(gateInput(payload, 1));
    expect(first.report.verdict).toBe("RETRY");
    expect(first.report.failures.map((f) => f.reason)).toEqual(['Field "appellant": missing']);
    expect(first.report.checksFailed).toBe(6);
    expect(first.confidence).toBe(0.757);

    expect(evaluateStageGate(gateInput(payload, 2)).report.verdict).toBe("BLOCK");
  });

  it("blocks an inconclusive stage 1", () => {
    const result = evaluateStageGate(
      gateInput({ stage: "stage1", fields: toFieldMap(STAGE1_ANSWER.fields), inconclusive: true }),
    );
    expect(result.report.failures).toEqual([
      { gate: "inconclusive", verdict: "BLOCK", reason: "Stage 1 reported an inconclusive result" },
    ]);
  });

  it("checks theme citations against the taxonomy", () => {
    const payload = stage2Payload();
    payload.themes[THEME_ID].citations = ["Súmula 999/STJ"];

    const result = evaluateStageGate(gateInput(payload));

    expect(result.report.failures).toEqual([
      {
        gate: "known_set",
        verdict: "RETRY",
        reason: 'Theme "prescricao": citation "Súmula 999/STJ" is not in taxonomy 2026.02.13',
      },
    ]);
  });

  it("escalates a theme whose analysis did not complete", () => {
    const payload: StagePayload = {
      stage: "stage2",
      themes: { [THEME_ID]: { title: "Prescrição", status: "escalated", fields: {}, citations: [], confidence: 0 } },
    };

    const result = evaluateStageGate(gateInput(payload));

    expect(result.report.verdict).toBe("ESCALATE");
    expect(result.report.escalations.map((e) => e.reason)).toEqual(['Theme "prescricao" analysis did not complete']);
    expect(result.confidence).toBe(0);
  });

  it("retries a stage 2 without themes", () => {
    const result = evaluateStageGate(gateInput({ stage: "stage2", themes: {} }));
    expect(result.report.failures.map((f) => f.reason)).toEqual(["Stage 2 identified no themes"]);
    expect(result.report.verdict).toBe("RETRY");
  });

  const explained = {
    warning: "AVISO: decisão inconclusiva, revisão humana necessária",
    reasonCode: "RULING_INCOMPLETE",
    reasonDescription: "O acórdão recorrido está incompleto",
  };

  function stage3Payload(overrides: Partial<Stage3Payload> = {}): StagePayload {
    return {
      stage: "stage3",
      decision: "NOT_ADMITTED",
      fields: toFieldMap(STAGE3_ANSWER.fields),
      citations: STAGE3_ANSWER.citations,
      transcript: STAGE3_ANSWER.transcript,
      warning: null,
      reasonCode: null,
      reasonDescription: null,
      ...overrides,
    };
  }

  it("passes a stage 3 consistent with stage 2 and the ruling", () => {
    const result = evaluateStageGate(gateInput(stage3Payload()));

    expect(result.report.verdict).toBe("PASS");
    expect(result.confidence).toBe(1);
  });

  it("escalates an INCONCLUSIVE stage 3 that carries its warning and reason", () => {
    const result = evaluateStageGate(gateInput(stage3Payload({ decision: "INCONCLUSIVE", ...explained })));

    expect(result.report.failures).toEqual([]);
    expect(result.report.verdict).toBe("ESCALATE");
    expect(result.report.escalations).toEqual([
      {
        stage: "stage3",
        target: "decision",
        confidence: 0.65,
        threshold: 1,
        reason: "Stage 3 decision is INCONCLUSIVE (RULING_INCOMPLETE): O acórdão recorrido está incompleto",
      },
    ]);
    expect(result.confidence).toBe(0.65);
  });

  it("retries, then blocks, an INCONCLUSIVE stage 3 without its explanation", () => {
    const payload = stage3Payload({ decision: "INCONCLUSIVE", reasonCode: "  ", reasonDescription: explained.reasonDescription });

    const first = evaluateStageGate(gateInput(payload));
    const last = evaluateStageGate(gateInput(payload, 2));

    expect(first.report.failures).toEqual([
      { gate: "inconclusive", verdict: "RETRY", reason: "INCONCLUSIVE decision has no warning" },
      { gate: "inconclusive", verdict: "RETRY", reason: "INCONCLUSIVE decision has no reason code" },
    ]);
    expect(first.report.verdict).toBe("RETRY");
    expect(first.report.escalations).toEqual([]);
    expect(first.report.checksFailed).toBe(2);
    expect(last.report.verdict).toBe("BLOCK");
  });

  it("blocks an explained INCONCLUSIVE stage 3 with an invented transcript", () => {
    const payload = stage3Payload({ decision: "INCONCLUSIVE", citations: [], transcript: "Texto inventado", ...explained });

    const result = evaluateStageGate(gateInput(payload));

    expect(result.report.failures.map((f) => f.reason)).toEqual([
      'Transcript segment not found in supporting text ("Texto inventado")',
    ]);
    expect(result.report.verdict).toBe("BLOCK");
  });
});
