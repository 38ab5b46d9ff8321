/**
 * JSON Recovery Tests
 *
 * @module pipeline/json.test
 */

import { describe, expect, it } from "vitest";
import { extractFirstJsonObjectFromText, parseFirstJsonObject } from "@/lib/pipeline/json";

describe("extractFirstJsonObjectFromText", () => {
  it("finds an object wrapped in prose", () => {
    expect(extractFirstJsonObjectFromText('Aqui está: {"a": 1} espero que ajude')).toBe('{"a": 1}');
  });

  it("prefers a fenced block", () => {
    const text = 'Exemplo {"ignored": true}\n```json\n{"used": true}\n```';
    expect(extractFirstJsonObjectFromText(text)).toBe('{"used": true}');
  });

  it("ignores braces inside strings", () => {
    expect(extractFirstJsonObjectFromText('{"quote": "art. {105}", "n": {"x": "}"}} trailing')).toBe(
      '{"quote": "art. {105}", "n": {"x": "}"}}',
    );
  });

  it("handles escaped quotes", () => {
    expect(extractFirstJsonObjectFromText('{"q": "ele disse \\"sim\\" {"}')).toBe('{"q": "ele disse \\"sim\\" {"}');
  });

  it("returns null for an unbalanced or missing object", () => {
    expect(extractFirstJsonObjectFromText('{"fields": {')).toBeNull();
    expect(extractFirstJsonObjectFromText("no json here")).toBeNull();
  });
});

describe("parseFirstJsonObject", () => {
  it("parses the located object", () => {
    expect(parseFirstJsonObject('```\n{"a": [1, 2]}\n```')).toEqual({ ok: true, value: { a: [1, 2] } });
  });

  it("reports a missing object", () => {
    expect(parseFirstJsonObject("nothing")).toEqual({
      ok: false,
      reason: "no_object",
      detail: "response contains no JSON object",
    });
  });

  it("reports invalid JSON inside balanced braces", () => {
    const result = parseFirstJsonObject("{a: 1}");
    expect(result.ok).toBe(false);
    expect(result.ok === false && result.reason).toBe("invalid_json");
  });
});
