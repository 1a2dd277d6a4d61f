import { describe, expect, it } from "vitest";
import { extractFirstObject, parseJsonObject, stripTrailingCommas } from "./_json";

describe("parseJsonObject", () => {
  it("parses clean JSON strictly", () => {
    expect(parseJsonObject(' {"hooks": ["urgency"]} ')).toEqual({
      ok: true,
      value: { hooks: ["urgency"] },
      strategy: "strict",
    });
  });

  it("reads a fenced json block", () => {
    const text = 'Here you go:\n```json\n{"mood": "tense"}\n```';
    expect(parseJsonObject(text)).toEqual({ ok: true, value: { mood: "tense" }, strategy: "fenced" });
  });

  it("extracts the first object from surrounding prose", () => {
    const text = 'Sure! {"hooks": ["curiosity"], "note": "a } inside"} Hope that helps {"other": 1}';
    expect(parseJsonObject(text)).toEqual({
      ok: true,
      value: { hooks: ["curiosity"], note: "a } inside" },
      strategy: "object-substring",
    });
  });

  it("repairs trailing commas", () => {
    expect(parseJsonObject('{"a": [1, 2,], }')).toEqual({
      ok: true,
      value: { a: [1, 2] },
      strategy: "trailing-comma-repair",
    });
  });

  it("reports the strategies it tried when nothing parses", () => {
    expect(parseJsonObject("not json at all")).toEqual({
      ok: false,
      attempted: ["strict", "trailing-comma-repair"],
    });
  });

  it("rejects top-level arrays", () => {
    expect(parseJsonObject("[1, 2]").ok).toBe(false);
  });
});

describe("helpers", () => {
  it("falls back to the last brace when the object never closes", () => {
    expect(extractFirstObject('x {"a": {"b": 1} y')).toBe('{"a": {"b": 1}');
    expect(extractFirstObject("no braces")).toBeNull();
  });

  it("strips commas before closing brackets only", () => {
    expect(stripTrailingCommas('{"a": "x,y", "b": [1,\n]}')).toBe('{"a": "x,y", "b": [1]}');
  });
});
