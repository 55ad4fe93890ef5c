import { describe, expect, it } from "vitest";

import { parseJsonObject } from "../../src/agents/base_utils/parse";

describe("parseJsonObject", () => {
  it("parses a bare object", () => {
    expect(parseJsonObject('{"summary":"ok","highlights":[]}')).toEqual({ summary: "ok", highlights: [] });
  });

  it("extracts an object surrounded by prose", () => {
    expect(parseJsonObject('Sure. {"summary":"brace } in text"} Hope that helps.')).toEqual({
      summary: "brace } in text",
    });
  });

  it("reads fenced blocks and drops trailing commas", () => {
    expect(parseJsonObject('```json\n{"highlights":["a","b",],}\n```')).toEqual({ highlights: ["a", "b"] });
  });

  it("returns null for empty, non-object or broken replies", () => {
    expect(parseJsonObject("   ")).toBeNull();
    expect(parseJsonObject("[1,2,3]")).toBeNull();
    expect(parseJsonObject('{"summary": ')).toBeNull();
  });
});
