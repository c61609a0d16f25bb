import { describe, expect, it } from "vitest";
import { extractFirstStructuredBlock } from "../src/extract/structuredBlock.js";

describe("extractFirstStructuredBlock", () => {
  it("returns the first balanced region with surrounding prose removed", () => {
    expect(extractFirstStructuredBlock('noise {"a": [1,2]} trailing')).toBe('{"a": [1,2]}');
  });

  it("starts at whichever bracket kind comes first", () => {
    expect(extractFirstStructuredBlock('Here: [{"path":"a.tf"}] and {"b":1}')).toBe(
      '[{"path":"a.tf"}]',
    );
  });

  it("unwraps a fenced block", () => {
    const reply = 'Sure!\n```json\n{"files": []}\n```\nDone.';
    expect(extractFirstStructuredBlock(reply)).toBe('{"files": []}');
  });

  it("returns an empty string without any bracket", () => {
    expect(extractFirstStructuredBlock("no structure here")).toBe("");
  });

  it("returns an empty string when the first block never closes", () => {
    expect(extractFirstStructuredBlock('{"a": {"b": 1}')).toBe("");
  });

  it("does not pair bracket kinds", () => {
    expect(extractFirstStructuredBlock("x {a] y")).toBe("{a]");
  });

  it("counts brackets inside string literals", () => {
    expect(extractFirstStructuredBlock('{"a": "}"} tail')).toBe('{"a": "}');
  });
});
