import { describe, expect, it } from "vitest";
import type { Statement } from "../../ir/types.js";
import { runBody, run, tpl } from "../test-helpers.js";

/** Condition line of `if <test> { }` */
function condition(test: Statement): string | undefined {
  const body = runBody([{
    kind: "Conditional",
    conditional: {
      condition: [test],
      category: "generic-command",
      then: [],
      elifs: [],
      else: [],
    },
  }]);
  return body[0];
}

describe("test lowering", () => {
  it("lowers file tests to fileTest", () => {
    expect(condition(run("[", ["-f", tpl("${CONFIG}"), "]"]))).toBe(
      'if fileTest("-f", os.Getenv("CONFIG")) {',
    );
  });

  it("compares strings natively", () => {
    expect(condition(run("test", ["-z", tpl("${S}")]))).toBe('if os.Getenv("S") == "" {');
    expect(condition(run("[", ["a", "!=", "b", "]"]))).toBe('if "a" != "b" {');
  });

  it("converts non-literal numeric operands", () => {
    expect(condition(run("[", [tpl("${N}"), "-gt", "05", "]"]))).toBe(
      'if toInt(os.Getenv("N")) > 5 {',
    );
  });

  it("converts numeric literals outside int64 at run time", () => {
    expect(condition(run("[", [tpl("${N}"), "-gt", "99999999999999999999", "]"]))).toBe(
      'if toInt(os.Getenv("N")) > toInt("99999999999999999999") {',
    );
  });

  it("wraps a leading ! around the comparison", () => {
    expect(condition(run("[", ["!", "-d", "out", "]"]))).toBe(
      'if !(fileTest("-d", "out")) {',
    );
  });

  it("spawns test for operators without a native form", () => {
    expect(condition(run("[", ["-x", "tool", "]"]))).toBe(
      'if runCommand("test", "-x", "tool") == nil {',
    );
  });

  it("goes through testStatus as a statement", () => {
    expect(runBody([run("[", ["-e", "lock", "]"])])).toEqual([
      'if err := testStatus(fileTest("-e", "lock")); err != nil {',
      "\treturn err",
      "}",
    ]);
  });
});
