import { describe, expect, it } from "vitest";
import {
  buildToolFailure,
  configError,
  describeError,
  internalError,
  isTranspileError,
  malformedSource,
  TranspileError,
  unsupportedConstruct,
} from "./errors.js";

describe("TranspileError", () => {
  it("serializes code, message, details and suggestion", () => {
    const error = unsupportedConstruct("CaseClause", "build", { line: 3, column: 1 });
    expect(error.toJSON()).toEqual({
      code: "UNSUPPORTED_CONSTRUCT",
      message: "Unsupported construct: CaseClause at 3:1",
      details: { stage: "build", kind: "CaseClause", location: { line: 3, column: 1 } },
      suggestion:
        "Rewrite this part of the script with commands, conditionals, loops or pipelines",
    });
  });

  it("is recognized by the type guard", () => {
    expect(isTranspileError(configError("bad"))).toBe(true);
    expect(isTranspileError(new Error("plain"))).toBe(false);
  });

  it("keeps the parser message verbatim", () => {
    const error = malformedSource("a.sh:1:6: reached EOF without closing quote", { line: 1, column: 6 });
    expect(error.code).toBe("MALFORMED_SOURCE");
    expect(error.message).toBe("a.sh:1:6: reached EOF without closing quote");
    expect(error.details?.stage).toBe("parse");
  });

  it("carries the tool output of a failed build step", () => {
    const error = buildToolFailure("compile", "./main.go:3:2: undefined: foo\n");
    expect(error).toBeInstanceOf(TranspileError);
    expect(error.message).toBe("Build step 'compile' failed:\n./main.go:3:2: undefined: foo");
    expect(error.details?.output).toBe("./main.go:3:2: undefined: foo\n");
  });

  it("omits the output block when the tool printed nothing", () => {
    expect(buildToolFailure("manifest", "  ").message).toBe("Build step 'manifest' failed");
  });

  it("describes errors without stack traces", () => {
    expect(describeError(internalError("imports out of sync"))).toBe(
      "Internal error: imports out of sync",
    );
    expect(describeError("text")).toBe("text");
  });
});
