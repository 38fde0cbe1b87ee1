import { describe, expect, it } from "vitest";
import {
  escapeTemplateText,
  exprSegments,
  literalValue,
  referenceToken,
  scanTemplate,
} from "./template.js";

describe("scanTemplate", () => {
  it("splits text around short and braced references", () => {
    expect(scanTemplate("Hello, $NAME! ${GREETING}s")).toEqual([
      { kind: "text", value: "Hello, " },
      { kind: "variable", name: "NAME" },
      { kind: "text", value: "! " },
      { kind: "variable", name: "GREETING" },
      { kind: "text", value: "s" },
    ]);
  });

  it("stops short references at the first non-identifier character", () => {
    expect(scanTemplate("$dir/$file.txt")).toEqual([
      { kind: "variable", name: "dir" },
      { kind: "text", value: "/" },
      { kind: "variable", name: "file" },
      { kind: "text", value: ".txt" },
    ]);
  });

  it("recognizes positional and special parameters", () => {
    expect(scanTemplate("$1 ${12} $0 $@ $# $$")).toEqual([
      { kind: "positional", index: 1 },
      { kind: "text", value: " " },
      { kind: "positional", index: 12 },
      { kind: "text", value: " " },
      { kind: "special", name: "0" },
      { kind: "text", value: " " },
      { kind: "special", name: "@" },
      { kind: "text", value: " " },
      { kind: "special", name: "#" },
      { kind: "text", value: " " },
      { kind: "special", name: "$" },
    ]);
  });

  it("keeps escaped and dangling dollars literal", () => {
    expect(scanTemplate("cost: \\$5 $ and ${ and \\\\")).toEqual([
      { kind: "text", value: "cost: $5 $ and ${ and \\" },
    ]);
  });
});

describe("template helpers", () => {
  it("escapes text so it scans back verbatim", () => {
    const escaped = escapeTemplateText("a $b \\ c");
    expect(escaped).toBe("a \\$b \\\\ c");
    expect(scanTemplate(escaped)).toEqual([{ kind: "text", value: "a $b \\ c" }]);
  });

  it("writes reference tokens", () => {
    expect(referenceToken("NAME")).toBe("${NAME}");
    expect(referenceToken("1")).toBe("${1}");
    expect(referenceToken("@")).toBe("$@");
  });

  it("treats literals as a single text segment", () => {
    expect(exprSegments({ kind: "literal", value: "$HOME" })).toEqual([
      { kind: "text", value: "$HOME" },
    ]);
    expect(exprSegments({ kind: "literal", value: "" })).toEqual([]);
    expect(literalValue({ kind: "interpolated", template: "${X}" })).toBeNull();
  });
});
