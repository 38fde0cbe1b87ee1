/**
 * End-to-end conversion through the real shell parser
 */

import { describe, expect, it } from "vitest";
import { convert } from "../../src/convert.js";
import { isTranspileError } from "../../src/core/errors.js";
import { buildProgram } from "../../src/ir/builder.js";
import type { Program, Statement } from "../../src/ir/types.js";
import { literal } from "../../src/ir/types.js";
import { parse } from "../../src/syntax/parse.js";

function lower(source: string): Program {
  return buildProgram(parse(source)).program;
}

function only(program: Program): Statement {
  expect(program.statements).toHaveLength(1);
  const [statement] = program.statements;
  if (!statement) throw new Error("expected one statement");
  return statement;
}

function convertError(source: string): unknown {
  try {
    convert(source);
  } catch (error) {
    return error;
  }
  throw new Error("expected the conversion to fail");
}

describe("shell to Go", () => {
  it("splices variables into echo", () => {
    const source = 'NAME="World"\necho "Hello, $NAME!"\n';
    const { code, diagnostics } = convert(source);

    expect(diagnostics).toEqual([]);
    expect(code.split("\n")).toEqual(expect.arrayContaining([
      'var NAME = os.Getenv("NAME")',
      '\tNAME = "World"',
      '\tfmt.Println("Hello, " + NAME + "!")',
    ]));
    expect(code.startsWith("package main\n")).toBe(true);
  });

  it("lowers a file test to a native branch", () => {
    const source = 'if [ -f "go.mod" ]; then echo "exists"; else echo "missing"; fi\n';
    const statement = only(lower(source));
    if (statement.kind !== "Conditional") throw new Error("expected a conditional");
    expect(statement.conditional.category).toBe("file-test");

    expect(convert(source).code).toContain([
      '\tif fileTest("-f", "go.mod") {',
      '\t\tfmt.Println("exists")',
      "\t} else {",
      '\t\tfmt.Println("missing")',
      "\t}",
    ].join("\n"));
  });

  it("builds a three-stage pipeline started as one unit", () => {
    const source = 'ls -la | grep ".sh" | wc -l\n';
    const statement = only(lower(source));
    if (statement.kind !== "Pipeline") throw new Error("expected a pipeline");
    expect(statement.pipeline.commands.map((command) => [command.name, ...command.args])).toEqual([
      ["ls", literal("-la")],
      ["grep", literal(".sh")],
      ["wc", literal("-l")],
    ]);

    const { code } = convert(source);
    expect(code).toContain(
      '\tif err := runPipeline(exec.Command("ls", "-la"), exec.Command("grep", ".sh"), exec.Command("wc", "-l")); err != nil {',
    );
    expect(code).toContain('\t"os/exec"\n');
  });

  it("flattens n pipe operators into n + 1 stages", () => {
    for (const depth of [1, 2, 5]) {
      const names = Array.from({ length: depth + 1 }, (_, i) => `stage${i}`);
      const statement = only(lower(`${names.join(" | ")}\n`));
      if (statement.kind !== "Pipeline") throw new Error("expected a pipeline");
      expect(statement.pipeline.commands.map((command) => command.name)).toEqual(names);
    }
  });

  it("linearizes elif chains and emits them in order", () => {
    const source = [
      'if [ "$X" = 1 ]; then',
      "  echo one",
      'elif [ "$X" = 2 ]; then',
      "  echo two",
      'elif [ "$X" = 3 ]; then',
      "  echo three",
      "else",
      "  echo other",
      "fi",
      "",
    ].join("\n");
    const statement = only(lower(source));
    if (statement.kind !== "Conditional") throw new Error("expected a conditional");
    expect(statement.conditional.elifs).toHaveLength(2);
    expect(statement.conditional.else).toHaveLength(1);

    const lines = convert(source).code.split("\n");
    const branches = lines.filter((line) => line.startsWith("\tif ") || line.startsWith("\t} else"));
    expect(branches).toEqual([
      '\tif os.Getenv("X") == "1" {',
      '\t} else if os.Getenv("X") == "2" {',
      '\t} else if os.Getenv("X") == "3" {',
      "\t} else {",
    ]);
  });

  it("isolates subshells in their own closure", () => {
    const { code } = convert("(cd /tmp; pwd)\npwd\n");
    expect(code).toContain("\tif err := subshell(func() error {\n");
    expect(code).toContain('\t\tif err := os.Chdir("/tmp"); err != nil {\n');
  });

  it("is byte-identical across runs", () => {
    const source = [
      "greet() {",
      '  echo "hi $1"',
      "}",
      "for f in *.txt; do",
      '  cp "$f" backup/',
      "done",
      "sleep 1 &",
      "wait",
      'greet "$USER" > greeting.txt',
      "",
    ].join("\n");
    expect(convert(source).code).toBe(convert(source).code);
  });

  it("fails on constructs without a lowering rule", () => {
    const error = convertError("case $1 in\n  start) echo go ;;\nesac\n");
    if (!isTranspileError(error)) throw error;
    expect(error.code).toBe("UNSUPPORTED_CONSTRUCT");
    expect(error.details?.kind).toBe("CaseClause");
  });

  it("reports malformed scripts", () => {
    const error = convertError("if true; then\n");
    if (!isTranspileError(error)) throw error;
    expect(error.code).toBe("MALFORMED_SOURCE");
  });
});
