import { describe, expect, it } from "vitest";
import type { Statement } from "../../ir/types.js";
import { generate } from "../mod.js";
import { block, program, run, runBody, set, shellFunction, text, tpl } from "../test-helpers.js";

const conditional = (
  condition: Statement[],
  then: Statement[],
  rest: { elifs?: { condition: Statement[]; body: Statement[] }[]; else?: Statement[] } = {},
): Statement => ({
  kind: "Conditional",
  conditional: {
    condition,
    category: "generic-command",
    then,
    elifs: (rest.elifs ?? []).map((elif) => ({ ...elif, category: "generic-command" })),
    else: rest.else ?? [],
  },
});

describe("conditionals", () => {
  it("emits if / else", () => {
    expect(runBody([conditional(
      [run("[", ["-f", "x", "]"])],
      [run("echo", ["yes"])],
      { else: [run("echo", ["no"])] },
    )])).toEqual([
      'if fileTest("-f", "x") {',
      '\tfmt.Println("yes")',
      "} else {",
      '\tfmt.Println("no")',
      "}",
    ]);
  });

  it("chains elifs as else if", () => {
    expect(runBody([conditional(
      [run("[", ["a", "=", "b", "]"])],
      [run("echo", ["1"])],
      {
        elifs: [
          { condition: [run("[", ["a", "=", "c", "]"])], body: [run("echo", ["2"])] },
          { condition: [run("[", ["a", "=", "d", "]"])], body: [run("echo", ["3"])] },
        ],
      },
    )])).toEqual([
      'if "a" == "b" {',
      '\tfmt.Println("1")',
      '} else if "a" == "c" {',
      '\tfmt.Println("2")',
      '} else if "a" == "d" {',
      '\tfmt.Println("3")',
      "}",
    ]);
  });

  it("runs a statement list condition in a closure", () => {
    expect(runBody([conditional(
      [run("cd", ["d"]), run("ls", [], "external")],
      [run("echo", ["ok"])],
    )])).toEqual([
      "if func() error {",
      '\tif err := os.Chdir("d"); err != nil {',
      "\t\treturn err",
      "\t}",
      '\tif err := runCommand("ls"); err != nil {',
      "\t\treturn err",
      "\t}",
      "\treturn nil",
      "}() == nil {",
      '\tfmt.Println("ok")',
      "}",
    ]);
  });
});

describe("loops", () => {
  it("counts through a numeric range", () => {
    expect(runBody([{
      kind: "Loop",
      loop: { type: "range", variable: "i", from: text("1"), to: text("3"), body: [run("echo", [tpl("${i}")])] },
    }], ["i"])).toEqual([
      "for n0 := 1; n0 <= 3; n0++ {",
      "\ti = strconv.Itoa(n0)",
      "\tfmt.Println(i)",
      "}",
    ]);
  });

  it("counts down through a descending range", () => {
    expect(runBody([{
      kind: "Loop",
      loop: { type: "range", variable: "i", from: text("3"), to: text("1"), descending: true, body: [] },
    }], ["i"])).toEqual([
      "for n0 := 3; n0 >= 1; n0-- {",
      "\ti = strconv.Itoa(n0)",
      "}",
    ]);
  });

  it("converts range bounds outside int64 at run time", () => {
    expect(runBody([{
      kind: "Loop",
      loop: { type: "range", variable: "i", from: text("1"), to: text("99999999999999999999"), body: [] },
    }], ["i"])[0]).toBe('for n0 := 1; n0 <= toInt("99999999999999999999"); n0++ {');
  });

  it("concatenates word groups and split expansions", () => {
    expect(runBody([{
      kind: "Loop",
      loop: {
        type: "list",
        variable: "f",
        items: [
          { value: text("a"), expand: "none" },
          { value: tpl("${LIST}"), expand: "split" },
        ],
        body: [],
      },
    }], ["f"])).toEqual([
      'for _, item0 := range concatItems([]string{"a"}, strings.Fields(os.Getenv("LIST"))) {',
      "\tf = item0",
      "}",
    ]);
  });

  it("globs loop items", () => {
    expect(runBody([{
      kind: "Loop",
      loop: { type: "list", variable: "f", items: [{ value: text("*.txt"), expand: "glob" }], body: [] },
    }], ["f"])[0]).toBe('for _, item0 := range globItems("*.txt") {');
  });

  it("uses read directly as a while condition", () => {
    expect(runBody([{
      kind: "Loop",
      loop: { type: "while", condition: [run("read", ["LINE"])], category: "generic-command", body: [] },
    }], ["LINE"])).toEqual(["for readLine(&LINE) {", "}"]);
  });

  it("negates until conditions", () => {
    expect(runBody([{
      kind: "Loop",
      loop: { type: "until", condition: [run("[", ["-e", "lock", "]"])], category: "file-test", body: [] },
    }])[0]).toBe('for !(fileTest("-e", "lock")) {');
  });
});

describe("subshells", () => {
  it("restores assigned variables and the working directory", () => {
    expect(runBody([{
      kind: "Subshell",
      subshell: { body: [run("cd", ["/tmp"]), set("X", text("1"))] },
    }], ["X"])).toEqual([
      "if err := subshell(func() error {",
      "\tdefer func(saved0 string) { X = saved0 }(X)",
      '\tif err := os.Chdir("/tmp"); err != nil {',
      "\t\treturn err",
      "\t}",
      '\tX = "1"',
      "\treturn nil",
      "}); err != nil {",
      "\treturn err",
      "}",
    ]);
  });

  it("returns the exit status instead of ending the process", () => {
    expect(runBody([{
      kind: "Subshell",
      subshell: { body: [run("exit", ["2"])] },
    }])).toContain("\treturn statusError(2)");
  });
});

describe("redirections and background jobs", () => {
  it("runs the statement with stdout pointed at the file", () => {
    expect(runBody([{
      kind: "Redirection",
      redirection: { operator: "truncate", target: text("out.txt"), fd: 1, statement: run("echo", ["hi"]) },
    }])).toEqual([
      'if err := redirectOutput("out.txt", os.O_CREATE|os.O_WRONLY|os.O_TRUNC, 1, func() error {',
      '\tfmt.Println("hi")',
      "\treturn nil",
      "}); err != nil {",
      "\treturn err",
      "}",
    ]);
  });

  it("sends stderr of an external command to the redirected file", () => {
    const { code } = generate(program([{
      kind: "Redirection",
      redirection: { operator: "truncate", target: text("err.log"), fd: 2, statement: run("ls", ["/missing"], "external") },
    }]));
    expect(block(code, "func run(args []string) error {")[1]).toBe(
      '\tif err := redirectOutput("err.log", os.O_CREATE|os.O_WRONLY|os.O_TRUNC, 2, func() error {',
    );
    expect(code).toContain("\tcmd.Stderr = os.Stderr\n");
  });

  it("reads stdin from a file", () => {
    expect(runBody([{
      kind: "Redirection",
      redirection: { operator: "read", target: text("in.txt"), fd: 0, statement: run("sort", [], "external") },
    }])[0]).toBe('if err := redirectInput("in.txt", func() error {');
  });

  it("starts jobs in the job group and waits at the end of run", () => {
    const { code } = generate(program([{
      kind: "Background",
      background: { statement: { kind: "Command", command: { name: "sleep", args: [text("1")], classification: "external", useHelper: true } } },
    }]));
    expect(block(code, "func run(args []string) error {")).toEqual([
      "func run(args []string) error {",
      "\tjobs.Go(func() error {",
      '\t\tif err := runCommand("sleep", "1"); err != nil {',
      "\t\t\treturn err",
      "\t\t}",
      "\t\treturn nil",
      "\t})",
      "\treturn jobs.Wait()",
      "}",
    ]);
  });

  it("passes the variables a job uses by value when it is scheduled", () => {
    expect(runBody([{
      kind: "Loop",
      loop: {
        type: "list",
        variable: "f",
        items: [{ value: text("a"), expand: "none" }, { value: text("b"), expand: "none" }],
        body: [{ kind: "Background", background: { statement: run("echo", [tpl("job ${f}")]) } }],
      },
    }], ["f"])).toEqual([
      'for _, item0 := range []string{"a", "b"} {',
      "\tf = item0",
      "\tjobs.Go(func(f string) func() error {",
      "\t\treturn func() error {",
      '\t\t\tfmt.Println("job " + f)',
      "\t\t\treturn nil",
      "\t\t}",
      "\t}(f))",
      "}",
    ]);
  });

  it("leaves environment reads to run time", () => {
    expect(runBody([{
      kind: "Background",
      background: { statement: run("echo", [tpl("${HOME}")]) },
    }])[0]).toBe("jobs.Go(func() error {");
  });
});

describe("return", () => {
  it("returns a literal status from a function", () => {
    const { code } = generate(program([], {
      functions: [shellFunction("check", [{ kind: "Return", ret: { code: 3, value: null } }])],
    }));
    expect(block(code, "func check(args ...string) error {")).toEqual([
      "func check(args ...string) error {",
      "\treturn statusError(3)",
      "\treturn nil",
      "}",
    ]);
  });

  it("rejects return inside a redirection", () => {
    const fn = shellFunction("log", [{
      kind: "Redirection",
      redirection: {
        operator: "append",
        target: text("log.txt"),
        fd: 1,
        statement: { kind: "Return", ret: { code: 1, value: null } },
      },
    }]);
    expect(() => generate(program([], { functions: [fn] }))).toThrow(
      "Unsupported construct: return inside a redirection or background job",
    );
  });
});
