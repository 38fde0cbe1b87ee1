import { describe, expect, it } from "vitest";
import { isTranspileError } from "../core/errors.js";
import type { Program, Statement } from "../ir/types.js";
import { formatImports } from "./emitter.js";
import { collectRequirements, execBackend, generate, GoGenerator } from "./mod.js";
import { block, cmd, program, run, set, shellFunction, text, tpl } from "./test-helpers.js";

const HELLO: Program = program(
  [set("NAME", text("World")), run("echo", [tpl("Hello, ${NAME}!")])],
  { variables: ["NAME"] },
);

/** A program touching most lowerings */
function kitchenSink(): Program {
  const statements: Statement[] = [
    set("COUNT", text("0")),
    run("mkdir", ["-p", tpl("${HOME}/out")]),
    {
      kind: "Loop",
      loop: {
        type: "list",
        variable: "f",
        items: [{ value: text("*.log"), expand: "glob" }, { value: tpl("$@"), expand: "split" }],
        body: [run("cp", [tpl("${f}"), "backup"])],
      },
    },
    {
      kind: "Loop",
      loop: { type: "range", variable: "i", from: text("1"), to: tpl("${COUNT}"), body: [] },
    },
    {
      kind: "Pipeline",
      pipeline: { commands: [cmd("ls", [], "external"), cmd("sort", [], "external")] },
    },
    {
      kind: "Subshell",
      subshell: { body: [run("cd", ["/tmp"]), run("pwd")] },
    },
    {
      kind: "Redirection",
      redirection: { operator: "append", target: text("log.txt"), fd: 2, statement: run("build", [], "function") },
    },
    {
      kind: "Background",
      background: { statement: run("sleep", ["1"], "external") },
    },
    run("echo", [tpl("$# args, pid $$, script $0")]),
  ];
  const build = shellFunction("build", [
    set("target", tpl("${1}"), { local: true }),
    {
      kind: "Return",
      ret: { code: null, value: tpl("${STATUS}") },
    },
  ], { params: ["1"], locals: ["target"] });
  return program(statements, { variables: ["COUNT", "f", "i"], functions: [build] });
}

describe("generate", () => {
  it("emits a complete program for an assignment and echo", () => {
    expect(generate(HELLO).code).toBe([
      "package main",
      "",
      "import (",
      '\t"errors"',
      '\t"fmt"',
      '\t"os"',
      ")",
      "",
      'var NAME = os.Getenv("NAME")',
      "",
      "func run(args []string) error {",
      '\tNAME = "World"',
      '\tfmt.Println("Hello, " + NAME + "!")',
      "\treturn nil",
      "}",
      "",
      "func main() {",
      "\tif err := run(os.Args[1:]); err != nil {",
      "\t\tvar status statusError",
      "\t\tif errors.As(err, &status) {",
      "\t\t\tos.Exit(int(status))",
      "\t\t}",
      '\t\tfmt.Fprintf(os.Stderr, "Error: %v\\n", err)',
      "\t\tos.Exit(1)",
      "\t}",
      "}",
      "",
      "// statusError carries an exit status out of run.",
      "type statusError int",
      "",
      "func (s statusError) Error() string {",
      '\treturn fmt.Sprintf("exit status %d", int(s))',
      "}",
      "",
    ].join("\n"));
  });

  it("is byte-identical across runs", () => {
    const generator = new GoGenerator();
    expect(generator.generate(kitchenSink()).code).toBe(generator.generate(kitchenSink()).code);
  });

  it("agrees with the requirements pass", () => {
    const source = kitchenSink();
    expect(generate(source).requirements).toEqual(collectRequirements(source, execBackend));
  });

  it("uses every package it imports", () => {
    const { code, requirements } = generate(kitchenSink());
    const body = code.slice(code.indexOf("\n)\n"));
    for (const path of requirements.imports) {
      const name = path.slice(path.lastIndexOf("/") + 1);
      expect(body, path).toContain(`${name}.`);
    }
  });

  it("collects helpers in registry order", () => {
    expect(generate(kitchenSink()).requirements.helpers).toEqual([
      "statusError",
      "arg",
      "toInt",
      "returnStatus",
      "runCommand",
      "runPipeline",
      "printWorkingDir",
      "copyFile",
      "subshell",
      "redirectOutput",
      "jobGroup",
      "concatItems",
      "globItems",
    ]);
  });

  it("declares functions with their locals before run", () => {
    const { code } = generate(kitchenSink());
    expect(block(code, "func build(args ...string) error {")).toEqual([
      "func build(args ...string) error {",
      "\tvar target string",
      "\t_ = target",
      "\ttarget = arg(args, 1)",
      '\treturn returnStatus(os.Getenv("STATUS"))',
      "\treturn nil",
      "}",
    ]);
    expect(code).toContain("// build reads positional parameters $1.\nfunc build(");
    expect(code.indexOf("func build(")).toBeLessThan(code.indexOf("func run("));
    expect(code.indexOf("func run(")).toBeLessThan(code.indexOf("func main("));
  });

  it("lowers special parameters", () => {
    expect(generate(kitchenSink()).code).toContain(
      '\tfmt.Println(strconv.Itoa(len(args)) + " args, pid " + strconv.Itoa(os.Getpid()) + ", script " + os.Args[0])',
    );
  });

  it("imports gexe in its own group for the gexe backend", () => {
    const { code } = generate(program([run("git", ["status"], "external")]), { backend: "gexe" });
    expect(code).toContain([
      "import (",
      '\t"errors"',
      '\t"fmt"',
      '\t"io"',
      '\t"os"',
      '\t"strconv"',
      '\t"strings"',
      "",
      '\t"github.com/vladimirvivien/gexe"',
      ")",
    ].join("\n"));
  });

  it("reports unsupported constructs from the generate stage", () => {
    try {
      generate(program([run("cd", ["-"])]));
      expect.unreachable();
    } catch (error) {
      if (!isTranspileError(error)) throw error;
      expect(error.code).toBe("UNSUPPORTED_CONSTRUCT");
      expect(error.details?.stage).toBe("generate");
      expect(error.message).toBe("Unsupported construct: cd -");
    }
  });
});

describe("formatImports", () => {
  it("separates the standard library from third-party packages", () => {
    expect(formatImports(["os", "github.com/vladimirvivien/gexe", "fmt"])).toEqual([
      "import (",
      '\t"fmt"',
      '\t"os"',
      "",
      '\t"github.com/vladimirvivien/gexe"',
      ")",
    ]);
  });
});
