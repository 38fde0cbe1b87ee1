import { describe, expect, it } from "vitest";
import { analyzeTest, conditionCategory } from "./conditions.js";
import type { Command, Expr, Statement } from "./types.js";
import { literal } from "./types.js";

function testCommand(name: string, ...args: (string | Expr)[]): Command {
  return {
    name,
    args: args.map((arg) => typeof arg === "string" ? literal(arg) : arg),
    classification: "builtin",
    useHelper: false,
  };
}

const statement = (command: Command): Statement => ({ kind: "Command", command });

describe("analyzeTest", () => {
  it("reads unary file operators", () => {
    const analysis = analyzeTest(testCommand("[", "-f", "go.mod", "]"));
    expect(analysis).toEqual({
      category: "file-test",
      negated: false,
      operator: "-f",
      operands: [literal("go.mod")],
    });
  });

  it("reads binary operators in the middle position", () => {
    const name: Expr = { kind: "interpolated", template: "${NAME}" };
    expect(analyzeTest(testCommand("test", name, "=", "x")).category).toBe("string-test");
    expect(analyzeTest(testCommand("[", name, "-ge", "10", "]")).category).toBe("numeric-test");
    expect(analyzeTest(testCommand("test", "-z", name)).category).toBe("string-test");
  });

  it("skips a leading negation", () => {
    const analysis = analyzeTest(testCommand("[", "!", "-d", "build", "]"));
    expect(analysis.negated).toBe(true);
    expect(analysis.category).toBe("file-test");
    expect(analysis.operands).toEqual([literal("build")]);
  });

  it("falls back to a generic command for other shapes", () => {
    expect(analyzeTest(testCommand("[", "-x", "run.sh", "]")).category).toBe("generic-command");
    expect(analyzeTest(testCommand("[", "a", "==", "b", "]")).category).toBe("generic-command");
    expect(analyzeTest(testCommand("test", "value")).category).toBe("generic-command");
  });
});

describe("conditionCategory", () => {
  it("uses the test category for a single test command", () => {
    expect(conditionCategory([statement(testCommand("[", "-e", "x", "]"))])).toBe("file-test");
  });

  it("treats other conditions as generic commands", () => {
    const grep: Command = {
      name: "grep",
      args: [literal("-q"), literal("x")],
      classification: "external",
      useHelper: true,
    };
    expect(conditionCategory([statement(grep)])).toBe("generic-command");
    expect(conditionCategory([
      statement(testCommand("[", "-e", "x", "]")),
      statement(testCommand("[", "-e", "y", "]")),
    ])).toBe("generic-command");
  });
});
