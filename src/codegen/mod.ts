/**
 * Go Code Generator
 *
 * Visitor-based generator lowering a Program to a single `main.go`.
 * Pass 1 derives the imports and runtime helpers from the Program; pass 2
 * emits declarations in a fixed order: imports, globals, functions in
 * function-table order, `run`, `main`, then the helpers.
 */

import { internalError } from "../core/errors.js";
import type { Program, Statement } from "../ir/types.js";
import { getBackend } from "./backend.js";
import { GeneratorContext } from "./context.js";
import { formatImports, OutputEmitter } from "./emitter.js";
import * as handlers from "./handlers/mod.js";
import type { FrameKind, Requirements } from "./lowering.js";
import { collectRequirements, finalizeRequirements } from "./requirements.js";
import { helperSource } from "./runtime.js";
import type {
  GenerateOptions,
  GenerateResult,
  ResolvedGenerateOptions,
  StatementResult,
  VisitorContext,
} from "./types.js";
import { goString } from "./utils/escape.js";

// Re-exports
export type {
  GenerateOptions,
  GenerateResult,
  Lowering,
  ResolvedGenerateOptions,
  StatementResult,
  VisitorContext,
} from "./types.js";
export type { Requirements } from "./lowering.js";
export { collectRequirements } from "./requirements.js";
export { execBackend, gexeBackend, getBackend, GEXE_IMPORT } from "./backend.js";
export type { ProcessBackend } from "./backend.js";
export { GeneratorContext } from "./context.js";
export { OutputEmitter } from "./emitter.js";

export function resolveOptions(options: GenerateOptions = {}): ResolvedGenerateOptions {
  return {
    backend: getBackend(options.backend ?? "exec"),
    indent: options.indent ?? "\t",
  };
}

function sameRequirements(a: Requirements, b: Requirements): boolean {
  return a.imports.join(",") === b.imports.join(",") &&
    a.helpers.join(",") === b.helpers.join(",");
}

// =============================================================================
// GoGenerator Class
// =============================================================================

/**
 * Coordinates context, emitter and handlers. Holds no state between
 * calls, so one instance may generate any number of programs.
 */
export class GoGenerator {
  private readonly options: ResolvedGenerateOptions;

  constructor(options?: GenerateOptions) {
    this.options = resolveOptions(options);
  }

  generate(program: Program): GenerateResult {
    const requirements = collectRequirements(program, this.options.backend);

    const ctx = new GeneratorContext(program, this.options);
    const emitter = new OutputEmitter(ctx);
    const visitorCtx = this.createVisitorContext(ctx);

    emitter.emit("package main");
    emitter.emitBlank();
    emitter.emitRaw(formatImports(requirements.imports));
    emitter.emitBlank();

    if (ctx.names.globals.size > 0) {
      for (const [name, id] of ctx.names.globals) {
        emitter.emit(`var ${id} = os.Getenv(${goString(name)})`);
      }
      emitter.emitBlank();
    }

    for (const fn of program.functions.values()) {
      const id = ctx.names.functions.get(fn.name);
      if (id === undefined) {
        throw internalError(`function ${fn.name} has no identifier`);
      }
      if (fn.params.length > 0) {
        const params = fn.params.map((param) => `$${param}`).join(", ");
        emitter.emit(`// ${id} reads positional parameters ${params}.`);
      }
      emitter.emitBlock(`func ${id}(args ...string) error`, () => {
        for (const local of ctx.names.localsOf(fn.name).values()) {
          emitter.emit(`var ${local} string`);
          emitter.emit(`_ = ${local}`);
        }
        ctx.enterBody(fn.name);
        emitter.emitRaw(visitorCtx.visitStatements(fn.body));
        emitter.emit("return nil");
      });
      emitter.emitBlank();
    }

    emitter.emitBlock("func run(args []string) error", () => {
      ctx.enterBody(null);
      emitter.emitRaw(visitorCtx.visitStatements(program.statements));
      emitter.emit(requirements.helpers.includes("jobGroup") ? "return jobs.Wait()" : "return nil");
    });
    emitter.emitBlank();

    emitter.emitBlock("func main()", () => {
      emitter.emitBlock("if err := run(os.Args[1:]); err != nil", () => {
        emitter.emit("var status statusError");
        emitter.emitBlock("if errors.As(err, &status)", () => {
          emitter.emit("os.Exit(int(status))");
        });
        emitter.emit('fmt.Fprintf(os.Stderr, "Error: %v\\n", err)');
        emitter.emit("os.Exit(1)");
      });
    });

    for (const name of requirements.helpers) {
      emitter.emitBlank();
      emitter.emitRaw(helperSource(name, this.options.backend).source.split("\n"));
    }

    const used = finalizeRequirements(
      ctx.getUsedImports(),
      ctx.getUsedHelpers(),
      this.options.backend,
    );
    if (!sameRequirements(used, requirements)) {
      throw internalError(
        `emitted code uses [${[...used.imports, ...used.helpers].join(", ")}] ` +
          `but the requirements pass found [${[...requirements.imports, ...requirements.helpers].join(", ")}]`,
      );
    }

    return { code: emitter.toString(), requirements };
  }

  /**
   * Create a VisitorContext that provides the interface for handlers.
   */
  private createVisitorContext(ctx: GeneratorContext): VisitorContext {
    const self = this;

    return {
      getIndent: () => ctx.getIndent(),
      indent: () => ctx.indent(),
      dedent: () => ctx.dedent(),
      getOptions: () => ctx.getOptions(),
      getTempVar: (prefix: string) => ctx.getTempVar(prefix),
      usePackage: (path: string) => ctx.usePackage(path),
      useHelper: (name) => ctx.useHelper(name),

      resolveVariable(name: string): string {
        return ctx.lookupVariable(name) ?? `os.Getenv(${goString(name)})`;
      },
      variableTarget(name: string): string {
        const id = ctx.lookupVariable(name);
        if (id === undefined) {
          throw internalError(`variable ${name} is assigned but never declared`);
        }
        return id;
      },
      hasVariable: (name: string) => ctx.lookupVariable(name) !== undefined,
      functionName: (name: string) => ctx.functionName(name),

      getFrames: () => ctx.getFrames(),
      withFrame<T>(kind: FrameKind, fn: () => T): T {
        return ctx.withFrame(kind, fn);
      },

      visitExpr(expr, options) {
        return handlers.visitExpr(expr, this, options);
      },

      visitStatement(stmt: Statement): StatementResult {
        return self.visitStatement(stmt, this);
      },

      visitStatements(stmts: Statement[]): string[] {
        return stmts.flatMap((stmt) => self.visitStatement(stmt, this).lines);
      },

      visitCondition(stmts: Statement[]): string[] {
        return handlers.visitCondition(stmts, this);
      },
    };
  }

  /**
   * Visit a statement and return generated lines.
   */
  private visitStatement(stmt: Statement, ctx: VisitorContext): StatementResult {
    switch (stmt.kind) {
      case "Command":
        return handlers.visitCommand(stmt.command, ctx);
      case "Assignment":
        return handlers.visitAssignment(stmt.assignment, ctx);
      case "Conditional":
        return handlers.visitConditional(stmt.conditional, ctx);
      case "Loop":
        return handlers.visitLoop(stmt.loop, ctx);
      case "Pipeline":
        return handlers.visitPipeline(stmt.pipeline, ctx);
      case "Subshell":
        return handlers.visitSubshell(stmt.subshell, ctx);
      case "Redirection":
        return handlers.visitRedirection(stmt.redirection, ctx);
      case "Background":
        return handlers.visitBackground(stmt.background, ctx);
      case "Return":
        return handlers.visitReturn(stmt.ret, ctx);
      case "FunctionDecl":
        return { lines: [] };
    }
  }
}

// =============================================================================
// Convenience Function
// =============================================================================

/**
 * Lower a Program to Go source.
 */
export function generate(program: Program, options?: GenerateOptions): GenerateResult {
  return new GoGenerator(options).generate(program);
}
