/**
 * Generator Context
 *
 * Manages generator state: indentation, Go identifiers for shell names,
 * temporary variables, the closure frame stack and the imports and helpers
 * pass 2 actually uses.
 */

import { internalError } from "../core/errors.js";
import type { Program } from "../ir/types.js";
import type { FrameKind } from "./lowering.js";
import type { HelperName } from "./runtime.js";
import { isHelperName } from "./runtime.js";
import type { ResolvedGenerateOptions } from "./types.js";
import { GO_KEYWORDS, GO_PREDECLARED, sanitizeIdentifier } from "./utils/escape.js";

/** Names the generated program defines itself */
const GENERATOR_NAMES = new Set(["args", "run", "main", "jobs", "err"]);

/** Qualifiers of every package generated code may import */
const PACKAGE_NAMES = new Set([
  "errors",
  "exec",
  "filepath",
  "fmt",
  "gexe",
  "io",
  "os",
  "strconv",
  "strings",
  "sync",
]);

function isReserved(name: string): boolean {
  return GO_KEYWORDS.has(name) || GO_PREDECLARED.has(name) || GENERATOR_NAMES.has(name) ||
    PACKAGE_NAMES.has(name) || isHelperName(name);
}

/** Package qualifier of an import path */
export function packageName(path: string): string {
  return path.slice(path.lastIndexOf("/") + 1);
}

// =============================================================================
// Name Table
// =============================================================================

/**
 * Go identifiers for shell names. Package-level names are allocated first
 * (functions in table order, then globals sorted); function locals avoid
 * every package-level name.
 */
export class NameTable {
  readonly functions = new Map<string, string>();
  readonly globals = new Map<string, string>();
  private readonly locals = new Map<string, Map<string, string>>();
  private readonly packageLevel = new Set<string>();

  constructor(program: Program) {
    for (const name of program.functions.keys()) {
      this.functions.set(name, this.allocate(name));
    }
    for (const name of [...program.variables.keys()].sort()) {
      this.globals.set(name, this.allocate(name));
    }
    for (const fn of program.functions.values()) {
      const taken = new Set<string>();
      const names = new Map<string, string>();
      for (const local of fn.locals.keys()) {
        const id = sanitizeIdentifier(
          local,
          (candidate) => isReserved(candidate) || this.packageLevel.has(candidate) || taken.has(candidate),
        );
        taken.add(id);
        names.set(local, id);
      }
      this.locals.set(fn.name, names);
    }
  }

  private allocate(name: string): string {
    const id = sanitizeIdentifier(
      name,
      (candidate) => isReserved(candidate) || this.packageLevel.has(candidate),
    );
    this.packageLevel.add(id);
    return id;
  }

  localsOf(fn: string): Map<string, string> {
    return this.locals.get(fn) ?? new Map();
  }

  /** Whether an identifier is taken at package level or by a local of fn */
  isTaken(id: string, fn: string | null): boolean {
    if (isReserved(id) || this.packageLevel.has(id)) {
      return true;
    }
    if (fn === null) {
      return false;
    }
    return [...this.localsOf(fn).values()].includes(id);
  }
}

// =============================================================================
// Generator Context
// =============================================================================

export class GeneratorContext {
  private readonly options: ResolvedGenerateOptions;
  readonly names: NameTable;
  private indentLevel = 0;
  private tempVarCounter = 0;
  private currentFunction: string | null = null;
  private frames: FrameKind[] = [];
  private readonly usedImports = new Set<string>();
  private readonly usedHelpers = new Set<HelperName>();

  constructor(program: Program, options: ResolvedGenerateOptions) {
    this.options = options;
    this.names = new NameTable(program);
  }

  getOptions(): ResolvedGenerateOptions {
    return this.options;
  }

  // ===========================================================================
  // Indentation
  // ===========================================================================

  indent(): void {
    this.indentLevel++;
  }

  dedent(): void {
    if (this.indentLevel > 0) {
      this.indentLevel--;
    }
  }

  getIndent(): string {
    return this.options.indent.repeat(this.indentLevel);
  }

  // ===========================================================================
  // Temporary Variables
  // ===========================================================================

  /** Generate a unique temporary identifier */
  getTempVar(prefix: string): string {
    let id = `${prefix}${this.tempVarCounter++}`;
    while (this.names.isTaken(id, this.currentFunction)) {
      id = `${prefix}${this.tempVarCounter++}`;
    }
    return id;
  }

  // ===========================================================================
  // Scopes and Frames
  // ===========================================================================

  /** Enter a function body (name) or the run body (null) */
  enterBody(fn: string | null): void {
    this.currentFunction = fn;
    this.frames = [fn === null ? "run" : "function"];
  }

  getFrames(): readonly FrameKind[] {
    return this.frames;
  }

  withFrame<T>(kind: FrameKind, fn: () => T): T {
    this.frames.push(kind);
    try {
      return fn();
    } finally {
      this.frames.pop();
    }
  }

  isLocal(name: string): boolean {
    return this.currentFunction !== null &&
      this.names.localsOf(this.currentFunction).has(name);
  }

  /** Go identifier of a local or global, or undefined for environment-only names */
  lookupVariable(name: string): string | undefined {
    if (this.currentFunction !== null) {
      const local = this.names.localsOf(this.currentFunction).get(name);
      if (local !== undefined) {
        return local;
      }
    }
    return this.names.globals.get(name);
  }

  functionName(name: string): string {
    const id = this.names.functions.get(name);
    if (id === undefined) {
      throw internalError(`function ${name} has no declaration`);
    }
    return id;
  }

  // ===========================================================================
  // Usage
  // ===========================================================================

  usePackage(path: string): string {
    this.usedImports.add(path);
    return packageName(path);
  }

  useHelper(name: HelperName): string {
    this.usedHelpers.add(name);
    return name;
  }

  getUsedImports(): ReadonlySet<string> {
    return this.usedImports;
  }

  getUsedHelpers(): ReadonlySet<HelperName> {
    return this.usedHelpers;
  }
}
