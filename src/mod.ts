/**
 * sh2go - transpile shell scripts to Go and build them into binaries
 *
 * @module
 */

// Core types, errors and config
export * from "./core/mod.js";

// Pipeline stages
export { parse } from "./syntax/parse.js";
export { buildProgram } from "./ir/builder.js";
export type { BuildResult } from "./ir/builder.js";
export * from "./ir/types.js";
export { generate, GoGenerator } from "./codegen/mod.js";
export type { GenerateOptions, GenerateResult } from "./codegen/mod.js";

// Conversion and build
export { convert } from "./convert.js";
export type { ConvertOptions, ConvertResult } from "./convert.js";
export { stageAndBuild } from "./compiler/build.js";
export type { BuildOptions, BuildOutcome } from "./compiler/build.js";
export { execaRunner } from "./compiler/runner.js";
export type { ToolResult, ToolRunner, ToolRunOptions } from "./compiler/runner.js";
